// 전투 이벤트 — 표현 계층이 type 으로 exhaustive match 한다

import type { DebuffType, Side } from './enums.js';

type EventOf<T extends string, P> = Readonly<{ type: T } & P>;

export type BattleStartedEvent = EventOf<'battle_started', {
  battleId: string;
  enemyNames: readonly string[];
  battleLevel: number;
}>;

export type SummonSpawnedEvent = EventOf<'summon_spawned', {
  ownerId: string;
  summonId: string;
  instanceId: string;
  name: string;
  bondCost: number;
  ownerBond: number;
}>;

export type EnemyTargetedEvent = EventOf<'enemy_targeted', {
  attackerId: string;
  targetId: string;
  threat: number;
  antiRepeatApplied: boolean;
}>;

export type AttackResolvedEvent = EventOf<'attack_resolved', {
  attackerId: string;
  attackerName: string;
  targetId: string;
  targetName: string;
  damage: number;
  absorbed: number;
  targetHp: number;
}>;

export type SkillUsedEvent = EventOf<'skill_used', {
  attackerId: string;
  attackerName: string;
  skillId: string;
  skillName: string;
  targetId: string;
  targetName: string;
  damage: number;
  absorbed: number;
  targetHp: number;
}>;

export type SkillFailedEvent = EventOf<'skill_failed', {
  combatantId: string;
  combatantName: string;
  skillId: string;
  reason: string;
}>;

export type GuardAppliedEvent = EventOf<'guard_applied', {
  combatantId: string;
  combatantName: string;
  amount: number;
}>;

export type ItemUsedEvent = EventOf<'item_used', {
  userId: string;
  userName: string;
  targetId: string;
  targetName: string;
  itemId: string;
  itemName: string;
  hpDelta: number;
  mpDelta: number;
  hadEffect: boolean;
}>;

export type DebuffAppliedEvent = EventOf<'debuff_applied', {
  targetId: string;
  targetName: string;
  debuffType: DebuffType;
  amount: number;
  expiresAtRound: number;
}>;

export type DebuffExpiredEvent = EventOf<'debuff_expired', {
  targetId: string;
  targetName: string;
  debuffType: DebuffType;
}>;

export type CombatantDefeatedEvent = EventOf<'combatant_defeated', {
  combatantId: string;
  combatantName: string;
  side: Side;
}>;

export type PartyTalkEvent = EventOf<'party_talk', {
  speakerId: string;
  speakerName: string;
  text: string;
  revealedEnemyIds: readonly string[];
}>;

export type RoundStartedEvent = EventOf<'round_started', {
  roundIndex: number;
}>;

export type GoldGrantedEvent = EventOf<'gold_granted', {
  amount: number;
  totalGold: number;
}>;

export type ExpGrantedEvent = EventOf<'exp_granted', {
  memberId: string;
  memberName: string;
  amount: number;
  level: number;
}>;

export type LevelUpEvent = EventOf<'level_up', {
  memberId: string;
  memberName: string;
  newLevel: number;
}>;

export type LootAcquiredEvent = EventOf<'loot_acquired', {
  itemId: string;
  itemName: string;
  quantity: number;
}>;

export type BattleResolvedEvent = EventOf<'battle_resolved', {
  victor: Side;
}>;

export type BattleEvent =
  | BattleStartedEvent
  | SummonSpawnedEvent
  | EnemyTargetedEvent
  | AttackResolvedEvent
  | SkillUsedEvent
  | SkillFailedEvent
  | GuardAppliedEvent
  | ItemUsedEvent
  | DebuffAppliedEvent
  | DebuffExpiredEvent
  | CombatantDefeatedEvent
  | PartyTalkEvent
  | RoundStartedEvent
  | GoldGrantedEvent
  | ExpGrantedEvent
  | LevelUpEvent
  | LootAcquiredEvent
  | BattleResolvedEvent;

export type BattleEventType = BattleEvent['type'];
