import type { HpVisibilityMode, KnowledgeTier, Side } from './enums.js';
import type { Combatant } from './combatant.js';

export type HpRange = { low: number; high: number };

/** 전투 시작 시점에 고정되는 적 1체의 정보 공개 결정 */
export type EnemyKnowledgeView = {
  knowledgeKey: string;
  tier: KnowledgeTier;
  hpMode: HpVisibilityMode;
  staticRange: HpRange;
};

export type ThreatTable = Record<string, Record<string, number>>;

export type BattleState = {
  battleId: string;
  playerId: string | null;
  allies: Combatant[];
  enemies: Combatant[];
  turnQueue: string[];
  currentActorId: string | null;
  roundIndex: number;
  /** enemy id → { ally id → threat } */
  enemyAggro: ThreatTable;
  /** ally id → { enemy id → threat } (아군 AI 스킬 타겟용) */
  partyThreat: ThreatTable;
  lastTarget: Record<string, string | null>;
  knowledgeSnapshot: Record<string, EnemyKnowledgeView>;
  /** 이번 전투 한정 공개 (영구 카운터에 기록되지 않음) */
  temporaryReveals: Record<string, HpVisibilityMode>;
  battleLevel: number;
  isOver: boolean;
  victor: Side | null;
  /** 승리 보상 / 패배 처리가 이미 적용되었는지 */
  outcomeApplied: boolean;
};

export function allCombatants(battle: BattleState): Combatant[] {
  return [...battle.allies, ...battle.enemies];
}

export function findCombatant(
  battle: BattleState,
  instanceId: string,
): Combatant | undefined {
  return allCombatants(battle).find((c) => c.instanceId === instanceId);
}
