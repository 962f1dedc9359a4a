// 전투 진행 — 검증 → 변경 → 종료 판정 또는 턴 진행

import { Inject, Injectable, Logger } from '@nestjs/common';
import { CombatConfigService } from '../../common/config/combat-config.service.js';
import { ActionRejectedError } from '../../common/errors/game-errors.js';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import type { ItemDefinition, SkillDefinition } from '../../content/content.types.js';
import { KnowledgeService } from '../knowledge/knowledge.service.js';
import { PartyTalkService } from '../knowledge/party-talk.service.js';
import { InventoryService, type BattleInventoryItem } from '../rewards/inventory.service.js';
import type { Rng } from '../rng/rng.service.js';
import { DebuffService } from '../status/debuff.service.js';
import { SummonService } from '../summon/summon.service.js';
import { TurnSchedulerService } from '../turn/turn-scheduler.service.js';
import { BattleFactoryService, type BattleOptions } from './battle-factory.service.js';
import { DamageService } from './damage.service.js';
import { SkillService } from './skill.service.js';
import { ThreatService } from './threat.service.js';
import {
  findCombatant,
  isAlive,
  isSkillEffectKind,
  isSummon,
  type BattleEvent,
  type BattleState,
  type Combatant,
  type DebuffType,
  type GameState,
} from '../../types/index.js';

export interface StartBattleResult {
  battle: BattleState;
  events: BattleEvent[];
}

@Injectable()
export class CombatService {
  private readonly logger = new Logger(CombatService.name);

  constructor(
    @Inject(COMBAT_CONTENT) private readonly content: CombatContent,
    private readonly config: CombatConfigService,
    private readonly factory: BattleFactoryService,
    private readonly summons: SummonService,
    private readonly threat: ThreatService,
    private readonly turns: TurnSchedulerService,
    private readonly damage: DamageService,
    private readonly skills: SkillService,
    private readonly debuffs: DebuffService,
    private readonly knowledge: KnowledgeService,
    private readonly partyTalkService: PartyTalkService,
    private readonly inventory: InventoryService,
  ) {}

  startBattle(
    enemyOrGroupId: string,
    game: GameState,
    rng: Rng,
    options: BattleOptions = {},
  ): StartBattleResult {
    const { battle, event } = this.factory.createBattle(enemyOrGroupId, game, rng, options);
    this.threat.initialize(battle);
    const summonEvents = this.summons.spawnEquipped(battle, game, rng);
    this.turns.initialize(battle);
    this.knowledge.buildSnapshot(battle, game);

    this.logger.debug(
      `Battle ${battle.battleId} started: [${event.enemyNames.join(', ')}] level=${battle.battleLevel} summons=${summonEvents.length}`,
    );
    return { battle, events: [event, ...summonEvents] };
  }

  // --- 행동 ---

  basicAttack(battle: BattleState, attackerId: string, targetId: string): BattleEvent[] {
    const attacker = this.requireActor(battle, attackerId);
    const target = this.requireOpponent(battle, attacker, targetId);
    return this.finishAction(battle, attacker.instanceId, this.resolveAttack(battle, attacker, target));
  }

  useSkill(
    battle: BattleState,
    actorId: string,
    skillId: string,
    targetIds: readonly string[],
  ): BattleEvent[] {
    const actor = this.requireActor(battle, actorId);
    const events = this.skills.execute(battle, actor, skillId, targetIds);
    return this.finishAction(battle, actor.instanceId, events);
  }

  /**
   * 소모품 사용. 디버프가 이미 걸려 있어 효과가 없어도 아이템은 소모된다.
   */
  useItem(
    battle: BattleState,
    game: GameState,
    actorId: string,
    itemId: string,
    targetId: string,
  ): BattleEvent[] {
    const actor = this.requireActor(battle, actorId);
    const target = findCombatant(battle, targetId);
    if (!target) {
      throw new ActionRejectedError('unknown_combatant', undefined, { targetId });
    }
    if (!isAlive(target)) {
      throw new ActionRejectedError('target_not_alive', undefined, { targetId });
    }
    if (!this.content.items.has(itemId)) {
      throw new ActionRejectedError('unknown_item', `Unknown item '${itemId}'`, { itemId });
    }
    const item = this.content.items.get(itemId);
    if (item.kind !== 'consumable') {
      throw new ActionRejectedError('item_not_consumable', undefined, { itemId });
    }

    const debuff = this.itemDebuff(item);
    if (item.targeting === 'enemy' && debuff === null) {
      throw new ActionRejectedError('unsupported_targeting', undefined, { itemId });
    }
    const sideOk =
      item.targeting === 'self'
        ? target.instanceId === actor.instanceId
        : item.targeting === 'ally'
          ? target.side === actor.side
          : target.side !== actor.side;
    if (!sideOk) {
      throw new ActionRejectedError('invalid_target_side', undefined, {
        itemId,
        targetId,
        targeting: item.targeting,
      });
    }
    if (!this.inventory.removeItem(game, itemId, 1)) {
      throw new ActionRejectedError('item_not_available', undefined, { itemId });
    }

    const events: BattleEvent[] = [];
    if (debuff !== null) {
      const expiresAtRound = battle.roundIndex + this.config.get().debuffDurationRounds;
      const applied = this.debuffs.applyNoStack(target, debuff.type, debuff.amount, expiresAtRound);
      events.push({
        type: 'item_used',
        userId: actor.instanceId,
        userName: actor.name,
        targetId: target.instanceId,
        targetName: target.name,
        itemId: item.id,
        itemName: item.name,
        hpDelta: 0,
        mpDelta: 0,
        hadEffect: applied,
      });
      if (applied) {
        events.push({
          type: 'debuff_applied',
          targetId: target.instanceId,
          targetName: target.name,
          debuffType: debuff.type,
          amount: debuff.amount,
          expiresAtRound,
        });
      }
    } else {
      const hpBefore = target.stats.hp;
      const mpBefore = target.stats.mp;
      target.stats.hp = Math.min(target.stats.maxHp, hpBefore + item.healHp);
      target.stats.mp = Math.min(target.stats.maxMp, mpBefore + item.healMp);
      const hpDelta = target.stats.hp - hpBefore;
      const mpDelta = target.stats.mp - mpBefore;
      events.push({
        type: 'item_used',
        userId: actor.instanceId,
        userName: actor.name,
        targetId: target.instanceId,
        targetName: target.name,
        itemId: item.id,
        itemName: item.name,
        hpDelta,
        mpDelta,
        hadEffect: hpDelta > 0 || mpDelta > 0,
      });
    }
    return this.finishAction(battle, actor.instanceId, events);
  }

  /** 현재 행동자의 턴을 써서 동료(speaker)가 적 정보를 말한다 */
  partyTalk(battle: BattleState, actorId: string, speakerId: string): BattleEvent[] {
    const actor = this.requireActor(battle, actorId);
    const speaker = this.requireSpeaker(battle, actor, speakerId);
    const result = this.partyTalkService.talk(battle, speaker);
    const events: BattleEvent[] = [
      {
        type: 'party_talk',
        speakerId: speaker.instanceId,
        speakerName: speaker.name,
        text: result.text,
        revealedEnemyIds: result.revealEnemyIds,
      },
    ];
    return this.finishAction(battle, actor.instanceId, events);
  }

  // --- AI ---

  /** 위협도 타겟 → 첫 번째로 감당 가능한 단일 대상 피해 스킬, 없으면 기본 공격 */
  runEnemyTurn(battle: BattleState, rng: Rng): BattleEvent[] {
    const actor = this.requireActor(battle, battle.currentActorId ?? '');
    if (actor.side !== 'enemies') {
      throw new ActionRejectedError('not_actor_turn', 'Current actor is not an enemy', {
        currentActorId: actor.instanceId,
      });
    }

    const selection = this.threat.selectEnemyTarget(battle, actor, rng);
    if (!selection) return this.finishAction(battle, actor.instanceId, []);

    const events: BattleEvent[] = [
      {
        type: 'enemy_targeted',
        attackerId: actor.instanceId,
        targetId: selection.target.instanceId,
        threat: selection.threat,
        antiRepeatApplied: selection.antiRepeatApplied,
      },
    ];

    const skill = this.skills
      .getAvailableSkills(actor)
      .find(
        (s) =>
          s.targetMode === 'single_enemy' &&
          s.effectType === 'damage' &&
          this.skills.canAfford(actor, s),
      );
    if (skill) {
      events.push(...this.skills.execute(battle, actor, skill.id, [selection.target.instanceId]));
    } else {
      events.push(...this.resolveAttack(battle, actor, selection.target));
    }
    return this.finishAction(battle, actor.instanceId, events);
  }

  /** 아군 AI — 유효 타겟이 있는 첫 스킬, 없으면 최상위 위협 적에게 기본 공격 */
  runAllyAiTurn(battle: BattleState, rng: Rng): BattleEvent[] {
    const actor = this.requireActor(battle, battle.currentActorId ?? '');
    if (actor.side !== 'allies') {
      throw new ActionRejectedError('not_actor_turn', 'Current actor is not an ally', {
        currentActorId: actor.instanceId,
      });
    }
    if (!battle.enemies.some(isAlive)) return this.finishAction(battle, actor.instanceId, []);

    for (const skill of this.skills.getAvailableSkills(actor)) {
      if (!this.skills.canAfford(actor, skill) || !isSkillEffectKind(skill.effectType)) continue;
      const targetIds = this.selectAiSkillTargets(battle, actor, skill, rng);
      if (targetIds === null) continue;
      const events = this.skills.execute(battle, actor, skill.id, targetIds);
      return this.finishAction(battle, actor.instanceId, events);
    }

    const [target] = this.threat.orderEnemiesForAlly(battle, actor, rng);
    return this.finishAction(battle, actor.instanceId, this.resolveAttack(battle, actor, target));
  }

  // --- 조회 (순수) ---

  getAvailableSkills(battle: BattleState, combatantId: string): SkillDefinition[] {
    return this.skills.getAvailableSkills(this.requireCombatant(battle, combatantId));
  }

  getBattleItems(game: GameState): BattleInventoryItem[] {
    return this.inventory.getBattleItems(game);
  }

  /** RNG, HP, 가드 모두 불변 */
  estimateDamage(
    battle: BattleState,
    attackerId: string,
    targetId: string,
    skillId?: string,
  ): number {
    const attacker = this.requireCombatant(battle, attackerId);
    const target = this.requireCombatant(battle, targetId);
    if (skillId === undefined) return this.skills.estimate(attacker, target);
    if (!this.content.skills.has(skillId)) {
      throw new ActionRejectedError('unknown_skill', `Unknown skill '${skillId}'`, { skillId });
    }
    return this.skills.estimate(attacker, target, this.content.skills.get(skillId));
  }

  // --- 내부 ---

  private resolveAttack(
    battle: BattleState,
    attacker: Combatant,
    target: Combatant,
  ): BattleEvent[] {
    const result = this.damage.resolve(battle, attacker, target);
    const events: BattleEvent[] = [
      {
        type: 'attack_resolved',
        attackerId: attacker.instanceId,
        attackerName: attacker.name,
        targetId: target.instanceId,
        targetName: target.name,
        damage: result.damage,
        absorbed: result.absorbed,
        targetHp: result.targetHp,
      },
    ];
    if (result.defeated) {
      events.push({
        type: 'combatant_defeated',
        combatantId: target.instanceId,
        combatantName: target.name,
        side: target.side,
      });
    }
    return events;
  }

  private selectAiSkillTargets(
    battle: BattleState,
    actor: Combatant,
    skill: SkillDefinition,
    rng: Rng,
  ): string[] | null {
    switch (skill.targetMode) {
      case 'self':
        return [];
      case 'single_enemy': {
        const [target] = this.threat.orderEnemiesForAlly(battle, actor, rng);
        return target ? [target.instanceId] : null;
      }
      case 'multi_enemy': {
        if (battle.enemies.filter(isAlive).length < 2) return null;
        const targets = this.threat.selectAllyTargets(battle, actor, skill.maxTargets, rng);
        return targets.length >= 2 ? targets.map((t) => t.instanceId) : null;
      }
    }
  }

  private itemDebuff(item: ItemDefinition): { type: DebuffType; amount: number } | null {
    if (item.debuffAttackFlat > 0) return { type: 'attack_down', amount: item.debuffAttackFlat };
    if (item.debuffDefenseFlat > 0) return { type: 'defense_down', amount: item.debuffDefenseFlat };
    return null;
  }

  private finishAction(battle: BattleState, actorId: string, events: BattleEvent[]): BattleEvent[] {
    const resolved = this.turns.checkBattleEnd(battle);
    if (resolved) {
      this.logger.debug(`Battle ${battle.battleId} resolved: victor=${resolved.victor}`);
      events.push(resolved);
      return events;
    }
    events.push(...this.turns.advanceTurn(battle, actorId));
    return events;
  }

  private requireCombatant(battle: BattleState, id: string): Combatant {
    const combatant = findCombatant(battle, id);
    if (!combatant) {
      throw new ActionRejectedError('unknown_combatant', undefined, { combatantId: id });
    }
    return combatant;
  }

  /** 종료 여부 → 존재 → 차례 → 생존 순으로 검증 */
  private requireActor(battle: BattleState, actorId: string): Combatant {
    if (battle.isOver) {
      throw new ActionRejectedError('battle_over', undefined, { battleId: battle.battleId });
    }
    const actor = this.requireCombatant(battle, actorId);
    if (battle.currentActorId !== actor.instanceId) {
      throw new ActionRejectedError('not_actor_turn', undefined, {
        actorId,
        currentActorId: battle.currentActorId,
      });
    }
    if (!isAlive(actor)) {
      throw new ActionRejectedError('actor_not_alive', undefined, { actorId });
    }
    return actor;
  }

  private requireOpponent(battle: BattleState, actor: Combatant, targetId: string): Combatant {
    const target = this.requireCombatant(battle, targetId);
    if (target.side === actor.side) {
      throw new ActionRejectedError('invalid_target_side', undefined, { targetId });
    }
    if (!isAlive(target)) {
      throw new ActionRejectedError('target_not_alive', undefined, { targetId });
    }
    return target;
  }

  /** 살아있는 아군 동료만 (소환수 제외) */
  private requireSpeaker(battle: BattleState, actor: Combatant, speakerId: string): Combatant {
    const speaker = this.requireCombatant(battle, speakerId);
    if (speaker.side !== actor.side || isSummon(speaker)) {
      throw new ActionRejectedError('invalid_target_side', undefined, { speakerId });
    }
    if (!isAlive(speaker)) {
      throw new ActionRejectedError('target_not_alive', undefined, { speakerId });
    }
    return speaker;
  }
}
