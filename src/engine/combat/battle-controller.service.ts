// 표현 계층용 파사드 — 구조화된 상태/행동만 노출. 출력, 입력 대기 없음

import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { ActionRejectedError } from '../../common/errors/game-errors.js';
import type { SkillDefinition } from '../../content/content.types.js';
import { KnowledgeService } from '../knowledge/knowledge.service.js';
import { PartyTalkService, type PartyTalkResult } from '../knowledge/party-talk.service.js';
import type { BattleInventoryItem } from '../rewards/inventory.service.js';
import { VictoryService } from '../rewards/victory.service.js';
import type { Rng } from '../rng/rng.service.js';
import { CombatService } from './combat.service.js';
import {
  findCombatant,
  isAlive,
  isSummon,
  type ActiveDebuff,
  type BattleEvent,
  type BattleState,
  type Combatant,
  type GameState,
  type Side,
} from '../../types/index.js';

const PlayerActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('attack'), targetId: z.string().min(1) }),
  z.object({
    type: z.literal('skill'),
    skillId: z.string().min(1),
    targetIds: z.array(z.string().min(1)),
  }),
  z.object({ type: z.literal('talk'), speakerId: z.string().min(1) }),
  z.object({
    type: z.literal('item'),
    itemId: z.string().min(1),
    targetId: z.string().min(1),
  }),
]);

export type PlayerAction = z.infer<typeof PlayerActionSchema>;

export interface CombatantView {
  instanceId: string;
  name: string;
  side: Side;
  /** 아군은 `hp/max`, 적은 지식 티어에 따라 `???` / `low-high` / `hp/max` */
  hpDisplay: string;
  mp: number;
  maxMp: number;
  alive: boolean;
  summon: boolean;
  guardReduction: number;
  debuffs: ActiveDebuff[];
}

export interface BattleView {
  battleId: string;
  roundIndex: number;
  currentActorId: string | null;
  allies: CombatantView[];
  enemies: CombatantView[];
  isOver: boolean;
  victor: Side | null;
}

export interface AvailableActions {
  canAttack: boolean;
  canUseSkill: boolean;
  canUseItem: boolean;
  canTalk: boolean;
  skills: SkillDefinition[];
  items: BattleInventoryItem[];
}

const NO_ACTIONS: AvailableActions = {
  canAttack: false,
  canUseSkill: false,
  canUseItem: false,
  canTalk: false,
  skills: [],
  items: [],
};

@Injectable()
export class BattleControllerService {
  constructor(
    private readonly combat: CombatService,
    private readonly victory: VictoryService,
    private readonly knowledge: KnowledgeService,
    private readonly partyTalk: PartyTalkService,
  ) {}

  getView(battle: BattleState): BattleView {
    return {
      battleId: battle.battleId,
      roundIndex: battle.roundIndex,
      currentActorId: battle.currentActorId,
      allies: battle.allies.map((c) => this.toView(c, `${c.stats.hp}/${c.stats.maxHp}`)),
      enemies: battle.enemies.map((c) => this.toView(c, this.knowledge.formatEnemyHp(battle, c))),
      isOver: battle.isOver,
      victor: battle.victor,
    };
  }

  isPlayerTurn(battle: BattleState, game: GameState): boolean {
    const actorId = battle.currentActorId;
    return actorId !== null && actorId === game.player?.id;
  }

  isAllyAiTurn(battle: BattleState, game: GameState): boolean {
    const actorId = battle.currentActorId;
    if (actorId === null || this.isPlayerTurn(battle, game)) return false;
    return battle.allies.some((c) => c.instanceId === actorId);
  }

  isEnemyTurn(battle: BattleState): boolean {
    const actorId = battle.currentActorId;
    if (actorId === null) return false;
    return battle.enemies.some((c) => c.instanceId === actorId);
  }

  getAvailableActions(battle: BattleState, game: GameState): AvailableActions {
    const actorId = battle.currentActorId;
    if (actorId === null || battle.isOver) return NO_ACTIONS;
    const skills = this.combat.getAvailableSkills(battle, actorId);
    const items = this.combat.getBattleItems(game);
    return {
      canAttack: true,
      canUseSkill: skills.length > 0,
      canUseItem: items.length > 0,
      canTalk: game.partyMembers.length > 0,
      skills,
      items,
    };
  }

  /**
   * 현재 행동자(플레이어)로서 행동 적용. 필드가 빠진 입력은 missing_action_field,
   * 동료 AI나 적의 차례면 not_player_turn 으로 거부
   */
  applyPlayerAction(battle: BattleState, game: GameState, input: PlayerAction): BattleEvent[] {
    const parsed = PlayerActionSchema.safeParse(input);
    if (!parsed.success) {
      throw new ActionRejectedError('missing_action_field', 'Malformed battle action', {
        issues: parsed.error.issues,
      });
    }
    const actorId = battle.currentActorId;
    if (actorId === null) {
      throw new ActionRejectedError(battle.isOver ? 'battle_over' : 'not_actor_turn');
    }
    if (!this.isPlayerTurn(battle, game)) {
      throw new ActionRejectedError('not_player_turn', undefined, { actorId });
    }

    const action = parsed.data;
    switch (action.type) {
      case 'attack':
        return this.combat.basicAttack(battle, actorId, action.targetId);
      case 'skill':
        return this.combat.useSkill(battle, actorId, action.skillId, action.targetIds);
      case 'talk':
        return this.combat.partyTalk(battle, actorId, action.speakerId);
      case 'item':
        return this.combat.useItem(battle, game, actorId, action.itemId, action.targetId);
    }
  }

  runAllyAiTurn(battle: BattleState, rng: Rng): BattleEvent[] {
    if (battle.currentActorId === null) return [];
    return this.combat.runAllyAiTurn(battle, rng);
  }

  runEnemyTurn(battle: BattleState, rng: Rng): BattleEvent[] {
    if (battle.currentActorId === null) return [];
    return this.combat.runEnemyTurn(battle, rng);
  }

  applyVictoryRewards(battle: BattleState, game: GameState, rng: Rng): BattleEvent[] {
    return this.victory.applyVictoryRewards(battle, game, rng);
  }

  applyDefeat(battle: BattleState, game: GameState): boolean {
    return this.victory.applyDefeat(battle, game);
  }

  /** 상태 변경 없음 */
  previewPartyTalk(battle: BattleState, speakerId: string): PartyTalkResult {
    const speaker = findCombatant(battle, speakerId);
    if (!speaker) {
      throw new ActionRejectedError('unknown_combatant', undefined, { speakerId });
    }
    return this.partyTalk.preview(battle, speaker);
  }

  hasKnowledgeOfEnemy(game: GameState, enemyTags: readonly string[]): boolean {
    return this.partyTalk.partyHasKnowledge(game, enemyTags);
  }

  estimateDamage(
    battle: BattleState,
    attackerId: string,
    targetId: string,
    skillId?: string,
  ): number {
    return this.combat.estimateDamage(battle, attackerId, targetId, skillId);
  }

  refreshKnowledgeSnapshot(battle: BattleState, game: GameState): void {
    this.knowledge.refreshSnapshot(battle, game);
  }

  /** 첫 턴과 플레이어 턴에만 전체 상태 패널 */
  shouldRenderStatePanel(battle: BattleState, game: GameState, isFirstTurn: boolean): boolean {
    return isFirstTurn || this.isPlayerTurn(battle, game);
  }

  private toView(c: Combatant, hpDisplay: string): CombatantView {
    return {
      instanceId: c.instanceId,
      name: c.name,
      side: c.side,
      hpDisplay,
      mp: c.stats.mp,
      maxMp: c.stats.maxMp,
      alive: isAlive(c),
      summon: isSummon(c),
      guardReduction: c.guardReduction,
      debuffs: c.debuffs.map((d) => ({ ...d })),
    };
  }
}
