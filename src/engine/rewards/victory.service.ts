// 전투 결과 적용 — 승리 보상(골드/경험치/레벨업/처치 기록/전리품)과 패배 처리. 전투당 1회

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import type { LootTableDefinition } from '../../content/content.types.js';
import { KnowledgeService } from '../knowledge/knowledge.service.js';
import type { Rng } from '../rng/rng.service.js';
import { GameStateService } from '../state/game-state.service.js';
import { InventoryService } from './inventory.service.js';
import {
  isAlive,
  type BattleEvent,
  type BattleState,
  type Combatant,
  type GameState,
} from '../../types/index.js';

export function xpToNext(level: number): number {
  return 10 + (level - 1) * 5;
}

export function lootTableMatches(
  table: Pick<LootTableDefinition, 'requiredTags' | 'forbiddenTags'>,
  enemyTags: readonly string[],
): boolean {
  if (!table.requiredTags.every((t) => enemyTags.includes(t))) return false;
  return !table.forbiddenTags.some((t) => enemyTags.includes(t));
}

@Injectable()
export class VictoryService {
  private readonly logger = new Logger(VictoryService.name);

  constructor(
    @Inject(COMBAT_CONTENT) private readonly content: CombatContent,
    private readonly knowledge: KnowledgeService,
    private readonly inventory: InventoryService,
    private readonly gameState: GameStateService,
  ) {}

  /** 플레이어 + 파티원 순 */
  activePartyIds(game: GameState): string[] {
    return [...(game.player ? [game.player.id] : []), ...game.partyMembers];
  }

  /**
   * 아군 승리 시 1회만 적용. 두 번째 호출은 변경 없이 [].
   * 전리품 테이블이 하나도 맞지 않으면 RNG 를 소비하지 않는다.
   */
  applyVictoryRewards(battle: BattleState, game: GameState, rng: Rng): BattleEvent[] {
    const player = game.player;
    if (battle.outcomeApplied || !battle.isOver || battle.victor !== 'allies' || !player) {
      return [];
    }
    battle.outcomeApplied = true;

    const combatant = battle.allies.find((c) => c.instanceId === player.id);
    if (combatant) {
      player.stats.hp = Math.min(combatant.stats.hp, player.stats.maxHp);
      player.stats.mp = Math.min(combatant.stats.mp, player.stats.maxMp);
    }
    this.gameState.restorePartyResources(game, { hp: false, mp: true });
    game.flags.lastBattleDefeat = false;

    const defeated = battle.enemies.filter(
      (e) => !isAlive(e) && e.sourceId !== undefined && this.content.enemies.has(e.sourceId),
    );
    const events: BattleEvent[] = [];

    let gold = 0;
    let exp = 0;
    for (const enemy of defeated) {
      const def = this.content.enemies.get(enemy.sourceId ?? '');
      gold += def.rewardsGold;
      exp += def.rewardsExp;
    }

    if (gold > 0) {
      const totalGold = this.inventory.adjustGold(game, gold);
      events.push({ type: 'gold_granted', amount: gold, totalGold });
    }

    if (exp > 0) {
      const participants = this.activePartyIds(game);
      const share = Math.floor(exp / participants.length);
      const remainder = exp % participants.length;
      for (const memberId of participants) {
        const amount = memberId === player.id ? share + remainder : share;
        events.push(...this.awardExp(game, memberId, amount));
      }
    }

    const kills: Record<string, number> = {};
    for (const enemy of defeated) {
      const key = this.knowledge.knowledgeKeyOf(enemy);
      kills[key] = (kills[key] ?? 0) + 1;
    }
    this.knowledge.recordKills(game, kills);

    for (const enemy of defeated) {
      events.push(...this.rollLoot(enemy, game, rng));
    }

    this.logger.debug(
      `Victory rewards for ${battle.battleId}: gold=${gold} exp=${exp} kills=${defeated.length}`,
    );
    return events;
  }

  /** 패배 플래그 설정 + 파티 HP/MP 회복. 이미 적용됐으면 false */
  applyDefeat(battle: BattleState, game: GameState): boolean {
    if (battle.outcomeApplied || !battle.isOver || battle.victor !== 'enemies') return false;
    battle.outcomeApplied = true;
    game.flags.lastBattleDefeat = true;
    this.gameState.restorePartyResources(game, { hp: true, mp: true });
    this.logger.debug(`Defeat applied for ${battle.battleId}`);
    return true;
  }

  /** 레벨업마다 HP/MP 전부 회복, 플레이어는 스탯 재계산 */
  awardExp(game: GameState, memberId: string, amount: number): BattleEvent[] {
    if (amount <= 0) return [];
    let level = game.memberLevels[memberId] ?? 1;
    let current = (game.memberExp[memberId] ?? 0) + amount;
    const reached: number[] = [];
    while (current >= xpToNext(level)) {
      current -= xpToNext(level);
      level += 1;
      reached.push(level);
    }
    game.memberLevels[memberId] = level;
    game.memberExp[memberId] = current;

    const memberName = this.memberName(game, memberId);
    const events: BattleEvent[] = [
      { type: 'exp_granted', memberId, memberName, amount, level },
      ...reached.map((newLevel): BattleEvent => ({
        type: 'level_up',
        memberId,
        memberName,
        newLevel,
      })),
    ];
    if (reached.length > 0 && game.player?.id === memberId) {
      this.gameState.recalculatePlayerStats(game);
      this.gameState.restorePartyResources(game, { hp: true, mp: true });
    }
    return events;
  }

  private rollLoot(enemy: Combatant, game: GameState, rng: Rng): BattleEvent[] {
    const events: BattleEvent[] = [];
    for (const table of this.content.lootTables.all()) {
      if (!lootTableMatches(table, enemy.tags)) continue;
      for (const drop of table.drops) {
        const roll = rng.next();
        if (roll > drop.chance) continue;
        const quantity =
          drop.minQty === drop.maxQty ? drop.minQty : rng.range(drop.minQty, drop.maxQty);
        if (quantity <= 0) continue;
        this.inventory.addItem(game, drop.itemId, quantity);
        events.push({
          type: 'loot_acquired',
          itemId: drop.itemId,
          itemName: this.content.items.has(drop.itemId)
            ? this.content.items.get(drop.itemId).name
            : drop.itemId,
          quantity,
        });
      }
    }
    return events;
  }

  private memberName(game: GameState, memberId: string): string {
    if (game.player?.id === memberId) return game.player.name;
    if (this.content.partyMembers.has(memberId)) return this.content.partyMembers.get(memberId).name;
    return memberId;
  }
}
