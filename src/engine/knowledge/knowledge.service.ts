// 적 정보 공개 — 처치 수 기반 티어, 전투 시작 시 고정되는 HP 표시 모드

import { Inject, Injectable } from '@nestjs/common';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import type { EnemyDefinition } from '../../content/content.types.js';
import {
  HP_VISIBILITY_MODE,
  isAlive,
  type BattleState,
  type Combatant,
  type EnemyKnowledgeView,
  type GameState,
  type HpRange,
  type HpVisibilityMode,
  type KnowledgeTier,
} from '../../types/index.js';

/** 정적 범위 폭 = maxHp 의 15% (최소 1) */
const STATIC_RANGE_SPREAD = 0.15;

function modeRank(mode: HpVisibilityMode): number {
  return HP_VISIBILITY_MODE.indexOf(mode);
}

@Injectable()
export class KnowledgeService {
  constructor(@Inject(COMBAT_CONTENT) private readonly content: CombatContent) {}

  resolveKnowledgeKey(def: Pick<EnemyDefinition, 'id' | 'knowledgeKey'>): string {
    return def.knowledgeKey ?? def.id;
  }

  /** 전투원 → 지식 키. 정의가 없으면 sourceId, 그마저 없으면 instanceId */
  knowledgeKeyOf(enemy: Combatant): string {
    const sourceId = enemy.sourceId;
    if (sourceId === undefined) return enemy.instanceId;
    if (!this.content.enemies.has(sourceId)) return sourceId;
    return this.resolveKnowledgeKey(this.content.enemies.get(sourceId));
  }

  // --- 처치 카운터 ---

  getKillCount(game: GameState, key: string): number {
    const count = game.knowledgeKillCounts[key.trim()] ?? 0;
    return Number.isInteger(count) && count > 0 ? count : 0;
  }

  /** 양수 증가분만 반영 */
  recordKills(game: GameState, killsByKey: Record<string, number>): void {
    for (const [rawKey, increment] of Object.entries(killsByKey)) {
      const key = rawKey.trim();
      if (!key || !Number.isInteger(increment) || increment <= 0) continue;
      game.knowledgeKillCounts[key] = this.getKillCount(game, key) + increment;
    }
  }

  setKillCount(game: GameState, key: string, value: number): number {
    const normalized = key.trim();
    if (!normalized) return 0;
    const next = Number.isInteger(value) ? Math.max(0, value) : 0;
    game.knowledgeKillCounts[normalized] = next;
    return next;
  }

  /** 0 미만으로 내려가지 않음 */
  addKillCount(game: GameState, key: string, delta: number): number {
    const normalized = key.trim();
    if (!normalized) return 0;
    const current = this.getKillCount(game, normalized);
    if (!Number.isInteger(delta)) return current;
    const total = Math.max(0, current + delta);
    game.knowledgeKillCounts[normalized] = total;
    return total;
  }

  // --- 티어 / 공개 모드 ---

  getTier(game: GameState, key: string): KnowledgeTier {
    const kills = this.getKillCount(game, key);
    const t = this.content.knowledgeRules().thresholds;
    if (kills >= t.tier3Kills) return 3;
    if (kills >= t.tier2Kills) return 2;
    if (kills >= t.tier1Kills) return 1;
    return 0;
  }

  getHpVisibility(tier: KnowledgeTier): HpVisibilityMode {
    return this.content.knowledgeRules().hpVisibilityByTier[tier];
  }

  /** RNG 없이 maxHp 로부터 계산 */
  staticRange(maxHp: number): HpRange {
    const spread = Math.max(1, Math.floor(maxHp * STATIC_RANGE_SPREAD));
    return { low: Math.max(1, maxHp - spread), high: maxHp + spread };
  }

  /** 전투 시작 시 1회. 이후 처치 수 변화는 refreshSnapshot 전까지 반영되지 않음 */
  buildSnapshot(battle: BattleState, game: GameState): void {
    const snapshot: Record<string, EnemyKnowledgeView> = {};
    for (const enemy of battle.enemies) {
      const knowledgeKey = this.knowledgeKeyOf(enemy);
      const tier = this.getTier(game, knowledgeKey);
      snapshot[enemy.instanceId] = {
        knowledgeKey,
        tier,
        hpMode: this.getHpVisibility(tier),
        staticRange: this.staticRange(enemy.stats.maxHp),
      };
    }
    battle.knowledgeSnapshot = snapshot;
  }

  refreshSnapshot(battle: BattleState, game: GameState): void {
    this.buildSnapshot(battle, game);
  }

  /** 스냅샷 모드와 임시 공개 중 높은 쪽 */
  effectiveHpMode(battle: BattleState, enemy: Combatant): HpVisibilityMode {
    const base = battle.knowledgeSnapshot[enemy.instanceId]?.hpMode ?? 'HIDDEN';
    const reveal = battle.temporaryReveals[enemy.instanceId];
    if (reveal !== undefined && modeRank(reveal) > modeRank(base)) return reveal;
    return base;
  }

  staticRangeOf(battle: BattleState, enemy: Combatant): HpRange {
    return (
      battle.knowledgeSnapshot[enemy.instanceId]?.staticRange ??
      this.staticRange(enemy.stats.maxHp)
    );
  }

  /** 이번 전투 한정으로 공개 수준을 올린다. 올라갔으면 true */
  revealTemporarily(
    battle: BattleState,
    enemy: Combatant,
    mode: HpVisibilityMode,
  ): boolean {
    if (modeRank(mode) <= modeRank(this.effectiveHpMode(battle, enemy))) return false;
    battle.temporaryReveals[enemy.instanceId] = mode;
    return true;
  }

  formatEnemyHp(battle: BattleState, enemy: Combatant): string {
    if (!isAlive(enemy)) return 'DOWN';
    switch (this.effectiveHpMode(battle, enemy)) {
      case 'HIDDEN':
        return '???';
      case 'STATIC_RANGE': {
        const range = this.staticRangeOf(battle, enemy);
        return `${range.low}-${range.high}`;
      }
      case 'REALTIME':
        return `${enemy.stats.hp}/${enemy.stats.maxHp}`;
    }
  }
}
