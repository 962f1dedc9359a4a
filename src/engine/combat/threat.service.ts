// 위협도(aggro) — 적 AI 타겟 선택 + 아군 AI 타겟 순서

import { Injectable } from '@nestjs/common';
import { CombatConfigService } from '../../common/config/combat-config.service.js';
import type { Rng } from '../rng/rng.service.js';
import {
  isAlive,
  type BattleState,
  type Combatant,
  type ThreatTable,
} from '../../types/index.js';

export interface EnemyTargetSelection {
  target: Combatant;
  threat: number;
  /** 직전 타겟을 피해 차순위로 전환했는지 */
  antiRepeatApplied: boolean;
}

function rowOf(table: ThreatTable, id: string): Record<string, number> {
  let row = table[id];
  if (!row) {
    row = {};
    table[id] = row;
  }
  return row;
}

@Injectable()
export class ThreatService {
  constructor(private readonly config: CombatConfigService) {}

  /** (maxHp + DEF) / divisor, 최소 1. 플레이어는 보너스 */
  baseThreat(battle: BattleState, target: Combatant): number {
    const { aggroBaseDivisor, playerBaseThreatBonus } = this.config.get();
    const base = Math.max(
      1,
      Math.floor((target.stats.maxHp + target.stats.defense) / aggroBaseDivisor),
    );
    return target.instanceId === battle.playerId ? base + playerBaseThreatBonus : base;
  }

  initialize(battle: BattleState): void {
    battle.enemyAggro = {};
    battle.partyThreat = {};
    battle.lastTarget = {};
    for (const enemy of battle.enemies) {
      battle.lastTarget[enemy.instanceId] = null;
    }
    for (const ally of battle.allies) {
      this.seedAlly(battle, ally);
    }
  }

  /** 전투 중 합류한 아군(소환수)의 위협도 초기화 */
  seedAlly(battle: BattleState, ally: Combatant): void {
    if (!isAlive(ally)) return;
    const allyRow = rowOf(battle.partyThreat, ally.instanceId);
    for (const enemy of battle.enemies) {
      if (!isAlive(enemy)) continue;
      const aggroRow = rowOf(battle.enemyAggro, enemy.instanceId);
      aggroRow[ally.instanceId] ??= this.baseThreat(battle, ally);
      allyRow[enemy.instanceId] ??= this.baseThreat(battle, enemy);
    }
  }

  /** 아군 → 적 피해만 기록. 소환수 피해는 소환수 자신에게 귀속 */
  recordDamage(
    battle: BattleState,
    attacker: Combatant,
    target: Combatant,
    damage: number,
  ): void {
    if (damage <= 0) return;
    if (attacker.side !== 'allies' || target.side !== 'enemies') return;
    const increment = damage + this.config.get().aggroHitBonus;

    const aggroRow = rowOf(battle.enemyAggro, target.instanceId);
    aggroRow[attacker.instanceId] =
      (aggroRow[attacker.instanceId] ?? this.baseThreat(battle, attacker)) + increment;

    const allyRow = rowOf(battle.partyThreat, attacker.instanceId);
    allyRow[target.instanceId] =
      (allyRow[target.instanceId] ?? this.baseThreat(battle, target)) + increment;
  }

  /**
   * 최고 위협도 아군 선택. 직전 타겟이 최고 그룹에 있고 차순위와의 격차가
   * ignore-gap 미만이면 차순위 그룹으로 전환. 남은 후보 동률만 RNG 사용.
   */
  selectEnemyTarget(
    battle: BattleState,
    enemy: Combatant,
    rng: Rng,
  ): EnemyTargetSelection | null {
    const living = battle.allies.filter(isAlive);
    if (living.length === 0) return null;

    const row = rowOf(battle.enemyAggro, enemy.instanceId);
    for (const ally of living) {
      row[ally.instanceId] ??= this.baseThreat(battle, ally);
    }
    const threatOf = (c: Combatant): number => row[c.instanceId] ?? 0;

    const top = Math.max(...living.map(threatOf));
    let candidates = living.filter((c) => threatOf(c) === top);
    let antiRepeatApplied = false;

    const lastId = battle.lastTarget[enemy.instanceId] ?? null;
    if (
      lastId !== null &&
      living.length > 1 &&
      candidates.some((c) => c.instanceId === lastId)
    ) {
      const others = living.filter((c) => c.instanceId !== lastId);
      const second = Math.max(...others.map(threatOf));
      if (top - second < this.config.get().antiRepeatIgnoreGap) {
        candidates = others.filter((c) => threatOf(c) === second);
        antiRepeatApplied = true;
      } else {
        candidates = living.filter((c) => c.instanceId === lastId);
      }
    }

    const target =
      candidates.length === 1
        ? candidates[0]
        : candidates[rng.range(0, candidates.length - 1)];
    battle.lastTarget[enemy.instanceId] = target.instanceId;
    return { target, threat: threatOf(target), antiRepeatApplied };
  }

  /** 살아있는 적을 위협도 내림차순으로. 동률 그룹은 셔플 */
  orderEnemiesForAlly(
    battle: BattleState,
    ally: Combatant,
    rng: Rng,
  ): Combatant[] {
    const living = battle.enemies.filter(isAlive);
    const row = rowOf(battle.partyThreat, ally.instanceId);
    for (const enemy of living) {
      row[enemy.instanceId] ??= this.baseThreat(battle, enemy);
    }

    const groups = new Map<number, Combatant[]>();
    for (const enemy of living) {
      const value = row[enemy.instanceId] ?? 0;
      const group = groups.get(value);
      if (group) group.push(enemy);
      else groups.set(value, [enemy]);
    }

    const ordered: Combatant[] = [];
    for (const value of [...groups.keys()].sort((a, b) => b - a)) {
      const group = groups.get(value) ?? [];
      if (group.length > 1) rng.shuffle(group);
      ordered.push(...group);
    }
    return ordered;
  }

  /** 광역 스킬용 상위 N */
  selectAllyTargets(
    battle: BattleState,
    ally: Combatant,
    count: number,
    rng: Rng,
  ): Combatant[] {
    return this.orderEnemiesForAlly(battle, ally, rng).slice(0, Math.max(0, count));
  }
}
