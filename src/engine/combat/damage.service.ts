// 피해 계산 — max(최소치, 유효ATK + 보너스 − 유효DEF), 가드가 먼저 흡수

import { Injectable } from '@nestjs/common';
import { CombatConfigService } from '../../common/config/combat-config.service.js';
import { DebuffService } from '../status/debuff.service.js';
import { StatsService } from '../stats/stats.service.js';
import { ThreatService } from './threat.service.js';
import { isAlive, type BattleState, type Combatant } from '../../types/index.js';

export interface DamageResult {
  /** 가드 흡수 후 실제 적용된 피해 */
  damage: number;
  absorbed: number;
  targetHp: number;
  defeated: boolean;
}

@Injectable()
export class DamageService {
  constructor(
    private readonly config: CombatConfigService,
    private readonly stats: StatsService,
    private readonly debuffs: DebuffService,
    private readonly threat: ThreatService,
  ) {}

  /** 행동 공격력 − attack_down 합 (최소 1) */
  effectiveAttack(attacker: Combatant, skillTags?: readonly string[]): number {
    const value =
      this.stats.actionAttack(attacker, skillTags) -
      this.debuffs.penalty(attacker, 'attack_down');
    return Math.max(1, value);
  }

  /** DEF − defense_down 합 (최소 0) */
  effectiveDefense(target: Combatant): number {
    return Math.max(
      0,
      target.stats.defense - this.debuffs.penalty(target, 'defense_down'),
    );
  }

  /** 순수 미리보기 — 변경 없음, RNG 없음. 가드 적용 전 값 */
  estimate(
    attacker: Combatant,
    target: Combatant,
    bonusPower = 0,
    skillTags?: readonly string[],
  ): number {
    return Math.max(
      this.config.get().minimumDamage,
      this.effectiveAttack(attacker, skillTags) + bonusPower - this.effectiveDefense(target),
    );
  }

  /** 피해 적용 + 가드 소모 + 사망 시 디버프 정리 + 위협도 기록 */
  resolve(
    battle: BattleState,
    attacker: Combatant,
    target: Combatant,
    bonusPower = 0,
    skillTags?: readonly string[],
  ): DamageResult {
    let damage = this.estimate(attacker, target, bonusPower, skillTags);
    let absorbed = 0;
    if (target.guardReduction > 0) {
      absorbed = Math.min(damage, target.guardReduction);
      damage -= absorbed;
      target.guardReduction = 0;
    }

    target.stats.hp = Math.max(0, target.stats.hp - damage);
    const defeated = !isAlive(target);
    if (defeated) this.debuffs.clear(target);

    this.threat.recordDamage(battle, attacker, target, damage);
    return { damage, absorbed, targetHp: target.stats.hp, defeated };
  }
}
