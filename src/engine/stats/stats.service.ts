// 스탯 파이프라인 — 속성 보정 / 적 레벨 보정 / 소환수 유대 보정 / 행동 공격력

import { Injectable } from '@nestjs/common';
import type { SummonDefinition } from '../../content/content.types.js';
import {
  ELEMENTAL_TAGS,
  FINESSE_TAG,
  PHYSICAL_TAG,
  type Attributes,
  type BaseStats,
  type CombatStats,
  type Combatant,
} from '../../types/index.js';

/** 속성 1포인트당 보정치 */
export const ATTRIBUTE_SCALING = {
  hpPerVit: 3,
  mpPerInt: 2,
  attackPerStr: 1,
  speedPerDex: 1,
} as const;

/** 전투 레벨 1당 적 스탯 증가량 (선형, 가산) */
export const ENEMY_LEVEL_SCALING = {
  hp: 12,
  attack: 2,
  defense: 1,
  speed: 1,
} as const;

@Injectable()
export class StatsService {
  /** 기본 스탯 + 속성 → 최종 전투 스탯. 현재 HP/MP 는 새 최대치로 clamp */
  applyAttributeScaling(
    base: BaseStats,
    attributes: Attributes,
    current: { hp: number; mp: number },
  ): CombatStats {
    const maxHp = base.maxHp + attributes.VIT * ATTRIBUTE_SCALING.hpPerVit;
    const maxMp = base.maxMp + attributes.INT * ATTRIBUTE_SCALING.mpPerInt;
    return {
      maxHp,
      hp: Math.min(current.hp, maxHp),
      maxMp,
      mp: Math.min(current.mp, maxMp),
      attack: base.attack + attributes.STR * ATTRIBUTE_SCALING.attackPerStr,
      defense: base.defense,
      speed: base.speed + attributes.DEX * ATTRIBUTE_SCALING.speedPerDex,
    };
  }

  /** 전투 레벨 보정 — 결과는 HP/MP 가득 찬 상태 */
  scaleEnemyStats(base: BaseStats, battleLevel: number): CombatStats {
    const level = Math.max(0, battleLevel);
    const maxHp = base.maxHp + ENEMY_LEVEL_SCALING.hp * level;
    return {
      maxHp,
      hp: maxHp,
      maxMp: base.maxMp,
      mp: base.maxMp,
      attack: base.attack + ENEMY_LEVEL_SCALING.attack * level,
      defense: base.defense + ENEMY_LEVEL_SCALING.defense * level,
      speed: base.speed + ENEMY_LEVEL_SCALING.speed * level,
    };
  }

  /** 유대 보정 — 스탯마다 한 번만 내림 */
  scaleSummonStats(def: SummonDefinition, ownerBond: number): CombatStats {
    const bond = Math.max(0, ownerBond);
    const s = def.bondScaling;
    const maxHp = Math.max(1, Math.floor(def.maxHp + bond * s.hpPerBond));
    return {
      maxHp,
      hp: maxHp,
      maxMp: def.maxMp,
      mp: def.maxMp,
      attack: Math.max(0, Math.floor(def.attack + bond * s.atkPerBond)),
      defense: Math.max(0, Math.floor(def.defense + bond * s.defPerBond)),
      speed: Math.max(0, Math.floor(def.speed + bond * s.initPerBond)),
    };
  }

  /**
   * 행동 공격력 (디버프 적용 전).
   * 속성이 없는 전투원(적, 소환수)은 stats.attack 그대로.
   */
  actionAttack(combatant: Combatant, skillTags?: readonly string[]): number {
    const attrs = combatant.attributes;
    if (!attrs) return combatant.stats.attack;

    const base = combatant.baseStats?.attack ?? combatant.stats.attack;
    const physicalAttr = combatant.weaponTags.includes(FINESSE_TAG)
      ? attrs.DEX
      : attrs.STR;

    if (skillTags === undefined) {
      return base + physicalAttr;
    }

    const physical = skillTags.includes(PHYSICAL_TAG);
    const elemental = skillTags.some((t) => ELEMENTAL_TAGS.includes(t));
    if (physical && elemental) {
      return base + Math.floor((physicalAttr + attrs.INT) / 2);
    }
    if (physical) return base + physicalAttr;
    return base + attrs.INT;
  }
}
