import type { DebuffType, Side } from './enums.js';
import type { Attributes, BaseStats, CombatStats } from './stats.js';

export type ActiveDebuff = {
  type: DebuffType;
  amount: number;
  expiresAtRound: number;
};

export type Combatant = {
  instanceId: string;
  name: string;
  side: Side;
  stats: CombatStats;
  baseStats?: BaseStats;
  /** 플레이어/파티원만 보유. 없으면 stats.attack 을 그대로 사용 */
  attributes?: Attributes;
  tags: string[];
  weaponTags: string[];
  skillIds: string[];
  guardReduction: number;
  /** 원본 정의 id (enemy/summon/party member/class) */
  sourceId?: string;
  debuffs: ActiveDebuff[];
  // summon 전용
  ownerId?: string;
  bondCost?: number;
};

export function isAlive(combatant: Combatant): boolean {
  return combatant.stats.hp > 0;
}

export function isSummon(combatant: Combatant): boolean {
  return combatant.ownerId !== undefined;
}
