import type { Attributes, BaseStats, CombatStats } from './stats.js';

export type ItemStack = {
  itemId: string;
  qty: number;
};

export type MemberEquipment = {
  weaponIds: string[];
  armourIds: string[];
};

export type PlayerState = {
  id: string;
  name: string;
  classId: string;
  baseStats: BaseStats;
  stats: CombatStats;
  attributes: Attributes;
  equippedSummons: string[];
};

export type GameFlags = {
  lastBattleDefeat: boolean;
};

/** 전투 간에 유지되는 영구 상태 */
export type GameState = {
  seed: string;
  player: PlayerState | null;
  partyMembers: string[];
  partyMemberAttributes: Record<string, Attributes>;
  partyMemberSummonLoadouts: Record<string, string[]>;
  equipment: Record<string, MemberEquipment>;
  memberLevels: Record<string, number>;
  memberExp: Record<string, number>;
  gold: number;
  inventory: ItemStack[];
  knowledgeKillCounts: Record<string, number>;
  flags: GameFlags;
};
