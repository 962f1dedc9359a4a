export type CombatStats = {
  maxHp: number;
  hp: number;
  maxMp: number;
  mp: number;
  attack: number;
  defense: number;
  speed: number;
};

/** 속성 보정 전 기본 스탯 */
export type BaseStats = {
  maxHp: number;
  maxMp: number;
  attack: number;
  defense: number;
  speed: number;
};

export type Attributes = {
  STR: number;
  DEX: number;
  INT: number;
  VIT: number;
  BOND: number;
};

export const EMPTY_ATTRIBUTES: Readonly<Attributes> = {
  STR: 0,
  DEX: 0,
  INT: 0,
  VIT: 0,
  BOND: 0,
};
