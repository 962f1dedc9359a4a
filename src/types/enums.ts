// 전투 코어 공통 enum

export const SIDE = ['allies', 'enemies'] as const;
export type Side = (typeof SIDE)[number];

export const DEBUFF_TYPE = ['attack_down', 'defense_down'] as const;
export type DebuffType = (typeof DEBUFF_TYPE)[number];

export const SKILL_TARGET_MODE = ['self', 'single_enemy', 'multi_enemy'] as const;
export type SkillTargetMode = (typeof SKILL_TARGET_MODE)[number];

/** 알려진 스킬 효과. 그 외 문자열은 unknown 으로 분류되어 무시된다 */
export const SKILL_EFFECT_KIND = ['damage', 'guard'] as const;
export type SkillEffectKind = (typeof SKILL_EFFECT_KIND)[number];

export function isSkillEffectKind(value: string): value is SkillEffectKind {
  return SKILL_EFFECT_KIND.some((kind) => kind === value);
}

export const ITEM_KIND = ['consumable', 'material', 'key'] as const;
export type ItemKind = (typeof ITEM_KIND)[number];

export const ITEM_TARGETING = ['self', 'ally', 'enemy'] as const;
export type ItemTargeting = (typeof ITEM_TARGETING)[number];

export const KNOWLEDGE_TIER = [0, 1, 2, 3] as const;
export type KnowledgeTier = (typeof KNOWLEDGE_TIER)[number];

export const HP_VISIBILITY_MODE = ['HIDDEN', 'STATIC_RANGE', 'REALTIME'] as const;
export type HpVisibilityMode = (typeof HP_VISIBILITY_MODE)[number];

/** 스킬/무기 태그 규약 */
export const PHYSICAL_TAG = 'physical';
export const FINESSE_TAG = 'finesse';
export const SUMMON_TAG = 'summon';
export const ELEMENTAL_TAGS: readonly string[] = [
  'fire',
  'ice',
  'lightning',
  'earth',
  'holy',
  'shadow',
  'poison',
];
