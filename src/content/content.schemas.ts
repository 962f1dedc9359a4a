// combat_v1 JSON 스키마 (zod) — 로드 시점 검증

import { z } from 'zod';
import {
  HP_VISIBILITY_MODE,
  ITEM_KIND,
  ITEM_TARGETING,
  SKILL_TARGET_MODE,
} from '../types/index.js';

const id = z.string().min(1);
const tags = z.array(z.string().min(1)).default([]);
const nonNegInt = z.number().int().min(0);

export const AttributesSchema = z.object({
  STR: nonNegInt,
  DEX: nonNegInt,
  INT: nonNegInt,
  VIT: nonNegInt,
  BOND: nonNegInt,
});

export const BaseStatsSchema = z.object({
  maxHp: z.number().int().min(1),
  maxMp: nonNegInt,
  attack: nonNegInt,
  defense: nonNegInt,
  speed: nonNegInt,
});

export const EnemyDefinitionSchema = z.object({
  id,
  name: z.string().min(1),
  hp: z.number().int().min(1),
  mp: nonNegInt.default(0),
  attack: nonNegInt,
  defense: nonNegInt,
  speed: nonNegInt,
  tags,
  rewardsGold: nonNegInt.default(0),
  rewardsExp: nonNegInt.default(0),
  knowledgeKey: z.string().min(1).optional(),
  weaponIds: z.array(id).default([]),
  armourIds: z.array(id).default([]),
  skillIds: z.array(id).default([]),
});

export const EnemyGroupDefinitionSchema = z.object({
  id,
  name: z.string().optional(),
  enemyIds: z.array(id).min(1),
});

export const SkillDefinitionSchema = z.object({
  id,
  name: z.string().min(1),
  description: z.string().default(''),
  tags,
  requiredWeaponTags: tags,
  targetMode: z.enum(SKILL_TARGET_MODE),
  maxTargets: z.number().int().min(1).default(1),
  mpCost: nonNegInt,
  basePower: nonNegInt,
  // 알 수 없는 효과도 로드는 허용 — 사용 시점에 무시 + 로그
  effectType: z.string().min(1),
  goldValue: nonNegInt.default(0),
}).refine((skill) => !(skill.targetMode === 'self' && skill.effectType === 'damage'), {
  message: "self-targeted skills cannot use the 'damage' effect",
  path: ['effectType'],
});

export const ItemDefinitionSchema = z.object({
  id,
  name: z.string().min(1),
  kind: z.enum(ITEM_KIND),
  value: nonNegInt.default(0),
  targeting: z.enum(ITEM_TARGETING).default('self'),
  healHp: nonNegInt.default(0),
  healMp: nonNegInt.default(0),
  debuffAttackFlat: nonNegInt.default(0),
  debuffDefenseFlat: nonNegInt.default(0),
});

export const LootDropSchema = z
  .object({
    itemId: id,
    chance: z.number().min(0).max(1),
    minQty: nonNegInt.default(1),
    maxQty: nonNegInt.default(1),
  })
  .refine((d) => d.maxQty >= d.minQty, { message: 'maxQty must be >= minQty' });

export const LootTableDefinitionSchema = z.object({
  id,
  requiredTags: tags,
  forbiddenTags: tags,
  drops: z.array(LootDropSchema),
});

export const WeaponDefinitionSchema = z.object({
  id,
  name: z.string().min(1),
  attack: nonNegInt,
  tags,
  value: nonNegInt.default(0),
});

export const ArmourDefinitionSchema = z.object({
  id,
  name: z.string().min(1),
  defense: nonNegInt,
  value: nonNegInt.default(0),
});

export const PartyMemberDefinitionSchema = z.object({
  id,
  name: z.string().min(1),
  baseHp: z.number().int().min(1),
  baseMp: nonNegInt,
  speed: nonNegInt,
  weaponIds: z.array(id).default([]),
  armourIds: z.array(id).default([]),
  tags,
  startingAttributes: AttributesSchema,
});

export const BondScalingSchema = z.object({
  hpPerBond: z.number().min(0),
  atkPerBond: z.number().min(0),
  defPerBond: z.number().min(0),
  initPerBond: z.number().min(0),
});

export const SummonDefinitionSchema = z.object({
  id,
  name: z.string().min(1),
  maxHp: z.number().int().min(1),
  maxMp: nonNegInt.default(0),
  attack: nonNegInt,
  defense: nonNegInt,
  speed: nonNegInt,
  bondCost: z.number().int().min(1),
  tags,
  bondScaling: BondScalingSchema,
});

export const KnowledgeEntrySchema = z.object({
  knowledgeKeys: z.array(id).default([]),
  enemyTags: tags,
  speedHint: z.string().optional(),
  behavior: z.string().optional(),
});

export const KnowledgeEntriesSchema = z.record(id, z.array(KnowledgeEntrySchema));

export const KnowledgeRulesSchema = z
  .object({
    thresholds: z.object({
      tier1Kills: nonNegInt,
      tier2Kills: nonNegInt,
      tier3Kills: nonNegInt,
    }),
    hpVisibilityByTier: z.tuple([
      z.enum(HP_VISIBILITY_MODE),
      z.enum(HP_VISIBILITY_MODE),
      z.enum(HP_VISIBILITY_MODE),
      z.enum(HP_VISIBILITY_MODE),
    ]),
  })
  .refine(
    (r) =>
      r.thresholds.tier1Kills <= r.thresholds.tier2Kills &&
      r.thresholds.tier2Kills <= r.thresholds.tier3Kills,
    { message: 'knowledge thresholds must be ascending' },
  );

export const PlayerDefaultsSchema = z.object({
  classId: id,
  baseStats: BaseStatsSchema,
  attributes: AttributesSchema,
  weaponIds: z.array(id).default([]),
  armourIds: z.array(id).default([]),
  equippedSummons: z.array(id).default([]),
  partyMembers: z.array(id).default([]),
  startingGold: nonNegInt.default(0),
  startingItems: z.array(z.object({ itemId: id, qty: z.number().int().min(1) })).default([]),
});
