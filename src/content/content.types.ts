// combat_v1 JSON 정의 타입 (스키마에서 파생)

import type { z } from 'zod';
import type {
  ArmourDefinitionSchema,
  BondScalingSchema,
  EnemyDefinitionSchema,
  EnemyGroupDefinitionSchema,
  ItemDefinitionSchema,
  KnowledgeEntrySchema,
  KnowledgeRulesSchema,
  LootDropSchema,
  LootTableDefinitionSchema,
  PartyMemberDefinitionSchema,
  PlayerDefaultsSchema,
  SkillDefinitionSchema,
  SummonDefinitionSchema,
  WeaponDefinitionSchema,
} from './content.schemas.js';

export type EnemyDefinition = z.infer<typeof EnemyDefinitionSchema>;
export type EnemyGroupDefinition = z.infer<typeof EnemyGroupDefinitionSchema>;
export type SkillDefinition = z.infer<typeof SkillDefinitionSchema>;
export type ItemDefinition = z.infer<typeof ItemDefinitionSchema>;
export type LootDrop = z.infer<typeof LootDropSchema>;
export type LootTableDefinition = z.infer<typeof LootTableDefinitionSchema>;
export type WeaponDefinition = z.infer<typeof WeaponDefinitionSchema>;
export type ArmourDefinition = z.infer<typeof ArmourDefinitionSchema>;
export type PartyMemberDefinition = z.infer<typeof PartyMemberDefinitionSchema>;
export type BondScaling = z.infer<typeof BondScalingSchema>;
export type SummonDefinition = z.infer<typeof SummonDefinitionSchema>;
export type KnowledgeEntry = z.infer<typeof KnowledgeEntrySchema>;
export type KnowledgeRules = z.infer<typeof KnowledgeRulesSchema>;
export type PlayerDefaults = z.infer<typeof PlayerDefaultsSchema>;
