// 전투 콘텐츠 계약 — 엔진은 이 인터페이스만 의존한다

import { z } from 'zod';
import {
  ContentNotFoundError,
  InvalidInputError,
} from '../common/errors/game-errors.js';
import {
  ArmourDefinitionSchema,
  EnemyDefinitionSchema,
  EnemyGroupDefinitionSchema,
  ItemDefinitionSchema,
  KnowledgeEntriesSchema,
  KnowledgeRulesSchema,
  LootTableDefinitionSchema,
  PartyMemberDefinitionSchema,
  PlayerDefaultsSchema,
  SkillDefinitionSchema,
  SummonDefinitionSchema,
  WeaponDefinitionSchema,
} from './content.schemas.js';
import type {
  ArmourDefinition,
  EnemyDefinition,
  EnemyGroupDefinition,
  ItemDefinition,
  KnowledgeEntry,
  KnowledgeRules,
  LootTableDefinition,
  PartyMemberDefinition,
  PlayerDefaults,
  SkillDefinition,
  SummonDefinition,
  WeaponDefinition,
} from './content.types.js';

export const COMBAT_CONTENT = Symbol('COMBAT_CONTENT');

export interface DefinitionLookup<T> {
  /** 없으면 ContentNotFoundError */
  get(id: string): T;
  has(id: string): boolean;
  all(): T[];
}

export interface CombatContent {
  readonly enemies: DefinitionLookup<EnemyDefinition>;
  readonly enemyGroups: DefinitionLookup<EnemyGroupDefinition>;
  readonly skills: DefinitionLookup<SkillDefinition>;
  readonly items: DefinitionLookup<ItemDefinition>;
  readonly lootTables: DefinitionLookup<LootTableDefinition>;
  readonly weapons: DefinitionLookup<WeaponDefinition>;
  readonly armour: DefinitionLookup<ArmourDefinition>;
  readonly partyMembers: DefinitionLookup<PartyMemberDefinition>;
  readonly summons: DefinitionLookup<SummonDefinition>;
  /** 파티원(또는 플레이어) id 별 지식 항목. 없으면 빈 배열 */
  knowledgeFor(memberId: string): KnowledgeEntry[];
  knowledgeRules(): KnowledgeRules;
  playerDefaults(): PlayerDefaults;
}

export const DEFAULT_KNOWLEDGE_RULES = {
  thresholds: { tier1Kills: 25, tier2Kills: 75, tier3Kills: 150 },
  hpVisibilityByTier: ['HIDDEN', 'STATIC_RANGE', 'REALTIME', 'REALTIME'],
} satisfies KnowledgeRules;

export const CombatContentDataSchema = z.object({
  enemies: z.array(EnemyDefinitionSchema).default([]),
  enemyGroups: z.array(EnemyGroupDefinitionSchema).default([]),
  skills: z.array(SkillDefinitionSchema).default([]),
  items: z.array(ItemDefinitionSchema).default([]),
  lootTables: z.array(LootTableDefinitionSchema).default([]),
  weapons: z.array(WeaponDefinitionSchema).default([]),
  armour: z.array(ArmourDefinitionSchema).default([]),
  partyMembers: z.array(PartyMemberDefinitionSchema).default([]),
  summons: z.array(SummonDefinitionSchema).default([]),
  knowledge: KnowledgeEntriesSchema.default({}),
  knowledgeRules: KnowledgeRulesSchema.default(DEFAULT_KNOWLEDGE_RULES),
  playerDefaults: PlayerDefaultsSchema,
});

export type CombatContentData = z.infer<typeof CombatContentDataSchema>;
export type CombatContentInput = z.input<typeof CombatContentDataSchema>;

/** id 중복을 허용하지 않는 Map 기반 조회 테이블 */
export class DefinitionRegistry<T extends { id: string }>
  implements DefinitionLookup<T>
{
  private readonly byId = new Map<string, T>();

  constructor(
    private readonly kind: string,
    definitions: readonly T[],
  ) {
    for (const def of definitions) {
      if (this.byId.has(def.id)) {
        throw new InvalidInputError(`duplicate ${kind} id '${def.id}'`, {
          kind,
          id: def.id,
        });
      }
      this.byId.set(def.id, def);
    }
  }

  get(id: string): T {
    const def = this.byId.get(id);
    if (!def) throw new ContentNotFoundError(this.kind, id);
    return def;
  }

  has(id: string): boolean {
    return this.byId.has(id);
  }

  all(): T[] {
    return [...this.byId.values()];
  }
}

/** 메모리 데이터로 구성한 콘텐츠 (로더 결과, 테스트, 도구) */
export class StaticCombatContent implements CombatContent {
  readonly enemies: DefinitionRegistry<EnemyDefinition>;
  readonly enemyGroups: DefinitionRegistry<EnemyGroupDefinition>;
  readonly skills: DefinitionRegistry<SkillDefinition>;
  readonly items: DefinitionRegistry<ItemDefinition>;
  readonly lootTables: DefinitionRegistry<LootTableDefinition>;
  readonly weapons: DefinitionRegistry<WeaponDefinition>;
  readonly armour: DefinitionRegistry<ArmourDefinition>;
  readonly partyMembers: DefinitionRegistry<PartyMemberDefinition>;
  readonly summons: DefinitionRegistry<SummonDefinition>;

  constructor(private readonly data: CombatContentData) {
    this.enemies = new DefinitionRegistry('enemy', data.enemies);
    this.enemyGroups = new DefinitionRegistry('enemy_group', data.enemyGroups);
    this.skills = new DefinitionRegistry('skill', data.skills);
    this.items = new DefinitionRegistry('item', data.items);
    this.lootTables = new DefinitionRegistry('loot_table', data.lootTables);
    this.weapons = new DefinitionRegistry('weapon', data.weapons);
    this.armour = new DefinitionRegistry('armour', data.armour);
    this.partyMembers = new DefinitionRegistry('party_member', data.partyMembers);
    this.summons = new DefinitionRegistry('summon', data.summons);
  }

  /** 원시 입력을 zod 로 검증한 뒤 구성 */
  static fromRaw(raw: unknown): StaticCombatContent {
    const parsed = CombatContentDataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError('Invalid combat content', {
        issues: parsed.error.issues,
      });
    }
    return new StaticCombatContent(parsed.data);
  }

  knowledgeFor(memberId: string): KnowledgeEntry[] {
    return this.data.knowledge[memberId] ?? [];
  }

  knowledgeRules(): KnowledgeRules {
    return this.data.knowledgeRules;
  }

  playerDefaults(): PlayerDefaults {
    return this.data.playerDefaults;
  }
}
