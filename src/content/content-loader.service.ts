// combat_v1 JSON 로드 + zod 검증 + 메모리 캐시

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import { CombatConfigService } from '../common/config/combat-config.service.js';
import { GameError, InvalidInputError } from '../common/errors/game-errors.js';
import {
  StaticCombatContent,
  type CombatContent,
  type DefinitionLookup,
} from './combat-content.js';
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

/** 필수 파일 — 없으면 로드 실패 */
const REQUIRED_FILES = {
  enemies: 'enemies.json',
  skills: 'skills.json',
  items: 'items.json',
  playerDefaults: 'player_defaults.json',
} as const;

/** 선택 파일 — 없으면 스키마 기본값 */
const OPTIONAL_FILES = {
  enemyGroups: 'enemy_groups.json',
  lootTables: 'loot_tables.json',
  weapons: 'weapons.json',
  armour: 'armour.json',
  partyMembers: 'party_members.json',
  summons: 'summons.json',
  knowledge: 'knowledge.json',
  knowledgeRules: 'knowledge_rules.json',
} as const;

@Injectable()
export class ContentLoaderService implements OnModuleInit, CombatContent {
  private readonly logger = new Logger(ContentLoaderService.name);
  private content: StaticCombatContent | null = null;

  constructor(private readonly config: CombatConfigService) {}

  async onModuleInit() {
    await this.loadAll();
  }

  /** contentDir 의 JSON 파일 전부를 다시 읽는다 */
  async loadAll(): Promise<void> {
    const dir = resolve(process.cwd(), this.config.get().contentDir);
    const raw: Record<string, unknown> = {};

    await Promise.all([
      ...Object.entries(REQUIRED_FILES).map(async ([key, file]) => {
        raw[key] = await this.readJson(dir, file);
      }),
      ...Object.entries(OPTIONAL_FILES).map(async ([key, file]) => {
        const value = await this.readJson(dir, file, true);
        if (value !== undefined) raw[key] = value;
      }),
    ]);

    this.content = StaticCombatContent.fromRaw(raw);
    this.logger.log(
      `Loaded combat content from ${dir}: ` +
        `${this.content.enemies.all().length} enemies, ` +
        `${this.content.skills.all().length} skills, ` +
        `${this.content.items.all().length} items, ` +
        `${this.content.summons.all().length} summons`,
    );
  }

  private async readJson(
    dir: string,
    file: string,
    optional = false,
  ): Promise<unknown> {
    let text: string;
    try {
      text = await readFile(resolve(dir, file), 'utf-8');
    } catch (err) {
      if (optional && isMissingFile(err)) return undefined;
      throw err;
    }
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch (err) {
      throw new InvalidInputError(`Malformed JSON in ${file}`, {
        file,
        cause: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private loaded(): StaticCombatContent {
    if (!this.content) {
      throw new GameError('CONTENT_NOT_LOADED', 'Combat content is not loaded');
    }
    return this.content;
  }

  get enemies(): DefinitionLookup<EnemyDefinition> {
    return this.loaded().enemies;
  }

  get enemyGroups(): DefinitionLookup<EnemyGroupDefinition> {
    return this.loaded().enemyGroups;
  }

  get skills(): DefinitionLookup<SkillDefinition> {
    return this.loaded().skills;
  }

  get items(): DefinitionLookup<ItemDefinition> {
    return this.loaded().items;
  }

  get lootTables(): DefinitionLookup<LootTableDefinition> {
    return this.loaded().lootTables;
  }

  get weapons(): DefinitionLookup<WeaponDefinition> {
    return this.loaded().weapons;
  }

  get armour(): DefinitionLookup<ArmourDefinition> {
    return this.loaded().armour;
  }

  get partyMembers(): DefinitionLookup<PartyMemberDefinition> {
    return this.loaded().partyMembers;
  }

  get summons(): DefinitionLookup<SummonDefinition> {
    return this.loaded().summons;
  }

  knowledgeFor(memberId: string): KnowledgeEntry[] {
    return this.loaded().knowledgeFor(memberId);
  }

  knowledgeRules(): KnowledgeRules {
    return this.loaded().knowledgeRules();
  }

  playerDefaults(): PlayerDefaults {
    return this.loaded().playerDefaults();
  }
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
