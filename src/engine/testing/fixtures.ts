// 테스트 공용 픽스처 — 작은 인메모리 콘텐츠 + 상태 빌더

import {
  StaticCombatContent,
  type CombatContent,
  type CombatContentInput,
} from '../../content/combat-content.js';
import { CombatConfigService } from '../../common/config/combat-config.service.js';
import { ActionRejectedError } from '../../common/errors/game-errors.js';
import { BattleControllerService } from '../combat/battle-controller.service.js';
import { BattleFactoryService } from '../combat/battle-factory.service.js';
import { CombatService } from '../combat/combat.service.js';
import { DamageService } from '../combat/damage.service.js';
import { SkillService } from '../combat/skill.service.js';
import { ThreatService } from '../combat/threat.service.js';
import { KnowledgeService } from '../knowledge/knowledge.service.js';
import { PartyTalkService } from '../knowledge/party-talk.service.js';
import { InventoryService } from '../rewards/inventory.service.js';
import { VictoryService } from '../rewards/victory.service.js';
import { RngService } from '../rng/rng.service.js';
import { GameStateService } from '../state/game-state.service.js';
import { StatsService } from '../stats/stats.service.js';
import { DebuffService } from '../status/debuff.service.js';
import { SummonService } from '../summon/summon.service.js';
import { TurnSchedulerService } from '../turn/turn-scheduler.service.js';
import {
  findCombatant,
  type BattleState,
  type Combatant,
  type GameState,
} from '../../types/index.js';

export const TEST_CONTENT: CombatContentInput = {
  enemies: [
    { id: 'slime', name: 'Slime', hp: 10, attack: 3, defense: 1, speed: 2, tags: ['slime'], rewardsGold: 5, rewardsExp: 7 },
    { id: 'goblin', name: 'Goblin', hp: 12, mp: 4, attack: 5, defense: 2, speed: 4, tags: ['goblin', 'humanoid'], rewardsGold: 3, rewardsExp: 4, knowledgeKey: 'goblin_kin', skillIds: ['fire_spit'] },
    { id: 'ghost', name: 'Ghost', hp: 15, attack: 4, defense: 0, speed: 8, tags: ['undead'] },
    { id: 'brute', name: 'Brute', hp: 30, attack: 6, defense: 1, speed: 1, tags: ['humanoid'], weaponIds: ['club'], armourIds: ['vest'] },
  ],
  enemyGroups: [{ id: 'goblin_pair', enemyIds: ['goblin', 'goblin'] }],
  skills: [
    { id: 'power_strike', name: 'Power Strike', tags: ['physical'], requiredWeaponTags: ['sword'], targetMode: 'single_enemy', mpCost: 3, basePower: 2, effectType: 'damage' },
    { id: 'cleave', name: 'Cleave', tags: ['physical'], requiredWeaponTags: ['sword'], targetMode: 'multi_enemy', maxTargets: 2, mpCost: 4, basePower: 0, effectType: 'damage' },
    { id: 'brace', name: 'Brace', requiredWeaponTags: ['sword'], targetMode: 'self', mpCost: 1, basePower: 3, effectType: 'guard' },
    { id: 'fire_spit', name: 'Fire Spit', tags: ['fire'], targetMode: 'single_enemy', mpCost: 2, basePower: 1, effectType: 'damage' },
    { id: 'mystery', name: 'Mystery', requiredWeaponTags: ['sword'], targetMode: 'self', mpCost: 1, basePower: 0, effectType: 'teleport' },
    { id: 'backstab', name: 'Backstab', tags: ['physical'], requiredWeaponTags: ['dagger'], targetMode: 'single_enemy', mpCost: 2, basePower: 3, effectType: 'damage' },
  ],
  items: [
    { id: 'potion', name: 'Potion', kind: 'consumable', targeting: 'ally', healHp: 10 },
    { id: 'ether', name: 'Ether', kind: 'consumable', targeting: 'self', healMp: 5 },
    { id: 'hex_powder', name: 'Hex Powder', kind: 'consumable', targeting: 'enemy', debuffAttackFlat: 2 },
    { id: 'rust_powder', name: 'Rust Powder', kind: 'consumable', targeting: 'enemy', debuffDefenseFlat: 2 },
    { id: 'pebble', name: 'Pebble', kind: 'material' },
  ],
  lootTables: [
    { id: 'goblin_loot', requiredTags: ['goblin'], drops: [{ itemId: 'pebble', chance: 1, minQty: 1, maxQty: 1 }] },
  ],
  weapons: [
    { id: 'sword', name: 'Sword', attack: 4, tags: ['sword'] },
    { id: 'dagger', name: 'Dagger', attack: 3, tags: ['dagger', 'finesse'] },
    { id: 'club', name: 'Club', attack: 2, tags: ['blunt'] },
  ],
  armour: [{ id: 'vest', name: 'Vest', defense: 2 }],
  partyMembers: [
    { id: 'ally_mage', name: 'Mage', baseHp: 20, baseMp: 10, speed: 3, tags: ['mage'], startingAttributes: { STR: 0, DEX: 0, INT: 3, VIT: 0, BOND: 1 } },
    { id: 'ally_rogue', name: 'Rogue', baseHp: 18, baseMp: 4, speed: 7, weaponIds: ['dagger'], startingAttributes: { STR: 1, DEX: 2, INT: 0, VIT: 0, BOND: 0 } },
  ],
  summons: [
    { id: 'wisp', name: 'Wisp', maxHp: 5, attack: 1, defense: 0, speed: 8, bondCost: 1, bondScaling: { hpPerBond: 1, atkPerBond: 0.5, defPerBond: 0, initPerBond: 0 } },
    { id: 'golem', name: 'Golem', maxHp: 20, attack: 3, defense: 2, speed: 1, bondCost: 3, bondScaling: { hpPerBond: 0, atkPerBond: 0, defPerBond: 0, initPerBond: 0 } },
  ],
  knowledge: {
    ally_mage: [
      { knowledgeKeys: ['goblin_kin'], enemyTags: ['goblin'], speedHint: 'Quick', behavior: 'Spits fire.' },
      { enemyTags: ['undead'], behavior: 'Fades in and out.' },
    ],
  },
  playerDefaults: {
    classId: 'tester',
    baseStats: { maxHp: 30, maxMp: 10, attack: 2, defense: 1, speed: 5 },
    attributes: { STR: 2, DEX: 1, INT: 1, VIT: 0, BOND: 2 },
    weaponIds: ['sword'],
    armourIds: ['vest'],
    startingGold: 10,
    startingItems: [{ itemId: 'potion', qty: 2 }],
  },
};

export function makeTestContent(): StaticCombatContent {
  return StaticCombatContent.fromRaw(TEST_CONTENT);
}

export function makeConfig(): CombatConfigService {
  return new CombatConfigService();
}

export function makeCombatant(
  instanceId: string,
  overrides: Partial<Combatant> = {},
): Combatant {
  return {
    instanceId,
    name: instanceId,
    side: 'allies',
    stats: { maxHp: 20, hp: 20, maxMp: 10, mp: 10, attack: 5, defense: 1, speed: 5 },
    tags: [],
    weaponTags: [],
    skillIds: [],
    guardReduction: 0,
    debuffs: [],
    ...overrides,
  };
}

export function makeEnemy(
  instanceId: string,
  overrides: Partial<Combatant> = {},
): Combatant {
  return makeCombatant(instanceId, { side: 'enemies', ...overrides });
}

export function makeBattle(
  allies: Combatant[],
  enemies: Combatant[],
  overrides: Partial<BattleState> = {},
): BattleState {
  return {
    battleId: 'battle_test',
    playerId: allies[0]?.instanceId ?? null,
    allies,
    enemies,
    turnQueue: [],
    currentActorId: null,
    roundIndex: 1,
    enemyAggro: {},
    partyThreat: {},
    lastTarget: {},
    knowledgeSnapshot: {},
    temporaryReveals: {},
    battleLevel: 0,
    isOver: false,
    victor: null,
    outcomeApplied: false,
    ...overrides,
  };
}

/**
 * 전투 전 플레이어 상태. 속성 보정 후: maxHp 30, maxMp 12, ATK 4, DEF 1, SPD 6
 */
export function makeGameState(overrides: Partial<GameState> = {}): GameState {
  return {
    seed: 'test-seed',
    player: {
      id: 'player_100001',
      name: 'Tester',
      classId: 'tester',
      baseStats: { maxHp: 30, maxMp: 10, attack: 2, defense: 1, speed: 5 },
      stats: { maxHp: 30, hp: 30, maxMp: 12, mp: 12, attack: 4, defense: 1, speed: 6 },
      attributes: { STR: 2, DEX: 1, INT: 1, VIT: 0, BOND: 2 },
      equippedSummons: [],
    },
    partyMembers: [],
    partyMemberAttributes: {},
    partyMemberSummonLoadouts: {},
    equipment: { player_100001: { weaponIds: ['sword'], armourIds: ['vest'] } },
    memberLevels: {},
    memberExp: {},
    gold: 0,
    inventory: [
      { itemId: 'potion', qty: 2 },
      { itemId: 'hex_powder', qty: 1 },
    ],
    knowledgeKillCounts: {},
    flags: { lastBattleDefeat: false },
    ...overrides,
  };
}

/** 전체 서비스 그래프를 DI 없이 직접 구성 */
export function makeEngine(content: CombatContent = makeTestContent()) {
  const config = makeConfig();
  const rngService = new RngService();
  const stats = new StatsService();
  const debuffs = new DebuffService();
  const turns = new TurnSchedulerService(debuffs);
  const threat = new ThreatService(config);
  const damage = new DamageService(config, stats, debuffs, threat);
  const skills = new SkillService(content, damage);
  const knowledge = new KnowledgeService(content);
  const partyTalk = new PartyTalkService(content, knowledge);
  const summons = new SummonService(content, stats, threat, turns);
  const inventory = new InventoryService(content);
  const factory = new BattleFactoryService(content, stats, skills);
  const gameState = new GameStateService(content, rngService, factory, stats, inventory);
  const victory = new VictoryService(content, knowledge, inventory, gameState);
  const combat = new CombatService(
    content,
    config,
    factory,
    summons,
    threat,
    turns,
    damage,
    skills,
    debuffs,
    knowledge,
    partyTalk,
    inventory,
  );
  const controller = new BattleControllerService(combat, victory, knowledge, partyTalk);
  return {
    content,
    config,
    rngService,
    turns,
    threat,
    knowledge,
    inventory,
    factory,
    gameState,
    victory,
    combat,
    controller,
  };
}

export function combatantOf(battle: BattleState, instanceId: string): Combatant {
  const combatant = findCombatant(battle, instanceId);
  if (!combatant) throw new Error(`combatant ${instanceId} not in battle`);
  return combatant;
}

/** 거부 사유. 거부되지 않으면 undefined */
export function rejectionReason(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (err) {
    if (err instanceof ActionRejectedError) return err.reason;
    throw err;
  }
  return undefined;
}
