// 전투 구성 — 플레이어/파티원/적 전투원 생성과 BattleState 초기화

import { Inject, Injectable } from '@nestjs/common';
import { FactoryError } from '../../common/errors/game-errors.js';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import { makeInstanceId } from '../rng/instance-id.js';
import type { Rng } from '../rng/rng.service.js';
import { StatsService } from '../stats/stats.service.js';
import { partyCombatantId } from '../summon/summon.service.js';
import { SkillService } from './skill.service.js';
import type {
  BaseStats,
  BattleStartedEvent,
  BattleState,
  Combatant,
  GameState,
  MemberEquipment,
} from '../../types/index.js';

export interface BattleOptions {
  battleLevel?: number;
}

@Injectable()
export class BattleFactoryService {
  constructor(
    @Inject(COMBAT_CONTENT) private readonly content: CombatContent,
    private readonly stats: StatsService,
    private readonly skills: SkillService,
  ) {}

  /** 적 id 우선, 없으면 그룹 id */
  resolveEnemyIds(enemyOrGroupId: string): string[] {
    if (this.content.enemies.has(enemyOrGroupId)) return [enemyOrGroupId];
    if (this.content.enemyGroups.has(enemyOrGroupId)) {
      return [...this.content.enemyGroups.get(enemyOrGroupId).enemyIds];
    }
    throw new FactoryError(`Enemy or group '${enemyOrGroupId}' not found`, {
      enemyId: enemyOrGroupId,
    });
  }

  createBattle(
    enemyOrGroupId: string,
    game: GameState,
    rng: Rng,
    options: BattleOptions = {},
  ): { battle: BattleState; event: BattleStartedEvent } {
    const player = game.player;
    if (!player) {
      throw new FactoryError('Cannot start a battle before the player is created');
    }
    const battleLevel = Math.max(0, options.battleLevel ?? 0);

    const allies = [
      this.createPlayerCombatant(game),
      ...game.partyMembers.map((id) => this.createPartyCombatant(game, id)),
    ];
    const taken = new Set(allies.map((a) => a.instanceId));
    const enemies = this.resolveEnemyIds(enemyOrGroupId).map((id) => {
      const enemy = this.createEnemy(id, battleLevel, rng, taken);
      taken.add(enemy.instanceId);
      return enemy;
    });
    this.disambiguateNames(enemies);

    const battle: BattleState = {
      battleId: makeInstanceId('battle', rng),
      playerId: player.id,
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
      battleLevel,
      isOver: false,
      victor: null,
      outcomeApplied: false,
    };
    return {
      battle,
      event: {
        type: 'battle_started',
        battleId: battle.battleId,
        enemyNames: enemies.map((e) => e.name),
        battleLevel,
      },
    };
  }

  // --- 장비 ---

  weaponTags(weaponIds: readonly string[]): string[] {
    const tags = new Set<string>();
    for (const id of weaponIds) {
      for (const tag of this.requireWeapon(id).tags) tags.add(tag);
    }
    return [...tags].sort();
  }

  /** 첫 무기 공격력 (최소 1). 무기가 없으면 fallback */
  baseAttack(weaponIds: readonly string[], fallback: number): number {
    const first = weaponIds[0];
    if (first === undefined) return Math.max(1, fallback);
    return Math.max(1, this.requireWeapon(first).attack);
  }

  /** 방어구 DEF 합. 방어구가 없으면 fallback */
  baseDefense(armourIds: readonly string[], fallback: number): number {
    if (armourIds.length === 0) return Math.max(0, fallback);
    return armourIds.reduce((sum, id) => sum + this.requireArmour(id).defense, 0);
  }

  playerEquipment(game: GameState): MemberEquipment {
    const id = game.player?.id;
    const equipment = id === undefined ? undefined : game.equipment[id];
    return equipment ?? { weaponIds: [], armourIds: [] };
  }

  /** 장비 반영 기본 스탯 (속성 보정 전) */
  playerBaseStats(game: GameState): BaseStats {
    const player = game.player;
    if (!player) throw new FactoryError('Player not created');
    const eq = this.playerEquipment(game);
    return {
      maxHp: player.baseStats.maxHp,
      maxMp: player.baseStats.maxMp,
      attack: this.baseAttack(eq.weaponIds, player.baseStats.attack),
      defense: this.baseDefense(eq.armourIds, player.baseStats.defense),
      speed: player.baseStats.speed,
    };
  }

  // --- 전투원 ---

  createPlayerCombatant(game: GameState): Combatant {
    const player = game.player;
    if (!player) throw new FactoryError('Player not created');
    const eq = this.playerEquipment(game);
    const baseStats = this.playerBaseStats(game);
    const weaponTags = this.weaponTags(eq.weaponIds);
    return {
      instanceId: player.id,
      name: player.name,
      side: 'allies',
      stats: this.stats.applyAttributeScaling(baseStats, player.attributes, {
        hp: player.stats.hp,
        mp: player.stats.mp,
      }),
      baseStats,
      attributes: { ...player.attributes },
      tags: [],
      weaponTags,
      skillIds: this.skills.eligibleSkillIds(weaponTags),
      guardReduction: 0,
      sourceId: player.classId,
      debuffs: [],
    };
  }

  /** 파티원은 매 전투 HP/MP 가득 찬 상태로 시작 */
  createPartyCombatant(game: GameState, memberId: string): Combatant {
    if (!this.content.partyMembers.has(memberId)) {
      throw new FactoryError(`Party member '${memberId}' not found`, { memberId });
    }
    const def = this.content.partyMembers.get(memberId);
    const eq = game.equipment[memberId];
    const weaponIds = eq && eq.weaponIds.length > 0 ? eq.weaponIds : def.weaponIds.slice(0, 2);
    const armourIds = eq && eq.armourIds.length > 0 ? eq.armourIds : def.armourIds;
    const attributes = game.partyMemberAttributes[memberId] ?? def.startingAttributes;

    const baseStats: BaseStats = {
      maxHp: def.baseHp,
      maxMp: def.baseMp,
      attack: this.baseAttack(weaponIds, 1),
      defense: this.baseDefense(armourIds, 0),
      speed: def.speed,
    };
    const stats = this.stats.applyAttributeScaling(baseStats, attributes, { hp: 0, mp: 0 });
    stats.hp = stats.maxHp;
    stats.mp = stats.maxMp;
    const weaponTags = this.weaponTags(weaponIds);

    return {
      instanceId: partyCombatantId(memberId),
      name: def.name,
      side: 'allies',
      stats,
      baseStats,
      attributes: { ...attributes },
      tags: [...def.tags],
      weaponTags,
      skillIds: this.skills.eligibleSkillIds(weaponTags),
      guardReduction: 0,
      sourceId: memberId,
      debuffs: [],
    };
  }

  createEnemy(
    enemyId: string,
    battleLevel: number,
    rng: Rng,
    taken: ReadonlySet<string> = new Set(),
  ): Combatant {
    if (!this.content.enemies.has(enemyId)) {
      throw new FactoryError(`Enemy '${enemyId}' not found`, { enemyId });
    }
    const def = this.content.enemies.get(enemyId);
    for (const skillId of def.skillIds) {
      if (!this.content.skills.has(skillId)) {
        throw new FactoryError(`Skill '${skillId}' for enemy '${enemyId}' not found`, {
          enemyId,
          skillId,
        });
      }
    }

    const weaponAttack =
      def.weaponIds.length > 0 ? Math.max(0, this.requireWeapon(def.weaponIds[0]).attack) : 0;
    const armourDefense = def.armourIds.reduce(
      (sum, id) => sum + this.requireArmour(id).defense,
      0,
    );
    const baseStats: BaseStats = {
      maxHp: def.hp,
      maxMp: def.mp,
      attack: def.attack + weaponAttack,
      defense: def.defense + armourDefense,
      speed: def.speed,
    };

    return {
      instanceId: makeInstanceId('enemy', rng, taken),
      name: def.name,
      side: 'enemies',
      stats: this.stats.scaleEnemyStats(baseStats, battleLevel),
      baseStats,
      tags: [...def.tags],
      weaponTags: this.weaponTags(def.weaponIds),
      skillIds: [...def.skillIds],
      guardReduction: 0,
      sourceId: def.id,
      debuffs: [],
    };
  }

  /** 같은 이름이 여럿이면 "Name (1)", "Name (2)" */
  disambiguateNames(enemies: Combatant[]): void {
    const groups = new Map<string, Combatant[]>();
    for (const enemy of enemies) {
      const group = groups.get(enemy.name);
      if (group) group.push(enemy);
      else groups.set(enemy.name, [enemy]);
    }
    for (const [name, group] of groups) {
      if (group.length <= 1) continue;
      group.forEach((enemy, idx) => {
        enemy.name = `${name} (${idx + 1})`;
      });
    }
  }

  private requireWeapon(id: string) {
    if (!this.content.weapons.has(id)) {
      throw new FactoryError(`Weapon '${id}' not found`, { weaponId: id });
    }
    return this.content.weapons.get(id);
  }

  private requireArmour(id: string) {
    if (!this.content.armour.has(id)) {
      throw new FactoryError(`Armour '${id}' not found`, { armourId: id });
    }
    return this.content.armour.get(id);
  }
}
