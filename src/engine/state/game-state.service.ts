// 영구 게임 상태 — 새 게임 생성, 플레이어 스탯 재계산, save_v1 스냅샷

import { Inject, Injectable, Logger } from '@nestjs/common';
import { FactoryError, InvalidInputError } from '../../common/errors/game-errors.js';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import { BattleFactoryService } from '../combat/battle-factory.service.js';
import { InventoryService } from '../rewards/inventory.service.js';
import { makeInstanceId } from '../rng/instance-id.js';
import { RngService, type Rng } from '../rng/rng.service.js';
import { StatsService } from '../stats/stats.service.js';
import type { GameState } from '../../types/index.js';
import { GameSnapshotSchema, SAVE_VERSION, type GameSnapshot } from './game-state.schema.js';

export interface LoadedGame {
  game: GameState;
  rng: Rng;
}

@Injectable()
export class GameStateService {
  private readonly logger = new Logger(GameStateService.name);

  constructor(
    @Inject(COMBAT_CONTENT) private readonly content: CombatContent,
    private readonly rngService: RngService,
    private readonly factory: BattleFactoryService,
    private readonly stats: StatsService,
    private readonly inventory: InventoryService,
  ) {}

  /** player_defaults 기반 새 게임. 플레이어 id 는 seed RNG 첫 추첨 */
  createNewGame(seed: string, name: string): LoadedGame {
    const defaults = this.content.playerDefaults();
    const rng = this.rngService.create(seed);
    const playerId = makeInstanceId('player', rng);

    for (const memberId of defaults.partyMembers) {
      if (!this.content.partyMembers.has(memberId)) {
        throw new FactoryError(`Party member '${memberId}' not found`, { memberId });
      }
    }
    for (const stack of defaults.startingItems) {
      if (!this.content.items.has(stack.itemId)) {
        throw new FactoryError(`Item '${stack.itemId}' not found`, { itemId: stack.itemId });
      }
    }

    const game: GameState = {
      seed,
      player: {
        id: playerId,
        name,
        classId: defaults.classId,
        baseStats: { ...defaults.baseStats },
        stats: { maxHp: 1, hp: 0, maxMp: 0, mp: 0, attack: 0, defense: 0, speed: 0 },
        attributes: { ...defaults.attributes },
        equippedSummons: [...defaults.equippedSummons],
      },
      partyMembers: [...defaults.partyMembers],
      partyMemberAttributes: {},
      partyMemberSummonLoadouts: {},
      equipment: {
        [playerId]: { weaponIds: [...defaults.weaponIds], armourIds: [...defaults.armourIds] },
      },
      memberLevels: { [playerId]: 1 },
      memberExp: { [playerId]: 0 },
      gold: defaults.startingGold,
      inventory: [],
      knowledgeKillCounts: {},
      flags: { lastBattleDefeat: false },
    };

    for (const memberId of defaults.partyMembers) {
      const def = this.content.partyMembers.get(memberId);
      game.partyMemberAttributes[memberId] = { ...def.startingAttributes };
      game.equipment[memberId] = {
        weaponIds: def.weaponIds.slice(0, 2),
        armourIds: [...def.armourIds],
      };
      game.memberLevels[memberId] = 1;
      game.memberExp[memberId] = 0;
    }
    this.inventory.addItems(game, defaults.startingItems);

    this.recalculatePlayerStats(game);
    this.restorePartyResources(game, { hp: true, mp: true });
    this.logger.log(`New game '${seed}' created for ${name} (${playerId})`);
    return { game, rng };
  }

  /** 장비 + 속성 보정으로 플레이어 스탯 재계산. 현재 HP/MP 는 새 최대치로 clamp */
  recalculatePlayerStats(game: GameState): void {
    const player = game.player;
    if (!player) return;
    const base = this.factory.playerBaseStats(game);
    player.stats = this.stats.applyAttributeScaling(base, player.attributes, {
      hp: player.stats.hp,
      mp: player.stats.mp,
    });
  }

  restorePartyResources(game: GameState, restore: { hp: boolean; mp: boolean }): void {
    const player = game.player;
    if (!player) return;
    if (restore.hp) player.stats.hp = player.stats.maxHp;
    if (restore.mp) player.stats.mp = player.stats.maxMp;
  }

  exportSnapshot(game: GameState, rng: Rng): GameSnapshot {
    return {
      version: SAVE_VERSION,
      game: structuredClone(game),
      rng: rng.exportState(),
    };
  }

  /** 검증 실패 시 InvalidInputError. RNG 는 저장 시점 이후 시퀀스를 그대로 재현 */
  importSnapshot(raw: unknown): LoadedGame {
    const parsed = GameSnapshotSchema.safeParse(raw);
    if (!parsed.success) {
      throw new InvalidInputError('Invalid save snapshot', { issues: parsed.error.issues });
    }
    return {
      game: parsed.data.game,
      rng: this.rngService.restore(parsed.data.rng),
    };
  }
}
