// 소환수 — 소유자 BOND 용량 내에서 장착 순서대로 생성

import { Inject, Injectable, Logger } from '@nestjs/common';
import { FactoryError } from '../../common/errors/game-errors.js';
import {
  COMBAT_CONTENT,
  type CombatContent,
} from '../../content/combat-content.js';
import { ThreatService } from '../combat/threat.service.js';
import { makeInstanceId } from '../rng/instance-id.js';
import type { Rng } from '../rng/rng.service.js';
import { StatsService } from '../stats/stats.service.js';
import { TurnSchedulerService } from '../turn/turn-scheduler.service.js';
import {
  SUMMON_TAG,
  allCombatants,
  type BattleState,
  type Combatant,
  type GameState,
  type SummonSpawnedEvent,
} from '../../types/index.js';

export interface SummonOwner {
  /** GameState 상의 id (플레이어 id 또는 파티원 정의 id) */
  ownerKey: string;
  ownerInstanceId: string;
  summonIds: string[];
}

export function partyCombatantId(memberId: string): string {
  return `party_${memberId}`;
}

@Injectable()
export class SummonService {
  private readonly logger = new Logger(SummonService.name);

  constructor(
    @Inject(COMBAT_CONTENT) private readonly content: CombatContent,
    private readonly stats: StatsService,
    private readonly threat: ThreatService,
    private readonly turns: TurnSchedulerService,
  ) {}

  /** 플레이어 → 파티원 순 */
  owners(game: GameState): SummonOwner[] {
    const owners: SummonOwner[] = [];
    if (game.player) {
      owners.push({
        ownerKey: game.player.id,
        ownerInstanceId: game.player.id,
        summonIds: game.player.equippedSummons,
      });
    }
    for (const memberId of game.partyMembers) {
      owners.push({
        ownerKey: memberId,
        ownerInstanceId: partyCombatantId(memberId),
        summonIds: game.partyMemberSummonLoadouts[memberId] ?? [],
      });
    }
    return owners;
  }

  ownerBond(game: GameState, ownerKey: string): number {
    if (game.player && ownerKey === game.player.id) return game.player.attributes.BOND;
    const attrs = game.partyMemberAttributes[ownerKey];
    if (attrs) return attrs.BOND;
    if (this.content.partyMembers.has(ownerKey)) {
      return this.content.partyMembers.get(ownerKey).startingAttributes.BOND;
    }
    return 0;
  }

  /**
   * 소유자별 누적 비용이 BOND 를 넘는 첫 소환수에서 그 소유자는 중단.
   * 더 싼 뒤 소환수로 건너뛰지 않는다.
   */
  spawnEquipped(battle: BattleState, game: GameState, rng: Rng): SummonSpawnedEvent[] {
    const events: SummonSpawnedEvent[] = [];
    for (const owner of this.owners(game)) {
      const capacity = this.ownerBond(game, owner.ownerKey);
      let used = 0;
      for (const summonId of owner.summonIds) {
        if (!this.content.summons.has(summonId)) {
          throw new FactoryError(`Summon '${summonId}' not found`, {
            summonId,
            ownerId: owner.ownerKey,
          });
        }
        const cost = this.content.summons.get(summonId).bondCost;
        if (used + cost > capacity) {
          this.logger.debug(
            `Summon '${summonId}' (cost ${cost}) exceeds ${owner.ownerKey} bond ${capacity - used}/${capacity}`,
          );
          break;
        }
        used += cost;
        events.push(this.spawn(battle, summonId, owner.ownerInstanceId, capacity, rng));
      }
    }
    return events;
  }

  /** 아군 목록, 위협도, 턴 큐에 삽입 */
  spawn(
    battle: BattleState,
    summonId: string,
    ownerInstanceId: string,
    ownerBond: number,
    rng: Rng,
  ): SummonSpawnedEvent {
    if (!this.content.summons.has(summonId)) {
      throw new FactoryError(`Summon '${summonId}' not found`, { summonId });
    }
    const def = this.content.summons.get(summonId);
    const taken = new Set(allCombatants(battle).map((c) => c.instanceId));
    const summon: Combatant = {
      instanceId: makeInstanceId('summon', rng, taken),
      name: def.name,
      side: 'allies',
      stats: this.stats.scaleSummonStats(def, ownerBond),
      tags: [SUMMON_TAG, ...def.tags.filter((t) => t !== SUMMON_TAG)],
      weaponTags: [],
      skillIds: [],
      guardReduction: 0,
      sourceId: def.id,
      debuffs: [],
      ownerId: ownerInstanceId,
      bondCost: def.bondCost,
    };

    battle.allies.push(summon);
    this.threat.seedAlly(battle, summon);
    this.turns.rebuildQueue(battle);

    return {
      type: 'summon_spawned',
      ownerId: ownerInstanceId,
      summonId: def.id,
      instanceId: summon.instanceId,
      name: summon.name,
      bondCost: def.bondCost,
      ownerBond,
    };
  }
}
