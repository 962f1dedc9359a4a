// 턴 큐 — 살아있는 전투원을 (-speed, instanceId) 순으로 정렬

import { Injectable } from '@nestjs/common';
import { DebuffService } from '../status/debuff.service.js';
import {
  allCombatants,
  isAlive,
  type BattleEvent,
  type BattleResolvedEvent,
  type BattleState,
  type Combatant,
} from '../../types/index.js';

/** 속도 내림차순, 동률은 id 사전순 (code unit) */
export function compareTurnOrder(a: Combatant, b: Combatant): number {
  if (a.stats.speed !== b.stats.speed) return b.stats.speed - a.stats.speed;
  if (a.instanceId < b.instanceId) return -1;
  if (a.instanceId > b.instanceId) return 1;
  return 0;
}

@Injectable()
export class TurnSchedulerService {
  constructor(private readonly debuffs: DebuffService) {}

  /** 사망/소환 발생 시마다 호출 */
  rebuildQueue(battle: BattleState): void {
    const living = allCombatants(battle).filter(isAlive).sort(compareTurnOrder);
    battle.turnQueue = living.map((c) => c.instanceId);
    if (living.length === 0) battle.currentActorId = null;
  }

  initialize(battle: BattleState): void {
    this.rebuildQueue(battle);
    battle.currentActorId = battle.turnQueue[0] ?? null;
  }

  /**
   * 다음 행동자로 진행. 큐 끝에서 처음으로 돌아가거나
   * 마지막 행동자가 큐에서 사라졌으면 새 라운드를 시작한다.
   */
  advanceTurn(battle: BattleState, lastActorId: string): BattleEvent[] {
    this.rebuildQueue(battle);
    if (battle.turnQueue.length === 0) {
      battle.currentActorId = null;
      return [];
    }

    const idx = battle.turnQueue.indexOf(lastActorId);
    const wrapped = idx === -1 || idx === battle.turnQueue.length - 1;
    if (!wrapped) {
      battle.currentActorId = battle.turnQueue[idx + 1];
      return [];
    }

    const events = this.startNewRound(battle);
    this.rebuildQueue(battle);
    battle.currentActorId = battle.turnQueue[0] ?? null;
    return events;
  }

  startNewRound(battle: BattleState): BattleEvent[] {
    battle.roundIndex += 1;
    return [
      { type: 'round_started', roundIndex: battle.roundIndex },
      ...this.debuffs.expire(battle),
    ];
  }

  /**
   * 한쪽 전멸 또는 플레이어 사망 시 전투 종료.
   * 이미 종료된 전투는 null. 큐는 종료 여부와 무관하게 재구성된다.
   */
  checkBattleEnd(battle: BattleState): BattleResolvedEvent | null {
    if (battle.isOver) return null;
    this.rebuildQueue(battle);

    let victor: BattleState['victor'] = null;
    if (!battle.enemies.some(isAlive)) {
      victor = 'allies';
    } else if (!battle.allies.some(isAlive)) {
      victor = 'enemies';
    } else if (battle.playerId !== null) {
      const player = battle.allies.find((c) => c.instanceId === battle.playerId);
      if (player && !isAlive(player)) victor = 'enemies';
    }
    if (victor === null) return null;

    battle.isOver = true;
    battle.victor = victor;
    battle.currentActorId = null;
    return { type: 'battle_resolved', victor };
  }
}
