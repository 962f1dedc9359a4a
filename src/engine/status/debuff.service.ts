// 전투 한정 디버프 — 동일 타입 중첩 불가, 라운드 경계에서 만료

import { Injectable } from '@nestjs/common';
import {
  isAlive,
  type BattleState,
  type Combatant,
  type DebuffExpiredEvent,
  type DebuffType,
} from '../../types/index.js';

@Injectable()
export class DebuffService {
  /** 같은 타입이 이미 있으면 false (목록 변경 없음) */
  applyNoStack(
    combatant: Combatant,
    type: DebuffType,
    amount: number,
    expiresAtRound: number,
  ): boolean {
    if (combatant.debuffs.some((d) => d.type === type)) return false;
    combatant.debuffs.push({ type, amount, expiresAtRound });
    return true;
  }

  /** 해당 타입 디버프 총량 */
  penalty(combatant: Combatant, type: DebuffType): number {
    return combatant.debuffs
      .filter((d) => d.type === type)
      .reduce((sum, d) => sum + d.amount, 0);
  }

  /** 라운드 시작 시에만 호출. 살아있는 전투원만 이벤트 발생 */
  expire(battle: BattleState): DebuffExpiredEvent[] {
    const events: DebuffExpiredEvent[] = [];
    for (const c of [...battle.allies, ...battle.enemies]) {
      const expired = c.debuffs.filter((d) => d.expiresAtRound <= battle.roundIndex);
      if (expired.length === 0) continue;
      c.debuffs = c.debuffs.filter((d) => d.expiresAtRound > battle.roundIndex);
      if (!isAlive(c)) continue;
      for (const d of expired) {
        events.push({
          type: 'debuff_expired',
          targetId: c.instanceId,
          targetName: c.name,
          debuffType: d.type,
        });
      }
    }
    return events;
  }

  clear(combatant: Combatant): void {
    combatant.debuffs = [];
  }
}
