import type { BattleEvent } from '../types/index.js';

/**
 * 전투 이벤트 → 한 줄 로그 텍스트.
 * 새 이벤트 타입이 추가되면 never 검사에서 컴파일 오류가 난다.
 */
export function describeEvent(event: BattleEvent): string {
  switch (event.type) {
    case 'battle_started':
      return `Battle ${event.battleId} begins (level ${event.battleLevel}): ${event.enemyNames.join(', ')}`;
    case 'summon_spawned':
      return `${event.name} answers the call (bond ${event.bondCost}/${event.ownerBond})`;
    case 'enemy_targeted':
      return `${event.attackerId} targets ${event.targetId} (threat ${event.threat}${event.antiRepeatApplied ? ', switched' : ''})`;
    case 'attack_resolved':
      return `${event.attackerName} hits ${event.targetName} for ${event.damage}${absorbedSuffix(event.absorbed)} → ${event.targetHp} HP`;
    case 'skill_used':
      return `${event.attackerName} uses ${event.skillName} on ${event.targetName} for ${event.damage}${absorbedSuffix(event.absorbed)} → ${event.targetHp} HP`;
    case 'skill_failed':
      return `${event.combatantName}'s ${event.skillId} fails (${event.reason})`;
    case 'guard_applied':
      return `${event.combatantName} braces (guard ${event.amount})`;
    case 'item_used':
      if (!event.hadEffect) {
        return `${event.userName} uses ${event.itemName} on ${event.targetName}: had no effect.`;
      }
      return `${event.userName} uses ${event.itemName} on ${event.targetName} (HP ${signed(event.hpDelta)}, MP ${signed(event.mpDelta)})`;
    case 'debuff_applied':
      return `${event.targetName}: ${debuffLabel(event.debuffType)} -${event.amount} until round ${event.expiresAtRound}`;
    case 'debuff_expired':
      return `${event.targetName}: ${debuffLabel(event.debuffType)} penalty wears off`;
    case 'combatant_defeated':
      return `${event.combatantName} is defeated`;
    case 'party_talk':
      return event.text;
    case 'round_started':
      return `-- Round ${event.roundIndex} --`;
    case 'gold_granted':
      return `+${event.amount} gold (total ${event.totalGold})`;
    case 'exp_granted':
      return `${event.memberName} gains ${event.amount} EXP (Lv ${event.level})`;
    case 'level_up':
      return `${event.memberName} reached level ${event.newLevel}!`;
    case 'loot_acquired':
      return `Obtained ${event.itemName} x${event.quantity}`;
    case 'battle_resolved':
      return event.victor === 'allies' ? 'Victory!' : 'Defeat...';
    default: {
      const unreachable: never = event;
      return unreachable;
    }
  }
}

function absorbedSuffix(absorbed: number): string {
  return absorbed > 0 ? ` (${absorbed} absorbed)` : '';
}

function signed(value: number): string {
  return value >= 0 ? `+${value}` : `${value}`;
}

function debuffLabel(type: 'attack_down' | 'defense_down'): string {
  return type === 'attack_down' ? 'ATK' : 'DEF';
}
