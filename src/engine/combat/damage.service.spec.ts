import { DamageService } from './damage.service.js';
import { ThreatService } from './threat.service.js';
import { DebuffService } from '../status/debuff.service.js';
import { StatsService } from '../stats/stats.service.js';
import {
  makeBattle,
  makeCombatant,
  makeConfig,
  makeEnemy,
} from '../testing/fixtures.js';
import type { Combatant } from '../../types/index.js';

function attackerWith(attack: number): Combatant {
  return makeCombatant('a', {
    stats: { maxHp: 20, hp: 20, maxMp: 0, mp: 0, attack, defense: 0, speed: 5 },
  });
}

function targetWith(defense: number, hp = 20): Combatant {
  return makeEnemy('t', {
    stats: { maxHp: 20, hp, maxMp: 0, mp: 0, attack: 1, defense, speed: 1 },
  });
}

describe('DamageService', () => {
  let service: DamageService;

  beforeEach(() => {
    const config = makeConfig();
    service = new DamageService(
      config,
      new StatsService(),
      new DebuffService(),
      new ThreatService(config),
    );
  });

  it('ATK 6 vs DEF 2 → 4', () => {
    const attacker = attackerWith(6);
    const target = targetWith(2);
    const battle = makeBattle([attacker], [target]);
    const result = service.resolve(battle, attacker, target);
    expect(result).toEqual({ damage: 4, absorbed: 0, targetHp: 16, defeated: false });
  });

  it('가드 3 → 1 피해, 가드는 0으로 초기화', () => {
    const attacker = attackerWith(6);
    const target = targetWith(2);
    target.guardReduction = 3;
    const battle = makeBattle([attacker], [target]);

    const first = service.resolve(battle, attacker, target);
    expect(first).toEqual({ damage: 1, absorbed: 3, targetHp: 19, defeated: false });
    expect(target.guardReduction).toBe(0);

    const second = service.resolve(battle, attacker, target);
    expect(second.damage).toBe(4);
  });

  it('가드가 피해보다 크면 0 피해, 남은 가드도 소멸', () => {
    const attacker = attackerWith(3);
    const target = targetWith(0);
    target.guardReduction = 10;
    const battle = makeBattle([attacker], [target]);
    const result = service.resolve(battle, attacker, target);
    expect(result.damage).toBe(0);
    expect(result.absorbed).toBe(3);
    expect(target.guardReduction).toBe(0);
  });

  it('최소 피해 1', () => {
    expect(service.estimate(attackerWith(2), targetWith(10))).toBe(1);
  });

  it('디버프 반영 — attack_down 최소 1, defense_down 최소 0', () => {
    const attacker = attackerWith(6);
    attacker.debuffs.push({ type: 'attack_down', amount: 10, expiresAtRound: 3 });
    const target = targetWith(2);
    target.debuffs.push({ type: 'defense_down', amount: 5, expiresAtRound: 3 });
    expect(service.effectiveAttack(attacker)).toBe(1);
    expect(service.effectiveDefense(target)).toBe(0);
    expect(service.estimate(attacker, target, 2)).toBe(3);
  });

  it('HP는 0 미만으로 내려가지 않고, 사망 시 디버프 제거', () => {
    const attacker = attackerWith(50);
    const target = targetWith(0, 5);
    target.debuffs.push({ type: 'defense_down', amount: 1, expiresAtRound: 3 });
    const battle = makeBattle([attacker], [target]);
    const result = service.resolve(battle, attacker, target);
    expect(result.targetHp).toBe(0);
    expect(result.defeated).toBe(true);
    expect(target.debuffs).toEqual([]);
  });

  it('estimate는 순수 — HP, 가드 불변', () => {
    const attacker = attackerWith(6);
    const target = targetWith(2);
    target.guardReduction = 3;
    expect(service.estimate(attacker, target, 1)).toBe(5);
    expect(target.stats.hp).toBe(20);
    expect(target.guardReduction).toBe(3);
  });

  it('피해는 위협도에 기록', () => {
    const attacker = attackerWith(6);
    const target = targetWith(2);
    const battle = makeBattle([attacker], [target], { playerId: null });
    service.resolve(battle, attacker, target);
    // base floor(20/5)=4 + 4 피해
    expect(battle.enemyAggro['t']['a']).toBe(8);
  });
});
