import { describeEvent } from './text-utils.js';

describe('describeEvent', () => {
  it('공격 — 흡수량이 있을 때만 표시', () => {
    const base = {
      type: 'attack_resolved',
      attackerId: 'a',
      attackerName: 'Hero',
      targetId: 'b',
      targetName: 'Slime',
      damage: 4,
      absorbed: 0,
      targetHp: 6,
    } as const;
    expect(describeEvent(base)).toBe('Hero hits Slime for 4 → 6 HP');
    expect(describeEvent({ ...base, damage: 2, absorbed: 2, targetHp: 8 })).toBe(
      'Hero hits Slime for 2 (2 absorbed) → 8 HP',
    );
  });

  it('아이템 — 효과 없음 / 증감 부호', () => {
    const base = {
      type: 'item_used',
      userId: 'a',
      userName: 'Hero',
      targetId: 'a',
      targetName: 'Hero',
      itemId: 'potion',
      itemName: 'Potion',
      hpDelta: 0,
      mpDelta: 0,
      hadEffect: false,
    } as const;
    expect(describeEvent(base)).toBe('Hero uses Potion on Hero: had no effect.');
    expect(describeEvent({ ...base, hpDelta: 5, hadEffect: true })).toBe(
      'Hero uses Potion on Hero (HP +5, MP +0)',
    );
  });

  it('디버프 적용/해제', () => {
    expect(
      describeEvent({
        type: 'debuff_applied',
        targetId: 'g',
        targetName: 'Goblin',
        debuffType: 'attack_down',
        amount: 2,
        expiresAtRound: 3,
      }),
    ).toBe('Goblin: ATK -2 until round 3');
    expect(
      describeEvent({ type: 'debuff_expired', targetId: 'g', targetName: 'Goblin', debuffType: 'defense_down' }),
    ).toBe('Goblin: DEF penalty wears off');
  });

  it('라운드, 보상, 결과', () => {
    expect(describeEvent({ type: 'round_started', roundIndex: 2 })).toBe('-- Round 2 --');
    expect(describeEvent({ type: 'gold_granted', amount: 5, totalGold: 25 })).toBe('+5 gold (total 25)');
    expect(
      describeEvent({ type: 'level_up', memberId: 'p', memberName: 'Hero', newLevel: 3 }),
    ).toBe('Hero reached level 3!');
    expect(describeEvent({ type: 'battle_resolved', victor: 'allies' })).toBe('Victory!');
    expect(describeEvent({ type: 'battle_resolved', victor: 'enemies' })).toBe('Defeat...');
  });

  it('파티 대화는 본문 그대로', () => {
    expect(
      describeEvent({
        type: 'party_talk',
        speakerId: 'm',
        speakerName: 'Mage',
        text: 'Mage: Slime look to have around 9-11 HP.',
        revealedEnemyIds: [],
      }),
    ).toBe('Mage: Slime look to have around 9-11 HP.');
  });
});
