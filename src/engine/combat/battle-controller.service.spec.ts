import type { Rng } from '../rng/rng.service.js';
import {
  combatantOf,
  makeEngine,
  makeGameState,
  rejectionReason,
} from '../testing/fixtures.js';
import type { BattleState, GameState } from '../../types/index.js';

const PLAYER = 'player_100001';
const MAGE = 'party_ally_mage';

describe('BattleControllerService', () => {
  let engine: ReturnType<typeof makeEngine>;
  let game: GameState;
  let rng: Rng;

  beforeEach(() => {
    engine = makeEngine();
    game = makeGameState();
    rng = engine.rngService.create('controller-seed');
  });

  function start(enemyOrGroupId: string): BattleState {
    return engine.combat.startBattle(enemyOrGroupId, game, rng).battle;
  }

  describe('getView', () => {
    it('아군은 실제 HP, 적은 지식 티어에 따라 표시', () => {
      const battle = start('slime');
      const view = engine.controller.getView(battle);

      expect(view.currentActorId).toBe(PLAYER);
      expect(view.allies.map((c) => c.hpDisplay)).toEqual(['30/30']);
      expect(view.enemies.map((c) => c.hpDisplay)).toEqual(['???']);
      expect(view.isOver).toBe(false);
      expect(view.victor).toBeNull();
    });

    it('정적 범위는 피해를 받아도 고정, 실시간은 현재 HP', () => {
      const battle = start('slime');
      const slime = battle.enemies[0];
      slime.stats.hp = 3;

      game.knowledgeKillCounts = { slime: 25 };
      engine.controller.refreshKnowledgeSnapshot(battle, game);
      expect(engine.controller.getView(battle).enemies[0].hpDisplay).toBe('9-11');

      game.knowledgeKillCounts = { slime: 75 };
      engine.controller.refreshKnowledgeSnapshot(battle, game);
      expect(engine.controller.getView(battle).enemies[0].hpDisplay).toBe('3/10');

      slime.stats.hp = 0;
      expect(engine.controller.getView(battle).enemies[0].hpDisplay).toBe('DOWN');
    });

    it('뷰의 디버프 목록은 복사본', () => {
      const battle = start('slime');
      const view = engine.controller.getView(battle);
      view.enemies[0].debuffs.push({ type: 'attack_down', amount: 1, expiresAtRound: 9 });
      expect(battle.enemies[0].debuffs).toEqual([]);
    });
  });

  it('턴 판별 — 플레이어 → 동료 AI → 적', () => {
    game.partyMembers = ['ally_mage'];
    const battle = start('slime');
    const slime = battle.enemies[0];
    slime.stats.maxHp = 100;
    slime.stats.hp = 100;
    expect(battle.turnQueue).toEqual([PLAYER, MAGE, slime.instanceId]);

    expect(engine.controller.isPlayerTurn(battle, game)).toBe(true);
    expect(engine.controller.isAllyAiTurn(battle, game)).toBe(false);

    engine.controller.applyPlayerAction(battle, game, { type: 'attack', targetId: slime.instanceId });
    expect(engine.controller.isPlayerTurn(battle, game)).toBe(false);
    expect(engine.controller.isAllyAiTurn(battle, game)).toBe(true);
    expect(engine.controller.isEnemyTurn(battle)).toBe(false);

    engine.controller.runAllyAiTurn(battle, rng);
    expect(engine.controller.isEnemyTurn(battle)).toBe(true);
    expect(engine.controller.isAllyAiTurn(battle, game)).toBe(false);
  });

  describe('getAvailableActions', () => {
    it('플레이어 턴 — 스킬/아이템/대화 가능 여부', () => {
      const battle = start('slime');
      const actions = engine.controller.getAvailableActions(battle, game);

      expect(actions.canAttack).toBe(true);
      expect(actions.canUseSkill).toBe(true);
      expect(actions.skills.map((s) => s.id)).toContain('power_strike');
      expect(actions.canUseItem).toBe(true);
      expect(actions.items.map((i) => i.itemId)).toEqual(['potion', 'hex_powder']);
      expect(actions.canTalk).toBe(false);
    });

    it('파티원이 있으면 대화 가능', () => {
      game.partyMembers = ['ally_mage'];
      const battle = start('slime');
      expect(engine.controller.getAvailableActions(battle, game).canTalk).toBe(true);
    });

    it('전투 종료 후에는 아무 행동도 없음', () => {
      const battle = start('slime');
      battle.enemies[0].stats.hp = 1;
      engine.controller.applyPlayerAction(battle, game, {
        type: 'attack',
        targetId: battle.enemies[0].instanceId,
      });
      expect(battle.isOver).toBe(true);
      expect(engine.controller.getAvailableActions(battle, game)).toEqual({
        canAttack: false,
        canUseSkill: false,
        canUseItem: false,
        canTalk: false,
        skills: [],
        items: [],
      });
    });
  });

  describe('applyPlayerAction', () => {
    it('행동 종류별로 전투 서비스에 위임', () => {
      const battle = start('slime');
      const slime = battle.enemies[0].instanceId;
      const events = engine.controller.applyPlayerAction(battle, game, {
        type: 'skill',
        skillId: 'power_strike',
        targetIds: [slime],
      });
      expect(events[0]).toMatchObject({ type: 'skill_used', skillId: 'power_strike' });
      expect(combatantOf(battle, PLAYER).stats.mp).toBe(9);
    });

    it('필드가 빈 입력 → missing_action_field', () => {
      const battle = start('slime');
      expect(
        rejectionReason(() =>
          engine.controller.applyPlayerAction(battle, game, {
            type: 'skill',
            skillId: '',
            targetIds: [],
          }),
        ),
      ).toBe('missing_action_field');
      expect(battle.currentActorId).toBe(PLAYER);
    });

    it('동료 AI / 적 차례 → not_player_turn, 상태 불변', () => {
      game.partyMembers = ['ally_mage'];
      const battle = start('slime');
      const slime = battle.enemies[0];
      slime.stats.maxHp = 100;
      slime.stats.hp = 100;
      engine.controller.applyPlayerAction(battle, game, { type: 'attack', targetId: slime.instanceId });
      expect(battle.currentActorId).toBe(MAGE);

      const before = structuredClone(battle);
      expect(
        rejectionReason(() =>
          engine.controller.applyPlayerAction(battle, game, { type: 'attack', targetId: slime.instanceId }),
        ),
      ).toBe('not_player_turn');
      expect(battle).toEqual(before);

      engine.controller.runAllyAiTurn(battle, rng);
      expect(battle.currentActorId).toBe(slime.instanceId);
      expect(
        rejectionReason(() =>
          engine.controller.applyPlayerAction(battle, game, { type: 'attack', targetId: PLAYER }),
        ),
      ).toBe('not_player_turn');
    });

    it('종료된 전투 → battle_over', () => {
      const battle = start('slime');
      const slime = battle.enemies[0].instanceId;
      battle.enemies[0].stats.hp = 1;
      engine.controller.applyPlayerAction(battle, game, { type: 'attack', targetId: slime });
      expect(
        rejectionReason(() =>
          engine.controller.applyPlayerAction(battle, game, { type: 'attack', targetId: slime }),
        ),
      ).toBe('battle_over');
    });
  });

  it('전투 종료 후 AI 턴은 빈 이벤트', () => {
    const battle = start('slime');
    battle.enemies[0].stats.hp = 1;
    engine.controller.applyPlayerAction(battle, game, {
      type: 'attack',
      targetId: battle.enemies[0].instanceId,
    });
    expect(engine.controller.runEnemyTurn(battle, rng)).toEqual([]);
    expect(engine.controller.runAllyAiTurn(battle, rng)).toEqual([]);
  });

  describe('previewPartyTalk', () => {
    it('상태를 바꾸지 않는다', () => {
      game.partyMembers = ['ally_mage'];
      const battle = start('goblin');
      const before = structuredClone(battle);

      const result = engine.controller.previewPartyTalk(battle, MAGE);
      expect(result.text).toBe('Mage: Goblin look to have around 11-13 HP. Quick Spits fire.');
      expect(result.revealEnemyIds).toEqual([battle.enemies[0].instanceId]);
      expect(battle).toEqual(before);
    });

    it('없는 화자 → unknown_combatant', () => {
      const battle = start('goblin');
      expect(rejectionReason(() => engine.controller.previewPartyTalk(battle, 'nobody'))).toBe(
        'unknown_combatant',
      );
    });
  });

  it('hasKnowledgeOfEnemy — 파티 누군가의 지식 태그와 겹치면 true', () => {
    expect(engine.controller.hasKnowledgeOfEnemy(game, ['goblin'])).toBe(false);
    game.partyMembers = ['ally_mage'];
    expect(engine.controller.hasKnowledgeOfEnemy(game, ['goblin'])).toBe(true);
    expect(engine.controller.hasKnowledgeOfEnemy(game, ['beast'])).toBe(false);
  });

  it('estimateDamage 는 상태를 바꾸지 않는다', () => {
    const battle = start('slime');
    const before = structuredClone(battle);
    expect(engine.controller.estimateDamage(battle, PLAYER, battle.enemies[0].instanceId)).toBe(5);
    expect(battle).toEqual(before);
  });

  it('shouldRenderStatePanel — 첫 턴 또는 플레이어 턴', () => {
    game.partyMembers = ['ally_mage'];
    const battle = start('slime');
    battle.enemies[0].stats.hp = 100;
    expect(engine.controller.shouldRenderStatePanel(battle, game, false)).toBe(true);

    engine.controller.applyPlayerAction(battle, game, {
      type: 'attack',
      targetId: battle.enemies[0].instanceId,
    });
    expect(engine.controller.shouldRenderStatePanel(battle, game, false)).toBe(false);
    expect(engine.controller.shouldRenderStatePanel(battle, game, true)).toBe(true);
  });
});
