import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { CombatConfigService } from '../common/config/combat-config.service.js';
import { GameError, InvalidInputError } from '../common/errors/game-errors.js';
import { makeEngine } from '../engine/testing/fixtures.js';
import type { BattleEvent } from '../types/index.js';
import { StaticCombatContent } from './combat-content.js';
import { ContentLoaderService } from './content-loader.service.js';

const CONTENT_DIR = resolve(__dirname, '../../content/combat_v1');

function makeLoader(contentDir: string): ContentLoaderService {
  const config = new CombatConfigService();
  config.update({ contentDir });
  return new ContentLoaderService(config);
}

describe('ContentLoaderService', () => {
  it('로드 전 조회 → CONTENT_NOT_LOADED', () => {
    const loader = makeLoader(CONTENT_DIR);
    expect(() => loader.playerDefaults()).toThrow(GameError);
  });

  it('combat_v1 전체 로드', async () => {
    const loader = makeLoader(CONTENT_DIR);
    await loader.onModuleInit();

    expect(loader.playerDefaults().classId).toBe('warrior');
    expect(loader.enemyGroups.get('goblin_pack').enemyIds).toEqual([
      'goblin_grunt',
      'goblin_grunt',
      'goblin_shaman',
    ]);
    expect(loader.skills.has('mend_aura')).toBe(true);
    expect(loader.knowledgeFor('nobody')).toEqual([]);
  });

  describe('잘못된 디렉터리', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), 'combat-content-'));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it('필수 파일이 없으면 실패', async () => {
      await expect(makeLoader(dir).loadAll()).rejects.toThrow();
    });

    it('JSON 파싱 실패 → InvalidInputError', async () => {
      await writeFile(join(dir, 'enemies.json'), '[{', 'utf-8');
      await writeFile(join(dir, 'skills.json'), '[]', 'utf-8');
      await writeFile(join(dir, 'items.json'), '[]', 'utf-8');
      await writeFile(join(dir, 'player_defaults.json'), '{}', 'utf-8');
      await expect(makeLoader(dir).loadAll()).rejects.toThrow(InvalidInputError);
    });
  });

  it('중복 id / 스키마 위반 → InvalidInputError', () => {
    const playerDefaults = {
      classId: 'x',
      baseStats: { maxHp: 10, maxMp: 0, attack: 1, defense: 0, speed: 1 },
      attributes: { STR: 0, DEX: 0, INT: 0, VIT: 0, BOND: 0 },
    };
    const slime = { id: 'slime', name: 'Slime', hp: 5, attack: 1, defense: 0, speed: 1 };

    expect(() => StaticCombatContent.fromRaw({ enemies: [slime, slime], playerDefaults })).toThrow(
      InvalidInputError,
    );
    expect(() =>
      StaticCombatContent.fromRaw({ enemies: [{ ...slime, hp: -1 }], playerDefaults }),
    ).toThrow(InvalidInputError);
  });

  it('자기 대상 스킬은 damage 효과를 가질 수 없다', () => {
    const playerDefaults = {
      classId: 'x',
      baseStats: { maxHp: 10, maxMp: 0, attack: 1, defense: 0, speed: 1 },
      attributes: { STR: 0, DEX: 0, INT: 0, VIT: 0, BOND: 0 },
    };
    const skill = { id: 'recoil', name: 'Recoil', targetMode: 'self', mpCost: 0, basePower: 2 };

    expect(() =>
      StaticCombatContent.fromRaw({ skills: [{ ...skill, effectType: 'damage' }], playerDefaults }),
    ).toThrow(InvalidInputError);
    expect(
      StaticCombatContent.fromRaw({ skills: [{ ...skill, effectType: 'guard' }], playerDefaults })
        .skills.get('recoil').effectType,
    ).toBe('guard');
  });

  describe('실제 콘텐츠로 자동 전투', () => {
    async function autoBattle(seed: string) {
      const loader = makeLoader(CONTENT_DIR);
      await loader.onModuleInit();
      const engine = makeEngine(loader);
      const { game, rng } = engine.gameState.createNewGame(seed, 'Hero');
      const { battle, events } = engine.combat.startBattle('goblin_pack', game, rng);
      const log: BattleEvent[] = [...events];

      for (let i = 0; i < 500 && !battle.isOver; i++) {
        log.push(
          ...(engine.controller.isEnemyTurn(battle)
            ? engine.controller.runEnemyTurn(battle, rng)
            : engine.controller.runAllyAiTurn(battle, rng)),
        );
      }
      log.push(...engine.controller.applyVictoryRewards(battle, game, rng));
      engine.controller.applyDefeat(battle, game);
      return { battle, game, log, rng: rng.exportState() };
    }

    it('전투가 끝나고 같은 seed 는 같은 결과', async () => {
      const first = await autoBattle('e2e-seed');
      const second = await autoBattle('e2e-seed');

      expect(first.battle.isOver).toBe(true);
      expect(first.battle.victor).not.toBeNull();
      expect(first.battle.outcomeApplied).toBe(true);
      expect(second.log).toEqual(first.log);
      expect(second.game).toEqual(first.game);
      expect(second.rng).toEqual(first.rng);
    });
  });
});
