import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from './app.module.js';
import { describeEvent } from './common/text-utils.js';
import { BattleControllerService } from './engine/combat/battle-controller.service.js';
import { CombatService } from './engine/combat/combat.service.js';
import { GameStateService } from './engine/state/game-state.service.js';
import type { BattleEvent } from './types/index.js';

const MAX_ACTIONS = 500;

/** 자동 전투 1회: `node dist/main.js [seed] [enemyOrGroupId] [battleLevel]` */
async function bootstrap(): Promise<void> {
  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'warn', 'error'],
  });
  const logger = new Logger('Simulation');
  const [seed = 'demo-seed', enemyOrGroupId = 'goblin_pack', level = '0'] = process.argv.slice(2);

  const states = app.get(GameStateService);
  const combat = app.get(CombatService);
  const controller = app.get(BattleControllerService);

  const { game, rng } = states.createNewGame(seed, 'Hero');
  const log = (events: readonly BattleEvent[]) => {
    for (const event of events) logger.log(describeEvent(event));
  };

  const { battle, events } = combat.startBattle(enemyOrGroupId, game, rng, {
    battleLevel: Number.parseInt(level, 10) || 0,
  });
  log(events);

  let actions = 0;
  while (!battle.isOver && actions < MAX_ACTIONS) {
    log(
      controller.isEnemyTurn(battle)
        ? controller.runEnemyTurn(battle, rng)
        : controller.runAllyAiTurn(battle, rng),
    );
    actions += 1;
  }
  if (!battle.isOver) {
    logger.warn(`Battle ${battle.battleId} did not finish within ${MAX_ACTIONS} actions`);
  }

  if (battle.victor === 'allies') {
    log(controller.applyVictoryRewards(battle, game, rng));
  } else if (controller.applyDefeat(battle, game)) {
    logger.log('The party retreats to recover.');
  }

  const snapshot = states.exportSnapshot(game, rng);
  logger.log(
    `gold=${game.gold} inventory=${JSON.stringify(game.inventory)} rng=${JSON.stringify(snapshot.rng)}`,
  );
  await app.close();
}

bootstrap().catch((err: unknown) => {
  new Logger('Simulation').error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exitCode = 1;
});
