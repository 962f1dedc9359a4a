import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { StatsService } from './stats/stats.service.js';
import { DebuffService } from './status/debuff.service.js';
import { TurnSchedulerService } from './turn/turn-scheduler.service.js';
import { ThreatService } from './combat/threat.service.js';
import { DamageService } from './combat/damage.service.js';
import { SkillService } from './combat/skill.service.js';
import { BattleFactoryService } from './combat/battle-factory.service.js';
import { KnowledgeService } from './knowledge/knowledge.service.js';
import { PartyTalkService } from './knowledge/party-talk.service.js';
import { SummonService } from './summon/summon.service.js';
import { InventoryService } from './rewards/inventory.service.js';
import { GameStateService } from './state/game-state.service.js';
import { VictoryService } from './rewards/victory.service.js';
import { CombatService } from './combat/combat.service.js';
import { BattleControllerService } from './combat/battle-controller.service.js';

const providers = [
  // Layer 1
  RngService,
  // Layer 2
  StatsService,
  DebuffService,
  // Layer 3
  TurnSchedulerService,
  ThreatService,
  DamageService,
  SkillService,
  // Layer 4
  KnowledgeService,
  PartyTalkService,
  SummonService,
  InventoryService,
  // Layer 5
  BattleFactoryService,
  GameStateService,
  VictoryService,
  CombatService,
  // Layer 6 — Façade
  BattleControllerService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
