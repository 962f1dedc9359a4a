import { Module } from '@nestjs/common';
import { CombatConfigModule } from './common/config/config.module.js';
import { ContentModule } from './content/content.module.js';
import { EngineModule } from './engine/engine.module.js';

@Module({
  imports: [CombatConfigModule, ContentModule, EngineModule],
})
export class AppModule {}
