// 전투 튜닝 상수 — 환경변수 기본값 + 런타임 변경 지원

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';

const CombatConfigSchema = z.object({
  minimumDamage: z.coerce.number().int().min(0),
  antiRepeatIgnoreGap: z.coerce.number().int().min(0),
  aggroBaseDivisor: z.coerce.number().int().min(1),
  playerBaseThreatBonus: z.coerce.number().int().min(0),
  aggroHitBonus: z.coerce.number().int().min(0),
  debuffDurationRounds: z.coerce.number().int().min(1),
  contentDir: z.string().min(1),
});

export type CombatConfig = z.infer<typeof CombatConfigSchema>;

export type CombatConfigPatch = Partial<CombatConfig>;

@Injectable()
export class CombatConfigService {
  private readonly logger = new Logger(CombatConfigService.name);
  private config: CombatConfig;

  constructor() {
    this.config = CombatConfigSchema.parse({
      minimumDamage: process.env.COMBAT_MINIMUM_DAMAGE ?? 1,
      antiRepeatIgnoreGap: process.env.COMBAT_ANTI_REPEAT_IGNORE_GAP ?? 10,
      aggroBaseDivisor: process.env.COMBAT_AGGRO_BASE_DIVISOR ?? 5,
      playerBaseThreatBonus: process.env.COMBAT_PLAYER_BASE_THREAT_BONUS ?? 5,
      aggroHitBonus: process.env.COMBAT_AGGRO_HIT_BONUS ?? 0,
      debuffDurationRounds: process.env.COMBAT_DEBUFF_DURATION_ROUNDS ?? 2,
      contentDir: process.env.COMBAT_CONTENT_DIR ?? 'content/combat_v1',
    });
  }

  get(): CombatConfig {
    return this.config;
  }

  /** 런타임 설정 변경 — 다음 행동부터 반영 */
  update(patch: CombatConfigPatch): CombatConfig {
    this.config = CombatConfigSchema.parse({ ...this.config, ...patch });
    this.logger.log(`Combat config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }
}
