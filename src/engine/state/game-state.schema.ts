// save_v1 스냅샷 스키마 — importSnapshot 검증용

import { z } from 'zod';
import { AttributesSchema, BaseStatsSchema } from '../../content/content.schemas.js';

export const SAVE_VERSION = 'save_v1';

const id = z.string().min(1);
const nonNegInt = z.number().int().min(0);

export const CombatStatsSchema = z.object({
  maxHp: z.number().int().min(1),
  hp: nonNegInt,
  maxMp: nonNegInt,
  mp: nonNegInt,
  attack: nonNegInt,
  defense: nonNegInt,
  speed: nonNegInt,
});

export const PlayerStateSchema = z.object({
  id,
  name: z.string().min(1),
  classId: id,
  baseStats: BaseStatsSchema,
  stats: CombatStatsSchema,
  attributes: AttributesSchema,
  equippedSummons: z.array(id),
});

export const GameStateSchema = z.object({
  seed: z.string(),
  player: PlayerStateSchema.nullable(),
  partyMembers: z.array(id),
  partyMemberAttributes: z.record(id, AttributesSchema),
  partyMemberSummonLoadouts: z.record(id, z.array(id)),
  equipment: z.record(
    id,
    z.object({ weaponIds: z.array(id), armourIds: z.array(id) }),
  ),
  memberLevels: z.record(id, z.number().int().min(1)),
  memberExp: z.record(id, nonNegInt),
  gold: nonNegInt,
  inventory: z.array(z.object({ itemId: id, qty: z.number().int().min(1) })),
  knowledgeKillCounts: z.record(z.string(), nonNegInt),
  flags: z.object({ lastBattleDefeat: z.boolean() }),
});

export const RngStateSchema = z.object({
  seed: z.string(),
  cursor: nonNegInt,
});

export const GameSnapshotSchema = z.object({
  version: z.literal(SAVE_VERSION),
  game: GameStateSchema,
  rng: RngStateSchema,
});

export type GameSnapshot = z.infer<typeof GameSnapshotSchema>;
