// ─────────────────────────────────────────────
//  Game configuration & rule constants
// ─────────────────────────────────────────────

import { z } from 'zod';
import { ConfigError } from '@/engine/utils/errors';

// ── Map generation ──
export const SMOOTHING_PASSES = 4;
export const CLEANUP_PASSES   = 2;
export const SMOOTHING_STEP   = 0.2;

// ── Visibility ──
export const CITY_SIGHT = 3;

// ── Cities & production ──
export const DEFAULT_SUPPORT_CAP = 2;
export const HEAL_PER_TURN       = 1;

// ── Combat ──
export const ATTACK_DAMAGE      = 3;
export const DEFENSE_DAMAGE     = 2;
/** Symmetric swing applied when the defender holds its own city */
export const CITY_DEFENSE_BONUS = 0.1;

// ── Nuclear missiles ──
export const MISSILE_MAX_RANGE    = 8;
export const MISSILE_BLAST_RADIUS = 2;

// ── Telemetry ──
export const BATTLE_LOG_CAPACITY = 20;

export interface GameConfig {
  width: number;
  height: number;
  /** null = draw a seed from host entropy */
  seed: number | null;
  /** Approximate share of land tiles, in (0, 1] */
  landFraction: number;
  cityCount: number;
  /** Minimum Manhattan distance between cities */
  citySeparation: number;
  playerNames: [string, string];
  logToConsole: boolean;
}

export const DEFAULT_GAME_CONFIG: GameConfig = {
  width: 60,
  height: 24,
  seed: null,
  landFraction: 0.55,
  cityCount: 12,
  citySeparation: 3,
  playerNames: ['P1', 'P2'],
  logToConsole: true,
};

const gameConfigSchema = z.object({
  width: z.number().int().min(2).max(512),
  height: z.number().int().min(2).max(512),
  // Seeds are consumed as uint32
  seed: z.number().int().nonnegative().max(0xffffffff).nullable(),
  landFraction: z.number().gt(0).max(1),
  cityCount: z.number().int().min(2),
  citySeparation: z.number().int().min(1),
  playerNames: z.tuple([z.string().min(1), z.string().min(1)])
    .refine(([a, b]) => a !== b, 'player names must differ'),
  logToConsole: z.boolean(),
});

/** Merge a partial config over the defaults and validate the result. */
export function resolveConfig(overrides: Partial<GameConfig> = {}): GameConfig {
  const parsed = gameConfigSchema.safeParse({ ...DEFAULT_GAME_CONFIG, ...overrides });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(i => `${i.path.join('.') || 'config'}: ${i.message}`),
    );
  }
  return parsed.data;
}
