// Zod schema for persisted game snapshots.
// Structural checks live here; cross-field checks (bounds, known owners)
// run in SaveManager.restoreState.

import { z } from 'zod';
import type { UnitType } from '@/engine/data/types/Unit';
import type { TurnPhase } from '@/engine/systems/turn/TurnManager';

export const SNAPSHOT_VERSION = 1;

const unitTypeSchema = z.enum(['Army', 'Fighter', 'Carrier', 'NuclearMissile'] as const satisfies readonly UnitType[]);
// END_TURN_PROCESSING and HANDOFF only exist while an action runs
export const PERSISTED_PHASES = ['ACTIVE_TURN', 'GAME_OVER'] as const satisfies readonly TurnPhase[];
export type PersistedPhase = (typeof PERSISTED_PHASES)[number];
const phaseSchema = z.enum(PERSISTED_PHASES);

const intSchema = z.number().int();
const posSchema = z.object({ x: intSchema, y: intSchema });

const citySchema = z.object({
  x: intSchema,
  y: intSchema,
  owner: z.string().nullable(),
  production: unitTypeSchema.nullable(),
  progress: intSchema.nonnegative(),
  cost: intSchema.nonnegative(),
  support_cap: intSchema.nonnegative(),
});

const mapSchema = z.object({
  width: intSchema.positive(),
  height: intSchema.positive(),
  tiles: z.array(z.string().regex(/^[+.]*$/, 'tile rows may only hold "+" and "."')),
  cities: z.array(citySchema),
});

const unitSchema = z.object({
  id: z.string().min(1),
  type: unitTypeSchema,
  owner: z.string(),
  x: intSchema,
  y: intSchema,
  hp: intSchema,
  max_hp: intSchema.positive(),
  movement: intSchema.nonnegative(),
  moves_left: intSchema,
  home: posSchema.nullable(),
  missile: z.object({
    heading: z.object({ dx: intSchema.min(-1).max(1), dy: intSchema.min(-1).max(1) }).nullable(),
    traveled: intSchema.nonnegative(),
  }).optional(),
});

const tallySchema = z.object({
  Army: intSchema.nonnegative(),
  Fighter: intSchema.nonnegative(),
  Carrier: intSchema.nonnegative(),
  NuclearMissile: intSchema.nonnegative(),
});

const playerSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  is_ai: z.boolean(),
  explored: z.array(z.string().regex(/^[01]*$/, 'explored rows may only hold "0" and "1"')),
  kills: tallySchema,
  losses: tallySchema,
});

const combatantSchema = z.object({ unit_id: z.string(), type: unitTypeSchema, owner: z.string() });

const battleSchema = z.object({
  turn: intSchema,
  attacker: combatantSchema,
  defender: combatantSchema,
  x: intSchema,
  y: intSchema,
  attacker_chance: z.number().min(0).max(1),
  defender_chance: z.number().min(0).max(1),
  outcome: z.enum(['attacker_won', 'defender_won']),
  text: z.string(),
});

export const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  map: mapSchema,
  units: z.array(unitSchema),
  players: z.array(playerSchema).length(2, 'a game has exactly two players'),
  turn_number: intSchema.positive(),
  current_player: z.string(),
  phase: phaseSchema,
  winner: z.string().nullable(),
  rng_state: intSchema.nonnegative(),
  next_unit_id: intSchema.nonnegative(),
  battle_log: z.array(battleSchema),
});

export type GameSnapshot = z.infer<typeof snapshotSchema>;
export type CitySnapshot = z.infer<typeof citySchema>;
export type UnitSnapshot = z.infer<typeof unitSchema>;
export type PlayerSnapshot = z.infer<typeof playerSchema>;
export type BattleSnapshot = z.infer<typeof battleSchema>;

