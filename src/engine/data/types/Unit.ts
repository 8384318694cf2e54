// ─────────────────────────────────────────────
//  Unit Types
//  One shared record for every unit; per-type behaviour lives in
//  strategy tables keyed by `type` (movement rules, spawn procedures).
// ─────────────────────────────────────────────

import type { Direction, Pos } from './Map';
import type { PlayerId } from './Player';

export type UnitType = 'Army' | 'Fighter' | 'Carrier' | 'NuclearMissile';

export const UNIT_TYPES: readonly UnitType[] = ['Army', 'Fighter', 'Carrier', 'NuclearMissile'];

/** Static catalog entry; never mutated */
export interface UnitData {
  type: UnitType;
  name: string;
  /** Map glyph for the first player; the second player's is lower case */
  glyph: string;
  maxHp: number;
  /** Moves per turn */
  movement: number;
  /** Sight radius (tiles, Euclidean) */
  sight: number;
  /** Production cost in city-turns */
  cost: number;
}

/** Flight state carried by nuclear missiles only */
export interface MissileFlight {
  /** Locked on the first accepted move; null until launched */
  heading: Direction | null;
  /** Tiles covered so far, hops counting both tiles */
  traveled: number;
}

/** Runtime instance of a unit */
export interface UnitInstance {
  readonly id: string;
  readonly type: UnitType;
  readonly owner: PlayerId;

  x: number;
  y: number;

  hp: number;
  maxHp: number;

  movement: number;
  movesLeft: number;

  /** City that supports this unit; a coordinate copy, used for support-cap accounting only */
  home: Pos | null;

  missile?: MissileFlight;
}

/** A record of all units by id for O(1) lookup; insertion order is creation order */
export type UnitMap = Record<string, UnitInstance>;

export function isAlive(unit: Pick<UnitInstance, 'hp'>): boolean {
  return unit.hp > 0;
}

/** Creates a UnitInstance from catalog data with a given spawn position and full moves */
export function createUnit(
  data: UnitData,
  id: string,
  owner: PlayerId,
  x: number,
  y: number,
  home: Pos | null = null,
): UnitInstance {
  const unit: UnitInstance = {
    id,
    type: data.type,
    owner,
    x,
    y,
    hp: data.maxHp,
    maxHp: data.maxHp,
    movement: data.movement,
    movesLeft: data.movement,
    home: home ? { x: home.x, y: home.y } : null,
  };

  if (data.type === 'NuclearMissile') {
    unit.missile = { heading: null, traveled: 0 };
  }

  return unit;
}
