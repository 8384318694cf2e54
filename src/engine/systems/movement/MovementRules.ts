// ─────────────────────────────────────────────
//  Movement Rules: per-type strategy table
// ─────────────────────────────────────────────

import type { Terrain } from '@/engine/data/types/Map';
import type { UnitType } from '@/engine/data/types/Unit';

export interface MovementRule {
  canEnter(terrain: Terrain): boolean;
  /** Takes ownership of a city it ends a move on */
  canCapture: boolean;
  /** May jump a friendly unit for two moves */
  hopsFriendly: boolean;
  /** Attacks an enemy on the destination instead of being blocked */
  fights: boolean;
  /** Consumed by flight rules of its own (heading lock, auto-detonation) */
  ballistic: boolean;
}

const anyTerrain = (): boolean => true;

export const MOVEMENT_RULES: Readonly<Record<UnitType, MovementRule>> = {
  Army: {
    canEnter: t => t === 'land',
    canCapture: true,
    hopsFriendly: false,
    fights: true,
    ballistic: false,
  },
  Fighter: {
    canEnter: anyTerrain,
    canCapture: false,
    hopsFriendly: true,
    fights: true,
    ballistic: false,
  },
  Carrier: {
    canEnter: t => t === 'ocean',
    canCapture: false,
    hopsFriendly: false,
    fights: true,
    ballistic: false,
  },
  NuclearMissile: {
    canEnter: anyTerrain,
    canCapture: false,
    hopsFriendly: false,
    fights: false,
    ballistic: true,
  },
};

export function movementRule(type: UnitType): MovementRule {
  return MOVEMENT_RULES[type];
}

const TERRAIN_NAMES: Record<UnitType, string> = {
  Army: 'land',
  Fighter: 'any terrain',
  Carrier: 'ocean',
  NuclearMissile: 'any terrain',
};

export function terrainRequirement(type: UnitType): string {
  return TERRAIN_NAMES[type];
}
