// ─────────────────────────────────────────────
//  Unit Catalog: static stats + production cost per unit type
// ─────────────────────────────────────────────

import type { UnitData, UnitType } from './types/Unit';
import { UNIT_TYPES } from './types/Unit';

export const UNIT_CATALOG: Readonly<Record<UnitType, UnitData>> = {
  Army:           { type: 'Army',           name: 'Army',           glyph: 'A', maxHp: 10, movement: 1, sight: 2, cost: 6 },
  Fighter:        { type: 'Fighter',        name: 'Fighter',        glyph: 'F', maxHp: 8,  movement: 6, sight: 4, cost: 10 },
  Carrier:        { type: 'Carrier',        name: 'Carrier',        glyph: 'C', maxHp: 12, movement: 3, sight: 2, cost: 16 },
  NuclearMissile: { type: 'NuclearMissile', name: 'Nuclear Missile', glyph: 'N', maxHp: 1, movement: 8, sight: 1, cost: 30 },
};

/** Order used when cycling a city's production */
export const PRODUCTION_ORDER: readonly UnitType[] = UNIT_TYPES;

/** Order given to captured and newly founded cities */
export const DEFAULT_PRODUCTION: UnitType = 'Army';

export function isUnitType(value: unknown): value is UnitType {
  return UNIT_TYPES.some(t => t === value);
}

export function unitData(type: UnitType): UnitData {
  return UNIT_CATALOG[type];
}
