// ─────────────────────────────────────────────
//  Production System: city build orders, spawning, healing
//  Spawn placement is a strategy table keyed by unit type.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { CityState } from '@/engine/data/types/City';
import type { Pos, Terrain } from '@/engine/data/types/Map';
import { NEIGHBOR_OFFSETS, inBounds } from '@/engine/data/types/Map';
import type { UnitInstance, UnitType } from '@/engine/data/types/Unit';
import { createUnit } from '@/engine/data/types/Unit';
import type { PlayerId } from '@/engine/data/types/Player';
import { PRODUCTION_ORDER, isUnitType, unitData } from '@/engine/data/UnitCatalog';
import type { ActionContext } from '@/engine/state/actions/GameAction';
import { HEAL_PER_TURN } from '@/config';

/** City tile first, then its 8 neighbours */
const SPAWN_OFFSETS: readonly Pos[] = [{ x: 0, y: 0 }, ...NEIGHBOR_OFFSETS.map(d => ({ x: d.dx, y: d.dy }))];

/** First in-bounds, unoccupied tile of `terrain` around the city, or null */
function firstFreeTile(
  state: GameState,
  city: CityState,
  terrain: Terrain,
  offsets: readonly Pos[],
): Pos | null {
  for (const o of offsets) {
    const x = city.x + o.x;
    const y = city.y + o.y;
    if (!inBounds(state.map, x, y)) continue;
    if (StateQuery.terrain(state, x, y) !== terrain) continue;
    if (StateQuery.at(state, x, y)) continue;
    return { x, y };
  }
  return null;
}

interface SpawnProcedure {
  /** Where the unit appears, or null when it cannot be placed this turn */
  site(state: GameState, city: CityState): Pos | null;
  /** Armies count against the city's support cap */
  supported: boolean;
}

const cityTileOnly = (state: GameState, city: CityState): Pos | null =>
  StateQuery.at(state, city.x, city.y) ? null : { x: city.x, y: city.y };

export const SPAWN_PROCEDURES: Readonly<Record<UnitType, SpawnProcedure>> = {
  Army: {
    site(state, city) {
      if (StateQuery.supportedBy(state, city).length >= city.supportCap) return null;
      return firstFreeTile(state, city, 'land', SPAWN_OFFSETS);
    },
    supported: true,
  },
  Fighter: { site: cityTileOnly, supported: false },
  NuclearMissile: { site: cityTileOnly, supported: false },
  Carrier: {
    site: (state, city) => firstFreeTile(state, city, 'ocean', SPAWN_OFFSETS.slice(1)),
    supported: false,
  },
};

// --- Build orders ---

export interface ProductionChange {
  ok: boolean;
  message: string;
}

/** Set `city`'s build order. Progress carries over; the threshold follows the catalog. */
export function setProduction(city: CityState, type: string): ProductionChange {
  if (!isUnitType(type)) return { ok: false, message: `Unknown unit type: ${type}` };
  city.production = type;
  city.cost = unitData(type).cost;
  return { ok: true, message: `City at (${city.x},${city.y}) now producing ${type}` };
}

export function nextInOrder(current: UnitType | null): UnitType {
  if (current === null) return PRODUCTION_ORDER[0] ?? 'Army';
  const idx = PRODUCTION_ORDER.indexOf(current);
  return PRODUCTION_ORDER[(idx + 1) % PRODUCTION_ORDER.length] ?? 'Army';
}

export function cycleProduction(city: CityState): ProductionChange {
  return setProduction(city, nextInOrder(city.production));
}

// --- Per-turn advance ---

export function spawnUnit(
  draft: Draft<GameState>,
  type: UnitType,
  owner: PlayerId,
  pos: Pos,
  home: Pos | null,
): UnitInstance {
  const id = `unit_${draft.nextUnitId}`;
  draft.nextUnitId += 1;
  const unit = createUnit(unitData(type), id, owner, pos.x, pos.y, home);
  draft.units[id] = unit;
  return unit;
}

/**
 * Tick every owned city with a build order. A city that reaches its cost
 * spawns and resets; one that cannot place its unit holds at `cost`.
 * Returns the units spawned.
 */
export function advanceProduction(draft: Draft<GameState>, ctx: ActionContext): UnitInstance[] {
  const spawned: UnitInstance[] = [];

  for (const city of draft.cities) {
    if (city.owner === null || city.production === null || city.cost <= 0) continue;

    city.progress += 1;
    if (city.progress < city.cost) continue;

    const proc = SPAWN_PROCEDURES[city.production];
    const site = proc.site(draft, city);
    if (!site) {
      city.progress = city.cost;
      continue;
    }

    const home = proc.supported ? { x: city.x, y: city.y } : null;
    const unit = spawnUnit(draft, city.production, city.owner, site, home);
    city.progress = 0;
    spawned.push(unit);

    ctx.bus.emit('unitSpawned', { unitId: unit.id, type: unit.type, owner: unit.owner, x: unit.x, y: unit.y });
    ctx.logger.log(`${unit.owner} city at (${city.x},${city.y}) produced ${unit.type}`, 'production');
  }

  return spawned;
}

/** Units standing on a city their owner holds regain HEAL_PER_TURN hp */
export function healUnits(draft: Draft<GameState>): number {
  let healed = 0;
  for (const unit of StateQuery.liveUnits(draft)) {
    if (unit.hp >= unit.maxHp) continue;
    const city = StateQuery.cityAt(draft, unit.x, unit.y);
    if (!city || city.owner !== unit.owner) continue;
    unit.hp = Math.min(unit.maxHp, unit.hp + HEAL_PER_TURN);
    healed++;
  }
  return healed;
}
