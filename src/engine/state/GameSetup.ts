// ─────────────────────────────────────────────
//  Game Setup: builds the turn-1 GameState from a config
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { GameState } from './GameState';
import { StateQuery } from './GameState';
import type { GameConfig } from '@/config';
import type { MapData, Pos } from '@/engine/data/types/Map';
import type { PlayerData, PlayerId } from '@/engine/data/types/Player';
import { DEFAULT_PRODUCTION, unitData } from '@/engine/data/UnitCatalog';
import { createPrng, entropySeed } from '@/engine/utils/Prng';
import { generateTerrain } from '@/engine/systems/terrain/TerrainGenerator';
import { landTiles, placeCities } from '@/engine/systems/terrain/CityPlacement';
import { initFog, recomputeAll } from '@/engine/systems/visibility/VisibilitySystem';
import { createTelemetry } from '@/engine/systems/combat/Telemetry';
import { spawnUnit } from '@/engine/systems/production/ProductionSystem';
import { MathUtils } from '@/engine/utils/MathUtils';

// Separate streams per concern, all derived from the one game seed
const PLACEMENT_SALT = 0x9e3779b9;
const COMBAT_SALT = 0x85ebca6b;

/** Free land tile closest to the map centre (squared distance, row-major ties) */
export function findCentralLand(state: GameState): Pos | null {
  const center = { x: Math.floor(state.map.width / 2), y: Math.floor(state.map.height / 2) };
  let best: Pos | null = null;
  let bestDist = Infinity;
  for (const pos of landTiles(state.map.tiles)) {
    if (StateQuery.at(state, pos.x, pos.y)) continue;
    const d = MathUtils.distSq(pos, center);
    if (d < bestDist) {
      best = pos;
      bestDist = d;
    }
  }
  return best;
}

/**
 * Generate a fresh game: terrain, cities, one starting city and Army per
 * player, fog computed for both. Player one moves first.
 */
export function createInitialState(config: GameConfig): GameState {
  const seed = config.seed ?? entropySeed();
  const tiles = generateTerrain(config.width, config.height, seed, config.landFraction);
  const map: MapData = { width: config.width, height: config.height, tiles };

  const cities = placeCities(tiles, config.cityCount, config.citySeparation, createPrng(seed ^ PLACEMENT_SALT));

  const players: PlayerData[] = config.playerNames.map(name => ({ id: name, name, isAi: false }));
  const ids: PlayerId[] = players.map(p => p.id);

  const blank: GameState = {
    map,
    cities,
    units: {},
    players,
    fog: initFog(ids, config.width, config.height),
    telemetry: createTelemetry(ids),
    turn: 1,
    activePlayer: ids[0] ?? 'P1',
    phase: 'ACTIVE_TURN',
    winner: null,
    rngState: createPrng(seed ^ COMBAT_SALT).state,
    nextUnitId: 1,
  };

  return produce(blank, draft => {
    const first = draft.cities[0];
    const last = draft.cities[draft.cities.length - 1];
    // A lone city stays neutral; both players then start on central land
    const starts = draft.cities.length >= 2 ? [first, last] : [];

    ids.forEach((id, seat) => {
      const city = starts[seat];
      if (!city) return;
      city.owner = id;
      city.production = DEFAULT_PRODUCTION;
      city.cost = unitData(DEFAULT_PRODUCTION).cost;
    });

    for (const id of ids) {
      const home = StateQuery.citiesOf(draft, id)[0];
      const site = home ?? findCentralLand(draft);
      if (!site) continue;
      spawnUnit(draft, 'Army', id, site, home ? { x: home.x, y: home.y } : null);
    }

    recomputeAll(draft);
  });
}
