// ─────────────────────────────────────────────
//  City Placement: greedy scatter over shuffled land tiles
// ─────────────────────────────────────────────

import type { Pos, TileGrid } from '@/engine/data/types/Map';
import type { CityState } from '@/engine/data/types/City';
import type { Prng } from '@/engine/utils/Prng';
import { MathUtils } from '@/engine/utils/MathUtils';
import { DEFAULT_SUPPORT_CAP } from '@/config';

export function createCity(x: number, y: number): CityState {
  return {
    x,
    y,
    owner: null,
    production: null,
    progress: 0,
    cost: 0,
    supportCap: DEFAULT_SUPPORT_CAP,
  };
}

export function landTiles(tiles: TileGrid): Pos[] {
  const out: Pos[] = [];
  tiles.forEach((row, y) => row.forEach((t, x) => {
    if (t === 'land') out.push({ x, y });
  }));
  return out;
}

/**
 * Accept shuffled land tiles whose Manhattan distance to every accepted city
 * is at least `minSeparation`. Stops at `count` cities or when candidates run out.
 */
export function placeCities(
  tiles: TileGrid,
  count: number,
  minSeparation: number,
  prng: Prng,
): CityState[] {
  const candidates = prng.shuffle(landTiles(tiles));
  const placed: CityState[] = [];

  for (const pos of candidates) {
    if (placed.length >= count) break;
    if (placed.every(c => MathUtils.dist(c, pos) >= minSeparation)) {
      placed.push(createCity(pos.x, pos.y));
    }
  }

  return placed;
}
