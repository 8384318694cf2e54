// ─────────────────────────────────────────────
//  Terrain Generator
//  Noise → cellular smoothing → percentile threshold → cleanup →
//  connectivity repair. Deterministic for a given seed.
//  Pure functions: no side effects.
// ─────────────────────────────────────────────

import type { Pos, Terrain, TileGrid } from '@/engine/data/types/Map';
import { NEIGHBOR_OFFSETS } from '@/engine/data/types/Map';
import { createPrng, entropySeed } from '@/engine/utils/Prng';
import type { Prng } from '@/engine/utils/Prng';
import { ConfigError } from '@/engine/utils/errors';
import { CLEANUP_PASSES, SMOOTHING_PASSES, SMOOTHING_STEP } from '@/config';

const ORTHOGONAL: [number, number][] = [[1, 0], [-1, 0], [0, 1], [0, -1]];

/** Row-major float field */
type Field = number[][];

function fieldAt(field: Field, x: number, y: number): number | undefined {
  return field[y]?.[x];
}

function setTile(tiles: TileGrid, x: number, y: number, t: Terrain): void {
  const row = tiles[y];
  if (row && x >= 0 && x < row.length) row[x] = t;
}

// --- Noise ---

function makeNoise(width: number, height: number, prng: Prng): Field {
  const noise: Field = [];
  for (let y = 0; y < height; y++) {
    const row: number[] = [];
    for (let x = 0; x < width; x++) row.push(prng.next());
    noise.push(row);
  }
  return noise;
}

function countLandish(field: Field, x: number, y: number): number {
  let total = 0;
  for (const { dx, dy } of NEIGHBOR_OFFSETS) {
    const v = fieldAt(field, x + dx, y + dy);
    if (v !== undefined && v > 0.5) total++;
  }
  return total;
}

/** One cellular pass over the noise: land-leaning neighbourhoods pull values up, sea-leaning ones down. */
export function smoothNoise(field: Field): Field {
  return field.map((row, y) => row.map((v, x) => {
    const n = countLandish(field, x, y);
    if (n >= 5) return Math.min(1, v + SMOOTHING_STEP);
    if (n <= 3) return Math.max(0, v - SMOOTHING_STEP);
    return v;
  }));
}

function strongestCell(field: Field): Pos {
  let best: Pos = { x: 0, y: 0 };
  let bestValue = -Infinity;
  field.forEach((row, y) => row.forEach((v, x) => {
    if (v > bestValue) {
      bestValue = v;
      best = { x, y };
    }
  }));
  return best;
}

/** Value at the (1 - landFraction) percentile of the field */
export function landThreshold(field: Field, landFraction: number): number {
  const flat = field.flat().sort((a, b) => a - b);
  if (flat.length === 0) return 0;
  const idx = Math.min(flat.length - 1, Math.floor((1 - landFraction) * flat.length));
  return flat[idx] ?? 0;
}

// --- Tile passes ---

/** Removes tiny lakes and peninsulas: five or more like neighbours flip the tile. */
export function cleanupTiles(tiles: TileGrid): TileGrid {
  return tiles.map((row, y) => row.map((t, x): Terrain => {
    let land = 0;
    let water = 0;
    for (const { dx, dy } of NEIGHBOR_OFFSETS) {
      const n = tiles[y + dy]?.[x + dx];
      if (n === 'land') land++;
      else if (n === 'ocean') water++;
    }
    if (land >= 5) return 'land';
    if (water >= 5) return 'ocean';
    return t;
  }));
}

// --- Connectivity ---

/**
 * 4-connected land components, discovered in row-major order.
 * Each component lists its tiles in breadth-first order starting from the
 * first tile discovered.
 */
export function findLandComponents(tiles: TileGrid): Pos[][] {
  const height = tiles.length;
  const width = tiles[0]?.length ?? 0;
  const visited: boolean[][] = Array.from({ length: height }, () => Array<boolean>(width).fill(false));
  const components: Pos[][] = [];

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      if (visited[y]?.[x] || tiles[y]?.[x] !== 'land') continue;

      const comp: Pos[] = [{ x, y }];
      const vrow = visited[y];
      if (vrow) vrow[x] = true;

      for (let head = 0; head < comp.length; head++) {
        const cur = comp[head];
        if (!cur) break;
        for (const [dx, dy] of ORTHOGONAL) {
          const nx = cur.x + dx;
          const ny = cur.y + dy;
          const row = visited[ny];
          if (!row || nx < 0 || nx >= width || row[nx]) continue;
          if (tiles[ny]?.[nx] !== 'land') continue;
          row[nx] = true;
          comp.push({ x: nx, y: ny });
        }
      }
      components.push(comp);
    }
  }

  return components;
}

/** Lays land along an L-shaped path: along x first, then along y. */
export function carveCorridor(tiles: TileGrid, from: Pos, to: Pos): void {
  let { x, y } = from;
  while (x !== to.x) {
    setTile(tiles, x, y, 'land');
    x += to.x > x ? 1 : -1;
  }
  while (y !== to.y) {
    setTile(tiles, x, y, 'land');
    y += to.y > y ? 1 : -1;
  }
  setTile(tiles, x, y, 'land');
}

/**
 * Joins every land component to the largest one (ties: first discovered).
 * Returns a new grid; the input is left untouched.
 */
export function connectLand(tiles: TileGrid): TileGrid {
  const out = tiles.map(row => [...row]);
  const components = findLandComponents(out);
  if (components.length <= 1) return out;

  // Stable sort keeps discovery order among equal sizes
  const ranked = [...components].sort((a, b) => b.length - a.length);
  const main = ranked[0]?.[0];
  if (!main) return out;

  for (const comp of ranked.slice(1)) {
    const rep = comp[0];
    if (rep) carveCorridor(out, rep, main);
  }
  return out;
}

// --- Main generator ---

/**
 * Generate a width × height land/ocean grid with roughly `landFraction` land,
 * all of it one 4-connected region. `seed = null` draws fresh entropy.
 */
export function generateTerrain(
  width: number,
  height: number,
  seed: number | null,
  landFraction: number,
): TileGrid {
  const issues: string[] = [];
  if (!Number.isInteger(width) || width < 1) issues.push(`width must be a positive integer (got ${width})`);
  if (!Number.isInteger(height) || height < 1) issues.push(`height must be a positive integer (got ${height})`);
  if (!(landFraction > 0 && landFraction <= 1)) issues.push(`landFraction must be in (0, 1] (got ${landFraction})`);
  if (issues.length > 0) throw new ConfigError(issues);

  const prng = createPrng(seed ?? entropySeed());

  let noise = makeNoise(width, height, prng);
  for (let i = 0; i < SMOOTHING_PASSES; i++) noise = smoothNoise(noise);

  const threshold = landThreshold(noise, landFraction);
  let tiles: TileGrid = noise.map(row => row.map((v): Terrain => (v >= threshold ? 'land' : 'ocean')));

  for (let i = 0; i < CLEANUP_PASSES; i++) tiles = cleanupTiles(tiles);

  // Cleanup can erase a sparse map entirely; keep the strongest cell as land.
  if (findLandComponents(tiles).length === 0) {
    const peak = strongestCell(noise);
    setTile(tiles, peak.x, peak.y, 'land');
  }

  return connectLand(tiles);
}
