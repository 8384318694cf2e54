// ─────────────────────────────────────────────
//  Map Types
// ─────────────────────────────────────────────

export interface Pos {
  x: number;
  y: number;
}

export type Terrain = 'land' | 'ocean';

/** Terrain grid, indexed [y][x]. Row 0 = top row. */
export type TileGrid = Terrain[][];

export interface MapData {
  width: number;
  height: number;
  tiles: TileGrid;
}

/** Window onto the map used for rendering: top-left corner plus size. */
export interface Viewport {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** A single-step heading; each component is -1, 0 or 1 and not both 0. */
export interface Direction {
  dx: number;
  dy: number;
}

/** 8-neighbour offsets in spawn-search priority order (orthogonals first). */
export const NEIGHBOR_OFFSETS: readonly Direction[] = [
  { dx: 1, dy: 0 },
  { dx: -1, dy: 0 },
  { dx: 0, dy: 1 },
  { dx: 0, dy: -1 },
  { dx: 1, dy: 1 },
  { dx: -1, dy: 1 },
  { dx: 1, dy: -1 },
  { dx: -1, dy: -1 },
];

export function inBounds(map: Pick<MapData, 'width' | 'height'>, x: number, y: number): boolean {
  return x >= 0 && x < map.width && y >= 0 && y < map.height;
}

export function terrainAt(map: MapData, x: number, y: number): Terrain | undefined {
  return map.tiles[y]?.[x];
}

export function isStep(dx: number, dy: number): boolean {
  return Number.isInteger(dx) && Number.isInteger(dy)
    && Math.abs(dx) <= 1 && Math.abs(dy) <= 1
    && (dx !== 0 || dy !== 0);
}
