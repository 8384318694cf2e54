import type { Pos } from '@/engine/data/types/Map';

export const MathUtils = {
  /** Manhattan distance */
  dist(a: Pos, b: Pos): number {
    return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
  },

  /** Squared Euclidean distance; compared against radius² to stay in integers */
  distSq(a: Pos, b: Pos): number {
    const dx = a.x - b.x;
    const dy = a.y - b.y;
    return dx * dx + dy * dy;
  },

  /** True when b is one of the 8 tiles around a (or a itself) */
  isAdjacent(a: Pos, b: Pos): boolean {
    return Math.abs(a.x - b.x) <= 1 && Math.abs(a.y - b.y) <= 1;
  },
};
