// ─────────────────────────────────────────────
//  Render System: glyph rows for a map viewport
//  The UI draws these strings; the engine never touches a terminal.
// ─────────────────────────────────────────────

import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { Viewport } from '@/engine/data/types/Map';
import type { PlayerId } from '@/engine/data/types/Player';
import type { UnitInstance } from '@/engine/data/types/Unit';
import { unitData } from '@/engine/data/UnitCatalog';
import { isExplored, isVisible } from '@/engine/systems/visibility/VisibilitySystem';

export const GLYPHS = {
  land: '+',
  ocean: '.',
  unexplored: ' ',
  neutralCity: 'o',
  firstCity: 'O',
  secondCity: 'X',
} as const;

function cityGlyph(state: GameState, owner: PlayerId | null): string {
  if (owner === null) return GLYPHS.neutralCity;
  const seat = StateQuery.seat(state, owner);
  if (seat === 0) return GLYPHS.firstCity;
  if (seat === 1) return GLYPHS.secondCity;
  return GLYPHS.neutralCity;
}

export function unitGlyph(state: GameState, unit: Pick<UnitInstance, 'type' | 'owner'>): string {
  const glyph = unitData(unit.type).glyph;
  return StateQuery.seat(state, unit.owner) === 0 ? glyph.toUpperCase() : glyph.toLowerCase();
}

/**
 * One string per map row inside `viewport`, clipped to the map.
 * `observer = null` renders the omniscient view.
 */
export function renderSnapshot(state: GameState, viewport: Viewport, observer: PlayerId | null): string[] {
  const x0 = Math.max(0, viewport.x);
  const y0 = Math.max(0, viewport.y);
  const x1 = Math.min(state.map.width, viewport.x + viewport.width);
  const y1 = Math.min(state.map.height, viewport.y + viewport.height);

  const unitIndex = new Map<string, UnitInstance>();
  for (const u of StateQuery.liveUnits(state)) unitIndex.set(`${u.x},${u.y}`, u);
  const cityIndex = new Map(state.cities.map(c => [`${c.x},${c.y}`, c]));

  const rows: string[] = [];
  for (let y = y0; y < y1; y++) {
    let row = '';
    for (let x = x0; x < x1; x++) {
      const key = `${x},${y}`;
      const seen = observer === null || isVisible(state, observer, x, y);

      if (!seen && observer !== null && !isExplored(state, observer, x, y)) {
        row += GLYPHS.unexplored;
        continue;
      }

      const unit = seen ? unitIndex.get(key) : undefined;
      if (unit) {
        row += unitGlyph(state, unit);
        continue;
      }

      const city = cityIndex.get(key);
      if (city) {
        // Remembered cities show no owner
        row += seen ? cityGlyph(state, city.owner) : GLYPHS.neutralCity;
        continue;
      }

      row += StateQuery.terrain(state, x, y) === 'land' ? GLYPHS.land : GLYPHS.ocean;
    }
    rows.push(row);
  }
  return rows;
}
