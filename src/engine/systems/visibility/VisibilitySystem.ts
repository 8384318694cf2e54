// ─────────────────────────────────────────────
//  Visibility System: per-player explored / visible grids
//  Mutators work on plain objects or immer drafts.
//  Invariant: visible ⊆ explored, explored never shrinks.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { Draft } from 'immer';
import type { PlayerId } from '@/engine/data/types/Player';
import type { GameState, PlayerFog } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import { unitData } from '@/engine/data/UnitCatalog';
import { CITY_SIGHT } from '@/config';

export type FogTable = Record<PlayerId, PlayerFog>;

export function createGrid(width: number, height: number): boolean[][] {
  return Array.from({ length: height }, () => Array<boolean>(width).fill(false));
}

export function initFog(players: PlayerId[], width: number, height: number): FogTable {
  const fog: FogTable = {};
  for (const p of players) {
    fog[p] = { explored: createGrid(width, height), visible: createGrid(width, height) };
  }
  return fog;
}

/** Zero the player's visible grid; explored is untouched */
export function clearVisible(fog: FogTable, player: PlayerId): void {
  const pf = fog[player];
  if (!pf) return;
  for (const row of pf.visible) row.fill(false);
}

/** Mark every tile with dx² + dy² ≤ radius² as visible and explored */
export function markVisibleCircle(
  fog: FogTable,
  player: PlayerId,
  cx: number,
  cy: number,
  radius: number,
): void {
  const pf = fog[player];
  if (!pf) return;
  const height = pf.visible.length;
  const width = pf.visible[0]?.length ?? 0;
  const r2 = radius * radius;

  for (let y = Math.max(0, cy - radius); y < Math.min(height, cy + radius + 1); y++) {
    const vis = pf.visible[y];
    const exp = pf.explored[y];
    if (!vis || !exp) continue;
    for (let x = Math.max(0, cx - radius); x < Math.min(width, cx + radius + 1); x++) {
      const dx = x - cx;
      const dy = y - cy;
      if (dx * dx + dy * dy <= r2) {
        vis[x] = true;
        exp[x] = true;
      }
    }
  }
}

/** Clear, then re-mark around every city and alive unit the player owns */
export function recomputeVisibility(draft: Draft<GameState>, player: PlayerId): void {
  if (!draft.fog[player]) return;
  clearVisible(draft.fog, player);

  for (const city of StateQuery.citiesOf(draft, player)) {
    markVisibleCircle(draft.fog, player, city.x, city.y, CITY_SIGHT);
  }
  for (const unit of StateQuery.unitsOf(draft, player)) {
    markVisibleCircle(draft.fog, player, unit.x, unit.y, unitData(unit.type).sight);
  }
}

export function recomputeAll(draft: Draft<GameState>): void {
  for (const p of draft.players) recomputeVisibility(draft, p.id);
}

/** Pure variant for callers holding a frozen state */
export function withVisibility(state: GameState, player: PlayerId): GameState {
  return produce(state, draft => { recomputeVisibility(draft, player); });
}

export function isVisible(state: GameState, player: PlayerId, x: number, y: number): boolean {
  return state.fog[player]?.visible[y]?.[x] ?? false;
}

export function isExplored(state: GameState, player: PlayerId, x: number, y: number): boolean {
  return state.fog[player]?.explored[y]?.[x] ?? false;
}
