// ─────────────────────────────────────────────
//  Missile System: heading-locked flight + detonation
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { UnitInstance } from '@/engine/data/types/Unit';
import type { PlayerId } from '@/engine/data/types/Player';
import { inBounds } from '@/engine/data/types/Map';
import type { ActionContext, DetonationReport, MoveResult } from '@/engine/state/actions/GameAction';
import { rejectMove } from '@/engine/state/actions/GameAction';
import type { TypedEventBus } from '@/engine/utils/EventBus';
import { MathUtils } from '@/engine/utils/MathUtils';
import { CasualtySystem } from '@/engine/systems/combat/CasualtySystem';
import { recomputeAll, recomputeVisibility } from '@/engine/systems/visibility/VisibilitySystem';
import { MISSILE_BLAST_RADIUS, MISSILE_MAX_RANGE } from '@/config';

/**
 * Destroy every alive unit and neutralize every owned city within
 * `radius` (dx² + dy² ≤ r²) of (x, y). City production settings survive.
 * Kills are credited to `detonator`.
 */
export function detonateMissile(
  draft: Draft<GameState>,
  x: number,
  y: number,
  radius: number,
  detonator: PlayerId | null,
  bus: TypedEventBus,
): DetonationReport {
  const r2 = radius * radius;
  const center = { x, y };

  let unitsDestroyed = 0;
  for (const unit of StateQuery.liveUnits(draft)) {
    if (MathUtils.distSq(unit, center) > r2) continue;
    CasualtySystem.destroy(draft, unit, 'detonation', detonator, bus);
    unitsDestroyed++;
  }

  let citiesNeutralized = 0;
  for (const city of draft.cities) {
    if (city.owner === null || MathUtils.distSq(city, center) > r2) continue;
    const from = city.owner;
    city.owner = null;
    citiesNeutralized++;
    bus.emit('cityNeutralized', { x: city.x, y: city.y, from });
  }

  return { unitsDestroyed, citiesNeutralized };
}

/** Blow up `missile` where it stands. The missile itself is spent, not counted. */
export function detonateUnit(draft: Draft<GameState>, missile: UnitInstance, ctx: ActionContext): DetonationReport {
  const { x, y, owner } = missile;
  missile.hp = 0;
  missile.movesLeft = 0;

  const report = detonateMissile(draft, x, y, MISSILE_BLAST_RADIUS, owner, ctx.bus);
  recomputeAll(draft);

  ctx.bus.emit('missileDetonated', {
    unitId: missile.id, type: missile.type, owner, x, y,
    radius: MISSILE_BLAST_RADIUS, ...report,
  });
  ctx.logger.log(
    `${owner} missile detonated at (${x},${y}): ${report.unitsDestroyed} units destroyed, `
      + `${report.citiesNeutralized} cities neutralized`,
    'critical',
  );
  return report;
}

/**
 * Advance a missile one step along its heading, or hop over an occupied tile
 * for two moves. The first accepted move locks the heading. The missile goes
 * off once it has flown MISSILE_MAX_RANGE tiles or run out of moves.
 */
export function flyMissile(
  draft: Draft<GameState>,
  missile: UnitInstance,
  dx: number,
  dy: number,
  ctx: ActionContext,
): MoveResult {
  const flight = missile.missile ?? { heading: null, traveled: 0 };
  const heading = flight.heading;
  if (heading && (heading.dx !== dx || heading.dy !== dy)) {
    return rejectMove(`Missile is locked on heading (${heading.dx},${heading.dy})`);
  }

  const nx = missile.x + dx;
  const ny = missile.y + dy;
  if (!inBounds(draft.map, nx, ny)) return rejectMove('Missile cannot leave the map');

  let dest = { x: nx, y: ny };
  let cost = 1;
  if (StateQuery.at(draft, nx, ny)) {
    const hx = nx + dx;
    const hy = ny + dy;
    if (missile.movesLeft < 2 || !inBounds(draft.map, hx, hy) || StateQuery.at(draft, hx, hy)) {
      return rejectMove('Flight path blocked');
    }
    dest = { x: hx, y: hy };
    cost = 2;
  }

  const fromX = missile.x;
  const fromY = missile.y;
  missile.x = dest.x;
  missile.y = dest.y;
  missile.movesLeft -= cost;
  missile.missile = { heading: { dx, dy }, traveled: flight.traveled + cost };

  ctx.bus.emit('unitMoved', {
    unitId: missile.id, type: missile.type, owner: missile.owner,
    fromX, fromY, toX: dest.x, toY: dest.y,
  });

  const traveled = missile.missile.traveled;
  if (traveled >= MISSILE_MAX_RANGE || missile.movesLeft <= 0) {
    const report = detonateUnit(draft, missile, ctx);
    return {
      ok: true, moved: true, capturedCity: false, victory: false,
      message: `Missile reached (${dest.x},${dest.y}) and detonated: `
        + `${report.unitsDestroyed} units destroyed, ${report.citiesNeutralized} cities neutralized`,
    };
  }

  recomputeVisibility(draft, missile.owner);
  return {
    ok: true, moved: true, capturedCity: false, victory: false,
    message: `Missile flew to (${dest.x},${dest.y}) [${traveled}/${MISSILE_MAX_RANGE}]`,
  };
}
