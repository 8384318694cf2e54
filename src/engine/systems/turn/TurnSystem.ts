// ─────────────────────────────────────────────
//  Turn System: end-of-turn pipeline and handoff
//  Runs inside a single produce() so the whole pipeline commits at once.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { PlayerId } from '@/engine/data/types/Player';
import type { ActionContext, EndTurnResult } from '@/engine/state/actions/GameAction';
import { MathUtils } from '@/engine/utils/MathUtils';
import { invariant } from '@/engine/utils/errors';
import { TurnManager } from './TurnManager';
import { advanceProduction, healUnits } from '@/engine/systems/production/ProductionSystem';
import { detonateUnit } from '@/engine/systems/missile/MissileSystem';
import { CasualtySystem } from '@/engine/systems/combat/CasualtySystem';
import { ConquestSystem } from '@/engine/systems/conquest/ConquestSystem';
import { recomputeAll } from '@/engine/systems/visibility/VisibilitySystem';

/**
 * Destroy `player`'s Fighters that are neither on one of their cities nor
 * next to one of their Carriers. Returns how many were lost.
 */
export function enforceFighterBasing(draft: Draft<GameState>, player: PlayerId, ctx: ActionContext): number {
  const carriers = StateQuery.unitsOf(draft, player).filter(u => u.type === 'Carrier');
  let lost = 0;

  for (const fighter of StateQuery.unitsOf(draft, player)) {
    if (fighter.type !== 'Fighter') continue;
    if (StateQuery.cityAt(draft, fighter.x, fighter.y)?.owner === player) continue;
    if (carriers.some(c => MathUtils.isAdjacent(c, fighter))) continue;

    CasualtySystem.destroy(draft, fighter, 'basing', null, ctx.bus);
    ctx.logger.log(`${player} Fighter at (${fighter.x},${fighter.y}) ran out of fuel`, 'critical');
    lost++;
  }

  return lost;
}

/** Reset moves for `player`'s alive units */
export function refreshMoves(draft: Draft<GameState>, player: PlayerId): void {
  for (const unit of StateQuery.unitsOf(draft, player)) unit.movesLeft = unit.movement;
}

/**
 * Close the active player's turn: production and healing, forced missile
 * detonation, fighter basing, pruning, victory check, then handoff.
 */
export function endTurn(draft: Draft<GameState>, ctx: ActionContext): EndTurnResult {
  const ending = draft.activePlayer;
  const turn = draft.turn;
  const next = StateQuery.opponent(draft, ending);
  invariant(next !== undefined, `no opponent for ${ending}`);

  TurnManager.transition(draft, 'END_TURN_PROCESSING', ctx.bus);
  ctx.bus.emit('turnEnded', { turn, player: ending });

  const spawned = advanceProduction(draft, ctx).length;
  healUnits(draft);

  // A missile caught in a sibling's blast is already gone and is not counted
  let missilesDetonated = 0;
  const missiles = StateQuery.unitsOf(draft, ending).filter(u => u.type === 'NuclearMissile');
  for (const missile of missiles) {
    if (missile.hp <= 0) continue;
    detonateUnit(draft, missile, ctx);
    missilesDetonated++;
  }

  const fightersLost = enforceFighterBasing(draft, ending, ctx);
  CasualtySystem.prune(draft);

  if (ConquestSystem.hasWon(draft, ending)) {
    ConquestSystem.declareVictory(draft, ending, ctx.bus, ctx.logger);
    return {
      ok: true,
      message: `${ending} wins!`,
      winner: ending,
      nextPlayer: null,
      spawned,
      missilesDetonated,
      fightersLost,
    };
  }

  TurnManager.transition(draft, 'HANDOFF', ctx.bus);
  ctx.bus.emit('handoff', { from: ending, to: next });
  draft.activePlayer = next;
  draft.turn = turn + 1;
  refreshMoves(draft, next);
  recomputeAll(draft);
  TurnManager.transition(draft, 'ACTIVE_TURN', ctx.bus);

  ctx.bus.emit('turnStarted', { turn: draft.turn, player: next });
  ctx.logger.log(`Turn ${draft.turn}: ${next} to move`, 'system');

  return {
    ok: true,
    message: `Turn ${turn} ended; ${next} to move`,
    winner: null,
    nextPlayer: next,
    spawned,
    missilesDetonated,
    fightersLost,
  };
}
