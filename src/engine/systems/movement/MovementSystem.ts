// ─────────────────────────────────────────────
//  Movement System: one-step moves, hops, attacks and captures
//  Called from MoveAction inside produce(); a rejection leaves the draft untouched.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { UnitInstance } from '@/engine/data/types/Unit';
import type { BattleReport, Combatant } from '@/engine/data/types/Player';
import { inBounds } from '@/engine/data/types/Map';
import type { ActionContext, MoveResult } from '@/engine/state/actions/GameAction';
import { rejectMove } from '@/engine/state/actions/GameAction';
import { createPrng } from '@/engine/utils/Prng';
import { movementRule, terrainRequirement } from './MovementRules';
import { effectiveHitChances, resolveCombat } from '@/engine/systems/combat/CombatSystem';
import { describeBattle, recordBattle } from '@/engine/systems/combat/Telemetry';
import { CasualtySystem } from '@/engine/systems/combat/CasualtySystem';
import { ConquestSystem } from '@/engine/systems/conquest/ConquestSystem';
import { flyMissile } from '@/engine/systems/missile/MissileSystem';
import { recomputeAll, recomputeVisibility } from '@/engine/systems/visibility/VisibilitySystem';

const combatant = (u: UnitInstance): Combatant => ({ unitId: u.id, type: u.type, owner: u.owner });

/** Relocate, spend moves, then run the capture check and the immediate-victory rule */
function advance(
  draft: Draft<GameState>,
  unit: UnitInstance,
  x: number,
  y: number,
  cost: number,
  ctx: ActionContext,
): { capturedCity: boolean; victory: boolean } {
  const fromX = unit.x;
  const fromY = unit.y;
  unit.x = x;
  unit.y = y;
  unit.movesLeft -= cost;
  ctx.bus.emit('unitMoved', { unitId: unit.id, type: unit.type, owner: unit.owner, fromX, fromY, toX: x, toY: y });

  const capturedCity = ConquestSystem.captureCity(draft, unit, ctx.bus, ctx.logger);
  const victory = capturedCity
    && ConquestSystem.hasWon(draft, unit.owner)
    && ConquestSystem.declareVictory(draft, unit.owner, ctx.bus, ctx.logger);
  return { capturedCity, victory };
}

/**
 * Fight `defender`. The combat PRNG is rebuilt from and written back to
 * `draft.rngState`, so identical states resolve identically.
 */
function attack(draft: Draft<GameState>, unit: UnitInstance, defender: UnitInstance, ctx: ActionContext): MoveResult {
  const { x, y } = defender;
  const holdsCity = StateQuery.cityAt(draft, x, y)?.owner === defender.owner;
  const chances = effectiveHitChances(unit.type, defender.type, holdsCity);

  const prng = createPrng(draft.rngState);
  const outcome = resolveCombat(unit.hp, defender.hp, chances, prng);
  draft.rngState = prng.state;

  const base: Omit<BattleReport, 'text'> = {
    turn: draft.turn,
    attacker: combatant(unit),
    defender: combatant(defender),
    x,
    y,
    attackerChance: chances.attacker,
    defenderChance: chances.defender,
    outcome: outcome.attackerAlive ? 'attacker_won' : 'defender_won',
  };
  const report: BattleReport = { ...base, text: describeBattle(base) };

  if (outcome.defenderAlive) defender.hp = outcome.defenderHp;
  else CasualtySystem.destroy(draft, defender, 'combat', unit.owner, ctx.bus);
  if (outcome.attackerAlive) unit.hp = outcome.attackerHp;
  else CasualtySystem.destroy(draft, unit, 'combat', defender.owner, ctx.bus);

  recordBattle(draft.telemetry, report);
  ctx.bus.emit('battleResolved', { report: { ...report, attacker: { ...report.attacker }, defender: { ...report.defender } } });
  ctx.logger.log(report.text, 'combat');

  if (!outcome.attackerAlive) {
    recomputeAll(draft);
    return { ok: true, moved: false, capturedCity: false, victory: false, message: report.text };
  }

  const { capturedCity, victory } = advance(draft, unit, x, y, 1, ctx);
  recomputeAll(draft);
  return { ok: true, moved: true, capturedCity, victory, message: report.text };
}

/**
 * Try to move `unit` one step by (dx, dy). Missiles follow their own flight
 * rules; everything else steps, hops a friendly (Fighters) or attacks.
 */
export function resolveMove(
  draft: Draft<GameState>,
  unit: UnitInstance,
  dx: number,
  dy: number,
  ctx: ActionContext,
): MoveResult {
  if (unit.movesLeft <= 0) return rejectMove(`${unit.type} has no moves left`);

  const rule = movementRule(unit.type);
  if (rule.ballistic) return flyMissile(draft, unit, dx, dy, ctx);

  const nx = unit.x + dx;
  const ny = unit.y + dy;
  const terrain = StateQuery.terrain(draft, nx, ny);
  if (!inBounds(draft.map, nx, ny) || terrain === undefined) return rejectMove('Cannot move off the map');
  if (!rule.canEnter(terrain)) {
    return rejectMove(`${unit.type} can only move on ${terrainRequirement(unit.type)}`);
  }

  const occupant = StateQuery.at(draft, nx, ny);

  if (!occupant) {
    const { capturedCity, victory } = advance(draft, unit, nx, ny, 1, ctx);
    if (capturedCity) recomputeAll(draft);
    else recomputeVisibility(draft, unit.owner);
    return {
      ok: true, moved: true, capturedCity, victory,
      message: capturedCity ? `${unit.type} captured the city at (${nx},${ny})` : `${unit.type} moved to (${nx},${ny})`,
    };
  }

  if (occupant.owner !== unit.owner) {
    if (!rule.fights) return rejectMove(`${unit.type} cannot attack`);
    return attack(draft, unit, occupant, ctx);
  }

  // Friendly in the way
  if (!rule.hopsFriendly) return rejectMove('Tile occupied by a friendly unit');
  const hx = nx + dx;
  const hy = ny + dy;
  const hopTerrain = StateQuery.terrain(draft, hx, hy);
  if (unit.movesLeft < 2 || hopTerrain === undefined || !rule.canEnter(hopTerrain) || StateQuery.at(draft, hx, hy)) {
    return rejectMove('Tile occupied by a friendly unit');
  }

  advance(draft, unit, hx, hy, 2, ctx);
  recomputeVisibility(draft, unit.owner);
  return {
    ok: true, moved: true, capturedCity: false, victory: false,
    message: `${unit.type} hopped to (${hx},${hy})`,
  };
}
