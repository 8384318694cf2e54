// ─────────────────────────────────────────────
//  Conquest System: city capture + victory rule
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { UnitInstance } from '@/engine/data/types/Unit';
import type { PlayerId } from '@/engine/data/types/Player';
import type { TypedEventBus } from '@/engine/utils/EventBus';
import type { Logger } from '@/engine/utils/Logger';
import { movementRule } from '@/engine/systems/movement/MovementRules';
import { TurnManager } from '@/engine/systems/turn/TurnManager';
import { DEFAULT_PRODUCTION, unitData } from '@/engine/data/UnitCatalog';

export const ConquestSystem = {
  /**
   * Take the city under `unit` if its type can capture and the city is not
   * already its owner's. The city's order resets to the default Army build.
   */
  captureCity(draft: Draft<GameState>, unit: UnitInstance, bus: TypedEventBus, logger: Logger): boolean {
    if (!movementRule(unit.type).canCapture) return false;
    const city = StateQuery.cityAt(draft, unit.x, unit.y);
    if (!city || city.owner === unit.owner) return false;

    const from = city.owner;
    city.owner = unit.owner;
    city.production = DEFAULT_PRODUCTION;
    city.cost = unitData(DEFAULT_PRODUCTION).cost;
    city.progress = 0;

    bus.emit('cityCaptured', { x: city.x, y: city.y, from, to: unit.owner });
    logger.log(`${unit.owner} captured the city at (${city.x},${city.y})`, 'action');
    return true;
  },

  /**
   * `player` wins when the opponent owns no city and `player` owns at least one.
   */
  hasWon(state: GameState, player: PlayerId): boolean {
    const opponent = StateQuery.opponent(state, player);
    if (opponent === undefined) return false;
    return StateQuery.cityCount(state, opponent) === 0 && StateQuery.cityCount(state, player) > 0;
  },

  /** End the game with `winner`. No-op once the game is over. */
  declareVictory(draft: Draft<GameState>, winner: PlayerId, bus: TypedEventBus, logger: Logger): boolean {
    if (draft.winner !== null) return false;
    if (!TurnManager.transition(draft, 'GAME_OVER', bus)) return false;
    draft.winner = winner;
    bus.emit('victory', { winner, turn: draft.turn });
    logger.log(`${winner} wins on turn ${draft.turn}!`, 'critical');
    return true;
  },
};
