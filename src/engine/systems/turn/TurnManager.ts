// ─────────────────────────────────────────────
//  Turn / Phase FSM
//  ACTIVE_TURN → END_TURN_PROCESSING → HANDOFF → ACTIVE_TURN, until GAME_OVER.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import type { TypedEventBus } from '@/engine/utils/EventBus';

export type TurnPhase =
  | 'ACTIVE_TURN'
  | 'END_TURN_PROCESSING'
  | 'HANDOFF'
  | 'GAME_OVER';

export const TURN_PHASES: readonly TurnPhase[] = ['ACTIVE_TURN', 'END_TURN_PROCESSING', 'HANDOFF', 'GAME_OVER'];

const TRANSITIONS: Record<TurnPhase, TurnPhase[]> = {
  // A capture during the active turn can end the game on the spot.
  ACTIVE_TURN:         ['END_TURN_PROCESSING', 'GAME_OVER'],
  END_TURN_PROCESSING: ['HANDOFF', 'GAME_OVER'],
  HANDOFF:             ['ACTIVE_TURN'],
  GAME_OVER:           [],
};

export const TurnManager = {
  canTransition(from: TurnPhase, to: TurnPhase): boolean {
    return TRANSITIONS[from].includes(to);
  },

  /**
   * Move the draft to `next`. Returns false (and leaves the phase alone)
   * when the transition is not in the table.
   */
  transition(draft: Draft<GameState>, next: TurnPhase, bus: TypedEventBus): boolean {
    const current = draft.phase;
    if (!TurnManager.canTransition(current, next)) {
      console.error(
        `[TurnManager] Invalid transition: ${current} → ${next}. Allowed: [${TRANSITIONS[current].join(', ')}]`,
      );
      return false;
    }
    draft.phase = next;
    bus.emit('phaseChanged', { phase: next });
    return true;
  },

  isInteractive(phase: TurnPhase): boolean {
    return phase === 'ACTIVE_TURN';
  },
};
