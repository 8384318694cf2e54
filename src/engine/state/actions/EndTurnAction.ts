import { produce } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { invariant } from '@/engine/utils/errors';
import { endTurn } from '@/engine/systems/turn/TurnSystem';
import type { ActionContext, ActionExecution, EndTurnResult, GameAction } from './GameAction';
import { turnGuard } from './GameAction';

export class EndTurnAction implements GameAction<EndTurnResult> {
  readonly type = 'END_TURN';

  execute(state: GameState, ctx: ActionContext): ActionExecution<EndTurnResult> {
    const blocked = turnGuard(state);
    if (blocked) {
      return {
        state,
        result: {
          ok: false, message: blocked, winner: state.winner, nextPlayer: null,
          spawned: 0, missilesDetonated: 0, fightersLost: 0,
        },
      };
    }

    const out: { result?: EndTurnResult } = {};
    const next = produce(state, draft => { out.result = endTurn(draft, ctx); });
    invariant(out.result, 'end-turn pipeline did not run');
    return { state: next, result: out.result };
  }
}
