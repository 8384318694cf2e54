import { produce } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import { isStep } from '@/engine/data/types/Map';
import { resolveMove } from '@/engine/systems/movement/MovementSystem';
import type { ActionContext, ActionExecution, GameAction, MoveResult } from './GameAction';
import { rejectMove, turnGuard } from './GameAction';

export class MoveAction implements GameAction<MoveResult> {
  readonly type = 'MOVE';

  constructor(
    private readonly unitId: string,
    private readonly dx: number,
    private readonly dy: number,
  ) {}

  execute(state: GameState, ctx: ActionContext): ActionExecution<MoveResult> {
    const reject = (message: string): ActionExecution<MoveResult> => ({ state, result: rejectMove(message) });

    const blocked = turnGuard(state);
    if (blocked) return reject(blocked);

    const unit = StateQuery.unit(state, this.unitId);
    if (!unit) return reject(`No live unit with id ${this.unitId}`);
    if (unit.owner !== state.activePlayer) return reject(`${unit.type} ${unit.id} belongs to ${unit.owner}`);
    if (!isStep(this.dx, this.dy)) return reject(`Invalid direction (${this.dx},${this.dy})`);

    let result = rejectMove(`No live unit with id ${this.unitId}`);
    const next = produce(state, draft => {
      const u = draft.units[this.unitId];
      if (u) result = resolveMove(draft, u, this.dx, this.dy, ctx);
    });

    return { state: result.ok ? next : state, result };
  }
}
