import { produce } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { CityState } from '@/engine/data/types/City';
import { cycleProduction, setProduction } from '@/engine/systems/production/ProductionSystem';
import type { ProductionChange } from '@/engine/systems/production/ProductionSystem';
import type { ActionContext, ActionExecution, CommandResult, GameAction } from './GameAction';
import { turnGuard } from './GameAction';

/** Guard shared by both production commands: the city must be the active player's */
function ownCity(state: GameState, x: number, y: number): CityState | string {
  const blocked = turnGuard(state);
  if (blocked) return blocked;
  const city = StateQuery.cityAt(state, x, y);
  if (!city) return `No city at (${x},${y})`;
  if (city.owner !== state.activePlayer) return `City at (${x},${y}) is not yours`;
  return city;
}

function applyToCity(
  state: GameState,
  x: number,
  y: number,
  change: (city: CityState) => ProductionChange,
  ctx: ActionContext,
): ActionExecution<CommandResult> {
  const found = ownCity(state, x, y);
  if (typeof found === 'string') return { state, result: { ok: false, message: found } };

  let result: CommandResult = { ok: false, message: `No city at (${x},${y})` };
  const next = produce(state, draft => {
    const city = StateQuery.cityAt(draft, x, y);
    if (city) result = change(city);
  });
  if (!result.ok) return { state, result };

  ctx.logger.log(result.message, 'production');
  return { state: next, result };
}

export class SetProductionAction implements GameAction {
  readonly type = 'SET_PRODUCTION';

  constructor(
    private readonly x: number,
    private readonly y: number,
    private readonly unitType: string,
  ) {}

  execute(state: GameState, ctx: ActionContext): ActionExecution<CommandResult> {
    return applyToCity(state, this.x, this.y, city => setProduction(city, this.unitType), ctx);
  }
}

export class CycleProductionAction implements GameAction {
  readonly type = 'CYCLE_PRODUCTION';

  constructor(
    private readonly x: number,
    private readonly y: number,
  ) {}

  execute(state: GameState, ctx: ActionContext): ActionExecution<CommandResult> {
    return applyToCity(state, this.x, this.y, cycleProduction, ctx);
  }
}
