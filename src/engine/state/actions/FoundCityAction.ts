import { produce } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import { DEFAULT_PRODUCTION, unitData } from '@/engine/data/UnitCatalog';
import { createCity } from '@/engine/systems/terrain/CityPlacement';
import { recomputeAll } from '@/engine/systems/visibility/VisibilitySystem';
import type { ActionContext, ActionExecution, CommandResult, GameAction } from './GameAction';
import { turnGuard } from './GameAction';

/** An Army settles where it stands; the Army is consumed. */
export class FoundCityAction implements GameAction {
  readonly type = 'FOUND_CITY';

  constructor(private readonly unitId: string) {}

  execute(state: GameState, ctx: ActionContext): ActionExecution<CommandResult> {
    const reject = (message: string): ActionExecution<CommandResult> => ({ state, result: { ok: false, message } });

    const blocked = turnGuard(state);
    if (blocked) return reject(blocked);

    const unit = StateQuery.unit(state, this.unitId);
    if (!unit) return reject(`No live unit with id ${this.unitId}`);
    if (unit.owner !== state.activePlayer) return reject(`${unit.type} ${unit.id} belongs to ${unit.owner}`);
    if (unit.type !== 'Army') return reject('Only an Army can found a city');

    const { x, y, owner } = unit;
    if (StateQuery.terrain(state, x, y) !== 'land') return reject('Cities can only be founded on land');
    if (StateQuery.cityAt(state, x, y)) return reject(`There is already a city at (${x},${y})`);
    const other = StateQuery.at(state, x, y);
    if (other && other.owner !== owner) return reject('An enemy unit holds this tile');

    const next = produce(state, draft => {
      const city = createCity(x, y);
      city.owner = owner;
      city.production = DEFAULT_PRODUCTION;
      city.cost = unitData(DEFAULT_PRODUCTION).cost;
      draft.cities.push(city);
      delete draft.units[this.unitId];
      recomputeAll(draft);
    });

    ctx.bus.emit('cityFounded', { x, y, owner });
    ctx.logger.log(`${owner} founded a city at (${x},${y})`, 'action');
    return { state: next, result: { ok: true, message: `City founded at (${x},${y})` } };
  }
}
