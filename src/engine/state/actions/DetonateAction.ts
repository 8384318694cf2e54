import { produce } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import { detonateUnit } from '@/engine/systems/missile/MissileSystem';
import type { ActionContext, ActionExecution, DetonationResult, GameAction } from './GameAction';
import { turnGuard } from './GameAction';

export class DetonateAction implements GameAction<DetonationResult> {
  readonly type = 'DETONATE';

  constructor(private readonly unitId: string) {}

  execute(state: GameState, ctx: ActionContext): ActionExecution<DetonationResult> {
    const reject = (message: string): ActionExecution<DetonationResult> => ({
      state,
      result: { ok: false, message, unitsDestroyed: 0, citiesNeutralized: 0 },
    });

    const blocked = turnGuard(state);
    if (blocked) return reject(blocked);

    const unit = StateQuery.unit(state, this.unitId);
    if (!unit) return reject(`No live unit with id ${this.unitId}`);
    if (unit.owner !== state.activePlayer) return reject(`${unit.type} ${unit.id} belongs to ${unit.owner}`);
    if (unit.type !== 'NuclearMissile') return reject(`${unit.type} cannot detonate`);

    let report = { unitsDestroyed: 0, citiesNeutralized: 0 };
    const next = produce(state, draft => {
      const missile = draft.units[this.unitId];
      if (missile) report = detonateUnit(draft, missile, ctx);
    });

    return {
      state: next,
      result: {
        ok: true,
        message: `Detonated at (${unit.x},${unit.y}): ${report.unitsDestroyed} units destroyed, `
          + `${report.citiesNeutralized} cities neutralized`,
        ...report,
      },
    };
  }
}
