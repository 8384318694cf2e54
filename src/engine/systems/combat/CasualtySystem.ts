// ─────────────────────────────────────────────
//  Casualty System: the single place units die
//  Forces hp to 0, updates counters, reports the loss.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import type { UnitInstance } from '@/engine/data/types/Unit';
import type { PlayerId } from '@/engine/data/types/Player';
import type { DestroyCause, TypedEventBus } from '@/engine/utils/EventBus';
import { recordCasualty } from './Telemetry';

export const CasualtySystem = {
  /** Kill `unit` (a draft) and credit `killer`, if any */
  destroy(
    draft: Draft<GameState>,
    unit: UnitInstance,
    cause: DestroyCause,
    killer: PlayerId | null,
    bus: TypedEventBus,
  ): void {
    if (unit.hp <= 0) return;
    unit.hp = 0;
    recordCasualty(draft.telemetry, { type: unit.type, owner: unit.owner }, killer);
    bus.emit('unitDestroyed', {
      unitId: unit.id, type: unit.type, owner: unit.owner, x: unit.x, y: unit.y, cause,
    });
  },

  /** Drop dead units from the unit map */
  prune(draft: Draft<GameState>): number {
    let removed = 0;
    for (const [id, unit] of Object.entries(draft.units)) {
      if (unit.hp <= 0) {
        delete draft.units[id];
        removed++;
      }
    }
    return removed;
  },
};
