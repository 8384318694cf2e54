// ─────────────────────────────────────────────
//  Game Action: command pattern for every player command
//  execute() never throws for gameplay problems: it hands back the
//  unchanged state and a result with ok=false and a reason.
// ─────────────────────────────────────────────

import type { GameState } from '@/engine/state/GameState';
import type { PlayerId } from '@/engine/data/types/Player';
import type { TypedEventBus } from '@/engine/utils/EventBus';
import type { Logger } from '@/engine/utils/Logger';

export interface ActionContext {
  readonly bus: TypedEventBus;
  readonly logger: Logger;
}

export interface CommandResult {
  ok: boolean;
  message: string;
}

export interface MoveResult extends CommandResult {
  moved: boolean;
  capturedCity: boolean;
  victory: boolean;
}

export interface DetonationReport {
  unitsDestroyed: number;
  citiesNeutralized: number;
}

export interface DetonationResult extends CommandResult, DetonationReport {}

export interface EndTurnResult extends CommandResult {
  winner: PlayerId | null;
  nextPlayer: PlayerId | null;
  spawned: number;
  missilesDetonated: number;
  fightersLost: number;
}

export interface ActionExecution<R extends CommandResult> {
  state: GameState;
  result: R;
}

export interface GameAction<R extends CommandResult = CommandResult> {
  readonly type: string;
  execute(state: GameState, ctx: ActionContext): ActionExecution<R>;
}

export function rejectMove(message: string): MoveResult {
  return { ok: false, moved: false, capturedCity: false, victory: false, message };
}

/** Shared guard: commands are only taken during the active player's turn */
export function turnGuard(state: GameState): string | null {
  if (state.phase === 'GAME_OVER') return `Game over: ${state.winner ?? "nobody"} won`;
  if (state.phase !== 'ACTIVE_TURN') return 'Turn is being processed';
  return null;
}
