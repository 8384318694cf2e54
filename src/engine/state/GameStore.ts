// ─────────────────────────────────────────────
//  Game Store: single source of truth
//  Holds GameState, dispatches actions, notifies subscribers.
//  Events for a command fire while it executes; subscribers see the
//  committed state afterwards.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { GameState } from './GameState';
import { StateQuery } from './GameState';
import { createInitialState } from './GameSetup';
import type {
  ActionContext,
  CommandResult,
  DetonationResult,
  EndTurnResult,
  GameAction,
  MoveResult,
} from './actions/GameAction';
import { turnGuard } from './actions/GameAction';
import { MoveAction } from './actions/MoveAction';
import { CycleProductionAction, SetProductionAction } from './actions/SetProductionAction';
import { FoundCityAction } from './actions/FoundCityAction';
import { DetonateAction } from './actions/DetonateAction';
import { EndTurnAction } from './actions/EndTurnAction';
import type { GameConfig } from '@/config';
import { resolveConfig } from '@/config';
import type { Viewport } from '@/engine/data/types/Map';
import type { UnitInstance } from '@/engine/data/types/Unit';
import type { PlayerId } from '@/engine/data/types/Player';
import { TypedEventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { detonateMissile } from '@/engine/systems/missile/MissileSystem';
import { recomputeAll, withVisibility } from '@/engine/systems/visibility/VisibilitySystem';
import { renderSnapshot } from '@/engine/systems/render/RenderSystem';
import { SaveManager } from '@/engine/systems/save/SaveManager';
import type { GameSnapshot } from '@/engine/systems/save/SnapshotSchema';

type StoreListener = (state: GameState) => void;

export class GameStore {
  /** Domain events for this game only */
  readonly events = new TypedEventBus();

  private config: GameConfig;
  private state: GameState;
  private listeners: StoreListener[] = [];
  private log: Logger;

  /** Throws ConfigError when `config` does not validate */
  constructor(config: Partial<GameConfig> = {}) {
    this.config = resolveConfig(config);
    this.log = new Logger(this.events, this.config.logToConsole);
    this.state = createInitialState(this.config);
    this.announceTurn();
  }

  /** Start a fresh game. The previous game survives a ConfigError. */
  init(config: Partial<GameConfig> = {}): void {
    const resolved = resolveConfig(config);
    const state = createInitialState(resolved);
    this.config = resolved;
    this.log = new Logger(this.events, resolved.logToConsole);
    this.state = state;
    this.announceTurn();
    this.notify();
  }

  getState(): GameState { return this.state; }

  getConfig(): GameConfig { return this.config; }

  get logger(): Logger { return this.log; }

  private get ctx(): ActionContext {
    return { bus: this.events, logger: this.log };
  }

  /** Run a command; state and subscribers are only touched when it succeeds */
  dispatch<R extends CommandResult>(action: GameAction<R>): R {
    const { state, result } = action.execute(this.state, this.ctx);
    if (state !== this.state) {
      this.state = state;
      this.notify();
    }
    return result;
  }

  subscribe(listener: StoreListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  private notify(): void {
    for (const l of [...this.listeners]) l(this.state);
  }

  private announceTurn(): void {
    this.log.log(`Turn ${this.state.turn}: ${this.state.activePlayer} to move`, 'system');
  }

  // ── Commands ──

  attemptMove(unitId: string, dx: number, dy: number): MoveResult {
    return this.dispatch(new MoveAction(unitId, dx, dy));
  }

  setProduction(x: number, y: number, unitType: string): CommandResult {
    return this.dispatch(new SetProductionAction(x, y, unitType));
  }

  cycleProduction(x: number, y: number): CommandResult {
    return this.dispatch(new CycleProductionAction(x, y));
  }

  foundCity(unitId: string): CommandResult {
    return this.dispatch(new FoundCityAction(unitId));
  }

  detonate(unitId: string): DetonationResult {
    return this.dispatch(new DetonateAction(unitId));
  }

  endTurn(): EndTurnResult {
    return this.dispatch(new EndTurnAction());
  }

  /**
   * Raw blast at (x, y) with kills credited to the active player.
   * Used by scenario tooling; players detonate through `detonate`.
   */
  detonateMissile(x: number, y: number, radius: number): DetonationResult {
    const blocked = turnGuard(this.state);
    if (blocked) return { ok: false, message: blocked, unitsDestroyed: 0, citiesNeutralized: 0 };
    let report = { unitsDestroyed: 0, citiesNeutralized: 0 };
    const detonator = this.state.activePlayer;
    const next = produce(this.state, draft => {
      report = detonateMissile(draft, x, y, radius, detonator, this.events);
      recomputeAll(draft);
    });
    if (next !== this.state) {
      this.state = next;
      this.notify();
    }
    return {
      ok: true,
      message: `Blast at (${x},${y}) r=${radius}: ${report.unitsDestroyed} units destroyed, `
        + `${report.citiesNeutralized} cities neutralized`,
      ...report,
    };
  }

  // ── Queries ──

  /** Glyph rows; defaults to the whole map seen by the active player */
  render(viewport?: Viewport, observer: PlayerId | null = this.state.activePlayer): string[] {
    const vp = viewport ?? { x: 0, y: 0, width: this.state.map.width, height: this.state.map.height };
    return renderSnapshot(this.state, vp, observer);
  }

  recomputeVisibility(player: PlayerId): void {
    const next = withVisibility(this.state, player);
    if (next === this.state) return;
    this.state = next;
    this.notify();
  }

  nextUnit(currentId: string | null, owner: PlayerId = this.state.activePlayer): UnitInstance | undefined {
    return StateQuery.nextUnit(this.state, owner, currentId);
  }

  // ── Persistence ──

  snapshot(): GameSnapshot {
    return SaveManager.createSnapshot(this.state);
  }

  serialize(): string {
    return SaveManager.serialize(this.state);
  }

  /** Replace the game with a saved one. Throws SnapshotError and keeps the current game on bad input. */
  restore(document: unknown): void {
    this.state = SaveManager.restoreState(document);
    this.log.log(`Save restored: turn ${this.state.turn}, ${this.state.activePlayer} to move`, 'system');
    this.notify();
  }

  load(json: string): void {
    this.state = SaveManager.deserialize(json);
    this.log.log(`Save restored: turn ${this.state.turn}, ${this.state.activePlayer} to move`, 'system');
    this.notify();
  }
}
