// ─────────────────────────────────────────────
//  Integration Test Helpers
//  Build headless scenarios on small hand-drawn maps.
//  Drive them through actions or a GameStore.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { GameState } from '@/engine/state/GameState';
import { GameStore } from '@/engine/state/GameStore';
import type { ActionContext } from '@/engine/state/actions/GameAction';
import type { Pos, Terrain, TileGrid } from '@/engine/data/types/Map';
import type { CityState } from '@/engine/data/types/City';
import type { UnitInstance, UnitMap, UnitType } from '@/engine/data/types/Unit';
import { createUnit } from '@/engine/data/types/Unit';
import type { PlayerId } from '@/engine/data/types/Player';
import { unitData } from '@/engine/data/UnitCatalog';
import { DEFAULT_SUPPORT_CAP } from '@/config';
import { TypedEventBus } from '@/engine/utils/EventBus';
import type { GameEventMap } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';
import { initFog, recomputeAll } from '@/engine/systems/visibility/VisibilitySystem';
import { createTelemetry } from '@/engine/systems/combat/Telemetry';
import { createSnapshot } from '@/engine/systems/save/SaveManager';

export const P1 = 'P1';
export const P2 = 'P2';

// ── Scenario description ─────────────────────

export interface CitySpec {
  x: number;
  y: number;
  owner?: PlayerId | null;
  production?: UnitType | null;
  progress?: number;
  /** Defaults to the catalog cost of `production` */
  cost?: number;
  supportCap?: number;
}

export interface UnitSpec {
  type: UnitType;
  owner: PlayerId;
  x: number;
  y: number;
  hp?: number;
  movesLeft?: number;
  home?: Pos | null;
}

export interface Scenario {
  /** One string per row: '+' land, '.' ocean */
  rows: string[];
  cities?: CitySpec[];
  /** Ids are assigned in order: unit_1, unit_2, … */
  units?: UnitSpec[];
  activePlayer?: PlayerId;
  turn?: number;
  rngState?: number;
}

export function parseRows(rows: string[]): TileGrid {
  return rows.map(row => [...row].map((ch): Terrain => (ch === '+' ? 'land' : 'ocean')));
}

export function makeCity(spec: CitySpec): CityState {
  const production = spec.production ?? null;
  return {
    x: spec.x,
    y: spec.y,
    owner: spec.owner ?? null,
    production,
    progress: spec.progress ?? 0,
    cost: spec.cost ?? (production ? unitData(production).cost : 0),
    supportCap: spec.supportCap ?? DEFAULT_SUPPORT_CAP,
  };
}

/** Build a GameState from a scenario, with both players' visibility computed */
export function makeState(scenario: Scenario): GameState {
  const tiles = parseRows(scenario.rows);
  const height = tiles.length;
  const width = tiles[0]?.length ?? 0;

  const units: UnitMap = {};
  (scenario.units ?? []).forEach((spec, i) => {
    const id = `unit_${i + 1}`;
    const unit: UnitInstance = createUnit(unitData(spec.type), id, spec.owner, spec.x, spec.y, spec.home ?? null);
    if (spec.hp !== undefined) unit.hp = spec.hp;
    if (spec.movesLeft !== undefined) unit.movesLeft = spec.movesLeft;
    units[id] = unit;
  });

  const state: GameState = {
    map: { width, height, tiles },
    cities: (scenario.cities ?? []).map(makeCity),
    units,
    players: [
      { id: P1, name: P1, isAi: false },
      { id: P2, name: P2, isAi: false },
    ],
    fog: initFog([P1, P2], width, height),
    telemetry: createTelemetry([P1, P2]),
    turn: scenario.turn ?? 1,
    activePlayer: scenario.activePlayer ?? P1,
    phase: 'ACTIVE_TURN',
    winner: null,
    rngState: scenario.rngState ?? 12345,
    nextUnitId: Object.keys(units).length + 1,
  };

  return produce(state, draft => { recomputeAll(draft); });
}

// ── Execution context ────────────────────────

type EventLog = { [K in keyof GameEventMap]: GameEventMap[K][] };

export interface RecordingContext extends ActionContext {
  /** Payloads per event name */
  log: EventLog;
  /** Event names in emission order */
  order: (keyof GameEventMap)[];
}

const EVENT_NAMES: readonly (keyof GameEventMap)[] = [
  'unitMoved', 'unitSpawned', 'unitDestroyed', 'battleResolved', 'missileDetonated',
  'cityCaptured', 'cityNeutralized', 'cityFounded', 'phaseChanged', 'turnStarted',
  'turnEnded', 'handoff', 'victory', 'logMessage',
];

/** Quiet context that records every event it carries */
export function makeCtx(): RecordingContext {
  const bus = new TypedEventBus();
  const log: EventLog = {
    unitMoved: [], unitSpawned: [], unitDestroyed: [], battleResolved: [], missileDetonated: [],
    cityCaptured: [], cityNeutralized: [], cityFounded: [], phaseChanged: [], turnStarted: [],
    turnEnded: [], handoff: [], victory: [], logMessage: [],
  };
  const order: (keyof GameEventMap)[] = [];

  function track<K extends keyof GameEventMap>(name: K): void {
    bus.on(name, payload => {
      log[name].push(payload);
      order.push(name);
    });
  }
  EVENT_NAMES.forEach(track);

  return { bus, logger: new Logger(bus, false), log, order };
}

// ── Store builder ────────────────────────────

/** A quiet GameStore loaded with the scenario through the snapshot path */
export function buildStore(scenario: Scenario): GameStore {
  const store = new GameStore({ width: 8, height: 6, cityCount: 2, seed: 1, logToConsole: false });
  store.restore(createSnapshot(makeState(scenario)));
  return store;
}

export function unitById(state: GameState, id: string): UnitInstance {
  const unit = state.units[id];
  if (!unit) throw new Error(`test scenario has no unit ${id}`);
  return unit;
}
