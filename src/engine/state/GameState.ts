// ─────────────────────────────────────────────
//  Game State: immutable snapshot of the whole game
// ─────────────────────────────────────────────

import type { MapData, Pos, Terrain } from '@/engine/data/types/Map';
import type { CityState } from '@/engine/data/types/City';
import type { UnitInstance, UnitMap, UnitType } from '@/engine/data/types/Unit';
import type { PlayerData, PlayerId, Telemetry } from '@/engine/data/types/Player';
import type { TurnPhase } from '@/engine/systems/turn/TurnManager';
import { terrainAt } from '@/engine/data/types/Map';

/** Per-player fog of war; both grids indexed [y][x] */
export interface PlayerFog {
  /** Ever seen; only ever set */
  explored: boolean[][];
  /** In sight right now; rebuilt on every refresh */
  visible: boolean[][];
}

export interface GameState {
  readonly map: MapData;

  /** Creation order is preserved and meaningful (first = player one's start) */
  readonly cities: CityState[];

  /** All units keyed by id; dead units linger until end-of-turn pruning */
  readonly units: UnitMap;

  /** Exactly two entries, in seat order */
  readonly players: PlayerData[];

  readonly fog: Record<PlayerId, PlayerFog>;

  readonly telemetry: Telemetry;

  readonly turn: number;
  readonly activePlayer: PlayerId;
  readonly phase: TurnPhase;
  readonly winner: PlayerId | null;

  /** Combat PRNG state; threading it through state keeps replays exact */
  readonly rngState: number;
  readonly nextUnitId: number;
}

/** Utility helpers for querying GameState. All unit queries skip dead units. */
export const StateQuery = {
  liveUnits(state: GameState): UnitInstance[] {
    return Object.values(state.units).filter(u => u.hp > 0);
  },

  unitsOf(state: GameState, owner: PlayerId): UnitInstance[] {
    return StateQuery.liveUnits(state).filter(u => u.owner === owner);
  },

  unit(state: GameState, id: string): UnitInstance | undefined {
    const u = state.units[id];
    return u && u.hp > 0 ? u : undefined;
  },

  at(state: GameState, x: number, y: number): UnitInstance | undefined {
    return Object.values(state.units).find(u => u.hp > 0 && u.x === x && u.y === y);
  },

  cityAt(state: GameState, x: number, y: number): CityState | undefined {
    return state.cities.find(c => c.x === x && c.y === y);
  },

  citiesOf(state: GameState, owner: PlayerId): CityState[] {
    return state.cities.filter(c => c.owner === owner);
  },

  cityCount(state: GameState, owner: PlayerId): number {
    return StateQuery.citiesOf(state, owner).length;
  },

  terrain(state: GameState, x: number, y: number): Terrain | undefined {
    return terrainAt(state.map, x, y);
  },

  player(state: GameState, id: PlayerId): PlayerData | undefined {
    return state.players.find(p => p.id === id);
  },

  seat(state: GameState, id: PlayerId): number {
    return state.players.findIndex(p => p.id === id);
  },

  opponent(state: GameState, id: PlayerId): PlayerId | undefined {
    return state.players.find(p => p.id !== id)?.id;
  },

  /** Alive Armies of `type` whose recorded home is `home` */
  supportedBy(state: GameState, home: Pos, type: UnitType = 'Army'): UnitInstance[] {
    return StateQuery.liveUnits(state).filter(
      u => u.type === type && u.home !== null && u.home.x === home.x && u.home.y === home.y,
    );
  },

  /**
   * Next own unit with moves left after `currentId`, wrapping around.
   * Falls back to the next own unit when none can move.
   */
  nextUnit(state: GameState, owner: PlayerId, currentId: string | null): UnitInstance | undefined {
    const own = StateQuery.unitsOf(state, owner);
    if (own.length === 0) return undefined;
    const idx = currentId === null ? -1 : own.findIndex(u => u.id === currentId);
    for (let i = 1; i <= own.length; i++) {
      const cand = own[(idx + i + own.length) % own.length];
      if (cand && cand.movesLeft > 0) return cand;
    }
    return own[(idx + 1 + own.length) % own.length];
  },
};
