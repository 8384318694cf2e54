// ─────────────────────────────────────────────
//  Typed Event Bus
//  Systems report what happened through events; the UI listens.
//  Each GameStore owns its own bus so engines stay independent.
// ─────────────────────────────────────────────

import type { UnitType } from '@/engine/data/types/Unit';
import type { BattleReport, PlayerId } from '@/engine/data/types/Player';
import type { TurnPhase } from '@/engine/systems/turn/TurnManager';

export type DestroyCause = 'combat' | 'detonation' | 'basing';

interface UnitRef {
  unitId: string;
  type: UnitType;
  owner: PlayerId;
}

/** Centralised map of all game events and their payload types */
export interface GameEventMap {
  // Unit lifecycle
  unitMoved:       UnitRef & { fromX: number; fromY: number; toX: number; toY: number };
  unitSpawned:     UnitRef & { x: number; y: number };
  unitDestroyed:   UnitRef & { x: number; y: number; cause: DestroyCause };

  // Combat
  battleResolved:  { report: BattleReport };
  missileDetonated: UnitRef & { x: number; y: number; radius: number; unitsDestroyed: number; citiesNeutralized: number };

  // Cities
  cityCaptured:    { x: number; y: number; from: PlayerId | null; to: PlayerId };
  cityNeutralized: { x: number; y: number; from: PlayerId };
  cityFounded:     { x: number; y: number; owner: PlayerId };

  // Phase / turn
  phaseChanged:    { phase: TurnPhase };
  turnStarted:     { turn: number; player: PlayerId };
  turnEnded:       { turn: number; player: PlayerId };
  handoff:         { from: PlayerId; to: PlayerId };

  // Game outcome
  victory:         { winner: PlayerId; turn: number };

  // UI
  logMessage:      { text: string; cls: string };
}

type Listener<T> = (payload: T) => void;

type ListenerTable = { [K in keyof GameEventMap]?: Listener<GameEventMap[K]>[] };

export class TypedEventBus {
  private listeners: ListenerTable = {};

  on<K extends keyof GameEventMap>(event: K, listener: Listener<GameEventMap[K]>): void {
    const table: { [P in K]?: Listener<GameEventMap[P]>[] } = this.listeners;
    const arr = table[event] ?? [];
    arr.push(listener);
    table[event] = arr;
  }

  off<K extends keyof GameEventMap>(event: K, listener: Listener<GameEventMap[K]>): void {
    const arr = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof GameEventMap>(event: K, payload: GameEventMap[K]): void {
    const arr = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }
}
