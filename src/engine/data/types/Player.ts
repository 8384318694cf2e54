// ─────────────────────────────────────────────
//  Player & telemetry types
// ─────────────────────────────────────────────

import type { UnitType } from './Unit';

export type PlayerId = string;

export interface PlayerData {
  readonly id: PlayerId;
  name: string;
  /** Declared for the AI collaborator; the engine itself never reads it */
  isAi: boolean;
}

export type UnitTally = Record<UnitType, number>;

export interface PlayerStats {
  kills: UnitTally;
  losses: UnitTally;
}

export type BattleOutcome = 'attacker_won' | 'defender_won';

export interface Combatant {
  unitId: string;
  type: UnitType;
  owner: PlayerId;
}

export interface BattleReport {
  turn: number;
  attacker: Combatant;
  defender: Combatant;
  x: number;
  y: number;
  /** Effective hit chances after the city modifier */
  attackerChance: number;
  defenderChance: number;
  outcome: BattleOutcome;
  /** Human-readable one-liner */
  text: string;
}

export interface Telemetry {
  /** Rolling log, oldest first, capped at BATTLE_LOG_CAPACITY */
  battleLog: BattleReport[];
  stats: Record<PlayerId, PlayerStats>;
}
