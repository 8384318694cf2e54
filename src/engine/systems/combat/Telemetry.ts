// ─────────────────────────────────────────────
//  Telemetry: battle log ring + kill/loss counters
//  Lives inside GameState; mutators take the telemetry object or its draft.
// ─────────────────────────────────────────────

import type { BattleReport, PlayerId, PlayerStats, Telemetry, UnitTally } from '@/engine/data/types/Player';
import type { UnitType } from '@/engine/data/types/Unit';
import { BATTLE_LOG_CAPACITY } from '@/config';

export function emptyTally(): UnitTally {
  return { Army: 0, Fighter: 0, Carrier: 0, NuclearMissile: 0 };
}

export function emptyStats(): PlayerStats {
  return { kills: emptyTally(), losses: emptyTally() };
}

export function createTelemetry(players: PlayerId[]): Telemetry {
  const stats: Record<PlayerId, PlayerStats> = {};
  for (const p of players) stats[p] = emptyStats();
  return { battleLog: [], stats };
}

/**
 * Count a destroyed unit: a loss for its owner, and a kill for `killer`
 * when someone else destroyed it.
 */
export function recordCasualty(
  telemetry: Telemetry,
  victim: { type: UnitType; owner: PlayerId },
  killer: PlayerId | null,
): void {
  const loserStats = telemetry.stats[victim.owner];
  if (loserStats) loserStats.losses[victim.type] += 1;

  if (killer === null || killer === victim.owner) return;
  const killerStats = telemetry.stats[killer];
  if (killerStats) killerStats.kills[victim.type] += 1;
}

export function recordBattle(telemetry: Telemetry, report: BattleReport): void {
  telemetry.battleLog.push(report);
  while (telemetry.battleLog.length > BATTLE_LOG_CAPACITY) telemetry.battleLog.shift();
}

const pct = (v: number): string => `${Math.round(v * 100)}%`;

export function describeBattle(report: Omit<BattleReport, 'text'>): string {
  const { attacker, defender } = report;
  const winner = report.outcome === 'attacker_won' ? attacker : defender;
  return `T${report.turn} ${attacker.owner} ${attacker.type} attacked ${defender.owner} ${defender.type} `
    + `at (${report.x},${report.y}) [${pct(report.attackerChance)}/${pct(report.defenderChance)}] `
    + `→ ${report.outcome} (${winner.owner} ${winner.type} survives)`;
}
