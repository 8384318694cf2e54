// ─────────────────────────────────────────────
//  SaveManager: GameState ⇄ plain snapshot document
//  Transport (file, network, storage) belongs to the caller.
// ─────────────────────────────────────────────

import { produce } from 'immer';
import type { GameState, PlayerFog } from '@/engine/state/GameState';
import type { Terrain, TileGrid } from '@/engine/data/types/Map';
import { inBounds } from '@/engine/data/types/Map';
import type { CityState } from '@/engine/data/types/City';
import type { UnitInstance, UnitMap } from '@/engine/data/types/Unit';
import type { BattleReport, PlayerId, PlayerStats } from '@/engine/data/types/Player';
import { SnapshotError, invariant } from '@/engine/utils/errors';
import type { TurnPhase } from '@/engine/systems/turn/TurnManager';
import { createGrid, recomputeAll } from '@/engine/systems/visibility/VisibilitySystem';
import { emptyStats } from '@/engine/systems/combat/Telemetry';
import { SNAPSHOT_VERSION, snapshotSchema } from './SnapshotSchema';
import type { BattleSnapshot, GameSnapshot, PersistedPhase, PlayerSnapshot, UnitSnapshot } from './SnapshotSchema';

// ── Encoding ──

const TILE_CHAR: Record<Terrain, string> = { land: '+', ocean: '.' };

function encodeTiles(tiles: TileGrid): string[] {
  return tiles.map(row => row.map(t => TILE_CHAR[t]).join(''));
}

function encodeGrid(grid: boolean[][]): string[] {
  return grid.map(row => row.map(v => (v ? '1' : '0')).join(''));
}

function persistedPhase(phase: TurnPhase): PersistedPhase {
  invariant(phase === 'ACTIVE_TURN' || phase === 'GAME_OVER', `cannot snapshot during ${phase}`);
  return phase;
}

function encodeUnit(u: UnitInstance): UnitSnapshot {
  const out: UnitSnapshot = {
    id: u.id,
    type: u.type,
    owner: u.owner,
    x: u.x,
    y: u.y,
    hp: u.hp,
    max_hp: u.maxHp,
    movement: u.movement,
    moves_left: u.movesLeft,
    home: u.home ? { x: u.home.x, y: u.home.y } : null,
  };
  if (u.missile) {
    const h = u.missile.heading;
    out.missile = { heading: h ? { dx: h.dx, dy: h.dy } : null, traveled: u.missile.traveled };
  }
  return out;
}

function encodeBattle(r: BattleReport): BattleSnapshot {
  return {
    turn: r.turn,
    attacker: { unit_id: r.attacker.unitId, type: r.attacker.type, owner: r.attacker.owner },
    defender: { unit_id: r.defender.unitId, type: r.defender.type, owner: r.defender.owner },
    x: r.x,
    y: r.y,
    attacker_chance: r.attackerChance,
    defender_chance: r.defenderChance,
    outcome: r.outcome,
    text: r.text,
  };
}

/** Plain JSON-able document of `state`. Visible grids are not stored. */
export function createSnapshot(state: GameState): GameSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    map: {
      width: state.map.width,
      height: state.map.height,
      tiles: encodeTiles(state.map.tiles),
      cities: state.cities.map(c => ({
        x: c.x,
        y: c.y,
        owner: c.owner,
        production: c.production,
        progress: c.progress,
        cost: c.cost,
        support_cap: c.supportCap,
      })),
    },
    units: Object.values(state.units).map(encodeUnit),
    players: state.players.map((p): PlayerSnapshot => {
      const stats = state.telemetry.stats[p.id] ?? emptyStats();
      return {
        id: p.id,
        name: p.name,
        is_ai: p.isAi,
        explored: encodeGrid(state.fog[p.id]?.explored ?? createGrid(state.map.width, state.map.height)),
        kills: { ...stats.kills },
        losses: { ...stats.losses },
      };
    }),
    turn_number: state.turn,
    current_player: state.activePlayer,
    phase: persistedPhase(state.phase),
    winner: state.winner,
    rng_state: state.rngState,
    next_unit_id: state.nextUnitId,
    battle_log: state.telemetry.battleLog.map(encodeBattle),
  };
}

// ── Decoding ──

/** Cross-field checks zod cannot express on its own */
function checkConsistency(doc: GameSnapshot): string[] {
  const issues: string[] = [];
  const { width, height } = doc.map;
  const ids = new Set(doc.players.map(p => p.id));
  const knownOwner = (owner: string | null): boolean => owner === null || ids.has(owner);

  if (ids.size !== doc.players.length) issues.push('players: ids must be distinct');

  if (doc.map.tiles.length !== height) {
    issues.push(`map.tiles: expected ${height} rows, got ${doc.map.tiles.length}`);
  }
  doc.map.tiles.forEach((row, y) => {
    if (row.length !== width) issues.push(`map.tiles.${y}: expected ${width} columns, got ${row.length}`);
  });

  const cityKeys = new Set<string>();
  doc.map.cities.forEach((c, i) => {
    if (!inBounds(doc.map, c.x, c.y)) issues.push(`map.cities.${i}: (${c.x},${c.y}) is off the map`);
    if (!knownOwner(c.owner)) issues.push(`map.cities.${i}: unknown owner ${c.owner ?? ''}`);
    const key = `${c.x},${c.y}`;
    if (cityKeys.has(key)) issues.push(`map.cities.${i}: second city at (${key})`);
    cityKeys.add(key);
  });

  const unitIds = new Set<string>();
  doc.units.forEach((u, i) => {
    if (!inBounds(doc.map, u.x, u.y)) issues.push(`units.${i}: (${u.x},${u.y}) is off the map`);
    if (!ids.has(u.owner)) issues.push(`units.${i}: unknown owner ${u.owner}`);
    if (unitIds.has(u.id)) issues.push(`units.${i}: duplicate id ${u.id}`);
    unitIds.add(u.id);
  });

  doc.players.forEach((p, i) => {
    if (p.explored.length !== height || p.explored.some(row => row.length !== width)) {
      issues.push(`players.${i}.explored: grid must be ${width}x${height}`);
    }
  });

  if (!ids.has(doc.current_player)) issues.push(`current_player: unknown player ${doc.current_player}`);
  if (!knownOwner(doc.winner)) issues.push(`winner: unknown player ${doc.winner ?? ''}`);
  if (doc.phase === 'GAME_OVER' && doc.winner === null) issues.push('winner: a finished game needs a winner');
  if (doc.phase !== 'GAME_OVER' && doc.winner !== null) issues.push(`winner: set to ${doc.winner} while the game is running`);

  return issues;
}

function decodeUnit(u: UnitSnapshot): UnitInstance {
  const unit: UnitInstance = {
    id: u.id,
    type: u.type,
    owner: u.owner,
    x: u.x,
    y: u.y,
    hp: u.hp,
    maxHp: u.max_hp,
    movement: u.movement,
    movesLeft: u.moves_left,
    home: u.home,
  };
  if (u.missile) unit.missile = u.missile;
  else if (u.type === 'NuclearMissile') unit.missile = { heading: null, traveled: 0 };
  return unit;
}

function decodeBattle(b: BattleSnapshot): BattleReport {
  return {
    turn: b.turn,
    attacker: { unitId: b.attacker.unit_id, type: b.attacker.type, owner: b.attacker.owner },
    defender: { unitId: b.defender.unit_id, type: b.defender.type, owner: b.defender.owner },
    x: b.x,
    y: b.y,
    attackerChance: b.attacker_chance,
    defenderChance: b.defender_chance,
    outcome: b.outcome,
    text: b.text,
  };
}

/**
 * Rebuild a GameState from a snapshot document.
 * Throws SnapshotError listing every problem; visible grids are recomputed.
 */
export function restoreState(document: unknown): GameState {
  const parsed = snapshotSchema.safeParse(document);
  if (!parsed.success) {
    throw new SnapshotError(parsed.error.issues.map(i => `${i.path.join('.') || 'snapshot'}: ${i.message}`));
  }
  const doc = parsed.data;
  const issues = checkConsistency(doc);
  if (issues.length > 0) throw new SnapshotError(issues);

  const tiles: TileGrid = doc.map.tiles.map(row => [...row].map((ch): Terrain => (ch === '+' ? 'land' : 'ocean')));

  const cities: CityState[] = doc.map.cities.map(c => ({
    x: c.x,
    y: c.y,
    owner: c.owner,
    production: c.production,
    progress: c.progress,
    cost: c.cost,
    supportCap: c.support_cap,
  }));

  const units: UnitMap = {};
  for (const u of doc.units) units[u.id] = decodeUnit(u);

  const fog: Record<PlayerId, PlayerFog> = {};
  const stats: Record<PlayerId, PlayerStats> = {};
  for (const p of doc.players) {
    fog[p.id] = {
      explored: p.explored.map(row => [...row].map(ch => ch === '1')),
      visible: createGrid(doc.map.width, doc.map.height),
    };
    stats[p.id] = { kills: { ...p.kills }, losses: { ...p.losses } };
  }

  const state: GameState = {
    map: { width: doc.map.width, height: doc.map.height, tiles },
    cities,
    units,
    players: doc.players.map(p => ({ id: p.id, name: p.name, isAi: p.is_ai })),
    fog,
    telemetry: { battleLog: doc.battle_log.map(decodeBattle), stats },
    turn: doc.turn_number,
    activePlayer: doc.current_player,
    phase: doc.phase,
    winner: doc.winner,
    rngState: doc.rng_state,
    nextUnitId: doc.next_unit_id,
  };

  return produce(state, draft => { recomputeAll(draft); });
}

export function serialize(state: GameState): string {
  return JSON.stringify(createSnapshot(state));
}

/** Parse JSON text and restore it. Bad JSON is reported as a SnapshotError too. */
export function deserialize(json: string): GameState {
  let document: unknown;
  try {
    document = JSON.parse(json);
  } catch (err) {
    throw new SnapshotError([`invalid JSON: ${err instanceof Error ? err.message : String(err)}`]);
  }
  return restoreState(document);
}

/** Convenience namespace export */
export const SaveManager = {
  createSnapshot,
  restoreState,
  serialize,
  deserialize,
};
