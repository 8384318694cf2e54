import { describe, it, expect } from 'vitest';
import { EndTurnAction } from '@/engine/state/actions/EndTurnAction';
import { MoveAction } from '@/engine/state/actions/MoveAction';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import { P1, P2, makeCtx, makeState, unitById } from '../integration/helpers';
import type { RecordingContext } from '../integration/helpers';

const SEA = ['++++....', '++++....', '++++....', '++++....'];

function endTurn(state: GameState, ctx: RecordingContext = makeCtx()) {
  return { ...new EndTurnAction().execute(state, ctx), ctx };
}

const twoSides = (): GameState => makeState({
  rows: SEA,
  cities: [{ x: 0, y: 0, owner: P1, production: 'Army' }, { x: 3, y: 3, owner: P2, production: 'Army' }],
  units: [
    { type: 'Army', owner: P1, x: 1, y: 0, movesLeft: 0 },
    { type: 'Army', owner: P2, x: 2, y: 3, movesLeft: 0 },
  ],
});

describe('endTurn: handoff', () => {
  it('passes the turn to the opponent with fresh moves', () => {
    const { state, result } = endTurn(twoSides());
    expect(result).toEqual({
      ok: true,
      message: 'Turn 1 ended; P2 to move',
      winner: null,
      nextPlayer: P2,
      spawned: 0,
      missilesDetonated: 0,
      fightersLost: 0,
    });
    expect(state).toMatchObject({ turn: 2, activePlayer: P2, phase: 'ACTIVE_TURN', winner: null });
    expect(unitById(state, 'unit_2').movesLeft).toBe(1);
    expect(unitById(state, 'unit_1').movesLeft).toBe(0);
  });

  it('walks the phase machine in order', () => {
    const { ctx } = endTurn(twoSides());
    expect(ctx.log.phaseChanged.map(e => e.phase)).toEqual(['END_TURN_PROCESSING', 'HANDOFF', 'ACTIVE_TURN']);
    expect(ctx.log.turnEnded).toEqual([{ turn: 1, player: P1 }]);
    expect(ctx.log.handoff).toEqual([{ from: P1, to: P2 }]);
    expect(ctx.log.turnStarted).toEqual([{ turn: 2, player: P2 }]);
  });

  it('advances production for both players\' cities', () => {
    const { state } = endTurn(twoSides());
    expect(state.cities.map(c => c.progress)).toEqual([1, 1]);
  });

  it('comes back around to the first player', () => {
    const once = endTurn(twoSides()).state;
    const twice = endTurn(once).state;
    expect(twice).toMatchObject({ turn: 3, activePlayer: P1 });
    expect(unitById(twice, 'unit_1').movesLeft).toBe(1);
  });

  it('heals units resting in their own cities', () => {
    const state = makeState({
      rows: SEA,
      cities: [{ x: 0, y: 0, owner: P1 }, { x: 3, y: 3, owner: P2 }],
      units: [{ type: 'Army', owner: P1, x: 0, y: 0, hp: 4 }],
    });
    expect(unitById(endTurn(state).state, 'unit_1').hp).toBe(5);
  });
});

describe('endTurn: missiles and basing', () => {
  it('detonates the ending player\'s missiles where they stand', () => {
    const state = makeState({
      rows: SEA,
      cities: [{ x: 0, y: 0, owner: P1 }, { x: 3, y: 3, owner: P2 }, { x: 0, y: 3, owner: P2 }],
      units: [
        { type: 'NuclearMissile', owner: P1, x: 6, y: 1 },
        { type: 'NuclearMissile', owner: P2, x: 6, y: 3 },
        { type: 'Carrier', owner: P2, x: 7, y: 2 },
      ],
    });
    const { state: next, result, ctx } = endTurn(state);
    expect(result.missilesDetonated).toBe(1);
    // (6,3) and (7,2) are both inside the blast; only the ending player launches
    expect(ctx.log.missileDetonated).toHaveLength(1);
    expect(StateQuery.liveUnits(next)).toEqual([]);
    expect(next.units).toEqual({});
    expect(next.telemetry.stats[P1]?.kills).toMatchObject({ NuclearMissile: 1, Carrier: 1 });
  });

  it('does not count a missile already caught in a sibling\'s blast', () => {
    const state = makeState({
      rows: SEA,
      cities: [{ x: 0, y: 0, owner: P1 }, { x: 3, y: 3, owner: P2 }],
      units: [
        { type: 'NuclearMissile', owner: P1, x: 5, y: 0 },
        { type: 'NuclearMissile', owner: P1, x: 6, y: 0 },
      ],
    });
    const { state: next, result, ctx } = endTurn(state);
    expect(result.missilesDetonated).toBe(1);
    expect(ctx.log.missileDetonated.map(e => e.unitId)).toEqual(['unit_1']);
    expect(ctx.log.unitDestroyed.map(e => [e.unitId, e.cause])).toEqual([['unit_2', 'detonation']]);
    expect(next.units).toEqual({});
  });

  it('destroys Fighters far from an own city or Carrier', () => {
    const state = makeState({
      rows: SEA,
      cities: [{ x: 0, y: 0, owner: P1 }, { x: 3, y: 3, owner: P2 }],
      units: [
        { type: 'Fighter', owner: P1, x: 0, y: 0 },   // on own city
        { type: 'Fighter', owner: P1, x: 5, y: 1 },   // beside own carrier
        { type: 'Carrier', owner: P1, x: 6, y: 2 },
        { type: 'Fighter', owner: P1, x: 2, y: 2 },   // stranded
        { type: 'Fighter', owner: P1, x: 3, y: 3 },   // on an enemy city
        { type: 'Fighter', owner: P2, x: 7, y: 0 },   // not this player's turn
      ],
    });
    const { state: next, result, ctx } = endTurn(state);
    expect(result.fightersLost).toBe(2);
    expect(Object.keys(next.units)).toEqual(['unit_1', 'unit_2', 'unit_3', 'unit_6']);
    expect(ctx.log.unitDestroyed.map(e => [e.unitId, e.cause])).toEqual([['unit_4', 'basing'], ['unit_5', 'basing']]);
    expect(next.telemetry.stats[P1]?.losses.Fighter).toBe(2);
    expect(next.telemetry.stats[P2]?.kills.Fighter).toBe(0);
  });

  it('prunes units killed during the turn', () => {
    const state = makeState({
      rows: SEA,
      cities: [{ x: 0, y: 0, owner: P1 }, { x: 3, y: 3, owner: P2 }],
      units: [{ type: 'Army', owner: P1, x: 1, y: 1, hp: 0 }, { type: 'Army', owner: P2, x: 2, y: 2 }],
    });
    expect(Object.keys(endTurn(state).state.units)).toEqual(['unit_2']);
  });
});

describe('endTurn: victory', () => {
  const lastStand = (): GameState => makeState({
    rows: SEA,
    cities: [{ x: 0, y: 0, owner: P1, production: 'Army' }, { x: 3, y: 3 }],
    units: [{ type: 'Army', owner: P2, x: 2, y: 2 }],
  });

  it('ends the game when the opponent holds no city', () => {
    const { state, result, ctx } = endTurn(lastStand());
    expect(result).toMatchObject({ ok: true, winner: P1, nextPlayer: null, message: 'P1 wins!' });
    expect(state).toMatchObject({ phase: 'GAME_OVER', winner: P1, turn: 1, activePlayer: P1 });
    expect(ctx.log.victory).toEqual([{ winner: P1, turn: 1 }]);
    expect(ctx.log.handoff).toEqual([]);
  });

  it('reports the victory exactly once', () => {
    const ctx = makeCtx();
    const over = endTurn(lastStand(), ctx).state;
    const again = endTurn(over, ctx);
    const move = new MoveAction('unit_1', 1, 0).execute(over, ctx);

    expect(again.result).toMatchObject({ ok: false, message: 'Game over: P1 won', winner: P1 });
    expect(again.state).toBe(over);
    expect(move.result.ok).toBe(false);
    expect(ctx.log.victory).toHaveLength(1);
  });

  it('needs the winner to hold a city', () => {
    const state = makeState({
      rows: SEA,
      cities: [{ x: 3, y: 3 }],
      units: [{ type: 'Army', owner: P1, x: 0, y: 0 }],
    });
    const { state: next } = endTurn(state);
    expect(next).toMatchObject({ phase: 'ACTIVE_TURN', winner: null, activePlayer: P2 });
  });
});
