import { describe, it, expect } from 'vitest';
import { produce } from 'immer';
import {
  advanceProduction,
  cycleProduction,
  healUnits,
  nextInOrder,
  setProduction,
} from '@/engine/systems/production/ProductionSystem';
import { SetProductionAction, CycleProductionAction } from '@/engine/state/actions/SetProductionAction';
import type { GameState } from '@/engine/state/GameState';
import { StateQuery } from '@/engine/state/GameState';
import type { UnitInstance } from '@/engine/data/types/Unit';
import { P1, P2, makeCity, makeCtx, makeState, unitById } from '../integration/helpers';
import type { RecordingContext } from '../integration/helpers';

const LAND5 = Array.from({ length: 5 }, () => '+++++');

function tick(state: GameState, ctx: RecordingContext = makeCtx()): { state: GameState; spawned: UnitInstance[] } {
  let spawned: UnitInstance[] = [];
  const next = produce(state, draft => { spawned = advanceProduction(draft, ctx).map(u => ({ ...u })); });
  return { state: next, spawned };
}

const cityAt = (state: GameState, x: number, y: number) => {
  const city = StateQuery.cityAt(state, x, y);
  if (!city) throw new Error(`no city at (${x},${y})`);
  return city;
};

describe('setProduction / cycleProduction', () => {
  it('rejects an unknown unit type and changes nothing', () => {
    const city = makeCity({ x: 0, y: 0, owner: P1, production: 'Army', progress: 3 });
    expect(setProduction(city, 'Tank')).toEqual({ ok: false, message: 'Unknown unit type: Tank' });
    expect(city).toMatchObject({ production: 'Army', cost: 6, progress: 3 });
  });

  it('switches the order, takes the catalog cost and keeps progress', () => {
    const city = makeCity({ x: 0, y: 0, owner: P1, production: 'Army', progress: 3 });
    expect(setProduction(city, 'Fighter').ok).toBe(true);
    expect(city).toMatchObject({ production: 'Fighter', cost: 10, progress: 3 });
  });

  it('cycles Army → Fighter → Carrier → NuclearMissile → Army', () => {
    expect(nextInOrder(null)).toBe('Army');
    expect(nextInOrder('Army')).toBe('Fighter');
    expect(nextInOrder('Fighter')).toBe('Carrier');
    expect(nextInOrder('Carrier')).toBe('NuclearMissile');
    expect(nextInOrder('NuclearMissile')).toBe('Army');

    const city = makeCity({ x: 0, y: 0, owner: P1 });
    cycleProduction(city);
    expect(city).toMatchObject({ production: 'Army', cost: 6 });
  });
});

describe('production commands', () => {
  const state = makeState({
    rows: LAND5,
    cities: [{ x: 0, y: 0, owner: P1, production: 'Army' }, { x: 4, y: 4, owner: P2, production: 'Army' }],
  });

  it('only touch the active player\'s cities', () => {
    const { state: next, result } = new SetProductionAction(4, 4, 'Fighter').execute(state, makeCtx());
    expect(result).toEqual({ ok: false, message: 'City at (4,4) is not yours' });
    expect(next).toBe(state);
  });

  it('report a missing city', () => {
    expect(new CycleProductionAction(2, 2).execute(state, makeCtx()).result.message).toBe('No city at (2,2)');
  });

  it('keep the state on an unknown type', () => {
    const { state: next, result } = new SetProductionAction(0, 0, 'Tank').execute(state, makeCtx());
    expect(result.ok).toBe(false);
    expect(next).toBe(state);
  });

  it('cycle the order of an own city', () => {
    const { state: next, result } = new CycleProductionAction(0, 0).execute(state, makeCtx());
    expect(result).toEqual({ ok: true, message: 'City at (0,0) now producing Fighter' });
    expect(cityAt(next, 0, 0)).toMatchObject({ production: 'Fighter', cost: 10 });
  });
});

describe('advanceProduction', () => {
  it('spawns an Army once progress reaches cost, then resets', () => {
    let state = makeState({ rows: LAND5, cities: [{ x: 2, y: 2, owner: P1, production: 'Army', cost: 12 }] });
    const spawnedAt: number[] = [];
    for (let turn = 1; turn <= 13; turn++) {
      const out = tick(state);
      state = out.state;
      if (out.spawned.length > 0) spawnedAt.push(turn);
    }
    expect(spawnedAt).toEqual([12]);
    expect(cityAt(state, 2, 2).progress).toBe(1);
    expect(StateQuery.unitsOf(state, P1)).toHaveLength(1);
    expect(unitById(state, 'unit_1')).toMatchObject({
      type: 'Army', x: 2, y: 2, movesLeft: 1, hp: 10, home: { x: 2, y: 2 },
    });
  });

  it('holds a city at its support cap pinned at cost', () => {
    let state = makeState({
      rows: LAND5,
      cities: [{ x: 2, y: 2, owner: P1, production: 'Army', cost: 12, progress: 11, supportCap: 1 }],
      units: [{ type: 'Army', owner: P1, x: 0, y: 0, home: { x: 2, y: 2 } }],
    });
    for (let i = 0; i < 3; i++) {
      state = tick(state).state;
      expect(cityAt(state, 2, 2).progress).toBe(12);
    }
    expect(StateQuery.unitsOf(state, P1)).toHaveLength(1);
  });

  it('does not count dead Armies against the cap', () => {
    const state = makeState({
      rows: LAND5,
      cities: [{ x: 2, y: 2, owner: P1, production: 'Army', progress: 5, supportCap: 1 }],
      units: [{ type: 'Army', owner: P1, x: 0, y: 0, home: { x: 2, y: 2 }, hp: 0 }],
    });
    expect(tick(state).spawned).toHaveLength(1);
  });

  it('tries the city tile, then the neighbours in order', () => {
    const state = makeState({
      rows: ['+++', '+++', '+++'],
      cities: [{ x: 1, y: 1, owner: P1, production: 'Army', progress: 5 }],
      units: [{ type: 'Fighter', owner: P2, x: 1, y: 1 }, { type: 'Army', owner: P1, x: 2, y: 1 }],
    });
    const { spawned } = tick(state);
    expect(spawned.map(u => [u.x, u.y])).toEqual([[0, 1]]);
  });

  it('skips ocean around the city for Armies', () => {
    const state = makeState({
      rows: ['...', '.+.', '..+'],
      cities: [{ x: 1, y: 1, owner: P1, production: 'Army', progress: 5 }],
      units: [{ type: 'Fighter', owner: P1, x: 1, y: 1 }],
    });
    expect(tick(state).spawned.map(u => [u.x, u.y])).toEqual([[2, 2]]);
  });

  it('spawns Fighters and missiles on the city tile only', () => {
    const state = makeState({
      rows: LAND5,
      cities: [
        { x: 0, y: 0, owner: P1, production: 'Fighter', progress: 9 },
        { x: 4, y: 4, owner: P1, production: 'NuclearMissile', progress: 29 },
      ],
      units: [{ type: 'Army', owner: P1, x: 0, y: 0 }],
    });
    const { state: next, spawned } = tick(state);
    expect(spawned.map(u => u.type)).toEqual(['NuclearMissile']);
    expect(cityAt(next, 0, 0).progress).toBe(10);
    expect(cityAt(next, 4, 4).progress).toBe(0);
    expect(spawned[0]?.missile).toEqual({ heading: null, traveled: 0 });
  });

  it('launches Carriers onto the first free ocean neighbour', () => {
    const state = makeState({
      rows: ['+.+', '+++', '.++'],
      cities: [{ x: 1, y: 1, owner: P1, production: 'Carrier', progress: 15 }],
    });
    const { spawned } = tick(state);
    expect(spawned.map(u => [u.type, u.x, u.y])).toEqual([['Carrier', 1, 0]]);
  });

  it('holds a landlocked Carrier order', () => {
    const state = makeState({
      rows: ['+++', '+++', '+++'],
      cities: [{ x: 1, y: 1, owner: P1, production: 'Carrier', progress: 15 }],
    });
    const { state: next, spawned } = tick(state);
    expect(spawned).toEqual([]);
    expect(cityAt(next, 1, 1).progress).toBe(16);
  });

  it('ignores neutral cities and cities without an order', () => {
    const state = makeState({
      rows: LAND5,
      cities: [{ x: 0, y: 0, production: 'Army', progress: 2 }, { x: 4, y: 4, owner: P1 }],
    });
    const { state: next } = tick(state);
    expect(next.cities.map(c => c.progress)).toEqual([2, 0]);
  });

  it('hands out sequential unit ids and reports each spawn', () => {
    const ctx = makeCtx();
    const state = makeState({
      rows: LAND5,
      cities: [
        { x: 0, y: 0, owner: P1, production: 'Army', progress: 5 },
        { x: 4, y: 4, owner: P2, production: 'Army', progress: 5 },
      ],
      units: [{ type: 'Army', owner: P1, x: 2, y: 2 }],
    });
    const { state: next, spawned } = tick(state, ctx);
    expect(spawned.map(u => u.id)).toEqual(['unit_2', 'unit_3']);
    expect(next.nextUnitId).toBe(4);
    expect(ctx.log.unitSpawned).toEqual([
      { unitId: 'unit_2', type: 'Army', owner: P1, x: 0, y: 0 },
      { unitId: 'unit_3', type: 'Army', owner: P2, x: 4, y: 4 },
    ]);
  });
});

describe('healUnits', () => {
  it('restores one hp on an own city, up to max', () => {
    const state = makeState({
      rows: LAND5,
      cities: [{ x: 0, y: 0, owner: P1 }, { x: 1, y: 0, owner: P1 }, { x: 2, y: 0, owner: P2 }],
      units: [
        { type: 'Army', owner: P1, x: 0, y: 0, hp: 5 },
        { type: 'Army', owner: P1, x: 1, y: 0, hp: 10 },
        { type: 'Army', owner: P1, x: 2, y: 0, hp: 5 },
        { type: 'Army', owner: P1, x: 3, y: 0, hp: 5 },
      ],
    });
    const next = produce(state, draft => { healUnits(draft); });
    expect(['unit_1', 'unit_2', 'unit_3', 'unit_4'].map(id => unitById(next, id).hp)).toEqual([6, 10, 5, 5]);
  });
});
