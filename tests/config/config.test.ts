import { describe, it, expect } from 'vitest';
import { DEFAULT_GAME_CONFIG, resolveConfig } from '@/config';
import { ConfigError } from '@/engine/utils/errors';

describe('resolveConfig', () => {
  it('fills in the defaults', () => {
    expect(resolveConfig()).toEqual(DEFAULT_GAME_CONFIG);
  });

  it('overrides only what is given', () => {
    expect(resolveConfig({ width: 20, seed: 4 })).toEqual({ ...DEFAULT_GAME_CONFIG, width: 20, seed: 4 });
  });

  it('lists every problem at once', () => {
    try {
      resolveConfig({ width: 1, landFraction: 0 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) expect(err.issues).toHaveLength(2);
    }
  });

  it('takes seeds up to 32 bits', () => {
    expect(resolveConfig({ seed: 0xffffffff }).seed).toBe(0xffffffff);
    expect(() => resolveConfig({ seed: 2 ** 32 })).toThrow(ConfigError);
  });

  it('requires two different player names', () => {
    expect(() => resolveConfig({ playerNames: ['Ann', 'Ann'] })).toThrow('playerNames: player names must differ');
  });
});
