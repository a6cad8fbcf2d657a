import { describe, it, expect } from 'vitest';
import { GAME_CONSTANTS, resolveGameConfig } from '@/config';
import { IllegalArgumentError } from '@/engine/utils/errors';

describe('resolveGameConfig', () => {
  it('returns the defaults when nothing is overridden', () => {
    const config = resolveGameConfig();
    expect(config).toEqual(GAME_CONSTANTS);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('carries the standard rules', () => {
    expect(GAME_CONSTANTS).toMatchObject({
      startingBalance: 10,
      passiveIncomePerTurn: 1,
      farmIncomePerTurn: 1,
      initialTimePool: 10,
      timeIncrementPerTurn: 0.01,
      sellHealthFraction: 0.75,
      exploreGoldFraction: 0.5,
      exploreHealthMultiplier: 1.5,
      turnLimit: 1000,
      agentInitTimeout: 10,
    });
  });

  it('merges overrides onto the defaults', () => {
    const config = resolveGameConfig({ startingBalance: 50, turnLimit: 20 });
    expect(config.startingBalance).toBe(50);
    expect(config.turnLimit).toBe(20);
    expect(config.initialTimePool).toBe(10);
  });

  it('accepts zero', () => {
    expect(resolveGameConfig({ passiveIncomePerTurn: 0 }).passiveIncomePerTurn).toBe(0);
  });

  it('rejects negative and non-finite values', () => {
    expect(() => resolveGameConfig({ startingBalance: -1 })).toThrow(IllegalArgumentError);
    expect(() => resolveGameConfig({ initialTimePool: Number.NaN })).toThrow(IllegalArgumentError);
    expect(() => resolveGameConfig({ timeIncrementPerTurn: Number.POSITIVE_INFINITY })).toThrow(IllegalArgumentError);
  });

  it('requires a positive whole turn limit', () => {
    expect(() => resolveGameConfig({ turnLimit: 0 })).toThrow(IllegalArgumentError);
    expect(() => resolveGameConfig({ turnLimit: 2.5 })).toThrow('Config "turnLimit" must be a positive integer (got 2.5)');
  });
});
