import { describe, test, expect } from 'vitest';
import { DEFAULT_OPTIONS, resolveOptions } from './config';
import { EngineError } from './errors';
import type { RunOptions } from './types';

function configError(overrides: Partial<RunOptions>): EngineError | undefined {
  try {
    resolveOptions(overrides);
  } catch (e) {
    if (e instanceof EngineError) return e;
    throw e;
  }
  return undefined;
}

describe('resolveOptions', () => {
  test('defaults', () => {
    expect(resolveOptions()).toEqual({
      handsPerBlind: 3,
      discardsPerBlind: 2,
      poolSize: 8,
      startingCoins: 5,
      maxJokers: 5,
      shopSize: 3,
      allowWheel: false
    });
    expect(resolveOptions()).not.toBe(DEFAULT_OPTIONS);
  });

  test('overrides merge over defaults', () => {
    const options = resolveOptions({ handsPerBlind: 4, allowWheel: true });
    expect(options.handsPerBlind).toBe(4);
    expect(options.allowWheel).toBe(true);
    expect(options.poolSize).toBe(8);
  });

  test('rejects out-of-range values', () => {
    expect(configError({ poolSize: 4 })?.code).toBe('INVALID_CONFIG');
    expect(configError({ handsPerBlind: 0 })?.code).toBe('INVALID_CONFIG');
    expect(configError({ startingCoins: -1 })?.code).toBe('INVALID_CONFIG');
    expect(configError({ discardsPerBlind: 1.5 })?.code).toBe('INVALID_CONFIG');
    expect(configError({ poolSize: 4 })?.message).toMatch(/^Invalid run option poolSize:/);
    expect(configError({ discardsPerBlind: 0 })).toBeUndefined();
  });
});
