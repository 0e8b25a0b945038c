import { z } from 'zod';
import { EngineError } from './errors';
import { HAND_SIZE } from './evaluation';
import { JOKERS, MAX_JOKERS } from './jokers';
import { SHOP_SIZE } from './shop';
import type { RunOptions } from './types';

export const DEFAULT_OPTIONS: RunOptions = {
  handsPerBlind: 3,
  discardsPerBlind: 2,
  poolSize: 8,
  startingCoins: 5,
  maxJokers: MAX_JOKERS,
  shopSize: SHOP_SIZE,
  allowWheel: false
};

export const runOptionsSchema = z.object({
  handsPerBlind: z.number().int().min(1).max(10),
  discardsPerBlind: z.number().int().min(0).max(10),
  poolSize: z.number().int().min(HAND_SIZE).max(16),
  startingCoins: z.number().int().min(0),
  maxJokers: z.number().int().min(1).max(JOKERS.length),
  shopSize: z.number().int().min(1).max(JOKERS.length),
  allowWheel: z.boolean()
});

export function resolveOptions(overrides: Partial<RunOptions> = {}): RunOptions {
  const parsed = runOptionsSchema.safeParse({ ...DEFAULT_OPTIONS, ...overrides });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new EngineError('INVALID_CONFIG', `Invalid run option ${issue.path.join('.')}: ${issue.message}`, {
      path: issue.path
    });
  }
  return parsed.data;
}
