import type { EvaluateOptions } from './evaluation';
import { HAND_SIZE } from './evaluation';
import { scoreHand } from './scoring';
import type { BlindSlot, Card, JokerInstance, ScoreBreakdown } from './types';

export interface PlayOption {
  indices: number[];
  cards: Card[];
  breakdown: ScoreBreakdown;
}

// All k-subsets of [0, n) in lexicographic order
export function combinations(n: number, k: number): number[][] {
  const out: number[][] = [];
  const current: number[] = [];

  const walk = (start: number) => {
    if (current.length === k) {
      out.push([...current]);
      return;
    }
    for (let i = start; i <= n - (k - current.length); i++) {
      current.push(i);
      walk(i + 1);
      current.pop();
    }
  };

  walk(0);
  return out;
}

export function allPlays(
  pool: Card[],
  jokers: JokerInstance[],
  slot: BlindSlot,
  options: EvaluateOptions = {}
): PlayOption[] {
  if (pool.length < HAND_SIZE) return [];
  return combinations(pool.length, HAND_SIZE).map(indices => {
    const cards = indices.map(i => pool[i]);
    return { indices, cards, breakdown: scoreHand(cards, jokers, slot, options) };
  });
}

/**
 * Highest scoring five cards from the pool with the current jokers. Ties go
 * to the first combination in index order. Null when the pool is too small.
 */
export function bestPlay(
  pool: Card[],
  jokers: JokerInstance[],
  slot: BlindSlot,
  options: EvaluateOptions = {}
): PlayOption | null {
  let best: PlayOption | null = null;
  for (const option of allPlays(pool, jokers, slot, options)) {
    if (best === null || option.breakdown.total > best.breakdown.total) {
      best = option;
    }
  }
  return best;
}
