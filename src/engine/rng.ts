import seedrandom from 'seedrandom';
import { z } from 'zod';
import type { RngState } from './types';

// ARC4 keystream position as exported by seedrandom
export const rngStateSchema = z.object({
  i: z.number().int().min(0).max(255),
  j: z.number().int().min(0).max(255),
  S: z.array(z.number().int().min(0).max(255)).length(256)
});

export interface RngStream {
  /** Uniform double in [0, 1). */
  next(): number;
  /** Uniform integer in [0, bound). */
  int(bound: number): number;
  snapshot(): RngState;
}

type Prng = seedrandom.StatefulPRNG<seedrandom.State.Arc4>;

function wrap(prng: Prng): RngStream {
  return {
    next: () => prng(),
    int: (bound) => {
      if (!Number.isInteger(bound) || bound <= 0) {
        throw new RangeError(`rng bound must be a positive integer, got ${bound}.`);
      }
      return Math.floor(prng() * bound);
    },
    snapshot: () => {
      const parsed = rngStateSchema.safeParse(prng.state());
      if (!parsed.success) {
        throw new Error('seedrandom returned a state that is not an ARC4 keystream position.');
      }
      return parsed.data;
    }
  };
}

export function seedRng(seed: string | number): RngState {
  return wrap(seedrandom(String(seed), { state: true })).snapshot();
}

export function openRng(state: RngState): RngStream {
  // Copy so the stream never writes through to a stored state
  const copy: RngState = { i: state.i, j: state.j, S: state.S.slice() };
  return wrap(seedrandom('', { state: copy }));
}

// Runs fn against a resumed stream and returns its result with the advanced position.
export function withRng<T>(state: RngState, fn: (rng: RngStream) => T): [T, RngState] {
  const rng = openRng(state);
  const result = fn(rng);
  return [result, rng.snapshot()];
}
