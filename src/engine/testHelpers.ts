import { parseCard } from './deck';
import { EngineError } from './errors';
import type { Card } from './types';

// Space-separated card text, e.g. '7♥ K♠ 10♦'
export function hand(text: string): Card[] {
  return text.split(/\s+/).map(parseCard);
}

// Code of the EngineError fn throws, undefined when it returns
export function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (e) {
    return e instanceof EngineError ? e.code : `not an EngineError: ${String(e)}`;
  }
  return undefined;
}
