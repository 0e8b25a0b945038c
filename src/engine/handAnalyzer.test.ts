import { describe, test, expect } from 'vitest';
import { allPlays, bestPlay, combinations } from './handAnalyzer';
import { requireJoker, toInstance } from './jokers';
import { HandCategory } from './types';
import { hand } from './testHelpers';

describe('combinations', () => {
  test('enumerates subsets in index order', () => {
    const all = combinations(8, 5);
    expect(all.length).toBe(56);
    expect(all[0]).toEqual([0, 1, 2, 3, 4]);
    expect(all[1]).toEqual([0, 1, 2, 3, 5]);
    expect(all[55]).toEqual([3, 4, 5, 6, 7]);
    expect(combinations(4, 5)).toEqual([]);
    expect(combinations(3, 0)).toEqual([[]]);
  });
});

describe('bestPlay', () => {
  const pool = hand('2♥ 5♥ 8♥ J♥ K♥ A♠ A♦ 3♣');

  test('finds the highest scoring five', () => {
    const best = bestPlay(pool, [], 'Small');
    expect(best?.indices).toEqual([0, 1, 2, 3, 4]);
    expect(best?.breakdown.category).toBe(HandCategory.Flush);
    expect(best?.breakdown.total).toBe(255);
  });

  test('no play beats the best one', () => {
    const best = bestPlay(pool, [], 'Small');
    const totals = allPlays(pool, [], 'Small').map(p => p.breakdown.total);
    expect(totals.length).toBe(56);
    expect(Math.max(...totals)).toBe(best?.breakdown.total);
  });

  test('jokers change the choice', () => {
    const mixed = hand('A♠ A♦ K♠ Q♦ J♣ 3♥ 5♥ 9♣');
    const plain = bestPlay(mixed, [], 'Small');
    expect(plain?.indices).toEqual([0, 1, 2, 3, 4]);
    expect(plain?.breakdown.total).toBe(62);

    const odd = bestPlay(mixed, [toInstance(requireJoker('odd-one-out'))], 'Small');
    expect(odd?.indices).toEqual([0, 1, 2, 4, 7]);
    expect(odd?.breakdown.total).toBe(244);
  });

  test('ties keep the first combination', () => {
    const flat = hand('2♠ 3♥ 4♦ 6♣ 8♠ 9♥');
    const totals = allPlays(flat, [], 'Small').map(p => p.breakdown.total);
    const best = bestPlay(flat, [], 'Small');
    expect(best?.indices).toEqual(allPlays(flat, [], 'Small')[totals.indexOf(Math.max(...totals))].indices);
  });

  test('too few cards', () => {
    expect(bestPlay(hand('2♠ 3♥ 4♦ 6♣'), [], 'Small')).toBeNull();
    expect(allPlays([], [], 'Small')).toEqual([]);
  });
});
