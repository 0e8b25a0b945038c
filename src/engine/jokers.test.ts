import { describe, test, expect } from 'vitest';
import { evaluateHand } from './evaluation';
import { getJoker, JOKERS, requireJoker, triggerTimes } from './jokers';
import type { TriggerContext } from './jokers';
import type { BlindSlot, JokerTrigger, Rarity } from './types';
import { hand } from './testHelpers';

function ctx(text: string, slot: BlindSlot = 'Small'): TriggerContext {
  const cards = hand(text);
  return { cards, category: evaluateHand(cards).category, slot };
}

function times(id: string, text: string, slot?: BlindSlot): number {
  return triggerTimes(requireJoker(id).trigger, ctx(text, slot));
}

describe('joker catalog', () => {
  test('ids are unique and every rarity is stocked', () => {
    expect(new Set(JOKERS.map(j => j.id)).size).toBe(JOKERS.length);
    const count = (rarity: Rarity) => JOKERS.filter(j => j.rarity === rarity).length;
    expect(count('common')).toBe(7);
    expect(count('uncommon')).toBe(5);
    expect(count('rare')).toBe(3);
  });

  test('every joker has a positive cost and an effect', () => {
    for (const def of JOKERS) {
      expect(def.cost).toBeGreaterThan(0);
      expect(def.chips + def.mult).toBeGreaterThan(0);
      expect(def.description.length).toBeGreaterThan(0);
    }
  });

  test('lookup', () => {
    expect(getJoker('rainbow')?.name).toBe('Rainbow');
    expect(getJoker('nope')).toBeUndefined();
    expect(() => requireJoker('nope')).toThrow(RangeError);
  });
});

describe('triggerTimes', () => {
  test('rank and suit presence', () => {
    expect(times('lucky-seven', '7♥ K♠ Q♣ J♦ A♠')).toBe(1);
    expect(times('lucky-seven', '8♥ K♠ Q♣ J♦ A♠')).toBe(0);
    expect(times('spade-stack', '2♠ 5♠ 9♠ J♣ K♥')).toBe(1);
    expect(times('spade-stack', '2♠ 5♠ 9♦ J♣ K♥')).toBe(0);
  });

  test('scaled suit count', () => {
    expect(times('heartfelt', '2♥ 5♥ 9♥ J♥ K♠')).toBe(4);
    expect(times('heartfelt', '2♠ 5♠ 9♠ J♠ K♣')).toBe(0);
  });

  test('category thresholds', () => {
    expect(times('straight-shooter', '5♠ 6♥ 7♦ 8♣ 9♠')).toBe(1);
    expect(times('straight-shooter', '9♠ 9♥ 9♦ 4♣ 4♠')).toBe(1);
    expect(times('straight-shooter', 'Q♠ Q♥ Q♦ 8♣ 3♠')).toBe(0);
    expect(times('pair-pal', 'K♠ K♥ 5♦ 5♣ A♠')).toBe(1);
    expect(times('pair-pal', 'Q♠ Q♥ Q♦ 8♣ 3♠')).toBe(0);
    expect(times('flush-fan', '6♠ 7♠ 8♠ 9♠ 10♠')).toBe(1);
  });

  test('distinct ranks count in pairs', () => {
    expect(times('variety-show', '7♥ K♠ Q♣ J♦ A♠')).toBe(2);
    expect(times('variety-show', 'K♠ K♥ 5♦ 5♣ A♠')).toBe(1);
    expect(times('variety-show', 'A♠ A♥ A♦ A♣ K♠')).toBe(1);
  });

  test('high cards', () => {
    expect(times('court-jester', '10♥ J♥ Q♥ K♥ A♥')).toBe(5);
    expect(times('court-jester', '2♥ 3♠ 4♦ 6♣ 7♠')).toBe(0);
    expect(times('crown-jewels', '10♥ J♥ Q♥ K♥ A♥')).toBe(5);
    expect(times('crown-jewels', '9♥ J♥ Q♥ K♥ A♥')).toBe(0);
  });

  test('all suits and all odd', () => {
    expect(times('rainbow', '2♠ 3♥ 4♦ 5♣ 9♠')).toBe(1);
    expect(times('rainbow', '2♠ 3♥ 4♦ 5♦ 9♠')).toBe(0);
    expect(times('odd-one-out', 'A♠ 3♥ 5♦ 9♣ K♠')).toBe(1);
    expect(times('odd-one-out', 'A♠ 3♥ 5♦ 9♣ Q♠')).toBe(0);
  });

  test('always and boss triggers', () => {
    expect(times('plain-joker', '2♠ 3♥ 4♦ 6♣ 8♠')).toBe(1);
    expect(times('boss-hunter', '2♠ 3♥ 4♦ 6♣ 8♠', 'Boss')).toBe(1);
    expect(times('boss-hunter', '2♠ 3♥ 4♦ 6♣ 8♠', 'Big')).toBe(0);
  });

  test('min guards the distinct-rank trigger', () => {
    const trigger: JokerTrigger = { kind: 'distinct-ranks', min: 4, per: 1 };
    expect(triggerTimes(trigger, ctx('K♠ K♥ 5♦ 5♣ A♠'))).toBe(0);
    expect(triggerTimes(trigger, ctx('7♥ K♠ Q♣ J♦ A♠'))).toBe(5);
  });
});
