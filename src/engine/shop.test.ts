import { describe, test, expect } from 'vitest';
import { JOKERS, requireJoker, toInstance } from './jokers';
import { openRng, seedRng } from './rng';
import { purchase, rollRarity, rollShop } from './shop';
import type { JokerInstance, Rarity, ShopOffer } from './types';
import { codeOf } from './testHelpers';

function offer(id: string, sold = false): ShopOffer {
  const def = requireJoker(id);
  return { definitionId: def.id, rarity: def.rarity, cost: def.cost, sold };
}

function owned(...ids: string[]): JokerInstance[] {
  return ids.map(id => toInstance(requireJoker(id)));
}

describe('rollShop', () => {
  test('offers three distinct jokers', () => {
    for (let seed = 0; seed < 50; seed++) {
      const offers = rollShop(openRng(seedRng(seed)), []);
      expect(offers.length).toBe(3);
      expect(new Set(offers.map(o => o.definitionId)).size).toBe(3);
      for (const o of offers) {
        expect(o.sold).toBe(false);
        expect(o.cost).toBe(requireJoker(o.definitionId).cost);
      }
    }
  });

  test('same stream position gives the same offers', () => {
    const state = seedRng('shop-determinism');
    expect(rollShop(openRng(state), [])).toEqual(rollShop(openRng(state), []));
  });

  test('never offers an owned joker', () => {
    const mine = owned('plain-joker', 'lucky-seven', 'rainbow', 'boss-hunter');
    for (let seed = 0; seed < 50; seed++) {
      const ids = rollShop(openRng(seedRng(seed)), mine).map(o => o.definitionId);
      for (const j of mine) expect(ids).not.toContain(j.definitionId);
    }
  });

  test('offers fewer when the catalog runs dry', () => {
    const left = ['heartfelt', 'crown-jewels'];
    const mine = JOKERS.filter(j => !left.includes(j.id)).map(toInstance);
    const offers = rollShop(openRng(seedRng(1)), mine);
    expect(offers.map(o => o.definitionId).sort()).toEqual(['crown-jewels', 'heartfelt']);
    expect(rollShop(openRng(seedRng(1)), JOKERS.map(toInstance))).toEqual([]);
  });

  test('respects a custom size', () => {
    expect(rollShop(openRng(seedRng(2)), [], 5).length).toBe(5);
  });
});

describe('rollRarity', () => {
  test('follows the 70/25/5 weights', () => {
    const rng = openRng(seedRng('rarity-distribution'));
    const counts: Record<Rarity, number> = { common: 0, uncommon: 0, rare: 0 };
    const rolls = 20000;
    for (let i = 0; i < rolls; i++) counts[rollRarity(rng)]++;

    expect(Math.abs(counts.common / rolls - 0.7)).toBeLessThan(0.02);
    expect(Math.abs(counts.uncommon / rolls - 0.25)).toBeLessThan(0.02);
    expect(Math.abs(counts.rare / rolls - 0.05)).toBeLessThan(0.02);
  });

  test('only returns allowed rarities', () => {
    const rng = openRng(seedRng(3));
    for (let i = 0; i < 200; i++) expect(rollRarity(rng, ['rare'])).toBe('rare');
    expect(() => rollRarity(rng, [])).toThrow(RangeError);
  });
});

describe('purchase', () => {
  const offers = [offer('plain-joker'), offer('rainbow'), offer('pair-pal')];

  test('exact coins buy the joker and leave zero', () => {
    const result = purchase(offers, 1, 7, [], 5);
    expect(result.coins).toBe(0);
    expect(result.jokers.map(j => j.definitionId)).toEqual(['rainbow']);
    expect(result.offers[1].sold).toBe(true);
    expect(result.bought).toEqual({ definitionId: 'rainbow', rarity: 'rare', cost: 7 });
    expect(offers[1].sold).toBe(false);
  });

  test('one coin short is rejected', () => {
    expect(codeOf(() => purchase(offers, 1, 6, [], 5))).toBe('INSUFFICIENT_COINS');
  });

  test('a full collection is rejected before the price is checked', () => {
    const full = owned('lucky-seven', 'heartfelt', 'flush-fan', 'court-jester', 'odd-one-out');
    expect(codeOf(() => purchase(offers, 0, 0, full, 5))).toBe('COLLECTION_FULL');
    expect(codeOf(() => purchase(offers, 0, 10, full.slice(0, 4), 5))).toBeUndefined();
  });

  test('bad and sold offers are invalid indices', () => {
    expect(codeOf(() => purchase(offers, 3, 10, [], 5))).toBe('INVALID_INDEX');
    expect(codeOf(() => purchase(offers, -1, 10, [], 5))).toBe('INVALID_INDEX');
    expect(codeOf(() => purchase(offers, 0.5, 10, [], 5))).toBe('INVALID_INDEX');
    const { offers: after } = purchase(offers, 0, 10, [], 5);
    expect(codeOf(() => purchase(after, 0, 10, [], 5))).toBe('INVALID_INDEX');
  });
});
