import { isHighTier, isOddRank, SUITS } from './deck';
import { HandCategory } from './types';
import type { BlindSlot, Card, JokerDefinition, JokerInstance, JokerTrigger, Rarity } from './types';

export const MAX_JOKERS = 5;

export const RARITIES: Rarity[] = ['common', 'uncommon', 'rare'];

export const JOKERS: readonly JokerDefinition[] = [
  {
    id: 'plain-joker',
    name: 'Plain Joker',
    description: '+4 mult on every hand',
    rarity: 'common',
    cost: 2,
    trigger: { kind: 'always' },
    chips: 0,
    mult: 4
  },
  {
    id: 'lucky-seven',
    name: 'Lucky Seven',
    description: '+10 chips if a 7 is played',
    rarity: 'common',
    cost: 3,
    trigger: { kind: 'rank-contains', rank: 7 },
    chips: 10,
    mult: 0
  },
  {
    id: 'ace-in-the-hole',
    name: 'Ace in the Hole',
    description: '+20 chips if an Ace is played',
    rarity: 'common',
    cost: 3,
    trigger: { kind: 'rank-contains', rank: 14 },
    chips: 20,
    mult: 0
  },
  {
    id: 'pair-pal',
    name: 'Pair Pal',
    description: '+15 chips on a Pair or Two Pair',
    rarity: 'common',
    cost: 3,
    trigger: { kind: 'category-equals', categories: [HandCategory.Pair, HandCategory.TwoPair] },
    chips: 15,
    mult: 0
  },
  {
    id: 'flush-fan',
    name: 'Flush Fan',
    description: '+2 mult on a Flush or Straight Flush',
    rarity: 'common',
    cost: 4,
    trigger: { kind: 'category-equals', categories: [HandCategory.Flush, HandCategory.StraightFlush] },
    chips: 0,
    mult: 2
  },
  {
    id: 'heartfelt',
    name: 'Heartfelt',
    description: '+3 chips for each Heart played',
    rarity: 'common',
    cost: 5,
    trigger: { kind: 'suit-count', suit: 'H', min: 1, scaled: true },
    chips: 3,
    mult: 0
  },
  {
    id: 'court-jester',
    name: 'Court Jester',
    description: '+1 mult for each 10, J, Q, K or A played',
    rarity: 'common',
    cost: 4,
    trigger: { kind: 'high-cards', min: 1 },
    chips: 0,
    mult: 1
  },
  {
    id: 'odd-one-out',
    name: 'Odd One Out',
    description: '+3 mult if every played card has an odd rank (A, 3, 5, 7, 9, J, K)',
    rarity: 'uncommon',
    cost: 5,
    trigger: { kind: 'all-odd' },
    chips: 0,
    mult: 3
  },
  {
    id: 'variety-show',
    name: 'Variety Show',
    description: '+1 mult for every two distinct ranks played',
    rarity: 'uncommon',
    cost: 5,
    trigger: { kind: 'distinct-ranks', min: 2, per: 2 },
    chips: 0,
    mult: 1
  },
  {
    id: 'boss-hunter',
    name: 'Boss Hunter',
    description: '+10 chips and +2 mult against a Boss blind',
    rarity: 'uncommon',
    cost: 6,
    trigger: { kind: 'vs-boss' },
    chips: 10,
    mult: 2
  },
  {
    id: 'spade-stack',
    name: 'Spade Stack',
    description: '+30 chips if at least three Spades are played',
    rarity: 'uncommon',
    cost: 5,
    trigger: { kind: 'suit-count', suit: 'S', min: 3 },
    chips: 30,
    mult: 0
  },
  {
    id: 'straight-shooter',
    name: 'Straight Shooter',
    description: '+25 chips on a Straight or better',
    rarity: 'uncommon',
    cost: 6,
    trigger: { kind: 'category-at-least', category: HandCategory.Straight },
    chips: 25,
    mult: 0
  },
  {
    id: 'rainbow',
    name: 'Rainbow',
    description: '+4 mult if all four suits are played',
    rarity: 'rare',
    cost: 7,
    trigger: { kind: 'all-suits' },
    chips: 0,
    mult: 4
  },
  {
    id: 'full-force',
    name: 'Full Force',
    description: '+4 mult on a Full House or better',
    rarity: 'rare',
    cost: 8,
    trigger: { kind: 'category-at-least', category: HandCategory.FullHouse },
    chips: 0,
    mult: 4
  },
  {
    id: 'crown-jewels',
    name: 'Crown Jewels',
    description: '+2 mult for each high card when all five are 10 or higher',
    rarity: 'rare',
    cost: 8,
    trigger: { kind: 'high-cards', min: 5 },
    chips: 0,
    mult: 2
  }
];

const JOKERS_BY_ID = new Map(JOKERS.map(j => [j.id, j]));

export function getJoker(id: string): JokerDefinition | undefined {
  return JOKERS_BY_ID.get(id);
}

export function requireJoker(id: string): JokerDefinition {
  const def = JOKERS_BY_ID.get(id);
  if (!def) {
    throw new RangeError(`Unknown joker ${JSON.stringify(id)}.`);
  }
  return def;
}

export function toInstance(def: JokerDefinition): JokerInstance {
  return { definitionId: def.id, rarity: def.rarity, cost: def.cost };
}

export interface TriggerContext {
  cards: Card[];
  category: HandCategory;
  slot: BlindSlot;
}

/**
 * How many times a trigger fires for a played hand. Plain predicates return
 * 0 or 1; scaled triggers return the count the bonus is multiplied by.
 */
export function triggerTimes(trigger: JokerTrigger, ctx: TriggerContext): number {
  switch (trigger.kind) {
    case 'always':
      return 1;
    case 'rank-contains':
      return ctx.cards.some(c => c.r === trigger.rank) ? 1 : 0;
    case 'suit-count': {
      const n = ctx.cards.filter(c => c.s === trigger.suit).length;
      if (n < trigger.min) return 0;
      return trigger.scaled ? n : 1;
    }
    case 'all-suits':
      return SUITS.every(s => ctx.cards.some(c => c.s === s)) ? 1 : 0;
    case 'all-odd':
      return ctx.cards.every(isOddRank) ? 1 : 0;
    case 'category-at-least':
      return ctx.category >= trigger.category ? 1 : 0;
    case 'category-equals':
      return trigger.categories.includes(ctx.category) ? 1 : 0;
    case 'distinct-ranks': {
      const distinct = new Set(ctx.cards.map(c => c.r)).size;
      return distinct >= trigger.min ? Math.floor(distinct / trigger.per) : 0;
    }
    case 'high-cards': {
      const n = ctx.cards.filter(isHighTier).length;
      return n >= trigger.min ? n : 0;
    }
    case 'vs-boss':
      return ctx.slot === 'Boss' ? 1 : 0;
  }
}
