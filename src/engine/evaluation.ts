import { EngineError } from './errors';
import { HandCategory } from './types';
import type { Card, EvaluatedHand, Rank } from './types';

export const HAND_SIZE = 5;

export const CATEGORY_NAMES: Record<HandCategory, string> = {
  [HandCategory.HighCard]: 'High Card',
  [HandCategory.Pair]: 'Pair',
  [HandCategory.TwoPair]: 'Two Pair',
  [HandCategory.ThreeOfAKind]: 'Three of a Kind',
  [HandCategory.Straight]: 'Straight',
  [HandCategory.Flush]: 'Flush',
  [HandCategory.FullHouse]: 'Full House',
  [HandCategory.FourOfAKind]: 'Four of a Kind',
  [HandCategory.StraightFlush]: 'Straight Flush'
};

export interface EvaluateOptions {
  // Count A-2-3-4-5 as a straight
  allowWheel?: boolean;
}

interface RankGroup {
  rank: Rank;
  cards: Card[];
}

function groupByRank(cards: Card[]): RankGroup[] {
  const byRank = new Map<Rank, Card[]>();
  for (const card of cards) {
    const group = byRank.get(card.r);
    if (group) group.push(card);
    else byRank.set(card.r, [card]);
  }
  return Array.from(byRank.entries())
    .map(([rank, group]) => ({ rank, cards: group }))
    .sort((a, b) => (b.cards.length !== a.cards.length ? b.cards.length - a.cards.length : b.rank - a.rank));
}

function isFlush(cards: Card[]): boolean {
  const suit = cards[0].s;
  return cards.every(c => c.s === suit);
}

// Returns the cards high-to-low when they form a straight, otherwise null.
function straightOrder(groups: RankGroup[], allowWheel: boolean): Card[] | null {
  if (groups.length !== HAND_SIZE) return null;
  const desc = groups.map(g => g.cards[0]);

  let consecutive = true;
  for (let i = 1; i < desc.length; i++) {
    if (desc[i - 1].r - 1 !== desc[i].r) {
      consecutive = false;
      break;
    }
  }
  if (consecutive) return desc;

  const wheel = desc[0].r === 14 && desc[1].r === 5 && desc[2].r === 4 && desc[3].r === 3 && desc[4].r === 2;
  if (allowWheel && wheel) return [...desc.slice(1), desc[0]];

  return null;
}

function assertPlayable(cards: Card[]): void {
  if (cards.length !== HAND_SIZE) {
    throw new EngineError('INVALID_SELECTION_SIZE', `A hand must be exactly ${HAND_SIZE} cards, got ${cards.length}.`, {
      size: cards.length
    });
  }
  const ids = new Set(cards.map(c => c.id));
  if (ids.size !== cards.length) {
    throw new RangeError('A hand cannot contain the same card twice.');
  }
}

/**
 * Classifies exactly five cards. Categories are tested from Straight Flush
 * down to High Card and the first match wins, so a hand that satisfies
 * several categories always gets the highest one.
 */
export function evaluateHand(cards: Card[], options: EvaluateOptions = {}): EvaluatedHand {
  assertPlayable(cards);

  const groups = groupByRank(cards);
  const flush = isFlush(cards);
  const straight = straightOrder(groups, options.allowWheel ?? false);
  const grouped = groups.flatMap(g => g.cards);
  const counts = groups.map(g => g.cards.length);

  if (straight && flush) return { category: HandCategory.StraightFlush, scoringCards: straight };
  if (counts[0] === 4) return { category: HandCategory.FourOfAKind, scoringCards: grouped };
  if (counts[0] === 3 && counts[1] === 2) return { category: HandCategory.FullHouse, scoringCards: grouped };
  if (flush) return { category: HandCategory.Flush, scoringCards: grouped };
  if (straight) return { category: HandCategory.Straight, scoringCards: straight };
  if (counts[0] === 3) return { category: HandCategory.ThreeOfAKind, scoringCards: grouped };
  if (counts[0] === 2 && counts[1] === 2) return { category: HandCategory.TwoPair, scoringCards: grouped };
  if (counts[0] === 2) return { category: HandCategory.Pair, scoringCards: grouped };

  return { category: HandCategory.HighCard, scoringCards: grouped };
}

export function categoryName(category: HandCategory): string {
  return CATEGORY_NAMES[category];
}
