import { EngineError } from './errors';
import type { RngStream } from './rng';
import type { Card, Deck, Rank, Suit } from './types';

export const SUITS: Suit[] = ['S', 'H', 'D', 'C'];
export const RANKS: Rank[] = [2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14];
export const DECK_SIZE = 52;

const SUIT_SYMBOLS: Record<Suit, string> = { S: '♠', H: '♥', D: '♦', C: '♣' };
const FACE_NAMES: Partial<Record<Rank, string>> = { 11: 'J', 12: 'Q', 13: 'K', 14: 'A' };

export function makeCard(r: Rank, s: Suit): Card {
  return { id: `${r}${s}`, r, s };
}

export function makeDeck(): Card[] {
  const cards: Card[] = [];
  for (const suit of SUITS) {
    for (const rank of RANKS) {
      cards.push(makeCard(rank, suit));
    }
  }
  return cards;
}

export function shuffle(cards: Card[], rng: RngStream): Card[] {
  const shuffled = [...cards];

  // Fisher-Yates shuffle
  for (let i = shuffled.length - 1; i > 0; i--) {
    const j = rng.int(i + 1);
    [shuffled[i], shuffled[j]] = [shuffled[j], shuffled[i]];
  }

  return shuffled;
}

export function cardChips(card: Card): number {
  if (card.r <= 10) return card.r;
  if (card.r === 14) return 11; // Ace
  return 10; // J, Q, K
}

export function chipSum(cards: Card[]): number {
  return cards.reduce((sum, card) => sum + cardChips(card), 0);
}

export function isHighTier(card: Card): boolean {
  return card.r >= 10;
}

// Ace counts as 1
export function isOddRank(card: Card): boolean {
  return card.r === 14 || card.r % 2 === 1;
}

export function cardsEqual(a: Card, b: Card): boolean {
  return a.id === b.id;
}

export function rankLabel(rank: Rank): string {
  return FACE_NAMES[rank] ?? String(rank);
}

export function cardToString(card: Card): string {
  return `${rankLabel(card.r)}${SUIT_SYMBOLS[card.s]}`;
}

export function formatCards(cards: Card[]): string {
  return cards.map(cardToString).join(' ');
}

export function parseCard(text: string): Card {
  const trimmed = text.trim().toUpperCase();
  const suitChar = trimmed.slice(-1);
  const rankText = trimmed.slice(0, -1);

  const suit = SUITS.find(s => s === suitChar || SUIT_SYMBOLS[s] === suitChar);
  const rank = RANKS.find(r => rankLabel(r) === rankText || (r === 10 && rankText === 'T'));
  if (!suit || !rank) {
    throw new RangeError(`Invalid card ${JSON.stringify(text)}; expected like "A♠", "10H" or "Td".`);
  }
  return makeCard(rank, suit);
}

export function newDeck(rng: RngStream): Deck {
  return {
    drawPile: shuffle(makeDeck(), rng),
    pool: [],
    discardPile: []
  };
}

export function deckSize(deck: Deck): number {
  return deck.drawPile.length + deck.pool.length + deck.discardPile.length;
}

/**
 * Moves up to `n` cards from the draw pile into the pool. When the draw pile
 * runs out, the discard pile is shuffled back in and drawing continues.
 */
export function draw(deck: Deck, n: number, rng: RngStream): Deck {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`draw count must be a non-negative integer, got ${n}.`);
  }
  if (n > deck.drawPile.length + deck.discardPile.length) {
    throw new EngineError('INSUFFICIENT_CARDS', `Cannot draw ${n} cards; only ${deck.drawPile.length + deck.discardPile.length} remain outside the pool.`, {
      requested: n
    });
  }

  let drawPile = deck.drawPile;
  let discardPile = deck.discardPile;
  const drawn: Card[] = drawPile.slice(0, n);
  drawPile = drawPile.slice(drawn.length);

  if (drawn.length < n) {
    drawPile = shuffle(discardPile, rng);
    discardPile = [];
    const rest = n - drawn.length;
    drawn.push(...drawPile.slice(0, rest));
    drawPile = drawPile.slice(rest);
  }

  return {
    drawPile,
    pool: [...deck.pool, ...drawn],
    discardPile
  };
}

export function assertSelection(size: number, indices: number[]): void {
  const seen = new Set<number>();
  for (const idx of indices) {
    if (!Number.isInteger(idx) || idx < 0 || idx >= size) {
      throw new EngineError('INVALID_INDEX', `Card index ${idx} is out of range (pool has ${size} cards).`, { index: idx });
    }
    if (seen.has(idx)) {
      throw new EngineError('INVALID_INDEX', `Card index ${idx} was selected twice.`, { index: idx });
    }
    seen.add(idx);
  }
}

export function selectCards(pool: Card[], indices: number[]): Card[] {
  assertSelection(pool.length, indices);
  return indices.map(i => pool[i]);
}

// Moves the referenced pool cards to the discard pile, preserving pool order for the rest.
export function discard(deck: Deck, indices: number[]): Deck {
  const removed = selectCards(deck.pool, indices);
  return {
    drawPile: deck.drawPile,
    pool: deck.pool.filter(c => !removed.some(r => cardsEqual(r, c))),
    discardPile: [...deck.discardPile, ...removed]
  };
}

export function discardPool(deck: Deck): Deck {
  return {
    drawPile: deck.drawPile,
    pool: [],
    discardPile: [...deck.discardPile, ...deck.pool]
  };
}

// Throws unless the three partitions hold exactly the 52 distinct cards
export function assertDeckIntegrity(deck: Deck): void {
  const all = [...deck.drawPile, ...deck.pool, ...deck.discardPile];
  if (all.length !== DECK_SIZE) {
    throw new EngineError('CORRUPT_SAVE', `Deck holds ${all.length} cards, expected ${DECK_SIZE}.`);
  }
  const ids = new Set(all.map(c => c.id));
  if (ids.size !== DECK_SIZE) {
    throw new EngineError('CORRUPT_SAVE', 'Deck contains duplicate cards.');
  }
}
