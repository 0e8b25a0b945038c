export type Suit = 'S' | 'H' | 'D' | 'C';
export type Rank = 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9 | 10 | 11 | 12 | 13 | 14; // 11=J, 12=Q, 13=K, 14=A

export interface Card {
  id: string;
  r: Rank;
  s: Suit;
}

export enum HandCategory {
  HighCard = 0,
  Pair = 1,
  TwoPair = 2,
  ThreeOfAKind = 3,
  Straight = 4,
  Flush = 5,
  FullHouse = 6,
  FourOfAKind = 7,
  StraightFlush = 8
}

export interface EvaluatedHand {
  category: HandCategory;
  // Played cards ordered by group size, then rank, high to low
  scoringCards: Card[];
}

export type BlindSlot = 'Small' | 'Big' | 'Boss';

export interface BlindState {
  ante: number;
  slot: BlindSlot;
}

export type Rarity = 'common' | 'uncommon' | 'rare';

export type JokerTrigger =
  | { kind: 'always' }
  | { kind: 'rank-contains'; rank: Rank }
  | { kind: 'suit-count'; suit: Suit; min: number; scaled?: boolean }
  | { kind: 'all-suits' }
  | { kind: 'all-odd' }
  | { kind: 'category-at-least'; category: HandCategory }
  | { kind: 'category-equals'; categories: readonly HandCategory[] }
  | { kind: 'distinct-ranks'; min: number; per: number }
  | { kind: 'high-cards'; min: number }
  | { kind: 'vs-boss' };

export interface JokerDefinition {
  id: string;
  name: string;
  description: string;
  rarity: Rarity;
  cost: number;
  trigger: JokerTrigger;
  chips: number;
  mult: number;
}

export interface JokerInstance {
  definitionId: string;
  rarity: Rarity;
  cost: number;
}

export interface JokerContribution {
  definitionId: string;
  name: string;
  // How many times the effect applied (0 when the trigger missed)
  times: number;
  chips: number;
  mult: number;
}

export interface ScoreBreakdown {
  category: HandCategory;
  cards: Card[];
  scoringCards: Card[];
  baseChips: number;
  baseMult: number;
  cardChips: number;
  bonusChips: number;
  bonusMult: number;
  totalChips: number;
  totalMult: number;
  total: number;
  jokers: JokerContribution[];
}

export interface Deck {
  drawPile: Card[];
  pool: Card[];
  discardPile: Card[];
}

export interface RngState {
  i: number;
  j: number;
  S: number[];
}

export interface ShopOffer {
  definitionId: string;
  rarity: Rarity;
  cost: number;
  sold: boolean;
}

export type GamePhase = 'awaiting-deal' | 'hand-in-play' | 'shop-open' | 'blind-failed';

export interface RunOptions {
  handsPerBlind: number;
  discardsPerBlind: number;
  poolSize: number;
  startingCoins: number;
  maxJokers: number;
  shopSize: number;
  allowWheel: boolean;
}

export interface RunStats {
  handsPlayed: number;
  discardsUsed: number;
  blindsCleared: number;
  totalScore: number;
  highestHandScore: number;
  bestCategory: HandCategory | null;
  coinsEarned: number;
  jokersBought: number;
}

export interface GameState {
  seed: string;
  phase: GamePhase;
  blind: BlindState;
  roundScore: number;
  handsRemaining: number;
  discardsRemaining: number;
  coins: number;
  jokers: JokerInstance[];
  deck: Deck;
  shop: ShopOffer[];
  lastBreakdown: ScoreBreakdown | null;
  stats: RunStats;
  rng: RngState;
  options: RunOptions;
}
