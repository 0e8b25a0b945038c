import { blindReward, blindTarget, nextBlind } from './blinds';
import { resolveOptions } from './config';
import { discard, discardPool, draw, newDeck, selectCards } from './deck';
import { EngineError } from './errors';
import { HAND_SIZE } from './evaluation';
import { requireJoker } from './jokers';
import { seedRng, withRng } from './rng';
import { scoreHand } from './scoring';
import { purchase, rollShop } from './shop';
import type {
  BlindSlot,
  Card,
  GamePhase,
  GameState,
  JokerInstance,
  Rarity,
  RunOptions,
  RunStats,
  ScoreBreakdown
} from './types';

export type PlayOutcome = 'cleared' | 'continue' | 'failed';

export interface PlayResult {
  state: GameState;
  breakdown: ScoreBreakdown;
  outcome: PlayOutcome;
  // Coins granted for clearing the blind, 0 otherwise
  reward: number;
}

function emptyStats(): RunStats {
  return {
    handsPlayed: 0,
    discardsUsed: 0,
    blindsCleared: 0,
    totalScore: 0,
    highestHandScore: 0,
    bestCategory: null,
    coinsEarned: 0,
    jokersBought: 0
  };
}

function assertPhase(state: GameState, expected: GamePhase, action: string): void {
  if (state.phase !== expected) {
    throw new EngineError('ILLEGAL_TRANSITION', `Cannot ${action} while ${state.phase}.`, {
      phase: state.phase,
      action
    });
  }
}

export function createGame(seed: string | number, overrides: Partial<RunOptions> = {}): GameState {
  const options = resolveOptions(overrides);
  const [deck, rng] = withRng(seedRng(seed), r => newDeck(r));

  return {
    seed: String(seed),
    phase: 'awaiting-deal',
    blind: { ante: 1, slot: 'Small' },
    roundScore: 0,
    handsRemaining: options.handsPerBlind,
    discardsRemaining: options.discardsPerBlind,
    coins: options.startingCoins,
    jokers: [],
    deck,
    shop: [],
    lastBreakdown: null,
    stats: emptyStats(),
    rng,
    options
  };
}

export function currentTarget(state: GameState): number {
  return blindTarget(state.blind.ante, state.blind.slot);
}

export function deal(state: GameState): GameState {
  assertPhase(state, 'awaiting-deal', 'deal');

  const need = state.options.poolSize - state.deck.pool.length;
  const [deck, rng] = withRng(state.rng, r => draw(state.deck, need, r));

  return { ...state, phase: 'hand-in-play', deck, rng };
}

export function discardCards(state: GameState, indices: number[]): GameState {
  assertPhase(state, 'hand-in-play', 'discard');
  if (state.discardsRemaining <= 0) {
    throw new EngineError('INSUFFICIENT_RESOURCE', 'No discards left for this blind.');
  }
  if (indices.length === 0) {
    throw new EngineError('INVALID_SELECTION_SIZE', 'Select at least one card to discard.');
  }

  const discarded = discard(state.deck, indices);
  const [deck, rng] = withRng(state.rng, r => draw(discarded, indices.length, r));

  return {
    ...state,
    deck,
    rng,
    discardsRemaining: state.discardsRemaining - 1,
    stats: { ...state.stats, discardsUsed: state.stats.discardsUsed + 1 }
  };
}

function recordHand(stats: RunStats, breakdown: ScoreBreakdown): RunStats {
  return {
    ...stats,
    handsPlayed: stats.handsPlayed + 1,
    totalScore: stats.totalScore + breakdown.total,
    highestHandScore: Math.max(stats.highestHandScore, breakdown.total),
    bestCategory:
      stats.bestCategory === null || breakdown.category > stats.bestCategory ? breakdown.category : stats.bestCategory
  };
}

export function play(state: GameState, indices: number[]): PlayResult {
  assertPhase(state, 'hand-in-play', 'play');
  if (state.handsRemaining <= 0) {
    throw new EngineError('INSUFFICIENT_RESOURCE', 'No hands left for this blind.');
  }
  if (indices.length !== HAND_SIZE) {
    throw new EngineError('INVALID_SELECTION_SIZE', `Play exactly ${HAND_SIZE} cards, got ${indices.length}.`, {
      size: indices.length
    });
  }

  const cards = selectCards(state.deck.pool, indices);
  const breakdown = scoreHand(cards, state.jokers, state.blind.slot, { allowWheel: state.options.allowWheel });
  const roundScore = state.roundScore + breakdown.total;
  const handsRemaining = state.handsRemaining - 1;
  const stats = recordHand(state.stats, breakdown);
  const afterPlay = discard(state.deck, indices);

  const played: GameState = {
    ...state,
    roundScore,
    handsRemaining,
    stats,
    lastBreakdown: breakdown,
    deck: afterPlay
  };

  if (roundScore >= currentTarget(state)) {
    return clearBlind(played, breakdown);
  }

  if (handsRemaining === 0) {
    return { state: { ...played, phase: 'blind-failed' }, breakdown, outcome: 'failed', reward: 0 };
  }

  const [deck, rng] = withRng(state.rng, r => draw(afterPlay, HAND_SIZE, r));
  return { state: { ...played, deck, rng }, breakdown, outcome: 'continue', reward: 0 };
}

function clearBlind(state: GameState, breakdown: ScoreBreakdown): PlayResult {
  const reward = blindReward(state.blind.ante, state.blind.slot);
  const blind = nextBlind(state.blind);
  const newAnte = blind.ante !== state.blind.ante;

  const [{ deck, shop }, rng] = withRng(state.rng, r => ({
    deck: newAnte ? newDeck(r) : discardPool(state.deck),
    shop: rollShop(r, state.jokers, state.options.shopSize)
  }));

  const next: GameState = {
    ...state,
    phase: 'shop-open',
    blind,
    roundScore: 0,
    handsRemaining: state.options.handsPerBlind,
    discardsRemaining: state.options.discardsPerBlind,
    coins: state.coins + reward,
    deck,
    shop,
    rng,
    stats: {
      ...state.stats,
      blindsCleared: state.stats.blindsCleared + 1,
      coinsEarned: state.stats.coinsEarned + reward
    }
  };

  return { state: next, breakdown, outcome: 'cleared', reward };
}

export function buy(state: GameState, offerIndex: number): GameState {
  assertPhase(state, 'shop-open', 'buy');

  const result = purchase(state.shop, offerIndex, state.coins, state.jokers, state.options.maxJokers);
  return {
    ...state,
    shop: result.offers,
    jokers: result.jokers,
    coins: result.coins,
    stats: { ...state.stats, jokersBought: state.stats.jokersBought + 1 }
  };
}

export function skip(state: GameState): GameState {
  assertPhase(state, 'shop-open', 'leave the shop');
  return { ...state, phase: 'awaiting-deal', shop: [] };
}

export function isRunOver(state: GameState): boolean {
  return state.phase === 'blind-failed';
}

export interface JokerView {
  id: string;
  name: string;
  description: string;
  rarity: Rarity;
  cost: number;
}

export interface OfferView extends JokerView {
  sold: boolean;
}

export interface GameSnapshot {
  phase: GamePhase;
  ante: number;
  slot: BlindSlot;
  target: number;
  roundScore: number;
  handsRemaining: number;
  discardsRemaining: number;
  coins: number;
  pool: Card[];
  jokers: JokerView[];
  shop: OfferView[];
  lastBreakdown: ScoreBreakdown | null;
  stats: RunStats;
}

function jokerView(joker: JokerInstance): JokerView {
  const def = requireJoker(joker.definitionId);
  return { id: def.id, name: def.name, description: def.description, rarity: joker.rarity, cost: joker.cost };
}

export function snapshot(state: GameState): GameSnapshot {
  return {
    phase: state.phase,
    ante: state.blind.ante,
    slot: state.blind.slot,
    target: currentTarget(state),
    roundScore: state.roundScore,
    handsRemaining: state.handsRemaining,
    discardsRemaining: state.discardsRemaining,
    coins: state.coins,
    pool: [...state.deck.pool],
    jokers: state.jokers.map(jokerView),
    shop: state.shop.map(o => ({ ...jokerView(o), sold: o.sold })),
    lastBreakdown: state.lastBreakdown,
    stats: { ...state.stats }
  };
}

export function summarize(state: GameState): string {
  const names = state.jokers.map(j => requireJoker(j.definitionId).name);
  return (
    `Ante ${state.blind.ante} | Blind: ${state.blind.slot} | Target: ${currentTarget(state)} | ` +
    `Score: ${state.roundScore} | Hands: ${state.handsRemaining} Discards: ${state.discardsRemaining} | ` +
    `Coins: ${state.coins} | Jokers [${state.jokers.length}/${state.options.maxJokers}]: ` +
    (names.length > 0 ? names.join(', ') : '(none)')
  );
}
