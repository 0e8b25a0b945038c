import { z } from 'zod';
import { runOptionsSchema } from './config';
import { assertDeckIntegrity, makeCard, RANKS, SUITS } from './deck';
import { EngineError } from './errors';
import { getJoker, toInstance } from './jokers';
import { rngStateSchema } from './rng';
import { HandCategory } from './types';
import type { BlindSlot, Card, GamePhase, GameState, JokerDefinition, ScoreBreakdown } from './types';

export const SAVE_VERSION = 1;

const PHASES: [GamePhase, ...GamePhase[]] = ['awaiting-deal', 'hand-in-play', 'shop-open', 'blind-failed'];
const SLOTS: [BlindSlot, ...BlindSlot[]] = ['Small', 'Big', 'Boss'];

const count = z.number().int().min(0);
const cardIds = z.array(z.string());

const breakdownSchema = z.object({
  category: z.nativeEnum(HandCategory),
  cards: cardIds,
  scoringCards: cardIds,
  baseChips: count,
  baseMult: count,
  cardChips: count,
  bonusChips: count,
  bonusMult: count,
  totalChips: count,
  totalMult: count,
  total: count,
  jokers: z.array(z.object({ id: z.string(), times: count, chips: count, mult: count }))
});

export const saveSchema = z.object({
  version: z.literal(SAVE_VERSION),
  seed: z.string(),
  phase: z.enum(PHASES),
  ante: z.number().int().min(1),
  slot: z.enum(SLOTS),
  roundScore: count,
  handsRemaining: count,
  discardsRemaining: count,
  coins: count,
  jokers: z.array(z.string()),
  deck: z.object({ drawPile: cardIds, pool: cardIds, discardPile: cardIds }),
  shop: z.array(z.object({ id: z.string(), sold: z.boolean() })),
  lastBreakdown: breakdownSchema.nullable(),
  stats: z.object({
    handsPlayed: count,
    discardsUsed: count,
    blindsCleared: count,
    totalScore: count,
    highestHandScore: count,
    bestCategory: z.nativeEnum(HandCategory).nullable(),
    coinsEarned: count,
    jokersBought: count
  }),
  rng: rngStateSchema,
  options: runOptionsSchema
});

export type SaveData = z.infer<typeof saveSchema>;

function corrupt(message: string, details?: Record<string, unknown>): EngineError {
  return new EngineError('CORRUPT_SAVE', message, details);
}

const ids = (cards: Card[]) => cards.map(c => c.id);

export function serializeGame(state: GameState): SaveData {
  const b = state.lastBreakdown;
  return {
    version: SAVE_VERSION,
    seed: state.seed,
    phase: state.phase,
    ante: state.blind.ante,
    slot: state.blind.slot,
    roundScore: state.roundScore,
    handsRemaining: state.handsRemaining,
    discardsRemaining: state.discardsRemaining,
    coins: state.coins,
    jokers: state.jokers.map(j => j.definitionId),
    deck: {
      drawPile: ids(state.deck.drawPile),
      pool: ids(state.deck.pool),
      discardPile: ids(state.deck.discardPile)
    },
    shop: state.shop.map(o => ({ id: o.definitionId, sold: o.sold })),
    lastBreakdown: b && {
      ...b,
      cards: ids(b.cards),
      scoringCards: ids(b.scoringCards),
      jokers: b.jokers.map(j => ({ id: j.definitionId, times: j.times, chips: j.chips, mult: j.mult }))
    },
    stats: { ...state.stats },
    rng: { i: state.rng.i, j: state.rng.j, S: state.rng.S.slice() },
    options: { ...state.options }
  };
}

function cardFromId(id: string): Card {
  const match = /^(\d{1,2})([SHDC])$/.exec(id);
  const rank = match ? RANKS.find(r => String(r) === match[1]) : undefined;
  const suit = match ? SUITS.find(s => s === match[2]) : undefined;
  if (!rank || !suit) {
    throw corrupt(`Unknown card id ${JSON.stringify(id)}.`, { id });
  }
  return makeCard(rank, suit);
}

function jokerFromId(id: string): JokerDefinition {
  const def = getJoker(id);
  if (!def) {
    throw corrupt(`Unknown joker ${JSON.stringify(id)}.`, { id });
  }
  return def;
}

function restoreBreakdown(data: NonNullable<SaveData['lastBreakdown']>): ScoreBreakdown {
  return {
    ...data,
    cards: data.cards.map(cardFromId),
    scoringCards: data.scoringCards.map(cardFromId),
    jokers: data.jokers.map(j => ({ definitionId: j.id, name: jokerFromId(j.id).name, times: j.times, chips: j.chips, mult: j.mult }))
  };
}

function checkConsistency(data: SaveData): void {
  if (data.handsRemaining > data.options.handsPerBlind) {
    throw corrupt(`handsRemaining ${data.handsRemaining} exceeds the per-blind allowance.`);
  }
  if (data.discardsRemaining > data.options.discardsPerBlind) {
    throw corrupt(`discardsRemaining ${data.discardsRemaining} exceeds the per-blind allowance.`);
  }
  if (data.jokers.length > data.options.maxJokers) {
    throw corrupt(`Joker collection holds ${data.jokers.length}, limit is ${data.options.maxJokers}.`);
  }
  if (new Set(data.jokers).size !== data.jokers.length) {
    throw corrupt('Joker collection contains duplicates.');
  }
  if (data.phase !== 'shop-open' && data.shop.length > 0) {
    throw corrupt(`Shop offers present while ${data.phase}.`);
  }
  if (data.shop.length > data.options.shopSize) {
    throw corrupt(`Shop holds ${data.shop.length} offers, limit is ${data.options.shopSize}.`);
  }
  if (new Set(data.shop.map(o => o.id)).size !== data.shop.length) {
    throw corrupt('Shop offers contain duplicates.');
  }
  // A sold offer is owned; an unsold one must not be
  const owned = new Set(data.jokers);
  const stale = data.shop.find(o => !o.sold && owned.has(o.id));
  if (stale) {
    throw corrupt(`Shop offers ${JSON.stringify(stale.id)}, which is already owned.`, { id: stale.id });
  }
  if (data.deck.pool.length > data.options.poolSize) {
    throw corrupt(`Pool holds ${data.deck.pool.length} cards, limit is ${data.options.poolSize}.`);
  }
}

export function deserializeGame(input: unknown): GameState {
  const parsed = saveSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw corrupt(`Save data is malformed at ${issue.path.join('.') || '(root)'}: ${issue.message}`, {
      path: issue.path
    });
  }
  const data = parsed.data;
  checkConsistency(data);

  const deck = {
    drawPile: data.deck.drawPile.map(cardFromId),
    pool: data.deck.pool.map(cardFromId),
    discardPile: data.deck.discardPile.map(cardFromId)
  };
  assertDeckIntegrity(deck);

  return {
    seed: data.seed,
    phase: data.phase,
    blind: { ante: data.ante, slot: data.slot },
    roundScore: data.roundScore,
    handsRemaining: data.handsRemaining,
    discardsRemaining: data.discardsRemaining,
    coins: data.coins,
    jokers: data.jokers.map(id => toInstance(jokerFromId(id))),
    deck,
    shop: data.shop.map(o => {
      const def = jokerFromId(o.id);
      return { definitionId: def.id, rarity: def.rarity, cost: def.cost, sold: o.sold };
    }),
    lastBreakdown: data.lastBreakdown && restoreBreakdown(data.lastBreakdown),
    stats: data.stats,
    rng: data.rng,
    options: data.options
  };
}

export function saveToJson(state: GameState): string {
  return JSON.stringify(serializeGame(state));
}

export function loadFromJson(json: string): GameState {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (e) {
    throw corrupt(`Save data is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }
  return deserializeGame(raw);
}
