import { EngineError } from './errors';
import { JOKERS, RARITIES, requireJoker, toInstance } from './jokers';
import type { RngStream } from './rng';
import type { JokerDefinition, JokerInstance, Rarity, ShopOffer } from './types';

export const SHOP_SIZE = 3;

// Percent weights
export const RARITY_WEIGHTS: Record<Rarity, number> = {
  common: 70,
  uncommon: 25,
  rare: 5
};

export function rollRarity(rng: RngStream, allowed: readonly Rarity[] = RARITIES): Rarity {
  const total = allowed.reduce((sum, r) => sum + RARITY_WEIGHTS[r], 0);
  if (total <= 0) {
    throw new RangeError('rollRarity needs at least one rarity with positive weight.');
  }
  let roll = rng.int(total);
  for (const rarity of allowed) {
    roll -= RARITY_WEIGHTS[rarity];
    if (roll < 0) return rarity;
  }
  return allowed[allowed.length - 1];
}

/**
 * Draws up to `size` distinct offers from the jokers not yet owned. Each
 * offer consumes one rarity roll and one uniform pick. A rarity with nothing
 * left to offer drops out of the weighting.
 */
export function rollShop(
  rng: RngStream,
  owned: readonly JokerInstance[],
  size = SHOP_SIZE,
  catalog: readonly JokerDefinition[] = JOKERS
): ShopOffer[] {
  const ownedIds = new Set(owned.map(j => j.definitionId));
  let candidates = catalog.filter(j => !ownedIds.has(j.id));
  const offers: ShopOffer[] = [];

  while (offers.length < size && candidates.length > 0) {
    const stocked = RARITIES.filter(r => candidates.some(j => j.rarity === r));
    const rarity = rollRarity(rng, stocked);
    const tier = candidates.filter(j => j.rarity === rarity);
    const pick = tier[rng.int(tier.length)];

    offers.push({ definitionId: pick.id, rarity: pick.rarity, cost: pick.cost, sold: false });
    candidates = candidates.filter(j => j.id !== pick.id);
  }

  return offers;
}

export interface PurchaseResult {
  offers: ShopOffer[];
  jokers: JokerInstance[];
  coins: number;
  bought: JokerInstance;
}

export function purchase(
  offers: ShopOffer[],
  index: number,
  coins: number,
  jokers: JokerInstance[],
  maxJokers: number
): PurchaseResult {
  if (!Number.isInteger(index) || index < 0 || index >= offers.length) {
    throw new EngineError('INVALID_INDEX', `Offer ${index} does not exist (shop has ${offers.length} offers).`, { index });
  }
  const offer = offers[index];
  if (offer.sold) {
    throw new EngineError('INVALID_INDEX', `Offer ${index} has already been bought.`, { index });
  }
  if (jokers.length >= maxJokers) {
    throw new EngineError('COLLECTION_FULL', `Joker collection is full (${jokers.length}/${maxJokers}).`, {
      size: jokers.length
    });
  }
  if (coins < offer.cost) {
    throw new EngineError('INSUFFICIENT_COINS', `Need ${offer.cost} coins, have ${coins}.`, {
      cost: offer.cost,
      coins
    });
  }

  const bought = toInstance(requireJoker(offer.definitionId));
  return {
    offers: offers.map((o, i) => (i === index ? { ...o, sold: true } : o)),
    jokers: [...jokers, bought],
    coins: coins - offer.cost,
    bought
  };
}
