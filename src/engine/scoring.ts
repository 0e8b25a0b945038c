import { chipSum } from './deck';
import { evaluateHand } from './evaluation';
import type { EvaluateOptions } from './evaluation';
import { requireJoker, triggerTimes } from './jokers';
import { HandCategory } from './types';
import type { BlindSlot, Card, EvaluatedHand, JokerContribution, JokerInstance, ScoreBreakdown } from './types';

export const CATEGORY_BASE: Record<HandCategory, { chips: number; mult: number }> = {
  [HandCategory.HighCard]: { chips: 0, mult: 1 },
  [HandCategory.Pair]: { chips: 10, mult: 1 },
  [HandCategory.TwoPair]: { chips: 20, mult: 2 },
  [HandCategory.ThreeOfAKind]: { chips: 30, mult: 2 },
  [HandCategory.Straight]: { chips: 40, mult: 3 },
  [HandCategory.Flush]: { chips: 50, mult: 3 },
  [HandCategory.FullHouse]: { chips: 60, mult: 4 },
  [HandCategory.FourOfAKind]: { chips: 80, mult: 5 },
  [HandCategory.StraightFlush]: { chips: 120, mult: 6 }
};

/**
 * Scores an already classified hand. Jokers are applied in collection order;
 * their bonuses only add up, so the order shows in `jokers` and nowhere else.
 */
export function scoreEvaluated(
  cards: Card[],
  hand: EvaluatedHand,
  jokers: JokerInstance[],
  slot: BlindSlot
): ScoreBreakdown {
  const base = CATEGORY_BASE[hand.category];
  const cardChips = chipSum(cards);
  const ctx = { cards, category: hand.category, slot };

  const contributions: JokerContribution[] = jokers.map(joker => {
    const def = requireJoker(joker.definitionId);
    const times = triggerTimes(def.trigger, ctx);
    return {
      definitionId: def.id,
      name: def.name,
      times,
      chips: def.chips * times,
      mult: def.mult * times
    };
  });

  const bonusChips = contributions.reduce((sum, c) => sum + c.chips, 0);
  const bonusMult = contributions.reduce((sum, c) => sum + c.mult, 0);
  const totalChips = base.chips + cardChips + bonusChips;
  const totalMult = base.mult + bonusMult;

  return {
    category: hand.category,
    cards: [...cards],
    scoringCards: hand.scoringCards,
    baseChips: base.chips,
    baseMult: base.mult,
    cardChips,
    bonusChips,
    bonusMult,
    totalChips,
    totalMult,
    total: totalChips * totalMult,
    jokers: contributions
  };
}

export function scoreHand(
  cards: Card[],
  jokers: JokerInstance[],
  slot: BlindSlot,
  options: EvaluateOptions = {}
): ScoreBreakdown {
  return scoreEvaluated(cards, evaluateHand(cards, options), jokers, slot);
}
