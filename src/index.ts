export type * from './engine/types';
export { HandCategory } from './engine/types';
export { EngineError, isEngineError, type EngineErrorCode } from './engine/errors';
export { seedRng, openRng, withRng, type RngStream } from './engine/rng';
export {
  makeCard,
  makeDeck,
  newDeck,
  draw,
  discard,
  shuffle,
  cardChips,
  chipSum,
  cardToString,
  formatCards,
  parseCard,
  deckSize
} from './engine/deck';
export { evaluateHand, categoryName, HAND_SIZE, type EvaluateOptions } from './engine/evaluation';
export { scoreHand, scoreEvaluated, CATEGORY_BASE } from './engine/scoring';
export { JOKERS, getJoker, requireJoker, triggerTimes } from './engine/jokers';
export { blindTarget, blindReward, nextBlind, BLIND_ORDER } from './engine/blinds';
export { rollShop, rollRarity, purchase, RARITY_WEIGHTS } from './engine/shop';
export { DEFAULT_OPTIONS, resolveOptions } from './engine/config';
export {
  createGame,
  deal,
  discardCards,
  play,
  buy,
  skip,
  snapshot,
  summarize,
  currentTarget,
  isRunOver,
  type GameSnapshot,
  type PlayResult,
  type PlayOutcome
} from './engine/game';
export { bestPlay, allPlays } from './engine/handAnalyzer';
export { serializeGame, deserializeGame, saveToJson, loadFromJson, type SaveData } from './engine/save';
export { createGameStore, type GameStore, type ActionResult, type TelemetryEvent } from './store/gameStore';
