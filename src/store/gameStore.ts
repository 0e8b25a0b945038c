import { createStore } from 'zustand/vanilla';
import { formatCards } from '../engine/deck';
import { EngineError } from '../engine/errors';
import type { EngineErrorCode } from '../engine/errors';
import { categoryName } from '../engine/evaluation';
import { buy, createGame, deal, discardCards, play, skip, snapshot } from '../engine/game';
import type { GameSnapshot, PlayOutcome } from '../engine/game';
import { bestPlay } from '../engine/handAnalyzer';
import { requireJoker } from '../engine/jokers';
import { deserializeGame, serializeGame } from '../engine/save';
import type { SaveData } from '../engine/save';
import type { GameState, RunOptions } from '../engine/types';

export type TelemetryType =
  | 'GAME_START'
  | 'DEAL'
  | 'DISCARD'
  | 'PLAY'
  | 'BLIND_CLEARED'
  | 'RUN_OVER'
  | 'SHOP_OPEN'
  | 'BUY'
  | 'SKIP'
  | 'LOAD'
  | 'REJECTED';

export interface TelemetryEvent {
  type: TelemetryType;
  timestamp: number;
  data: Record<string, unknown>;
}

export type ActionResult =
  | { ok: true; snapshot: GameSnapshot }
  | { ok: false; error: { code: EngineErrorCode; message: string }; snapshot: GameSnapshot | null };

export interface GameStore {
  game: GameState | null;
  turnLog: string[];
  events: TelemetryEvent[];

  newGame: (seed: string | number, options?: Partial<RunOptions>) => ActionResult;
  deal: () => ActionResult;
  discard: (indices: number[]) => ActionResult;
  play: (indices: number[]) => ActionResult;
  buy: (offerIndex: number) => ActionResult;
  skip: () => ActionResult;
  save: () => SaveData | null;
  load: (data: unknown) => ActionResult;
  suggest: () => number[] | null;
  addLog: (message: string) => void;
}

interface Step {
  game: GameState;
  log: string[];
  events: { type: TelemetryType; data: Record<string, unknown> }[];
}

const OUTCOME_LOG: Record<PlayOutcome, string> = {
  cleared: 'Blind cleared!',
  continue: 'Keep going.',
  failed: 'Out of hands - run over.'
};

export function createGameStore(now: () => number = Date.now) {
  return createStore<GameStore>((set, get) => {
    const emit = (type: TelemetryType, data: Record<string, unknown>): TelemetryEvent => ({
      type,
      timestamp: now(),
      data
    });

    // Applies a step atomically; an EngineError leaves the game untouched and is reported
    const run = (action: string, step: (game: GameState) => Step): ActionResult => {
      const { game } = get();
      if (!game) {
        const message = `Cannot ${action}: no game in progress.`;
        get().addLog(message);
        return { ok: false, error: { code: 'ILLEGAL_TRANSITION', message }, snapshot: null };
      }

      let result: Step;
      try {
        result = step(game);
      } catch (e) {
        if (!(e instanceof EngineError)) throw e;
        set(state => ({
          turnLog: [...state.turnLog, e.message],
          events: [...state.events, emit('REJECTED', { action, code: e.code, message: e.message })]
        }));
        return { ok: false, error: { code: e.code, message: e.message }, snapshot: snapshot(game) };
      }

      set(state => ({
        game: result.game,
        turnLog: [...state.turnLog, ...result.log],
        events: [...state.events, ...result.events.map(ev => emit(ev.type, ev.data))]
      }));
      return { ok: true, snapshot: snapshot(result.game) };
    };

    return {
      game: null,
      turnLog: [],
      events: [],

      newGame: (seed, options) => {
        try {
          const game = createGame(seed, options);
          set({
            game,
            turnLog: [`New game started (seed ${game.seed})`],
            events: [emit('GAME_START', { seed: game.seed, options: game.options })]
          });
          return { ok: true, snapshot: snapshot(game) };
        } catch (e) {
          if (!(e instanceof EngineError)) throw e;
          get().addLog(e.message);
          const { game } = get();
          return { ok: false, error: { code: e.code, message: e.message }, snapshot: game ? snapshot(game) : null };
        }
      },

      deal: () =>
        run('deal', game => {
          const next = deal(game);
          return {
            game: next,
            log: [`Dealt: ${formatCards(next.deck.pool)}`],
            events: [{ type: 'DEAL', data: { pool: next.deck.pool.map(c => c.id) } }]
          };
        }),

      discard: indices =>
        run('discard', game => {
          const next = discardCards(game, indices);
          const removed = indices.map(i => game.deck.pool[i]);
          return {
            game: next,
            log: [`Discarded ${formatCards(removed)} (${next.discardsRemaining} discards left)`],
            events: [{ type: 'DISCARD', data: { cards: removed.map(c => c.id), discardsRemaining: next.discardsRemaining } }]
          };
        }),

      play: indices =>
        run('play', game => {
          const { state: next, breakdown, outcome, reward } = play(game, indices);
          const log = [
            `Played ${formatCards(breakdown.cards)}: ${categoryName(breakdown.category)} ` +
              `(${breakdown.totalChips} chips x ${breakdown.totalMult} mult = ${breakdown.total})`,
            OUTCOME_LOG[outcome]
          ];
          const events: Step['events'] = [
            { type: 'PLAY', data: { category: breakdown.category, total: breakdown.total, outcome } }
          ];

          if (outcome === 'cleared') {
            log.push(`+${reward} coins. Shop is open.`);
            events.push({ type: 'BLIND_CLEARED', data: { reward, coins: next.coins } });
            events.push({ type: 'SHOP_OPEN', data: { offers: next.shop.map(o => o.definitionId) } });
          } else if (outcome === 'failed') {
            events.push({ type: 'RUN_OVER', data: { ante: next.blind.ante, slot: next.blind.slot, stats: next.stats } });
          }

          return { game: next, log, events };
        }),

      buy: offerIndex =>
        run('buy', game => {
          const next = buy(game, offerIndex);
          const def = requireJoker(game.shop[offerIndex].definitionId);
          return {
            game: next,
            log: [`Bought ${def.name} for ${def.cost} coins`],
            events: [{ type: 'BUY', data: { id: def.id, cost: def.cost, coins: next.coins } }]
          };
        }),

      skip: () =>
        run('leave the shop', game => {
          const next = skip(game);
          return {
            game: next,
            log: [`Next blind: ante ${next.blind.ante} ${next.blind.slot}`],
            events: [{ type: 'SKIP', data: { ante: next.blind.ante, slot: next.blind.slot } }]
          };
        }),

      save: () => {
        const { game } = get();
        return game ? serializeGame(game) : null;
      },

      load: data => {
        let game: GameState;
        try {
          game = deserializeGame(data);
        } catch (e) {
          if (!(e instanceof EngineError)) throw e;
          get().addLog(`Load failed: ${e.message}`);
          const current = get().game;
          return { ok: false, error: { code: e.code, message: e.message }, snapshot: current ? snapshot(current) : null };
        }
        set(state => ({
          game,
          turnLog: [...state.turnLog, `Loaded game (seed ${game.seed})`],
          events: [...state.events, emit('LOAD', { seed: game.seed, phase: game.phase })]
        }));
        return { ok: true, snapshot: snapshot(game) };
      },

      suggest: () => {
        const { game } = get();
        if (!game || game.phase !== 'hand-in-play') return null;
        const best = bestPlay(game.deck.pool, game.jokers, game.blind.slot, { allowWheel: game.options.allowWheel });
        return best ? best.indices : null;
      },

      addLog: message => {
        set(state => ({ turnLog: [...state.turnLog, message] }));
      }
    };
  });
}

export default createGameStore;
