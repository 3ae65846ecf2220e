// État par marché quoté (un seul writer : le CycleProcessor)
import { rootLog, shortId } from "../logger";
import type { Market, OutcomeSide } from "./types";

const log = rootLog.child({ name: "state" });

/**
 * Slot d'ordre de sortie pour un côté (YES ou NO)
 */
export type ExitSlot = {
  orderId: string | null;
  price: number | null; // prix de l'ordre de sortie au repos
  cooldownUntil: number | null; // pas de placement avant ce timestamp (ms)
};

export type QuotedMarket = {
  market: Market;

  // Ordres de quoting (bid = BUY YES, ask = BUY NO à 1 - ask)
  bidOrderId: string | null;
  askOrderId: string | null;

  // Ordres de sortie d'inventaire
  exits: Record<OutcomeSide, ExitSlot>;

  // Mid au moment du placement des quotes (base de la dérive)
  midAtPlacement: number;

  // Inventaire : timestamp de détection et mid à ce moment
  inventorySince: number | null;
  entryMid: number | null;

  // Prix réels des quotes au repos (espace YES), ancrages du coût de revient
  entryBidPrice: number | null;
  entryAskPrice: number | null;
};

function emptyExitSlot(): ExitSlot {
  return { orderId: null, price: null, cooldownUntil: null };
}

export function createQuotedMarket(market: Market): QuotedMarket {
  return {
    market,
    bidOrderId: null,
    askOrderId: null,
    exits: { YES: emptyExitSlot(), NO: emptyExitSlot() },
    midAtPlacement: 0,
    inventorySince: null,
    entryMid: null,
    entryBidPrice: null,
    entryAskPrice: null
  };
}

export function hasActiveExits(state: QuotedMarket): boolean {
  return state.exits.YES.orderId !== null || state.exits.NO.orderId !== null;
}

/**
 * Tous les ordres au repos connus pour ce marché (quotes + sorties)
 */
export function openOrderIds(state: QuotedMarket): string[] {
  return [
    state.bidOrderId,
    state.askOrderId,
    state.exits.YES.orderId,
    state.exits.NO.orderId
  ].filter((id): id is string => id !== null);
}

/**
 * Oublie tous les ordres (après un cancel réussi, un cancel-all ou au shutdown)
 */
export function clearOrders(state: QuotedMarket) {
  state.bidOrderId = null;
  state.askOrderId = null;
  for (const slot of Object.values(state.exits)) {
    slot.orderId = null;
    slot.price = null;
  }
}

/**
 * Log l'état d'un marché
 */
export function logState(state: QuotedMarket) {
  log.info({
    ticker: state.market.ticker,
    bidOrderId: state.bidOrderId ? shortId(state.bidOrderId) : null,
    askOrderId: state.askOrderId ? shortId(state.askOrderId) : null,
    yesExit: state.exits.YES.orderId ? `${shortId(state.exits.YES.orderId)} @ ${state.exits.YES.price}` : null,
    noExit: state.exits.NO.orderId ? `${shortId(state.exits.NO.orderId)} @ ${state.exits.NO.price}` : null,
    midAtPlacement: state.midAtPlacement,
    inventorySince: state.inventorySince ? new Date(state.inventorySince).toISOString() : null,
    entryMid: state.entryMid
  }, "🔄 Market state");
}
