// Pricing des quotes bid/ask autour du midpoint (fonctions pures)
import { clamp, roundToTick } from "../lib/amounts";
import { QUOTING_PARAMS, type QuotingParams } from "../config";
import type { Market } from "../core/types";

// Bornes plus larges que le clamp par défaut pour les marchés fins
export const QUOTE_MIN_PRICE = 0.001;
export const QUOTE_MAX_PRICE = 0.999;

export type Quotes = {
  bid: number;
  ask: number;
};

/**
 * Demi-spread visé = fraction du max_incentive_spread du marché
 */
export function halfSpread(market: Market, params: QuotingParams = QUOTING_PARAMS): number {
  return market.maxIncentiveSpread * params.spreadPct;
}

/**
 * Calcule bid et ask autour du midpoint, clampés à [0.001, 0.999].
 * Si l'arrondi au tick fait se croiser bid et ask, on repart sur mid ∓ 1 tick.
 */
export function computeQuotes(
  market: Market,
  midpoint: number,
  params: QuotingParams = QUOTING_PARAMS
): Quotes {
  const half = halfSpread(market, params);

  let bid = clamp(roundToTick(midpoint - half, market.tickSize), QUOTE_MIN_PRICE, QUOTE_MAX_PRICE);
  let ask = clamp(roundToTick(midpoint + half, market.tickSize), QUOTE_MIN_PRICE, QUOTE_MAX_PRICE);

  if (bid >= ask) {
    const tick = parseFloat(market.tickSize);
    bid = clamp(roundToTick(midpoint - tick, market.tickSize), QUOTE_MIN_PRICE, QUOTE_MAX_PRICE);
    ask = clamp(roundToTick(midpoint + tick, market.tickSize), QUOTE_MIN_PRICE, QUOTE_MAX_PRICE);
  }

  return { bid, ask };
}

/**
 * Taille par side : min_incentive_size du marché (ou override de test).
 * Pas de sizing dynamique selon la balance disponible.
 */
export function computeSize(market: Market, params: QuotingParams = QUOTING_PARAMS): number {
  if (params.sizeOverride !== null) {
    return params.sizeOverride;
  }
  return market.minIncentiveSize;
}

/**
 * Prix du BUY NO équivalent à un SELL YES au prix ask.
 * Borné à [tick, 1 - tick] : un ask clampé à 0.999 donnerait un prix NO nul.
 */
export function noPriceForAsk(market: Market, ask: number): number {
  const tick = parseFloat(market.tickSize);
  return clamp(roundToTick(1 - ask, market.tickSize), tick, roundToTick(1 - tick, market.tickSize));
}
