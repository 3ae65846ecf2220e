// Prix de sortie d'inventaire : escalade linéaire vers le breakeven + stop-loss
import { clamp, roundToTick } from "../lib/amounts";
import { QUOTING_PARAMS, type QuotingParams } from "../config";
import type { Market, OutcomeSide } from "../core/types";
import { halfSpread } from "./quotes";

/**
 * Progression de l'escalade dans [0, 1] (0 = fill détecté, 1 = horizon atteint)
 */
export function escalationProgress(
  inventorySince: number,
  now: number,
  params: QuotingParams = QUOTING_PARAMS
): number {
  const elapsedSeconds = (now - inventorySince) / 1000;
  return clamp(elapsedSeconds / params.escalationSeconds, 0, 1);
}

/**
 * Mouvement adverse relatif au mid d'entrée (mid qui baisse pour un holder YES,
 * qui monte pour un holder NO). Négatif si le marché va dans notre sens.
 */
export function adverseMove(entryMid: number, mid: number, side: OutcomeSide): number {
  if (entryMid <= 0) return 0;
  return side === "YES" ? (entryMid - mid) / entryMid : (mid - entryMid) / entryMid;
}

export function isStopLossTriggered(
  entryMid: number,
  mid: number,
  side: OutcomeSide,
  params: QuotingParams = QUOTING_PARAMS
): boolean {
  return adverseMove(entryMid, mid, side) >= params.stopLossPct;
}

/**
 * Prix de sortie d'une position.
 *
 * `entryPrice` est exprimé dans l'espace YES (prix du bid pour YES, prix de l'ask
 * pour NO). La cible démarre à coût + demi-spread et décroît linéairement jusqu'au
 * coût exact à l'horizon d'escalade. Si le stop-loss est déclenché, on sort au mid
 * courant (dans l'espace du token tenu). Arrondi au tick et clampé à [0.01, 0.99].
 */
export function computeExitPrice(
  market: Market,
  mid: number,
  inventorySince: number,
  entryMid: number,
  entryPrice: number,
  side: OutcomeSide,
  now: number = Date.now(),
  params: QuotingParams = QUOTING_PARAMS
): number {
  let target: number;

  if (isStopLossTriggered(entryMid, mid, side, params)) {
    target = side === "YES" ? mid : 1 - mid;
  } else {
    const t = escalationProgress(inventorySince, now, params);
    const cost = side === "YES" ? entryPrice : 1 - entryPrice;
    target = cost + halfSpread(market, params) * (1 - t);
  }

  return clamp(roundToTick(target, market.tickSize));
}
