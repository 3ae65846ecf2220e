// src/risk/pinGuard.ts
// Protection contre les marchés à probabilités extrêmes (pin risk)
// Près de 0 ou 1 on ne peut plus construire un quote deux côtés valide

import { QUOTING_PARAMS, type QuotingParams } from "../config";

/**
 * Vérifie si un midpoint est dans la zone de pin-risk (mid < seuil minimum quotable).
 * Côté haut, le clamp [0.001, 0.999] des quotes suffit.
 */
export function isPinRisk(mid: number, params: QuotingParams = QUOTING_PARAMS): boolean {
  return mid < params.minQuotableMid;
}

/**
 * Dérive relative du mid depuis le placement des quotes
 */
export function midDrift(midAtPlacement: number, mid: number): number {
  if (midAtPlacement <= 0) return Number.POSITIVE_INFINITY;
  return Math.abs(mid - midAtPlacement) / midAtPlacement;
}

/**
 * Le mid a-t-il dérivé au-delà du seuil de refresh ?
 */
export function hasDrifted(
  midAtPlacement: number,
  mid: number,
  params: QuotingParams = QUOTING_PARAMS
): boolean {
  return midDrift(midAtPlacement, mid) > params.refreshThresholdPct;
}
