// src/lib/amounts.ts - Arrondis prix / shares pour Polymarket

/**
 * Arrondit à n décimales
 */
export function roundTo(x: number, decimals: number): number {
  const f = Math.pow(10, decimals);
  return Math.round(x * f) / f;
}

/**
 * Snap un prix sur le multiple de tick le plus proche.
 * Résultat figé à 4 décimales pour éviter la dérive flottante (0.45999999 → 0.46).
 */
export function roundToTick(price: number, tickSize: string): number {
  const tick = parseFloat(tickSize);
  return roundTo(Math.round(price / tick) * tick, 4);
}

/**
 * Borne un prix dans l'intervalle tradable
 */
export function clamp(price: number, lo: number = 0.01, hi: number = 0.99): number {
  return Math.max(lo, Math.min(hi, price));
}

/**
 * Tronque (floor) une quantité de shares à 2 décimales.
 * Évite de demander une size qui dépasse légèrement la balance réelle.
 */
export function truncateShares(shares: number): number {
  // roundTo d'abord : 1.23 * 100 = 122.99999999999999
  return Math.floor(roundTo(shares * 100, 6)) / 100;
}

/**
 * Balance brute CLOB (6 décimales, comme USDC) → unités
 */
export function fromMicro(raw: string | number): number {
  const value = typeof raw === "number" ? raw : parseFloat(raw);
  return Number.isFinite(value) ? value / 1e6 : 0;
}
