// Types partagés : marché découvert, côté d'outcome, snapshot de données par cycle

export type OutcomeSide = "YES" | "NO";

export const OUTCOME_SIDES: readonly OutcomeSide[] = ["YES", "NO"];

/**
 * Marché résolu par la discovery (immutable)
 */
export type Market = {
  ticker: string; // ex "AAPL"
  question: string;
  conditionId: string;
  yesTokenId: string;
  noTokenId: string;
  maxIncentiveSpread: number; // en unités de prix (ex 0.055)
  minIncentiveSize: number; // shares minimum par side
  tickSize: string; // ex "0.01"
  negRisk: boolean;
};

/**
 * Lectures d'un cycle pour un marché. null = lecture échouée (inconnue).
 */
export type MarketData = {
  yesBalance: number | null;
  noBalance: number | null;
  midpoint: number | null;
};

export function tokenIdFor(market: Market, side: OutcomeSide): string {
  return side === "YES" ? market.yesTokenId : market.noTokenId;
}
