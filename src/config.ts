// Configuration centralisée pour le bot de quoting liquidity-rewards
// ============================================================
// INFRASTRUCTURE
// ============================================================
export const CLOB_HOST = process.env.CLOB_HOST || "https://clob.polymarket.com";
export const GAMMA_API_URL = process.env.GAMMA_API_URL || "https://gamma-api.polymarket.com";

// ============================================================
// LOGGING
// ============================================================
export const LOG_LEVEL = process.env.LOG_LEVEL || "info";
export const LOG_FILE = process.env.LOG_FILE || "";

// ============================================================
// MARKETS - Tickers du jour ("{ticker}-up-or-down-on-...") ou slugs explicites
// ============================================================
export const TICKERS = parseList(process.env.TICKERS || "AAPL,TSLA,NVDA");
export const MARKETS = parseList(process.env.MARKETS || "");

// ============================================================
// QUOTING - Spread & taille
// ============================================================
// Fraction du max_incentive_spread utilisée (0.8 = 80% du spread autorisé autour du mid)
// Plus serré = plus de rewards mais plus d'adverse selection
export const SPREAD_PCT = Number(process.env.SPREAD_PCT) || 0.8;
// Taille fixe pour les tests (sinon min_incentive_size du marché)
export const TEST_SIZE_OVERRIDE = process.env.TEST_SIZE_OVERRIDE ? Number(process.env.TEST_SIZE_OVERRIDE) : null;
// Dérive relative du mid avant cancel + re-place (0.05 = 5%)
export const REFRESH_THRESHOLD_PCT = Number(process.env.REFRESH_THRESHOLD_PCT) || 0.05;
// En dessous on ne peut pas quoter proprement (marché parqué)
export const MIN_QUOTABLE_MID = Number(process.env.MIN_QUOTABLE_MID) || 0.05;
// Montant USDC par side, utilisé seulement pour le check de balance au démarrage
export const ORDER_SIZE_USD = Number(process.env.ORDER_SIZE_USD) || 15.0;

// ============================================================
// INVENTORY & EXITS
// ============================================================
export const INVENTORY_MIN_SHARES = Number(process.env.INVENTORY_MIN_SHARES) || 1.0;
export const EXIT_ESCALATION_SECONDS = Number(process.env.EXIT_ESCALATION_SECONDS) || 1800;
export const STOP_LOSS_PCT = Number(process.env.STOP_LOSS_PCT) || 0.05;
export const EXIT_COOLDOWN_SECONDS = Number(process.env.EXIT_COOLDOWN_SECONDS) || 60;

// ============================================================
// TIMING
// ============================================================
export const POLL_INTERVAL_SECONDS = Number(process.env.POLL_INTERVAL_SECONDS) || 30;
export const FETCH_CONCURRENCY = Number(process.env.FETCH_CONCURRENCY) || 3;
// Cancel all avant la clôture NASDAQ ("HH:MM", 24h)
export const SHUTDOWN_TIME = process.env.SHUTDOWN_TIME || "15:50";
export const SHUTDOWN_TIMEZONE = process.env.SHUTDOWN_TIMEZONE || "America/New_York";

// ============================================================
// DRY RUN MODE
// ============================================================
export const DRY_RUN = process.env.DRY_RUN === "true";

// ============================================================
// PARAMÈTRES GROUPÉS (injectables dans les tests)
// ============================================================
export type QuotingParams = {
  spreadPct: number;
  sizeOverride: number | null;
  refreshThresholdPct: number;
  minQuotableMid: number;
  dustShares: number;
  escalationSeconds: number;
  stopLossPct: number;
  exitCooldownSeconds: number;
};

export const QUOTING_PARAMS: QuotingParams = {
  spreadPct: SPREAD_PCT,
  sizeOverride: TEST_SIZE_OVERRIDE,
  refreshThresholdPct: REFRESH_THRESHOLD_PCT,
  minQuotableMid: MIN_QUOTABLE_MID,
  dustShares: INVENTORY_MIN_SHARES,
  escalationSeconds: EXIT_ESCALATION_SECONDS,
  stopLossPct: STOP_LOSS_PCT,
  exitCooldownSeconds: EXIT_COOLDOWN_SECONDS
};

function parseList(raw: string): string[] {
  return raw
    .split(",")
    .map(s => s.trim())
    .filter(s => s.length > 0);
}
