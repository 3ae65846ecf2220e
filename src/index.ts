// Point d'entrée principal - bot de quoting liquidity-rewards
import "dotenv/config";
import type { ApiKeyCreds } from "@polymarket/clob-client";
import {
  CLOB_HOST,
  DRY_RUN,
  MARKETS,
  ORDER_SIZE_USD,
  POLL_INTERVAL_SECONDS,
  QUOTING_PARAMS,
  SHUTDOWN_TIME,
  SHUTDOWN_TIMEZONE,
  TICKERS
} from "./config";
import { PolyClobClient, deriveApiCreds } from "./clients/polySDK";
import { discoverMarkets } from "./clients/gamma";
import { MarketMaker } from "./core/MarketMaker";
import { errorMessage } from "./lib/errors";
import { rootLog } from "./logger";

const log = rootLog.child({ name: "main" });

// ============================================================
// VALIDATION DES VARIABLES D'ENVIRONNEMENT
// ============================================================
const privateKey = process.env.PRIVATE_KEY;
if (!privateKey) {
  console.error("❌ Missing required environment variable: PRIVATE_KEY");
  process.exit(1);
}

/**
 * Credentials L2 depuis l'env, sinon dérivés depuis la clé privée
 */
async function resolveCreds(key: string): Promise<ApiKeyCreds> {
  const apiKey = process.env.CLOB_API_KEY;
  const secret = process.env.CLOB_API_SECRET;
  const passphrase = process.env.CLOB_PASSPHRASE;
  if (apiKey && secret && passphrase) {
    return { key: apiKey, secret, passphrase };
  }

  log.info("🔑 No API creds in .env, deriving from private key...");
  const creds = await deriveApiCreds(key, CLOB_HOST);
  log.info({
    CLOB_API_KEY: creds.key,
    CLOB_API_SECRET: creds.secret,
    CLOB_PASSPHRASE: creds.passphrase
  }, "✅ API creds derived. Add these to your .env to skip derivation");
  return creds;
}

// ============================================================
// FONCTION PRINCIPALE
// ============================================================
async function main(key: string) {
  log.info({
    DRY_RUN,
    TICKERS,
    MARKETS,
    POLL_INTERVAL_SECONDS,
    SHUTDOWN_TIME,
    SHUTDOWN_TIMEZONE,
    ...QUOTING_PARAMS
  }, "⚙️ Configuration");

  // 1. Client CLOB
  log.info("🔌 Initializing CLOB client...");
  const clob = new PolyClobClient({
    privateKey: key,
    creds: await resolveCreds(key),
    host: CLOB_HOST,
    funderAddress: process.env.POLY_PROXY_ADDRESS || undefined
  });
  log.info({ eoa: clob.getAddress(), maker: clob.getMakerAddress() }, "✅ CLOB client initialized");

  // 2. Balance USDC
  let balance = 0;
  try {
    balance = await clob.getCollateralBalance();
  } catch (error: unknown) {
    log.warn({ error: errorMessage(error) }, "⚠️ Could not fetch USDC balance");
  }
  log.info({ balance: balance.toFixed(2) }, "💰 USDC balance");
  if (balance < ORDER_SIZE_USD * 2) {
    log.warn({
      needed: (ORDER_SIZE_USD * 2).toFixed(0),
      perSide: ORDER_SIZE_USD
    }, "⚠️ Low balance for one market (2 sides)");
  }

  // 3. Discovery
  log.info({ tickers: TICKERS, markets: MARKETS }, "🔍 Discovering markets...");
  const markets = await discoverMarkets();
  if (markets.length === 0) {
    throw new Error("No markets found");
  }
  log.info({ count: markets.length }, "📊 Markets found");

  // Allowances mises en cache côté CLOB pour tous les tokens découverts
  await clob.refreshAllowances(markets.flatMap(m => [m.yesTokenId, m.noTokenId]));

  // Sizing fixe (min incentive size) : on ne fait que prévenir si le capital semble court
  const totalNeeded = markets.length * ORDER_SIZE_USD * 2;
  if (balance < totalNeeded) {
    log.warn({
      balance: balance.toFixed(2),
      needed: totalNeeded.toFixed(0),
      markets: markets.length
    }, "⚠️ Balance below estimated need, some orders may be rejected");
  }

  // 4. Quotes initiales + boucle
  const marketMaker = new MarketMaker(clob, markets);
  await marketMaker.start();

  // Gestion propre de l'arrêt
  const shutdown = async (signal: string) => {
    log.info({ signal }, "🛑 Shutdown signal received, cancelling all orders...");
    await marketMaker.stop();
    log.info("👋 Bot stopped gracefully");
    process.exit(0);
  };
  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      log.error({ error: errorMessage(error) }, "❌ Shutdown failed");
      process.exit(1);
    });
  };

  // SIGINT = Ctrl+C local
  process.on("SIGINT", () => onSignal("SIGINT"));

  // SIGTERM = Docker shutdown
  process.on("SIGTERM", () => onSignal("SIGTERM"));

  log.info("✅ Bot running, press Ctrl+C to stop");
  await marketMaker.run();
  log.info("👋 Daily session finished");
}

// ============================================================
// DÉMARRAGE
// ============================================================
main(privateKey).catch((error: unknown) => {
  log.error({ error: errorMessage(error) }, "❌ Fatal error");
  process.exit(1);
});
