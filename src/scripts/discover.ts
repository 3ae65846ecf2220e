// Liste les marchés du jour (tickers + slugs explicites) avec leur midpoint et les quotes prévues
import "dotenv/config";
import { CLOB_HOST, MARKETS, QUOTING_PARAMS, TICKERS } from "../config";
import { discoverMarkets } from "../clients/gamma";
import { fetchPublicMidpoint } from "../clients/polySDK";
import { computeQuotes, computeSize } from "../pricing/quotes";
import { isPinRisk } from "../risk/pinGuard";
import { errorMessage } from "../lib/errors";
import { rootLog, shortId } from "../logger";

const log = rootLog.child({ name: "discover" });

async function main() {
  const markets = await discoverMarkets({ tickers: TICKERS, slugs: MARKETS });
  if (markets.length === 0) {
    log.warn({ tickers: TICKERS, markets: MARKETS }, "⚠️ No markets found");
    return;
  }

  for (const market of markets) {
    let mid: number | null = null;
    try {
      mid = await fetchPublicMidpoint(CLOB_HOST, market.yesTokenId);
    } catch (error: unknown) {
      log.warn({ ticker: market.ticker, error: errorMessage(error) }, "⚠️ Midpoint unavailable");
    }

    const quotes = mid !== null && !isPinRisk(mid, QUOTING_PARAMS)
      ? computeQuotes(market, mid, QUOTING_PARAMS)
      : null;

    log.info({
      ticker: market.ticker,
      question: market.question,
      yesToken: shortId(market.yesTokenId, 20),
      noToken: shortId(market.noTokenId, 20),
      mid,
      maxSpread: market.maxIncentiveSpread,
      minSize: market.minIncentiveSize,
      tick: market.tickSize,
      size: computeSize(market, QUOTING_PARAMS),
      bid: quotes?.bid ?? null,
      ask: quotes?.ask ?? null
    }, "📊 Market");
  }
}

main().catch((error: unknown) => {
  log.error({ error: errorMessage(error) }, "❌ Discovery failed");
  process.exit(1);
});
