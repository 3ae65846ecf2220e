// Data Fetcher - Lectures parallèles (balances YES/NO + midpoint) pour tous les marchés
import { rootLog } from "../logger";
import { mapWithConcurrency } from "../lib/concurrency";
import { errorMessage } from "../lib/errors";
import { FETCH_CONCURRENCY } from "../config";
import type { ExecutionVenue } from "../clients/venue";
import type { Market, MarketData } from "./types";

const log = rootLog.child({ name: "fetch" });

type Field = keyof MarketData;

type FetchTask = {
  marketIndex: number;
  field: Field;
  run: () => Promise<number | null>;
};

/**
 * Lit, pour chaque marché, la balance YES, la balance NO et le midpoint.
 * Chaque lecture est une tâche indépendante du pool (cap = concurrency).
 * Une lecture en échec ne marque que son champ comme inconnu (null).
 */
export async function fetchMarketData(
  venue: ExecutionVenue,
  markets: Market[],
  concurrency: number = FETCH_CONCURRENCY
): Promise<MarketData[]> {
  const tasks: FetchTask[] = [];
  markets.forEach((market, marketIndex) => {
    tasks.push({ marketIndex, field: "yesBalance", run: () => venue.getBalance(market.yesTokenId) });
    tasks.push({ marketIndex, field: "noBalance", run: () => venue.getBalance(market.noTokenId) });
    tasks.push({ marketIndex, field: "midpoint", run: () => venue.getMidpoint(market.yesTokenId) });
  });

  const results: MarketData[] = markets.map(() => ({
    yesBalance: null,
    noBalance: null,
    midpoint: null
  }));

  await mapWithConcurrency(tasks, concurrency, async (task) => {
    try {
      const value = await task.run();
      results[task.marketIndex][task.field] = normalize(task.field, value);
    } catch (error: unknown) {
      log.error({
        ticker: markets[task.marketIndex].ticker,
        field: task.field,
        error: errorMessage(error)
      }, "❌ Read failed, field marked unknown");
    }
  });

  return results;
}

function normalize(field: Field, value: number | null): number | null {
  if (value === null || !Number.isFinite(value)) return null;
  // Un midpoint à 0 n'est pas un prix exploitable
  if (field === "midpoint" && value <= 0) return null;
  return value;
}
