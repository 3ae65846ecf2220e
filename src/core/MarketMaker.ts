// Market Maker - Orchestrateur : quotes initiales, boucle de poll, cutoff quotidien, shutdown
import { rootLog } from "../logger";
import { errorMessage } from "../lib/errors";
import { sleep } from "../lib/concurrency";
import { isPastShutdownTime } from "../lib/schedule";
import {
  FETCH_CONCURRENCY,
  POLL_INTERVAL_SECONDS,
  QUOTING_PARAMS,
  SHUTDOWN_TIME,
  SHUTDOWN_TIMEZONE,
  type QuotingParams
} from "../config";
import type { ExecutionVenue } from "../clients/venue";
import { CycleProcessor } from "./CycleProcessor";
import { fetchMarketData } from "./DataFetcher";
import { OrderManager } from "./OrderManager";
import { clearOrders, createQuotedMarket, logState, openOrderIds, type QuotedMarket } from "./QuotedMarket";
import type { Market, MarketData } from "./types";

const log = rootLog.child({ name: "mm" });

export type MarketMakerOptions = {
  params?: QuotingParams;
  pollIntervalMs?: number;
  fetchConcurrency?: number;
  shutdownTime?: string;
  shutdownTimezone?: string;
  orderManager?: OrderManager;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => number;
};

export class MarketMaker {
  private venue: ExecutionVenue;
  private markets: Market[];
  private orders: OrderManager;
  private processor: CycleProcessor;

  private pollIntervalMs: number;
  private fetchConcurrency: number;
  private shutdownTime: string;
  private shutdownTimezone: string;
  private sleep: (ms: number) => Promise<void>;
  private clock: () => number;

  // Un état par marché quoté, dans l'ordre de la discovery
  private quoted: QuotedMarket[] = [];

  // Dernier compteur de cancel-all vu
  private seenAccountWideCancels = 0;

  private running = false;
  private stopped = false;

  // Traitement en cours (quotes initiales ou cycle), attendu par stop() avant le sweep
  private inFlight: Promise<void> | null = null;

  constructor(venue: ExecutionVenue, markets: Market[], options: MarketMakerOptions = {}) {
    this.venue = venue;
    this.markets = markets;
    this.orders = options.orderManager ?? new OrderManager(venue);
    this.processor = new CycleProcessor(this.orders, options.params ?? QUOTING_PARAMS);
    this.pollIntervalMs = options.pollIntervalMs ?? POLL_INTERVAL_SECONDS * 1000;
    this.fetchConcurrency = options.fetchConcurrency ?? FETCH_CONCURRENCY;
    this.shutdownTime = options.shutdownTime ?? SHUTDOWN_TIME;
    this.shutdownTimezone = options.shutdownTimezone ?? SHUTDOWN_TIMEZONE;
    this.sleep = options.sleep ?? sleep;
    this.clock = options.clock ?? Date.now;

    log.info({ markets: markets.length, pollIntervalMs: this.pollIntervalMs }, "🚀 Market Maker initialized");
  }

  /**
   * Place les quotes initiales. Throw si aucun marché n'a pu être quoté.
   */
  async start(): Promise<void> {
    log.info("🚀 Starting Market Maker...");

    const eligible = this.markets.filter(market => {
      if (market.maxIncentiveSpread <= 0) {
        log.warn({ ticker: market.ticker }, "⚠️ No incentive spread set, skipping");
        return false;
      }
      return true;
    });

    await this.track(this.placeInitialQuotes(eligible));

    // stop() reçu pendant les quotes initiales : la boucle ne doit pas démarrer
    if (this.stopped) return;

    if (this.quoted.length === 0) {
      throw new Error("No quotes placed");
    }

    this.running = true;
    log.info({
      activeMarkets: this.quoted.length,
      pollIntervalSeconds: this.pollIntervalMs / 1000
    }, "✅ Quotes placed, entering monitor loop");
  }

  private async placeInitialQuotes(eligible: Market[]) {
    const data = await fetchMarketData(this.venue, eligible, this.fetchConcurrency);

    for (let i = 0; i < eligible.length; i++) {
      if (this.stopped) return;
      const market = eligible[i];
      if (data[i].midpoint === null) {
        log.error({ ticker: market.ticker }, "❌ Cannot get midpoint, skipping (not retried this session)");
        continue;
      }

      const state = createQuotedMarket(market);
      this.quoted.push(state);
      await this.processSafely(state, i, data);
    }
  }

  /**
   * Boucle de poll jusqu'à stop() ou au cutoff quotidien
   */
  async run(): Promise<void> {
    while (this.running) {
      await this.sleep(this.pollIntervalMs);
      if (!this.running) break;

      if (isPastShutdownTime(new Date(this.clock()), this.shutdownTime, this.shutdownTimezone)) {
        log.info({ shutdownTime: this.shutdownTime, timeZone: this.shutdownTimezone }, "🕒 Daily cutoff reached");
        await this.stop();
        break;
      }

      await this.runCycle();
    }

    log.info("🛑 Main loop stopped");
  }

  /**
   * Un cycle : fetch parallèle de toutes les données, puis traitement séquentiel par marché
   */
  async runCycle(): Promise<void> {
    if (this.stopped) return;
    await this.track(this.cycleOnce());
  }

  private async track(work: Promise<void>) {
    this.inFlight = work;
    try {
      await work;
    } finally {
      if (this.inFlight === work) {
        this.inFlight = null;
      }
    }
  }

  private async cycleOnce() {
    const markets = this.quoted.map(q => q.market);
    const data = await fetchMarketData(this.venue, markets, this.fetchConcurrency);

    for (let i = 0; i < this.quoted.length; i++) {
      if (this.stopped) return;
      await this.processSafely(this.quoted[i], i, data);
    }
  }

  private async processSafely(state: QuotedMarket, index: number, data: MarketData[]) {
    try {
      await this.processor.processCycle(state, data[index], this.clock());
    } catch (error: unknown) {
      log.error({ ticker: state.market.ticker, error: errorMessage(error) }, "❌ Error processing market");
    }
    this.syncAccountWideCancels(state);
  }

  /**
   * Un cancel-all a tué les ordres de tous les marchés : on les oublie partout
   * (le marché courant a déjà été remis à zéro par le processor)
   */
  private syncAccountWideCancels(current: QuotedMarket) {
    const count = this.orders.getAccountWideCancels();
    if (count === this.seenAccountWideCancels) return;
    this.seenAccountWideCancels = count;

    for (const state of this.quoted) {
      if (state !== current) {
        clearOrders(state);
      }
    }
    log.warn({ trigger: current.market.ticker }, "⚠️ Account-wide cancel, all tracked orders forgotten");
  }

  /**
   * Arrête la boucle et annule tous les ordres connus (best effort)
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    this.running = false;
    this.orders.halt();
    log.info("🛑 Stopping Market Maker...");

    // Un placement déjà parti doit finir pour que son id entre dans le sweep
    if (this.inFlight) {
      log.info("⏳ Waiting for the cycle in progress...");
      try {
        await this.inFlight;
      } catch (error: unknown) {
        log.error({ error: errorMessage(error) }, "❌ Cycle in progress failed");
      }
    }

    for (const state of this.quoted) {
      logState(state);
    }

    const orderIds = this.quoted.flatMap(openOrderIds);
    for (const state of this.quoted) {
      clearOrders(state);
    }

    if (orderIds.length === 0) {
      log.info("No orders to cancel");
      return;
    }

    const result = await this.orders.cancelOrders(orderIds, "shutdown");
    if (result.success) {
      log.info({ count: orderIds.length, step: result.step }, "✅ All orders cancelled");
    } else {
      log.error({ count: orderIds.length, error: result.error }, "❌ Shutdown cancel failed");
    }
  }

  getQuotedMarkets(): readonly QuotedMarket[] {
    return this.quoted;
  }
}
