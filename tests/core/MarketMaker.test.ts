import { beforeEach, describe, expect, it } from "vitest";
import { MarketMaker, type MarketMakerOptions } from "../../src/core/MarketMaker";
import { OrderManager, type PlaceResult } from "../../src/core/OrderManager";
import type { LimitOrder } from "../../src/clients/venue";
import { FakeVenue, makeMarket, TEST_PARAMS } from "../helpers/fakeVenue";

const AAPL = makeMarket({ ticker: "AAPL", yesTokenId: "aapl-yes", noTokenId: "aapl-no" });
const TSLA = makeMarket({ ticker: "TSLA", yesTokenId: "tsla-yes", noTokenId: "tsla-no" });

// 10:00 et 16:00 à New York (heure d'hiver)
const MORNING = Date.parse("2025-02-03T15:00:00Z");
const AFTER_CLOSE = Date.parse("2025-02-03T21:00:00Z");

// OrderManager qui plante sur un token donné (erreur inattendue dans un cycle)
class ExplodingOrderManager extends OrderManager {
  constructor(venue: FakeVenue, private explodingToken: string) {
    super(venue, { dryRun: false });
  }

  async placeOrder(order: LimitOrder, label: string): Promise<PlaceResult> {
    if (order.tokenId === this.explodingToken) {
      throw new Error("unexpected failure");
    }
    return super.placeOrder(order, label);
  }
}

describe("MarketMaker", () => {
  let venue: FakeVenue;

  function build(markets = [AAPL, TSLA], options: MarketMakerOptions = {}): MarketMaker {
    return new MarketMaker(venue, markets, {
      params: TEST_PARAMS,
      orderManager: new OrderManager(venue, { dryRun: false }),
      sleep: async () => {},
      clock: () => MORNING,
      ...options
    });
  }

  beforeEach(() => {
    venue = new FakeVenue();
    venue.mids.set("aapl-yes", 0.5);
    venue.mids.set("tsla-yes", 0.5);
  });

  describe("start", () => {
    it("quotes every market", async () => {
      const mm = build();
      await mm.start();

      expect(venue.placements().map(o => o.tokenId)).toEqual(["aapl-yes", "aapl-no", "tsla-yes", "tsla-no"]);
      expect(mm.getQuotedMarkets().map(q => [q.bidOrderId, q.askOrderId])).toEqual([
        ["order-1", "order-2"],
        ["order-3", "order-4"]
      ]);
    });

    it("skips markets without an incentive spread or a midpoint", async () => {
      venue.mids.set("tsla-yes", null);
      const noSpread = makeMarket({ ticker: "NVDA", yesTokenId: "nvda-yes", noTokenId: "nvda-no", maxIncentiveSpread: 0 });
      venue.mids.set("nvda-yes", 0.5);

      const mm = build([AAPL, TSLA, noSpread]);
      await mm.start();

      expect(mm.getQuotedMarkets().map(q => q.market.ticker)).toEqual(["AAPL"]);
    });

    it("does not retry a market that had no midpoint at start", async () => {
      venue.mids.set("tsla-yes", null);
      const mm = build();
      await mm.start();

      venue.mids.set("tsla-yes", 0.5);
      await mm.runCycle();

      expect(venue.placements().map(o => o.tokenId)).toEqual(["aapl-yes", "aapl-no"]);
    });

    it("fails when no market can be quoted", async () => {
      venue.mids.set("aapl-yes", null);
      venue.mids.set("tsla-yes", null);

      await expect(build().start()).rejects.toThrow("No quotes placed");
    });

    it("keeps going when one market throws", async () => {
      const mm = build([AAPL, TSLA], { orderManager: new ExplodingOrderManager(venue, "aapl-yes") });
      await mm.start();

      expect(venue.placements().map(o => o.tokenId)).toEqual(["tsla-yes", "tsla-no"]);
      expect(mm.getQuotedMarkets()).toHaveLength(2);
    });
  });

  describe("cycles", () => {
    it("forgets other markets' orders after a fallback cancel-all", async () => {
      const mm = build();
      await mm.start();

      venue.cancelError = "timeout";
      venue.mids.set("aapl-yes", 0.53);
      await mm.runCycle();

      expect(venue.calls.slice(4)).toEqual([
        { kind: "cancel", orderIds: ["order-1", "order-2"] },
        { kind: "cancelAll" },
        { kind: "place", order: { tokenId: "aapl-yes", price: 0.49, size: 20, side: "BUY", tickSize: "0.01", negRisk: false } },
        { kind: "place", order: { tokenId: "aapl-no", price: 0.43, size: 20, side: "BUY", tickSize: "0.01", negRisk: false } },
        { kind: "place", order: { tokenId: "tsla-yes", price: 0.46, size: 20, side: "BUY", tickSize: "0.01", negRisk: false } },
        { kind: "place", order: { tokenId: "tsla-no", price: 0.46, size: 20, side: "BUY", tickSize: "0.01", negRisk: false } }
      ]);
      expect(mm.getQuotedMarkets().map(q => [q.bidOrderId, q.askOrderId])).toEqual([
        ["order-5", "order-6"],
        ["order-7", "order-8"]
      ]);
    });

    it("polls until stopped", async () => {
      let sleeps = 0;
      let mm: MarketMaker | null = null;
      mm = build([AAPL, TSLA], {
        sleep: async () => {
          sleeps += 1;
          if (sleeps === 2 && mm) await mm.stop();
        }
      });
      await mm.start();
      await mm.run();

      expect(sleeps).toBe(2);
      expect(venue.calls.at(-1)).toEqual({ kind: "cancel", orderIds: ["order-1", "order-2", "order-3", "order-4"] });
    });

    it("cancels everything at the daily cutoff", async () => {
      const mm = build([AAPL, TSLA], { clock: () => AFTER_CLOSE });
      await mm.start();
      await mm.run();

      expect(venue.calls.slice(4)).toEqual([
        { kind: "cancel", orderIds: ["order-1", "order-2", "order-3", "order-4"] }
      ]);
      expect(mm.getQuotedMarkets().every(q => q.bidOrderId === null && q.askOrderId === null)).toBe(true);
    });
  });

  describe("stop", () => {
    it("cancels all known orders in one call, once", async () => {
      const mm = build();
      await mm.start();
      await mm.stop();
      await mm.stop();

      expect(venue.calls.slice(4)).toEqual([
        { kind: "cancel", orderIds: ["order-1", "order-2", "order-3", "order-4"] }
      ]);
    });

    it("waits for the placement in flight and sweeps it", async () => {
      const mm = build([AAPL]);
      await mm.start();

      let release = () => {};
      venue.placeGate = new Promise<void>(resolve => {
        release = () => resolve();
      });
      venue.mids.set("aapl-yes", 0.6);
      const cycle = mm.runCycle();

      // Laisse le cycle atteindre le placement du bid
      await new Promise(resolve => setTimeout(resolve, 0));
      expect(venue.calls.at(-1)).toEqual({
        kind: "place",
        order: { tokenId: "aapl-yes", price: 0.56, size: 20, side: "BUY", tickSize: "0.01", negRisk: false }
      });

      const stopping = mm.stop();
      release();
      await stopping;
      await cycle;

      expect(venue.calls.slice(2).map(call => (call.kind === "cancel" ? call.orderIds : call.kind))).toEqual([
        ["order-1", "order-2"],
        "place",
        ["order-3"]
      ]);
      expect(mm.getQuotedMarkets()[0].bidOrderId).toBeNull();
      expect(mm.getQuotedMarkets()[0].askOrderId).toBeNull();
    });

    it("refuses new placements once stopped", async () => {
      const mm = build([AAPL]);
      await mm.start();
      await mm.stop();

      venue.mids.set("aapl-yes", 0.6);
      await mm.runCycle();

      expect(venue.placements()).toHaveLength(2);
    });

    it("never reaches the venue in dry run", async () => {
      const mm = build([AAPL], { orderManager: new OrderManager(venue, { dryRun: true }) });
      await mm.start();
      await mm.stop();

      expect(venue.calls).toEqual([]);
    });
  });
});
