import { beforeEach, describe, expect, it } from "vitest";
import { OrderManager, runCancelSteps, type CancelStep } from "../../src/core/OrderManager";
import type { LimitOrder } from "../../src/clients/venue";
import { FakeVenue } from "../helpers/fakeVenue";

const BID: LimitOrder = {
  tokenId: "yes-token",
  price: 0.46,
  size: 20,
  side: "BUY",
  tickSize: "0.01",
  negRisk: false
};

describe("OrderManager", () => {
  let venue: FakeVenue;
  let orders: OrderManager;

  beforeEach(() => {
    venue = new FakeVenue();
    orders = new OrderManager(venue, { dryRun: false });
  });

  describe("placeOrder", () => {
    it("returns the venue order id", async () => {
      expect(await orders.placeOrder(BID, "AAPL BID")).toEqual({ success: true, orderId: "order-1" });
      expect(venue.placements()).toEqual([BID]);
    });

    it("flags balance rejections", async () => {
      venue.placeError = "not enough balance / allowance";
      expect(await orders.placeOrder(BID, "AAPL BID")).toEqual({
        success: false,
        error: "not enough balance / allowance",
        balanceError: true
      });
    });

    it("reports other failures without throwing", async () => {
      venue.placeError = "invalid tick size";
      expect(await orders.placeOrder(BID, "AAPL BID")).toEqual({
        success: false,
        error: "invalid tick size",
        balanceError: false
      });
    });
  });

  describe("cancelOrders", () => {
    it("uses the bulk cancel first", async () => {
      expect(await orders.cancelOrders(["a", "b"], "test")).toEqual({
        success: true,
        step: "bulk_cancel",
        accountWide: false
      });
      expect(venue.calls).toEqual([{ kind: "cancel", orderIds: ["a", "b"] }]);
      expect(orders.getAccountWideCancels()).toBe(0);
    });

    it("falls back to cancel-all and counts it", async () => {
      venue.cancelError = "timeout";
      expect(await orders.cancelOrders(["a"], "test")).toEqual({
        success: true,
        step: "cancel_all",
        accountWide: true
      });
      expect(venue.calls).toEqual([{ kind: "cancel", orderIds: ["a"] }, { kind: "cancelAll" }]);
      expect(orders.getAccountWideCancels()).toBe(1);
    });

    it("reports the last error when every step fails", async () => {
      venue.cancelError = "timeout";
      venue.cancelAllError = "unauthorized";
      expect(await orders.cancelOrders(["a"], "test")).toEqual({ success: false, error: "unauthorized" });
      expect(orders.getAccountWideCancels()).toBe(0);
    });

    it("does nothing for an empty list", async () => {
      expect(await orders.cancelOrders([], "test")).toEqual({ success: true, step: "noop", accountWide: false });
      expect(venue.calls).toEqual([]);
    });
  });

  describe("halt", () => {
    it("refuses placements but still cancels", async () => {
      orders.halt();

      expect(await orders.placeOrder(BID, "AAPL BID")).toEqual({
        success: false,
        error: "order manager halted",
        balanceError: false
      });
      expect(await orders.cancelOrders(["a"], "shutdown")).toEqual({
        success: true,
        step: "bulk_cancel",
        accountWide: false
      });
      expect(venue.calls).toEqual([{ kind: "cancel", orderIds: ["a"] }]);
    });
  });

  describe("dry run", () => {
    it("never reaches the venue", async () => {
      const dry = new OrderManager(venue, { dryRun: true });
      expect(await dry.placeOrder(BID, "AAPL BID")).toEqual({ success: true, orderId: "dry-run-1" });
      expect(await dry.placeOrder(BID, "AAPL BID")).toEqual({ success: true, orderId: "dry-run-2" });
      expect(await dry.cancelOrders(["dry-run-1"], "test")).toEqual({
        success: true,
        step: "dry_run",
        accountWide: false
      });
      expect(venue.calls).toEqual([]);
    });
  });
});

describe("runCancelSteps", () => {
  it("stops at the first successful step", async () => {
    const ran: string[] = [];
    const steps: CancelStep[] = [
      { name: "first", accountWide: false, run: async () => { ran.push("first"); throw new Error("nope"); } },
      { name: "second", accountWide: false, run: async () => { ran.push("second"); } },
      { name: "third", accountWide: true, run: async () => { ran.push("third"); } }
    ];

    expect(await runCancelSteps(steps, ["x"], "test")).toEqual({ success: true, step: "second", accountWide: false });
    expect(ran).toEqual(["first", "second"]);
  });

  it("fails without steps", async () => {
    expect(await runCancelSteps([], ["x"], "test")).toEqual({ success: false, error: "no cancel step" });
  });
});
