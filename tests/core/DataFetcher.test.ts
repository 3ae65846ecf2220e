import { describe, expect, it } from "vitest";
import { fetchMarketData } from "../../src/core/DataFetcher";
import { FakeVenue, makeMarket } from "../helpers/fakeVenue";

const AAPL = makeMarket({ ticker: "AAPL", yesTokenId: "aapl-yes", noTokenId: "aapl-no" });
const TSLA = makeMarket({ ticker: "TSLA", yesTokenId: "tsla-yes", noTokenId: "tsla-no" });

describe("fetchMarketData", () => {
  it("reads balances and midpoint per market, in order", async () => {
    const venue = new FakeVenue();
    venue.balances.set("aapl-yes", 5);
    venue.mids.set("aapl-yes", 0.5);
    venue.balances.set("tsla-no", 12.5);
    venue.mids.set("tsla-yes", 0.31);

    expect(await fetchMarketData(venue, [AAPL, TSLA], 3)).toEqual([
      { yesBalance: 5, noBalance: 0, midpoint: 0.5 },
      { yesBalance: 0, noBalance: 12.5, midpoint: 0.31 }
    ]);
  });

  it("marks only the failed field as unknown", async () => {
    const venue = new FakeVenue();
    venue.balances.set("aapl-yes", 5);
    venue.mids.set("aapl-yes", 0.5);
    venue.mids.set("tsla-yes", 0.4);
    venue.failingReads.add("balance:aapl-no");
    venue.failingReads.add("mid:tsla-yes");

    expect(await fetchMarketData(venue, [AAPL, TSLA], 3)).toEqual([
      { yesBalance: 5, noBalance: null, midpoint: 0.5 },
      { yesBalance: 0, noBalance: 0, midpoint: null }
    ]);
  });

  it("treats a zero midpoint as unknown", async () => {
    const venue = new FakeVenue();
    venue.mids.set("aapl-yes", 0);

    expect(await fetchMarketData(venue, [AAPL], 3)).toEqual([
      { yesBalance: 0, noBalance: 0, midpoint: null }
    ]);
  });

  it("caps the number of reads in flight", async () => {
    const venue = new FakeVenue();
    venue.readDelayMs = 5;

    await fetchMarketData(venue, [AAPL, TSLA], 3);

    expect(venue.maxInFlight).toBe(3);
  });
});
