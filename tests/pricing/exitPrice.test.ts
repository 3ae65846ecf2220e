import { describe, expect, it } from "vitest";
import {
  adverseMove,
  computeExitPrice,
  escalationProgress,
  isStopLossTriggered
} from "../../src/pricing/exitPrice";
import { makeMarket, TEST_PARAMS } from "../helpers/fakeVenue";

const T0 = 1_700_000_000_000;
const market = makeMarket();

describe("escalationProgress", () => {
  it("goes linearly from 0 to 1 over the horizon", () => {
    expect(escalationProgress(T0, T0, TEST_PARAMS)).toBe(0);
    expect(escalationProgress(T0, T0 + 900_000, TEST_PARAMS)).toBe(0.5);
    expect(escalationProgress(T0, T0 + 3_600_000, TEST_PARAMS)).toBe(1);
  });
});

describe("computeExitPrice", () => {
  it("starts at cost plus half spread for YES", () => {
    expect(computeExitPrice(market, 0.5, T0, 0.5, 0.46, "YES", T0, TEST_PARAMS)).toBe(0.5);
  });

  it("escalates toward breakeven", () => {
    expect(computeExitPrice(market, 0.5, T0, 0.5, 0.46, "YES", T0 + 900_000, TEST_PARAMS)).toBe(0.48);
    expect(computeExitPrice(market, 0.5, T0, 0.5, 0.46, "YES", T0 + 1_800_000, TEST_PARAMS)).toBe(0.46);
    expect(computeExitPrice(market, 0.5, T0, 0.5, 0.46, "YES", T0 + 7_200_000, TEST_PARAMS)).toBe(0.46);
  });

  it("prices NO exits from the ask in NO space", () => {
    expect(computeExitPrice(market, 0.5, T0, 0.5, 0.54, "NO", T0, TEST_PARAMS)).toBe(0.5);
    expect(computeExitPrice(market, 0.5, T0, 0.5, 0.54, "NO", T0 + 900_000, TEST_PARAMS)).toBe(0.48);
  });

  it("exits at the current mid once the stop-loss triggers", () => {
    expect(computeExitPrice(market, 0.47, T0, 0.5, 0.46, "YES", T0, TEST_PARAMS)).toBe(0.47);
    expect(computeExitPrice(market, 0.53, T0, 0.5, 0.54, "NO", T0, TEST_PARAMS)).toBe(0.47);
  });

  it("clamps to the tradable range", () => {
    expect(computeExitPrice(market, 0.9, T0, 0.9, 0.99, "YES", T0, TEST_PARAMS)).toBe(0.99);
  });
});

describe("stop-loss", () => {
  it("measures adverse moves per side", () => {
    expect(adverseMove(0.5, 0.47, "YES")).toBeCloseTo(0.06, 10);
    expect(adverseMove(0.5, 0.53, "NO")).toBeCloseTo(0.06, 10);
    expect(adverseMove(0, 0.5, "YES")).toBe(0);
  });

  it("ignores favourable moves", () => {
    expect(isStopLossTriggered(0.5, 0.55, "YES", TEST_PARAMS)).toBe(false);
    expect(isStopLossTriggered(0.5, 0.45, "NO", TEST_PARAMS)).toBe(false);
    expect(isStopLossTriggered(0.5, 0.47, "YES", TEST_PARAMS)).toBe(true);
  });
});
