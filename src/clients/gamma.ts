// src/clients/gamma.ts - Discovery des marchés quotidiens "Up or Down" via la Gamma API
import axios from "axios";
import { rootLog } from "../logger";
import { errorMessage } from "../lib/errors";
import { zonedClock } from "../lib/schedule";
import { GAMMA_API_URL, MARKETS, TICKERS } from "../config";
import type { Market } from "../core/types";

const log = rootLog.child({ name: "gamma" });

const MARKET_TIMEZONE = "America/New_York";

// Champs utilisés d'un marché Gamma (le reste est ignoré)
export type GammaMarket = {
  conditionId?: string | null;
  question?: string | null;
  clobTokenIds?: string[] | string | null; // ["yesId", "noId"] ou string JSON
  rewardsMaxSpread?: number | string | null; // en cents
  rewardsMinSize?: number | string | null;
  orderPriceMinTickSize?: number | string | null;
  negRisk?: boolean | null;
};

export type GammaEvent = {
  title?: string | null;
  slug?: string | null;
  markets?: GammaMarket[] | null;
};

// Utilitaire pour normaliser les clobTokenIds
export function normalizeClobTokenIds(raw: unknown): { yes: string; no: string } | null {
  if (Array.isArray(raw) && raw.length >= 2 && typeof raw[0] === "string" && typeof raw[1] === "string") {
    return { yes: raw[0].trim(), no: raw[1].trim() };
  }
  if (typeof raw === "string") {
    const s = raw.trim();
    if (s.startsWith("[") && s.endsWith("]")) {
      try {
        const arr: unknown = JSON.parse(s);
        return normalizeClobTokenIds(arr);
      } catch (error: unknown) {
        log.debug({ raw: s, error: errorMessage(error) }, "clobTokenIds is not valid JSON");
      }
    }
    if (s.includes(",")) {
      const [a, b] = s.split(",").map(t => t.trim().replace(/^\[?"|"\]?$/g, ""));
      if (a && b) return { yes: a, no: b };
    }
  }
  return null;
}

function toNumber(raw: number | string | null | undefined): number {
  const value = typeof raw === "number" ? raw : parseFloat(raw ?? "");
  return Number.isFinite(value) ? value : 0;
}

/**
 * Slug de l'event quotidien : {ticker}-up-or-down-on-{month}-{day}-{year} (date ET)
 */
export function buildDailySlug(ticker: string, now: Date = new Date()): string {
  const clock = zonedClock(now, MARKET_TIMEZONE);
  return `${ticker.toLowerCase()}-up-or-down-on-${clock.monthName}-${clock.day}-${clock.year}`;
}

/**
 * Convertit un event Gamma en Market (premier marché de l'event). null si inexploitable.
 */
export function parseGammaEvent(label: string, event: GammaEvent): Market | null {
  const markets = event.markets ?? [];
  if (markets.length === 0) {
    log.warn({ label, title: event.title }, "⚠️ Event has no markets");
    return null;
  }

  const mkt = markets[0];
  const ids = normalizeClobTokenIds(mkt.clobTokenIds);
  if (!ids) {
    log.warn({ label, clobTokenIds: mkt.clobTokenIds }, "⚠️ Could not parse clobTokenIds");
    return null;
  }

  // rewardsMaxSpread est en cents → unités de prix
  const maxIncentiveSpread = toNumber(mkt.rewardsMaxSpread) / 100;
  const tick = mkt.orderPriceMinTickSize;

  return {
    ticker: label,
    question: event.title || mkt.question || "",
    conditionId: mkt.conditionId || "",
    yesTokenId: ids.yes,
    noTokenId: ids.no,
    maxIncentiveSpread,
    minIncentiveSize: toNumber(mkt.rewardsMinSize),
    tickSize: tick !== null && tick !== undefined && String(tick) !== "" ? String(tick) : "0.01",
    negRisk: mkt.negRisk === true
  };
}

/**
 * Récupère un event par slug. null si 404 ou erreur (loggée).
 */
export async function fetchEventBySlug(slug: string): Promise<GammaEvent | null> {
  const url = `${GAMMA_API_URL}/events/slug/${slug}`;
  log.info({ url }, "Fetching Gamma event");

  try {
    const { data } = await axios.get<GammaEvent>(url, { timeout: 15000 });
    return data;
  } catch (error: unknown) {
    if (axios.isAxiosError(error) && error.response?.status === 404) {
      log.warn({ slug }, "⚠️ No event found");
      return null;
    }
    log.error({ slug, error: errorMessage(error) }, "❌ Gamma API request failed");
    return null;
  }
}

export type DiscoveryRequest = {
  tickers: string[];
  slugs: string[];
  now?: Date;
};

/**
 * Trouve les marchés du jour pour chaque ticker, plus les slugs explicites
 */
export async function discoverMarkets(
  request: DiscoveryRequest = { tickers: TICKERS, slugs: MARKETS },
  fetchEvent: (slug: string) => Promise<GammaEvent | null> = fetchEventBySlug
): Promise<Market[]> {
  const targets = [
    ...request.tickers.map(ticker => ({ label: ticker, slug: buildDailySlug(ticker, request.now) })),
    ...request.slugs.map(slug => ({ label: slug, slug }))
  ];

  const found: Market[] = [];
  for (const target of targets) {
    const event = await fetchEvent(target.slug);
    if (!event) continue;

    const market = parseGammaEvent(target.label, event);
    if (!market) continue;

    found.push(market);
    log.info({
      ticker: market.ticker,
      question: market.question,
      spread: market.maxIncentiveSpread.toFixed(3),
      minSize: market.minIncentiveSize,
      tick: market.tickSize
    }, "✅ Market found");
  }

  return found;
}
