// Interface étroite vers la venue d'exécution + parsing des réponses brutes du CLOB
import { fromMicro } from "../lib/amounts";

export type OrderSide = "BUY" | "SELL";

export type LimitOrder = {
  tokenId: string;
  price: number;
  size: number;
  side: OrderSide;
  tickSize: string;
  negRisk: boolean;
};

/**
 * Ce que le cœur consomme de la venue. Les méthodes throw en cas d'échec.
 */
export interface ExecutionVenue {
  placeLimitOrder(order: LimitOrder): Promise<string>;
  cancelOrders(orderIds: string[]): Promise<void>;
  cancelAll(): Promise<void>;
  getBalance(tokenId: string): Promise<number>;
  getMidpoint(tokenId: string): Promise<number | null>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

/**
 * Message d'erreur d'une réponse CLOB ({ error }, { errorMsg }) ou undefined
 */
export function venueErrorMessage(resp: unknown): string | undefined {
  if (!isRecord(resp)) return undefined;
  const direct = readString(resp, "errorMsg") ?? readString(resp, "error");
  if (direct) return direct;
  const nested = resp["error"];
  if (isRecord(nested)) {
    return readString(nested, "error") ?? readString(nested, "message") ?? JSON.stringify(nested);
  }
  return undefined;
}

/**
 * Extrait l'orderID d'une réponse postOrder. Throw si la venue a rejeté l'ordre.
 */
export function parseOrderId(resp: unknown): string {
  if (isRecord(resp)) {
    const orderId = readString(resp, "orderID") ?? readString(resp, "orderId") ?? readString(resp, "id");
    if (orderId && resp["success"] !== false) {
      return orderId;
    }
  }
  throw new Error(venueErrorMessage(resp) ?? `order rejected: ${JSON.stringify(resp)}`);
}

/**
 * Midpoint depuis { mid: "0.515" }. null si absent ou <= 0.
 */
export function parseMidpoint(resp: unknown): number | null {
  if (!isRecord(resp)) return null;
  const error = venueErrorMessage(resp);
  if (error) {
    throw new Error(error);
  }
  const raw = readString(resp, "mid");
  if (raw === undefined) return null;
  const mid = parseFloat(raw);
  return Number.isFinite(mid) && mid > 0 ? mid : null;
}

/**
 * Balance en shares depuis { balance: "12340000" } (6 décimales)
 */
export function parseBalance(resp: unknown): number {
  if (!isRecord(resp)) {
    throw new Error(`unexpected balance response: ${JSON.stringify(resp)}`);
  }
  const raw = readString(resp, "balance");
  if (raw === undefined) {
    throw new Error(venueErrorMessage(resp) ?? `missing balance: ${JSON.stringify(resp)}`);
  }
  return fromMicro(raw);
}

/**
 * Rejet "not enough balance / allowance" : la position a déjà été vendue ou réglée
 */
const BALANCE_REJECTIONS = ["not enough balance", "insufficient balance", "allowance"];

export function isBalanceError(message: string): boolean {
  const lower = message.toLowerCase();
  return BALANCE_REJECTIONS.some(phrase => lower.includes(phrase));
}
