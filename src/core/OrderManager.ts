// Order Manager - Placement / annulation avec fallback, jamais de throw vers le cycle
import { rootLog, shortId } from "../logger";
import { errorMessage } from "../lib/errors";
import { isBalanceError, type ExecutionVenue, type LimitOrder } from "../clients/venue";
import { DRY_RUN } from "../config";

const log = rootLog.child({ name: "order" });

export type PlaceResult =
  | { success: true; orderId: string }
  | { success: false; error: string; balanceError: boolean };

/**
 * Étape d'annulation. Les étapes sont tentées dans l'ordre, la première qui réussit gagne.
 */
export type CancelStep = {
  name: string;
  // true si l'étape annule tout le compte (pas seulement les ids donnés)
  accountWide: boolean;
  run: (orderIds: string[]) => Promise<void>;
};

export type CancelResult =
  | { success: true; step: string; accountWide: boolean }
  | { success: false; error: string };

/**
 * Bulk cancel des ids, puis cancel-all du compte en dernier recours
 */
export function bulkThenCancelAll(venue: ExecutionVenue): CancelStep[] {
  return [
    { name: "bulk_cancel", accountWide: false, run: ids => venue.cancelOrders(ids) },
    { name: "cancel_all", accountWide: true, run: () => venue.cancelAll() }
  ];
}

export async function runCancelSteps(
  steps: CancelStep[],
  orderIds: string[],
  label: string
): Promise<CancelResult> {
  let lastError = "no cancel step";

  for (const step of steps) {
    try {
      await step.run(orderIds);
      log.info({ label, step: step.name, count: orderIds.length }, "🗑️ Orders cancelled");
      return { success: true, step: step.name, accountWide: step.accountWide };
    } catch (error: unknown) {
      lastError = errorMessage(error);
      log.error({ label, step: step.name, error: lastError }, "❌ Cancel step failed");
    }
  }

  return { success: false, error: lastError };
}

export type OrderManagerOptions = {
  dryRun?: boolean;
  cancelSteps?: CancelStep[];
};

export class OrderManager {
  private venue: ExecutionVenue;
  private dryRun: boolean;
  private cancelSteps: CancelStep[];
  private dryRunCounter = 0;

  // Incrémenté à chaque cancel qui a touché tout le compte
  private accountWideCancels = 0;

  // Plus aucun placement une fois l'arrêt demandé (les cancels restent permis)
  private halted = false;

  constructor(venue: ExecutionVenue, options: OrderManagerOptions = {}) {
    this.venue = venue;
    this.dryRun = options.dryRun ?? DRY_RUN;
    this.cancelSteps = options.cancelSteps ?? bulkThenCancelAll(venue);
    log.info({ dryRun: this.dryRun }, "📋 Order Manager initialized");
  }

  /**
   * Place un ordre limite GTC. Les échecs sont loggés et retournés, jamais throw.
   */
  async placeOrder(order: LimitOrder, label: string): Promise<PlaceResult> {
    log.info({
      label,
      tokenId: shortId(order.tokenId, 20),
      side: order.side,
      price: order.price.toFixed(4),
      size: order.size.toFixed(2)
    }, "📤 Placing order");

    if (this.halted) {
      log.warn({ label }, "⏸️ Shutting down: order NOT placed");
      return { success: false, error: "order manager halted", balanceError: false };
    }

    if (this.dryRun) {
      this.dryRunCounter += 1;
      const orderId = `dry-run-${this.dryRunCounter}`;
      log.info({ label, orderId }, "🔵 DRY RUN: order NOT placed");
      return { success: true, orderId };
    }

    try {
      const orderId = await this.venue.placeLimitOrder(order);
      log.info({
        label,
        orderId: shortId(orderId),
        side: order.side,
        price: order.price.toFixed(4),
        size: order.size.toFixed(2)
      }, "✅ Order placed");
      return { success: true, orderId };
    } catch (error: unknown) {
      const message = errorMessage(error);
      const balanceError = isBalanceError(message);
      log.error({ label, side: order.side, price: order.price.toFixed(4), error: message, balanceError }, "❌ Order failed");
      return { success: false, error: message, balanceError };
    }
  }

  /**
   * Annule des ordres (bulk puis cancel-all en fallback)
   */
  async cancelOrders(orderIds: string[], label: string): Promise<CancelResult> {
    if (orderIds.length === 0) {
      return { success: true, step: "noop", accountWide: false };
    }

    log.info({ label, orderIds: orderIds.map(id => shortId(id)) }, "🗑️ Canceling orders");

    if (this.dryRun) {
      log.info({ label }, "🔵 DRY RUN: orders NOT cancelled");
      return { success: true, step: "dry_run", accountWide: false };
    }

    const result = await runCancelSteps(this.cancelSteps, orderIds, label);
    if (result.success && result.accountWide) {
      this.accountWideCancels += 1;
      log.warn({ label }, "⚠️ Fallback cancel-all hit every order of the account");
    }
    return result;
  }

  /**
   * Refuse tout placement à partir de maintenant
   */
  halt() {
    this.halted = true;
  }

  /**
   * Nombre de cancel-all déclenchés depuis le démarrage
   */
  getAccountWideCancels(): number {
    return this.accountWideCancels;
  }
}
