// Cycle Processor - Machine à états par marché : quoting asymétrique + sorties d'inventaire
//
// Ordre d'un cycle :
//   1. balances inconnues avec inventaire suivi → rien
//   2. mid inconnu → rien
//   3. mid sous le seuil quotable → cancel de tout, marché parqué
//   4. détection des transitions d'inventaire
//   5. quotes : bid voulu tant que YES < dust, ask voulu tant que NO < dust
//   6. sorties : prix escaladé vers le breakeven, borné par le stop-loss
import { rootLog, shortId } from "../logger";
import { truncateShares } from "../lib/amounts";
import { QUOTING_PARAMS, type QuotingParams } from "../config";
import { computeQuotes, computeSize, noPriceForAsk } from "../pricing/quotes";
import { computeExitPrice, isStopLossTriggered } from "../pricing/exitPrice";
import { hasDrifted, isPinRisk, midDrift } from "../risk/pinGuard";
import { OrderManager } from "./OrderManager";
import {
  clearOrders,
  hasActiveExits,
  openOrderIds,
  type QuotedMarket
} from "./QuotedMarket";
import { OUTCOME_SIDES, tokenIdFor, type MarketData, type OutcomeSide } from "./types";

const log = rootLog.child({ name: "cycle" });

// Tolérance flottante pour comparer un écart de prix à un tick
const PRICE_EPSILON = 1e-9;

export class CycleProcessor {
  private orders: OrderManager;
  private params: QuotingParams;

  constructor(orders: OrderManager, params: QuotingParams = QUOTING_PARAMS) {
    this.orders = orders;
    this.params = params;
  }

  /**
   * Traite un cycle pour un marché. Mute et retourne l'état (toujours valide).
   */
  async processCycle(state: QuotedMarket, data: MarketData, now: number = Date.now()): Promise<QuotedMarket> {
    const { market } = state;
    const { yesBalance, noBalance, midpoint } = data;

    // 1. Lecture de balance échouée : ne pas toucher aux sorties sur une erreur transitoire
    if (yesBalance === null || noBalance === null) {
      if (hasActiveExits(state) || state.inventorySince !== null) {
        log.warn({
          ticker: market.ticker,
          yesBalance,
          noBalance
        }, "⏸️ Balances unknown while holding inventory - SKIPPING");
        return state;
      }
    }

    // 2. Pas de mid, pas de prix
    if (midpoint === null) {
      log.warn({ ticker: market.ticker }, "⏸️ Midpoint unknown - SKIPPING");
      return state;
    }

    // 3. Trop près de 0 pour quoter deux côtés
    if (isPinRisk(midpoint, this.params)) {
      await this.park(state, midpoint);
      return state;
    }

    // Balance inconnue alors qu'on est flat : on la considère vide ce cycle
    const balances: Record<OutcomeSide, number> = {
      YES: yesBalance ?? 0,
      NO: noBalance ?? 0
    };
    const holdsYes = balances.YES >= this.params.dustShares;
    const holdsNo = balances.NO >= this.params.dustShares;

    log.info({
      ticker: market.ticker,
      mid: midpoint.toFixed(4),
      openMid: state.midAtPlacement.toFixed(4),
      drift: (midDrift(state.midAtPlacement, midpoint) * 100).toFixed(1) + "%",
      yes: balances.YES.toFixed(2),
      no: balances.NO.toFixed(2)
    }, "🔄 Processing market");

    // 4. Transitions d'inventaire
    await this.trackInventory(state, holdsYes || holdsNo, midpoint, now);

    // 5. Quotes asymétriques
    await this.manageQuotes(state, holdsYes, holdsNo, midpoint);

    // 6. Sorties
    if (state.inventorySince !== null) {
      await this.manageExits(state, balances, midpoint, now);
    }

    return state;
  }

  /**
   * Annule des ordres du marché. Si le fallback cancel-all a frappé,
   * tous les ordres de ce marché sont oubliés.
   */
  private async cancel(state: QuotedMarket, orderIds: string[], label: string): Promise<boolean> {
    const result = await this.orders.cancelOrders(orderIds, label);
    if (!result.success) {
      return false;
    }
    if (result.accountWide) {
      clearOrders(state);
    }
    return true;
  }

  private async park(state: QuotedMarket, midpoint: number) {
    const ids = openOrderIds(state);
    log.warn({
      ticker: state.market.ticker,
      mid: midpoint.toFixed(4),
      minQuotableMid: this.params.minQuotableMid,
      openOrders: ids.length
    }, "🅿️ Midpoint below quotable threshold - parking market");

    if (ids.length === 0) return;

    if (await this.cancel(state, ids, `${state.market.ticker} park`)) {
      clearOrders(state);
    }
  }

  private async trackInventory(state: QuotedMarket, holding: boolean, midpoint: number, now: number) {
    const { market } = state;

    if (holding && state.inventorySince === null) {
      state.inventorySince = now;
      state.entryMid = midpoint;
      log.info({
        ticker: market.ticker,
        entryMid: midpoint.toFixed(4),
        entryBid: state.entryBidPrice,
        entryAsk: state.entryAskPrice
      }, "📦 Inventory detected");
    } else if (!holding && state.inventorySince !== null) {
      log.info({
        ticker: market.ticker,
        heldFor: ((now - state.inventorySince) / 1000).toFixed(0) + "s"
      }, "✅ Inventory cleared");
      state.inventorySince = null;
      state.entryMid = null;
      state.exits.YES.cooldownUntil = null;
      state.exits.NO.cooldownUntil = null;
    }

    if (holding) return;

    // Flat : toute sortie encore connue est périmée (fill déjà passé, lecture en retard...)
    const stale = [state.exits.YES.orderId, state.exits.NO.orderId].filter((id): id is string => id !== null);
    if (stale.length === 0) return;

    if (await this.cancel(state, stale, `${market.ticker} stale exits`)) {
      for (const side of OUTCOME_SIDES) {
        state.exits[side].orderId = null;
        state.exits[side].price = null;
      }
    }
  }

  private async manageQuotes(state: QuotedMarket, holdsYes: boolean, holdsNo: boolean, midpoint: number) {
    const { market } = state;
    const wantBid = !holdsYes;
    const wantAsk = !holdsNo;

    // Côtés non voulus : on arrête d'ajouter à une exposition déjà tenue
    const unwanted: string[] = [];
    if (!wantBid && state.bidOrderId) unwanted.push(state.bidOrderId);
    if (!wantAsk && state.askOrderId) unwanted.push(state.askOrderId);
    if (unwanted.length > 0) {
      log.info({ ticker: market.ticker, cancelBid: !wantBid, cancelAsk: !wantAsk }, "🛑 Cancelling quotes on held side");
      if (await this.cancel(state, unwanted, `${market.ticker} held side`)) {
        if (!wantBid) state.bidOrderId = null;
        if (!wantAsk) state.askOrderId = null;
      }
    }

    // Refresh sur dérive : cancel des deux côtés voulus avant de replacer
    const resting: string[] = [];
    if (wantBid && state.bidOrderId) resting.push(state.bidOrderId);
    if (wantAsk && state.askOrderId) resting.push(state.askOrderId);
    if (resting.length > 0 && hasDrifted(state.midAtPlacement, midpoint, this.params)) {
      log.info({
        ticker: market.ticker,
        openMid: state.midAtPlacement.toFixed(4),
        mid: midpoint.toFixed(4),
        drift: (midDrift(state.midAtPlacement, midpoint) * 100).toFixed(1) + "%"
      }, "🔄 Midpoint drifted, refreshing quotes");

      if (!(await this.cancel(state, resting, `${market.ticker} refresh`))) {
        log.warn({ ticker: market.ticker }, "⚠️ Refresh cancel failed, keeping current quotes");
        return;
      }
      if (wantBid) state.bidOrderId = null;
      if (wantAsk) state.askOrderId = null;
    }

    const placeBid = wantBid && state.bidOrderId === null;
    const placeAsk = wantAsk && state.askOrderId === null;
    if (!placeBid && !placeAsk) {
      log.debug({ ticker: market.ticker }, "Quotes unchanged");
      return;
    }

    const { bid, ask } = computeQuotes(market, midpoint, this.params);
    const size = computeSize(market, this.params);
    let placed = false;

    if (placeBid) {
      const result = await this.orders.placeOrder({
        tokenId: market.yesTokenId,
        price: bid,
        size,
        side: "BUY",
        tickSize: market.tickSize,
        negRisk: market.negRisk
      }, `${market.ticker} BID`);
      if (result.success) {
        state.bidOrderId = result.orderId;
        state.entryBidPrice = bid;
        placed = true;
      }
    }

    if (placeAsk) {
      // BUY NO à (1 - ask) ≡ SELL YES à ask
      const noPrice = noPriceForAsk(market, ask);
      const result = await this.orders.placeOrder({
        tokenId: market.noTokenId,
        price: noPrice,
        size,
        side: "BUY",
        tickSize: market.tickSize,
        negRisk: market.negRisk
      }, `${market.ticker} ASK (BUY NO @ ${noPrice.toFixed(3)} = SELL YES @ ${ask.toFixed(3)})`);
      if (result.success) {
        state.askOrderId = result.orderId;
        state.entryAskPrice = ask;
        placed = true;
      }
    }

    if (placed) {
      state.midAtPlacement = midpoint;
    }
  }

  private async manageExits(
    state: QuotedMarket,
    balances: Record<OutcomeSide, number>,
    midpoint: number,
    now: number
  ) {
    const { market } = state;
    const tick = parseFloat(market.tickSize);
    const inventorySince = state.inventorySince ?? now;
    const entryMid = state.entryMid ?? midpoint;

    for (const side of OUTCOME_SIDES) {
      const slot = state.exits[side];
      const balance = balances[side];
      const label = `${market.ticker}/${side} EXIT`;

      // Ce côté est flat : une sortie encore au repos est périmée
      if (balance < this.params.dustShares) {
        if (slot.orderId && (await this.cancel(state, [slot.orderId], label))) {
          slot.orderId = null;
          slot.price = null;
        }
        continue;
      }

      if (slot.cooldownUntil !== null) {
        if (now < slot.cooldownUntil) {
          log.info({
            label,
            remaining: ((slot.cooldownUntil - now) / 1000).toFixed(0) + "s"
          }, "⏳ Exit cooldown active - SKIPPING");
          continue;
        }
        slot.cooldownUntil = null;
      }

      // Coût de revient inconnu (ex. inventaire trouvé au démarrage) : on ancre sur le mid d'entrée
      const entryPrice = (side === "YES" ? state.entryBidPrice : state.entryAskPrice) ?? entryMid;
      const target = computeExitPrice(market, midpoint, inventorySince, entryMid, entryPrice, side, now, this.params);

      if (slot.orderId !== null) {
        if (slot.price !== null && Math.abs(target - slot.price) < tick - PRICE_EPSILON) {
          continue;
        }
        log.info({
          label,
          orderId: shortId(slot.orderId),
          oldPrice: slot.price,
          newPrice: target.toFixed(4)
        }, "🔄 Repricing exit");
        if (!(await this.cancel(state, [slot.orderId], label))) {
          continue;
        }
        slot.orderId = null;
        slot.price = null;
      }

      const shares = truncateShares(balance);
      if (shares <= 0) continue;

      log.info({
        label,
        balance: balance.toFixed(4),
        shares: shares.toFixed(2),
        price: target.toFixed(4),
        entryPrice: entryPrice.toFixed(4),
        stopLoss: isStopLossTriggered(entryMid, midpoint, side, this.params)
      }, "📤 Exit target computed");

      const result = await this.orders.placeOrder({
        tokenId: tokenIdFor(market, side),
        price: target,
        size: shares,
        side: "SELL",
        tickSize: market.tickSize,
        negRisk: market.negRisk
      }, label);

      if (result.success) {
        slot.orderId = result.orderId;
        slot.price = target;
      } else if (result.balanceError) {
        // Position déjà vendue / réglée entre la lecture et le placement
        slot.cooldownUntil = now + this.params.exitCooldownSeconds * 1000;
        log.info({
          label,
          cooldownSeconds: this.params.exitCooldownSeconds
        }, "ℹ️ Balance/allowance rejection treated as resolved, cooling down");
      }
    }
  }
}
