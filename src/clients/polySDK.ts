// Wrapper autour du SDK officiel Polymarket, exposé comme ExecutionVenue
import {
  AssetType,
  Chain,
  ClobClient,
  OrderType,
  Side,
  type ApiKeyCreds,
  type TickSize
} from "@polymarket/clob-client";
import { SignatureType } from "@polymarket/order-utils";
import { Wallet } from "@ethersproject/wallet";
import { rootLog, shortId } from "../logger";
import { errorMessage } from "../lib/errors";
import {
  parseBalance,
  parseMidpoint,
  parseOrderId,
  venueErrorMessage,
  type ExecutionVenue,
  type LimitOrder
} from "./venue";

const log = rootLog.child({ name: "poly-sdk" });

const VALID_TICK_SIZES: readonly TickSize[] = ["0.1", "0.01", "0.001", "0.0001"];

export function toTickSize(value: string): TickSize {
  const match = VALID_TICK_SIZES.find(t => t === value || parseFloat(t) === parseFloat(value));
  if (!match) {
    throw new Error(`unsupported tick size: ${value}`);
  }
  return match;
}

export type PolyClientOptions = {
  privateKey: string;
  creds: ApiKeyCreds;
  host: string;
  funderAddress?: string;
};

/**
 * Signature POLY_GNOSIS_SAFE si un proxy/funder distinct de l'EOA est fourni, sinon EOA
 */
export function resolveSignatureType(eoaAddress: string, funderAddress?: string): SignatureType {
  return funderAddress && funderAddress.toLowerCase() !== eoaAddress.toLowerCase()
    ? SignatureType.POLY_GNOSIS_SAFE
    : SignatureType.EOA;
}

/**
 * Dérive (ou crée) les credentials L2 depuis la clé privée
 */
export async function deriveApiCreds(privateKey: string, host: string): Promise<ApiKeyCreds> {
  const wallet = new Wallet(privateKey);
  const client = new ClobClient(host, Chain.POLYGON, wallet);
  const creds = await client.createOrDeriveApiKey();
  if (!creds?.key || !creds.secret || !creds.passphrase) {
    throw new Error("Failed to derive API credentials");
  }
  return creds;
}

/**
 * Midpoint via l'API publique (pas de signer ni de credentials)
 */
export async function fetchPublicMidpoint(host: string, tokenId: string): Promise<number | null> {
  const client = new ClobClient(host, Chain.POLYGON);
  const response: unknown = await client.getMidpoint(tokenId);
  return parseMidpoint(response);
}

/**
 * Client CLOB basé sur le SDK officiel Polymarket
 */
export class PolyClobClient implements ExecutionVenue {
  private client: ClobClient;
  private wallet: Wallet;
  private proxyAddress: string;
  private eoaAddress: string;

  constructor(options: PolyClientOptions) {
    this.wallet = new Wallet(options.privateKey);
    this.eoaAddress = this.wallet.address;
    this.proxyAddress = options.funderAddress || this.eoaAddress;

    const signatureType = resolveSignatureType(this.eoaAddress, options.funderAddress);

    log.info({
      eoaAddress: this.eoaAddress,
      proxyAddress: this.proxyAddress,
      baseURL: options.host,
      signatureTypeLabel: signatureType === SignatureType.POLY_GNOSIS_SAFE ? "POLY_GNOSIS_SAFE" : "EOA"
    }, "🚀 Initializing Polymarket SDK Client");

    this.client = new ClobClient(
      options.host,
      Chain.POLYGON,
      this.wallet,
      options.creds,
      signatureType,
      options.funderAddress
    );
  }

  /**
   * Crée, signe et poste un ordre limite GTC. Retourne l'orderID.
   */
  async placeLimitOrder(order: LimitOrder): Promise<string> {
    try {
      const signedOrder = await this.client.createOrder(
        {
          tokenID: order.tokenId,
          price: order.price,
          size: order.size,
          side: order.side === "BUY" ? Side.BUY : Side.SELL
        },
        { tickSize: toTickSize(order.tickSize), negRisk: order.negRisk }
      );

      const response: unknown = await this.client.postOrder(signedOrder, OrderType.GTC);
      return parseOrderId(response);
    } catch (error: unknown) {
      log.error({
        tokenId: shortId(order.tokenId, 20),
        side: order.side,
        price: order.price,
        size: order.size,
        error: errorMessage(error)
      }, "❌ Failed to place order");
      throw error;
    }
  }

  /**
   * Annule des ordres par id
   */
  async cancelOrders(orderIds: string[]): Promise<void> {
    const response: unknown = await this.client.cancelOrders(orderIds);
    const error = venueErrorMessage(response);
    if (error) {
      throw new Error(error);
    }
  }

  /**
   * Annule tous les ordres du compte
   */
  async cancelAll(): Promise<void> {
    const response: unknown = await this.client.cancelAll();
    const error = venueErrorMessage(response);
    if (error) {
      throw new Error(error);
    }
  }

  /**
   * Balance d'un token conditionnel, en shares
   */
  async getBalance(tokenId: string): Promise<number> {
    const response: unknown = await this.client.getBalanceAllowance({
      asset_type: AssetType.CONDITIONAL,
      token_id: tokenId
    });
    return parseBalance(response);
  }

  async getMidpoint(tokenId: string): Promise<number | null> {
    const response: unknown = await this.client.getMidpoint(tokenId);
    return parseMidpoint(response);
  }

  /**
   * Balance USDC (collateral) disponible pour trader
   */
  async getCollateralBalance(): Promise<number> {
    const response: unknown = await this.client.getBalanceAllowance({
      asset_type: AssetType.COLLATERAL
    });
    return parseBalance(response);
  }

  /**
   * Rafraîchit les allowances mises en cache côté CLOB pour chaque token
   */
  async refreshAllowances(tokenIds: string[]): Promise<void> {
    try {
      await this.client.updateBalanceAllowance({ asset_type: AssetType.COLLATERAL });
    } catch (error: unknown) {
      log.warn({ error: errorMessage(error) }, "⚠️ Collateral allowance refresh failed");
    }

    for (const tokenId of tokenIds) {
      try {
        await this.client.updateBalanceAllowance({
          asset_type: AssetType.CONDITIONAL,
          token_id: tokenId
        });
      } catch (error: unknown) {
        log.warn({ tokenId: shortId(tokenId, 20), error: errorMessage(error) }, "⚠️ Allowance refresh failed");
      }
    }

    log.info({ tokens: tokenIds.length }, "✅ Allowances refreshed");
  }

  /**
   * Retourne l'adresse EOA
   */
  getAddress(): string {
    return this.eoaAddress;
  }

  /**
   * Retourne l'adresse du maker (proxy ou EOA)
   */
  getMakerAddress(): string {
    return this.proxyAddress;
  }
}
