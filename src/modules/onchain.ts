// ===========================================
// MODULE: ON-CHAIN DATA FETCHING
// Helius (signatures + enhanced transactions) and DexScreener
// (token snapshots + SOL price)
// ===========================================

import axios, { type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { appConfig } from '../config/index.js';
import { ENHANCED_TX_BATCH_SIZE, WSOL_MINT } from '../config/constants.js';
import { logger, short } from '../utils/logger.js';
import { RateLimitedError, errorMessage } from '../utils/errors.js';
import { RateLimiter } from '../utils/rate-limiter.js';
import {
  dexScreenerTokenResponseSchema,
  enhancedTransactionSchema,
  heliusWebhookSchema,
  rpcResponseSchema,
  signatureInfoSchema,
} from '../types/helius.js';
import type {
  AssetSnapshot,
  CallResult,
  ChainDataProvider,
  DexScreenerPair,
  EnhancedTransaction,
  HeliusWebhook,
  TransactionRef,
  ValuationLookup,
} from '../types/index.js';

// ============ HTTP ============

// The subset of an axios instance the clients use
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
  post(url: string, body?: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
  put(url: string, body?: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

const RPC_RATE_LIMIT_CODES = new Set([429, -32429]);

// ============ HELIUS ============

export interface HeliusClientOptions {
  apiKey: string;
  rpcUrl: string;
  apiUrl: string;
  http?: HttpClient;
  limiter?: RateLimiter;
}

export class HeliusClient implements ChainDataProvider {
  private client: HttpClient;
  private limiter: RateLimiter;
  private rpcUrl: string;
  private apiKey: string;
  private apiUrl: string;

  constructor(options: HeliusClientOptions) {
    this.apiKey = options.apiKey;
    this.apiUrl = options.apiUrl.replace(/\/+$/, '');

    // Helius RPC URL format: https://mainnet.helius-rpc.com/?api-key=YOUR_KEY
    let rpcUrl = options.rpcUrl;
    if (!rpcUrl.includes('api-key=')) {
      const separator = rpcUrl.includes('?') ? '&' : '?';
      rpcUrl = `${rpcUrl}${separator}api-key=${this.apiKey}`;
    }
    this.rpcUrl = rpcUrl;

    this.client = options.http ?? axios.create({
      headers: { 'Content-Type': 'application/json' },
    });

    // One limiter for both endpoints: Helius counts them against the same key
    this.limiter = options.limiter ?? new RateLimiter({
      serviceName: 'helius',
      minDelayBetweenRequests: 150,
      baseBackoffMs: 2000,
      backoffMultiplier: 2,
      maxBackoff: 30000,
      maxRetries: 3,
    });
  }

  getMaskedRpcUrl(): string {
    return this.rpcUrl.replace(/api-key=([^&]+)/, `api-key=${this.apiKey.slice(0, 4)}...`);
  }

  /**
   * Newest-first signatures for a wallet, stopping at `sinceId` when given
   */
  async getLatestTransactionIds(
    wallet: string,
    limit: number,
    sinceId?: string
  ): Promise<CallResult<TransactionRef[]>> {
    const options: Record<string, unknown> = { limit, commitment: 'confirmed' };
    if (sinceId) {
      options.until = sinceId;
    }

    return this.limiter.execute(async () => {
      const result = await this.rpcCall('getSignaturesForAddress', [wallet, options]);
      const signatures = z.array(signatureInfoSchema).parse(result ?? []);

      return signatures.map(sig => ({
        id: sig.signature,
        occurredAt: typeof sig.blockTime === 'number' ? sig.blockTime * 1000 : null,
        failed: sig.err !== null && sig.err !== undefined,
      }));
    }, 'getSignaturesForAddress');
  }

  /**
   * Parsed transactions from the Enhanced Transactions API, in batches of 100.
   * Any failed batch fails the whole call.
   */
  async getEnhancedTransactions(ids: string[]): Promise<CallResult<EnhancedTransaction[]>> {
    const transactions: EnhancedTransaction[] = [];
    const url = `${this.apiUrl}/transactions?api-key=${this.apiKey}`;

    for (let i = 0; i < ids.length; i += ENHANCED_TX_BATCH_SIZE) {
      const batch = ids.slice(i, i + ENHANCED_TX_BATCH_SIZE);

      const result = await this.limiter.execute(async () => {
        const response = await this.client.post(url, { transactions: batch }, { timeout: 20000 });
        return z.array(z.unknown()).parse(response.data);
      }, 'enhancedTransactions');

      if (!result.ok) return result;

      for (const raw of result.data) {
        const parsed = enhancedTransactionSchema.safeParse(raw);
        if (parsed.success) {
          transactions.push(parsed.data);
        } else {
          logger.debug({ issues: parsed.error.issues.length }, 'Skipping malformed enhanced transaction');
        }
      }
    }

    return { ok: true, data: transactions };
  }

  // ============ WEBHOOKS ============

  async listWebhooks(): Promise<CallResult<HeliusWebhook[]>> {
    return this.limiter.execute(async () => {
      const response = await this.client.get(this.webhooksUrl(), { timeout: 15000 });
      return z.array(heliusWebhookSchema).parse(response.data);
    }, 'listWebhooks');
  }

  /**
   * Point an existing webhook at `webhookUrl` with the current wallet list
   */
  async updateWebhook(
    webhookId: string,
    wallets: string[],
    webhookUrl: string,
    authHeader: string
  ): Promise<CallResult<HeliusWebhook>> {
    return this.limiter.execute(async () => {
      const response = await this.client.put(
        this.webhooksUrl(webhookId),
        this.webhookBody(wallets, webhookUrl, authHeader),
        { timeout: 30000 }
      );
      return heliusWebhookSchema.parse(response.data);
    }, 'updateWebhook');
  }

  async registerWebhook(
    wallets: string[],
    webhookUrl: string,
    authHeader: string
  ): Promise<CallResult<HeliusWebhook>> {
    return this.limiter.execute(async () => {
      const response = await this.client.post(
        this.webhooksUrl(),
        this.webhookBody(wallets, webhookUrl, authHeader),
        { timeout: 30000 }
      );
      return heliusWebhookSchema.parse(response.data);
    }, 'registerWebhook');
  }

  private webhooksUrl(webhookId?: string): string {
    const path = webhookId ? `/webhooks/${encodeURIComponent(webhookId)}` : '/webhooks';
    return `${this.apiUrl}${path}?api-key=${this.apiKey}`;
  }

  private webhookBody(wallets: string[], webhookUrl: string, authHeader: string): Record<string, unknown> {
    const body: Record<string, unknown> = {
      webhookURL: webhookUrl,
      transactionTypes: ['ANY'],
      accountAddresses: wallets,
      webhookType: 'enhanced',
    };
    if (authHeader) {
      body.authHeader = authHeader;
    }
    return body;
  }

  private async rpcCall(method: string, params: unknown[]): Promise<unknown> {
    const response = await this.client.post(
      this.rpcUrl,
      { jsonrpc: '2.0', id: 1, method, params },
      { timeout: 15000 }
    );

    const body = rpcResponseSchema.parse(response.data);
    if (body.error) {
      if (RPC_RATE_LIMIT_CODES.has(body.error.code)) {
        throw new RateLimitedError('helius', `${method}: ${body.error.message}`);
      }
      throw new Error(`${method} RPC error ${body.error.code}: ${body.error.message}`);
    }
    return body.result;
  }
}

// ============ DEXSCREENER ============

export interface DexScreenerClientOptions {
  baseUrl: string;
  http?: HttpClient;
  minRequestIntervalMs?: number;
  now?: () => number;
}

const COINGECKO_SOL_URL = 'https://api.coingecko.com/api/v3/simple/price?ids=solana&vs_currencies=usd';
const coinGeckoSchema = z.object({
  solana: z.object({ usd: z.number() }).optional(),
});

export class DexScreenerClient implements ValuationLookup {
  private client: HttpClient;
  private now: () => number;

  // Rate limiting - DexScreener free tier allows ~300 req/min
  private lastRequestTime = 0;
  private readonly minRequestIntervalMs: number;

  // SOL price changes slowly relative to the polling cadence
  private solPrice: number | null = null;
  private solPriceUpdatedAt = 0;
  private readonly SOL_PRICE_TTL_MS = 60 * 1000;
  static readonly FALLBACK_SOL_PRICE = 180;

  constructor(options: DexScreenerClientOptions) {
    this.client = options.http ?? axios.create({
      baseURL: options.baseUrl,
      timeout: 10000,
    });
    this.minRequestIntervalMs = options.minRequestIntervalMs ?? 250;
    this.now = options.now ?? Date.now;
  }

  /**
   * Wait for rate limit before making request
   */
  private async waitForRateLimit(): Promise<void> {
    const requiredWait = this.minRequestIntervalMs - (Date.now() - this.lastRequestTime);
    if (requiredWait > 0) {
      await new Promise(resolve => setTimeout(resolve, requiredWait));
    }
    this.lastRequestTime = Date.now();
  }

  async getTokenPairs(address: string): Promise<DexScreenerPair[]> {
    await this.waitForRateLimit();
    const response = await this.client.get(`/latest/dex/tokens/${address}`, { timeout: 10000 });
    return dexScreenerTokenResponseSchema.parse(response.data).pairs;
  }

  /**
   * Fresh market snapshot from the deepest Solana pair. Null when DexScreener
   * has no pair for the token or the request fails.
   */
  async getAssetSnapshot(asset: string): Promise<AssetSnapshot | null> {
    let pairs: DexScreenerPair[];
    try {
      pairs = await this.getTokenPairs(asset);
    } catch (error) {
      logger.warn({ asset: short(asset), error: errorMessage(error) }, 'DexScreener token lookup failed');
      return null;
    }

    const pair = pickDeepestPair(pairs);
    if (!pair) return null;

    return {
      asset,
      symbol: pair.baseToken.symbol,
      name: pair.baseToken.name,
      marketValuation: pair.marketCap || pair.fdv,
      priceUsd: pair.priceUsd,
      liquidityUsd: pair.liquidity?.usd ?? 0,
      volume24h: pair.volume?.h24 ?? 0,
      buys24h: Math.trunc(pair.txns?.h24?.buys ?? 0),
      sells24h: Math.trunc(pair.txns?.h24?.sells ?? 0),
      priceChange24h: pair.priceChange?.h24 ?? 0,
      pairAddress: pair.pairAddress,
      dexId: pair.dexId,
    };
  }

  /**
   * SOL/USD from the wSOL pairs, then CoinGecko, then the last known
   * price (or a hard fallback)
   */
  async getNativePriceUsd(): Promise<number> {
    const now = this.now();
    if (this.solPrice !== null && now - this.solPriceUpdatedAt < this.SOL_PRICE_TTL_MS) {
      return this.solPrice;
    }

    const price = await this.fetchSolPrice();
    if (price !== null) {
      this.solPrice = price;
      this.solPriceUpdatedAt = now;
      return price;
    }

    logger.warn({ lastKnown: this.solPrice }, 'SOL price unavailable, using fallback');
    return this.solPrice ?? DexScreenerClient.FALLBACK_SOL_PRICE;
  }

  private async fetchSolPrice(): Promise<number | null> {
    try {
      const pair = pickDeepestPair(await this.getTokenPairs(WSOL_MINT));
      if (pair) {
        const baseSymbol = pair.baseToken.symbol.toUpperCase();
        let price = 0;
        if (baseSymbol === 'SOL' || baseSymbol === 'WSOL') {
          price = pair.priceUsd;
        } else if (pair.priceNative > 0 && pair.priceUsd > 0) {
          // SOL is the quote token
          price = pair.priceUsd / pair.priceNative;
        }
        if (price > 0) return price;
      }
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'DexScreener SOL price failed');
    }

    try {
      const response = await this.client.get(COINGECKO_SOL_URL, { timeout: 10000 });
      const usd = coinGeckoSchema.parse(response.data).solana?.usd ?? 0;
      if (usd > 0) return usd;
    } catch (error) {
      logger.debug({ error: errorMessage(error) }, 'CoinGecko SOL price failed');
    }

    return null;
  }
}

/**
 * Highest-liquidity pair, preferring Solana pairs
 */
export function pickDeepestPair(pairs: DexScreenerPair[]): DexScreenerPair | null {
  const solanaPairs = pairs.filter(p => p.chainId === 'solana');
  const candidates = solanaPairs.length > 0 ? solanaPairs : pairs;
  if (candidates.length === 0) return null;

  return candidates.reduce((best, pair) =>
    (pair.liquidity?.usd ?? 0) > (best.liquidity?.usd ?? 0) ? pair : best
  );
}

// ============ EXPORTS ============

export const heliusClient = new HeliusClient({
  apiKey: appConfig.heliusApiKey,
  rpcUrl: appConfig.heliusRpcUrl,
  apiUrl: appConfig.heliusApiUrl,
});

export const dexScreenerClient = new DexScreenerClient({
  baseUrl: appConfig.dexScreenerApiUrl,
});
