// Shared fixtures for the unit tests

import { vi } from 'vitest';
import { enhancedTransactionSchema } from '../src/types/helius.js';
import type {
  AlertConfig,
  AlertDecision,
  AssetSnapshot,
  EnhancedTransaction,
  ScreeningConfig,
  ValuationLookup,
} from '../src/types/index.js';

export const WALLET_A = '11111111111111111111111111111111';
export const WALLET_B = 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA';
export const WALLET_C = 'ComputeBudget111111111111111111111111111111';
export const WALLET_D = 'SysvarRent111111111111111111111111111111111';
export const WALLET_E = 'Vote111111111111111111111111111111111111111';

export const TOKEN = 'MemeToken1111111111111111111111111111111111';
export const RAYDIUM_AMM = '675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSdgbctX';

/**
 * Build an enhanced transaction through the wire schema so defaults
 * are filled the same way as for real payloads
 */
export function makeTx(fields: Record<string, unknown>): EnhancedTransaction {
  return enhancedTransactionSchema.parse({
    signature: 'sig-default',
    type: 'SWAP',
    source: 'RAYDIUM',
    feePayer: '',
    ...fields,
  });
}

/**
 * A swap where `wallet` pays `sol` SOL and receives `amount` of `mint`
 */
export function makeSwapTx(
  signature: string,
  wallet: string,
  options: { mint?: string; sol?: number; amount?: number; type?: string } = {}
): EnhancedTransaction {
  const { mint = TOKEN, sol = 1, amount = 1000, type = 'SWAP' } = options;
  return makeTx({
    signature,
    type,
    feePayer: wallet,
    nativeTransfers: [
      { fromUserAccount: wallet, toUserAccount: 'PoolVault', amount: sol * 1e9 },
    ],
    tokenTransfers: [
      { fromUserAccount: 'PoolVault', toUserAccount: wallet, mint, tokenAmount: amount },
    ],
  });
}

export function makeSnapshot(overrides: Partial<AssetSnapshot> = {}): AssetSnapshot {
  return {
    asset: TOKEN,
    symbol: 'MEME',
    name: 'Meme Token',
    marketValuation: 100_000,
    priceUsd: 0.0001,
    liquidityUsd: 20_000,
    volume24h: 50_000,
    buys24h: 100,
    sells24h: 50,
    priceChange24h: 5,
    pairAddress: 'PairAddress',
    dexId: 'raydium',
    ...overrides,
  };
}

export function makeAlertConfig(overrides: Partial<AlertConfig> = {}): AlertConfig {
  return {
    threshold: 3,
    timeWindowMs: 20_000,
    cooldownMs: 300_000,
    bullishWindowMs: 1_800_000,
    blackoutHours: [],
    blackoutExtraThreshold: 1,
    localUtcOffsetHours: 0,
    processedIdCapacity: 1000,
    ...overrides,
  };
}

export function makeScreeningConfig(overrides: Partial<ScreeningConfig> = {}): ScreeningConfig {
  return {
    maxMarketCap: 700_000,
    minVolume24h: 10_000,
    minTxns24h: 15,
    minBuyValueUsd: 5,
    minLiquidity: 5_000,
    excludedTokens: ['So11111111111111111111111111111111111111112'],
    excludedSymbols: ['SOL', 'USDC'],
    ...overrides,
  };
}

export function makeDecision(overrides: Partial<AlertDecision> = {}): AlertDecision {
  return {
    id: 'alert-1',
    asset: TOKEN,
    symbol: 'MEME',
    wallets: [
      { wallet: WALLET_A, nativeSpent: 1, valuationAtPurchase: 100_000 },
      { wallet: WALLET_B, nativeSpent: 2, valuationAtPurchase: 100_000 },
      { wallet: WALLET_C, nativeSpent: 0.5, valuationAtPurchase: 100_000 },
    ],
    snapshot: makeSnapshot(),
    streakPosition: 1,
    isBullish: false,
    baselineValuation: 100_000,
    effectiveThreshold: 3,
    decidedAt: 1_700_000_000_000,
    ...overrides,
  };
}

/**
 * Valuation lookup whose snapshot can be swapped between calls
 */
export function fakeValuation(snapshot: AssetSnapshot | null = makeSnapshot(), solPrice = 100) {
  const state = { snapshot, solPrice };
  const lookup = {
    getAssetSnapshot: vi.fn(async (_asset: string) => state.snapshot),
    getNativePriceUsd: vi.fn(async () => state.solPrice),
  } satisfies ValuationLookup;
  return { lookup, state };
}

/**
 * Manually advanced clock
 */
export function fakeClock(start = 1_700_000_000_000) {
  const clock = {
    time: start,
    now: () => clock.time,
    advance: (ms: number) => {
      clock.time += ms;
    },
  };
  return clock;
}
