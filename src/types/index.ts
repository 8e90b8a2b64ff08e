// ===========================================
// SOL SMART MONEY ALERTS - TYPE DEFINITIONS
// ===========================================

import type { EnhancedTransaction } from './helius.js';

export type {
  EnhancedTransaction,
  EnhancedInstruction,
  TokenTransfer,
  NativeTransfer,
  SignatureInfo,
  DexScreenerPair,
  HeliusWebhook,
} from './helius.js';

// ============ ENUMS ============

export enum SwapKind {
  SWAP = 'SWAP',
  TRANSFER = 'TRANSFER',
  AIRDROP = 'AIRDROP',         // Batch distribution to many recipients
  NFT_ACTIVITY = 'NFT_ACTIVITY',
  UNCLASSIFIED = 'UNCLASSIFIED' // No whitelisted DEX program found
}

export enum FailureCategory {
  RATE_LIMITED = 'RATE_LIMITED',           // 429 retries exhausted
  TRANSPORT_FAILURE = 'TRANSPORT_FAILURE'  // Network / protocol error, not retried
}

export enum RejectionReason {
  NOT_A_SWAP = 'NOT_A_SWAP',
  EXCLUDED_ASSET = 'EXCLUDED_ASSET',
  EXCLUDED_SYMBOL = 'EXCLUDED_SYMBOL',
  DUPLICATE_WALLET = 'DUPLICATE_WALLET',
  UNKNOWN_ASSET = 'UNKNOWN_ASSET',
  LOW_LIQUIDITY = 'LOW_LIQUIDITY',
  DUST = 'DUST',
  VALUATION_TOO_HIGH = 'VALUATION_TOO_HIGH',
  LOW_VOLUME = 'LOW_VOLUME',
  LOW_TXN_COUNT = 'LOW_TXN_COUNT'
}

export enum ValuationClassification {
  TRASH = 'trash',
  SHORT_LIST = 'short_list',
  CONTRACTS_CHECK = 'contracts_check',
  NOT_SHORT_LIST = 'not_short_list'
}

// ============ PROVIDER RESULTS ============

export type CallResult<T> =
  | { ok: true; data: T }
  | {
      ok: false;
      category: FailureCategory;
      endpoint: string;
      attempts: number;
      message: string;
    };

export interface TransactionRef {
  id: string;
  occurredAt: number | null; // ms since epoch
  failed: boolean;
}

// ============ CLASSIFICATION ============

export type SwapClassification =
  | { kind: SwapKind.SWAP; source: string }
  | {
      kind: SwapKind.TRANSFER | SwapKind.NFT_ACTIVITY | SwapKind.UNCLASSIFIED;
      source: string;
      reason: string;
    }
  | { kind: SwapKind.AIRDROP; source: string; reason: string; recipients: number };

export interface SwapDetails {
  asset: string;
  amountReceived: number;
  nativeSpent: number; // SOL
  source: string;
}

export type SwapExtraction =
  | { valid: true; swap: SwapDetails }
  | { valid: false; kind: SwapKind; source: string; reason: string };

export interface SwapEvent extends SwapDetails {
  wallet: string;
  signature: string;
  observedAt: number;
}

// ============ ASSETS ============

export interface AssetSnapshot {
  asset: string;
  symbol: string;
  name: string;
  marketValuation: number; // USD market cap (falls back to FDV)
  priceUsd: number;
  liquidityUsd: number;
  volume24h: number;
  buys24h: number;
  sells24h: number;
  priceChange24h: number;
  pairAddress: string;
  dexId: string;
}

// ============ ENGINE STATE ============

export interface PurchaseRecord {
  wallet: string;
  nativeSpent: number;
  valuationAtPurchase: number;
  timestamp: number;
  signature: string;
}

export interface AlertState {
  lastAlertAt: number;
  walletCountAtLastAlert: number;
  streakBaselineValuation: number;
  streakCount: number;
}

export interface AlertWallet {
  wallet: string;
  nativeSpent: number;
  valuationAtPurchase: number;
}

export interface AlertDecision {
  id: string;
  asset: string;
  symbol: string;
  wallets: AlertWallet[];
  snapshot: AssetSnapshot;
  streakPosition: number;
  isBullish: boolean;
  baselineValuation: number;
  effectiveThreshold: number;
  decidedAt: number;
}

export type EvaluationOutcome =
  | { status: 'BELOW_THRESHOLD'; uniqueWallets: number; threshold: number }
  | { status: 'COOLDOWN'; uniqueWallets: number; previousWalletCount: number }
  | { status: 'FAKE_ALERT'; reason: string }
  | { status: 'ALERTED'; decision: AlertDecision };

export type IngestOutcome =
  | { status: 'DUPLICATE' }
  | { status: 'REJECTED'; reason: RejectionReason; detail: string }
  | { status: 'ACCEPTED'; record: PurchaseRecord; evaluation: EvaluationOutcome };

export interface PurchaseEvent {
  wallet: string;
  asset: string;
  symbol: string;
  signature: string;
  nativeSpent: number;
  valuation: number;
  source: string;
  observedAt: number;
}

// ============ VALUATION CHECKS ============

export type ValuationCheckLabel = '1min' | '5min' | '15min' | '30min';

export interface PendingValuationCheck {
  alertId: string;
  asset: string;
  symbol: string;
  alertValuation: number;
  wallets: string[];
  alertTime: number;
  fireAt: number;
  label: ValuationCheckLabel;
  threshold: number | null;
}

export interface ValuationCheckResult {
  alertId: string;
  asset: string;
  symbol: string;
  label: ValuationCheckLabel;
  alertValuation: number;
  alertTime: number;
  wallets: string[];
  currentValuation: number;
  change: number; // fraction vs alert valuation
  classification: ValuationClassification | null;
  passed: boolean;
  peakValuation: number;
  checkedAt: number;
}

// One sent alert joined with its evaluation, for the daily report
export interface AlertSummaryRow {
  asset: string;
  symbol: string;
  alertValuation: number;
  walletCount: number;
  alertedAt: number;
  classification: ValuationClassification | null;
  athValuation: number;
}

// ============ COLLABORATORS ============

export interface ChainDataProvider {
  getLatestTransactionIds(
    wallet: string,
    limit: number,
    sinceId?: string
  ): Promise<CallResult<TransactionRef[]>>;
  getEnhancedTransactions(ids: string[]): Promise<CallResult<EnhancedTransaction[]>>;
}

export interface ValuationLookup {
  getAssetSnapshot(asset: string): Promise<AssetSnapshot | null>;
  getNativePriceUsd(): Promise<number>;
}

export interface Notifier {
  notify(decision: AlertDecision): Promise<boolean>;
  sendStatus(message: string): Promise<boolean>;
  sendReport(html: string): Promise<boolean>;
}

export interface DecisionStore {
  recordAlert(decision: AlertDecision): Promise<void>;
  recordValuationCheck(result: ValuationCheckResult): Promise<void>;
  recordPurchaseEvent(event: PurchaseEvent): Promise<void>;
  recordFakeAlert(asset: string, symbol: string, reason: string, at: number): Promise<void>;
  cleanupOlderThan(days: number): Promise<Record<string, number>>;
  getAlertsBetween(from: number, to: number): Promise<AlertSummaryRow[]>;
}

// ============ CONFIGURATION ============

export interface AlertConfig {
  threshold: number;
  timeWindowMs: number;
  cooldownMs: number;
  bullishWindowMs: number;
  blackoutHours: number[];
  blackoutExtraThreshold: number;
  localUtcOffsetHours: number;
  processedIdCapacity: number;
}

export interface ScreeningConfig {
  maxMarketCap: number;
  minVolume24h: number;
  minTxns24h: number;
  minBuyValueUsd: number;
  minLiquidity: number;
  excludedTokens: string[];
  excludedSymbols: string[];
}

export interface ValuationConfig {
  shortListThreshold: number;
  contractsCheckThreshold: number;
  deadTokenMcap: number;
  tickIntervalMs: number;
}

export interface PollingConfig {
  enabled: boolean;
  intervalMs: number;
  walletBatchSize: number;
  txFetchLimit: number;
  checkpointFlushEveryCycles: number;
  statsEveryCycles: number;
}

export interface WebhookRegistrationConfig {
  publicUrl: string;
  idFile: string;
  setupDelayMs: number;
}

export interface AppConfig {
  heliusApiKey: string;
  heliusRpcUrl: string;
  heliusApiUrl: string;
  dexScreenerApiUrl: string;
  telegramBotToken: string;
  telegramChatId: string;
  databaseUrl: string;
  webhookSecret: string;
  port: number;
  walletsFile: string;
  checkpointFile: string;
  dataRetentionDays: number;
  dailyReportEnabled: boolean;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  alerts: AlertConfig;
  screening: ScreeningConfig;
  valuation: ValuationConfig;
  webhookRegistration: WebhookRegistrationConfig;
  polling: PollingConfig;
}
