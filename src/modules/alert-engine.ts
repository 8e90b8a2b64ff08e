// ===========================================
// MODULE: ALERT ENGINE
// Aggregates verified smart-money purchases per asset and decides
// when a cluster is worth an alert
// ===========================================

import { v4 as uuidv4 } from 'uuid';
import { logger, short } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { AsyncMutex } from '../utils/async-mutex.js';
import { BoundedMap, BoundedSet } from '../utils/bounded-set.js';
import { PurchaseWindow } from './purchase-window.js';
import { toSwapEvent } from './swap-classifier.js';
import {
  RejectionReason,
  type AlertConfig,
  type AlertDecision,
  type AlertState,
  type AlertWallet,
  type AssetSnapshot,
  type DecisionStore,
  type EnhancedTransaction,
  type EvaluationOutcome,
  type IngestOutcome,
  type Notifier,
  type PurchaseRecord,
  type ScreeningConfig,
  type SwapEvent,
  type ValuationLookup,
} from '../types/index.js';

// ============ TYPES ============

export interface AlertScheduler {
  schedule(decision: AlertDecision): void;
}

export interface AlertEngineDeps {
  valuation: ValuationLookup;
  notifier?: Notifier;
  store?: DecisionStore;
  scheduler?: AlertScheduler;
  now?: () => number;
  createId?: () => string;
}

export interface AlertEngineStats {
  transactionsSeen: number;
  duplicates: number;
  swapsAccepted: number;
  alertsSent: number;
  notifyFailures: number;
  fakeAlerts: number;
  cooldownSuppressed: number;
  rejections: Partial<Record<RejectionReason, number>>;
}

const emptyStats = (): AlertEngineStats => ({
  transactionsSeen: 0,
  duplicates: 0,
  swapsAccepted: 0,
  alertsSent: 0,
  notifyFailures: 0,
  fakeAlerts: 0,
  cooldownSuppressed: 0,
  rejections: {},
});

// ============ ALERT ENGINE ============

export class AlertEngine {
  private readonly mutex = new AsyncMutex();
  private readonly window: PurchaseWindow;
  private readonly processedIds: BoundedSet;
  private readonly alertStates: BoundedMap<AlertState>;
  private trackedWallets: Set<string> = new Set();
  private stats: AlertEngineStats = emptyStats();

  private readonly now: () => number;
  private readonly createId: () => string;

  constructor(
    private readonly alertConfig: AlertConfig,
    private readonly screening: ScreeningConfig,
    private readonly deps: AlertEngineDeps
  ) {
    this.window = new PurchaseWindow(alertConfig.timeWindowMs);
    this.processedIds = new BoundedSet(alertConfig.processedIdCapacity);
    this.alertStates = new BoundedMap<AlertState>(alertConfig.processedIdCapacity);
    this.now = deps.now ?? Date.now;
    this.createId = deps.createId ?? uuidv4;
  }

  // ============ TRACKED WALLETS ============

  setTrackedWallets(wallets: Iterable<string>): void {
    this.trackedWallets = new Set(wallets);
  }

  isTracked(wallet: string): boolean {
    return this.trackedWallets.has(wallet);
  }

  getTrackedWallets(): string[] {
    return Array.from(this.trackedWallets);
  }

  hasProcessed(signature: string): boolean {
    return this.processedIds.has(signature);
  }

  // ============ ENTRY POINTS ============

  /**
   * Entry for both the polling loop and the webhook receiver.
   * The signature is marked processed before classification so a
   * non-swap is never looked at twice.
   */
  async processTransaction(wallet: string, tx: EnhancedTransaction): Promise<IngestOutcome> {
    return this.mutex.runExclusive(async () => {
      this.stats.transactionsSeen++;

      if (!this.processedIds.add(tx.signature)) {
        this.stats.duplicates++;
        return { status: 'DUPLICATE' };
      }

      const result = toSwapEvent(tx, wallet, this.now(), this.screening.excludedTokens);
      if (!result.event) {
        logger.debug({
          wallet: short(wallet),
          signature: short(tx.signature),
          kind: result.extraction.kind,
          reason: result.extraction.reason,
        }, 'Not a swap');
        return this.reject(RejectionReason.NOT_A_SWAP, result.extraction.reason);
      }

      return this.ingestSwap(result.event);
    });
  }

  /**
   * Ingest an already classified swap
   */
  async ingest(swap: SwapEvent): Promise<IngestOutcome> {
    return this.mutex.runExclusive(async () => {
      if (!this.processedIds.add(swap.signature)) {
        this.stats.duplicates++;
        return { status: 'DUPLICATE' };
      }
      return this.ingestSwap(swap);
    });
  }

  async evaluate(asset: string): Promise<EvaluationOutcome> {
    return this.mutex.runExclusive(() => this.evaluateAsset(asset));
  }

  // ============ INGESTION ============

  private async ingestSwap(swap: SwapEvent): Promise<IngestOutcome> {
    const { asset, wallet } = swap;
    const { screening } = this;

    if (screening.excludedTokens.includes(asset)) {
      return this.reject(RejectionReason.EXCLUDED_ASSET, `Excluded mint ${short(asset)}`);
    }

    const now = this.now();
    this.window.pruneAsset(asset, now);

    if (this.window.hasWallet(asset, wallet)) {
      return this.reject(
        RejectionReason.DUPLICATE_WALLET,
        `Wallet ${short(wallet)} already bought ${short(asset)} in this window`
      );
    }

    const snapshot = await this.fetchSnapshot(asset);
    if (!snapshot) {
      return this.reject(RejectionReason.UNKNOWN_ASSET, `No market data for ${short(asset)}`);
    }

    const symbol = snapshot.symbol.toUpperCase();
    if (screening.excludedSymbols.some(s => s.toUpperCase() === symbol)) {
      return this.reject(RejectionReason.EXCLUDED_SYMBOL, `Excluded symbol ${snapshot.symbol}`);
    }

    if (snapshot.liquidityUsd < screening.minLiquidity) {
      return this.reject(
        RejectionReason.LOW_LIQUIDITY,
        `${snapshot.symbol} liquidity $${snapshot.liquidityUsd.toFixed(0)} < $${screening.minLiquidity}`
      );
    }

    const nativePrice = await this.deps.valuation.getNativePriceUsd();
    const buyValueUsd = swap.nativeSpent * nativePrice;
    if (buyValueUsd > 0 && buyValueUsd < screening.minBuyValueUsd) {
      return this.reject(
        RejectionReason.DUST,
        `${snapshot.symbol} dust buy $${buyValueUsd.toFixed(2)} < $${screening.minBuyValueUsd}`
      );
    }

    if (snapshot.marketValuation > screening.maxMarketCap) {
      return this.reject(
        RejectionReason.VALUATION_TOO_HIGH,
        `${snapshot.symbol} mcap $${snapshot.marketValuation.toFixed(0)} > $${screening.maxMarketCap}`
      );
    }

    if (snapshot.volume24h < screening.minVolume24h) {
      return this.reject(
        RejectionReason.LOW_VOLUME,
        `${snapshot.symbol} volume $${snapshot.volume24h.toFixed(0)} < $${screening.minVolume24h}`
      );
    }

    const txns = snapshot.buys24h + snapshot.sells24h;
    if (txns < screening.minTxns24h) {
      return this.reject(
        RejectionReason.LOW_TXN_COUNT,
        `${snapshot.symbol} txns ${txns} < ${screening.minTxns24h}`
      );
    }

    const record: PurchaseRecord = {
      wallet,
      nativeSpent: swap.nativeSpent,
      valuationAtPurchase: snapshot.marketValuation,
      timestamp: now,
      signature: swap.signature,
    };
    this.window.add(asset, record);
    this.stats.swapsAccepted++;

    logger.info({
      wallet: short(wallet),
      symbol: snapshot.symbol,
      sol: swap.nativeSpent,
      usd: Math.round(buyValueUsd),
      mcap: snapshot.marketValuation,
      source: swap.source,
    }, 'Smart money purchase');

    const store = this.deps.store;
    if (store) {
      await this.bestEffort('recordPurchaseEvent', () => store.recordPurchaseEvent({
        wallet,
        asset,
        symbol: snapshot.symbol,
        signature: swap.signature,
        nativeSpent: swap.nativeSpent,
        valuation: snapshot.marketValuation,
        source: swap.source,
        observedAt: swap.observedAt,
      }));
    }

    this.window.prune(now);

    const evaluation = await this.evaluateAsset(asset);
    return { status: 'ACCEPTED', record, evaluation };
  }

  // ============ EVALUATION ============

  getEffectiveThreshold(now: number = this.now()): number {
    const { threshold, blackoutExtraThreshold } = this.alertConfig;
    return this.isBlackoutHour(now) ? threshold + blackoutExtraThreshold : threshold;
  }

  isBlackoutHour(now: number = this.now()): boolean {
    const { blackoutHours, localUtcOffsetHours } = this.alertConfig;
    const localHour = new Date(now + localUtcOffsetHours * 3_600_000).getUTCHours();
    return blackoutHours.includes(localHour);
  }

  private async evaluateAsset(asset: string): Promise<EvaluationOutcome> {
    const now = this.now();
    // Records can expire while lookups are awaited, and on a later evaluate()
    this.window.pruneAsset(asset, now);
    const uniqueWallets = this.window.uniqueWallets(asset);
    const threshold = this.getEffectiveThreshold(now);

    if (uniqueWallets < threshold) {
      return { status: 'BELOW_THRESHOLD', uniqueWallets, threshold };
    }

    const previous = this.alertStates.get(asset);
    if (
      previous &&
      now - previous.lastAlertAt <= this.alertConfig.cooldownMs &&
      uniqueWallets <= previous.walletCountAtLastAlert
    ) {
      this.stats.cooldownSuppressed++;
      logger.debug({ asset: short(asset), uniqueWallets }, 'Alert cooldown');
      return { status: 'COOLDOWN', uniqueWallets, previousWalletCount: previous.walletCountAtLastAlert };
    }

    if (this.isBlackoutHour(now)) {
      logger.info({
        threshold: this.alertConfig.threshold,
        effectiveThreshold: threshold,
      }, 'Blackout hour, raised threshold');
    }

    // Second pass on fresh data: a spike may have decayed since ingestion
    const snapshot = await this.fetchSnapshot(asset);
    if (!snapshot) {
      // No market data reads as zero volume and zero txns
      return this.blockFakeAlert(asset, 'UNKNOWN', this.checkFakeAlert(0, 0) ?? 'no market data', now);
    }

    const fakeReason = this.checkFakeAlert(snapshot.volume24h, snapshot.buys24h + snapshot.sells24h);
    if (fakeReason) {
      return this.blockFakeAlert(asset, snapshot.symbol, fakeReason, now);
    }

    const streak = previous && now - previous.lastAlertAt <= this.alertConfig.bullishWindowMs
      ? previous
      : null;
    const isBullish = streak !== null;
    const streakPosition = streak ? streak.streakCount + 1 : 1;
    const baselineValuation = streak ? streak.streakBaselineValuation : snapshot.marketValuation;

    const wallets: AlertWallet[] = this.window.records(asset).map(r => ({
      wallet: r.wallet,
      nativeSpent: r.nativeSpent,
      valuationAtPurchase: r.valuationAtPurchase,
    }));

    const decision: AlertDecision = {
      id: this.createId(),
      asset,
      symbol: snapshot.symbol,
      wallets,
      snapshot,
      streakPosition,
      isBullish,
      baselineValuation,
      effectiveThreshold: threshold,
      decidedAt: now,
    };

    this.alertStates.set(asset, {
      lastAlertAt: now,
      walletCountAtLastAlert: uniqueWallets,
      streakBaselineValuation: baselineValuation,
      streakCount: streakPosition,
    });
    this.stats.alertsSent++;

    logger.info({
      symbol: snapshot.symbol,
      wallets: uniqueWallets,
      mcap: snapshot.marketValuation,
      bullish: isBullish,
      streak: streakPosition,
    }, 'ALERT: smart money cluster');

    await this.dispatch(decision);

    return { status: 'ALERTED', decision };
  }

  private checkFakeAlert(volume24h: number, txns24h: number): string | null {
    const reasons: string[] = [];
    const { minVolume24h, minTxns24h } = this.screening;

    if (volume24h < minVolume24h) {
      reasons.push(`volume $${volume24h.toFixed(0)} < $${minVolume24h}`);
    }
    if (txns24h < minTxns24h) {
      reasons.push(`txns ${txns24h} < ${minTxns24h}`);
    }

    return reasons.length > 0 ? reasons.join(' | ') : null;
  }

  private async blockFakeAlert(
    asset: string,
    symbol: string,
    reason: string,
    now: number
  ): Promise<EvaluationOutcome> {
    this.stats.fakeAlerts++;
    this.window.clear(asset);
    logger.warn({ asset: short(asset), symbol, reason }, 'Fake alert blocked');

    const store = this.deps.store;
    if (store) {
      await this.bestEffort('recordFakeAlert', () => store.recordFakeAlert(asset, symbol, reason, now));
    }
    return { status: 'FAKE_ALERT', reason };
  }

  private async dispatch(decision: AlertDecision): Promise<void> {
    const { notifier, store, scheduler } = this.deps;

    if (notifier) {
      try {
        const delivered = await notifier.notify(decision);
        if (!delivered) {
          this.stats.notifyFailures++;
          logger.error({ symbol: decision.symbol }, 'Alert could not be delivered');
        }
      } catch (error) {
        this.stats.notifyFailures++;
        logger.error({ symbol: decision.symbol, error: errorMessage(error) }, 'Notifier threw');
      }
    }

    if (store) {
      await this.bestEffort('recordAlert', () => store.recordAlert(decision));
    }

    scheduler?.schedule(decision);
  }

  // ============ HELPERS ============

  private async fetchSnapshot(asset: string): Promise<AssetSnapshot | null> {
    try {
      return await this.deps.valuation.getAssetSnapshot(asset);
    } catch (error) {
      logger.warn({ asset: short(asset), error: errorMessage(error) }, 'Valuation lookup failed');
      return null;
    }
  }

  private reject(reason: RejectionReason, detail: string): IngestOutcome {
    this.stats.rejections[reason] = (this.stats.rejections[reason] ?? 0) + 1;
    if (reason !== RejectionReason.NOT_A_SWAP) {
      logger.info({ reason }, `Skip: ${detail}`);
    }
    return { status: 'REJECTED', reason, detail };
  }

  private async bestEffort(operation: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      logger.warn({ operation, error: errorMessage(error) }, 'Decision store write failed');
    }
  }

  // ============ STATE ============

  getStats(): AlertEngineStats {
    return { ...this.stats, rejections: { ...this.stats.rejections } };
  }

  getWindowSize(): number {
    return this.window.size();
  }

  getUniqueWallets(asset: string): number {
    return this.window.uniqueWallets(asset);
  }

  getAlertState(asset: string): AlertState | undefined {
    return this.alertStates.get(asset);
  }

  reset(): void {
    this.window.clear();
    this.processedIds.clear();
    this.alertStates.clear();
    this.stats = emptyStats();
  }
}
