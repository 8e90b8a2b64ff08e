// ===========================================
// MODULE: WALLET MONITOR
// Polls the tracked wallets in batches and feeds new
// transactions to the alert engine
// ===========================================

import { logger, short } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { AlertEngine } from './alert-engine.js';
import type { CheckpointStore } from './checkpoint-store.js';
import {
  FailureCategory,
  type ChainDataProvider,
  type PollingConfig,
} from '../types/index.js';

// ============ CONSTANTS ============

const MIN_CYCLE_WAIT_MS = 500;
const RATE_LIMIT_PAUSE_MS = 5000;
const CYCLE_ERROR_PAUSE_MS = 10000;

// ============ TYPES ============

export interface WalletMonitorDeps {
  chain: ChainDataProvider;
  engine: AlertEngine;
  checkpoints: CheckpointStore;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export interface BatchSummary {
  rateLimited: boolean;
  newTransactions: number;
  processed: number;
}

export interface MonitorStats {
  cycles: number;
  batches: number;
  rateLimitedBatches: number;
  transactionsProcessed: number;
  startedAt: number;
}

// ============ WALLET MONITOR ============

export class WalletMonitor {
  private running = false;
  private loopPromise: Promise<void> | null = null;
  private waitTimer: NodeJS.Timeout | null = null;
  private wake: (() => void) | null = null;
  private stats: MonitorStats;

  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly config: PollingConfig,
    private readonly deps: WalletMonitorDeps
  ) {
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? ((ms: number) => this.interruptibleWait(ms));
    this.stats = { cycles: 0, batches: 0, rateLimitedBatches: 0, transactionsProcessed: 0, startedAt: this.now() };
  }

  /**
   * One pass over every tracked wallet, batch by batch
   */
  async runCycle(): Promise<void> {
    this.stats.cycles++;
    const wallets = this.deps.engine.getTrackedWallets();

    for (let i = 0; i < wallets.length; i += this.config.walletBatchSize) {
      if (!this.running && this.loopPromise) break;
      await this.processBatch(wallets.slice(i, i + this.config.walletBatchSize));
    }

    if (this.stats.cycles % this.config.checkpointFlushEveryCycles === 0) {
      await this.deps.checkpoints.save();
    }

    if (this.stats.cycles % this.config.statsEveryCycles === 0) {
      const engineStats = this.deps.engine.getStats();
      logger.info({
        cycle: this.stats.cycles,
        swaps: engineStats.swapsAccepted,
        alerts: engineStats.alertsSent,
        fakeAlerts: engineStats.fakeAlerts,
        uptimeHours: Math.round((this.now() - this.stats.startedAt) / 360_000) / 10,
      }, 'Polling stats');
    }
  }

  async processBatch(wallets: string[]): Promise<BatchSummary> {
    const { chain, engine, checkpoints } = this.deps;
    this.stats.batches++;

    const walletBySignature = new Map<string, string>();

    for (const wallet of wallets) {
      const result = await chain.getLatestTransactionIds(
        wallet,
        this.config.txFetchLimit,
        checkpoints.get(wallet)
      );

      if (!result.ok) {
        if (result.category === FailureCategory.RATE_LIMITED) {
          this.stats.rateLimitedBatches++;
          logger.warn({ wallet: short(wallet), pauseMs: RATE_LIMIT_PAUSE_MS }, 'Batch rate limited, pausing');
          await this.sleep(RATE_LIMIT_PAUSE_MS);
          return { rateLimited: true, newTransactions: 0, processed: 0 };
        }
        logger.warn({ wallet: short(wallet), error: result.message }, 'Signature fetch failed');
        continue;
      }

      const refs = result.data;
      if (refs.length === 0) continue;

      // Newest first: the head is the new checkpoint
      checkpoints.set(wallet, refs[0].id);

      for (const ref of refs) {
        if (ref.failed || engine.hasProcessed(ref.id)) continue;
        walletBySignature.set(ref.id, wallet);
      }
    }

    if (walletBySignature.size === 0) {
      return { rateLimited: false, newTransactions: 0, processed: 0 };
    }

    const txResult = await chain.getEnhancedTransactions(Array.from(walletBySignature.keys()));
    if (!txResult.ok) {
      logger.warn({
        count: walletBySignature.size,
        category: txResult.category,
        error: txResult.message,
      }, 'Enhanced transaction fetch failed');
      return { rateLimited: txResult.category === FailureCategory.RATE_LIMITED, newTransactions: walletBySignature.size, processed: 0 };
    }

    let processed = 0;
    for (const tx of txResult.data) {
      const wallet = walletBySignature.get(tx.signature);
      if (!wallet) continue;
      await engine.processTransaction(wallet, tx);
      processed++;
    }
    this.stats.transactionsProcessed += processed;

    return { rateLimited: false, newTransactions: walletBySignature.size, processed };
  }

  // ============ LIFECYCLE ============

  start(): void {
    if (this.running) return;
    this.running = true;
    this.stats.startedAt = this.now();
    this.loopPromise = this.loop();

    logger.info({
      intervalMs: this.config.intervalMs,
      batchSize: this.config.walletBatchSize,
      wallets: this.deps.engine.getTrackedWallets().length,
    }, 'Polling started');
  }

  private async loop(): Promise<void> {
    while (this.running) {
      const cycleStart = this.now();
      try {
        await this.runCycle();
      } catch (error) {
        logger.error({ error: errorMessage(error) }, 'Polling cycle failed');
        await this.sleep(CYCLE_ERROR_PAUSE_MS);
        continue;
      }

      if (!this.running) break;
      const elapsed = this.now() - cycleStart;
      await this.sleep(Math.max(MIN_CYCLE_WAIT_MS, this.config.intervalMs - elapsed));
    }
  }

  /**
   * Stop after the in-flight batch and flush checkpoints
   */
  async stop(): Promise<void> {
    this.running = false;
    if (this.waitTimer) {
      clearTimeout(this.waitTimer);
      this.waitTimer = null;
    }
    this.wake?.();

    if (this.loopPromise) {
      await this.loopPromise;
      this.loopPromise = null;
    }
    await this.deps.checkpoints.save();
    logger.info({ cycles: this.stats.cycles }, 'Polling stopped');
  }

  private interruptibleWait(ms: number): Promise<void> {
    return new Promise(resolve => {
      this.wake = () => {
        this.wake = null;
        resolve();
      };
      this.waitTimer = setTimeout(() => {
        this.waitTimer = null;
        this.wake?.();
      }, ms);
    });
  }

  isRunning(): boolean {
    return this.running;
  }

  getStats(): MonitorStats {
    return { ...this.stats };
  }
}
