// ===========================================
// MODULE: VALUATION SCHEDULER
// Re-checks an alerted token's market cap 1, 5, 15 and 30 minutes
// after the alert and classifies how it moved
// ===========================================

import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import {
  ValuationClassification,
  type AlertDecision,
  type DecisionStore,
  type PendingValuationCheck,
  type ValuationCheckLabel,
  type ValuationCheckResult,
  type ValuationConfig,
  type ValuationLookup,
} from '../types/index.js';

// ============ CHECK POINTS ============

type ThresholdKey = 'shortListThreshold' | 'contractsCheckThreshold';

interface CheckPoint {
  label: ValuationCheckLabel;
  delayMs: number;
  threshold: ThresholdKey | null; // null = peak tracking only
}

export const CHECK_POINTS: readonly CheckPoint[] = [
  { label: '1min', delayMs: 60_000, threshold: null },
  { label: '5min', delayMs: 300_000, threshold: 'shortListThreshold' },
  { label: '15min', delayMs: 900_000, threshold: null },
  { label: '30min', delayMs: 1_800_000, threshold: 'contractsCheckThreshold' },
];

export interface ValuationSchedulerDeps {
  valuation: ValuationLookup;
  store?: DecisionStore;
  now?: () => number;
}

// ============ SCHEDULER ============

export class ValuationScheduler {
  private pending: PendingValuationCheck[] = [];
  private peaks: Map<string, number> = new Map(); // alertId -> peak mcap
  private timer: NodeJS.Timeout | null = null;
  private isTicking = false;
  private readonly now: () => number;

  constructor(
    private readonly config: ValuationConfig,
    private readonly deps: ValuationSchedulerDeps
  ) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Queue the four post-alert checks
   */
  schedule(decision: AlertDecision): void {
    const scheduledAt = this.now();
    const alertValuation = decision.snapshot.marketValuation;
    const wallets = decision.wallets.map(w => w.wallet);

    for (const point of CHECK_POINTS) {
      this.pending.push({
        alertId: decision.id,
        asset: decision.asset,
        symbol: decision.symbol,
        alertValuation,
        wallets,
        alertTime: decision.decidedAt,
        fireAt: scheduledAt + point.delayMs,
        label: point.label,
        threshold: point.threshold ? this.config[point.threshold] : null,
      });
    }
    this.pending.sort((a, b) => a.fireAt - b.fireAt);

    if (!this.peaks.has(decision.id)) {
      this.peaks.set(decision.id, alertValuation);
    }

    logger.info({
      symbol: decision.symbol,
      checks: CHECK_POINTS.map(p => p.label).join(', '),
    }, 'MCap checks scheduled');
  }

  /**
   * Run every check that is due. Returns the results in firing order.
   */
  async tick(now: number = this.now()): Promise<ValuationCheckResult[]> {
    const due = this.pending.filter(check => check.fireAt <= now);
    if (due.length === 0) return [];
    this.pending = this.pending.filter(check => check.fireAt > now);

    const results: ValuationCheckResult[] = [];
    for (const check of due) {
      results.push(await this.executeCheck(check, now));
    }

    // Peaks are only needed while an alert still has checks to run
    for (const alertId of new Set(due.map(check => check.alertId))) {
      if (!this.pending.some(p => p.alertId === alertId)) {
        this.peaks.delete(alertId);
      }
    }
    return results;
  }

  private async executeCheck(check: PendingValuationCheck, now: number): Promise<ValuationCheckResult> {
    const currentValuation = await this.currentValuation(check.asset);
    const change = check.alertValuation > 0
      ? (currentValuation - check.alertValuation) / check.alertValuation
      : 0;

    let classification: ValuationClassification | null = null;
    let passed = false;

    if (check.threshold !== null) {
      if (currentValuation <= this.config.deadTokenMcap) {
        classification = ValuationClassification.TRASH;
      } else if (change >= check.threshold) {
        classification = check.label === '5min'
          ? ValuationClassification.SHORT_LIST
          : ValuationClassification.CONTRACTS_CHECK;
        passed = true;
      } else {
        classification = ValuationClassification.NOT_SHORT_LIST;
      }
    }

    const peakValuation = Math.max(this.peaks.get(check.alertId) ?? check.alertValuation, currentValuation);
    this.peaks.set(check.alertId, peakValuation);

    const result: ValuationCheckResult = {
      alertId: check.alertId,
      asset: check.asset,
      symbol: check.symbol,
      label: check.label,
      alertValuation: check.alertValuation,
      alertTime: check.alertTime,
      wallets: check.wallets,
      currentValuation,
      change,
      classification,
      passed,
      peakValuation,
      checkedAt: now,
    };

    logger.info({
      symbol: check.symbol,
      check: check.label,
      alertMcap: check.alertValuation,
      currentMcap: currentValuation,
      changePct: Math.round(change * 10000) / 100,
      classification,
    }, passed ? 'MCap check passed' : 'MCap check');

    const store = this.deps.store;
    if (store) {
      try {
        await store.recordValuationCheck(result);
      } catch (error) {
        logger.warn({ symbol: check.symbol, error: errorMessage(error) }, 'Failed to save MCap check');
      }
    }

    return result;
  }

  private async currentValuation(asset: string): Promise<number> {
    try {
      const snapshot = await this.deps.valuation.getAssetSnapshot(asset);
      return snapshot?.marketValuation ?? 0;
    } catch (error) {
      logger.warn({ asset, error: errorMessage(error) }, 'MCap lookup failed');
      return 0;
    }
  }

  // ============ LIFECYCLE ============

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.isTicking) return;
      this.isTicking = true;
      this.tick()
        .catch(error => logger.error({ error: errorMessage(error) }, 'MCap check tick failed'))
        .finally(() => {
          this.isTicking = false;
        });
    }, this.config.tickIntervalMs);

    logger.info({ intervalMs: this.config.tickIntervalMs }, 'Valuation scheduler started');
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  pendingCount(): number {
    return this.pending.length;
  }

  getPeak(alertId: string): number | undefined {
    return this.peaks.get(alertId);
  }
}
