// ===========================================
// IN-MEMORY DECISION STORE
// Used when DATABASE_URL is not set, and by the tests
// ===========================================

import type {
  AlertDecision,
  AlertSummaryRow,
  DecisionStore,
  PurchaseEvent,
  ValuationCheckResult,
  ValuationClassification,
} from '../types/index.js';

export interface StoredEvaluation {
  alertId: string;
  asset: string;
  symbol: string;
  alertValuation: number;
  athValuation: number;
  classification: ValuationClassification | null;
  checks: ValuationCheckResult[];
  createdAt: number;
}

export interface StoredFakeAlert {
  asset: string;
  symbol: string;
  reason: string;
  createdAt: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export class MemoryDecisionStore implements DecisionStore {
  readonly alerts: AlertDecision[] = [];
  readonly evaluations: Map<string, StoredEvaluation> = new Map();
  readonly purchases: PurchaseEvent[] = [];
  readonly fakeAlerts: StoredFakeAlert[] = [];

  constructor(private readonly now: () => number = Date.now) {}

  async recordAlert(decision: AlertDecision): Promise<void> {
    if (this.alerts.some(a => a.id === decision.id)) return;
    this.alerts.push(decision);
  }

  async recordValuationCheck(result: ValuationCheckResult): Promise<void> {
    const existing = this.evaluations.get(result.alertId);
    if (!existing) {
      this.evaluations.set(result.alertId, {
        alertId: result.alertId,
        asset: result.asset,
        symbol: result.symbol,
        alertValuation: result.alertValuation,
        athValuation: Math.max(result.alertValuation, result.peakValuation),
        classification: result.classification,
        checks: [result],
        createdAt: this.now(),
      });
      return;
    }

    existing.athValuation = Math.max(existing.athValuation, result.peakValuation);
    existing.classification = result.classification ?? existing.classification;
    existing.checks.push(result);
  }

  async recordPurchaseEvent(event: PurchaseEvent): Promise<void> {
    // First purchase per wallet + token only
    if (this.purchases.some(p => p.wallet === event.wallet && p.asset === event.asset)) return;
    this.purchases.push(event);
  }

  async recordFakeAlert(asset: string, symbol: string, reason: string, at: number): Promise<void> {
    this.fakeAlerts.push({ asset, symbol, reason, createdAt: at });
  }

  async getAlertsBetween(from: number, to: number): Promise<AlertSummaryRow[]> {
    return this.alerts
      .filter(a => a.decidedAt >= from && a.decidedAt < to)
      .sort((a, b) => a.decidedAt - b.decidedAt)
      .map(alert => {
        const evaluation = this.evaluations.get(alert.id);
        const alertValuation = alert.snapshot.marketValuation > 0
          ? alert.snapshot.marketValuation
          : evaluation?.alertValuation ?? 0;
        return {
          asset: alert.asset,
          symbol: alert.symbol,
          alertValuation,
          walletCount: alert.wallets.length,
          alertedAt: alert.decidedAt,
          classification: evaluation?.classification ?? null,
          athValuation: evaluation?.athValuation ?? 0,
        };
      });
  }

  async cleanupOlderThan(days: number): Promise<Record<string, number>> {
    const cutoff = this.now() - days * DAY_MS;

    const removeWhere = <T>(items: T[], isOld: (item: T) => boolean): number => {
      const before = items.length;
      const kept = items.filter(item => !isOld(item));
      items.splice(0, items.length, ...kept);
      return before - kept.length;
    };

    let evaluations = 0;
    for (const [alertId, evaluation] of this.evaluations) {
      if (evaluation.createdAt < cutoff) {
        this.evaluations.delete(alertId);
        evaluations++;
      }
    }

    return {
      wallet_activity: removeWhere(this.purchases, p => p.observedAt < cutoff),
      alert_snapshots: removeWhere(this.alerts, a => a.decidedAt < cutoff),
      token_evaluations: evaluations,
      fake_alerts: removeWhere(this.fakeAlerts, f => f.createdAt < cutoff),
    };
  }
}
