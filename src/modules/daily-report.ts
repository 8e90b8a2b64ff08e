// ===========================================
// MODULE: DAILY CLOSING REPORT
// Yesterday's alerts per token, sent at local midnight
// ===========================================

import { CronJob } from 'cron';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { escapeHtml } from './telegram.js';
import {
  ValuationClassification,
  type AlertSummaryRow,
  type DecisionStore,
  type Notifier,
  type ValuationLookup,
} from '../types/index.js';

// ============ TYPES ============

export interface TokenReportLine {
  asset: string;
  symbol: string;
  alertValuation: number;
  currentValuation: number;
  athValuation: number;
  changePct: number | null;    // alert -> now (holding)
  athChangePct: number | null; // alert -> peak (ideal exit)
  isWin: boolean;
  alertCount: number;
  classification: ValuationClassification | null;
  hasAlertValuation: boolean;
}

export interface ReportWindow {
  from: number;
  to: number;
  dateLabel: string; // dd.mm.yyyy, local
}

export interface DailyReportOptions {
  store: DecisionStore;
  valuation: ValuationLookup;
  notifier: Notifier;
  utcOffsetHours: number;
  walletCount: () => number;
  now?: () => number;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const DIVIDER = '━━━━━━━━━━━━━━━━━━━━';

const TRASH_CLASSES: ReadonlySet<ValuationClassification> = new Set([
  ValuationClassification.TRASH,
  ValuationClassification.NOT_SHORT_LIST,
]);
const SUCCESS_CLASSES: ReadonlySet<ValuationClassification> = new Set([
  ValuationClassification.SHORT_LIST,
  ValuationClassification.CONTRACTS_CHECK,
]);

// ============ SCHEDULING ============

/**
 * Cron expression (seconds field first, UTC) for local midnight
 */
export function midnightCronExpression(utcOffsetHours: number): string {
  const minutes = ((Math.round(-utcOffsetHours * 60) % 1440) + 1440) % 1440;
  return `0 ${minutes % 60} ${Math.floor(minutes / 60)} * * *`;
}

/**
 * Yesterday in local time, as a UTC millisecond range
 */
export function previousDayWindow(now: number, utcOffsetHours: number): ReportWindow {
  const offsetMs = utcOffsetHours * 3_600_000;
  const to = Math.floor((now + offsetMs) / DAY_MS) * DAY_MS - offsetMs;
  const from = to - DAY_MS;
  const [year, month, day] = new Date(from + offsetMs).toISOString().slice(0, 10).split('-');
  return { from, to, dateLabel: `${day}.${month}.${year}` };
}

// ============ AGGREGATION ============

function roundPct(value: number): number {
  return Math.round(value * 10) / 10;
}

/**
 * One line per token, best peak first. The first alert's valuation is the
 * entry, the highest recorded or current valuation is the peak, and a token
 * is a win when its peak beat the entry.
 */
export function summarizeAlerts(
  rows: AlertSummaryRow[],
  currentValuations: ReadonlyMap<string, number>
): TokenReportLine[] {
  const byToken = new Map<string, {
    symbol: string;
    alertValuation: number;
    alertCount: number;
    classification: ValuationClassification | null;
    athValuation: number;
  }>();

  for (const row of rows) {
    const existing = byToken.get(row.asset);
    if (!existing) {
      byToken.set(row.asset, {
        symbol: row.symbol || '???',
        alertValuation: row.alertValuation,
        alertCount: 1,
        classification: row.classification,
        athValuation: row.athValuation,
      });
      continue;
    }
    existing.alertCount++;
    existing.classification = existing.classification ?? row.classification;
    existing.athValuation = Math.max(existing.athValuation, row.athValuation);
  }

  const lines: TokenReportLine[] = [];
  for (const [asset, token] of byToken) {
    const currentValuation = currentValuations.get(asset) ?? 0;
    const athValuation = Math.max(token.athValuation, currentValuation);
    const hasAlertValuation = token.alertValuation > 0;

    const changePct = hasAlertValuation
      ? roundPct(((currentValuation - token.alertValuation) / token.alertValuation) * 100)
      : null;
    const athChangePct = hasAlertValuation && athValuation > 0
      ? roundPct(((athValuation - token.alertValuation) / token.alertValuation) * 100)
      : null;

    let isWin = false;
    if (athChangePct !== null) {
      isWin = athChangePct > 0;
    } else if (changePct !== null) {
      isWin = changePct > 0;
    }

    lines.push({
      asset,
      symbol: token.symbol,
      alertValuation: token.alertValuation,
      currentValuation,
      athValuation,
      changePct,
      athChangePct,
      isWin,
      alertCount: token.alertCount,
      classification: token.classification,
      hasAlertValuation,
    });
  }

  return lines.sort((a, b) => (b.athChangePct ?? -9999) - (a.athChangePct ?? -9999));
}

// ============ FORMATTING ============

export function formatCompactUsd(value: number): string {
  if (value >= 1_000_000) return `$${(value / 1_000_000).toFixed(1)}M`;
  if (value >= 1_000) return `$${(value / 1_000).toFixed(0)}K`;
  if (value > 0) return `$${value.toFixed(0)}`;
  return '$0';
}

function formatPct(value: number): string {
  return value >= 0 ? `+${value.toFixed(0)}%` : `${value.toFixed(0)}%`;
}

function formatTokenLine(line: TokenReportLine): string {
  const symbol = `<b>${escapeHtml(line.symbol)}</b>`;
  const alert = formatCompactUsd(line.alertValuation);
  const current = formatCompactUsd(line.currentValuation);
  const emoji = line.isWin ? '🟢' : '🔴';
  const result = `<b>${line.isWin ? 'W' : 'L'}</b>`;

  if (line.athChangePct !== null) {
    const holding = line.changePct !== null ? formatPct(line.changePct) : '?';
    return `${emoji} ${symbol} | ${alert} → 🔝${formatCompactUsd(line.athValuation)} (${formatPct(line.athChangePct)}) 📍${current} (${holding}) ${result}`;
  }
  if (line.changePct !== null) {
    return `${emoji} ${symbol} | ${alert} → ${current} (${formatPct(line.changePct)}) ${result}`;
  }
  return `⚪ ${symbol} | ? → ${current} (no data)`;
}

export function formatDailyReport(
  dateLabel: string,
  totalAlerts: number,
  lines: TokenReportLine[],
  walletCount: number
): string {
  const header = `📊 <b>SOL DAILY CLOSE</b> - ${dateLabel}`;
  if (totalAlerts === 0) {
    return `${header}\n${DIVIDER}\n\nNo alerts yesterday.`;
  }

  const withData = lines.filter(l => l.hasAlertValuation);
  const missingData = lines.length - withData.length;
  const wins = withData.filter(l => l.isWin).length;
  const losses = withData.length - wins;

  const trash = lines.filter(l => l.classification !== null && TRASH_CLASSES.has(l.classification)).length;
  const successful = lines.filter(l => l.classification !== null && SUCCESS_CLASSES.has(l.classification)).length;
  const unevaluated = lines.filter(l => l.classification === null).length;

  const out = [header, DIVIDER, '', ...lines.map(formatTokenLine), '', DIVIDER];

  if (withData.length > 0) {
    const winRate = (wins / withData.length) * 100;
    out.push(`📈 <b>${wins}W</b> / <b>${losses}L</b> - ${withData.length} tokens (${winRate.toFixed(0)}% ATH win rate)`);
  }
  if (missingData > 0) {
    out.push(`⚪ ${missingData} tokens missing MCap data`);
  }

  const classified = trash + successful;
  if (classified > 0) {
    out.push(`🗑️ Trash: ${trash}/${classified} (${((trash / classified) * 100).toFixed(0)}%) | ✅ Successful: ${successful}`);
    if (unevaluated > 0) out.push(`❓ Not evaluated yet: ${unevaluated}`);
  } else if (unevaluated > 0) {
    out.push(`❓ ${unevaluated} tokens not evaluated yet`);
  }

  out.push(`📡 Total alerts: ${totalAlerts} (${lines.length} distinct tokens)`);
  out.push(`👛 <b>Wallets:</b> ${walletCount} tracked`);

  return out.join('\n');
}

// ============ DAILY REPORT JOB ============

export class DailyReport {
  private cronJob: CronJob | null = null;
  private lastReportDate: string | null = null;
  private readonly now: () => number;

  constructor(private readonly options: DailyReportOptions) {
    this.now = options.now ?? Date.now;
  }

  start(): void {
    if (this.cronJob) {
      logger.warn('Daily report already scheduled');
      return;
    }

    const schedule = midnightCronExpression(this.options.utcOffsetHours);
    this.cronJob = new CronJob(
      schedule,
      async () => {
        await this.send();
      },
      null,
      true,
      'UTC'
    );

    logger.info({ schedule, nextRun: this.cronJob.nextDate().toISO() }, 'Daily report scheduled');
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
    }
  }

  async buildReport(now: number = this.now()): Promise<string> {
    const { store, valuation, utcOffsetHours, walletCount } = this.options;
    const window = previousDayWindow(now, utcOffsetHours);

    const rows = await store.getAlertsBetween(window.from, window.to);

    const currentValuations = new Map<string, number>();
    for (const asset of new Set(rows.map(r => r.asset))) {
      try {
        const snapshot = await valuation.getAssetSnapshot(asset);
        currentValuations.set(asset, snapshot?.marketValuation ?? 0);
      } catch (error) {
        logger.warn({ asset, error: errorMessage(error) }, 'Current valuation lookup failed');
        currentValuations.set(asset, 0);
      }
    }

    return formatDailyReport(window.dateLabel, rows.length, summarizeAlerts(rows, currentValuations), walletCount());
  }

  /**
   * Build and send yesterday's report; at most once per day
   */
  async send(now: number = this.now()): Promise<boolean> {
    const { dateLabel } = previousDayWindow(now, this.options.utcOffsetHours);
    if (this.lastReportDate === dateLabel) {
      logger.debug({ date: dateLabel }, 'Daily report already sent');
      return false;
    }

    try {
      const report = await this.buildReport(now);
      const sent = await this.options.notifier.sendReport(report);
      if (sent) {
        this.lastReportDate = dateLabel;
        logger.info({ date: dateLabel }, 'Daily report sent');
      } else {
        logger.error({ date: dateLabel }, 'Daily report could not be delivered');
      }
      return sent;
    } catch (error) {
      logger.error({ date: dateLabel, error: errorMessage(error) }, 'Daily report failed');
      return false;
    }
  }
}
