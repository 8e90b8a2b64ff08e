// ===========================================
// DATABASE CLIENT & SCHEMA
// ===========================================

import pg from 'pg';
import { z } from 'zod';
import { logger } from './logger.js';
import {
  ValuationClassification,
  type AlertDecision,
  type AlertSummaryRow,
  type DecisionStore,
  type PurchaseEvent,
  type ValuationCheckLabel,
  type ValuationCheckResult,
} from '../types/index.js';

const { Pool } = pg;

// The part of a pg Pool the store uses
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
  end(): Promise<void>;
}

export function createPool(connectionString: string): SqlClient {
  const pool = new Pool({
    connectionString,
    max: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  });

  pool.on('error', (err) => {
    logger.error({ err }, 'Unexpected database pool error');
  });

  return pool;
}

// ============ SCHEMA CREATION ============

export const SCHEMA_SQL = `
-- One row per alert sent
CREATE TABLE IF NOT EXISTS alert_snapshots (
  id SERIAL PRIMARY KEY,
  alert_id UUID NOT NULL UNIQUE,
  token_address VARCHAR(50) NOT NULL,
  token_symbol VARCHAR(32),
  alert_mcap BIGINT,
  baseline_mcap BIGINT,
  wallet_count INTEGER,
  wallets_involved JSONB DEFAULT '[]',
  streak_position INTEGER DEFAULT 1,
  is_bullish BOOLEAN DEFAULT FALSE,
  created_at TIMESTAMPTZ DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_alert_snapshots_token ON alert_snapshots(token_address);
CREATE INDEX IF NOT EXISTS idx_alert_snapshots_created ON alert_snapshots(created_at DESC);

-- Post-alert market cap checks, one row per alert
CREATE TABLE IF NOT EXISTS token_evaluations (
  id SERIAL PRIMARY KEY,
  alert_id UUID NOT NULL UNIQUE,
  token_address VARCHAR(50) NOT NULL,
  token_symbol VARCHAR(32),
  alert_mcap BIGINT,
  alert_time TIMESTAMPTZ,
  wallets_involved JSONB DEFAULT '[]',
  mcap_1min BIGINT,
  mcap_5min BIGINT,
  mcap_15min BIGINT,
  mcap_30min BIGINT,
  change_5min_pct DOUBLE PRECISION,
  change_30min_pct DOUBLE PRECISION,
  classification VARCHAR(20),
  ath_mcap BIGINT DEFAULT 0,
  created_at TIMESTAMPTZ DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_token_evaluations_token ON token_evaluations(token_address);
CREATE INDEX IF NOT EXISTS idx_token_evaluations_class ON token_evaluations(classification);
CREATE INDEX IF NOT EXISTS idx_token_evaluations_alert_time ON token_evaluations(alert_time);

-- First purchase of each token by each tracked wallet
CREATE TABLE IF NOT EXISTS wallet_activity (
  id SERIAL PRIMARY KEY,
  wallet_address VARCHAR(50) NOT NULL,
  token_address VARCHAR(50) NOT NULL,
  token_symbol VARCHAR(32),
  tx_signature VARCHAR(100),
  sol_spent DOUBLE PRECISION DEFAULT 0,
  buy_mcap BIGINT DEFAULT 0,
  source VARCHAR(50),
  created_at TIMESTAMPTZ DEFAULT NOW(),
  UNIQUE(wallet_address, token_address)
);

CREATE INDEX IF NOT EXISTS idx_wallet_activity_wallet ON wallet_activity(wallet_address);
CREATE INDEX IF NOT EXISTS idx_wallet_activity_created ON wallet_activity(created_at);

-- Alerts blocked by the second-pass volume / txn check
CREATE TABLE IF NOT EXISTS fake_alerts (
  id SERIAL PRIMARY KEY,
  token_address VARCHAR(50) NOT NULL,
  token_symbol VARCHAR(32),
  reason TEXT,
  created_at TIMESTAMPTZ DEFAULT NOW()
);

CREATE INDEX IF NOT EXISTS idx_fake_alerts_created ON fake_alerts(created_at);
`;

export const RETENTION_TABLES = [
  'wallet_activity',
  'alert_snapshots',
  'token_evaluations',
  'fake_alerts',
] as const;

// Per check label: the market cap column and, for threshold checks, the change column
const CHECK_COLUMNS: Record<ValuationCheckLabel, { mcap: string; change: string | null }> = {
  '1min': { mcap: 'mcap_1min', change: null },
  '5min': { mcap: 'mcap_5min', change: 'change_5min_pct' },
  '15min': { mcap: 'mcap_15min', change: null },
  '30min': { mcap: 'mcap_30min', change: 'change_30min_pct' },
};

// BIGINT columns come back from pg as strings
const alertSummaryRowSchema = z.object({
  token_address: z.string(),
  token_symbol: z.string().nullable(),
  alert_mcap: z.coerce.number(),
  wallet_count: z.coerce.number().nullable(),
  created_at: z.coerce.date(),
  classification: z.nativeEnum(ValuationClassification).nullable().catch(null),
  ath_mcap: z.coerce.number(),
});

// ============ DATABASE OPERATIONS ============

export class Database implements DecisionStore {
  constructor(private readonly pool: SqlClient) {}

  async initializeSchema(): Promise<void> {
    await this.pool.query(SCHEMA_SQL);
  }

  async ping(): Promise<boolean> {
    const result = await this.pool.query('SELECT 1 AS ok');
    return result.rows.length === 1;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  // ============ ALERTS ============

  async recordAlert(decision: AlertDecision): Promise<void> {
    await this.pool.query(
      `INSERT INTO alert_snapshots
         (alert_id, token_address, token_symbol, alert_mcap, baseline_mcap, wallet_count,
          wallets_involved, streak_position, is_bullish, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
       ON CONFLICT (alert_id) DO NOTHING`,
      [
        decision.id,
        decision.asset,
        decision.symbol,
        Math.round(decision.snapshot.marketValuation),
        Math.round(decision.baselineValuation),
        decision.wallets.length,
        JSON.stringify(decision.wallets.map(w => w.wallet)),
        decision.streakPosition,
        decision.isBullish,
        new Date(decision.decidedAt),
      ]
    );
  }

  // ============ VALUATION CHECKS ============

  /**
   * Upsert the alert's evaluation row. ath_mcap is only ever raised.
   */
  async recordValuationCheck(result: ValuationCheckResult): Promise<void> {
    const columns = CHECK_COLUMNS[result.label];
    const changePct = Math.round(result.change * 10000) / 100;

    const insertColumns = [
      'alert_id', 'token_address', 'token_symbol', 'alert_mcap', 'alert_time',
      'wallets_involved', 'ath_mcap', 'classification', columns.mcap,
    ];
    const values: unknown[] = [
      result.alertId,
      result.asset,
      result.symbol,
      Math.round(result.alertValuation),
      new Date(result.alertTime),
      JSON.stringify(result.wallets),
      Math.round(result.peakValuation),
      result.classification,
      Math.round(result.currentValuation),
    ];
    const updates = [
      'ath_mcap = GREATEST(COALESCE(token_evaluations.ath_mcap, 0), EXCLUDED.ath_mcap)',
      'classification = COALESCE(EXCLUDED.classification, token_evaluations.classification)',
      `${columns.mcap} = EXCLUDED.${columns.mcap}`,
    ];

    if (columns.change) {
      insertColumns.push(columns.change);
      values.push(changePct);
      updates.push(`${columns.change} = EXCLUDED.${columns.change}`);
    }

    const placeholders = values.map((_, i) => `$${i + 1}`).join(', ');
    await this.pool.query(
      `INSERT INTO token_evaluations (${insertColumns.join(', ')})
       VALUES (${placeholders})
       ON CONFLICT (alert_id) DO UPDATE SET ${updates.join(', ')}`,
      values
    );
  }

  // ============ WALLET ACTIVITY ============

  async recordPurchaseEvent(event: PurchaseEvent): Promise<void> {
    await this.pool.query(
      `INSERT INTO wallet_activity
         (wallet_address, token_address, token_symbol, tx_signature, sol_spent, buy_mcap, source, created_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       ON CONFLICT (wallet_address, token_address) DO NOTHING`,
      [
        event.wallet,
        event.asset,
        event.symbol,
        event.signature,
        event.nativeSpent,
        Math.round(event.valuation),
        event.source,
        new Date(event.observedAt),
      ]
    );
  }

  // ============ FAKE ALERTS ============

  async recordFakeAlert(asset: string, symbol: string, reason: string, at: number): Promise<void> {
    await this.pool.query(
      `INSERT INTO fake_alerts (token_address, token_symbol, reason, created_at)
       VALUES ($1, $2, $3, $4)`,
      [asset, symbol, reason, new Date(at)]
    );
  }

  // ============ REPORTS ============

  async getAlertsBetween(from: number, to: number): Promise<AlertSummaryRow[]> {
    const result = await this.pool.query(
      `SELECT
         a.token_address,
         a.token_symbol,
         CASE WHEN a.alert_mcap > 0 THEN a.alert_mcap ELSE COALESCE(te.alert_mcap, 0) END AS alert_mcap,
         a.wallet_count,
         a.created_at,
         te.classification,
         COALESCE(te.ath_mcap, 0) AS ath_mcap
       FROM alert_snapshots a
       LEFT JOIN token_evaluations te ON te.alert_id = a.alert_id
       WHERE a.created_at >= $1 AND a.created_at < $2
       ORDER BY a.created_at ASC`,
      [new Date(from), new Date(to)]
    );

    return result.rows.map(raw => {
      const row = alertSummaryRowSchema.parse(raw);
      return {
        asset: row.token_address,
        symbol: row.token_symbol ?? '',
        alertValuation: row.alert_mcap,
        walletCount: row.wallet_count ?? 0,
        alertedAt: row.created_at.getTime(),
        classification: row.classification,
        athValuation: row.ath_mcap,
      };
    });
  }

  // ============ CLEANUP ============

  async cleanupOlderThan(days: number): Promise<Record<string, number>> {
    const removed: Record<string, number> = {};

    for (const table of RETENTION_TABLES) {
      const result = await this.pool.query(
        `DELETE FROM ${table} WHERE created_at < NOW() - make_interval(days => $1)`,
        [days]
      );
      removed[table] = result.rowCount ?? 0;
    }

    return removed;
  }
}
