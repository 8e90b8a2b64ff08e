import { describe, it, expect, vi } from 'vitest';
import { Database, RETENTION_TABLES, type SqlClient } from '../../src/utils/database.js';
import { ValuationClassification, type ValuationCheckResult } from '../../src/types/index.js';
import { TOKEN, WALLET_A, makeDecision } from '../helpers.js';

function fakeClient(rowCount = 0) {
  return {
    query: vi.fn(async (_text: string, _values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }> => ({
      rows: [{ ok: 1 }],
      rowCount,
    })),
    end: vi.fn(async () => undefined),
  } satisfies SqlClient;
}

const fiveMinuteCheck: ValuationCheckResult = {
  alertId: 'alert-1',
  asset: TOKEN,
  symbol: 'MEME',
  label: '5min',
  alertValuation: 100_000,
  alertTime: 1_700_000_000_000,
  wallets: [WALLET_A],
  currentValuation: 125_000.4,
  change: 0.25,
  classification: ValuationClassification.SHORT_LIST,
  passed: true,
  peakValuation: 130_000,
  checkedAt: 1_700_000_300_000,
};

describe('Database', () => {
  it('should upsert a threshold check into its mcap and change columns', async () => {
    const client = fakeClient();
    const db = new Database(client);

    await db.recordValuationCheck(fiveMinuteCheck);

    const [sql, values] = client.query.mock.calls[0];
    expect(sql).toContain('mcap_5min, change_5min_pct)');
    expect(sql).toContain('ath_mcap = GREATEST(COALESCE(token_evaluations.ath_mcap, 0), EXCLUDED.ath_mcap)');
    expect(sql).toContain('change_5min_pct = EXCLUDED.change_5min_pct');
    expect(values).toEqual([
      'alert-1',
      TOKEN,
      'MEME',
      100_000,
      new Date(1_700_000_000_000),
      JSON.stringify([WALLET_A]),
      130_000,
      'short_list',
      125_000,
      25,
    ]);
  });

  it('should leave the change column out for peak-only checks', async () => {
    const client = fakeClient();

    await new Database(client).recordValuationCheck({ ...fiveMinuteCheck, label: '15min', classification: null });

    const [sql, values] = client.query.mock.calls[0];
    expect(sql).toContain('mcap_15min)');
    expect(sql).not.toContain('change_');
    expect(values).toHaveLength(9);
  });

  it('should ignore repeated alerts and purchases', async () => {
    const client = fakeClient();
    const db = new Database(client);

    await db.recordAlert(makeDecision());
    await db.recordPurchaseEvent({
      wallet: WALLET_A,
      asset: TOKEN,
      symbol: 'MEME',
      signature: 'sig-1',
      nativeSpent: 1,
      valuation: 100_000,
      source: 'RAYDIUM',
      observedAt: 0,
    });

    expect(client.query.mock.calls[0][0]).toContain('ON CONFLICT (alert_id) DO NOTHING');
    expect(client.query.mock.calls[1][0]).toContain('ON CONFLICT (wallet_address, token_address) DO NOTHING');
  });

  it('should report deleted rows per table', async () => {
    const client = fakeClient(3);

    const removed = await new Database(client).cleanupOlderThan(30);

    expect(Object.keys(removed)).toEqual([...RETENTION_TABLES]);
    expect(Object.values(removed)).toEqual([3, 3, 3, 3]);
    expect(client.query).toHaveBeenCalledWith(
      'DELETE FROM fake_alerts WHERE created_at < NOW() - make_interval(days => $1)',
      [30]
    );
  });

  it('should read report rows with numeric strings converted', async () => {
    const client = fakeClient();
    client.query.mockResolvedValueOnce({
      rows: [
        {
          token_address: TOKEN,
          token_symbol: 'MEME',
          alert_mcap: '100000',
          wallet_count: 3,
          created_at: '2024-03-14T12:00:00.000Z',
          classification: 'short_list',
          ath_mcap: '250000',
        },
        {
          token_address: 'OtherToken',
          token_symbol: null,
          alert_mcap: '0',
          wallet_count: null,
          created_at: new Date(Date.UTC(2024, 2, 14, 13)),
          classification: null,
          ath_mcap: '0',
        },
      ],
      rowCount: 2,
    });

    const rows = await new Database(client).getAlertsBetween(Date.UTC(2024, 2, 14), Date.UTC(2024, 2, 15));

    const [sql, values] = client.query.mock.calls[0];
    expect(sql).toContain('LEFT JOIN token_evaluations te ON te.alert_id = a.alert_id');
    expect(values).toEqual([new Date(Date.UTC(2024, 2, 14)), new Date(Date.UTC(2024, 2, 15))]);
    expect(rows).toEqual([
      {
        asset: TOKEN,
        symbol: 'MEME',
        alertValuation: 100_000,
        walletCount: 3,
        alertedAt: Date.UTC(2024, 2, 14, 12),
        classification: ValuationClassification.SHORT_LIST,
        athValuation: 250_000,
      },
      {
        asset: 'OtherToken',
        symbol: '',
        alertValuation: 0,
        walletCount: 0,
        alertedAt: Date.UTC(2024, 2, 14, 13),
        classification: null,
        athValuation: 0,
      },
    ]);
  });

  it('should ping and close the pool', async () => {
    const client = fakeClient();
    const db = new Database(client);

    expect(await db.ping()).toBe(true);
    await db.close();
    expect(client.end).toHaveBeenCalledTimes(1);
  });
});
