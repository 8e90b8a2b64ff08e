import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AlertEngine, type AlertEngineDeps } from '../../src/modules/alert-engine.js';
import { MemoryDecisionStore } from '../../src/utils/memory-store.js';
import { WSOL_MINT } from '../../src/config/constants.js';
import {
  RejectionReason,
  type AlertConfig,
  type AlertDecision,
  type IngestOutcome,
  type Notifier,
} from '../../src/types/index.js';
import {
  TOKEN,
  WALLET_A,
  WALLET_B,
  WALLET_C,
  WALLET_D,
  fakeClock,
  fakeValuation,
  makeAlertConfig,
  makeScreeningConfig,
  makeSnapshot,
  makeSwapTx,
  makeTx,
} from '../helpers.js';

function alertedDecision(outcome: IngestOutcome): AlertDecision {
  if (outcome.status === 'ACCEPTED' && outcome.evaluation.status === 'ALERTED') {
    return outcome.evaluation.decision;
  }
  throw new Error(`expected an alert, got ${JSON.stringify(outcome)}`);
}

function setup(alertOverrides: Partial<AlertConfig> = {}, deps: Partial<AlertEngineDeps> = {}) {
  const clock = fakeClock();
  const valuation = fakeValuation();
  const notifier = {
    notify: vi.fn(async (_decision: AlertDecision) => true),
    sendStatus: vi.fn(async (_message: string) => true),
    sendReport: vi.fn(async (_html: string) => true),
  } satisfies Notifier;
  const store = new MemoryDecisionStore(clock.now);
  const scheduler = { schedule: vi.fn((_decision: AlertDecision) => undefined) };
  let ids = 0;

  const engine = new AlertEngine(makeAlertConfig(alertOverrides), makeScreeningConfig(), {
    valuation: valuation.lookup,
    notifier,
    store,
    scheduler,
    now: clock.now,
    createId: () => `alert-${++ids}`,
    ...deps,
  });
  engine.setTrackedWallets([WALLET_A, WALLET_B, WALLET_C, WALLET_D]);

  let signatures = 0;
  const buy = (wallet: string, options: { sol?: number } = {}) =>
    engine.processTransaction(wallet, makeSwapTx(`sig-${++signatures}`, wallet, options));

  return { engine, clock, valuation, notifier, store, scheduler, buy };
}

describe('AlertEngine', () => {
  describe('cluster detection', () => {
    it('should alert when the third distinct wallet buys inside the window', async () => {
      const { engine, clock, notifier, store, scheduler, buy } = setup();

      const first = await buy(WALLET_A);
      expect(first).toMatchObject({
        status: 'ACCEPTED',
        evaluation: { status: 'BELOW_THRESHOLD', uniqueWallets: 1, threshold: 3 },
      });

      clock.advance(1000);
      await buy(WALLET_B, { sol: 2 });
      clock.advance(1000);
      const decision = alertedDecision(await buy(WALLET_C, { sol: 0.5 }));

      expect(decision).toMatchObject({
        id: 'alert-1',
        asset: TOKEN,
        symbol: 'MEME',
        streakPosition: 1,
        isBullish: false,
        baselineValuation: 100_000,
        effectiveThreshold: 3,
        decidedAt: clock.time,
      });
      expect(decision.wallets).toEqual([
        { wallet: WALLET_A, nativeSpent: 1, valuationAtPurchase: 100_000 },
        { wallet: WALLET_B, nativeSpent: 2, valuationAtPurchase: 100_000 },
        { wallet: WALLET_C, nativeSpent: 0.5, valuationAtPurchase: 100_000 },
      ]);

      expect(notifier.notify).toHaveBeenCalledTimes(1);
      expect(scheduler.schedule).toHaveBeenCalledWith(decision);
      expect(store.alerts).toEqual([decision]);
      expect(store.purchases).toHaveLength(3);
      expect(engine.getAlertState(TOKEN)).toEqual({
        lastAlertAt: clock.time,
        walletCountAtLastAlert: 3,
        streakBaselineValuation: 100_000,
        streakCount: 1,
      });
      expect(engine.getStats().alertsSent).toBe(1);
    });

    it('should not count purchases that fell out of the window', async () => {
      const { engine, clock, buy } = setup();

      await buy(WALLET_A);
      clock.advance(20_000);
      const outcome = await buy(WALLET_B);

      expect(outcome).toMatchObject({ evaluation: { status: 'BELOW_THRESHOLD', uniqueWallets: 1 } });
      expect(engine.getUniqueWallets(TOKEN)).toBe(1);
    });

    it('should drop expired purchases when evaluating later on demand', async () => {
      const { engine, clock, valuation, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      valuation.state.snapshot = makeSnapshot({ liquidityUsd: 1000 });
      const third = await buy(WALLET_C);
      expect(third).toMatchObject({ status: 'REJECTED', reason: RejectionReason.LOW_LIQUIDITY });

      clock.advance(3_600_000);

      expect(await engine.evaluate(TOKEN)).toEqual({ status: 'BELOW_THRESHOLD', uniqueWallets: 0, threshold: 3 });
      expect(engine.getUniqueWallets(TOKEN)).toBe(0);
    });

    it('should not alert on purchases that expired while market data was fetched', async () => {
      const { clock, valuation, notifier, buy } = setup({ threshold: 2 });

      await buy(WALLET_A);
      clock.advance(19_000);
      valuation.lookup.getAssetSnapshot.mockImplementation(async () => {
        clock.advance(5_000);
        return makeSnapshot();
      });

      const outcome = await buy(WALLET_B);

      expect(outcome).toMatchObject({
        status: 'ACCEPTED',
        evaluation: { status: 'BELOW_THRESHOLD', uniqueWallets: 1, threshold: 2 },
      });
      expect(notifier.notify).not.toHaveBeenCalled();
    });

    it('should raise the threshold during a blackout hour', async () => {
      const { engine, clock, buy } = setup({ blackoutHours: [14], blackoutExtraThreshold: 1 });
      clock.time = Date.UTC(2024, 0, 1, 14, 30);

      await buy(WALLET_A);
      await buy(WALLET_B);
      const third = await buy(WALLET_C);
      expect(third).toMatchObject({ evaluation: { status: 'BELOW_THRESHOLD', uniqueWallets: 3, threshold: 4 } });

      const decision = alertedDecision(await buy(WALLET_D));
      expect(decision.effectiveThreshold).toBe(4);
      expect(engine.getEffectiveThreshold(Date.UTC(2024, 0, 1, 15, 0))).toBe(3);
    });

    it('should read blackout hours in local time', () => {
      const { engine } = setup({ blackoutHours: [2], localUtcOffsetHours: 3 });

      expect(engine.isBlackoutHour(Date.UTC(2024, 0, 1, 23, 30))).toBe(true);
      expect(engine.isBlackoutHour(Date.UTC(2024, 0, 1, 2, 30))).toBe(false);
    });
  });

  describe('cooldown and bullish streaks', () => {
    it('should re-alert inside the cooldown only when more wallets joined', async () => {
      const { clock, notifier, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      alertedDecision(await buy(WALLET_C));

      clock.advance(1000);
      const decision = alertedDecision(await buy(WALLET_D));

      expect(decision.wallets).toHaveLength(4);
      expect(decision.isBullish).toBe(true);
      expect(decision.streakPosition).toBe(2);
      expect(notifier.notify).toHaveBeenCalledTimes(2);
    });

    it('should suppress a cluster of the same size inside the cooldown', async () => {
      const { engine, clock, notifier, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      alertedDecision(await buy(WALLET_C));

      clock.advance(25_000);
      await buy(WALLET_A);
      await buy(WALLET_B);
      const outcome = await buy(WALLET_C);

      expect(outcome).toMatchObject({
        evaluation: { status: 'COOLDOWN', uniqueWallets: 3, previousWalletCount: 3 },
      });
      expect(notifier.notify).toHaveBeenCalledTimes(1);
      expect(engine.getStats().cooldownSuppressed).toBe(1);
    });

    it('should carry the first alert valuation through a bullish streak', async () => {
      const { clock, valuation, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      alertedDecision(await buy(WALLET_C));

      // Past the cooldown, inside the bullish window
      clock.advance(600_000);
      valuation.state.snapshot = makeSnapshot({ marketValuation: 150_000 });
      await buy(WALLET_A);
      await buy(WALLET_B);
      const decision = alertedDecision(await buy(WALLET_C));

      expect(decision.isBullish).toBe(true);
      expect(decision.streakPosition).toBe(2);
      expect(decision.baselineValuation).toBe(100_000);
      expect(decision.snapshot.marketValuation).toBe(150_000);
    });

    it('should start a new streak once the bullish window has passed', async () => {
      const { engine, clock, valuation, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      alertedDecision(await buy(WALLET_C));

      clock.advance(1_800_001);
      valuation.state.snapshot = makeSnapshot({ marketValuation: 200_000 });
      await buy(WALLET_A);
      await buy(WALLET_B);
      const decision = alertedDecision(await buy(WALLET_C));

      expect(decision.isBullish).toBe(false);
      expect(decision.streakPosition).toBe(1);
      expect(decision.baselineValuation).toBe(200_000);
      expect(engine.getAlertState(TOKEN)?.streakCount).toBe(1);
    });
  });

  describe('fake alerts', () => {
    it('should discard the window when fresh data no longer passes the filters', async () => {
      const { engine, valuation, notifier, store, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      valuation.lookup.getAssetSnapshot
        .mockResolvedValueOnce(makeSnapshot())
        .mockResolvedValueOnce(makeSnapshot({ volume24h: 5000, buys24h: 5, sells24h: 5 }));

      const outcome = await buy(WALLET_C);

      expect(outcome).toMatchObject({
        status: 'ACCEPTED',
        evaluation: { status: 'FAKE_ALERT', reason: 'volume $5000 < $10000 | txns 10 < 15' },
      });
      expect(engine.getUniqueWallets(TOKEN)).toBe(0);
      expect(engine.getAlertState(TOKEN)).toBeUndefined();
      expect(notifier.notify).not.toHaveBeenCalled();
      expect(store.fakeAlerts).toEqual([
        { asset: TOKEN, symbol: 'MEME', reason: 'volume $5000 < $10000 | txns 10 < 15', createdAt: expect.any(Number) },
      ]);
      expect(engine.getStats().fakeAlerts).toBe(1);
    });

    it('should treat missing market data at decision time as a fake alert', async () => {
      const { engine, clock, valuation, notifier, store, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      valuation.lookup.getAssetSnapshot
        .mockResolvedValueOnce(makeSnapshot())
        .mockResolvedValueOnce(null);

      const outcome = await buy(WALLET_C);

      expect(outcome).toMatchObject({
        status: 'ACCEPTED',
        evaluation: { status: 'FAKE_ALERT', reason: 'volume $0 < $10000 | txns 0 < 15' },
      });
      expect(engine.getUniqueWallets(TOKEN)).toBe(0);
      expect(notifier.notify).not.toHaveBeenCalled();
      expect(store.fakeAlerts).toEqual([
        { asset: TOKEN, symbol: 'UNKNOWN', reason: 'volume $0 < $10000 | txns 0 < 15', createdAt: clock.time },
      ]);
    });

    it('should not blacklist the asset after a fake alert', async () => {
      const { valuation, buy } = setup();

      await buy(WALLET_A);
      await buy(WALLET_B);
      valuation.lookup.getAssetSnapshot
        .mockResolvedValueOnce(makeSnapshot())
        .mockResolvedValueOnce(makeSnapshot({ volume24h: 100 }));
      await buy(WALLET_C);

      await buy(WALLET_A);
      await buy(WALLET_B);
      const decision = alertedDecision(await buy(WALLET_C));

      expect(decision.wallets).toHaveLength(3);
    });
  });

  describe('deduplication', () => {
    it('should process a signature once across both entry points', async () => {
      const { engine, clock, buy } = setup();

      await buy(WALLET_A);
      const outcome = await engine.ingest({
        asset: TOKEN,
        amountReceived: 1000,
        nativeSpent: 1,
        source: 'RAYDIUM',
        wallet: WALLET_A,
        signature: 'sig-1',
        observedAt: clock.time,
      });

      expect(outcome).toEqual({ status: 'DUPLICATE' });
      expect(engine.getUniqueWallets(TOKEN)).toBe(1);
      expect(engine.getStats().duplicates).toBe(1);
    });

    it('should reject a second purchase by the same wallet before looking up the asset', async () => {
      const { valuation, buy } = setup();

      await buy(WALLET_A);
      const outcome = await buy(WALLET_A);

      expect(outcome).toMatchObject({ status: 'REJECTED', reason: RejectionReason.DUPLICATE_WALLET });
      expect(valuation.lookup.getAssetSnapshot).toHaveBeenCalledTimes(1);
    });

    it('should mark non-swaps as processed', async () => {
      const { engine } = setup();
      const transfer = makeTx({ signature: 'transfer-1', type: 'TRANSFER' });

      const first = await engine.processTransaction(WALLET_A, transfer);
      const second = await engine.processTransaction(WALLET_A, transfer);

      expect(first).toMatchObject({ status: 'REJECTED', reason: RejectionReason.NOT_A_SWAP });
      expect(second).toEqual({ status: 'DUPLICATE' });
      expect(engine.hasProcessed('transfer-1')).toBe(true);
    });

    it('should alert once when concurrent purchases complete a cluster', async () => {
      const { engine, notifier } = setup();

      await Promise.all([
        engine.processTransaction(WALLET_A, makeSwapTx('c-1', WALLET_A)),
        engine.processTransaction(WALLET_B, makeSwapTx('c-2', WALLET_B)),
        engine.processTransaction(WALLET_C, makeSwapTx('c-3', WALLET_C)),
        engine.processTransaction(WALLET_C, makeSwapTx('c-3', WALLET_C)),
      ]);

      expect(notifier.notify).toHaveBeenCalledTimes(1);
      expect(engine.getStats()).toMatchObject({ swapsAccepted: 3, duplicates: 1, alertsSent: 1 });
    });
  });

  describe('screening', () => {
    let ctx: ReturnType<typeof setup>;

    beforeEach(() => {
      ctx = setup();
    });

    it.each([
      ['unknown to DexScreener', null, RejectionReason.UNKNOWN_ASSET],
      ['an excluded symbol', makeSnapshot({ symbol: 'usdc' }), RejectionReason.EXCLUDED_SYMBOL],
      ['thin liquidity', makeSnapshot({ liquidityUsd: 1000 }), RejectionReason.LOW_LIQUIDITY],
      ['a market cap above the ceiling', makeSnapshot({ marketValuation: 800_000 }), RejectionReason.VALUATION_TOO_HIGH],
      ['low 24h volume', makeSnapshot({ volume24h: 5000 }), RejectionReason.LOW_VOLUME],
      ['too few 24h transactions', makeSnapshot({ buys24h: 5, sells24h: 5 }), RejectionReason.LOW_TXN_COUNT],
    ])('should reject a token with %s', async (_label, snapshot, reason) => {
      ctx.valuation.state.snapshot = snapshot;

      const outcome = await ctx.buy(WALLET_A);

      expect(outcome).toMatchObject({ status: 'REJECTED', reason });
      expect(ctx.engine.getUniqueWallets(TOKEN)).toBe(0);
      expect(ctx.engine.getStats().rejections[reason]).toBe(1);
    });

    it('should reject dust buys', async () => {
      // 0.01 SOL at $100
      const outcome = await ctx.buy(WALLET_A, { sol: 0.01 });

      expect(outcome).toEqual({
        status: 'REJECTED',
        reason: RejectionReason.DUST,
        detail: 'MEME dust buy $1.00 < $5',
      });
    });

    it('should accept a buy whose SOL amount could not be determined', async () => {
      const outcome = await ctx.buy(WALLET_A, { sol: 0 });

      expect(outcome).toMatchObject({ status: 'ACCEPTED', record: { nativeSpent: 0 } });
    });

    it('should reject excluded mints', async () => {
      const outcome = await ctx.engine.ingest({
        asset: WSOL_MINT,
        amountReceived: 1,
        nativeSpent: 1,
        source: 'RAYDIUM',
        wallet: WALLET_A,
        signature: 'wsol-1',
        observedAt: ctx.clock.time,
      });

      expect(outcome).toMatchObject({ status: 'REJECTED', reason: RejectionReason.EXCLUDED_ASSET });
    });
  });

  describe('collaborator failures', () => {
    it('should keep the alert state when the notifier fails', async () => {
      const { engine, notifier, scheduler, store, buy } = setup();
      notifier.notify.mockResolvedValue(false);

      await buy(WALLET_A);
      await buy(WALLET_B);
      alertedDecision(await buy(WALLET_C));

      expect(engine.getStats().notifyFailures).toBe(1);
      expect(engine.getAlertState(TOKEN)?.walletCountAtLastAlert).toBe(3);
      expect(store.alerts).toHaveLength(1);
      expect(scheduler.schedule).toHaveBeenCalledTimes(1);
    });

    it('should ingest even when the decision store is down', async () => {
      const { store, buy } = setup();
      vi.spyOn(store, 'recordPurchaseEvent').mockRejectedValue(new Error('connection refused'));

      const outcome = await buy(WALLET_A);

      expect(outcome).toMatchObject({ status: 'ACCEPTED' });
    });

    it('should treat a throwing valuation lookup as an unknown asset', async () => {
      const { valuation, buy } = setup();
      valuation.lookup.getAssetSnapshot.mockRejectedValue(new Error('timeout'));

      const outcome = await buy(WALLET_A);

      expect(outcome).toMatchObject({ status: 'REJECTED', reason: RejectionReason.UNKNOWN_ASSET });
    });
  });

  it('should evaluate an asset on demand', async () => {
    const { engine, buy } = setup();
    await buy(WALLET_A);

    expect(await engine.evaluate(TOKEN)).toEqual({ status: 'BELOW_THRESHOLD', uniqueWallets: 1, threshold: 3 });
    expect(await engine.evaluate('UnseenToken')).toEqual({ status: 'BELOW_THRESHOLD', uniqueWallets: 0, threshold: 3 });
  });

  it('should reset all state', async () => {
    const { engine, buy } = setup();
    await buy(WALLET_A);

    engine.reset();

    expect(engine.getWindowSize()).toBe(0);
    expect(engine.hasProcessed('sig-1')).toBe(false);
    expect(engine.getStats().swapsAccepted).toBe(0);
  });
});
