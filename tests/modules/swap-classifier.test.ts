import { describe, it, expect } from 'vitest';
import {
  classifyTransaction,
  computeNativeSpent,
  extractSwap,
  toSwapEvent,
} from '../../src/modules/swap-classifier.js';
import { SwapKind } from '../../src/types/index.js';
import { WSOL_MINT } from '../../src/config/constants.js';
import { RAYDIUM_AMM, TOKEN, WALLET_A, makeSwapTx, makeTx } from '../helpers.js';

describe('classifyTransaction', () => {
  it('should accept transactions tagged SWAP', () => {
    expect(classifyTransaction(makeTx({ type: 'SWAP', source: 'JUPITER' })))
      .toEqual({ kind: SwapKind.SWAP, source: 'JUPITER' });
  });

  it('should flag a transfer to more than five recipients as an airdrop', () => {
    const tokenTransfers = ['r1', 'r2', 'r3', 'r4', 'r5', 'r6'].map(to => ({
      fromUserAccount: WALLET_A,
      toUserAccount: to,
      mint: TOKEN,
      tokenAmount: 1,
    }));

    expect(classifyTransaction(makeTx({ type: 'TRANSFER', source: 'SYSTEM_PROGRAM', tokenTransfers }))).toEqual({
      kind: SwapKind.AIRDROP,
      source: 'SYSTEM_PROGRAM',
      reason: 'Batch transfer to 6 recipients',
      recipients: 6,
    });
  });

  it('should treat a transfer to five recipients as a plain transfer', () => {
    const tokenTransfers = ['r1', 'r2', 'r3', 'r4', 'r5', 'r5'].map(to => ({
      fromUserAccount: WALLET_A,
      toUserAccount: to,
      mint: TOKEN,
      tokenAmount: 1,
    }));

    const result = classifyTransaction(makeTx({ type: 'TRANSFER', tokenTransfers }));

    expect(result.kind).toBe(SwapKind.TRANSFER);
  });

  it('should reject NFT activity', () => {
    expect(classifyTransaction(makeTx({ type: 'NFT_SALE', source: 'MAGIC_EDEN' }))).toEqual({
      kind: SwapKind.NFT_ACTIVITY,
      source: 'MAGIC_EDEN',
      reason: 'NFT activity (NFT_SALE)',
    });
  });

  it('should recognise an untagged transaction by its DEX program', () => {
    const tx = makeTx({
      type: 'UNKNOWN',
      instructions: [{ programId: 'ComputeBudget111111111111111111111111111111' }, { programId: RAYDIUM_AMM }],
    });

    expect(classifyTransaction(tx)).toEqual({ kind: SwapKind.SWAP, source: 'Raydium AMM V4' });
  });

  it('should look at inner instructions when no outer one matches', () => {
    const tx = makeTx({
      type: 'UNKNOWN',
      instructions: [{
        programId: 'SomeRouter',
        innerInstructions: [{ programId: '6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P' }],
      }],
    });

    expect(classifyTransaction(tx)).toEqual({ kind: SwapKind.SWAP, source: 'Pump.fun' });
  });

  it('should leave transactions without a DEX program unclassified', () => {
    expect(classifyTransaction(makeTx({ type: 'UNKNOWN', source: 'UNKNOWN' }))).toEqual({
      kind: SwapKind.UNCLASSIFIED,
      source: 'UNKNOWN',
      reason: 'No DEX program found (type: UNKNOWN)',
    });
  });
});

describe('computeNativeSpent', () => {
  it('should net lamports sent against lamports received', () => {
    const tx = makeTx({
      nativeTransfers: [
        { fromUserAccount: WALLET_A, toUserAccount: 'Pool', amount: 2_500_000_000 },
        { fromUserAccount: 'Pool', toUserAccount: WALLET_A, amount: 500_000_000 },
      ],
    });

    expect(computeNativeSpent(tx, WALLET_A)).toBe(2);
  });

  it('should compare addresses case-insensitively', () => {
    const tx = makeTx({
      nativeTransfers: [{ fromUserAccount: WALLET_A.toLowerCase(), toUserAccount: 'Pool', amount: 1_000_000_000 }],
    });

    expect(computeNativeSpent(tx, WALLET_A)).toBe(1);
  });

  it('should fall back to wrapped SOL transfers', () => {
    const tx = makeTx({
      tokenTransfers: [
        { fromUserAccount: WALLET_A, toUserAccount: 'Pool', mint: WSOL_MINT, tokenAmount: 0.75 },
        { fromUserAccount: 'Pool', toUserAccount: WALLET_A, mint: TOKEN, tokenAmount: 5000 },
      ],
    });

    expect(computeNativeSpent(tx, WALLET_A)).toBe(0.75);
  });

  it('should never go negative', () => {
    const tx = makeTx({
      nativeTransfers: [{ fromUserAccount: 'Pool', toUserAccount: WALLET_A, amount: 1_000_000_000 }],
    });

    expect(computeNativeSpent(tx, WALLET_A)).toBe(0);
  });
});

describe('extractSwap', () => {
  it('should return the received token and SOL spent', () => {
    const result = extractSwap(makeSwapTx('sig-1', WALLET_A, { sol: 1.5, amount: 4200 }), WALLET_A);

    expect(result).toEqual({
      valid: true,
      swap: { asset: TOKEN, amountReceived: 4200, nativeSpent: 1.5, source: 'RAYDIUM' },
    });
  });

  it('should skip excluded tokens when looking for the received mint', () => {
    const tx = makeTx({
      tokenTransfers: [
        { fromUserAccount: 'Pool', toUserAccount: WALLET_A, mint: WSOL_MINT, tokenAmount: 1 },
      ],
    });

    expect(extractSwap(tx, WALLET_A)).toEqual({
      valid: false,
      kind: SwapKind.SWAP,
      source: 'RAYDIUM',
      reason: 'No token received by this wallet',
    });
  });

  it('should carry the classification reason for non-swaps', () => {
    const result = extractSwap(makeTx({ type: 'TRANSFER', source: 'SYSTEM_PROGRAM' }), WALLET_A);

    expect(result).toEqual({
      valid: false,
      kind: SwapKind.TRANSFER,
      source: 'SYSTEM_PROGRAM',
      reason: 'Plain transfer, not a swap',
    });
  });
});

describe('toSwapEvent', () => {
  it('should stamp the wallet, signature and observation time', () => {
    const result = toSwapEvent(makeSwapTx('sig-9', WALLET_A), WALLET_A, 1234);

    expect(result.event).toEqual({
      asset: TOKEN,
      amountReceived: 1000,
      nativeSpent: 1,
      source: 'RAYDIUM',
      wallet: WALLET_A,
      signature: 'sig-9',
      observedAt: 1234,
    });
  });
});
