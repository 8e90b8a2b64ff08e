// ===========================================
// MODULE: SWAP CLASSIFIER
// Turns a Helius enhanced transaction into a typed swap
// or a reason why it is not one
// ===========================================

import {
  AIRDROP_RECIPIENT_THRESHOLD,
  DEX_PROGRAM_IDS,
  EXCLUDED_TOKENS,
  LAMPORTS_PER_SOL,
  WSOL_MINT,
} from '../config/constants.js';
import {
  SwapKind,
  type EnhancedTransaction,
  type SwapClassification,
  type SwapEvent,
  type SwapExtraction,
} from '../types/index.js';

const sameAddress = (a: string, b: string): boolean =>
  a.length > 0 && a.toLowerCase() === b.toLowerCase();

function findDexProgram(tx: EnhancedTransaction): string | null {
  // Outer instructions take precedence over nested ones
  for (const ix of tx.instructions) {
    const name = DEX_PROGRAM_IDS[ix.programId];
    if (name) return name;
  }
  for (const ix of tx.instructions) {
    for (const inner of ix.innerInstructions) {
      const name = DEX_PROGRAM_IDS[inner.programId];
      if (name) return name;
    }
  }
  return null;
}

export function classifyTransaction(tx: EnhancedTransaction): SwapClassification {
  const { type, source } = tx;

  if (type === 'SWAP') {
    return { kind: SwapKind.SWAP, source };
  }

  if (type === 'TRANSFER') {
    const recipients = new Set(
      tx.tokenTransfers.map(t => t.toUserAccount).filter(to => to.length > 0)
    );

    if (recipients.size > AIRDROP_RECIPIENT_THRESHOLD) {
      return {
        kind: SwapKind.AIRDROP,
        source,
        reason: `Batch transfer to ${recipients.size} recipients`,
        recipients: recipients.size,
      };
    }
    return { kind: SwapKind.TRANSFER, source, reason: 'Plain transfer, not a swap' };
  }

  if (type.includes('NFT')) {
    return { kind: SwapKind.NFT_ACTIVITY, source, reason: `NFT activity (${type})` };
  }

  const dex = findDexProgram(tx);
  if (dex) {
    return { kind: SwapKind.SWAP, source: dex };
  }

  return {
    kind: SwapKind.UNCLASSIFIED,
    source,
    reason: `No DEX program found (type: ${type})`,
  };
}

/**
 * SOL the wallet paid for the swap. Native lamport flows first; Pump.fun
 * and PumpSwap route through wrapped SOL so fall back to wSOL transfers.
 */
export function computeNativeSpent(tx: EnhancedTransaction, wallet: string): number {
  let lamports = 0;
  for (const nt of tx.nativeTransfers) {
    if (sameAddress(nt.fromUserAccount, wallet)) lamports += nt.amount;
    if (sameAddress(nt.toUserAccount, wallet)) lamports -= nt.amount;
  }
  const native = Math.max(0, lamports) / LAMPORTS_PER_SOL;
  if (native > 0) return native;

  let wrapped = 0;
  for (const tt of tx.tokenTransfers) {
    if (tt.mint !== WSOL_MINT) continue;
    if (sameAddress(tt.fromUserAccount, wallet)) wrapped += tt.tokenAmount;
    if (sameAddress(tt.toUserAccount, wallet)) wrapped -= tt.tokenAmount;
  }
  return Math.max(0, wrapped);
}

export function extractSwap(
  tx: EnhancedTransaction,
  wallet: string,
  excludedTokens: readonly string[] = EXCLUDED_TOKENS
): SwapExtraction {
  const classification = classifyTransaction(tx);
  if (classification.kind !== SwapKind.SWAP) {
    return {
      valid: false,
      kind: classification.kind,
      source: classification.source,
      reason: classification.reason,
    };
  }

  const excluded = new Set(excludedTokens);
  const received = tx.tokenTransfers.find(
    t => sameAddress(t.toUserAccount, wallet) && !excluded.has(t.mint)
  );

  if (!received) {
    return {
      valid: false,
      kind: SwapKind.SWAP,
      source: classification.source,
      reason: 'No token received by this wallet',
    };
  }

  return {
    valid: true,
    swap: {
      asset: received.mint,
      amountReceived: received.tokenAmount,
      nativeSpent: computeNativeSpent(tx, wallet),
      source: classification.source,
    },
  };
}

export function toSwapEvent(
  tx: EnhancedTransaction,
  wallet: string,
  observedAt: number = Date.now(),
  excludedTokens: readonly string[] = EXCLUDED_TOKENS
): { event: SwapEvent } | { event: null; extraction: Extract<SwapExtraction, { valid: false }> } {
  const extraction = extractSwap(tx, wallet, excludedTokens);
  if (!extraction.valid) {
    return { event: null, extraction };
  }

  return {
    event: {
      ...extraction.swap,
      wallet,
      signature: tx.signature,
      observedAt,
    },
  };
}
