// ===========================================
// HELIUS / DEXSCREENER RESPONSE SCHEMAS
// Wire payloads are validated here so the rest of the bot
// only ever sees fully-typed records
// ===========================================

import { z } from 'zod';

const address = z.string().nullish().transform(val => val ?? '');
const numeric = z.union([z.number(), z.string()]).nullish().transform(val => {
  const parsed = typeof val === 'string' ? parseFloat(val) : val ?? 0;
  return Number.isFinite(parsed) ? parsed : 0;
});

// ============ ENHANCED TRANSACTIONS ============

export const tokenTransferSchema = z.object({
  fromUserAccount: address,
  toUserAccount: address,
  mint: address,
  tokenAmount: numeric,
  tokenStandard: z.string().nullish(),
});

export const nativeTransferSchema = z.object({
  fromUserAccount: address,
  toUserAccount: address,
  amount: numeric, // lamports
});

export const innerInstructionSchema = z.object({
  programId: address,
});

export const instructionSchema = z.object({
  programId: address,
  innerInstructions: z.array(innerInstructionSchema).nullish().transform(val => val ?? []),
});

export const accountDataSchema = z.object({
  account: address,
  nativeBalanceChange: numeric,
});

export const enhancedTransactionSchema = z.object({
  signature: z.string().min(1),
  timestamp: z.number().nullish(),
  type: z.string().nullish().transform(val => val ?? 'UNKNOWN'),
  source: z.string().nullish().transform(val => val ?? 'UNKNOWN'),
  description: z.string().nullish(),
  feePayer: address,
  tokenTransfers: z.array(tokenTransferSchema).nullish().transform(val => val ?? []),
  nativeTransfers: z.array(nativeTransferSchema).nullish().transform(val => val ?? []),
  instructions: z.array(instructionSchema).nullish().transform(val => val ?? []),
  accountData: z.array(accountDataSchema).nullish().transform(val => val ?? []),
});

export type TokenTransfer = z.infer<typeof tokenTransferSchema>;
export type NativeTransfer = z.infer<typeof nativeTransferSchema>;
export type EnhancedInstruction = z.infer<typeof instructionSchema>;
export type EnhancedTransaction = z.infer<typeof enhancedTransactionSchema>;

// ============ JSON-RPC ============

export const signatureInfoSchema = z.object({
  signature: z.string(),
  slot: z.number().optional(),
  blockTime: z.number().nullish(),
  err: z.unknown().nullish(),
});

export const rpcResponseSchema = z.object({
  result: z.unknown().optional(),
  error: z.object({
    code: z.number(),
    message: z.string(),
  }).optional(),
});

export type SignatureInfo = z.infer<typeof signatureInfoSchema>;

// ============ WEBHOOKS ============

export const heliusWebhookSchema = z.object({
  webhookID: z.string(),
  webhookURL: z.string(),
  accountAddresses: z.array(z.string()).nullish().transform(val => val ?? []),
});

export type HeliusWebhook = z.infer<typeof heliusWebhookSchema>;

// ============ DEXSCREENER ============

export const dexScreenerPairSchema = z.object({
  chainId: z.string(),
  dexId: z.string().nullish().transform(val => val ?? ''),
  pairAddress: z.string().nullish().transform(val => val ?? ''),
  baseToken: z.object({
    address: z.string(),
    name: z.string().nullish().transform(val => val ?? 'Unknown Token'),
    symbol: z.string().nullish().transform(val => val ?? 'UNKNOWN'),
  }),
  quoteToken: z.object({
    address: z.string().nullish(),
    symbol: z.string().nullish(),
  }).nullish(),
  priceNative: numeric,
  priceUsd: numeric,
  marketCap: numeric,
  fdv: numeric,
  liquidity: z.object({ usd: numeric }).nullish(),
  volume: z.object({ h24: numeric }).nullish(),
  priceChange: z.object({ h24: numeric }).nullish(),
  txns: z.object({
    h24: z.object({ buys: numeric, sells: numeric }).nullish(),
  }).nullish(),
});

export const dexScreenerTokenResponseSchema = z.object({
  pairs: z.array(dexScreenerPairSchema).nullish().transform(val => val ?? []),
});

export type DexScreenerPair = z.infer<typeof dexScreenerPairSchema>;
