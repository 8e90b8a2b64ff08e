// ===========================================
// MODULE: WALLET LOADER
// Reads the tracked smart money wallet list
// ===========================================

import * as fs from 'fs';
import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';
import { logger, short } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

// Accepted layouts:
//   ["addr", ...]
//   [{ "address": "addr", ... }, ...]
//   { "wallets": <either of the above> }
const walletEntrySchema = z.union([
  z.string(),
  z.object({ address: z.string() }).passthrough(),
]);
const walletListSchema = z.array(walletEntrySchema);
const walletFileSchema = z.union([
  walletListSchema,
  z.object({ wallets: walletListSchema }).passthrough(),
]);

export function isValidSolanaAddress(address: string): boolean {
  try {
    new PublicKey(address);
    return true;
  } catch {
    return false;
  }
}

/**
 * Normalise a parsed wallet file into a de-duplicated list of valid addresses
 */
export function parseWalletList(data: unknown): string[] {
  const parsed = walletFileSchema.safeParse(data);
  if (!parsed.success) {
    logger.error({ issues: parsed.error.issues.length }, 'Unrecognised wallet file layout');
    return [];
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.wallets;
  const wallets = new Set<string>();

  for (const entry of entries) {
    const address = (typeof entry === 'string' ? entry : entry.address).trim();
    if (!isValidSolanaAddress(address)) {
      logger.warn({ address: short(address) }, 'Skipping invalid wallet address');
      continue;
    }
    wallets.add(address);
  }

  return Array.from(wallets);
}

export async function loadWallets(filePath: string): Promise<string[]> {
  try {
    const raw = await fs.promises.readFile(filePath, 'utf8');
    const wallets = parseWalletList(JSON.parse(raw));
    logger.info({ file: filePath, count: wallets.length }, 'Wallets loaded');
    return wallets;
  } catch (error) {
    logger.error({ file: filePath, error: errorMessage(error) }, 'Failed to load wallet file');
    return [];
  }
}
