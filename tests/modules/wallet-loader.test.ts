import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { isValidSolanaAddress, loadWallets, parseWalletList } from '../../src/modules/wallet-loader.js';
import { WALLET_A, WALLET_B, WALLET_C } from '../helpers.js';

describe('isValidSolanaAddress', () => {
  it('should accept base58 public keys and reject anything else', () => {
    expect(isValidSolanaAddress(WALLET_B)).toBe(true);
    expect(isValidSolanaAddress('not-a-wallet')).toBe(false);
    expect(isValidSolanaAddress('')).toBe(false);
  });
});

describe('parseWalletList', () => {
  it('should accept a plain list of addresses', () => {
    expect(parseWalletList([WALLET_A, ` ${WALLET_B} `])).toEqual([WALLET_A, WALLET_B]);
  });

  it('should accept objects with an address field and a wrapping wallets key', () => {
    const data = {
      wallets: [
        { address: WALLET_A, label: 'whale' },
        { address: WALLET_C },
      ],
    };

    expect(parseWalletList(data)).toEqual([WALLET_A, WALLET_C]);
  });

  it('should drop invalid and duplicate addresses', () => {
    expect(parseWalletList([WALLET_A, 'bogus!', WALLET_A])).toEqual([WALLET_A]);
  });

  it('should return nothing for an unknown layout', () => {
    expect(parseWalletList({ accounts: [WALLET_A] })).toEqual([]);
  });
});

describe('loadWallets', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'wallets-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should read the wallet file', async () => {
    const file = path.join(dir, 'wallets.json');
    fs.writeFileSync(file, JSON.stringify([WALLET_A, WALLET_B]));

    expect(await loadWallets(file)).toEqual([WALLET_A, WALLET_B]);
  });

  it('should return an empty list when the file is missing or invalid', async () => {
    const broken = path.join(dir, 'broken.json');
    fs.writeFileSync(broken, '[');

    expect(await loadWallets(path.join(dir, 'missing.json'))).toEqual([]);
    expect(await loadWallets(broken)).toEqual([]);
  });
});
