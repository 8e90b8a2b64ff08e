// ===========================================
// SOLANA CONSTANTS
// ===========================================

export const WSOL_MINT = 'So11111111111111111111111111111111111111112';

export const LAMPORTS_PER_SOL = 1e9;

// Swap-capable programs. Used when Helius does not tag the transaction as SWAP.
export const DEX_PROGRAM_IDS: Readonly<Record<string, string>> = {
  '675kPX9MHTjS2zt1qfr1NYHuzeLXfQM9H24wFSdgbctX': 'Raydium AMM V4',
  'CAMMCzo5YL8w4VFF8KVHrK22GGUsp5VTaW7grrKgrWqK': 'Raydium CLMM',
  'CPMMoo8L3F4NbTegBCKVNunggL7H1ZpdTHKxQB5qKP1C': 'Raydium CPMM',
  'JUP6LkbZbjS1jKKwapdHNy74zcZ3tLUZoi5QNyVTaV4': 'Jupiter V6',
  '6EF8rrecthR5Dkzon8Nwu78hRvfCKubJ14M5uBEwF6P': 'Pump.fun',
  'pAMMBay6oceH9fJKBRHGP5D4bD4sWpmSwMn52FMfXEA': 'PumpSwap',
  'whirLbMiicVdio4qvUfM5KAg6Ct8VwpYzGff3uctyCc': 'Orca Whirlpool',
  'LBUZKhRxPF3XUpBCjp4YzTKgLccjZhTSDM9YuVaPwxo': 'Meteora DLMM',
};

// Stables, LSTs and majors - never alerted on
export const EXCLUDED_TOKENS: readonly string[] = [
  WSOL_MINT,
  'EPjFWdd5AufqSSqeM2qN1xzybapC8G4wEGGkZwyTDt1v', // USDC
  'Es9vMFrzaCERmJfrF4H2FYD4KCoNkY11McCe8BenwNYB', // USDT
  'mSoLzYCxHdYgdzU16g5QSh3i5K3z3KZK7ytfqcJm7So',  // mSOL
  '7dHbWXmci3dT8UFYWYZweBLXgycu7Y3iL6trKn1Y7ARj', // stSOL
  'J1toso1uCk3RLmjorhTtrVwY9HJ7X8V9yYac6Y7kGCPn', // JitoSOL
  'bSo13r4TkiE4KumL71LsHTPpL2euBYLFx6h9HP3piy1',  // bSOL
  'DezXAZ8z7PnrnRJjz3wXBoRgixCa6xjnB7YaB1pPB263', // BONK
  'JUPyiwrYJFskUPiHa7hkeR8VUtAeFoSYbKedZNsDvCN',  // JUP
];

export const EXCLUDED_SYMBOLS: readonly string[] = [
  'SOL', 'WSOL', 'USDC', 'USDT', 'MSOL', 'STSOL', 'JITOSOL', 'BSOL', 'JUP',
];

// More distinct recipients than this in a plain transfer = batch airdrop
export const AIRDROP_RECIPIENT_THRESHOLD = 5;

// Enhanced Transactions API accepts at most 100 signatures per request
export const ENHANCED_TX_BATCH_SIZE = 100;
