// ===========================================
// UTILITY: TOKEN LINKS
// Explorer and chart links used in Telegram alerts
// ===========================================

// ============ LINK GENERATORS ============

/**
 * Generate DexScreener link
 */
export function getDexScreenerLink(tokenMint: string): string {
  return `https://dexscreener.com/solana/${tokenMint}`;
}

/**
 * Generate Solscan token link
 */
export function getSolscanTokenLink(tokenMint: string): string {
  return `https://solscan.io/token/${tokenMint}`;
}

/**
 * Generate Birdeye link
 */
export function getBirdeyeLink(tokenMint: string): string {
  return `https://birdeye.so/token/${tokenMint}?chain=solana`;
}

// ============ LINK COLLECTIONS ============

export interface TokenLinks {
  dexscreener: string;
  solscan: string;
  birdeye: string;
}

export function getTokenLinks(tokenMint: string): TokenLinks {
  return {
    dexscreener: getDexScreenerLink(tokenMint),
    solscan: getSolscanTokenLink(tokenMint),
    birdeye: getBirdeyeLink(tokenMint),
  };
}

/**
 * One bullet per link, Telegram HTML
 */
export function formatLinksAsHtml(tokenMint: string): string {
  const links = getTokenLinks(tokenMint);

  return [
    `• <a href="${links.dexscreener}">DexScreener</a>`,
    `• <a href="${links.solscan}">Solscan</a>`,
    `• <a href="${links.birdeye}">Birdeye</a>`,
  ].join('\n');
}
