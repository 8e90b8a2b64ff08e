// ===========================================
// MODULE: PURCHASE WINDOW
// Per-asset sliding window of verified purchases,
// at most one record per wallet
// ===========================================

import type { PurchaseRecord } from '../types/index.js';

export class PurchaseWindow {
  private purchases: Map<string, PurchaseRecord[]> = new Map();

  constructor(private readonly windowMs: number) {}

  /**
   * Append a purchase. Returns false (and keeps the first record) when the
   * wallet already has a live purchase for this asset.
   */
  add(asset: string, record: PurchaseRecord): boolean {
    const existing = this.purchases.get(asset) ?? [];
    if (existing.some(p => p.wallet === record.wallet)) {
      return false;
    }
    existing.push(record);
    this.purchases.set(asset, existing);
    return true;
  }

  hasWallet(asset: string, wallet: string): boolean {
    return (this.purchases.get(asset) ?? []).some(p => p.wallet === wallet);
  }

  /**
   * Drop records older than the window across all assets
   */
  prune(now: number): void {
    for (const asset of Array.from(this.purchases.keys())) {
      this.pruneAsset(asset, now);
    }
  }

  pruneAsset(asset: string, now: number): void {
    const records = this.purchases.get(asset);
    if (!records) return;

    const live = records.filter(p => now - p.timestamp < this.windowMs);
    if (live.length === 0) {
      this.purchases.delete(asset);
    } else {
      this.purchases.set(asset, live);
    }
  }

  uniqueWallets(asset: string): number {
    return new Set((this.purchases.get(asset) ?? []).map(p => p.wallet)).size;
  }

  records(asset: string): PurchaseRecord[] {
    return [...(this.purchases.get(asset) ?? [])];
  }

  clear(asset?: string): void {
    if (asset === undefined) {
      this.purchases.clear();
    } else {
      this.purchases.delete(asset);
    }
  }

  /**
   * Number of assets with at least one live record
   */
  size(): number {
    return this.purchases.size;
  }
}
