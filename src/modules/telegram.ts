// ===========================================
// MODULE: TELEGRAM ALERT SYSTEM
// ===========================================

import TelegramBot from 'node-telegram-bot-api';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { formatLinksAsHtml } from '../utils/trade-links.js';
import type { AlertDecision, Notifier } from '../types/index.js';

// ============ TYPES ============

// The part of node-telegram-bot-api the notifier needs
export interface MessageSender {
  sendMessage(chatId: string, text: string, options?: TelegramBot.SendMessageOptions): Promise<unknown>;
}

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  localUtcOffsetHours: number;
  bullishWindowMs: number;
  timeWindowMs: number;
  sender?: MessageSender;
}

const MAX_LISTED_WALLETS = 5;

// ============ FORMATTING ============

export function formatUsd(value: number): string {
  if (value >= 1_000_000) return `$${(value / 1_000_000).toFixed(2)}M`;
  if (value >= 1_000) return `$${(value / 1_000).toFixed(1)}K`;
  return `$${value.toFixed(2)}`;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

function formatWallet(address: string): string {
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}

function formatClock(timestamp: number, utcOffsetHours: number): string {
  return new Date(timestamp + utcOffsetHours * 3_600_000).toISOString().slice(11, 19);
}

function formatHeader(decision: AlertDecision, bullishWindowMs: number): string {
  if (!decision.isBullish) {
    return '🚨 <b>SOL SMART MONEY ALERT!</b> 🚨';
  }

  const lines = [
    '🔥🔥 <b>BULLISH ALERT!</b> 🔥🔥',
    '',
    `🔁 <b>Alert #${decision.streakPosition}</b> (within ${Math.round(bullishWindowMs / 60_000)}m)`,
  ];

  const baseline = decision.baselineValuation;
  if (baseline > 0) {
    const current = decision.snapshot.marketValuation;
    const changePct = ((current - baseline) / baseline) * 100;
    const sign = changePct >= 0 ? '+' : '';
    lines.push(
      `📈 <b>First alert MCap:</b> ${formatUsd(baseline)} → Now: ${formatUsd(current)} (${sign}${changePct.toFixed(0)}%)`
    );
  }

  return lines.join('\n');
}

export function formatAlertMessage(
  decision: AlertDecision,
  options: Pick<TelegramNotifierOptions, 'localUtcOffsetHours' | 'bullishWindowMs' | 'timeWindowMs'>
): string {
  const { snapshot, wallets, asset } = decision;

  const walletLines = wallets.slice(0, MAX_LISTED_WALLETS).map(w => {
    const details: string[] = [];
    if (w.nativeSpent > 0) details.push(`<b>${w.nativeSpent.toFixed(2)} SOL</b>`);
    if (w.valuationAtPurchase > 0) details.push(`MCap: ${formatUsd(w.valuationAtPurchase)}`);
    const suffix = details.length > 0 ? ` | ${details.join(' | ')}` : '';
    return `  • <code>${formatWallet(w.wallet)}</code>${suffix}`;
  });
  if (wallets.length > MAX_LISTED_WALLETS) {
    walletLines.push(`  • ... and ${wallets.length - MAX_LISTED_WALLETS} more`);
  }

  const marketLines: string[] = [];
  if (snapshot.marketValuation > 0) {
    marketLines.push(`💰 <b>MCap:</b> ${formatUsd(snapshot.marketValuation)}`);
    if (snapshot.liquidityUsd > 0) marketLines.push(`💧 <b>Liquidity:</b> ${formatUsd(snapshot.liquidityUsd)}`);
    if (snapshot.volume24h > 0) marketLines.push(`📊 <b>24h Volume:</b> ${formatUsd(snapshot.volume24h)}`);
    if (snapshot.priceChange24h !== 0) {
      const emoji = snapshot.priceChange24h > 0 ? '📈' : '📉';
      const sign = snapshot.priceChange24h > 0 ? '+' : '';
      marketLines.push(`${emoji} <b>24h Change:</b> ${sign}${snapshot.priceChange24h.toFixed(1)}%`);
    }
  }

  const totalSol = wallets.reduce((sum, w) => sum + w.nativeSpent, 0);
  const dex = snapshot.dexId ? snapshot.dexId.toUpperCase() : '?';
  const windowSeconds = Math.round(options.timeWindowMs / 1000);

  const sections = [
    formatHeader(decision, options.bullishWindowMs),
    [
      `📊 <b>Token:</b> $${escapeHtml(snapshot.symbol)}`,
      `📛 <b>Name:</b> ${escapeHtml(snapshot.name)}`,
      '📍 <b>Contract:</b>',
      `<code>${asset}</code>`,
      ...marketLines,
    ].join('\n'),
    [`👛 <b>Wallets (${wallets.length}):</b>`, ...walletLines].join('\n'),
    [
      `💵 <b>Total bought:</b> ${totalSol.toFixed(2)} SOL`,
      `💱 <b>DEX:</b> ${dex}`,
      `⏰ <b>Detected:</b> ${formatClock(decision.decidedAt, options.localUtcOffsetHours)}`,
    ].join('\n'),
    ['🔗 <b>Links:</b>', formatLinksAsHtml(asset)].join('\n'),
    `⚡️ <b>${wallets.length} smart money wallets bought the same token within ${windowSeconds} seconds!</b>`,
  ];

  return sections.join('\n\n');
}

// ============ NOTIFIER ============

export class TelegramNotifier implements Notifier {
  private sender: MessageSender | null;
  private chatId: string;

  constructor(private readonly options: TelegramNotifierOptions) {
    this.chatId = options.chatId;

    if (options.sender) {
      this.sender = options.sender;
    } else if (options.botToken && options.chatId) {
      // Send-only: commands are not handled so no polling
      this.sender = new TelegramBot(options.botToken, { polling: false });
    } else {
      logger.warn('Telegram bot token or chat id not configured - alerts disabled');
      this.sender = null;
    }
  }

  isEnabled(): boolean {
    return this.sender !== null;
  }

  async notify(decision: AlertDecision): Promise<boolean> {
    return this.send(formatAlertMessage(decision, this.options), decision.symbol);
  }

  async sendStatus(message: string): Promise<boolean> {
    return this.send(`ℹ️ <b>SOL Status:</b> ${message}`, 'status');
  }

  async sendReport(html: string): Promise<boolean> {
    return this.send(html, 'report');
  }

  private async send(text: string, context: string): Promise<boolean> {
    if (!this.sender) return false;

    try {
      await this.sender.sendMessage(this.chatId, text, {
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      });
      return true;
    } catch (error) {
      logger.error({ context, error: errorMessage(error) }, 'Telegram send failed');
      return false;
    }
  }
}
