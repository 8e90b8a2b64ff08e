#!/usr/bin/env node

/**
 * Test Telegram Alert Script
 * Sends a sample cluster alert to verify the bot can post to your chat
 */

import { appConfig } from '../src/config/index.js';
import { TelegramNotifier } from '../src/modules/telegram.js';
import type { AlertDecision } from '../src/types/index.js';

if (!appConfig.telegramBotToken || !appConfig.telegramChatId) {
  console.error('❌ Missing TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID');
  process.exit(1);
}

console.log('\n🔄 Sending test alert...\n');

const asset = 'So11111111111111111111111111111111111111112';
const now = Date.now();

const sample: AlertDecision = {
  id: 'test-alert',
  asset,
  symbol: 'TEST',
  wallets: [
    { wallet: '11111111111111111111111111111111', nativeSpent: 1.5, valuationAtPurchase: 120_000 },
    { wallet: 'TokenkegQfeZyiNwAJbNbGKPFXCWuBvf9Ss623VQ5DA', nativeSpent: 0.8, valuationAtPurchase: 125_000 },
    { wallet: 'ComputeBudget111111111111111111111111111111', nativeSpent: 2.1, valuationAtPurchase: 131_000 },
  ],
  snapshot: {
    asset,
    symbol: 'TEST',
    name: 'Test Alert (not a real signal)',
    marketValuation: 131_000,
    priceUsd: 0.000131,
    liquidityUsd: 28_000,
    volume24h: 96_000,
    buys24h: 410,
    sells24h: 280,
    priceChange24h: 12.5,
    pairAddress: '',
    dexId: 'raydium',
  },
  streakPosition: 1,
  isBullish: false,
  baselineValuation: 131_000,
  effectiveThreshold: appConfig.alerts.threshold,
  decidedAt: now,
};

const notifier = new TelegramNotifier({
  botToken: appConfig.telegramBotToken,
  chatId: appConfig.telegramChatId,
  localUtcOffsetHours: appConfig.alerts.localUtcOffsetHours,
  bullishWindowMs: appConfig.alerts.bullishWindowMs,
  timeWindowMs: appConfig.alerts.timeWindowMs,
});

const sent = await notifier.notify(sample);
if (sent) {
  console.log('✅ Test alert sent successfully!');
  console.log('\n📱 Check your Telegram - you should see the test message.');
} else {
  console.error('❌ Failed to send test alert (see log above)');
  process.exit(1);
}
