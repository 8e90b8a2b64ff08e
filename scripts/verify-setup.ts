#!/usr/bin/env node

/**
 * Setup Verification Script
 * Run this to check your configuration before starting the monitor
 */

import TelegramBot from 'node-telegram-bot-api';
import { appConfig } from '../src/config/index.js';
import { errorMessage } from '../src/utils/errors.js';
import { Database, createPool } from '../src/utils/database.js';
import { loadWallets } from '../src/modules/wallet-loader.js';
import { heliusClient, dexScreenerClient } from '../src/modules/onchain.js';

const REQUIRED_VARS = [
  'HELIUS_API_KEY',
  'TELEGRAM_BOT_TOKEN',
  'TELEGRAM_CHAT_ID',
];

const OPTIONAL_VARS = [
  'DATABASE_URL',
  'WEBHOOK_SECRET',
];

function mask(value: string): string {
  return value.length > 10 ? value.slice(0, 4) + '...' + value.slice(-4) : '****';
}

console.log('\n' + '='.repeat(50));
console.log('SOL SMART MONEY ALERTS - SETUP VERIFICATION');
console.log('='.repeat(50) + '\n');

// Check required variables
console.log('📋 Checking required environment variables...\n');

let allRequired = true;
for (const varName of REQUIRED_VARS) {
  const value = process.env[varName];
  if (value && value.length > 0) {
    console.log(`  ✅ ${varName}: ${mask(value)}`);
  } else {
    console.log(`  ❌ ${varName}: NOT SET`);
    allRequired = false;
  }
}

console.log('\n📋 Checking optional environment variables...\n');

for (const varName of OPTIONAL_VARS) {
  const value = process.env[varName];
  if (value && value.length > 0) {
    console.log(`  ✅ ${varName}: Set`);
  } else {
    console.log(`  ⚠️  ${varName}: Not set (optional)`);
  }
}

// Wallet list
console.log('\n📋 Loading wallet list...\n');

const wallets = await loadWallets(appConfig.walletsFile);
if (wallets.length > 0) {
  console.log(`  ✅ ${wallets.length} wallets in ${appConfig.walletsFile}`);
} else {
  console.log(`  ❌ No valid wallets in ${appConfig.walletsFile}`);
  allRequired = false;
}

// Test database connection
if (appConfig.databaseUrl) {
  console.log('\n📋 Testing database connection...\n');

  const database = new Database(createPool(appConfig.databaseUrl));
  try {
    await database.ping();
    console.log('  ✅ PostgreSQL connected');
  } catch (error) {
    console.log(`  ❌ PostgreSQL failed: ${errorMessage(error)}`);
    allRequired = false;
  } finally {
    await database.close();
  }
}

// Test Helius
if (wallets.length > 0) {
  console.log('\n📋 Testing Helius RPC...\n');

  const result = await heliusClient.getLatestTransactionIds(wallets[0], 1);
  if (result.ok) {
    console.log(`  ✅ Helius: ${heliusClient.getMaskedRpcUrl()} (${result.data.length} signature)`);
  } else {
    console.log(`  ❌ Helius ${result.category}: ${result.message}`);
    allRequired = false;
  }
}

// Test DexScreener
console.log('\n📋 Testing DexScreener...\n');

const solPrice = await dexScreenerClient.getNativePriceUsd();
console.log(`  ✅ SOL price: $${solPrice.toFixed(2)}`);

// Test Telegram bot
console.log('\n📋 Testing Telegram bot...\n');

if (appConfig.telegramBotToken) {
  try {
    const bot = new TelegramBot(appConfig.telegramBotToken, { polling: false });
    const me = await bot.getMe();
    console.log(`  ✅ Telegram bot: @${me.username ?? me.first_name}`);
  } catch (error) {
    console.log(`  ❌ Telegram test failed: ${errorMessage(error)}`);
    allRequired = false;
  }
}

// Summary
console.log('\n' + '='.repeat(50));
if (allRequired) {
  console.log('✅ All checks passed! You can start the monitor with:');
  console.log('   npm run build && npm start');
} else {
  console.log('❌ Some checks failed. Please fix the issues above.');
}
console.log('='.repeat(50) + '\n');

process.exit(allRequired ? 0 : 1);
