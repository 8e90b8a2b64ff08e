// ===========================================
// CONFIGURATION LOADER
// ===========================================

import { config } from 'dotenv';
import { z } from 'zod';
import type { AppConfig } from '../types/index.js';
import { EXCLUDED_SYMBOLS, EXCLUDED_TOKENS } from './constants.js';

// Load .env file
config();

// Comma-separated list of hours (0-23), e.g. "2,3,4"
const hourList = z.string().optional().default('').transform((val, ctx) => {
  const hours = val.split(',').map(h => h.trim()).filter(h => h.length > 0).map(Number);
  for (const hour of hours) {
    if (!Number.isInteger(hour) || hour < 0 || hour > 23) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid blackout hour: ${hour}` });
      return z.NEVER;
    }
  }
  return hours;
});

const csvList = z.string().optional().default('').transform(val =>
  val.split(',').map(item => item.trim()).filter(item => item.length > 0)
);

const flag = (defaultValue: boolean) => z.string().optional().transform(val =>
  val === undefined ? defaultValue : val.toLowerCase() !== 'false'
);

// Environment validation schema
const envSchema = z.object({
  // Helius
  HELIUS_API_KEY: z.string().optional().default(''),
  HELIUS_RPC_URL: z.string().optional().default('https://mainnet.helius-rpc.com'),
  HELIUS_API_URL: z.string().optional().default('https://api.helius.xyz/v0'),
  DEXSCREENER_API_URL: z.string().optional().default('https://api.dexscreener.com'),

  // Telegram
  TELEGRAM_BOT_TOKEN: z.string().optional().default(''),
  TELEGRAM_CHAT_ID: z.string().optional().default(''),

  // Record store - in-memory store when empty
  DATABASE_URL: z.string().optional().default(''),

  // Webhook receiver
  WEBHOOK_SECRET: z.string().optional().default(''),
  PORT: z.coerce.number().int().positive().default(8080),
  // Public base URL or domain; when set the Helius webhook is registered at startup
  WEBHOOK_PUBLIC_URL: z.string().optional().default(''),
  WEBHOOK_ID_FILE: z.string().optional().default('data/webhook_id.txt'),
  WEBHOOK_SETUP_DELAY_SECONDS: z.coerce.number().nonnegative().default(30),

  // Files
  WALLETS_FILE: z.string().optional().default('data/smart_money_wallets.json'),
  CHECKPOINT_FILE: z.string().optional().default('data/checkpoints/last_signatures.json'),

  // System
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  // Alerting
  ALERT_THRESHOLD: z.coerce.number().int().positive().default(3),
  TIME_WINDOW_SECONDS: z.coerce.number().positive().default(20),
  ALERT_COOLDOWN_SECONDS: z.coerce.number().nonnegative().default(300),   // 5 minutes
  BULLISH_WINDOW_SECONDS: z.coerce.number().nonnegative().default(1800),  // 30 minutes
  BLACKOUT_HOURS: hourList,
  BLACKOUT_EXTRA_THRESHOLD: z.coerce.number().int().nonnegative().default(1),
  LOCAL_UTC_OFFSET_HOURS: z.coerce.number().min(-12).max(14).default(3),
  PROCESSED_ID_CAPACITY: z.coerce.number().int().min(2).default(10000),

  // Screening
  MAX_MCAP: z.coerce.number().default(700000),          // $700K
  MIN_VOLUME_24H: z.coerce.number().default(10000),     // $10K
  MIN_TXNS_24H: z.coerce.number().default(15),          // buys + sells
  MIN_BUY_VALUE_USD: z.coerce.number().default(5),      // below = dust
  MIN_LIQUIDITY: z.coerce.number().default(5000),       // $5K
  EXTRA_EXCLUDED_TOKENS: csvList,

  // Post-alert valuation checks
  SHORT_LIST_THRESHOLD: z.coerce.number().default(0.20),
  CONTRACTS_CHECK_THRESHOLD: z.coerce.number().default(0.50),
  DEAD_TOKEN_MCAP: z.coerce.number().default(20000),
  VALUATION_TICK_SECONDS: z.coerce.number().positive().default(60),

  // Polling
  POLLING_ENABLED: flag(true),
  POLLING_INTERVAL_SECONDS: z.coerce.number().positive().default(300),
  WALLET_BATCH_SIZE: z.coerce.number().int().positive().default(25),
  TX_FETCH_LIMIT: z.coerce.number().int().positive().max(1000).default(5),

  DATA_RETENTION_DAYS: z.coerce.number().int().positive().default(30),
  DAILY_REPORT_ENABLED: flag(true),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    console.error('❌ Invalid environment configuration:');
    console.error(parsed.error.format());
    process.exit(1);
  }

  const vars = parsed.data;

  return {
    heliusApiKey: vars.HELIUS_API_KEY,
    heliusRpcUrl: vars.HELIUS_RPC_URL,
    heliusApiUrl: vars.HELIUS_API_URL,
    dexScreenerApiUrl: vars.DEXSCREENER_API_URL,
    telegramBotToken: vars.TELEGRAM_BOT_TOKEN,
    telegramChatId: vars.TELEGRAM_CHAT_ID,
    databaseUrl: vars.DATABASE_URL,
    webhookSecret: vars.WEBHOOK_SECRET,
    port: vars.PORT,
    walletsFile: vars.WALLETS_FILE,
    checkpointFile: vars.CHECKPOINT_FILE,
    dataRetentionDays: vars.DATA_RETENTION_DAYS,
    dailyReportEnabled: vars.DAILY_REPORT_ENABLED,
    nodeEnv: vars.NODE_ENV,
    logLevel: vars.LOG_LEVEL,

    alerts: {
      threshold: vars.ALERT_THRESHOLD,
      timeWindowMs: vars.TIME_WINDOW_SECONDS * 1000,
      cooldownMs: vars.ALERT_COOLDOWN_SECONDS * 1000,
      bullishWindowMs: vars.BULLISH_WINDOW_SECONDS * 1000,
      blackoutHours: vars.BLACKOUT_HOURS,
      blackoutExtraThreshold: vars.BLACKOUT_EXTRA_THRESHOLD,
      localUtcOffsetHours: vars.LOCAL_UTC_OFFSET_HOURS,
      processedIdCapacity: vars.PROCESSED_ID_CAPACITY,
    },

    screening: {
      maxMarketCap: vars.MAX_MCAP,
      minVolume24h: vars.MIN_VOLUME_24H,
      minTxns24h: vars.MIN_TXNS_24H,
      minBuyValueUsd: vars.MIN_BUY_VALUE_USD,
      minLiquidity: vars.MIN_LIQUIDITY,
      excludedTokens: [...EXCLUDED_TOKENS, ...vars.EXTRA_EXCLUDED_TOKENS],
      excludedSymbols: [...EXCLUDED_SYMBOLS],
    },

    valuation: {
      shortListThreshold: vars.SHORT_LIST_THRESHOLD,
      contractsCheckThreshold: vars.CONTRACTS_CHECK_THRESHOLD,
      deadTokenMcap: vars.DEAD_TOKEN_MCAP,
      tickIntervalMs: vars.VALUATION_TICK_SECONDS * 1000,
    },

    webhookRegistration: {
      publicUrl: vars.WEBHOOK_PUBLIC_URL,
      idFile: vars.WEBHOOK_ID_FILE,
      setupDelayMs: vars.WEBHOOK_SETUP_DELAY_SECONDS * 1000,
    },

    polling: {
      enabled: vars.POLLING_ENABLED,
      intervalMs: vars.POLLING_INTERVAL_SECONDS * 1000,
      walletBatchSize: vars.WALLET_BATCH_SIZE,
      txFetchLimit: vars.TX_FETCH_LIMIT,
      checkpointFlushEveryCycles: 10,
      statsEveryCycles: 20,
    },
  };
}

export const appConfig = loadConfig();
export default appConfig;
