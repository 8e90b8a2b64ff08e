// ===========================================
// SOL SMART MONEY ALERTS - MAIN ENTRY POINT
// ===========================================

import { appConfig } from './config/index.js';
import { logger } from './utils/logger.js';
import { ConfigurationError, errorMessage } from './utils/errors.js';
import { Database, createPool } from './utils/database.js';
import { MemoryDecisionStore } from './utils/memory-store.js';
import { heliusClient, dexScreenerClient } from './modules/onchain.js';
import { AlertEngine } from './modules/alert-engine.js';
import { ValuationScheduler } from './modules/valuation-scheduler.js';
import { WalletMonitor } from './modules/wallet-monitor.js';
import { CheckpointStore } from './modules/checkpoint-store.js';
import { WebhookServer } from './modules/webhook-server.js';
import { TelegramNotifier } from './modules/telegram.js';
import { RetentionJob } from './modules/maintenance.js';
import { DailyReport } from './modules/daily-report.js';
import { WebhookIdFile, buildWebhookUrl, ensureWebhook } from './modules/webhook-registration.js';
import { loadWallets } from './modules/wallet-loader.js';
import { DEX_PROGRAM_IDS } from './config/constants.js';
import type { DecisionStore } from './types/index.js';

// ============ STARTUP ============

async function initializeStore(): Promise<{ store: DecisionStore; database: Database | null }> {
  if (!appConfig.databaseUrl) {
    logger.warn('DATABASE_URL not set - records kept in memory only');
    return { store: new MemoryDecisionStore(), database: null };
  }

  logger.info('Initializing database...');
  const database = new Database(createPool(appConfig.databaseUrl));
  try {
    await database.initializeSchema();
    logger.info('Database schema initialized');
  } catch (error) {
    logger.error({ error }, 'Failed to initialize database');
    throw error;
  }
  return { store: database, database };
}

/**
 * Print startup diagnostic summary
 */
function printStartupDiagnostics(walletCount: number, checkpointCount: number, solPrice: number): void {
  const divider = '='.repeat(55);
  const { alerts, screening, polling, webhookRegistration } = appConfig;

  logger.info(divider);
  logger.info('        SOL SMART MONEY MONITOR STARTUP');
  logger.info(divider);

  logger.info('');
  logger.info('ENVIRONMENT');
  logger.info(`   Mode: ${appConfig.nodeEnv.toUpperCase()}`);
  logger.info(`   Log Level: ${appConfig.logLevel}`);

  logger.info('');
  logger.info('API CONNECTIONS');
  logger.info(`   Helius: ${appConfig.heliusApiKey ? 'CONFIGURED' : 'MISSING - polling will fail'}`);
  logger.info('   DexScreener: FREE (token snapshots, SOL price)');
  logger.info(`   Telegram: ${appConfig.telegramBotToken ? 'CONFIGURED' : 'MISSING - alerts disabled'}`);
  logger.info(`   PostgreSQL: ${appConfig.databaseUrl ? 'CONFIGURED' : 'NOT SET - in-memory records'}`);

  logger.info('');
  logger.info('TRACKING');
  logger.info(`   Wallets: ${walletCount} | Checkpoints: ${checkpointCount}`);
  logger.info(`   Alert threshold: ${alerts.threshold} wallets / ${alerts.timeWindowMs / 1000}s`);
  logger.info(`   Cooldown: ${alerts.cooldownMs / 1000}s | Bullish window: ${alerts.bullishWindowMs / 60_000}m`);
  const blackout = alerts.blackoutHours.map(h => `${String(h).padStart(2, '0')}:00`).join(', ') || 'none';
  logger.info(`   Blackout: ${blackout} -> +${alerts.blackoutExtraThreshold} (UTC${alerts.localUtcOffsetHours >= 0 ? '+' : ''}${alerts.localUtcOffsetHours})`);
  logger.info(`   Swap verification: ${Object.keys(DEX_PROGRAM_IDS).length} DEX programs`);

  logger.info('');
  logger.info('SCREENING');
  logger.info(`   Max MCap: $${screening.maxMarketCap.toLocaleString()} | Min Liquidity: $${screening.minLiquidity.toLocaleString()}`);
  logger.info(`   Min Volume: $${screening.minVolume24h.toLocaleString()} | Min Txns: ${screening.minTxns24h}`);
  logger.info(`   Min Buy: $${screening.minBuyValueUsd} | SOL: $${solPrice.toFixed(2)}`);

  logger.info('');
  logger.info('POLLING');
  logger.info(`   ${polling.enabled ? `ENABLED - every ${polling.intervalMs / 1000}s, ${polling.walletBatchSize} wallets/batch` : 'DISABLED (webhook only)'}`);

  logger.info('');
  logger.info('WEBHOOK & REPORTS');
  logger.info(`   Helius webhook: ${webhookRegistration.publicUrl ? buildWebhookUrl(webhookRegistration.publicUrl) : 'NOT REGISTERED (set WEBHOOK_PUBLIC_URL)'}`);
  logger.info(`   Daily report: ${appConfig.dailyReportEnabled ? 'ENABLED - local midnight' : 'DISABLED'}`);

  logger.info('');
  logger.info(divider);
}

async function main(): Promise<void> {
  logger.info({ env: appConfig.nodeEnv }, 'Starting up...');

  const wallets = await loadWallets(appConfig.walletsFile);
  if (wallets.length === 0) {
    throw new ConfigurationError(`No wallets to track in ${appConfig.walletsFile}`);
  }

  const checkpoints = new CheckpointStore(appConfig.checkpointFile);
  const checkpointCount = await checkpoints.load();

  const { store, database } = await initializeStore();

  const notifier = new TelegramNotifier({
    botToken: appConfig.telegramBotToken,
    chatId: appConfig.telegramChatId,
    localUtcOffsetHours: appConfig.alerts.localUtcOffsetHours,
    bullishWindowMs: appConfig.alerts.bullishWindowMs,
    timeWindowMs: appConfig.alerts.timeWindowMs,
  });

  const scheduler = new ValuationScheduler(appConfig.valuation, {
    valuation: dexScreenerClient,
    store,
  });

  const engine = new AlertEngine(appConfig.alerts, appConfig.screening, {
    valuation: dexScreenerClient,
    notifier,
    store,
    scheduler,
  });
  engine.setTrackedWallets(wallets);

  const monitor = new WalletMonitor(appConfig.polling, {
    chain: heliusClient,
    engine,
    checkpoints,
  });

  const webhookServer = new WebhookServer({
    engine,
    scheduler,
    secret: appConfig.webhookSecret,
  });

  const retention = new RetentionJob(store, appConfig.dataRetentionDays);

  const dailyReport = appConfig.dailyReportEnabled
    ? new DailyReport({
      store,
      valuation: dexScreenerClient,
      notifier,
      utcOffsetHours: appConfig.alerts.localUtcOffsetHours,
      walletCount: () => engine.getTrackedWallets().length,
    })
    : null;

  const solPrice = await dexScreenerClient.getNativePriceUsd();
  printStartupDiagnostics(wallets.length, checkpointCount, solPrice);

  await webhookServer.start(appConfig.port);
  scheduler.start();
  retention.start();
  dailyReport?.start();
  if (appConfig.polling.enabled) {
    monitor.start();
  }

  // Register once the receiver is reachable from outside
  const { publicUrl, idFile, setupDelayMs } = appConfig.webhookRegistration;
  const webhookSetupTimer = publicUrl
    ? setTimeout(() => {
      ensureWebhook(engine.getTrackedWallets(), {
        registrar: heliusClient,
        idStore: new WebhookIdFile(idFile),
        webhookUrl: buildWebhookUrl(publicUrl),
        authHeader: appConfig.webhookSecret,
      })
        .then(outcome => logger.info({ outcome }, 'Webhook setup finished'))
        .catch((error) => logger.error({ error: errorMessage(error) }, 'Webhook setup failed'));
    }, setupDelayMs)
    : null;

  await notifier.sendStatus(
    `Monitor started\n` +
    `• ${wallets.length} wallets tracked\n` +
    `• Threshold: ${appConfig.alerts.threshold} wallets / ${appConfig.alerts.timeWindowMs / 1000}s\n` +
    `• Max MCap: $${Math.round(appConfig.screening.maxMarketCap / 1000)}K\n` +
    `• SOL: $${solPrice.toFixed(2)}`
  );

  // Graceful shutdown
  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down...');

    if (webhookSetupTimer) clearTimeout(webhookSetupTimer);
    scheduler.stop();
    retention.stop();
    dailyReport?.stop();
    await monitor.stop();
    await webhookServer.stop();
    await notifier.sendStatus('Monitor stopped');
    if (database) {
      await database.close();
    }

    logger.info({ stats: engine.getStats() }, 'Shutdown complete');
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error) => {
      logger.error({ error }, 'Error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGINT', () => onSignal('SIGINT'));
  process.on('SIGTERM', () => onSignal('SIGTERM'));
}

// ============ RUN ============

main().catch((error) => {
  logger.error({ error }, 'Fatal error during startup');
  process.exit(1);
});
