// ===========================================
// MODULE: WEBHOOK RECEIVER
// Helius enhanced webhooks push transactions for the tracked
// wallets; polling stays on as the backup path
// ===========================================

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'http';
import { logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { enhancedTransactionSchema } from '../types/helius.js';
import type { EnhancedTransaction } from '../types/index.js';
import type { AlertEngine } from './alert-engine.js';
import type { ValuationScheduler } from './valuation-scheduler.js';

export interface WebhookServerDeps {
  engine: AlertEngine;
  scheduler?: ValuationScheduler;
  secret: string;
  now?: () => number;
}

/**
 * Which tracked wallet a pushed transaction belongs to: fee payer first,
 * then token transfers, native transfers and finally account data
 */
export function findMonitoredWallet(
  tx: EnhancedTransaction,
  isTracked: (wallet: string) => boolean
): string | null {
  if (isTracked(tx.feePayer)) return tx.feePayer;

  for (const tt of tx.tokenTransfers) {
    if (isTracked(tt.fromUserAccount)) return tt.fromUserAccount;
    if (isTracked(tt.toUserAccount)) return tt.toUserAccount;
  }

  for (const nt of tx.nativeTransfers) {
    if (isTracked(nt.fromUserAccount)) return nt.fromUserAccount;
    if (isTracked(nt.toUserAccount)) return nt.toUserAccount;
  }

  for (const ad of tx.accountData) {
    if (isTracked(ad.account)) return ad.account;
  }

  return null;
}

export function createWebhookApp(deps: WebhookServerDeps): Express {
  const { engine, scheduler, secret } = deps;
  const now = deps.now ?? Date.now;
  const startedAt = now();

  const app = express();
  app.use(express.json({ limit: '5mb', strict: false }));

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({
      status: 'ok',
      mode: 'webhook',
      wallets: engine.getTrackedWallets().length,
      stats: engine.getStats(),
      pendingChecks: scheduler?.pendingCount() ?? 0,
      uptime: now() - startedAt,
    });
  });

  app.post('/webhook', async (req: Request, res: Response) => {
    if (secret && req.get('Authorization') !== secret) {
      logger.warn({ ip: req.ip }, 'Webhook auth failed');
      res.status(401).json({ error: 'unauthorized' });
      return;
    }

    const payload: unknown = req.body;
    let items: unknown[];
    if (Array.isArray(payload)) {
      items = payload;
    } else if (payload !== null && typeof payload === 'object') {
      items = [payload];
    } else {
      res.status(400).json({ error: 'unexpected payload type' });
      return;
    }

    let processed = 0;
    for (const item of items) {
      const parsed = enhancedTransactionSchema.safeParse(item);
      if (!parsed.success) {
        logger.debug({ issues: parsed.error.issues.length }, 'Skipping malformed webhook transaction');
        continue;
      }

      const wallet = findMonitoredWallet(parsed.data, w => engine.isTracked(w));
      if (!wallet) continue;

      try {
        await engine.processTransaction(wallet, parsed.data);
        processed++;
      } catch (error) {
        logger.error({ signature: parsed.data.signature, error: errorMessage(error) }, 'Webhook transaction failed');
      }
    }

    if (processed > 0) {
      logger.info({ processed, received: items.length }, 'Webhook processed');
    }
    res.status(200).json({ processed });
  });

  // Malformed JSON bodies
  app.use((error: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    logger.warn({ error: errorMessage(error) }, 'Webhook request rejected');
    res.status(400).json({ error: 'invalid json' });
  });

  return app;
}

export class WebhookServer {
  private server: Server | null = null;
  private readonly app: Express;

  constructor(deps: WebhookServerDeps) {
    this.app = createWebhookApp(deps);
  }

  start(port: number, host = '0.0.0.0'): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        const address = server.address();
        const boundPort = address !== null && typeof address === 'object' ? address.port : port;
        logger.info({ port: boundPort, host }, 'Webhook server started');
        resolve(boundPort);
      });

      server.on('error', (error) => {
        logger.error({ error: errorMessage(error), port }, 'Express server error');
        reject(error);
      });

      this.server = server;
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
