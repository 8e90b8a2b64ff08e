// ===========================================
// MODULE: HELIUS WEBHOOK REGISTRATION
// Points a Helius enhanced webhook at this server with the
// current wallet list, reusing an existing webhook when possible
// ===========================================

import * as fs from 'fs';
import * as path from 'path';
import { logger, short } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import type { CallResult, HeliusWebhook } from '../types/index.js';

// ============ TYPES ============

// The part of HeliusClient registration needs
export interface WebhookRegistrar {
  listWebhooks(): Promise<CallResult<HeliusWebhook[]>>;
  updateWebhook(
    webhookId: string,
    wallets: string[],
    webhookUrl: string,
    authHeader: string
  ): Promise<CallResult<HeliusWebhook>>;
  registerWebhook(
    wallets: string[],
    webhookUrl: string,
    authHeader: string
  ): Promise<CallResult<HeliusWebhook>>;
}

export interface WebhookIdStore {
  load(): Promise<string | null>;
  save(webhookId: string): Promise<void>;
}

export interface WebhookRegistrationOptions {
  registrar: WebhookRegistrar;
  idStore: WebhookIdStore;
  webhookUrl: string;
  authHeader: string;
  maxAttempts?: number;
  retryBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

export type RegistrationOutcome =
  | { status: 'UPDATED'; webhookId: string; via: 'LISTED' | 'STORED_ID' }
  | { status: 'KEPT_EXISTING'; webhookId: string }
  | { status: 'REGISTERED'; webhookId: string }
  | { status: 'FAILED'; attempts: number };

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_RETRY_BASE_MS = 30_000;

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

// ============ URL ============

/**
 * Public base URL or bare domain -> the receiver's webhook endpoint
 */
export function buildWebhookUrl(publicUrl: string): string {
  const trimmed = publicUrl.trim().replace(/\/+$/, '');
  const base = /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return `${base}/webhook`;
}

// ============ WEBHOOK ID FILE ============

export class WebhookIdFile implements WebhookIdStore {
  constructor(private readonly filePath: string) {}

  async load(): Promise<string | null> {
    try {
      const id = (await fs.promises.readFile(this.filePath, 'utf8')).trim();
      return id || null;
    } catch (error) {
      logger.debug({ file: this.filePath, reason: errorMessage(error) }, 'No stored webhook id');
      return null;
    }
  }

  async save(webhookId: string): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.promises.writeFile(this.filePath, webhookId);
    } catch (error) {
      logger.warn({ file: this.filePath, error: errorMessage(error) }, 'Could not store webhook id');
    }
  }
}

// ============ REGISTRATION ============

/**
 * Each attempt tries, in order: the listed webhook whose URL matches,
 * the stored webhook id, then a fresh registration. Failed attempts
 * wait 30s, 60s, ... before the next one.
 */
export async function ensureWebhook(
  wallets: string[],
  options: WebhookRegistrationOptions
): Promise<RegistrationOutcome> {
  const { registrar, idStore, webhookUrl, authHeader } = options;
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const listed = await registrar.listWebhooks();
    const existing = listed.ok ? listed.data.find(w => w.webhookURL === webhookUrl) : undefined;

    if (existing) {
      const webhookId = existing.webhookID;
      const updated = await registrar.updateWebhook(webhookId, wallets, webhookUrl, authHeader);
      if (updated.ok) {
        await idStore.save(webhookId);
        logger.info({ webhookId: short(webhookId), wallets: wallets.length }, 'Helius webhook updated');
        return { status: 'UPDATED', webhookId, via: 'LISTED' };
      }

      // The webhook still delivers with its previous wallet list
      logger.warn({ webhookId: short(webhookId), error: updated.message }, 'Webhook update failed, keeping existing');
      return { status: 'KEPT_EXISTING', webhookId };
    }

    const storedId = await idStore.load();
    if (storedId) {
      const updated = await registrar.updateWebhook(storedId, wallets, webhookUrl, authHeader);
      if (updated.ok) {
        logger.info({ webhookId: short(storedId), wallets: wallets.length }, 'Helius webhook updated from stored id');
        return { status: 'UPDATED', webhookId: storedId, via: 'STORED_ID' };
      }
    }

    const registered = await registrar.registerWebhook(wallets, webhookUrl, authHeader);
    if (registered.ok) {
      const webhookId = registered.data.webhookID;
      await idStore.save(webhookId);
      logger.info({ webhookId: short(webhookId), webhookUrl, wallets: wallets.length }, 'Helius webhook registered');
      return { status: 'REGISTERED', webhookId };
    }

    if (attempt < maxAttempts) {
      const waitMs = retryBaseMs * attempt;
      logger.warn({ attempt, maxAttempts, waitMs, error: registered.message }, 'Webhook setup failed, retrying');
      await sleep(waitMs);
    }
  }

  logger.warn({ attempts: maxAttempts }, 'Webhook setup gave up, a previous webhook may still be active');
  return { status: 'FAILED', attempts: maxAttempts };
}
