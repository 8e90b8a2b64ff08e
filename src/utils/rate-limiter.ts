// ===========================================
// SHARED RATE LIMITER UTILITY
// Used by the Helius RPC and Enhanced Transactions clients
// ===========================================

import axios from 'axios';
import { logger } from './logger.js';
import { RateLimitedError, errorMessage } from './errors.js';
import { FailureCategory, type CallResult } from '../types/index.js';

// ============ TYPES ============

export interface RateLimiterConfig {
  serviceName: string;
  minDelayBetweenRequests: number; // ms
  baseBackoffMs: number;           // first 429 retry waits this long
  backoffMultiplier: number;
  maxBackoff: number;              // ms
  maxRetries: number;              // 429 retries before giving up
}

export interface RateLimiterClock {
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export type CallFailure = Extract<CallResult<never>, { ok: false }>;

interface QueueItem {
  endpoint: string;
  retryCount: number;
  // Runs the request and returns a thunk that settles the caller's promise
  attempt: () => Promise<() => void>;
  fail: (failure: CallFailure) => void;
}

const systemClock: RateLimiterClock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(resolve => setTimeout(resolve, ms)),
};

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof RateLimitedError) return true;
  return axios.isAxiosError(error) && error.response?.status === 429;
}

// ============ RATE LIMITER CLASS ============

export class RateLimiter {
  private config: RateLimiterConfig;
  private clock: RateLimiterClock;
  private lastRequestTime = 0;
  private queue: QueueItem[] = [];
  private isProcessing = false;
  private stats = { requests: 0, rateLimited: 0, exhausted: 0, transportFailures: 0 };

  constructor(config: RateLimiterConfig, clock: RateLimiterClock = systemClock) {
    this.config = config;
    this.clock = clock;
  }

  /**
   * Execute a request with rate limiting and 429 retry logic.
   * Never rejects: failures come back as a CallResult with a category.
   */
  execute<T>(request: () => Promise<T>, endpoint: string): Promise<CallResult<T>> {
    return new Promise(resolve => {
      this.queue.push({
        endpoint,
        retryCount: 0,
        attempt: async () => {
          const data = await request();
          return () => resolve({ ok: true, data });
        },
        fail: failure => resolve(failure),
      });
      void this.processQueue();
    });
  }

  /**
   * Process the request queue one call at a time
   */
  private async processQueue(): Promise<void> {
    if (this.isProcessing) return;
    this.isProcessing = true;

    try {
      while (this.queue.length > 0) {
        // Enforce minimum delay between requests
        const timeSinceLastRequest = this.clock.now() - this.lastRequestTime;
        if (timeSinceLastRequest < this.config.minDelayBetweenRequests) {
          await this.clock.sleep(this.config.minDelayBetweenRequests - timeSinceLastRequest);
        }

        const item = this.queue.shift();
        if (!item) break;

        this.lastRequestTime = this.clock.now();
        this.stats.requests++;

        try {
          const settle = await item.attempt();
          settle();
        } catch (error) {
          await this.handleFailure(item, error);
        }
      }
    } finally {
      this.isProcessing = false;
    }
  }

  private async handleFailure(item: QueueItem, error: unknown): Promise<void> {
    const attempts = item.retryCount + 1;

    if (!isRateLimitError(error)) {
      this.stats.transportFailures++;
      logger.warn({
        service: this.config.serviceName,
        endpoint: item.endpoint,
        error: errorMessage(error),
      }, 'Request failed, not retrying');

      item.fail({
        ok: false,
        category: FailureCategory.TRANSPORT_FAILURE,
        endpoint: item.endpoint,
        attempts,
        message: errorMessage(error),
      });
      return;
    }

    this.stats.rateLimited++;

    if (item.retryCount >= this.config.maxRetries) {
      this.stats.exhausted++;
      logger.error({
        service: this.config.serviceName,
        endpoint: item.endpoint,
        attempts,
      }, 'Rate limit retries exhausted');

      item.fail({
        ok: false,
        category: FailureCategory.RATE_LIMITED,
        endpoint: item.endpoint,
        attempts,
        message: `Rate limited after ${attempts} attempts`,
      });
      return;
    }

    item.retryCount++;
    const backoff = this.getBackoff(item.retryCount);

    logger.warn({
      service: this.config.serviceName,
      endpoint: item.endpoint,
      retry: item.retryCount,
      backoffMs: backoff,
    }, 'Rate limited (429), backing off');

    // Put back at front of queue
    this.queue.unshift(item);
    await this.clock.sleep(backoff);
  }

  /**
   * Backoff before the given retry (1-based)
   */
  getBackoff(retry: number): number {
    return Math.min(
      this.config.baseBackoffMs * Math.pow(this.config.backoffMultiplier, retry - 1),
      this.config.maxBackoff
    );
  }

  getStats(): { requests: number; rateLimited: number; exhausted: number; transportFailures: number } {
    return { ...this.stats };
  }
}
