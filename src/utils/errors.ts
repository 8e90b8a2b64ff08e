// ===========================================
// ERROR CLASSES
// ===========================================

/**
 * Thrown by HTTP adapters when the upstream answers 429 (or the JSON-RPC
 * equivalent) so the rate limiter can tell it apart from transport failures.
 */
export class RateLimitedError extends Error {
  readonly service: string;

  constructor(service: string, message = `${service} rate limited (429)`) {
    super(message);
    this.name = 'RateLimitedError';
    this.service = service;
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
