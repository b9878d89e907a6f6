/**
 * HTTP Client
 *
 * Native fetch with per-request timeouts, caller cancellation, backoff on
 * retryable statuses and zod-validated JSON bodies. The timeout covers the
 * body as well as the headers.
 *
 * The WiGLE client is built with `maxRetries: 0`: its retries belong to the
 * query orchestrator, where every attempt draws on the shared request budget.
 *
 * USAGE:
 * ```typescript
 * const client = new HTTPClient({ timeoutMs: 30000 });
 * const { data, response } = await client.fetchParsed(url, MySchema);
 * ```
 */

import type { z } from 'zod';
import { createLogger } from './utils/logger.js';

const log = createLogger({ module: 'http' });

// ============================================================================
// Configuration Types
// ============================================================================

export interface HTTPClientConfig {
  /** Maximum retry attempts after the first request (default: 3) */
  readonly maxRetries: number;
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
  readonly timeoutMs: number;
  readonly userAgent: string;
  /** 0-1, spreads concurrent retries apart */
  readonly jitterFactor: number;
}

export interface FetchOptions {
  readonly timeoutMs?: number;
  readonly headers?: Record<string, string>;
  readonly method?: 'GET' | 'POST';
  readonly body?: string | URLSearchParams;
  /** External cancellation */
  readonly signal?: AbortSignal;
}

/**
 * A 2xx response with its body already read
 */
export interface FetchedBody {
  readonly response: Response;
  readonly text: string;
}

export interface HTTPClientDeps {
  readonly fetch?: typeof fetch;
  readonly sleep?: (ms: number) => Promise<void>;
}

// ============================================================================
// Error Types
// ============================================================================

export class HTTPError extends Error {
  readonly name = 'HTTPError';

  constructor(
    message: string,
    readonly statusCode: number,
    readonly url: string,
    readonly response?: Response
  ) {
    super(message);
  }
}

export class HTTPTimeoutError extends Error {
  readonly name = 'HTTPTimeoutError';

  constructor(
    readonly url: string,
    readonly timeoutMs: number
  ) {
    super(`Request timeout after ${timeoutMs}ms: ${url}`);
  }
}

/**
 * DNS failure, refused connection or reset socket
 */
export class HTTPNetworkError extends Error {
  readonly name = 'HTTPNetworkError';

  constructor(
    readonly url: string,
    cause: Error
  ) {
    super(`Network error: ${cause.message}`, { cause });
  }
}

export class HTTPJSONParseError extends Error {
  readonly name = 'HTTPJSONParseError';
  /** First 500 characters of the body */
  readonly bodyExcerpt: string;

  constructor(
    readonly url: string,
    body: string,
    cause: Error
  ) {
    super(`Failed to parse JSON response: ${cause.message}`, { cause });
    this.bodyExcerpt = body.slice(0, 500);
  }
}

/**
 * Body was JSON but not the shape the provider expects
 */
export class HTTPSchemaError extends Error {
  readonly name = 'HTTPSchemaError';

  constructor(
    readonly url: string,
    readonly issues: readonly string[]
  ) {
    super(`Unexpected response shape from ${url}: ${issues.slice(0, 3).join('; ')}`);
  }
}

export function isRetryableStatus(status: number): boolean {
  return (
    status === 408 || // Request Timeout
    status === 429 || // Too Many Requests
    status === 500 ||
    status === 502 ||
    status === 503 ||
    status === 504
  );
}

/**
 * Timeouts, network failures and retryable statuses are transient.
 * Parse and schema errors are deterministic.
 */
export function isRetryableHTTPError(error: Error): boolean {
  if (error instanceof HTTPTimeoutError || error instanceof HTTPNetworkError) {
    return true;
  }
  if (error instanceof HTTPError) {
    return isRetryableStatus(error.statusCode);
  }
  return false;
}

/**
 * Parse a Retry-After header (delta seconds or HTTP date) into milliseconds
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (value === null || value.trim() === '') return null;

  const seconds = Number(value);
  if (Number.isFinite(seconds)) {
    return Math.max(0, Math.round(seconds * 1000));
  }

  const date = Date.parse(value);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

export interface BackoffPolicy {
  readonly initialDelayMs: number;
  readonly backoffMultiplier: number;
  readonly maxDelayMs: number;
  /** 0-1 */
  readonly jitterFactor: number;
}

/**
 * initialDelay * multiplier^(attempt - 1), capped at maxDelay, then spread by
 * up to +/- jitterFactor of itself
 */
export function backoffDelay(
  policy: BackoffPolicy,
  attempt: number,
  random: () => number = Math.random
): number {
  const capped = Math.min(
    policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1),
    policy.maxDelayMs
  );
  const spread = capped * policy.jitterFactor;
  return Math.max(0, Math.floor(capped + (random() * 2 - 1) * spread));
}

// ============================================================================
// HTTP Client Implementation
// ============================================================================

export class HTTPClient {
  private readonly config: HTTPClientConfig;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(config?: Partial<HTTPClientConfig>, deps: HTTPClientDeps = {}) {
    this.config = {
      maxRetries: 3,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 30000,
      timeoutMs: 30000,
      userAgent: 'alpr-scout/0.1',
      jitterFactor: 0.1,
      ...config,
    };
    // Resolve global fetch lazily so test stubs installed later are honoured
    this.fetchImpl = deps.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  /**
   * Fetch and parse a JSON body
   *
   * @throws {HTTPError} For non-2xx responses after retries
   * @throws {HTTPTimeoutError} If the request exceeds its timeout
   * @throws {HTTPNetworkError} For connection failures
   * @throws {HTTPJSONParseError} If the body is not JSON
   */
  async fetchJSON(url: string, options?: FetchOptions): Promise<{ data: unknown; response: Response }> {
    const { response, text } = await this.fetchWithRetry(url, options);

    try {
      const data: unknown = JSON.parse(text);
      return { data, response };
    } catch (error) {
      throw new HTTPJSONParseError(url, text, error instanceof Error ? error : new Error(String(error)));
    }
  }

  /**
   * Fetch JSON and validate it against a zod schema
   *
   * @throws Same as fetchJSON, plus HTTPSchemaError
   */
  async fetchParsed<T>(
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options?: FetchOptions
  ): Promise<{ data: T; response: Response }> {
    const { data, response } = await this.fetchJSON(url, options);
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new HTTPSchemaError(
        url,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return { data: parsed.data, response };
  }

  /**
   * Fetch a 2xx body, retrying transient failures with backoff
   */
  private async fetchWithRetry(url: string, options?: FetchOptions): Promise<FetchedBody> {
    const attempts = this.config.maxRetries + 1;

    for (let attempt = 1; ; attempt++) {
      try {
        return await this.fetchWithTimeout(url, options);
      } catch (error) {
        const failure = error instanceof Error ? error : new Error(String(error));
        if (attempt >= attempts || !isRetryableHTTPError(failure)) {
          throw failure;
        }
        log.warn('HTTP attempt failed', { url, attempt, attempts, error: failure.message });
        await this.sleep(backoffDelay(this.config, attempt));
      }
    }
  }

  /**
   * One attempt; the timer runs until the body has been read
   *
   * @throws {HTTPError} For non-2xx responses
   */
  private async fetchWithTimeout(url: string, options?: FetchOptions): Promise<FetchedBody> {
    const timeoutMs = options?.timeoutMs ?? this.config.timeoutMs;
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    const signal = options?.signal
      ? mergeAbortSignals([controller.signal, options.signal])
      : controller.signal;

    try {
      const response = await this.fetchImpl(url, {
        method: options?.method ?? 'GET',
        headers: {
          'User-Agent': this.config.userAgent,
          ...options?.headers,
        },
        body: options?.body,
        signal,
      });
      if (!response.ok) {
        throw new HTTPError(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
          url,
          response
        );
      }
      return { response, text: await readBody(response, signal) };
    } catch (error) {
      if (error instanceof HTTPError) {
        throw error;
      }
      // Caller cancelled
      if (options?.signal?.aborted) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new HTTPTimeoutError(url, timeoutMs);
      }

      throw new HTTPNetworkError(url, error instanceof Error ? error : new Error(String(error)));
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Body text, abandoned when the signal aborts even if the stream never does
 */
async function readBody(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    throw signal.reason;
  }
  const aborted = new Promise<never>((_, reject) => {
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
  return Promise.race([response.text(), aborted]);
}

/**
 * Signal that aborts when any input aborts
 */
export function mergeAbortSignals(signals: readonly AbortSignal[]): AbortSignal {
  const controller = new AbortController();

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      break;
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true });
  }

  return controller.signal;
}
