/**
 * WiGLE Observation Source
 *
 * Bounding-box network search against the WiGLE v2 API. One call returns one
 * page; the orchestrator drives pagination through the `searchAfter` cursor.
 *
 * Records without a BSSID, with an unparsable BSSID, or with missing or
 * out-of-range coordinates are counted as malformed and dropped.
 *
 * API: https://api.wigle.net/swagger
 *
 * @module providers/wigle-client
 */

import { z } from 'zod';
import {
  ConfigurationError,
  RateLimitExceededError,
  SourceResponseError,
} from '../core/errors.js';
import type { ServiceEndpointConfig } from '../core/config.js';
import { isValidCoordinate } from '../core/geo-utils.js';
import {
  HTTPClient,
  HTTPError,
  HTTPSchemaError,
  parseRetryAfter,
  type HTTPClientDeps,
} from '../core/http-client.js';
import { normalizeBssid } from '../core/mac.js';
import type { Observation, RawFields, RawValue } from '../core/types/observation.js';
import type {
  ObservationPage,
  ObservationSource,
  PageRequest,
  RateLimitInfo,
} from '../core/types/query.js';
import { createLogger } from '../core/utils/logger.js';

const log = createLogger({ module: 'wigle' });

export const WIGLE_SEARCH_PATH = '/api/v2/network/search';
export const WIGLE_SITE_STATS_PATH = '/api/v2/stats/site';
export const WIGLE_USER_STATS_PATH = '/api/v2/stats/user';

const SearchResponseSchema = z.object({
  success: z.boolean(),
  totalResults: z.number().optional(),
  searchAfter: z.union([z.string(), z.number()]).nullable().optional(),
  results: z.array(z.unknown()).optional(),
  message: z.string().optional(),
});

const NetworkRecordSchema = z.record(z.unknown());

const UserStatsSchema = z.object({
  success: z.boolean(),
  user: z.string().optional(),
  statistics: z
    .object({
      eventPrevCalendarDay: z.number().optional(),
      eventPrevMonth: z.number().optional(),
      discoveredGPS: z.number().optional(),
    })
    .passthrough()
    .optional(),
  message: z.string().optional(),
});

const SiteStatsSchema = z.object({ success: z.boolean().optional() }).passthrough();

const RATE_LIMIT_MESSAGE = /too many queries|rate limit/i;

export interface WigleQuota {
  readonly user: string | null;
  readonly queriesPreviousDay: number;
  readonly queriesPreviousMonth: number;
  readonly discoveredGps: number;
}

/**
 * Map one upstream record to an Observation, or null when malformed
 */
export function toObservation(record: Readonly<Record<string, unknown>>): Observation | null {
  const netid = record.netid;
  if (typeof netid !== 'string') return null;

  const bssid = normalizeBssid(netid);
  if (bssid === null) return null;

  const latitude = toNumber(record.trilat);
  const longitude = toNumber(record.trilong);
  if (latitude === null || longitude === null || !isValidCoordinate(latitude, longitude)) {
    return null;
  }

  const ssid = typeof record.ssid === 'string' && record.ssid.length > 0 ? record.ssid : null;

  return Object.freeze({
    bssid,
    ssid,
    latitude,
    longitude,
    lastSeen: toIsoTimestamp(record.lasttime),
    firstSeen: toIsoTimestamp(record.firsttime),
    raw: toRawFields(record),
  });
}

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toIsoTimestamp(value: unknown): string | null {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const time = Date.parse(value);
  return Number.isNaN(time) ? null : new Date(time).toISOString();
}

/**
 * Keep primitive fields; nested values and empty strings are dropped
 */
function toRawFields(record: Readonly<Record<string, unknown>>): RawFields {
  const raw: Record<string, RawValue> = {};
  for (const [key, value] of Object.entries(record)) {
    if (value === '' || value === undefined) continue;
    if (
      value === null ||
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean'
    ) {
      raw[key] = value;
    }
  }
  return Object.freeze(raw);
}

/**
 * Read rate-limit indicators from response headers
 */
export function readRateLimitHeaders(headers: Headers, now: number = Date.now()): RateLimitInfo | undefined {
  const remainingHeader = headers.get('x-ratelimit-remaining');
  const resetHeader = headers.get('x-ratelimit-reset');
  const retryAfterMs = parseRetryAfter(headers.get('retry-after'), now);

  const remaining = remainingHeader !== null ? toNumber(remainingHeader) : null;
  const reset = resetHeader !== null ? toNumber(resetHeader) : null;

  let resetAt: number | undefined;
  if (reset !== null) {
    // Epoch seconds, or seconds from now for small values
    resetAt = reset > 1_000_000_000 ? reset * 1000 : now + reset * 1000;
  }

  if (remaining === null && resetAt === undefined && retryAfterMs === null) {
    return undefined;
  }

  return {
    ...(remaining !== null ? { remaining } : {}),
    ...(resetAt !== undefined ? { resetAt } : {}),
    ...(retryAfterMs !== null ? { retryAfterMs } : {}),
  };
}

export class WigleClient implements ObservationSource {
  readonly name = 'wigle';
  private readonly http: HTTPClient;
  private readonly authHeader: string;

  constructor(
    private readonly config: ServiceEndpointConfig,
    authToken: string | null,
    deps: HTTPClientDeps = {}
  ) {
    if (authToken === null || authToken.trim() === '') {
      throw new ConfigurationError(
        'WiGLE API credentials missing: set WIGLE_API_TOKEN, or WIGLE_API_NAME and WIGLE_API_KEY'
      );
    }
    this.authHeader = `Basic ${authToken.trim()}`;
    this.http = new HTTPClient(
      { timeoutMs: config.timeoutMs, userAgent: config.userAgent, maxRetries: 0 },
      deps
    );
  }

  buildSearchUrl(request: PageRequest): string {
    const [minLon, minLat, maxLon, maxLat] = request.bbox;
    const params = new URLSearchParams({
      latrange1: String(minLat),
      latrange2: String(maxLat),
      longrange1: String(minLon),
      longrange2: String(maxLon),
      lastupdt: request.seenSince,
      resultsPerPage: String(request.pageSize),
      onlymine: 'false',
      freenet: 'false',
      paynet: 'false',
    });
    if (request.ssidLike !== undefined) {
      params.set('ssidlike', request.ssidLike);
    }
    if (request.cursor !== null) {
      params.set('searchAfter', request.cursor);
    }
    return `${this.config.baseUrl}${WIGLE_SEARCH_PATH}?${params.toString()}`;
  }

  /**
   * Fetch one page of networks inside the request's box
   *
   * @throws RateLimitExceededError on HTTP 429 or a quota message
   * @throws SourceResponseError when the body is not a search response
   * @throws HTTPError and friends for other transport failures
   */
  async searchPage(request: PageRequest): Promise<ObservationPage> {
    const url = this.buildSearchUrl(request);

    let data: z.infer<typeof SearchResponseSchema>;
    let response: Response;
    try {
      ({ data, response } = await this.http.fetchParsed(url, SearchResponseSchema, {
        headers: this.headers(),
      }));
    } catch (error) {
      throw this.translateError(error);
    }

    const rateLimit = readRateLimitHeaders(response.headers);

    if (!data.success) {
      const message = data.message ?? 'search failed';
      if (RATE_LIMIT_MESSAGE.test(message)) {
        throw new RateLimitExceededError(`WiGLE: ${message}`, rateLimit?.retryAfterMs ?? null);
      }
      throw new SourceResponseError('wigle', message);
    }

    const records = data.results ?? [];
    const observations: Observation[] = [];
    let malformed = 0;

    for (const entry of records) {
      const record = NetworkRecordSchema.safeParse(entry);
      const observation = record.success ? toObservation(record.data) : null;
      if (observation === null) {
        malformed++;
      } else {
        observations.push(observation);
      }
    }

    if (malformed > 0) {
      log.debug('Dropped malformed records', { malformed, page: request.cursor ?? 'first' });
    }

    // An empty page ends the unit; a short page may still carry a cursor
    const cursor = data.searchAfter;
    const nextCursor =
      cursor !== null && cursor !== undefined && records.length > 0 ? String(cursor) : null;

    return {
      observations,
      malformed,
      nextCursor,
      ...(data.totalResults !== undefined ? { totalResults: data.totalResults } : {}),
      ...(rateLimit !== undefined ? { rateLimit } : {}),
    };
  }

  /**
   * Verify the credentials against the site statistics endpoint
   */
  async checkAuth(): Promise<boolean> {
    try {
      await this.http.fetchParsed(`${this.config.baseUrl}${WIGLE_SITE_STATS_PATH}`, SiteStatsSchema, {
        headers: this.headers(),
      });
      return true;
    } catch (error) {
      if (error instanceof HTTPError && (error.statusCode === 401 || error.statusCode === 403)) {
        return false;
      }
      throw error;
    }
  }

  async getQuota(): Promise<WigleQuota> {
    const { data } = await this.http.fetchParsed(
      `${this.config.baseUrl}${WIGLE_USER_STATS_PATH}`,
      UserStatsSchema,
      { headers: this.headers() }
    );
    if (!data.success) {
      throw new SourceResponseError('wigle', data.message ?? 'user statistics unavailable');
    }
    return {
      user: data.user ?? null,
      queriesPreviousDay: data.statistics?.eventPrevCalendarDay ?? 0,
      queriesPreviousMonth: data.statistics?.eventPrevMonth ?? 0,
      discoveredGps: data.statistics?.discoveredGPS ?? 0,
    };
  }

  private headers(): Record<string, string> {
    return {
      Authorization: this.authHeader,
      Accept: 'application/json',
    };
  }

  private translateError(error: unknown): unknown {
    if (error instanceof HTTPError && error.statusCode === 429) {
      const retryAfterMs = error.response
        ? parseRetryAfter(error.response.headers.get('retry-after'))
        : null;
      return new RateLimitExceededError('WiGLE: HTTP 429 Too Many Requests', retryAfterMs);
    }
    if (error instanceof HTTPSchemaError) {
      return new SourceResponseError('wigle', 'unexpected search response', error.issues);
    }
    return error;
  }
}

/**
 * Map URL for a network on wigle.net
 */
export function wigleMapUrl(bssid: string): string {
  return `https://wigle.net/search?netid=${bssid}`;
}
