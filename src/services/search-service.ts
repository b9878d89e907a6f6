/**
 * Search Service
 *
 * Facade that wires the engine together for one search:
 * resolve areas -> run query units -> match and dedup -> aggregate.
 *
 * The request budget and in-memory result cache live as long as the service,
 * so repeated searches from one process share both.
 *
 * USAGE:
 * ```typescript
 * const service = await createSearchService({ config, authToken });
 * const results = await service.search({ areaIds: ['zipset:TX/Collin'] });
 * ```
 */

import { randomUUID } from 'node:crypto';
import type { SearchEngineConfig } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import type { ObservationSource, SearchStrategy } from '../core/types/query.js';
import type { SearchResultSet } from '../core/types/results.js';
import { createLogger } from '../core/utils/logger.js';
import type { HTTPClientDeps } from '../core/http-client.js';
import {
  OverpassBoundarySource,
  type BoundarySource,
} from '../providers/overpass-boundary-source.js';
import { WigleClient } from '../providers/wigle-client.js';
import { StaticRegistry } from '../registry/static-registry.js';
import { RequestBudget } from '../resilience/rate-limiter.js';
import { SignatureStore } from '../signatures/signature-store.js';
import { AreaResolver } from './area-resolver.js';
import { BoundaryCache, FileCacheStore } from './boundary-cache.js';
import { MatchEngine } from './match-engine.js';
import { QueryOrchestrator, type UnitProgress } from './query-orchestrator.js';
import { QueryResultCache } from './query-result-cache.js';
import { aggregateResults } from './result-aggregator.js';

const log = createLogger({ module: 'search' });

const SEEN_SINCE_PATTERN = /^\d{8}$/;

export interface SearchRequest {
  readonly areaIds: readonly string[];
  readonly strategy?: SearchStrategy;
  /** YYYYMMDD; defaults to orchestrator.seenSince */
  readonly seenSince?: string;
  readonly signal?: AbortSignal;
  readonly onProgress?: (update: UnitProgress) => void;
}

export interface SearchServiceDeps {
  readonly signatures: SignatureStore;
  readonly observationSource: ObservationSource;
  readonly boundarySource: BoundarySource;
  readonly registry: StaticRegistry;
  /** File store backing the boundary cache (and persisted results); omit to disable */
  readonly cacheStore?: FileCacheStore;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
  readonly generateId?: () => string;
}

export class SearchService {
  private readonly budget: RequestBudget;
  private readonly resultCache: QueryResultCache;
  private readonly resolver: AreaResolver;
  private readonly matcher: MatchEngine;
  private readonly now: () => number;
  private readonly generateId: () => string;

  constructor(
    private readonly config: SearchEngineConfig,
    private readonly deps: SearchServiceDeps
  ) {
    this.now = deps.now ?? Date.now;
    this.generateId = deps.generateId ?? randomUUID;

    this.budget = new RequestBudget(config.rateLimit, { now: this.now, sleep: deps.sleep });

    const store = config.cache.enabled ? deps.cacheStore : undefined;
    this.resultCache = new QueryResultCache({
      ttlMs: config.cache.resultTtlMs,
      now: this.now,
      ...(store !== undefined && config.cache.persistResults ? { store } : {}),
    });

    this.resolver = new AreaResolver(config.resolver, {
      boundarySource: deps.boundarySource,
      registry: deps.registry,
      now: this.now,
      ...(store !== undefined
        ? { boundaryCache: new BoundaryCache(store, config.cache.boundaryTtlMs, { now: this.now }) }
        : {}),
    });

    this.matcher = new MatchEngine(deps.signatures);
  }

  /**
   * Run one search
   *
   * @throws ConfigurationError for an empty selection or bad time window
   * @throws AreaNotFoundError when any selected id does not resolve
   */
  async search(request: SearchRequest): Promise<SearchResultSet> {
    const startedAt = new Date(this.now());
    const searchId = this.generateId();
    const strategy = request.strategy ?? this.config.resolver.strategy;
    const seenSince = request.seenSince ?? this.config.orchestrator.seenSince;

    if (!SEEN_SINCE_PATTERN.test(seenSince)) {
      throw new ConfigurationError(`Invalid time window "${seenSince}", expected YYYYMMDD`);
    }

    log.info('Search started', { searchId, areas: request.areaIds.length, strategy, seenSince });

    const resolution = await this.resolver.resolve(request.areaIds, {
      strategy,
      ssidPatterns: this.deps.signatures.ssidPatterns,
      signal: request.signal,
    });

    const orchestrator = new QueryOrchestrator(
      { ...this.config.orchestrator, seenSince },
      this.config.retry,
      {
        source: this.deps.observationSource,
        budget: this.budget,
        resultCache: this.config.cache.enabled ? this.resultCache : undefined,
        sleep: this.deps.sleep,
        random: this.deps.random,
      }
    );

    const orchestration = await orchestrator.run(resolution.units, {
      signal: request.signal,
      onProgress: request.onProgress,
    });

    const match = this.matcher.process(orchestration.completed);

    const results = aggregateResults({
      searchId,
      startedAt,
      completedAt: new Date(this.now()),
      strategy,
      seenSince,
      areasRequested: request.areaIds,
      resolution,
      orchestration,
      match,
      signatures: {
        bssidPrefixes: this.deps.signatures.bssidPrefixes.length,
        ssidPatterns: this.deps.signatures.ssidPatterns.length,
      },
    });

    log.info('Search finished', {
      searchId,
      devices: results.devices.length,
      units: results.metadata.units.requested,
      failed: results.metadata.units.failed,
      skipped: results.metadata.units.skipped,
      durationMs: results.metadata.durationMs,
    });

    return results;
  }
}

export interface CreateSearchServiceOptions {
  readonly config: SearchEngineConfig;
  readonly authToken: string | null;
  readonly signaturesDir: string;
  /** Defaults to the registry bundled with the package */
  readonly registryDir?: string;
  readonly http?: HTTPClientDeps;
}

/**
 * Build a service against the live WiGLE and Overpass endpoints
 *
 * Signature files and the registry are loaded first, so configuration
 * problems surface before any network activity.
 */
export async function createSearchService(options: CreateSearchServiceOptions): Promise<SearchService> {
  const { config } = options;
  const { store: signatures, report } = await SignatureStore.load(options.signaturesDir);

  const invalid = report.invalidBssidPrefixes.length + report.invalidSsidPatterns.length;
  if (invalid > 0) {
    log.warn('Ignoring invalid signature entries', {
      bssidPrefixes: report.invalidBssidPrefixes.join(', '),
      ssidPatterns: report.invalidSsidPatterns.join(', '),
    });
  }

  const registry = await StaticRegistry.load(options.registryDir);
  const observationSource = new WigleClient(config.wigle, options.authToken, options.http);
  const boundarySource = new OverpassBoundarySource(config.overpass, options.http);

  return new SearchService(config, {
    signatures,
    observationSource,
    boundarySource,
    registry,
    ...(config.cache.enabled ? { cacheStore: new FileCacheStore(config.cache.directory) } : {}),
  });
}
