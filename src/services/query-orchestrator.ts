/**
 * Query Orchestrator
 *
 * Runs QueryUnits through a bounded worker pool against the observation
 * source.
 *
 * - One RequestBudget gates every request from every worker
 * - Each page is retried with exponential backoff; an exhausted unit is
 *   recorded as failed and never aborts the others
 * - Pages within a unit are fetched strictly in cursor order
 * - Complete unit results are cached; partial pagination never is
 * - On abort, in-flight units finish and unstarted units are reported skipped
 */

import type { OrchestratorConfig, RetryPolicyConfig } from '../core/config.js';
import { QueryUnitFailedError, RateLimitExceededError, toError } from '../core/errors.js';
import type { Observation } from '../core/types/observation.js';
import type {
  FailedUnit,
  ObservationPage,
  ObservationSource,
  OrchestrationResult,
  QueryUnit,
  SkippedUnit,
  UnitCursor,
  UnitResult,
} from '../core/types/query.js';
import { createLogger } from '../core/utils/logger.js';
import { DEFAULT_EXHAUSTED_WAIT_MS, type RequestBudget } from '../resilience/rate-limiter.js';
import { RetryExecutor, RetryExhaustedError, type RetryAttempt } from '../resilience/retry.js';
import type { QueryResultCache } from './query-result-cache.js';

const log = createLogger({ module: 'orchestrator' });

export type UnitProgressEvent = 'started' | 'completed' | 'failed' | 'skipped';

export interface UnitProgress {
  readonly event: UnitProgressEvent;
  readonly unit: QueryUnit;
  readonly total: number;
  readonly completed: number;
  readonly failed: number;
  readonly skipped: number;
  /** Observations returned by a completed unit */
  readonly observations?: number;
  readonly fromCache?: boolean;
  readonly error?: string;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
  readonly onProgress?: (update: UnitProgress) => void;
}

export interface QueryOrchestratorDeps {
  readonly source: ObservationSource;
  readonly budget: RequestBudget;
  readonly resultCache?: QueryResultCache;
  readonly sleep?: (ms: number) => Promise<void>;
  readonly random?: () => number;
}

type UnitOutcome =
  | { readonly status: 'pending' }
  | { readonly status: 'completed'; readonly result: UnitResult }
  | { readonly status: 'failed'; readonly failure: FailedUnit };

export class QueryOrchestrator {
  constructor(
    private readonly config: OrchestratorConfig,
    private readonly retryPolicy: RetryPolicyConfig,
    private readonly deps: QueryOrchestratorDeps
  ) {}

  async run(units: readonly QueryUnit[], options: RunOptions = {}): Promise<OrchestrationResult> {
    const outcomes: UnitOutcome[] = units.map(() => ({ status: 'pending' }));
    const warnings: string[] = [];
    const counters = { completed: 0, failed: 0, skipped: 0 };
    let currentIndex = 0;

    const report = (
      event: UnitProgressEvent,
      unit: QueryUnit,
      extra: Partial<Pick<UnitProgress, 'observations' | 'fromCache' | 'error'>> = {}
    ): void => {
      options.onProgress?.({ event, unit, total: units.length, ...counters, ...extra });
    };

    const worker = async (): Promise<void> => {
      while (currentIndex < units.length) {
        if (options.signal?.aborted) {
          return;
        }

        const unitIndex = currentIndex++;
        const unit = units[unitIndex];
        if (unit === undefined) break;

        report('started', unit);
        const outcome = await this.executeUnit(unit, warnings);
        outcomes[unitIndex] = outcome;

        if (outcome.status === 'completed') {
          counters.completed++;
          report('completed', unit, {
            observations: outcome.result.observations.length,
            fromCache: outcome.result.fromCache,
          });
        } else if (outcome.status === 'failed') {
          counters.failed++;
          report('failed', unit, { error: outcome.failure.error });
        }
      }
    };

    const workerCount = Math.max(1, Math.min(this.config.concurrency, units.length));
    const runningWorkers: Array<Promise<void>> = [];
    for (let i = 0; i < workerCount; i++) {
      runningWorkers.push(worker());
    }
    await Promise.all(runningWorkers);

    const completed: UnitResult[] = [];
    const failed: FailedUnit[] = [];
    const skipped: SkippedUnit[] = [];

    outcomes.forEach((outcome, index) => {
      const unit = units[index];
      if (outcome.status === 'completed') {
        completed.push(outcome.result);
      } else if (outcome.status === 'failed') {
        failed.push(outcome.failure);
      } else {
        counters.skipped++;
        skipped.push({ unitId: unit.id, areaId: unit.areaId, bbox: unit.bbox, reason: 'cancelled' });
        report('skipped', unit);
      }
    });

    const cancelled = options.signal?.aborted === true;
    if (cancelled) {
      log.warn('Search cancelled', { completed: completed.length, skipped: skipped.length });
    }

    return { completed, failed, skipped, warnings, cancelled };
  }

  private async executeUnit(unit: QueryUnit, warnings: string[]): Promise<UnitOutcome> {
    const cacheKey = {
      bbox: unit.bbox,
      seenSince: this.config.seenSince,
      ...(unit.ssidLike !== undefined ? { ssidLike: unit.ssidLike } : {}),
    };

    const cached = await this.deps.resultCache?.get(cacheKey);
    if (cached !== undefined) {
      log.debug('Unit served from cache', { unitId: unit.id });
      return {
        status: 'completed',
        result: { unit, ...cached, fromCache: true },
      };
    }

    try {
      const { result, complete } = await this.paginate(unit, warnings);
      if (complete && this.deps.resultCache !== undefined) {
        try {
          await this.deps.resultCache.set(cacheKey, {
            observations: result.observations,
            malformed: result.malformed,
            pages: result.pages,
          });
        } catch (error) {
          log.warn('Could not cache unit result', { unitId: unit.id, error: toError(error).message });
        }
      }
      return { status: 'completed', result };
    } catch (error) {
      const failure = toFailedUnit(unit, error);
      log.error('Query unit failed', { unitId: unit.id, attempts: failure.attempts, error: failure.error });
      return { status: 'failed', failure };
    }
  }

  /**
   * Fetch every page of a unit in cursor order
   *
   * @throws QueryUnitFailedError when a page exhausts its retries
   */
  private async paginate(
    unit: QueryUnit,
    warnings: string[]
  ): Promise<{ result: UnitResult; complete: boolean }> {
    const observations: Observation[] = [];
    const seenCursors = new Set<string>();
    let state: UnitCursor = { unitId: unit.id, cursor: null, pagesFetched: 0 };
    let malformed = 0;
    let reported: number | undefined;
    let complete = false;

    for (;;) {
      const page = await this.fetchPage(unit, state.cursor);
      state = { ...state, pagesFetched: state.pagesFetched + 1 };
      observations.push(...page.observations);
      malformed += page.malformed;
      reported = page.totalResults ?? reported;

      if (page.rateLimit !== undefined) {
        this.deps.budget.reconcile(page.rateLimit);
      }

      const next = page.nextCursor;
      if (next === null) {
        complete = true;
        const received = observations.length + malformed;
        if (reported !== undefined && received < reported) {
          const message = `${unit.id}: received ${received} of ${reported} reported results`;
          log.warn(message);
          warnings.push(message);
        }
        break;
      }
      if (seenCursors.has(next) || next === state.cursor) {
        const message = `${unit.id}: source repeated cursor ${next}; pagination stopped`;
        log.warn(message);
        warnings.push(message);
        break;
      }
      if (state.pagesFetched >= this.config.maxPagesPerUnit) {
        const message = `${unit.id}: stopped after ${state.pagesFetched} pages (maxPagesPerUnit)`;
        log.warn(message);
        warnings.push(message);
        break;
      }

      seenCursors.add(next);
      state = { ...state, cursor: next };
    }

    log.debug('Unit complete', {
      unitId: unit.id,
      pages: state.pagesFetched,
      observations: observations.length,
      malformed,
    });

    return {
      result: {
        unit,
        observations,
        malformed,
        pages: state.pagesFetched,
        fromCache: false,
      },
      complete,
    };
  }

  private async fetchPage(unit: QueryUnit, cursor: string | null): Promise<ObservationPage> {
    const { budget, source } = this.deps;
    const retry = new RetryExecutor(this.retryPolicy, {
      sleep: this.deps.sleep,
      random: this.deps.random,
      onRetry: (attempt: RetryAttempt) => {
        if (attempt.error instanceof RateLimitExceededError) {
          budget.blockFor(attempt.error.retryAfterMs ?? DEFAULT_EXHAUSTED_WAIT_MS);
        }
        log.warn('Retrying page', {
          unitId: unit.id,
          attempt: attempt.attemptNumber,
          delayMs: attempt.delayMs,
          error: attempt.error.message,
        });
      },
    });

    try {
      return await retry.execute(async () => {
        await budget.acquire();
        return source.searchPage({
          bbox: unit.bbox,
          cursor,
          seenSince: this.config.seenSince,
          pageSize: this.config.pageSize,
          ...(unit.ssidLike !== undefined ? { ssidLike: unit.ssidLike } : {}),
        });
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new QueryUnitFailedError(
          unit.id,
          unit.areaId,
          unit.bbox,
          error.attempts.length,
          error.lastError
        );
      }
      throw error;
    }
  }
}

function toFailedUnit(unit: QueryUnit, error: unknown): FailedUnit {
  if (error instanceof QueryUnitFailedError) {
    return {
      unitId: unit.id,
      areaId: unit.areaId,
      bbox: unit.bbox,
      attempts: error.attempts,
      error: error.lastError.message,
      errorName: error.lastError.name,
    };
  }
  const normalized = toError(error);
  return {
    unitId: unit.id,
    areaId: unit.areaId,
    bbox: unit.bbox,
    attempts: 1,
    error: normalized.message,
    errorName: normalized.name,
  };
}
