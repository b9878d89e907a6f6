/**
 * alpr-scout
 *
 * Area-scoped search of WiFi observation data for ALPR camera radios.
 *
 * @packageDocumentation
 */

// Types
export * from './core/types/index.js';

// Configuration and errors
export {
  createConfig,
  DEFAULT_CONFIG,
  loadEnvironment,
  validateConfig,
  type DeepPartial,
  type EnvironmentConfig,
  type SearchEngineConfig,
} from './core/config.js';
export {
  AreaNotFoundError,
  BoundaryFetchError,
  ConfigurationError,
  QueryUnitFailedError,
  RateLimitExceededError,
  SearchEngineError,
  SourceResponseError,
  isAreaNotFoundError,
  isBoundaryFetchError,
  isConfigurationError,
  isQueryUnitFailedError,
  isRateLimitExceededError,
  isSearchEngineError,
} from './core/errors.js';
export { parseAreaId, type AreaRef } from './core/area-id.js';
export { configureLogging, createLogger, logger } from './core/utils/logger.js';

// Engine
export { SignatureStore, toSsidLike } from './signatures/signature-store.js';
export {
  selectAreas,
  StaticRegistry,
  type AreaCatalog,
  type AreaSelection,
} from './registry/static-registry.js';
export {
  OverpassBoundarySource,
  type BoundaryRecord,
  type BoundarySource,
} from './providers/overpass-boundary-source.js';
export { WigleClient, wigleMapUrl } from './providers/wigle-client.js';
export { AreaResolver, type ResolutionResult } from './services/area-resolver.js';
export { BoundaryCache, FileCacheStore } from './services/boundary-cache.js';
export { DivisionCatalog } from './services/division-catalog.js';
export { QueryOrchestrator, type UnitProgress } from './services/query-orchestrator.js';
export { MatchEngine, filterByPolygon } from './services/match-engine.js';
export { aggregateResults } from './services/result-aggregator.js';
export {
  createSearchService,
  SearchService,
  type SearchRequest,
} from './services/search-service.js';

// Output
export * from './output/index.js';
