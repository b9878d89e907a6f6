/**
 * CLI Commands Index
 *
 * Central registry of all CLI command groups.
 *
 * @module cli/commands
 */

export { registerSearchCommand } from './search/search.js';
export { registerAreasCommands } from './areas/index.js';
export { registerSignaturesCommands } from './signatures/index.js';
export { registerCacheCommands } from './cache/index.js';
export { registerAuthCommands } from './auth/index.js';
