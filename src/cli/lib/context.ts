/**
 * CLI global context and exit codes
 *
 * The context is built once in the program's preAction hook and read by
 * every command action.
 *
 * @module cli/lib/context
 */

import { HTTPError, HTTPNetworkError, HTTPTimeoutError } from '../../core/http-client.js';
import { isConfigurationError, SourceResponseError } from '../../core/errors.js';
import type { SearchMetadata } from '../../core/types/results.js';
import type { CLIConfig } from './config.js';
import type { CLILogger } from './logger.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  /** Completed, but some units or areas did not */
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  NETWORK_ERROR: 4,
  USER_CANCELLED: 10,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export interface GlobalContext {
  config: CLIConfig;
  logger: CLILogger;
  startTime: number;
}

let globalContext: GlobalContext | null = null;

export function setGlobalContext(context: GlobalContext): void {
  globalContext = context;
}

export function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

export function hasGlobalContext(): boolean {
  return globalContext !== null;
}

/**
 * Exit code for an error that ended a command
 */
export function exitCodeForError(error: unknown): ExitCode {
  if (isConfigurationError(error)) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (error instanceof HTTPNetworkError || error instanceof HTTPTimeoutError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (error instanceof HTTPError && (error.statusCode === 401 || error.statusCode === 403)) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  if (error instanceof SourceResponseError) {
    return EXIT_CODES.NETWORK_ERROR;
  }
  return EXIT_CODES.ERRORS;
}

/**
 * Exit code for a search that ran to the end (or was cancelled)
 */
export function exitCodeForSearch(metadata: SearchMetadata): ExitCode {
  if (metadata.cancelled) {
    return EXIT_CODES.USER_CANCELLED;
  }
  const incomplete =
    metadata.units.failed > 0 || metadata.units.skipped > 0 || metadata.failedAreas.length > 0;
  return incomplete ? EXIT_CODES.WARNINGS : EXIT_CODES.SUCCESS;
}
