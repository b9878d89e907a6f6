#!/usr/bin/env tsx
/**
 * alpr-scout CLI Entry Point
 *
 * Area-scoped discovery of ALPR camera WiFi radios from WiGLE observations.
 *
 * @module alpr-scout-cli
 */

import { Command } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import {
  registerAreasCommands,
  registerAuthCommands,
  registerCacheCommands,
  registerSearchCommand,
  registerSignaturesCommands,
} from '../src/cli/commands/index.js';
import { loadConfig } from '../src/cli/lib/config.js';
import {
  EXIT_CODES,
  getGlobalContext,
  hasGlobalContext,
  setGlobalContext,
  type GlobalContext,
} from '../src/cli/lib/context.js';
import { createCLILogger } from '../src/cli/lib/logger.js';
import { isConfigurationError } from '../src/core/errors.js';
import { configureLogging } from '../src/core/utils/logger.js';

loadDotenv();

// ============================================================================
// CLI Setup
// ============================================================================

const PackageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch (error) {
    console.warn(`Could not read version: ${error instanceof Error ? error.message : String(error)}`);
    return '0.0.0';
  }
}

const GlobalOptionsSchema = z.object({
  verbose: z.boolean().optional(),
  json: z.boolean().optional(),
  config: z.string().optional(),
  timeout: z.number().int().positive().optional(),
  concurrency: z.number().int().positive().optional(),
  cacheDir: z.string().optional(),
  outputDir: z.string().optional(),
  /** commander's --no-cache sets cache to false */
  cache: z.boolean().optional(),
});

async function initializeContext(rawOptions: unknown): Promise<GlobalContext> {
  const startTime = Date.now();
  const options = GlobalOptionsSchema.parse(rawOptions);

  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      timeout: options.timeout,
      concurrency: options.concurrency,
      cacheDir: options.cacheDir,
      outputDir: options.outputDir,
      noCache: options.cache === false,
    },
  });

  const logger = createCLILogger({
    level: config.verbose ? 'debug' : 'info',
    json: config.json,
  });
  configureLogging({ level: config.verbose ? 'debug' : 'warn', json: config.json });

  const context = { config, logger, startTime };
  setGlobalContext(context);
  return context;
}

function parseInteger(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed)) {
    throw new Error(`Not a number: ${value}`);
  }
  return parsed;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('alpr-scout')
    .description('Find ALPR camera WiFi radios in WiGLE observations for selected areas')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .alpr-scoutrc)')
    .option('--timeout <ms>', 'WiGLE request timeout in milliseconds', parseInteger)
    .option('--concurrency <n>', 'Query units run in parallel', parseInteger)
    .option('--cache-dir <dir>', 'Cache directory')
    .option('--output-dir <dir>', 'Directory for export files')
    .option('--no-cache', 'Bypass the boundary and result caches')
    .hook('preAction', async (thisCommand) => {
      try {
        await initializeContext(thisCommand.opts());
      } catch (error) {
        console.error(
          `Configuration error: ${error instanceof Error ? error.message : String(error)}`
        );
        if (isConfigurationError(error)) {
          for (const detail of error.details) {
            console.error(`  ${detail}`);
          }
        }
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerSearchCommand(program);
  registerAreasCommands(program);
  registerSignaturesCommands(program);
  registerCacheCommands(program);
  registerAuthCommands(program);

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (hasGlobalContext()) {
      const { logger, startTime } = getGlobalContext();
      logger.error('Command failed', {
        error: error instanceof Error ? error.message : String(error),
        duration_ms: Date.now() - startTime,
      });
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(EXIT_CODES.ERRORS);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
