/**
 * Signature Store
 *
 * Known BSSID prefixes and SSID patterns for ALPR camera radios. Loaded once,
 * validated, then frozen and passed by reference to the match engine.
 *
 * Prefixes match case-insensitively against the start of the colon-delimited
 * MAC. Patterns match case-insensitively as substrings, or as a whole-string
 * glob when they contain `*` or `?`. A null or empty SSID never matches.
 *
 * @module signatures/signature-store
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';
import { normalizeMacPrefix } from '../core/mac.js';
import type { MatchReason } from '../core/types/observation.js';
import { isMissingFileError } from '../core/utils/atomic-write.js';

export const BSSID_FILE_NAME = 'known_bssid_prefixes.json';
export const SSID_FILE_NAME = 'known_ssid_patterns.json';

const MAX_SSID_LENGTH = 32;
const PRINTABLE_ASCII = /^[\x20-\x7E]+$/;

const BssidFileSchema = z.object({
  bssid_prefixes: z.array(z.string()),
});

const SsidFileSchema = z
  .object({
    ssid_patterns: z.array(z.string()).optional(),
    // Older files name the list ssid_prefixes
    ssid_prefixes: z.array(z.string()).optional(),
  })
  .refine((file) => file.ssid_patterns !== undefined || file.ssid_prefixes !== undefined, {
    message: 'expected an ssid_patterns array',
  });

export interface SignatureMatch {
  readonly reason: MatchReason;
  readonly signature: string;
}

export interface SignatureValidationReport {
  readonly invalidBssidPrefixes: readonly string[];
  readonly invalidSsidPatterns: readonly string[];
  readonly duplicates: readonly string[];
}

interface CompiledPattern {
  readonly source: string;
  readonly test: (ssid: string) => boolean;
}

export function isValidSsidPattern(pattern: string): boolean {
  return pattern.length > 0 && pattern.length <= MAX_SSID_LENGTH && PRINTABLE_ASCII.test(pattern);
}

function hasWildcard(pattern: string): boolean {
  return pattern.includes('*') || pattern.includes('?');
}

function compilePattern(pattern: string): CompiledPattern {
  if (!hasWildcard(pattern)) {
    const needle = pattern.toLowerCase();
    return { source: pattern, test: (ssid) => ssid.toLowerCase().includes(needle) };
  }

  const body = pattern
    .split('')
    .map((char) => {
      if (char === '*') return '.*';
      if (char === '?') return '.';
      return char.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    })
    .join('');
  const regex = new RegExp(`^${body}$`, 'i');
  return { source: pattern, test: (ssid) => regex.test(ssid) };
}

/**
 * Translate a pattern into the upstream SQL LIKE filter syntax
 */
export function toSsidLike(pattern: string): string {
  if (!hasWildcard(pattern)) {
    return `%${pattern}%`;
  }
  return pattern.replace(/\*/g, '%').replace(/\?/g, '_');
}

export class SignatureStore {
  readonly bssidPrefixes: readonly string[];
  readonly ssidPatterns: readonly string[];
  private readonly compiled: readonly CompiledPattern[];

  private constructor(bssidPrefixes: readonly string[], ssidPatterns: readonly string[]) {
    this.bssidPrefixes = Object.freeze([...bssidPrefixes]);
    this.ssidPatterns = Object.freeze([...ssidPatterns]);
    this.compiled = Object.freeze(ssidPatterns.map(compilePattern));
    Object.freeze(this);
  }

  /**
   * Build a store from raw lists
   *
   * Invalid and duplicate entries are dropped and reported. An empty list,
   * before or after validation, is fatal.
   *
   * @throws ConfigurationError
   */
  static fromLists(
    bssidPrefixes: readonly string[],
    ssidPatterns: readonly string[]
  ): { store: SignatureStore; report: SignatureValidationReport } {
    if (bssidPrefixes.length === 0) {
      throw new ConfigurationError('No BSSID prefixes configured');
    }
    if (ssidPatterns.length === 0) {
      throw new ConfigurationError('No SSID patterns configured');
    }

    const invalidBssidPrefixes: string[] = [];
    const invalidSsidPatterns: string[] = [];
    const duplicates: string[] = [];

    const prefixes: string[] = [];
    for (const raw of bssidPrefixes) {
      const normalized = normalizeMacPrefix(raw);
      if (normalized === null) {
        invalidBssidPrefixes.push(raw);
      } else if (prefixes.includes(normalized)) {
        duplicates.push(raw);
      } else {
        prefixes.push(normalized);
      }
    }

    const patterns: string[] = [];
    const seenPatterns = new Set<string>();
    for (const raw of ssidPatterns) {
      if (!isValidSsidPattern(raw)) {
        invalidSsidPatterns.push(raw);
      } else if (seenPatterns.has(raw.toLowerCase())) {
        duplicates.push(raw);
      } else {
        seenPatterns.add(raw.toLowerCase());
        patterns.push(raw);
      }
    }

    if (prefixes.length === 0) {
      throw new ConfigurationError('No valid BSSID prefixes configured', invalidBssidPrefixes);
    }
    if (patterns.length === 0) {
      throw new ConfigurationError('No valid SSID patterns configured', invalidSsidPatterns);
    }

    return {
      store: new SignatureStore(prefixes, patterns),
      report: { invalidBssidPrefixes, invalidSsidPatterns, duplicates },
    };
  }

  /**
   * Load both signature files from a directory
   *
   * @throws ConfigurationError when a file is missing, unparsable or empty
   */
  static async load(
    directory: string
  ): Promise<{ store: SignatureStore; report: SignatureValidationReport }> {
    const bssidFile = await readSignatureFile(join(directory, BSSID_FILE_NAME), BssidFileSchema);
    const ssidFile = await readSignatureFile(join(directory, SSID_FILE_NAME), SsidFileSchema);

    return SignatureStore.fromLists(
      bssidFile.bssid_prefixes,
      ssidFile.ssid_patterns ?? ssidFile.ssid_prefixes ?? []
    );
  }

  /**
   * First prefix the BSSID starts with, or null
   */
  matchBssid(bssid: string): string | null {
    const normalized = bssid.toUpperCase();
    for (const prefix of this.bssidPrefixes) {
      if (normalized.startsWith(prefix)) {
        return prefix;
      }
    }
    return null;
  }

  /**
   * First pattern the SSID matches, or null. Null and empty SSIDs never match.
   */
  matchSsid(ssid: string | null): string | null {
    if (ssid === null || ssid.length === 0) {
      return null;
    }
    for (const pattern of this.compiled) {
      if (pattern.test(ssid)) {
        return pattern.source;
      }
    }
    return null;
  }

  /**
   * Classify an observation. A prefix match is checked first and wins.
   */
  classify(bssid: string, ssid: string | null): SignatureMatch | null {
    const prefix = this.matchBssid(bssid);
    if (prefix !== null) {
      return { reason: 'bssid-prefix', signature: prefix };
    }

    const pattern = this.matchSsid(ssid);
    if (pattern !== null) {
      return { reason: 'ssid-pattern', signature: pattern };
    }

    return null;
  }
}

async function readSignatureFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigurationError(`Signature file not found: ${path}`);
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(
      `Signature file is not valid JSON: ${path}`,
      [error instanceof Error ? error.message : String(error)]
    );
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Signature file has an unexpected shape: ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

/**
 * Starter files written by `signatures init`
 */
export const SIGNATURE_TEMPLATES = {
  [BSSID_FILE_NAME]: {
    description: 'OUI prefixes observed on ALPR camera WiFi radios. Format XX:XX:XX.',
    bssid_prefixes: ['00:00:00'],
  },
  [SSID_FILE_NAME]: {
    description:
      'SSID patterns broadcast by ALPR camera radios. Plain entries match as case-insensitive substrings; * and ? are wildcards.',
    ssid_patterns: ['Example-*'],
  },
} as const;
