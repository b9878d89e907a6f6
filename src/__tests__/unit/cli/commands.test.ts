/**
 * CLI Command Helper Tests
 *
 * Tests:
 * - Area selection flags and export format parsing
 * - Registry and metro listing rows
 * - Signature template init and ignored-entry counts
 * - Cache namespace parsing
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigurationError } from '../../../core/errors.js';
import type { AreaCatalog } from '../../../registry/static-registry.js';
import {
  BSSID_FILE_NAME,
  SIGNATURE_TEMPLATES,
  SSID_FILE_NAME,
} from '../../../signatures/signature-store.js';
import { metroRows, registryRows } from '../../../cli/commands/areas/list.js';
import { parseNamespace } from '../../../cli/commands/cache/cache.js';
import { buildSelection, parseFormats } from '../../../cli/commands/search/search.js';
import { countIgnored } from '../../../cli/commands/signatures/check.js';
import { writeSignatureTemplates } from '../../../cli/commands/signatures/init.js';

describe('buildSelection', () => {
  it('should pass explicit area ids through', () => {
    expect(buildSelection({ area: ['zip:75024', 'state:US-TX'], format: 'json' })).toEqual({
      kind: 'explicit',
      ids: ['zip:75024', 'state:US-TX'],
    });
  });

  it('should split a metro into state and key', () => {
    expect(buildSelection({ metro: 'TX/dallas-fort-worth', format: 'json' })).toEqual({
      kind: 'metro',
      state: 'TX',
      metro: 'dallas-fort-worth',
    });
  });

  it('should select every registry county unless some are named', () => {
    expect(buildSelection({ registry: 'TX', format: 'json' })).toEqual({
      kind: 'registry',
      state: 'TX',
      counties: 'all',
    });
    expect(buildSelection({ registry: 'TX', county: ['Collin'], format: 'json' })).toEqual({
      kind: 'registry',
      state: 'TX',
      counties: ['Collin'],
    });
  });

  it('should require exactly one selection', () => {
    expect(() => buildSelection({ format: 'json' })).toThrow(
      'No area selected: use --area, --metro or --registry'
    );
    expect(() => buildSelection({ area: ['zip:75024'], registry: 'TX', format: 'json' })).toThrow(
      'Use only one of --area, --metro or --registry'
    );
  });

  it('should reject --county without --registry', () => {
    expect(() => buildSelection({ area: ['zip:75024'], county: ['Collin'], format: 'json' })).toThrow(
      '--county requires --registry'
    );
  });

  it('should reject a metro without a key', () => {
    expect(() => buildSelection({ metro: 'TX', format: 'json' })).toThrow(
      'Invalid metro "TX", expected STATE/KEY'
    );
  });
});

describe('parseFormats', () => {
  it('should normalize case and drop repeats', () => {
    expect(parseFormats(' CSV, json,csv ')).toEqual(['csv', 'json']);
  });

  it('should reject an unknown format', () => {
    expect(() => parseFormats('csv,pdf')).toThrow('Unknown export format "pdf"');
  });

  it('should reject an empty list', () => {
    expect(() => parseFormats(' , ')).toThrow('No export format selected');
  });
});

describe('area listing rows', () => {
  const catalog: AreaCatalog = {
    states: [
      {
        name: 'Texas',
        code: 'TX',
        counties: [
          {
            name: 'Collin',
            stateCode: 'TX',
            file: 'collin.json',
            zipCount: 8,
            majorCities: ['Plano', 'McKinney'],
          },
        ],
      },
    ],
    metros: [
      {
        key: 'dallas-fort-worth',
        stateCode: 'TX',
        name: 'Dallas-Fort Worth',
        counties: ['Collin', 'Dallas'],
        description: 'North Texas',
      },
    ],
  };

  it('should list each registry county with its search id', () => {
    expect(registryRows(catalog)).toEqual([
      {
        state: 'TX',
        county: 'Collin',
        zipCount: 8,
        majorCities: ['Plano', 'McKinney'],
        areaId: 'zipset:TX/Collin',
      },
    ]);
  });

  it('should list metros by their selection key', () => {
    expect(metroRows(catalog)).toEqual([
      { metro: 'TX/dallas-fort-worth', name: 'Dallas-Fort Worth', counties: ['Collin', 'Dallas'] },
    ]);
  });
});

describe('countIgnored', () => {
  it('should add invalid entries and duplicates', () => {
    expect(
      countIgnored({
        invalidBssidPrefixes: ['ZZ:00:00'],
        invalidSsidPatterns: [''],
        duplicates: ['08:3A:88', 'Flock-*'],
      })
    ).toBe(4);
  });
});

describe('parseNamespace', () => {
  it('should accept known namespaces and undefined', () => {
    expect(parseNamespace('boundaries')).toBe('boundaries');
    expect(parseNamespace(undefined)).toBeUndefined();
  });

  it('should reject unknown namespaces', () => {
    expect(() => parseNamespace('tiles')).toThrow(ConfigurationError);
  });
});

describe('writeSignatureTemplates', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'signatures-init-test-'));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('should write both template files', async () => {
    const result = await writeSignatureTemplates(directory, false);

    expect(result).toEqual({
      written: [join(directory, BSSID_FILE_NAME), join(directory, SSID_FILE_NAME)],
      skipped: [],
    });
    const bssid: unknown = JSON.parse(await readFile(join(directory, BSSID_FILE_NAME), 'utf-8'));
    expect(bssid).toEqual(SIGNATURE_TEMPLATES[BSSID_FILE_NAME]);
  });

  it('should keep existing files unless forced', async () => {
    await writeFile(join(directory, BSSID_FILE_NAME), '{"bssid_prefixes":["08:3A:88"]}');

    const kept = await writeSignatureTemplates(directory, false);
    expect(kept.skipped).toEqual([join(directory, BSSID_FILE_NAME)]);
    expect(await readFile(join(directory, BSSID_FILE_NAME), 'utf-8')).toBe(
      '{"bssid_prefixes":["08:3A:88"]}'
    );

    const forced = await writeSignatureTemplates(directory, true);
    expect(forced.skipped).toEqual([]);
    expect(forced.written).toHaveLength(2);
  });
});
