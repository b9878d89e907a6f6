/**
 * Static Geographic Registry
 *
 * County ZIP-code lists and the metro-area table shipped with the tool.
 *
 * Layout under the registry directory:
 *   geographic-registry.json     states -> { state_code, counties -> { file, zip_count, major_cities } }
 *   counties/<state>/<county>.json   { county, state, zip_codes -> { city, lat, lon } }
 *   metro-areas.json             state code -> metro key -> { name, counties, description }
 *
 * County files are read on first use and kept for the life of the instance.
 *
 * @module registry/static-registry
 */

import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { StaticAreaRef } from '../core/area-id.js';
import { AreaNotFoundError, ConfigurationError } from '../core/errors.js';
import type { StaticZipArea, ZipCodeEntry } from '../core/types/geo.js';
import { isMissingFileError } from '../core/utils/atomic-write.js';

export const REGISTRY_FILE_NAME = 'geographic-registry.json';
export const METRO_FILE_NAME = 'metro-areas.json';

/**
 * Registry bundled with the package
 */
export function defaultRegistryDirectory(): string {
  return fileURLToPath(new URL('../../data/registry', import.meta.url));
}

// ============================================================================
// File schemas
// ============================================================================

const RegistryFileSchema = z.object({
  available_regions: z.record(
    z.object({
      state_code: z.string().min(2),
      counties: z.record(
        z.object({
          file: z.string(),
          zip_count: z.number().int().nonnegative().optional(),
          major_cities: z.array(z.string()).optional(),
        })
      ),
    })
  ),
});

const CountyFileSchema = z.object({
  county: z.string(),
  state: z.string(),
  zip_codes: z.record(
    z.object({
      city: z.string(),
      lat: z.number().min(-90).max(90),
      lon: z.number().min(-180).max(180),
    })
  ),
});

const MetroFileSchema = z.record(
  z.record(
    z.object({
      name: z.string(),
      counties: z.array(z.string()).min(1),
      description: z.string().optional(),
    })
  )
);

// ============================================================================
// Catalog
// ============================================================================

export interface RegistryCounty {
  readonly name: string;
  readonly stateCode: string;
  readonly file: string;
  readonly zipCount: number | null;
  readonly majorCities: readonly string[];
}

export interface RegistryState {
  readonly name: string;
  readonly code: string;
  readonly counties: readonly RegistryCounty[];
}

export interface MetroArea {
  readonly key: string;
  readonly stateCode: string;
  readonly name: string;
  readonly counties: readonly string[];
  readonly description: string;
}

/**
 * Everything selectable without a network call
 */
export interface AreaCatalog {
  readonly states: readonly RegistryState[];
  readonly metros: readonly MetroArea[];
}

export type AreaSelection =
  | { readonly kind: 'explicit'; readonly ids: readonly string[] }
  | { readonly kind: 'metro'; readonly state: string; readonly metro: string }
  | {
      readonly kind: 'registry';
      readonly state: string;
      /** County names, or 'all' for every county the registry lists */
      readonly counties: readonly string[] | 'all';
    };

function sameName(a: string, b: string): boolean {
  return a.localeCompare(b, 'en', { sensitivity: 'accent' }) === 0;
}

export function findRegistryState(catalog: AreaCatalog, state: string): RegistryState | undefined {
  return catalog.states.find((entry) => sameName(entry.code, state) || sameName(entry.name, state));
}

export function findRegistryCounty(state: RegistryState, county: string): RegistryCounty | undefined {
  const bare = county.replace(/\s+county$/i, '');
  return state.counties.find((entry) => sameName(entry.name, bare));
}

export function zipSetId(stateCode: string, county: string): string {
  return `zipset:${stateCode}/${county}`;
}

/**
 * Map a selection to area ids. Pure and deterministic.
 *
 * Metro counties the registry lists become ZIP sets; the rest fall back to
 * their OSM county boundary so the whole metro is still covered.
 *
 * @throws AreaNotFoundError for an unknown state, county or metro key
 */
export function selectAreas(catalog: AreaCatalog, choice: AreaSelection): string[] {
  switch (choice.kind) {
    case 'explicit': {
      const ids = choice.ids.map((id) => id.trim()).filter((id) => id.length > 0);
      return [...new Set(ids)];
    }

    case 'metro': {
      const metro = catalog.metros.find(
        (entry) => sameName(entry.stateCode, choice.state) && sameName(entry.key, choice.metro)
      );
      if (metro === undefined) {
        throw new AreaNotFoundError(`${choice.state}/${choice.metro}`, 'unknown metro area');
      }
      const state = findRegistryState(catalog, metro.stateCode);
      return metro.counties.map((county) => {
        const listed = state !== undefined ? findRegistryCounty(state, county) : undefined;
        return listed !== undefined
          ? zipSetId(listed.stateCode, listed.name)
          : `county:US-${metro.stateCode}:${county} County`;
      });
    }

    case 'registry': {
      const state = findRegistryState(catalog, choice.state);
      if (state === undefined) {
        throw new AreaNotFoundError(choice.state, 'state is not in the registry');
      }
      if (choice.counties === 'all') {
        return state.counties.map((county) => zipSetId(state.code, county.name));
      }
      if (choice.counties.length === 0) {
        throw new ConfigurationError(`No counties selected for ${state.name}`);
      }
      const ids = choice.counties.map((name) => {
        const county = findRegistryCounty(state, name);
        if (county === undefined) {
          throw new AreaNotFoundError(zipSetId(state.code, name), 'county is not in the registry');
        }
        return zipSetId(state.code, county.name);
      });
      return [...new Set(ids)];
    }
  }
}

// ============================================================================
// Registry
// ============================================================================

export class StaticRegistry {
  private readonly countyCache = new Map<string, Promise<ZipCodeEntry[]>>();

  private constructor(
    private readonly directory: string,
    readonly catalog: AreaCatalog
  ) {}

  /**
   * Read the registry index and metro table
   *
   * @throws ConfigurationError when either file is missing or malformed
   */
  static async load(directory: string = defaultRegistryDirectory()): Promise<StaticRegistry> {
    const registry = await readJsonFile(join(directory, REGISTRY_FILE_NAME), RegistryFileSchema);
    const metroFile = await readJsonFile(join(directory, METRO_FILE_NAME), MetroFileSchema);

    const states: RegistryState[] = Object.entries(registry.available_regions).map(
      ([name, region]) => {
        const code = region.state_code.toUpperCase();
        return {
          name,
          code,
          counties: Object.entries(region.counties).map(([county, entry]) => ({
            name: county,
            stateCode: code,
            file: entry.file,
            zipCount: entry.zip_count ?? null,
            majorCities: entry.major_cities ?? [],
          })),
        };
      }
    );

    const metros: MetroArea[] = Object.entries(metroFile).flatMap(([stateCode, entries]) =>
      Object.entries(entries).map(([key, metro]) => ({
        key,
        stateCode: stateCode.toUpperCase(),
        name: metro.name,
        counties: metro.counties,
        description: metro.description ?? '',
      }))
    );

    return new StaticRegistry(directory, { states, metros });
  }

  /**
   * Resolve a zip or zipset reference to its static area
   *
   * @throws AreaNotFoundError when the registry has no such ZIP or county
   */
  async resolve(ref: StaticAreaRef): Promise<StaticZipArea> {
    if (ref.type === 'zipset') {
      const state = findRegistryState(this.catalog, ref.state);
      const county = state !== undefined ? findRegistryCounty(state, ref.county) : undefined;
      if (state === undefined || county === undefined) {
        throw new AreaNotFoundError(ref.id, 'county is not in the registry');
      }
      const zipCodes = await this.loadCounty(county);
      if (zipCodes.length === 0) {
        throw new AreaNotFoundError(ref.id, 'county lists no ZIP codes');
      }
      return {
        source: 'static-registry',
        id: zipSetId(state.code, county.name),
        displayName: `${county.name} County, ${state.code}`,
        kind: 'static-zip-set',
        zipCodes,
      };
    }

    for (const state of this.catalog.states) {
      for (const county of state.counties) {
        const entry = (await this.loadCounty(county)).find((zip) => zip.code === ref.code);
        if (entry !== undefined) {
          return {
            source: 'static-registry',
            id: ref.id,
            displayName: `${entry.code} ${entry.city}, ${entry.state}`,
            kind: 'static-zip-set',
            zipCodes: [entry],
          };
        }
      }
    }
    throw new AreaNotFoundError(ref.id, 'ZIP code is not in the registry');
  }

  private loadCounty(county: RegistryCounty): Promise<ZipCodeEntry[]> {
    let pending = this.countyCache.get(county.file);
    if (pending === undefined) {
      pending = this.readCounty(county);
      this.countyCache.set(county.file, pending);
    }
    return pending;
  }

  private async readCounty(county: RegistryCounty): Promise<ZipCodeEntry[]> {
    const file = await readJsonFile(join(this.directory, county.file), CountyFileSchema);
    return Object.entries(file.zip_codes).map(([code, zip]) =>
      Object.freeze({
        code,
        city: zip.city,
        county: county.name,
        state: county.stateCode,
        centroid: Object.freeze({ lat: zip.lat, lng: zip.lon }),
      })
    );
  }
}

async function readJsonFile<T>(
  path: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigurationError(`Registry file not found: ${path}`);
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new ConfigurationError(`Registry file is not valid JSON: ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Registry file has an unexpected shape: ${path}`,
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}
