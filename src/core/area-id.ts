/**
 * Area identifiers
 *
 *   osm:<relationId>               any OSM administrative relation
 *   country:<ISO3166-1>            country, e.g. country:US
 *   state:<ISO3166-2>              state or province, e.g. state:US-TX
 *   county:<ISO3166-2>:<Name>      county in a state, e.g. county:US-TX:Collin County
 *   zip:<code>                     one registry ZIP code
 *   zipset:<STATE>/<County>        every registry ZIP in a county, e.g. zipset:TX/Collin
 *
 * Parsed ids carry a canonical `id` so differently-cased spellings of the
 * same area collapse to one.
 */

import { AreaNotFoundError } from './errors.js';

export type AreaRef =
  | { readonly type: 'osm'; readonly id: string; readonly relationId: number }
  | { readonly type: 'country'; readonly id: string; readonly countryCode: string }
  | { readonly type: 'state'; readonly id: string; readonly isoCode: string }
  | {
      readonly type: 'county';
      readonly id: string;
      readonly stateIso: string;
      readonly name: string;
    }
  | { readonly type: 'zip'; readonly id: string; readonly code: string }
  | {
      readonly type: 'zipset';
      readonly id: string;
      readonly state: string;
      readonly county: string;
    };

export type DynamicAreaRef = Extract<AreaRef, { type: 'osm' | 'country' | 'state' | 'county' }>;
export type StaticAreaRef = Extract<AreaRef, { type: 'zip' | 'zipset' }>;

const COUNTRY_CODE = /^[A-Z]{2}$/;
const SUBDIVISION_CODE = /^[A-Z]{2}-[A-Z0-9]{1,3}$/;
const ZIP_CODE = /^\d{5}$/;

/**
 * Parse an area identifier
 *
 * @throws AreaNotFoundError for an unknown prefix or malformed body
 */
export function parseAreaId(value: string): AreaRef {
  const input = value.trim();
  const separator = input.indexOf(':');
  if (separator <= 0) {
    throw new AreaNotFoundError(value, 'expected <type>:<identifier>');
  }

  const type = input.slice(0, separator).toLowerCase();
  const body = input.slice(separator + 1).trim();
  if (body.length === 0) {
    throw new AreaNotFoundError(value, 'empty identifier');
  }

  switch (type) {
    case 'osm':
    case 'relation': {
      const relationId = Number(body);
      if (!Number.isSafeInteger(relationId) || relationId <= 0) {
        throw new AreaNotFoundError(value, 'relation id must be a positive integer');
      }
      return { type: 'osm', id: `osm:${relationId}`, relationId };
    }

    case 'country': {
      const countryCode = body.toUpperCase();
      if (!COUNTRY_CODE.test(countryCode)) {
        throw new AreaNotFoundError(value, 'country must be an ISO 3166-1 alpha-2 code');
      }
      return { type: 'country', id: `country:${countryCode}`, countryCode };
    }

    case 'state':
    case 'province': {
      const isoCode = body.toUpperCase();
      if (!SUBDIVISION_CODE.test(isoCode)) {
        throw new AreaNotFoundError(value, 'state must be an ISO 3166-2 code such as US-TX');
      }
      return { type: 'state', id: `state:${isoCode}`, isoCode };
    }

    case 'county': {
      const split = body.indexOf(':');
      const stateIso = split > 0 ? body.slice(0, split).trim().toUpperCase() : '';
      const name = split > 0 ? body.slice(split + 1).trim() : '';
      if (!SUBDIVISION_CODE.test(stateIso) || name.length === 0) {
        throw new AreaNotFoundError(value, 'county must be <ISO3166-2>:<Name>');
      }
      return { type: 'county', id: `county:${stateIso}:${name}`, stateIso, name };
    }

    case 'zip': {
      if (!ZIP_CODE.test(body)) {
        throw new AreaNotFoundError(value, 'ZIP code must be five digits');
      }
      return { type: 'zip', id: `zip:${body}`, code: body };
    }

    case 'zipset': {
      const split = body.indexOf('/');
      const state = split > 0 ? body.slice(0, split).trim() : '';
      const county = split > 0 ? body.slice(split + 1).trim() : '';
      if (state.length === 0 || county.length === 0) {
        throw new AreaNotFoundError(value, 'zipset must be <STATE>/<County>');
      }
      return { type: 'zipset', id: `zipset:${state}/${county}`, state, county };
    }

    default:
      throw new AreaNotFoundError(value, `unknown area type "${type}"`);
  }
}

export function isDynamicRef(ref: AreaRef): ref is DynamicAreaRef {
  return ref.type === 'osm' || ref.type === 'country' || ref.type === 'state' || ref.type === 'county';
}

export function isStaticRef(ref: AreaRef): ref is StaticAreaRef {
  return ref.type === 'zip' || ref.type === 'zipset';
}
