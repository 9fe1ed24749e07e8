/**
 * Query and body parameters shared by record operations.
 *
 * @module client/params
 */

import type { PortalRequest, ScriptHooks, SortSpec } from '../types/index.js';

export type ParamValue = string | number | undefined;
export type Params = Record<string, ParamValue>;

/**
 * Script parameters: `script.prerequest`, `script.presort`, `script` and
 * their `.param` counterparts.
 */
export function scriptParams(scripts: ScriptHooks | undefined): Params {
  const params: Params = {};
  if (!scripts) {
    return params;
  }
  const slots: Array<[keyof ScriptHooks, string]> = [
    ['prerequest', 'script.prerequest'],
    ['presort', 'script.presort'],
    ['after', 'script'],
  ];
  for (const [slot, key] of slots) {
    const call = scripts[slot];
    if (!call) continue;
    const [name, param] = call;
    params[key] = name;
    if (param !== undefined) {
      params[`${key}.param`] = param;
    }
  }
  return params;
}

/**
 * Portal selection for GET requests: `portal` as a JSON list, with
 * `_offset.{name}` and `_limit.{name}` per portal.
 */
export function portalQueryParams(portals: PortalRequest[] | undefined): Params {
  const params: Params = {};
  if (!portals || portals.length === 0) {
    return params;
  }
  params.portal = JSON.stringify(portals.map((p) => p.name));
  for (const portal of portals) {
    params[`_offset.${portal.name}`] = portal.offset;
    params[`_limit.${portal.name}`] = portal.limit;
  }
  return params;
}

/**
 * Portal selection for find bodies: `portal` as a list, with
 * `offset.{name}` and `limit.{name}` sent as strings.
 */
export function portalBodyParams(portals: PortalRequest[] | undefined): Record<string, unknown> {
  const params: Record<string, unknown> = {};
  if (!portals || portals.length === 0) {
    return params;
  }
  params.portal = portals.map((p) => p.name);
  for (const portal of portals) {
    params[`offset.${portal.name}`] = portal.offset === undefined ? undefined : String(portal.offset);
    params[`limit.${portal.name}`] = portal.limit === undefined ? undefined : String(portal.limit);
  }
  return params;
}

export function sortQueryParam(sort: SortSpec[] | undefined): string | undefined {
  return sort && sort.length > 0 ? JSON.stringify(sort) : undefined;
}

/**
 * Drops keys whose value is undefined or null.
 */
export function compact<T>(params: Record<string, T | undefined | null>): Record<string, T> {
  const result: Record<string, T> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null) {
      result[key] = value;
    }
  }
  return result;
}
