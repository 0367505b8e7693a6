import type { Endpoint, RouteKey } from '../types/domain';
import { RegistryInvariantError } from './errors';
import { logger } from './log';

export const ENDPOINTS_PATH = '/endpoints';
export const ENDPOINTS_UNHIT_PATH = '/endpoints/unhit';

export interface ListOptions {
  unhitOnly?: boolean;
}

export interface RecordOptions {
  /** Counted like any route but left out of listings. */
  internal?: boolean;
}

export interface Registry {
  record(key: RouteKey, method: string, path: string, opts?: RecordOptions): void;
  hit(key: RouteKey): void;
  get(key: RouteKey): Endpoint | undefined;
  list(opts?: ListOptions): Endpoint[];
}

export interface RegistryOptions {
  /** Throw on an unknown key instead of logging it. */
  strictInvariants?: boolean;
}

/**
 * Hit counts per registered route. Every method runs to completion without yielding, so on
 * the single event loop no two requests can interleave inside one; increments are never lost.
 */
export function createRegistry(opts: RegistryOptions = {}): Registry {
  const strict = opts.strictInvariants ?? process.env.NODE_ENV !== 'production';
  const endpoints = new Map<RouteKey, Endpoint>();
  const internal = new Set<RouteKey>();

  function violation(message: string, key: RouteKey) {
    if (strict) throw new RegistryInvariantError(message, key);
    logger.error('registry.invariant_violation', { key, msg: message });
  }

  return {
    record(key, method, path, recordOpts = {}) {
      if (endpoints.has(key)) {
        violation(`Route key ${key} is already recorded`, key);
        return;
      }
      endpoints.set(key, { method, path, hits: 0 });
      if (recordOpts.internal) internal.add(key);
    },
    hit(key) {
      const endpoint = endpoints.get(key);
      if (!endpoint) {
        violation(`Hit for unregistered route key ${key}`, key);
        return;
      }
      endpoint.hits++;
    },
    get(key) {
      const endpoint = endpoints.get(key);
      return endpoint ? { ...endpoint } : undefined;
    },
    list({ unhitOnly = false } = {}) {
      const out: Endpoint[] = [];
      for (const [key, endpoint] of endpoints) {
        if (unhitOnly && endpoint.hits > 0) continue;
        if (internal.has(key)) continue;
        out.push({ ...endpoint });
      }
      return out;
    },
  };
}
