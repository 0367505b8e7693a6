import { describe, expect, it } from 'vitest';

import { createRegistry, ENDPOINTS_PATH, ENDPOINTS_UNHIT_PATH } from './registry';
import { RegistryInvariantError } from './errors';
import type { Endpoint } from '../types/domain';

function byPath(a: Endpoint, b: Endpoint) {
  return a.path.localeCompare(b.path) || a.method.localeCompare(b.method);
}

describe('createRegistry', () => {
  it('records endpoints with zero hits', () => {
    const registry = createRegistry();
    registry.record(1, 'GET', '/a');

    expect(registry.get(1)).toEqual({ method: 'GET', path: '/a', hits: 0 });
    expect(registry.get(2)).toBeUndefined();
  });

  it('counts one hit per call', () => {
    const registry = createRegistry();
    registry.record(1, 'GET', '/a');
    registry.record(2, 'POST', '/a');

    for (let i = 0; i < 5; i++) registry.hit(1);
    registry.hit(2);

    expect(registry.get(1)?.hits).toBe(5);
    expect(registry.get(2)?.hits).toBe(1);
  });

  it('returns snapshots rather than live entries', () => {
    const registry = createRegistry();
    registry.record(1, 'GET', '/a');

    const before = registry.list();
    registry.hit(1);
    const detached = registry.get(1);
    if (detached) detached.hits = 100;

    expect(before).toEqual([{ method: 'GET', path: '/a', hits: 0 }]);
    expect(registry.get(1)?.hits).toBe(1);
  });

  it('lists the same set twice when nothing is dispatched in between', () => {
    const registry = createRegistry();
    registry.record(1, 'GET', '/b');
    registry.record(2, 'GET', '/a');
    registry.hit(2);

    expect(registry.list().sort(byPath)).toEqual(registry.list().sort(byPath));
  });

  it('filters to unhit endpoints and never lists internal routes', () => {
    const registry = createRegistry();
    registry.record(1, 'GET', ENDPOINTS_PATH, { internal: true });
    registry.record(2, 'GET', ENDPOINTS_UNHIT_PATH, { internal: true });
    registry.record(3, 'GET', '/a');
    registry.record(4, 'GET', '/b');
    registry.record(5, 'DELETE', '/b');
    registry.hit(4);

    const all = registry.list().sort(byPath);
    const unhit = registry.list({ unhitOnly: true }).sort(byPath);

    expect(all).toEqual([
      { method: 'GET', path: '/a', hits: 0 },
      { method: 'DELETE', path: '/b', hits: 0 },
      { method: 'GET', path: '/b', hits: 1 },
    ]);
    expect(unhit).toEqual(all.filter((e) => e.hits === 0));
  });

  it('lists a user route that shares a path with an internal one', () => {
    const registry = createRegistry();
    registry.record(1, 'GET', ENDPOINTS_PATH, { internal: true });
    registry.record(2, 'POST', ENDPOINTS_PATH);
    registry.hit(1);

    expect(registry.list()).toEqual([{ method: 'POST', path: ENDPOINTS_PATH, hits: 0 }]);
    expect(registry.get(1)?.hits).toBe(1);
  });

  describe('invariant violations', () => {
    it('throws on a hit for an unknown key when strict', () => {
      const registry = createRegistry({ strictInvariants: true });

      expect(() => registry.hit(42)).toThrow(RegistryInvariantError);
      expect(() => registry.hit(42)).toThrow('Hit for unregistered route key 42');
    });

    it('throws when a key is recorded twice when strict', () => {
      const registry = createRegistry({ strictInvariants: true });
      registry.record(1, 'GET', '/a');

      expect(() => registry.record(1, 'GET', '/b')).toThrow('Route key 1 is already recorded');
      expect(registry.get(1)?.path).toBe('/a');
    });

    it('ignores the unknown key when not strict', () => {
      const registry = createRegistry({ strictInvariants: false });
      registry.record(1, 'GET', '/a');

      expect(() => registry.hit(42)).not.toThrow();
      expect(registry.list()).toEqual([{ method: 'GET', path: '/a', hits: 0 }]);
    });
  });
});
