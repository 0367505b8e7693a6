import { describe, expect, it } from 'vitest';

import { resolveLevel, sanitize } from './log';

describe('resolveLevel', () => {
  it('maps the silencing aliases and unknown values', () => {
    expect(resolveLevel(undefined)).toBe('info');
    expect(resolveLevel('DEBUG')).toBe('debug');
    expect(resolveLevel('none')).toBe('silent');
    expect(resolveLevel('off')).toBe('silent');
    expect(resolveLevel('verbose')).toBe('info');
  });
});

describe('sanitize', () => {
  it('flattens control whitespace and caps the length', () => {
    expect(sanitize('/a\r\n/b\t')).toBe('/a /b ');
    expect(sanitize(undefined)).toBe('');
    expect(sanitize('x'.repeat(2500))).toHaveLength(2000);
  });
});
