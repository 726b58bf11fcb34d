import { describe, expect, test } from 'vitest';

import { InvalidConfigurationError } from '../src/identity/errors.js';
import { buildCompactToken, buildUrlsafeToken } from '../src/identity/hashing.js';

describe('buildCompactToken', () => {
  test('same seed, namespace and length give the same base32 token', () => {
    const a = buildCompactToken('same-seed', 10, 'ns');
    const b = buildCompactToken('same-seed', 10, 'ns');
    expect(a).toBe(b);
    expect(a).toHaveLength(10);
    expect(a).toMatch(/^[a-z2-7]+$/);
  });

  test('matches the published token format (BLAKE2s, base32)', () => {
    expect(buildCompactToken('same-seed', 10, 'ns')).toBe('e4xompu7jh');
    expect(buildCompactToken('same-seed')).toBe('nty7l35euwnyhwx2');
    expect(buildCompactToken('same-seed', 51)).toBe('tyh7yjoxbn42htw6ncfiju6obp4ebyqj4q5zjt2xthqncmxiltc');
  });

  test('seed is trimmed before hashing', () => {
    expect(buildCompactToken('  same-seed  ')).toBe('nty7l35euwnyhwx2');
  });

  test('namespace separates tokens built from the same seed', () => {
    expect(buildCompactToken('same-seed', 16, 'a')).not.toBe(buildCompactToken('same-seed', 16, 'b'));
    expect(buildCompactToken('same-seed', 16, 'ns')).not.toBe(buildCompactToken('same-seed', 16));
  });

  test('separator keeps namespace/seed boundaries unambiguous', () => {
    expect(buildCompactToken('bc', 16, 'a')).not.toBe(buildCompactToken('c', 16, 'ab'));
  });

  test('rejects bad input', () => {
    expect(() => buildCompactToken('', 10)).toThrow(InvalidConfigurationError);
    expect(() => buildCompactToken('   ', 10)).toThrow('seed must be a non-empty string');
    expect(() => buildCompactToken('seed', 10, ' ')).toThrow('namespace must be a non-empty string when provided');
    expect(() => buildCompactToken('seed', 0)).toThrow('length must be >= 1');
    expect(() => buildCompactToken('seed', 52)).toThrow('length must be <= 51');
  });
});

describe('buildUrlsafeToken', () => {
  test('produces base64url tokens of the requested length', () => {
    expect(buildUrlsafeToken('same-seed')).toBe('oXpi1TCs2LvhcLrpCyt-3Xnq-Phqc9vO');
    expect(buildUrlsafeToken('same-seed', 8, 'ns')).toBe('vNznV0CP');
  });

  test('rejects lengths the digest cannot cover', () => {
    expect(buildUrlsafeToken('same-seed', 42)).toHaveLength(42);
    expect(() => buildUrlsafeToken('same-seed', 43)).toThrow('length must be <= 42');
  });
});
