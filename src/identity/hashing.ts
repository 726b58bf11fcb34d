import { blake2s } from '@noble/hashes/blake2s';
import { utf8ToBytes } from '@noble/hashes/utils';
import { base32 } from '@scure/base';

import { InvalidConfigurationError } from './errors.js';

// Joins namespace and seed; never valid inside an identity component.
export const SEED_SEPARATOR = '\x1f';

// BLAKE2s digests are 1..32 bytes.
const MAX_DIGEST_BYTES = 32;
const COMPACT_MIN_DIGEST_BYTES = 10;
const URLSAFE_MIN_DIGEST_BYTES = 16;

export const MAX_COMPACT_TOKEN_LENGTH = Math.floor((MAX_DIGEST_BYTES * 8) / 5);
export const MAX_URLSAFE_TOKEN_LENGTH = Math.floor((MAX_DIGEST_BYTES * 4) / 3);

function composeContent(seed: unknown, namespace: unknown): string {
  if (typeof seed !== 'string' || seed.trim() === '') {
    throw new InvalidConfigurationError('seed must be a non-empty string');
  }
  if (namespace === undefined) return seed.trim();
  if (typeof namespace !== 'string' || namespace.trim() === '') {
    throw new InvalidConfigurationError('namespace must be a non-empty string when provided');
  }
  return `${namespace.trim()}${SEED_SEPARATOR}${seed.trim()}`;
}

function checkLength(length: number, max: number): void {
  if (!Number.isInteger(length) || length < 1) throw new InvalidConfigurationError('length must be >= 1');
  if (length > max) throw new InvalidConfigurationError(`length must be <= ${max}`);
}

function digest(content: string, bytes: number): Uint8Array {
  return blake2s(utf8ToBytes(content), { dkLen: bytes });
}

/**
 * Deterministic token over lowercase base32 `[a-z2-7]`.
 *
 * The digest size grows with `length` (5 bits per character) and never drops below
 * 10 bytes. Same seed, namespace and length give the same token on every platform.
 */
export function buildCompactToken(seed: string, length = 16, namespace?: string): string {
  checkLength(length, MAX_COMPACT_TOKEN_LENGTH);
  const content = composeContent(seed, namespace);
  const raw = digest(content, Math.max(COMPACT_MIN_DIGEST_BYTES, Math.ceil((length * 5) / 8)));
  return base32.encode(raw).replace(/=+$/, '').toLowerCase().slice(0, length);
}

// Same rules as `buildCompactToken`, over base64url `[A-Za-z0-9_-]`.
export function buildUrlsafeToken(seed: string, length = 32, namespace?: string): string {
  checkLength(length, MAX_URLSAFE_TOKEN_LENGTH);
  const content = composeContent(seed, namespace);
  const raw = digest(content, Math.max(URLSAFE_MIN_DIGEST_BYTES, Math.ceil((length * 3) / 4)));
  return Buffer.from(raw).toString('base64url').slice(0, length);
}
