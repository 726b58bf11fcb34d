import { InvalidComponentError } from './errors.js';

const COMPONENT_PATTERN = /^[A-Za-z0-9-]+$/;

/**
 * Validate an app/instance component used in client-id derivation.
 * Letters, digits and `-` only; returned trimmed and lowercased.
 */
export function validateComponent(value: unknown, field: string): string {
  if (typeof value !== 'string') throw new InvalidComponentError(field, 'value must be a string.');

  const normalized = value.trim();
  if (normalized === '') throw new InvalidComponentError(field, 'value must not be empty.');
  if (!COMPONENT_PATTERN.test(normalized)) {
    throw new InvalidComponentError(field, "only letters, digits and '-' are allowed.");
  }

  return normalized.toLowerCase();
}
