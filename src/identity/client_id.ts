import { collectDeviceFacts, type Connection, type FactsProbe } from './facts.js';
import { InvalidConfigurationError } from './errors.js';
import { resolveDeviceFingerprint } from './fingerprint.js';
import { buildCompactToken, SEED_SEPARATOR } from './hashing.js';
import { validateComponent } from './validation.js';

// MQTT 3.1.1 brokers must accept client ids of at least 23 bytes.
export const DEFAULT_MAX_CLIENT_ID_LENGTH = 23;
export const MIN_CLIENT_ID_LENGTH = 8;

// Namespace of the hash suffix. Changing the hash algorithm or sizing constants means a new
// namespace (e.g. `mqtt-client/v2`) so old and new identifiers can never be confused.
export const CLIENT_ID_NAMESPACE = 'mqtt-client';

export type ComposeClientIdOptions = {
  appName: string;
  instanceId?: string;
  maxLength?: number;
  serialNumber?: string;
  connections?: readonly Connection[];
  hostname?: () => string;
};

export type BuildAutoClientIdOptions = ComposeClientIdOptions & {
  probe?: FactsProbe;
};

type ValidatedRequest = {
  app: string;
  instance?: string;
  maxLength: number;
};

function validateRequest(opts: ComposeClientIdOptions): ValidatedRequest {
  const app = validateComponent(opts.appName, 'app_name');
  const instance = opts.instanceId === undefined ? undefined : validateComponent(opts.instanceId, 'instance_id');

  const maxLength = opts.maxLength ?? DEFAULT_MAX_CLIENT_ID_LENGTH;
  if (!Number.isInteger(maxLength) || maxLength < MIN_CLIENT_ID_LENGTH) {
    throw new InvalidConfigurationError(`max_length must be an integer >= ${MIN_CLIENT_ID_LENGTH}`);
  }
  return { app, instance, maxLength };
}

function assemble(req: ValidatedRequest, fingerprint: string): string {
  const parts = [fingerprint, req.app];
  if (req.instance !== undefined) parts.push(req.instance);
  const seed = parts.join(SEED_SEPARATOR);

  const hashLength = Math.min(12, Math.max(8, req.maxLength - 4));
  const suffix = buildCompactToken(seed, hashLength, CLIENT_ID_NAMESPACE);

  const prefixBudget = req.maxLength - suffix.length - 1;
  if (prefixBudget <= 0) return suffix.slice(0, req.maxLength);

  // A cut may end on a hyphen; the separator must stay the only hyphen between prefix and suffix.
  const prefix = req.app.slice(0, prefixBudget).replace(/-{2,}/g, '-').replace(/^-+|-+$/g, '');
  if (prefix === '') return suffix.slice(0, req.maxLength);

  return `${prefix}-${suffix}`.slice(0, req.maxLength);
}

/**
 * Deterministic client id from facts the caller already holds.
 *
 * Seed: `fingerprint + app_name [+ instance_id]`. A missing `connections` list counts as empty;
 * nothing is probed here.
 */
export function composeClientId(opts: ComposeClientIdOptions): string {
  const req = validateRequest(opts);
  const fingerprint = resolveDeviceFingerprint(opts.serialNumber, opts.connections ?? [], opts.hostname);
  return assemble(req, fingerprint);
}

/**
 * Deterministic client id for this device.
 *
 * Components and `maxLength` are checked synchronously, so bad input throws before anything is
 * probed or hashed. Device facts are probed only when neither `serialNumber` nor `connections`
 * is given.
 */
export function buildAutoClientId(opts: BuildAutoClientIdOptions): Promise<string> {
  const req = validateRequest(opts);
  return probeAndAssemble(req, opts);
}

async function probeAndAssemble(req: ValidatedRequest, opts: BuildAutoClientIdOptions): Promise<string> {
  let serialNumber = opts.serialNumber;
  let connections = opts.connections;
  if (serialNumber === undefined && connections === undefined) {
    const facts = await (opts.probe ?? collectDeviceFacts)();
    serialNumber = facts.serialNumber;
    connections = facts.connections;
  }

  const fingerprint = resolveDeviceFingerprint(serialNumber, connections ?? [], opts.hostname);
  return assemble(req, fingerprint);
}
