export {
  buildAutoClientId,
  CLIENT_ID_NAMESPACE,
  composeClientId,
  DEFAULT_MAX_CLIENT_ID_LENGTH,
  MIN_CLIENT_ID_LENGTH,
  type BuildAutoClientIdOptions,
  type ComposeClientIdOptions,
} from './client_id.js';
export { ClientIdentityError, InvalidComponentError, InvalidConfigurationError } from './errors.js';
export {
  collectDeviceFacts,
  CONN_BT,
  CONN_MAC,
  normalizeConnections,
  type CollectDeviceFactsOptions,
  type Connection,
  type ConnectionKind,
  type DeviceFacts,
  type FactsProbe,
} from './facts.js';
export { resolveDeviceFingerprint } from './fingerprint.js';
export { buildCompactToken, buildUrlsafeToken } from './hashing.js';
export { createNodeProbeHost, DEFAULT_PROBE_TIMEOUT_MS, type ProbeHost } from './host.js';
export { detectPlatform, type BoardAdapter, type Platform, type RuntimeInfo } from './platforms.js';
export { absent, ok, type Probe } from './probe.js';
export { validateComponent } from './validation.js';
