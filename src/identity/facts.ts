import { silentSink, type LogSink } from '../log.js';

import { createNodeProbeHost, type ProbeHost } from './host.js';
import { detectPlatform, probePlatform, type RuntimeInfo } from './platforms.js';
import { normalizeConnections, type Connection } from './connections.js';

export { CONN_BT, CONN_MAC, normalizeConnections, type Connection, type ConnectionKind } from './connections.js';

export type DeviceFacts = {
  serialNumber?: string;
  connections: Connection[];
};

export type FactsProbe = () => Promise<DeviceFacts>;

export type CollectDeviceFactsOptions = {
  host?: ProbeHost;
  runtime?: RuntimeInfo;
  log?: LogSink;
};

/**
 * Best-effort runtime detection of stable device facts.
 *
 * Never rejects: every source that fails is logged to the sink and skipped, so the
 * result may be empty. Connections come back normalized and deduplicated in no
 * particular order.
 */
export async function collectDeviceFacts(opts: CollectDeviceFactsOptions = {}): Promise<DeviceFacts> {
  const log = opts.log ?? silentSink;
  const host = opts.host ?? createNodeProbeHost();
  const platform = detectPlatform(opts.runtime);
  log(`[facts] platform=${platform.kind}`);

  const { serial, connections, skipped } = await probePlatform(platform, host);

  const facts: DeviceFacts = { connections: normalizeConnections(connections) };
  if (serial.ok) {
    facts.serialNumber = serial.value;
    log('[facts] serial: found');
  } else {
    log(`[facts] serial: absent (${serial.reason})`);
  }
  for (const r of skipped) log(`[facts] connections: skipped (${r})`);
  log(`[facts] connections: ${facts.connections.length}`);
  return facts;
}
