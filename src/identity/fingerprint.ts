import os from 'node:os';

import { CONN_BT, CONN_MAC, type Connection } from './connections.js';

function kindRank(kind: string): number {
  if (kind === CONN_MAC) return 0;
  if (kind === CONN_BT) return 1;
  return 2;
}

function byRankThenAddress(a: Connection, b: Connection): number {
  const r = kindRank(a.kind) - kindRank(b.kind);
  if (r !== 0) return r;
  if (a.address < b.address) return -1;
  if (a.address > b.address) return 1;
  return 0;
}

/**
 * Pick the most trustworthy stable value for this device.
 *
 * Priority: serial number, then the first connection ordered by (mac < bluetooth < other, address),
 * then the host name, then the literal `host:unknown`. Never throws.
 */
export function resolveDeviceFingerprint(
  serialNumber: string | null | undefined,
  connections: readonly Connection[],
  hostname: () => string = os.hostname,
): string {
  if (typeof serialNumber === 'string' && serialNumber.trim() !== '') {
    return `sn:${serialNumber.trim().toLowerCase()}`;
  }

  for (const { kind, address } of [...connections].sort(byRankThenAddress)) {
    if (typeof address === 'string' && address.trim() !== '') {
      return `${kind}:${address.trim().toLowerCase()}`;
    }
  }

  try {
    const host = hostname().trim().toLowerCase();
    if (host) return `host:${host}`;
  } catch {
    // fall through to the literal marker
  }

  return 'host:unknown';
}
