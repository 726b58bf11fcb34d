export const CONN_MAC = 'mac' as const;
export const CONN_BT = 'bluetooth' as const;

export type ConnectionKind = typeof CONN_MAC | typeof CONN_BT;

// `kind` stays a plain string so callers can hand in connections from other sources;
// anything but mac/bluetooth ranks last in the fingerprint and is dropped by normalization.
export type Connection = {
  kind: string;
  address: string;
};

const PLACEHOLDER_MACS = new Set(['00:00:00:00:00:00', 'ff:ff:ff:ff:ff:ff']);

export function normalizeMac(value: string): string | null {
  const raw = value.replace(/[^A-Za-z0-9]/g, '').toLowerCase();
  if (!/^[0-9a-f]{12}$/.test(raw)) return null;
  return raw.match(/../g)?.join(':') ?? null;
}

// Bit 0 of the first octet marks multicast, bit 1 a locally administered (virtual/random) address.
export function isGlobalMac(mac: string): boolean {
  const first = Number.parseInt(mac.slice(0, 2), 16);
  if (Number.isNaN(first)) return false;
  return (first & 0x01) === 0 && (first & 0x02) === 0;
}

export function globalMac(value: string): string | null {
  const mac = normalizeMac(value);
  return mac && isGlobalMac(mac) ? mac : null;
}

export function normalizeConnections(conns: Iterable<Connection>): Connection[] {
  const out = new Map<string, Connection>();
  for (const { kind, address } of conns) {
    const mac = normalizeMac(address);
    if (!kind || !mac) continue;
    if (PLACEHOLDER_MACS.has(mac)) continue;
    if (kind === CONN_MAC && !isGlobalMac(mac)) continue;
    if (kind !== CONN_MAC && kind !== CONN_BT) continue;
    out.set(`${kind}|${mac}`, { kind, address: mac });
  }
  return [...out.values()];
}
