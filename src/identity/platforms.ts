import { CONN_BT, CONN_MAC, globalMac, normalizeMac, type Connection } from './connections.js';
import type { ProbeHost } from './host.js';
import { absent, firstPresent, ok, reasonOf, type Probe } from './probe.js';

// Hardware access of a JavaScript runtime on a microcontroller board (Espruino, Moddable, ...).
export interface BoardAdapter {
  uniqueId(): Uint8Array | string;
  macAddresses(): Array<Uint8Array | string>;
}

export type RuntimeInfo = {
  platform: string;
  board?: BoardAdapter;
};

export type Platform =
  | { kind: 'embedded'; board: BoardAdapter }
  | { kind: 'linux' }
  | { kind: 'darwin' }
  | { kind: 'windows' }
  | { kind: 'unknown' };

export type PlatformFacts = {
  serial: Probe<string>;
  connections: Connection[];
  skipped: string[];
};

export function detectPlatform(runtime: RuntimeInfo = { platform: process.platform }): Platform {
  // The board marker wins over the host OS family.
  if (runtime.board) return { kind: 'embedded', board: runtime.board };
  switch (runtime.platform) {
    case 'linux':
      return { kind: 'linux' };
    case 'darwin':
      return { kind: 'darwin' };
    case 'win32':
      return { kind: 'windows' };
    default:
      return { kind: 'unknown' };
  }
}

export function probePlatform(platform: Platform, host: ProbeHost): Promise<PlatformFacts> {
  switch (platform.kind) {
    case 'embedded':
      return gather(embeddedSerial(platform.board), [embeddedConnections(platform.board)]);
    case 'linux':
      return gather(linuxSerial(host), [linuxMacs(host), linuxBluetooth(host)]);
    case 'darwin':
      return gather(darwinSerial(host), [darwinMacs(host), darwinBluetooth(host)]);
    case 'windows':
      return gather(windowsSerial(host), [windowsMacs(host), windowsBluetooth(host)]);
    case 'unknown':
      return Promise.resolve({ serial: absent('unsupported_platform'), connections: [], skipped: [] });
  }
}

async function gather(
  serialProbe: Promise<Probe<string>>,
  connectionProbes: Array<Promise<Probe<Connection[]>>>,
): Promise<PlatformFacts> {
  const [serial, conns] = await Promise.all([serialProbe, Promise.all(connectionProbes)]);
  const connections: Connection[] = [];
  const skipped: string[] = [];
  for (const c of conns) {
    if (c.ok) connections.push(...c.value);
    else skipped.push(c.reason);
  }
  return { serial, connections, skipped };
}

function nonEmpty(value: string, source: string): Probe<string> {
  return value ? ok(value) : absent(`${source}: empty`);
}

function lines(text: string): string[] {
  return text.split(/\r?\n/);
}

function afterColon(line: string): string {
  return line.slice(line.indexOf(':') + 1).trim();
}

function toHex(value: Uint8Array | string): string {
  return typeof value === 'string' ? value : Buffer.from(value).toString('hex');
}

// embedded

async function embeddedSerial(board: BoardAdapter): Promise<Probe<string>> {
  try {
    return nonEmpty(toHex(board.uniqueId()).trim(), 'board unique id');
  } catch (err) {
    return absent(`board unique id: ${reasonOf(err)}`);
  }
}

async function embeddedConnections(board: BoardAdapter): Promise<Probe<Connection[]>> {
  let raw: Array<Uint8Array | string>;
  try {
    raw = board.macAddresses();
  } catch (err) {
    return absent(`board mac: ${reasonOf(err)}`);
  }
  const out: Connection[] = [];
  for (const m of raw) {
    const mac = globalMac(toHex(m));
    if (mac) out.push({ kind: CONN_MAC, address: mac });
  }
  return ok(out);
}

// linux

const LINUX_SERIAL_FILES = [
  '/sys/class/dmi/id/product_serial',
  '/sys/firmware/devicetree/base/serial-number',
  '/proc/device-tree/serial-number',
];

function linuxSerial(host: ProbeHost): Promise<Probe<string>> {
  const fromFile = (path: string) => async (): Promise<Probe<string>> => {
    const res = await host.readText(path);
    if (!res.ok) return res;
    // device-tree strings are NUL terminated
    return nonEmpty(res.value.trim().replace(/^\0+|\0+$/g, ''), path);
  };

  const fromCpuinfo = async (): Promise<Probe<string>> => {
    const res = await host.readText('/proc/cpuinfo');
    if (!res.ok) return res;
    for (const line of lines(res.value)) {
      if (!line.toLowerCase().startsWith('serial')) continue;
      const value = afterColon(line);
      if (value) return ok(value);
    }
    return absent('/proc/cpuinfo: no serial line');
  };

  return firstPresent([...LINUX_SERIAL_FILES.map(fromFile), fromCpuinfo]);
}

async function linuxMacs(host: ProbeHost): Promise<Probe<Connection[]>> {
  const ifaces = await host.listDir('/sys/class/net');
  if (!ifaces.ok) return absent(ifaces.reason);

  const reads = await Promise.all(ifaces.value.map((name) => host.readText(`/sys/class/net/${name}/address`)));
  const out: Connection[] = [];
  for (const r of reads) {
    if (!r.ok) continue;
    const mac = globalMac(r.value.trim());
    if (mac) out.push({ kind: CONN_MAC, address: mac });
  }
  return ok(out);
}

async function linuxBluetooth(host: ProbeHost): Promise<Probe<Connection[]>> {
  // Controllers report a random static address unless btmgmt confirms a public one.
  const info = await host.run('btmgmt', ['info']);
  if (!info.ok) return absent(info.reason);
  if (!info.value.toLowerCase().includes('public address')) return absent('btmgmt: no public address');

  const controllers = await host.listDir('/sys/class/bluetooth');
  const out: Connection[] = [];

  if (controllers.ok) {
    const reads = await Promise.all(
      controllers.value.map((name) => host.readText(`/sys/class/bluetooth/${name}/address`)),
    );
    for (const r of reads) {
      if (!r.ok) continue;
      const mac = normalizeMac(r.value.trim());
      if (mac) out.push({ kind: CONN_BT, address: mac });
    }
    return ok(out);
  }

  const show = await host.run('bluetoothctl', ['show']);
  if (!show.ok) return absent(show.reason);
  for (const line of lines(show.value)) {
    const parts = line.trim().split(/\s+/);
    if (parts[0] !== 'Controller' || !parts[1]) continue;
    const mac = normalizeMac(parts[1]);
    if (mac) out.push({ kind: CONN_BT, address: mac });
  }
  return ok(out);
}

// darwin

async function darwinSerial(host: ProbeHost): Promise<Probe<string>> {
  const res = await host.run('ioreg', ['-rd1', '-c', 'IOPlatformExpertDevice']);
  if (!res.ok) return res;
  for (const line of lines(res.value)) {
    if (!line.includes('IOPlatformSerialNumber')) continue;
    const value = (line.split('=')[1] ?? '').trim().replace(/^"+|"+$/g, '');
    if (value) return ok(value);
  }
  return absent('ioreg: no IOPlatformSerialNumber');
}

async function darwinMacs(host: ProbeHost): Promise<Probe<Connection[]>> {
  const res = await host.run('networksetup', ['-listallhardwareports']);
  if (!res.ok) return absent(res.reason);
  const out: Connection[] = [];
  for (const raw of lines(res.value)) {
    const line = raw.trim();
    if (!line.toLowerCase().startsWith('ethernet address')) continue;
    const mac = globalMac(afterColon(line));
    if (mac) out.push({ kind: CONN_MAC, address: mac });
  }
  return ok(out);
}

async function darwinBluetooth(host: ProbeHost): Promise<Probe<Connection[]>> {
  const res = await host.run('system_profiler', ['SPBluetoothDataType']);
  if (!res.ok) return absent(res.reason);
  for (const raw of lines(res.value)) {
    const line = raw.trim();
    if (!line.toLowerCase().startsWith('address:')) continue;
    // only the local controller's public address counts; paired devices follow it
    const mac = globalMac(afterColon(line));
    if (mac) return ok([{ kind: CONN_BT, address: mac }]);
  }
  return ok([]);
}

// windows

function windowsSerial(host: ProbeHost): Promise<Probe<string>> {
  const fromCim = async (): Promise<Probe<string>> => {
    const res = await host.run('powershell', ['-NoProfile', '-Command', '(Get-CimInstance Win32_BIOS).SerialNumber']);
    if (!res.ok) return res;
    return nonEmpty(res.value.trim(), 'Win32_BIOS');
  };

  const fromWmic = async (): Promise<Probe<string>> => {
    const res = await host.run('wmic', ['bios', 'get', 'serialnumber']);
    if (!res.ok) return res;
    // header line, then the value
    const rows = lines(res.value)
      .map((l) => l.trim())
      .filter((l) => l !== '');
    return rows[1] ? ok(rows[1]) : absent('wmic bios: no value');
  };

  return firstPresent([fromCim, fromWmic]);
}

function csvCells(line: string): string[] {
  return line.split(',').map((c) => c.trim().replace(/^"+|"+$/g, ''));
}

async function windowsMacs(host: ProbeHost): Promise<Probe<Connection[]>> {
  const res = await host.run('getmac', ['/v', '/fo', 'csv']);
  if (!res.ok) return absent(res.reason);
  const out: Connection[] = [];
  for (const line of lines(res.value)) {
    if (!line.includes(',')) continue;
    for (const cell of csvCells(line)) {
      const mac = globalMac(cell);
      if (mac) out.push({ kind: CONN_MAC, address: mac });
    }
  }
  return ok(out);
}

async function windowsBluetooth(host: ProbeHost): Promise<Probe<Connection[]>> {
  const res = await host.run('wmic', ['nic', 'get', 'Name,MACAddress', '/format:csv']);
  if (!res.ok) return absent(res.reason);
  const out: Connection[] = [];
  // Node,MACAddress,Name
  for (const row of lines(res.value)) {
    const cols = row.split(',').map((c) => c.trim());
    const [, address, name] = cols;
    if (address === undefined || name === undefined) continue;
    if (!name.toLowerCase().includes('bluetooth')) continue;
    const mac = globalMac(address);
    if (mac) out.push({ kind: CONN_BT, address: mac });
  }
  return ok(out);
}
