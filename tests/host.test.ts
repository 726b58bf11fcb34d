import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterAll, beforeAll, describe, expect, test } from 'vitest';

import { createNodeProbeHost } from '../src/identity/host.js';

describe('createNodeProbeHost', () => {
  let dir = '';

  beforeAll(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'probe-host-'));
    await writeFile(path.join(dir, 'serial'), 'ABC123\n');
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('reads files and lists directories', async () => {
    const host = createNodeProbeHost();
    expect(await host.readText(path.join(dir, 'serial'))).toEqual({ ok: true, value: 'ABC123\n' });
    expect(await host.listDir(dir)).toEqual({ ok: true, value: ['serial'] });
  });

  test('a missing file or directory is absent', async () => {
    const host = createNodeProbeHost();
    const missing = path.join(dir, 'missing');

    expect(await host.readText(missing)).toEqual({ ok: false, reason: `read ${missing}: enoent` });
    expect(await host.listDir(missing)).toEqual({ ok: false, reason: `list ${missing}: enoent` });
  });

  test('captures the output of a command', async () => {
    const host = createNodeProbeHost();
    const res = await host.run(process.execPath, ['-e', 'process.stdout.write("hello")']);
    expect(res).toEqual({ ok: true, value: 'hello' });
  });

  test('a missing binary is absent', async () => {
    const host = createNodeProbeHost();
    const res = await host.run('no-such-binary-for-probe-host', []);
    expect(res).toEqual({ ok: false, reason: 'run no-such-binary-for-probe-host: enoent' });
  });

  test('a non-zero exit is absent', async () => {
    const host = createNodeProbeHost();
    const res = await host.run(process.execPath, ['-e', 'process.exit(3)']);
    expect(res.ok).toBe(false);
  });

  test('a hanging command is killed at the timeout', async () => {
    const host = createNodeProbeHost({ timeoutMs: 50 });
    const started = Date.now();
    const res = await host.run(process.execPath, ['-e', 'setTimeout(() => {}, 5000)']);

    expect(res.ok).toBe(false);
    expect(Date.now() - started).toBeLessThan(3000);
  });
});
