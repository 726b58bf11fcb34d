import { execFile } from 'node:child_process';
import { readdir, readFile } from 'node:fs/promises';

import { absent, ok, reasonOf, type Probe } from './probe.js';

export const DEFAULT_PROBE_TIMEOUT_MS = 2_000;

// Everything the platform probes may touch. Swapped for an in-memory host in tests.
export interface ProbeHost {
  readText(path: string): Promise<Probe<string>>;
  listDir(path: string): Promise<Probe<string[]>>;
  run(command: string, args: readonly string[]): Promise<Probe<string>>;
}

export type NodeProbeHostOptions = {
  timeoutMs?: number;
};

export function createNodeProbeHost(opts: NodeProbeHostOptions = {}): ProbeHost {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;

  return {
    async readText(path) {
      try {
        return ok(await readFile(path, { encoding: 'utf8', signal: AbortSignal.timeout(timeoutMs) }));
      } catch (err) {
        return absent(`read ${path}: ${reasonOf(err)}`);
      }
    },

    async listDir(path) {
      try {
        return ok(await readdir(path));
      } catch (err) {
        return absent(`list ${path}: ${reasonOf(err)}`);
      }
    },

    run(command, args) {
      return new Promise((resolve) => {
        execFile(
          command,
          [...args],
          { encoding: 'utf8', timeout: timeoutMs, windowsHide: true, maxBuffer: 4 * 1024 * 1024 },
          (err, stdout) => {
            if (err) {
              resolve(absent(`run ${command}: ${reasonOf(err)}`));
              return;
            }
            resolve(ok(stdout));
          },
        );
      });
    },
  };
}
