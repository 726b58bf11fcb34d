import { describe, expect, test, vi } from 'vitest';

import {
  buildAutoClientId,
  CLIENT_ID_NAMESPACE,
  composeClientId,
  DEFAULT_MAX_CLIENT_ID_LENGTH,
} from '../src/identity/client_id.js';
import { InvalidComponentError, InvalidConfigurationError } from '../src/identity/errors.js';
import type { DeviceFacts } from '../src/identity/facts.js';
import { buildCompactToken } from '../src/identity/hashing.js';

const ID_ALPHABET = /^[a-z0-9]+(-[a-z0-9]+)*$/;

describe('buildAutoClientId', () => {
  test('equals the hand-composed seed, hashed into the client-id namespace', async () => {
    const clientId = await buildAutoClientId({
      appName: 'agent',
      instanceId: 'worker1',
      serialNumber: 'serial-client',
      connections: [],
    });

    // max 23 -> 12 hash chars, 10 left for the prefix
    const suffix = buildCompactToken('sn:serial-client\x1fagent\x1fworker1', 12, CLIENT_ID_NAMESPACE);
    expect(clientId).toBe(`agent-${suffix}`);
    expect(clientId).toBe('agent-q2ypm3uh2ga7');
  });

  test('is deterministic and separates instances', async () => {
    const base = { appName: 'agent', serialNumber: 'serial-client', connections: [] };
    const a = await buildAutoClientId({ ...base, instanceId: 'worker1' });
    const b = await buildAutoClientId({ ...base, instanceId: 'worker1' });
    const c = await buildAutoClientId({ ...base, instanceId: 'worker2' });
    const d = await buildAutoClientId(base);

    expect(a).toBe(b);
    expect(c).toBe('agent-x2qtkb7xz5ny');
    expect(d).toBe('agent-7qmnpg2r363k');
  });

  test('normalizes components before seeding', async () => {
    const a = await buildAutoClientId({ appName: ' Agent ', instanceId: 'WORKER1', serialNumber: 'SERIAL-CLIENT' });
    expect(a).toBe('agent-q2ypm3uh2ga7');
  });

  test('uses the mac fingerprint when there is no serial', async () => {
    const clientId = await buildAutoClientId({
      appName: 'agent',
      connections: [
        { kind: 'bluetooth', address: '11:22:33:44:55:66' },
        { kind: 'mac', address: 'aa:bb:cc:dd:ee:ff' },
      ],
    });
    expect(clientId).toBe('agent-5ulhnflnqev4');
  });

  test('max length 8 leaves no room for a prefix', async () => {
    const clientId = await buildAutoClientId({
      appName: 'agent',
      instanceId: 'worker1',
      maxLength: 8,
      serialNumber: 'serial-client',
    });
    expect(clientId).toBe('q2ypm3uh');
  });

  test('truncates the app-name prefix to the remaining budget', async () => {
    const base = { appName: 'agent', instanceId: 'worker1', serialNumber: 'serial-client' };
    expect(await buildAutoClientId({ ...base, maxLength: 12 })).toBe('age-q2ypm3uh');
    expect(await buildAutoClientId({ ...base, maxLength: 14 })).toBe('age-q2ypm3uh2g');
    expect(await buildAutoClientId({ appName: 'a-very-long-application-name', serialNumber: 'x' })).toBe(
      'a-very-lon-chtbdsewudml',
    );
  });

  test('stays within the length bound and alphabet', async () => {
    for (let maxLength = 8; maxLength <= 40; maxLength += 1) {
      const clientId = await buildAutoClientId({ appName: 'My-App1', maxLength, serialNumber: 'ABC' });
      expect(clientId.length).toBeLessThanOrEqual(maxLength);
      expect(clientId).toMatch(ID_ALPHABET);
    }
    expect(await buildAutoClientId({ appName: 'My-App1', maxLength: 40, serialNumber: 'ABC' })).toBe(
      'my-app1-uq5ylz2k6u37',
    );
  });

  test('probes only when neither serial nor connections is given', async () => {
    const probe = vi.fn(async (): Promise<DeviceFacts> => ({ serialNumber: 'serial-client', connections: [] }));

    expect(await buildAutoClientId({ appName: 'agent', instanceId: 'worker1', probe })).toBe('agent-q2ypm3uh2ga7');
    expect(probe).toHaveBeenCalledTimes(1);

    await buildAutoClientId({ appName: 'agent', connections: [], probe, hostname: () => 'box' });
    await buildAutoClientId({ appName: 'agent', serialNumber: 'serial-client', probe });
    expect(probe).toHaveBeenCalledTimes(1);
  });

  test('supplied connections without a serial fall back to the host name', async () => {
    const viaHost = await buildAutoClientId({ appName: 'agent', connections: [], hostname: () => 'Edge-01' });
    const direct = composeClientId({ appName: 'agent', hostname: () => 'edge-01' });
    expect(viaHost).toBe(direct);
  });

  test('throws synchronously on invalid input, before probing', () => {
    const probe = vi.fn(async (): Promise<DeviceFacts> => ({ connections: [] }));

    expect(() => buildAutoClientId({ appName: 'bad name!', probe })).toThrow(InvalidComponentError);
    expect(() => buildAutoClientId({ appName: 'agent', instanceId: '', probe })).toThrow(
      'instance_id is invalid: value must not be empty.',
    );
    expect(() => buildAutoClientId({ appName: 'agent', maxLength: 7, probe })).toThrow(InvalidConfigurationError);
    expect(probe).not.toHaveBeenCalled();
  });
});

describe('composeClientId', () => {
  test('matches the async builder for the same facts', async () => {
    const opts = { appName: 'agent', instanceId: 'worker1', serialNumber: 'serial-client', connections: [] };
    expect(composeClientId(opts)).toBe(await buildAutoClientId(opts));
  });

  test('throws synchronously on a short max length', () => {
    expect(() => composeClientId({ appName: 'agent', maxLength: 4, serialNumber: 'x' })).toThrow(
      'max_length must be an integer >= 8',
    );
  });

  test('rejects a fractional max length', () => {
    expect(() => composeClientId({ appName: 'agent', maxLength: 8.5, serialNumber: 'x' })).toThrow(
      'max_length must be an integer >= 8',
    );
  });

  test('defaults to the MQTT 3.1.1 client id limit', () => {
    expect(DEFAULT_MAX_CLIENT_ID_LENGTH).toBe(23);
    expect(composeClientId({ appName: 'agent', serialNumber: 'serial-client' })).toHaveLength(18);
  });
});

describe('client id prefix', () => {
  test('a cut after a hyphen does not leave a double hyphen', () => {
    // budget 3 cuts "my-app1" to "my-"
    expect(composeClientId({ appName: 'My-App1', maxLength: 12, serialNumber: 'ABC' })).toMatch(/^my-[a-z2-7]{8}$/);
  });

  test('hyphen-only names degrade to the bare suffix', () => {
    expect(composeClientId({ appName: '---', serialNumber: 'ABC' })).toMatch(/^[a-z2-7]{12}$/);
  });
});
