import type { IClientOptions } from 'mqtt';

import { DEFAULT_MAX_CLIENT_ID_LENGTH } from '../identity/client_id.js';
import { InvalidConfigurationError } from '../identity/errors.js';
import type { FactsProbe } from '../identity/facts.js';

export type QoS = 0 | 1 | 2;
export type MqttProtocol = 'v3' | 'v5';

export type LastWill = {
  topic: string;
  payload: string;
  qos: QoS;
  retain: boolean;
};

export type Availability = {
  topic: string;
  payloadOnline: string;
  payloadOffline: string;
  qos: QoS;
  retain: boolean;
};

export type TlsSettings = {
  allowInsecure: boolean;
  caFile?: string;
};

// Seconds.
export type AutoReconnect = {
  minDelay: number;
  maxDelay: number;
};

export type MqttConfig = Readonly<{
  host: string;
  appName: string;
  protocol: MqttProtocol;
  instanceId?: string;
  port: number;
  keepAlive: number;
  persistentSession: boolean;
  credentials?: { username: string; password: string };
  lastWill?: LastWill;
  availability?: Availability;
  tls?: TlsSettings;
  autoReconnect?: AutoReconnect;
  maxClientIdLength: number;
  // unset: live probing of this device
  probe?: FactsProbe;
}>;

// Session lifetime the broker keeps for a persistent v5 session.
export const PERSISTENT_SESSION_EXPIRY_SECONDS = 3600;

export function createMqttConfig(args: { host: string; appName: string; protocol: MqttProtocol }): MqttConfig {
  if (args.host.trim() === '') throw new InvalidConfigurationError('host must not be empty');
  return {
    host: args.host.trim(),
    appName: args.appName,
    protocol: args.protocol,
    port: 1883,
    keepAlive: 60,
    persistentSession: false,
    maxClientIdLength: DEFAULT_MAX_CLIENT_ID_LENGTH,
  };
}

// Component format is validated once, when the client id is derived at build time.
export function withInstanceId(config: MqttConfig, instanceId: string): MqttConfig {
  return { ...config, instanceId };
}

export function withPort(config: MqttConfig, port: number): MqttConfig {
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new InvalidConfigurationError('port must be an integer in 1..65535');
  }
  return { ...config, port };
}

export function withKeepAlive(config: MqttConfig, keepAlive: number): MqttConfig {
  if (!Number.isInteger(keepAlive) || keepAlive < 0) {
    throw new InvalidConfigurationError('keep_alive must be a non-negative integer');
  }
  return { ...config, keepAlive };
}

export function withPersistentSession(config: MqttConfig, persistentSession = true): MqttConfig {
  return { ...config, persistentSession };
}

export function withLogin(config: MqttConfig, username: string, password: string): MqttConfig {
  return { ...config, credentials: { username, password } };
}

export function withLastWill(
  config: MqttConfig,
  topic: string,
  opts: { payload?: string; qos?: QoS; retain?: boolean } = {},
): MqttConfig {
  const lastWill: LastWill = {
    topic,
    payload: opts.payload ?? 'offline',
    qos: opts.qos ?? 1,
    retain: opts.retain ?? true,
  };
  return { ...config, lastWill };
}

/**
 * Publish `payloadOnline` on every successful connect and `payloadOffline` before a clean
 * disconnect. The offline payload also becomes the last will, so the broker announces
 * unclean disconnects on the same topic.
 */
export function withAvailability(
  config: MqttConfig,
  topic: string,
  opts: { payloadOnline?: string; payloadOffline?: string; qos?: QoS; retain?: boolean } = {},
): MqttConfig {
  const availability: Availability = {
    topic,
    payloadOnline: opts.payloadOnline ?? 'online',
    payloadOffline: opts.payloadOffline ?? 'offline',
    qos: opts.qos ?? 1,
    retain: opts.retain ?? true,
  };
  return withLastWill(
    { ...config, availability },
    topic,
    { payload: availability.payloadOffline, qos: availability.qos, retain: availability.retain },
  );
}

export function withTls(config: MqttConfig, tls: { allowInsecure?: boolean; caFile?: string } = {}): MqttConfig {
  return { ...config, tls: { allowInsecure: tls.allowInsecure ?? false, caFile: tls.caFile } };
}

export function withAutoReconnect(config: MqttConfig, minDelay = 1, maxDelay = 30): MqttConfig {
  if (!(minDelay > 0) || maxDelay < minDelay) {
    throw new InvalidConfigurationError('auto reconnect needs 0 < min_delay <= max_delay');
  }
  return { ...config, autoReconnect: { minDelay, maxDelay } };
}

export function withFactsProbe(config: MqttConfig, probe: FactsProbe): MqttConfig {
  return { ...config, probe };
}

export function withMaxClientIdLength(config: MqttConfig, maxClientIdLength: number): MqttConfig {
  return { ...config, maxClientIdLength };
}

// Options for the MQTT.js client. `ca` is the already-read CA bundle when `tls.caFile` is set.
export function toClientOptions(config: MqttConfig, clientId: string, ca?: Buffer): IClientOptions {
  const options: IClientOptions = {
    host: config.host,
    port: config.port,
    clientId,
    protocolVersion: config.protocol === 'v5' ? 5 : 4,
    keepalive: config.keepAlive,
    clean: !config.persistentSession,
    reconnectPeriod: config.autoReconnect ? config.autoReconnect.minDelay * 1000 : 0,
  };

  if (config.protocol === 'v5') {
    options.properties = {
      sessionExpiryInterval: config.persistentSession ? PERSISTENT_SESSION_EXPIRY_SECONDS : 0,
    };
  }

  if (config.tls) {
    options.protocol = 'mqtts';
    options.rejectUnauthorized = !config.tls.allowInsecure;
    if (ca) options.ca = ca;
  } else {
    options.protocol = 'mqtt';
  }

  if (config.credentials) {
    options.username = config.credentials.username;
    options.password = config.credentials.password;
  }

  if (config.lastWill) {
    options.will = {
      topic: config.lastWill.topic,
      payload: config.lastWill.payload,
      qos: config.lastWill.qos,
      retain: config.lastWill.retain,
    };
  }

  return options;
}
