import { readFile } from 'node:fs/promises';

import { buildAutoClientId } from '../identity/client_id.js';
import { collectDeviceFacts, type FactsProbe } from '../identity/facts.js';
import { silentSink, type LogSink } from '../log.js';

import {
  createMqttConfig,
  toClientOptions,
  withAutoReconnect,
  withAvailability,
  withFactsProbe,
  withInstanceId,
  withKeepAlive,
  withLastWill,
  withLogin,
  withMaxClientIdLength,
  withPersistentSession,
  withPort,
  withTls,
  type MqttConfig,
  type MqttProtocol,
  type QoS,
} from './config.js';
import { MqttConnection, mqttConnector, type Connector } from './connection.js';

type BuilderDeps = {
  connector: Connector;
  log: LogSink;
};

/**
 * Immutable, fluent MQTT connection builder. Every option returns a new builder;
 * `build()` derives the client id from device facts plus `appName` / `instanceId`.
 * The client id is never taken from the caller.
 *
 * If the same app may run more than once against one broker, set `instanceId(...)`
 * so the instances do not kick each other off with a duplicate client id.
 */
export class MqttBuilder {
  private constructor(
    readonly config: MqttConfig,
    private readonly deps: BuilderDeps,
  ) {}

  static create(host: string, appName: string, protocol: MqttProtocol): MqttBuilder {
    return new MqttBuilder(createMqttConfig({ host, appName, protocol }), { connector: mqttConnector, log: silentSink });
  }

  static v3(host: string, appName: string): MqttBuilder {
    return MqttBuilder.create(host, appName, 'v3');
  }

  static v5(host: string, appName: string): MqttBuilder {
    return MqttBuilder.create(host, appName, 'v5');
  }

  private next(config: MqttConfig, deps: Partial<BuilderDeps> = {}): MqttBuilder {
    return new MqttBuilder(config, { ...this.deps, ...deps });
  }

  instanceId(id: string): MqttBuilder {
    return this.next(withInstanceId(this.config, id));
  }

  port(port: number): MqttBuilder {
    return this.next(withPort(this.config, port));
  }

  keepAlive(seconds: number): MqttBuilder {
    return this.next(withKeepAlive(this.config, seconds));
  }

  persistentSession(persistent = true): MqttBuilder {
    return this.next(withPersistentSession(this.config, persistent));
  }

  login(username: string, password: string): MqttBuilder {
    return this.next(withLogin(this.config, username, password));
  }

  lastWill(topic: string, opts: { payload?: string; qos?: QoS; retain?: boolean } = {}): MqttBuilder {
    return this.next(withLastWill(this.config, topic, opts));
  }

  availability(
    topic: string,
    opts: { payloadOnline?: string; payloadOffline?: string; qos?: QoS; retain?: boolean } = {},
  ): MqttBuilder {
    return this.next(withAvailability(this.config, topic, opts));
  }

  tls(allowInsecure = false): MqttBuilder {
    return this.next(withTls(this.config, { allowInsecure }));
  }

  ownTls(caFile: string, allowInsecure = false): MqttBuilder {
    return this.next(withTls(this.config, { allowInsecure, caFile }));
  }

  autoReconnect(minDelay = 1, maxDelay = 30): MqttBuilder {
    return this.next(withAutoReconnect(this.config, minDelay, maxDelay));
  }

  maxClientIdLength(length: number): MqttBuilder {
    return this.next(withMaxClientIdLength(this.config, length));
  }

  factsProbe(probe: FactsProbe): MqttBuilder {
    return this.next(withFactsProbe(this.config, probe));
  }

  connector(connector: Connector): MqttBuilder {
    return this.next(this.config, { connector });
  }

  logTo(log: LogSink): MqttBuilder {
    return this.next(this.config, { log });
  }

  /** Derive the client id and return an unconnected connection. */
  async build(): Promise<MqttConnection> {
    const clientId = await buildAutoClientId({
      appName: this.config.appName,
      instanceId: this.config.instanceId,
      maxLength: this.config.maxClientIdLength,
      probe: this.config.probe ?? (() => collectDeviceFacts({ log: this.deps.log })),
    });
    this.deps.log(`[mqtt] client id ${clientId} for ${this.config.host}:${this.config.port}`);

    const ca = this.config.tls?.caFile ? await readFile(this.config.tls.caFile) : undefined;
    return new MqttConnection(clientId, toClientOptions(this.config, clientId, ca), {
      connector: this.deps.connector,
      availability: this.config.availability,
      autoReconnect: this.config.autoReconnect,
      log: this.deps.log,
    });
  }

  /** `build()` and connect. */
  async fastBuild(): Promise<MqttConnection> {
    const connection = await this.build();
    return connection.connect();
  }
}
