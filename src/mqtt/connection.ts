import { connect, type IClientOptions } from 'mqtt';

import { silentSink, type LogSink } from '../log.js';

import type { Availability, AutoReconnect, QoS } from './config.js';

// The part of MQTT.js' client this wrapper drives. Tests hand in an in-process fake.
export interface MqttClientLike {
  options: IClientOptions;
  on(event: 'connect' | 'reconnect' | 'close', listener: () => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'message', listener: (topic: string, payload: Buffer) => void): unknown;
  removeListener(event: 'connect' | 'close', listener: () => void): unknown;
  removeListener(event: 'error', listener: (err: Error) => void): unknown;
  publishAsync(topic: string, message: string, opts?: { qos?: QoS; retain?: boolean }): Promise<unknown>;
  subscribeAsync(topic: string, opts?: { qos: QoS }): Promise<unknown>;
  end(force?: boolean): unknown;
  endAsync(force?: boolean): Promise<void>;
}

export type Connector = (options: IClientOptions) => MqttClientLike;

export const mqttConnector: Connector = (options) => connect(options);

export type MqttConnectionDeps = {
  connector?: Connector;
  availability?: Availability;
  autoReconnect?: AutoReconnect;
  log?: LogSink;
};

export class MqttConnection {
  private client: MqttClientLike | null = null;
  private readonly connector: Connector;
  private readonly log: LogSink;

  constructor(
    readonly clientId: string,
    readonly options: IClientOptions,
    private readonly deps: MqttConnectionDeps = {},
  ) {
    this.connector = deps.connector ?? mqttConnector;
    this.log = deps.log ?? silentSink;
  }

  get isStarted(): boolean {
    return this.client !== null;
  }

  /**
   * Create the client and resolve once the broker acknowledged the first connect. An error or a
   * close before that rejects and force-ends the client, so the connection can be retried.
   */
  connect(): Promise<this> {
    if (this.client) return Promise.reject(new Error('already_connected'));
    const client = this.connector(this.options);
    this.client = client;
    this.wire(client);

    return new Promise((resolve, reject) => {
      const onConnect = () => {
        cleanup();
        resolve(this);
      };
      const onError = (err: Error) => fail(err);
      const onClose = () => fail(new Error('connection_closed'));
      const fail = (err: Error) => {
        cleanup();
        client.end(true);
        if (this.client === client) this.client = null;
        this.log(`[mqtt:${this.clientId}] connect_failed: ${err.message}`);
        reject(err);
      };
      const cleanup = () => {
        client.removeListener('connect', onConnect);
        client.removeListener('error', onError);
        client.removeListener('close', onClose);
      };
      client.on('connect', onConnect);
      client.on('error', onError);
      client.on('close', onClose);
    });
  }

  async publish(topic: string, payload: string, opts: { qos?: QoS; retain?: boolean } = {}): Promise<void> {
    await this.requireClient().publishAsync(topic, payload, { qos: opts.qos ?? 0, retain: opts.retain ?? false });
  }

  async subscribe(topic: string, qos: QoS = 0): Promise<void> {
    await this.requireClient().subscribeAsync(topic, { qos });
  }

  onMessage(handler: (topic: string, payload: Buffer) => void): void {
    this.requireClient().on('message', handler);
  }

  /** Announce the offline state (when availability is configured) and end the session. */
  async disconnect(): Promise<void> {
    const client = this.client;
    if (!client) return;
    const availability = this.deps.availability;
    try {
      if (availability) {
        await client.publishAsync(availability.topic, availability.payloadOffline, {
          qos: availability.qos,
          retain: availability.retain,
        });
      }
    } finally {
      await client.endAsync();
      this.client = null;
    }
    this.log(`[mqtt:${this.clientId}] disconnected`);
  }

  private wire(client: MqttClientLike) {
    const availability = this.deps.availability;
    const backoff = this.deps.autoReconnect;

    client.on('connect', () => {
      this.log(`[mqtt:${this.clientId}] connected`);
      if (backoff) client.options.reconnectPeriod = backoff.minDelay * 1000;
      if (!availability) return;
      client
        .publishAsync(availability.topic, availability.payloadOnline, {
          qos: availability.qos,
          retain: availability.retain,
        })
        .catch((err: unknown) =>
          this.log(`[mqtt:${this.clientId}] availability_publish_failed: ${err instanceof Error ? err.message : String(err)}`),
        );
    });

    client.on('reconnect', () => {
      if (!backoff) return;
      // Double the wait before the next attempt, capped at maxDelay.
      const current = client.options.reconnectPeriod ?? backoff.minDelay * 1000;
      client.options.reconnectPeriod = Math.min(current * 2, backoff.maxDelay * 1000);
      this.log(`[mqtt:${this.clientId}] reconnecting (next in ${client.options.reconnectPeriod}ms)`);
    });

    client.on('close', () => this.log(`[mqtt:${this.clientId}] closed`));
  }

  private requireClient(): MqttClientLike {
    if (!this.client) throw new Error('not_connected');
    return this.client;
  }
}
