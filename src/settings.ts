import { z } from 'zod';

import { DEFAULT_MAX_CLIENT_ID_LENGTH } from './identity/client_id.js';
import { collectDeviceFacts } from './identity/facts.js';
import { createNodeProbeHost, DEFAULT_PROBE_TIMEOUT_MS } from './identity/host.js';
import { silentSink, type LogSink } from './log.js';
import { MqttBuilder } from './mqtt/builder.js';

function parseBool(raw: string): boolean | undefined {
  const v = raw.trim().toLowerCase();
  if (v === '1' || v === 'true' || v === 'yes' || v === 'on') return true;
  if (v === '0' || v === 'false' || v === 'no' || v === 'off') return false;
  return undefined;
}

const BoolFlag = z
  .string()
  .transform((raw, ctx) => {
    const v = parseBool(raw);
    if (v === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected 1/0, true/false, yes/no or on/off' });
      return z.NEVER;
    }
    return v;
  })
  .optional();

const NonEmpty = z.string().trim().min(1);

export const SettingsSchema = z.object({
  MQTT_HOST: NonEmpty,
  MQTT_PORT: z.coerce.number().int().min(1).max(65_535).default(1883),
  MQTT_APP_NAME: NonEmpty,
  MQTT_INSTANCE_ID: NonEmpty.optional(),
  MQTT_PROTOCOL: z.enum(['v3', 'v5']).default('v5'),
  MQTT_USERNAME: z.string().optional(),
  MQTT_PASSWORD: z.string().optional(),
  MQTT_KEEPALIVE: z.coerce.number().int().nonnegative().default(60),
  MQTT_PERSISTENT_SESSION: BoolFlag,
  MQTT_TLS: BoolFlag,
  MQTT_TLS_INSECURE: BoolFlag,
  MQTT_CA_FILE: NonEmpty.optional(),
  MQTT_AVAILABILITY_TOPIC: NonEmpty.optional(),
  MQTT_CLIENT_ID_MAX_LENGTH: z.coerce.number().int().min(8).default(DEFAULT_MAX_CLIENT_ID_LENGTH),
  MQTT_PROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_PROBE_TIMEOUT_MS),
});
export type Settings = z.infer<typeof SettingsSchema>;

// Empty variables count as unset, the way a blank line in .env reads.
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v.trim() !== ''));
  return SettingsSchema.parse(present);
}

export function builderFromSettings(settings: Settings, log: LogSink = silentSink): MqttBuilder {
  const host = createNodeProbeHost({ timeoutMs: settings.MQTT_PROBE_TIMEOUT_MS });
  let b = MqttBuilder.create(settings.MQTT_HOST, settings.MQTT_APP_NAME, settings.MQTT_PROTOCOL)
    .port(settings.MQTT_PORT)
    .keepAlive(settings.MQTT_KEEPALIVE)
    .maxClientIdLength(settings.MQTT_CLIENT_ID_MAX_LENGTH)
    .factsProbe(() => collectDeviceFacts({ host, log }))
    .logTo(log);

  if (settings.MQTT_INSTANCE_ID) b = b.instanceId(settings.MQTT_INSTANCE_ID);
  if (settings.MQTT_PERSISTENT_SESSION) b = b.persistentSession();
  if (settings.MQTT_USERNAME !== undefined && settings.MQTT_PASSWORD !== undefined) {
    b = b.login(settings.MQTT_USERNAME, settings.MQTT_PASSWORD);
  }
  if (settings.MQTT_CA_FILE) b = b.ownTls(settings.MQTT_CA_FILE, settings.MQTT_TLS_INSECURE ?? false);
  else if (settings.MQTT_TLS) b = b.tls(settings.MQTT_TLS_INSECURE ?? false);
  if (settings.MQTT_AVAILABILITY_TOPIC) b = b.availability(settings.MQTT_AVAILABILITY_TOPIC);
  return b;
}
