import 'dotenv/config';

import { buildAutoClientId, DEFAULT_MAX_CLIENT_ID_LENGTH } from '../src/identity/client_id.js';
import { collectDeviceFacts } from '../src/identity/facts.js';
import { createNodeProbeHost } from '../src/identity/host.js';
import { consoleSink, silentSink } from '../src/log.js';

// Prints the client id this device derives. Usage:
//   npm run client-id -- --app agent [--instance worker1] [--max-length 23] [--verbose]

type Args = {
  app: string | undefined;
  instance: string | undefined;
  maxLength: number;
  verbose: boolean;
};

function parseArgs(argv: string[]): Args {
  const args: Args = {
    app: process.env.MQTT_APP_NAME,
    instance: process.env.MQTT_INSTANCE_ID || undefined,
    maxLength: Number(process.env.MQTT_CLIENT_ID_MAX_LENGTH ?? DEFAULT_MAX_CLIENT_ID_LENGTH),
    verbose: false,
  };
  for (let i = 0; i < argv.length; i += 1) {
    const a = argv[i];
    const b = argv[i + 1];
    if (a === '--app' && b) args.app = b;
    if (a === '--instance' && b) args.instance = b;
    if (a === '--max-length' && b) args.maxLength = Number(b);
    if (a === '--verbose') args.verbose = true;
  }
  return args;
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  if (!args.app) {
    console.error('[client-id] set --app or MQTT_APP_NAME');
    process.exit(2);
  }
  const log = args.verbose ? consoleSink : silentSink;
  const host = createNodeProbeHost({ timeoutMs: Number(process.env.MQTT_PROBE_TIMEOUT_MS ?? 2_000) });

  const clientId = await buildAutoClientId({
    appName: args.app,
    instanceId: args.instance,
    maxLength: args.maxLength,
    probe: () => collectDeviceFacts({ host, log }),
  });
  console.log(clientId);
}

main().catch((err: unknown) => {
  console.error(`[client-id] ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
