import { errorMessage } from '@serialbridge/shared/protocol';
import { loadConfig, parseArgs, USAGE, type BridgeConfig } from './config.js';
import { createBridgeApp } from './app.js';

const argv = process.argv.slice(2);

if (parseArgs(argv).help) {
  console.log(USAGE);
  process.exit(0);
}

let config: BridgeConfig;
try {
  config = loadConfig(process.env, argv);
} catch (err) {
  console.error(`[Config] ${errorMessage(err)}`);
  process.exit(1);
}

console.log(`[Bridge] Serial port: ${config.serialPort} @ ${config.baudRate} baud`);

const app = createBridgeApp(config);

let stopping = false;
function shutdown(signal: string): void {
  if (stopping) return;
  stopping = true;
  console.log(`[Bridge] Received ${signal}`);
  app.stop().then(
    () => process.exit(0),
    (err: unknown) => {
      console.error(`[Bridge] Error during shutdown: ${errorMessage(err)}`);
      process.exit(1);
    }
  );
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

await app.start();
