import { z } from 'zod';
import { BridgeError, ErrorCode } from '@serialbridge/shared/protocol';

export function defaultSerialPort(platform: NodeJS.Platform = process.platform): string {
  return platform === 'win32' ? 'COM3' : '/dev/ttyUSB0';
}

const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess((value) => (value === '' ? undefined : value), schema);

const ConfigSchema = z.object({
  serialPort: optional(z.string().min(1).optional()),
  baudRate: optional(z.coerce.number().int().positive().default(9600)),
  serialTimeout: optional(z.coerce.number().positive().default(1.0)),
  reconnectInterval: optional(z.coerce.number().positive().default(5)),
  maxConnections: optional(z.coerce.number().int().positive().default(100)),
  host: optional(z.string().min(1).default('0.0.0.0')),
  port: optional(z.coerce.number().int().min(0).max(65535).default(8000)),
});

type ConfigKey = keyof BridgeConfig;

export interface BridgeConfig {
  serialPort: string;
  baudRate: number;
  /** Seconds */
  serialTimeout: number;
  /** Seconds */
  reconnectInterval: number;
  maxConnections: number;
  host: string;
  port: number;
}

const ENV_VARS: ReadonlyArray<readonly [ConfigKey, string]> = [
  ['serialPort', 'SERIAL_PORT'],
  ['baudRate', 'BAUDRATE'],
  ['serialTimeout', 'SERIAL_TIMEOUT'],
  ['reconnectInterval', 'RECONNECT_INTERVAL'],
  ['maxConnections', 'MAX_WS_CONNECTIONS'],
  ['host', 'WS_HOST'],
  ['port', 'WS_PORT'],
];

const FLAGS = new Map<string, ConfigKey>([
  ['--port', 'serialPort'],
  ['--baudrate', 'baudRate'],
  ['--serial-timeout', 'serialTimeout'],
  ['--reconnect-interval', 'reconnectInterval'],
  ['--max-connections', 'maxConnections'],
  ['--host', 'host'],
  ['--ws-port', 'port'],
]);

export const USAGE = `Usage: serial-bridge [options]

Options:
  --port <path>                Serial device (env SERIAL_PORT, default ${defaultSerialPort()})
  --baudrate <n>               Serial speed (env BAUDRATE, default 9600)
  --serial-timeout <seconds>   Read timeout (env SERIAL_TIMEOUT, default 1.0)
  --reconnect-interval <s>     Delay between reconnect attempts (env RECONNECT_INTERVAL, default 5)
  --max-connections <n>        WebSocket client limit (env MAX_WS_CONNECTIONS, default 100)
  --host <host>                Listen host (env WS_HOST, default 0.0.0.0)
  --ws-port <n>                Listen port (env WS_PORT, default 8000)
  --help                       Show this message
`;

export interface ParsedArgs {
  flags: Partial<Record<ConfigKey, string>>;
  help: boolean;
  unknown: string[];
}

/**
 * Accepts --flag=value and --flag value
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { flags: {}, help: false, unknown: [] };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) continue;

    if (arg === '--help' || arg === '-h') {
      parsed.help = true;
      continue;
    }

    const eq = arg.indexOf('=');
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const key = FLAGS.get(name);
    if (!key) {
      parsed.unknown.push(arg);
      continue;
    }

    if (eq !== -1) {
      parsed.flags[key] = arg.slice(eq + 1);
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith('--')) {
      parsed.flags[key] = '';
      continue;
    }
    parsed.flags[key] = next;
    i++;
  }

  return parsed;
}

/**
 * Build the configuration from environment variables, overridden by CLI flags
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  argv: readonly string[] = [],
  platform: NodeJS.Platform = process.platform
): BridgeConfig {
  const { flags, unknown } = parseArgs(argv);
  for (const arg of unknown) {
    console.warn(`[Config] Ignoring unknown argument: ${arg}`);
  }

  const raw: Partial<Record<ConfigKey, string>> = {};
  for (const [key, envVar] of ENV_VARS) {
    const value = flags[key] ?? env[envVar];
    if (value !== undefined) {
      raw[key] = value;
    }
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const fields = result.error.issues.map((issue) => {
      const key = issue.path.join('.');
      const envVar = ENV_VARS.find(([name]) => name === key)?.[1] ?? key;
      return `${envVar}: ${issue.message}`;
    });
    throw new BridgeError(ErrorCode.CONFIG_INVALID, `Invalid configuration: ${fields.join('; ')}`, {
      fields,
    });
  }

  const { serialPort, ...rest } = result.data;
  return Object.freeze({
    ...rest,
    serialPort: serialPort ?? defaultSerialPort(platform),
  });
}
