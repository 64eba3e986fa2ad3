import { z } from 'zod';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const USAGE = 'Usage: tsx src/main.ts [--bind-addr HOST:PORT] [--max-rows N]';

const ENV_KEYS = [
  'SIDECAR_BIND_ADDR',
  'SIDECAR_MAX_ROWS',
  'SIDECAR_SCAN_BATCH_SIZE',
  'DATABASE_URL',
  'LOG_LEVEL',
] as const;

const envSchema = z.object({
  SIDECAR_BIND_ADDR: z.string().default('localhost:1331'),
  SIDECAR_MAX_ROWS: z.coerce.number().int().min(0).default(0),
  SIDECAR_SCAN_BATCH_SIZE: z.coerce.number().int().min(1).max(10_000).default(100),
  DATABASE_URL: z.string({ required_error: 'DATABASE_URL is required' }),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export type SidecarSettings = {
  bindAddr: string;
  /** 0 means unbounded. */
  maxRows: number;
  scanBatchSize: number;
  databaseUrl: string;
  logLevel: LogLevel;
};

export type CliArgs = {
  bindAddr?: string;
  maxRows?: number;
  help: boolean;
};

export type BindAddress = {
  host: string;
  port: number;
};

// Blank values count as unset, like a missing variable.
function presentEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of ENV_KEYS) {
    const value = (env[key] ?? '').trim();
    if (value) out[key] = value;
  }
  return out;
}

function parseMaxRows(value: string): number {
  const n = Number(value);
  if (!value.trim() || !Number.isInteger(n) || n < 0) {
    throw new Error(`Invalid --max-rows: ${value}`);
  }
  return n;
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false };

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i] ?? '';
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const flag = eq > 0 ? raw.slice(0, eq) : raw;
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) throw new Error(`Missing value for ${flag}`);
      i++;
      return next;
    };

    if (flag === '--help' || flag === '-h') args.help = true;
    else if (flag === '--bind-addr') args.bindAddr = value();
    else if (flag === '--max-rows') args.maxRows = parseMaxRows(value());
    else throw new Error(`Unknown argument: ${raw}`);
  }

  return args;
}

/** Splits `host:port`. An empty host (`:1331`) binds every interface. */
export function parseBindAddr(addr: string): BindAddress {
  const idx = addr.lastIndexOf(':');
  const portText = idx >= 0 ? addr.slice(idx + 1) : '';
  const port = Number(portText);
  if (!/^\d{1,5}$/.test(portText) || port > 65_535) {
    throw new Error(`Invalid bind address: ${addr}`);
  }

  let host = addr.slice(0, idx);
  if (host.startsWith('[') && host.endsWith(']')) host = host.slice(1, -1);
  return { host: host || '0.0.0.0', port };
}

export function loadConfig(env: NodeJS.ProcessEnv, cli: CliArgs = { help: false }): SidecarSettings {
  const parsed = envSchema.safeParse(presentEnv(env));
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }

  const settings: SidecarSettings = {
    bindAddr: cli.bindAddr ?? parsed.data.SIDECAR_BIND_ADDR,
    maxRows: cli.maxRows ?? parsed.data.SIDECAR_MAX_ROWS,
    scanBatchSize: parsed.data.SIDECAR_SCAN_BATCH_SIZE,
    databaseUrl: parsed.data.DATABASE_URL,
    logLevel: parsed.data.LOG_LEVEL,
  };

  parseBindAddr(settings.bindAddr);
  return settings;
}
