import { z } from 'zod';
import 'dotenv/config';
import * as fs from 'node:fs';
import * as path from 'node:path';
import { ConfigError } from './errors.js';
import { LOG_LEVELS } from './logger.js';

export const DEFAULT_CONFIG_FILE = 'netcheck.config.json';

/** Largest whole-second delay a Node timer accepts (2^31 - 1 ms). */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

const networkSchema = z.object({
  pingCount: z.number().int().positive().default(1),
  timeoutSeconds: z.number().int().positive().max(MAX_TIMEOUT_SECONDS).default(5),
  dnsServers: z
    .array(z.string().trim().min(1))
    .min(1)
    .default(['google.com', '8.8.8.8'])
    .transform(servers => [...new Set(servers)]),
});

const configSchema = z.object({
  network: networkSchema.default({}),
  logging: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
    file: z.string().min(1).optional(),
    maxBytes: z.number().int().positive().default(1_048_576),
    backupCount: z.number().int().nonnegative().default(3),
  }).default({}),
  metrics: z.object({
    enabled: z.boolean().default(false),
    namespace: z.string().min(1).default('NetCheck'),
  }).default({}),
});

// The file is validated as plain sections here and as a whole after the merge.
const fileSchema = z.object({
  network: z.record(z.unknown()).default({}),
  logging: z.record(z.unknown()).default({}),
  metrics: z.record(z.unknown()).default({}),
});

export type Config = z.infer<typeof configSchema>;
type RawSections = z.infer<typeof fileSchema>;

export interface LoadConfigOptions {
  /** Explicit config file; a missing explicit file is an error. */
  configPath?: string;
  env?: Record<string, string | undefined>;
  /** Highest precedence, e.g. command-line flags. Undefined values are ignored. */
  overrides?: Partial<Record<keyof RawSections, Record<string, unknown>>>;
}

function toNumber(value: string | undefined): number | undefined {
  return value ? Number(value) : undefined;
}

function toList(value: string | undefined): string[] | undefined {
  if (!value) return undefined;
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function toBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return value === 'true' || value === '1';
}

function compact(section: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(section).filter(([, v]) => v !== undefined));
}

function buildEnvMap(env: Record<string, string | undefined>): RawSections {
  return {
    network: compact({
      pingCount: toNumber(env.NETCHECK_PING_COUNT),
      timeoutSeconds: toNumber(env.NETCHECK_TIMEOUT_SECONDS),
      dnsServers: toList(env.NETCHECK_DNS_SERVERS),
    }),
    logging: compact({
      level: env.LOG_LEVEL || undefined,
      file: env.LOG_FILE || undefined,
      maxBytes: toNumber(env.LOG_MAX_BYTES),
      backupCount: toNumber(env.LOG_BACKUP_COUNT),
    }),
    metrics: compact({
      enabled: toBoolean(env.METRICS_ENABLED),
      namespace: env.METRICS_NAMESPACE || undefined,
    }),
  };
}

export function resolveConfigPath(
  configPath: string | undefined,
  env: Record<string, string | undefined>,
): { path: string; explicit: boolean } {
  const chosen = configPath ?? (env.NETCHECK_CONFIG || undefined);
  return chosen
    ? { path: path.resolve(chosen), explicit: true }
    : { path: path.resolve(DEFAULT_CONFIG_FILE), explicit: false };
}

function readConfigFile(filePath: string, explicit: boolean): RawSections {
  if (!fs.existsSync(filePath)) {
    if (explicit) {
      throw new ConfigError(`Config file not found: ${filePath}`, { context: { path: filePath } });
    }
    return { network: {}, logging: {}, metrics: {} };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (err) {
    throw new ConfigError(`Could not read config file ${filePath}`, {
      context: { path: filePath },
      cause: err instanceof Error ? err : new Error(String(err)),
    });
  }

  const parsed = fileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Config file ${filePath} has an invalid layout`, {
      context: { path: filePath },
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/** Defaults, then the JSON file, then the environment, then `overrides`. */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const env = options.env ?? process.env;
  const { path: filePath, explicit } = resolveConfigPath(options.configPath, env);
  const fromFile = readConfigFile(filePath, explicit);
  const fromEnv = buildEnvMap(env);
  const overrides = options.overrides ?? {};

  const raw = {
    network: { ...fromFile.network, ...fromEnv.network, ...compact(overrides.network ?? {}) },
    logging: { ...fromFile.logging, ...fromEnv.logging, ...compact(overrides.logging ?? {}) },
    metrics: { ...fromFile.metrics, ...fromEnv.metrics, ...compact(overrides.metrics ?? {}) },
  };

  try {
    return configSchema.parse(raw);
  } catch (err) {
    throw new ConfigError('Invalid configuration', {
      context: { path: filePath },
      cause: err instanceof Error ? err : new Error(String(err)),
    });
  }
}

export function defaultConfig(): Config {
  return configSchema.parse({});
}

export function saveConfig(filePath: string, config: Config): void {
  try {
    fs.writeFileSync(filePath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Could not write config file ${filePath}`, {
      operation: 'save',
      context: { path: filePath },
      cause: err instanceof Error ? err : new Error(String(err)),
    });
  }
}
