import { existsSync, readFileSync } from 'node:fs';
import { homedir, hostname } from 'node:os';
import { join } from 'node:path';
import { parse } from 'smol-toml';
import { z } from 'zod';

/**
 * Daemon configuration.
 *
 * Precedence: defaults < TOML config file < environment variables.
 */
export interface RelayConfig {
  serverUrl: string;
  /** Empty disables forwarding. */
  apiToken: string;
  syncIntervalMinutes: number;
  syncBatchSize: number;
  /** Redact project, git remote and filename before forwarding. */
  metricsOnly: boolean;
  socketPath: string;
  dbPath: string;
  machine: string;
}

/** One day. Longer intervals would overflow the timer. */
export const MAX_SYNC_INTERVAL_MINUTES = 24 * 60;

const syncIntervalMinutes = z.number().int().positive().max(MAX_SYNC_INTERVAL_MINUTES);

/** Config file keys are snake_case. Unknown keys are ignored. */
export const configFileSchema = z.object({
  server_url: z.string().url().optional(),
  api_token: z.string().optional(),
  sync_interval_minutes: syncIntervalMinutes.optional(),
  sync_batch_size: z.number().int().positive().optional(),
  metrics_only: z.boolean().optional(),
  socket_path: z.string().min(1).optional(),
  db_path: z.string().min(1).optional(),
  machine: z.string().min(1).optional(),
});

export type ConfigFile = z.infer<typeof configFileSchema>;

const relayConfigSchema = z.object({
  serverUrl: z.string().url(),
  apiToken: z.string(),
  syncIntervalMinutes,
  syncBatchSize: z.number().int().positive(),
  metricsOnly: z.boolean(),
  socketPath: z.string().min(1),
  dbPath: z.string().min(1),
  machine: z.string().min(1),
});

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  /** Defaults to `os.hostname()`. */
  hostName?: string;
}

/**
 * Default configuration. Forwarding is disabled until a token is set.
 */
export function defaultConfig(homeDir: string, hostName: string): RelayConfig {
  const dataDir = join(homeDir, '.local', 'share', 'activity-relay');

  return {
    serverUrl: 'https://activity.example.com',
    apiToken: '',
    syncIntervalMinutes: 10,
    syncBatchSize: 100,
    metricsOnly: false,
    socketPath: join(dataDir, 'relay.sock'),
    dbPath: join(dataDir, 'activity.db'),
    machine: hostName,
  };
}

/** Candidate config files, most specific first. */
export function configPaths(env: NodeJS.ProcessEnv, homeDir: string): string[] {
  const paths: string[] = [];
  const explicit = env['ACTIVITY_RELAY_CONFIG'];
  if (explicit) paths.push(explicit);

  const xdg = env['XDG_CONFIG_HOME'];
  if (xdg) paths.push(join(xdg, 'activity-relay', 'config.toml'));

  paths.push(join(homeDir, '.config', 'activity-relay', 'config.toml'));
  return paths;
}

function readConfigFile(path: string): ConfigFile {
  let raw: unknown;
  try {
    raw = parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    throw new Error(`Failed to read config file ${path}`, { cause: err });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${path}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Loads configuration.
 *
 * Only the first existing config file is read. A file that exists but
 * cannot be parsed is an error, not a silent fallback to defaults.
 */
export function loadConfig(options: LoadConfigOptions = {}): RelayConfig {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? homedir();
  const config = defaultConfig(homeDir, options.hostName ?? hostname());

  const path = configPaths(env, homeDir).find((candidate) => existsSync(candidate));
  const file: ConfigFile = path ? readConfigFile(path) : {};

  const merged: RelayConfig = {
    serverUrl: env['ACTIVITY_RELAY_SERVER_URL'] ?? file.server_url ?? config.serverUrl,
    apiToken: env['ACTIVITY_RELAY_API_TOKEN'] ?? file.api_token ?? config.apiToken,
    syncIntervalMinutes: file.sync_interval_minutes ?? config.syncIntervalMinutes,
    syncBatchSize: file.sync_batch_size ?? config.syncBatchSize,
    metricsOnly: file.metrics_only ?? config.metricsOnly,
    socketPath: file.socket_path ?? config.socketPath,
    dbPath: env['ACTIVITY_RELAY_DB_PATH'] ?? file.db_path ?? config.dbPath,
    machine: env['ACTIVITY_RELAY_MACHINE'] ?? file.machine ?? config.machine,
  };

  const validated = relayConfigSchema.safeParse(merged);
  if (!validated.success) {
    const issues = validated.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return validated.data;
}
