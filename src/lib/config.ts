/**
 * Config loader for the WebSocket bridge
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import * as yaml from 'yaml';
import { z } from 'zod';

export const DEFAULT_CONFIG_FILE = path.join(os.homedir(), '.config', 'ws-bridge', 'config.yaml');
export const CONFIG_ENV_VAR = 'WS_BRIDGE_CONFIG';

const WS_URL_PATTERN = /^wss?:\/\//i;

const BackoffConfigSchema = z
  .object({
    base_ms: z.number().int().min(1).default(500),
    max_ms: z.number().int().min(1).default(30_000),
    jitter: z.number().min(0).max(1).default(0.2),
  })
  .refine((b) => b.max_ms >= b.base_ms, { message: 'max_ms must be >= base_ms', path: ['max_ms'] });

const ConnectionConfigSchema = z.object({
  queue_capacity: z.number().int().min(1).default(100),
  pending_ttl_ms: z.number().int().min(0).default(0),
  close_timeout_ms: z.number().int().min(0).default(1000),
  backoff: BackoffConfigSchema.default({}),
});

const LoggingConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
  file: z.string().nullable().default(null),
  stream: z.enum(['stderr', 'none']).default('stderr'),
});

const ConfigSchema = z.object({
  schema_version: z.string().default('1.0'),
  destinations: z
    .record(z.string(), z.string().regex(WS_URL_PATTERN, 'must be a ws:// or wss:// URL'))
    .default({}),
  connection: ConnectionConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type BridgeConfig = z.infer<typeof ConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type BackoffConfig = z.infer<typeof BackoffConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: 'NOT_FOUND' | 'PARSE_ERROR' | 'VALIDATION_ERROR'
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Expand ~ to home directory in paths
 */
export function expandPath(p: string): string {
  if (p.startsWith('~/')) {
    return path.join(os.homedir(), p.slice(2));
  }
  return p;
}

/**
 * Config used when no file is present or it fails to load
 */
export function defaultConfig(): BridgeConfig {
  return ConfigSchema.parse({});
}

/**
 * Pick the config file: first CLI argument (the manifest passes `@config.yaml`),
 * then WS_BRIDGE_CONFIG, then ~/.config/ws-bridge/config.yaml
 */
export function resolveConfigPath(
  argv: readonly string[] = process.argv.slice(2),
  env: NodeJS.ProcessEnv = process.env
): string {
  const arg = argv.find((a) => a.trim().length > 0);
  if (arg) {
    const trimmed = arg.trim();
    return expandPath(trimmed.startsWith('@') ? trimmed.slice(1) : trimmed);
  }
  const fromEnv = env[CONFIG_ENV_VAR]?.trim();
  if (fromEnv) {
    return expandPath(fromEnv);
  }
  return DEFAULT_CONFIG_FILE;
}

/**
 * Load bridge config from a YAML file
 */
export async function loadConfig(configFile: string = DEFAULT_CONFIG_FILE): Promise<BridgeConfig> {
  try {
    const content = await fs.readFile(configFile, 'utf-8');
    // An empty file parses to null; treat it as all defaults
    const parsed: unknown = yaml.parse(content) ?? {};
    const validated = ConfigSchema.parse(parsed);

    if (validated.logging.file) {
      validated.logging.file = expandPath(validated.logging.file);
    }

    return validated;
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigError(`Config file not found at ${configFile}. Using defaults.`, 'NOT_FOUND');
    }
    if (error instanceof yaml.YAMLParseError) {
      throw new ConfigError(`Invalid YAML in config: ${error.message}`, 'PARSE_ERROR');
    }
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
      throw new ConfigError(`Config validation failed: ${issues}`, 'VALIDATION_ERROR');
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
