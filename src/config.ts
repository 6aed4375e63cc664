/**
 * Configuration loader
 */

import { promises as fs } from 'fs';
import path from 'path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import { z } from 'zod';
import type { Config } from './types.js';
import { generateRandomId } from './vault/encryption.js';
import { createLogger, isLogLevel } from './logger.js';

const log = createLogger('config');

const DEFAULT_CONFIG_PATH = '/app/config/config.yml';
const GENERATED_CONFIG_PATH = './config.yml';

// YAML uses snake_case; every key is optional and falls back to a default
const ConfigFileSchema = z.object({
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.number().int().default(8080),
    cors_origin: z.string().default('*'),
  }).default({}),
  storage: z.object({
    targets_path: z.string().default('./data/targets.json'),
    audit_path: z.string().default('./data/audit.log'),
  }).default({}),
  security: z.object({
    server_secret: z.string().default(''),
  }).default({}),
  ssh: z.object({
    ready_timeout_ms: z.number().int().positive().default(30_000),
    keepalive_interval_ms: z.number().int().nonnegative().default(15_000),
  }).default({}),
  bridge: z.object({
    auth_timeout_ms: z.number().int().positive().default(30_000),
    host_key_timeout_ms: z.number().int().positive().default(60_000),
    close_grace_ms: z.number().int().nonnegative().default(100),
    output_chunk_size: z.number().int().default(4096),
    initial_rows: z.number().int().positive().default(24),
    initial_cols: z.number().int().positive().default(80),
  }).default({}),
  auth: z.object({
    tokens: z.array(z.object({
      token: z.string().min(1),
      owner: z.string().min(1),
    })).default([]),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
});

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export function parseConfig(input: unknown): Config {
  const file: ConfigFile = ConfigFileSchema.parse(input ?? {});
  return {
    server: {
      host: file.server.host,
      port: file.server.port,
      corsOrigin: file.server.cors_origin,
    },
    storage: {
      targetsPath: file.storage.targets_path,
      auditPath: file.storage.audit_path,
    },
    security: {
      serverSecret: file.security.server_secret,
    },
    ssh: {
      readyTimeoutMs: file.ssh.ready_timeout_ms,
      keepaliveIntervalMs: file.ssh.keepalive_interval_ms,
    },
    bridge: {
      authTimeoutMs: file.bridge.auth_timeout_ms,
      hostKeyTimeoutMs: file.bridge.host_key_timeout_ms,
      closeGraceMs: file.bridge.close_grace_ms,
      outputChunkSize: file.bridge.output_chunk_size,
      initialRows: file.bridge.initial_rows,
      initialCols: file.bridge.initial_cols,
    },
    auth: {
      tokens: file.auth.tokens,
    },
    logging: {
      level: file.logging.level,
    },
  };
}

function defaultConfigYaml(): string {
  return stringifyYaml({
    server: { host: '0.0.0.0', port: 8080, cors_origin: '*' },
    storage: { targets_path: './data/targets.json', audit_path: './data/audit.log' },
    security: { server_secret: generateRandomId(32) },
    auth: { tokens: [] },
    logging: { level: 'info' },
  });
}

async function readConfigFile(p: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(p, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
  return parseYaml(content);
}

export async function loadConfig(configPath?: string): Promise<Config> {
  const searchPaths = [
    configPath,
    DEFAULT_CONFIG_PATH,
    './config.yml',
    './config.yaml',
    path.join(process.env.HOME || '', '.ssh-bridge/config.yml'),
  ].filter((p): p is string => Boolean(p));

  for (const p of searchPaths) {
    const parsed = await readConfigFile(p);
    if (parsed !== undefined) {
      log.info(`Loaded config from ${p}`);
      return applyEnvOverrides(parseConfig(parsed));
    }
  }

  // No config file found: write one with a fresh server secret
  const content = defaultConfigYaml();
  try {
    await fs.writeFile(GENERATED_CONFIG_PATH, content, { encoding: 'utf-8', mode: 0o600 });
    log.warn(`No config found. Created default config at ${GENERATED_CONFIG_PATH}`);
  } catch (error) {
    log.warn(`No config found and ${GENERATED_CONFIG_PATH} is not writable; using defaults in memory:`, error);
  }
  return applyEnvOverrides(parseConfig(parseYaml(content)));
}

/**
 * Apply environment variable overrides.
 * Supports: SSH_BRIDGE_PORT, PORT, SSH_BRIDGE_SERVER_SECRET,
 * SSH_BRIDGE_TARGETS_PATH, SSH_BRIDGE_LOG_LEVEL
 */
export function applyEnvOverrides(config: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const port = env.SSH_BRIDGE_PORT || env.PORT;
  const secret = env.SSH_BRIDGE_SERVER_SECRET;
  const targetsPath = env.SSH_BRIDGE_TARGETS_PATH;
  const level = env.SSH_BRIDGE_LOG_LEVEL;

  if (port) {
    config.server.port = parseInt(port, 10);
  }

  if (secret) {
    config.security.serverSecret = secret;
  }

  if (targetsPath) {
    config.storage.targetsPath = targetsPath;
  }

  if (level && isLogLevel(level)) {
    config.logging.level = level;
  }

  return config;
}

export function validateConfig(config: Config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!config.security.serverSecret) {
    errors.push('security.server_secret is required');
  } else if (config.security.serverSecret.length < 32) {
    errors.push('security.server_secret must be at least 32 characters');
  }

  if (!Number.isInteger(config.server.port) || config.server.port < 1 || config.server.port > 65535) {
    errors.push('server.port must be between 1 and 65535');
  }

  if (config.bridge.outputChunkSize <= 0) {
    errors.push('bridge.output_chunk_size must be positive');
  }

  if (!config.storage.targetsPath) {
    errors.push('storage.targets_path is required');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
