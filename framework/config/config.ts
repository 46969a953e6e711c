/**
 * Configuration Management
 *
 * Loads and manages application configuration from defaults, a JSON file
 * and environment variables, in that order of precedence (last wins).
 */

import { readFile } from 'node:fs/promises';
import type { LogFormat, LogLevel } from '../telemetry/logger.ts';
import { isLogFormat, isLogLevel } from '../telemetry/logger.ts';

export interface ServerSettings {
  /** Largest accepted request head in bytes */
  maxHeaderSize: number;
  /** Largest accepted request body in bytes */
  maxBodySize: number;
  /** Milliseconds of socket inactivity before a connection is dropped */
  idleTimeout: number;
}

export interface ConfigOptions {
  port?: number;
  host?: string;
  env?: string;
  logLevel?: LogLevel;
  logFormat?: LogFormat;
  server?: Partial<ServerSettings>;
  static?: {
    prefix?: string;
    root?: string;
  };
  [key: string]: unknown;
}

export const DEFAULT_SERVER_SETTINGS: ServerSettings = {
  maxHeaderSize: 8 * 1024,
  maxBodySize: 1024 * 1024,
  idleTimeout: 30_000,
};

const DEFAULT_CONFIG: ConfigOptions = {
  port: 8080,
  host: '0.0.0.0',
  env: 'development',
  logLevel: 'info',
  logFormat: 'pretty',
  server: { ...DEFAULT_SERVER_SETTINGS },
};

const DEFAULT_CONFIG_PATHS = ['./config/app.json', './config.json'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Configuration manager
 */
export class Config {
  private config: Record<string, unknown>;

  constructor(options: ConfigOptions = {}) {
    this.config = mergeConfig(DEFAULT_CONFIG, options);
  }

  /**
   * Get a configuration value by dotted key
   */
  get<T>(key: string, defaultValue?: T): T {
    const value = getNestedValue(this.config, key);
    return (value ?? defaultValue) as T;
  }

  /**
   * Set a configuration value by dotted key
   */
  set(key: string, value: unknown): void {
    setNestedValue(this.config, key, value);
  }

  has(key: string): boolean {
    return getNestedValue(this.config, key) !== undefined;
  }

  /**
   * Deep-merge options over the current values; undefined values are skipped
   */
  merge(options: Record<string, unknown>): this {
    this.config = mergeConfig(this.config, options);
    return this;
  }

  /**
   * Get all configuration
   */
  all(): Record<string, unknown> {
    return mergeConfig({}, this.config);
  }

  /**
   * Server limits, falling back to defaults for missing or non-numeric values
   */
  serverSettings(): ServerSettings {
    return {
      maxHeaderSize: this.number('server.maxHeaderSize', DEFAULT_SERVER_SETTINGS.maxHeaderSize),
      maxBodySize: this.number('server.maxBodySize', DEFAULT_SERVER_SETTINGS.maxBodySize),
      idleTimeout: this.number('server.idleTimeout', DEFAULT_SERVER_SETTINGS.idleTimeout),
    };
  }

  private number(key: string, fallback: number): number {
    const value = getNestedValue(this.config, key);
    return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
  }
}

function mergeConfig(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;

    const current = base[key];
    if (isRecord(value)) {
      result[key] = mergeConfig(isRecord(current) ? current : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function getNestedValue(obj: Record<string, unknown>, path: string): unknown {
  return path.split('.').reduce<unknown>(
    (current, key) => (isRecord(current) ? current[key] : undefined),
    obj,
  );
}

function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop() ?? path;
  let current = obj;

  for (const part of parts) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[last] = value;
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value === '') return undefined;
  if (!/^\d+$/.test(value)) {
    throw new Error(`Invalid value for ${name}: ${JSON.stringify(value)}`);
  }
  return Number(value);
}

async function readConfigFile(path: string): Promise<Record<string, unknown>> {
  const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
  if (!isRecord(parsed)) {
    throw new Error(`Config file ${path} must contain a JSON object`);
  }
  return parsed;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Options read from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): ConfigOptions {
  const logLevel = env.LOG_LEVEL;
  const logFormat = env.LOG_FORMAT;

  return {
    port: parseInteger('PORT', env.PORT),
    host: env.HOST || undefined,
    env: env.NODE_ENV || undefined,
    logLevel: isLogLevel(logLevel) ? logLevel : undefined,
    logFormat: isLogFormat(logFormat) ? logFormat : undefined,
    server: {
      maxHeaderSize: parseInteger('MAX_HEADER_SIZE', env.MAX_HEADER_SIZE),
      maxBodySize: parseInteger('MAX_BODY_SIZE', env.MAX_BODY_SIZE),
      idleTimeout: parseInteger('IDLE_TIMEOUT', env.IDLE_TIMEOUT),
    },
  };
}

/**
 * Load configuration from a config file and the environment.
 *
 * An explicit path must exist; otherwise the default locations are tried
 * and skipped when absent.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Config> {
  let fileConfig: Record<string, unknown> = {};

  if (configPath) {
    fileConfig = await readConfigFile(configPath);
  } else {
    for (const path of DEFAULT_CONFIG_PATHS) {
      try {
        fileConfig = await readConfigFile(path);
        break;
      } catch (error) {
        if (isMissingFile(error)) continue;
        throw error;
      }
    }
  }

  return new Config().merge(fileConfig).merge(configFromEnv(env));
}
