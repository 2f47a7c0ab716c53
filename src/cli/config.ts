import { z } from 'zod';
import * as yaml from 'yaml';
import * as fs from 'node:fs';
import { ConfigError } from '../utils/errors.js';
import { ethereumAddressSchema, urlSchema } from '../utils/validation.js';

export const PYUSD_ADDRESS = '0x6c3ea9036406852006290770bedfcaba0e23a0e8';

const RpcConfigSchema = z.object({
  url: urlSchema,
});

const TokenConfigSchema = z.object({
  address: ethereumAddressSchema.default(PYUSD_ADDRESS),
  decimals: z.number().int().min(0).max(36).optional(),
  symbol: z.string().min(1).optional(),
}).default({});

// Signature overrides per event kind; the shape is checked against the fixed layouts later
const EventsConfigSchema = z.object({
  transfer: z.string().min(1).optional(),
  approval: z.string().min(1).optional(),
  mint: z.string().min(1).optional(),
  burn: z.string().min(1).optional(),
}).default({});

const FetchConfigSchema = z.object({
  page_size: z.number().int().positive().default(1000),
  min_page_size: z.number().int().positive().default(1),
  strategy: z.enum(['adaptive', 'fixed']).default('adaptive'),
  recent_blocks: z.number().int().positive().default(100),
}).refine(fetch => fetch.min_page_size <= fetch.page_size, {
  message: 'min_page_size must not exceed page_size',
  path: ['min_page_size'],
}).default({});

const CacheConfigSchema = z.object({
  ttl_ms: z.number().int().positive().default(60000),
  max_entries: z.number().int().positive().default(100),
}).default({});

const ConfigSchema = z.object({
  rpc: RpcConfigSchema,
  token: TokenConfigSchema,
  events: EventsConfigSchema,
  fetch: FetchConfigSchema,
  cache: CacheConfigSchema,
  labels: z.record(ethereumAddressSchema, z.string().min(1)).default({}),
  // Addresses `balance` reports on when none are given
  watchlist: z.array(ethereumAddressSchema).default([]),
});

export type Config = z.infer<typeof ConfigSchema>;
export type RpcConfig = z.infer<typeof RpcConfigSchema>;
export type TokenConfig = z.infer<typeof TokenConfigSchema>;
export type EventsConfig = z.infer<typeof EventsConfigSchema>;
export type FetchConfig = z.infer<typeof FetchConfigSchema>;
export type CacheConfig = z.infer<typeof CacheConfigSchema>;

/**
 * Interpolates environment variables in a string using ${VAR_NAME} syntax
 * @throws ConfigError if a referenced environment variable is not set
 */
function interpolateEnvVars(str: string): string {
  return str.replace(/\$\{(\w+)\}/g, (_, varName: string) => {
    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(
        `Environment variable ${varName} is not set. ` +
        `Please set it before running stablescope or remove it from the config.`
      );
    }
    return value;
  });
}

function interpolateObjectEnvVars(value: unknown): unknown {
  if (typeof value === 'string') {
    return interpolateEnvVars(value);
  } else if (Array.isArray(value)) {
    return value.map(interpolateObjectEnvVars);
  } else if (value !== null && typeof value === 'object') {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateObjectEnvVars(entry);
    }
    return result;
  }
  return value;
}

/**
 * Parses and validates config from YAML content
 * @throws ConfigError if parsing or validation fails
 */
export function parseConfig(yamlContent: string): Config {
  let parsed: unknown;

  try {
    parsed = yaml.parse(yamlContent);
  } catch (error) {
    throw new ConfigError(
      `Failed to parse YAML configuration: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  if (!parsed || typeof parsed !== 'object') {
    throw new ConfigError('Configuration file is empty or invalid');
  }

  parsed = interpolateObjectEnvVars(parsed);

  const result = ConfigSchema.safeParse(parsed);

  if (!result.success) {
    const issues = result.error.issues.map(issue => {
      const path = issue.path.join('.');
      return `  - ${path ? path + ': ' : ''}${issue.message}`;
    }).join('\n');

    throw new ConfigError(
      `Configuration validation failed:\n${issues}\n\n` +
      `Please check your config file and ensure all required fields are present and valid.`
    );
  }

  return result.data;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Loads and parses config from a file
 * @throws ConfigError if file cannot be read or config is invalid
 */
export function loadConfigFile(path: string): Config {
  let content: string;

  try {
    content = fs.readFileSync(path, 'utf-8');
  } catch (error) {
    const code = errorCode(error);
    if (code === 'ENOENT') {
      throw new ConfigError(
        `Configuration file not found at path: ${path}\n` +
        `Please ensure the file exists and the path is correct.`
      );
    } else if (code === 'EACCES') {
      throw new ConfigError(
        `Permission denied when reading configuration file: ${path}\n` +
        `Please check file permissions.`
      );
    }
    throw new ConfigError(
      `Failed to read configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  return parseConfig(content);
}
