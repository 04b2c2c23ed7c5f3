/**
 * Configuration Management
 *
 * Loads the optional JSON config file, layers environment variables on top
 * and validates the result.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { Logger } from './logger.js';

export const DEFAULT_MASTER_KEY = 'sk-1234';
export const DEFAULT_AZURE_API_VERSION = '2024-02-15-preview';

/**
 * Direct OpenAI backend
 */
const OpenAIProviderSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  organization: z.string().optional(),
  models: z.array(z.string().min(1)).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

/**
 * Azure OpenAI backend. Exactly one credential source is used, in order:
 * identity chain, static AD token, API key.
 */
const AzureProviderSchema = z.object({
  endpoint: z.string().url(),
  deployment: z.string().min(1).optional(),
  apiVersion: z.string().default(DEFAULT_AZURE_API_VERSION),
  apiKey: z.string().min(1).optional(),
  adToken: z.string().min(1).optional(),
  useIdentity: z.boolean().default(false),
  models: z.array(z.string().min(1)).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

/**
 * Model-name rules used by the router. The order in which they are applied
 * is fixed; only the prefixes and markers are configurable.
 */
const RoutingSchema = z.object({
  directPrefixes: z.array(z.string().min(1)).default(['gpt-']),
  gatewayPrefixes: z.array(z.string().min(1)).default(['azure-']),
  familyMarkers: z.array(z.string().min(1)).default(['gpt']),
});

/**
 * Full config schema
 */
const ConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.number().int().min(0).max(65535).default(4000),
  masterKey: z.string().min(1).default(DEFAULT_MASTER_KEY),
  verbose: z.boolean().default(false),
  streamBufferSize: z.number().int().positive().default(2),
  openai: OpenAIProviderSchema.optional(),
  azure: AzureProviderSchema.optional(),
  routing: RoutingSchema.default({}),
});

export type OpenAIProviderConfig = z.infer<typeof OpenAIProviderSchema>;
export type AzureProviderConfig = z.infer<typeof AzureProviderSchema>;
export type RoutingConfig = z.infer<typeof RoutingSchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface LoadConfigOptions {
  /** JSON config file; falls back to `PROXY_CONFIG`, then to no file. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the config file path, if any.
 */
export function getConfigPath(opts: LoadConfigOptions = {}): string | null {
  const env = opts.env ?? process.env;
  const candidate = opts.configPath ?? env['PROXY_CONFIG'];
  if (!candidate || !candidate.trim()) return null;
  return path.resolve(candidate);
}

/**
 * Load and validate config
 */
export function loadConfig(opts: LoadConfigOptions = {}): Config {
  const env = opts.env ?? process.env;
  const configPath = getConfigPath(opts);
  const fromFile = configPath ? readConfigFile(configPath) : {};
  const merged = pruneIncompleteProviders(deepMerge(fromFile, configFromEnv(env)));
  return parseConfig(merged);
}

/**
 * Validate an in-memory config (tests and embedding callers).
 */
export function parseConfig(raw: unknown): Config {
  try {
    return ConfigSchema.parse(raw);
  } catch (err) {
    if (err instanceof z.ZodError) {
      const issues = err.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigError(`Invalid config: ${issues.join('; ')}`);
    }
    throw err;
  }
}

function readConfigFile(configPath: string): Record<string, unknown> {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Failed to read config ${configPath}: ${reason}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof SyntaxError ? err.message : String(err);
    throw new ConfigError(`Config JSON parse error in ${configPath}: ${reason}`);
  }

  if (!isPlainObject(parsed)) {
    throw new ConfigError(`Config ${configPath} must contain a JSON object`);
  }
  return parsed;
}

/**
 * Map environment variables onto the config shape. Only variables that are
 * set produce keys, so file values survive the merge.
 */
function configFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  setIfPresent(result, 'host', env['HOST']);
  if (env['PORT']) result['port'] = Number(env['PORT']);
  setIfPresent(result, 'masterKey', env['MASTER_KEY']);
  if (env['PROXY_VERBOSE']) result['verbose'] = parseBoolean(env['PROXY_VERBOSE']);

  const openai: Record<string, unknown> = {};
  setIfPresent(openai, 'apiKey', env['OPENAI_API_KEY']);
  setIfPresent(openai, 'baseUrl', env['OPENAI_BASE_URL']);
  setIfPresent(openai, 'organization', env['OPENAI_ORGANIZATION']);
  if (Object.keys(openai).length > 0) result['openai'] = openai;

  const azure: Record<string, unknown> = {};
  setIfPresent(azure, 'endpoint', env['AZURE_ENDPOINT']);
  setIfPresent(azure, 'deployment', env['AZURE_DEPLOYMENT']);
  setIfPresent(azure, 'apiVersion', env['AZURE_API_VERSION']);
  setIfPresent(azure, 'apiKey', env['AZURE_OPENAI_API_KEY']);
  setIfPresent(azure, 'adToken', env['AZURE_AD_TOKEN']);
  if (parseBoolean(env['USE_AZURE_IDENTITY'])) azure['useIdentity'] = true;
  if (Object.keys(azure).length > 0) result['azure'] = azure;

  return result;
}

/**
 * A provider section only counts when it can actually authenticate:
 * OpenAI needs a key, Azure needs an endpoint plus one credential source.
 */
function pruneIncompleteProviders(raw: Record<string, unknown>): Record<string, unknown> {
  const result = { ...raw };

  const openai = result['openai'];
  if (isPlainObject(openai) && !openai['apiKey']) {
    delete result['openai'];
  }

  const azure = result['azure'];
  if (isPlainObject(azure)) {
    const hasCredential = Boolean(azure['apiKey'] || azure['adToken'] || azure['useIdentity'] === true);
    if (!azure['endpoint'] || !hasCredential) {
      delete result['azure'];
    }
  }

  return result;
}

/**
 * Report the configured providers at startup.
 * Returns false when no provider is available.
 */
export function checkEnvironment(config: Config, logger: Logger, env: NodeJS.ProcessEnv = process.env): boolean {
  if (!config.openai && !config.azure) {
    logger.error('No AI providers configured. Please set either:');
    logger.error('  - OPENAI_API_KEY for OpenAI');
    logger.error('  - AZURE_ENDPOINT + AZURE_OPENAI_API_KEY for Azure OpenAI');
    logger.error('  - AZURE_ENDPOINT + USE_AZURE_IDENTITY=true for Azure Managed Identity');
    return false;
  }

  if (config.openai) {
    logger.info('OpenAI provider configured');
  }

  if (config.azure) {
    if (config.azure.useIdentity) {
      logger.info('Azure OpenAI provider configured (using Azure Identity)');
    } else if (config.azure.adToken) {
      logger.info('Azure OpenAI provider configured (using AD token)');
    } else {
      logger.info('Azure OpenAI provider configured (using API key)');
    }
  }

  if (env['AZURE_OPENAI_API_KEY'] && !config.azure?.endpoint) {
    logger.warn('AZURE_OPENAI_API_KEY set but AZURE_ENDPOINT missing');
  }

  if (config.masterKey === DEFAULT_MASTER_KEY) {
    logger.warn('Using default master key. Set MASTER_KEY for production.');
  }

  return true;
}

function setIfPresent(target: Record<string, unknown>, key: string, value: string | undefined): void {
  if (value !== undefined && value !== '') target[key] = value;
}

function parseBoolean(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes', 'on'].includes(value.trim().toLowerCase());
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(base: Record<string, unknown>, patch: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    const current = result[key];
    if (isPlainObject(value) && isPlainObject(current)) {
      result[key] = deepMerge(current, value);
    } else {
      result[key] = value;
    }
  }
  return result;
}
