/**
 * Application Configuration
 *
 * Persistent configuration lives in ~/.sobject-resolver/config.json.
 * Environment variables take precedence over the file, and the file over
 * the built-in defaults.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { z } from 'zod';
import { DEFAULTS } from './defaults.js';

export const AppConfigSchema = z.object({
  /** Log level (trace, debug, info, warn, error, fatal, silent) */
  logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
  /** OAuth token endpoint for the client-credentials flow */
  tokenUrl: z.string().url().optional(),
  /** Connected app consumer key */
  consumerKey: z.string().min(1).optional(),
  /** Connected app consumer secret */
  consumerSecret: z.string().min(1).optional(),
  /** Org alias or username authorised in the Salesforce CLI */
  targetOrg: z.string().min(1).optional(),
  /** Salesforce REST API version */
  apiVersion: z.string().regex(/^\d+\.\d$/),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

const DEFAULT_CONFIG: AppConfig = {
  logLevel: DEFAULTS.LOG_LEVEL,
  tokenUrl: undefined,
  consumerKey: undefined,
  consumerSecret: undefined,
  targetOrg: undefined,
  apiVersion: DEFAULTS.API_VERSION,
};

/**
 * Environment variables recognised for each config key
 */
export const CONFIG_ENV_VARS: Record<keyof AppConfig, string> = {
  logLevel: 'LOG_LEVEL',
  tokenUrl: 'SALESFORCE_TOKEN_URL',
  consumerKey: 'CONSUMER_KEY',
  consumerSecret: 'CONSUMER_SECRET',
  targetOrg: 'SF_TARGET_ORG',
  apiVersion: 'SF_API_VERSION',
};

/**
 * Get the path to the config directory
 */
export function getConfigDir(): string {
  return process.env.SOBJECT_RESOLVER_HOME || path.join(os.homedir(), '.sobject-resolver');
}

/**
 * Get the path to the config file
 */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

function readConfigFile(): Record<string, unknown> {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return {};
  }

  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    if (parsed && typeof parsed === 'object' && !Array.isArray(parsed)) {
      return { ...parsed };
    }
    console.warn(`Warning: ${configPath} does not hold a JSON object, using defaults`);
  } catch (error) {
    console.warn(`Warning: Could not parse config file, using defaults: ${error instanceof Error ? error.message : String(error)}`);
  }
  return {};
}

function isConfigKey(key: string): key is keyof AppConfig {
  return key in CONFIG_ENV_VARS;
}

function readEnvironment(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [key, envVar] of Object.entries(CONFIG_ENV_VARS)) {
    const value = env[envVar];
    if (value) {
      values[key] = value;
    }
  }
  return values;
}

/**
 * Load the configuration: defaults, then the config file, then the environment.
 * A key whose value is invalid falls back to its default with a warning,
 * since the logger itself depends on this function. Other keys are kept.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: Record<string, unknown> = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(),
    ...readEnvironment(env),
  };

  const result = AppConfigSchema.safeParse(merged);
  if (result.success) {
    return result.data;
  }

  for (const issue of result.error.issues) {
    const key = String(issue.path[0]);
    console.warn(`Warning: Invalid configuration value for ${key}, using default: ${issue.message}`);
    if (isConfigKey(key)) {
      merged[key] = DEFAULT_CONFIG[key];
    }
  }

  const retried = AppConfigSchema.safeParse(merged);
  return retried.success ? retried.data : { ...DEFAULT_CONFIG };
}

/**
 * Save configuration to disk, merged with what the file already holds
 */
export function saveConfig(config: Partial<AppConfig>): void {
  const configDir = getConfigDir();
  if (!fs.existsSync(configDir)) {
    fs.mkdirSync(configDir, { recursive: true });
  }

  const merged = AppConfigSchema.parse({ ...DEFAULT_CONFIG, ...readConfigFile(), ...config });
  fs.writeFileSync(getConfigPath(), JSON.stringify(merged, null, 2), 'utf-8');
}

