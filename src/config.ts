import fs from 'node:fs';
import path from 'node:path';
import { ConfigFileSchema, ErrorCodes, type Config, type ConfigFile } from './types.js';

/**
 * Raised when config.json is missing, unreadable or fails validation
 */
export class ConfigError extends Error {
  readonly code = ErrorCodes.INVALID_CONFIG;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function getEnvOrDefault(key: string, defaultValue: string): string {
  return process.env[key] ?? defaultValue;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() === 'true' || value === '1';
}

function getEnvInt(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Validates the parsed contents of config.json
 */
export function parseConfigFile(raw: unknown): ConfigFile {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  // Calendar check: the regex accepts 2024-02-31
  const [year = NaN, month = NaN, day = NaN] = result.data.settings.start_date.split('-').map(Number);
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() + 1 !== month || date.getDate() !== day) {
    throw new ConfigError(
      `Invalid configuration: settings.start_date: ${result.data.settings.start_date} is not a calendar date`
    );
  }

  return result.data;
}

function readConfigFile(configPath: string): ConfigFile {
  let text: string;
  try {
    text = fs.readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigError(
      `Cannot read config file ${configPath}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseConfigFile(raw);
}

export function loadConfig(configPath = getEnvOrDefault('CONFIG_PATH', './config.json')): Config {
  const file = readConfigFile(path.resolve(configPath));

  return {
    accounts: file.accounts,
    settings: file.settings,

    portalBaseUrl: getEnvOrDefault('PORTAL_BASE_URL', 'https://www.rjmart.cn').replace(/\/+$/, ''),

    // Playwright settings
    playwrightHeadless: getEnvBool('PLAYWRIGHT_HEADLESS', true),
    playwrightTimeout: getEnvInt('PLAYWRIGHT_TIMEOUT_MS', 30000),

    // Download completion
    downloadTimeoutMs: getEnvInt('DOWNLOAD_TIMEOUT_MS', 30000),
    downloadPollIntervalMs: getEnvInt('DOWNLOAD_POLL_INTERVAL_MS', 1000),
    downloadStableChecks: getEnvInt('DOWNLOAD_STABLE_CHECKS', 0),

    // Pause after each export list deletion
    cleanupSettleMs: getEnvInt('CLEANUP_SETTLE_MS', 1000),
  };
}

// Singleton config instance
let configInstance: Config | null = null;

export function getConfig(): Config {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

// Allow resetting config (useful for testing)
export function resetConfig(): void {
  configInstance = null;
}
