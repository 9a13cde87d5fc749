/**
 * Daemon configuration from environment variables
 */

import { delimiter } from 'path';
import { ZodError } from 'zod';
import { DaemonConfigSchema, type DaemonConfig } from './schemas/config.schema.js';

export type Env = Record<string, string | undefined>;

/**
 * Environment variable for each config field
 */
export const ENV_KEYS = {
  host: 'BROKER_HOST',
  port: 'BROKER_PORT',
  clientId: 'BROKER_CLIENT_ID',
  timeout: 'BROKER_TIMEOUT',
  readonly: 'BROKER_READONLY',
  account: 'BROKER_ACCOUNT',
  maxRetries: 'BROKER_HANDLER_MAX_RETRIES',
  retryDelay: 'BROKER_HANDLER_RETRY_DELAY',
  autoReconnect: 'BROKER_HANDLER_AUTO_RECONNECT',
  handlerPaths: 'BROKER_DAEMON_HANDLERS',
  eventBridge: 'BROKER_EVENT_BRIDGE',
  logLevel: 'BROKER_LOG_LEVEL',
  logDir: 'BROKER_LOG_DIR',
  logFile: 'BROKER_LOG_FILE',
  logConsole: 'BROKER_LOG_CONSOLE',
  telegramToken: 'TELEGRAM_BOT_TOKEN',
  telegramChatId: 'TELEGRAM_CHAT_ID',
  telegramLevels: 'TELEGRAM_ALERT_LEVELS',
} as const;

/**
 * Raised when the environment does not describe a valid configuration
 */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[], options?: { cause?: unknown }) {
    super(`Invalid configuration: ${issues.join('; ')}`, options);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Split a path-list variable on the platform delimiter, dropping blanks
 */
export function splitPathList(raw: string | undefined, separator: string = delimiter): string[] {
  if (!raw) return [];
  return raw
    .split(separator)
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

function splitList(raw: string | undefined): string[] | undefined {
  if (!raw) return undefined;
  return raw
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Validate a raw (possibly partial, possibly string-valued) configuration, filling defaults
 *
 * @throws {ConfigError} When any field is invalid
 */
export function parseConfig(input: unknown): DaemonConfig {
  try {
    return DaemonConfigSchema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigError(
        error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
        { cause: error }
      );
    }
    throw error;
  }
}

/**
 * Load configuration from environment
 *
 * Empty variables count as unset.
 *
 * @throws {ConfigError} When any variable is invalid
 */
export function loadConfig(env: Env = process.env): DaemonConfig {
  const read = (key: string): string | undefined => {
    const value = env[key];
    return value === undefined || value === '' ? undefined : value;
  };

  return parseConfig({
    connection: {
      host: read(ENV_KEYS.host),
      port: read(ENV_KEYS.port),
      clientId: read(ENV_KEYS.clientId),
      timeout: read(ENV_KEYS.timeout),
      readonly: read(ENV_KEYS.readonly),
      account: read(ENV_KEYS.account),
    },
    retry: {
      maxRetries: read(ENV_KEYS.maxRetries),
      retryDelay: read(ENV_KEYS.retryDelay),
      autoReconnect: read(ENV_KEYS.autoReconnect),
    },
    log: {
      level: read(ENV_KEYS.logLevel),
      dir: read(ENV_KEYS.logDir),
      file: read(ENV_KEYS.logFile),
      console: read(ENV_KEYS.logConsole),
      telegramToken: read(ENV_KEYS.telegramToken),
      telegramChatId: read(ENV_KEYS.telegramChatId),
      telegramLevels: splitList(read(ENV_KEYS.telegramLevels)),
    },
    handlerPaths: splitPathList(read(ENV_KEYS.handlerPaths)),
    eventBridge: read(ENV_KEYS.eventBridge),
  });
}

/**
 * Environment variables that reproduce a configuration through loadConfig()
 */
export function exportEnv(config: DaemonConfig): Record<string, string> {
  const env: Record<string, string> = {
    [ENV_KEYS.host]: config.connection.host,
    [ENV_KEYS.port]: String(config.connection.port),
    [ENV_KEYS.clientId]: String(config.connection.clientId),
    [ENV_KEYS.timeout]: String(config.connection.timeout),
    [ENV_KEYS.readonly]: String(config.connection.readonly),
    [ENV_KEYS.account]: config.connection.account,
    [ENV_KEYS.maxRetries]: String(config.retry.maxRetries),
    [ENV_KEYS.retryDelay]: String(config.retry.retryDelay),
    [ENV_KEYS.autoReconnect]: String(config.retry.autoReconnect),
    [ENV_KEYS.handlerPaths]: config.handlerPaths.join(delimiter),
    [ENV_KEYS.eventBridge]: String(config.eventBridge),
    [ENV_KEYS.logLevel]: config.log.level,
    [ENV_KEYS.logFile]: String(config.log.file),
    [ENV_KEYS.logConsole]: String(config.log.console),
    [ENV_KEYS.telegramLevels]: config.log.telegramLevels.join(','),
  };

  // Secrets and unset optionals are not exported
  if (config.log.dir) {
    env[ENV_KEYS.logDir] = config.log.dir;
  }

  return env;
}
