import { z } from 'zod';
import { LOG_LEVELS } from '../logger.js';

const TRUE_WORDS = new Set(['true', '1', 'yes', 'on']);
const FALSE_WORDS = new Set(['false', '0', 'no', 'off']);

/**
 * Boolean that also accepts the usual environment spellings (true/1/yes/on, false/0/no/off)
 */
export const EnvBooleanSchema = z.preprocess((value) => {
  if (typeof value !== 'string') return value;
  const word = value.trim().toLowerCase();
  if (TRUE_WORDS.has(word)) return true;
  if (FALSE_WORDS.has(word)) return false;
  return value;
}, z.boolean());

/**
 * Gateway connection settings
 */
export const ConnectionConfigSchema = z.object({
  host: z.string().trim().min(1, 'Host cannot be empty').default('127.0.0.1'),
  port: z.coerce.number().int().min(0).max(65535).default(7497),
  clientId: z.coerce.number().int().positive().default(1),
  /** Seconds */
  timeout: z.coerce.number().positive().default(4),
  readonly: EnvBooleanSchema.default(false),
  account: z.string().default(''),
});

/**
 * Bounded, fixed-delay retry policy
 */
export const RetryPolicySchema = z.object({
  maxRetries: z.coerce.number().int().min(0).default(3),
  /** Seconds */
  retryDelay: z.coerce.number().positive().default(1),
  autoReconnect: EnvBooleanSchema.default(false),
});

export const LogLevelSchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  z.enum(LOG_LEVELS)
);

export const LogConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  dir: z.string().min(1).optional(),
  file: EnvBooleanSchema.default(true),
  console: EnvBooleanSchema.default(true),
  telegramToken: z.string().min(1).optional(),
  telegramChatId: z.string().min(1).optional(),
  telegramLevels: z.array(LogLevelSchema).default(['error']),
});

export const DaemonConfigSchema = z.object({
  connection: ConnectionConfigSchema.default({}),
  retry: RetryPolicySchema.default({}),
  log: LogConfigSchema.default({}),
  handlerPaths: z.array(z.string().min(1)).default([]),
  eventBridge: EnvBooleanSchema.default(false),
});

export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type LogConfig = z.infer<typeof LogConfigSchema>;
export type DaemonConfig = z.infer<typeof DaemonConfigSchema>;
export type DaemonConfigInput = z.input<typeof DaemonConfigSchema>;
