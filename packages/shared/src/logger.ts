/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - File logging with daily rotation
 * - Console output for development
 * - Telegram alerts for critical errors
 * - Structured JSON logs
 * - Context injection (component, event, handler, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import TelegramBot from 'node-telegram-bot-api';
import * as path from 'path';
import * as fs from 'fs';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface LoggerConfig {
  /** Service name (daemon, handler script name, ...) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
  /** Drop every entry (tests) */
  silent?: boolean;
  /** Telegram bot token */
  telegramToken?: string;
  /** Telegram chat ID to send alerts to */
  telegramChatId?: string;
  /** Only alert on these levels */
  telegramLevels?: LogLevel[];
}

export type LogContext = Record<string, unknown>;

interface TelegramTarget {
  bot: TelegramBot;
  chatId: string;
}

/**
 * Logger class with structured logging
 */
export class Logger {
  private readonly logger: winston.Logger;
  private readonly service: string;
  private readonly telegram?: TelegramTarget;
  private readonly telegramLevels: Set<LogLevel>;

  constructor(config: LoggerConfig, parent?: { logger: winston.Logger; telegram?: TelegramTarget }) {
    this.service = config.service;
    this.telegramLevels = new Set(config.telegramLevels ?? ['error']);

    if (parent) {
      this.logger = parent.logger;
      this.telegram = parent.telegram;
      return;
    }

    if (config.telegramToken && config.telegramChatId) {
      this.telegram = {
        bot: new TelegramBot(config.telegramToken, { polling: false }),
        chatId: config.telegramChatId,
      };
    }

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      silent: config.silent ?? false,
      defaultMeta: { service: config.service },
      transports: createTransports(config),
    });
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  /**
   * Log with level and context
   */
  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context ?? {});

    if (this.telegram && this.telegramLevels.has(level)) {
      this.sendTelegramAlert(this.telegram, level, message, context).catch((error: unknown) => {
        // Alert failures go to the log only, never back to the caller
        this.logger.error('Failed to send Telegram alert', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }

  private async sendTelegramAlert(
    target: TelegramTarget,
    level: LogLevel,
    message: string,
    context?: LogContext
  ): Promise<void> {
    await target.bot.sendMessage(target.chatId, formatTelegramAlert(this.service, level, message, context), {
      parse_mode: 'HTML',
    });
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(
      { service: this.service, telegramLevels: [...this.telegramLevels] },
      { logger: this.logger.child(context), telegram: this.telegram }
    );
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.close();
      // Give it a moment to flush
      setTimeout(resolve, 100);
    });
  }
}

function createTransports(config: LoggerConfig): winston.transport[] {
  const transports: winston.transport[] = [];

  if (config.console !== false) {
    transports.push(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
          })
        ),
      })
    );
  }

  if (config.file !== false) {
    const logDir = config.logDir ?? path.join(process.cwd(), 'logs', config.service);
    fs.mkdirSync(logDir, { recursive: true });

    const fileFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    transports.push(
      new DailyRotateFile({
        filename: path.join(logDir, `${config.service}-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '14d',
        format: fileFormat,
      }),
      new DailyRotateFile({
        filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
        datePattern: 'YYYY-MM-DD',
        maxSize: '20m',
        maxFiles: '30d',
        level: 'error',
        format: fileFormat,
      })
    );
  }

  return transports;
}

const LEVEL_EMOJI: Record<LogLevel, string> = {
  error: '🔴',
  warn: '⚠️',
  info: 'ℹ️',
  debug: '🐛',
};

/**
 * Render an alert as Telegram HTML
 */
export function formatTelegramAlert(
  service: string,
  level: LogLevel,
  message: string,
  context?: LogContext,
  timestamp: string = new Date().toISOString()
): string {
  let text = `${LEVEL_EMOJI[level]} <b>${level.toUpperCase()}: ${escapeHtml(service)}</b>\n\n`;
  text += `<b>Message:</b>\n<code>${escapeHtml(message)}</code>\n\n`;

  if (context && Object.keys(context).length > 0) {
    text += `<b>Context:</b>\n<code>${escapeHtml(JSON.stringify(context, null, 2))}</code>\n\n`;
  }

  return `${text}🕐 ${timestamp}`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Logger that writes nothing, for tests and library defaults
 */
export function createSilentLogger(service = 'test'): Logger {
  return new Logger({ service, console: false, file: false, silent: true });
}
