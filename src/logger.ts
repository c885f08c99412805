// Logger implementation using LogTape, with a console-only SimpleLogger fallback

import { getFileSink } from '@logtape/file';
import {
  configureSync,
  disposeSync,
  getConsoleSink,
  getLogger,
  type Logger as CategoryLogger,
  type LogLevel as LogTapeLevel,
  type LogRecord,
  type Sink,
} from '@logtape/logtape';
import chalk from 'chalk';
import { createWriteStream, existsSync, mkdirSync, type WriteStream } from 'fs';
import { dirname } from 'path';
import type { LogLevel } from './types.js';

export interface Logger {
  info(message: string, metadata?: unknown): void;
  error(message: string, metadata?: unknown): void;
  warn(message: string, metadata?: unknown): void;
  debug(message: string, metadata?: unknown): void;
  success(message: string, metadata?: unknown): void;
  /** Write out buffered entries; call before the process exits. */
  flush?(): Promise<void>;
}

export const LOG_CATEGORY = ['rigger'] as const;

const LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOGTAPE_LEVELS: Record<LogLevel, LogTapeLevel> = {
  debug: 'debug',
  info: 'info',
  warn: 'warning',
  error: 'error',
};

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function levelLabel(level: LogTapeLevel): string {
  return level === 'warning' ? 'WARN' : level.toUpperCase();
}

function recordTarget(record: LogRecord): string {
  const target = record.properties.target;
  return typeof target === 'string' ? `[${target}] ` : '';
}

function colorFor(level: LogTapeLevel): (text: string) => string {
  switch (level) {
    case 'error':
    case 'fatal':
      return chalk.red;
    case 'warning':
      return chalk.yellow;
    case 'debug':
    case 'trace':
      return chalk.gray;
    default:
      return (text) => text;
  }
}

export function formatConsoleRecord(record: LogRecord): string {
  const time = new Date(record.timestamp).toLocaleTimeString('en-US', { hour12: false });
  const line = `🔧 [${time}] ${levelLabel(record.level)}: ${recordTarget(record)}${record.message.join('')}`;
  return colorFor(record.level)(line);
}

export function formatFileRecord(record: LogRecord): string {
  const timestamp = new Date(record.timestamp).toISOString();
  const level = levelLabel(record.level).padEnd(5);
  return `${timestamp} ${level}: ${recordTarget(record)}${record.message.join('')}\n`;
}

class LogTapeLogger implements Logger {
  private logger: CategoryLogger;
  private targetName?: string;

  constructor(logger: CategoryLogger, targetName?: string) {
    this.logger = logger;
    this.targetName = targetName;
  }

  private properties(message: string, metadata: unknown): Record<string, unknown> {
    return { message, target: this.targetName, metadata };
  }

  info(message: string, metadata?: unknown): void {
    this.logger.info('{message}', this.properties(message, metadata));
  }

  error(message: string, metadata?: unknown): void {
    this.logger.error('{message}', this.properties(message, metadata));
  }

  warn(message: string, metadata?: unknown): void {
    this.logger.warn('{message}', this.properties(message, metadata));
  }

  debug(message: string, metadata?: unknown): void {
    this.logger.debug('{message}', this.properties(message, metadata));
  }

  success(message: string, metadata?: unknown): void {
    this.logger.info('{message}', this.properties(`✅ ${message}`, metadata));
  }

  async flush(): Promise<void> {
    disposeSync();
  }
}

// Console output without LogTape; used when the log sinks cannot be set up
export class SimpleLogger implements Logger {
  private targetName?: string;
  private logLevel: LogLevel;
  private logStream?: WriteStream;

  constructor(targetName?: string, logLevel: LogLevel = 'info', logFile?: string) {
    this.targetName = targetName;
    this.logLevel = logLevel;

    if (logFile) {
      const dir = dirname(logFile);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      // One configuration pass = one log
      this.logStream = createWriteStream(logFile, { flags: 'w' });
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatMessage(level: LogLevel, message: string): string {
    const time = new Date().toLocaleTimeString('en-US', { hour12: false });
    const target = this.targetName ? ` [${this.targetName}]` : '';
    return `🔧 [${time}] ${level.toUpperCase()}:${target} ${message}`;
  }

  private writeToFile(level: LogLevel, message: string): void {
    if (this.logStream) {
      const timestamp = new Date().toISOString();
      const levelStr = level.toUpperCase().padEnd(5);
      const target = this.targetName ? `[${this.targetName}] ` : '';
      this.logStream.write(`${timestamp} ${levelStr}: ${target}${message}\n`);
    }
  }

  flush(): Promise<void> {
    const stream = this.logStream;
    if (!stream || stream.writableFinished) {
      return Promise.resolve();
    }
    return new Promise((resolve, reject) => {
      stream.once('error', reject);
      stream.end(() => resolve());
    });
  }

  info(message: string, metadata?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(this.formatMessage('info', message));
      if (metadata) console.log(metadata);
      this.writeToFile('info', message);
    }
  }

  error(message: string, metadata?: unknown): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(this.formatMessage('error', message)));
      if (metadata) console.error(metadata);
      this.writeToFile('error', message);
    }
  }

  warn(message: string, metadata?: unknown): void {
    if (this.shouldLog('warn')) {
      console.warn(chalk.yellow(this.formatMessage('warn', message)));
      if (metadata) console.warn(metadata);
      this.writeToFile('warn', message);
    }
  }

  debug(message: string, metadata?: unknown): void {
    if (this.shouldLog('debug')) {
      console.log(chalk.gray(this.formatMessage('debug', message)));
      if (metadata) console.log(metadata);
      this.writeToFile('debug', message);
    }
  }

  success(message: string, metadata?: unknown): void {
    if (this.shouldLog('info')) {
      console.log(chalk.green(this.formatMessage('info', `✅ ${message}`)));
      if (metadata) console.log(metadata);
      this.writeToFile('info', `✅ ${message}`);
    }
  }
}

export function createLogger(logFile?: string, logLevel?: LogLevel, targetName?: string): Logger {
  const level = logLevel ?? 'info';

  try {
    const sinks: Record<string, Sink> = {
      console: getConsoleSink({ formatter: formatConsoleRecord }),
    };

    if (logFile) {
      const dir = dirname(logFile);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
      sinks.file = getFileSink(logFile, { formatter: formatFileRecord });
    }

    configureSync({
      sinks,
      loggers: [
        {
          category: [...LOG_CATEGORY],
          lowestLevel: LOGTAPE_LEVELS[level],
          sinks: logFile ? ['console', 'file'] : ['console'],
        },
        { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
      ],
      reset: true,
    });

    return new LogTapeLogger(getLogger([...LOG_CATEGORY]), targetName);
  } catch (error) {
    const fallback = new SimpleLogger(targetName, level);
    fallback.warn(
      `File logging unavailable, using the console only: ${error instanceof Error ? error.message : String(error)}`
    );
    return fallback;
  }
}

// Prefixes every message with the action or project it concerns
export class TargetLogger implements Logger {
  private logger: Logger;
  private targetName?: string;

  constructor(logger: Logger, targetName?: string) {
    this.logger = logger;
    this.targetName = targetName;
  }

  private formatMessage(message: string): string {
    const target = this.targetName ? `[${this.targetName}] ` : '';
    return `${target}${message}`;
  }

  info(message: string, metadata?: unknown): void {
    this.logger.info(this.formatMessage(message), metadata);
  }

  error(message: string, metadata?: unknown): void {
    this.logger.error(this.formatMessage(message), metadata);
  }

  warn(message: string, metadata?: unknown): void {
    this.logger.warn(this.formatMessage(message), metadata);
  }

  debug(message: string, metadata?: unknown): void {
    this.logger.debug(this.formatMessage(message), metadata);
  }

  success(message: string, metadata?: unknown): void {
    this.logger.success(this.formatMessage(message), metadata);
  }

  async flush(): Promise<void> {
    await this.logger.flush?.();
  }
}

export function createTargetLogger(baseLogger: Logger, targetName: string): Logger {
  return new TargetLogger(baseLogger, targetName);
}
