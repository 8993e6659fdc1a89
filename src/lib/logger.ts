/**
 * Stderr logger with an optional append-only log file.
 *
 * Stdout is reserved for the host protocol, so nothing here ever writes to it.
 */

import { createWriteStream, type WriteStream } from 'fs';
import type { LoggingConfig } from './config.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
type LevelSetting = LoggingConfig['level'];

const LEVEL_PRIORITY: Record<LevelSetting, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

const sink: {
  level: LevelSetting;
  toStderr: boolean;
  file: WriteStream | null;
} = {
  level: 'info',
  toStderr: true,
  file: null,
};

/**
 * Apply the logging section of the config. Replaces any open log file.
 */
export function configureLogging(config: LoggingConfig): void {
  sink.level = config.level;
  sink.toStderr = config.stream === 'stderr';

  if (sink.file) {
    sink.file.end();
    sink.file = null;
  }
  if (config.file && config.level !== 'silent') {
    const stream = createWriteStream(config.file, { flags: 'a' });
    stream.on('error', (error) => {
      console.error(`Log file ${config.file} unavailable, file logging disabled: ${error.message}`);
      if (sink.file === stream) sink.file = null;
    });
    sink.file = stream;
  }
}

export function closeLogFile(): Promise<void> {
  const file = sink.file;
  sink.file = null;
  if (!file) return Promise.resolve();
  return new Promise((resolve) => file.end(resolve));
}

export class Logger {
  constructor(private readonly scope: string) {}

  debug(message: string, data?: Record<string, unknown>): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write('error', message, data);
  }

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`);
  }

  private write(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[sink.level]) return;
    if (!sink.toStderr && !sink.file) return;

    const suffix = data && Object.keys(data).length > 0 ? ` ${JSON.stringify(data)}` : '';
    const line = `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${this.scope}] ${message}${suffix}`;

    if (sink.toStderr) console.error(line);
    sink.file?.write(`${line}\n`);
  }
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
