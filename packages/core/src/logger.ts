import { appendFile } from 'node:fs/promises';
import { format } from 'node:util';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  level?: LogLevel;
  file?: string;
  /** Line sink, defaults to console.log / console.error by level. */
  write?: (level: LogLevel, line: string) => void;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

function consoleWrite(level: LogLevel, line: string): void {
  if (level === 'error') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const minValue = LEVEL_ORDER[options.level ?? 'info'];
  const filePath = options.file;
  const write = options.write ?? consoleWrite;

  const log = (level: LogLevel, ...args: unknown[]): void => {
    if (LEVEL_ORDER[level] < minValue) {
      return;
    }
    const timestamp = new Date().toISOString();
    const line = `[${timestamp}] [${level.toUpperCase()}] ${format(...args)}`;
    write(level, line);
    if (filePath) {
      appendFile(filePath, `${line}\n`, 'utf8').catch((error: unknown) => {
        console.error(`[${timestamp}] [ERROR] failed to write log file ${filePath}:`, error);
      });
    }
  };

  return {
    debug: (...args: unknown[]) => log('debug', ...args),
    info: (...args: unknown[]) => log('info', ...args),
    warn: (...args: unknown[]) => log('warn', ...args),
    error: (...args: unknown[]) => log('error', ...args),
  };
}
