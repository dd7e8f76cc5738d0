import { appendFileSync } from 'node:fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

export type LogSink = (level: LogLevel, message: string, context?: LogContext) => void;

export interface LoggerOptions {
  /** Append formatted lines to this file instead of writing to the console */
  filePath?: string;
  /** Minimum level that reaches the sink (default: debug) */
  level?: LogLevel;
  /** Explicit sink; takes precedence over filePath */
  sink?: LogSink;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const consoleSink: LogSink = (level, message, context) => {
  // The terminal UI owns stdout; console logging stays on stderr and is only
  // the default before a log file has been configured.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context) {
    logger(message, context);
    return;
  }
  logger(message);
};

let activeSink: LogSink = consoleSink;
let minimumLevel: LogLevel = 'debug';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function formatLogLine(level: LogLevel, message: string, context: LogContext | undefined, now: Date): string {
  const stamp =
    `${pad(now.getMonth() + 1)}-${pad(now.getDate())}-${now.getFullYear()} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;
  const suffix = context ? ` ${JSON.stringify(context)}` : '';
  return `[${stamp} ${level.toUpperCase().padStart(5)}] ${message}${suffix}\n`;
}

export function createFileSink(filePath: string, clock: () => Date = () => new Date()): LogSink {
  return (level, message, context) => {
    appendFileSync(filePath, formatLogLine(level, message, context, clock()), 'utf8');
  };
}

export function configureLogger(options: LoggerOptions): void {
  if (options.sink) {
    activeSink = options.sink;
  } else if (options.filePath) {
    activeSink = createFileSink(options.filePath);
  }
  if (options.level) {
    minimumLevel = options.level;
  }
}

export function resetLogger(): void {
  activeSink = consoleSink;
  minimumLevel = 'debug';
}

const emit = (level: LogLevel, message: string, context?: LogContext): void => {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
  const hasContext = context !== undefined && Object.keys(context).length > 0;
  activeSink(level, message, hasContext ? context : undefined);
};

export const logInfo: LoggerFn = (message, context) => emit('info', message, context);
export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
