import { createColors, detectColorSupport, type Colors } from './colors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'none';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'none'] as const satisfies readonly LogLevel[];

export interface LoggerOptions {
  level?: LogLevel;
  prefix?: string;
  timestamp?: boolean;
  colors?: boolean;
  /** Line sink (default: stderr, so logs never tear the dashboard) */
  write?: (line: string) => void;
  env?: Record<string, string | undefined>;
}

const levels: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  none: 999,
};

export class Logger {
  private level: LogLevel;
  private prefix: string;
  private useTimestamp: boolean;
  private paint: Colors;
  private write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    const env = options.env ?? process.env;
    this.level = options.level || this.detectLogLevel(env);
    this.prefix = options.prefix || 'pws';
    this.useTimestamp = options.timestamp !== false;
    this.paint = createColors(options.colors !== false && detectColorSupport(env, Boolean(process.stderr.isTTY)));
    this.write = options.write ?? ((line) => process.stderr.write(line + '\n'));
  }

  private detectLogLevel(env: Record<string, string | undefined>): LogLevel {
    const debug = env.DEBUG || '';
    if (debug.includes('pws') || debug.includes('*')) {
      return 'debug';
    }
    return 'none';
  }

  get currentLevel(): LogLevel {
    return this.level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  private formatTimestamp(): string {
    if (!this.useTimestamp) return '';
    const time = new Date().toTimeString().split(' ')[0];
    return this.paint.gray(`[${time}]`) + ' ';
  }

  shouldLog(level: LogLevel): boolean {
    return level !== 'none' && levels[level] >= levels[this.level];
  }

  private log(level: LogLevel, message: string) {
    if (!this.shouldLog(level)) return;

    const prefix = this.paint.cyan(`[${this.prefix}]`);
    this.write(`${this.formatTimestamp()}${prefix} ${message}`);
  }

  debug(message: string) {
    this.log('debug', message);
  }

  info(message: string) {
    this.log('info', message);
  }

  warn(message: string) {
    this.log('warn', this.paint.yellow(message));
  }

  error(message: string) {
    this.log('error', this.paint.red(message));
  }

  /**
   * Log an error with its first stack frames at debug level
   */
  logError(context: string, error: Error) {
    if (!this.shouldLog('error')) return;

    this.error(`✖ ${context}: ${error.message}`);

    if (error.stack && this.shouldLog('debug')) {
      const stack = error.stack
        .split('\n')
        .slice(1, 4)
        .map((line) => `  ${this.paint.gray('│')} ${line.trim()}`)
        .join('\n');
      this.write(stack);
    }
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
