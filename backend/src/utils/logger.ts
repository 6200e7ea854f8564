export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

// Thin console wrapper so the simulation core can be silenced in tests and scripts
class Logger {
  private level: LogLevel;

  constructor(level: LogLevel) {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string, ...meta: unknown[]): void {
    if (this.enabled('debug')) console.debug(message, ...meta);
  }

  info(message: string, ...meta: unknown[]): void {
    if (this.enabled('info')) console.log(message, ...meta);
  }

  warn(message: string, ...meta: unknown[]): void {
    if (this.enabled('warn')) console.warn(`⚠️ ${message}`, ...meta);
  }

  error(message: string, ...meta: unknown[]): void {
    if (this.enabled('error')) console.error(`❌ ${message}`, ...meta);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }
}

const envLevel = process.env.LOG_LEVEL?.toLowerCase();

export const logger = new Logger(isLogLevel(envLevel) ? envLevel : 'info');
