export type LogLevel = 'debug' | 'info' | 'warn';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2 };

/**
 * Prints to the console, dropping messages below the configured level.
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private prefix: string;

  constructor(level: LogLevel = 'info', prefix = '') {
    this.level = level;
    this.prefix = prefix;
  }

  debug(message: string): void {
    if (this.enabled('debug')) console.log(this.format(message));
  }

  info(message: string): void {
    if (this.enabled('info')) console.log(this.format(message));
  }

  warn(message: string): void {
    if (this.enabled('warn')) console.warn(this.format(message));
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

export interface MemoryLogEntry {
  level: LogLevel;
  message: string;
}

/**
 * Keeps every message in memory. Useful for tests.
 */
export class MemoryLogger implements Logger {
  readonly entries: MemoryLogEntry[] = [];

  debug(message: string): void {
    this.entries.push({ level: 'debug', message });
  }

  info(message: string): void {
    this.entries.push({ level: 'info', message });
  }

  warn(message: string): void {
    this.entries.push({ level: 'warn', message });
  }

  messages(): string[] {
    return this.entries.map(e => e.message);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
};

/**
 * Logger for one solver call: an explicit logger wins, `verbose` alone
 * gets a debug-level console logger, otherwise nothing is printed.
 */
export function resolveLogger(options: { verbose?: boolean; logger?: Logger }, name: string): Logger {
  if (options.logger) return options.logger;
  if (options.verbose) return new ConsoleLogger('debug', name);
  return silentLogger;
}
