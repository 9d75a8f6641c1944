/**
 * Auth Chain Logging
 *
 * Context fields never carry secret material; callers pass names, chain
 * positions and endpoints only.
 */

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn'];

/**
 * Log context fields.
 */
export interface AuthLogContext {
  provider?: string;
  identity?: string;
  /** Position in the authentication chain */
  chainIndex?: number;
  /** Chain step name */
  step?: string;
  endpoint?: string;
  [key: string]: unknown;
}

export interface Logger {
  trace(message: string, context?: AuthLogContext): void;
  debug(message: string, context?: AuthLogContext): void;
  info(message: string, context?: AuthLogContext): void;
  warn(message: string, context?: AuthLogContext): void;
  child(context: AuthLogContext): Logger;
}

export const noOpLogger: Logger = {
  trace(): void {},
  debug(): void {},
  info(): void {},
  warn(): void {},
  child(): Logger {
    return noOpLogger;
  },
};

export interface LogEntry {
  level: LogLevel;
  message: string;
  context: AuthLogContext;
}

/**
 * Records entries for assertions. Children append to the parent's list.
 */
export class InMemoryLogger implements Logger {
  constructor(
    private readonly baseContext: AuthLogContext = {},
    private readonly entries: LogEntry[] = []
  ) {}

  private record(level: LogLevel, message: string, context?: AuthLogContext): void {
    this.entries.push({ level, message, context: { ...this.baseContext, ...context } });
  }

  trace(message: string, context?: AuthLogContext): void {
    this.record('trace', message, context);
  }

  debug(message: string, context?: AuthLogContext): void {
    this.record('debug', message, context);
  }

  info(message: string, context?: AuthLogContext): void {
    this.record('info', message, context);
  }

  warn(message: string, context?: AuthLogContext): void {
    this.record('warn', message, context);
  }

  child(context: AuthLogContext): Logger {
    return new InMemoryLogger({ ...this.baseContext, ...context }, this.entries);
  }

  getLogs(): LogEntry[] {
    return [...this.entries];
  }

  getLogsByLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => entry.level === level);
  }

  getLogsContaining(substring: string): LogEntry[] {
    return this.entries.filter((entry) => entry.message.includes(substring));
  }
}

/**
 * Writes `[LEVEL] auth-chain: message {context}` lines to stderr, leaving
 * stdout for environment exports.
 */
export class ConsoleLogger implements Logger {
  private readonly minLevel: LogLevel;
  private readonly baseContext: AuthLogContext;

  constructor(options: { minLevel?: LogLevel; context?: AuthLogContext } = {}) {
    this.minLevel = options.minLevel ?? 'info';
    this.baseContext = options.context ?? {};
  }

  private write(level: LogLevel, message: string, context?: AuthLogContext): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.minLevel)) {
      return;
    }
    const fields = Object.entries({ ...this.baseContext, ...context }).filter(
      ([, value]) => value !== undefined
    );
    const suffix = fields.length > 0 ? ` ${JSON.stringify(Object.fromEntries(fields))}` : '';
    console.error(`[${level.toUpperCase()}] auth-chain: ${message}${suffix}`);
  }

  trace(message: string, context?: AuthLogContext): void {
    this.write('trace', message, context);
  }

  debug(message: string, context?: AuthLogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: AuthLogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: AuthLogContext): void {
    this.write('warn', message, context);
  }

  child(context: AuthLogContext): Logger {
    return new ConsoleLogger({
      minLevel: this.minLevel,
      context: { ...this.baseContext, ...context },
    });
  }
}

/**
 * Parses a configured level name; unknown names yield undefined.
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === 'warning') {
    return 'warn';
  }
  return LOG_LEVELS.find((level) => level === normalized);
}
