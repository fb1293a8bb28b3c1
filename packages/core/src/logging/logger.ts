/*
 * Logger
 * ------
 * Level-filtered logger shared by every scope, the scope manager, the
 * reactive hub and the module registry of one container.
 *
 * Output goes through a pluggable handler so hosts can route framework logs
 * into their own sink (and tests can capture them); the default handler
 * writes to the console with an `[arbor]` prefix.
 */

export const LogLevel = {
  None: 'none',
  Error: 'error',
  Warn: 'warn',
  Info: 'info',
  Debug: 'debug',
  Trace: 'trace',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/** Messages at a level are emitted when its rank is <= the configured rank. */
const LEVEL_RANK: Record<LogLevel, number> = {
  none: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

export type LogHandler = (level: Exclude<LogLevel, 'none'>, message: string, details?: unknown) => void;

export const consoleHandler: LogHandler = (level, message, details) => {
  const line = `[arbor] ${level.toUpperCase()}: ${message}`;
  const args = details === undefined ? [line] : [line, details];
  switch (level) {
    case 'error':
      console.error(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'info':
      console.info(...args);
      break;
    default:
      console.debug(...args);
  }
};

export interface LoggerOptions {
  level?: LogLevel;
  handler?: LogHandler;
  /** Prepended to every message as `name: ` */
  name?: string;
}

export class Logger {
  /** Shared with every child so a level change applies to the whole family. */
  private readonly state: { level: LogLevel };
  private readonly handler: LogHandler;
  private readonly name: string;

  constructor(options: LoggerOptions = {}, state?: { level: LogLevel }) {
    this.state = state ?? { level: options.level ?? LogLevel.Warn };
    this.handler = options.handler ?? consoleHandler;
    this.name = options.name ?? '';
  }

  get currentLevel(): LogLevel {
    return this.state.level;
  }

  setLevel(level: LogLevel): void {
    this.state.level = level;
  }

  isLevelEnabled(level: Exclude<LogLevel, 'none'>): boolean {
    return LEVEL_RANK[level] <= LEVEL_RANK[this.state.level];
  }

  error(message: string, details?: unknown): void {
    this.emit('error', message, details);
  }

  warn(message: string, details?: unknown): void {
    this.emit('warn', message, details);
  }

  info(message: string, details?: unknown): void {
    this.emit('info', message, details);
  }

  debug(message: string, details?: unknown): void {
    this.emit('debug', message, details);
  }

  trace(message: string, details?: unknown): void {
    this.emit('trace', message, details);
  }

  /**
   * Logger sharing this one's handler and level, with an extra name segment.
   */
  child(name: string): Logger {
    return new Logger(
      { handler: this.handler, name: this.name ? `${this.name}/${name}` : name },
      this.state
    );
  }

  private emit(level: Exclude<LogLevel, 'none'>, message: string, details?: unknown): void {
    if (!this.isLevelEnabled(level)) return;
    this.handler(level, this.name ? `${this.name}: ${message}` : message, details);
  }
}
