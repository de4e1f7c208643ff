/**
 * lambda-ops - Centralized Logger
 *
 * - `pretty`: coloured, timestamped lines
 * - `json`: one structured object per line
 * - Sink is injectable
 */

// ============================================================================
// TYPES
// ============================================================================

export type LogLevel = 'DEBUG' | 'INFO' | 'SUCCESS' | 'WARN' | 'ERROR';

export type LogFormat = 'pretty' | 'json';

export interface LogContext {
  /** Command being run (e.g. 'deploy', 'rollback') */
  command?: string;
  /** Target Lambda function */
  functionName?: string;
  /** Target AWS region */
  region?: string;
  /** Additional metadata */
  [key: string]: unknown;
}

export type LogSink = (line: string, level: LogLevel) => void;

export interface LoggerOptions {
  minLevel?: LogLevel;
  format?: LogFormat;
  service?: string;
  sink?: LogSink;
  /** Injected clock, used for timestamps */
  now?: () => Date;
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  service: string;
  command?: string;
  functionName?: string;
  region?: string;
  errorName?: string;
  errorMessage?: string;
  errorStack?: string;
  meta?: Record<string, unknown>;
}

// ============================================================================
// LOGGER CLASS
// ============================================================================

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  SUCCESS: 2,
  WARN: 3,
  ERROR: 4,
};

const COLORS: Record<LogLevel, string> = {
  DEBUG: '\x1b[90m', // Gray
  INFO: '\x1b[36m', // Cyan
  SUCCESS: '\x1b[32m', // Green
  WARN: '\x1b[33m', // Yellow
  ERROR: '\x1b[31m', // Red
};
const RESET = '\x1b[0m';

const consoleSink: LogSink = (line, level) => {
  switch (level) {
    case 'DEBUG':
      console.debug(line);
      break;
    case 'WARN':
      console.warn(line);
      break;
    case 'ERROR':
      console.error(line);
      break;
    default:
      console.log(line);
  }
};

export class OpsLogger {
  private minLevel: LogLevel;
  private format: LogFormat;
  private service: string;
  private sink: LogSink;
  private now: () => Date;
  private persistentContext: Partial<LogContext> = {};

  constructor(options: LoggerOptions = {}) {
    this.minLevel = options.minLevel ?? 'INFO';
    this.format = options.format ?? 'pretty';
    this.service = options.service ?? 'lambda-ops';
    this.sink = options.sink ?? consoleSink;
    this.now = options.now ?? (() => new Date());
  }

  /** Set persistent context included in ALL subsequent logs. */
  setContext(context: Partial<LogContext>): void {
    this.persistentContext = { ...context };
  }

  /** Add keys to existing persistent context without overwriting. */
  appendContext(context: Partial<LogContext>): void {
    this.persistentContext = { ...this.persistentContext, ...context };
  }

  /** Clear persistent context. */
  clearContext(): void {
    this.persistentContext = {};
  }

  configure(options: Pick<LoggerOptions, 'minLevel' | 'format'>): void {
    if (options.minLevel) this.minLevel = options.minLevel;
    if (options.format) this.format = options.format;
  }

  // --------------------------------------------------------------------------
  // Core log methods
  // --------------------------------------------------------------------------

  debug(message: string, meta?: Record<string, unknown>): void {
    this._log('DEBUG', message, undefined, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this._log('INFO', message, undefined, meta);
  }

  success(message: string, meta?: Record<string, unknown>): void {
    this._log('SUCCESS', message, undefined, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this._log('WARN', message, undefined, meta);
  }

  error(message: string, error?: unknown, meta?: Record<string, unknown>): void {
    this._log('ERROR', message, error, meta);
  }

  /** Log a finished step with its duration */
  step(description: string, durationMs: number): void {
    this._log('SUCCESS', `${description} (${Math.round(durationMs / 1000)}s)`, undefined, { durationMs });
  }

  // --------------------------------------------------------------------------
  // Internal
  // --------------------------------------------------------------------------

  private _log(level: LogLevel, message: string, error?: unknown, meta?: Record<string, unknown>): void {
    if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const timestamp = this.now().toISOString();

    if (this.format === 'pretty') {
      let line = `${COLORS[level]}[${timestamp}] ${message}${RESET}`;
      if (error instanceof Error) {
        line += `\n${COLORS[level]}  ${error.name}: ${error.message}${RESET}`;
      } else if (error !== undefined && error !== null) {
        line += `\n${COLORS[level]}  ${String(error)}${RESET}`;
      }
      this.sink(line, level);
      return;
    }

    const entry: LogEntry = {
      timestamp,
      level,
      message,
      service: this.service,
      command: typeof this.persistentContext.command === 'string' ? this.persistentContext.command : undefined,
      functionName: typeof this.persistentContext.functionName === 'string' ? this.persistentContext.functionName : undefined,
      region: typeof this.persistentContext.region === 'string' ? this.persistentContext.region : undefined,
    };

    if (error instanceof Error) {
      entry.errorName = error.name;
      entry.errorMessage = error.message;
      entry.errorStack = error.stack;
    } else if (error !== undefined && error !== null) {
      entry.errorMessage = String(error);
    }

    if (meta && Object.keys(meta).length > 0) {
      entry.meta = meta;
    }

    const cleanEntry = Object.fromEntries(
      Object.entries(entry).filter(([_, v]) => v !== undefined && v !== null)
    );

    this.sink(JSON.stringify(cleanEntry), level);
  }
}

// ============================================================================
// SINGLETON EXPORT
// ============================================================================

export const logger = new OpsLogger();
export default logger;
