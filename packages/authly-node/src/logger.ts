/**
 * Structured logging for the Authly client.
 *
 * Emits one JSON object per entry. Loggers carry a component name and
 * hand out child loggers for sub-components (`authly.handshake`,
 * `authly.session`, ...).
 */

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

export interface LogEntry {
  level: string;
  message: string;
  timestamp: string;
  component?: string;
  [key: string]: unknown;
}

export type LogOutput = (entry: LogEntry) => void;

export interface LoggerOptions {
  /** Minimum level to emit. Default: WARN. */
  level?: LogLevel;
  component?: string;
  /** Output sink. Default: JSON line on stderr. */
  output?: LogOutput;
}

const LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: 'DEBUG',
  [LogLevel.INFO]: 'INFO',
  [LogLevel.WARN]: 'WARN',
  [LogLevel.ERROR]: 'ERROR',
  [LogLevel.SILENT]: 'SILENT',
};

const LEVEL_BY_NAME: Record<string, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
  silent: LogLevel.SILENT,
};

// stdout belongs to the host application
const defaultOutput: LogOutput = (entry: LogEntry): void => {
  process.stderr.write(JSON.stringify(entry) + '\n');
};

/**
 * Parse a level name (`debug`, `info`, `warn`, `error`, `silent`), case-insensitive.
 * Returns `undefined` for anything else.
 */
export function parseLogLevel(name: string): LogLevel | undefined {
  return LEVEL_BY_NAME[name.trim().toLowerCase()];
}

/**
 * Structured logger with level filtering and child loggers.
 *
 * ```ts
 * const log = new Logger({ level: LogLevel.DEBUG, component: 'authly' });
 * log.child('handshake').debug('state changed', { state: 'peer_verifying' });
 * ```
 */
export class Logger {
  private _level: LogLevel;
  private readonly _component: string | undefined;
  private readonly _output: LogOutput;

  constructor(options?: LoggerOptions) {
    this._level = options?.level ?? LogLevel.WARN;
    this._component = options?.component;
    this._output = options?.output ?? defaultOutput;
  }

  debug(message: string, fields?: Record<string, unknown>): void {
    this._log(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: Record<string, unknown>): void {
    this._log(LogLevel.INFO, message, fields);
  }

  warn(message: string, fields?: Record<string, unknown>): void {
    this._log(LogLevel.WARN, message, fields);
  }

  error(message: string, fields?: Record<string, unknown>): void {
    this._log(LogLevel.ERROR, message, fields);
  }

  /** Child logger sharing level and output, with component `parent.child`. */
  child(component: string): Logger {
    return new Logger({
      level: this._level,
      component: this._component ? `${this._component}.${component}` : component,
      output: this._output,
    });
  }

  setLevel(level: LogLevel): void {
    this._level = level;
  }

  getLevel(): LogLevel {
    return this._level;
  }

  private _log(level: LogLevel, message: string, fields?: Record<string, unknown>): void {
    if (level < this._level) return;

    const entry: LogEntry = {
      level: LEVEL_NAMES[level],
      message,
      timestamp: new Date().toISOString(),
      ...(this._component !== undefined ? { component: this._component } : {}),
      ...fields,
    };

    this._output(entry);
  }
}

/** Convenience wrapper around `new Logger(options)`. */
export function createLogger(options?: LoggerOptions): Logger {
  return new Logger(options);
}
