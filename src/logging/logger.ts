export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFields = Record<string, unknown>;

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Structured logger writing one JSON object per line
 */
export interface Logger {
  debug(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
  child(fields: LogFields): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  fields?: LogFields;
  /**
   * Disable all output (tests)
   */
  silent?: boolean;
}

function serializeError(err: Error): LogFields {
  return { name: err.name, message: err.message };
}

function normalize(fields: LogFields): LogFields {
  const out: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    out[key] = value instanceof Error ? serializeError(value) : value;
  }
  return out;
}

class ConsoleLogger implements Logger {
  constructor(
    private readonly level: LogLevel,
    private readonly bound: LogFields,
    private readonly silent: boolean
  ) {}

  debug(message: string, fields?: LogFields): void {
    this.write('debug', message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write('info', message, fields);
  }

  warn(message: string, fields?: LogFields): void {
    this.write('warn', message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write('error', message, fields);
  }

  child(fields: LogFields): Logger {
    return new ConsoleLogger(this.level, { ...this.bound, ...fields }, this.silent);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (this.silent || LEVEL_WEIGHT[level] < LEVEL_WEIGHT[this.level]) {
      return;
    }

    const line = JSON.stringify({
      timestamp: new Date().toISOString(),
      level,
      message,
      ...this.bound,
      ...(fields ? normalize(fields) : {}),
    });

    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

/**
 * Create a logger
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return new ConsoleLogger(options.level ?? 'info', options.fields ?? {}, options.silent ?? false);
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = createLogger({ silent: true });
