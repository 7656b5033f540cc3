export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export type LogFields = Record<string, unknown>;

/**
 * Structured console logger. Each entry is a single JSON line:
 * `{"level":"info","time":"...","event":"chat.done",...fields}`.
 */
export class Logger {
  private ownLevel: LogLevel | undefined;

  /**
   * A child without a level of its own follows its parent, so `setLevel` on the root
   * reaches loggers created before the call.
   */
  constructor(
    level?: LogLevel,
    private bindings: LogFields = {},
    private parent?: Logger
  ) {
    this.ownLevel = level;
  }

  get level(): LogLevel {
    return this.ownLevel ?? this.parent?.level ?? 'info';
  }

  child(bindings: LogFields): Logger {
    return new Logger(undefined, { ...this.bindings, ...bindings }, this);
  }

  setLevel(level: LogLevel): void {
    this.ownLevel = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level] && level !== 'silent';
  }

  debug(event: string, fields?: LogFields): void {
    this.write('debug', event, fields);
  }

  info(event: string, fields?: LogFields): void {
    this.write('info', event, fields);
  }

  warn(event: string, fields?: LogFields): void {
    this.write('warn', event, fields);
  }

  error(event: string, fields?: LogFields): void {
    this.write('error', event, fields);
  }

  private write(level: Exclude<LogLevel, 'silent'>, event: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level,
      time: new Date().toISOString(),
      event,
      ...this.bindings,
      ...normalizeFields(fields),
    };

    const line = JSON.stringify(entry);
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }
}

function normalizeFields(fields?: LogFields): LogFields {
  if (!fields) return {};
  const result: LogFields = {};
  for (const [key, value] of Object.entries(fields)) {
    result[key] = value instanceof Error ? { name: value.name, message: value.message } : value;
  }
  return result;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

export function parseLogLevel(value: string | undefined, fallback: LogLevel = 'info'): LogLevel {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogLevel(normalized) ? normalized : fallback;
}

export const logger = new Logger(parseLogLevel(process.env['LOG_LEVEL']));
