export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: Exclude<LogLevel, 'silent'>;
  msg: string;
  [key: string]: unknown;
};

export type LogSink = (line: string) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Where formatted lines go; defaults to stderr */
  sink?: LogSink;
  /** Fields added to every record */
  fields?: Record<string, unknown>;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function toJsonSafe(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  get level(): LogLevel {
    return this.options.level ?? 'warn';
  }

  isEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.level];
  }

  child(fields: Record<string, unknown>): Logger {
    return new Logger({
      ...this.options,
      fields: { ...(this.options.fields ?? {}), ...fields },
    });
  }

  log(level: Exclude<LogLevel, 'silent'>, msg: string, extra?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(this.options.fields ?? {}),
      ...(extra ?? {}),
    };

    const sink = this.options.sink ?? ((line: string) => process.stderr.write(`${line}\n`));

    if ((this.options.format ?? 'text') === 'json') {
      sink(JSON.stringify(record, (_key, value: unknown) => toJsonSafe(value)));
      return;
    }

    const { ts, level: _level, msg: _msg, ...rest } = record;
    const restPart = Object.entries(rest)
      .map(([k, v]) => ` ${k}=${typeof v === 'string' ? v : JSON.stringify(toJsonSafe(v))}`)
      .join('');
    sink(`[${ts}] ${level.toUpperCase()} ${msg}${restPart}`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}

/** Logger that drops everything */
export const silentLogger = new Logger({ level: 'silent' });
