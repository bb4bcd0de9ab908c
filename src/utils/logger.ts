export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

type LogContext = Record<string, unknown>;

interface LogOptions {
  level?: LogLevel;
  format?: LogFormat;
}

export interface Logger {
  child(ctx: LogContext): Logger;
  debug(msg: string, ctx?: LogContext): void;
  info(msg: string, ctx?: LogContext): void;
  warn(msg: string, ctx?: LogContext): void;
  error(msg: string, ctx?: LogContext): void;
}

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && (LEVELS as readonly string[]).includes(value);
}

let defaults: Required<LogOptions> = {
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info',
  format: process.env.LOG_FORMAT === 'json' ? 'json' : 'pretty',
};

/** Override the level/format used by loggers that were not given explicit options. */
export function configureLogging(opts: LogOptions): void {
  defaults = { ...defaults, ...opts };
}

/**
 * Tagged logger. Writes to stderr so that CLI output on stdout stays clean.
 * Pretty lines look like `[ts] WARN [tag] - msg {"ctx":1}`.
 */
export function getLogger(tag: string, opts: LogOptions = {}, base: LogContext = {}): Logger {
  function emit(level: LogLevel, msg: string, extra?: LogContext): void {
    const threshold = opts.level ?? defaults.level;
    if (LEVELS.indexOf(level) < LEVELS.indexOf(threshold)) return;

    const ts = new Date().toISOString();
    const ctx = { ...base, ...extra };
    if ((opts.format ?? defaults.format) === 'json') {
      console.error(JSON.stringify({ ts, level, tag, msg, ...ctx }));
      return;
    }
    const ctxStr = Object.keys(ctx).length ? ` ${JSON.stringify(ctx)}` : '';
    console.error(`[${ts}] ${level.toUpperCase()} [${tag}] - ${msg}${ctxStr}`);
  }

  return {
    child: (ctx) => getLogger(tag, opts, { ...base, ...ctx }),
    debug: (msg, ctx) => emit('debug', msg, ctx),
    info: (msg, ctx) => emit('info', msg, ctx),
    warn: (msg, ctx) => emit('warn', msg, ctx),
    error: (msg, ctx) => emit('error', msg, ctx),
  };
}
