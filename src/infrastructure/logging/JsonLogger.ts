import type { LogLevel, Logger } from '../../domain/ports/Logger.js';

/** A log level, or `silent` to write nothing at all. */
export type LogThreshold = LogLevel | 'silent';

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export interface JsonLoggerOptions {
  /** Minimum level written. Default: `silent`. */
  readonly level?: LogThreshold;
  /** Line sink. Default: `process.stderr`. */
  readonly write?: (line: string) => void;
  readonly baseExtra?: Record<string, unknown>;
}

function writeToStderr(line: string): void {
  process.stderr.write(line);
}

/** Logger that writes one JSON object per line: `level`, `service`, `msg`, `ts` and any extra fields. */
export function createLogger(service: string, options: JsonLoggerOptions = {}): Logger {
  const threshold = options.level ?? 'silent';
  const write = options.write ?? writeToStderr;
  const baseExtra = options.baseExtra ?? {};

  function emit(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;

    const line = JSON.stringify({
      level,
      service,
      msg,
      ts: new Date().toISOString(),
      ...baseExtra,
      ...extra,
    });

    write(`${line}\n`);
  }

  return {
    debug(msg, extra) {
      emit('debug', msg, extra);
    },
    info(msg, extra) {
      emit('info', msg, extra);
    },
    warn(msg, extra) {
      emit('warn', msg, extra);
    },
    error(msg, extra) {
      emit('error', msg, extra);
    },
    child(extra) {
      return createLogger(service, { level: threshold, write, baseExtra: { ...baseExtra, ...extra } });
    },
  };
}
