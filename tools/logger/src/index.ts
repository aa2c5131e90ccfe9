type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

/** Numeric rank per level; a message is emitted when its rank >= the threshold */
const LOG_LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

class Logger implements LoggerMethods {
  public readonly debug: LogFn;
  public readonly info: LogFn;
  public readonly warn: LogFn;
  public readonly error: LogFn;

  constructor(methods: LoggerMethods) {
    this.debug = methods.debug;
    this.info = methods.info;
    this.warn = methods.warn;
    this.error = methods.error;
  }
}

interface CreateLoggerOptions {
  /** Minimum level to emit (default: 'info') */
  level?: LogLevel;
  /** Sink receiving emitted messages (default: console) */
  sink?: LoggerMethods;
}

const noop: LogFn = () => {};

/**
 * Build a Logger that forwards to `sink` and drops messages below `level`.
 */
function createLogger(options: CreateLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_RANK[options.level ?? 'info'];
  const sink: LoggerMethods = options.sink ?? console;

  const gate = (level: Exclude<LogLevel, 'silent'>): LogFn =>
    LOG_LEVEL_RANK[level] >= threshold
      ? (...args) => sink[level](...args)
      : noop;

  return new Logger({
    debug: gate('debug'),
    info: gate('info'),
    warn: gate('warn'),
    error: gate('error'),
  });
}

export { Logger, createLogger };
export type { CreateLoggerOptions, LoggerMethods, LogFn, LogLevel };
