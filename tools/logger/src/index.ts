type LogFn = (...args: unknown[]) => void;

type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LoggerMethods {
  debug: LogFn;
  info: LogFn;
  warn: LogFn;
  error: LogFn;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
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

interface GetLoggerOptions {
  /**
   * Lowest level that is written (default: 'info')
   */
  level?: LogLevel;

  /**
   * Sink the messages are written to (default: console)
   */
  sink?: LoggerMethods;
}

const noop: LogFn = () => {};

/**
 * Create a level-filtered logger.
 *
 * Messages below `level` are dropped before they reach the sink.
 *
 * @example
 * ```typescript
 * const logger = getLogger({ level: 'warn' });
 * logger.info('dropped');
 * logger.warn('[AnalysisPipeline] Partial coverage'); // written
 * ```
 */
function getLogger(options: GetLoggerOptions = {}): Logger {
  const threshold = LOG_LEVEL_ORDER[options.level ?? 'info'];
  const sink: LoggerMethods = options.sink ?? {
    debug: (...args) => console.debug(...args),
    info: (...args) => console.info(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
  };

  const pick = (level: LogLevel): LogFn =>
    LOG_LEVEL_ORDER[level] >= threshold ? sink[level] : noop;

  return new Logger({
    debug: pick('debug'),
    info: pick('info'),
    warn: pick('warn'),
    error: pick('error'),
  });
}

/**
 * Logger that discards everything. Useful as a default for library callers
 * that did not pass one.
 */
const silentLogger = new Logger({
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
});

export { Logger, LOG_LEVEL_ORDER, getLogger, silentLogger };
export type { GetLoggerOptions, LoggerMethods, LogFn, LogLevel };
