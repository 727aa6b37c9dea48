// Structured logging for registry operations

/**
 * Logger the registry reports registrations, conflicts and instantiation
 * failures to. Each call carries a short message plus structured fields
 * such as schemaName, version or serDesId.
 */
export type RegistryLogger = {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
};

export type LogLevel = keyof RegistryLogger;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export type ConsoleLoggerOptions = {
  /**
   * Lowest level written (default 'info')
   */
  level?: LogLevel;

  /**
   * Tag put in front of every line (default 'schema-registry')
   */
  scope?: string;
};

/**
 * Logger writing `[LEVEL] scope: message` lines to the console, dropping
 * anything below the configured level.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): RegistryLogger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info');
  const scope = options.scope ?? 'schema-registry';

  const write = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return;
    console[level](`[${level.toUpperCase()}] ${scope}: ${message}`, data ?? '');
  };

  return {
    debug: write('debug'),
    info: write('info'),
    warn: write('warn'),
    error: write('error'),
  };
}

export const silentLogger: RegistryLogger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
};

/**
 * Logger that keeps every entry in memory, for assertions in tests
 */
export function createCapturingLogger(): RegistryLogger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const capture = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    entries.push({ level, message, data });
  };

  return {
    entries,
    debug: capture('debug'),
    info: capture('info'),
    warn: capture('warn'),
    error: capture('error'),
  };
}
