import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_COLOR: Record<LogLevel, (text: string) => string> = {
  debug: pc.dim,
  info: (text) => text,
  warn: pc.yellow,
  error: pc.red,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  /** Receives every formatted line. Defaults to stderr so stdout stays clean. */
  sink?: (line: string) => void;
}

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_ORDER, value);
}

function levelFromEnv(): LogLevel {
  const raw = process.env.VISION_AGENT_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : 'info';
}

/**
 * Scoped logger writing `[scope] message` lines, the same shape the
 * browser tools have always printed to stderr.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? levelFromEnv()];
  const sink = options.sink ?? ((line: string) => console.error(line));

  const write = (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < threshold) return;
    sink(LEVEL_COLOR[level](`[${scope}] ${message}`));
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
