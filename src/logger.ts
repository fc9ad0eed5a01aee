export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const MASKED_KEYS = new Set(['password', 'token', 'secret', 'api_key', 'apikey', 'authorization']);
const MASK = '***MASKED***';

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

/**
 * Replaces the values of sensitive keys at any depth. Errors are flattened to
 * their name and message so they survive JSON serialisation.
 */
export function maskContext(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  if (Array.isArray(value)) {
    return value.map(maskContext);
  }
  if (value !== null && typeof value === 'object') {
    const masked: Record<string, unknown> = {};
    for (const [key, inner] of Object.entries(value)) {
      masked[key] = MASKED_KEYS.has(key.toLowerCase()) ? MASK : maskContext(inner);
    }
    return masked;
  }
  return value;
}

function currentLevel(): LogLevel {
  const fromEnv = process.env.LOG_LEVEL;
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

// Writes `[Scope] message {"json":"context"}` lines to the console.
export function createLogger(scope: string, level: LogLevel = currentLevel()): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (at: LogLevel, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[at] < threshold) return;

    const line = context
      ? `[${scope}] ${message} ${JSON.stringify(maskContext(context))}`
      : `[${scope}] ${message}`;

    if (at === 'error') {
      console.error(line);
    } else if (at === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}
