export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogThreshold = LogLevel | 'silent';

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown> | undefined;
}

const LEVEL_ORDER: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogThreshold(value: string): value is LogThreshold {
  return Object.hasOwn(LEVEL_ORDER, value);
}

/**
 * Threshold from LOG_LEVEL, `info` when unset or unknown.
 */
export function resolveLogThreshold(value: string | undefined): LogThreshold {
  const normalized = value?.trim().toLowerCase();
  return normalized && isLogThreshold(normalized) ? normalized : 'info';
}

// biome-ignore lint/complexity/useLiteralKeys: TypeScript requires bracket notation for index signatures
let threshold: LogThreshold = resolveLogThreshold(process.env['LOG_LEVEL']);

export function setLogThreshold(next: LogThreshold): void {
  threshold = next;
}

export function getLogThreshold(): LogThreshold {
  return threshold;
}

function isEnabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

export function formatLog(entry: LogEntry): string {
  const base = `[${entry.timestamp}] ${entry.level.toUpperCase()}: ${entry.message}`;
  if (entry.data) {
    return `${base} ${JSON.stringify(entry.data)}`;
  }
  return base;
}

function createLogEntry(
  level: LogLevel,
  message: string,
  data?: Record<string, unknown>
): LogEntry {
  return {
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  };
}

export const logger = {
  debug(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('debug')) {
      console.debug(formatLog(createLogEntry('debug', message, data)));
    }
  },

  info(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('info')) {
      console.info(formatLog(createLogEntry('info', message, data)));
    }
  },

  warn(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('warn')) {
      console.warn(formatLog(createLogEntry('warn', message, data)));
    }
  },

  error(message: string, data?: Record<string, unknown>): void {
    if (isEnabled('error')) {
      console.error(formatLog(createLogEntry('error', message, data)));
    }
  },
};

export type Logger = typeof logger;
