export type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

const LOG_LEVELS: Record<LogLevel, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

// Read on every call so hosts and tests can change LOG_LEVEL after import.
function currentLevel(): number {
  const configured = (process.env.LOG_LEVEL || 'INFO').toUpperCase();
  return isLogLevel(configured) ? LOG_LEVELS[configured] : LOG_LEVELS.INFO;
}

function log(level: LogLevel, module: string, message: string, data?: Record<string, unknown>): void {
  if (LOG_LEVELS[level] < currentLevel()) return;

  const dataStr = data ? ` ${JSON.stringify(data)}` : '';
  console.log(`[${level}] [${module}] ${message}${dataStr}`);
}

export function createLogger(module: string) {
  return {
    debug: (message: string, data?: Record<string, unknown>) => log('DEBUG', module, message, data),
    info: (message: string, data?: Record<string, unknown>) => log('INFO', module, message, data),
    warn: (message: string, data?: Record<string, unknown>) => log('WARN', module, message, data),
    error: (message: string, data?: Record<string, unknown>) => log('ERROR', module, message, data),
  };
}

export type Logger = ReturnType<typeof createLogger>;
