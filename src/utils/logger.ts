/* Simple structured logger helper so we can swap implementations later if needed */
type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

function currentLevel(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

class Logger {
  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel()];
  }

  debug(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('debug')) return;
    console.debug(`[DEBUG] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  info(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('info')) return;
    console.log(`[INFO] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  error(message: string, meta?: unknown) {
    if (!this.enabled('error')) return;
    console.error(`[ERROR] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }

  warn(message: string, meta?: Record<string, unknown>) {
    if (!this.enabled('warn')) return;
    console.warn(`[WARN] ${new Date().toISOString()} - ${message}`, meta ?? '');
  }
}

export const logger = new Logger();
