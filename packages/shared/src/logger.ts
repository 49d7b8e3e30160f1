type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const PREFIX: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️',
  warn: '⚠️',
  error: '❌',
};

/**
 * Logger utility for structured logging
 */
export class Logger {
  constructor(
    private jsonMode = false,
    private fields: Record<string, unknown> = {}
  ) {}

  /**
   * Derive a logger that stamps every entry with the given fields
   */
  child(fields: Record<string, unknown>): Logger {
    return new Logger(this.jsonMode, { ...this.fields, ...fields });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (process.env.LOG_LEVEL !== 'debug') return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    const payload = { ...this.fields, ...data };
    const hasPayload = Object.keys(payload).length > 0;
    const write = level === 'error' || level === 'warn' ? console.error : console.log;

    if (this.jsonMode) {
      write(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...payload,
        })
      );
    } else {
      const formattedData = hasPayload ? ` ${JSON.stringify(payload)}` : '';
      write(`${PREFIX[level]} ${message}${formattedData}`);
    }
  }
}

/**
 * Logger configured from the LOG_FORMAT environment variable
 */
export function createLogger(format: 'text' | 'json' = 'text'): Logger {
  return new Logger(format === 'json');
}
