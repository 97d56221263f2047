/**
 * Structured logging utility
 * Provides consistent logging across the tx, rpc and wallet layers
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  layer: string;
  message: string;
  data?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class Logger {
  private minLevel: LogLevel;
  private layer: string;

  constructor(layer: string, minLevel: LogLevel = 'info') {
    this.layer = layer;
    this.minLevel = minLevel;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private formatEntry(entry: LogEntry): string {
    const { timestamp, level, layer, message, data } = entry;
    const prefix = `[${timestamp}] [${level.toUpperCase().padEnd(5)}] [${layer}]`;

    if (data && Object.keys(data).length > 0) {
      const sanitizedData = this.sanitize(data);
      return `${prefix} ${message} ${JSON.stringify(sanitizedData)}`;
    }

    return `${prefix} ${message}`;
  }

  /**
   * Signing material never reaches the log. Public keys and signatures are
   * several kilobytes of base64, so they are dropped along with secrets.
   */
  private sanitize(data: Record<string, unknown>): Record<string, unknown> {
    const sensitiveKeys = ['privatekey', 'secret', 'password', 'seed', 'signature', 'b64'];
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      if (sensitiveKeys.some((sk) => lowerKey.includes(sk))) {
        result[key] = '[REDACTED]';
      } else if (value instanceof Uint8Array) {
        result[key] = `<${value.length} bytes>`;
      } else if (typeof value === 'bigint') {
        result[key] = value.toString();
      } else if (isRecord(value)) {
        result[key] = this.sanitize(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      layer: this.layer,
      message,
      data,
    };

    const formatted = this.formatEntry(entry);

    switch (level) {
      case 'error':
        console.error(formatted);
        break;
      case 'warn':
        console.warn(formatted);
        break;
      default:
        console.log(formatted);
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
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
}

/**
 * Create a logger for a specific layer
 */
export function createLogger(layer: string): Logger {
  const envLevel = process.env['LOG_LEVEL'];
  return new Logger(layer, isLogLevel(envLevel) ? envLevel : 'info');
}
