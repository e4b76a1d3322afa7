import { TraceContext } from '../../types/CommonTypes';

export interface LogMeta {
  [key: string]: unknown;
  traceId?: string;
  entity?: string;
  month?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_RANK;
}

/** Threshold from LOG_LEVEL, read on every call; unknown values mean info. */
function currentThreshold(): number {
  const configured = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return LEVEL_RANK[isLogLevel(configured) ? configured : 'info'];
}

export interface LoggerOptions {
  /** 'stderr' sends info and debug lines to stderr, leaving stdout to the program's output. */
  sink?: 'stdout' | 'stderr';
}

export class Logger {
  private serviceName: string;
  private defaultContext?: Partial<TraceContext>;
  private options: LoggerOptions;

  constructor(serviceName: string, context?: Partial<TraceContext>, options: LoggerOptions = {}) {
    this.serviceName = serviceName;
    this.defaultContext = context;
    this.options = options;
  }

  private formatMessage(
    level: LogLevel,
    message: string,
    meta?: LogMeta
  ): string {
    const timestamp = new Date().toISOString();
    const enrichedMeta = {
      ...this.defaultContext,
      ...meta,
    };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= currentThreshold();
  }

  private writeOut(line: string): void {
    if (this.options.sink === 'stderr') {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  info(message: string, meta?: LogMeta): void {
    if (this.enabled('info')) {
      this.writeOut(this.formatMessage('info', message, meta));
    }
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.formatMessage('error', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    if (this.enabled('warn')) {
      console.warn(this.formatMessage('warn', message, meta));
    }
  }

  debug(message: string, meta?: LogMeta): void {
    if (this.enabled('debug')) {
      this.writeOut(this.formatMessage('debug', message, meta));
    }
  }

  setContext(context: Partial<TraceContext>): void {
    this.defaultContext = context;
  }

  /** Same service, context extended with `context` (e.g. the month being evaluated). */
  child(context: Partial<TraceContext>): Logger {
    return new Logger(this.serviceName, { ...this.defaultContext, ...context }, this.options);
  }
}
