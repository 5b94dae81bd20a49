export interface LogMeta {
  [key: string]: unknown;
  accountName?: string;
  region?: string;
  method?: string;
}

export interface LogContext {
  accountName?: string;
  region?: string;
  environment?: string;
}

export class Logger {
  private serviceName: string;
  private defaultContext?: LogContext;

  constructor(serviceName: string, context?: LogContext) {
    this.serviceName = serviceName;
    this.defaultContext = context;
  }

  private formatMessage(
    level: string,
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

  info(message: string, meta?: LogMeta): void {
    console.log(this.formatMessage('info', message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.formatMessage('error', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    console.warn(this.formatMessage('warn', message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    const logLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();
    if (logLevel === 'debug') {
      console.log(this.formatMessage('debug', message, meta));
    }
  }

  /** Child logger sharing this logger's context under another service name. */
  child(serviceName: string): Logger {
    return new Logger(serviceName, this.defaultContext);
  }

  setContext(context: LogContext): void {
    this.defaultContext = context;
  }
}
