import winston from 'winston';
import { env, EnvConfig } from './env';

export interface LogContext {
  handleId?: string;
  source?: string;
  [key: string]: unknown;
}

/**
 * Per-service winston logger. Load sessions are correlated by `handleId`
 * rather than a request id.
 */
class Logger {
  private logger: winston.Logger;

  constructor(serviceName: string, config: EnvConfig = env) {
    this.logger = winston.createLogger({
      level: config.LOG_LEVEL,
      // Jest sets NODE_ENV=test
      silent: config.NODE_ENV === 'test',
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      ),
      defaultMeta: { service: serviceName },
      transports: [new winston.transports.Console()]
    });
  }

  get level(): string {
    return this.logger.level;
  }

  get silent(): boolean {
    return this.logger.silent;
  }

  info(message: string, context: LogContext = {}): void {
    this.logger.info(message, context);
  }

  error(message: string, error?: Error, context: LogContext = {}): void {
    this.logger.error(message, {
      ...context,
      error: error ? { message: error.message, name: error.name, stack: error.stack } : undefined
    });
  }

  warn(message: string, context: LogContext = {}): void {
    this.logger.warn(message, context);
  }

  debug(message: string, context: LogContext = {}): void {
    this.logger.debug(message, context);
  }

  logTransition(handleId: string, from: string, to: string): void {
    this.debug('Load state transition', { handleId, from, to });
  }
}

export function createLogger(serviceName: string, config?: EnvConfig): Logger {
  return new Logger(serviceName, config);
}

export { Logger };
