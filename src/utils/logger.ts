import { Logtail } from '@logtail/node';
import type { Context } from 'hono';
import type { AppConfig, AppEnv } from '../types/index.js';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  flush(): Promise<void>;
}

type Level = 'debug' | 'info' | 'warn' | 'error';

function createLogtailLogger(logtail: Logtail): Logger {
  const send = (level: Level, message: string, context: LogContext = {}) => {
    logtail[level](message, context).catch((error: unknown) => {
      console.error('[LOGGER] Failed to ship log', error);
    });
  };

  return {
    debug: (message, context) => send('debug', message, context),
    info: (message, context) => send('info', message, context),
    warn: (message, context) => send('warn', message, context),
    error: (message, context) => send('error', message, context),
    flush: () => logtail.flush(),
  };
}

function createConsoleLogger(): Logger {
  const write = (level: Level, message: string, context?: LogContext) => {
    if (context && Object.keys(context).length > 0) {
      console[level](message, context);
    } else {
      console[level](message);
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
    flush: async () => {},
  };
}

/**
 * Ship logs to Better Stack when a source token is configured, else log to the console
 */
export function createLogger(config: Pick<AppConfig, 'logtail'>): Logger {
  if (!config.logtail) {
    return createConsoleLogger();
  }

  const logtail = new Logtail(config.logtail.sourceToken, {
    ...(config.logtail.endpoint ? { endpoint: config.logtail.endpoint } : {}),
    ignoreExceptions: true,
  });
  return createLogtailLogger(logtail);
}

export function getLogger(c: Context<AppEnv>): Logger {
  const logger = c.get('logger');
  if (!logger) {
    throw new Error('Logger not initialized in context');
  }
  return logger;
}
