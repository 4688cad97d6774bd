import pino from 'pino';
import { getEnvironmentConfig } from './env';

export interface LogContext {
  symbol?: string;
  entityId?: string;
  operation?: string;
  [key: string]: unknown;
}

let logger: pino.Logger | null = null;

export function createLogger(): pino.Logger {
  if (logger) {
    return logger;
  }

  const env = getEnvironmentConfig();

  const loggerConfig: pino.LoggerOptions = {
    level: env.LOG_LEVEL,
    base: {
      pid: process.pid,
      hostname: process.env['HOSTNAME'] || 'unknown',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  };

  // Add pretty printing for development
  if (env.NODE_ENV === 'development') {
    loggerConfig.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  }

  logger = pino(loggerConfig);
  return logger;
}

export function getLogger(): pino.Logger {
  if (!logger) {
    return createLogger();
  }
  return logger;
}

/**
 * Child logger bound to one engine component.
 */
export function getComponentLogger(component: string): pino.Logger {
  return getLogger().child({ component });
}

export function logEngineStartup(mode: string, environment: string): void {
  getLogger().info(
    {
      event: 'engine_startup',
      mode,
      environment,
      nodeVersion: process.version,
      platform: process.platform,
    },
    'Engine starting up'
  );
}

export function logEngineShutdown(reason?: string): void {
  getLogger().info(
    {
      event: 'engine_shutdown',
      reason,
    },
    'Engine shutting down'
  );
}

export function logError(error: Error, context?: LogContext): void {
  getLogger().error(
    {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      ...context,
    },
    'Error occurred'
  );
}
