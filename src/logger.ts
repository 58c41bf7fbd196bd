import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
}

export interface LoggerConfig {
  level?: LogLevel;
}

const env = process.env.NODE_ENV;
const usePretty = env !== 'production' && env !== 'test';

const baseLogger = pino({
  level: 'info',
  transport: usePretty
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: () => `,"timestamp":"${new Date().toISOString()}"`,
});

/**
 * Creates a logger bound to one component. Payload fields go first so pino
 * keeps them as structured properties next to the message.
 */
export function createLogger(service: string, config?: LoggerConfig): Logger {
  const logger = baseLogger.child({ service });
  if (config?.level) logger.level = config.level;

  const emit = (level: LogLevel) => (message: string, data?: Record<string, unknown>) => {
    if (data) {
      logger[level](data, message);
    } else {
      logger[level](message);
    }
  };

  return {
    debug: emit('debug'),
    info: emit('info'),
    warn: emit('warn'),
    error: emit('error'),
  };
}
