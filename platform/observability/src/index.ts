import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import pino from 'pino';
import { readConfig, type LoggerConfig } from '@huddle/shared';

export const initOtel = (logLevel: DiagLogLevel = DiagLogLevel.ERROR): void => {
  diag.setLogger(new DiagConsoleLogger(), logLevel);
  // OTLP exporter + SDK initialization goes here once a vendor is chosen.
};

export const loggerConfig = (): LoggerConfig => {
  const config = readConfig();
  return {
    level: config.LOG_LEVEL,
    transport:
      config.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard' },
          }
        : undefined,
  };
};

const baseLogger = pino(loggerConfig());

export const logger = {
  child: (bindings?: Record<string, unknown>) => baseLogger.child(bindings ?? {}),
  info: (msg: string, meta?: Record<string, unknown>) => baseLogger.info(meta ?? {}, msg),
  warn: (msg: string, meta?: Record<string, unknown>) => baseLogger.warn(meta ?? {}, msg),
  error: (msg: string, meta?: Record<string, unknown>) => baseLogger.error(meta ?? {}, msg),
};
