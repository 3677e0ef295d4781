import pino, { type Level } from 'pino';
import { loggerConfig } from './config.js';

export const logger = loggerConfig.transport
  ? pino(loggerConfig)
  : pino(loggerConfig, pino.destination(2));

export type SettingsLogLevel = 'debug' | 'info' | 'warning' | 'error';

const PINO_LEVELS: Record<SettingsLogLevel, Level> = {
  debug: 'debug',
  info: 'info',
  warning: 'warn',
  error: 'error',
};

/**
 * Applies the level from the settings file unless LOG_LEVEL pins it.
 * `force` is used by --debug and wins over both.
 */
export const setLogLevel = (level: SettingsLogLevel, force = false) => {
  if (process.env.LOG_LEVEL && !force) return;
  logger.level = PINO_LEVELS[level];
};

// Typed convenience methods
export const logDebug = (component: string, message: string, data?: object) => {
  logger.debug({ component, ...data }, message);
};

export const logInfo = (component: string, message: string, data?: object) => {
  logger.info({ component, ...data }, message);
};

export const logWarn = (component: string, message: string, data?: object) => {
  logger.warn({ component, ...data }, message);
};

export const logError = (
  component: string,
  message: string,
  error?: Error | unknown
) => {
  logger.error(
    {
      component,
      err: error instanceof Error ? error : new Error(String(error)),
    },
    message
  );
};
