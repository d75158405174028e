/**
 * Winston-based logger module
 */

import winston from 'winston';
import { envVars } from './env_vars.js';
import { join } from 'path';
import { existsSync, mkdirSync } from 'fs';

/**
 * Log levels
 */
const levels: winston.config.AbstractConfigSetLevels = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

/**
 * Log level colors
 */
const colors: winston.config.AbstractConfigSetColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  debug: 'cyan',
};

winston.addColors(colors);

/**
 * Custom format for console output
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.colorize({ all: true }),
  winston.format.printf((info) => {
    const { timestamp, level, message, service, ...meta } = info;
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
  })
);

/**
 * Custom format for file output
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.json()
);

/**
 * Resolve log level from environment, falling back to info
 */
export function getLogLevel(): string {
  const level = envVars.WORDCASE_LOGGING_LEVEL.toLowerCase();
  if (level in levels) {
    return level;
  }
  return 'info';
}

const loggerCache = new Map<string, winston.Logger>();

/**
 * Initialize and return a logger instance
 */
export function initLogger(name: string = 'wordcase'): winston.Logger {
  const cached = loggerCache.get(name);
  if (cached) {
    return cached;
  }

  const transports: winston.transport[] = [];
  const logLevel = getLogLevel();

  const logPath = envVars.WORDCASE_LOGGING_PATH;
  const logFileName = envVars.WORDCASE_LOGGING_FILE_NAME;

  if (logPath) {
    if (!existsSync(logPath)) {
      mkdirSync(logPath, { recursive: true });
    }

    transports.push(
      new winston.transports.File({
        filename: join(logPath, logFileName),
        format: fileFormat,
        level: logLevel,
      })
    );
  } else {
    transports.push(
      new winston.transports.Console({
        format: consoleFormat,
        level: logLevel,
      })
    );
  }

  const logger = winston.createLogger({
    levels,
    defaultMeta: { service: name },
    transports,
  });

  loggerCache.set(name, logger);

  return logger;
}

/**
 * Get or create a child logger
 */
export function getChildLogger(parentName: string, childName: string): winston.Logger {
  return initLogger(`${parentName}:${childName}`);
}

/**
 * Default logger instance
 */
export const defaultLogger = initLogger('wordcase');

export type Logger = winston.Logger;
