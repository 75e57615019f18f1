import winston from 'winston';
import * as path from 'path';
import fs from 'fs-extra';
import { config } from '../config.js';

// Ensure logs directory exists
const logsDir = config.LOG_DIR;
fs.ensureDirSync(logsDir);

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    return JSON.stringify({
      timestamp,
      level,
      message,
      ...meta
    });
  })
);

export const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  format: logFormat,
  defaultMeta: { service: 'infoschema-catalog' },
  transports: [
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5
    }),
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5
    }),
  ],
});

// Console output outside production; tests keep the console quiet
if (config.NODE_ENV !== 'production' && config.NODE_ENV !== 'test') {
  logger.add(new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple(),
      winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const metaString = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
        return `${timestamp} ${level}: ${message} ${metaString}`;
      })
    )
  }));
}

export const catalogLogger = logger.child({ component: 'catalog' });
export const apiLogger = logger.child({ component: 'api' });
export const cliLogger = logger.child({ component: 'cli' });
export const databaseLogger = logger.child({ component: 'database' });
