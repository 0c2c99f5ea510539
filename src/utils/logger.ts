// src/utils/logger.ts - Logging utility
import winston from 'winston';
import path from 'path';

const logsDir = process.env.IRACING_LOG_DIR;

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const consoleTransport = new winston.transports.Console({
  format: winston.format.combine(
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, ...meta }) => {
      const metaString = Object.keys(meta).length > 0
        ? ` ${JSON.stringify(meta)}`
        : '';
      return `${timestamp} ${level}: ${message}${metaString}`;
    })
  )
});

// File transports only when a log directory is configured
const transports = logsDir
  ? [
      consoleTransport,
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error'
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log')
      })
    ]
  : [consoleTransport];

export const logger = winston.createLogger({
  level: process.env.IRACING_LOG_LEVEL
    || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  format: logFormat,
  defaultMeta: { service: 'iracing-data-client' },
  transports
});

export default logger;
