import path from 'path';
import winston from 'winston';
import { config } from './config.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}]: ${message}`;

  // Add stack trace for errors
  if (stack) {
    log += `\n${stack}`;
  }

  // Add metadata if present
  if (Object.keys(meta).length > 0) {
    log += ` ${JSON.stringify(meta)}`;
  }

  return log;
});

function createTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    // Console output with colors
    new winston.transports.Console({
      format: combine(
        colorize(),
        timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        logFormat
      ),
    }),
  ];

  const { dir, maxFileSize } = config.logging;
  if (dir) {
    transports.push(
      // File output for errors
      new winston.transports.File({
        filename: path.join(dir, 'error.log'),
        level: 'error',
        maxsize: maxFileSize,
        maxFiles: 5,
      }),
      // File output for all logs
      new winston.transports.File({
        filename: path.join(dir, 'combined.log'),
        maxsize: maxFileSize,
        maxFiles: 5,
      })
    );
  }

  return transports;
}

// Create logger instance
export const logger = winston.createLogger({
  level: config.logging.level,
  silent: config.logging.silent,
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports: createTransports(),
});
