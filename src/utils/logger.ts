import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { config } from '../config';

export type Logger = winston.Logger;

const isProduction = config.server.nodeEnv === 'production';
const writeLogFiles = config.server.nodeEnv !== 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json(),
);

const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, stack }) => {
    return `${timestamp} [${level}]: ${stack || message}`;
  }),
);

if (writeLogFiles && !existsSync('logs')) {
  mkdirSync('logs', { recursive: true });
}

const fileTransports: winston.transports.FileTransportInstance[] = writeLogFiles
  ? [
      new winston.transports.File({
        filename: 'logs/error.log',
        level: 'error',
        format: logFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: 'logs/combined.log',
        format: logFormat,
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
    ]
  : [];

export const logger = winston.createLogger({
  level: config.server.logLevel,
  format: isProduction ? logFormat : consoleFormat,
  transports: [
    new winston.transports.Console({
      format: isProduction ? logFormat : consoleFormat,
    }),
    ...fileTransports,
  ],
  exceptionHandlers: writeLogFiles
    ? [
        new winston.transports.File({
          filename: 'logs/exceptions.log',
          format: logFormat,
          maxsize: 5242880,
          maxFiles: 5,
        }),
      ]
    : [],
  rejectionHandlers: writeLogFiles
    ? [
        new winston.transports.File({
          filename: 'logs/rejections.log',
          format: logFormat,
          maxsize: 5242880,
          maxFiles: 5,
        }),
      ]
    : [],
});

export default logger;
