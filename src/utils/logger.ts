import winston from 'winston';
import path from 'path';
import 'winston-daily-rotate-file';
import { format } from 'winston';
import { Request, Response, NextFunction } from 'express';
import { logConfig } from '../config';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Define colors for different log levels
const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'blue',
};

winston.addColors(colors);

const renderMeta = (info: winston.Logform.TransformableInfo): string => {
  const { timestamp, level, message, service, ...rest } = info;
  const keys = Object.keys(rest);
  return keys.length > 0 ? ` ${JSON.stringify(rest)}` : '';
};

// Custom log format
const logFormat = format.combine(
  format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}${renderMeta(info)}`
  )
);

const fileTransports = (): winston.transport[] => [
  // Everything at `info` and below
  new winston.transports.DailyRotateFile({
    filename: path.join(logConfig.directory, 'application-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '14d',
    zippedArchive: true,
  }),
  // Errors only
  new winston.transports.DailyRotateFile({
    level: 'error',
    filename: path.join(logConfig.directory, 'error-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '30d',
    zippedArchive: true,
  }),
  // HTTP requests
  new winston.transports.DailyRotateFile({
    level: 'http',
    filename: path.join(logConfig.directory, 'http-%DATE%.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '14d',
    zippedArchive: true,
  }),
];

const logger = winston.createLogger({
  level: logConfig.level,
  levels,
  format: logFormat,
  defaultMeta: { service: 'card-repository-loader' },
  transports: logConfig.toFile ? fileTransports() : [],
  exitOnError: false,
});

// Console output outside production; silent under jest
if (logConfig.console) {
  logger.add(
    new winston.transports.Console({
      silent: logConfig.silent,
      format: format.combine(format.colorize({ all: true }), logFormat),
    })
  );
}

// Log HTTP requests
const httpLogger = (req: Request, res: Response, next: NextFunction) => {
  if (req.path === '/health') {
    return next();
  }

  const start = Date.now();
  const { method, originalUrl, ip, headers } = req;

  logger.http(`[${method}] ${originalUrl} - IP: ${ip} - Started`);

  res.on('finish', () => {
    const { statusCode } = res;
    const responseTime = Date.now() - start;
    const contentLength = res.get('content-length') || 0;

    let logLevel = 'http';
    if (statusCode >= 500) {
      logLevel = 'error';
    } else if (statusCode >= 400) {
      logLevel = 'warn';
    }

    logger.log({
      level: logLevel,
      message: `[${method}] ${originalUrl} - ${statusCode} - ${responseTime}ms - ${contentLength}b`,
      meta: {
        method,
        url: originalUrl,
        status: statusCode,
        responseTime: `${responseTime}ms`,
        userAgent: headers['user-agent'],
      },
    });
  });

  next();
};

export { logger, httpLogger };
