import winston from 'winston';
import * as fs from 'fs';
import * as dotenv from 'dotenv';
import type { CaptureMiss, RankedSnapshot, TickSummary } from '../types/common';

dotenv.config();

const logLevel = process.env.LOG_LEVEL || 'info';
const isTest = process.env.NODE_ENV === 'test';

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    ),
  }),
];

if (!isTest) {
  // Create logs directory if it doesn't exist
  if (!fs.existsSync('logs')) {
    fs.mkdirSync('logs');
  }

  transports.push(
    new winston.transports.File({
      filename: 'logs/error.log',
      level: 'error',
    }),
    new winston.transports.File({
      filename: 'logs/combined.log',
    })
  );
}

export const logger = winston.createLogger({
  level: logLevel,
  silent: isTest,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss',
    }),
    winston.format.errors({ stack: true }),
    winston.format.json(),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      return `${timestamp} [${level.toUpperCase()}]: ${message} ${
        Object.keys(meta).length > 0 ? JSON.stringify(meta, null, 2) : ''
      }`;
    })
  ),
  defaultMeta: { service: 'funding-capture' },
  transports,
});

// Helper functions for structured logging
export const logError = (error: Error, context?: Record<string, unknown>): void => {
  logger.error('Error occurred', {
    name: error.name,
    message: error.message,
    stack: error.stack,
    context,
  });
};

export const logRanking = (snapshot: RankedSnapshot): void => {
  logger.info('Round ranked', {
    eventKey: snapshot.eventKey,
    topSymbols: snapshot.topSymbols,
    rates: snapshot.rates,
    computedAt: snapshot.computedAt.toISOString(),
  });
};

export const logCapture = (data: {
  eventKey: string;
  symbols: string[];
  rows: number;
  failed: number;
  complete: boolean;
}): void => {
  if (data.failed === 0) {
    logger.info('Capture batch written', data);
  } else {
    logger.warn('Capture batch incomplete', data);
  }
};

export const logMiss = (miss: CaptureMiss): void => {
  logger.warn('Capture miss recorded', {
    ...miss,
    recordedAt: miss.recordedAt.toISOString(),
  });
};

export const logTick = (summary: TickSummary): void => {
  logger.info('Tick finished', {
    tickId: summary.tickId,
    skipped: summary.skipped,
    roundsSeen: summary.roundsSeen,
    ranked: summary.ranked,
    captured: summary.captured,
    failures: summary.failures.length,
    misses: summary.misses.length,
    durationMs: summary.finishedAt.getTime() - summary.startedAt.getTime(),
  });
};
