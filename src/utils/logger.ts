import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { redactPII } from './redact.js';

const logsDir = path.join(process.cwd(), process.env.LOG_DIR || 'logs');
const isTest = process.env.NODE_ENV === 'test';
const logLevel = process.env.LOG_LEVEL || 'info';

/**
 * Redact PII from every string field of the log entry. Symbol keys that winston
 * relies on (level, message) are left in place.
 */
const redact = winston.format((info) => {
  const redacted: Record<string, unknown> = JSON.parse(redactPII(JSON.stringify(info)));
  return Object.assign(info, redacted);
});

const transports: winston.transport[] = [];

if (isTest) {
  transports.push(new winston.transports.Console({ silent: true }));
} else {
  try {
    fs.mkdirSync(logsDir, { recursive: true });
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error'
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log')
      })
    );
  } catch (error) {
    // If we can't create the logs dir, just use the console
    console.error('Failed to create logs directory:', error);
  }

  if (process.env.NODE_ENV !== 'production') {
    transports.push(
      new winston.transports.Console({
        stderrLevels: ['error', 'warn', 'info', 'debug'],
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple()
        )
      })
    );
  }
}

export const logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.splat(),
    redact(),
    winston.format.json()
  ),
  defaultMeta: { service: 'lms-inactivity-monitor' },
  transports,
  exitOnError: false
});

/**
 * Logger whose entries carry the scan cycle identifier
 */
export function getCycleLogger(cycleId: string): winston.Logger {
  return logger.child({ cycle_id: cycleId });
}
