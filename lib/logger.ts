import pino from 'pino';
import { DEFAULT_LOG_TIMEZONE } from './constants';

const TIMEZONE = process.env.LOG_TIMEZONE ?? DEFAULT_LOG_TIMEZONE;
const isDevelopment = process.env.NODE_ENV !== 'production';
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

// Cached DateTimeFormat instance for performance
const cachedFormatter = new Intl.DateTimeFormat('en-GB', {
  timeZone: TIMEZONE,
  year: 'numeric',
  month: '2-digit',
  day: '2-digit',
  hour: '2-digit',
  minute: '2-digit',
  second: '2-digit',
  hour12: false,
});

/**
 * Format date as `YYYY-MM-DD HH:mm:ss` in the configured timezone
 */
function formatLogDate(date: Date): string {
  const parts = cachedFormatter.formatToParts(date);
  const get = (type: string): string => parts.find(p => p.type === type)?.value ?? '';

  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')}`;
}

const timestampLocal = (): string => `,"time":"${formatLogDate(new Date())}"`;

function getLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (isTest) {
    return 'silent';
  }
  return isDevelopment ? 'debug' : 'info';
}

// Pretty console output in development; plain JSON otherwise.
// No transport under test: the worker thread would outlive the run.
function getTransport(): pino.TransportSingleOptions | undefined {
  if (!isDevelopment || isTest) {
    return undefined;
  }

  return {
    target: 'pino-pretty',
    options: {
      colorize: true,
      ignore: 'pid,hostname',
      // Don't translate time - we already format it in the configured timezone
      translateTime: false,
    },
  };
}

export const logger = pino({
  level: getLevel(),
  timestamp: timestampLocal,
  transport: getTransport(),
});

export default logger;
