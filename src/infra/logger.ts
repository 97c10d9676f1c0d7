import winston from 'winston';
import type { Env } from './env.js';

const REDACTED = '***REDACTED***';

const SECRET_PATTERN = /\b(password|api[_-]?key|token|secret)([=:]\s*["']?)([^"'\s]+)/gi;

// 10-digit US numbers in any of the layouts technicians type
const PHONE_PATTERN = /(?<![\w-])\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?(\d{4})(?![\w-])/g;

const SECRET_FIELDS = new Set(['password', 'apiKey', 'token', 'secret']);
const PHONE_FIELDS = new Set(['phone']);

function maskPhone(value: string): string {
  return value.replace(PHONE_PATTERN, (_match, last4: string) => `***-***-${last4}`);
}

/**
 * Masks secrets and customer phone numbers before anything reaches a transport.
 * Parse failures echo message lines back, so free text is scanned as well as keys.
 */
export function redactSensitive(value: unknown): unknown {
  if (typeof value === 'string') {
    return maskPhone(
      value.replace(SECRET_PATTERN, (_match, key: string, separator: string) => `${key}${separator}${REDACTED}`)
    );
  }

  if (Array.isArray(value)) {
    return value.map(redactSensitive);
  }

  if (value instanceof Date || value instanceof Error || value === null || typeof value !== 'object') {
    return value;
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(value)) {
    if (SECRET_FIELDS.has(key)) {
      redacted[key] = REDACTED;
    } else if (PHONE_FIELDS.has(key) && typeof field === 'string') {
      redacted[key] = field.length > 4 ? `***${field.slice(-4)}` : field;
    } else {
      redacted[key] = redactSensitive(field);
    }
  }
  return redacted;
}

const redactFormat = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key !== 'level') {
      info[key] = redactSensitive(info[key]);
    }
  }
  return info;
});

const consoleLine = winston.format.printf(({ timestamp, level, message, ...meta }) => {
  const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${String(timestamp)} [${level}]: ${String(message)}${details}`;
});

/**
 * Console always; JSON lines to LOG_FILE as well when one is configured
 */
export function createLogger(env: Pick<Env, 'NODE_ENV' | 'LOG_LEVEL' | 'LOG_FILE'>): winston.Logger {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
        consoleLine
      ),
    }),
  ];

  if (env.LOG_FILE) {
    transports.push(
      new winston.transports.File({
        filename: env.LOG_FILE,
        format: winston.format.combine(winston.format.timestamp(), winston.format.json()),
      })
    );
  }

  return winston.createLogger({
    level: env.LOG_LEVEL,
    silent: env.NODE_ENV === 'test',
    format: winston.format.combine(winston.format.errors({ stack: true }), redactFormat()),
    transports,
    exitOnError: false,
  });
}

/**
 * Shared instance. server.ts and the CLI swap in one built from the
 * validated environment; until then it logs at info to the console.
 */
export let logger: winston.Logger = createLogger({
  NODE_ENV: process.env.NODE_ENV === 'test' ? 'test' : 'development',
  LOG_LEVEL: 'info',
  LOG_FILE: undefined,
});

export function setLogger(instance: winston.Logger): void {
  logger = instance;
}
