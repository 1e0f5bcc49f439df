/**
 * backend/src/shared/logger/logger.ts
 *
 * WHY:
 * - Central logger instance (structured JSON logs).
 * - Adds stable metadata (service, env) for log querying.
 * - Payment credentials never reach log storage: known secret-bearing keys are
 *   masked at the format stage, whoever logged them.
 *
 * HOW TO USE:
 * - Import `logger` anywhere you need logs.
 * - Prefer `withRequestContext(req)` inside request handlers.
 * - Pass errors as `{ err }` so stack/message is preserved.
 */

import winston from 'winston';

const nodeEnv = process.env.NODE_ENV ?? 'development';
const service = process.env.SERVICE_NAME ?? 'footy-hire-backend';
const level = process.env.LOG_LEVEL ?? 'info';

export const REDACTED = '[REDACTED]';

/** Top-level meta keys that may carry gateway or session credentials. */
export const REDACTED_LOG_KEYS: ReadonlySet<string> = new Set([
  'clientSecret',
  'client_secret',
  'signature',
  'stripeSecretKey',
  'webhookSecret',
  'rawBody',
]);

export const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (REDACTED_LOG_KEYS.has(key)) info[key] = REDACTED;
  }
  return info;
});

export const logger = winston.createLogger({
  level,
  format: winston.format.combine(
    redactSecrets(),
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json(),
  ),
  defaultMeta: {
    service,
    env: nodeEnv,
  },
  transports: [new winston.transports.Console()],
});

export type Logger = typeof logger;
