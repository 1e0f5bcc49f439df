/**
 * backend/src/app/config.ts
 *
 * WHY:
 * - Central place for env parsing + validation (12-factor friendly).
 * - Prevents "undefined env var" bugs at runtime.
 *
 * HOW TO USE:
 * - In dev, we load backend/.env via dotenv.
 * - In prod, the platform injects env vars (no file).
 *
 * TYPING:
 * - nodeEnv is a union ('development' | 'test' | 'production'), not a plain string.
 *   Comparisons in di.ts (nodeEnv === 'test', nodeEnv === 'production') stay
 *   exhaustive and invalid values ('prod', 'staging') fail at startup.
 *
 * PAYMENTS:
 * - Empty STRIPE_SECRET_KEY selects the in-memory gateway (dev/test only).
 * - Production refuses to start without both Stripe secrets.
 */

import 'dotenv/config';
import { z } from 'zod';

const NodeEnvSchema = z.enum(['development', 'test', 'production']).default('development');

const BooleanFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const ConfigSchema = z
  .object({
    NODE_ENV: NodeEnvSchema,
    PORT: z.coerce.number().default(3000),

    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),

    // Logging / service identity
    LOG_LEVEL: z
      .enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'])
      .default('info'),
    SERVICE_NAME: z.string().default('footy-hire-backend'),

    // Session
    SESSION_TTL_SECONDS: z.coerce.number().int().min(300).max(604800).default(86400),

    // Payments
    STRIPE_SECRET_KEY: z.string().default(''),
    STRIPE_WEBHOOK_SECRET: z.string().default(''),
    PAYMENT_CURRENCY: z
      .string()
      .regex(/^[a-z]{3}$/)
      .default('usd'),

    // DEV seed bootstrap (idempotent)
    SEED_ON_START: BooleanFromEnv,
    SEED_ADMIN_EMAIL: z.string().email().default('admin@example.com'),
    SEED_TEAM_EMAIL: z.string().email().default('club@example.com'),
    SEED_CANDIDATE_EMAIL: z.string().email().default('candidate@example.com'),
  })
  .superRefine((env, ctx) => {
    if (env.NODE_ENV !== 'production') return;

    if (!env.STRIPE_SECRET_KEY) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STRIPE_SECRET_KEY'],
        message: 'STRIPE_SECRET_KEY is required in production',
      });
    }
    if (!env.STRIPE_WEBHOOK_SECRET) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['STRIPE_WEBHOOK_SECRET'],
        message: 'STRIPE_WEBHOOK_SECRET is required in production',
      });
    }
  });

export type NodeEnv = z.infer<typeof NodeEnvSchema>;

export type AppConfig = {
  nodeEnv: NodeEnv;
  port: number;
  databaseUrl: string;
  redisUrl: string;

  logLevel: string;
  serviceName: string;

  sessionTtlSeconds: number;

  payments: {
    stripeSecretKey: string;
    webhookSecret: string;
    currency: string;
  };

  seed: {
    enabled: boolean;
    adminEmail: string;
    teamEmail: string;
    candidateEmail: string;
  };
};

export function buildConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = ConfigSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    databaseUrl: parsed.DATABASE_URL,
    redisUrl: parsed.REDIS_URL,

    logLevel: parsed.LOG_LEVEL,
    serviceName: parsed.SERVICE_NAME,

    sessionTtlSeconds: parsed.SESSION_TTL_SECONDS,

    payments: {
      stripeSecretKey: parsed.STRIPE_SECRET_KEY,
      webhookSecret: parsed.STRIPE_WEBHOOK_SECRET,
      currency: parsed.PAYMENT_CURRENCY,
    },

    seed: {
      enabled: parsed.SEED_ON_START,
      adminEmail: parsed.SEED_ADMIN_EMAIL,
      teamEmail: parsed.SEED_TEAM_EMAIL,
      candidateEmail: parsed.SEED_CANDIDATE_EMAIL,
    },
  };
}
