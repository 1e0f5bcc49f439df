import { describe, it, expect } from 'vitest';
import { buildConfig } from '../../../src/app/config';

const base = {
  DATABASE_URL: 'postgres://localhost/footy_hire',
  REDIS_URL: 'redis://localhost:6379',
};

describe('buildConfig', () => {
  it('applies defaults', () => {
    const config = buildConfig({ ...base, NODE_ENV: 'development' });

    expect(config.nodeEnv).toBe('development');
    expect(config.port).toBe(3000);
    expect(config.serviceName).toBe('footy-hire-backend');
    expect(config.payments).toEqual({ stripeSecretKey: '', webhookSecret: '', currency: 'usd' });
    expect(config.seed.enabled).toBe(false);
  });

  it('parses SEED_ON_START strictly', () => {
    expect(buildConfig({ ...base, SEED_ON_START: 'true' }).seed.enabled).toBe(true);
    expect(buildConfig({ ...base, SEED_ON_START: 'false' }).seed.enabled).toBe(false);
    expect(() => buildConfig({ ...base, SEED_ON_START: 'yes' })).toThrow();
  });

  it('requires Stripe secrets in production', () => {
    expect(() => buildConfig({ ...base, NODE_ENV: 'production' })).toThrowError(
      'STRIPE_SECRET_KEY is required in production',
    );

    const config = buildConfig({
      ...base,
      NODE_ENV: 'production',
      STRIPE_SECRET_KEY: 'test-secret',
      STRIPE_WEBHOOK_SECRET: 'test-secret',
    });
    expect(config.payments.stripeSecretKey).toBe('test-secret');
  });

  it('rejects unknown environments', () => {
    expect(() => buildConfig({ ...base, NODE_ENV: 'staging' })).toThrow();
  });
});
