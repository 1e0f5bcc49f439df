import { describe, it, expect } from 'vitest';
import { REDACTED, redactSecrets } from '../../../../src/shared/logger/logger';

describe('redactSecrets log format', () => {
  it('masks secret-bearing keys and leaves the rest alone', () => {
    const out = redactSecrets().transform({
      level: 'info',
      message: 'memberships.purchase.success',
      intentId: 'pi_123',
      clientSecret: 'pi_123_secret_abc',
      signature: 't=1,v1=deadbeef',
    });

    expect(out).toEqual({
      level: 'info',
      message: 'memberships.purchase.success',
      intentId: 'pi_123',
      clientSecret: REDACTED,
      signature: REDACTED,
    });
  });
});
