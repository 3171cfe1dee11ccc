import { describe, it, expect } from 'vitest';

import { ConfigError } from '@/common/errors/authErrors';
import { TEST_SECRET } from '@/tests/fakes';

import { loadConfig } from '..';

function configError(env: NodeJS.ProcessEnv): ConfigError | null {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  return null;
}

describe('loadConfig', () => {
  it('applies defaults around the required secret', () => {
    const config = loadConfig({ JWT_SECRET: TEST_SECRET });

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      JWT_ISSUER: 'access-gate',
      JWT_ACCESS_TTL_SECONDS: 900,
      JWT_REFRESH_ROTATION: false,
      PERMISSION_CACHE_TTL_SECONDS: 30,
      PERMISSION_FAIL_POLICY: 'closed',
      RATE_LIMIT_BACKEND: 'memory',
      RATE_LIMIT_FAIL_POLICY: 'closed',
      RATE_LIMIT_AUTH_MAX: 5,
      STORE_TIMEOUT_MS: 3000,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('requires the secret', () => {
    expect(configError({})?.details).toContain('JWT_SECRET: JWT_SECRET is required');
  });

  it('refuses a short secret', () => {
    expect(configError({ JWT_SECRET: 'test-secret' })?.details).toEqual([
      'JWT_SECRET: JWT_SECRET must be at least 32 characters long for security',
    ]);
  });

  it('parses booleans strictly', () => {
    expect(loadConfig({ JWT_SECRET: TEST_SECRET, JWT_REFRESH_ROTATION: 'true' }).JWT_REFRESH_ROTATION).toBe(true);
    expect(loadConfig({ JWT_SECRET: TEST_SECRET, JWT_REVOCATION: '0' }).JWT_REVOCATION).toBe(false);
    expect(configError({ JWT_SECRET: TEST_SECRET, JWT_REVOCATION: 'yes' })).toBeInstanceOf(ConfigError);
  });

  it('refuses a TTL above its maximum', () => {
    expect(
      configError({
        JWT_SECRET: TEST_SECRET,
        JWT_ACCESS_TTL_SECONDS: '7200',
        JWT_ACCESS_MAX_TTL_SECONDS: '3600',
      })?.details,
    ).toEqual(['JWT_ACCESS_TTL_SECONDS: JWT_ACCESS_TTL_SECONDS exceeds JWT_ACCESS_MAX_TTL_SECONDS']);
  });

  it('requires an explicit fail policy for the shared rate-limit backend', () => {
    expect(configError({ JWT_SECRET: TEST_SECRET, RATE_LIMIT_BACKEND: 'redis' })?.details).toEqual([
      'RATE_LIMIT_FAIL_POLICY: RATE_LIMIT_FAIL_POLICY must be set explicitly when RATE_LIMIT_BACKEND=redis',
    ]);
    expect(
      loadConfig({
        JWT_SECRET: TEST_SECRET,
        RATE_LIMIT_BACKEND: 'redis',
        RATE_LIMIT_FAIL_POLICY: 'open',
      }).RATE_LIMIT_FAIL_POLICY,
    ).toBe('open');
  });

  it('keeps store calls between 2 and 5 seconds', () => {
    expect(configError({ JWT_SECRET: TEST_SECRET, STORE_TIMEOUT_MS: '1000' })).toBeInstanceOf(
      ConfigError,
    );
    expect(configError({ JWT_SECRET: TEST_SECRET, STORE_TIMEOUT_MS: '6000' })).toBeInstanceOf(
      ConfigError,
    );
  });

  it('refuses schema synchronisation in production', () => {
    expect(
      configError({ JWT_SECRET: TEST_SECRET, NODE_ENV: 'production', DB_SYNCHRONIZE: 'true' })
        ?.details,
    ).toEqual(['DB_SYNCHRONIZE: DB_SYNCHRONIZE must be false in production environment']);
  });
});
