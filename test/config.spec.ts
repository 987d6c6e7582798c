import { describe, expect, it } from 'vitest';
import { ConfigError, DEFAULT_CORS_ORIGINS, loadConfig } from '../src/config/env';

const SECRET = 'test-secret-for-unit-tests';

describe('loadConfig', () => {
  it('applies defaults when only the secret is set', () => {
    const config = loadConfig({ JWT_SECRET: SECRET });

    expect(config.port).toBe(8080);
    expect(config.host).toBe('0.0.0.0');
    expect(config.mongodbUri).toBe('mongodb://localhost:27017/hackathon-admin');
    expect(config.logLevel).toBe('info');
    expect(config.corsOrigins).toEqual(DEFAULT_CORS_ORIGINS);
    expect(config.auth).toEqual({ jwtSecret: SECRET, tokenTtlSeconds: 86400, bcryptRounds: 10 });
    expect(config.rateLimit).toEqual({ redisUrl: undefined, windowSeconds: 60, maxRequests: 100 });
    expect(config.admin).toEqual({ username: 'admin', password: undefined });
    expect(config.registration).toEqual({ numberPrefix: 'PCCOEIGC', teamIdPrefix: 'IGC' });
  });

  it('refuses to start without a signing secret', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow('Invalid configuration: JWT_SECRET: Required');
  });

  it('rejects a short secret', () => {
    expect(() => loadConfig({ JWT_SECRET: 'short' })).toThrow(
      'Invalid configuration: JWT_SECRET: must be at least 16 characters'
    );
  });

  it('appends extra CORS origins without duplicating the defaults', () => {
    const config = loadConfig({
      JWT_SECRET: SECRET,
      CORS_ORIGINS: 'https://admin.example.com, http://localhost:3000,'
    });

    expect(config.corsOrigins).toEqual([
      'http://localhost:3000',
      'http://127.0.0.1:3000',
      'https://admin.example.com'
    ]);
  });

  it('treats blank variables as unset', () => {
    const config = loadConfig({ JWT_SECRET: SECRET, REDIS_URL: '', PORT: '  ' });

    expect(config.rateLimit.redisUrl).toBeUndefined();
    expect(config.port).toBe(8080);
  });

  it('coerces numeric variables', () => {
    const config = loadConfig({
      JWT_SECRET: SECRET,
      PORT: '9090',
      RATE_LIMIT_MAX_REQUESTS: '5',
      JWT_EXPIRES_IN_SECONDS: '3600'
    });

    expect(config.port).toBe(9090);
    expect(config.rateLimit.maxRequests).toBe(5);
    expect(config.auth.tokenTtlSeconds).toBe(3600);
  });

  it('reports every invalid variable', () => {
    expect(() => loadConfig({ JWT_SECRET: SECRET, PORT: 'abc', LOG_LEVEL: 'loud' })).toThrow(/PORT: .*; LOG_LEVEL: /);
  });
});
