import jwt from 'jsonwebtoken';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { AuthService } from '../src/services/authService';
import { bearer, createTestApp, TEST_SECRET } from './helpers/app';
import { MemoryUserStore } from './helpers/memoryStores';

describe('AuthService', () => {
  const auth = new AuthService(new MemoryUserStore(), {
    jwtSecret: TEST_SECRET,
    tokenTtlSeconds: 60,
    bcryptRounds: 4
  });
  const claims = { id: '65f000000000000000000001', username: 'judge1', role: 'judge' as const };

  it('issues tokens that carry the user claims and expire after the ttl', () => {
    const token = auth.generateToken(claims);
    const decoded = jwt.decode(token);

    expect(decoded).toMatchObject(claims);
    if (decoded === null || typeof decoded === 'string') {
      throw new Error('expected an object payload');
    }
    expect((decoded.exp ?? 0) - (decoded.iat ?? 0)).toBe(60);
    expect(auth.verifyToken(token)).toEqual(claims);
  });

  it('hashes passwords with bcrypt', async () => {
    const hash = await auth.hashPassword('password123');
    expect(hash).not.toBe('password123');
    expect(hash.startsWith('$2b$04$')).toBe(true);
  });

  it('treats a token without a role claim as a plain user', () => {
    const token = jwt.sign({ id: claims.id, username: 'someone' }, TEST_SECRET, { algorithm: 'HS256' });
    expect(auth.verifyToken(token)).toEqual({ id: claims.id, username: 'someone', role: 'user' });
  });

  it('rejects tokens signed with another secret', () => {
    const token = jwt.sign(claims, 'another-test-secret-value', { algorithm: 'HS256' });
    expect(() => auth.verifyToken(token)).toThrow('Invalid or expired token');
  });

  it('rejects expired tokens', () => {
    const token = jwt.sign({ ...claims, exp: Math.floor(Date.now() / 1000) - 60 }, TEST_SECRET, { algorithm: 'HS256' });
    expect(() => auth.verifyToken(token)).toThrow('Invalid or expired token');
  });

  it('rejects tokens whose claims have the wrong shape', () => {
    const token = jwt.sign({ username: 'no-id', role: 'admin' }, TEST_SECRET, { algorithm: 'HS256' });
    expect(() => auth.verifyToken(token)).toThrow('Invalid token claims');
  });

  it('rejects tokens with an unknown role', () => {
    const token = jwt.sign({ ...claims, role: 'superuser' }, TEST_SECRET, { algorithm: 'HS256' });
    expect(() => auth.verifyToken(token)).toThrow('Invalid token claims');
  });
});

describe('POST /api/v1/auth/login', () => {
  let ctx: Awaited<ReturnType<typeof createTestApp>>;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('returns a token whose role matches the stored user', async () => {
    const { user } = await ctx.seedUser('admin1', 'admin');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { username: 'admin1', password: 'password123' }
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.message).toBe('Login successful');
    expect(body.user).toEqual({ id: user.id, username: 'admin1', role: 'admin' });
    expect(ctx.services.authService.verifyToken(body.token)).toEqual({
      id: user.id,
      username: 'admin1',
      role: 'admin'
    });
  });

  it('returns 401 without a token for a wrong password', async () => {
    await ctx.seedUser('admin1', 'admin');

    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { username: 'admin1', password: 'wrong-password' }
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Invalid credentials' });
  });

  it('returns 401 for an unknown user', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { username: 'ghost', password: 'password123' }
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Invalid credentials' });
  });

  it('validates the body', async () => {
    const response = await ctx.app.inject({
      method: 'POST',
      url: '/api/v1/auth/login',
      payload: { username: 'admin1' }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      error: 'Invalid request data',
      details: [{ path: 'password', message: 'Required' }]
    });
  });
});

describe('authentication middleware', () => {
  let ctx: Awaited<ReturnType<typeof createTestApp>>;

  beforeEach(async () => {
    ctx = await createTestApp();
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it('requires a bearer token', async () => {
    const missing = await ctx.app.inject({ method: 'GET', url: '/api/v1/users' });
    const basic = await ctx.app.inject({
      method: 'GET',
      url: '/api/v1/users',
      headers: { authorization: 'Basic YWRtaW46cGFzcw==' }
    });

    for (const response of [missing, basic]) {
      expect(response.statusCode).toBe(401);
      expect(response.json()).toEqual({ error: 'Missing or invalid Authorization header' });
    }
  });

  it('rejects a malformed token', async () => {
    const response = await ctx.app.inject({
      method: 'GET',
      url: '/api/v1/users',
      headers: bearer('not.a.token')
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({ error: 'Invalid or expired token' });
  });

  it('admits a token without a role claim to token-only routes', async () => {
    const token = jwt.sign({ id: '65f000000000000000000009', username: 'viewer' }, TEST_SECRET, { algorithm: 'HS256' });

    const response = await ctx.app.inject({ method: 'GET', url: '/api/v1/users', headers: bearer(token) });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ users: [], pagination: { page: 1, limit: 10, total: 0 } });
  });
});
