import request from 'supertest';
import type { Express } from 'express';
import { describe, it, expect, beforeAll, beforeEach, afterEach } from 'vitest';

import { createApp } from '@/app';
import { MemoryKeyValueStore } from '@/common/store/memory.store';
import { loadConfig } from '@/config';
import { createContainer, type Container } from '@/container';
import { InMemoryAccessStore, TEST_SECRET } from '@/tests/fakes';

import { LoginService } from '../services/login.services';

const PASSWORD = 'correct-horse';

describe('Auth routes', () => {
  let passwordHash: string;
  let accessStore: InMemoryAccessStore;
  let container: Container;
  let app: Express;

  beforeAll(async () => {
    passwordHash = await LoginService.hashPassword(PASSWORD);
  });

  beforeEach(() => {
    accessStore = new InMemoryAccessStore()
      .addRole(1, 'editor', ['posts:write', 'posts:read'])
      .addRole(2, 'viewer', ['posts:read', 'comments:read'])
      .addPrincipal({ id: 7, handle: 'ada', passwordHash, active: true }, [1, 2]);
    const config = loadConfig({
      NODE_ENV: 'test',
      JWT_SECRET: TEST_SECRET,
      JWT_REFRESH_ROTATION: 'true',
      JWT_REVOCATION: 'true',
      RATE_LIMIT_AUTH_MAX: '3',
    });
    container = createContainer(config, { accessStore, kvStore: new MemoryKeyValueStore() });
    app = createApp(container);
  });

  afterEach(() => {
    container.close();
  });

  const login = (handle = 'ada', password = PASSWORD) =>
    request(app).post('/api/v1/auth/login').send({ handle, password });

  it('GET / reports liveness', async () => {
    const res = await request(app).get('/');

    expect(res.status).toBe(200);
    expect(res.body.status).toBe('success');
    expect(res.body.data.message).toBe('API is running in test mode');
  });

  describe('POST /login', () => {
    it('returns a token pair and the auth quota headers', async () => {
      const res = await login('Ada');

      expect(res.status).toBe(200);
      expect(res.body.data.tokenType).toBe('Bearer');
      expect(typeof res.body.data.accessToken.token).toBe('string');
      expect(typeof res.body.data.refreshToken.token).toBe('string');
      expect(res.headers['x-ratelimit-limit']).toBe('3');
      expect(res.headers['x-ratelimit-remaining']).toBe('2');
    });

    it('answers the same 401 for a wrong password and an unknown handle', async () => {
      const wrongPassword = await login('ada', 'wrong-password');
      const unknown = await login('nobody');

      for (const res of [wrongPassword, unknown]) {
        expect(res.status).toBe(401);
        expect(res.body).toEqual({
          status: 'fail',
          data: { message: 'Invalid handle or password.', code: 'ERR_UNAUTHORIZED' },
        });
      }
    });

    it('rejects an incomplete body with 422', async () => {
      const res = await request(app).post('/api/v1/auth/login').send({ handle: 'ada' });

      expect(res.status).toBe(422);
      expect(res.body.data).toEqual({
        message: 'Validation failed',
        code: 'ERR_VALIDATION',
        details: { password: ['Required'] },
      });
    });

    it('rejects malformed JSON with 400', async () => {
      const res = await request(app)
        .post('/api/v1/auth/login')
        .set('Content-Type', 'application/json')
        .send('{"handle": ');

      expect(res.status).toBe(400);
      expect(res.body.data.message).toBe('Malformed JSON body');
    });

    it('throttles login attempts per source address', async () => {
      await login('ada', 'wrong-password');
      await login('ada', 'wrong-password');
      await login('ada', 'wrong-password');
      const res = await login();

      expect(res.status).toBe(429);
      expect(res.body.data.code).toBe('ERR_RATE_LIMITED');
      expect(res.headers['x-ratelimit-remaining']).toBe('0');
      const retryAfter = Number(res.headers['retry-after']);
      expect(retryAfter).toBeGreaterThanOrEqual(1);
      expect(retryAfter).toBeLessThanOrEqual(60);
    });
  });

  describe('GET /me', () => {
    it('returns the principal and its current permissions', async () => {
      const { body } = await login();

      const res = await request(app)
        .get('/api/v1/auth/me')
        .set('Authorization', `Bearer ${body.data.accessToken.token}`);

      expect(res.status).toBe(200);
      expect(res.body.data).toEqual({
        id: 7,
        handle: 'ada',
        roles: ['editor', 'viewer'],
        permissions: ['comments:read', 'posts:read', 'posts:write'],
        expiresAt: body.data.accessToken.expiresAt,
      });
      expect(res.headers['x-ratelimit-limit']).toBe('100');
    });

    it('requires a bearer token', async () => {
      const res = await request(app).get('/api/v1/auth/me');

      expect(res.status).toBe(401);
      expect(res.body.data).toEqual({ message: 'Unauthorized', code: 'ERR_UNAUTHORIZED' });
    });
  });

  describe('POST /refresh', () => {
    it('rotates the refresh token and refuses a second use', async () => {
      const { body } = await login();
      const refreshToken: string = body.data.refreshToken.token;

      const first = await request(app).post('/api/v1/auth/refresh').send({ refreshToken });
      expect(first.status).toBe(200);
      expect(typeof first.body.data.accessToken.token).toBe('string');
      expect(first.body.data.refreshToken.token).not.toBe(refreshToken);

      const reused = await request(app).post('/api/v1/auth/refresh').send({ refreshToken });
      expect(reused.status).toBe(401);
    });
  });

  describe('POST /logout', () => {
    it('revokes the access token', async () => {
      const { body } = await login();
      const authorization = `Bearer ${body.data.accessToken.token}`;

      const res = await request(app)
        .post('/api/v1/auth/logout')
        .set('Authorization', authorization)
        .send({ refreshToken: body.data.refreshToken.token });
      expect(res.status).toBe(200);
      expect(res.body).toEqual({ status: 'success', data: 'Logout successful' });

      const me = await request(app).get('/api/v1/auth/me').set('Authorization', authorization);
      expect(me.status).toBe(401);

      const refresh = await request(app)
        .post('/api/v1/auth/refresh')
        .send({ refreshToken: body.data.refreshToken.token });
      expect(refresh.status).toBe(401);
    });
  });

  it('answers 404 for unknown routes', async () => {
    const res = await request(app).get('/api/v1/nope');

    expect(res.status).toBe(404);
    expect(res.body.data.message).toBe('Not found: GET /api/v1/nope');
  });
});
