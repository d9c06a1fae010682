/**
 * Integration Tests
 *
 * Drives the HTTP API end to end over an in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { z } from 'zod';
import { getEnv } from '../env';
import { createApp, type App } from '../server';
import { circleInputs, INTERNAL_SECRET, users } from './helpers/fixtures';
import { createTestContext, type TestContext } from './helpers/harness';

const CreatedSchema = z.object({ data: z.object({ id: z.string() }) });
const InviteSchema = z.object({ data: z.object({ token: z.string() }) });

describe('HTTP API', () => {
  let t: TestContext;
  let app: App;

  beforeEach(async () => {
    t = await createTestContext();
    const config = getEnv({ ENVIRONMENT: 'test', INTERNAL_SECRET, LOG_LEVEL: 'silent' });
    app = createApp({ config, db: t.db, services: t.services });
  });

  afterEach(() => {
    t.close();
  });

  function request(path: string, init: { method?: string; userId?: string; body?: unknown } = {}) {
    const headers: Record<string, string> = { 'X-Internal-Secret': INTERNAL_SECRET };
    if (init.userId) {
      headers['X-User-Id'] = init.userId;
    }
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    return app.request(path, {
      method: init.method ?? 'GET',
      headers,
      body: init.body === undefined ? undefined : JSON.stringify(init.body),
    });
  }

  async function register(...userIds: string[]): Promise<void> {
    for (const userId of userIds) {
      const res = await request('/internal/users', { method: 'POST', body: { userId } });
      expect(res.status).toBe(201);
    }
  }

  async function createCircle(userId: string): Promise<string> {
    const res = await request('/api/circles', { method: 'POST', userId, body: circleInputs.family });
    expect(res.status).toBe(201);
    return CreatedSchema.parse(await res.json()).data.id;
  }

  describe('service endpoints', () => {
    it('should report health without authentication', async () => {
      // Act
      const res = await app.request('/health');

      // Assert
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: 'healthy', service: 'circles-service' });
    });

    it('should echo the request id', async () => {
      // Act
      const res = await app.request('/health', { headers: { 'X-Request-ID': 'req-test-1' } });

      // Assert
      expect(res.headers.get('X-Request-ID')).toBe('req-test-1');
    });

    it('should return 404 for an unknown route', async () => {
      // Act
      const res = await app.request('/nowhere');

      // Assert
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ success: false, error: 'Not found', path: '/nowhere' });
    });
  });

  describe('authentication', () => {
    it('should reject a request without the internal secret', async () => {
      // Act
      const res = await app.request('/api/circles', { headers: { 'X-User-Id': users.alice } });

      // Assert
      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ success: false, error: 'Invalid internal secret' });
    });

    it('should reject a request without a user id', async () => {
      // Act
      const res = await request('/api/circles');

      // Assert
      expect(res.status).toBe(401);
      expect(await res.json()).toMatchObject({ success: false, error: 'Authentication required' });
    });

    it('should protect the internal endpoints with the secret', async () => {
      // Act
      const res = await app.request('/internal/users', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ userId: users.alice }),
      });

      // Assert
      expect(res.status).toBe(401);
    });
  });

  describe('internal endpoints', () => {
    it('should register a user once', async () => {
      // Arrange
      await register(users.alice);

      // Act
      const again = await request('/internal/users', { method: 'POST', body: { userId: users.alice } });

      // Assert
      expect(again.status).toBe(200);
    });

    it('should reject a malformed user id in the path', async () => {
      // Act
      const res = await request(`/internal/subscriptions/${'u'.repeat(129)}`, {
        method: 'PUT',
        body: { tier: 'plus', status: 'active' },
      });

      // Assert
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ success: false, code: 'VALIDATION_FAILED' });
    });

    it('should return 404 for the subscription of an unknown user', async () => {
      // Act
      const res = await request('/internal/subscriptions/usr_unknown', {
        method: 'PUT',
        body: { tier: 'plus', status: 'active' },
      });

      // Assert
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        success: false,
        error: 'User not found',
        code: 'NOT_FOUND',
        details: { entity: 'user' },
      });
    });
  });

  describe('circles', () => {
    beforeEach(async () => {
      await register(users.alice, users.bob, users.carol);
    });

    it('should create and fetch a circle', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);

      // Act
      const res = await request(`/api/circles/${circleId}`, { userId: users.alice });

      // Assert
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        data: {
          id: circleId,
          name: 'The Parkers',
          role: 'owner',
          stats: { memberCount: 1, photoCount: 0, storyCount: 0 },
        },
      });
    });

    it('should rename a circle', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);

      // Act
      const res = await request(`/api/circles/${circleId}`, {
        method: 'PATCH',
        userId: users.alice,
        body: { name: 'The Parker Family' },
      });

      // Assert
      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        success: true,
        data: { id: circleId, name: 'The Parker Family', role: 'owner' },
      });
    });

    it('should reject an invalid body with 400', async () => {
      // Act
      const res = await request('/api/circles', {
        method: 'POST',
        userId: users.alice,
        body: { type: 'club', name: '' },
      });

      // Assert
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        success: false,
        error: 'Validation failed',
        code: 'VALIDATION_FAILED',
      });
    });

    it('should answer 402 with quota details once the tier limit is reached', async () => {
      // Arrange
      await createCircle(users.alice);
      await createCircle(users.alice);
      await createCircle(users.alice);

      // Act
      const res = await request('/api/circles', { method: 'POST', userId: users.alice, body: circleInputs.couple });

      // Assert
      expect(res.status).toBe(402);
      expect(await res.json()).toEqual({
        success: false,
        error: 'Quota limit exceeded',
        code: 'QUOTA_EXCEEDED',
        details: { kind: 'circle', limit: 3, current: 3 },
      });
    });

    it('should lift the limit after a subscription upgrade', async () => {
      // Arrange
      await createCircle(users.alice);
      await createCircle(users.alice);
      await createCircle(users.alice);
      const upgrade = await request(`/internal/subscriptions/${users.alice}`, {
        method: 'PUT',
        body: { tier: 'plus', status: 'active' },
      });
      expect(upgrade.status).toBe(200);

      // Act
      const res = await request('/api/circles', { method: 'POST', userId: users.alice, body: circleInputs.couple });

      // Assert
      expect(res.status).toBe(201);
      const usage = await request('/api/usage', { userId: users.alice });
      expect(await usage.json()).toMatchObject({
        data: { tier: 'plus', circles: { used: 4, limit: 25, remaining: 21 } },
      });
    });

    it('should let a user join with an invite and refuse an exhausted one', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);
      const created = await request(`/api/circles/${circleId}/invites`, {
        method: 'POST',
        userId: users.alice,
        body: {},
      });
      expect(created.status).toBe(201);
      const { token } = InviteSchema.parse(await created.json()).data;

      const preview = await request(`/api/invites/${token}`, { userId: users.bob });
      expect(await preview.json()).toMatchObject({
        data: { circleId, circleName: 'The Parkers', circleType: 'family', usesRemaining: 1 },
      });

      // Act
      const joined = await request('/api/circles/join', { method: 'POST', userId: users.bob, body: { token } });
      const refused = await request('/api/circles/join', { method: 'POST', userId: users.carol, body: { token } });

      // Assert
      expect(joined.status).toBe(201);
      expect(await joined.json()).toMatchObject({ data: { circle: { id: circleId, role: 'member' } } });
      expect(refused.status).toBe(410);
      expect(await refused.json()).toMatchObject({ code: 'INVITE_EXHAUSTED' });
    });

    it('should forbid a plain member from creating invites', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);
      const added = await request(`/api/circles/${circleId}/members`, {
        method: 'POST',
        userId: users.alice,
        body: { userId: users.bob },
      });
      expect(added.status).toBe(201);

      // Act
      const res = await request(`/api/circles/${circleId}/invites`, { method: 'POST', userId: users.bob, body: {} });

      // Assert
      expect(res.status).toBe(403);
      expect(await res.json()).toMatchObject({ code: 'PERMISSION_DENIED' });
    });

    it('should transfer ownership through a role change', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);
      await request(`/api/circles/${circleId}/members`, {
        method: 'POST',
        userId: users.alice,
        body: { userId: users.bob, role: 'admin' },
      });

      // Act
      const res = await request(`/api/circles/${circleId}/members/${users.bob}`, {
        method: 'PATCH',
        userId: users.alice,
        body: { role: 'owner' },
      });

      // Assert
      expect(res.status).toBe(200);
      const members = await request(`/api/circles/${circleId}/members`, { userId: users.alice });
      expect(await members.json()).toMatchObject({
        data: [
          { userId: users.alice, role: 'admin' },
          { userId: users.bob, role: 'owner' },
        ],
      });
    });

    it('should record and release media usage', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);

      // Act
      const recorded = await request(`/api/circles/${circleId}/usage/photo`, {
        method: 'POST',
        userId: users.alice,
        body: { amount: 2 },
      });
      const released = await request(`/api/circles/${circleId}/usage/photo?amount=1`, {
        method: 'DELETE',
        userId: users.alice,
      });

      // Assert
      expect(await recorded.json()).toMatchObject({ data: { used: 2, limit: 50, remaining: 48 } });
      expect(await released.json()).toMatchObject({ data: { used: 1, limit: 50, remaining: 49 } });
    });

    it('should reject an unknown media kind', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);

      // Act
      const res = await request(`/api/circles/${circleId}/usage/video`, {
        method: 'POST',
        userId: users.alice,
        body: { amount: 1 },
      });

      // Assert
      expect(res.status).toBe(400);
    });

    it('should delete the circle when its sole owner leaves', async () => {
      // Arrange
      const circleId = await createCircle(users.alice);

      // Act
      const res = await request(`/api/circles/${circleId}/leave`, { method: 'POST', userId: users.alice, body: {} });

      // Assert
      expect(await res.json()).toEqual({
        success: true,
        data: { circleId, userId: users.alice, circleDeleted: true, newOwnerId: null },
      });
      const gone = await request(`/api/circles/${circleId}`, { userId: users.alice });
      expect(gone.status).toBe(404);
    });
  });
});
