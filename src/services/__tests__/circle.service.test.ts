/**
 * Unit Tests for CircleRegistry
 *
 * Tests circle lifecycle, invite joins and media usage against an
 * in-memory database.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createTestContext, failureOf, unwrap, type TestContext } from '../../__tests__/helpers/harness';
import { circleInputs, FIXED_NOW, users } from '../../__tests__/helpers/fixtures';

describe('CircleRegistry', () => {
  let t: TestContext;

  beforeEach(async () => {
    t = await createTestContext();
    await t.registerUsers(users.alice, users.bob, users.carol);
  });

  afterEach(() => {
    t.close();
  });

  async function createFamilyCircle(owner: string = users.alice): Promise<string> {
    const circle = unwrap(await t.services.circles.createCircle(owner, circleInputs.family));
    return circle.id;
  }

  async function joinWithInvite(circleId: string, userId: string): Promise<void> {
    const invite = unwrap(await t.services.invites.create(users.alice, circleId));
    unwrap(await t.services.circles.joinViaInvite(userId, invite.token));
  }

  describe('createCircle', () => {
    it('should create a circle with the creator as owner', async () => {
      // Act
      const circle = unwrap(await t.services.circles.createCircle(users.alice, circleInputs.family));

      // Assert
      expect(circle.id).toMatch(/^circle_[0-9A-Za-z]{20}$/);
      expect(circle).toMatchObject({
        type: 'family',
        name: 'The Parkers',
        description: null,
        privacy: 'members_only',
        createdBy: users.alice,
        createdAt: FIXED_NOW,
        updatedAt: FIXED_NOW,
        role: 'owner',
      });

      const owner = unwrap(await t.services.memberships.checkPermission(users.alice, circle.id, 'owner'));
      expect(owner).toEqual({
        circleId: circle.id,
        userId: users.alice,
        role: 'owner',
        invitedBy: null,
        joinedAt: FIXED_NOW,
      });
    });

    it('should keep description and privacy when given', async () => {
      // Act
      const circle = unwrap(await t.services.circles.createCircle(users.alice, circleInputs.friends));

      // Assert
      expect(circle.description).toBe('Trail photos');
      expect(circle.privacy).toBe('private');
    });

    it('should count the circle against the creator', async () => {
      // Act
      await createFamilyCircle();

      // Assert
      const usage = unwrap(await t.services.quota.getUsage(users.alice, 'circle'));
      expect(usage).toEqual({ kind: 'circle', ownerKey: users.alice, used: 1, limit: 3, remaining: 2 });
    });

    it('should trim the name', async () => {
      // Act
      const circle = unwrap(
        await t.services.circles.createCircle(users.alice, { type: 'couple', name: '  Us Two  ' })
      );

      // Assert
      expect(circle.name).toBe('Us Two');
    });

    it('should reject a blank name without using quota', async () => {
      // Act
      const result = await t.services.circles.createCircle(users.alice, { type: 'couple', name: '   ' });

      // Assert
      expect(failureOf(result).code).toBe('VALIDATION_FAILED');
      const usage = unwrap(await t.services.quota.getUsage(users.alice, 'circle'));
      expect(usage.used).toBe(0);
    });

    it('should fail with QUOTA_EXCEEDED once a free user holds three circles', async () => {
      // Arrange
      await createFamilyCircle();
      await createFamilyCircle();
      await createFamilyCircle();

      // Act
      const result = await t.services.circles.createCircle(users.alice, circleInputs.couple);

      // Assert
      const failure = failureOf(result);
      expect(failure.code).toBe('QUOTA_EXCEEDED');
      expect(failure.details).toEqual({ kind: 'circle', limit: 3, current: 3 });
      expect(await t.count('SELECT COUNT(*) AS count FROM circles WHERE created_by = ?', [users.alice])).toBe(3);
    });

    it('should admit exactly the remaining quota under concurrent creates', async () => {
      // Act
      const results = await Promise.all(
        Array.from({ length: 5 }, (_, i) =>
          t.services.circles.createCircle(users.alice, { type: 'friends', name: `Group ${i}` })
        )
      );

      // Assert
      const succeeded = results.filter((result) => result.success);
      const failed = results.filter((result) => !result.success);
      expect(succeeded).toHaveLength(3);
      expect(failed.map((result) => failureOf(result).code)).toEqual(['QUOTA_EXCEEDED', 'QUOTA_EXCEEDED']);

      const usage = unwrap(await t.services.quota.getUsage(users.alice, 'circle'));
      expect(usage.used).toBe(3);
    });

    it('should not limit a premium user', async () => {
      // Arrange
      await t.setSubscription(users.alice, 'premium');

      // Act
      for (let i = 0; i < 5; i++) {
        unwrap(await t.services.circles.createCircle(users.alice, { type: 'community', name: `Club ${i}` }));
      }

      // Assert
      const usage = unwrap(await t.services.quota.getUsage(users.alice, 'circle'));
      expect(usage).toEqual({ kind: 'circle', ownerKey: users.alice, used: 5, limit: -1, remaining: null });
    });

    it('should fail with NOT_FOUND for an unregistered user', async () => {
      // Act
      const result = await t.services.circles.createCircle('usr_unknown', circleInputs.family);

      // Assert
      expect(failureOf(result)).toMatchObject({ code: 'NOT_FOUND', error: 'User not found' });
    });
  });

  describe('listCircles', () => {
    it('should list the circles of a user newest first with their role', async () => {
      // Arrange
      const first = await createFamilyCircle();
      t.clock.advance(1000);
      const second = unwrap(await t.services.circles.createCircle(users.bob, circleInputs.mentor)).id;
      unwrap(await t.services.memberships.addMember(users.bob, second, users.alice, 'admin'));

      // Act
      const circles = unwrap(await t.services.circles.listCircles(users.alice));

      // Assert
      expect(circles.map((circle) => [circle.id, circle.role])).toEqual([
        [second, 'admin'],
        [first, 'owner'],
      ]);
    });

    it('should return an empty list for a user without circles', async () => {
      // Act
      const circles = unwrap(await t.services.circles.listCircles(users.carol));

      // Assert
      expect(circles).toEqual([]);
    });
  });

  describe('getCircle', () => {
    it('should return the circle with stats for a member', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      await joinWithInvite(circleId, users.bob);
      unwrap(await t.services.circles.recordMedia(users.bob, circleId, 'photo', 4));
      unwrap(await t.services.circles.recordMedia(users.alice, circleId, 'story'));

      // Act
      const details = unwrap(await t.services.circles.getCircle(users.bob, circleId));

      // Assert
      expect(details.role).toBe('member');
      expect(details.stats).toEqual({ memberCount: 2, photoCount: 4, storyCount: 1 });
    });

    it('should deny a non-member', async () => {
      // Arrange
      const circleId = await createFamilyCircle();

      // Act
      const result = await t.services.circles.getCircle(users.carol, circleId);

      // Assert
      expect(failureOf(result)).toMatchObject({
        code: 'PERMISSION_DENIED',
        error: 'You are not a member of this circle',
      });
    });

    it('should fail with NOT_FOUND for an unknown circle', async () => {
      // Act
      const result = await t.services.circles.getCircle(users.alice, 'circle_missing');

      // Assert
      expect(failureOf(result)).toMatchObject({ code: 'NOT_FOUND', error: 'Circle not found' });
    });
  });

  describe('updateCircle', () => {
    it('should let an admin rename the circle', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      unwrap(await t.services.memberships.addMember(users.alice, circleId, users.bob, 'admin'));
      t.clock.advance(5000);

      // Act
      const updated = unwrap(
        await t.services.circles.updateCircle(users.bob, circleId, { name: ' Parkers & Co ', description: 'Everyone' })
      );

      // Assert
      expect(updated).toMatchObject({
        id: circleId,
        name: 'Parkers & Co',
        description: 'Everyone',
        role: 'admin',
        updatedAt: FIXED_NOW + 5000,
      });
    });

    it('should clear the description when set to null', async () => {
      // Arrange
      const circle = unwrap(await t.services.circles.createCircle(users.alice, circleInputs.friends));

      // Act
      const updated = unwrap(await t.services.circles.updateCircle(users.alice, circle.id, { description: null }));

      // Assert
      expect(updated.description).toBeNull();
    });

    it('should return the circle unchanged for an empty update', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      t.clock.advance(5000);

      // Act
      const updated = unwrap(await t.services.circles.updateCircle(users.alice, circleId, {}));

      // Assert
      expect(updated.updatedAt).toBe(FIXED_NOW);
      expect(updated.name).toBe('The Parkers');
    });

    it('should deny a plain member', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      unwrap(await t.services.memberships.addMember(users.alice, circleId, users.bob));

      // Act
      const result = await t.services.circles.updateCircle(users.bob, circleId, { name: 'Mine now' });

      // Assert
      expect(failureOf(result).code).toBe('PERMISSION_DENIED');
    });
  });

  describe('deleteCircle', () => {
    it('should delete the circle with its members and invites', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      await joinWithInvite(circleId, users.bob);
      unwrap(await t.services.invites.create(users.alice, circleId, { maxUses: 5 }));
      unwrap(await t.services.circles.recordMedia(users.alice, circleId, 'photo', 2));
      t.events.clear();

      // Act
      const result = unwrap(await t.services.circles.deleteCircle(users.alice, circleId));

      // Assert
      expect(result).toEqual({ circleId, deleted: true });
      expect(await t.count('SELECT COUNT(*) AS count FROM circles')).toBe(0);
      expect(await t.count('SELECT COUNT(*) AS count FROM circle_memberships')).toBe(0);
      expect(await t.count('SELECT COUNT(*) AS count FROM invites')).toBe(0);
      expect(await t.count("SELECT COUNT(*) AS count FROM usage_counters WHERE kind = 'photo'")).toBe(0);

      const usage = unwrap(await t.services.quota.getUsage(users.alice, 'circle'));
      expect(usage.used).toBe(0);

      expect(t.events.events).toEqual([
        {
          type: 'CircleDeleted',
          circleId,
          deletedBy: users.alice,
          reason: 'deleted',
          memberIds: [users.alice, users.bob],
          occurredAt: FIXED_NOW,
        },
      ]);
    });

    it('should deny an admin', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      unwrap(await t.services.memberships.addMember(users.alice, circleId, users.bob, 'admin'));

      // Act
      const result = await t.services.circles.deleteCircle(users.bob, circleId);

      // Assert
      expect(failureOf(result).code).toBe('PERMISSION_DENIED');
      expect(await t.count('SELECT COUNT(*) AS count FROM circles')).toBe(1);
    });
  });

  describe('joinViaInvite', () => {
    it('should add the user as a member and consume one use', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      const invite = unwrap(await t.services.invites.create(users.alice, circleId, { maxUses: 2 }));
      t.events.clear();

      // Act
      const joined = unwrap(await t.services.circles.joinViaInvite(users.bob, invite.token));

      // Assert
      expect(joined.circle).toMatchObject({ id: circleId, role: 'member' });
      expect(joined.membership).toEqual({
        circleId,
        userId: users.bob,
        role: 'member',
        invitedBy: users.alice,
        joinedAt: FIXED_NOW,
      });

      const remaining = unwrap(await t.services.invites.validate(invite.token));
      expect(remaining.usesRemaining).toBe(1);

      expect(t.events.types()).toEqual(['InviteConsumed', 'MemberAdded']);
      expect(t.events.events[0]).toMatchObject({ tokenPrefix: invite.token.slice(0, 6), usesRemaining: 1 });
      expect(t.events.events[1]).toMatchObject({ userId: users.bob, via: 'invite', addedBy: users.alice });
    });

    it('should let exactly one of two concurrent joins use a single-use invite', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      const invite = unwrap(await t.services.invites.create(users.alice, circleId, { maxUses: 1 }));

      // Act
      const [first, second] = await Promise.all([
        t.services.circles.joinViaInvite(users.bob, invite.token),
        t.services.circles.joinViaInvite(users.carol, invite.token),
      ]);

      // Assert
      expect(first.success).toBe(true);
      expect(failureOf(second).code).toBe('INVITE_EXHAUSTED');
      expect(await t.count('SELECT COUNT(*) AS count FROM circle_memberships WHERE circle_id = ?', [circleId])).toBe(2);
    });

    it('should not consume a use when the user is already a member', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      const invite = unwrap(await t.services.invites.create(users.alice, circleId, { maxUses: 2 }));
      t.events.clear();

      // Act
      const result = await t.services.circles.joinViaInvite(users.alice, invite.token);

      // Assert
      expect(failureOf(result)).toMatchObject({
        code: 'CONFLICT',
        error: 'User is already a member of this circle',
      });
      const unchanged = unwrap(await t.services.invites.validate(invite.token));
      expect(unchanged.usesRemaining).toBe(2);
      expect(t.events.events).toEqual([]);
    });

    it('should reject an unknown token', async () => {
      // Act
      const result = await t.services.circles.joinViaInvite(users.bob, 'no-such-token');

      // Assert
      expect(failureOf(result)).toMatchObject({ code: 'NOT_FOUND', error: 'Invite not found' });
    });
  });

  describe('recordMedia', () => {
    it('should record photos against the circle', async () => {
      // Arrange
      const circleId = await createFamilyCircle();

      // Act
      const usage = unwrap(await t.services.circles.recordMedia(users.alice, circleId, 'photo', 3));

      // Assert
      expect(usage).toEqual({ kind: 'photo', ownerKey: circleId, used: 3, limit: 50, remaining: 47 });
    });

    it('should fail with QUOTA_EXCEEDED past the story limit of the owner tier', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      unwrap(await t.services.circles.recordMedia(users.alice, circleId, 'story', 10));

      // Act
      const result = await t.services.circles.recordMedia(users.alice, circleId, 'story');

      // Assert
      const failure = failureOf(result);
      expect(failure.code).toBe('QUOTA_EXCEEDED');
      expect(failure.details).toEqual({ kind: 'story', limit: 10, current: 10 });
    });

    it('should apply the tier of the owner to every member', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      await t.setSubscription(users.alice, 'personal');
      await joinWithInvite(circleId, users.bob);

      // Act
      const usage = unwrap(await t.services.circles.recordMedia(users.bob, circleId, 'story', 20));

      // Assert
      expect(usage).toEqual({ kind: 'story', ownerKey: circleId, used: 20, limit: 100, remaining: 80 });
    });

    it('should reject an amount outside 1..100', async () => {
      // Arrange
      const circleId = await createFamilyCircle();

      // Act
      const zero = await t.services.circles.recordMedia(users.alice, circleId, 'photo', 0);
      const tooMany = await t.services.circles.recordMedia(users.alice, circleId, 'photo', 101);

      // Assert
      expect(failureOf(zero).code).toBe('VALIDATION_FAILED');
      expect(failureOf(tooMany).code).toBe('VALIDATION_FAILED');
    });

    it('should deny a non-member', async () => {
      // Arrange
      const circleId = await createFamilyCircle();

      // Act
      const result = await t.services.circles.recordMedia(users.carol, circleId, 'photo');

      // Assert
      expect(failureOf(result).code).toBe('PERMISSION_DENIED');
    });
  });

  describe('releaseMedia', () => {
    it('should give recorded units back', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      unwrap(await t.services.circles.recordMedia(users.alice, circleId, 'photo', 5));

      // Act
      const usage = unwrap(await t.services.circles.releaseMedia(users.alice, circleId, 'photo', 2));

      // Assert
      expect(usage).toEqual({ kind: 'photo', ownerKey: circleId, used: 3, limit: 50, remaining: 47 });
    });

    it('should clamp at zero when releasing more than was recorded', async () => {
      // Arrange
      const circleId = await createFamilyCircle();
      unwrap(await t.services.circles.recordMedia(users.alice, circleId, 'photo', 2));

      // Act
      const usage = unwrap(await t.services.circles.releaseMedia(users.alice, circleId, 'photo', 5));

      // Assert
      expect(usage.used).toBe(0);
    });

    it('should succeed on a counter that was never used', async () => {
      // Arrange
      const circleId = await createFamilyCircle();

      // Act
      const usage = unwrap(await t.services.circles.releaseMedia(users.alice, circleId, 'story'));

      // Assert
      expect(usage).toEqual({ kind: 'story', ownerKey: circleId, used: 0, limit: 10, remaining: 10 });
    });
  });
});
