/**
 * Test Fixtures
 *
 * Predefined identities, inputs and times for consistent testing.
 */

// 2025-01-01T00:00:00.000Z
export const FIXED_NOW = 1735689600000;

export const DAY_MS = 24 * 60 * 60 * 1000;

export const users = {
  alice: 'usr_alice',
  bob: 'usr_bob',
  carol: 'usr_carol',
  dave: 'usr_dave',
  erin: 'usr_erin',
} as const;

export const circleInputs = {
  family: { type: 'family', name: 'The Parkers' },
  friends: { type: 'friends', name: 'Weekend Hikers', description: 'Trail photos', privacy: 'private' },
  couple: { type: 'couple', name: 'Us Two' },
  mentor: { type: 'mentor', name: 'Mentoring' },
} as const;

export const INTERNAL_SECRET = 'test-secret-0123456789abcdefghij';
