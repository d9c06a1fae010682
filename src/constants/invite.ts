/**
 * Invite Constants
 */

export const INVITE_TOKEN_LENGTH = 24;

export const DEFAULT_INVITE_MAX_USES = 1;
export const MAX_INVITE_USES = 100;

// 7 days
export const DEFAULT_INVITE_TTL_SECONDS = 7 * 24 * 60 * 60;
export const MAX_INVITE_TTL_SECONDS = 90 * 24 * 60 * 60;

// Visible characters of a token in logs and events
export const TOKEN_PREFIX_LENGTH = 6;
