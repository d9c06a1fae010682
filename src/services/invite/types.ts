export interface CreateInviteInput {
    maxUses?: number;
    ttlSeconds?: number;
}

export interface InviteServiceOptions {
    defaultTtlSeconds: number;
}

/** Invite details safe to show to someone holding the token. */
export interface InvitePreview {
    circleId: string;
    circleName: string;
    circleType: string;
    usesRemaining: number;
    expiresAt: number;
}
