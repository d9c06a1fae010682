import { ERROR_MESSAGES, ErrorCode } from '../../constants/errors';
import {
    DEFAULT_INVITE_MAX_USES,
    DEFAULT_INVITE_TTL_SECONDS,
    INVITE_TOKEN_LENGTH,
    MAX_INVITE_TTL_SECONDS,
    MAX_INVITE_USES,
    TOKEN_PREFIX_LENGTH,
} from '../../constants/invite';
import type { Invite, InviteState, ServiceResult } from '../../types';
import { CircleEvents } from '../events/types';
import type { MembershipManager } from '../membership';
import {
    CircleError,
    concurrentModification,
    expiresIn,
    generateRandomToken,
    isExpired,
    notFound,
    runMutation,
    runQuery,
    validationFailed,
    type ServiceContext,
    type TxScope,
} from '../shared';
import type { CreateInviteInput, InvitePreview, InviteServiceOptions } from './types';

export function tokenPrefix(token: string): string {
    return token.slice(0, TOKEN_PREFIX_LENGTH);
}

/**
 * State as observed at `now`. Revocation wins; otherwise expiry is checked
 * before use count, so a used-up invite past its expiry reads as expired.
 */
export function effectiveState(invite: Invite, now: number): InviteState {
    if (invite.state === 'revoked' || invite.state === 'expired') {
        return invite.state;
    }
    if (isExpired(invite.expiresAt, now)) {
        return 'expired';
    }
    if (invite.state === 'exhausted' || invite.usesRemaining === 0) {
        return 'exhausted';
    }
    return 'active';
}

const UNUSABLE_INVITE: Record<Exclude<InviteState, 'active'>, { code: ErrorCode; message: string }> = {
    expired: { code: ErrorCode.INVITE_EXPIRED, message: ERROR_MESSAGES.INVITE.EXPIRED },
    exhausted: { code: ErrorCode.INVITE_EXHAUSTED, message: ERROR_MESSAGES.INVITE.EXHAUSTED },
    revoked: { code: ErrorCode.INVITE_REVOKED, message: ERROR_MESSAGES.INVITE.REVOKED },
};

function requireWholeNumberInRange(value: number, min: number, max: number, field: string): void {
    if (!Number.isInteger(value) || value < min || value > max) {
        throw validationFailed(`${field} must be an integer between ${min} and ${max}`, { field, value });
    }
}

// InviteService - shareable join tokens with a bounded number of uses.
export class InviteService {
    constructor(
        private ctx: ServiceContext,
        private membership: MembershipManager,
        private options: InviteServiceOptions = { defaultTtlSeconds: DEFAULT_INVITE_TTL_SECONDS }
    ) {}

    async create(actor: string, circleId: string, input: CreateInviteInput = {}): Promise<ServiceResult<Invite>> {
        return runMutation(this.ctx, 'invite.create', async (scope) => {
            const maxUses = input.maxUses ?? DEFAULT_INVITE_MAX_USES;
            const ttlSeconds = input.ttlSeconds ?? this.options.defaultTtlSeconds;
            requireWholeNumberInRange(maxUses, 1, MAX_INVITE_USES, 'maxUses');
            requireWholeNumberInRange(ttlSeconds, 1, MAX_INVITE_TTL_SECONDS, 'ttlSeconds');

            await this.membership.authorize(scope, actor, circleId, 'invite:create');

            const invite: Invite = {
                token: generateRandomToken(INVITE_TOKEN_LENGTH),
                circleId,
                createdBy: actor,
                maxUses,
                usesRemaining: maxUses,
                expiresAt: expiresIn(ttlSeconds, scope.now),
                state: 'active',
                version: 0,
                createdAt: scope.now,
                updatedAt: scope.now,
            };
            await scope.repos.invites.create(invite);

            this.ctx.logger.info('invite_created', {
                circleId,
                actor,
                tokenPrefix: tokenPrefix(invite.token),
                maxUses,
                expiresAt: invite.expiresAt,
            });

            return invite;
        });
    }

    async validate(token: string): Promise<ServiceResult<Invite>> {
        return runQuery(this.ctx, (scope) => this.validateWithin(scope, token));
    }

    /** Validates the token and returns the circle it leads to, without exposing the token owner. */
    async preview(token: string): Promise<ServiceResult<InvitePreview>> {
        return runQuery(this.ctx, async (scope) => {
            const invite = await this.validateWithin(scope, token);
            const circle = await scope.repos.circles.getById(invite.circleId);
            if (!circle) {
                throw notFound('circle');
            }
            return {
                circleId: circle.id,
                circleName: circle.name,
                circleType: circle.type,
                usesRemaining: invite.usesRemaining,
                expiresAt: invite.expiresAt,
            };
        });
    }

    async validateWithin(scope: TxScope, token: string): Promise<Invite> {
        const invite = await scope.repos.invites.getByToken(token);
        if (!invite) {
            throw notFound('invite');
        }

        const state = effectiveState(invite, scope.now);
        if (state !== 'active') {
            const failure = UNUSABLE_INVITE[state];
            throw new CircleError(failure.code, failure.message, { state });
        }

        return invite;
    }

    /**
     * Takes one use of the invite inside the caller's transaction and
     * returns the updated invite. The caller inserts the membership in the
     * same transaction.
     */
    async consume(scope: TxScope, token: string, userId: string): Promise<Invite> {
        const invite = await this.validateWithin(scope, token);

        const meta = await scope.repos.invites.consumeUse(token, invite.version, scope.now);
        if (meta.changes === 0) {
            throw concurrentModification('invite');
        }

        const usesRemaining = invite.usesRemaining - 1;
        scope.emit({
            type: CircleEvents.INVITE_CONSUMED,
            circleId: invite.circleId,
            tokenPrefix: tokenPrefix(token),
            userId,
            usesRemaining,
            occurredAt: scope.now,
        });

        return {
            ...invite,
            usesRemaining,
            state: usesRemaining === 0 ? 'exhausted' : 'active',
            version: invite.version + 1,
            updatedAt: scope.now,
        };
    }

    /** Revokes the invite; with `circleId`, only an invite of that circle. */
    async revoke(actor: string, token: string, circleId?: string): Promise<ServiceResult<Invite>> {
        return runMutation(this.ctx, 'invite.revoke', async (scope) => {
            const invite = await scope.repos.invites.getByToken(token);
            if (!invite || (circleId !== undefined && invite.circleId !== circleId)) {
                throw notFound('invite');
            }

            await this.membership.authorize(scope, actor, invite.circleId, 'invite:revoke');

            if (invite.state === 'revoked') {
                return invite;
            }

            const meta = await scope.repos.invites.setState(token, 'revoked', invite.version, scope.now);
            if (meta.changes === 0) {
                throw concurrentModification('invite');
            }

            this.ctx.logger.info('invite_revoked', {
                circleId: invite.circleId,
                actor,
                tokenPrefix: tokenPrefix(token),
            });

            return { ...invite, state: 'revoked', version: invite.version + 1, updatedAt: scope.now };
        });
    }

    async list(actor: string, circleId: string): Promise<ServiceResult<Invite[]>> {
        return runQuery(this.ctx, async (scope) => {
            await this.membership.authorize(scope, actor, circleId, 'invite:list');
            const invites = await scope.repos.invites.listByCircle(circleId);
            return invites.map((invite) => ({ ...invite, state: effectiveState(invite, scope.now) }));
        });
    }

    /** Persists the expired state of active invites past their expiry. */
    async expireStale(): Promise<ServiceResult<number>> {
        return runMutation(this.ctx, 'invite.expire_stale', async (scope) => {
            const meta = await scope.repos.invites.expireStale(scope.now);
            if (meta.changes > 0) {
                this.ctx.logger.info('invites_expired', { count: meta.changes });
            }
            return meta.changes;
        });
    }
}
