import { MAX_MEDIA_RESERVATION } from '../../constants/quota';
import type {
    Circle,
    CircleDetails,
    CircleMembership,
    CircleView,
    MediaKind,
    ServiceResult,
    UsageStatus,
} from '../../types';
import { CircleEvents } from '../events/types';
import type { InviteService } from '../invite';
import type { MembershipManager } from '../membership';
import type { QuotaEnforcer } from '../quota';
import {
    generateId,
    notFound,
    runMutation,
    runQuery,
    validationFailed,
    type ServiceContext,
} from '../shared';
import type { CreateCircleInput, DeleteResult, JoinResult, UpdateCircleInput } from './types';

const MAX_NAME_LENGTH = 100;

function normalizeName(name: string): string {
    const trimmed = name.trim();
    if (trimmed.length === 0 || trimmed.length > MAX_NAME_LENGTH) {
        throw validationFailed(`name must be between 1 and ${MAX_NAME_LENGTH} characters`, { field: 'name' });
    }
    return trimmed;
}

function normalizeDescription(description: string | null | undefined): string | null {
    const trimmed = description?.trim();
    return trimmed ? trimmed : null;
}

function validateAmount(amount: number): void {
    if (!Number.isInteger(amount) || amount < 1 || amount > MAX_MEDIA_RESERVATION) {
        throw validationFailed(`amount must be an integer between 1 and ${MAX_MEDIA_RESERVATION}`, { amount });
    }
}

// CircleRegistry - circle lifecycle, invite joins and media usage.
export class CircleRegistry {
    constructor(
        private ctx: ServiceContext,
        private quota: QuotaEnforcer,
        private membership: MembershipManager,
        private invites: InviteService
    ) {}

    async createCircle(actor: string, input: CreateCircleInput): Promise<ServiceResult<CircleView>> {
        return runMutation(this.ctx, 'circle.create', async (scope) => {
            const name = normalizeName(input.name);

            const handle = await this.quota.reserve(scope, 'circle', actor);

            const circle: Circle = {
                id: generateId('circle'),
                type: input.type,
                name,
                description: normalizeDescription(input.description),
                privacy: input.privacy ?? 'members_only',
                createdBy: actor,
                createdAt: scope.now,
                updatedAt: scope.now,
            };
            await scope.repos.circles.create(circle);
            await scope.repos.memberships.add({
                circleId: circle.id,
                userId: actor,
                role: 'owner',
                invitedBy: null,
                joinedAt: scope.now,
            });

            this.quota.commit(handle);
            this.ctx.logger.info('circle_created', { circleId: circle.id, actor, type: circle.type });

            return { ...circle, role: 'owner' };
        });
    }

    async listCircles(actor: string): Promise<ServiceResult<CircleView[]>> {
        return runQuery(this.ctx, (scope) => scope.repos.circles.listForUser(actor));
    }

    async getCircle(actor: string, circleId: string): Promise<ServiceResult<CircleDetails>> {
        return runQuery(this.ctx, async (scope) => {
            const { circle, membership } = await this.membership.authorize(scope, actor, circleId, 'circle:read');

            const memberCount = await scope.repos.memberships.count(circleId);
            const photoCount = await scope.repos.usage.getUsed('photo', circleId);
            const storyCount = await scope.repos.usage.getUsed('story', circleId);

            return {
                ...circle,
                role: membership.role,
                stats: { memberCount, photoCount, storyCount },
            };
        });
    }

    async updateCircle(actor: string, circleId: string, input: UpdateCircleInput): Promise<ServiceResult<CircleView>> {
        return runMutation(this.ctx, 'circle.update', async (scope) => {
            const { circle, membership } = await this.membership.authorize(scope, actor, circleId, 'circle:update');

            const updates = {
                name: input.name === undefined ? undefined : normalizeName(input.name),
                description: input.description === undefined ? undefined : normalizeDescription(input.description),
                privacy: input.privacy,
            };

            const meta = await scope.repos.circles.update(circleId, updates, scope.now);
            if (meta.changes === 0) {
                return { ...circle, role: membership.role };
            }

            const updated = await scope.repos.circles.getById(circleId);
            if (!updated) {
                throw notFound('circle');
            }

            this.ctx.logger.info('circle_updated', { circleId, actor });
            return { ...updated, role: membership.role };
        });
    }

    async deleteCircle(actor: string, circleId: string): Promise<ServiceResult<DeleteResult>> {
        return runMutation(this.ctx, 'circle.delete', async (scope) => {
            await this.membership.authorize(scope, actor, circleId, 'circle:delete');
            await this.membership.dissolveCircle(scope, circleId, actor, 'deleted');
            return { circleId, deleted: true };
        });
    }

    async joinViaInvite(userId: string, token: string): Promise<ServiceResult<JoinResult>> {
        return runMutation(this.ctx, 'circle.join', async (scope) => {
            const user = await scope.repos.users.getById(userId);
            if (!user) {
                throw notFound('user');
            }

            const invite = await this.invites.consume(scope, token, userId);

            const circle = await scope.repos.circles.getById(invite.circleId);
            if (!circle) {
                throw notFound('circle');
            }

            const membership: CircleMembership = {
                circleId: invite.circleId,
                userId,
                role: 'member',
                invitedBy: invite.createdBy,
                joinedAt: scope.now,
            };
            await this.membership.insertMembership(scope, membership);

            scope.emit({
                type: CircleEvents.MEMBER_ADDED,
                circleId: invite.circleId,
                userId,
                role: 'member',
                addedBy: invite.createdBy,
                via: 'invite',
                occurredAt: scope.now,
            });
            this.ctx.logger.info('circle_joined', { circleId: invite.circleId, userId });

            return { circle: { ...circle, role: 'member' }, membership };
        });
    }

    async recordMedia(
        actor: string,
        circleId: string,
        kind: MediaKind,
        amount: number = 1
    ): Promise<ServiceResult<UsageStatus>> {
        return runMutation(this.ctx, 'usage.record', async (scope) => {
            validateAmount(amount);
            await this.membership.authorize(scope, actor, circleId, 'usage:record');

            const handle = await this.quota.reserve(scope, kind, circleId, amount);
            this.quota.commit(handle);

            return this.quota.usageWithin(scope, kind, circleId);
        });
    }

    async releaseMedia(
        actor: string,
        circleId: string,
        kind: MediaKind,
        amount: number = 1
    ): Promise<ServiceResult<UsageStatus>> {
        return runMutation(this.ctx, 'usage.release', async (scope) => {
            validateAmount(amount);
            await this.membership.authorize(scope, actor, circleId, 'usage:record');

            await this.quota.release(scope, this.quota.committed(kind, circleId, amount));

            return this.quota.usageWithin(scope, kind, circleId);
        });
    }
}
