import { ERROR_MESSAGES } from '../../constants/errors';
import type { CircleMembership, CircleRole, ServiceResult } from '../../types';
import { CircleEvents } from '../events/types';
import type { QuotaEnforcer } from '../quota';
import {
    concurrentModification,
    duplicate,
    invalidRole,
    notFound,
    ownershipConflict,
    permissionDenied,
    runMutation,
    runQuery,
    type ServiceContext,
    type TxScope,
} from '../shared';
import { hasRoleAtLeast, isAllowed, ROLE_RANK, type CircleOperation } from './permissions';
import type { AuthorizedMember, DissolveReason, RemovalResult, RemoveMemberOptions } from './types';

// MembershipManager - roles, permission checks and membership changes.
// Every circle keeps exactly one owner: ownership moves only through
// transferOwnership, and the owner leaves only by naming a successor or by
// being the last member, which dissolves the circle.
export class MembershipManager {
    constructor(
        private ctx: ServiceContext,
        private quota: QuotaEnforcer
    ) {}

    async checkPermission(
        actor: string,
        circleId: string,
        requiredRole: CircleRole
    ): Promise<ServiceResult<CircleMembership>> {
        return runQuery(this.ctx, (scope) => this.requireRole(scope, actor, circleId, requiredRole));
    }

    async listMembers(actor: string, circleId: string): Promise<ServiceResult<CircleMembership[]>> {
        return runQuery(this.ctx, async (scope) => {
            await this.authorize(scope, actor, circleId, 'member:list');
            return scope.repos.memberships.listByCircle(circleId);
        });
    }

    async addMember(
        actor: string,
        circleId: string,
        targetUserId: string,
        role: CircleRole = 'member'
    ): Promise<ServiceResult<CircleMembership>> {
        return runMutation(this.ctx, 'membership.add', async (scope) => {
            if (role === 'owner') {
                throw invalidRole();
            }

            await this.authorize(scope, actor, circleId, 'member:add');

            const target = await scope.repos.users.getById(targetUserId);
            if (!target) {
                throw notFound('user');
            }

            const membership: CircleMembership = {
                circleId,
                userId: targetUserId,
                role,
                invitedBy: actor,
                joinedAt: scope.now,
            };
            await this.insertMembership(scope, membership);

            scope.emit({
                type: CircleEvents.MEMBER_ADDED,
                circleId,
                userId: targetUserId,
                role,
                addedBy: actor,
                via: 'direct',
                occurredAt: scope.now,
            });
            this.ctx.logger.info('member_added', { circleId, userId: targetUserId, role, actor });

            return membership;
        });
    }

    async updateRole(
        actor: string,
        circleId: string,
        targetUserId: string,
        newRole: CircleRole
    ): Promise<ServiceResult<CircleMembership>> {
        return runMutation(this.ctx, 'membership.update_role', async (scope) => {
            const { membership: owner } = await this.authorize(scope, actor, circleId, 'member:update_role');

            const target = await scope.repos.memberships.get(circleId, targetUserId);
            if (!target) {
                throw notFound('membership');
            }

            if (target.role === newRole) {
                return target;
            }

            if (newRole === 'owner') {
                await this.transferOwnership(scope, circleId, owner.userId, targetUserId);
                return { ...target, role: newRole };
            }

            if (target.role === 'owner') {
                throw ownershipConflict(ERROR_MESSAGES.MEMBERSHIP.SOLE_OWNER_DEMOTION);
            }

            await scope.repos.memberships.updateRole(circleId, targetUserId, newRole);
            this.ctx.logger.info('member_role_updated', {
                circleId,
                userId: targetUserId,
                from: target.role,
                to: newRole,
                actor,
            });

            return { ...target, role: newRole };
        });
    }

    async removeMember(
        actor: string,
        circleId: string,
        targetUserId: string,
        options: RemoveMemberOptions = {}
    ): Promise<ServiceResult<RemovalResult>> {
        return runMutation(this.ctx, 'membership.remove', async (scope) => {
            const circle = await scope.repos.circles.getById(circleId);
            if (!circle) {
                throw notFound('circle');
            }

            const actorMembership = await scope.repos.memberships.get(circleId, actor);
            if (!actorMembership) {
                throw permissionDenied(ERROR_MESSAGES.MEMBERSHIP.NOT_A_MEMBER);
            }

            const selfRemoval = actor === targetUserId;
            const target = selfRemoval
                ? actorMembership
                : await scope.repos.memberships.get(circleId, targetUserId);
            if (!target) {
                throw notFound('membership');
            }

            if (!selfRemoval) {
                const outranked = ROLE_RANK[target.role] > ROLE_RANK[actorMembership.role];
                if (!isAllowed(actorMembership.role, 'member:remove') || target.role === 'owner' || outranked) {
                    throw permissionDenied();
                }
            }

            const reason = selfRemoval ? 'left' : 'removed';
            let newOwnerId: string | null = null;

            if (target.role === 'owner') {
                const memberCount = await scope.repos.memberships.count(circleId);

                if (memberCount === 1) {
                    scope.emit({
                        type: CircleEvents.MEMBER_REMOVED,
                        circleId,
                        userId: targetUserId,
                        removedBy: actor,
                        reason,
                        occurredAt: scope.now,
                    });
                    await this.dissolveCircle(scope, circleId, actor, 'last_member_left');
                    return { circleId, userId: targetUserId, circleDeleted: true, newOwnerId: null };
                }

                const successorId = options.successorId;
                if (!successorId) {
                    throw ownershipConflict(ERROR_MESSAGES.MEMBERSHIP.OWNER_MUST_TRANSFER);
                }
                if (successorId === targetUserId) {
                    throw ownershipConflict(ERROR_MESSAGES.MEMBERSHIP.INVALID_SUCCESSOR);
                }

                await this.transferOwnership(scope, circleId, targetUserId, successorId);
                newOwnerId = successorId;
            }

            const meta = await scope.repos.memberships.remove(circleId, targetUserId);
            if (meta.changes === 0) {
                throw concurrentModification('membership');
            }

            scope.emit({
                type: CircleEvents.MEMBER_REMOVED,
                circleId,
                userId: targetUserId,
                removedBy: actor,
                reason,
                occurredAt: scope.now,
            });
            this.ctx.logger.info('member_removed', { circleId, userId: targetUserId, actor, reason });

            return { circleId, userId: targetUserId, circleDeleted: false, newOwnerId };
        });
    }

    async leave(actor: string, circleId: string, successorId?: string): Promise<ServiceResult<RemovalResult>> {
        return this.removeMember(actor, circleId, actor, { successorId });
    }

    /** Ensures the actor holds `requiredRole` or higher in the circle. */
    async requireRole(
        scope: TxScope,
        actor: string,
        circleId: string,
        requiredRole: CircleRole
    ): Promise<CircleMembership> {
        const { membership } = await this.findMember(scope, actor, circleId);
        if (!hasRoleAtLeast(membership.role, requiredRole)) {
            throw permissionDenied();
        }
        return membership;
    }

    /** Ensures the actor's role may perform `operation` in the circle. */
    async authorize(
        scope: TxScope,
        actor: string,
        circleId: string,
        operation: CircleOperation
    ): Promise<AuthorizedMember> {
        const member = await this.findMember(scope, actor, circleId);
        if (!isAllowed(member.membership.role, operation)) {
            this.ctx.logger.warn('Access denied', { circleId, actor, operation, role: member.membership.role });
            throw permissionDenied();
        }
        return member;
    }

    async insertMembership(scope: TxScope, membership: CircleMembership): Promise<void> {
        const existing = await scope.repos.memberships.get(membership.circleId, membership.userId);
        if (existing) {
            throw duplicate(ERROR_MESSAGES.MEMBERSHIP.ALREADY_MEMBER);
        }
        await scope.repos.memberships.add(membership);
    }

    /**
     * Moves the owner role and the circle-count unit that comes with it.
     * The previous owner stays on as admin.
     */
    async transferOwnership(scope: TxScope, circleId: string, fromUserId: string, toUserId: string): Promise<void> {
        const successor = await scope.repos.memberships.get(circleId, toUserId);
        if (!successor) {
            throw notFound('membership');
        }

        const handle = await this.quota.reserve(scope, 'circle', toUserId);
        this.quota.commit(handle);
        await this.quota.release(scope, this.quota.committed('circle', fromUserId));

        // Demote first: the schema allows at most one owner row per circle.
        const demoted = await scope.repos.memberships.updateRole(circleId, fromUserId, 'admin');
        const promoted = await scope.repos.memberships.updateRole(circleId, toUserId, 'owner');
        if (demoted.changes !== 1 || promoted.changes !== 1) {
            throw concurrentModification('membership');
        }

        scope.emit({
            type: CircleEvents.OWNERSHIP_TRANSFERRED,
            circleId,
            fromUserId,
            toUserId,
            occurredAt: scope.now,
        });
        this.ctx.logger.info('ownership_transferred', { circleId, fromUserId, toUserId });
    }

    /**
     * Deletes the circle with its memberships, invites and media counters,
     * and gives the owner's circle-count unit back.
     */
    async dissolveCircle(scope: TxScope, circleId: string, actor: string, reason: DissolveReason): Promise<void> {
        const members = await scope.repos.memberships.listByCircle(circleId);
        const owner = members.find((member) => member.role === 'owner');

        await scope.repos.invites.deleteByCircle(circleId);
        await scope.repos.memberships.removeAll(circleId);
        await scope.repos.usage.deleteForOwner('photo', circleId);
        await scope.repos.usage.deleteForOwner('story', circleId);
        await scope.repos.circles.delete(circleId);

        if (owner) {
            await this.quota.release(scope, this.quota.committed('circle', owner.userId));
        }

        scope.emit({
            type: CircleEvents.CIRCLE_DELETED,
            circleId,
            deletedBy: actor,
            reason,
            memberIds: members.map((member) => member.userId),
            occurredAt: scope.now,
        });
        this.ctx.logger.info('circle_deleted', { circleId, actor, reason, memberCount: members.length });
    }

    private async findMember(scope: TxScope, actor: string, circleId: string): Promise<AuthorizedMember> {
        const circle = await scope.repos.circles.getById(circleId);
        if (!circle) {
            throw notFound('circle');
        }

        const membership = await scope.repos.memberships.get(circleId, actor);
        if (!membership) {
            throw permissionDenied(ERROR_MESSAGES.MEMBERSHIP.NOT_A_MEMBER);
        }

        return { circle, membership };
    }
}
