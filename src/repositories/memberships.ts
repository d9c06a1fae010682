import type { Queryable, QueryMeta } from '../utils/db';
import type { CircleMembership, CircleRole } from '../types';
import type { CountRow, MembershipRow } from '../db/row-types';
import { mapMembership } from '../db/mappers';

export class MembershipRepository {
    constructor(private db: Queryable) {}

    async get(circleId: string, userId: string): Promise<CircleMembership | null> {
        const row = await this.db.first<MembershipRow>(
            'SELECT * FROM circle_memberships WHERE circle_id = ? AND user_id = ?',
            [circleId, userId]
        );
        return row ? mapMembership(row) : null;
    }

    async getOwner(circleId: string): Promise<CircleMembership | null> {
        const row = await this.db.first<MembershipRow>(
            "SELECT * FROM circle_memberships WHERE circle_id = ? AND role = 'owner'",
            [circleId]
        );
        return row ? mapMembership(row) : null;
    }

    async listByCircle(circleId: string): Promise<CircleMembership[]> {
        const result = await this.db.all<MembershipRow>(
            'SELECT * FROM circle_memberships WHERE circle_id = ? ORDER BY joined_at, rowid',
            [circleId]
        );
        return result.results.map(mapMembership);
    }

    async add(membership: CircleMembership): Promise<QueryMeta> {
        return this.db.run(
            `INSERT INTO circle_memberships (circle_id, user_id, role, invited_by, joined_at)
             VALUES (?, ?, ?, ?, ?)`,
            [membership.circleId, membership.userId, membership.role, membership.invitedBy, membership.joinedAt]
        );
    }

    async updateRole(circleId: string, userId: string, role: CircleRole): Promise<QueryMeta> {
        return this.db.run(
            'UPDATE circle_memberships SET role = ? WHERE circle_id = ? AND user_id = ?',
            [role, circleId, userId]
        );
    }

    async remove(circleId: string, userId: string): Promise<QueryMeta> {
        return this.db.run(
            'DELETE FROM circle_memberships WHERE circle_id = ? AND user_id = ?',
            [circleId, userId]
        );
    }

    async removeAll(circleId: string): Promise<QueryMeta> {
        return this.db.run('DELETE FROM circle_memberships WHERE circle_id = ?', [circleId]);
    }

    async count(circleId: string): Promise<number> {
        const result = await this.db.first<CountRow>(
            'SELECT COUNT(*) AS count FROM circle_memberships WHERE circle_id = ?',
            [circleId]
        );
        return result?.count ?? 0;
    }

    async countOwners(circleId: string): Promise<number> {
        const result = await this.db.first<CountRow>(
            "SELECT COUNT(*) AS count FROM circle_memberships WHERE circle_id = ? AND role = 'owner'",
            [circleId]
        );
        return result?.count ?? 0;
    }
}
