import type { Queryable, QueryMeta } from '../utils/db';
import type { Invite, InviteState } from '../types';
import type { InviteRow } from '../db/row-types';
import { mapInvite } from '../db/mappers';

export class InviteRepository {
    constructor(private db: Queryable) {}

    async getByToken(token: string): Promise<Invite | null> {
        const row = await this.db.first<InviteRow>('SELECT * FROM invites WHERE token = ?', [token]);
        return row ? mapInvite(row) : null;
    }

    async listByCircle(circleId: string): Promise<Invite[]> {
        const result = await this.db.all<InviteRow>(
            'SELECT * FROM invites WHERE circle_id = ? ORDER BY created_at DESC, rowid DESC',
            [circleId]
        );
        return result.results.map(mapInvite);
    }

    async create(invite: Invite): Promise<QueryMeta> {
        return this.db.run(
            `INSERT INTO invites
                (token, circle_id, created_by, max_uses, uses_remaining, expires_at, state, version, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                invite.token,
                invite.circleId,
                invite.createdBy,
                invite.maxUses,
                invite.usesRemaining,
                invite.expiresAt,
                invite.state,
                invite.version,
                invite.createdAt,
                invite.updatedAt,
            ]
        );
    }

    /**
     * Takes one use if the row is still at `expectedVersion` and active.
     * Reaching zero uses moves the invite to `exhausted`. Zero changes means
     * the row moved on since it was read.
     */
    async consumeUse(token: string, expectedVersion: number, now: number): Promise<QueryMeta> {
        return this.db.run(
            `UPDATE invites
             SET uses_remaining = uses_remaining - 1,
                 state = CASE WHEN uses_remaining - 1 = 0 THEN 'exhausted' ELSE state END,
                 version = version + 1,
                 updated_at = ?
             WHERE token = ? AND version = ? AND state = 'active' AND uses_remaining > 0`,
            [now, token, expectedVersion]
        );
    }

    async setState(token: string, state: InviteState, expectedVersion: number, now: number): Promise<QueryMeta> {
        return this.db.run(
            `UPDATE invites SET state = ?, version = version + 1, updated_at = ?
             WHERE token = ? AND version = ?`,
            [state, now, token, expectedVersion]
        );
    }

    /** Marks active invites past their expiry as expired. */
    async expireStale(now: number): Promise<QueryMeta> {
        return this.db.run(
            `UPDATE invites SET state = 'expired', version = version + 1, updated_at = ?
             WHERE state = 'active' AND expires_at < ?`,
            [now, now]
        );
    }

    async deleteByCircle(circleId: string): Promise<QueryMeta> {
        return this.db.run('DELETE FROM invites WHERE circle_id = ?', [circleId]);
    }
}
