import type { Queryable, QueryMeta } from '../utils/db';
import type { Circle, CirclePrivacy, CircleView } from '../types';
import type { CircleRow, CircleWithRoleRow } from '../db/row-types';
import { mapCircle, mapCircleView } from '../db/mappers';
import { executeUpdate, transforms, type FieldMapping } from './utils';

export interface CircleUpdate {
    name?: string;
    description?: string | null;
    privacy?: CirclePrivacy;
}

const CIRCLE_FIELD_MAPPINGS: FieldMapping<CircleUpdate>[] = [
    { key: 'name', column: 'name' },
    { key: 'description', column: 'description', transform: transforms.trimmedOrNull },
    { key: 'privacy', column: 'privacy' },
];

export class CircleRepository {
    constructor(private db: Queryable) {}

    async getById(id: string): Promise<Circle | null> {
        const row = await this.db.first<CircleRow>('SELECT * FROM circles WHERE id = ?', [id]);
        return row ? mapCircle(row) : null;
    }

    /** Circles the user belongs to, newest first, with the user's role. */
    async listForUser(userId: string): Promise<CircleView[]> {
        const result = await this.db.all<CircleWithRoleRow>(
            `SELECT c.*, m.role AS role
             FROM circles c
             JOIN circle_memberships m ON m.circle_id = c.id
             WHERE m.user_id = ?
             ORDER BY c.created_at DESC, c.rowid DESC`,
            [userId]
        );
        return result.results.map(mapCircleView);
    }

    /** Ids of circles in which the user holds the owner role. */
    async listOwnedIds(userId: string): Promise<string[]> {
        const result = await this.db.all<{ circle_id: string }>(
            `SELECT circle_id FROM circle_memberships
             WHERE user_id = ? AND role = 'owner'
             ORDER BY joined_at, rowid`,
            [userId]
        );
        return result.results.map((row) => row.circle_id);
    }

    async create(circle: Circle): Promise<QueryMeta> {
        return this.db.run(
            `INSERT INTO circles (id, type, name, description, privacy, created_by, created_at, updated_at)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
            [
                circle.id,
                circle.type,
                circle.name,
                circle.description,
                circle.privacy,
                circle.createdBy,
                circle.createdAt,
                circle.updatedAt,
            ]
        );
    }

    async update(id: string, updates: CircleUpdate, updatedAt: number): Promise<QueryMeta> {
        return executeUpdate(this.db, 'circles', id, updates, CIRCLE_FIELD_MAPPINGS, { updatedAt });
    }

    async delete(id: string): Promise<QueryMeta> {
        return this.db.run('DELETE FROM circles WHERE id = ?', [id]);
    }
}
