import type { Queryable } from '../utils/db';
import type { User } from '../types';
import type { UserRow } from '../db/row-types';
import { mapUser } from '../db/mappers';

export class UserRepository {
    constructor(private db: Queryable) {}

    async getById(id: string): Promise<User | null> {
        const row = await this.db.first<UserRow>('SELECT * FROM users WHERE id = ?', [id]);
        return row ? mapUser(row) : null;
    }

    /** Inserts the user unless it already exists; returns the stored row. */
    async ensure(id: string, createdAt: number): Promise<{ user: User; created: boolean }> {
        const meta = await this.db.run(
            'INSERT INTO users (id, created_at) VALUES (?, ?) ON CONFLICT(id) DO NOTHING',
            [id, createdAt]
        );
        const user = await this.getById(id);
        if (!user) {
            throw new Error(`User ${id} missing after insert`);
        }
        return { user, created: meta.changes > 0 };
    }
}
