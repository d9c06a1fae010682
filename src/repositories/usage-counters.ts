import type { Queryable, QueryMeta } from '../utils/db';
import type { ResourceKind, UsageCounter } from '../types';
import type { UsageCounterRow } from '../db/row-types';
import { mapUsageCounter } from '../db/mappers';

export class UsageCounterRepository {
    constructor(private db: Queryable) {}

    async get(kind: ResourceKind, ownerKey: string): Promise<UsageCounter | null> {
        const row = await this.db.first<UsageCounterRow>(
            'SELECT * FROM usage_counters WHERE kind = ? AND owner_key = ?',
            [kind, ownerKey]
        );
        return row ? mapUsageCounter(row) : null;
    }

    async getUsed(kind: ResourceKind, ownerKey: string): Promise<number> {
        const counter = await this.get(kind, ownerKey);
        return counter?.used ?? 0;
    }

    /**
     * Compare-and-swap write of `used`. `expectedVersion` null means the
     * counter is expected not to exist yet. Zero changes means a lost race.
     */
    async compareAndSet(
        kind: ResourceKind,
        ownerKey: string,
        used: number,
        expectedVersion: number | null,
        now: number
    ): Promise<QueryMeta> {
        if (expectedVersion === null) {
            return this.db.run(
                `INSERT INTO usage_counters (kind, owner_key, used, version, updated_at)
                 VALUES (?, ?, ?, 1, ?)
                 ON CONFLICT(kind, owner_key) DO NOTHING`,
                [kind, ownerKey, used, now]
            );
        }

        return this.db.run(
            `UPDATE usage_counters SET used = ?, version = version + 1, updated_at = ?
             WHERE kind = ? AND owner_key = ? AND version = ?`,
            [used, now, kind, ownerKey, expectedVersion]
        );
    }

    async deleteForOwner(kind: ResourceKind, ownerKey: string): Promise<QueryMeta> {
        return this.db.run('DELETE FROM usage_counters WHERE kind = ? AND owner_key = ?', [kind, ownerKey]);
    }
}
