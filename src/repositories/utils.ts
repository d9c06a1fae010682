export { UpdateBuilder, transforms, type FieldMapping } from '../utils/update-builder';

import type { Queryable, QueryMeta } from '../utils/db';
import { UpdateBuilder, type FieldMapping } from '../utils/update-builder';

export async function executeUpdate<T>(
    db: Queryable,
    table: string,
    id: string,
    updates: Partial<T>,
    mappings: FieldMapping<T>[],
    options?: { updatedAt?: number }
): Promise<QueryMeta> {
    const builder = new UpdateBuilder(updates, mappings);

    if (!builder.hasUpdates()) {
        return { changes: 0, duration: 0, lastRowId: 0 };
    }

    builder.addTimestamp('updated_at', options?.updatedAt);
    return db.run(builder.toSql(table), builder.getValues(id));
}
