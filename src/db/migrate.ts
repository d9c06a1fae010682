import fs from 'node:fs';
import path from 'node:path';
import type { Client } from '@libsql/client';
import { logger } from '../utils/logger';

export const MIGRATIONS_DIR = path.resolve(__dirname, '..', '..', 'migrations');

/**
 * Applies every `*.sql` file in `dir` that has not run yet, in file name
 * order, each in its own transaction. Returns the names applied.
 */
export async function applyMigrations(client: Client, dir: string = MIGRATIONS_DIR): Promise<string[]> {
    await client.execute(
        `CREATE TABLE IF NOT EXISTS schema_migrations (
            name TEXT PRIMARY KEY,
            applied_at INTEGER NOT NULL
        )`
    );

    const { rows } = await client.execute('SELECT name FROM schema_migrations');
    const applied = new Set(rows.map((row) => String(row.name)));

    const pending = fs
        .readdirSync(dir)
        .filter((file) => file.endsWith('.sql') && !applied.has(file))
        .sort();

    for (const file of pending) {
        const sql = fs.readFileSync(path.join(dir, file), 'utf8');
        const name = file.replace(/'/g, "''");
        // executeMultiple rolls back whatever is still open if a statement fails.
        await client.executeMultiple(
            `BEGIN IMMEDIATE;
${sql}
;
INSERT INTO schema_migrations (name, applied_at) VALUES ('${name}', ${Date.now()});
COMMIT;`
        );
        logger.info('Migration applied', { migration: file });
    }

    return pending;
}
