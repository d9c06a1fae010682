/**
 * Serialized SQLite wrapper for circle state.
 *
 * Every mutation runs inside `transaction()`, which opens `BEGIN IMMEDIATE`
 * so the write lock is taken up front and held until commit. Work on one
 * connection is queued: a transaction that awaits between statements never
 * interleaves with another transaction or a root-level query.
 *
 * Usage:
 *   const db = createCircleDB(await openDatabase(config.databasePath));
 *   const circle = await db.first<CircleRow>('SELECT * FROM circles WHERE id = ?', [circleId]);
 *   await db.transaction(async (tx) => {
 *       await tx.run('UPDATE usage_counters SET used = ? WHERE kind = ? AND owner_key = ?', [1, 'circle', userId]);
 *   });
 *
 * Calling `db.*` from inside a transaction callback waits behind that same
 * transaction and never resolves; always use the `tx` handle.
 */
import { createClient, LibsqlError, type Client, type InValue } from '@libsql/client';
import { concurrentModification } from '../services/shared/errors';

/** Query result types */
export interface QueryResult<T> {
    results: T[];
    success: boolean;
    meta: QueryMeta;
}

export interface QueryMeta {
    duration: number;
    changes: number;
    lastRowId: number;
}

/** Row type constraint - must be a record/object */
export type Row = Record<string, unknown>;

/**
 * Statement executor shared by the root handle and transaction handles.
 */
export interface Queryable {
    /** Execute a query and return the first matching row. */
    first<T extends Row>(sql: string, params?: unknown[]): Promise<T | null>;

    /** Execute a query and return all matching rows. */
    all<T extends Row>(sql: string, params?: unknown[]): Promise<QueryResult<T>>;

    /** Execute a write query (INSERT, UPDATE, DELETE). */
    run(sql: string, params?: unknown[]): Promise<QueryMeta>;
}

export interface CircleDB extends Queryable {
    /**
     * Run `work` in one IMMEDIATE transaction. Commits when the callback
     * resolves, rolls back when it throws and rethrows the error. A write
     * lock held by another connection past the busy timeout surfaces as a
     * retryable `CONFLICT`.
     */
    transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;

    close(): void;
}

export interface OpenDatabaseOptions {
    busyTimeoutMs?: number;
}

const BUSY_CODES = new Set(['SQLITE_BUSY', 'SQLITE_BUSY_SNAPSHOT']);

function isBusyError(error: unknown): boolean {
    return error instanceof LibsqlError && BUSY_CODES.has(error.code);
}

export async function openDatabase(path: string, options: OpenDatabaseOptions = {}): Promise<Client> {
    const client = createClient({ url: path === ':memory:' ? ':memory:' : `file:${path}` });
    if (path !== ':memory:') {
        await client.execute('PRAGMA journal_mode = WAL');
    }
    await client.execute('PRAGMA foreign_keys = ON');
    await client.execute(`PRAGMA busy_timeout = ${options.busyTimeoutMs ?? 5000}`);
    return client;
}

function toInValue(value: unknown): InValue {
    if (value === undefined || value === null) {
        return null;
    }
    if (
        typeof value === 'string' ||
        typeof value === 'number' ||
        typeof value === 'bigint' ||
        typeof value === 'boolean' ||
        value instanceof Date ||
        value instanceof Uint8Array ||
        value instanceof ArrayBuffer
    ) {
        return value;
    }
    throw new TypeError(`Unsupported SQL parameter of type ${typeof value}`);
}

function createExecutor(client: Client, assertOpen: () => void): Queryable {
    const execute = async (sql: string, params: unknown[]) => {
        assertOpen();
        return client.execute({ sql, args: params.map(toInValue) });
    };

    return {
        async first<T extends Row>(sql: string, params: unknown[] = []): Promise<T | null> {
            const result = await execute(sql, params);
            const [row] = result.rows;
            return row === undefined ? null : (row as unknown as T);
        },

        async all<T extends Row>(sql: string, params: unknown[] = []): Promise<QueryResult<T>> {
            const start = Date.now();
            const result = await execute(sql, params);
            return {
                results: result.rows as unknown as T[],
                success: true,
                meta: { duration: Date.now() - start, changes: 0, lastRowId: 0 },
            };
        },

        async run(sql: string, params: unknown[] = []): Promise<QueryMeta> {
            const start = Date.now();
            const result = await execute(sql, params);
            return {
                duration: Date.now() - start,
                changes: result.rowsAffected,
                lastRowId: Number(result.lastInsertRowid ?? 0),
            };
        },
    };
}

/**
 * Creates the serialized wrapper over an open client.
 *
 * @example
 * ```typescript
 * const client = await openDatabase(':memory:');
 * await applyMigrations(client);
 * const db = createCircleDB(client);
 * const count = await db.transaction(async (tx) => {
 *     const row = await tx.first<{ count: number }>('SELECT COUNT(*) AS count FROM circles');
 *     return row?.count ?? 0;
 * });
 * ```
 */
export function createCircleDB(client: Client): CircleDB {
    let tail: Promise<unknown> = Promise.resolve();

    const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
        const next = tail.then(task);
        // The caller observes failures through `next`; the queue only needs ordering.
        tail = next.then(
            () => undefined,
            () => undefined
        );
        return next;
    };

    const root = createExecutor(client, () => undefined);

    return {
        first: (sql, params) => enqueue(() => root.first(sql, params)),
        all: (sql, params) => enqueue(() => root.all(sql, params)),
        run: (sql, params) => enqueue(() => root.run(sql, params)),

        transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
            return enqueue(async () => {
                let open = true;
                const tx = createExecutor(client, () => {
                    if (!open) {
                        throw new Error('Transaction handle used after the transaction finished');
                    }
                });

                // client.transaction() swaps the connection out, which loses a
                // :memory: database; the queue already gives this client to one
                // transaction at a time.
                try {
                    await client.execute('BEGIN IMMEDIATE');
                } catch (error) {
                    open = false;
                    if (isBusyError(error)) {
                        throw concurrentModification('database');
                    }
                    throw error;
                }

                try {
                    const result = await work(tx);
                    await client.execute('COMMIT');
                    return result;
                } catch (error) {
                    await rollbackQuietly(client);
                    if (isBusyError(error)) {
                        throw concurrentModification('database');
                    }
                    throw error;
                } finally {
                    open = false;
                }
            });
        },

        close(): void {
            client.close();
        },
    };
}

async function rollbackQuietly(client: Client): Promise<void> {
    // SQLite already ended the transaction when a statement failed with an
    // automatic rollback; ROLLBACK then reports "no transaction is active".
    try {
        await client.execute('ROLLBACK');
    } catch (error) {
        if (!(error instanceof LibsqlError) || !/no transaction is active/i.test(error.message)) {
            throw error;
        }
    }
}
