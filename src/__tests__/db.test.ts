/**
 * Tests for the serialized SQLite wrapper and migrations
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { applyMigrations } from '../db/migrate';
import { createCircleDB, openDatabase, type CircleDB, type Queryable } from '../utils/db';
import { circleInputs, users } from './helpers/fixtures';
import { createTestContext, failureOf, unwrap } from './helpers/harness';

describe('CircleDB', () => {
  let db: CircleDB;

  beforeEach(async () => {
    db = createCircleDB(await openDatabase(':memory:'));
    await db.run('CREATE TABLE items (id INTEGER PRIMARY KEY, label TEXT NOT NULL)');
  });

  afterEach(() => {
    db.close();
  });

  it('should report changes and the inserted row id', async () => {
    // Act
    const meta = await db.run('INSERT INTO items (label) VALUES (?)', ['first']);

    // Assert
    expect(meta.changes).toBe(1);
    expect(meta.lastRowId).toBe(1);
  });

  it('should return null when no row matches', async () => {
    // Act
    const row = await db.first('SELECT * FROM items WHERE id = ?', [42]);

    // Assert
    expect(row).toBeNull();
  });

  it('should commit a transaction that resolves', async () => {
    // Act
    await db.transaction(async (tx) => {
      await tx.run('INSERT INTO items (label) VALUES (?)', ['kept']);
    });

    // Assert
    const rows = await db.all<{ label: string }>('SELECT label FROM items');
    expect(rows.results).toEqual([{ label: 'kept' }]);
  });

  it('should roll back a transaction that throws', async () => {
    // Act
    const outcome = db.transaction(async (tx) => {
      await tx.run('INSERT INTO items (label) VALUES (?)', ['dropped']);
      throw new Error('boom');
    });

    // Assert
    await expect(outcome).rejects.toThrow('boom');
    const rows = await db.all('SELECT * FROM items');
    expect(rows.results).toEqual([]);
  });

  it('should run transactions one after another', async () => {
    // Arrange
    const order: string[] = [];

    // Act
    await Promise.all([
      db.transaction(async () => {
        order.push('first:start');
        await new Promise((resolve) => setTimeout(resolve, 10));
        order.push('first:end');
      }),
      db.transaction(async () => {
        order.push('second:start');
      }),
    ]);

    // Assert
    expect(order).toEqual(['first:start', 'first:end', 'second:start']);
  });

  it('should keep serving after a failed transaction', async () => {
    // Arrange
    await expect(
      db.transaction(async () => {
        throw new Error('first fails');
      })
    ).rejects.toThrow('first fails');

    // Act
    const meta = await db.run('INSERT INTO items (label) VALUES (?)', ['after']);

    // Assert
    expect(meta.changes).toBe(1);
  });

  it('should refuse a transaction handle used after the transaction', async () => {
    // Arrange
    const captured: Queryable[] = [];
    await db.transaction(async (tx) => {
      captured.push(tx);
    });
    const [leaked] = captured;

    // Act & Assert
    expect(leaked).toBeDefined();
    await expect(Promise.resolve().then(() => leaked?.first('SELECT 1 AS one'))).rejects.toThrow(
      'Transaction handle used after the transaction finished'
    );
  });
});

describe('applyMigrations', () => {
  it('should apply each migration once', async () => {
    // Arrange
    const client = await openDatabase(':memory:');

    // Act
    const first = await applyMigrations(client);
    const second = await applyMigrations(client);

    // Assert
    expect(first).toEqual(['0001_init.sql']);
    expect(second).toEqual([]);
    client.close();
  });

  it('should allow at most one owner per circle', async () => {
    // Arrange
    const client = await openDatabase(':memory:');
    await applyMigrations(client);
    await client.executeMultiple(`
      INSERT INTO users (id, created_at) VALUES ('usr_a', 0), ('usr_b', 0);
      INSERT INTO circles (id, type, name, description, privacy, created_by, created_at, updated_at)
        VALUES ('circle_a', 'family', 'A', NULL, 'private', 'usr_a', 0, 0);
      INSERT INTO circle_memberships (circle_id, user_id, role, invited_by, joined_at)
        VALUES ('circle_a', 'usr_a', 'owner', NULL, 0);
    `);

    // Act & Assert
    await expect(
      client.execute(
        `INSERT INTO circle_memberships (circle_id, user_id, role, invited_by, joined_at)
         VALUES ('circle_a', 'usr_b', 'owner', NULL, 0)`
      )
    ).rejects.toThrow(/UNIQUE constraint failed/);
    client.close();
  });
});

describe('write lock held by another connection', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'circles-db-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should report lock contention as a retryable conflict', async () => {
    // Arrange
    const file = path.join(dir, 'circles.db');
    const holder = await createTestContext({ path: file });
    const contender = await createTestContext({ path: file, busyTimeoutMs: 20 });
    await holder.registerUsers(users.alice);

    let markLocked: () => void = () => undefined;
    let release: () => void = () => undefined;
    const locked = new Promise<void>((resolve) => {
      markLocked = resolve;
    });
    const held = holder.db.transaction(async () => {
      markLocked();
      await new Promise<void>((resolve) => {
        release = resolve;
      });
    });
    await locked;

    // Act
    const blocked = await contender.services.circles.createCircle(users.alice, circleInputs.family);
    release();
    await held;
    const retried = await contender.services.circles.createCircle(users.alice, circleInputs.family);

    // Assert
    expect(failureOf(blocked)).toMatchObject({
      code: 'CONFLICT',
      details: { resource: 'database', retryable: true },
    });
    expect(unwrap(retried).name).toBe('The Parkers');
    contender.close();
    holder.close();
  });
});
