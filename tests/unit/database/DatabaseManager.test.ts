import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { DatabaseManager } from '../../../src/database/DatabaseManager.js';
import { createTempDir, removeTempDir } from '../../utils/testHelpers.js';

const tableNames = z.array(z.object({ name: z.string() }));

describe('DatabaseManager', () => {
  let dbManager: DatabaseManager;

  beforeEach(() => {
    dbManager = new DatabaseManager(':memory:');
  });

  afterEach(async () => {
    await dbManager.close();
  });

  describe('initialize', () => {
    it('should create the monitor tables', async () => {
      await dbManager.initialize();

      const rows = tableNames.parse(
        await dbManager.queryAll(
          "SELECT name FROM sqlite_master WHERE type = 'table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
        )
      );
      expect(rows.map((row) => row.name)).toEqual(['dispatch_audit', 'notifications', 'users']);
      expect(dbManager.isInitialized()).toBe(true);
    });

    it('should be safe to call twice', async () => {
      await dbManager.initialize();
      await dbManager.execute("INSERT INTO users (name, email) VALUES ('Alice', 'alice@example.edu')");

      await dbManager.initialize();

      expect(await dbManager.queryAll('SELECT id FROM users')).toEqual([{ id: 1 }]);
    });

    it('should create the directory of a database file', async () => {
      const dir = await createTempDir();
      const fileManager = new DatabaseManager(path.join(dir, 'nested', 'lms.db'));
      try {
        await fileManager.initialize();

        await expect(fs.stat(path.join(dir, 'nested', 'lms.db'))).resolves.toBeDefined();
      } finally {
        await fileManager.close();
        await removeTempDir(dir);
      }
    });

    it('should enforce the audit status constraint', async () => {
      await dbManager.initialize();

      await expect(
        dbManager.execute(
          `INSERT INTO dispatch_audit (cycle_id, recipient, recipient_email, timestamp, status)
           VALUES ('cycle_a', 'u1', 'u1@example.edu', 0, 'queued')`
        )
      ).rejects.toThrow(/CHECK constraint failed/);
    });
  });

  describe('queries', () => {
    beforeEach(async () => {
      await dbManager.initialize();
    });

    it('should report the inserted id and changed rows', async () => {
      const insert = await dbManager.execute('INSERT INTO users (name, email, role) VALUES (?, ?, ?)', [
        'Alice',
        'alice@example.edu',
        'student'
      ]);
      const update = await dbManager.execute('UPDATE users SET is_active = 0 WHERE role = ?', ['student']);

      expect(insert).toEqual({ lastID: 1, changes: 1 });
      expect(update.changes).toBe(1);
    });

    it('should resolve undefined when a single-row query matches nothing', async () => {
      expect(await dbManager.query('SELECT id FROM users WHERE id = ?', [42])).toBeUndefined();
    });

    it('should apply column defaults', async () => {
      await dbManager.execute("INSERT INTO users (name, email) VALUES ('Bob', 'bob@example.edu')");

      expect(await dbManager.query('SELECT role, is_active, last_active FROM users')).toEqual({
        role: 'student',
        is_active: 1,
        last_active: null
      });
    });

    it('should cascade notification deletes with the user', async () => {
      await dbManager.execute("INSERT INTO users (name, email) VALUES ('Bob', 'bob@example.edu')");
      await dbManager.execute("INSERT INTO notifications (user_id, message, sent_at) VALUES (1, 'hello', 0)");

      await dbManager.execute('DELETE FROM users WHERE id = 1');

      expect(await dbManager.queryAll('SELECT id FROM notifications')).toEqual([]);
    });

    it('should settle pending writes before resolving waitForIdle', async () => {
      const write = dbManager.execute("INSERT INTO users (name, email) VALUES ('Bob', 'bob@example.edu')");

      await dbManager.waitForIdle();

      await expect(write).resolves.toEqual({ lastID: 1, changes: 1 });
    });
  });

  it('should reject queries before initialization', async () => {
    await expect(dbManager.queryAll('SELECT 1')).rejects.toThrow(
      'DatabaseManager.all() called before database initialization'
    );
  });

  it('should mark itself uninitialized after close', async () => {
    await dbManager.initialize();

    await dbManager.close();

    expect(dbManager.isInitialized()).toBe(false);
  });
});
