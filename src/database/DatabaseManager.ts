import sqlite3 from "sqlite3";
import path from "path";
import fs from "fs/promises";
import { logger } from "../utils/logger.js";

export type SqlValue = string | number | null;

export interface RunResult {
  lastID: number; // For INSERT statements
  changes: number; // For INSERT, UPDATE, DELETE statements
}

const IN_MEMORY = ":memory:";

export class DatabaseManager {
  private db: sqlite3.Database | null = null;
  private dbPath: string;
  private initialized: boolean = false;
  private instanceId: string = Math.random().toString(36).slice(2, 11);
  private pendingWrites: number = 0;
  private idlePromise: Promise<void> = Promise.resolve();
  private resolveIdle: (() => void) | null = null;

  /**
   * Create a new DatabaseManager instance
   * @param dbPath Database file, or ":memory:" for a private in-memory database
   */
  constructor(dbPath?: string) {
    const storagePath = path.join(process.cwd(), process.env.STORAGE_PATH || "data");
    this.dbPath = dbPath || path.join(storagePath, "lms.db");

    logger.debug(`DatabaseManager created with ID: ${this.instanceId}`);
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /**
   * Initialize the database
   * @param dbPath Optional path to use for the database file
   */
  async initialize(dbPath?: string): Promise<void> {
    if (this.initialized) {
      logger.debug("DatabaseManager already initialized", {
        instanceId: this.instanceId,
        dbPath: this.dbPath,
      });
      return;
    }

    try {
      this.dbPath = dbPath || this.dbPath;
      if (this.dbPath !== IN_MEMORY) {
        await fs.mkdir(path.dirname(this.dbPath), { recursive: true });
      }

      await new Promise<void>((resolve, reject) => {
        this.db = new sqlite3.Database(this.dbPath, (err) => {
          if (err) {
            logger.error("Database connection failed", {
              instanceId: this.instanceId,
              error: err.message,
            });
            reject(err);
          } else {
            resolve();
          }
        });
      });

      await this.run("PRAGMA foreign_keys = ON");
      await this.createTables();

      this.initialized = true;

      logger.info(`Database initialized at ${this.dbPath}`, {
        instanceId: this.instanceId,
      });
    } catch (error) {
      logger.error("Failed to initialize database:", error);
      throw error;
    }
  }

  private async createTables(): Promise<void> {
    try {
      const queries = [
        // Users are owned by the LMS; the monitor reads them and stamps last_notification
        `CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        email TEXT NOT NULL UNIQUE,
        role TEXT NOT NULL DEFAULT 'student',
        last_active INTEGER,
        is_active INTEGER NOT NULL DEFAULT 1,
        last_notification INTEGER,
        created_at INTEGER DEFAULT (strftime('%s', 'now'))
      )`,

        `CREATE INDEX IF NOT EXISTS idx_users_role ON users(role)`,
        `CREATE INDEX IF NOT EXISTS idx_users_last_active ON users(last_active)`,

        `CREATE TABLE IF NOT EXISTS notifications (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL,
        message TEXT NOT NULL,
        sent_at INTEGER NOT NULL,
        FOREIGN KEY (user_id) REFERENCES users(id) ON DELETE CASCADE
      )`,

        `CREATE INDEX IF NOT EXISTS idx_notifications_user ON notifications(user_id)`,
        `CREATE INDEX IF NOT EXISTS idx_notifications_sent_at ON notifications(sent_at)`,

        // Append-only dispatch audit trail
        `CREATE TABLE IF NOT EXISTS dispatch_audit (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        cycle_id TEXT NOT NULL,
        recipient TEXT NOT NULL,
        recipient_email TEXT NOT NULL,
        timestamp INTEGER NOT NULL, -- epoch milliseconds
        status TEXT NOT NULL CHECK(status IN ('sent', 'failed')),
        reason TEXT
      )`,

        `CREATE INDEX IF NOT EXISTS idx_dispatch_audit_cycle ON dispatch_audit(cycle_id)`,
      ];

      for (const query of queries) {
        await this.run(query);
      }
    } catch (error) {
      logger.error("Failed to create tables:", error);
      throw error;
    }
  }

  private run(sql: string, params: SqlValue[] = []): Promise<RunResult> {
    return new Promise((resolve, reject) => {
      const db = this.db;
      if (db === null) {
        reject(new Error(`DatabaseManager.run() called before database initialization (instanceId: ${this.instanceId})`));
        return;
      }

      const manager = this;
      this.incrementWrites();
      db.run(sql, params, function (err) {
        manager.decrementWrites();
        if (err) {
          reject(err);
        } else {
          resolve({ lastID: this.lastID, changes: this.changes });
        }
      });
    });
  }

  private get(sql: string, params: SqlValue[] = []): Promise<unknown> {
    return new Promise((resolve, reject) => {
      if (this.db === null) {
        reject(new Error(`DatabaseManager.get() called before database initialization (instanceId: ${this.instanceId})`));
        return;
      }

      this.db.get(sql, params, (err: Error | null, row: unknown) => {
        if (err) reject(err);
        else resolve(row);
      });
    });
  }

  private all(sql: string, params: SqlValue[] = []): Promise<unknown[]> {
    return new Promise((resolve, reject) => {
      if (this.db === null) {
        reject(new Error(`DatabaseManager.all() called before database initialization (instanceId: ${this.instanceId})`));
        return;
      }

      this.db.all(sql, params, (err: Error | null, rows: unknown[]) => {
        if (err) reject(err);
        else resolve(rows);
      });
    });
  }

  // Public methods for database operations

  /**
   * Execute non-query operations (INSERT, UPDATE, DELETE, CREATE)
   */
  public execute(sql: string, params: SqlValue[] = []): Promise<RunResult> {
    return this.run(sql, params);
  }

  /**
   * Execute a query that returns a single row, or undefined when nothing matches.
   * Rows are untyped; callers validate them.
   */
  public query(sql: string, params: SqlValue[] = []): Promise<unknown> {
    return this.get(sql, params);
  }

  /**
   * Execute a query that returns multiple rows
   */
  public queryAll(sql: string, params: SqlValue[] = []): Promise<unknown[]> {
    return this.all(sql, params);
  }

  private incrementWrites() {
    if (this.pendingWrites === 0) {
      this.idlePromise = new Promise((resolve) => {
        this.resolveIdle = resolve;
      });
    }
    this.pendingWrites++;
  }

  private decrementWrites() {
    this.pendingWrites--;
    if (this.pendingWrites === 0 && this.resolveIdle) {
      this.resolveIdle();
      this.resolveIdle = null;
    }
  }

  async waitForIdle(): Promise<void> {
    return this.idlePromise;
  }

  async close(): Promise<void> {
    await this.waitForIdle();
    const db = this.db;
    if (db) {
      return new Promise((resolve, reject) => {
        db.close((err) => {
          if (err) {
            logger.error("Failed to close database:", err);
            reject(err);
          } else {
            this.db = null;
            this.initialized = false;
            logger.info("Database connection closed");
            resolve();
          }
        });
      });
    }
  }
}
