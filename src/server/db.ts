import Database from 'better-sqlite3';
import type BetterSqlite3 from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { sqliteTable, text } from 'drizzle-orm/sqlite-core';
import { eq } from 'drizzle-orm';
import type { KeyValueStore, TransactionalStore } from '../engine/kv-store.js';

// ── Drizzle schema ──

export const kvEntries = sqliteTable('kv_entries', {
  key: text('key').primaryKey(),
  value: text('value').notNull(), // encoded record
  updatedAt: text('updated_at').notNull(),
});

// ── Database client ──

export type DbClient = ReturnType<typeof drizzle>;

export function createDb(dbPath: string): { db: DbClient; sqlite: BetterSqlite3.Database } {
  const sqlite = new Database(dbPath);
  sqlite.pragma('journal_mode = WAL');

  const db = drizzle(sqlite);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS kv_entries (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL,
      updated_at TEXT NOT NULL
    );
  `);

  return { db, sqlite };
}

// ── TransactionalStore implementation ──

/**
 * Key-value store over a single SQLite table. `transaction` opens an
 * IMMEDIATE transaction so concurrent writers queue on the database lock;
 * a throw inside `fn` rolls every write back.
 */
export class SqliteKeyValueStore implements TransactionalStore {
  constructor(
    private db: DbClient,
    private sqlite: BetterSqlite3.Database,
  ) {}

  get(key: string): string | null {
    const rows = this.db.select({ value: kvEntries.value }).from(kvEntries).where(eq(kvEntries.key, key)).all();
    if (rows.length === 0) return null;
    return rows[0].value;
  }

  put(key: string, value: string): void {
    const updatedAt = new Date().toISOString();
    this.db.insert(kvEntries).values({ key, value, updatedAt }).onConflictDoUpdate({
      target: kvEntries.key,
      set: { value, updatedAt },
    }).run();
  }

  delete(key: string): void {
    this.db.delete(kvEntries).where(eq(kvEntries.key, key)).run();
  }

  transaction<T>(fn: (tx: KeyValueStore) => T): T {
    if (this.sqlite.inTransaction) {
      throw new Error('Nested transactions are not supported');
    }
    return this.sqlite.transaction(() => fn(this)).immediate();
  }
}
