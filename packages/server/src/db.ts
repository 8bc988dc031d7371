/**
 * SQLite database — schema and lifecycle.
 *
 * Uses better-sqlite3 for synchronous access: every state transition runs as
 * one transaction that finishes before any other request touches the store.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

let _db: Database.Database | null = null;

/**
 * Current schema version. Increment when schema changes.
 */
const SCHEMA_VERSION = 1;

const SCHEMA = `
  -- Groups — metadata, one row per group_id
  CREATE TABLE IF NOT EXISTS groups (
    id TEXT PRIMARY KEY,
    name TEXT,
    description TEXT,
    dp_url TEXT,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  -- Group members — position keeps join order, is_admin marks the admin set
  CREATE TABLE IF NOT EXISTS group_members (
    group_id TEXT NOT NULL,
    address TEXT NOT NULL,
    is_admin INTEGER NOT NULL DEFAULT 0 CHECK(is_admin IN (0, 1)),
    position INTEGER NOT NULL,
    PRIMARY KEY (group_id, address),
    FOREIGN KEY (group_id) REFERENCES groups(id)
  );

  -- Address bindings — the key an address first acted with
  CREATE TABLE IF NOT EXISTS address_bindings (
    address TEXT PRIMARY KEY,
    pubkey TEXT NOT NULL,
    bound_at TEXT DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  );

  -- Profiles — one row per public key; the address is stored encrypted
  CREATE TABLE IF NOT EXISTS profiles (
    pubkey TEXT PRIMARY KEY,
    first_name TEXT,
    first_name_visibility TEXT NOT NULL DEFAULT 'private' CHECK(first_name_visibility IN ('public', 'private')),
    middle_name TEXT,
    middle_name_visibility TEXT NOT NULL DEFAULT 'private' CHECK(middle_name_visibility IN ('public', 'private')),
    last_name TEXT,
    last_name_visibility TEXT NOT NULL DEFAULT 'private' CHECK(last_name_visibility IN ('public', 'private')),
    display_picture TEXT,
    display_picture_visibility TEXT NOT NULL DEFAULT 'private' CHECK(display_picture_visibility IN ('public', 'private')),
    address_ciphertext TEXT,
    address_nonce TEXT,
    updated_at TEXT NOT NULL
  );

  -- Thread heads — last sequence number handed out per thread
  CREATE TABLE IF NOT EXISTS thread_heads (
    thread_key TEXT PRIMARY KEY,
    last_seq INTEGER NOT NULL
  );

  -- Thread messages — append-only log of accepted envelopes
  CREATE TABLE IF NOT EXISTS thread_messages (
    thread_key TEXT NOT NULL,
    seq INTEGER NOT NULL,
    envelope TEXT NOT NULL,
    accepted_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now')),
    PRIMARY KEY (thread_key, seq)
  );

  CREATE INDEX IF NOT EXISTS idx_group_members_address ON group_members(address);
  CREATE INDEX IF NOT EXISTS idx_address_bindings_pubkey ON address_bindings(pubkey);
`;

/**
 * Open (or create) the database at the given path and apply the schema.
 */
export function initializeDatabase(dbPath: string): Database.Database {
  mkdirSync(dirname(dbPath), { recursive: true });

  const db = new Database(dbPath);

  db.pragma('busy_timeout = 5000');
  db.pragma('journal_mode = DELETE'); // Safe on all filesystems
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA);

  db.exec(`
    CREATE TABLE IF NOT EXISTS _meta (
      key TEXT PRIMARY KEY,
      value TEXT
    );
  `);
  db.prepare(
    'INSERT OR REPLACE INTO _meta (key, value) VALUES (?, ?)'
  ).run('schema_version', String(SCHEMA_VERSION));

  _db = db;
  return db;
}

/**
 * Close the database opened by initializeDatabase.
 */
export function closeDb(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}

/**
 * Get the stored schema version, or 0 for a database without one.
 */
export function getSchemaVersion(db: Database.Database): number {
  const row = db
    .prepare<[string], { value: string }>('SELECT value FROM _meta WHERE key = ?')
    .get('schema_version');
  return row ? parseInt(row.value, 10) : 0;
}
