/**
 * Thread log — append-only, per-thread ordered storage of accepted envelopes.
 *
 * Thread keys:
 *   <group_id>              group threads
 *   dm:<address> <address>  direct threads, participants sorted
 *   profile:<pubkey>        every accepted change to one profile
 *
 * Group ids cannot contain ':', and addresses cannot contain spaces.
 */

import type Database from 'better-sqlite3';
import { isRecord } from 'esmp-sdk';
import type { Address, Envelope, ThreadRecord } from 'esmp-sdk';

const DEFAULT_READ_LIMIT = 100;
const MAX_READ_LIMIT = 1000;

export function directThreadKey(a: string, b: string): string {
  const [first, second] = a < b ? [a, b] : [b, a];
  return `dm:${first} ${second}`;
}

export function profileThreadKey(pubkey: string): string {
  return `profile:${pubkey}`;
}

/**
 * Who a direct envelope is from: `from`, then the system `actor`, then the signing key.
 */
export function senderIdentity(envelope: Envelope): string {
  if (envelope.type === 'text') return envelope.from ?? envelope.sender_pubkey;
  return envelope.actor;
}

/**
 * Threads an accepted envelope is appended to — its group, or one direct
 * thread per distinct recipient in `to` and `cc`.
 */
export function threadKeysFor(envelope: Envelope): string[] {
  if (envelope.group_id !== undefined) return [envelope.group_id];
  const sender = senderIdentity(envelope);
  const recipients = new Set<Address>([...envelope.to, ...(envelope.cc ?? [])]);
  return [...new Set([...recipients].map((r) => directThreadKey(sender, r)))];
}

/**
 * Append an envelope to a thread. Returns its sequence number (1 for the first).
 */
export function append(
  db: Database.Database,
  threadKey: string,
  envelope: Record<string, unknown>,
): number {
  const run = db.transaction((): number => {
    const head = db.prepare<[string], { last_seq: number }>(
      `INSERT INTO thread_heads (thread_key, last_seq) VALUES (?, 1)
       ON CONFLICT(thread_key) DO UPDATE SET last_seq = last_seq + 1
       RETURNING last_seq`
    ).get(threadKey);
    if (!head) throw new Error(`Failed to advance thread head for ${threadKey}`);

    db.prepare(
      'INSERT INTO thread_messages (thread_key, seq, envelope) VALUES (?, ?, ?)'
    ).run(threadKey, head.last_seq, JSON.stringify(envelope));
    return head.last_seq;
  });
  return run();
}

/**
 * Read a thread in sequence order, starting after `after`.
 */
export function read(
  db: Database.Database,
  threadKey: string,
  range: { after?: number; limit?: number } = {},
): ThreadRecord[] {
  const after = Math.max(0, range.after ?? 0);
  const limit = Math.min(Math.max(1, range.limit ?? DEFAULT_READ_LIMIT), MAX_READ_LIMIT);

  const rows = db.prepare<[string, number, number], {
    thread_key: string; seq: number; envelope: string; accepted_at: string;
  }>(
    `SELECT thread_key, seq, envelope, accepted_at FROM thread_messages
     WHERE thread_key = ? AND seq > ?
     ORDER BY seq ASC
     LIMIT ?`
  ).all(threadKey, after, limit);

  return rows.map((row) => {
    const envelope: unknown = JSON.parse(row.envelope);
    if (!isRecord(envelope)) {
      throw new Error(`Corrupt thread record ${row.thread_key}#${row.seq}`);
    }
    return { threadKey: row.thread_key, seq: row.seq, envelope, acceptedAt: row.accepted_at };
  });
}

/**
 * Last sequence number handed out for a thread, or 0.
 */
export function lastSeq(db: Database.Database, threadKey: string): number {
  const row = db.prepare<[string], { last_seq: number }>(
    'SELECT last_seq FROM thread_heads WHERE thread_key = ?'
  ).get(threadKey);
  return row?.last_seq ?? 0;
}
