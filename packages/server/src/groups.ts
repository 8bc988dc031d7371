/**
 * Group state machine — membership, admins, and metadata driven by system messages.
 *
 *   group_created                                  nonexistent -> active
 *   joined / left                                  any actor, on themselves
 *   removed / admin_assigned / admin_revoked       admins only, on a target
 *   group_renamed / description_updated / dp_updated  admins only
 *
 * `transition` is pure; the store functions below persist its result. A
 * group's metadata is always the fold of `transition` over its thread log.
 */

import type Database from 'better-sqlite3';
import { isLaterThan, validateEnvelope } from 'esmp-sdk';
import type { Address, GroupMetadata, GroupSubtype, GroupSystemEnvelope } from 'esmp-sdk';
import { reject, type Outcome } from './errors.js';
import { read } from './thread-log.js';

export type TransitionResult = Outcome<{ group: GroupMetadata }>;

/**
 * May `actor` perform `subtype` on `group`? Membership changes on oneself are
 * open to anyone; everything else needs an admin.
 */
export function isAuthorized(group: GroupMetadata, actor: Address, subtype: GroupSubtype): boolean {
  switch (subtype) {
    case 'group_created':
    case 'joined':
    case 'left':
      return true;
    default:
      return group.admins.includes(actor);
  }
}

/** Keep admins ⊆ members, ordered as members are. */
function withAdmins(group: GroupMetadata, admins: Set<Address>): GroupMetadata {
  return { ...group, admins: group.members.filter((m) => admins.has(m)) };
}

/**
 * Apply one system message to a group's current state (null when it does not exist yet).
 */
export function transition(
  current: GroupMetadata | null,
  envelope: GroupSystemEnvelope,
): TransitionResult {
  const { actor, timestamp, group_id: groupId } = envelope;

  if (envelope.subtype === 'group_created') {
    if (current) return reject('DuplicateGroup', `Group ${groupId} already exists`, 'group_id');
    return {
      ok: true,
      group: {
        group_id: groupId,
        group_name: envelope.new_name ?? null,
        group_description: envelope.new_description ?? null,
        group_dp_url: envelope.new_dp_url ?? null,
        admins: [actor],
        members: [actor],
        created_at: timestamp,
        updated_at: timestamp,
      },
    };
  }

  if (!current) return reject('UnknownGroup', `Group ${groupId} does not exist`, 'group_id');

  if (!isLaterThan(timestamp, current.updated_at)) {
    return reject(
      'StaleMutation',
      `timestamp ${timestamp} is not after the group's last update (${current.updated_at})`,
      'timestamp',
    );
  }

  if (!isAuthorized(current, actor, envelope.subtype)) {
    return reject('Forbidden', `${actor} is not an admin of ${groupId}`, 'actor');
  }

  const members = current.members;
  const admins = new Set(current.admins);
  let next: GroupMetadata = { ...current, members: [...members], updated_at: timestamp };

  switch (envelope.subtype) {
    case 'joined':
      if (members.includes(actor)) {
        return reject('InvalidTransition', `${actor} is already a member of ${groupId}`, 'actor');
      }
      next.members.push(actor);
      break;
    case 'left':
      if (!members.includes(actor)) {
        return reject('InvalidTransition', `${actor} is not a member of ${groupId}`, 'actor');
      }
      next.members = members.filter((m) => m !== actor);
      admins.delete(actor);
      break;
    case 'removed':
      if (!members.includes(envelope.target)) {
        return reject('InvalidTransition', `${envelope.target} is not a member of ${groupId}`, 'target');
      }
      next.members = members.filter((m) => m !== envelope.target);
      admins.delete(envelope.target);
      break;
    case 'admin_assigned':
      if (!members.includes(envelope.target)) {
        return reject('InvalidTransition', `${envelope.target} is not a member of ${groupId}`, 'target');
      }
      admins.add(envelope.target);
      break;
    case 'admin_revoked':
      if (!admins.has(envelope.target)) {
        return reject('InvalidTransition', `${envelope.target} is not an admin of ${groupId}`, 'target');
      }
      admins.delete(envelope.target);
      break;
    case 'group_renamed':
      next = { ...next, group_name: envelope.new_name };
      break;
    case 'description_updated':
      next = { ...next, group_description: envelope.new_description };
      break;
    case 'dp_updated':
      next = { ...next, group_dp_url: envelope.new_dp_url };
      break;
  }

  return { ok: true, group: withAdmins(next, admins) };
}

/**
 * Rebuild a group's metadata from accepted log records. Records that are not
 * group system messages (text in the group thread) are skipped.
 */
export function replayGroup(records: Iterable<Record<string, unknown>>): GroupMetadata | null {
  let group: GroupMetadata | null = null;
  for (const record of records) {
    const parsed = validateEnvelope(record);
    if (!parsed.ok) throw new Error(`Unreadable log record: ${parsed.message}`);
    const envelope = parsed.envelope;
    if (envelope.type !== 'system' || envelope.subtype === 'profile_updated') continue;
    const result = transition(group, envelope);
    if (!result.ok) throw new Error(`Log record does not apply: ${result.error} ${result.message}`);
    group = result.group;
  }
  return group;
}

/** Every record in a group's thread, for replay. */
export function* groupLog(db: Database.Database, groupId: string): Generator<Record<string, unknown>> {
  let after = 0;
  for (;;) {
    const page = read(db, groupId, { after, limit: 500 });
    if (page.length === 0) return;
    for (const record of page) yield record.envelope;
    after = page[page.length - 1]?.seq ?? after;
  }
}

// ================================================================
// Store
// ================================================================

interface GroupRow {
  id: string;
  name: string | null;
  description: string | null;
  dp_url: string | null;
  created_at: string;
  updated_at: string;
}

/** Load a group's metadata, or null if it was never created. */
export function getGroup(db: Database.Database, groupId: string): GroupMetadata | null {
  const row = db.prepare<[string], GroupRow>('SELECT * FROM groups WHERE id = ?').get(groupId);
  if (!row) return null;

  const members = db.prepare<[string], { address: string; is_admin: number }>(
    'SELECT address, is_admin FROM group_members WHERE group_id = ? ORDER BY position ASC'
  ).all(groupId);

  return {
    group_id: row.id,
    group_name: row.name,
    group_description: row.description,
    group_dp_url: row.dp_url,
    admins: members.filter((m) => m.is_admin === 1).map((m) => m.address),
    members: members.map((m) => m.address),
    created_at: row.created_at,
    updated_at: row.updated_at,
  };
}

/**
 * Persist a group's metadata. Only called with the output of `transition`,
 * inside the caller's transaction.
 */
export function saveGroup(db: Database.Database, group: GroupMetadata): void {
  db.prepare(
    `INSERT INTO groups (id, name, description, dp_url, created_at, updated_at)
     VALUES (?, ?, ?, ?, ?, ?)
     ON CONFLICT(id) DO UPDATE SET
       name = excluded.name,
       description = excluded.description,
       dp_url = excluded.dp_url,
       updated_at = excluded.updated_at`
  ).run(
    group.group_id,
    group.group_name,
    group.group_description,
    group.group_dp_url,
    group.created_at,
    group.updated_at,
  );

  db.prepare('DELETE FROM group_members WHERE group_id = ?').run(group.group_id);
  const insert = db.prepare(
    'INSERT INTO group_members (group_id, address, is_admin, position) VALUES (?, ?, ?, ?)'
  );
  const admins = new Set(group.admins);
  group.members.forEach((address, position) => {
    insert.run(group.group_id, address, admins.has(address) ? 1 : 0, position);
  });
}

