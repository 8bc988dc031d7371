/**
 * Envelope pipeline — the one path every inbound envelope takes, whichever
 * transport carried it.
 *
 *   parse -> verify signature -> validate shape -> check address binding
 *   -> apply group / profile transition -> append to thread log(s)
 *
 * Everything from the binding check on runs inside one transaction, so a
 * rejected envelope leaves no trace in state or in the log.
 */

import type Database from 'better-sqlite3';
import {
  CanonicalizationError,
  isRecord,
  signablePayload,
  validateEnvelope,
  verify,
} from 'esmp-sdk';
import type { Envelope, GroupMetadata, ThreadPosition } from 'esmp-sdk';
import type { ServerConfig } from './config.js';
import { reject, type Outcome } from './errors.js';
import { getGroup, saveGroup, transition } from './groups.js';
import { actingAddress, bindAddress, boundKey, checkBinding } from './identity.js';
import { applyProfileChanges, parseProfileChanges, type StoredProfile } from './profiles.js';
import { append, profileThreadKey, threadKeysFor } from './thread-log.js';

export interface ServerContext {
  db: Database.Database;
  config: ServerConfig;
}

export type Acceptance = Outcome<{
  envelope: Envelope;
  threads: ThreadPosition[];
  /** Group state after a group system message. */
  group?: GroupMetadata;
  /** Profile after a profile_updated message. */
  profile?: StoredProfile;
}>;

const utf8 = new TextDecoder('utf-8', { fatal: true });

/**
 * Decode one wire line. Invalid UTF-8 and invalid JSON are both MalformedInput.
 */
export function parseLine(line: Uint8Array): Outcome<{ value: unknown }> {
  let text: string;
  try {
    text = utf8.decode(line);
  } catch {
    return reject('MalformedInput', 'Line is not valid UTF-8');
  }
  try {
    const value: unknown = JSON.parse(text);
    return { ok: true, value };
  } catch (err) {
    return reject('MalformedInput', `Invalid JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Authenticate an envelope: signature fields present, canonical form exists,
 * and the signature verifies against `sender_pubkey`.
 */
export function authenticateEnvelope(raw: unknown): Outcome<{ record: Record<string, unknown> }> {
  if (!isRecord(raw)) return reject('MalformedInput', 'Envelope must be a JSON object');

  const { signature, sender_pubkey: senderPubkey } = raw;
  if (typeof signature !== 'string') {
    return reject('SignatureInvalid', 'signature is missing', 'signature');
  }
  if (typeof senderPubkey !== 'string') {
    return reject('SignatureInvalid', 'sender_pubkey is missing', 'sender_pubkey');
  }

  let payload: string;
  try {
    payload = signablePayload(raw);
  } catch (err) {
    if (err instanceof CanonicalizationError) return reject('MalformedInput', err.message);
    throw err;
  }

  if (!verify(Buffer.from(payload), signature, senderPubkey)) {
    return reject('SignatureInvalid', 'Signature does not verify against sender_pubkey', 'signature');
  }
  return { ok: true, record: raw };
}

/** State changes and log appends for an authenticated, well-formed envelope. */
function commit(ctx: ServerContext, envelope: Envelope, record: Record<string, unknown>): Acceptance {
  const { db, config } = ctx;
  const acting = actingAddress(envelope);
  if (acting !== null) {
    const binding = checkBinding(db, acting, envelope.sender_pubkey);
    if (!binding.ok) return binding;
  }

  let group: GroupMetadata | undefined;
  let profile: StoredProfile | undefined;

  if (envelope.type === 'text') {
    if (envelope.group_id !== undefined && !getGroup(db, envelope.group_id)) {
      return reject('UnknownGroup', `Group ${envelope.group_id} does not exist`, 'group_id');
    }
  } else if (envelope.subtype === 'profile_updated') {
    if (envelope.group_id !== undefined && !getGroup(db, envelope.group_id)) {
      return reject('UnknownGroup', `Group ${envelope.group_id} does not exist`, 'group_id');
    }
    const parsed = parseProfileChanges(envelope.changes);
    if (!parsed.ok) return { ...parsed, field: parsed.field === undefined ? 'changes' : `changes.${parsed.field}` };
    const applied = applyProfileChanges(
      db,
      config.profileSecret,
      envelope.sender_pubkey,
      parsed.changes,
      envelope.timestamp,
    );
    if (!applied.ok) return applied;
    profile = applied.profile;
  } else {
    const result = transition(getGroup(db, envelope.group_id), envelope);
    if (!result.ok) return result;
    saveGroup(db, result.group);
    group = result.group;
  }

  if (acting !== null) bindAddress(db, acting, envelope.sender_pubkey);

  const threadKeys = threadKeysFor(envelope);
  if (profile) threadKeys.push(profileThreadKey(envelope.sender_pubkey));
  const threads = threadKeys.map((threadKey) => ({
    threadKey,
    seq: append(db, threadKey, record),
  }));

  return {
    ok: true,
    envelope,
    threads,
    ...(group ? { group } : {}),
    ...(profile ? { profile } : {}),
  };
}

/**
 * Run one decoded envelope through the pipeline.
 */
export function acceptEnvelope(ctx: ServerContext, raw: unknown): Acceptance {
  const auth = authenticateEnvelope(raw);
  if (!auth.ok) return auth;

  const validation = validateEnvelope(auth.record);
  if (!validation.ok) return validation;

  const envelope = validation.envelope;
  const result = ctx.db.transaction(() => commit(ctx, envelope, auth.record))();

  if (result.ok) {
    const unknown = [...envelope.to, ...(envelope.cc ?? [])].filter((r) => boundKey(ctx.db, r) === null);
    if (unknown.length > 0) {
      console.log(`[esmp] Recipients not yet seen by this server: ${unknown.join(', ')}`);
    }
    const to = envelope.to.length > 0 ? ` to=${envelope.to.join(',')}` : '';
    const kind = envelope.type === 'text' ? 'text' : envelope.subtype;
    console.log(`[esmp] Accepted ${kind}${to} -> ${result.threads.map((t) => `${t.threadKey}#${t.seq}`).join(' ') || '(no thread)'}`);
  }
  return result;
}
