/**
 * Profile store — per-key profiles with field visibility and an encrypted address.
 *
 * The address is encrypted at rest with AES-256-GCM under a key derived from
 * the server secret and the owner's public key; it is only decrypted for the
 * owner's own read.
 */

import type Database from 'better-sqlite3';
import {
  PROFILE_FIELD_NAMES,
  CanonicalizationError,
  canonicalize,
  decrypt,
  deriveKey,
  encrypt,
  isLaterThan,
  isRecord,
  isTimestamp,
  verify,
} from 'esmp-sdk';
import type {
  ProfileChanges,
  ProfileField,
  ProfileFieldName,
  ProfileFieldUpdate,
  ProfileView,
  ThreadPosition,
  Visibility,
} from 'esmp-sdk';
import { reject, type Outcome } from './errors.js';
import { append, profileThreadKey } from './thread-log.js';

const MAX_NAME_LENGTH = 50;
const MAX_ADDRESS_LENGTH = 200;

/** Letters (any script), space, hyphen, apostrophe. */
const NAME_CHARACTER = /[\p{Alphabetic} '-]/u;

const ADDRESS_KEY_INFO = 'esmp-profile-address-v1';

type PlainFieldName = Exclude<ProfileFieldName, 'address'>;

const PLAIN_FIELDS: readonly PlainFieldName[] = ['first_name', 'middle_name', 'last_name', 'display_picture'];

interface EncryptedField {
  /** base64 ciphertext with GCM tag appended */
  ciphertext: string | null;
  nonce: string | null;
  visibility: 'private';
}

export interface StoredProfile {
  pubkey: string;
  first_name: ProfileField<string>;
  middle_name: ProfileField<string>;
  last_name: ProfileField<string>;
  display_picture: ProfileField<string>;
  address: EncryptedField;
  updated_at: string;
}

export type ProfileResult = Outcome<{ profile: StoredProfile }>;

// ================================================================
// Field validation
// ================================================================

function checkValue(name: ProfileFieldName, value: string): string | null {
  switch (name) {
    case 'first_name':
    case 'middle_name':
    case 'last_name': {
      const chars = [...value];
      if (chars.length > MAX_NAME_LENGTH) {
        return `${name} is too long (max ${MAX_NAME_LENGTH} characters)`;
      }
      const invalid = chars.find((c) => !NAME_CHARACTER.test(c));
      return invalid === undefined ? null : `Invalid character '${invalid}' in ${name}`;
    }
    case 'display_picture':
      try {
        new URL(value);
        return null;
      } catch {
        return 'Invalid display picture URL';
      }
    case 'address':
      return [...value].length > MAX_ADDRESS_LENGTH
        ? `address is too long (max ${MAX_ADDRESS_LENGTH} characters)`
        : null;
  }
}

function fieldName(key: string): ProfileFieldName | undefined {
  return PROFILE_FIELD_NAMES.find((name) => name === key);
}

/**
 * Validate raw per-field changes. Every field is checked before anything is applied.
 */
export function parseProfileChanges(raw: unknown): Outcome<{ changes: ProfileChanges }> {
  if (!isRecord(raw)) return reject('InvalidField', 'Profile changes must be an object', 'fields');

  const changes: ProfileChanges = {};
  for (const [key, update] of Object.entries(raw)) {
    const name = fieldName(key);
    if (!name) return reject('InvalidField', `Unknown profile field: ${key}`, key);
    if (!isRecord(update)) return reject('InvalidField', `${name} must be an object`, name);

    const extra = Object.keys(update).find((k) => k !== 'value' && k !== 'visibility');
    if (extra !== undefined) return reject('InvalidField', `Unknown key ${extra} in ${name}`, name);

    const { value, visibility } = update;
    const parsed: ProfileFieldUpdate = {};

    if (value !== undefined) {
      if (value !== null && typeof value !== 'string') {
        return reject('InvalidField', `${name}.value must be a string or null`, name);
      }
      if (typeof value === 'string') {
        const problem = checkValue(name, value);
        if (problem) return reject('InvalidField', problem, name);
      }
      parsed.value = value;
    }

    if (visibility !== undefined) {
      if (visibility !== 'public' && visibility !== 'private') {
        return reject('InvalidField', `${name}.visibility must be "public" or "private"`, name);
      }
      parsed.visibility = visibility;
    }

    changes[name] = parsed;
  }
  return { ok: true, changes };
}

// ================================================================
// Store
// ================================================================

interface ProfileRow {
  pubkey: string;
  first_name: string | null;
  first_name_visibility: Visibility;
  middle_name: string | null;
  middle_name_visibility: Visibility;
  last_name: string | null;
  last_name_visibility: Visibility;
  display_picture: string | null;
  display_picture_visibility: Visibility;
  address_ciphertext: string | null;
  address_nonce: string | null;
  updated_at: string;
}

export function addressKey(secret: string, pubkey: string): Buffer {
  return deriveKey(secret, pubkey, ADDRESS_KEY_INFO);
}

/** The stored (address still encrypted) profile, or null if never created. */
export function getStoredProfile(db: Database.Database, pubkey: string): StoredProfile | null {
  const row = db.prepare<[string], ProfileRow>('SELECT * FROM profiles WHERE pubkey = ?').get(pubkey);
  if (!row) return null;
  return {
    pubkey: row.pubkey,
    first_name: { value: row.first_name, visibility: row.first_name_visibility },
    middle_name: { value: row.middle_name, visibility: row.middle_name_visibility },
    last_name: { value: row.last_name, visibility: row.last_name_visibility },
    display_picture: { value: row.display_picture, visibility: row.display_picture_visibility },
    address: { ciphertext: row.address_ciphertext, nonce: row.address_nonce, visibility: 'private' },
    updated_at: row.updated_at,
  };
}

function saveProfile(db: Database.Database, profile: StoredProfile): void {
  db.prepare(
    `INSERT OR REPLACE INTO profiles (
       pubkey,
       first_name, first_name_visibility,
       middle_name, middle_name_visibility,
       last_name, last_name_visibility,
       display_picture, display_picture_visibility,
       address_ciphertext, address_nonce,
       updated_at
     ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
  ).run(
    profile.pubkey,
    profile.first_name.value, profile.first_name.visibility,
    profile.middle_name.value, profile.middle_name.visibility,
    profile.last_name.value, profile.last_name.visibility,
    profile.display_picture.value, profile.display_picture.visibility,
    profile.address.ciphertext, profile.address.nonce,
    profile.updated_at,
  );
}

function emptyProfile(pubkey: string, timestamp: string): StoredProfile {
  return {
    pubkey,
    first_name: { value: null, visibility: 'private' },
    middle_name: { value: null, visibility: 'private' },
    last_name: { value: null, visibility: 'private' },
    display_picture: { value: null, visibility: 'private' },
    address: { ciphertext: null, nonce: null, visibility: 'private' },
    updated_at: timestamp,
  };
}

function mergeField(current: ProfileField<string>, update: ProfileFieldUpdate | undefined): ProfileField<string> {
  if (!update) return current;
  return {
    value: update.value === undefined ? current.value : update.value,
    visibility: update.visibility ?? current.visibility,
  };
}

/**
 * Apply validated changes to the profile owned by `pubkey`, creating it on
 * first write. The caller has already authenticated the owner and owns the
 * surrounding transaction.
 */
export function applyProfileChanges(
  db: Database.Database,
  secret: string,
  pubkey: string,
  changes: ProfileChanges,
  timestamp: string,
): ProfileResult {
  const existing = getStoredProfile(db, pubkey);
  if (existing && !isLaterThan(timestamp, existing.updated_at)) {
    return reject(
      'StaleMutation',
      `timestamp ${timestamp} is not after the profile's last update (${existing.updated_at})`,
      'timestamp',
    );
  }

  const profile: StoredProfile = { ...(existing ?? emptyProfile(pubkey, timestamp)), updated_at: timestamp };
  for (const name of PLAIN_FIELDS) {
    profile[name] = mergeField(profile[name], changes[name]);
  }

  // Visibility requests for the address are ignored: it is always private
  const address = changes.address?.value;
  if (address === null) {
    profile.address = { ciphertext: null, nonce: null, visibility: 'private' };
  } else if (address !== undefined) {
    const { ciphertext, nonce } = encrypt(Buffer.from(address, 'utf8'), addressKey(secret, pubkey), pubkey);
    profile.address = {
      ciphertext: ciphertext.toString('base64'),
      nonce: nonce.toString('base64'),
      visibility: 'private',
    };
  }

  saveProfile(db, profile);
  return { ok: true, profile };
}

export type SignedProfileResult = Outcome<{ profile: StoredProfile; thread: ThreadPosition }>;

/**
 * Apply a `PUT /users/:pubkey/profile` body: `{ fields, timestamp, signature }`,
 * signed by `pubkey` over canonicalize({ fields, timestamp }). The signed body,
 * with `pubkey` added, goes to the owner's profile thread.
 */
export function applySignedProfileUpdate(
  db: Database.Database,
  secret: string,
  pubkey: string,
  body: unknown,
): SignedProfileResult {
  if (!isRecord(body)) return reject('MalformedInput', 'Body must be a JSON object');
  const { fields, timestamp, signature } = body;
  if (typeof signature !== 'string') return reject('SchemaViolation', 'signature is required', 'signature');
  if (!isTimestamp(timestamp)) return reject('SchemaViolation', 'timestamp must be an RFC3339 instant', 'timestamp');
  if (!isRecord(fields)) return reject('SchemaViolation', 'fields must be an object', 'fields');

  let signed: string;
  try {
    signed = canonicalize({ fields, timestamp });
  } catch (err) {
    if (err instanceof CanonicalizationError) return reject('MalformedInput', err.message);
    throw err;
  }
  if (!verify(Buffer.from(signed), signature, pubkey)) {
    return reject('Forbidden', 'Signature does not match the profile owner', 'signature');
  }

  const parsed = parseProfileChanges(fields);
  if (!parsed.ok) return parsed;

  return db.transaction((): SignedProfileResult => {
    const applied = applyProfileChanges(db, secret, pubkey, parsed.changes, timestamp);
    if (!applied.ok) return applied;
    const threadKey = profileThreadKey(pubkey);
    const seq = append(db, threadKey, { fields, timestamp, signature, pubkey });
    return { ok: true, profile: applied.profile, thread: { threadKey, seq } };
  })();
}

// ================================================================
// Views
// ================================================================

function decryptAddress(profile: StoredProfile, secret: string): string | null {
  const { ciphertext, nonce } = profile.address;
  if (ciphertext === null || nonce === null) return null;
  return decrypt(
    Buffer.from(ciphertext, 'base64'),
    Buffer.from(nonce, 'base64'),
    addressKey(secret, profile.pubkey),
    profile.pubkey,
  ).toString('utf8');
}

/**
 * Render a profile for `requester`: the owner sees everything with the
 * address decrypted; anyone else sees only public fields and never the address.
 */
export function renderProfile(profile: StoredProfile, secret: string, requester: string | null): ProfileView {
  const view: ProfileView = { pubkey: profile.pubkey, updated_at: profile.updated_at };

  if (requester === profile.pubkey) {
    for (const name of PLAIN_FIELDS) view[name] = { ...profile[name] };
    view.address = { value: decryptAddress(profile, secret), visibility: 'private' };
    return view;
  }

  for (const name of PLAIN_FIELDS) {
    if (profile[name].visibility === 'public') view[name] = { ...profile[name] };
  }
  return view;
}

export function getProfileView(
  db: Database.Database,
  secret: string,
  pubkey: string,
  requester: string | null,
): ProfileView | null {
  const profile = getStoredProfile(db, pubkey);
  return profile ? renderProfile(profile, secret, requester) : null;
}
