/**
 * Wire format — canonical JSON for signatures and envelope shape validation.
 */

import type {
  Address,
  Envelope,
  GroupSubtype,
  Rejection,
  SystemSubtype,
  TextEnvelope,
} from './types.js';
import { GROUP_SUBTYPES } from './types.js';

const ADDRESS_PATTERN = /^[^\s#]+#[^\s#]+$/;

/** Group ids double as thread keys, so they stay within a safe charset. */
const GROUP_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

const RFC3339_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/** An unpaired UTF-16 surrogate has no UTF-8 encoding. */
const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** Fields excluded from the signed bytes. */
const UNSIGNED_FIELDS = new Set(['signature', 'sender_pubkey']);

/**
 * Thrown when a value has no canonical encoding.
 */
export class CanonicalizationError extends Error {
  constructor(message: string, readonly path: string) {
    super(`${message} at ${path}`);
    this.name = 'CanonicalizationError';
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAddress(value: unknown): value is Address {
  return typeof value === 'string' && ADDRESS_PATTERN.test(value);
}

export function isGroupId(value: unknown): value is string {
  return typeof value === 'string' && GROUP_ID_PATTERN.test(value);
}

/** RFC3339 with a zone designator, and a real calendar instant. */
export function isTimestamp(value: unknown): value is string {
  if (typeof value !== 'string' || !RFC3339_PATTERN.test(value) || Number.isNaN(Date.parse(value))) return false;
  // Date.parse rolls 2024-02-31 over into March
  const year = Number(value.slice(0, 4));
  const month = Number(value.slice(5, 7));
  const day = Number(value.slice(8, 10));
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  return date.getUTCFullYear() === year && date.getUTCMonth() === month - 1 && date.getUTCDate() === day;
}

/** True when `a` is a strictly later instant than `b`. */
export function isLaterThan(a: string, b: string): boolean {
  return Date.parse(a) > Date.parse(b);
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function encode(value: unknown, path: string): string {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'boolean':
      return value ? 'true' : 'false';
    case 'number':
      if (!Number.isFinite(value)) {
        throw new CanonicalizationError('Non-finite number', path);
      }
      return JSON.stringify(value);
    case 'string':
      if (LONE_SURROGATE.test(value)) {
        throw new CanonicalizationError('String is not valid UTF-8', path);
      }
      return JSON.stringify(value);
    case 'object': {
      if (Array.isArray(value)) {
        // Holes and undefined encode as null, as JSON.stringify does
        const items: string[] = [];
        for (let i = 0; i < value.length; i++) {
          const item: unknown = value[i];
          items.push(item === undefined ? 'null' : encode(item, `${path}[${i}]`));
        }
        return `[${items.join(',')}]`;
      }
      const proto: unknown = Object.getPrototypeOf(value);
      if (proto !== Object.prototype && proto !== null) {
        throw new CanonicalizationError('Only plain objects can be canonicalized', path);
      }
      const members: string[] = [];
      const entries = Object.entries(value).sort(([a], [b]) => compareKeys(a, b));
      for (const [key, member] of entries) {
        if (member === undefined) continue;
        if (LONE_SURROGATE.test(key)) {
          throw new CanonicalizationError('Key is not valid UTF-8', path);
        }
        members.push(`${JSON.stringify(key)}:${encode(member, `${path}.${key}`)}`);
      }
      return `{${members.join(',')}}`;
    }
    default:
      throw new CanonicalizationError(`Cannot encode ${typeof value}`, path);
  }
}

/**
 * Canonical JSON serialization — keys sorted, no whitespace, one encoding per value.
 * Throws CanonicalizationError for values JSON cannot carry faithfully.
 */
export function canonicalize(value: unknown): string {
  return encode(value, '$');
}

/**
 * The signable portion of an envelope: every field except `signature` and `sender_pubkey`.
 */
export function signablePayload(envelope: Record<string, unknown>): string {
  // fromEntries keeps an own "__proto__" key as data
  const rest = Object.fromEntries(Object.entries(envelope).filter(([key]) => !UNSIGNED_FIELDS.has(key)));
  return canonicalize(rest);
}

// ================================================================
// Shape validation
// ================================================================

export type EnvelopeValidation = { ok: true; envelope: Envelope } | Rejection;

type Field<T> = { ok: true; value: T } | Rejection;

function violation(field: string, message: string): Rejection {
  return { ok: false, error: 'SchemaViolation', message, field };
}

function addressList(obj: Record<string, unknown>, key: 'to' | 'cc'): Field<Address[] | undefined> {
  const raw = obj[key];
  if (raw === undefined || raw === null) return { ok: true, value: undefined };
  if (!Array.isArray(raw)) return violation(key, `${key} must be an array of addresses`);
  const seen = new Set<Address>();
  for (const item of raw) {
    if (!isAddress(item)) {
      return violation(key, `${key} contains an invalid address: ${JSON.stringify(item)}`);
    }
    seen.add(item);
  }
  return { ok: true, value: [...seen] };
}

function optionalString(obj: Record<string, unknown>, key: string): Field<string | undefined> {
  const raw = obj[key];
  if (raw === undefined || raw === null) return { ok: true, value: undefined };
  if (typeof raw !== 'string') return violation(key, `${key} must be a string`);
  return { ok: true, value: raw };
}

function requiredString(obj: Record<string, unknown>, key: string): Field<string> {
  const raw = obj[key];
  if (typeof raw !== 'string') return violation(key, `${key} is required`);
  return { ok: true, value: raw };
}

function requiredAddress(obj: Record<string, unknown>, key: string): Field<Address> {
  const raw = obj[key];
  if (raw === undefined || raw === null) return violation(key, `${key} is required`);
  if (!isAddress(raw)) return violation(key, `${key} must be a localpart#domain address`);
  return { ok: true, value: raw };
}

function isSystemSubtype(value: unknown): value is SystemSubtype {
  return value === 'profile_updated' || isGroupSubtype(value);
}

export function isGroupSubtype(value: unknown): value is GroupSubtype {
  return typeof value === 'string' && GROUP_SUBTYPES.some((s) => s === value);
}

/**
 * Validate an envelope's shape against its declared kind and return its typed form.
 *
 * Does not check the signature, and does not consult group or profile state.
 */
export function validateEnvelope(data: unknown): EnvelopeValidation {
  if (!isRecord(data)) {
    return { ok: false, error: 'MalformedInput', message: 'Envelope must be a JSON object' };
  }

  const signature = requiredString(data, 'signature');
  if (!signature.ok) return signature;
  const senderPubkey = requiredString(data, 'sender_pubkey');
  if (!senderPubkey.ok) return senderPubkey;

  const to = addressList(data, 'to');
  if (!to.ok) return to;
  const cc = addressList(data, 'cc');
  if (!cc.ok) return cc;

  const groupId = data.group_id;
  if (groupId !== undefined && groupId !== null && !isGroupId(groupId)) {
    return violation('group_id', 'group_id must be 1-128 characters of [A-Za-z0-9._-]');
  }

  const base = {
    to: to.value ?? [],
    ...(cc.value ? { cc: cc.value } : {}),
    signature: signature.value,
    sender_pubkey: senderPubkey.value,
  };

  if (data.type === 'text') {
    if (!('body' in data)) return violation('body', 'body is required for text messages');
    const from = data.from;
    if (from !== undefined && from !== null && !isAddress(from)) {
      return violation('from', 'from must be a localpart#domain address');
    }
    if (base.to.length === 0 && typeof groupId !== 'string') {
      return violation('to', 'Text messages need at least one recipient or a group_id');
    }
    const envelope: TextEnvelope = {
      ...base,
      ...(typeof groupId === 'string' ? { group_id: groupId } : {}),
      type: 'text',
      ...(typeof from === 'string' ? { from } : {}),
      body: data.body,
    };
    return { ok: true, envelope };
  }

  if (data.type !== 'system') {
    return violation('type', 'type must be "text" or "system"');
  }

  const subtype = data.subtype;
  if (subtype === undefined || subtype === null) return violation('subtype', 'subtype is required');
  if (!isSystemSubtype(subtype)) {
    return violation('subtype', `Unknown subtype: ${JSON.stringify(subtype)}`);
  }
  const actor = requiredAddress(data, 'actor');
  if (!actor.ok) return actor;
  if (!isTimestamp(data.timestamp)) {
    return violation('timestamp', 'timestamp must be an RFC3339 instant');
  }
  const system = { ...base, type: 'system' as const, actor: actor.value, timestamp: data.timestamp };

  if (subtype === 'profile_updated') {
    if (!isRecord(data.changes)) return violation('changes', 'changes is required for profile_updated');
    return {
      ok: true,
      envelope: {
        ...system,
        ...(typeof groupId === 'string' ? { group_id: groupId } : {}),
        subtype,
        changes: data.changes,
      },
    };
  }

  if (typeof groupId !== 'string') {
    return violation('group_id', `group_id is required for ${subtype}`);
  }
  const group = { ...system, group_id: groupId };

  switch (subtype) {
    case 'group_created': {
      const name = optionalString(data, 'new_name');
      if (!name.ok) return name;
      const description = optionalString(data, 'new_description');
      if (!description.ok) return description;
      const dp = optionalString(data, 'new_dp_url');
      if (!dp.ok) return dp;
      return {
        ok: true,
        envelope: {
          ...group,
          subtype,
          ...(name.value !== undefined ? { new_name: name.value } : {}),
          ...(description.value !== undefined ? { new_description: description.value } : {}),
          ...(dp.value !== undefined ? { new_dp_url: dp.value } : {}),
        },
      };
    }
    case 'joined':
    case 'left':
      return { ok: true, envelope: { ...group, subtype } };
    case 'removed':
    case 'admin_assigned':
    case 'admin_revoked': {
      const target = requiredAddress(data, 'target');
      if (!target.ok) return target;
      return { ok: true, envelope: { ...group, subtype, target: target.value } };
    }
    case 'group_renamed': {
      const name = requiredString(data, 'new_name');
      if (!name.ok) return name;
      return { ok: true, envelope: { ...group, subtype, new_name: name.value } };
    }
    case 'description_updated': {
      const description = requiredString(data, 'new_description');
      if (!description.ok) return description;
      return { ok: true, envelope: { ...group, subtype, new_description: description.value } };
    }
    case 'dp_updated': {
      const dp = requiredString(data, 'new_dp_url');
      if (!dp.ok) return dp;
      return { ok: true, envelope: { ...group, subtype, new_dp_url: dp.value } };
    }
  }
}
