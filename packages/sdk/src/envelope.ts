/**
 * Envelope construction and signing.
 *
 * Builders return unsigned envelopes; `signEnvelope` adds `signature` and
 * `sender_pubkey` over the canonical form of everything else.
 */

import { createHash, type KeyObject } from 'node:crypto';
import { canonicalize, signablePayload } from './wire.js';
import { publicKeyToBase64, signBase64, verify } from './crypto.js';
import type {
  Address,
  EnvelopeSignature,
  GroupCreatedEnvelope,
  ProfileChanges,
  SignedProfileUpdate,
  UnsignedEnvelope,
} from './types.js';

type Unsigned<E> = Omit<E, keyof EnvelopeSignature>;

function now(): string {
  return new Date().toISOString();
}

/**
 * Sign an envelope with the sender's Ed25519 private key.
 */
export function signEnvelope<U extends UnsignedEnvelope>(
  unsigned: U,
  privateKey: KeyObject,
): U & EnvelopeSignature {
  return {
    ...unsigned,
    signature: signBase64(canonicalize(unsigned), privateKey),
    sender_pubkey: publicKeyToBase64(privateKey),
  };
}

/**
 * Check a received envelope's signature against its own `sender_pubkey`.
 */
export function verifyEnvelope(envelope: Record<string, unknown>): boolean {
  const { signature, sender_pubkey } = envelope;
  if (typeof signature !== 'string' || typeof sender_pubkey !== 'string') return false;
  return verify(Buffer.from(signablePayload(envelope)), signature, sender_pubkey);
}

export function textMessage(options: {
  to?: Address[];
  cc?: Address[];
  groupId?: string;
  from?: Address;
  body: unknown;
}): UnsignedEnvelope {
  return {
    type: 'text',
    to: options.to ?? [],
    ...(options.cc ? { cc: options.cc } : {}),
    ...(options.groupId ? { group_id: options.groupId } : {}),
    ...(options.from ? { from: options.from } : {}),
    body: options.body,
  };
}

// ================================================================
// Group system messages
// ================================================================

export function groupCreated(
  groupId: string,
  actor: Address,
  metadata: { name?: string; description?: string; dpUrl?: string } = {},
  timestamp: string = now(),
): Unsigned<GroupCreatedEnvelope> {
  return {
    type: 'system',
    subtype: 'group_created',
    to: [],
    group_id: groupId,
    actor,
    timestamp,
    ...(metadata.name !== undefined ? { new_name: metadata.name } : {}),
    ...(metadata.description !== undefined ? { new_description: metadata.description } : {}),
    ...(metadata.dpUrl !== undefined ? { new_dp_url: metadata.dpUrl } : {}),
  };
}

export function joined(groupId: string, actor: Address, timestamp: string = now()): UnsignedEnvelope {
  return { type: 'system', subtype: 'joined', to: [], group_id: groupId, actor, timestamp };
}

export function left(groupId: string, actor: Address, timestamp: string = now()): UnsignedEnvelope {
  return { type: 'system', subtype: 'left', to: [], group_id: groupId, actor, timestamp };
}

export function removed(
  groupId: string,
  actor: Address,
  target: Address,
  timestamp: string = now(),
): UnsignedEnvelope {
  return { type: 'system', subtype: 'removed', to: [], group_id: groupId, actor, target, timestamp };
}

export function adminAssigned(
  groupId: string,
  actor: Address,
  target: Address,
  timestamp: string = now(),
): UnsignedEnvelope {
  return { type: 'system', subtype: 'admin_assigned', to: [], group_id: groupId, actor, target, timestamp };
}

export function adminRevoked(
  groupId: string,
  actor: Address,
  target: Address,
  timestamp: string = now(),
): UnsignedEnvelope {
  return { type: 'system', subtype: 'admin_revoked', to: [], group_id: groupId, actor, target, timestamp };
}

export function groupRenamed(
  groupId: string,
  actor: Address,
  newName: string,
  timestamp: string = now(),
): UnsignedEnvelope {
  return { type: 'system', subtype: 'group_renamed', to: [], group_id: groupId, actor, new_name: newName, timestamp };
}

export function descriptionUpdated(
  groupId: string,
  actor: Address,
  newDescription: string,
  timestamp: string = now(),
): UnsignedEnvelope {
  return {
    type: 'system',
    subtype: 'description_updated',
    to: [],
    group_id: groupId,
    actor,
    new_description: newDescription,
    timestamp,
  };
}

export function dpUpdated(
  groupId: string,
  actor: Address,
  newDpUrl: string,
  timestamp: string = now(),
): UnsignedEnvelope {
  return { type: 'system', subtype: 'dp_updated', to: [], group_id: groupId, actor, new_dp_url: newDpUrl, timestamp };
}

/** Profile change announced over the wire; applies to the signer's own profile. */
export function profileUpdated(
  actor: Address,
  changes: ProfileChanges,
  options: { to?: Address[]; timestamp?: string } = {},
): UnsignedEnvelope {
  return {
    type: 'system',
    subtype: 'profile_updated',
    to: options.to ?? [],
    actor,
    changes: { ...changes },
    timestamp: options.timestamp ?? now(),
  };
}

// ================================================================
// HTTP API signing
// ================================================================

/** Bytes signed for `PUT /users/:pubkey/profile`. */
export function profileUpdatePayload(fields: ProfileChanges, timestamp: string): string {
  return canonicalize({ fields, timestamp });
}

export function signProfileUpdate(
  fields: ProfileChanges,
  privateKey: KeyObject,
  timestamp: string = now(),
): SignedProfileUpdate {
  return {
    fields,
    timestamp,
    signature: signBase64(profileUpdatePayload(fields, timestamp), privateKey),
  };
}

/**
 * Build the signing string for request auth:
 *   <METHOD> <PATH>\n<ISO-8601 timestamp>\n<body_sha256_hex>
 */
export function buildSigningString(
  method: string,
  path: string,
  timestamp: string,
  bodyHash: string,
): string {
  return `${method} ${path}\n${timestamp}\n${bodyHash}`;
}

/**
 * SHA-256 hex of a body string. An empty body hashes like any other string.
 */
export function hashBody(body: string): string {
  return createHash('sha256').update(body).digest('hex');
}

/**
 * Headers for a signed HTTP request:
 *   Authorization: Signature <pubkey_base64>:<signature_base64>
 *   X-Timestamp: <ISO-8601>
 */
export function signRequest(
  method: string,
  path: string,
  body: string,
  privateKey: KeyObject,
  timestamp: string = now(),
): Record<string, string> {
  const signingString = buildSigningString(method, path, timestamp, hashBody(body));
  return {
    'Authorization': `Signature ${publicKeyToBase64(privateKey)}:${signBase64(signingString, privateKey)}`,
    'X-Timestamp': timestamp,
  };
}
