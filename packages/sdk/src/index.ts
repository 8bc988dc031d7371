/**
 * ESMP client SDK — signed envelopes, group system messages, and profile updates.
 *
 * @example
 * ```typescript
 * import { EsmpConnection, generateKeypair, groupCreated, signEnvelope } from 'esmp-sdk';
 *
 * const { privateKey } = generateKeypair();
 * const conn = await EsmpConnection.connect(5888, 'chat.example.org');
 *
 * const reply = await conn.send(signEnvelope(groupCreated('book-club', 'alice#example.org'), privateKey));
 * if (!reply.ok) console.error(reply.error, reply.message);
 * ```
 *
 * @packageDocumentation
 */

export type {
  Address,
  Visibility,
  GroupSubtype,
  SystemSubtype,
  EnvelopeSignature,
  TextEnvelope,
  GroupCreatedEnvelope,
  JoinedEnvelope,
  LeftEnvelope,
  RemovedEnvelope,
  AdminAssignedEnvelope,
  AdminRevokedEnvelope,
  GroupRenamedEnvelope,
  DescriptionUpdatedEnvelope,
  DpUpdatedEnvelope,
  ProfileUpdatedEnvelope,
  GroupSystemEnvelope,
  SystemEnvelope,
  Envelope,
  UnsignedEnvelope,
  GroupMetadata,
  ProfileField,
  ProfileFieldName,
  ProfileFieldUpdate,
  ProfileChanges,
  ProfileView,
  SignedProfileUpdate,
  ProtocolErrorKind,
  Rejection,
  ThreadPosition,
  ThreadRecord,
  DispatchReply,
} from './types.js';
export { GROUP_SUBTYPES, PROFILE_FIELD_NAMES, PROTOCOL_ERROR_KINDS } from './types.js';

// Canonical form + shape validation
export {
  CanonicalizationError,
  canonicalize,
  signablePayload,
  validateEnvelope,
  isRecord,
  isAddress,
  isGroupId,
  isGroupSubtype,
  isTimestamp,
  isLaterThan,
} from './wire.js';
export type { EnvelopeValidation } from './wire.js';

// Keys, signatures, encryption
export {
  generateKeypair,
  publicKeyToBase64,
  publicKeyFromBase64,
  sign,
  signBase64,
  verify,
  deriveKey,
  encrypt,
  decrypt,
} from './crypto.js';

// Envelope builders
export {
  signEnvelope,
  verifyEnvelope,
  textMessage,
  groupCreated,
  joined,
  left,
  removed,
  adminAssigned,
  adminRevoked,
  groupRenamed,
  descriptionUpdated,
  dpUpdated,
  profileUpdated,
  profileUpdatePayload,
  signProfileUpdate,
  buildSigningString,
  hashBody,
  signRequest,
} from './envelope.js';

// Transports
export { EsmpConnection, parseReply } from './connection.js';
export { HttpEsmpAPI } from './server-api.js';
export type { IEsmpAPI, EsmpResponse } from './server-api.js';
