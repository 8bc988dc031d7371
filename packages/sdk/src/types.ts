/**
 * ESMP type definitions — wire envelopes, group metadata, profiles.
 *
 * Field names follow the wire format (snake_case) so that a parsed line and
 * its typed form share one shape.
 */

/** A `localpart#domain` identifier. */
export type Address = string;

export type Visibility = 'public' | 'private';

export type GroupSubtype =
  | 'group_created'
  | 'joined'
  | 'left'
  | 'removed'
  | 'admin_assigned'
  | 'admin_revoked'
  | 'group_renamed'
  | 'description_updated'
  | 'dp_updated';

export type SystemSubtype = GroupSubtype | 'profile_updated';

export const GROUP_SUBTYPES: readonly GroupSubtype[] = [
  'group_created',
  'joined',
  'left',
  'removed',
  'admin_assigned',
  'admin_revoked',
  'group_renamed',
  'description_updated',
  'dp_updated',
];

/** Fields that never take part in the signed bytes. */
export type EnvelopeSignature = {
  /** Base64 Ed25519 signature over the canonical form. */
  signature: string;
  /** Base64 raw 32-byte Ed25519 public key. */
  sender_pubkey: string;
};

interface EnvelopeBase extends EnvelopeSignature {
  to: Address[];
  cc?: Address[];
  group_id?: string;
}

export interface TextEnvelope extends EnvelopeBase {
  type: 'text';
  /** Sending address; keys direct threads when present. */
  from?: Address;
  /** Opaque payload — signed and stored, never inspected. */
  body: unknown;
}

interface SystemEnvelopeBase<S extends SystemSubtype> extends EnvelopeBase {
  type: 'system';
  subtype: S;
  actor: Address;
  /** RFC3339 instant. */
  timestamp: string;
}

interface GroupEnvelopeBase<S extends GroupSubtype> extends SystemEnvelopeBase<S> {
  group_id: string;
}

export interface GroupCreatedEnvelope extends GroupEnvelopeBase<'group_created'> {
  new_name?: string;
  new_description?: string;
  new_dp_url?: string;
}

export type JoinedEnvelope = GroupEnvelopeBase<'joined'>;
export type LeftEnvelope = GroupEnvelopeBase<'left'>;

export interface RemovedEnvelope extends GroupEnvelopeBase<'removed'> {
  target: Address;
}

export interface AdminAssignedEnvelope extends GroupEnvelopeBase<'admin_assigned'> {
  target: Address;
}

export interface AdminRevokedEnvelope extends GroupEnvelopeBase<'admin_revoked'> {
  target: Address;
}

export interface GroupRenamedEnvelope extends GroupEnvelopeBase<'group_renamed'> {
  new_name: string;
}

export interface DescriptionUpdatedEnvelope extends GroupEnvelopeBase<'description_updated'> {
  new_description: string;
}

export interface DpUpdatedEnvelope extends GroupEnvelopeBase<'dp_updated'> {
  new_dp_url: string;
}

export interface ProfileUpdatedEnvelope extends SystemEnvelopeBase<'profile_updated'> {
  /** Per-field changes; shape checked by the profile store. */
  changes: Record<string, unknown>;
}

export type GroupSystemEnvelope =
  | GroupCreatedEnvelope
  | JoinedEnvelope
  | LeftEnvelope
  | RemovedEnvelope
  | AdminAssignedEnvelope
  | AdminRevokedEnvelope
  | GroupRenamedEnvelope
  | DescriptionUpdatedEnvelope
  | DpUpdatedEnvelope;

export type SystemEnvelope = GroupSystemEnvelope | ProfileUpdatedEnvelope;

export type Envelope = TextEnvelope | SystemEnvelope;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown ? Omit<T, K> : never;

/** An envelope before signing. */
export type UnsignedEnvelope = DistributiveOmit<Envelope, keyof EnvelopeSignature>;

export interface GroupMetadata {
  group_id: string;
  group_name: string | null;
  group_description: string | null;
  group_dp_url: string | null;
  admins: Address[];
  members: Address[];
  created_at: string;
  updated_at: string;
}

export interface ProfileField<T> {
  value: T | null;
  visibility: Visibility;
}

export const PROFILE_FIELD_NAMES = [
  'first_name',
  'middle_name',
  'last_name',
  'display_picture',
  'address',
] as const;

export type ProfileFieldName = (typeof PROFILE_FIELD_NAMES)[number];

export interface ProfileFieldUpdate {
  /** `null` clears the stored value; absent keeps it. */
  value?: string | null;
  visibility?: Visibility;
}

export type ProfileChanges = Partial<Record<ProfileFieldName, ProfileFieldUpdate>>;

/** Profile as rendered for one reader. Fields the reader may not see are absent. */
export interface ProfileView {
  pubkey: string;
  first_name?: ProfileField<string>;
  middle_name?: ProfileField<string>;
  last_name?: ProfileField<string>;
  display_picture?: ProfileField<string>;
  address?: ProfileField<string>;
  updated_at: string;
}

/** Body of `PUT /users/:pubkey/profile`. */
export interface SignedProfileUpdate {
  fields: ProfileChanges;
  timestamp: string;
  signature: string;
}

export type ProtocolErrorKind =
  | 'MalformedInput'
  | 'SignatureInvalid'
  | 'SchemaViolation'
  | 'StaleMutation'
  | 'DuplicateGroup'
  | 'UnknownGroup'
  | 'Forbidden'
  | 'InvalidField'
  | 'InvalidTransition';

export const PROTOCOL_ERROR_KINDS: readonly ProtocolErrorKind[] = [
  'MalformedInput',
  'SignatureInvalid',
  'SchemaViolation',
  'StaleMutation',
  'DuplicateGroup',
  'UnknownGroup',
  'Forbidden',
  'InvalidField',
  'InvalidTransition',
];

/** A client-attributable refusal. */
export interface Rejection {
  ok: false;
  error: ProtocolErrorKind;
  message: string;
  /** Offending field, when one can be named. */
  field?: string;
}

export interface ThreadPosition {
  threadKey: string;
  seq: number;
}

export interface ThreadRecord extends ThreadPosition {
  /** The envelope exactly as accepted, signature included. */
  envelope: Record<string, unknown>;
  acceptedAt: string;
}

/** One reply line from the TCP listener. */
export type DispatchReply =
  | { ok: true; threads: ThreadPosition[] }
  | { ok: false; error: ProtocolErrorKind | 'InternalError'; message: string; field?: string };
