/**
 * Protocol rejections and their HTTP mapping.
 *
 * Rejections are values, not exceptions: every core operation returns either
 * its success shape or a Rejection. Anything thrown is an infrastructure fault.
 */

import type { ProtocolErrorKind, Rejection } from 'esmp-sdk';

export type Outcome<T extends object> = ({ ok: true } & T) | Rejection;

export function reject(error: ProtocolErrorKind, message: string, field?: string): Rejection {
  return field === undefined ? { ok: false, error, message } : { ok: false, error, message, field };
}

const HTTP_STATUS: Record<ProtocolErrorKind, number> = {
  MalformedInput: 400,
  SchemaViolation: 400,
  InvalidField: 400,
  StaleMutation: 400,
  InvalidTransition: 400,
  SignatureInvalid: 401,
  Forbidden: 403,
  UnknownGroup: 404,
  DuplicateGroup: 409,
};

export function httpStatusFor(error: ProtocolErrorKind): number {
  return HTTP_STATUS[error];
}

/** JSON body sent for a rejection. */
export function rejectionBody(rejection: Rejection): Record<string, string> {
  const body: Record<string, string> = { error: rejection.error, message: rejection.message };
  if (rejection.field !== undefined) body.field = rejection.field;
  return body;
}

/** Status and JSON body of an HTTP route's answer. */
export interface RouteResult {
  status: number;
  body: unknown;
}

export function rejectionResponse(rejection: Rejection): RouteResult {
  return { status: httpStatusFor(rejection.error), body: rejectionBody(rejection) };
}
