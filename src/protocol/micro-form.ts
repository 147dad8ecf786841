/**
 * Micro-form validation for authorities.
 *
 * The micro (compact binary) URI encoding only has room for an IPv4/IPv6
 * address or an id whose length fits in one byte. Encoders must call
 * `validateMicroForm` (or `assertMicroForm`) first and refuse to encode an
 * authority that fails.
 */

import type { Authority } from "./authority.js";
import { ValidationError } from "./errors.js";
import {
  REMOTE_ID_MAXIMUM_BYTES,
  REMOTE_ID_MINIMUM_BYTES,
  REMOTE_IPV4_BYTES,
  REMOTE_IPV6_BYTES,
} from "./types.js";

export type ValidationResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: ValidationError };

export const NO_REMOTE_REASON = "Has Authority, but no remote";
export const IP_LENGTH_REASON =
  "IP address is not IPv4 (4 bytes) or IPv6 (16 bytes)";
export const ID_LENGTH_REASON = "ID doesn't fit in bytes allocated";
export const NAME_REASON =
  "Must use IP address or ID as Authority for micro form.";

export function isValidIpLength(length: number): boolean {
  return length === REMOTE_IPV4_BYTES || length === REMOTE_IPV6_BYTES;
}

export function isValidIdLength(length: number): boolean {
  return length >= REMOTE_ID_MINIMUM_BYTES && length <= REMOTE_ID_MAXIMUM_BYTES;
}

/**
 * Check whether an authority can be carried by a micro-form URI.
 *
 * Every failing reason is collected and joined into one ValidationError.
 * Never throws and never mutates `authority`.
 */
export function validateMicroForm(authority: Authority): ValidationResult {
  const errors: ValidationError[] = [];
  const remote = authority.getRemote();

  if (remote === undefined) {
    errors.push(new ValidationError(NO_REMOTE_REASON));
  } else {
    switch (remote.kind) {
      case "ip":
        if (!isValidIpLength(remote.ip.length)) {
          errors.push(new ValidationError(IP_LENGTH_REASON));
        }
        break;
      case "id":
        if (!isValidIdLength(remote.id.length)) {
          errors.push(new ValidationError(ID_LENGTH_REASON));
        }
        break;
      case "name":
        errors.push(new ValidationError(NAME_REASON));
        break;
    }
  }

  if (errors.length > 0) {
    return { ok: false, error: ValidationError.join(errors) };
  }
  return { ok: true };
}

export function isMicroForm(authority: Authority): boolean {
  return validateMicroForm(authority).ok;
}

/**
 * Precondition for micro-form encoding.
 *
 * @throws {ValidationError} With every failing reason if `authority` is not micro-form legal.
 */
export function assertMicroForm(authority: Authority): void {
  const result = validateMicroForm(authority);
  if (!result.ok) {
    throw result.error;
  }
}
