/**
 * Plain-object form of an authority, for JSON and config files.
 *
 * Byte designators are base64url strings on the wire:
 *   {}                 local
 *   { "name": "..." }  name
 *   { "ip": "..." }    IP address bytes
 *   { "id": "..." }    id bytes
 */

import { Authority } from "./authority.js";
import { InvalidAuthorityError } from "./errors.js";
import { b64Decode, b64Encode } from "./types.js";

const DESIGNATOR_FIELDS = new Set(["name", "ip", "id"]);

/**
 * Convert an authority to a plain dict. Local authorities become `{}`.
 */
export function authorityToDict(authority: Authority): Record<string, string> {
  const remote = authority.getRemote();
  if (remote === undefined) return {};
  switch (remote.kind) {
    case "name":
      return { name: remote.name };
    case "ip":
      return { ip: b64Encode(remote.ip) };
    case "id":
      return { id: b64Encode(remote.id) };
  }
}

/**
 * Restore an authority from a plain dict.
 *
 * Does not check micro-form rules; call `validateMicroForm` for that.
 *
 * @throws {InvalidAuthorityError} If the dict has unknown keys, more than one
 *   designator, a non-string value, or bytes that are not unpadded base64url.
 */
export function authorityFromDict(d: Record<string, unknown>): Authority {
  const keys = Object.keys(d);
  const unknown = keys.filter((k) => !DESIGNATOR_FIELDS.has(k)).sort();
  if (unknown.length > 0) {
    throw new InvalidAuthorityError(
      `Unknown authority fields: ${JSON.stringify(unknown)}`
    );
  }
  if (keys.length > 1) {
    throw new InvalidAuthorityError(
      `Authority has more than one remote: ${JSON.stringify(keys.sort())}`
    );
  }
  if (keys.length === 0) {
    return Authority.local();
  }

  const field = keys[0];
  const value = d[field];
  if (typeof value !== "string") {
    throw new InvalidAuthorityError(
      `Authority field "${field}" must be a string`
    );
  }

  switch (field) {
    case "name":
      return Authority.fromName(value);
    case "ip":
      return Authority.fromIp(b64Decode(value));
    default:
      return Authority.fromId(b64Decode(value));
  }
}
