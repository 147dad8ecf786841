/**
 * Constants and byte helpers shared by the authority modules.
 */

import { InvalidAuthorityError } from "./errors.js";

/** IPv4 address length in bytes. */
export const REMOTE_IPV4_BYTES = 4;

/** IPv6 address length in bytes. */
export const REMOTE_IPV6_BYTES = 16;

/** Micro form carries the id length in one byte, so ids are 1..255 bytes. */
export const REMOTE_ID_MINIMUM_BYTES = 1;
export const REMOTE_ID_MAXIMUM_BYTES = 255;

/** Unpadded base64url, the byte encoding of the plain-object form. */
export function b64Encode(data: Uint8Array): string {
  return Buffer.from(data).toString("base64url");
}

const B64URL_RE = /^[A-Za-z0-9_-]*$/;

/**
 * Decode unpadded URL-safe base64.
 *
 * @throws {InvalidAuthorityError} If `s` has characters outside the base64url
 *   alphabet, padding, or a length no encoder produces (1 mod 4).
 */
export function b64Decode(s: string): Uint8Array {
  if (!B64URL_RE.test(s) || s.length % 4 === 1) {
    throw new InvalidAuthorityError(`Invalid base64url bytes: ${JSON.stringify(s)}`);
  }
  return new Uint8Array(Buffer.from(s, "base64url"));
}

export function bytesToHex(data: Uint8Array): string {
  return Buffer.from(data).toString("hex");
}

const HEX_RE = /^(?:[0-9a-f]{2})*$/i;

/**
 * Decode a hex string (optionally `0x`-prefixed) into bytes.
 *
 * @throws {InvalidAuthorityError} If `raw` is not an even-length hex string.
 */
export function hexToBytes(raw: string): Uint8Array {
  const trimmed = raw.trim();
  const digits = /^0x/i.test(trimmed) ? trimmed.slice(2) : trimmed;
  if (!HEX_RE.test(digits)) {
    throw new InvalidAuthorityError(`Invalid hex bytes: ${JSON.stringify(raw)}`);
  }
  return new Uint8Array(Buffer.from(digits, "hex"));
}
