/**
 * URI authority protocol layer.
 *
 * Public API re-exports for the authority model and micro-form validation.
 */

// Types
export {
  REMOTE_IPV4_BYTES,
  REMOTE_IPV6_BYTES,
  REMOTE_ID_MINIMUM_BYTES,
  REMOTE_ID_MAXIMUM_BYTES,
  b64Encode,
  b64Decode,
  bytesToHex,
  hexToBytes,
} from "./types.js";

// Errors
export {
  UriError,
  ValidationError,
  InvalidAuthorityError,
} from "./errors.js";

// Authority
export {
  type Remote,
  type RemoteKind,
  type ByteInput,
  Authority,
} from "./authority.js";

// Micro form
export {
  type ValidationResult,
  NO_REMOTE_REASON,
  IP_LENGTH_REASON,
  ID_LENGTH_REASON,
  NAME_REASON,
  isValidIpLength,
  isValidIdLength,
  validateMicroForm,
  isMicroForm,
  assertMicroForm,
} from "./micro-form.js";

// Plain-object form
export { authorityToDict, authorityFromDict } from "./authority-dict.js";
