/**
 * CLI helper utilities shared across commands.
 */

import {
  Authority,
  InvalidAuthorityError,
  bytesToHex,
  hexToBytes,
} from "../protocol/index.js";

/** Designator flags shared by every command. At most one may be given. */
export interface DesignatorOptions {
  name?: string;
  ip?: string;
  id?: string;
}

/**
 * Build an authority from CLI flags. No flag means a local authority.
 *
 * @throws {InvalidAuthorityError} If more than one designator is given or
 *   the hex bytes are malformed.
 */
export function authorityFromOptions(options: DesignatorOptions): Authority {
  const given = (["name", "ip", "id"] as const).filter(
    (key) => options[key] !== undefined
  );
  if (given.length > 1) {
    throw new InvalidAuthorityError(
      `Specify at most one of --name, --ip, --id (got ${given
        .map((key) => `--${key}`)
        .join(", ")})`
    );
  }

  if (options.name !== undefined) return Authority.fromName(options.name);
  if (options.ip !== undefined) return Authority.fromIp(hexToBytes(options.ip));
  if (options.id !== undefined) return Authority.fromId(hexToBytes(options.id));
  return Authority.local();
}

/**
 * Short human-readable form, e.g. `ip 7f000001` or `local`.
 */
export function describeAuthority(authority: Authority): string {
  const remote = authority.getRemote();
  if (remote === undefined) return "local";
  switch (remote.kind) {
    case "name":
      return `name ${JSON.stringify(remote.name)}`;
    case "ip":
      return `ip ${bytesToHex(remote.ip) || "(empty)"}`;
    case "id":
      return `id ${bytesToHex(remote.id) || "(empty)"}`;
  }
}

/** Message of a caught value, prefixed for stderr. */
export function formatError(err: unknown): string {
  return `Error: ${err instanceof Error ? err.message : String(err)}`;
}

/**
 * Write `msg` to stderr and exit, with code 1 unless another is given.
 */
export function cliError(msg: string, exitCode = 1): never {
  process.stderr.write(`${msg}\n`);
  process.exit(exitCode);
}
