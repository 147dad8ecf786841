/**
 * URI authority model.
 *
 * An authority names the node that owns a resource. It is either local
 * (no remote) or carries exactly one remote designator: a name, an IP
 * address, or an opaque id.
 */

import { InvalidAuthorityError } from "./errors.js";

/**
 * The remote designator of an authority. A single slot, so at most one
 * addressing form can be set at a time.
 */
export type Remote =
  | { readonly kind: "name"; readonly name: string }
  | { readonly kind: "ip"; readonly ip: Uint8Array }
  | { readonly kind: "id"; readonly id: Uint8Array };

export type RemoteKind = Remote["kind"];

/** Byte input accepted by `setIp`/`setId`; always copied. */
export type ByteInput = Uint8Array | ArrayLike<number>;

/**
 * Copy byte input, rejecting numbers that are not integers in 0..255
 * (Uint8Array.from would wrap or truncate them).
 */
function toBytes(input: ByteInput): Uint8Array {
  if (input instanceof Uint8Array) return input.slice();
  const bytes = new Uint8Array(input.length);
  for (let i = 0; i < input.length; i++) {
    const value = input[i];
    if (!Number.isInteger(value) || value < 0 || value > 255) {
      throw new InvalidAuthorityError(
        `Byte at index ${i} is not an integer in 0..255: ${value}`
      );
    }
    bytes[i] = value;
  }
  return bytes;
}

function copyRemote(remote: Remote): Remote {
  switch (remote.kind) {
    case "name":
      return remote;
    case "ip":
      return { kind: "ip", ip: remote.ip.slice() };
    case "id":
      return { kind: "id", id: remote.id.slice() };
  }
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((v, i) => v === b[i]);
}

export class Authority {
  private remote: Remote | undefined;

  constructor(remote?: Remote) {
    this.remote = undefined;
    if (remote === undefined) return;
    switch (remote.kind) {
      case "name":
        this.setName(remote.name);
        break;
      case "ip":
        this.setIp(remote.ip);
        break;
      case "id":
        this.setId(remote.id);
        break;
    }
  }

  static local(): Authority {
    return new Authority();
  }

  static fromName(name: string): Authority {
    return new Authority().setName(name);
  }

  static fromIp(ip: ByteInput): Authority {
    return new Authority().setIp(ip);
  }

  static fromId(id: ByteInput): Authority {
    return new Authority().setId(id);
  }

  hasName(): boolean {
    return this.remote?.kind === "name";
  }

  hasIp(): boolean {
    return this.remote?.kind === "ip";
  }

  hasId(): boolean {
    return this.remote?.kind === "id";
  }

  hasRemote(): boolean {
    return this.remote !== undefined;
  }

  /** True when the authority refers to the local node. */
  isLocal(): boolean {
    return this.remote === undefined;
  }

  /** A copy of the current designator, or undefined when local. */
  getRemote(): Remote | undefined {
    return this.remote === undefined ? undefined : copyRemote(this.remote);
  }

  getName(): string | undefined {
    return this.remote?.kind === "name" ? this.remote.name : undefined;
  }

  getIp(): Uint8Array | undefined {
    return this.remote?.kind === "ip" ? this.remote.ip.slice() : undefined;
  }

  getId(): Uint8Array | undefined {
    return this.remote?.kind === "id" ? this.remote.id.slice() : undefined;
  }

  /** Replace the designator with a name. Names are never length-checked here. */
  setName(name: string): this {
    this.remote = { kind: "name", name };
    return this;
  }

  /** @throws {InvalidAuthorityError} If a number is not a byte value. */
  setIp(ip: ByteInput): this {
    this.remote = { kind: "ip", ip: toBytes(ip) };
    return this;
  }

  /** @throws {InvalidAuthorityError} If a number is not a byte value. */
  setId(id: ByteInput): this {
    this.remote = { kind: "id", id: toBytes(id) };
    return this;
  }

  clearRemote(): this {
    this.remote = undefined;
    return this;
  }

  equals(other: Authority): boolean {
    const a = this.remote;
    const b = other.remote;
    if (a === undefined || b === undefined) return a === b;
    switch (a.kind) {
      case "name":
        return b.kind === "name" && a.name === b.name;
      case "ip":
        return b.kind === "ip" && bytesEqual(a.ip, b.ip);
      case "id":
        return b.kind === "id" && bytesEqual(a.id, b.id);
    }
  }
}
