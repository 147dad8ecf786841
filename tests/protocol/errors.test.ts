import { describe, it, expect } from "vitest";
import {
  InvalidAuthorityError,
  UriError,
  ValidationError,
} from "../../src/protocol/errors.js";

describe("ValidationError", () => {
  it("is part of the UriError hierarchy", () => {
    const err = new ValidationError("bad");
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toBeInstanceOf(UriError);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("ValidationError");
    expect(err.reasons).toEqual(["bad"]);
  });

  it("joins reasons in insertion order", () => {
    const joined = ValidationError.join([
      new ValidationError("first"),
      new ValidationError("second"),
      new ValidationError("third"),
    ]);
    expect(joined.message).toBe("first, second, third");
    expect(joined.reasons).toEqual(["first", "second", "third"]);
  });

  it("flattens already-joined errors", () => {
    const inner = ValidationError.join([
      new ValidationError("a"),
      new ValidationError("b"),
    ]);
    const outer = ValidationError.join([inner, new ValidationError("c")]);
    expect(outer.message).toBe("a, b, c");
    expect(outer.reasons).toEqual(["a", "b", "c"]);
  });

  it("joins a single reason unchanged", () => {
    expect(ValidationError.join([new ValidationError("only")]).message).toBe("only");
  });
});

describe("InvalidAuthorityError", () => {
  it("extends UriError", () => {
    const err = new InvalidAuthorityError("oops");
    expect(err).toBeInstanceOf(UriError);
    expect(err.name).toBe("InvalidAuthorityError");
    expect(err.message).toBe("oops");
  });
});
