/**
 * Tests for CliConfig.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CliConfig } from "../../src/cli/config.js";

describe("CliConfig", () => {
  let saved: string | undefined;

  beforeEach(() => {
    saved = process.env["UAUTH_OUTPUT"];
    delete process.env["UAUTH_OUTPUT"];
  });

  afterEach(() => {
    if (saved !== undefined) {
      process.env["UAUTH_OUTPUT"] = saved;
    } else {
      delete process.env["UAUTH_OUTPUT"];
    }
  });

  it("defaults to text output", () => {
    expect(new CliConfig().output).toBe("text");
  });

  it("uses UAUTH_OUTPUT env var", () => {
    process.env["UAUTH_OUTPUT"] = "json";
    expect(new CliConfig().output).toBe("json");
  });

  it("prefers constructor arg over env var", () => {
    process.env["UAUTH_OUTPUT"] = "json";
    expect(new CliConfig({ output: "text" }).output).toBe("text");
  });

  it("rejects an unknown format", () => {
    expect(() => new CliConfig({ output: "yaml" })).toThrow(
      "Invalid output format 'yaml'"
    );
  });
});
