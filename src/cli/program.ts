/**
 * The uauth commander program. Built fresh per call so tests can parse
 * argument lists without touching process.argv.
 */

import { Command } from "commander";

import { validateCommand } from "./commands/validate.js";
import { showCommand } from "./commands/show.js";
import type { DesignatorOptions } from "./helpers.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("uauth")
    .description("Inspect and validate URI authorities for micro form")
    .version("0.1.0");

  // ---- validate ------------------------------------------------------------
  program
    .command("validate")
    .description("Check whether an authority can be used in a micro-form URI")
    .option("--name <name>", "Authority name")
    .option("--ip <hex>", "IP address bytes as hex (e.g. 7f000001)")
    .option("--id <hex>", "Id bytes as hex")
    .option("-o, --output <format>", "Output format: text or json (env: UAUTH_OUTPUT)")
    .option("--json", "Shorthand for --output json")
    .action((opts: DesignatorOptions & { output?: string; json?: boolean }) => {
      validateCommand({
        name: opts.name,
        ip: opts.ip,
        id: opts.id,
        output: opts.json ? "json" : opts.output,
      });
    });

  // ---- show ----------------------------------------------------------------
  program
    .command("show")
    .description("Print the JSON form of an authority")
    .option("--name <name>", "Authority name")
    .option("--ip <hex>", "IP address bytes as hex")
    .option("--id <hex>", "Id bytes as hex")
    .action((opts: DesignatorOptions) => {
      showCommand({ name: opts.name, ip: opts.ip, id: opts.id });
    });

  return program;
}
