/**
 * CLI configuration.
 *
 * Priority (highest wins): constructor arg > env var > default.
 */

export type OutputFormat = "text" | "json";

const VALID_FORMATS: ReadonlySet<string> = new Set(["text", "json"]);

function isOutputFormat(value: string): value is OutputFormat {
  return VALID_FORMATS.has(value);
}

export class CliConfig {
  readonly output: OutputFormat;

  constructor(options: { output?: string | null } = {}) {
    // Output format: constructor arg > UAUTH_OUTPUT > text
    const format = options.output ?? process.env["UAUTH_OUTPUT"] ?? "text";

    if (!isOutputFormat(format)) {
      throw new Error(
        `Invalid output format '${format}'. ` +
          `Must be one of: ${JSON.stringify([...VALID_FORMATS].sort())}`
      );
    }

    this.output = format;
  }
}
