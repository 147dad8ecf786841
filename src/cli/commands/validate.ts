/**
 * uauth validate -- Check whether an authority is legal for micro form.
 *
 * Text output prints `OK: <authority>` on success; failures go to stderr
 * as `INVALID: <authority>: <reasons>` and exit with code 1.
 */

import {
  authorityToDict,
  validateMicroForm,
  type Authority,
} from "../../protocol/index.js";
import { CliConfig } from "../config.js";
import {
  authorityFromOptions,
  cliError,
  formatError,
  describeAuthority,
  type DesignatorOptions,
} from "../helpers.js";

export function validateCommand(
  options: DesignatorOptions & { output?: string }
): void {
  let cfg: CliConfig;
  let authority: Authority;
  try {
    cfg = new CliConfig({ output: options.output });
    authority = authorityFromOptions(options);
  } catch (err) {
    cliError(formatError(err));
  }

  const result = validateMicroForm(authority);

  if (cfg.output === "json") {
    console.log(
      JSON.stringify(
        {
          authority: authorityToDict(authority),
          valid: result.ok,
          ...(result.ok ? {} : { error: result.error.message }),
        },
        null,
        2
      )
    );
    if (!result.ok) process.exitCode = 1;
    return;
  }

  if (!result.ok) {
    cliError(`INVALID: ${describeAuthority(authority)}: ${result.error.message}`);
  }
  console.log(`OK: ${describeAuthority(authority)}`);
}
