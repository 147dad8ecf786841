/**
 * uauth show -- Print the plain-object form of an authority as JSON.
 */

import { authorityToDict } from "../../protocol/index.js";
import {
  authorityFromOptions,
  cliError,
  formatError,
  type DesignatorOptions,
} from "../helpers.js";

export function showCommand(options: DesignatorOptions): void {
  try {
    const authority = authorityFromOptions(options);
    console.log(JSON.stringify(authorityToDict(authority), null, 2));
  } catch (err) {
    cliError(formatError(err));
  }
}
