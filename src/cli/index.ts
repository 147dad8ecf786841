/**
 * uauth -- command-line front end for authority micro-form checks.
 */

import { createProgram } from "./program.js";

createProgram().parse(process.argv);
