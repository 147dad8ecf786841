/**
 * URI authority model and micro-form validation.
 *
 * Top-level package exports.
 */

export * from "./protocol/index.js";
