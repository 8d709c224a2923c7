/**
 * @subword/core -- shared types, errors, ports and configuration.
 */
export * from "./types.js";
export * from "./errors.js";
export * from "./interfaces.js";
export * from "./config.js";
export { Registry } from "./registry.js";
export { hashConfig } from "./hash.js";
