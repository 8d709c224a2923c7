/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { Effect } from "effect";
import { ConfigError } from "@subword/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function requireArg(
  kv: Record<string, string>,
  key: string,
  label?: string,
): Effect.Effect<string, ConfigError> {
  const val = kv[key];
  return val
    ? Effect.succeed(val)
    : Effect.fail(
        new ConfigError({ message: `Missing required argument: --${key}${label ? ` (${label})` : ""}` }),
      );
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

/** Flags handled by the CLI itself rather than by the config loader. */
const CLI_ONLY = new Set(["config", "debug", "wordFreqs", "out", "to"]);

/**
 * CLI flags that override config keys. `--debug` is shorthand for
 * `--logLevel=debug`.
 */
export function configOverrides(kv: Record<string, string>): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (const [key, value] of Object.entries(kv)) {
    if (!CLI_ONLY.has(key)) overrides[key] = value;
  }
  if (kv["debug"] === "true") overrides["logLevel"] = "debug";
  return overrides;
}
