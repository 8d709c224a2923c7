/**
 * Shared command runner: load config, install logging, map failures to an
 * exit code.
 */
import { Effect, LogLevel } from "effect";
import {
  ConfigService,
  loadConfig,
  type ArtifactError,
  type ConfigError,
  type CorpusError,
  type EmptyInputError,
  type TokenizerError,
  type UnsupportedModeError,
} from "@subword/core";
import { RuntimeFrom, loggingLayer } from "@subword/effect-runtime";
import { configOverrides } from "./parse.js";

export type CliError =
  | ConfigError
  | CorpusError
  | UnsupportedModeError
  | ArtifactError
  | TokenizerError
  | EmptyInputError;

export function describeError(error: CliError): string {
  const cause = error.cause instanceof Error ? ` (${error.cause.message})` : "";
  return `${error._tag}: ${error.message}${cause}`;
}

/**
 * Run `program` with the config built from `--config`, the environment and
 * the remaining flags. Resolves to the process exit code.
 */
export function runCommand(
  kv: Record<string, string>,
  program: Effect.Effect<unknown, CliError, ConfigService>,
): Promise<number> {
  const main = Effect.gen(function* () {
    const config = yield* loadConfig({ path: kv["config"], overrides: configOverrides(kv) });
    yield* program.pipe(Effect.provide(RuntimeFrom(config)));
    return 0;
  }).pipe(
    Effect.catchAll((error) => Effect.as(Effect.logError(describeError(error)), 1)),
    Effect.provide(loggingLayer(LogLevel.Info)),
  );
  return Effect.runPromise(main);
}
