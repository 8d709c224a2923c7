/**
 * Typed error classes for every subsystem.
 */
import { Data } from "effect";

export class TokenizerError extends Data.TaggedError("TokenizerError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/** Precondition violation: an operation that needs at least one element got none. */
export class EmptyInputError extends Data.TaggedError("EmptyInputError")<{
  readonly message: string;
}> {}

export class ArtifactError extends Data.TaggedError("ArtifactError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

export class CorpusError extends Data.TaggedError("CorpusError")<{
  readonly message: string;
  readonly path: string;
  readonly cause?: unknown;
}> {}

/** A text loading strategy was requested that no loader implements. */
export class UnsupportedModeError extends Data.TaggedError("UnsupportedModeError")<{
  readonly message: string;
  readonly mode: string;
}> {}

export class ConfigError extends Data.TaggedError("ConfigError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}
