/**
 * Subsystem interfaces (ports). Every subsystem implements one of these.
 */
import { Context, Effect, Option } from "effect";
import type { ArtifactError, TokenizerError } from "./errors.js";
import type { TokenizerConfig } from "./config.js";
import type {
  TrainingArtifacts,
  TrainingStats,
  WordFrequencyTable,
} from "./types.js";

// ── Trainer ────────────────────────────────────────────────────────────────

/** Paths of the records written by `Trainer.saveArtifacts`. */
export interface SavedArtifacts {
  readonly vocabPath: string;
  readonly mergesPath: string;
}

/**
 * A subword vocabulary learner. BPE is one implementation; other algorithms
 * plug in as further implementations of the same capabilities.
 */
export interface Trainer {
  readonly name: string;
  /** Learn from a word-frequency table. Replaces any earlier result. */
  fit(words: WordFrequencyTable): Effect.Effect<TrainingArtifacts, TokenizerError>;
  saveArtifacts(outputDir: string): Effect.Effect<SavedArtifacts, ArtifactError>;
  /** Logs a summary, or a warning when nothing has been trained yet. */
  logStatistics(): Effect.Effect<void>;
  statistics(): Option.Option<TrainingStats>;
  artifacts(): Option.Option<TrainingArtifacts>;
}

export class TrainerService extends Context.Tag("TrainerService")<
  TrainerService,
  Trainer
>() {}

// ── Configuration ──────────────────────────────────────────────────────────

export class ConfigService extends Context.Tag("ConfigService")<
  ConfigService,
  TokenizerConfig
>() {}
