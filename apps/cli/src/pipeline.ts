/**
 * Tokenizer pipelines: corpus -> word frequencies -> trainer -> artifacts.
 *
 * Both pipelines read their settings from `ConfigService`; training also
 * needs a `TrainerService`.
 */
import { join } from "node:path";
import { Effect } from "effect";
import {
  ConfigService,
  TrainerService,
  describeConfig,
  hashConfig,
  type ArtifactError,
  type CorpusError,
  type SavedArtifacts,
  type TokenizerError,
  type TrainingArtifacts,
  type UnsupportedModeError,
  type WordFrequencyTable,
} from "@subword/core";
import { buildWordFrequencies } from "@subword/corpus";
import { loadWordFrequencies, saveWordFrequencies } from "@subword/tokenizers";

export const WORD_FREQS_FILE = "word_freqs.txt";

/** Where training words come from: the configured corpus, or a saved table. */
export type WordSource =
  | { readonly kind: "corpus" }
  | { readonly kind: "file"; readonly path: string };

export function collectWords(
  source: WordSource,
): Effect.Effect<WordFrequencyTable, CorpusError | UnsupportedModeError | ArtifactError, ConfigService> {
  return Effect.gen(function* () {
    if (source.kind === "file") {
      yield* Effect.logInfo(`Reading word frequencies from ${source.path}`);
      return yield* loadWordFrequencies(source.path);
    }
    const config = yield* ConfigService;
    return yield* buildWordFrequencies(config.inputDir, {
      mode: config.loadMode,
      lowercase: config.lowercase,
      chunkSize: config.chunkSize,
    });
  });
}

export interface TrainTokenizerResult {
  readonly artifacts: TrainingArtifacts;
  readonly saved: SavedArtifacts;
}

/**
 * Build word frequencies, fit the trainer, log statistics, save artifacts.
 * Statistics are logged before saving so they survive a persistence failure.
 */
export function trainTokenizer(
  source: WordSource,
): Effect.Effect<
  TrainTokenizerResult,
  CorpusError | UnsupportedModeError | ArtifactError | TokenizerError,
  ConfigService | TrainerService
> {
  return Effect.gen(function* () {
    const config = yield* ConfigService;
    const trainer = yield* TrainerService;
    yield* Effect.logInfo(`Starting tokenizer training pipeline (trainer=${trainer.name}, config ${hashConfig(config)})`);
    for (const line of describeConfig(config)) yield* Effect.logDebug(line);

    const words = yield* collectWords(source);
    const artifacts = yield* trainer.fit(words);
    yield* trainer.logStatistics();
    const saved = yield* trainer.saveArtifacts(config.outputDir);

    yield* Effect.logInfo("Tokenizer training pipeline complete.");
    return { artifacts, saved };
  }).pipe(Effect.withSpan("pipeline.trainTokenizer"));
}

/** Build the word-frequency table and write it to `out` (default: under outputDir). */
export function preprocess(
  out?: string,
): Effect.Effect<
  { readonly path: string; readonly words: WordFrequencyTable },
  CorpusError | UnsupportedModeError | ArtifactError,
  ConfigService
> {
  return Effect.gen(function* () {
    const config = yield* ConfigService;
    const path = out ?? join(config.outputDir, WORD_FREQS_FILE);
    const words = yield* collectWords({ kind: "corpus" });
    yield* saveWordFrequencies(path, words);
    yield* Effect.logInfo(`Saved ${words.size} word frequencies to: ${path}`);
    return { path, words };
  }).pipe(Effect.withSpan("pipeline.preprocess"));
}
