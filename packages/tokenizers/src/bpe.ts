/**
 * Byte-pair encoding vocabulary trainer.
 *
 * Starts from a character-level decomposition of every word (plus an
 * end-of-word marker) and repeatedly merges the most frequent adjacent pair,
 * weighting each occurrence by its word's frequency. The learned merges are
 * recorded in the order they were discovered; an encoder must replay them in
 * that order.
 *
 * Loop:  initializing -> iterating -> converged | exhausted
 *
 * Pair counts are rebuilt from the whole vocabulary every iteration and the
 * vocabulary itself is replaced, not edited, by each merge.
 */
import { Effect, Option } from "effect";
import {
  ArtifactError,
  END_OF_WORD,
  TokenizerError,
  type MergeRule,
  type SavedArtifacts,
  type Trainer,
  type TrainingArtifacts,
  type TrainingStats,
  type TrainingStatus,
  type Vocabulary,
  type WordFrequencyTable,
} from "@subword/core";
import { symbolize } from "./symbolize.js";
import { countPairs, selectBest } from "./pairs.js";
import { applyMerge } from "./merge.js";
import { summarize } from "./stats.js";
import { saveArtifacts } from "./persist.js";

export const DEFAULT_NUM_MERGES = 10_000;
export const DEFAULT_LOG_INTERVAL = 100;

export type TrainerPhase = "idle" | "initializing" | "iterating" | TrainingStatus;

export interface BpeOptions {
  /** Merge budget. */
  readonly numMerges?: number;
  /** Merges between debug progress lines. */
  readonly logInterval?: number;
  readonly marker?: string;
  /** Called on every state transition of the loop. */
  readonly onPhase?: (phase: TrainerPhase) => void;
}

/**
 * Run the training loop over a word-frequency table.
 *
 * Stops early (`converged`) when no word has two symbols left; otherwise runs
 * the full budget (`exhausted`).
 */
export function trainBpe(
  words: WordFrequencyTable,
  options: BpeOptions = {},
): Effect.Effect<TrainingArtifacts, TokenizerError> {
  const numMerges = options.numMerges ?? DEFAULT_NUM_MERGES;
  const logInterval = options.logInterval ?? DEFAULT_LOG_INTERVAL;
  const marker = options.marker ?? END_OF_WORD;
  const enter = (phase: TrainerPhase) => Effect.sync(() => options.onPhase?.(phase));

  return Effect.gen(function* () {
    if (!Number.isInteger(numMerges) || numMerges < 1) {
      return yield* Effect.fail(
        new TokenizerError({ message: `numMerges must be a positive integer, got ${numMerges}` }),
      );
    }
    if (!Number.isInteger(logInterval) || logInterval < 1) {
      return yield* Effect.fail(
        new TokenizerError({ message: `logInterval must be a positive integer, got ${logInterval}` }),
      );
    }

    yield* enter("initializing");
    yield* Effect.logInfo(`Starting BPE training (numMerges=${numMerges})`);
    let vocab: Vocabulary = symbolize(words, marker);
    const merges: MergeRule[] = [];
    yield* Effect.logInfo(`Initialized vocab with ${vocab.length} entries`);

    yield* enter("iterating");
    let status: TrainingStatus = "exhausted";
    for (let i = 0; i < numMerges; i++) {
      const counts = countPairs(vocab);
      if (counts.size === 0) {
        yield* Effect.logInfo(`No more symbol pairs left after ${i} merges`);
        status = "converged";
        break;
      }

      const best = yield* selectBest(counts).pipe(
        Effect.mapError((cause) => new TokenizerError({ message: cause.message, cause })),
      );
      const [left, right] = best.pair;
      vocab = applyMerge(best.pair, vocab);
      merges.push({ rank: i, left, right });

      if (i % logInterval === 0 || i === numMerges - 1) {
        yield* Effect.logDebug(
          `Merge ${i + 1}/${numMerges}: (${left}, ${right}) -> ${left}${right} [count ${best.count}]`,
        );
      }
    }

    yield* enter(status);
    yield* Effect.logInfo(`Training complete (${status}). Learned ${merges.length} merge operations`);
    return { vocab, merges, status } satisfies TrainingArtifacts;
  }).pipe(Effect.withSpan("bpe.train"));
}

export class BpeTrainer implements Trainer {
  readonly name = "bpe";

  private readonly _numMerges: number;
  private readonly _logInterval: number;
  private readonly _marker: string;

  /** Result of the last successful `fit`. */
  private _artifacts: Option.Option<TrainingArtifacts> = Option.none();

  private _phase: TrainerPhase = "idle";

  constructor(options: Omit<BpeOptions, "onPhase"> = {}) {
    this._numMerges = options.numMerges ?? DEFAULT_NUM_MERGES;
    this._logInterval = options.logInterval ?? DEFAULT_LOG_INTERVAL;
    this._marker = options.marker ?? END_OF_WORD;
  }

  // ── Public interface ─────────────────────────────────────────────────────

  get numMerges(): number {
    return this._numMerges;
  }

  get phase(): TrainerPhase {
    return this._phase;
  }

  fit(words: WordFrequencyTable): Effect.Effect<TrainingArtifacts, TokenizerError> {
    return trainBpe(words, {
      numMerges: this._numMerges,
      logInterval: this._logInterval,
      marker: this._marker,
      onPhase: (phase) => {
        this._phase = phase;
      },
    }).pipe(
      Effect.tap((artifacts) =>
        Effect.sync(() => {
          this._artifacts = Option.some(artifacts);
        }),
      ),
    );
  }

  saveArtifacts(outputDir: string): Effect.Effect<SavedArtifacts, ArtifactError> {
    return Option.match(this._artifacts, {
      onNone: () =>
        Effect.fail(
          new ArtifactError({ message: "Nothing to save: run fit() first", path: outputDir }),
        ),
      onSome: (artifacts) => saveArtifacts(outputDir, artifacts, this._marker),
    });
  }

  statistics(): Option.Option<TrainingStats> {
    return Option.map(this._artifacts, summarize);
  }

  artifacts(): Option.Option<TrainingArtifacts> {
    return this._artifacts;
  }

  /** Vocabulary compression summary after training. */
  logStatistics(): Effect.Effect<void> {
    return Option.match(this.statistics(), {
      onNone: () => Effect.logWarning("No vocabulary found. Run fit() first."),
      onSome: (stats) =>
        Effect.gen(function* () {
          yield* Effect.logInfo("BPE merge statistics:");
          yield* Effect.logInfo(`  unique symbolized words: ${stats.entryCount}`);
          yield* Effect.logInfo(`  merge operations learned: ${stats.mergeCount}`);
          yield* Effect.logInfo(`  avg symbols per word (weighted): ${stats.avgSymbolsPerWord.toFixed(2)}`);
        }),
    });
  }
}
