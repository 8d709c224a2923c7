/**
 * @subword/tokenizers -- subword vocabulary trainers.
 *
 * Provides the BPE trainer and its building blocks, the end-of-word format
 * converter, artifact persistence, and a registry so callers can look up
 * trainers by name.
 */
import { Registry, type Trainer } from "@subword/core";
import { BpeTrainer } from "./bpe.js";

// ── Re-exports ────────────────────────────────────────────────────────────
export { BpeTrainer, trainBpe, DEFAULT_NUM_MERGES, DEFAULT_LOG_INTERVAL } from "./bpe.js";
export type { BpeOptions, TrainerPhase } from "./bpe.js";
export { symbolize } from "./symbolize.js";
export { countPairs, selectBest } from "./pairs.js";
export { applyMerge, mergeSequence } from "./merge.js";
export { summarize, totalFrequency, weightedSymbolCount } from "./stats.js";
export {
  toCompact,
  toExpanded,
  convertFormat,
  compactSequence,
  expandSequence,
  entryWord,
} from "./format.js";
export type { EndOfWordFormat } from "./format.js";
export {
  saveArtifacts,
  loadArtifacts,
  saveWordFrequencies,
  loadWordFrequencies,
  parseVocabRecord,
  parseMergeRecord,
  vocabLines,
  mergeLines,
  VOCAB_FILE,
  MERGES_FILE,
} from "./persist.js";
export type { LoadedArtifacts } from "./persist.js";

// ── Trainer registry ──────────────────────────────────────────────────────

/** Settings every trainer factory receives. */
export interface TrainerOptions {
  readonly numMerges: number;
  readonly logInterval: number;
}

/**
 * Trainer registry.
 *
 * Pre-registered implementations:
 * - `"bpe"` -- byte-pair encoding with a `</w>` end-of-word marker
 *
 * Usage:
 * ```ts
 * const trainer = yield* trainerRegistry.get("bpe", { numMerges: 5000, logInterval: 100 });
 * ```
 */
export const trainerRegistry = new Registry<Trainer, TrainerOptions>("trainer");

trainerRegistry.register("bpe", (options) => new BpeTrainer(options));
