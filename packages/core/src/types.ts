/**
 * Core types for the subword system.
 */

// ── Input ──────────────────────────────────────────────────────────────────

/**
 * word -> occurrence count. Iteration order is the insertion order and is
 * preserved through every later structure; it decides ties between pairs.
 */
export type WordFrequencyTable = ReadonlyMap<string, number>;

// ── Symbols ────────────────────────────────────────────────────────────────

/** An opaque symbol: a character, the end-of-word marker, or a merge of both. */
export type Sym = string;

/** One word's current decomposition. Never empty. */
export type SymbolSequence = readonly Sym[];

/** Reserved end-of-word symbol. Longer than one character so it cannot clash. */
export const END_OF_WORD = "</w>";

// ── Vocabulary ─────────────────────────────────────────────────────────────

export interface VocabEntry {
  readonly symbols: SymbolSequence;
  /** The word's count in the original table. */
  readonly frequency: number;
}

/** Working set of word decompositions, in input-table order. */
export type Vocabulary = readonly VocabEntry[];

// ── Pairs and merges ───────────────────────────────────────────────────────

export type Pair = readonly [Sym, Sym];

export interface PairCount {
  readonly pair: Pair;
  /** Frequency-weighted number of adjacent occurrences. */
  readonly count: number;
}

/** Keyed by `pairKey`, in first-observation order. */
export type PairCounts = ReadonlyMap<string, PairCount>;

/**
 * Unambiguous map key for an ordered pair of symbols. JSON quoting keeps
 * `("a b", "c")` and `("a", "b c")` apart whatever the symbols contain.
 */
export function pairKey(left: Sym, right: Sym): string {
  return JSON.stringify([left, right]);
}

export interface MergeRule {
  /** 0-based position in the learned sequence; rules replay in this order. */
  readonly rank: number;
  readonly left: Sym;
  readonly right: Sym;
}

// ── Training results ───────────────────────────────────────────────────────

/**
 * How the training loop stopped: `converged` when no adjacent pair was left,
 * `exhausted` when the merge budget ran out first.
 */
export type TrainingStatus = "converged" | "exhausted";

export interface TrainingArtifacts {
  readonly vocab: Vocabulary;
  readonly merges: readonly MergeRule[];
  readonly status: TrainingStatus;
}

export interface TrainingStats {
  /** Number of distinct symbolized words. */
  readonly entryCount: number;
  readonly mergeCount: number;
  readonly totalFrequency: number;
  /** Frequency-weighted mean sequence length; 0 for an empty vocabulary. */
  readonly avgSymbolsPerWord: number;
}
