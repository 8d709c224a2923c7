/**
 * Pair statistics: frequency-weighted adjacent-pair counting and selection
 * of the pair to merge next.
 */
import { Effect } from "effect";
import {
  EmptyInputError,
  pairKey,
  type PairCount,
  type PairCounts,
  type Vocabulary,
} from "@subword/core";

/**
 * Count every adjacent symbol pair, weighted by the frequency of the word it
 * occurs in. Recomputed from scratch on every call.
 *
 * The returned map iterates in first-observation order (vocabulary order,
 * then left to right within a word), which `selectBest` relies on for ties.
 */
export function countPairs(vocab: Vocabulary): PairCounts {
  const counts = new Map<string, PairCount>();
  for (const { symbols, frequency } of vocab) {
    for (let i = 0; i < symbols.length - 1; i++) {
      const left = symbols[i];
      const right = symbols[i + 1];
      const key = pairKey(left, right);
      const prev = counts.get(key);
      counts.set(key, {
        pair: prev ? prev.pair : [left, right],
        count: (prev ? prev.count : 0) + frequency,
      });
    }
  }
  return counts;
}

/**
 * The pair with the highest count. Among equal counts the one observed first
 * wins, so results depend on input order but never on symbol text.
 */
export function selectBest(counts: PairCounts): Effect.Effect<PairCount, EmptyInputError> {
  let best: PairCount | undefined;
  for (const candidate of counts.values()) {
    if (best === undefined || candidate.count > best.count) {
      best = candidate;
    }
  }
  return best === undefined
    ? Effect.fail(new EmptyInputError({ message: "Cannot select a merge from empty pair counts" }))
    : Effect.succeed(best);
}
