/**
 * Merge application.
 */
import type { Pair, Sym, SymbolSequence, Vocabulary, VocabEntry } from "@subword/core";

/**
 * Replace every adjacent `(left, right)` in `symbols` with `left + right`.
 *
 * The scan works on whole symbols, left to right: a match consumes both
 * symbols and scanning resumes after them, so occurrences never overlap
 * (`a a a` with `(a, a)` gives `aa a`). Returns the input array itself when
 * nothing matched.
 */
export function mergeSequence(symbols: SymbolSequence, [left, right]: Pair): SymbolSequence {
  let out: Sym[] | null = null;
  let i = 0;
  while (i < symbols.length) {
    if (i < symbols.length - 1 && symbols[i] === left && symbols[i + 1] === right) {
      out ??= symbols.slice(0, i);
      out.push(left + right);
      i += 2;
    } else {
      out?.push(symbols[i]);
      i += 1;
    }
  }
  return out ?? symbols;
}

/**
 * Apply one merge to every entry and return a new vocabulary.
 *
 * Entries without an occurrence are carried over as they are; the input
 * vocabulary is never mutated.
 */
export function applyMerge(pair: Pair, vocab: Vocabulary): Vocabulary {
  return vocab.map((entry): VocabEntry => {
    const symbols = mergeSequence(entry.symbols, pair);
    return symbols === entry.symbols ? entry : { symbols, frequency: entry.frequency };
  });
}
