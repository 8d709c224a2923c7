/**
 * Conversion between the two end-of-word conventions.
 *
 * expanded (paper):    ("v", "i", "l", "l", "a", "</w>")
 * compact (Sennrich):  ("v", "i", "l", "l", "a</w>")
 *
 * Both directions leave sequences already in the target form, or without a
 * detectable marker, untouched.
 */
import { END_OF_WORD, type Sym, type SymbolSequence, type Vocabulary } from "@subword/core";

export type EndOfWordFormat = "expanded" | "compact";

/** Fold a trailing standalone marker into the symbol before it. */
export function compactSequence(symbols: SymbolSequence, marker: string = END_OF_WORD): SymbolSequence {
  const n = symbols.length;
  if (n < 2 || symbols[n - 1] !== marker) return symbols;
  return [...symbols.slice(0, n - 2), symbols[n - 2] + marker];
}

/** Split a marker suffix off the last symbol into a standalone marker. */
export function expandSequence(symbols: SymbolSequence, marker: string = END_OF_WORD): SymbolSequence {
  const n = symbols.length;
  const last: Sym | undefined = symbols[n - 1];
  if (last === undefined || last.length <= marker.length || !last.endsWith(marker)) return symbols;
  return [...symbols.slice(0, n - 1), last.slice(0, -marker.length), marker];
}

export function toCompact(vocab: Vocabulary, marker: string = END_OF_WORD): Vocabulary {
  return vocab.map((entry) => {
    const symbols = compactSequence(entry.symbols, marker);
    return symbols === entry.symbols ? entry : { symbols, frequency: entry.frequency };
  });
}

export function toExpanded(vocab: Vocabulary, marker: string = END_OF_WORD): Vocabulary {
  return vocab.map((entry) => {
    const symbols = expandSequence(entry.symbols, marker);
    return symbols === entry.symbols ? entry : { symbols, frequency: entry.frequency };
  });
}

export function convertFormat(
  vocab: Vocabulary,
  to: EndOfWordFormat,
  marker: string = END_OF_WORD,
): Vocabulary {
  return to === "compact" ? toCompact(vocab, marker) : toExpanded(vocab, marker);
}

/** The word an entry spells, with every marker removed. */
export function entryWord(symbols: SymbolSequence, marker: string = END_OF_WORD): string {
  return symbols.join("").replaceAll(marker, "");
}
