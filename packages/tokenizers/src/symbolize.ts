/**
 * Initial symbolization: every word becomes its characters followed by the
 * end-of-word marker.
 */
import {
  END_OF_WORD,
  type Vocabulary,
  type VocabEntry,
  type WordFrequencyTable,
} from "@subword/core";

/**
 * Turn a word-frequency table into a starting vocabulary.
 *
 * Characters are Unicode code points, so a surrogate pair stays one symbol.
 * Entry order follows the table's iteration order.
 */
export function symbolize(words: WordFrequencyTable, marker: string = END_OF_WORD): Vocabulary {
  const vocab: VocabEntry[] = [];
  for (const [word, frequency] of words) {
    vocab.push({ symbols: [...word, marker], frequency });
  }
  return vocab;
}
