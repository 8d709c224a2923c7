/**
 * Word extraction with `Intl.Segmenter`.
 */

// Cached segmenter instance (reusable across calls)
const segmenter = new Intl.Segmenter("en", { granularity: "word" });

const ALPHABETIC = /^\p{L}+$/u;

/** A stem followed by an English clitic: `John's`, `doesn't`, `I'm`, `we’ll`. */
const CLITIC = /^(\p{L}+?)(?:n['’]t|['’](?:s|m|d|re|ll|ve))$/iu;

/** The alphabetic word a segment contributes, if any. */
function wordOf(segment: string): string | undefined {
  if (ALPHABETIC.test(segment)) return segment;
  const match = CLITIC.exec(segment);
  return match ? match[1] : undefined;
}

/**
 * Split a line into purely alphabetic words. Clitics are cut off their stem
 * (`doesn't` gives `does`); numbers, punctuation and other mixed tokens
 * (`mp3`, `o'clock`) are dropped.
 */
export function splitWords(line: string, lowercase = false): string[] {
  const words: string[] = [];
  for (const segment of segmenter.segment(line)) {
    if (!segment.isWordLike) continue;
    const word = wordOf(segment.segment);
    if (word === undefined) continue;
    words.push(lowercase ? word.toLowerCase() : word);
  }
  return words;
}

/** Add every word of `text` to `counts`, keeping first-seen order. */
export function countWordsInto(counts: Map<string, number>, text: string, lowercase = false): void {
  for (const word of splitWords(text, lowercase)) {
    counts.set(word, (counts.get(word) ?? 0) + 1);
  }
}

/** Word-frequency table of a sequence of texts. */
export function countWords(texts: Iterable<string>, lowercase = false): Map<string, number> {
  const counts = new Map<string, number>();
  for (const text of texts) countWordsInto(counts, text, lowercase);
  return counts;
}
