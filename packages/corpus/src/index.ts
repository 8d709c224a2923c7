/**
 * @subword/corpus -- turns raw text files into a word-frequency table.
 */
export { loadText, parseLoadMode, DEFAULT_CHUNK_SIZE } from "./loader.js";
export { splitWords, countWords, countWordsInto } from "./words.js";
export { buildWordFrequencies, listTextFiles } from "./frequency.js";
export type { WordFrequencyOptions } from "./frequency.js";
