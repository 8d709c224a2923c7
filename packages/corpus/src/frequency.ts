/**
 * Word-frequency table construction from a directory of `.txt` files.
 */
import { readdir } from "node:fs/promises";
import { join } from "node:path";
import { Effect, Stream } from "effect";
import {
  CorpusError,
  UnsupportedModeError,
  type WordFrequencyTable,
} from "@subword/core";
import { DEFAULT_CHUNK_SIZE, loadText, parseLoadMode } from "./loader.js";
import { countWordsInto } from "./words.js";

export interface WordFrequencyOptions {
  /** `line` (default) or `chunk`. */
  readonly mode?: string;
  readonly lowercase?: boolean;
  readonly chunkSize?: number;
}

/** The `.txt` files of a directory, sorted by name. */
export function listTextFiles(inputDir: string): Effect.Effect<string[], CorpusError> {
  return Effect.tryPromise({
    try: () => readdir(inputDir, { withFileTypes: true }),
    catch: (cause) =>
      new CorpusError({ message: `Cannot list corpus directory "${inputDir}"`, path: inputDir, cause }),
  }).pipe(
    Effect.map((entries) =>
      entries
        .filter((e) => e.isFile() && e.name.endsWith(".txt"))
        .map((e) => e.name)
        .sort()
        .map((name) => join(inputDir, name)),
    ),
  );
}

/**
 * Count alphabetic words across every `.txt` file in `inputDir`.
 *
 * Files are read in name order and words keep their first-seen order, so
 * the same corpus always yields the same table iteration order.
 */
export function buildWordFrequencies(
  inputDir: string,
  options: WordFrequencyOptions = {},
): Effect.Effect<WordFrequencyTable, CorpusError | UnsupportedModeError> {
  const lowercase = options.lowercase ?? false;
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  return Effect.gen(function* () {
    const mode = yield* parseLoadMode(options.mode ?? "line");
    yield* Effect.logInfo(`Scanning directory: ${inputDir}`);
    const files = yield* listTextFiles(inputDir);
    if (files.length === 0) {
      yield* Effect.logWarning(`No .txt files found in ${inputDir}`);
    }

    const counts = new Map<string, number>();
    for (const file of files) {
      yield* Effect.logDebug(`Processing file: ${file}`);
      yield* loadText(file, mode, chunkSize).pipe(
        Stream.runForEach((text) => Effect.sync(() => countWordsInto(counts, text, lowercase))),
      );
    }

    yield* Effect.logInfo(`Word frequency dictionary built with ${counts.size} unique words`);
    return counts;
  }).pipe(Effect.withSpan("corpus.buildWordFrequencies"));
}
