/**
 * Persistence helpers for training artifacts.
 *
 * Two line-oriented records per output directory:
 *
 *   vocab.txt   "<word> <frequency>"   one per vocabulary entry, in order
 *   merges.txt  "<left> <right>"       one per merge rule, in learned order
 *
 * Each record is written to a temporary sibling and renamed into place, so a
 * failed write leaves any earlier copy of that record intact.
 */
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { Effect } from "effect";
import {
  ArtifactError,
  END_OF_WORD,
  type MergeRule,
  type SavedArtifacts,
  type TrainingArtifacts,
  type WordFrequencyTable,
} from "@subword/core";
import { entryWord } from "./format.js";

export const VOCAB_FILE = "vocab.txt";
export const MERGES_FILE = "merges.txt";

const DIGITS = /^\d+$/;

export interface LoadedArtifacts {
  readonly words: WordFrequencyTable;
  readonly merges: readonly MergeRule[];
}

/** Lines of the vocabulary record. */
export function vocabLines(artifacts: TrainingArtifacts, marker: string = END_OF_WORD): string[] {
  return artifacts.vocab.map((e) => `${entryWord(e.symbols, marker)} ${e.frequency}`);
}

/** Lines of the merge record. */
export function mergeLines(artifacts: TrainingArtifacts): string[] {
  return artifacts.merges.map((m) => `${m.left} ${m.right}`);
}

/**
 * Write `vocab.txt` and `merges.txt` under `outputDir`, creating it if needed.
 */
export function saveArtifacts(
  outputDir: string,
  artifacts: TrainingArtifacts,
  marker: string = END_OF_WORD,
): Effect.Effect<SavedArtifacts, ArtifactError> {
  const vocabPath = join(outputDir, VOCAB_FILE);
  const mergesPath = join(outputDir, MERGES_FILE);
  return Effect.gen(function* () {
    yield* Effect.tryPromise({
      try: () => mkdir(outputDir, { recursive: true }),
      catch: (cause) =>
        new ArtifactError({ message: `Failed to create output directory "${outputDir}"`, path: outputDir, cause }),
    });
    yield* writeRecord(vocabPath, vocabLines(artifacts, marker));
    yield* writeRecord(mergesPath, mergeLines(artifacts));
    yield* Effect.logInfo(`Saved vocab to: ${vocabPath}`);
    yield* Effect.logInfo(`Saved merges to: ${mergesPath}`);
    return { vocabPath, mergesPath };
  });
}

/**
 * Read back the records written by `saveArtifacts`.
 */
export function loadArtifacts(outputDir: string): Effect.Effect<LoadedArtifacts, ArtifactError> {
  const vocabPath = join(outputDir, VOCAB_FILE);
  const mergesPath = join(outputDir, MERGES_FILE);
  return Effect.gen(function* () {
    const vocabText = yield* readRecord(vocabPath);
    const mergesText = yield* readRecord(mergesPath);
    const words = yield* parseVocabRecord(vocabText, vocabPath);
    const merges = yield* parseMergeRecord(mergesText, mergesPath);
    return { words, merges };
  });
}

/**
 * Parse `"<word> <frequency>"` lines. The word is everything before the last
 * space and may not be empty; the frequency is a plain decimal integer.
 */
export function parseVocabRecord(
  text: string,
  path: string,
): Effect.Effect<WordFrequencyTable, ArtifactError> {
  return Effect.try({
    try: () => {
      const words = new Map<string, number>();
      recordLines(text).forEach((line, i) => {
        const sep = line.lastIndexOf(" ");
        const field = line.slice(sep + 1);
        if (sep <= 0 || !DIGITS.test(field)) {
          throw malformed(path, i, line, "expected \"<word> <frequency>\"");
        }
        const frequency = Number(field);
        const word = line.slice(0, sep);
        if (words.has(word)) {
          throw malformed(path, i, line, `duplicate word "${word}"`);
        }
        words.set(word, frequency);
      });
      return words;
    },
    catch: (cause) => asArtifactError(cause, path),
  });
}

/** Parse `"<left> <right>"` lines; rank is the line's position. */
export function parseMergeRecord(
  text: string,
  path: string,
): Effect.Effect<MergeRule[], ArtifactError> {
  return Effect.try({
    try: () =>
      recordLines(text).map((line, i): MergeRule => {
        const parts = line.split(" ");
        if (parts.length !== 2 || parts[0] === "" || parts[1] === "") {
          throw malformed(path, i, line, "expected \"<left> <right>\"");
        }
        return { rank: i, left: parts[0], right: parts[1] };
      }),
    catch: (cause) => asArtifactError(cause, path),
  });
}

/**
 * Write a word-frequency table in the vocabulary record format, so the file
 * `preprocess` produces can be fed back into training.
 */
export function saveWordFrequencies(
  path: string,
  words: WordFrequencyTable,
): Effect.Effect<void, ArtifactError> {
  const lines = [...words].map(([word, count]) => `${word} ${count}`);
  return Effect.tryPromise({
    try: () => mkdir(dirname(path), { recursive: true }),
    catch: (cause) =>
      new ArtifactError({ message: `Failed to create directory for "${path}"`, path, cause }),
  }).pipe(Effect.zipRight(writeRecord(path, lines)));
}

export function loadWordFrequencies(path: string): Effect.Effect<WordFrequencyTable, ArtifactError> {
  return readRecord(path).pipe(Effect.flatMap((text) => parseVocabRecord(text, path)));
}

// ── Internal helpers ─────────────────────────────────────────────────────

function writeRecord(path: string, lines: readonly string[]): Effect.Effect<void, ArtifactError> {
  const tmp = `${path}.tmp`;
  const body = lines.length > 0 ? `${lines.join("\n")}\n` : "";
  return Effect.tryPromise({
    try: async () => {
      await writeFile(tmp, body, "utf-8");
      await rename(tmp, path);
    },
    catch: (cause) => new ArtifactError({ message: `Failed to write "${path}"`, path, cause }),
  }).pipe(
    Effect.tapError(() =>
      Effect.tryPromise(() => rm(tmp, { force: true })).pipe(Effect.ignoreLogged),
    ),
  );
}

function readRecord(path: string): Effect.Effect<string, ArtifactError> {
  return Effect.tryPromise({
    try: () => readFile(path, "utf-8"),
    catch: (cause) => new ArtifactError({ message: `Failed to read "${path}"`, path, cause }),
  });
}

function recordLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

function malformed(path: string, index: number, line: string, hint: string): ArtifactError {
  return new ArtifactError({
    message: `Malformed line ${index + 1} in "${path}": ${JSON.stringify(line)} (${hint})`,
    path,
  });
}

function asArtifactError(cause: unknown, path: string): ArtifactError {
  return cause instanceof ArtifactError
    ? cause
    : new ArtifactError({ message: `Failed to parse "${path}"`, path, cause });
}
