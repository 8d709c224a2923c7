/**
 * Text loading strategies.
 *
 * `line` yields trimmed lines and suits word-level preprocessing; `chunk`
 * yields fixed-size blocks of raw text for very large files, at the cost of
 * splitting words that straddle a block boundary.
 */
import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import * as readline from "node:readline";
import { Effect, Stream } from "effect";
import { CorpusError, LOAD_MODES, UnsupportedModeError, type LoadMode } from "@subword/core";

export const DEFAULT_CHUNK_SIZE = 8192;

/** Accept only a known loading mode; anything else fails, never a default. */
export function parseLoadMode(mode: string): Effect.Effect<LoadMode, UnsupportedModeError> {
  const match = LOAD_MODES.find((m) => m === mode);
  return match === undefined
    ? Effect.fail(
        new UnsupportedModeError({
          message: `Unsupported mode: ${mode}. Use ${LOAD_MODES.map((m) => `'${m}'`).join(" or ")}.`,
          mode,
        }),
      )
    : Effect.succeed(match);
}

/**
 * Stream the contents of a text file.
 *
 * @param mode - `line` or `chunk`.
 * @param chunkSize - Bytes read per chunk in `chunk` mode. A multi-byte
 *   character is never split between chunks.
 */
export function loadText(
  path: string,
  mode: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE,
): Stream.Stream<string, CorpusError | UnsupportedModeError> {
  return Stream.unwrap(
    Effect.gen(function* () {
      const loadMode = yield* parseLoadMode(mode);
      yield* ensureFile(path);
      yield* Effect.logInfo(`Loading file: ${path} (mode: ${loadMode})`);
      if (loadMode === "line") return readLines(path);
      yield* Effect.logWarning(
        "Chunk mode may split words across chunk boundaries. Not recommended for word-level preprocessing.",
      );
      return readChunks(path, chunkSize);
    }),
  );
}

function ensureFile(path: string): Effect.Effect<void, CorpusError> {
  return Effect.tryPromise({
    try: () => stat(path),
    catch: (cause) => new CorpusError({ message: `Cannot read "${path}"`, path, cause }),
  }).pipe(
    Effect.flatMap((info) =>
      info.isFile()
        ? Effect.void
        : Effect.fail(new CorpusError({ message: `Not a file: "${path}"`, path })),
    ),
  );
}

function readLines(path: string): Stream.Stream<string, CorpusError> {
  return Stream.suspend(() => {
    const rl = readline.createInterface({
      input: createReadStream(path, { encoding: "utf-8" }),
      crlfDelay: Infinity,
    });
    return Stream.fromAsyncIterable(
      rl,
      (cause) => new CorpusError({ message: `Failed while reading "${path}"`, path, cause }),
    ).pipe(
      Stream.map((line) => line.trim()),
      Stream.ensuring(Effect.sync(() => rl.close())),
    );
  });
}

function readChunks(path: string, chunkSize: number): Stream.Stream<string, CorpusError> {
  return Stream.suspend(() =>
    Stream.fromAsyncIterable(
      createReadStream(path, { encoding: "utf-8", highWaterMark: chunkSize }),
      (cause) => new CorpusError({ message: `Failed while reading "${path}"`, path, cause }),
    ).pipe(Stream.map((chunk: unknown) => (typeof chunk === "string" ? chunk : String(chunk)))),
  );
}
