import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Chunk, Effect, Stream } from "effect";
import {
  buildWordFrequencies,
  countWords,
  listTextFiles,
  loadText,
  splitWords,
} from "@subword/corpus";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "subword-corpus-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

function collect(path: string, mode: string, chunkSize?: number): Promise<string[]> {
  return Effect.runPromise(
    Stream.runCollect(loadText(path, mode, chunkSize)).pipe(Effect.map(Chunk.toArray)),
  );
}

describe("splitWords", () => {
  it("keeps only alphabetic words", () => {
    expect(splitWords("The cat sat on 3 mats.")).toEqual(["The", "cat", "sat", "on", "mats"]);
  });

  it("lower-cases on request", () => {
    expect(splitWords("Hello World", true)).toEqual(["hello", "world"]);
  });

  it("accepts letters outside ASCII", () => {
    expect(splitWords("Crème brûlée")).toEqual(["Crème", "brûlée"]);
  });

  it("keeps the stem of possessives and contractions", () => {
    expect(splitWords("John's dog doesn't bark, it's late and I'm tired")).toEqual([
      "John", "dog", "does", "bark", "it", "late", "and", "I", "tired",
    ]);
  });

  it("accepts the typographic apostrophe", () => {
    expect(splitWords("We’ll see", true)).toEqual(["we", "see"]);
  });

  it("drops other mixed tokens", () => {
    expect(splitWords("mp3 at five o'clock")).toEqual(["at", "five"]);
  });

  it("returns nothing for punctuation only", () => {
    expect(splitWords("... !!! --")).toEqual([]);
  });
});

describe("countWords", () => {
  it("counts in first-seen order", () => {
    const counts = countWords(["b a b", "c a b"]);
    expect([...counts]).toEqual([
      ["b", 3],
      ["a", 2],
      ["c", 1],
    ]);
  });
});

describe("loadText", () => {
  it("yields trimmed lines", async () => {
    const path = join(dir, "a.txt");
    await writeFile(path, "  hello  \nworld\n");
    expect(await collect(path, "line")).toEqual(["hello", "world"]);
  });

  it("yields fixed-size chunks", async () => {
    const path = join(dir, "a.txt");
    await writeFile(path, "abcdefghij");
    expect(await collect(path, "chunk", 4)).toEqual(["abcd", "efgh", "ij"]);
  });

  it("counts chunk size in bytes without splitting characters", async () => {
    const path = join(dir, "a.txt");
    await writeFile(path, "ééé");
    expect(await collect(path, "chunk", 4)).toEqual(["éé", "é"]);
  });

  it("fails fast on an unsupported mode", async () => {
    const path = join(dir, "a.txt");
    await writeFile(path, "x");
    const error = await Effect.runPromise(
      Effect.flip(Stream.runCollect(loadText(path, "paragraph"))),
    );
    expect(error._tag).toBe("UnsupportedModeError");
    expect(error.message).toBe("Unsupported mode: paragraph. Use 'line' or 'chunk'.");
  });

  it("fails with CorpusError for a missing file", async () => {
    const error = await Effect.runPromise(
      Effect.flip(Stream.runCollect(loadText(join(dir, "missing.txt"), "line"))),
    );
    expect(error._tag).toBe("CorpusError");
  });
});

describe("buildWordFrequencies", () => {
  beforeEach(async () => {
    await writeFile(join(dir, "a.txt"), "The cat sat.\nThe dog 42 ran!\n");
    await writeFile(join(dir, "b.txt"), "cat CAT\n");
    await writeFile(join(dir, "notes.md"), "ignored words here\n");
  });

  it("lists only .txt files, sorted", async () => {
    const files = await Effect.runPromise(listTextFiles(dir));
    expect(files).toEqual([join(dir, "a.txt"), join(dir, "b.txt")]);
  });

  it("counts words across files", async () => {
    const table = await Effect.runPromise(buildWordFrequencies(dir));
    expect([...table]).toEqual([
      ["The", 2],
      ["cat", 2],
      ["sat", 1],
      ["dog", 1],
      ["ran", 1],
      ["CAT", 1],
    ]);
  });

  it("merges case variants when lower-casing", async () => {
    const table = await Effect.runPromise(buildWordFrequencies(dir, { lowercase: true }));
    expect([...table]).toEqual([
      ["the", 2],
      ["cat", 3],
      ["sat", 1],
      ["dog", 1],
      ["ran", 1],
    ]);
  });

  it("rejects an unknown mode before reading anything", async () => {
    const error = await Effect.runPromise(
      Effect.flip(buildWordFrequencies(join(dir, "nowhere"), { mode: "bogus" })),
    );
    expect(error._tag).toBe("UnsupportedModeError");
  });

  it("fails with CorpusError for a missing directory", async () => {
    const error = await Effect.runPromise(Effect.flip(buildWordFrequencies(join(dir, "nowhere"))));
    expect(error._tag).toBe("CorpusError");
  });
});
