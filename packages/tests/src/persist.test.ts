import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile, mkdir, readdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Effect } from "effect";
import {
  BpeTrainer,
  loadArtifacts,
  loadWordFrequencies,
  parseMergeRecord,
  parseVocabRecord,
  saveArtifacts,
  saveWordFrequencies,
  trainBpe,
} from "@subword/tokenizers";

const canonical = new Map([
  ["low", 5],
  ["lower", 2],
  ["newest", 6],
  ["widest", 3],
]);

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "subword-persist-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("saveArtifacts", () => {
  it("writes vocab.txt and merges.txt", async () => {
    const artifacts = await Effect.runPromise(trainBpe(canonical, { numMerges: 5 }));
    const out = join(dir, "nested", "vocabulary");
    const saved = await Effect.runPromise(saveArtifacts(out, artifacts));

    expect(saved).toEqual({ vocabPath: join(out, "vocab.txt"), mergesPath: join(out, "merges.txt") });
    expect(await readFile(saved.vocabPath, "utf-8")).toBe("low 5\nlower 2\nnewest 6\nwidest 3\n");
    expect(await readFile(saved.mergesPath, "utf-8")).toBe("e s\nes t\nest </w>\nl o\nlo w\n");
    expect((await readdir(out)).sort()).toEqual(["merges.txt", "vocab.txt"]);
  });

  it("writes empty records for an empty run", async () => {
    const artifacts = await Effect.runPromise(trainBpe(new Map(), { numMerges: 3 }));
    const saved = await Effect.runPromise(saveArtifacts(dir, artifacts));
    expect(await readFile(saved.vocabPath, "utf-8")).toBe("");
    expect(await readFile(saved.mergesPath, "utf-8")).toBe("");
  });

  it("fails with ArtifactError when the directory cannot be created", async () => {
    const blocker = join(dir, "file");
    await writeFile(blocker, "x");
    const artifacts = await Effect.runPromise(trainBpe(canonical, { numMerges: 1 }));
    const error = await Effect.runPromise(Effect.flip(saveArtifacts(join(blocker, "out"), artifacts)));
    expect(error._tag).toBe("ArtifactError");
    expect(error.path).toBe(join(blocker, "out"));
  });

  it("keeps the earlier vocab record when its rewrite fails", async () => {
    const artifacts = await Effect.runPromise(trainBpe(canonical, { numMerges: 2 }));
    await Effect.runPromise(saveArtifacts(dir, artifacts));
    // a directory in the way of the temporary file makes the next write fail
    await mkdir(join(dir, "vocab.txt.tmp"));
    const error = await Effect.runPromise(Effect.flip(saveArtifacts(dir, artifacts)));
    expect(error._tag).toBe("ArtifactError");
    expect(await readFile(join(dir, "vocab.txt"), "utf-8")).toBe("low 5\nlower 2\nnewest 6\nwidest 3\n");
  });

  it("saves through the trainer after fit", async () => {
    const trainer = new BpeTrainer({ numMerges: 3 });
    await Effect.runPromise(trainer.fit(canonical));
    const saved = await Effect.runPromise(trainer.saveArtifacts(dir));
    expect(await readFile(saved.mergesPath, "utf-8")).toBe("e s\nes t\nest </w>\n");
  });
});

describe("loadArtifacts", () => {
  it("reads back what was saved", async () => {
    const artifacts = await Effect.runPromise(trainBpe(canonical, { numMerges: 5 }));
    await Effect.runPromise(saveArtifacts(dir, artifacts));
    const loaded = await Effect.runPromise(loadArtifacts(dir));
    expect([...loaded.words]).toEqual([...canonical]);
    expect(loaded.merges).toEqual(artifacts.merges);
  });

  it("fails when a record is missing", async () => {
    const error = await Effect.runPromise(Effect.flip(loadArtifacts(dir)));
    expect(error._tag).toBe("ArtifactError");
    expect(error.path).toBe(join(dir, "vocab.txt"));
  });
});

describe("record parsing", () => {
  it("rejects a vocab line without a frequency", async () => {
    const error = await Effect.runPromise(Effect.flip(parseVocabRecord("low 5\nlower\n", "vocab.txt")));
    expect(error.message).toBe(
      'Malformed line 2 in "vocab.txt": "lower" (expected "<word> <frequency>")',
    );
  });

  it("rejects a trailing space after the frequency", async () => {
    const error = await Effect.runPromise(Effect.flip(parseVocabRecord("low 5 \n", "vocab.txt")));
    expect(error.message).toBe(
      'Malformed line 1 in "vocab.txt": "low 5 " (expected "<word> <frequency>")',
    );
  });

  it("rejects an empty frequency field", async () => {
    const error = await Effect.runPromise(Effect.flip(parseVocabRecord("low 5\nlower \n", "vocab.txt")));
    expect(error.message).toBe(
      'Malformed line 2 in "vocab.txt": "lower " (expected "<word> <frequency>")',
    );
  });

  it("rejects a non-decimal frequency", async () => {
    const error = await Effect.runPromise(Effect.flip(parseVocabRecord("newest 0x10\n", "vocab.txt")));
    expect(error.message).toBe(
      'Malformed line 1 in "vocab.txt": "newest 0x10" (expected "<word> <frequency>")',
    );
  });

  it("rejects an empty word", async () => {
    const error = await Effect.runPromise(Effect.flip(parseVocabRecord(" 3\n", "vocab.txt")));
    expect(error._tag).toBe("ArtifactError");
    expect(error.message).toBe('Malformed line 1 in "vocab.txt": " 3" (expected "<word> <frequency>")');
  });

  it("rejects duplicate words", async () => {
    const error = await Effect.runPromise(Effect.flip(parseVocabRecord("a 1\na 2\n", "vocab.txt")));
    expect(error.message).toBe('Malformed line 2 in "vocab.txt": "a 2" (duplicate word "a")');
  });

  it("rejects a merge line with three fields", async () => {
    const error = await Effect.runPromise(Effect.flip(parseMergeRecord("a b c\n", "merges.txt")));
    expect(error.message).toBe(
      'Malformed line 1 in "merges.txt": "a b c" (expected "<left> <right>")',
    );
  });

  it("accepts CRLF line endings", async () => {
    const merges = await Effect.runPromise(parseMergeRecord("a b\r\nab c\r\n", "merges.txt"));
    expect(merges).toEqual([
      { rank: 0, left: "a", right: "b" },
      { rank: 1, left: "ab", right: "c" },
    ]);
  });
});

describe("word-frequency files", () => {
  it("round-trips a table in order", async () => {
    const path = join(dir, "freqs", "word_freqs.txt");
    await Effect.runPromise(saveWordFrequencies(path, canonical));
    expect(await readFile(path, "utf-8")).toBe("low 5\nlower 2\nnewest 6\nwidest 3\n");
    const loaded = await Effect.runPromise(loadWordFrequencies(path));
    expect([...loaded]).toEqual([...canonical]);
  });
});
