import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import type { Vocabulary } from "@subword/core";
import {
  compactSequence,
  convertFormat,
  entryWord,
  expandSequence,
  symbolize,
  toCompact,
  toExpanded,
  trainBpe,
} from "@subword/tokenizers";

describe("toCompact / toExpanded", () => {
  const expanded: Vocabulary = [
    { symbols: ["v", "i", "l", "l", "a", "</w>"], frequency: 3 },
    { symbols: ["lo", "w", "</w>"], frequency: 1 },
  ];

  it("folds the marker into the last symbol", () => {
    expect(toCompact(expanded)).toEqual([
      { symbols: ["v", "i", "l", "l", "a</w>"], frequency: 3 },
      { symbols: ["lo", "w</w>"], frequency: 1 },
    ]);
  });

  it("splits the marker back out", () => {
    expect(toExpanded(toCompact(expanded))).toEqual(expanded);
  });

  it("round-trips symbolizer output", () => {
    const vocab = symbolize(new Map([["low", 5], ["a", 1], ["", 2]]));
    expect(toExpanded(toCompact(vocab))).toEqual(vocab);
  });

  it("is idempotent on already-converted input", () => {
    const compact = toCompact(expanded);
    expect(toCompact(compact)).toEqual(compact);
    expect(toExpanded(expanded)).toEqual(expanded);
  });

  it("passes sequences without a marker through", () => {
    const plain: Vocabulary = [{ symbols: ["a", "b"], frequency: 1 }];
    expect(toCompact(plain)).toEqual(plain);
    expect(toExpanded(plain)).toEqual(plain);
  });

  it("leaves a lone marker alone", () => {
    expect(compactSequence(["</w>"])).toEqual(["</w>"]);
    expect(expandSequence(["</w>"])).toEqual(["</w>"]);
  });

  it("expands a trained word-final symbol", async () => {
    const trained = await Effect.runPromise(trainBpe(new Map([["ab", 1]]), { numMerges: 10 }));
    expect(convertFormat(trained.vocab, "expanded")).toEqual([
      { symbols: ["ab", "</w>"], frequency: 1 },
    ]);
  });

  it("honours a custom marker", () => {
    expect(compactSequence(["a", "<eow>"], "<eow>")).toEqual(["a<eow>"]);
    expect(expandSequence(["a<eow>"], "<eow>")).toEqual(["a", "<eow>"]);
  });
});

describe("entryWord", () => {
  it("strips the marker from joined symbols", () => {
    expect(entryWord(["n", "e", "w", "est</w>"])).toBe("newest");
    expect(entryWord(["lo", "w", "</w>"])).toBe("low");
  });
});
