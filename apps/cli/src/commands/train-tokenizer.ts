/**
 * Command: subword train-tokenizer
 *
 * Usage:
 *   subword train-tokenizer --config=configs/tokenizer.json
 *   subword train-tokenizer --inputDir=datasets/raw --numMerges=5000 --lowercase
 *   subword train-tokenizer --wordFreqs=artifacts/data/vocabulary/word_freqs.txt
 */
import { Effect } from "effect";
import { ConfigService } from "@subword/core";
import { TrainerFrom } from "@subword/effect-runtime";
import { parseKV } from "../parse.js";
import { resolveTrainer } from "../resolve.js";
import { trainTokenizer, type WordSource } from "../pipeline.js";
import { runCommand } from "../run.js";

export async function trainTokenizerCmd(args: string[]): Promise<number> {
  const kv = parseKV(args);
  const source: WordSource = kv["wordFreqs"]
    ? { kind: "file", path: kv["wordFreqs"] }
    : { kind: "corpus" };

  return runCommand(
    kv,
    Effect.gen(function* () {
      const config = yield* ConfigService;
      const trainer = yield* resolveTrainer(config);
      const { artifacts, saved } = yield* trainTokenizer(source).pipe(
        Effect.provide(TrainerFrom(trainer)),
      );
      yield* Effect.logInfo(
        `Tokenizer trained: ${artifacts.merges.length} merges (${artifacts.status}) -> ${saved.mergesPath}`,
      );
    }),
  );
}
