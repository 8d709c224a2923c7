/**
 * Command: subword convert
 *
 * Trains on a saved word-frequency table and prints the final symbolized
 * vocabulary in the requested end-of-word convention, one entry per line:
 * space-separated symbols, a tab, then the frequency.
 */
import { Effect } from "effect";
import { ConfigError, ConfigService } from "@subword/core";
import { convertFormat, loadWordFrequencies, type EndOfWordFormat } from "@subword/tokenizers";
import { parseKV, requireArg, strArg } from "../parse.js";
import { resolveTrainer } from "../resolve.js";
import { runCommand } from "../run.js";

const FORMATS: readonly EndOfWordFormat[] = ["compact", "expanded"];

function parseFormat(value: string): Effect.Effect<EndOfWordFormat, ConfigError> {
  const match = FORMATS.find((f) => f === value);
  return match === undefined
    ? Effect.fail(new ConfigError({ message: `--to must be one of ${FORMATS.join(", ")}, got "${value}"` }))
    : Effect.succeed(match);
}

export async function convertCmd(args: string[]): Promise<number> {
  const kv = parseKV(args);
  return runCommand(
    kv,
    Effect.gen(function* () {
      const path = yield* requireArg(kv, "wordFreqs", "word-frequency file");
      const format = yield* parseFormat(strArg(kv, "to", "compact"));
      const config = yield* ConfigService;
      const trainer = yield* resolveTrainer(config);
      const words = yield* loadWordFrequencies(path);
      const artifacts = yield* trainer.fit(words);
      for (const entry of convertFormat(artifacts.vocab, format)) {
        console.log(`${entry.symbols.join(" ")}\t${entry.frequency}`);
      }
    }),
  );
}
