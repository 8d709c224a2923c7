/**
 * Command: subword preprocess
 *
 * Counts the words of every .txt file in the corpus directory and writes the
 * table as "<word> <count>" lines, ready for `train-tokenizer --wordFreqs`.
 */
import { parseKV } from "../parse.js";
import { preprocess } from "../pipeline.js";
import { runCommand } from "../run.js";

export async function preprocessCmd(args: string[]): Promise<number> {
  const kv = parseKV(args);
  return runCommand(kv, preprocess(kv["out"]));
}
