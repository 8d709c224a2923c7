#!/usr/bin/env tsx
/**
 * subword CLI — the main entry point.
 *
 * Commands: train-tokenizer, preprocess, convert, list
 */
import { loadEnvFile } from "./env.js";
import { trainTokenizerCmd } from "./commands/train-tokenizer.js";
import { preprocessCmd } from "./commands/preprocess.js";
import { convertCmd } from "./commands/convert.js";
import { listImplementations } from "./resolve.js";

const USAGE = `
subword — BPE subword vocabulary training

Commands:
  train-tokenizer  Learn merge rules from a corpus and save vocab.txt / merges.txt
  preprocess       Count corpus words and save them as a word-frequency file
  convert          Train and print the vocabulary in compact or expanded form
  list             List registered trainers

Options:
  --config=path    JSON config file (flags override it)
  --debug          Shorthand for --logLevel=debug
  --help, -h       Show this help

Examples:
  subword train-tokenizer --config=configs/tokenizer.json
  subword train-tokenizer --inputDir=datasets/raw --numMerges=5000 --lowercase
  subword preprocess --inputDir=datasets/raw --out=artifacts/word_freqs.txt
  subword convert --wordFreqs=artifacts/word_freqs.txt --to=compact --numMerges=200
`.trim();

async function main(): Promise<number> {
  loadEnvFile(".env.local");
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return 0;
  }

  const command = args[0];

  if (command === "train-tokenizer") {
    return trainTokenizerCmd(args.slice(1));
  } else if (command === "preprocess") {
    return preprocessCmd(args.slice(1));
  } else if (command === "convert") {
    return convertCmd(args.slice(1));
  } else if (command === "list") {
    console.log(listImplementations());
    return 0;
  }
  console.error(`Unknown command: ${args.join(" ")}`);
  console.log(USAGE);
  return 1;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Fatal:", err);
    process.exitCode = 1;
  },
);
