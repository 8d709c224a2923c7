/**
 * Resolve pluggable implementations from configuration.
 */
import type { Effect } from "effect";
import type { ConfigError, TokenizerConfig, Trainer } from "@subword/core";
import { trainerRegistry } from "@subword/tokenizers";

export function resolveTrainer(config: TokenizerConfig): Effect.Effect<Trainer, ConfigError> {
  return trainerRegistry.get(config.trainer, {
    numMerges: config.numMerges,
    logInterval: config.logInterval,
  });
}

export function listImplementations(): string {
  return `Trainers: ${trainerRegistry.list().join(", ")}`;
}
