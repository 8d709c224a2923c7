/**
 * Training statistics.
 */
import type { TrainingArtifacts, TrainingStats, Vocabulary } from "@subword/core";

/** Σ frequency; equal to the input table's total at every merge step. */
export function totalFrequency(vocab: Vocabulary): number {
  let total = 0;
  for (const entry of vocab) total += entry.frequency;
  return total;
}

/** Σ sequence length × frequency: corpus length measured in symbols. */
export function weightedSymbolCount(vocab: Vocabulary): number {
  let total = 0;
  for (const entry of vocab) total += entry.symbols.length * entry.frequency;
  return total;
}

export function summarize(artifacts: TrainingArtifacts): TrainingStats {
  const total = totalFrequency(artifacts.vocab);
  return {
    entryCount: artifacts.vocab.length,
    mergeCount: artifacts.merges.length,
    totalFrequency: total,
    avgSymbolsPerWord: total === 0 ? 0 : weightedSymbolCount(artifacts.vocab) / total,
  };
}
