/**
 * Config fingerprinting for reproducibility tracking.
 * FNV-1a over the training-relevant keys.
 */
import type { TokenizerConfig } from "./config.js";

/** Keys that change what a run learns; paths and log settings do not. */
const TRAINING_KEYS = ["trainer", "numMerges", "lowercase", "loadMode", "chunkSize"] as const;

export function hashConfig(config: TokenizerConfig): string {
  const picked: Record<string, unknown> = {};
  for (const key of TRAINING_KEYS) picked[key] = config[key];
  const json = JSON.stringify(picked);
  let hash = 0x811c9dc5;
  for (let i = 0; i < json.length; i++) {
    hash ^= json.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}
