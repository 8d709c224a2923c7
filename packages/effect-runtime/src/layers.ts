/**
 * Effect layers for dependency injection.
 *
 * Each service gets a Layer that provides it from an already-built value.
 */
import { Layer } from "effect";
import {
  ConfigService,
  TrainerService,
  type TokenizerConfig,
  type Trainer,
} from "@subword/core";
import { loggingLayer, parseLogLevel } from "./logging.js";

// ── Trainer Layer ──────────────────────────────────────────────────────────

export const TrainerFrom = (trainer: Trainer) =>
  Layer.succeed(TrainerService, trainer);

// ── Config Layer ───────────────────────────────────────────────────────────

export const ConfigFrom = (config: TokenizerConfig) =>
  Layer.succeed(ConfigService, config);

// ── Runtime Layer ──────────────────────────────────────────────────────────

/** Config service plus logging at the configured level. */
export const RuntimeFrom = (config: TokenizerConfig) =>
  Layer.merge(ConfigFrom(config), loggingLayer(parseLogLevel(config.logLevel)));
