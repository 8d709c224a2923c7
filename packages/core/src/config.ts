/**
 * TokenizerConfig type, defaults, and loading.
 *
 * A config value is built once per run and handed to whoever needs it;
 * nothing here keeps process-wide state.
 *
 * Precedence, lowest first: defaults, JSON config file, environment,
 * explicit overrides (CLI flags).
 */
import { readFile } from "node:fs/promises";
import { isAbsolute, resolve } from "node:path";
import { Effect } from "effect";
import { ConfigError } from "./errors.js";

export type LoadMode = "line" | "chunk";
export type LogLevelName = "debug" | "info" | "warn" | "error";

export const LOAD_MODES: readonly LoadMode[] = ["line", "chunk"];
export const LOG_LEVELS: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

export interface TokenizerConfig {
  /** Trainer registry name. */
  readonly trainer: string;
  /** Merge budget. */
  readonly numMerges: number;
  /** Lower-case words while extracting them from the corpus. */
  readonly lowercase: boolean;
  /** Root that a relative `outputDir` is resolved against. */
  readonly baseDir: string;
  /** Directory of `.txt` corpus files. */
  readonly inputDir: string;
  /** Where `vocab.txt` and `merges.txt` are written. */
  readonly outputDir: string;
  readonly loadMode: LoadMode;
  /** Bytes read per chunk in `chunk` mode. */
  readonly chunkSize: number;
  readonly logLevel: LogLevelName;
  /** Merges between progress log lines. */
  readonly logInterval: number;
}

export const defaultTokenizerConfig: TokenizerConfig = {
  trainer: "bpe",
  numMerges: 10_000,
  lowercase: false,
  baseDir: "artifacts",
  inputDir: "datasets/raw",
  outputDir: "data/vocabulary",
  loadMode: "line",
  chunkSize: 8192,
  logLevel: "info",
  logInterval: 100,
};

/** Environment variables consulted, and the key each one sets. */
const ENV_KEYS = {
  BASE_DIR: "baseDir",
  TOKENIZER_OUTPUT_DIR: "outputDir",
  LOG_LEVEL: "logLevel",
} as const satisfies Record<string, keyof TokenizerConfig>;

export interface LoadConfigOptions {
  /** JSON config file. A path that cannot be read is an error. */
  readonly path?: string;
  readonly env?: Readonly<Record<string, string | undefined>>;
  /** Highest-precedence values, e.g. parsed CLI flags. Strings are coerced. */
  readonly overrides?: Readonly<Record<string, unknown>>;
  /** Directory relative `baseDir`/`inputDir` resolve against. */
  readonly cwd?: string;
}

/** Load, merge, validate and resolve a TokenizerConfig. */
export function loadConfig(
  options: LoadConfigOptions = {},
): Effect.Effect<TokenizerConfig, ConfigError> {
  return Effect.gen(function* () {
    const fromFile = options.path ? yield* readConfigFile(options.path) : {};
    const fromEnv = envLayer(options.env ?? process.env);
    const merged: Record<string, unknown> = {
      ...defaultTokenizerConfig,
      ...fromFile,
      ...fromEnv,
      ...(options.overrides ?? {}),
    };
    const config = yield* parseConfig(merged);
    return resolveConfigPaths(config, options.cwd ?? process.cwd());
  });
}

/** Read a JSON config file into a plain object. */
export function readConfigFile(
  path: string,
): Effect.Effect<Record<string, unknown>, ConfigError> {
  return Effect.gen(function* () {
    const raw = yield* Effect.tryPromise({
      try: () => readFile(path, "utf-8"),
      catch: (cause) =>
        new ConfigError({ message: `Failed to read config file "${path}"`, cause }),
    });
    const parsed: unknown = yield* Effect.try({
      try: () => JSON.parse(raw),
      catch: (cause) =>
        new ConfigError({ message: `Failed to parse config at ${path}: invalid JSON`, cause }),
    });
    if (!isRecord(parsed)) {
      return yield* Effect.fail(
        new ConfigError({ message: `Config at ${path} must be a JSON object` }),
      );
    }
    return parsed;
  });
}

/** Pick the config keys set through the environment. */
export function envLayer(
  env: Readonly<Record<string, string | undefined>>,
): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [name, key] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined && value !== "") out[key] = value;
  }
  return out;
}

/**
 * Validate a merged record into a TokenizerConfig. Keys that are not config
 * keys are ignored.
 */
export function parseConfig(
  raw: Readonly<Record<string, unknown>>,
): Effect.Effect<TokenizerConfig, ConfigError> {
  return Effect.try({
    try: (): TokenizerConfig => ({
      trainer: readString(raw, "trainer"),
      numMerges: readPositiveInt(raw, "numMerges"),
      lowercase: readBoolean(raw, "lowercase"),
      baseDir: readString(raw, "baseDir"),
      inputDir: readString(raw, "inputDir"),
      outputDir: readString(raw, "outputDir"),
      loadMode: readChoice(raw, "loadMode", LOAD_MODES),
      chunkSize: readPositiveInt(raw, "chunkSize"),
      logLevel: readChoice({ logLevel: normaliseLevel(raw["logLevel"]) }, "logLevel", LOG_LEVELS),
      logInterval: readPositiveInt(raw, "logInterval"),
    }),
    catch: (cause) =>
      cause instanceof ConfigError
        ? cause
        : new ConfigError({ message: "Invalid configuration", cause }),
  });
}

/**
 * Make directories absolute: `baseDir` and `inputDir` against `cwd`,
 * `outputDir` against `baseDir`.
 */
export function resolveConfigPaths(config: TokenizerConfig, cwd: string): TokenizerConfig {
  const baseDir = isAbsolute(config.baseDir) ? config.baseDir : resolve(cwd, config.baseDir);
  return {
    ...config,
    baseDir,
    inputDir: isAbsolute(config.inputDir) ? config.inputDir : resolve(cwd, config.inputDir),
    outputDir: isAbsolute(config.outputDir) ? config.outputDir : resolve(baseDir, config.outputDir),
  };
}

/** One aligned `key value` line per setting, for startup logs. */
export function describeConfig(config: TokenizerConfig): string[] {
  return Object.entries(config).map(([key, value]) => `${key.padEnd(12)} ${String(value)}`);
}

// ── Field readers ──────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(raw: Readonly<Record<string, unknown>>, key: keyof TokenizerConfig): string {
  const value = raw[key];
  if (typeof value !== "string" || value.length === 0) {
    throw new ConfigError({ message: `${key} must be a non-empty string, got ${JSON.stringify(value)}` });
  }
  return value;
}

function readPositiveInt(raw: Readonly<Record<string, unknown>>, key: keyof TokenizerConfig): number {
  const value = raw[key];
  const n = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  if (typeof n !== "number" || !Number.isInteger(n) || n < 1) {
    throw new ConfigError({ message: `${key} must be a positive integer, got ${JSON.stringify(value)}` });
  }
  return n;
}

function readBoolean(raw: Readonly<Record<string, unknown>>, key: keyof TokenizerConfig): boolean {
  const value = raw[key];
  if (typeof value === "boolean") return value;
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new ConfigError({ message: `${key} must be a boolean, got ${JSON.stringify(value)}` });
}

function readChoice<T extends string>(
  raw: Readonly<Record<string, unknown>>,
  key: keyof TokenizerConfig,
  choices: readonly T[],
): T {
  const value = raw[key];
  const match = choices.find((c) => c === value);
  if (match === undefined) {
    throw new ConfigError({
      message: `${key} must be one of ${choices.join(", ")}, got ${JSON.stringify(value)}`,
    });
  }
  return match;
}

/** Levels are case-insensitive and `warning` is accepted for `warn`. */
function normaliseLevel(value: unknown): unknown {
  if (typeof value !== "string") return value;
  const lower = value.toLowerCase();
  return lower === "warning" ? "warn" : lower;
}
