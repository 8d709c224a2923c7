/**
 * Generic registry for pluggable implementations.
 *
 * Factories receive the options the caller resolved (merge budget, log
 * cadence, ...) so a single registration serves every configuration.
 */
import { Effect } from "effect";
import { ConfigError } from "./errors.js";

export class Registry<T, O = void> {
  private readonly _map = new Map<string, (options: O) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (options: O) => T): void {
    this._map.set(name, factory);
  }

  get(name: string, options: O): Effect.Effect<T, ConfigError> {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      return Effect.fail(
        new ConfigError({
          message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
        }),
      );
    }
    return Effect.sync(() => factory(options));
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
