/**
 * Named registry for pluggable implementations (naming conventions and the like).
 */
import { Effect } from "effect";
import { ConfigError } from "./errors.js";

export class Registry<T> {
  private readonly _map = new Map<string, () => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: () => T): void {
    this._map.set(name, factory);
  }

  get(name: string): Effect.Effect<T, ConfigError> {
    return Effect.suspend(() => {
      const factory = this._map.get(name);
      if (!factory) {
        const avail = this.list().join(", ");
        return Effect.fail(
          new ConfigError({ message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}` }),
        );
      }
      return Effect.sync(factory);
    });
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
