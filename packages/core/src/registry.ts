/**
 * Generic registry for pluggable implementations built from run-time options.
 */
import { ConfigurationError } from "./errors.js";

export class Registry<A, T> {
  private readonly _map = new Map<string, (args: A) => T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: string, factory: (args: A) => T): void {
    this._map.set(name, factory);
  }

  /** Build the named implementation. Unknown names are configuration errors. */
  get(name: string, args: A): T {
    const factory = this._map.get(name);
    if (!factory) {
      const avail = [...this._map.keys()].join(", ");
      throw new ConfigurationError({
        message: `[${this.subsystem}] Unknown implementation "${name}". Available: ${avail}`,
      });
    }
    return factory(args);
  }

  has(name: string): boolean {
    return this._map.has(name);
  }

  list(): string[] {
    return [...this._map.keys()];
  }
}
