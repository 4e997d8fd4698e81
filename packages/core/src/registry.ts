/**
 * Generic registry for pluggable implementations, keyed by a string union.
 */
import { ConfigError } from "./errors.js";

export class Registry<K extends string, T> {
  private readonly factories = new Map<K, () => T>();
  private readonly cache = new Map<K, T>();
  readonly subsystem: string;

  constructor(subsystem: string) {
    this.subsystem = subsystem;
  }

  register(name: K, factory: () => T): this {
    this.factories.set(name, factory);
    this.cache.delete(name);
    return this;
  }

  /** Returns the (memoised) implementation registered under `name`. */
  get(name: K): T {
    const hit = this.cache.get(name);
    if (hit !== undefined) return hit;
    const factory = this.factories.get(name);
    if (!factory) {
      throw new ConfigError({
        message: `[${this.subsystem}] no implementation "${name}" (have: ${this.list().join(", ")})`,
      });
    }
    const impl = factory();
    this.cache.set(name, impl);
    return impl;
  }

  has(name: string): name is K {
    return this.list().some((k) => k === name);
  }

  list(): K[] {
    return [...this.factories.keys()];
  }
}
