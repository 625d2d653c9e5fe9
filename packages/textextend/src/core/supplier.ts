import { inspect } from "node:util";

/**
 * A parameter value computed when a request is built instead of when the
 * parameter is set. The wrapped function runs again on every resolution.
 *
 * @example
 * ```typescript
 * const completer = new Completer({
 *   transport,
 *   prompt: "It was a dark and stormy night.",
 *   parameters: { top_k: new Supplier(() => 20 + Math.floor(Math.random() * 30)) },
 * });
 * ```
 */
export class Supplier<T = unknown> {
  private readonly supply: () => T;

  constructor(supply: () => T) {
    this.supply = supply;
  }

  /** Calls the wrapped function and returns what it produced. */
  resolve(): T {
    return this.supply();
  }

  toString(): string {
    return `Supplier(${this.supply.name || "anonymous"})`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

export function isSupplier(value: unknown): value is Supplier {
  return value instanceof Supplier;
}
