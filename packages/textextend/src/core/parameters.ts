import { randomInt } from "node:crypto";
import { z } from "zod";
import { UsageError } from "./errors.js";
import { isSupplier, Supplier } from "./supplier.js";

/** A JSON value the inference service accepts as a generation parameter. */
export type ParameterLiteral = string | number | boolean | null | readonly ParameterLiteral[];

/** Validates a value decoded from JSON or TOML as a {@link ParameterLiteral}. */
export const parameterLiteralSchema: z.ZodType<ParameterLiteral> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(parameterLiteralSchema)]),
);

/** What callers may pass for a parameter: a fixed value or a {@link Supplier}. */
export type ParameterInput = ParameterLiteral | Supplier<ParameterLiteral>;

/** A stored parameter, tagged by how it gets its value. */
export type ParameterValue =
  | { kind: "literal"; value: ParameterLiteral }
  | { kind: "deferred"; supplier: Supplier<ParameterLiteral> };

/** Parameters in insertion order, keyed by the name sent to the service. */
export type ParameterBundle = Map<string, ParameterValue>;

/** Parameters with every deferred value resolved, ready to send. */
export type ResolvedParameters = Record<string, ParameterLiteral>;

/** Names starting with this prefix are reserved. */
export const RESERVED_PARAMETER_PREFIX = "_";

/** Exclusive upper bound for generated seeds (the widest range `randomInt` takes). */
export const SEED_LIMIT = 2 ** 48 - 1;

export function literal(value: ParameterLiteral): ParameterValue {
  return { kind: "literal", value };
}

export function deferred(
  supplier: Supplier<ParameterLiteral> | (() => ParameterLiteral),
): ParameterValue {
  return {
    kind: "deferred",
    supplier: isSupplier(supplier) ? supplier : new Supplier(supplier),
  };
}

export function toParameterValue(value: ParameterInput): ParameterValue {
  return isSupplier(value) ? deferred(value) : literal(value);
}

export function assertParameterName(name: string): void {
  if (name.startsWith(RESERVED_PARAMETER_PREFIX)) {
    throw new UsageError(
      `cannot set parameter "${name}": names with a leading "${RESERVED_PARAMETER_PREFIX}" are reserved`,
    );
  }
}

/**
 * A random seed that round-trips exactly through JSON.
 */
export function randomSeed(): number {
  return randomInt(SEED_LIMIT);
}

/**
 * Default sampling parameters. The seed is drawn anew for every request.
 */
export function defaultParameters(seed: () => number = randomSeed): ParameterBundle {
  return new Map<string, ParameterValue>([
    ["do_sample", literal(true)],
    ["max_new_tokens", literal(250)],
    ["seed", deferred(seed)],
    ["temperature", literal(0.75)],
  ]);
}

/**
 * Resolves every deferred value once and returns the parameters sorted by name.
 */
export function resolveParameters(bundle: ParameterBundle): ResolvedParameters {
  const resolved: ResolvedParameters = {};
  const names = [...bundle.keys()].sort();

  for (const name of names) {
    const parameter = bundle.get(name);
    if (parameter === undefined) continue;

    switch (parameter.kind) {
      case "literal":
        resolved[name] = parameter.value;
        break;
      case "deferred":
        resolved[name] = parameter.supplier.resolve();
        break;
      default: {
        const unreachable: never = parameter;
        throw new Error(`Unknown parameter kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  return resolved;
}
