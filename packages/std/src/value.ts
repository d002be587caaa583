/**
 * Value identity for graph vertices and set members.
 *
 * JavaScript collections compare objects by reference. Graphs need value
 * identity instead: two `GraphEdge("a", "b")` instances are the same edge.
 * Objects opt in by implementing {@link ValueObject}; primitives compare by
 * value out of the box.
 */

import type { Eq, Hash } from "./typeclasses/index.js";
import { eqNumber, hashBigInt, hashBoolean, hashNumber, hashString } from "./typeclasses/index.js";

/**
 * An object with value semantics. `hashCode` must agree with `equals`.
 */
export interface ValueObject {
  equals(other: unknown): boolean;
  hashCode(): number;
}

export type Primitive = string | number | bigint | boolean | symbol;

/** Anything usable as a vertex, set member, or index key. */
export type Hashable = Primitive | ValueObject;

export function isValueObject(value: unknown): value is ValueObject {
  if (typeof value !== "object" || value === null) return false;
  return (
    "equals" in value &&
    typeof value.equals === "function" &&
    "hashCode" in value &&
    typeof value.hashCode === "function"
  );
}

/**
 * Whether a value may serve as an identity. Arrays, plain objects, functions,
 * `null` and `undefined` may not.
 */
export function isHashable(value: unknown): value is Hashable {
  switch (typeof value) {
    case "string":
    case "number":
    case "bigint":
    case "boolean":
    case "symbol":
      return true;
    case "object":
      return isValueObject(value);
    default:
      return false;
  }
}

/**
 * Eq over every {@link Hashable}. Value objects of different classes are
 * never equal, so `equals` only ever sees its own kind.
 */
export const eqValue: Eq<Hashable> = {
  equals: (a, b) => valueEquals(a, b),
  notEquals: (a, b) => !valueEquals(a, b),
};

function valueEquals(a: Hashable, b: Hashable): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") return eqNumber.equals(a, b);
  if (isValueObject(a) && isValueObject(b)) {
    if (Object.getPrototypeOf(a) !== Object.getPrototypeOf(b)) return false;
    return a.equals(b);
  }
  return false;
}

/**
 * Hash over every {@link Hashable}. Each primitive type is salted so that
 * `1`, `"1"` and `1n` tend to land in different buckets.
 */
export const hashValue: Hash<Hashable> = {
  hash: (a) => {
    switch (typeof a) {
      case "string":
        return hashString.hash(a);
      case "number":
        return hashNumber.hash(a);
      case "bigint":
        return (hashBigInt.hash(a) ^ 0x5bd1e995) >>> 0;
      case "boolean":
        return (hashBoolean.hash(a) ^ 0x27d4eb2f) >>> 0;
      case "symbol":
        return (hashString.hash(a.description ?? "") ^ 0x165667b1) >>> 0;
      default:
        return a.hashCode() >>> 0;
    }
  },
};

/**
 * Typed views of {@link eqValue} and {@link hashValue} for a narrower
 * element type.
 */
export function eqFor<A extends Hashable>(): Eq<A> {
  return eqValue;
}

export function hashFor<A extends Hashable>(): Hash<A> {
  return hashValue;
}

/**
 * Render a value the way graph `toString()` output shows it: strings quoted,
 * everything else through `String()`.
 */
export function showValue(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  return String(value);
}
