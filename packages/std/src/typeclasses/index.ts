/**
 * Standard Typeclasses
 *
 * The small set of dictionaries the collections and graph algorithms are
 * parameterized over:
 * - Eq: equality
 * - Hash: bucketing for hash tables (must agree with Eq)
 * - Ord: total ordering, used for sorting edges by weight
 *
 * Instances are plain objects, passed explicitly wherever a structure needs
 * to decide identity (Haskell-style dictionary passing).
 */

// ============================================================================
// Eq
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b || (Number.isNaN(a) && Number.isNaN(b)),
  notEquals: (a, b) => !eqNumber.equals(a, b),
};

export const eqString: Eq<string> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

// ============================================================================
// Hash
// ============================================================================

/**
 * Hash typeclass - a 32-bit bucket key.
 *
 * Law: `eq.equals(a, b) => hash(a) === hash(b)`. The converse need not hold.
 */
export interface Hash<A> {
  hash(a: A): number;
}

// djb2, as in the hash tables of most scripting runtimes
export const hashString: Hash<string> = {
  hash: (a) => {
    let h = 5381;
    for (let i = 0; i < a.length; i++) {
      h = ((h << 5) + h) ^ a.charCodeAt(i);
    }
    return h >>> 0;
  },
};

export const hashNumber: Hash<number> = {
  hash: (a) => {
    if (Number.isNaN(a)) return 0x7fc00000;
    if (!Number.isFinite(a)) return a > 0 ? 0x7f800000 : 0xff800000;
    // -0 and 0 are the same vertex
    if (Number.isInteger(a) && Math.abs(a) < 2 ** 31) return a | 0;
    return hashString.hash(String(a));
  },
};

export const hashBoolean: Hash<boolean> = {
  hash: (a) => (a ? 1 : 0),
};

export const hashBigInt: Hash<bigint> = {
  hash: (a) => hashString.hash(a.toString()),
};

// ============================================================================
// Ord
// ============================================================================

export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * Ord typeclass - total ordering.
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
}

/**
 * Build a full Ord from a compare function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    compare,
    equals: (a, b) => compare(a, b) === EQ_ORD,
    notEquals: (a, b) => compare(a, b) !== EQ_ORD,
    lessThan: (a, b) => compare(a, b) === LT,
    lessThanOrEqual: (a, b) => compare(a, b) !== GT,
    greaterThan: (a, b) => compare(a, b) === GT,
    greaterThanOrEqual: (a, b) => compare(a, b) !== LT,
  };
}

// Infinity sorts last, which is what edge weights need
export const ordNumber: Ord<number> = makeOrd((a, b) => (a < b ? LT : a > b ? GT : EQ_ORD));

