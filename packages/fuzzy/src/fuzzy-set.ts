/**
 * Fuzzy sets: objects paired with a membership degree in [0, 1].
 */

import { eqFor, hashFor, showValue, type Hashable } from "@fuzzgraph/std";
import { HashSet, IndexedMember, IndexedSet } from "@fuzzgraph/collections";
import { InvalidMembershipError } from "@fuzzgraph/core";

function checkMembership(mu: number): number {
  if (typeof mu !== "number" || Number.isNaN(mu) || mu < 0 || mu > 1) {
    throw new InvalidMembershipError("membership degree must be in [0, 1]", mu);
  }
  return mu;
}

/**
 * An object and its membership degree. The object is the index and never
 * changes; `mu` may be reassigned within [0, 1].
 */
export class FuzzyElement<T extends Hashable = Hashable> extends IndexedMember<T> {
  private _mu: number;

  constructor(obj: T, mu = 1) {
    super(obj);
    this._mu = checkMembership(mu);
  }

  get obj(): T {
    return this.index;
  }

  get mu(): number {
    return this._mu;
  }

  set mu(value: number) {
    this._mu = checkMembership(value);
  }

  toString(): string {
    return `${showValue(this.obj)}: ${this._mu}`;
  }
}

export function isFuzzyElement<T extends Hashable>(
  value: T | FuzzyElement<T>
): value is FuzzyElement<T> {
  return value instanceof FuzzyElement;
}

/**
 * A set of FuzzyElements keyed by their object. Absent objects have
 * membership 0.
 */
export class FuzzySet<T extends Hashable = Hashable> extends IndexedSet<T, FuzzyElement<T>> {
  addObject(obj: T, mu = 1): this {
    return this.add(new FuzzyElement(obj, mu));
  }

  mu(obj: T): number {
    return this._members.get(obj)?.mu ?? 0;
  }

  get objects(): HashSet<T> {
    return this.keys();
  }

  /** Objects with membership at least `threshold`. */
  alpha(threshold: number): HashSet<T> {
    return this.select((mu) => mu >= threshold);
  }

  /** Objects with membership strictly above `threshold`. */
  strongAlpha(threshold: number): HashSet<T> {
    return this.select((mu) => mu > threshold);
  }

  support(): HashSet<T> {
    return this.strongAlpha(0);
  }

  kernel(): HashSet<T> {
    return this.alpha(1);
  }

  height(): number {
    let max = 0;
    for (const element of this) max = Math.max(max, element.mu);
    return max;
  }

  /** Scale every degree so the largest becomes 1. No-op for height 0. */
  normalize(): void {
    const h = this.height();
    if (h === 0 || h === 1) return;
    for (const element of this) element.mu = element.mu / h;
  }

  /** Every object here is present in `other` with at least the same degree. */
  isSubset(other: FuzzySet<T>): boolean {
    for (const element of this) {
      if (!other.has(element.obj) || element.mu > other.mu(element.obj)) return false;
    }
    return true;
  }

  equals(other: FuzzySet<T>): boolean {
    return this.size === other.size && this.isSubset(other) && other.isSubset(this);
  }

  clone(): FuzzySet<T> {
    return new FuzzySet<T>(this._members.values());
  }

  toString(): string {
    return `{${[...this].map(String).join(", ")}}`;
  }

  private select(keep: (mu: number) => boolean): HashSet<T> {
    const result = new HashSet<T>(eqFor<T>(), hashFor<T>());
    for (const element of this) {
      if (keep(element.mu)) result.add(element.obj);
    }
    return result;
  }
}
