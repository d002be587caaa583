/**
 * @fuzzgraph/std: Standard Library
 *
 * Typeclasses and value identity shared by every fuzzgraph package:
 * - Eq, Hash, Ord with primitive instances
 * - ValueObject / Hashable: the contract a vertex must satisfy
 * - eqValue / hashValue: identity instances for any Hashable
 */

export type { Eq, Hash, Ord, Ordering } from "./typeclasses/index.js";
export {
  eqNumber,
  eqString,
  hashString,
  hashNumber,
  hashBoolean,
  hashBigInt,
  LT,
  EQ_ORD,
  GT,
  makeOrd,
  ordNumber,
} from "./typeclasses/index.js";

export type { ValueObject, Primitive, Hashable } from "./value.js";
export {
  isValueObject,
  isHashable,
  eqValue,
  hashValue,
  eqFor,
  hashFor,
  showValue,
} from "./value.js";
