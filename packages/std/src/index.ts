/**
 * @matrica/std — Standard Library
 *
 * Element typeclasses with primitive instances, plus derived operations
 * over any Numeric instance.
 *
 * @example
 * ```ts
 * import { scalarNumber, sum } from "@matrica/std";
 *
 * scalarNumber.mul(3, 4); // 12
 * sum([1, 2, 3], scalarNumber); // 6
 * ```
 *
 * @packageDocumentation
 */

export {
  type Eq,
  type Numeric,
  type Printable,
  type Copyable,
  type Scalar,
  eqNumber,
  eqBigInt,
  numericNumber,
  numericBigInt,
  printableNumber,
  printableBigInt,
  scalar,
  scalarNumber,
  scalarBigInt,
} from "./typeclasses/index.js";

export { sum, product } from "./typeclasses/numeric-ops.js";
