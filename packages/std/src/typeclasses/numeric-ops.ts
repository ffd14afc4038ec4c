/**
 * Generic Numeric Operations
 *
 * Derived operations that work for ANY type with a Numeric instance.
 *
 * @example
 * ```typescript
 * import { sum, product, numericNumber } from "@matrica/std";
 *
 * sum([1, 2, 3, 4, 5], numericNumber); // 15
 * product([1, 2, 3, 4], numericNumber); // 24
 * ```
 */

import type { Numeric } from "./index.js";

/**
 * Sum all elements in an iterable, left to right.
 *
 * @returns The sum of all elements, or zero() if empty
 */
export function sum<A>(xs: Iterable<A>, N: Numeric<A>): A {
  let acc = N.zero();
  for (const x of xs) {
    acc = N.add(acc, x);
  }
  return acc;
}

/**
 * Multiply all elements in an iterable, left to right.
 *
 * @returns The product of all elements, or one() if empty
 */
export function product<A>(xs: Iterable<A>, N: Numeric<A>): A {
  let acc = N.one();
  for (const x of xs) {
    acc = N.mul(acc, x);
  }
  return acc;
}
