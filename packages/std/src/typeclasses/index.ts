/**
 * Standard Typeclasses
 *
 * The element-level abstractions a matrix needs from its entries, in
 * dictionary-passing style: every generic operation takes the instance for
 * its element type as an explicit argument.
 *
 * - Eq — Haskell Eq, Rust PartialEq
 * - Numeric — Haskell Num, Scala Numeric (the ring operations only)
 * - Printable — Rust Display
 * - Copyable — Rust Clone
 * - Scalar — the bundle of all four that `Matrix<T>` carries
 */

// ============================================================================
// Eq — Haskell Eq, Rust PartialEq/Eq, Scala CanEqual
// Types supporting equality comparison.
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true`
 * - Symmetry: `equals(x, y) === equals(y, x)`
 * - Transitivity: `equals(x, y) && equals(y, z) => equals(x, z)`
 *
 * @typeclass
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

export const eqNumber: Eq<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

export const eqBigInt: Eq<bigint> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
};

// ============================================================================
// Numeric — Haskell Num, Scala Numeric, Kotlin: Number
// Types supporting ring arithmetic.
// ============================================================================

/**
 * Numeric typeclass - types supporting addition, subtraction, negation and
 * multiplication, with additive and multiplicative identities.
 *
 * Multiplication is not assumed to be commutative.
 *
 * @typeclass
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  fromNumber(n: number): A;
  zero(): A;
  one(): A;
}

export const numericNumber: Numeric<number> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  fromNumber: (n) => n,
  zero: () => 0,
  one: () => 1,
};

export const numericBigInt: Numeric<bigint> = {
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  negate: (a) => -a,
  fromNumber: (n) => BigInt(Math.trunc(n)),
  zero: () => 0n,
  one: () => 1n,
};

// ============================================================================
// Printable — Rust Display, Haskell Show (but human-readable focus)
// ============================================================================

export interface Printable<A> {
  display(a: A): string;
}

export const printableNumber: Printable<number> = {
  display: (a) => String(a),
};

export const printableBigInt: Printable<bigint> = {
  display: (a) => a.toString(),
};

// ============================================================================
// Copyable — Rust Clone
// Types that can be deeply copied. Immutable values need no instance.
// ============================================================================

export interface Copyable<A> {
  copy(a: A): A;
}

// ============================================================================
// Scalar — everything a matrix needs from its element type
// ============================================================================

/**
 * Element dictionary carried by every `Matrix<A>`.
 *
 * `copy` is optional: element types that are immutable values (number,
 * bigint) leave it out and are shared by reference on
 * copy; mutable element types (matrices of matrices) provide it.
 */
export interface Scalar<A> extends Numeric<A>, Eq<A>, Printable<A>, Partial<Copyable<A>> {
  /** Human-readable name of the element type, used in diagnostics */
  readonly name: string;
}

/**
 * Bundle separate instances into a Scalar dictionary.
 */
export function scalar<A>(
  name: string,
  N: Numeric<A>,
  E: Eq<A>,
  P: Printable<A>,
  C?: Copyable<A>
): Scalar<A> {
  return {
    name,
    add: N.add,
    sub: N.sub,
    mul: N.mul,
    negate: N.negate,
    fromNumber: N.fromNumber,
    zero: N.zero,
    one: N.one,
    equals: E.equals,
    notEquals: E.notEquals,
    display: P.display,
    ...(C ? { copy: C.copy } : {}),
  };
}

export const scalarNumber: Scalar<number> = scalar("number", numericNumber, eqNumber, printableNumber);

export const scalarBigInt: Scalar<bigint> = scalar("bigint", numericBigInt, eqBigInt, printableBigInt);
