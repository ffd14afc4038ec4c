/**
 * @matrica/math — Dense matrices over any numeric element type
 *
 * This package provides:
 * - **Matrix<T>**: row-major matrices with copy/move semantics, checked and
 *   unchecked element access, and the arithmetic operators
 * - **Errors**: one class per violated precondition, discriminated by `kind`
 * - **Rendering**: parenthesized row text with a per-element-type output width
 * - **scalarMatrix**: square matrices as the element type of other matrices
 *
 * @example
 * ```typescript
 * import { Matrix, mul, render, setOutputWidth } from "@matrica/math";
 * import { scalarNumber } from "@matrica/std";
 *
 * const e = Matrix.fromFlat(2, 3, [1, 2, 3, 4, 5, 6], scalarNumber);
 * const c = Matrix.diagonal([1, 2, 3], scalarNumber);
 * setOutputWidth(scalarNumber, 3);
 * render(mul(e, c));
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// Matrix
// ============================================================================

export {
  Matrix,
  // Operators
  negate,
  add,
  sub,
  addAssign,
  subAssign,
  mul,
  scaleLeft,
  scaleRight,
  transpose,
  equals,
  // Scalar instance
  scalarMatrix,
} from "./types/matrix.js";

// ============================================================================
// Errors
// ============================================================================

export {
  type MatrixErrorKind,
  MatrixError,
  ZeroSizeError,
  InitializerWrongSizeError,
  IncompatibleSizesAddError,
  IncompatibleSizesMultiplyError,
  IndexOutOfRangeError,
  describeMatrixError,
  isMatrixError,
} from "./errors.js";

// ============================================================================
// Rendering
// ============================================================================

export {
  type RenderOptions,
  render,
  setOutputWidth,
  getOutputWidth,
  resetOutputWidth,
} from "./format.js";
