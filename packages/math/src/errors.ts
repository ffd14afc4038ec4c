/**
 * Matrix Error Types
 *
 * One payload-free error class per precondition a matrix operation can
 * violate. Every class carries a `kind` discriminant, so callers can either
 * `instanceof` a specific class or `switch` on `error.kind`.
 */

import { unreachable } from "@matrica/core";

export type MatrixErrorKind =
  | "zero_size"
  | "initializer_wrong_size"
  | "incompatible_sizes_add"
  | "incompatible_sizes_multiply"
  | "index_out_of_range";

/**
 * Fixed, human-readable message for each error kind.
 */
export function describeMatrixError(kind: MatrixErrorKind): string {
  switch (kind) {
    case "zero_size":
      return "Cannot create a matrix with zero rows or columns";
    case "initializer_wrong_size":
      return "Initializer size does not match the expected number of elements";
    case "incompatible_sizes_add":
      return "Two matrices can only be added or subtracted if they are of the same size";
    case "incompatible_sizes_multiply":
      return "Two matrices can only be multiplied if the number of columns in the first matrix is equal to the number of rows in the second matrix";
    case "index_out_of_range":
      return "Requested matrix element is out of range";
    default:
      return unreachable(kind);
  }
}

/**
 * Base class for all matrix precondition violations.
 */
export class MatrixError extends Error {
  constructor(public readonly kind: MatrixErrorKind) {
    super(describeMatrixError(kind));
    this.name = "MatrixError";
  }
}

/**
 * Thrown when a matrix would be created with zero rows or columns.
 */
export class ZeroSizeError extends MatrixError {
  constructor() {
    super("zero_size");
    this.name = "ZeroSizeError";
  }
}

/**
 * Thrown when a flat initializer does not hold exactly rows * cols elements.
 */
export class InitializerWrongSizeError extends MatrixError {
  constructor() {
    super("initializer_wrong_size");
    this.name = "InitializerWrongSizeError";
  }
}

/**
 * Thrown when matrices of different shapes are added or subtracted.
 */
export class IncompatibleSizesAddError extends MatrixError {
  constructor() {
    super("incompatible_sizes_add");
    this.name = "IncompatibleSizesAddError";
  }
}

/**
 * Thrown when the left operand's column count differs from the right operand's row count.
 */
export class IncompatibleSizesMultiplyError extends MatrixError {
  constructor() {
    super("incompatible_sizes_multiply");
    this.name = "IncompatibleSizesMultiplyError";
  }
}

/**
 * Thrown by checked element access outside the matrix bounds.
 */
export class IndexOutOfRangeError extends MatrixError {
  constructor() {
    super("index_out_of_range");
    this.name = "IndexOutOfRangeError";
  }
}

export function isMatrixError(error: unknown): error is MatrixError {
  return error instanceof MatrixError;
}
