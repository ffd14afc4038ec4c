/**
 * Matrix<T> - Dense row-major matrices over any Scalar element type
 *
 * A matrix owns one flat buffer of `rows * cols` elements; element (i, j)
 * lives at offset `i * cols + j`. No two matrices ever share a buffer:
 * copying allocates a new one, moving hands the buffer over and leaves the
 * source empty (0 x 0).
 *
 * @example
 * ```typescript
 * const e = Matrix.fromFlat(2, 3, [1, 2, 3, 4, 5, 6], scalarNumber);
 * e.set(0, 2, 7);
 * const c = Matrix.diagonal([1, 2, 3], scalarNumber);
 * mul(e, c).toRows(); // [[1, 4, 21], [4, 10, 18]]
 * ```
 */

import { createLogger, invariant } from "@matrica/core";
import { sum, type Scalar } from "@matrica/std";
import {
  ZeroSizeError,
  InitializerWrongSizeError,
  IncompatibleSizesAddError,
  IncompatibleSizesMultiplyError,
  IndexOutOfRangeError,
} from "../errors.js";
import { render, type RenderOptions } from "../format.js";

const log = createLogger("matrix");

// ============================================================================
// Shape Validation
// ============================================================================

function checkDimension(n: number, what: string): void {
  if (!Number.isSafeInteger(n) || n < 0) {
    throw new RangeError(`Matrix ${what} must be a non-negative integer, got ${n}`);
  }
}

function checkShape(rows: number, cols: number): void {
  checkDimension(rows, "rows");
  checkDimension(cols, "cols");
  if (rows === 0 || cols === 0) {
    throw new ZeroSizeError();
  }
}

function copyOne<T>(value: T, S: Scalar<T>): T {
  return S.copy ? S.copy(value) : value;
}

function copyAll<T>(values: readonly T[], S: Scalar<T>): T[] {
  const copy = S.copy;
  return copy ? values.map((x) => copy(x)) : values.slice();
}

// ============================================================================
// Matrix
// ============================================================================

export class Matrix<T> {
  private _rows: number;
  private _cols: number;
  private elements: T[];
  private _scalar: Scalar<T>;

  private constructor(rows: number, cols: number, elements: T[], scalar: Scalar<T>) {
    invariant(
      elements.length === rows * cols,
      `Matrix buffer holds ${elements.length} elements, expected ${rows * cols}`
    );
    this._rows = rows;
    this._cols = cols;
    this.elements = elements;
    this._scalar = scalar;
  }

  // ==========================================================================
  // Constructors
  // ==========================================================================

  /**
   * Create an UNINITIALIZED matrix. Every element must be written before it is read.
   *
   * @throws ZeroSizeError if rows or cols is zero
   */
  static uninitialized<T>(rows: number, cols: number, S: Scalar<T>): Matrix<T> {
    checkShape(rows, cols);
    return new Matrix(rows, cols, new Array<T>(rows * cols), S);
  }

  /**
   * Create a matrix with every element set to `value`.
   *
   * @throws ZeroSizeError if rows or cols is zero
   */
  static filled<T>(rows: number, cols: number, value: T, S: Scalar<T>): Matrix<T> {
    checkShape(rows, cols);
    const elements = new Array<T>(rows * cols);
    for (let i = 0; i < elements.length; i++) {
      elements[i] = copyOne(value, S);
    }
    return new Matrix(rows, cols, elements, S);
  }

  /**
   * Create a square matrix with `values` on the diagonal and zero elsewhere.
   * The side length is `values.length`.
   *
   * @throws ZeroSizeError if `values` is empty
   */
  static diagonal<T>(values: readonly T[], S: Scalar<T>): Matrix<T> {
    const n = values.length;
    if (n === 0) {
      throw new ZeroSizeError();
    }
    const elements = new Array<T>(n * n);
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) {
        elements[i * n + j] = i === j ? copyOne(values[i], S) : S.zero();
      }
    }
    return new Matrix(n, n, elements, S);
  }

  /**
   * Create a matrix from elements in flattened row-major order:
   * element (i, j) is `elements[i * cols + j]`.
   *
   * @throws ZeroSizeError if rows or cols is zero
   * @throws InitializerWrongSizeError if `elements.length !== rows * cols`
   */
  static fromFlat<T>(rows: number, cols: number, elements: readonly T[], S: Scalar<T>): Matrix<T> {
    checkShape(rows, cols);
    if (elements.length !== rows * cols) {
      throw new InitializerWrongSizeError();
    }
    return new Matrix(rows, cols, copyAll(elements, S), S);
  }

  /**
   * Create a matrix from row arrays, which must all have the same length.
   *
   * @throws ZeroSizeError if there are no rows or the rows are empty
   * @throws InitializerWrongSizeError if the rows are ragged
   */
  static fromRows<T>(rows: readonly (readonly T[])[], S: Scalar<T>): Matrix<T> {
    if (rows.length === 0 || rows[0].length === 0) {
      throw new ZeroSizeError();
    }
    const cols = rows[0].length;
    const elements: T[] = [];
    for (const row of rows) {
      if (row.length !== cols) {
        throw new InitializerWrongSizeError();
      }
      elements.push(...row);
    }
    return new Matrix(rows.length, cols, copyAll(elements, S), S);
  }

  /**
   * Create the n x n identity matrix.
   */
  static identity<T>(n: number, S: Scalar<T>): Matrix<T> {
    checkDimension(n, "size");
    const ones: T[] = [];
    for (let i = 0; i < n; i++) {
      ones.push(S.one());
    }
    return Matrix.diagonal(ones, S);
  }

  /**
   * Deep copy: a new buffer with the same dimensions and elements.
   */
  static copyOf<T>(m: Matrix<T>): Matrix<T> {
    return new Matrix(m._rows, m._cols, m.copyElements(), m._scalar);
  }

  /**
   * Move: the new matrix takes over the buffer of `m`, which is left empty.
   */
  static moveFrom<T>(m: Matrix<T>): Matrix<T> {
    const moved = new Matrix(m._rows, m._cols, m.elements, m._scalar);
    m.release();
    log.debug(`moved a ${moved._rows}x${moved._cols} matrix of ${moved._scalar.name}`);
    return moved;
  }

  clone(): Matrix<T> {
    return Matrix.copyOf(this);
  }

  take(): Matrix<T> {
    return Matrix.moveFrom(this);
  }

  // ==========================================================================
  // Assignment
  // ==========================================================================

  /**
   * Copy assignment: replace this matrix's dimensions and buffer with a copy of `source`.
   */
  assign(source: Matrix<T>): this {
    if (source === this) return this;
    this._rows = source._rows;
    this._cols = source._cols;
    this.elements = source.copyElements();
    this._scalar = source._scalar;
    return this;
  }

  /**
   * Move assignment: take over the buffer of `source`, which is left empty.
   */
  moveAssign(source: Matrix<T>): this {
    if (source === this) return this;
    this._rows = source._rows;
    this._cols = source._cols;
    this.elements = source.elements;
    this._scalar = source._scalar;
    source.release();
    return this;
  }

  private copyElements(): T[] {
    return copyAll(this.elements, this._scalar);
  }

  private release(): void {
    this._rows = 0;
    this._cols = 0;
    this.elements = [];
  }

  // ==========================================================================
  // Dimensions
  // ==========================================================================

  get rows(): number {
    return this._rows;
  }

  get cols(): number {
    return this._cols;
  }

  get scalar(): Scalar<T> {
    return this._scalar;
  }

  /** True only for a matrix that has been moved from. */
  get isEmpty(): boolean {
    return this._rows === 0 && this._cols === 0;
  }

  // ==========================================================================
  // Element Access
  // ==========================================================================

  /**
   * Read element (row, col) WITHOUT range checking.
   * Out-of-range indices are undefined behavior; use `at` when in doubt.
   */
  get(row: number, col: number): T {
    return this.elements[row * this._cols + col];
  }

  /**
   * Write element (row, col) WITHOUT range checking.
   * Like every write, stores a copy if the element type defines `copy`.
   */
  set(row: number, col: number, value: T): void {
    this.elements[row * this._cols + col] = copyOne(value, this._scalar);
  }

  /**
   * Read element (row, col) WITH range checking.
   *
   * @throws IndexOutOfRangeError if row >= rows or col >= cols
   */
  at(row: number, col: number): T {
    this.checkIndex(row, col);
    return this.elements[row * this._cols + col];
  }

  /**
   * Write element (row, col) WITH range checking.
   *
   * @throws IndexOutOfRangeError if row >= rows or col >= cols
   */
  setAt(row: number, col: number, value: T): void {
    this.checkIndex(row, col);
    this.elements[row * this._cols + col] = copyOne(value, this._scalar);
  }

  /**
   * Replace element (row, col) with `fn` applied to it, WITH range checking.
   */
  update(row: number, col: number, fn: (value: T) => T): void {
    this.checkIndex(row, col);
    const offset = row * this._cols + col;
    this.elements[offset] = fn(this.elements[offset]);
  }

  private checkIndex(row: number, col: number): void {
    if (
      !Number.isInteger(row) ||
      !Number.isInteger(col) ||
      row < 0 ||
      col < 0 ||
      row >= this._rows ||
      col >= this._cols
    ) {
      throw new IndexOutOfRangeError();
    }
  }

  // ==========================================================================
  // Arithmetic
  // ==========================================================================

  negate(): Matrix<T> {
    const S = this._scalar;
    const result = Matrix.uninitialized(this._rows, this._cols, S);
    const a = this.elements;
    const out = result.elements;
    for (let i = 0; i < a.length; i++) {
      out[i] = S.negate(a[i]);
    }
    return result;
  }

  /**
   * Element-wise sum.
   *
   * @throws IncompatibleSizesAddError if the shapes differ
   */
  add(other: Matrix<T>): Matrix<T> {
    this.checkSameShape(other);
    const S = this._scalar;
    const result = Matrix.uninitialized(this._rows, this._cols, S);
    const a = this.elements;
    const b = other.elements;
    const out = result.elements;
    for (let i = 0; i < a.length; i++) {
      out[i] = S.add(a[i], b[i]);
    }
    return result;
  }

  /**
   * Element-wise difference.
   *
   * @throws IncompatibleSizesAddError if the shapes differ
   */
  sub(other: Matrix<T>): Matrix<T> {
    this.checkSameShape(other);
    const S = this._scalar;
    const result = Matrix.uninitialized(this._rows, this._cols, S);
    const a = this.elements;
    const b = other.elements;
    const out = result.elements;
    for (let i = 0; i < a.length; i++) {
      out[i] = S.sub(a[i], b[i]);
    }
    return result;
  }

  /** `this = this + other`. Leaves this matrix untouched if it throws. */
  addAssign(other: Matrix<T>): this {
    return this.moveAssign(this.add(other));
  }

  /** `this = this - other`. Leaves this matrix untouched if it throws. */
  subAssign(other: Matrix<T>): this {
    return this.moveAssign(this.sub(other));
  }

  /**
   * Matrix product: (R x K) * (K x C) -> (R x C).
   *
   * @throws IncompatibleSizesMultiplyError if this.cols !== other.rows
   */
  mul(other: Matrix<T>): Matrix<T> {
    if (this._cols !== other._rows) {
      throw new IncompatibleSizesMultiplyError();
    }
    const S = this._scalar;
    const r = this._rows;
    const k = this._cols;
    const c = other._cols;
    const result = Matrix.uninitialized(r, c, S);
    const a = this.elements;
    const b = other.elements;
    const out = result.elements;
    for (let i = 0; i < r; i++) {
      for (let j = 0; j < c; j++) {
        const terms: T[] = [];
        for (let m = 0; m < k; m++) {
          terms.push(S.mul(a[i * k + m], b[m * c + j]));
        }
        out[i * c + j] = sum(terms, S);
      }
    }
    return result;
  }

  /** Scalar on the left: each element becomes `s * x`. */
  scaleLeft(s: T): Matrix<T> {
    const S = this._scalar;
    const result = Matrix.uninitialized(this._rows, this._cols, S);
    const a = this.elements;
    const out = result.elements;
    for (let i = 0; i < a.length; i++) {
      out[i] = S.mul(s, a[i]);
    }
    return result;
  }

  /**
   * Scalar on the right, defined as `s * this`. Each element becomes `s * x`,
   * which equals `x * s` only if T's multiplication commutes.
   */
  scaleRight(s: T): Matrix<T> {
    return this.scaleLeft(s);
  }

  private checkSameShape(other: Matrix<T>): void {
    if (this._rows !== other._rows || this._cols !== other._cols) {
      throw new IncompatibleSizesAddError();
    }
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  transpose(): Matrix<T> {
    const r = this._rows;
    const c = this._cols;
    const result = Matrix.uninitialized(c, r, this._scalar);
    const out = result.elements;
    for (let i = 0; i < r; i++) {
      for (let j = 0; j < c; j++) {
        out[j * r + i] = this.elements[i * c + j];
      }
    }
    return result;
  }

  /**
   * Apply `fn` to every element, producing a matrix over another element type.
   */
  map<U>(fn: (value: T, row: number, col: number) => U, S: Scalar<U>): Matrix<U> {
    const result = Matrix.uninitialized(this._rows, this._cols, S);
    for (let i = 0; i < this._rows; i++) {
      for (let j = 0; j < this._cols; j++) {
        result.elements[i * this._cols + j] = fn(this.elements[i * this._cols + j], i, j);
      }
    }
    return result;
  }

  /**
   * Same shape and element-wise equal under the element type's Eq.
   */
  equals(other: Matrix<T>): boolean {
    if (this._rows !== other._rows || this._cols !== other._cols) return false;
    for (let i = 0; i < this.elements.length; i++) {
      if (!this._scalar.equals(this.elements[i], other.elements[i])) return false;
    }
    return true;
  }

  toRows(): T[][] {
    const result: T[][] = [];
    for (let i = 0; i < this._rows; i++) {
      result.push(this.elements.slice(i * this._cols, (i + 1) * this._cols));
    }
    return result;
  }

  toFlat(): T[] {
    return this.elements.slice();
  }

  // ==========================================================================
  // Rendering
  // ==========================================================================

  render(options?: RenderOptions<T>): string {
    return render(this, options);
  }

  toString(): string {
    return render(this);
  }
}

// ============================================================================
// Operators
// ============================================================================

/** `-m` */
export function negate<T>(m: Matrix<T>): Matrix<T> {
  return m.negate();
}

/** `a + b` */
export function add<T>(a: Matrix<T>, b: Matrix<T>): Matrix<T> {
  return a.add(b);
}

/** `a - b` */
export function sub<T>(a: Matrix<T>, b: Matrix<T>): Matrix<T> {
  return a.sub(b);
}

/** `a += b` */
export function addAssign<T>(a: Matrix<T>, b: Matrix<T>): Matrix<T> {
  return a.addAssign(b);
}

/** `a -= b` */
export function subAssign<T>(a: Matrix<T>, b: Matrix<T>): Matrix<T> {
  return a.subAssign(b);
}

/** `a * b` (matrix product) */
export function mul<T>(a: Matrix<T>, b: Matrix<T>): Matrix<T> {
  return a.mul(b);
}

/** `s * m` */
export function scaleLeft<T>(s: T, m: Matrix<T>): Matrix<T> {
  return m.scaleLeft(s);
}

/** `m * s`, computed as `s * m` */
export function scaleRight<T>(m: Matrix<T>, s: T): Matrix<T> {
  return m.scaleRight(s);
}

export function transpose<T>(m: Matrix<T>): Matrix<T> {
  return m.transpose();
}

export function equals<T>(a: Matrix<T>, b: Matrix<T>): boolean {
  return a.equals(b);
}

// ============================================================================
// Scalar Instance
// ============================================================================

/**
 * Scalar instance for n x n matrices, so that square matrices can
 * themselves be matrix elements.
 * - add/sub: element-wise
 * - mul: matrix multiplication (not commutative!)
 * - zero: zero matrix
 * - one: identity matrix
 * - display: `[a b; c d]`
 */
export function scalarMatrix<T>(n: number, S: Scalar<T>): Scalar<Matrix<T>> {
  checkShape(n, n);
  return {
    name: `Matrix<${S.name}>[${n}x${n}]`,
    add: (a, b) => a.add(b),
    sub: (a, b) => a.sub(b),
    mul: (a, b) => a.mul(b),
    negate: (a) => a.negate(),
    fromNumber: (x) => Matrix.identity(n, S).scaleLeft(S.fromNumber(x)),
    zero: () => Matrix.filled(n, n, S.zero(), S),
    one: () => Matrix.identity(n, S),
    equals: (a, b) => a.equals(b),
    notEquals: (a, b) => !a.equals(b),
    display: (a) =>
      "[" +
      a
        .toRows()
        .map((row) => row.map((x) => S.display(x)).join(" "))
        .join("; ") +
      "]",
    copy: (a) => a.clone(),
  };
}
