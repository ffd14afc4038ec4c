/**
 * Text rendering for matrices.
 *
 * Each row is printed as `( x x x )` with every element right-aligned to the
 * output width, and a blank line follows the last row:
 *
 * ```text
 * (   1   2   3 )
 * (   4   5   6 )
 *
 * ```
 *
 * The output width is scoped to an element type, identified by its Scalar
 * dictionary's `name`, so separately built dictionaries for one type (two
 * `scalarMatrix(2, S)` calls, say) share it. It can be overridden per call
 * and otherwise comes from the `format.width` config.
 */

import { config, createLogger } from "@matrica/core";
import type { Scalar } from "@matrica/std";
import type { Matrix } from "./types/matrix.js";

const log = createLogger("format");

const widths = new Map<string, number>();

export interface RenderOptions<T> {
  /** Character width of each element; overrides the element type's width */
  width?: number;
  /** Element formatter; overrides the element type's `display` */
  display?: (value: T) => string;
}

function normalizeWidth(width: number): number {
  if (!Number.isFinite(width)) {
    throw new RangeError(`Output width must be a finite number, got ${width}`);
  }
  return Math.max(0, Math.trunc(width));
}

/**
 * Set the output width used when rendering matrices of this element type.
 * Negative widths are treated as 0.
 */
export function setOutputWidth<T>(S: Scalar<T>, width: number): void {
  const normalized = normalizeWidth(width);
  widths.set(S.name, normalized);
  log.debug(`output width for ${S.name} set to ${normalized}`);
}

/**
 * Forget the width set for this element type, falling back to the configured default.
 */
export function resetOutputWidth<T>(S: Scalar<T>): void {
  widths.delete(S.name);
}

/**
 * The width in effect for this element type.
 */
export function getOutputWidth<T>(S: Scalar<T>): number {
  return widths.get(S.name) ?? normalizeWidth(config.get("format.width"));
}

/**
 * Render a matrix as text, one parenthesized line per row followed by a blank line.
 * A moved-from matrix renders as `()`.
 */
export function render<T>(m: Matrix<T>, options: RenderOptions<T> = {}): string {
  if (m.isEmpty) {
    return "()\n";
  }

  const width = options.width !== undefined ? normalizeWidth(options.width) : getOutputWidth(m.scalar);
  const S = m.scalar;
  const display = options.display ?? ((value: T) => S.display(value));

  let out = "";
  for (let i = 0; i < m.rows; i++) {
    out += "( ";
    for (let j = 0; j < m.cols; j++) {
      out += display(m.get(i, j)).padStart(width) + " ";
    }
    out += ")\n";
  }
  return out + "\n";
}
