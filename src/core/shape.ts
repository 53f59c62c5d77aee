/**
 * Canonical pure shape utility functions.
 *
 * No dependencies; importable from any layer.
 */

/** Marker for an extent that is unknown until run time. Printed as `?`. */
export const DYNAMIC = -1;

/** A static non-negative extent, or {@link DYNAMIC}. */
export type Dim = number;

export type Shape = readonly Dim[];

export function isValidDim(dim: number): boolean {
  return dim === DYNAMIC || (Number.isSafeInteger(dim) && dim >= 0);
}

export function makeShape(dims: Iterable<Dim>): Shape {
  const out = Array.from(dims);
  for (const dim of out) {
    if (!isValidDim(dim)) {
      throw new TypeError(`Invalid dimension ${dim} in shape [${out.join(", ")}]`);
    }
  }
  return Object.freeze(out);
}

export function rank(shape: Shape): number {
  return shape.length;
}

export function dimAt(shape: Shape, index: number): Dim | undefined {
  return shape[index];
}

export function isDynamicDim(shape: Shape, index: number): boolean {
  return shape[index] === DYNAMIC;
}

export function hasDynamicDims(shape: Shape): boolean {
  return shape.includes(DYNAMIC);
}

/**
 * Structural equality where an unknown extent never equals anything,
 * including another unknown extent.
 */
export function shapesEqual(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] === DYNAMIC || a[i] !== b[i]) return false;
  }
  return true;
}

/** Type-level identity: `?` matches `?`. */
export function shapesIdentical(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function formatDim(dim: Dim): string {
  return dim === DYNAMIC ? "?" : String(dim);
}

export function formatShape(shape: Shape): string {
  return `[${shape.map(formatDim).join(", ")}]`;
}
