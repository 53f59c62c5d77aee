/**
 * Broadcast resolution for binary elementwise ops.
 *
 * Decides whether two operand shapes (plus an optional explicit dimension
 * map) combine legally, and computes the result shape. Errors are returned
 * as values so that verifiers and parsers can report them and continue.
 */

import type { DType } from "../core/dtype";
import { type Dim, DYNAMIC, formatDim, makeShape, type Shape } from "../core/shape";
import type { TensorType } from "../core/tensor-type";
import {
  acceptsElementType,
  describeElementTypeRule,
  getBinaryOpSpec,
} from "../ops/registry";
import type { BinaryOpKind } from "../ops/types";
import { BroadcastError } from "./engine-errors";

/**
 * Strictly increasing result-dimension indices, one per dimension of the
 * lower-rank operand.
 */
export type DimensionMap = readonly number[];

/**
 * Combine one aligned pair of dimensions, or return null when they cannot
 * be broadcast together.
 *
 * An unknown extent against a fixed extent greater than 1 resolves to the
 * fixed extent (the unknown one must be 1 or equal at run time); against 1
 * or 0 it stays unknown.
 */
export function broadcastDim(a: Dim, b: Dim): Dim | null {
  if (a === b) return a;
  if (a === DYNAMIC) return b > 1 ? b : DYNAMIC;
  if (b === DYNAMIC) return a > 1 ? a : DYNAMIC;
  if (a === 1) return b;
  if (b === 1) return a;
  return null;
}

/**
 * Result-dimension index each dimension of an operand aligns to: the map
 * when the operand is the lower-rank one, right alignment otherwise.
 * Assumes the map has already been validated.
 */
export function alignmentFor(
  operandRank: number,
  resultRank: number,
  broadcastDims?: DimensionMap,
): number[] {
  if (broadcastDims && operandRank < resultRank) {
    return broadcastDims.slice();
  }
  const offset = resultRank - operandRank;
  return Array.from({ length: operandRank }, (_, i) => offset + i);
}

function resolveImplicit(lhs: Shape, rhs: Shape, map?: DimensionMap): Shape | BroadcastError {
  const outRank = Math.max(lhs.length, rhs.length);
  const out = new Array<Dim>(outRank);
  for (let i = 0; i < outRank; i += 1) {
    const aDim: Dim | undefined = lhs[lhs.length - 1 - i];
    const bDim: Dim | undefined = rhs[rhs.length - 1 - i];
    const outIndex = outRank - 1 - i;
    if (aDim === undefined || bDim === undefined) {
      // Leading dimension of the larger operand, no counterpart.
      out[outIndex] = aDim ?? bDim ?? 1;
      continue;
    }
    const dim = broadcastDim(aDim, bDim);
    if (dim === null) {
      return new BroadcastError({
        kind: "RankMismatchOrIncompatibleDims",
        detail:
          `cannot broadcast dimension ${outIndex}: ` +
          `${formatDim(aDim)} vs ${formatDim(bDim)}`,
        lhs,
        rhs,
        broadcastDims: map,
      });
    }
    out[outIndex] = dim;
  }
  return makeShape(out);
}

function invalidMap(
  lhs: Shape,
  rhs: Shape,
  map: DimensionMap,
  detail: string,
  offendingEntries: number[],
): BroadcastError {
  return new BroadcastError({
    kind: "InvalidBroadcastDimensions",
    detail,
    lhs,
    rhs,
    broadcastDims: map,
    offendingEntries,
  });
}

function validateMap(
  lhs: Shape,
  rhs: Shape,
  map: DimensionMap,
  lowerRank: number,
  resultRank: number,
): BroadcastError | null {
  if (map.length !== lowerRank) {
    return invalidMap(
      lhs,
      rhs,
      map,
      `broadcast_dimensions has ${map.length} entries, expected ${lowerRank}`,
      [],
    );
  }
  const outOfRange = map
    .map((entry, i) => ({ entry, i }))
    .filter(({ entry }) => !Number.isInteger(entry) || entry < 0 || entry >= resultRank)
    .map(({ i }) => i);
  if (outOfRange.length > 0) {
    const shown = outOfRange.map((i) => map[i]).join(", ");
    return invalidMap(
      lhs,
      rhs,
      map,
      `broadcast_dimensions entries [${shown}] out of range [0, ${resultRank})`,
      outOfRange,
    );
  }
  for (let i = 1; i < map.length; i += 1) {
    if (map[i] <= map[i - 1]) {
      return invalidMap(
        lhs,
        rhs,
        map,
        `broadcast_dimensions must be strictly increasing: ` +
          `entry ${i} (${map[i]}) follows ${map[i - 1]}`,
        [i - 1, i],
      );
    }
  }
  return null;
}

/**
 * Resolve the result shape of broadcasting `lhs` against `rhs`.
 *
 * Without a map the lower-rank operand is right-aligned under the larger.
 * With a map, dimension `i` of the lower-rank operand aligns to result
 * dimension `map[i]`; equal-rank operands accept only the identity map.
 */
export function resolveBroadcastShape(
  lhs: Shape,
  rhs: Shape,
  broadcastDims?: DimensionMap,
): Shape | BroadcastError {
  if (broadcastDims === undefined) {
    return resolveImplicit(lhs, rhs);
  }

  const map = broadcastDims;
  if (lhs.length === rhs.length) {
    const nonIdentity = map
      .map((entry, i) => ({ entry, i }))
      .filter(({ entry, i }) => entry !== i)
      .map(({ i }) => i);
    if (map.length !== lhs.length || nonIdentity.length > 0) {
      return invalidMap(
        lhs,
        rhs,
        map,
        "broadcast_dimensions must be the identity map for operands of equal rank",
        nonIdentity,
      );
    }
    return resolveImplicit(lhs, rhs, map);
  }

  const lhsIsLower = lhs.length < rhs.length;
  const lower = lhsIsLower ? lhs : rhs;
  const higher = lhsIsLower ? rhs : lhs;
  const mapError = validateMap(lhs, rhs, map, lower.length, higher.length);
  if (mapError) return mapError;

  const out = higher.slice();
  for (let i = 0; i < lower.length; i += 1) {
    const target = map[i];
    const dim = broadcastDim(lower[i], higher[target]);
    if (dim === null) {
      return invalidMap(
        lhs,
        rhs,
        map,
        `dimension ${i} of the lower-rank operand (${formatDim(lower[i])}) ` +
          `cannot map to result dimension ${target} (${formatDim(higher[target])})`,
        [i],
      );
    }
    out[target] = dim;
  }
  return makeShape(out);
}

function checkElementTypes(
  op: BinaryOpKind,
  lhs: TensorType,
  rhs: TensorType,
  map?: DimensionMap,
): BroadcastError | null {
  const rule = getBinaryOpSpec(op).elementTypes;
  const fail = (detail: string) =>
    new BroadcastError({
      kind: "ElementTypeMismatch",
      detail,
      lhs: lhs.shape,
      rhs: rhs.shape,
      op,
      broadcastDims: map,
    });
  if (lhs.dtype !== rhs.dtype) {
    return fail(`element types ${lhs.dtype} and ${rhs.dtype} differ`);
  }
  if (!acceptsElementType(rule, lhs.dtype)) {
    return fail(
      `requires ${describeElementTypeRule(rule)} element types, got ${lhs.dtype}`,
    );
  }
  return null;
}

/**
 * Resolve the full result type of a client op. Shape errors take
 * precedence over element type errors when both apply.
 */
export function resolveBinaryOp(
  op: BinaryOpKind,
  lhs: TensorType,
  rhs: TensorType,
  broadcastDims?: DimensionMap,
): TensorType | BroadcastError {
  const shape = resolveBroadcastShape(lhs.shape, rhs.shape, broadcastDims);
  if (shape instanceof BroadcastError) {
    return shape.withOperator(op);
  }
  const dtypeError = checkElementTypes(op, lhs, rhs, broadcastDims);
  if (dtypeError) return dtypeError;
  const dtype: DType = lhs.dtype;
  return Object.freeze({ shape, dtype });
}
