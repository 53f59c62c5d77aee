/**
 * Binary op registry: the single source of truth for every client op's
 * element-type constraint, commutativity and lowering target.
 *
 * Families:
 * - "arithmetic" : identical numeric element types
 * - "shift"      : identical integer element types
 * - "logic"      : identical integer-or-bool element types
 */

import {
  type DType,
  isBoolDType,
  isIntegerDType,
  isNumericDType,
} from "../core/dtype";
import {
  BINARY_OP_KINDS,
  type BinaryOpKind,
  type BinaryOpSpec,
  type ElementTypeRule,
} from "./types";

function arithmetic(op: BinaryOpKind, commutative: boolean): BinaryOpSpec {
  return { family: "arithmetic", elementTypes: "numeric", commutative, canonical: `ew.${op}` };
}

function shift(op: BinaryOpKind): BinaryOpSpec {
  return { family: "shift", elementTypes: "integer", commutative: false, canonical: `ew.${op}` };
}

function logic(op: BinaryOpKind): BinaryOpSpec {
  return { family: "logic", elementTypes: "integer_or_bool", commutative: true, canonical: `ew.${op}` };
}

export const BINARY_OPS: Readonly<Record<BinaryOpKind, BinaryOpSpec>> = {
  add: arithmetic("add", true),
  subtract: arithmetic("subtract", false),
  multiply: arithmetic("multiply", true),
  divide: arithmetic("divide", false),
  power: arithmetic("power", false),
  remainder: arithmetic("remainder", false),
  atan2: arithmetic("atan2", false),
  max: arithmetic("max", true),
  min: arithmetic("min", true),

  shift_left: shift("shift_left"),
  shift_right_arithmetic: shift("shift_right_arithmetic"),
  shift_right_logical: shift("shift_right_logical"),

  and: logic("and"),
  or: logic("or"),
  xor: logic("xor"),
};

export function isBinaryOpKind(value: string): value is BinaryOpKind {
  return BINARY_OP_KINDS.some((op) => op === value);
}

export function getBinaryOpSpec(op: BinaryOpKind): BinaryOpSpec {
  return BINARY_OPS[op];
}

export function isCommutative(op: BinaryOpKind): boolean {
  return BINARY_OPS[op].commutative;
}

const CANONICAL_TO_KIND: ReadonlyMap<string, BinaryOpKind> = new Map(
  BINARY_OP_KINDS.map((op) => [BINARY_OPS[op].canonical, op]),
);

/** Reverse lookup: `ew.add` → `add`. */
export function binaryOpForCanonical(mnemonic: string): BinaryOpKind | undefined {
  return CANONICAL_TO_KIND.get(mnemonic);
}

export function acceptsElementType(rule: ElementTypeRule, dtype: DType): boolean {
  switch (rule) {
    case "numeric":
      return isNumericDType(dtype);
    case "integer":
      return isIntegerDType(dtype);
    case "integer_or_bool":
      return isIntegerDType(dtype) || isBoolDType(dtype);
  }
}

export function describeElementTypeRule(rule: ElementTypeRule): string {
  switch (rule) {
    case "numeric":
      return "numeric";
    case "integer":
      return "integer";
    case "integer_or_bool":
      return "integer or bool";
  }
}
