export const BINARY_OP_KINDS = [
  "add",
  "subtract",
  "multiply",
  "divide",
  "power",
  "remainder",
  "atan2",
  "max",
  "min",
  "shift_left",
  "shift_right_arithmetic",
  "shift_right_logical",
  "and",
  "or",
  "xor",
] as const;

export type BinaryOpKind = (typeof BINARY_OP_KINDS)[number];

export type OpFamily = "arithmetic" | "shift" | "logic";

/**
 * Element types accepted on both operands. Both operands must always carry
 * the same element type; this narrows which one.
 */
export type ElementTypeRule = "numeric" | "integer" | "integer_or_bool";

export type BinaryOpSpec = {
  family: OpFamily;
  elementTypes: ElementTypeRule;
  commutative: boolean;
  /** Mnemonic of the same-shape op this lowers to. */
  canonical: string;
};
