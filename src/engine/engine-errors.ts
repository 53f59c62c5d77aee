import { formatShape, type Shape } from "../core/shape";

export type BroadcastErrorKind =
  | "RankMismatchOrIncompatibleDims"
  | "InvalidBroadcastDimensions"
  | "ElementTypeMismatch";

export type BroadcastErrorInfo = {
  kind: BroadcastErrorKind;
  detail: string;
  lhs: Shape;
  rhs: Shape;
  op?: string;
  broadcastDims?: readonly number[];
  /** Indices into broadcastDims of the malformed entries. */
  offendingEntries?: readonly number[];
};

function composeMessage(info: BroadcastErrorInfo): string {
  const prefix = info.op ? `${info.op}: ` : "";
  let operands = `lhs ${formatShape(info.lhs)}, rhs ${formatShape(info.rhs)}`;
  if (info.broadcastDims) {
    operands += `, broadcast_dimensions [${info.broadcastDims.join(", ")}]`;
  }
  return `${prefix}${info.detail} (${operands})`;
}

/**
 * A user-facing legality failure. Aborts construction of the one operation
 * it describes; callers may report it and carry on.
 */
export class BroadcastError extends Error {
  name = "BroadcastError";
  readonly kind: BroadcastErrorKind;
  readonly op: string | undefined;
  readonly lhs: Shape;
  readonly rhs: Shape;
  readonly broadcastDims: readonly number[] | undefined;
  readonly offendingEntries: readonly number[];
  readonly detail: string;

  constructor(info: BroadcastErrorInfo) {
    super(composeMessage(info));
    this.kind = info.kind;
    this.op = info.op;
    this.lhs = info.lhs;
    this.rhs = info.rhs;
    this.broadcastDims = info.broadcastDims;
    this.offendingEntries = info.offendingEntries ?? [];
    this.detail = info.detail;
  }

  withOperator(op: string): BroadcastError {
    return new BroadcastError({
      kind: this.kind,
      detail: this.detail,
      lhs: this.lhs,
      rhs: this.rhs,
      op,
      broadcastDims: this.broadcastDims,
      offendingEntries: this.offendingEntries,
    });
  }
}

/**
 * A builder or pass produced IR that contradicts the resolver. Never
 * expected in normal operation; aborts the whole pass.
 */
export class InternalConsistencyError extends Error {
  name = "InternalConsistencyError";
}

/** Malformed text. `line` and `column` are 1-based. */
export class ParseError extends Error {
  name = "ParseError";
  readonly reason: string;
  readonly line: number;
  readonly column: number;

  constructor(reason: string, line: number, column: number) {
    super(`${line}:${column}: ${reason}`);
    this.reason = reason;
    this.line = line;
    this.column = column;
  }
}
