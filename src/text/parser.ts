/**
 * Parser for the textual IR.
 *
 * Errors in one operation line never stop the parse: the line is reported
 * as a diagnostic, left out of the module, and later uses of the value it
 * would have defined are dropped silently.
 */

import {
  formatTensorType,
  type TensorType,
  tensorTypesIdentical,
} from "../core/tensor-type";
import { resolveBinaryOp } from "../engine/broadcast";
import {
  BroadcastError,
  type BroadcastErrorKind,
  ParseError,
} from "../engine/engine-errors";
import type {
  BroadcastBinaryNode,
  IRFunction,
  IRModule,
  IRNode,
  IRValue,
  ValueId,
} from "../engine/ir";
import { checkCanonicalNode } from "../engine/verify";
import { binaryOpForCanonical, isBinaryOpKind } from "../ops/registry";
import { LineScanner } from "./scanner";

export type DiagnosticKind = BroadcastErrorKind | "ParseError";

export type Diagnostic = {
  line: number;
  column: number;
  kind: DiagnosticKind;
  message: string;
  /** The resolver error behind a broadcast diagnostic. */
  cause?: BroadcastError;
};

export type ParseResult = {
  module: IRModule;
  diagnostics: Diagnostic[];
};

export function formatDiagnostic(diagnostic: Diagnostic): string {
  return `${diagnostic.line}:${diagnostic.column}: ${diagnostic.kind}: ${diagnostic.message}`;
}

type Operand = { id: ValueId; column: number };

type RawOperation = {
  id: ValueId;
  idColumn: number;
  mnemonic: string;
  mnemonicColumn: number;
  operands: Operand[];
  broadcastDims?: number[];
  attrColumn?: number;
  operandTypes: TensorType[];
  resultType: TensorType;
  resultColumn: number;
};

function parseOperationLine(scanner: LineScanner): RawOperation {
  const idColumn = scanner.column;
  const id = scanner.expectValueRef();
  scanner.expect("=");
  scanner.skipWhitespace();
  const mnemonicColumn = scanner.column;
  const mnemonic = scanner.expectIdentifier("operation name");

  scanner.expect("(");
  const operands: Operand[] = [];
  if (!scanner.accept(")")) {
    do {
      scanner.skipWhitespace();
      operands.push({ column: scanner.column, id: scanner.expectValueRef() });
    } while (scanner.accept(","));
    scanner.expect(")");
  }

  let broadcastDims: number[] | undefined;
  let attrColumn: number | undefined;
  if (scanner.accept("{")) {
    attrColumn = scanner.column - 1;
    const attrName = scanner.expectIdentifier("attribute name");
    if (attrName !== "broadcast_dimensions") {
      throw scanner.error(`unknown attribute '${attrName}'`, attrColumn + 1);
    }
    scanner.expect("=");
    broadcastDims = scanner.expectIntegerList();
    scanner.expect("}");
  }

  scanner.expect(":");
  scanner.expect("(");
  const operandTypes: TensorType[] = [];
  if (!scanner.accept(")")) {
    do {
      operandTypes.push(scanner.expectTensorType());
    } while (scanner.accept(","));
    scanner.expect(")");
  }
  scanner.expect("->");
  scanner.skipWhitespace();
  const resultColumn = scanner.column;
  const resultType = scanner.expectTensorType();
  scanner.expectEnd();

  return {
    id,
    idColumn,
    mnemonic,
    mnemonicColumn,
    operands,
    broadcastDims,
    attrColumn,
    operandTypes,
    resultType,
    resultColumn,
  };
}

function parseHeader(scanner: LineScanner): { name: string; params: IRValue[] } {
  scanner.expect("func");
  scanner.expect("@");
  const name = scanner.expectIdentifier("function name");
  scanner.expect("(");
  const params: IRValue[] = [];
  if (!scanner.accept(")")) {
    do {
      const id = scanner.expectValueRef();
      scanner.expect(":");
      params.push({ id, type: scanner.expectTensorType() });
    } while (scanner.accept(","));
    scanner.expect(")");
  }
  scanner.expect("{");
  scanner.expectEnd();
  return { name, params };
}

class FunctionParseState {
  readonly nodes: IRNode[] = [];
  results: ValueId[] = [];
  readonly types = new Map<ValueId, TensorType>();
  /** Values whose defining line was rejected. */
  readonly poisoned = new Set<ValueId>();

  constructor(
    readonly name: string,
    readonly params: IRValue[],
  ) {}

  isDefined(id: ValueId): boolean {
    return this.types.has(id) || this.poisoned.has(id);
  }

  finish(): IRFunction {
    return {
      name: this.name,
      params: this.params,
      nodes: this.nodes,
      results: this.results,
    };
  }
}

function buildNode(raw: RawOperation, lineNumber: number): IRNode {
  const operandCount = (expected: number) => {
    if (raw.operands.length !== expected) {
      throw new ParseError(
        `'${raw.mnemonic}' expects ${expected} operand${expected === 1 ? "" : "s"}, ` +
          `got ${raw.operands.length}`,
        lineNumber,
        raw.mnemonicColumn,
      );
    }
  };
  const noAttributes = () => {
    if (raw.broadcastDims !== undefined) {
      throw new ParseError(
        `'${raw.mnemonic}' does not take broadcast_dimensions`,
        lineNumber,
        raw.attrColumn ?? raw.mnemonicColumn,
      );
    }
  };
  const [lhs, rhs] = raw.operands.map((operand) => operand.id);

  if (isBinaryOpKind(raw.mnemonic)) {
    operandCount(2);
    const node: BroadcastBinaryNode = {
      id: raw.id,
      kind: "broadcast_binary",
      op: raw.mnemonic,
      inputs: [lhs, rhs],
      type: raw.resultType,
    };
    if (raw.broadcastDims !== undefined) {
      node.broadcastDims = Object.freeze(raw.broadcastDims);
    }
    return node;
  }

  noAttributes();
  const canonicalOp = binaryOpForCanonical(raw.mnemonic);
  if (canonicalOp) {
    operandCount(2);
    return {
      id: raw.id,
      kind: "elementwise",
      op: canonicalOp,
      inputs: [lhs, rhs],
      type: raw.resultType,
    };
  }
  if (raw.mnemonic === "ew.reshape" || raw.mnemonic === "ew.expand") {
    operandCount(1);
    return {
      id: raw.id,
      kind: raw.mnemonic === "ew.reshape" ? "reshape" : "expand",
      inputs: [lhs],
      type: raw.resultType,
    };
  }
  throw new ParseError(`unknown operation '${raw.mnemonic}'`, lineNumber, raw.mnemonicColumn);
}

/**
 * Parse a module. Never throws for malformed input; see `diagnostics`.
 */
export function parseModule(text: string): ParseResult {
  const diagnostics: Diagnostic[] = [];
  const functions: IRFunction[] = [];
  const functionNames = new Set<string>();
  const report = (error: ParseError) => {
    diagnostics.push({
      line: error.line,
      column: error.column,
      kind: "ParseError",
      message: error.reason,
    });
  };

  let current: FunctionParseState | undefined;
  let currentLine = 0;
  let skippingBody = false;
  const lines = text.split("\n");

  for (let i = 0; i < lines.length; i++) {
    const lineNumber = i + 1;
    const line = lines[i].replace(/\r$/, "");
    const trimmed = line.trim();
    if (trimmed === "" || trimmed.startsWith("//")) continue;

    if (skippingBody) {
      if (trimmed === "}") skippingBody = false;
      continue;
    }

    const scanner = new LineScanner(line, lineNumber);

    if (!current) {
      try {
        const header = parseHeader(scanner);
        if (functionNames.has(header.name)) {
          throw new ParseError(`function @${header.name} redefined`, lineNumber, 1);
        }
        current = new FunctionParseState(header.name, header.params);
        currentLine = lineNumber;
        const seen = new Set<ValueId>();
        for (const param of header.params) {
          if (seen.has(param.id)) {
            throw new ParseError(`value %${param.id} redefined`, lineNumber, 1);
          }
          seen.add(param.id);
          current.types.set(param.id, param.type);
        }
        functionNames.add(header.name);
      } catch (e) {
        if (!(e instanceof ParseError)) throw e;
        report(e);
        current = undefined;
        skippingBody = true;
      }
      continue;
    }

    if (trimmed === "}") {
      functions.push(current.finish());
      current = undefined;
      continue;
    }

    try {
      scanner.skipWhitespace();
      if (scanner.accept("return")) {
        parseReturn(scanner, current);
      } else {
        parseOperation(scanner, current, diagnostics);
      }
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      report(e);
    }
  }

  if (current) {
    diagnostics.push({
      line: currentLine,
      column: 1,
      kind: "ParseError",
      message: `function @${current.name} is missing its closing '}'`,
    });
    functions.push(current.finish());
  }

  return { module: { functions }, diagnostics };
}

function parseReturn(scanner: LineScanner, state: FunctionParseState): void {
  const results: ValueId[] = [];
  scanner.skipWhitespace();
  if (!scanner.isAtEnd) {
    do {
      scanner.skipWhitespace();
      const column = scanner.column;
      const id = scanner.expectValueRef();
      if (!state.isDefined(id)) {
        throw scanner.error(`use of undefined value %${id}`, column);
      }
      if (!state.poisoned.has(id)) results.push(id);
    } while (scanner.accept(","));
  }
  scanner.expectEnd();
  state.results = results;
}

function parseOperation(
  scanner: LineScanner,
  state: FunctionParseState,
  diagnostics: Diagnostic[],
): void {
  const lineNumber = scanner.lineNumber;
  const raw = parseOperationLine(scanner);

  if (state.isDefined(raw.id)) {
    throw new ParseError(`value %${raw.id} redefined`, lineNumber, raw.idColumn);
  }

  const operandTypes: TensorType[] = [];
  for (const operand of raw.operands) {
    if (state.poisoned.has(operand.id)) {
      state.poisoned.add(raw.id);
      return;
    }
    const type = state.types.get(operand.id);
    if (!type) {
      state.poisoned.add(raw.id);
      throw new ParseError(`use of undefined value %${operand.id}`, lineNumber, operand.column);
    }
    operandTypes.push(type);
  }

  let node: IRNode;
  try {
    node = buildNode(raw, lineNumber);
    if (raw.operandTypes.length !== operandTypes.length) {
      throw new ParseError(
        `expected ${operandTypes.length} operand types, got ${raw.operandTypes.length}`,
        lineNumber,
        raw.mnemonicColumn,
      );
    }
    raw.operandTypes.forEach((annotated, i) => {
      if (!tensorTypesIdentical(annotated, operandTypes[i])) {
        throw new ParseError(
          `operand %${raw.operands[i].id} has type ${formatTensorType(operandTypes[i])}, ` +
            `annotated ${formatTensorType(annotated)}`,
          lineNumber,
          raw.operands[i].column,
        );
      }
    });
  } catch (e) {
    state.poisoned.add(raw.id);
    throw e;
  }

  if (node.kind === "broadcast_binary") {
    const [lhs, rhs] = operandTypes;
    const resolved = resolveBinaryOp(node.op, lhs, rhs, node.broadcastDims);
    if (resolved instanceof BroadcastError) {
      state.poisoned.add(raw.id);
      diagnostics.push({
        line: lineNumber,
        column: raw.mnemonicColumn,
        kind: resolved.kind,
        message: resolved.message,
        cause: resolved,
      });
      return;
    }
    if (!tensorTypesIdentical(resolved, raw.resultType)) {
      state.poisoned.add(raw.id);
      throw new ParseError(
        `declared result type ${formatTensorType(raw.resultType)} does not match ` +
          `inferred ${formatTensorType(resolved)}`,
        lineNumber,
        raw.resultColumn,
      );
    }
  } else {
    const problem = checkCanonicalNode(node, operandTypes);
    if (problem !== null) {
      state.poisoned.add(raw.id);
      throw new ParseError(problem, lineNumber, raw.mnemonicColumn);
    }
  }

  state.nodes.push(node);
  state.types.set(node.id, node.type);
}

/**
 * Parse a module, throwing the first diagnostic: the resolver's
 * BroadcastError for legality failures, a ParseError otherwise.
 */
export function parseModuleOrThrow(text: string): IRModule {
  const { module, diagnostics } = parseModule(text);
  const [first] = diagnostics;
  if (first) {
    if (first.cause) throw first.cause;
    throw new ParseError(first.message, first.line, first.column);
  }
  return module;
}
