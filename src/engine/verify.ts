/**
 * IR verification.
 *
 * Client ops are checked against the broadcast resolver; a resolver error
 * is a user error and is rethrown as-is. Anything else that is wrong (a
 * stored type that disagrees with the resolver, a malformed canonical op,
 * broken SSA) is a defect in whoever built the IR.
 */

import { DYNAMIC, formatShape, type Shape } from "../core/shape";
import {
  formatTensorType,
  type TensorType,
  tensorTypesIdentical,
} from "../core/tensor-type";
import {
  acceptsElementType,
  describeElementTypeRule,
  getBinaryOpSpec,
} from "../ops/registry";
import { resolveBinaryOp } from "./broadcast";
import { BroadcastError, InternalConsistencyError } from "./engine-errors";
import {
  type BroadcastBinaryNode,
  type IRFunction,
  type IRNode,
  isBroadcastBinary,
  mnemonicOf,
  type ValueId,
} from "./ir";

export function verifyBroadcastNode(
  node: BroadcastBinaryNode,
  lhs: TensorType,
  rhs: TensorType,
): void {
  const resolved = resolveBinaryOp(node.op, lhs, rhs, node.broadcastDims);
  if (resolved instanceof BroadcastError) {
    throw resolved;
  }
  if (!tensorTypesIdentical(resolved, node.type)) {
    throw new InternalConsistencyError(
      `%${node.id} = ${node.op}: stored result type ${formatTensorType(node.type)} ` +
        `disagrees with resolved ${formatTensorType(resolved)}`,
    );
  }
}

/** True when deleting some size-1 entries of `output` yields `input`. */
function onlyInsertsUnitDims(input: Shape, output: Shape): boolean {
  if (output.length < input.length) return false;
  let i = 0;
  for (const dim of output) {
    if (i < input.length && dim === input[i]) {
      i += 1;
    } else if (dim !== 1) {
      return false;
    }
  }
  return i === input.length;
}

function expandsTo(input: Shape, output: Shape): boolean {
  if (input.length !== output.length) return false;
  return input.every((dim, i) => {
    const out = output[i];
    return dim === out || dim === 1 || dim === DYNAMIC || out === DYNAMIC;
  });
}

/**
 * Check a canonical node against its operand types. Returns a description
 * of the problem, or null when the node is well-formed.
 */
export function checkCanonicalNode(
  node: IRNode,
  operandTypes: readonly TensorType[],
): string | null {
  const mnemonic = mnemonicOf(node);
  if (operandTypes.length !== node.inputs.length) {
    return `${mnemonic} expects ${node.inputs.length} operands, got ${operandTypes.length}`;
  }
  switch (node.kind) {
    case "broadcast_binary":
      return `${mnemonic} is not a canonical op`;
    case "elementwise": {
      const [lhs, rhs] = operandTypes;
      if (!tensorTypesIdentical(lhs, rhs) || !tensorTypesIdentical(lhs, node.type)) {
        return (
          `${mnemonic} requires identical operand and result types, got ` +
          `(${formatTensorType(lhs)}, ${formatTensorType(rhs)}) -> ${formatTensorType(node.type)}`
        );
      }
      const rule = getBinaryOpSpec(node.op).elementTypes;
      if (!acceptsElementType(rule, lhs.dtype)) {
        return `${mnemonic} requires ${describeElementTypeRule(rule)} element types, got ${lhs.dtype}`;
      }
      return null;
    }
    case "reshape":
    case "expand": {
      const [input] = operandTypes;
      if (input.dtype !== node.type.dtype) {
        return `${mnemonic} cannot change element type ${input.dtype} to ${node.type.dtype}`;
      }
      const legal =
        node.kind === "reshape"
          ? onlyInsertsUnitDims(input.shape, node.type.shape)
          : expandsTo(input.shape, node.type.shape);
      if (!legal) {
        return (
          `${mnemonic} cannot take ${formatShape(input.shape)} ` +
          `to ${formatShape(node.type.shape)}`
        );
      }
      return null;
    }
  }
}

export function verifyNode(node: IRNode, operandTypes: readonly TensorType[]): void {
  if (node.kind === "broadcast_binary") {
    const [lhs, rhs] = operandTypes;
    if (!lhs || !rhs) {
      throw new InternalConsistencyError(`%${node.id} = ${node.op} is missing operand types`);
    }
    verifyBroadcastNode(node, lhs, rhs);
    return;
  }
  const problem = checkCanonicalNode(node, operandTypes);
  if (problem !== null) {
    throw new InternalConsistencyError(`%${node.id}: ${problem}`);
  }
}

export type VerifyOptions = {
  /** Reject client ops that have not been legalized. */
  canonical?: boolean;
};

/**
 * Verify a whole function: SSA form (unique ids, defined before use,
 * results defined) and every node.
 */
export function verifyFunction(fn: IRFunction, options: VerifyOptions = {}): void {
  const types = new Map<ValueId, TensorType>();
  const define = (id: ValueId, type: TensorType) => {
    if (types.has(id)) {
      throw new InternalConsistencyError(`@${fn.name}: value %${id} defined twice`);
    }
    types.set(id, type);
  };

  for (const param of fn.params) {
    define(param.id, param.type);
  }
  for (const node of fn.nodes) {
    if (options.canonical && isBroadcastBinary(node)) {
      throw new InternalConsistencyError(
        `@${fn.name}: %${node.id} = ${node.op} survived legalization`,
      );
    }
    const operandTypes = node.inputs.map((id) => {
      const type = types.get(id);
      if (!type) {
        throw new InternalConsistencyError(
          `@${fn.name}: %${node.id} uses %${id} before its definition`,
        );
      }
      return type;
    });
    verifyNode(node, operandTypes);
    define(node.id, node.type);
  }
  for (const id of fn.results) {
    if (!types.has(id)) {
      throw new InternalConsistencyError(`@${fn.name}: returns undefined value %${id}`);
    }
  }
}
