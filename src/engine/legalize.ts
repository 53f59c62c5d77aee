/**
 * Broadcast legalization
 *
 * Rewrites every client (broadcasting) binary op into canonical form:
 * 1. Resolves the result type of the client op
 * 2. For each operand whose shape differs from the result, inserts
 *    ew.reshape (size-1 dims in every unmapped result slot) and then
 *    ew.expand (degenerate dims widened to the result extents)
 * 3. Emits the same-shape ew.<op> over the aligned operands
 *
 * The canonical op keeps the client op's id, so consumers and function
 * results stay bound to it. Alignment nodes take fresh ids.
 */

import { makeShape, type Shape, shapesEqual } from "../core/shape";
import { formatTensorType, type TensorType } from "../core/tensor-type";
import { debugLog } from "../core/debug";
import { alignmentFor, resolveBinaryOp } from "./broadcast";
import { BroadcastError, InternalConsistencyError } from "./engine-errors";
import {
  type BroadcastBinaryNode,
  collectValueTypes,
  type ElementwiseNode,
  type IRFunction,
  type IRModule,
  type IRNode,
  isBroadcastBinary,
  maxValueId,
  type ValueId,
} from "./ir";

export type LegalizeResult = {
  fn: IRFunction;
  /** Number of client ops rewritten */
  rewritten: number;
  reshapesInserted: number;
  expandsInserted: number;
  modified: boolean;
};

export type LegalizeModuleResult = {
  module: IRModule;
  functions: LegalizeResult[];
  modified: boolean;
};

/**
 * Shape an operand takes once size-1 dims fill every result slot it does
 * not map to.
 */
export function insertDegenerateDims(
  operand: Shape,
  resultRank: number,
  alignment: readonly number[],
): Shape {
  const out = new Array<number>(resultRank).fill(1);
  alignment.forEach((target, i) => {
    out[target] = operand[i];
  });
  return makeShape(out);
}

type AlignmentPlan = {
  reshapeTo?: Shape;
  expandTo?: Shape;
};

/**
 * Work out which alignment steps bring `operand` to `result`. Empty when
 * the operand already has the result shape.
 */
export function planAlignment(
  operand: Shape,
  result: Shape,
  alignment: readonly number[],
): AlignmentPlan {
  if (shapesEqual(operand, result)) {
    return {};
  }
  const plan: AlignmentPlan = {};
  let current = operand;
  if (operand.length < result.length) {
    current = insertDegenerateDims(operand, result.length, alignment);
    plan.reshapeTo = current;
  }
  if (!shapesEqual(current, result)) {
    plan.expandTo = result;
  }
  return plan;
}

class FunctionRewriter {
  private nextId: number;
  readonly nodes: IRNode[] = [];
  reshapesInserted = 0;
  expandsInserted = 0;

  constructor(private readonly fn: IRFunction) {
    this.nextId = maxValueId(fn) + 1;
  }

  align(
    input: ValueId,
    inputType: TensorType,
    resultType: TensorType,
    alignment: readonly number[],
  ): ValueId {
    const plan = planAlignment(inputType.shape, resultType.shape, alignment);
    let current = input;
    if (plan.reshapeTo) {
      current = this.emit("reshape", current, plan.reshapeTo, inputType);
      this.reshapesInserted++;
    }
    if (plan.expandTo) {
      current = this.emit("expand", current, plan.expandTo, inputType);
      this.expandsInserted++;
    }
    return current;
  }

  private emit(
    kind: "reshape" | "expand",
    input: ValueId,
    shape: Shape,
    inputType: TensorType,
  ): ValueId {
    const id = this.nextId++;
    this.nodes.push({
      id,
      kind,
      inputs: [input],
      type: Object.freeze({ shape, dtype: inputType.dtype }),
    });
    return id;
  }

  lower(node: BroadcastBinaryNode, lhsType: TensorType, rhsType: TensorType): ElementwiseNode {
    const resolved = resolveBinaryOp(node.op, lhsType, rhsType, node.broadcastDims);
    if (resolved instanceof BroadcastError) {
      throw new InternalConsistencyError(
        `@${this.fn.name}: %${node.id} reached legalization unverified: ${resolved.message}`,
      );
    }
    const resultRank = resolved.shape.length;
    const lhs = this.align(
      node.inputs[0],
      lhsType,
      resolved,
      alignmentFor(lhsType.shape.length, resultRank, node.broadcastDims),
    );
    const rhs = this.align(
      node.inputs[1],
      rhsType,
      resolved,
      alignmentFor(rhsType.shape.length, resultRank, node.broadcastDims),
    );
    return {
      id: node.id,
      kind: "elementwise",
      op: node.op,
      inputs: [lhs, rhs],
      type: resolved,
    };
  }
}

/**
 * Legalize one function. Functions without client ops come back
 * unchanged (same object, `modified: false`).
 */
export function legalizeFunction(fn: IRFunction): LegalizeResult {
  if (!fn.nodes.some(isBroadcastBinary)) {
    return { fn, rewritten: 0, reshapesInserted: 0, expandsInserted: 0, modified: false };
  }

  const types = collectValueTypes(fn);
  const typeOf = (id: ValueId): TensorType => {
    const type = types.get(id);
    if (!type) {
      throw new InternalConsistencyError(`@${fn.name}: unknown value %${id}`);
    }
    return type;
  };

  const rewriter = new FunctionRewriter(fn);
  let rewritten = 0;
  for (const node of fn.nodes) {
    if (!isBroadcastBinary(node)) {
      rewriter.nodes.push(node);
      continue;
    }
    const lowered = rewriter.lower(node, typeOf(node.inputs[0]), typeOf(node.inputs[1]));
    rewriter.nodes.push(lowered);
    rewritten++;
    debugLog(
      "legalize",
      `@${fn.name}: %${node.id} = ${node.op} -> ${formatTensorType(lowered.type)}`,
    );
  }

  return {
    fn: { ...fn, nodes: rewriter.nodes },
    rewritten,
    reshapesInserted: rewriter.reshapesInserted,
    expandsInserted: rewriter.expandsInserted,
    modified: true,
  };
}

/** Functions are independent compilation units; each is legalized on its own. */
export function legalizeModule(module: IRModule): LegalizeModuleResult {
  const functions = module.functions.map(legalizeFunction);
  return {
    module: { functions: functions.map((result) => result.fn) },
    functions,
    modified: functions.some((result) => result.modified),
  };
}
