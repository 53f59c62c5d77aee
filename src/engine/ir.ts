import type { TensorType } from "../core/tensor-type";
import { getBinaryOpSpec } from "../ops/registry";
import type { BinaryOpKind } from "../ops/types";
import type { DimensionMap } from "./broadcast";

/** SSA value id, printed `%N`. */
export type ValueId = number;

export type IRValue = {
  id: ValueId;
  type: TensorType;
};

/** Client op: operands may differ in shape. */
export type BroadcastBinaryNode = {
  id: ValueId;
  kind: "broadcast_binary";
  op: BinaryOpKind;
  inputs: [ValueId, ValueId];
  broadcastDims?: DimensionMap;
  type: TensorType;
};

/** Canonical op: operand and result types are identical. */
export type ElementwiseNode = {
  id: ValueId;
  kind: "elementwise";
  op: BinaryOpKind;
  inputs: [ValueId, ValueId];
  type: TensorType;
};

/** Inserts size-1 dimensions. */
export type ReshapeNode = {
  id: ValueId;
  kind: "reshape";
  inputs: [ValueId];
  type: TensorType;
};

/** Expands degenerate dimensions to the result extent, rank unchanged. */
export type ExpandNode = {
  id: ValueId;
  kind: "expand";
  inputs: [ValueId];
  type: TensorType;
};

export type IRNode = BroadcastBinaryNode | ElementwiseNode | ReshapeNode | ExpandNode;

export type IRNodeKind = IRNode["kind"];

/** One compilation unit. */
export type IRFunction = {
  name: string;
  params: IRValue[];
  nodes: IRNode[];
  results: ValueId[];
};

export type IRModule = {
  functions: IRFunction[];
};

export function isBroadcastBinary(node: IRNode): node is BroadcastBinaryNode {
  return node.kind === "broadcast_binary";
}

/** Every value's type, keyed by id: params first, then node results. */
export function collectValueTypes(fn: IRFunction): Map<ValueId, TensorType> {
  const types = new Map<ValueId, TensorType>();
  for (const param of fn.params) {
    types.set(param.id, param.type);
  }
  for (const node of fn.nodes) {
    types.set(node.id, node.type);
  }
  return types;
}

export function maxValueId(fn: IRFunction): ValueId {
  let max = -1;
  for (const param of fn.params) max = Math.max(max, param.id);
  for (const node of fn.nodes) max = Math.max(max, node.id);
  return max;
}

export function countNodes(fn: IRFunction, kind: IRNodeKind): number {
  return fn.nodes.filter((node) => node.kind === kind).length;
}

export function mnemonicOf(node: IRNode): string {
  switch (node.kind) {
    case "broadcast_binary":
      return node.op;
    case "elementwise":
      return getBinaryOpSpec(node.op).canonical;
    case "reshape":
      return "ew.reshape";
    case "expand":
      return "ew.expand";
  }
}
