import type { DType } from "../core/dtype";
import { makeShape, type Shape } from "../core/shape";
import { type TensorType, tensorType } from "../core/tensor-type";
import type { BinaryOpKind } from "../ops/types";
import { type DimensionMap, resolveBinaryOp } from "./broadcast";
import { BroadcastError, InternalConsistencyError } from "./engine-errors";
import type {
  BroadcastBinaryNode,
  IRFunction,
  IRNode,
  IRValue,
  ValueId,
} from "./ir";
import { verifyNode } from "./verify";

/**
 * Builds one IRFunction in SSA order. Client op result types are always
 * derived by the resolver; canonical ops are verified as they are added.
 */
export class FunctionBuilder {
  private nextId = 0;
  private readonly params: IRValue[] = [];
  private readonly nodes: IRNode[] = [];
  private readonly types = new Map<ValueId, TensorType>();

  constructor(readonly name: string) {}

  typeOf(id: ValueId): TensorType {
    const type = this.types.get(id);
    if (!type) {
      throw new InternalConsistencyError(`@${this.name}: unknown value %${id}`);
    }
    return type;
  }

  param(dims: Iterable<number>, dtype: DType): ValueId {
    const value: IRValue = { id: this.nextId++, type: tensorType(dims, dtype) };
    this.params.push(value);
    this.types.set(value.id, value.type);
    return value.id;
  }

  /** @throws BroadcastError when the operands cannot be combined. */
  broadcastBinary(
    op: BinaryOpKind,
    lhs: ValueId,
    rhs: ValueId,
    broadcastDims?: DimensionMap,
  ): ValueId {
    const resolved = resolveBinaryOp(op, this.typeOf(lhs), this.typeOf(rhs), broadcastDims);
    if (resolved instanceof BroadcastError) {
      throw resolved;
    }
    const node: BroadcastBinaryNode = {
      id: this.nextId,
      kind: "broadcast_binary",
      op,
      inputs: [lhs, rhs],
      type: resolved,
    };
    if (broadcastDims) {
      node.broadcastDims = Object.freeze(broadcastDims.slice());
    }
    return this.push(node);
  }

  elementwise(op: BinaryOpKind, lhs: ValueId, rhs: ValueId): ValueId {
    return this.push({
      id: this.nextId,
      kind: "elementwise",
      op,
      inputs: [lhs, rhs],
      type: this.typeOf(lhs),
    });
  }

  reshape(input: ValueId, shape: Shape): ValueId {
    return this.push({
      id: this.nextId,
      kind: "reshape",
      inputs: [input],
      type: Object.freeze({ shape: makeShape(shape), dtype: this.typeOf(input).dtype }),
    });
  }

  expand(input: ValueId, shape: Shape): ValueId {
    return this.push({
      id: this.nextId,
      kind: "expand",
      inputs: [input],
      type: Object.freeze({ shape: makeShape(shape), dtype: this.typeOf(input).dtype }),
    });
  }

  build(results: ValueId[]): IRFunction {
    for (const id of results) this.typeOf(id);
    return {
      name: this.name,
      params: this.params.slice(),
      nodes: this.nodes.slice(),
      results: results.slice(),
    };
  }

  private push(node: IRNode): ValueId {
    verifyNode(
      node,
      node.inputs.map((id) => this.typeOf(id)),
    );
    this.nodes.push(node);
    this.types.set(node.id, node.type);
    this.nextId += 1;
    return node.id;
  }
}
