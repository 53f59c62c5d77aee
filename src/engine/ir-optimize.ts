/**
 * Canonical IR cleanup
 *
 * Implements:
 * - CSE (Common Subexpression Elimination); every node kind is pure
 * - Commutative operand normalization for CSE keys
 * - Dead code elimination from the function results
 */

import { formatTensorType } from "../core/tensor-type";
import { debugLog } from "../core/debug";
import { isCommutative } from "../ops/registry";
import { type IRFunction, type IRNode, mnemonicOf, type ValueId } from "./ir";

// ============================================================================
// CSE Key Generation
// ============================================================================

/**
 * Generate a CSE key for a node.
 * Nodes with the same key compute the same value.
 */
export function generateCSEKey(
  node: IRNode,
  valueToCSEId: ReadonlyMap<ValueId, ValueId>,
): string {
  let inputs = node.inputs.map((id) => valueToCSEId.get(id) ?? id);
  if (node.kind !== "reshape" && node.kind !== "expand" && isCommutative(node.op)) {
    inputs = inputs.slice().sort((a, b) => a - b);
  }

  let attrs = "";
  if (node.kind === "broadcast_binary" && node.broadcastDims) {
    attrs = `{${node.broadcastDims.join(",")}}`;
  }

  return `${mnemonicOf(node)}[${inputs.join(",")}]${attrs}(${formatTensorType(node.type)})`;
}

// ============================================================================
// Common Subexpression Elimination
// ============================================================================

/**
 * Result of CSE optimization.
 */
export type CSEResult = {
  fn: IRFunction;
  eliminatedNodes: ValueId[];
  cseMapping: Map<ValueId, ValueId>; // Original ID -> CSE'd ID
  stats: {
    originalNodeCount: number;
    optimizedNodeCount: number;
    eliminatedCount: number;
  };
};

/**
 * Perform Common Subexpression Elimination on a function.
 *
 * Nodes with identical (mnemonic, inputs, attributes, type) are merged
 * into the first occurrence; commutative ops match with swapped inputs.
 */
export function performCSE(fn: IRFunction): CSEResult {
  const cseKeyToId = new Map<string, ValueId>();
  const valueToCSEId = new Map<ValueId, ValueId>();
  const eliminatedNodes: ValueId[] = [];
  const keptNodes: IRNode[] = [];

  for (const node of fn.nodes) {
    const key = generateCSEKey(node, valueToCSEId);
    const existingId = cseKeyToId.get(key);

    if (existingId !== undefined) {
      valueToCSEId.set(node.id, existingId);
      eliminatedNodes.push(node.id);
    } else {
      cseKeyToId.set(key, node.id);
      valueToCSEId.set(node.id, node.id);
      keptNodes.push(node);
    }
  }

  // Rewrite inputs in kept nodes
  const remap = (id: ValueId) => valueToCSEId.get(id) ?? id;
  const optimizedNodes = keptNodes.map((node): IRNode => {
    switch (node.kind) {
      case "broadcast_binary":
      case "elementwise":
        return { ...node, inputs: [remap(node.inputs[0]), remap(node.inputs[1])] };
      case "reshape":
      case "expand":
        return { ...node, inputs: [remap(node.inputs[0])] };
    }
  });

  return {
    fn: {
      ...fn,
      nodes: optimizedNodes,
      results: fn.results.map(remap),
    },
    eliminatedNodes,
    cseMapping: valueToCSEId,
    stats: {
      originalNodeCount: fn.nodes.length,
      optimizedNodeCount: optimizedNodes.length,
      eliminatedCount: eliminatedNodes.length,
    },
  };
}

// ============================================================================
// Dead Code Elimination
// ============================================================================

/**
 * Result of DCE optimization.
 */
export type DCEResult = {
  fn: IRFunction;
  eliminatedNodes: ValueId[];
  stats: {
    originalNodeCount: number;
    optimizedNodeCount: number;
    eliminatedCount: number;
  };
};

/**
 * Perform Dead Code Elimination on a function.
 *
 * Keeps every node transitively reachable from the function results.
 * Parameters are never removed.
 */
export function performDCE(fn: IRFunction): DCEResult {
  const reachable = new Set<ValueId>(fn.results);

  // Nodes are in SSA order, so one backwards sweep reaches a fixed point
  for (let i = fn.nodes.length - 1; i >= 0; i--) {
    const node = fn.nodes[i];
    if (!reachable.has(node.id)) continue;
    for (const inputId of node.inputs) {
      reachable.add(inputId);
    }
  }

  const keptNodes = fn.nodes.filter((n) => reachable.has(n.id));
  const eliminatedNodes = fn.nodes.filter((n) => !reachable.has(n.id)).map((n) => n.id);

  return {
    fn: { ...fn, nodes: keptNodes },
    eliminatedNodes,
    stats: {
      originalNodeCount: fn.nodes.length,
      optimizedNodeCount: keptNodes.length,
      eliminatedCount: eliminatedNodes.length,
    },
  };
}

// ============================================================================
// Full IR Optimization Pipeline
// ============================================================================

/**
 * Options for IR optimization.
 */
export type OptimizeOptions = {
  enableCSE?: boolean;
  enableDCE?: boolean;
};

/**
 * Result of full optimization pipeline.
 */
export type OptimizeResult = {
  fn: IRFunction;
  cse?: CSEResult;
  dce?: DCEResult;
  stats: {
    originalNodeCount: number;
    finalNodeCount: number;
    cseEliminated: number;
    dceEliminated: number;
  };
};

/**
 * Run CSE then DCE over one function.
 */
export function optimizeIR(fn: IRFunction, options: OptimizeOptions = {}): OptimizeResult {
  const { enableCSE = true, enableDCE = true } = options;

  let current = fn;
  let cseResult: CSEResult | undefined;
  let dceResult: DCEResult | undefined;

  if (enableCSE) {
    cseResult = performCSE(current);
    current = cseResult.fn;
  }

  if (enableDCE) {
    dceResult = performDCE(current);
    current = dceResult.fn;
  }

  const stats = {
    originalNodeCount: fn.nodes.length,
    finalNodeCount: current.nodes.length,
    cseEliminated: cseResult?.stats.eliminatedCount ?? 0,
    dceEliminated: dceResult?.stats.eliminatedCount ?? 0,
  };
  debugLog(
    "optimize",
    `@${fn.name}: ${stats.originalNodeCount} -> ${stats.finalNodeCount} nodes ` +
      `(cse ${stats.cseEliminated}, dce ${stats.dceEliminated})`,
  );

  return { fn: current, cse: cseResult, dce: dceResult, stats };
}
