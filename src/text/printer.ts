import { formatTensorType } from "../core/tensor-type";
import type { IRFunction, IRModule, IRNode, IRValue, ValueId } from "../engine/ir";
import { mnemonicOf } from "../engine/ir";

const INDENT = "  ";

export function formatValue(id: ValueId): string {
  return `%${id}`;
}

function formatParam(param: IRValue): string {
  return `${formatValue(param.id)}: ${formatTensorType(param.type)}`;
}

/**
 * One operation line, without indentation. Operand types are looked up
 * through `typeOf`.
 */
export function printNode(node: IRNode, typeOf: (id: ValueId) => string): string {
  const operands = node.inputs.map(formatValue).join(", ");
  const operandTypes = node.inputs.map(typeOf).join(", ");
  let attrs = "";
  if (node.kind === "broadcast_binary" && node.broadcastDims) {
    attrs = ` {broadcast_dimensions = [${node.broadcastDims.join(", ")}]}`;
  }
  return (
    `${formatValue(node.id)} = ${mnemonicOf(node)}(${operands})${attrs} : ` +
    `(${operandTypes}) -> ${formatTensorType(node.type)}`
  );
}

export function printFunction(fn: IRFunction): string {
  const types = new Map<ValueId, string>();
  for (const param of fn.params) types.set(param.id, formatTensorType(param.type));
  for (const node of fn.nodes) types.set(node.id, formatTensorType(node.type));
  const typeOf = (id: ValueId) => types.get(id) ?? "<undefined>";

  const lines = [`func @${fn.name}(${fn.params.map(formatParam).join(", ")}) {`];
  for (const node of fn.nodes) {
    lines.push(INDENT + printNode(node, typeOf));
  }
  const results = fn.results.map(formatValue).join(", ");
  lines.push(INDENT + (results ? `return ${results}` : "return"));
  lines.push("}");
  return lines.join("\n");
}

export function printModule(module: IRModule): string {
  if (module.functions.length === 0) return "";
  return `${module.functions.map(printFunction).join("\n\n")}\n`;
}
