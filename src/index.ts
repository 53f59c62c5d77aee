export * from "./engine";
export { type BcastirConfig, config, readConfig } from "./core/config";
export { debugLog, isDebugEnabled, setDebugEnabled } from "./core/debug";
export {
  type DType,
  DTYPES,
  isBoolDType,
  isDType,
  isFloatDType,
  isIntegerDType,
  isNumericDType,
} from "./core/dtype";
export {
  type Dim,
  dimAt,
  DYNAMIC,
  formatShape,
  hasDynamicDims,
  isDynamicDim,
  makeShape,
  rank,
  type Shape,
  shapesEqual,
  shapesIdentical,
} from "./core/shape";
export {
  formatTensorType,
  type TensorType,
  tensorType,
  tensorTypesIdentical,
} from "./core/tensor-type";
export {
  BINARY_OPS,
  binaryOpForCanonical,
  getBinaryOpSpec,
  isBinaryOpKind,
  isCommutative,
} from "./ops/registry";
export {
  BINARY_OP_KINDS,
  type BinaryOpKind,
  type BinaryOpSpec,
  type ElementTypeRule,
  type OpFamily,
} from "./ops/types";
export {
  type Diagnostic,
  type DiagnosticKind,
  formatDiagnostic,
  parseModule,
  parseModuleOrThrow,
  type ParseResult,
} from "./text/parser";
export { printFunction, printModule, printNode } from "./text/printer";
