export {
  alignmentFor,
  broadcastDim,
  type DimensionMap,
  resolveBinaryOp,
  resolveBroadcastShape,
} from "./broadcast";
export { FunctionBuilder } from "./builder";
export {
  BroadcastError,
  type BroadcastErrorInfo,
  type BroadcastErrorKind,
  InternalConsistencyError,
  ParseError,
} from "./engine-errors";
export {
  type BroadcastBinaryNode,
  collectValueTypes,
  countNodes,
  type ElementwiseNode,
  type ExpandNode,
  type IRFunction,
  type IRModule,
  type IRNode,
  type IRNodeKind,
  type IRValue,
  isBroadcastBinary,
  maxValueId,
  mnemonicOf,
  type ReshapeNode,
  type ValueId,
} from "./ir";
export {
  type CSEResult,
  type DCEResult,
  generateCSEKey,
  optimizeIR,
  type OptimizeOptions,
  type OptimizeResult,
  performCSE,
  performDCE,
} from "./ir-optimize";
export {
  insertDegenerateDims,
  legalizeFunction,
  legalizeModule,
  type LegalizeModuleResult,
  type LegalizeResult,
  planAlignment,
} from "./legalize";
export {
  type FunctionPipelineResult,
  type PipelineOptions,
  type PipelineResult,
  runFunctionPipeline,
  runPipeline,
} from "./pipeline";
export {
  checkCanonicalNode,
  verifyBroadcastNode,
  verifyFunction,
  verifyNode,
  type VerifyOptions,
} from "./verify";
