import { config } from "../core/config";
import { debugLog } from "../core/debug";
import { InternalConsistencyError } from "./engine-errors";
import type { IRFunction, IRModule } from "./ir";
import { optimizeIR, type OptimizeResult } from "./ir-optimize";
import { legalizeFunction, type LegalizeResult } from "./legalize";
import { verifyFunction } from "./verify";

/** Per-call overrides of the BCASTIR_* switches. */
export type PipelineOptions = {
  verifyEach?: boolean;
  enableCSE?: boolean;
  enableDCE?: boolean;
};

export type FunctionPipelineResult = {
  fn: IRFunction;
  legalize: LegalizeResult;
  optimize: OptimizeResult;
};

export type PipelineResult = {
  module: IRModule;
  functions: FunctionPipelineResult[];
};

function checkpoint(fn: IRFunction, pass: string, canonical: boolean): void {
  try {
    verifyFunction(fn, { canonical });
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new InternalConsistencyError(`verification failed after ${pass}: ${reason}`);
  }
}

/**
 * verify → legalize → verify (canonical) → CSE/DCE.
 *
 * The input must already be well-formed: client op errors surface from
 * the first verification as BroadcastError. Any failure after that is an
 * InternalConsistencyError and aborts the whole module.
 */
export function runFunctionPipeline(
  fn: IRFunction,
  options: PipelineOptions = {},
): FunctionPipelineResult {
  const verifyEach = options.verifyEach ?? config.verifyEach;
  const enableCSE = options.enableCSE ?? config.enableCSE;
  const enableDCE = options.enableDCE ?? config.enableDCE;

  verifyFunction(fn);

  const legalize = legalizeFunction(fn);
  debugLog(
    "pipeline",
    `@${fn.name}: legalized ${legalize.rewritten} ops ` +
      `(+${legalize.reshapesInserted} reshape, +${legalize.expandsInserted} expand)`,
  );
  if (verifyEach) checkpoint(legalize.fn, "legalize", true);

  const optimize = optimizeIR(legalize.fn, { enableCSE, enableDCE });
  if (verifyEach) checkpoint(optimize.fn, "optimize", true);

  return { fn: optimize.fn, legalize, optimize };
}

export function runPipeline(module: IRModule, options: PipelineOptions = {}): PipelineResult {
  const functions = module.functions.map((fn) => runFunctionPipeline(fn, options));
  return {
    module: { functions: functions.map((result) => result.fn) },
    functions,
  };
}
