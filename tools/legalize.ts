/**
 * Broadcast legalization driver.
 *
 * Parses an IR file, reports diagnostics, and prints the requested stage.
 *
 * Usage:
 *   npx tsx tools/legalize.ts input.ir                    # verify → legalize → optimize
 *   npx tsx tools/legalize.ts input.ir --emit verify      # parse + verify only
 *   npx tsx tools/legalize.ts input.ir --emit legalize    # stop after legalization
 *   npx tsx tools/legalize.ts input.ir --no-cse --no-dce  # skip cleanup passes
 *
 * BCASTIR_DEBUG=1 logs each pass.
 */

import fs from "node:fs";

import {
  formatDiagnostic,
  legalizeModule,
  parseModule,
  printModule,
  runPipeline,
  verifyFunction,
} from "../src";

type Emit = "verify" | "legalize" | "optimize";

type Args = {
  input: string;
  emit: Emit;
  enableCSE?: boolean;
  enableDCE?: boolean;
};

function usage(): never {
  console.error("usage: legalize <file> [--emit verify|legalize|optimize] [--no-cse] [--no-dce]");
  process.exit(2);
}

function parseArgs(): Args {
  const args = process.argv.slice(2);
  let input: string | undefined;
  let emit: Emit = "optimize";
  let enableCSE: boolean | undefined;
  let enableDCE: boolean | undefined;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--emit" && i + 1 < args.length) {
      const value = args[++i];
      if (value !== "verify" && value !== "legalize" && value !== "optimize") usage();
      emit = value;
    } else if (arg === "--no-cse") {
      enableCSE = false;
    } else if (arg === "--no-dce") {
      enableDCE = false;
    } else if (!arg.startsWith("--") && input === undefined) {
      input = arg;
    } else {
      usage();
    }
  }
  if (input === undefined) usage();
  return { input, emit, enableCSE, enableDCE };
}

function main(): number {
  const args = parseArgs();
  const text = fs.readFileSync(args.input, "utf8");
  const { module, diagnostics } = parseModule(text);

  for (const diagnostic of diagnostics) {
    console.error(`${args.input}:${formatDiagnostic(diagnostic)}`);
  }
  if (diagnostics.length > 0) return 1;

  for (const fn of module.functions) verifyFunction(fn);

  if (args.emit === "verify") {
    process.stdout.write(printModule(module));
  } else if (args.emit === "legalize") {
    process.stdout.write(printModule(legalizeModule(module).module));
  } else {
    const result = runPipeline(module, {
      enableCSE: args.enableCSE,
      enableDCE: args.enableDCE,
    });
    process.stdout.write(printModule(result.module));
  }
  return 0;
}

try {
  process.exit(main());
} catch (e) {
  console.error(e);
  process.exit(1);
}
