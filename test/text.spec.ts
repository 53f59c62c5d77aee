import { describe, expect, it } from "vitest";

import { FunctionBuilder } from "../src/engine/builder";
import { BroadcastError, ParseError } from "../src/engine/engine-errors";
import { legalizeModule } from "../src/engine/legalize";
import { formatDiagnostic, parseModule, parseModuleOrThrow } from "../src/text/parser";
import { printFunction, printModule } from "../src/text/printer";
import { LineScanner } from "../src/text/scanner";

const lines = (...text: string[]) => `${text.join("\n")}\n`;

const VECTOR_PLUS_MATRIX = lines(
  "func @main(%0: tensor<4xf32>, %1: tensor<3x4xf32>) {",
  "  %2 = add(%0, %1) : (tensor<4xf32>, tensor<3x4xf32>) -> tensor<3x4xf32>",
  "  return %2",
  "}",
);

describe("printer", () => {
  it("prints client ops by their bare mnemonic", () => {
    const b = new FunctionBuilder("main");
    const x = b.param([4], "f32");
    const y = b.param([3, 4], "f32");
    const fn = b.build([b.broadcastBinary("add", x, y)]);
    expect(printModule({ functions: [fn] })).toBe(VECTOR_PLUS_MATRIX);
  });

  it("prints the dimension map as an attribute", () => {
    const b = new FunctionBuilder("mapped");
    const x = b.param([3], "i32");
    const y = b.param([3, 4], "i32");
    const fn = b.build([b.broadcastBinary("subtract", x, y, [0])]);
    expect(printFunction(fn).split("\n")[1]).toBe(
      "  %2 = subtract(%0, %1) {broadcast_dimensions = [0]} : " +
        "(tensor<3xi32>, tensor<3x4xi32>) -> tensor<3x4xi32>",
    );
  });

  it("prints scalars, unknown extents and empty returns", () => {
    const b = new FunctionBuilder("misc");
    b.param([], "f64");
    b.param([-1, 2], "bf16");
    expect(printFunction(b.build([]))).toBe(
      "func @misc(%0: tensor<f64>, %1: tensor<?x2xbf16>) {\n  return\n}",
    );
  });

  it("separates functions with a blank line", () => {
    const a = new FunctionBuilder("a").build([]);
    const b = new FunctionBuilder("b").build([]);
    expect(printModule({ functions: [a, b] })).toBe(
      "func @a() {\n  return\n}\n\nfunc @b() {\n  return\n}\n",
    );
    expect(printModule({ functions: [] })).toBe("");
  });
});

describe("parser", () => {
  it("round-trips client IR", () => {
    const { module, diagnostics } = parseModule(VECTOR_PLUS_MATRIX);
    expect(diagnostics).toEqual([]);
    expect(printModule(module)).toBe(VECTOR_PLUS_MATRIX);
  });

  it("round-trips legalized IR", () => {
    const legal = printModule(legalizeModule(parseModuleOrThrow(VECTOR_PLUS_MATRIX)).module);
    expect(legal).toBe(
      lines(
        "func @main(%0: tensor<4xf32>, %1: tensor<3x4xf32>) {",
        "  %3 = ew.reshape(%0) : (tensor<4xf32>) -> tensor<1x4xf32>",
        "  %4 = ew.expand(%3) : (tensor<1x4xf32>) -> tensor<3x4xf32>",
        "  %2 = ew.add(%4, %1) : (tensor<3x4xf32>, tensor<3x4xf32>) -> tensor<3x4xf32>",
        "  return %2",
        "}",
      ),
    );
    expect(printModule(parseModuleOrThrow(legal))).toBe(legal);
  });

  it("parses the dimension map attribute", () => {
    const text = lines(
      "func @mapped(%0: tensor<4xf32>, %1: tensor<3x4xf32>) {",
      "  %2 = add(%0, %1) {broadcast_dimensions = [1]} : (tensor<4xf32>, tensor<3x4xf32>) -> tensor<3x4xf32>",
      "  return %2",
      "}",
    );
    const module = parseModuleOrThrow(text);
    const [node] = module.functions[0].nodes;
    expect(node.kind === "broadcast_binary" && node.broadcastDims).toEqual([1]);
    expect(printModule(module)).toBe(text);
  });

  it("skips comments and blank lines", () => {
    const text = [
      "// leading comment",
      "",
      "func @main(%0: tensor<2xf32>) {",
      "  // inside",
      "",
      "  %1 = multiply(%0, %0) : (tensor<2xf32>, tensor<2xf32>) -> tensor<2xf32>",
      "  return %1",
      "}",
    ].join("\n");
    const { module, diagnostics } = parseModule(text);
    expect(diagnostics).toEqual([]);
    expect(module.functions[0].nodes).toHaveLength(1);
  });

  it("reports an illegal op at its mnemonic and drops its uses", () => {
    const { module, diagnostics } = parseModule(
      lines(
        "func @bad(%0: tensor<3xf32>, %1: tensor<4xf32>) {",
        "  %2 = add(%0, %1) : (tensor<3xf32>, tensor<4xf32>) -> tensor<4xf32>",
        "  %3 = multiply(%2, %2) : (tensor<4xf32>, tensor<4xf32>) -> tensor<4xf32>",
        "  return %3",
        "}",
      ),
    );
    expect(diagnostics).toHaveLength(1);
    const [diagnostic] = diagnostics;
    expect(diagnostic.line).toBe(2);
    expect(diagnostic.column).toBe(8);
    expect(diagnostic.kind).toBe("RankMismatchOrIncompatibleDims");
    expect(diagnostic.message).toBe(
      "add: cannot broadcast dimension 0: 3 vs 4 (lhs [3], rhs [4])",
    );
    expect(diagnostic.cause).toBeInstanceOf(BroadcastError);
    expect(module.functions[0].nodes).toEqual([]);
    expect(module.functions[0].results).toEqual([]);
  });

  it("keeps parsing after a rejected line", () => {
    const { module, diagnostics } = parseModule(
      lines(
        "func @first(%0: tensor<4xf32>, %1: tensor<3x4xf32>) {",
        "  %2 = add(%0, %1) {broadcast_dimensions = [0]} : (tensor<4xf32>, tensor<3x4xf32>) -> tensor<3x4xf32>",
        "  %3 = add(%1, %1) : (tensor<3x4xf32>, tensor<3x4xf32>) -> tensor<3x4xf32>",
        "  return %3",
        "}",
        "",
        "func @second(%0: tensor<2xi8>) {",
        "  %1 = shift_left(%0, %0) : (tensor<2xi8>, tensor<2xi8>) -> tensor<2xi8>",
        "  return %1",
        "}",
      ),
    );
    expect(diagnostics.map((d) => d.kind)).toEqual(["InvalidBroadcastDimensions"]);
    expect(module.functions.map((fn) => fn.name)).toEqual(["first", "second"]);
    expect(module.functions[0].nodes.map((node) => node.id)).toEqual([3]);
    expect(module.functions[0].results).toEqual([3]);
    expect(module.functions[1].nodes).toHaveLength(1);
  });

  it("reports uses of undefined values at the operand", () => {
    const { diagnostics } = parseModule(
      lines(
        "func @main(%0: tensor<2xf32>) {",
        "  %1 = add(%0, %5) : (tensor<2xf32>, tensor<2xf32>) -> tensor<2xf32>",
        "  return %1",
        "}",
      ),
    );
    expect(diagnostics.map(formatDiagnostic)).toEqual([
      "2:16: ParseError: use of undefined value %5",
    ]);
  });

  it("rejects a declared result type that differs from the inferred one", () => {
    const { diagnostics } = parseModule(
      lines(
        "func @main(%0: tensor<4xf32>, %1: tensor<3x4xf32>) {",
        "  %2 = add(%0, %1) : (tensor<4xf32>, tensor<3x4xf32>) -> tensor<4x4xf32>",
        "}",
      ),
    );
    expect(diagnostics).toHaveLength(1);
    expect(diagnostics[0].kind).toBe("ParseError");
    expect(diagnostics[0].message).toBe(
      "declared result type tensor<4x4xf32> does not match inferred tensor<3x4xf32>",
    );
  });

  it("rejects operand annotations that differ from the operand types", () => {
    const { diagnostics } = parseModule(
      lines(
        "func @main(%0: tensor<2xf32>) {",
        "  %1 = add(%0, %0) : (tensor<2xf32>, tensor<3xf32>) -> tensor<2xf32>",
        "}",
      ),
    );
    expect(diagnostics[0].message).toBe("operand %0 has type tensor<2xf32>, annotated tensor<3xf32>");
  });

  it("rejects unknown operations and misplaced attributes", () => {
    const { diagnostics } = parseModule(
      lines(
        "func @main(%0: tensor<2xf32>) {",
        "  %1 = frobnicate(%0, %0) : (tensor<2xf32>, tensor<2xf32>) -> tensor<2xf32>",
        "  %2 = ew.add(%0, %0) {broadcast_dimensions = [0]} : (tensor<2xf32>, tensor<2xf32>) -> tensor<2xf32>",
        "  return",
        "}",
      ),
    );
    expect(diagnostics.map((d) => [d.line, d.column, d.message])).toEqual([
      [2, 8, "unknown operation 'frobnicate'"],
      [3, 23, "'ew.add' does not take broadcast_dimensions"],
    ]);
  });

  it("checks canonical ops while parsing", () => {
    const { diagnostics } = parseModule(
      lines(
        "func @main(%0: tensor<4xf32>) {",
        "  %1 = ew.expand(%0) : (tensor<4xf32>) -> tensor<3x4xf32>",
        "}",
      ),
    );
    expect(diagnostics[0].message).toBe("ew.expand cannot take [4] to [3, 4]");
  });

  it("reports redefined values and functions", () => {
    const { module, diagnostics } = parseModule(
      lines(
        "func @main(%0: tensor<2xf32>) {",
        "  %0 = add(%0, %0) : (tensor<2xf32>, tensor<2xf32>) -> tensor<2xf32>",
        "  return %0",
        "}",
        "func @main() {",
        "  return",
        "}",
      ),
    );
    expect(diagnostics.map((d) => d.message)).toEqual([
      "value %0 redefined",
      "function @main redefined",
    ]);
    expect(module.functions).toHaveLength(1);
    expect(module.functions[0].results).toEqual([0]);
  });

  it("skips the body of a function with a malformed header", () => {
    const { module, diagnostics } = parseModule(
      lines("func main(%0: tensor<2xf32>) {", "  %1 = nonsense", "}"),
    );
    expect(diagnostics.map(formatDiagnostic)).toEqual([
      "1:6: ParseError: expected '@', found 'm'",
    ]);
    expect(module.functions).toEqual([]);
  });

  it("rejects extents beyond the exactly representable integers", () => {
    const { module, diagnostics } = parseModule(
      lines("func @f(%0: tensor<1000000000000000000000xf32>) {", "  return %0", "}"),
    );
    expect(diagnostics.map(formatDiagnostic)).toEqual([
      "1:20: ParseError: dimension 1000000000000000000000 is too large",
    ]);
    expect(module.functions).toEqual([]);

    const justPast = parseModule(
      lines("func @f(%0: tensor<9007199254740993xf32>) {", "  return %0", "}"),
    );
    expect(justPast.diagnostics.map((d) => d.message)).toEqual([
      "dimension 9007199254740993 is too large",
    ]);
  });

  it("accepts the largest exactly representable extent and prints it back", () => {
    const text = lines("func @f(%0: tensor<9007199254740991xf32>) {", "  return %0", "}");
    expect(printModule(parseModuleOrThrow(text))).toBe(text);
  });

  it("rejects oversized value numbers and map entries", () => {
    const { diagnostics } = parseModule(
      lines(
        "func @f(%0: tensor<4xf32>, %1: tensor<3x4xf32>) {",
        "  %2 = add(%0, %9007199254740993) : (tensor<4xf32>, tensor<3x4xf32>) -> tensor<3x4xf32>",
        "  %3 = add(%0, %1) {broadcast_dimensions = [99999999999999999999]} : (tensor<4xf32>, tensor<3x4xf32>) -> tensor<3x4xf32>",
        "}",
      ),
    );
    expect(diagnostics.map(formatDiagnostic)).toEqual([
      "2:17: ParseError: value number 9007199254740993 is too large",
      "3:45: ParseError: integer 99999999999999999999 is too large",
    ]);
  });

  it("reports a missing closing brace and keeps the function", () => {
    const { module, diagnostics } = parseModule(
      ["func @open(%0: tensor<2xf32>) {", "  return %0"].join("\n"),
    );
    expect(diagnostics.map(formatDiagnostic)).toEqual([
      "1:1: ParseError: function @open is missing its closing '}'",
    ]);
    expect(module.functions[0].results).toEqual([0]);
  });
});

describe("parseModuleOrThrow", () => {
  it("throws the resolver's error for illegal ops", () => {
    const text = lines(
      "func @bad(%0: tensor<2xf32>, %1: tensor<2xi32>) {",
      "  %2 = add(%0, %1) : (tensor<2xf32>, tensor<2xi32>) -> tensor<2xf32>",
      "}",
    );
    expect(() => parseModuleOrThrow(text)).toThrow(BroadcastError);
    expect(() => parseModuleOrThrow(text)).toThrow(
      "add: element types f32 and i32 differ (lhs [2], rhs [2])",
    );
  });

  it("throws a ParseError for malformed text", () => {
    expect(() => parseModuleOrThrow("func @f(")).toThrow(ParseError);
  });
});

describe("LineScanner", () => {
  it("reads tensor types", () => {
    expect(new LineScanner("tensor<3x?x4xf32>", 1).expectTensorType()).toEqual({
      shape: [3, -1, 4],
      dtype: "f32",
    });
    expect(new LineScanner("tensor<i64>", 1).expectTensorType()).toEqual({
      shape: [],
      dtype: "i64",
    });
  });

  it("positions errors at the offending character", () => {
    const scanner = new LineScanner("tensor<3xq9>", 4);
    expect(() => scanner.expectTensorType()).toThrow("4:10: unknown element type 'q9'");
  });

  it("reads signed integer lists", () => {
    expect(new LineScanner("[1, -2, 3]", 1).expectIntegerList()).toEqual([1, -2, 3]);
    expect(new LineScanner("[]", 1).expectIntegerList()).toEqual([]);
  });

  it("points at the first digit of an oversized integer", () => {
    expect(() => new LineScanner("tensor<9007199254740993xf32>", 1).expectTensorType()).toThrow(
      "1:8: dimension 9007199254740993 is too large",
    );
    expect(() => new LineScanner("[1, -99999999999999999999]", 2).expectIntegerList()).toThrow(
      "2:6: integer 99999999999999999999 is too large",
    );
  });
});
