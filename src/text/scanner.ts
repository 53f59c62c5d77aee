/**
 * Character scanner for one line of IR text.
 *
 * Whitespace between tokens is insignificant; every `expect*` method
 * skips it first and throws a ParseError positioned at the offending
 * character.
 */

import { DYNAMIC } from "../core/shape";
import { isDType } from "../core/dtype";
import { type TensorType, tensorType } from "../core/tensor-type";
import { ParseError } from "../engine/engine-errors";

const WHITESPACE_CHARS = new Set([" ", "\t"]);
const DIGIT = /^[0-9]$/;
const IDENT_START = /^[A-Za-z_]$/;
const IDENT_CONTINUE = /^[A-Za-z0-9_.]$/;

export class LineScanner {
  private index = 0;

  constructor(
    private readonly text: string,
    readonly lineNumber: number,
  ) {}

  get lookahead(): string {
    return this.text[this.index] ?? "";
  }

  /** 1-based column of the next character. */
  get column(): number {
    return this.index + 1;
  }

  get isAtEnd(): boolean {
    return this.index >= this.text.length;
  }

  get unscanned(): string {
    return this.text.slice(this.index);
  }

  error(reason: string, column = this.column): ParseError {
    return new ParseError(reason, this.lineNumber, column);
  }

  skipWhitespace(): void {
    while (WHITESPACE_CHARS.has(this.lookahead)) {
      this.index++;
    }
  }

  /** Consume `literal` if it comes next. */
  accept(literal: string): boolean {
    this.skipWhitespace();
    if (this.text.startsWith(literal, this.index)) {
      this.index += literal.length;
      return true;
    }
    return false;
  }

  expect(literal: string): void {
    if (!this.accept(literal)) {
      throw this.error(`expected '${literal}', found ${this.describeNext()}`);
    }
  }

  expectEnd(): void {
    this.skipWhitespace();
    if (!this.isAtEnd) {
      throw this.error(`unexpected trailing input '${this.unscanned}'`);
    }
  }

  expectIdentifier(what = "identifier"): string {
    this.skipWhitespace();
    if (!IDENT_START.test(this.lookahead)) {
      throw this.error(`expected ${what}, found ${this.describeNext()}`);
    }
    const start = this.index;
    while (IDENT_CONTINUE.test(this.lookahead)) {
      this.index++;
    }
    return this.text.slice(start, this.index);
  }

  expectUnsigned(what = "integer"): number {
    this.skipWhitespace();
    if (!DIGIT.test(this.lookahead)) {
      throw this.error(`expected ${what}, found ${this.describeNext()}`);
    }
    const start = this.index;
    while (DIGIT.test(this.lookahead)) {
      this.index++;
    }
    const literal = this.text.slice(start, this.index);
    const value = Number.parseInt(literal, 10);
    if (!Number.isSafeInteger(value)) {
      throw this.error(`${what} ${literal} is too large`, start + 1);
    }
    return value;
  }

  expectInteger(what = "integer"): number {
    this.skipWhitespace();
    const negative = this.accept("-");
    const value = this.expectUnsigned(what);
    return negative ? -value : value;
  }

  /** `%N` */
  expectValueRef(): number {
    this.expect("%");
    return this.expectUnsigned("value number");
  }

  /** `tensor<3x?x4xf32>`, `tensor<f32>` */
  expectTensorType(): TensorType {
    this.expect("tensor");
    this.expect("<");
    const dims: number[] = [];
    for (;;) {
      if (this.accept("?")) {
        dims.push(DYNAMIC);
      } else if (DIGIT.test(this.lookahead)) {
        dims.push(this.expectUnsigned("dimension"));
      } else {
        break;
      }
      this.expect("x");
    }
    const column = this.column;
    const dtype = this.expectIdentifier("element type");
    if (!isDType(dtype)) {
      throw this.error(`unknown element type '${dtype}'`, column);
    }
    this.expect(">");
    return tensorType(dims, dtype);
  }

  /** `[1, 2]`, `[]` */
  expectIntegerList(): number[] {
    this.expect("[");
    const values: number[] = [];
    if (this.accept("]")) return values;
    do {
      values.push(this.expectInteger());
    } while (this.accept(","));
    this.expect("]");
    return values;
  }

  private describeNext(): string {
    return this.isAtEnd ? "end of line" : `'${this.lookahead}'`;
  }
}
