export type DType =
  | "bool"
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "f16"
  | "bf16"
  | "f32"
  | "f64";

export const DTYPES: readonly DType[] = [
  "bool",
  "i8",
  "i16",
  "i32",
  "i64",
  "u8",
  "u16",
  "u32",
  "u64",
  "f16",
  "bf16",
  "f32",
  "f64",
];

const INTEGER_DTYPES: ReadonlySet<DType> = new Set([
  "i8",
  "i16",
  "i32",
  "i64",
  "u8",
  "u16",
  "u32",
  "u64",
]);

const FLOAT_DTYPES: ReadonlySet<DType> = new Set(["f16", "bf16", "f32", "f64"]);

export function isDType(value: string): value is DType {
  return DTYPES.some((dtype) => dtype === value);
}

export function isBoolDType(dtype: DType): boolean {
  return dtype === "bool";
}

export function isIntegerDType(dtype: DType): boolean {
  return INTEGER_DTYPES.has(dtype);
}

export function isFloatDType(dtype: DType): boolean {
  return FLOAT_DTYPES.has(dtype);
}

export function isNumericDType(dtype: DType): boolean {
  return isIntegerDType(dtype) || isFloatDType(dtype);
}
