import type { DType } from "./dtype";
import { formatDim, makeShape, type Shape, shapesIdentical } from "./shape";

export type TensorType = {
  readonly shape: Shape;
  readonly dtype: DType;
};

export function tensorType(dims: Iterable<number>, dtype: DType): TensorType {
  return Object.freeze({ shape: makeShape(dims), dtype });
}

export function tensorTypesIdentical(a: TensorType, b: TensorType): boolean {
  return a.dtype === b.dtype && shapesIdentical(a.shape, b.shape);
}

/** `tensor<3x?x4xf32>`; rank 0 prints as `tensor<f32>`. */
export function formatTensorType(type: TensorType): string {
  const dims = type.shape.map((d) => `${formatDim(d)}x`).join("");
  return `tensor<${dims}${type.dtype}>`;
}
