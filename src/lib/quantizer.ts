import { BitVector } from "./bit-vector";
import { ShapeError } from "./errors";

export type FloatVector = ArrayLike<number>;

/** One vector, or one vector per token. */
export type EmbeddingInput = FloatVector | readonly FloatVector[];

function isFlatVector(input: EmbeddingInput): input is FloatVector {
  return input.length > 0 && typeof input[0] === "number";
}

/**
 * Normalizes a single vector or a list of vectors to a list.
 * An empty input is an empty list.
 */
export function toVectorList(input: EmbeddingInput): FloatVector[] {
  if (isFlatVector(input)) return [input];
  const list: FloatVector[] = [];
  for (let i = 0; i < input.length; i++) {
    const item: FloatVector | number = input[i];
    if (typeof item === "number") {
      throw new ShapeError(`Mixed scalars and vectors at position ${i}`);
    }
    list.push(item);
  }
  return list;
}

/**
 * Sign-based binary quantization: bit i is set iff component i is > 0.
 */
export function quantize(input: EmbeddingInput, dimensions: number): BitVector[] {
  return toVectorList(input).map((vector, index) => {
    if (vector.length !== dimensions) {
      throw new ShapeError(
        `Embedding ${index} has ${vector.length} dimensions, expected ${dimensions}`,
        dimensions,
        vector.length,
      );
    }
    const bits = new Array<boolean>(dimensions);
    for (let i = 0; i < dimensions; i++) {
      bits[i] = vector[i] > 0;
    }
    return BitVector.fromBits(bits);
  });
}
