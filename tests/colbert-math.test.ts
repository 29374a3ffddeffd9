import { describe, expect, it } from "vitest";
import { BitVector } from "../src/lib/bit-vector";
import { hammingSim, maxSim } from "../src/lib/colbert-math";
import { ShapeError } from "../src/lib/errors";

const bits = (s: string) => BitVector.fromString(s);

describe("hammingSim", () => {
  it("is 1 for identical vectors and 0 for complements", () => {
    expect(hammingSim(bits("1010"), bits("1010"))).toBe(1);
    expect(hammingSim(bits("1010"), bits("0101"))).toBe(0);
  });

  it("divides the distance by the document vector length", () => {
    expect(hammingSim(bits("11110000"), bits("11111111"))).toBe(0.5);
    expect(hammingSim(bits("10000000"), bits("00000000"))).toBe(0.875);
  });

  it("throws on mismatched widths", () => {
    expect(() => hammingSim(bits("10"), bits("1"))).toThrow(ShapeError);
  });
});

describe("maxSim", () => {
  it("sums the best match of each query vector", () => {
    const query = [bits("1111"), bits("0000")];
    const doc = [bits("1110"), bits("0011")];
    // 1111 -> 1110 (0.75), 0000 -> 0011 (0.5)
    expect(maxSim(query, doc)).toBe(1.25);
  });

  it("scores an exact token match as 1 per query vector", () => {
    const v1 = bits("10110010");
    expect(maxSim([v1], [bits("01001101"), v1])).toBe(1);
    expect(maxSim([v1, v1], [v1])).toBe(2);
  });

  it("is 0 for an empty query", () => {
    expect(maxSim([], [bits("1010")])).toBe(0);
  });

  it("is 0 for a document without vectors", () => {
    expect(maxSim([bits("1010")], [])).toBe(0);
  });

  it("lets every query token pick its own document token", () => {
    const query = [bits("1100"), bits("0011")];
    const together = [bits("1100"), bits("0011")];
    const pooled = [bits("1111")];
    expect(maxSim(query, together)).toBe(2);
    expect(maxSim(query, pooled)).toBe(1);
  });
});
