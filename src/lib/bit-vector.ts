import { ShapeError } from "./errors";

// Set-bit count for every byte value.
const POPCOUNT = new Uint8Array(256);
for (let i = 1; i < 256; i++) {
  POPCOUNT[i] = (i & 1) + POPCOUNT[i >> 1];
}

export function byteLength(bits: number): number {
  return Math.ceil(bits / 8);
}

/**
 * Fixed-length bit string packed MSB-first: bit 0 is the high bit of byte 0.
 * Trailing pad bits of the last byte are always zero.
 */
export class BitVector {
  private readonly packed: Uint8Array;

  constructor(
    bytes: Uint8Array,
    readonly length: number,
  ) {
    if (!Number.isInteger(length) || length < 0) {
      throw new ShapeError(`Invalid bit-vector length ${length}`);
    }
    if (bytes.length !== byteLength(length)) {
      throw new ShapeError(
        `Bit-vector of ${length} bits needs ${byteLength(length)} bytes, got ${bytes.length}`,
        byteLength(length),
        bytes.length,
      );
    }
    this.packed = Uint8Array.from(bytes);
    const pad = bytes.length * 8 - length;
    if (pad > 0) {
      this.packed[bytes.length - 1] &= 0xff << pad;
    }
  }

  static fromBits(bits: ArrayLike<boolean>): BitVector {
    const bytes = new Uint8Array(byteLength(bits.length));
    for (let i = 0; i < bits.length; i++) {
      if (bits[i]) bytes[i >> 3] |= 0x80 >> (i & 7);
    }
    return new BitVector(bytes, bits.length);
  }

  static fromString(value: string): BitVector {
    if (!/^[01]*$/.test(value)) {
      throw new ShapeError(`Bit string may only contain 0 and 1: "${value}"`);
    }
    return BitVector.fromBits(Array.from(value, (c) => c === "1"));
  }

  get(index: number): boolean {
    if (index < 0 || index >= this.length) {
      throw new RangeError(`Bit index ${index} out of range [0, ${this.length})`);
    }
    return (this.packed[index >> 3] & (0x80 >> (index & 7))) !== 0;
  }

  popcount(): number {
    let count = 0;
    for (const byte of this.packed) count += POPCOUNT[byte];
    return count;
  }

  toString(): string {
    let out = "";
    for (let i = 0; i < this.length; i++) out += this.get(i) ? "1" : "0";
    return out;
  }

  /** Copy of the packed bytes. */
  toBytes(): Uint8Array {
    return Uint8Array.from(this.packed);
  }

  distanceTo(other: BitVector): number {
    if (this.length !== other.length) {
      throw new ShapeError(
        `Cannot compare bit-vectors of ${this.length} and ${other.length} bits`,
        this.length,
        other.length,
      );
    }
    let distance = 0;
    for (let i = 0; i < this.packed.length; i++) {
      distance += POPCOUNT[this.packed[i] ^ other.packed[i]];
    }
    return distance;
  }

  equals(other: BitVector): boolean {
    return this.length === other.length && this.distanceTo(other) === 0;
  }
}

export function hammingDistance(a: BitVector, b: BitVector): number {
  return a.distanceTo(b);
}

/**
 * Lowercase hex of the packed bytes; `dimensions` bits fit in
 * `2 * byteLength(dimensions)` characters.
 */
export function toHex(vector: BitVector): string {
  return Buffer.from(vector.toBytes()).toString("hex");
}

export function fromHex(hex: string, dimensions: number): BitVector {
  const expected = byteLength(dimensions) * 2;
  if (hex.length !== expected || !/^[0-9a-f]*$/i.test(hex)) {
    throw new ShapeError(
      `Expected ${expected} hex characters for a ${dimensions}-bit vector, got "${hex}"`,
      expected,
      hex.length,
    );
  }
  return new BitVector(Buffer.from(hex, "hex"), dimensions);
}
