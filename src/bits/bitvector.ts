export type ByteOrder = 'little' | 'big';

/** Anything a BitVector operation accepts as its right-hand operand. */
export type BitOperand = BitVector | number | bigint;

function widthMask(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

function toBigInt(value: number | bigint): bigint {
  if (typeof value === 'bigint') return value;
  if (!Number.isInteger(value)) {
    throw new RangeError(`BitVector values must be integers (got ${value})`);
  }
  return BigInt(value);
}

function checkWidth(width: number): void {
  if (!Number.isInteger(width) || width < 1) {
    throw new RangeError(`BitVector width must be an integer >= 1 (got ${width})`);
  }
}

/** Number of significant bits in |value|; 0 for zero. */
export function bitLength(value: bigint): number {
  const magnitude = value < 0n ? -value : value;
  return magnitude === 0n ? 0 : magnitude.toString(2).length;
}

/**
 * Immutable fixed-width unsigned bit vector.
 *
 * The stored value is always normalized into `[0, 2^width)`; negative inputs wrap modulo
 * `2^width`. Bit 0 is the least significant bit.
 */
export class BitVector {
  readonly value: bigint;
  readonly width: number;

  constructor(value: number | bigint, width = 1) {
    checkWidth(width);
    this.width = width;
    this.value = toBigInt(value) & widthMask(width);
  }

  get mask(): bigint {
    return widthMask(this.width);
  }

  static fromBool(flag: boolean): BitVector {
    return new BitVector(flag ? 1 : 0, 1);
  }

  /**
   * Build a vector from raw bytes.
   *
   * `width` defaults to `8 * bytes.length`; bytes beyond the width are truncated.
   */
  static fromBytes(bytes: Uint8Array, width?: number, order: ByteOrder = 'little'): BitVector {
    const ordered = order === 'little' ? [...bytes].reverse() : [...bytes];
    let acc = 0n;
    for (const b of ordered) acc = (acc << 8n) | BigInt(b);
    return new BitVector(acc, width ?? Math.max(1, bytes.length * 8));
  }

  /**
   * Build a vector from a list, most significant element first.
   *
   * - Without `bitsPerElement`, a list made only of 0/1 is read as binary digits.
   * - Otherwise every element is packed into `bitsPerElement` bits (default: the widest element).
   * - An empty list yields a single zero bit.
   */
  static fromList(values: readonly (number | bigint)[], bitsPerElement?: number): BitVector {
    if (values.length === 0) return new BitVector(0, 1);
    const items = values.map(toBigInt);
    if (bitsPerElement === undefined && items.every((v) => v === 0n || v === 1n)) {
      return new BitVector(
        items.reduce<bigint>((acc, v) => (acc << 1n) | v, 0n),
        items.length,
      );
    }
    const elementWidth = bitsPerElement ?? Math.max(1, ...items.map(bitLength));
    checkWidth(elementWidth);
    const elementMask = widthMask(elementWidth);
    const shift = BigInt(elementWidth);
    let acc = 0n;
    for (const v of items) acc = (acc << shift) | (v & elementMask);
    return new BitVector(acc, elementWidth * items.length);
  }

  /** Width-aligned view of an operand: plain integers take the wider of their own bit length and ours. */
  private align(other: BitOperand): BitVector {
    if (other instanceof BitVector) return other;
    const raw = toBigInt(other);
    return new BitVector(raw, Math.max(this.width, bitLength(raw), 1));
  }

  and(other: BitOperand): BitVector {
    const o = this.align(other);
    return new BitVector(this.value & o.value, Math.max(this.width, o.width));
  }

  or(other: BitOperand): BitVector {
    const o = this.align(other);
    return new BitVector(this.value | o.value, Math.max(this.width, o.width));
  }

  xor(other: BitOperand): BitVector {
    const o = this.align(other);
    return new BitVector(this.value ^ o.value, Math.max(this.width, o.width));
  }

  not(): BitVector {
    return new BitVector(~this.value, this.width);
  }

  /** Logical left shift; bits shifted past the width are lost. A negative count shifts right. */
  shl(count: number): BitVector {
    return new BitVector(this.value << BigInt(count), this.width);
  }

  /** Logical right shift. A negative count shifts left. */
  shr(count: number): BitVector {
    return new BitVector(this.value >> BigInt(count), this.width);
  }

  /**
   * Arithmetic right shift: the top bit is treated as a sign bit and replicated. A negative count
   * shifts left.
   */
  sar(count: number): BitVector {
    return new BitVector(this.toSigned() >> BigInt(count), this.width);
  }

  /** Modular addition; the result keeps this vector's width. */
  add(other: BitOperand): BitVector {
    const o = other instanceof BitVector ? other.value : toBigInt(other);
    return new BitVector(this.value + o, this.width);
  }

  /**
   * Extract `stop - start` bits starting at bit `start` (LSB = 0).
   */
  slice(start = 0, stop = this.width): BitVector {
    if (!Number.isInteger(start) || !Number.isInteger(stop) || start < 0 || stop > this.width) {
      throw new RangeError(`Slice [${start}, ${stop}) is outside a ${this.width}-bit vector`);
    }
    if (stop <= start) {
      throw new RangeError(`Slice [${start}, ${stop}) is empty`);
    }
    return new BitVector(this.value >> BigInt(start), stop - start);
  }

  /** Bit at `index` (LSB = 0); negative indices count down from the top bit. */
  bit(index: number): 0 | 1 {
    const at = index < 0 ? index + this.width : index;
    if (!Number.isInteger(at) || at < 0 || at >= this.width) {
      throw new RangeError(`Bit ${index} is outside a ${this.width}-bit vector`);
    }
    return (this.value >> BigInt(at)) & 1n ? 1 : 0;
  }

  /** `this` becomes the high part, `low` the low part. */
  concat(low: BitVector): BitVector {
    if (!(low instanceof BitVector)) {
      throw new TypeError('concat expects a BitVector');
    }
    return new BitVector((this.value << BigInt(low.width)) | low.value, this.width + low.width);
  }

  equals(other: BitOperand): boolean {
    if (other instanceof BitVector) {
      return this.width === other.width && this.value === other.value;
    }
    return this.value === toBigInt(other);
  }

  toBigInt(): bigint {
    return this.value;
  }

  toNumber(): number {
    return Number(this.value);
  }

  /** Two's-complement interpretation at this width. */
  toSigned(): bigint {
    const signBit = 1n << BigInt(this.width - 1);
    return this.value & signBit ? this.value - (1n << BigInt(this.width)) : this.value;
  }

  toBytes(order: ByteOrder = 'little'): Uint8Array {
    const count = Math.ceil(this.width / 8);
    const out = new Uint8Array(count);
    let v = this.value;
    for (let i = 0; i < count; i++) {
      out[order === 'little' ? i : count - 1 - i] = Number(v & 0xffn);
      v >>= 8n;
    }
    return out;
  }

  /** Binary digits, most significant first. */
  toDigits(): Array<0 | 1> {
    return [...this.toBinary()].map((c) => (c === '1' ? 1 : 0));
  }

  /** Split into equal elements of `bitsPerElement` bits, most significant first. */
  toList(bitsPerElement: number): bigint[] {
    checkWidth(bitsPerElement);
    if (this.width % bitsPerElement !== 0) {
      throw new RangeError(`${this.width}-bit vector does not split into ${bitsPerElement}-bit elements`);
    }
    const out: bigint[] = [];
    for (let start = this.width - bitsPerElement; start >= 0; start -= bitsPerElement) {
      out.push(this.slice(start, start + bitsPerElement).value);
    }
    return out;
  }

  toBinary(): string {
    return this.value.toString(2).padStart(this.width, '0');
  }

  toHex(): string {
    return this.value.toString(16).toUpperCase().padStart(Math.ceil(this.width / 4), '0');
  }

  toString(): string {
    return `${this.value} (0b${this.toBinary()}, width=${this.width})`;
  }
}
