/**
 * Raised by operand encoders when a value has no encoding. The emitter reports it against
 * the instruction being generated.
 */
export class EncodeFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EncodeFailure';
  }
}

/**
 * Raised by the decoder. `nonCanonical` marks input that is well formed but that the
 * assembler would never produce.
 */
export class DecodeFailure extends Error {
  constructor(
    message: string,
    readonly offset: number,
    readonly nonCanonical = false,
  ) {
    super(message);
    this.name = 'DecodeFailure';
  }
}

/**
 * Growable little-endian byte sink.
 */
export class ByteWriter {
  private readonly bytes: number[] = [];

  get length(): number {
    return this.bytes.length;
  }

  u8(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xff) {
      throw new EncodeFailure(`Value ${value} does not fit in a byte.`);
    }
    this.bytes.push(value);
  }

  u16(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffff) {
      throw new EncodeFailure(`Value ${value} does not fit in 16 bits.`);
    }
    this.bytes.push(value & 0xff, (value >> 8) & 0xff);
  }

  u24(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffff) {
      throw new EncodeFailure(`Value ${value} does not fit in 24 bits.`);
    }
    this.bytes.push(value & 0xff, (value >> 8) & 0xff, (value >> 16) & 0xff);
  }

  u32(value: number): void {
    if (!Number.isInteger(value) || value < 0 || value > 0xffffffff) {
      throw new EncodeFailure(`Value ${value} does not fit in 32 bits.`);
    }
    this.bytes.push(value & 0xff, (value >>> 8) & 0xff, (value >>> 16) & 0xff, (value >>> 24) & 0xff);
  }

  raw(bytes: Iterable<number>): void {
    for (const b of bytes) this.bytes.push(b & 0xff);
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.bytes);
  }
}

/**
 * Cursor over a byte block. Every read past the end raises a {@link DecodeFailure}.
 */
export class ByteReader {
  constructor(
    private readonly bytes: Uint8Array,
    public pos = 0,
  ) {}

  get length(): number {
    return this.bytes.length;
  }

  atEnd(): boolean {
    return this.pos >= this.bytes.length;
  }

  u8(): number {
    const b = this.bytes[this.pos];
    if (b === undefined) throw new DecodeFailure('Unexpected end of input.', this.pos);
    this.pos++;
    return b;
  }

  u16(): number {
    const lo = this.u8();
    return lo | (this.u8() << 8);
  }

  u24(): number {
    const lo = this.u16();
    return lo | (this.u8() << 16);
  }

  u32(): number {
    const lo = this.u24();
    return (lo | (this.u8() << 24)) >>> 0;
  }

  take(n: number): Uint8Array {
    if (this.pos + n > this.bytes.length) {
      throw new DecodeFailure('Unexpected end of input.', this.bytes.length);
    }
    const out = this.bytes.subarray(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }
}

/**
 * Patch a little-endian u32 in place.
 */
export function patchU32(bytes: Uint8Array, offset: number, value: number): void {
  bytes[offset] = value & 0xff;
  bytes[offset + 1] = (value >>> 8) & 0xff;
  bytes[offset + 2] = (value >>> 16) & 0xff;
  bytes[offset + 3] = (value >>> 24) & 0xff;
}

export function toHex(bytes: Uint8Array): string {
  return Array.from(bytes, (b) => b.toString(16).padStart(2, '0')).join('');
}

export function fromHex(hex: string): Uint8Array {
  const clean = hex.replace(/\s+/g, '');
  const out = new Uint8Array(clean.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = Number.parseInt(clean.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}
