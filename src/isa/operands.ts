import type { ByteReader, ByteWriter } from './bytes.js';
import { DecodeFailure, EncodeFailure } from './bytes.js';
import type { NumberOperand } from './ir.js';

/** Register encodings at or above this value are argument registers (`$aN`). */
export const ARGUMENT_REGISTER_BASE = 0x1000;
/** Highest register index in either bank. */
export const MAX_REGISTER_INDEX = 0xfff;
/** Argument registers a NumberSpec can address. */
export const ADDRESSABLE_ARGUMENTS = 16;

const utf8Decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });
const utf8Encoder = new TextEncoder();

// ---------------------------------------------------------------------------
// registers

export function regularRegister(index: number): number {
  return index;
}

export function argumentRegister(index: number): number {
  return ARGUMENT_REGISTER_BASE + index;
}

export function isArgumentRegister(reg: number): boolean {
  return reg >= ARGUMENT_REGISTER_BASE;
}

/**
 * Canonical source spelling of a register encoding (`$v12`, `$a0`).
 */
export function registerName(reg: number): string {
  return isArgumentRegister(reg) ? `$a${reg - ARGUMENT_REGISTER_BASE}` : `$v${reg}`;
}

/**
 * Parse a built-in register name without the `$` (`v12`, `a0`).
 */
export function parseRegisterName(name: string): number | undefined {
  const m = /^([va])(0|[1-9][0-9]*)$/.exec(name);
  if (!m) return undefined;
  const index = Number.parseInt(m[2] ?? '', 10);
  if (index > MAX_REGISTER_INDEX) return undefined;
  return m[1] === 'a' ? argumentRegister(index) : regularRegister(index);
}

export function encodeRegister(w: ByteWriter, reg: number): void {
  if (!Number.isInteger(reg) || reg < 0 || reg >= 2 * ARGUMENT_REGISTER_BASE) {
    throw new EncodeFailure(`Register encoding 0x${reg.toString(16)} is out of range.`);
  }
  w.u16(reg);
}

export function decodeRegister(r: ByteReader): number {
  const at = r.pos;
  const reg = r.u16();
  if (reg >= 2 * ARGUMENT_REGISTER_BASE) {
    throw new DecodeFailure(`Invalid register encoding 0x${reg.toString(16)}.`, at);
  }
  return reg;
}

// ---------------------------------------------------------------------------
// NumberSpec

function fitsSigned(value: number, bits: number): boolean {
  const limit = 2 ** (bits - 1);
  return value >= -limit && value < limit;
}

function signExtend(value: number, bits: number): number {
  const shift = 32 - bits;
  return (value << shift) >> shift;
}

/**
 * Largest constant a NumberSpec can hold (28-bit signed).
 */
export function numberSpecFits(value: number): boolean {
  return Number.isInteger(value) && fitsSigned(value, 28);
}

/**
 * Write the smallest NumberSpec form for `op`.
 */
export function encodeNumberSpec(w: ByteWriter, op: NumberOperand): void {
  if (op.kind === 'const') {
    const v = op.value;
    if (!Number.isInteger(v)) throw new EncodeFailure(`Constant ${v} is not an integer.`);
    if (fitsSigned(v, 7)) {
      w.u8(v & 0x7f);
    } else if (fitsSigned(v, 12)) {
      w.u8(0x80 | ((v >> 8) & 0xf));
      w.u8(v & 0xff);
    } else if (fitsSigned(v, 20)) {
      w.u8(0x90 | ((v >> 16) & 0xf));
      w.u8((v >> 8) & 0xff);
      w.u8(v & 0xff);
    } else if (fitsSigned(v, 28)) {
      w.u8(0xa0 | ((v >> 24) & 0xf));
      w.u8((v >> 16) & 0xff);
      w.u8((v >> 8) & 0xff);
      w.u8(v & 0xff);
    } else {
      throw new EncodeFailure(`Constant ${v} does not fit in a 28-bit number operand.`);
    }
    return;
  }

  const reg = op.reg;
  if (isArgumentRegister(reg)) {
    const index = reg - ARGUMENT_REGISTER_BASE;
    if (index >= ADDRESSABLE_ARGUMENTS) {
      throw new EncodeFailure(
        `${registerName(reg)} cannot be used as a number operand (only $a0-$a15 are addressable).`,
      );
    }
    w.u8(0xd0 | index);
    return;
  }
  if (reg < 16) {
    w.u8(0xb0 | reg);
    return;
  }
  if (reg > MAX_REGISTER_INDEX) throw new EncodeFailure(`Register index ${reg} is out of range.`);
  w.u8(0xc0 | (reg >> 8));
  w.u8(reg & 0xff);
}

/**
 * Read a NumberSpec, rejecting forms wider than necessary.
 */
export function decodeNumberSpec(r: ByteReader): NumberOperand {
  const at = r.pos;
  const t = r.u8();
  if ((t & 0x80) === 0) return { kind: 'const', value: signExtend(t, 7) };

  const p = (t >> 4) & 0x7;
  const k = t & 0xf;
  const nonCanonical = (what: string) =>
    new DecodeFailure(`Non-canonical NumberSpec: ${what} has a shorter encoding.`, at, true);

  switch (p) {
    case 0: {
      const value = signExtend((k << 8) | r.u8(), 12);
      if (fitsSigned(value, 7)) throw nonCanonical(`constant ${value}`);
      return { kind: 'const', value };
    }
    case 1: {
      const b1 = r.u8();
      const b2 = r.u8();
      const value = signExtend((k << 16) | (b1 << 8) | b2, 20);
      if (fitsSigned(value, 12)) throw nonCanonical(`constant ${value}`);
      return { kind: 'const', value };
    }
    case 2: {
      const b1 = r.u8();
      const b2 = r.u8();
      const b3 = r.u8();
      const value = signExtend((k << 24) | (b1 << 16) | (b2 << 8) | b3, 28);
      if (fitsSigned(value, 20)) throw nonCanonical(`constant ${value}`);
      return { kind: 'const', value };
    }
    case 3:
      return { kind: 'reg', reg: regularRegister(k) };
    case 4: {
      const index = (k << 8) | r.u8();
      if (index < 16) throw nonCanonical(`register $v${index}`);
      return { kind: 'reg', reg: regularRegister(index) };
    }
    case 5:
      return { kind: 'reg', reg: argumentRegister(k) };
    default:
      throw new DecodeFailure(
        `Unknown NumberSpec type: t=0x${t.toString(16).padStart(2, '0')}, P=${p}.`,
        at,
      );
  }
}

// ---------------------------------------------------------------------------
// strings

/**
 * u16 length (including the terminating NUL), UTF-8 bytes, NUL.
 */
export function encodeString(w: ByteWriter, value: string): void {
  const bytes = utf8Encoder.encode(value);
  if (bytes.includes(0)) throw new EncodeFailure('Strings cannot contain NUL characters.');
  if (bytes.length + 1 > 0xffff) throw new EncodeFailure('String is too long.');
  w.u16(bytes.length + 1);
  w.raw(bytes);
  w.u8(0);
}

export function decodeString(r: ByteReader): string {
  const at = r.pos;
  const length = r.u16();
  if (length === 0) throw new DecodeFailure('String length must include the terminating NUL.', at);
  const bytes = r.take(length);
  if (bytes[length - 1] !== 0) throw new DecodeFailure('String is not NUL-terminated.', at);
  const body = bytes.subarray(0, length - 1);
  if (body.includes(0)) throw new DecodeFailure('String contains an embedded NUL.', at);
  return decodeUtf8(body, at);
}

/**
 * u16 byte size, then NUL-terminated strings, then a final NUL.
 *
 * Only the first string may be empty: an empty string after it would read as the end marker.
 */
export function encodeStringArray(w: ByteWriter, values: readonly string[]): void {
  if (values.length === 0) throw new EncodeFailure('A string list needs at least one string.');
  const parts: number[] = [];
  values.forEach((value, i) => {
    const bytes = utf8Encoder.encode(value);
    if (bytes.includes(0)) throw new EncodeFailure('Strings cannot contain NUL characters.');
    if (i > 0 && bytes.length === 0) {
      throw new EncodeFailure('Only the first string of a list may be empty.');
    }
    parts.push(...bytes, 0);
  });
  parts.push(0);
  if (parts.length > 0xffff) throw new EncodeFailure('String list is too long.');
  w.u16(parts.length);
  w.raw(parts);
}

export function decodeStringArray(r: ByteReader): string[] {
  const at = r.pos;
  const size = r.u16();
  const bytes = r.take(size);
  if (size < 2 || bytes[size - 1] !== 0) {
    throw new DecodeFailure('Malformed string list.', at);
  }
  const out: string[] = [];
  let start = 0;
  for (;;) {
    const end = bytes.indexOf(0, start);
    if (end < 0) throw new DecodeFailure('Malformed string list.', at);
    if (end === start && out.length > 0) {
      if (end !== size - 1) throw new DecodeFailure('String list has data after its end marker.', at);
      return out;
    }
    out.push(decodeUtf8(bytes.subarray(start, end), at));
    start = end + 1;
    if (start >= size) throw new DecodeFailure('String list is missing its end marker.', at);
  }
}

function decodeUtf8(bytes: Uint8Array, at: number): string {
  try {
    return utf8Decoder.decode(bytes);
  } catch (err) {
    throw new DecodeFailure(`Invalid UTF-8 in string: ${String(err)}`, at);
  }
}

// ---------------------------------------------------------------------------
// other command operands

/**
 * Mask byte, then one NumberSpec per set bit (bit 0 = first slot).
 */
export function encodeBitmask(w: ByteWriter, values: readonly (NumberOperand | undefined)[]): void {
  if (values.length > 8) throw new EncodeFailure('A bitmask operand list holds at most 8 slots.');
  let mask = 0;
  values.forEach((v, i) => {
    if (v) mask |= 1 << i;
  });
  w.u8(mask);
  for (const v of values) if (v) encodeNumberSpec(w, v);
}

export function decodeBitmask(r: ByteReader): (NumberOperand | undefined)[] {
  const mask = r.u8();
  const out: (NumberOperand | undefined)[] = [];
  for (let i = 0; i < 8; i++) {
    if (mask >> i === 0) break;
    out.push(mask & (1 << i) ? decodeNumberSpec(r) : undefined);
  }
  return out;
}

/**
 * u8 count, then that many NumberSpecs.
 */
export function encodeNumberList(w: ByteWriter, values: readonly NumberOperand[]): void {
  if (values.length > 0xff) throw new EncodeFailure('A number list holds at most 255 values.');
  w.u8(values.length);
  for (const v of values) encodeNumberSpec(w, v);
}

export function decodeNumberList(r: ByteReader): NumberOperand[] {
  const count = r.u8();
  const out: NumberOperand[] = [];
  for (let i = 0; i < count; i++) out.push(decodeNumberSpec(r));
  return out;
}

export function encodeBool(w: ByteWriter, value: boolean): void {
  w.u8(value ? 1 : 0);
}

export function decodeBool(r: ByteReader): boolean {
  const at = r.pos;
  const b = r.u8();
  if (b > 1) throw new DecodeFailure(`Boolean byte must be 0 or 1, got ${b}.`, at, true);
  return b === 1;
}
