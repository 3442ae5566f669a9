import { describe, expect, it } from 'vitest';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { Artifact, BinArtifact } from '../src/formats/types.js';
import { assemble, hex, ids } from './helpers/assemble.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

function binOf(artifacts: Artifact[]): BinArtifact {
  const bin = artifacts.find((a): a is BinArtifact => a.kind === 'bin');
  if (!bin) throw new Error('no bin artifact');
  return bin;
}

function bytesOf(text: string): string {
  const res = assemble(text);
  expect(res.diagnostics).toEqual([]);
  return hex(res.block.bytes);
}

describe('code generation: fixtures', () => {
  it('assembles a recursive function', async () => {
    const entry = join(__dirname, 'fixtures', 'gcd.scasm');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    expect(hex(binOf(res.artifacts).bytes)).toBe(
      [
        '46 01 d1 00 0e 00 00 00',
        '41 00 01 00 d0',
        '50',
        '42 00 10 00 d0 00 d1 05 ff',
        '4f 00 00 00 00 02 d1 d0',
        '50',
      ].join(' '),
    );
  });

  it('assembles a dispatch table over scenario commands', async () => {
    const entry = join(__dirname, 'fixtures', 'dispatch.scasm');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    const bytes = binOf(res.artifacts).bytes;
    expect(bytes.length).toBe(53);
    expect(hex(bytes)).toBe(
      [
        '4a b0 02 00 0f 00 00 00 22 00 00 00',
        '00 00 00',
        '86 4f 1d 00 00 09 00 4d 6f 72 6e 69 6e 67 2e 00',
        '00 01 00',
        '86 50 1d 00 01 09 00 45 76 65 6e 69 6e 67 2e 00',
        '00 02 00',
      ].join(' '),
    );
  });

  it('keeps generating the other units when one has an error', () => {
    const res = assemble('function F\n    mov $v0, $y\nendfun\nfunction G($x)\n    mov $v1, $x\nendfun\n');
    expect(res.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [DiagnosticIds.UndefinedSymbol, 'Unknown register `$y`.', 2],
    ]);
    expect(hex(res.block.bytes)).toBe('50 41 00 01 00 d0 50');
  });
});

describe('code generation: instructions', () => {
  it.each([
    ['neg $v3, 5', '40 82 03 00 05'],
    ['zero $a2', '40 00 02 10'],
    ['add $v2, $v3, -7', '41 82 02 00 b3 79'],
    ['mov $v1, $a0', '41 00 01 00 d0'],
    ['exp $v0, $v1 * 3 + 1', '42 00 00 00 b1 00 03 03 00 01 01 ff'],
    ['gt $v0, $v1, [1, 1000]', '44 00 00 b1 02 00 01 00 00 00 83 e8 00 00'],
    ['jc !($v0 == 1), 0x12345678', '46 80 b0 01 78 56 34 12'],
    ['jc $v2, 0x10', '46 01 b2 00 10 00 00 00'],
    ['jc bitset($v1, 3), 0x10', '46 07 b1 03 10 00 00 00'],
    ['jc $v1 & 4, 0x10', '46 06 b1 04 10 00 00 00'],
    ['rnd $v1, 1, 6', '4c 01 00 01 06'],
    ['push $v1, 5', '4d 02 b1 05'],
    ['pop $v1, $a0', '4e 02 01 00 00 10'],
    ['WAIT 30, interruptable', '83 01 1e'],
    ['WAIT 30', '83 00 1e'],
    ['msgclose 1', '8a 01'],
    ['SELECT 1, 2, $v3, 7, "Go", ["A", "B"]', '8d 01 00 02 00 03 00 07 03 00 47 6f 00 05 00 41 00 42 00 00'],
    ['WIPE 1, 2, 3, [_, 5]', '8e 01 02 03 02 05'],
    ['UNLOCK 1, [2, $v3]', 'b1 01 02 02 b3'],
  ])('%s', (source, bytes) => {
    expect(bytesOf(`${source}\n`)).toBe(bytes);
  });

  it('writes the nowait flag byte only when asked', () => {
    expect(bytesOf('MSGSET 1, "a", nowait\n')).toBe('86 01 00 00 00 02 00 61 00');
    expect(bytesOf('MSGSET 1, "a"\n')).toBe('86 01 00 00 01 02 00 61 00');
  });

  it('writes escaped control characters as raw bytes', () => {
    expect(bytesOf('MSGSET 1, "a\\tb\\x01"\n')).toBe('86 01 00 00 01 05 00 61 09 62 01 00');
  });

  it('warns about duplicate jump table cases and keeps the first', () => {
    const res = assemble('jt $v0, { 0 => A, 0 => B }\nA:\nreturn\nB:\nreturn\n');
    expect(res.diagnostics.map((d) => [d.id, d.severity, d.message])).toEqual([
      [DiagnosticIds.DuplicateJumpTableCase, 'warning', 'Duplicate jump table case 0; the first one is used.'],
    ]);
    expect(hex(res.block.bytes)).toBe('4a b0 01 00 08 00 00 00 50 50');
  });

  it('rejects a jump table with a hole', () => {
    const res = assemble('jt $v0, { 1 => A }\nA:\nreturn\n');
    expect(res.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.JumpTableKeyError, 'Jump table has no case for key 0.'],
    ]);
  });

  it.each([
    ['EXIT 1', DiagnosticIds.ArityMismatch, '`EXIT` takes 2 operands, got 1.'],
    ['WAIT 30, nowait', DiagnosticIds.EncodeError, '`WAIT` does not take `nowait`.'],
    ['mov $v0, 1, nowait', DiagnosticIds.EncodeError, '`mov` takes no flags.'],
    ['frobnicate $v0', DiagnosticIds.EncodeError, 'Unknown instruction `frobnicate`.'],
    ['mov 1, 2', DiagnosticIds.TypeMismatch, 'Expected a register.'],
    ['MSGCLOSE 2', DiagnosticIds.TypeMismatch, '`wait_for_close` must be 0 or 1.'],
    ['MSGSET 1, 2', DiagnosticIds.TypeMismatch, 'Expected a string literal.'],
  ])('rejects %j', (source, id, message) => {
    expect(assemble(`${source}\n`).diagnostics.map((d) => [d.id, d.message])).toEqual([[id, message]]);
  });

  it('drops the bytes of a unit with an operand that does not fit', () => {
    const res = assemble('mov $v0, 0x10000000\n');
    expect(res.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.OperandOverflow, 'Constant 268435456 does not fit in a 28-bit number operand.'],
    ]);
    expect(res.block.bytes.length).toBe(0);
  });
});

describe('code generation: blocks', () => {
  it('restores preserved registers before every return', () => {
    const res = assemble('function F($x) [$v2-$v3]\n    jc $x == 0, DONE\n    return\nDONE:\nendfun\n');
    expect(res.diagnostics).toEqual([]);
    expect(hex(res.block.bytes)).toBe(
      [
        '4d 02 b2 b3',
        '46 00 d0 00 13 00 00 00',
        '4e 02 03 00 02 00',
        '50',
        '4e 02 03 00 02 00',
        '50',
      ].join(' '),
    );
  });

  it('ends subroutines with retsub', () => {
    expect(bytesOf('subroutine S\n    mov $v0, 1\nendsub\ngosub S\n')).toBe('41 00 00 00 01 49 48 00 00 00 00');
  });

  it('refuses the wrong return instruction', () => {
    expect(assemble('subroutine S\n    return\nendsub\n').diagnostics.map((d) => [d.message, d.line])).toEqual([
      ['`return` inside a subroutine; use `retsub`.', 2],
    ]);
    expect(assemble('function F\n    retsub\nendfun\n').diagnostics.map((d) => [d.message, d.line])).toEqual([
      ['`retsub` inside a function; use `return`.', 2],
    ]);
  });

  it('places code at the base address', () => {
    const res = assemble('start:\n    j start\n', 0x100);
    expect(ids(res.diagnostics)).toEqual([]);
    expect(hex(res.block.bytes)).toBe('47 00 01 00 00');
    expect(res.symbols).toEqual([{ kind: 'label', name: 'start', address: 0x100, file: 'test.scasm', line: 1 }]);
  });
});
