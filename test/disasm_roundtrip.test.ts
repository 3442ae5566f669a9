import { describe, expect, it } from 'vitest';
import fc from 'fast-check';
import { readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { assembleSource } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { disassemble } from '../src/disasm/disassemble.js';
import { printTerms } from '../src/disasm/expr.js';
import type { SymbolEntry } from '../src/formats/types.js';
import { fromHex } from '../src/isa/bytes.js';
import { encodeInstructions } from '../src/isa/encode.js';
import type { CodeTarget, ExprTerm, Instruction, JumpConditionType } from '../src/isa/ir.js';
import { CommandFlags, constOperand, regOperand } from '../src/isa/ir.js';
import { isTermOp, TERM_ARITY } from '../src/isa/opcodes.js';
import { argumentRegister } from '../src/isa/operands.js';
import { hex } from './helpers/assemble.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

/**
 * Encode a program whose targets refer to instruction indexes.
 */
function encodeProgram(build: (at: (index: number) => CodeTarget) => Instruction[], baseAddress = 0): Uint8Array {
  const offsets: number[] = [];
  let pos = baseAddress;
  for (const ins of build(() => ({ kind: 'address', address: 0 }))) {
    offsets.push(pos);
    pos += encodeInstructions([ins]).length;
  }
  return encodeInstructions(build((index) => ({ kind: 'address', address: offsets[index] ?? 0 })));
}

function reassemble(bytes: Uint8Array, baseAddress = 0): { text: string; bytes: string } {
  const { text, diagnostics } = disassemble(bytes, { baseAddress });
  expect(diagnostics).toEqual([]);
  const back = assembleSource('roundtrip.scasm', text, { baseAddress });
  expect(back.diagnostics).toEqual([]);
  return { text, bytes: hex(back.block.bytes) };
}

const push = (value: number): ExprTerm => ({ op: 'push', value: constOperand(value) });
const pushReg = (reg: number): ExprTerm => ({ op: 'push', value: regOperand(reg) });

describe('disassembly: canonical text', () => {
  it('prints a recursive function with synthetic labels', async () => {
    const source = await readFile(join(__dirname, 'fixtures', 'gcd.scasm'), 'utf8');
    const assembled = assembleSource('gcd.scasm', source);
    expect(assembled.diagnostics).toEqual([]);

    const { text } = disassemble(assembled.block.bytes);
    expect(text).toBe(
      [
        'L_00000000:',
        '    jc $a1 != 0, L_0000000E',
        '    mov $v1, $a0',
        '    return',
        'L_0000000E:',
        '    exp $a0, $a0 mod $a1',
        '    call L_00000000, $a1, $a0',
        '    return',
        '',
      ].join('\n'),
    );
  });

  it('names labels from a symbol list', async () => {
    const source = await readFile(join(__dirname, 'fixtures', 'gcd.scasm'), 'utf8');
    const assembled = assembleSource('gcd.scasm', source);
    const { text } = disassemble(assembled.block.bytes, { symbols: assembled.symbols });
    expect(text.split('\n').filter((line) => line.endsWith(':'))).toEqual(['GCD:', '_RECUR:']);
    expect(text).toContain('    call GCD, $a1, $a0\n');
  });

  it('falls back to synthetic labels for names that would not read back', () => {
    const bytes = fromHex('47 00 00 00 00');
    const symbols: SymbolEntry[] = [
      { kind: 'label', name: 'nowait', address: 0 },
      { kind: 'label', name: 'mod', address: 0 },
    ];
    expect(disassemble(bytes, { symbols }).text).toBe('L_00000000:\n    j L_00000000\n');
  });

  it('spells targets off instruction boundaries as addresses', () => {
    expect(disassemble(fromHex('47 02 00 00 00')).text).toBe('    j 0x00000002\n');
  });

  it('uses absolute addresses from the base address', () => {
    expect(disassemble(fromHex('47 00 01 00 00'), { baseAddress: 0x100 }).text).toBe(
      'L_00000100:\n    j L_00000100\n',
    );
  });

  it('stops at the first undecodable instruction', () => {
    const res = disassemble(fromHex('50 43 50'), { file: 'block.bin' });
    expect(res.text).toBe('    return\n');
    expect(res.diagnostics).toEqual([
      { id: DiagnosticIds.DecodeError, severity: 'error', message: '0x00000001: Unknown opcode 0x43.', file: 'block.bin' },
    ]);
  });

  it('reports non-canonical encodings separately', () => {
    const res = disassemble(fromHex('41 00 00 00 80 05'));
    expect(res.text).toBe('');
    expect(res.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.NonCanonicalEncoding, '0x00000004: Non-canonical NumberSpec: constant 5 has a shorter encoding.'],
    ]);
  });
});

describe('disassembly: expressions', () => {
  it.each<[string, ExprTerm[], string]>([
    ['infix arithmetic', [pushReg(1), push(2), { op: 'add' }, push(3), { op: 'mul' }], '($v1 + 2) * 3'],
    ['constant pairs as intrinsics', [push(1), push(2), { op: 'add' }], 'add(1, 2)'],
    ['negative constants', [pushReg(1), push(-5), { op: 'sub' }], '$v1 - -5'],
    ['select', [pushReg(1), pushReg(2), pushReg(3), { op: 'select' }], 'select($v3, $v2, $v1)'],
    ['division by a zero constant', [pushReg(1), push(0), { op: 'div' }], 'div($v1, 0)'],
    ['modulo by a zero constant', [pushReg(1), push(0), { op: 'mod' }], 'mod($v1, 0)'],
    ['modulo of constants', [push(7), push(3), { op: 'mod' }], 'mod(7, 3)'],
    ['modulo of mixed kinds', [pushReg(1), { op: 'sin' }, push(2), { op: 'mod' }], 'mod(sin($v1), 2)'],
    ['int division', [pushReg(1), push(2), { op: 'div' }], '$v1 ./ 2'],
    ['logical not', [pushReg(1), { op: 'zero' }], '!$v1'],
    ['a negated constant', [push(5), { op: 'neg' }], 'neg(5)'],
    ['fixed-point multiply of ints', [push(1500), pushReg(1), { op: 'mulr' }], 'mulr(1500, $v1)'],
    ['comparison and logic', [pushReg(1), pushReg(2), { op: 'lt' }, pushReg(3), { op: 'land' }], '$v1 < $v2 && $v3'],
  ])('%s', (_name, terms, text) => {
    expect(printTerms(terms)).toBe(text);
    const res = assembleSource('expr.scasm', `exp $v0, ${text}\n`);
    expect(res.diagnostics).toEqual([]);
    expect(res.block.instructions[0]?.instruction).toEqual({ op: 'exp', dest: 0, terms });
  });
});

describe('disassembly: round trips', () => {
  it('reassembles its own output to the same bytes', () => {
    const bytes = encodeProgram((at) => [
      { op: 'uo', type: 'neg', dest: 3, source: constOperand(5) },
      { op: 'uo', type: 'zero', dest: argumentRegister(2) },
      { op: 'bo', type: 'add', dest: 2, left: regOperand(3), right: constOperand(-7) },
      { op: 'bo', type: 'mov', dest: 1, right: constOperand(1000) },
      { op: 'exp', dest: 0, terms: [pushReg(1), push(1000), { op: 'mul' }, push(1500), { op: 'add' }] },
      { op: 'gt', dest: 4, index: regOperand(1), table: [constOperand(1), constOperand(-1), regOperand(2)] },
      { op: 'jc', cond: 'bitSet', negated: true, left: regOperand(1), right: constOperand(3), target: at(14) },
      { op: 'jc', cond: 'andNotZero', negated: false, left: regOperand(1), right: constOperand(4), target: at(0) },
      { op: 'jt', index: regOperand(0), targets: [at(0), at(14), at(15)] },
      { op: 'rnd', dest: 1, min: constOperand(1), max: regOperand(2) },
      { op: 'push', values: [regOperand(1), regOperand(2)] },
      { op: 'pop', dests: [2, 1] },
      { op: 'call', target: at(15), args: [constOperand(1), regOperand(argumentRegister(0))] },
      { op: 'gosub', target: at(16) },
      { op: 'return' },
      {
        op: 'command',
        name: 'MSGSET',
        operands: [
          { kind: 'msgid', value: 7503 },
          { kind: 'str', value: 'Say "hi" \\ bye' },
        ],
        flags: CommandFlags.nowait,
      },
      {
        op: 'command',
        name: 'SELECT',
        operands: [
          { kind: 'u16', value: 1 },
          { kind: 'u16', value: 2 },
          { kind: 'reg', reg: 3 },
          { kind: 'num', value: constOperand(7) },
          { kind: 'str', value: '' },
          { kind: 'strs', value: ['', 'B'] },
        ],
        flags: 0,
      },
      {
        op: 'command',
        name: 'WIPE',
        operands: [
          { kind: 'num', value: constOperand(1) },
          { kind: 'num', value: regOperand(2) },
          { kind: 'num', value: constOperand(3) },
          { kind: 'mask', values: [undefined, constOperand(5), undefined, regOperand(1)] },
        ],
        flags: 0,
      },
      { op: 'command', name: 'WAIT', operands: [{ kind: 'num', value: constOperand(30) }], flags: CommandFlags.interruptable },
      { op: 'retsub' },
    ]);
    expect(reassemble(bytes).bytes).toBe(hex(bytes));
  });

  it('round-trips at a non-zero base address', () => {
    const bytes = encodeProgram((at) => [{ op: 'j', target: at(1) }, { op: 'return' }], 0x4000);
    expect(reassemble(bytes, 0x4000)).toEqual({
      text: '    j L_00004005\nL_00004005:\n    return\n',
      bytes: hex(bytes),
    });
  });

  it('prints text that disassembles back to itself', async () => {
    const source = await readFile(join(__dirname, 'fixtures', 'dispatch.scasm'), 'utf8');
    const first = assembleSource('dispatch.scasm', source);
    expect(first.diagnostics).toEqual([]);
    const { text, bytes } = reassemble(first.block.bytes);
    expect(bytes).toBe(hex(first.block.bytes));
    expect(disassemble(fromHex(bytes)).text).toBe(text);
  });

  it('reassembles the modulo intrinsic', () => {
    expect(reassemble(fromHex('42 00 00 00 07 00 03 05 ff'))).toEqual({
      text: '    exp $v0, mod(7, 3)\n',
      bytes: '42 00 00 00 07 00 03 05 ff',
    });
  });

  it('escapes control characters in strings', () => {
    const bytes = encodeInstructions([
      {
        op: 'command',
        name: 'SELECT',
        operands: [
          { kind: 'u16', value: 1 },
          { kind: 'u16', value: 2 },
          { kind: 'reg', reg: 3 },
          { kind: 'num', value: constOperand(7) },
          { kind: 'str', value: 'a\nb' },
          { kind: 'strs', value: ['A\t', '\x1b'] },
        ],
        flags: 0,
      },
    ]);
    expect(reassemble(bytes)).toEqual({
      text: '    SELECT 1, 2, $v3, 7, "a\\nb", ["A\\t", "\\x1b"]\n',
      bytes: hex(bytes),
    });
  });

  it('reassembles random programs', () => {
    const operand = fc.oneof(
      fc.integer({ min: -(2 ** 27), max: 2 ** 27 - 1 }).map(constOperand),
      fc.integer({ min: 0, max: 300 }).map(regOperand),
      fc.integer({ min: 0, max: 15 }).map((i) => regOperand(argumentRegister(i))),
    );
    const register = fc.integer({ min: 0, max: 4095 });
    const text = fc.fullUnicodeString({ maxLength: 12 }).filter((v) => !v.includes('\0'));
    const termOps = Object.keys(TERM_ARITY).filter(isTermOp);

    // Any sequence becomes a single-result stack program: ops without enough operands are
    // dropped and leftovers are joined with `lor`.
    const terms = fc
      .array(fc.oneof(operand, fc.constant(constOperand(0)), fc.constantFrom(...termOps)), {
        minLength: 1,
        maxLength: 16,
      })
      .map((steps) => {
        const out: ExprTerm[] = [];
        let depth = 0;
        for (const step of steps) {
          if (typeof step !== 'string') {
            out.push({ op: 'push', value: step });
            depth++;
          } else if (depth >= TERM_ARITY[step]) {
            out.push({ op: step });
            depth += 1 - TERM_ARITY[step];
          }
        }
        if (depth === 0) {
          out.push({ op: 'push', value: constOperand(0) });
          depth = 1;
        }
        for (; depth > 1; depth--) out.push({ op: 'lor' });
        return out;
      });

    type Build = (at: (index: number) => CodeTarget) => Instruction;
    const target = fc.nat({ max: 1000 });
    const instruction: fc.Arbitrary<Build> = fc.oneof(
      fc
        .record({
          type: fc.constantFrom('mov' as const, 'add' as const, 'sub' as const, 'ctz' as const),
          dest: register,
          right: operand,
        })
        .map((r): Build => () => ({ op: 'bo', ...r })),
      fc.record({ dest: register, min: operand, max: operand }).map((r): Build => () => ({ op: 'rnd', ...r })),
      fc.array(operand, { maxLength: 4 }).map((values): Build => () => ({ op: 'push', values })),
      fc.record({ dest: register, terms }).map((r): Build => () => ({ op: 'exp', ...r })),
      fc
        .record({
          cond: fc.constantFrom<JumpConditionType>('eq', 'ne', 'ge', 'gt', 'le', 'lt', 'andNotZero', 'bitSet'),
          negated: fc.boolean(),
          left: operand,
          right: operand,
          to: target,
        })
        .map(({ to, ...r }): Build => (at) => ({ op: 'jc', target: at(to), ...r })),
      target.map((to): Build => (at) => ({ op: 'j', target: at(to) })),
      target.map((to): Build => (at) => ({ op: 'gosub', target: at(to) })),
      fc
        .record({ to: target, args: fc.array(operand, { maxLength: 3 }) })
        .map(({ to, args }): Build => (at) => ({ op: 'call', target: at(to), args })),
      fc
        .record({ index: operand, targets: fc.array(target, { minLength: 1, maxLength: 4 }) })
        .map(({ index, targets }): Build => (at) => ({ op: 'jt', index, targets: targets.map(at) })),
      fc.constant<Build>(() => ({ op: 'return' })),
      fc
        .record({ id: fc.integer({ min: 0, max: 0xffffff }), value: text, nowait: fc.boolean() })
        .map(
          ({ id, value, nowait }): Build =>
            () => ({
              op: 'command',
              name: 'MSGSET',
              operands: [
                { kind: 'msgid', value: id },
                { kind: 'str', value },
              ],
              flags: nowait ? CommandFlags.nowait : 0,
            }),
        ),
      fc
        .record({
          prompt: text,
          first: text,
          rest: fc.array(text.filter((v) => v.length > 0), { maxLength: 3 }),
          dest: fc.integer({ min: 0, max: 300 }),
          choice: operand,
        })
        .map(
          ({ prompt, first, rest, dest, choice }): Build =>
            () => ({
              op: 'command',
              name: 'SELECT',
              operands: [
                { kind: 'u16', value: 1 },
                { kind: 'u16', value: 2 },
                { kind: 'reg', reg: dest },
                { kind: 'num', value: choice },
                { kind: 'str', value: prompt },
                { kind: 'strs', value: [first, ...rest] },
              ],
              flags: 0,
            }),
        ),
      fc
        .record({
          head: fc.array(fc.option(operand, { nil: undefined }), { maxLength: 7 }),
          last: operand,
          time: operand,
        })
        .map(
          ({ head, last, time }): Build =>
            () => ({
              op: 'command',
              name: 'WIPE',
              operands: [
                { kind: 'num', value: constOperand(1) },
                { kind: 'num', value: constOperand(2) },
                { kind: 'num', value: time },
                { kind: 'mask', values: [...head, last] },
              ],
              flags: 0,
            }),
        ),
      fc
        .record({ amount: operand, interruptable: fc.boolean() })
        .map(
          ({ amount, interruptable }): Build =>
            () => ({
              op: 'command',
              name: 'WAIT',
              operands: [{ kind: 'num', value: amount }],
              flags: interruptable ? CommandFlags.interruptable : 0,
            }),
        ),
    );

    fc.assert(
      fc.property(fc.array(instruction, { minLength: 1, maxLength: 8 }), (program) => {
        const bytes = encodeProgram((at) => program.map((build) => build((i) => at(i % program.length))));
        const { text: source, diagnostics } = disassemble(bytes);
        if (diagnostics.length > 0) return false;
        const back = assembleSource('random.scasm', source);
        return back.diagnostics.length === 0 && hex(back.block.bytes) === hex(bytes);
      }),
      { numRuns: 200 },
    );
  });
});
