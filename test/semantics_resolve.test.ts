import { describe, expect, it } from 'vitest';

import type { Diagnostic } from '../src/diagnostics/types.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { parseUnit } from '../src/frontend/units.js';
import { fingerprint, resolveGlobals } from '../src/semantics/resolve.js';
import { collectScope } from '../src/semantics/scope.js';
import { assemble, hex, ids } from './helpers/assemble.js';

describe('global scope', () => {
  it('reports a duplicate label against the first declaration', () => {
    const res = assemble('A:\nreturn\nA:\nreturn\n');
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({
      id: DiagnosticIds.DuplicateSymbol,
      message: 'Duplicate label `A`.',
      line: 3,
      column: 1,
      related: [{ message: 'first declared here as a label', file: 'test.scasm', line: 1, column: 1 }],
    });
  });

  it('shares one namespace between labels, functions and value aliases', () => {
    const res = assemble('def F = 1\nfunction F\nendfun\n');
    expect(res.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [DiagnosticIds.DuplicateSymbol, 'Duplicate function `F`.', 2],
    ]);
  });

  it('evaluates value aliases in terms of each other', () => {
    const res = assemble('def N = 2 * 3\ndef M = N + 1.5\nmov $v0, M\n');
    expect(res.diagnostics).toEqual([]);
    expect(hex(res.block.bytes)).toBe('41 00 00 00 90 1d 4c');
    expect(res.symbols).toEqual([
      { kind: 'constant', name: 'N', value: 6, valueKind: 'int', file: 'test.scasm', line: 1 },
      { kind: 'constant', name: 'M', value: 7500, valueKind: 'real', file: 'test.scasm', line: 2 },
    ]);
  });

  it('stores a real alias scaled by 1000', () => {
    const res = assemble('def SPEED = 1.5\nmov $v0, SPEED\n');
    expect(res.diagnostics).toEqual([]);
    expect(hex(res.block.bytes)).toBe('41 00 00 00 85 dc');
  });

  it('reports a value alias cycle once', () => {
    const res = assemble('def A = B\ndef B = A\n');
    expect(res.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [DiagnosticIds.AliasCycle, 'Value alias `A` refers to itself.', 2],
    ]);
  });

  it('reports a self-referencing value alias', () => {
    const res = assemble('def X = X + 1\n');
    expect(ids(res.diagnostics)).toEqual([DiagnosticIds.AliasCycle]);
  });

  it('refuses registers in value aliases', () => {
    const res = assemble('def A = $v1 + 1\n');
    expect(res.diagnostics.map((d) => d.message)).toEqual(['A value alias cannot read register `$v1`.']);
  });
});

describe('register aliases', () => {
  it('resolves through chains of aliases', () => {
    const res = assemble('def $ctr = $v5\ndef $i = $ctr\nmov $i, 1\n');
    expect(res.diagnostics).toEqual([]);
    expect(hex(res.block.bytes)).toBe('41 00 05 00 01');
  });

  it('reports a register alias cycle once', () => {
    const res = assemble('def $p = $q\ndef $q = $p\n');
    expect(res.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [DiagnosticIds.AliasCycle, 'Register alias `$p` refers to itself.', 2],
    ]);
  });

  it('refuses to redefine a built-in register', () => {
    const res = assemble('def $v1 = $v2\n');
    expect(res.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.DuplicateSymbol, '`$v1` is a built-in register and cannot be redefined.'],
    ]);
  });

  it('binds function parameters to argument registers', () => {
    const res = assemble('function F($x, $y)\n    mov $v0, $y\nendfun\n');
    expect(res.diagnostics).toEqual([]);
    expect(hex(res.block.bytes)).toBe('41 00 00 00 d1 50');
  });

  it('refuses to preserve a register bound to a parameter', () => {
    const res = assemble('function F($x) [$a0]\nendfun\n');
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]).toMatchObject({
      id: DiagnosticIds.AliasPreserveConflict,
      message: 'Cannot preserve $a0: it is bound to parameter `$x`.',
      related: [{ message: 'parameter declared here', line: 1 }],
    });
  });
});

describe('code references', () => {
  it('resolves labels declared later', () => {
    const res = assemble('j later\nreturn\nlater:\nreturn\n');
    expect(res.diagnostics).toEqual([]);
    expect(hex(res.block.bytes)).toBe('47 06 00 00 00 50 50');
  });

  it('reports undefined labels', () => {
    const res = assemble('j nowhere\n');
    expect(res.diagnostics.map((d) => [d.id, d.message, d.column])).toEqual([
      [DiagnosticIds.UndefinedSymbol, 'Undefined label `nowhere`.', 3],
    ]);
  });

  it('refuses a value alias as a code address', () => {
    const res = assemble('def N = 1\nj N\n');
    expect(res.diagnostics.map((d) => d.message)).toEqual(['`N` is a value alias, not a code address.']);
  });

  it('refuses gosub to a function', () => {
    const res = assemble('function F\nendfun\ngosub F\n');
    expect(res.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [DiagnosticIds.TypeMismatch, '`F` is a function; `gosub` needs a subroutine or label.', 3],
    ]);
  });

  it('checks call arity against the function header', () => {
    const res = assemble('function F($x)\nendfun\ncall F, 1, 2\n');
    expect(res.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [DiagnosticIds.ArityMismatch, '`F` takes 1 argument, got 2.', 3],
    ]);
  });
});

describe('global fingerprints', () => {
  it('names the identity of every referenced global', () => {
    const diagnostics: Diagnostic[] = [];
    const { program } = parseUnit('t.scasm', 'def $ctr = $v5\ndef N = 6\nfunction F($x)\nendfun\n');
    const globals = resolveGlobals(collectScope([{ program, lineOffset: 0, startOffset: 0 }], diagnostics), diagnostics);
    expect(diagnostics).toEqual([]);
    expect(fingerprint(globals, ['N', 'missing', '$ctr', 'F'])).toBe(
      '$ctr=reg:5\nF=function/1\nN=value/int/6\nmissing=undefined',
    );
  });
});
