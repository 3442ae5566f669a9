import { describe, expect, it } from 'vitest';

import { assembleSource } from '../src/compile.js';
import type { AssembleResult } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { UnitCache } from '../src/incremental/cache.js';
import { hex } from './helpers/assemble.js';

const UNIT_A = 'function A($x)\n    mov $v0, $x\nendfun\n';
const UNIT_A2 = 'function A($x, $y)\n    mov $v0, $y\nendfun\n';
const UNIT_B = 'function B\n    call A, 1\nendfun\n';
const UNIT_B2 = 'function B\n    call A, 2\nendfun\n';

function run(cache: UnitCache, text: string): AssembleResult {
  cache.resetStats();
  const cached = assembleSource('main.scasm', text, {}, cache);
  const fresh = assembleSource('main.scasm', text);
  expect(hex(cached.block.bytes)).toBe(hex(fresh.block.bytes));
  expect(cached.diagnostics).toEqual(fresh.diagnostics);
  return cached;
}

describe('incremental unit cache', () => {
  it('reuses every unit of an unchanged file', () => {
    const cache = new UnitCache();
    run(cache, UNIT_A + UNIT_B);
    expect(cache.stats).toEqual({ parse: { hits: 0, misses: 2 }, codegen: { hits: 0, misses: 2 } });

    run(cache, UNIT_A + UNIT_B);
    expect(cache.stats).toEqual({ parse: { hits: 2, misses: 0 }, codegen: { hits: 2, misses: 0 } });
  });

  it('regenerates only the edited unit', () => {
    const cache = new UnitCache();
    run(cache, UNIT_A + UNIT_B);
    const res = run(cache, UNIT_A + UNIT_B2);
    expect(cache.stats).toEqual({ parse: { hits: 1, misses: 1 }, codegen: { hits: 1, misses: 1 } });
    expect(hex(res.block.bytes)).toBe('41 00 00 00 d0 50 4f 00 00 00 00 01 02 50');
  });

  it('regenerates callers when a referenced function changes arity', () => {
    const cache = new UnitCache();
    run(cache, UNIT_A + UNIT_B);
    const res = run(cache, UNIT_A2 + UNIT_B);
    expect(cache.stats).toEqual({ parse: { hits: 1, misses: 1 }, codegen: { hits: 0, misses: 2 } });
    expect(res.diagnostics.map((d) => [d.id, d.message, d.line])).toEqual([
      [DiagnosticIds.ArityMismatch, '`A` takes 2 arguments, got 1.', 5],
    ]);
  });

  it('moves cached diagnostics with their unit', () => {
    const cache = new UnitCache();
    const broken = 'function F\n    mov $v0, $y\nendfun\n';
    expect(run(cache, broken).diagnostics.map((d) => d.line)).toEqual([2]);
    const moved = run(cache, `// header\n\n${broken}`);
    expect(cache.stats.codegen).toEqual({ hits: 1, misses: 1 });
    expect(moved.diagnostics.map((d) => d.line)).toEqual([4]);
  });

  it('sweeps entries the last run did not use', () => {
    const cache = new UnitCache();
    run(cache, UNIT_A + UNIT_B);
    cache.sweep();
    run(cache, UNIT_A + UNIT_B2);
    expect(cache.size).toEqual({ parse: 3, codegen: 3 });
    cache.sweep();
    expect(cache.size).toEqual({ parse: 2, codegen: 2 });
  });

  it('forgets a unit on request', () => {
    const cache = new UnitCache();
    run(cache, UNIT_A + UNIT_B);
    cache.invalidate(UNIT_A);
    run(cache, UNIT_A + UNIT_B);
    expect(cache.stats.parse).toEqual({ hits: 1, misses: 1 });
    cache.clear();
    expect(cache.size).toEqual({ parse: 0, codegen: 0 });
  });
});
