import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile, decompile } from '../src/compile.js';
import { DiagnosticIds } from '../src/diagnostics/types.js';
import { defaultFormatWriters } from '../src/formats/index.js';
import type { Artifact, AsmArtifact, BinArtifact, ListingArtifact, SymbolsArtifact } from '../src/formats/types.js';
import { UnitCache } from '../src/incremental/cache.js';
import { hex } from './helpers/assemble.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const SOURCE = 'start:\nmov $v0, 1\nj start\n';

function pick<A extends Artifact>(artifacts: Artifact[], guard: (a: Artifact) => a is A): A {
  const found = artifacts.find(guard);
  if (!found) throw new Error('missing artifact');
  return found;
}

const isBin = (a: Artifact): a is BinArtifact => a.kind === 'bin';
const isListing = (a: Artifact): a is ListingArtifact => a.kind === 'lst';
const isAsm = (a: Artifact): a is AsmArtifact => a.kind === 'asm';
const isSymbols = (a: Artifact): a is SymbolsArtifact => a.kind === 'sym';

describe('compile pipeline', () => {
  let work: string;
  let entry: string;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'scenasm-pipeline-'));
    entry = join(work, 'main.scasm');
    await writeFile(entry, SOURCE, 'utf8');
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('produces every artifact by default', async () => {
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts.map((a) => a.kind)).toEqual(['bin', 'lst', 'asm', 'sym']);

    expect(hex(pick(res.artifacts, isBin).bytes)).toBe('41 00 00 00 01 47 00 00 00 00');
    expect(pick(res.artifacts, isListing).text).toBe(
      [
        '// scenasm listing',
        '// base: 0x00000000 size: 10 bytes',
        '',
        'start:',
        '00000000  41 00 00 00 01           mov $v0, 1',
        '00000005  47 00 00 00 00           j start',
        '',
        '// symbols:',
        '// label start = 0x00000000',
        '',
      ].join('\n'),
    );
    expect(pick(res.artifacts, isAsm).text).toBe(
      [
        '// scenasm canonical source',
        '// base: 0x00000000 size: 10',
        '',
        'start:',
        '    mov $v0, 1',
        '    j start',
        '',
      ].join('\n'),
    );
    expect(pick(res.artifacts, isSymbols).json).toEqual({
      format: 'scenasm-symbols',
      version: 1,
      baseAddress: 0,
      size: 10,
      symbols: [{ kind: 'label', name: 'start', address: 0, file: 'main.scasm', line: 1 }],
    });
  });

  it('assembles at a base address', async () => {
    const res = await compile(entry, { baseAddress: 0x100 }, { formats: defaultFormatWriters });
    expect(hex(pick(res.artifacts, isBin).bytes)).toBe('41 00 00 00 01 47 00 01 00 00');
    expect(pick(res.artifacts, isListing).text.split('\n')[1]).toBe('// base: 0x00000100 size: 10 bytes');
  });

  it('skips artifacts that were not asked for', async () => {
    const res = await compile(
      entry,
      { emitListing: false, emitAsm: false, emitSymbols: false },
      { formats: defaultFormatWriters },
    );
    expect(res.artifacts.map((a) => a.kind)).toEqual(['bin']);
  });

  it('warns when a requested artifact has no writer', async () => {
    const res = await compile(entry, {}, { formats: { writeBin: defaultFormatWriters.writeBin } });
    expect(res.artifacts.map((a) => a.kind)).toEqual(['bin']);
    expect(res.diagnostics.map((d) => [d.id, d.severity, d.message])).toEqual([
      [DiagnosticIds.Unknown, 'warning', 'emitListing=true but no writer is configured; skipping .lst artifact.'],
      [DiagnosticIds.Unknown, 'warning', 'emitAsm=true but no writer is configured; skipping .asm artifact.'],
      [DiagnosticIds.Unknown, 'warning', 'emitSymbols=true but no writer is configured; skipping .sym.json artifact.'],
    ]);
  });

  it('reports an unreadable entry file', async () => {
    const res = await compile(join(work, 'missing.scasm'), {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics).toHaveLength(1);
    expect(res.diagnostics[0]?.id).toBe(DiagnosticIds.IoReadFailed);
    expect(res.diagnostics[0]?.message.startsWith('Failed to read entry file:')).toBe(true);
  });

  it('produces no artifacts when there are errors', async () => {
    await writeFile(entry, 'j nowhere\n', 'utf8');
    const res = await compile(entry, {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics.map((d) => [d.id, d.file, d.line])).toEqual([[DiagnosticIds.UndefinedSymbol, entry, 1]]);
  });

  it('reports errors against the fixture path', async () => {
    const broken = join(__dirname, 'fixtures', 'broken.scasm');
    const res = await compile(broken, {}, { formats: defaultFormatWriters });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics.map((d) => [d.id, d.message, d.file, d.line])).toEqual([
      [DiagnosticIds.UndefinedSymbol, 'Unknown register `$y`.', broken, 2],
    ]);
  });

  it('reuses units through a shared cache', async () => {
    const cache = new UnitCache();
    await compile(entry, {}, { formats: defaultFormatWriters, cache });
    cache.resetStats();
    const res = await compile(entry, {}, { formats: defaultFormatWriters, cache });
    expect(res.diagnostics).toEqual([]);
    expect(cache.stats).toEqual({ parse: { hits: 1, misses: 0 }, codegen: { hits: 1, misses: 0 } });
  });
});

describe('decompile pipeline', () => {
  let work: string;
  let bin: string;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'scenasm-decompile-'));
    bin = join(work, 'block.bin');
    await writeFile(bin, Uint8Array.from([0x41, 0x00, 0x00, 0x00, 0x01, 0x47, 0x00, 0x00, 0x00, 0x00]));
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('prints a block with synthetic labels', async () => {
    const res = await decompile(bin, {});
    expect(res.diagnostics).toEqual([]);
    expect(res.artifacts).toEqual([{ kind: 'asm', text: 'L_00000000:\n    mov $v0, 1\n    j L_00000000\n' }]);
  });

  it('names labels from a symbol map', async () => {
    const sym = join(work, 'block.sym.json');
    await writeFile(
      sym,
      JSON.stringify({
        format: 'scenasm-symbols',
        version: 1,
        baseAddress: 0,
        size: 10,
        symbols: [{ kind: 'label', name: 'start', address: 0 }],
      }),
      'utf8',
    );
    const res = await decompile(bin, { symbolsFile: sym });
    expect(res.artifacts).toEqual([{ kind: 'asm', text: 'start:\n    mov $v0, 1\n    j start\n' }]);
  });

  it('rejects a file that is not a symbol map', async () => {
    const sym = join(work, 'other.json');
    await writeFile(sym, '{"format":"other"}', 'utf8');
    const res = await decompile(bin, { symbolsFile: sym });
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics.map((d) => [d.id, d.message])).toEqual([
      [DiagnosticIds.IoReadFailed, 'Not a scenasm symbol map.'],
    ]);
  });

  it('reports undecodable input', async () => {
    await writeFile(bin, Uint8Array.from([0x43]));
    const res = await decompile(bin, {});
    expect(res.artifacts).toEqual([]);
    expect(res.diagnostics.map((d) => [d.id, d.message, d.file])).toEqual([
      [DiagnosticIds.DecodeError, '0x00000000: Unknown opcode 0x43.', bin],
    ]);
  });
});
