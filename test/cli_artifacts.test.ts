import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { runCli } from '../src/cli.js';
import { hex } from './helpers/assemble.js';

async function run(args: string[]): Promise<{ code: number; stdout: string; stderr: string }> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const out = vi.spyOn(process.stdout, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stdout.push(String(chunk));
    return true;
  });
  const err = vi.spyOn(process.stderr, 'write').mockImplementation((chunk: string | Uint8Array) => {
    stderr.push(String(chunk));
    return true;
  });
  try {
    const code = await runCli(args);
    return { code, stdout: stdout.join(''), stderr: stderr.join('') };
  } finally {
    out.mockRestore();
    err.mockRestore();
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

describe('cli artifacts', () => {
  let work: string;
  let entry: string;

  beforeEach(async () => {
    work = await mkdtemp(join(tmpdir(), 'scenasm-cli-'));
    entry = join(work, 'main.scasm');
    await writeFile(entry, 'start:\nmov $v0, 1\nj start\n', 'utf8');
  });

  afterEach(async () => {
    await rm(work, { recursive: true, force: true });
  });

  it('writes sibling artifacts next to the -o output path', async () => {
    const outBin = join(work, 'out.bin');
    const res = await run(['-o', outBin, entry]);
    expect(res).toEqual({ code: 0, stdout: `${outBin}\n`, stderr: '' });

    expect(hex(await readFile(outBin))).toBe('41 00 00 00 01 47 00 00 00 00');
    expect(await exists(join(work, 'out.lst'))).toBe(true);
    expect(await exists(join(work, 'out.asm'))).toBe(true);
    expect(await exists(join(work, 'out.sym.json'))).toBe(true);
  });

  it('names artifacts after the input file by default', async () => {
    const res = await run([entry]);
    expect(res.code).toBe(0);
    expect(res.stdout).toBe(`${join(work, 'main.bin')}\n`);
    expect(await exists(join(work, 'main.lst'))).toBe(true);
  });

  it('suppresses artifacts on request', async () => {
    const res = await run(['--nolist', '--noasm', '--nosym', entry]);
    expect(res.code).toBe(0);
    expect(await exists(join(work, 'main.bin'))).toBe(true);
    expect(await exists(join(work, 'main.lst'))).toBe(false);
    expect(await exists(join(work, 'main.asm'))).toBe(false);
    expect(await exists(join(work, 'main.sym.json'))).toBe(false);
  });

  it('assembles at the --base address', async () => {
    const res = await run(['--base', '0x100', '-n', entry]);
    expect(res.code).toBe(0);
    expect(hex(await readFile(join(work, 'main.bin')))).toBe('41 00 00 00 01 47 00 01 00 00');
  });

  it('disassembles with labels from a symbol map', async () => {
    expect((await run([entry])).code).toBe(0);
    const back = join(work, 'back.asm');
    const res = await run(['-d', '--sym', join(work, 'main.sym.json'), '-o', back, join(work, 'main.bin')]);
    expect(res).toEqual({ code: 0, stdout: `${back}\n`, stderr: '' });
    expect(await readFile(back, 'utf8')).toBe('start:\n    mov $v0, 1\n    j start\n');
  });

  it('exits 1 and writes nothing when the source has errors', async () => {
    await writeFile(entry, 'j nowhere\n', 'utf8');
    const res = await run([entry]);
    expect(res.code).toBe(1);
    expect(res.stdout).toBe('');
    expect(res.stderr).toBe(`${entry}:1:3: error: [SCN301] Undefined label \`nowhere\`.\n`);
    expect(await exists(join(work, 'main.bin'))).toBe(false);
  });
});

describe('cli usage', () => {
  it('prints the package version', async () => {
    expect(await run(['-V'])).toEqual({ code: 0, stdout: '0.1.0\n', stderr: '' });
  });

  it('prints help', async () => {
    const res = await run(['--help']);
    expect(res.code).toBe(0);
    expect(res.stdout.split('\n')[0]).toBe('scenasm [options] <entry.scasm>');
  });

  it.each([
    [['--frob', 'main.scasm'], 'Unknown option "--frob"'],
    [['-o', 'out.hex', 'main.scasm'], '--output must end with ".bin" when assembling'],
    [['-d', '-o', 'out.bin', 'main.bin'], '--output must end with ".asm" when disassembling'],
    [['--sym', 'main.sym.json', 'main.scasm'], '--sym is only used with --disassemble'],
    [['--base', '-1', 'main.scasm'], '--base expects an address between 0 and 0xffffffff, got "-1"'],
    [['a.scasm', 'b.scasm'], 'Expected exactly one input file argument (and it must be last)'],
    [[], 'Expected exactly one input file argument (and it must be last)'],
  ])('rejects %j', async (args, message) => {
    const res = await run(args);
    expect(res.code).toBe(2);
    expect(res.stdout).toBe('');
    expect(res.stderr.split('\n')[0]).toBe(`scenasm: ${message}`);
  });
});
