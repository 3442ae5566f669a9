#!/usr/bin/env node
import { mkdir, writeFile } from 'node:fs/promises';
import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { dirname, extname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { compile, decompile } from './compile.js';
import { compareDiagnostics, formatDiagnostic, hasErrors } from './diagnostics/report.js';
import { defaultFormatWriters } from './formats/index.js';
import type { Artifact } from './formats/types.js';

type CliExit = { code: number };

type CliOptions = {
  mode: 'assemble' | 'disassemble';
  inputFile: string;
  outputPath?: string;
  baseAddress: number;
  symbolsFile?: string;
  emitListing: boolean;
  emitAsm: boolean;
  emitSymbols: boolean;
};

function usage(): string {
  return [
    'scenasm [options] <entry.scasm>',
    'scenasm -d [options] <block.bin>',
    '',
    'Options:',
    '  -d, --disassemble     Disassemble a code block into canonical source',
    '  -o, --output <file>   Primary output path (.bin when assembling, .asm when disassembling)',
    '      --base <addr>     Load address of the block (decimal or 0x hex, default 0)',
    '      --sym <file>      Symbol map naming labels when disassembling',
    '  -n, --nolist          Suppress .lst',
    '      --noasm           Suppress .asm',
    '      --nosym           Suppress .sym.json',
    '  -V, --version         Print version',
    '  -h, --help            Show help',
    '',
    'Notes:',
    '  - The input file must be the last argument (assembler-style).',
    '  - Output artifacts are written next to the primary output using the artifact base name.',
    '',
  ].join('\n');
}

function fail(message: string): never {
  throw Object.assign(new Error(message), { name: 'CliError' });
}

function parseAddress(text: string): number {
  const value = /^(0x[0-9a-f]+|[0-9]+)$/i.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(value) || value < 0 || value > 0xffffffff) {
    fail(`--base expects an address between 0 and 0xffffffff, got "${text}"`);
  }
  return value;
}

function packageVersion(): string {
  const here = dirname(fileURLToPath(import.meta.url));
  // src/cli.ts and dist/src/cli.js sit at different depths below the package root.
  for (const candidate of [resolve(here, '..', 'package.json'), resolve(here, '..', '..', 'package.json')]) {
    if (!existsSync(candidate)) continue;
    const pkg: unknown = JSON.parse(readFileSync(candidate, 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

function parseArgs(argv: string[]): CliOptions | CliExit {
  let mode: CliOptions['mode'] = 'assemble';
  let outputPath: string | undefined;
  let baseAddress = 0;
  let symbolsFile: string | undefined;
  let emitListing = true;
  let emitAsm = true;
  let emitSymbols = true;
  let inputFile: string | undefined;

  const valueOf = (a: string, name: string, i: number): string => {
    const v = a.startsWith(`${name}=`) ? a.slice(name.length + 1) : argv[i];
    if (!v) fail(`${name} expects a value`);
    return v;
  };

  for (let i = 0; i < argv.length; i++) {
    const a = argv[i] ?? '';
    if (a === '-h' || a === '--help') {
      process.stdout.write(usage());
      return { code: 0 };
    }
    if (a === '-V' || a === '--version') {
      process.stdout.write(`${packageVersion()}\n`);
      return { code: 0 };
    }
    if (a === '-d' || a === '--disassemble') {
      mode = 'disassemble';
      continue;
    }
    if (a === '-o' || a === '--output' || a.startsWith('--output=')) {
      outputPath = a.includes('=') ? valueOf(a, '--output', i) : valueOf(a, a, ++i);
      continue;
    }
    if (a === '--base' || a.startsWith('--base=')) {
      baseAddress = parseAddress(a.includes('=') ? valueOf(a, '--base', i) : valueOf(a, a, ++i));
      continue;
    }
    if (a === '--sym' || a.startsWith('--sym=')) {
      symbolsFile = a.includes('=') ? valueOf(a, '--sym', i) : valueOf(a, a, ++i);
      continue;
    }
    if (a === '-n' || a === '--nolist') {
      emitListing = false;
      continue;
    }
    if (a === '--noasm') {
      emitAsm = false;
      continue;
    }
    if (a === '--nosym') {
      emitSymbols = false;
      continue;
    }
    if (a.startsWith('-')) {
      fail(`Unknown option "${a}"`);
    }
    if (inputFile !== undefined || i !== argv.length - 1) {
      fail(`Expected exactly one input file argument (and it must be last)`);
    }
    inputFile = a;
  }

  if (!inputFile) {
    fail(`Expected exactly one input file argument (and it must be last)`);
  }

  const wantExt = mode === 'assemble' ? '.bin' : '.asm';
  if (outputPath && extname(outputPath).toLowerCase() !== wantExt) {
    fail(`--output must end with "${wantExt}" when ${mode === 'assemble' ? 'assembling' : 'disassembling'}`);
  }
  if (symbolsFile !== undefined && mode !== 'disassemble') {
    fail(`--sym is only used with --disassemble`);
  }

  return {
    mode,
    inputFile,
    ...(outputPath ? { outputPath } : {}),
    baseAddress,
    ...(symbolsFile !== undefined ? { symbolsFile } : {}),
    emitListing,
    emitAsm,
    emitSymbols,
  };
}

function artifactBase(inputFile: string, outputPath?: string): string {
  const primary = resolve(outputPath ?? inputFile);
  const ext = extname(primary);
  return ext.length > 0 ? primary.slice(0, -ext.length) : primary;
}

async function writeArtifacts(base: string, artifacts: Artifact[]): Promise<string[]> {
  await mkdir(dirname(base), { recursive: true });
  const written: string[] = [];
  const writes: Array<Promise<void>> = [];
  for (const artifact of artifacts) {
    switch (artifact.kind) {
      case 'bin':
        written.push(`${base}.bin`);
        writes.push(writeFile(`${base}.bin`, artifact.bytes));
        break;
      case 'lst':
        written.push(`${base}.lst`);
        writes.push(writeFile(`${base}.lst`, artifact.text, 'utf8'));
        break;
      case 'asm':
        written.push(`${base}.asm`);
        writes.push(writeFile(`${base}.asm`, artifact.text, 'utf8'));
        break;
      case 'sym':
        written.push(`${base}.sym.json`);
        writes.push(writeFile(`${base}.sym.json`, JSON.stringify(artifact.json, null, 2) + '\n', 'utf8'));
        break;
    }
  }
  await Promise.all(writes);
  return written;
}

export async function runCli(argv: string[]): Promise<number> {
  try {
    const parsed = parseArgs(argv);
    if ('code' in parsed) return parsed.code;

    const base = artifactBase(parsed.inputFile, parsed.outputPath);
    const res =
      parsed.mode === 'assemble'
        ? await compile(
            parsed.inputFile,
            {
              baseAddress: parsed.baseAddress,
              emitBin: true,
              emitListing: parsed.emitListing,
              emitAsm: parsed.emitAsm,
              emitSymbols: parsed.emitSymbols,
            },
            { formats: defaultFormatWriters },
          )
        : await decompile(parsed.inputFile, {
            baseAddress: parsed.baseAddress,
            ...(parsed.symbolsFile !== undefined ? { symbolsFile: parsed.symbolsFile } : {}),
          });

    for (const d of [...res.diagnostics].sort(compareDiagnostics)) {
      process.stderr.write(`${formatDiagnostic(d)}\n`);
    }
    if (hasErrors(res.diagnostics)) return 1;

    const written = await writeArtifacts(base, res.artifacts);
    // Primary output first: the block when assembling, the source when disassembling.
    const primary = `${base}${parsed.mode === 'assemble' ? '.bin' : '.asm'}`;
    if (written.includes(primary)) process.stdout.write(`${primary}\n`);
    return 0;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    process.stderr.write(`scenasm: ${msg}\n`);
    process.stderr.write(`${usage()}\n`);
    return 2;
  }
}

function normalizePathForCompare(path: string): string {
  const resolved = resolve(path);
  const real = (() => {
    try {
      return realpathSync.native(resolved);
    } catch {
      return resolved;
    }
  })();
  const normalized = real.replace(/\\/g, '/');
  return process.platform === 'win32' ? normalized.toLowerCase() : normalized;
}

function isDirectCliInvocation(invokedAs: string | undefined): boolean {
  if (!invokedAs) return false;
  return normalizePathForCompare(invokedAs) === normalizePathForCompare(fileURLToPath(import.meta.url));
}

if (isDirectCliInvocation(process.argv[1])) {
  // eslint-disable-next-line no-void
  void runCli(process.argv.slice(2)).then((code) => process.exit(code));
}
