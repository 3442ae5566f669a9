import { createHash } from 'node:crypto';

import type { ParsedUnit } from '../frontend/units.js';
import { parseUnit } from '../frontend/units.js';
import type { UnitCode } from '../lowering/emit.js';
import { emitUnit } from '../lowering/emit.js';
import type { ResolvedGlobals } from '../semantics/resolve.js';
import { fingerprint } from '../semantics/resolve.js';

export interface StageStats {
  hits: number;
  misses: number;
}

export interface CacheStats {
  parse: StageStats;
  codegen: StageStats;
}

interface CodegenEntry {
  /** Identities of the globals the unit referenced when it was generated. */
  fingerprint: string;
  code: UnitCode;
}

function sha256(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

function emptyStats(): CacheStats {
  return { parse: { hits: 0, misses: 0 }, codegen: { hits: 0, misses: 0 } };
}

/**
 * Per-unit memo of the parse and codegen stages.
 *
 * Entries are keyed by the SHA-256 of the unit text (plus the file path, which diagnostics
 * carry). Parsed units are reused as long as the text is unchanged; generated code is reused
 * while, in addition, every global the unit references keeps its identity (kind, arity,
 * alias value). Cached results hold unit-relative positions; callers rebase them.
 */
export class UnitCache {
  private readonly parsed = new Map<string, ParsedUnit>();
  private readonly generated = new Map<string, CodegenEntry>();
  private readonly touched = new Set<string>();
  private counters: CacheStats = emptyStats();

  get stats(): CacheStats {
    return {
      parse: { ...this.counters.parse },
      codegen: { ...this.counters.codegen },
    };
  }

  get size(): { parse: number; codegen: number } {
    return { parse: this.parsed.size, codegen: this.generated.size };
  }

  resetStats(): void {
    this.counters = emptyStats();
  }

  parse(path: string, text: string): ParsedUnit {
    const key = this.key(path, text);
    const hit = this.parsed.get(key);
    if (hit) {
      this.counters.parse.hits++;
      return hit;
    }
    this.counters.parse.misses++;
    const unit = parseUnit(path, text);
    this.parsed.set(key, unit);
    return unit;
  }

  /**
   * Generated code for a unit previously returned by {@link parse} with the same text.
   */
  generate(path: string, text: string, unit: ParsedUnit, globals: ResolvedGlobals): UnitCode {
    const key = this.key(path, text);
    const hit = this.generated.get(key);
    if (hit && hit.fingerprint === fingerprint(globals, hit.code.refs)) {
      this.counters.codegen.hits++;
      return hit.code;
    }
    this.counters.codegen.misses++;
    const code = emitUnit(unit.program, globals);
    this.generated.set(key, { fingerprint: fingerprint(globals, code.refs), code });
    return code;
  }

  /**
   * Drop every entry for this unit text, whatever file it came from.
   */
  invalidate(unitText: string): void {
    const prefix = `${sha256(unitText)}:`;
    for (const map of [this.parsed, this.generated]) {
      for (const key of [...map.keys()]) {
        if (key.startsWith(prefix)) map.delete(key);
      }
    }
  }

  clear(): void {
    this.parsed.clear();
    this.generated.clear();
    this.touched.clear();
  }

  /**
   * Drop entries not used since the previous sweep. Call after a compilation to release
   * units that were edited away.
   */
  sweep(): void {
    for (const map of [this.parsed, this.generated]) {
      for (const key of [...map.keys()]) {
        if (!this.touched.has(key)) map.delete(key);
      }
    }
    this.touched.clear();
  }

  private key(path: string, text: string): string {
    const key = `${sha256(text)}:${path}`;
    this.touched.add(key);
    return key;
  }
}
