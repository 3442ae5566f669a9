import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt, labelAt, rebaseDiagnostics, warnAt } from '../diagnostics/report.js';
import type {
  ExprNode,
  FunctionNode,
  InstructionNode,
  ProgramNode,
  SourceSpan,
  StatementNode,
  SubroutineNode,
} from '../frontend/ast.js';
import { rebaseSpan } from '../frontend/source.js';
import { ByteWriter, EncodeFailure } from '../isa/bytes.js';
import type { CommandDef } from '../isa/commands.js';
import { commandByName, flagOperands, positionalOperands } from '../isa/commands.js';
import { encodeInstruction } from '../isa/encode.js';
import type {
  CodeTarget,
  CommandOperandValue,
  Instruction,
  JumpConditionType,
  NumberOperand,
  PlacedInstruction,
} from '../isa/ir.js';
import { CommandFlags, constOperand, regOperand } from '../isa/ir.js';
import { isBinaryOpType, isUnaryOpType } from '../isa/opcodes.js';
import {
  ADDRESSABLE_ARGUMENTS,
  ARGUMENT_REGISTER_BASE,
  argumentRegister,
  isArgumentRegister,
  parseRegisterName,
  registerName,
} from '../isa/operands.js';
import { lowerConst, lowerExpression, toTerms } from '../semantics/expr.js';
import type { ResolvedGlobals } from '../semantics/resolve.js';
import { UnitResolver } from '../semantics/resolve.js';
import type { SymbolKind } from '../semantics/scope.js';

/**
 * A u32 code address to patch once every unit has an address.
 */
export interface Relocation {
  /** Byte offset of the u32 within the unit. */
  offset: number;
  symbol: string;
  span: SourceSpan;
}

export interface UnitLabel {
  name: string;
  /** Byte offset within the unit. */
  offset: number;
  kind: 'label' | 'function' | 'subroutine';
}

/**
 * Generated code of one unit. Offsets are unit-relative; spans are relative to the unit text.
 */
export interface UnitCode {
  bytes: Uint8Array;
  labels: UnitLabel[];
  relocations: Relocation[];
  instructions: PlacedInstruction[];
  diagnostics: Diagnostic[];
  /** Globals the unit referenced (register aliases as `$name`). */
  refs: string[];
}

type BlockContext = 'top' | 'function' | 'subroutine';

const JUMP_CONDITIONS: ReadonlyMap<string, JumpConditionType> = new Map<string, JumpConditionType>([
  ['==', 'eq'],
  ['!=', 'ne'],
  ['>=', 'ge'],
  ['>', 'gt'],
  ['<=', 'le'],
  ['<', 'lt'],
  ['&', 'andNotZero'],
]);

const ANY_CODE: readonly SymbolKind[] = ['label', 'function', 'subroutine'];

/**
 * Generate code for one unit.
 *
 * Instructions with errors produce no bytes; an operand that does not fit its encoding drops
 * the bytes of the whole unit (labels are kept so other units still resolve).
 */
export function emitUnit(program: ProgramNode, globals: ResolvedGlobals): UnitCode {
  const diagnostics: Diagnostic[] = [];
  const resolver = new UnitResolver(globals, diagnostics);
  const w = new ByteWriter();
  const labels: UnitLabel[] = [];
  const relocations: Relocation[] = [];
  const instructions: PlacedInstruction[] = [];
  let overflow = false;

  const error = (id: DiagnosticId, span: SourceSpan, message: string): undefined => {
    errorAt(diagnostics, id, span, message);
    return undefined;
  };

  const place = (ins: Instruction, span: SourceSpan): void => {
    if (overflow) return;
    const offset = w.length;
    try {
      encodeInstruction(w, ins, (target, at) => {
        if (target.kind === 'address') return target.address;
        relocations.push({ offset: at, symbol: target.name, span });
        return 0;
      });
    } catch (err) {
      if (!(err instanceof EncodeFailure)) throw err;
      overflow = true;
      error(DiagnosticIds.OperandOverflow, span, err.message);
      return;
    }
    instructions.push({ offset, size: w.length - offset, instruction: ins, span });
  };

  // -------------------------------------------------------------------------
  // operands

  const num = (expr: ExprNode): NumberOperand | undefined => {
    if (expr.kind === 'Register') {
      const reg = resolver.register(expr.name, expr.span);
      return reg === undefined ? undefined : regOperand(reg);
    }
    const value = lowerConst(expr, resolver);
    return value === undefined ? undefined : constOperand(value.value);
  };

  const int = (expr: ExprNode): number | undefined => lowerConst(expr, resolver)?.value;

  const dest = (expr: ExprNode): number | undefined => {
    if (expr.kind === 'Register') return resolver.register(expr.name, expr.span);
    if (expr.kind === 'Missing') return undefined;
    return error(DiagnosticIds.TypeMismatch, expr.span, 'Expected a register.');
  };

  const target = (expr: ExprNode, allowed: readonly SymbolKind[], what: string): CodeTarget | undefined => {
    if (expr.kind === 'Name') {
      const symbol = resolver.codeSymbol(expr.name, expr.span);
      if (!symbol) return undefined;
      if (!allowed.includes(symbol.kind)) {
        return error(
          DiagnosticIds.TypeMismatch,
          expr.span,
          `\`${expr.name}\` is a ${symbol.kind}; ${what} needs a ${allowed.join(' or ')}.`,
        );
      }
      return { kind: 'symbol', name: expr.name };
    }
    const value = int(expr);
    return value === undefined ? undefined : { kind: 'address', address: value >>> 0 };
  };

  const array = (expr: ExprNode): ExprNode[] | undefined => {
    if (expr.kind === 'Array') return expr.elements;
    if (expr.kind === 'Missing') return undefined;
    return error(DiagnosticIds.TypeMismatch, expr.span, 'Expected a `[...]` list.');
  };

  const all = <T>(items: readonly ExprNode[], lower: (e: ExprNode) => T | undefined): T[] | undefined => {
    const out: T[] = [];
    let failed = false;
    for (const item of items) {
      const v = lower(item);
      if (v === undefined) failed = true;
      else out.push(v);
    }
    return failed ? undefined : out;
  };

  const str = (expr: ExprNode): string | undefined => {
    if (expr.kind === 'String') return expr.value;
    if (expr.kind === 'Missing') return undefined;
    return error(DiagnosticIds.TypeMismatch, expr.span, 'Expected a string literal.');
  };

  const arity = (node: InstructionNode, min: number, max = min): boolean => {
    const n = node.args.length;
    if (n >= min && n <= max) return true;
    const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} or ${max}`;
    error(
      DiagnosticIds.ArityMismatch,
      node.span,
      `\`${node.mnemonic}\` takes ${expected} operand${expected === '1' ? '' : 's'}, got ${n}.`,
    );
    return false;
  };

  // -------------------------------------------------------------------------
  // instructions

  const condition = (
    expr: ExprNode,
  ): { cond: JumpConditionType; negated: boolean; left: NumberOperand; right: NumberOperand } | undefined => {
    let e = expr;
    let negated = false;
    while (e.kind === 'Unary' && e.op === '!') {
      negated = !negated;
      e = e.operand;
    }
    let cond: JumpConditionType = 'ne';
    let operands: ExprNode[] = [e, { kind: 'Int', span: e.span, value: 0 }];
    if (e.kind === 'Binary' && JUMP_CONDITIONS.has(e.op)) {
      cond = JUMP_CONDITIONS.get(e.op) ?? 'ne';
      operands = [e.left, e.right];
    } else if (e.kind === 'Call' && e.callee === 'bitset') {
      if (e.args.length !== 2) {
        return error(DiagnosticIds.ArityMismatch, e.span, '`bitset` takes 2 arguments.');
      }
      cond = 'bitSet';
      operands = e.args;
    }
    const lowered = all(operands, num);
    const [left, right] = lowered ?? [];
    if (!left || !right) return undefined;
    return { cond, negated, left, right };
  };

  const jumpTable = (expr: ExprNode): CodeTarget[] | undefined => {
    if (expr.kind !== 'JumpTable') {
      if (expr.kind === 'Missing') return undefined;
      return error(DiagnosticIds.TypeMismatch, expr.span, 'Expected a `{ key => label, ... }` table.');
    }
    const entries = new Map<number, { target: CodeTarget | undefined; span: SourceSpan }>();
    let failed = false;
    for (const c of expr.cases) {
      const key = int(c.key);
      const t = target(c.target, ANY_CODE, '`jt`');
      if (key === undefined) {
        failed = true;
        continue;
      }
      if (key < 0) {
        error(DiagnosticIds.JumpTableKeyError, c.key.span, `Jump table key ${key} is negative.`);
        failed = true;
        continue;
      }
      const first = entries.get(key);
      if (first) {
        warnAt(
          diagnostics,
          DiagnosticIds.DuplicateJumpTableCase,
          c.span,
          `Duplicate jump table case ${key}; the first one is used.`,
          [labelAt(first.span, 'first case here')],
        );
        continue;
      }
      entries.set(key, { target: t, span: c.span });
    }
    const max = Math.max(-1, ...entries.keys());
    const targets: CodeTarget[] = [];
    for (let key = 0; key <= max; key++) {
      const entry = entries.get(key);
      if (!entry) {
        error(DiagnosticIds.JumpTableKeyError, expr.span, `Jump table has no case for key ${key}.`);
        failed = true;
      } else if (!entry.target) {
        failed = true;
      } else {
        targets.push(entry.target);
      }
    }
    return failed ? undefined : targets;
  };

  const command = (node: InstructionNode, def: CommandDef): Instruction | undefined => {
    const positional = positionalOperands(def);
    const flagDefs = flagOperands(def);
    let flags = 0;
    let failed = false;
    for (const flag of node.flags) {
      const flagDef = flagDefs.find((f) => f.flag === flag.name);
      if (!flagDef) {
        error(DiagnosticIds.EncodeError, flag.span, `\`${node.mnemonic}\` does not take \`${flag.name}\`.`);
        failed = true;
        continue;
      }
      flags |= CommandFlags[flagDef.flag];
    }
    if (!arity(node, positional.length)) return undefined;

    const operands: CommandOperandValue[] = [];
    positional.forEach((operand, i) => {
      const expr = node.args[i];
      if (!expr) return;
      let value: CommandOperandValue | undefined;
      switch (operand.kind) {
        case 'u8':
        case 'u16':
        case 'msgid': {
          const v = int(expr);
          if (v !== undefined) value = { kind: operand.kind, value: v };
          break;
        }
        case 'bool': {
          const v = int(expr);
          if (v === 0 || v === 1) value = { kind: 'bool', value: v === 1 };
          else if (v !== undefined) error(DiagnosticIds.TypeMismatch, expr.span, `\`${operand.name}\` must be 0 or 1.`);
          break;
        }
        case 'reg': {
          const reg = dest(expr);
          if (reg !== undefined) value = { kind: 'reg', reg };
          break;
        }
        case 'num': {
          const v = num(expr);
          if (v) value = { kind: 'num', value: v };
          break;
        }
        case 'str': {
          const v = str(expr);
          if (v !== undefined) value = { kind: 'str', value: v };
          break;
        }
        case 'strs': {
          const items = array(expr);
          const v = items && all(items, str);
          if (v) value = { kind: 'strs', value: v };
          break;
        }
        case 'mask': {
          const items = array(expr);
          if (!items) break;
          const values: (NumberOperand | undefined)[] = [];
          let bad = false;
          for (const item of items) {
            if (item.kind === 'Name' && item.name === '_') {
              values.push(undefined);
              continue;
            }
            const v = num(item);
            if (v) values.push(v);
            else bad = true;
          }
          if (!bad) value = { kind: 'mask', values };
          break;
        }
        case 'nums': {
          const items = array(expr);
          const v = items && all(items, num);
          if (v) value = { kind: 'nums', values: v };
          break;
        }
      }
      if (value) operands.push(value);
      else failed = true;
    });
    if (failed) return undefined;
    return { op: 'command', name: def.name, operands, flags };
  };

  const instruction = (node: InstructionNode, context: BlockContext): Instruction | undefined => {
    const name = node.mnemonic.toLowerCase();
    const args = node.args;
    const [a0, a1, a2] = args;

    const def = isInstructionName(name) ? undefined : commandByName(node.mnemonic);
    if (def) return command(node, def);
    const [flag] = node.flags;
    if (flag) return error(DiagnosticIds.EncodeError, flag.span, `\`${node.mnemonic}\` takes no flags.`);

    if (isUnaryOpType(name)) {
      if (!arity(node, 1, 2) || !a0) return undefined;
      const d = dest(a0);
      const source = a1 ? num(a1) : undefined;
      if (d === undefined || (a1 && !source)) return undefined;
      return source ? { op: 'uo', type: name, dest: d, source } : { op: 'uo', type: name, dest: d };
    }
    if (isBinaryOpType(name)) {
      if (!arity(node, 2, 3) || !a0 || !a1) return undefined;
      const d = dest(a0);
      const explicit = a2 !== undefined;
      const left = explicit ? num(a1) : undefined;
      const right = num(a2 ?? a1);
      if (d === undefined || !right || (explicit && !left)) return undefined;
      return left ? { op: 'bo', type: name, dest: d, left, right } : { op: 'bo', type: name, dest: d, right };
    }

    switch (name) {
      case 'exp': {
        if (!arity(node, 2) || !a0 || !a1) return undefined;
        const d = dest(a0);
        const tree = lowerExpression(a1, resolver);
        if (d === undefined || !tree) return undefined;
        return { op: 'exp', dest: d, terms: toTerms(tree) };
      }
      case 'gt': {
        if (!arity(node, 3) || !a0 || !a1 || !a2) return undefined;
        const d = dest(a0);
        const index = num(a1);
        const items = array(a2);
        const table = items && all(items, num);
        if (d === undefined || !index || !table) return undefined;
        return { op: 'gt', dest: d, index, table };
      }
      case 'jc': {
        if (!arity(node, 2) || !a0 || !a1) return undefined;
        const cond = condition(a0);
        const t = target(a1, ANY_CODE, '`jc`');
        if (!cond || !t) return undefined;
        return { op: 'jc', ...cond, target: t };
      }
      case 'j': {
        if (!arity(node, 1) || !a0) return undefined;
        const t = target(a0, ANY_CODE, '`j`');
        return t && { op: 'j', target: t };
      }
      case 'gosub': {
        if (!arity(node, 1) || !a0) return undefined;
        const t = target(a0, ['subroutine', 'label'], '`gosub`');
        return t && { op: 'gosub', target: t };
      }
      case 'call': {
        if (!arity(node, 1, Infinity) || !a0) return undefined;
        const t = target(a0, ['function', 'label'], '`call`');
        const callArgs = all(args.slice(1), num);
        if (!t || !callArgs) return undefined;
        const callee = a0.kind === 'Name' ? globals.scope.symbols.get(a0.name) : undefined;
        if (callee?.kind === 'function' && callee.arity !== callArgs.length) {
          return error(
            DiagnosticIds.ArityMismatch,
            node.span,
            `\`${callee.name}\` takes ${callee.arity} argument${callee.arity === 1 ? '' : 's'}, got ${callArgs.length}.`,
          );
        }
        return { op: 'call', target: t, args: callArgs };
      }
      case 'retsub':
        if (!arity(node, 0)) return undefined;
        if (context === 'function') {
          return error(DiagnosticIds.EncodeError, node.mnemonicSpan, '`retsub` inside a function; use `return`.');
        }
        return { op: 'retsub' };
      case 'return':
        if (!arity(node, 0)) return undefined;
        if (context === 'subroutine') {
          return error(DiagnosticIds.EncodeError, node.mnemonicSpan, '`return` inside a subroutine; use `retsub`.');
        }
        return { op: 'return' };
      case 'jt': {
        if (!arity(node, 2) || !a0 || !a1) return undefined;
        const index = num(a0);
        const targets = jumpTable(a1);
        if (!index || !targets) return undefined;
        return { op: 'jt', index, targets };
      }
      case 'rnd': {
        if (!arity(node, 3) || !a0 || !a1 || !a2) return undefined;
        const d = dest(a0);
        const min = num(a1);
        const max = num(a2);
        if (d === undefined || !min || !max) return undefined;
        return { op: 'rnd', dest: d, min, max };
      }
      case 'push': {
        const values = all(args, num);
        return values && { op: 'push', values };
      }
      case 'pop': {
        const dests = all(args, dest);
        return dests && { op: 'pop', dests };
      }
      default:
        return error(DiagnosticIds.EncodeError, node.mnemonicSpan, `Unknown instruction \`${node.mnemonic}\`.`);
    }
  };

  const body = (statements: readonly StatementNode[], context: BlockContext, epilogue: () => void): void => {
    for (const stmt of statements) {
      if (stmt.kind === 'Label') {
        labels.push({ name: stmt.name, offset: w.length, kind: 'label' });
        continue;
      }
      const ins = instruction(stmt, context);
      if (!ins) continue;
      if (ins.op === 'return') epilogue();
      place(ins, stmt.span);
    }
  };

  // -------------------------------------------------------------------------
  // blocks

  const bindParams = (fn: FunctionNode): Map<string, number> => {
    const params = new Map<string, number>();
    const spans = new Map<string, SourceSpan>();
    fn.params.forEach((p, i) => {
      const first = spans.get(p.name);
      if (first) {
        errorAt(diagnostics, DiagnosticIds.DuplicateSymbol, p.span, `Duplicate parameter \`$${p.name}\`.`, [
          labelAt(first, 'first declared here'),
        ]);
        return;
      }
      if (parseRegisterName(p.name) !== undefined) {
        error(DiagnosticIds.DuplicateSymbol, p.span, `\`$${p.name}\` is a built-in register and cannot name a parameter.`);
        return;
      }
      if (i >= ADDRESSABLE_ARGUMENTS) {
        error(
          DiagnosticIds.ArityMismatch,
          p.span,
          `A function takes at most ${ADDRESSABLE_ARGUMENTS} parameters.`,
        );
        return;
      }
      spans.set(p.name, p.span);
      params.set(p.name, argumentRegister(i));
    });
    return params;
  };

  const preservedRegisters = (fn: FunctionNode, params: ReadonlyMap<string, number>): number[] => {
    const regs: number[] = [];
    for (const range of fn.preserves) {
      const first = resolver.register(range.first.name, range.first.span);
      const last = range.last ? resolver.register(range.last.name, range.last.span) : first;
      if (first === undefined || last === undefined) continue;
      if (isArgumentRegister(first) !== isArgumentRegister(last) || last < first) {
        error(DiagnosticIds.TypeMismatch, range.span, 'Preserved range must run upward within one register bank.');
        continue;
      }
      for (let reg = first; reg <= last; reg++) {
        const boundIndex = reg - ARGUMENT_REGISTER_BASE;
        const param = fn.params[boundIndex];
        if (isArgumentRegister(reg) && param && params.get(param.name) === reg) {
          errorAt(
            diagnostics,
            DiagnosticIds.AliasPreserveConflict,
            range.span,
            `Cannot preserve ${registerName(reg)}: it is bound to parameter \`$${param.name}\`.`,
            [labelAt(param.span, 'parameter declared here')],
          );
          continue;
        }
        regs.push(reg);
      }
    }
    return regs;
  };

  const functionBlock = (fn: FunctionNode): void => {
    labels.push({ name: fn.name, offset: w.length, kind: 'function' });
    const params = bindParams(fn);
    resolver.setParams(params);
    const preserved = preservedRegisters(fn, params);
    if (preserved.length > 0) place({ op: 'push', values: preserved.map(regOperand) }, fn.nameSpan);
    const epilogue = () => {
      if (preserved.length > 0) place({ op: 'pop', dests: [...preserved].reverse() }, fn.span);
    };
    body(fn.body, 'function', epilogue);
    epilogue();
    place({ op: 'return' }, fn.span);
    resolver.setParams(new Map());
  };

  const subroutineBlock = (sub: SubroutineNode): void => {
    labels.push({ name: sub.name, offset: w.length, kind: 'subroutine' });
    const first = sub.params[0];
    if (first) error(DiagnosticIds.ParseError, first.span, 'A subroutine takes no parameters.');
    const preserve = sub.preserves[0];
    if (preserve) error(DiagnosticIds.ParseError, preserve.span, 'A subroutine cannot preserve registers.');
    body(sub.body, 'subroutine', () => undefined);
    place({ op: 'retsub' }, sub.span);
  };

  const topLevel: StatementNode[] = [];
  const flushTop = () => {
    body(topLevel, 'top', () => undefined);
    topLevel.length = 0;
  };
  for (const item of program.items) {
    switch (item.kind) {
      case 'Function':
        flushTop();
        functionBlock(item);
        break;
      case 'Subroutine':
        flushTop();
        subroutineBlock(item);
        break;
      case 'AliasDef':
        break;
      default:
        topLevel.push(item);
    }
  }
  flushTop();

  return {
    bytes: overflow ? new Uint8Array(0) : w.toUint8Array(),
    labels: overflow ? labels.map((l) => ({ ...l, offset: 0 })) : labels,
    relocations: overflow ? [] : relocations,
    instructions: overflow ? [] : instructions,
    diagnostics,
    refs: [...resolver.refs].sort(),
  };
}

/**
 * Move unit-relative spans and diagnostics to the unit's place in the whole file.
 */
export function rebaseUnitCode(code: UnitCode, lineDelta: number, offsetDelta: number): UnitCode {
  if (lineDelta === 0 && offsetDelta === 0) return code;
  return {
    ...code,
    relocations: code.relocations.map((r) => ({ ...r, span: rebaseSpan(r.span, lineDelta, offsetDelta) })),
    instructions: code.instructions.map((i) =>
      i.span ? { ...i, span: rebaseSpan(i.span, lineDelta, offsetDelta) } : i,
    ),
    diagnostics: rebaseDiagnostics(code.diagnostics, lineDelta),
  };
}

const INSTRUCTION_NAMES: ReadonlySet<string> = new Set([
  'exp',
  'gt',
  'jc',
  'j',
  'gosub',
  'retsub',
  'jt',
  'rnd',
  'push',
  'pop',
  'call',
  'return',
]);

/**
 * True for mnemonics of built-in instructions (case-insensitive).
 */
export function isInstructionName(mnemonic: string): boolean {
  const lower = mnemonic.toLowerCase();
  return INSTRUCTION_NAMES.has(lower) || isUnaryOpType(lower) || isBinaryOpType(lower);
}
