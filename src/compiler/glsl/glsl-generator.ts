/**
 * GLSL Generator
 * Renders an IR Program into GLSL source text.
 *
 * Output is byte-reproducible: every name is synthesized from a variable's category and index,
 * literals use a fixed exponent format, and binary operands are always parenthesized.
 */

import type {
  Block, Expr, Func, Program, ShaderType, Stmt, StructShaderType, Variable, BinaryOp, UnaryOp
} from '../../ir/types';
import { countFuncLocals, funcParams, serializeType } from '../../ir/utils';
import { validateIR } from '../../ir/schema';
import { DEFAULT_GLSL_INDENT, NUMERIC_LITERAL_PRECISION, VARIABLE_PREFIXES } from '../../constants';

const isGlslDebugEnabled = () => {
  try {
    return typeof process !== 'undefined' && !!process.env && !!process.env.GLSL_DEBUG;
  } catch (e) {
    return false;
  }
};

export interface GlslOptions {
  /** Indentation unit per nesting level (default: a single tab) */
  indent?: string;
  /** If set, emits `#version <value>` as the first line */
  versionDirective?: string;
}

export const BINARY_OP_TOKENS: Record<BinaryOp, string> = {
  add: '+',
  sub: '-',
  mul: '*',
  div: '/',
  mod: '%',
  shl: '<<',
  shr: '>>',
  lt: '<',
  le: '<=',
  gt: '>',
  ge: '>=',
  eq: '==',
  ne: '!=',
  and: '&',
  xor: '^',
  or: '|',
  andAnd: '&&',
  orOr: '||',
};

export const UNARY_OP_TOKENS: Record<UnaryOp, string> = {
  neg: '-',
  not: '!',
  bitNot: '~',
};

/**
 * Formats a float like C's `%.9e`: `1.500000000e+00`, `-2.500000000e-07`.
 * Rounds the exact binary value half-to-even, so ties such as `10000000005` give `1.000000000e+10`.
 */
export function formatNumericLiteral(value: number): string {
  if (!Number.isFinite(value)) {
    throw new Error(`[GlslGenerator] Numeric literal must be finite, got ${value}`);
  }
  const sign = value < 0 || Object.is(value, -0) ? '-' : '';
  const { digits, exp10 } = roundSignificant(Math.abs(value), NUMERIC_LITERAL_PRECISION + 1);
  const expSign = exp10 < 0 ? '-' : '+';
  const expDigits = String(Math.abs(exp10)).padStart(2, '0');
  return `${sign}${digits[0]}.${digits.slice(1)}e${expSign}${expDigits}`;
}

/**
 * Rounds a finite non-negative double to `count` significant decimal digits.
 * `exp10` is the decimal exponent of the first digit.
 */
function roundSignificant(value: number, count: number): { digits: string; exp10: number } {
  if (value === 0) {
    return { digits: '0'.repeat(count), exp10: 0 };
  }

  // value = mantissa * 2^exp2, exactly
  const view = new DataView(new ArrayBuffer(8));
  view.setFloat64(0, value);
  const bits = view.getBigUint64(0);
  const biased = Number((bits >> 52n) & 0x7ffn);
  let mantissa = bits & 0xfffffffffffffn;
  let exp2 = -1074;
  if (biased !== 0) {
    mantissa |= 1n << 52n;
    exp2 = biased - 1075;
  }

  // Exact decimal expansion: value = BigInt(exact) * 10^scale
  const exact = exp2 >= 0
    ? (mantissa << BigInt(exp2)).toString()
    : (mantissa * 5n ** BigInt(-exp2)).toString();
  const scale = exp2 >= 0 ? 0 : exp2;
  let exp10 = exact.length - 1 + scale;

  if (exact.length <= count) {
    return { digits: exact.padEnd(count, '0'), exp10 };
  }

  let head = BigInt(exact.slice(0, count));
  const rest = exact.slice(count);
  const restIsHalf = rest[0] === '5' && /^0*$/.test(rest.slice(1));
  const roundUp = rest[0] > '5' || (rest[0] === '5' && !restIsHalf) || (restIsHalf && head % 2n === 1n);
  if (roundUp) {
    head += 1n;
  }
  let digits = head.toString();
  if (digits.length > count) {
    digits = digits.slice(0, count);
    exp10++;
  }
  return { digits, exp10 };
}

// Per-compile state. A fresh one is created for every call, so a generator instance is re-entrant.
interface GlslContext {
  program: Program;
  indent: string;
  structNames: Map<string, string>; // serialized type -> S{n}
  structLines: string[];
  localCount: number; // Locals allocated so far in the current function
  debug: boolean;
}

export class GlslGenerator {

  compile(program: Program, options: GlslOptions = {}): string {
    const ctx: GlslContext = {
      program,
      indent: options.indent ?? DEFAULT_GLSL_INDENT,
      structNames: new Map(),
      structLines: [],
      localCount: 0,
      debug: isGlslDebugEnabled(),
    };
    const lines: string[] = [];

    // Global declarations
    (program.uniforms ?? []).forEach((t, i) => {
      lines.push(`uniform ${this.resolveType(ctx, t)} ${VARIABLE_PREFIXES.uniform}${i};`);
    });
    (program.attributes ?? []).forEach((t, i) => {
      lines.push(`attribute ${this.resolveType(ctx, t)} ${VARIABLE_PREFIXES.attribute}${i};`);
    });
    (program.varyings ?? []).forEach((t, i) => {
      lines.push(`varying ${this.resolveType(ctx, t)} ${VARIABLE_PREFIXES.varying}${i};`);
    });

    for (const func of program.funcs ?? []) {
      this.emitFunction(ctx, func, lines);
    }

    // Structs are collected while rendering, but every definition must precede its first use.
    const header = options.versionDirective !== undefined ? [`#version ${options.versionDirective}`] : [];
    return [...header, ...ctx.structLines, ...lines].join('\n') + '\n';
  }

  private resolveType(ctx: GlslContext, type: ShaderType): string {
    if (type.main === 'struct') {
      return this.registerStruct(ctx, type);
    }
    return type.main;
  }

  private registerStruct(ctx: GlslContext, type: StructShaderType): string {
    const key = serializeType(type);
    const existing = ctx.structNames.get(key);
    if (existing) return existing;

    // Members first: nested structs get lower indices and are defined before this one.
    const members = type.sub.map((m, i) => `${ctx.indent}${this.resolveType(ctx, m)} M${i};`);
    const name = `S${ctx.structNames.size}`;
    ctx.structNames.set(key, name);
    ctx.structLines.push(`struct ${name} {`, ...members, '};');

    if (ctx.debug) {
      console.log(`[GlslGenerator] Registered ${name} for ${key}`);
    }
    return name;
  }

  private allocLocal(ctx: GlslContext): string {
    return `${VARIABLE_PREFIXES.local}${ctx.localCount++}`;
  }

  private emitFunction(ctx: GlslContext, func: Func, lines: string[]) {
    ctx.localCount = 0;

    const params = funcParams(func).map(p => `${p.direction} ${this.resolveType(ctx, p.type)} ${this.allocLocal(ctx)}`);
    lines.push(`void ${func.name}(${params.length > 0 ? params.join(', ') : 'void'}) {`);
    if (func.block) {
      this.emitBlock(ctx, func.block, 1, lines);
    }
    lines.push('}');

    if (ctx.debug) {
      console.log(`[GlslGenerator] ${func.name}: ${ctx.localCount} locals (expected ${countFuncLocals(func)})`);
    }
  }

  private emitBlock(ctx: GlslContext, block: Block, depth: number, lines: string[]) {
    const indent = ctx.indent.repeat(depth);
    for (const t of block.localVars ?? []) {
      lines.push(`${indent}${this.resolveType(ctx, t)} ${this.allocLocal(ctx)};`);
    }
    for (const stmt of block.stmts ?? []) {
      this.emitStmt(ctx, stmt, depth, lines);
    }
  }

  private emitStmt(ctx: GlslContext, stmt: Stmt, depth: number, lines: string[]) {
    const indent = ctx.indent.repeat(depth);

    switch (stmt.kind) {
      case 'block':
        lines.push(`${indent}{`);
        this.emitBlock(ctx, stmt.block, depth + 1, lines);
        lines.push(`${indent}}`);
        break;
      case 'assign':
        lines.push(`${indent}${this.compileExpr(ctx, stmt.lhs)} = ${this.compileExpr(ctx, stmt.rhs)};`);
        break;
      case 'if':
        lines.push(`${indent}if (${this.compileExpr(ctx, stmt.cond)}) {`);
        this.emitBlock(ctx, stmt.block, depth + 1, lines);
        lines.push(`${indent}} else {`);
        this.emitBlock(ctx, stmt.elseBlock, depth + 1, lines);
        lines.push(`${indent}}`);
        break;
      case 'for': {
        const { init, end, delta } = stmt;
        if (!Number.isInteger(init) || !Number.isInteger(end) || !Number.isInteger(delta)) {
          throw new Error(`[GlslGenerator] Loop bounds must be integers, got init=${init} end=${end} delta=${delta}`);
        }
        if (delta === 0) {
          throw new Error('[GlslGenerator] Loop delta must be non-zero');
        }
        const counter = this.allocLocal(ctx);
        lines.push(`${indent}for (int ${counter} = ${init}; ${counter} < ${end}; ${counter}${this.formatIncrement(delta)}) {`);
        this.emitBlock(ctx, stmt.block, depth + 1, lines);
        lines.push(`${indent}}`);
        break;
      }
      case 'break':
        lines.push(`${indent}break;`);
        break;
      case 'continue':
        lines.push(`${indent}continue;`);
        break;
      case 'discard':
        lines.push(`${indent}discard;`);
        break;
      case 'call': {
        const args = stmt.args.map(a => this.compileExpr(ctx, a)).join(', ');
        lines.push(`${indent}${stmt.name}(${args});`);
        break;
      }
      default: {
        const unhandled: never = stmt;
        throw new Error(`[GlslGenerator] Unknown statement kind: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private formatIncrement(delta: number): string {
    if (delta === 1) return '++';
    if (delta === -1) return '--';
    return ` += ${delta}`;
  }

  private compileExpr(ctx: GlslContext, expr: Expr): string {
    switch (expr.kind) {
      case 'numeric':
        return formatNumericLiteral(expr.value);
      case 'varName':
        return this.varName(ctx, expr.variable);
      case 'binary':
        return `(${this.compileExpr(ctx, expr.left)}) ${BINARY_OP_TOKENS[expr.op]} (${this.compileExpr(ctx, expr.right)})`;
      case 'unary':
        return `${UNARY_OP_TOKENS[expr.op]}(${this.compileExpr(ctx, expr.operand)})`;
      default: {
        const unhandled: never = expr;
        throw new Error(`[GlslGenerator] Unknown expression kind: ${JSON.stringify(unhandled)}`);
      }
    }
  }

  private varName(ctx: GlslContext, variable: Variable): string {
    const { category, index } = variable;
    let limit: number;
    switch (category) {
      case 'uniform':
        limit = ctx.program.uniforms?.length ?? 0;
        break;
      case 'attribute':
        limit = ctx.program.attributes?.length ?? 0;
        break;
      case 'varying':
        limit = ctx.program.varyings?.length ?? 0;
        break;
      case 'local':
        limit = ctx.localCount;
        break;
      default: {
        const unhandled: never = category;
        throw new Error(`[GlslGenerator] Unknown variable category: ${String(unhandled)}`);
      }
    }
    if (!Number.isInteger(index) || index < 0 || index >= limit) {
      throw new Error(`[GlslGenerator] ${category} index ${index} out of range (${limit} declared)`);
    }
    return `${VARIABLE_PREFIXES[category]}${index}`;
  }
}

/**
 * Validates untrusted IR JSON, then renders it.
 * Throws with every validation message if the document is malformed.
 */
export function compileGlslFromJson(json: unknown, options: GlslOptions = {}): string {
  const result = validateIR(json);
  if (!result.success) {
    const details = result.errors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`).join('\n');
    throw new Error(`[GlslGenerator] Invalid IR:\n${details}`);
  }
  return new GlslGenerator().compile(result.data, options);
}
