import { z } from 'zod';
import { BASIC_TYPES } from './types';
import type { Block, Expr, Func, Program, ShaderType, Stmt } from './types';
import { funcParams } from './utils';

// ------------------------------------------------------------------
// Validation Types
// ------------------------------------------------------------------

export interface ValidationError {
  path: string[];
  message: string;
  code: string;
}

export type ValidationResult =
  | { success: true; data: Program }
  | { success: false; errors: ValidationError[] };

// ------------------------------------------------------------------
// Zod Schemas
// ------------------------------------------------------------------

export const ShaderTypeSchema: z.ZodType<ShaderType> = z.lazy(() => z.union([
  z.object({ main: z.enum(BASIC_TYPES) }),
  z.object({ main: z.literal('struct'), sub: z.array(ShaderTypeSchema) }),
]));

const VariableSchema = z.object({
  category: z.enum(['uniform', 'attribute', 'varying', 'local']),
  index: z.number().int().nonnegative(),
});

const BinaryOpSchema = z.enum([
  'add', 'sub', 'mul', 'div', 'mod',
  'shl', 'shr',
  'lt', 'le', 'gt', 'ge', 'eq', 'ne',
  'and', 'xor', 'or',
  'andAnd', 'orOr',
]);

const UnaryOpSchema = z.enum(['neg', 'not', 'bitNot']);

export const ExprSchema: z.ZodType<Expr> = z.lazy(() => z.union([
  z.object({ kind: z.literal('numeric'), value: z.number().finite() }),
  z.object({ kind: z.literal('varName'), variable: VariableSchema }),
  z.object({ kind: z.literal('binary'), op: BinaryOpSchema, left: ExprSchema, right: ExprSchema }),
  z.object({ kind: z.literal('unary'), op: UnaryOpSchema, operand: ExprSchema }),
]));

export const BlockSchema: z.ZodType<Block> = z.lazy(() => z.object({
  localVars: z.array(ShaderTypeSchema).optional(),
  stmts: z.array(StmtSchema).optional(),
}));

export const StmtSchema: z.ZodType<Stmt> = z.lazy(() => z.union([
  z.object({ kind: z.literal('block'), block: BlockSchema }),
  z.object({ kind: z.literal('assign'), lhs: ExprSchema, rhs: ExprSchema }),
  z.object({ kind: z.literal('if'), cond: ExprSchema, block: BlockSchema, elseBlock: BlockSchema }),
  z.object({
    kind: z.literal('for'),
    init: z.number().int(),
    end: z.number().int(),
    delta: z.number().int().refine(d => d !== 0, { message: 'Loop delta must be non-zero' }),
    block: BlockSchema,
  }),
  z.object({ kind: z.literal('break') }),
  z.object({ kind: z.literal('continue') }),
  z.object({ kind: z.literal('discard') }),
  z.object({ kind: z.literal('call'), name: z.string().min(1), args: z.array(ExprSchema) }),
]));

const FuncSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, { message: 'Function name must be a GLSL identifier' }),
  inParams: z.array(ShaderTypeSchema).optional(),
  inOutParams: z.array(ShaderTypeSchema).optional(),
  outParams: z.array(ShaderTypeSchema).optional(),
  block: BlockSchema.optional(),
});

// Root
export const ProgramSchema = z.object({
  uniforms: z.array(ShaderTypeSchema).optional(),
  attributes: z.array(ShaderTypeSchema).optional(),
  varyings: z.array(ShaderTypeSchema).optional(),
  funcs: z.array(FuncSchema).optional(),
});

// ------------------------------------------------------------------
// Validator Function
// ------------------------------------------------------------------

interface SemanticScope {
  program: Program;
  funcsByName: Map<string, Func>;
  funcIndexByName: Map<string, number>;
  func: Func;
  funcIndex: number;
  localCount: number; // Locals declared so far, in the generator's allocation order
  errors: ValidationError[];
}

export function validateIR(json: unknown): ValidationResult {
  const result = ProgramSchema.safeParse(json);

  // 1. Structural Validation (Zod)
  if (!result.success) {
    const errors: ValidationError[] = result.error.issues.map(err => ({
      path: err.path.map(String),
      message: err.message,
      code: err.code
    }));
    return { success: false, errors };
  }

  const program: Program = result.data;
  const semanticErrors: ValidationError[] = [];

  // 2. Semantic Validation

  // Check Duplicates: Functions
  const funcsByName = new Map<string, Func>();
  const funcIndexByName = new Map<string, number>();
  (program.funcs ?? []).forEach((f, idx) => {
    if (funcsByName.has(f.name)) {
      semanticErrors.push({
        path: ['funcs', idx.toString(), 'name'],
        message: `Duplicate function name '${f.name}'.`,
        code: 'semantic_error'
      });
      return;
    }
    funcsByName.set(f.name, f);
    funcIndexByName.set(f.name, idx);
  });

  // Variable references & calls
  (program.funcs ?? []).forEach((func, fIdx) => {
    if (!func.block) return;
    const scope: SemanticScope = {
      program,
      funcsByName,
      funcIndexByName,
      func,
      funcIndex: fIdx,
      localCount: funcParams(func).length,
      errors: semanticErrors,
    };
    checkBlock(scope, func.block, ['funcs', fIdx.toString(), 'block']);
  });

  if (semanticErrors.length > 0) {
    return { success: false, errors: semanticErrors };
  }

  return { success: true, data: program };
}

function checkBlock(scope: SemanticScope, block: Block, path: string[]) {
  scope.localCount += block.localVars?.length ?? 0;
  (block.stmts ?? []).forEach((stmt, idx) => checkStmt(scope, stmt, [...path, 'stmts', idx.toString()]));
}

function checkStmt(scope: SemanticScope, stmt: Stmt, path: string[]) {
  switch (stmt.kind) {
    case 'block':
      checkBlock(scope, stmt.block, [...path, 'block']);
      break;
    case 'assign':
      checkExpr(scope, stmt.lhs, [...path, 'lhs']);
      checkExpr(scope, stmt.rhs, [...path, 'rhs']);
      break;
    case 'if':
      checkExpr(scope, stmt.cond, [...path, 'cond']);
      checkBlock(scope, stmt.block, [...path, 'block']);
      checkBlock(scope, stmt.elseBlock, [...path, 'elseBlock']);
      break;
    case 'for':
      scope.localCount++; // loop counter
      checkBlock(scope, stmt.block, [...path, 'block']);
      break;
    case 'call': {
      stmt.args.forEach((arg, idx) => checkExpr(scope, arg, [...path, 'args', idx.toString()]));
      const callee = scope.funcsByName.get(stmt.name);
      if (!callee) {
        scope.errors.push({
          path: [...path, 'name'],
          message: `Call to unknown function '${stmt.name}' in function '${scope.func.name}'.`,
          code: 'semantic_error'
        });
      } else if (funcParams(callee).length !== stmt.args.length) {
        scope.errors.push({
          path: [...path, 'args'],
          message: `Function '${stmt.name}' takes ${funcParams(callee).length} argument(s), got ${stmt.args.length}.`,
          code: 'semantic_error'
        });
      } else if ((scope.funcIndexByName.get(stmt.name) ?? 0) >= scope.funcIndex) {
        // GLSL needs a callee declared above its caller, which also rules out recursion.
        scope.errors.push({
          path: [...path, 'name'],
          message: `Function '${scope.func.name}' calls '${stmt.name}' before it is defined.`,
          code: 'semantic_error'
        });
      }
      break;
    }
    case 'break':
    case 'continue':
    case 'discard':
      break;
    default: {
      const unhandled: never = stmt;
      throw new Error(`Unknown statement kind: ${JSON.stringify(unhandled)}`);
    }
  }
}

function checkExpr(scope: SemanticScope, expr: Expr, path: string[]) {
  switch (expr.kind) {
    case 'numeric':
      break;
    case 'varName': {
      const { category, index } = expr.variable;
      const limit = category === 'uniform' ? scope.program.uniforms?.length ?? 0
        : category === 'attribute' ? scope.program.attributes?.length ?? 0
          : category === 'varying' ? scope.program.varyings?.length ?? 0
            : scope.localCount;
      if (index >= limit) {
        scope.errors.push({
          path: [...path, 'variable', 'index'],
          message: `Function '${scope.func.name}' references ${category} ${index}, but only ${limit} are declared.`,
          code: 'semantic_error'
        });
      }
      break;
    }
    case 'binary':
      checkExpr(scope, expr.left, [...path, 'left']);
      checkExpr(scope, expr.right, [...path, 'right']);
      break;
    case 'unary':
      checkExpr(scope, expr.operand, [...path, 'operand']);
      break;
    default: {
      const unhandled: never = expr;
      throw new Error(`Unknown expression kind: ${JSON.stringify(unhandled)}`);
    }
  }
}
