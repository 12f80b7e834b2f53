import type {
  BinaryOp, Block, Expr, ShaderType, Stmt, UnaryOp, VariableCategory
} from './types';

/**
 * Shorthand constructors for hand-written IR (examples, tests, front ends).
 */

export function block(localVars: ShaderType[] | undefined, ...stmts: Stmt[]): Block {
  return { localVars: localVars ?? [], stmts };
}

export function blockStmt(b: Block): Stmt {
  return { kind: 'block', block: b };
}

export function assignStmt(lhs: Expr, rhs: Expr): Stmt {
  return { kind: 'assign', lhs, rhs };
}

export function ifStmt(cond: Expr, thenBlock: Block, elseBlock: Block): Stmt {
  return { kind: 'if', cond, block: thenBlock, elseBlock };
}

export function forStmt(init: number, end: number, delta: number, body: Block): Stmt {
  return { kind: 'for', init, end, delta, block: body };
}

export function callStmt(name: string, ...args: Expr[]): Stmt {
  return { kind: 'call', name, args };
}

export function numericExpr(value: number): Expr {
  return { kind: 'numeric', value };
}

export function varNameExpr(category: VariableCategory, index: number): Expr {
  return { kind: 'varName', variable: { category, index } };
}

export function binaryExpr(op: BinaryOp, left: Expr, right: Expr): Expr {
  return { kind: 'binary', op, left, right };
}

export function unaryExpr(op: UnaryOp, operand: Expr): Expr {
  return { kind: 'unary', op, operand };
}

// Types
export const floatT: ShaderType = { main: 'float' };
export const vec2T: ShaderType = { main: 'vec2' };
export const vec3T: ShaderType = { main: 'vec3' };
export const vec4T: ShaderType = { main: 'vec4' };
export const mat2T: ShaderType = { main: 'mat2' };
export const mat3T: ShaderType = { main: 'mat3' };
export const mat4T: ShaderType = { main: 'mat4' };

export function structT(...sub: ShaderType[]): ShaderType {
  return { main: 'struct', sub };
}
