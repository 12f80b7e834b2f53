export type BasicType =
  | 'float'
  | 'vec2' | 'vec3' | 'vec4'
  | 'mat2' | 'mat3' | 'mat4';

export const BASIC_TYPES = [
  'float',
  'vec2', 'vec3', 'vec4',
  'mat2', 'mat3', 'mat4'
] as const satisfies readonly BasicType[];

// ------------------------------------------------------------------
// Types
// ------------------------------------------------------------------
export interface BasicShaderType {
  main: BasicType;
}

export interface StructShaderType {
  main: 'struct';
  sub: ShaderType[]; // Member types, in declaration order
}

export type ShaderType = BasicShaderType | StructShaderType;

// ------------------------------------------------------------------
// Variables
// ------------------------------------------------------------------
// Each category owns an independent index domain.
// Locals are numbered per function: params first, then block locals in pre-order.
export type VariableCategory = 'uniform' | 'attribute' | 'varying' | 'local';

export interface Variable {
  category: VariableCategory;
  index: number;
}

// ------------------------------------------------------------------
// Expressions
// ------------------------------------------------------------------
export type BinaryOp =
  | 'add' | 'sub' | 'mul' | 'div' | 'mod'
  | 'shl' | 'shr'
  | 'lt' | 'le' | 'gt' | 'ge' | 'eq' | 'ne'
  | 'and' | 'xor' | 'or'
  | 'andAnd' | 'orOr';

export type UnaryOp = 'neg' | 'not' | 'bitNot';

export interface NumericExpr {
  kind: 'numeric';
  value: number;
}

export interface VarNameExpr {
  kind: 'varName';
  variable: Variable;
}

export interface BinaryExpr {
  kind: 'binary';
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr {
  kind: 'unary';
  op: UnaryOp;
  operand: Expr;
}

export type Expr = NumericExpr | VarNameExpr | BinaryExpr | UnaryExpr;

// ------------------------------------------------------------------
// Statements & Blocks
// ------------------------------------------------------------------
export interface Block {
  localVars?: ShaderType[];
  stmts?: Stmt[];
}

export interface BlockStmt {
  kind: 'block';
  block: Block;
}

export interface AssignStmt {
  kind: 'assign';
  lhs: Expr;
  rhs: Expr;
}

/**
 * Both branches are always emitted. An empty `elseBlock` renders as `} else {` followed by `}`.
 */
export interface IfStmt {
  kind: 'if';
  cond: Expr;
  block: Block;
  elseBlock: Block;
}

/**
 * Counted loop over an int counter.
 * The counter claims the next local index of the enclosing function at the point the loop occurs,
 * so the body can reference it as a `local` variable.
 */
export interface ForStmt {
  kind: 'for';
  init: number;
  end: number;
  delta: number; // Non-zero integer
  block: Block;
}

export interface BreakStmt {
  kind: 'break';
}

export interface ContinueStmt {
  kind: 'continue';
}

export interface DiscardStmt {
  kind: 'discard';
}

// Calls a function defined earlier in the same program, by name. Arguments line up with in, inout, then out params.
export interface CallStmt {
  kind: 'call';
  name: string;
  args: Expr[];
}

export type Stmt =
  | BlockStmt
  | AssignStmt
  | IfStmt
  | ForStmt
  | BreakStmt
  | ContinueStmt
  | DiscardStmt
  | CallStmt;

// ------------------------------------------------------------------
// Functions & Program
// ------------------------------------------------------------------
export interface Func {
  name: string;
  inParams?: ShaderType[];
  inOutParams?: ShaderType[];
  outParams?: ShaderType[];
  block?: Block;
}

export interface Program {
  uniforms?: ShaderType[];
  attributes?: ShaderType[];
  varyings?: ShaderType[];
  funcs?: Func[];
}
