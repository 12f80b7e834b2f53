import type { Block, Func, ShaderType, Stmt } from './types';

export type ParamDirection = 'in' | 'inout' | 'out';

export interface FuncParam {
  direction: ParamDirection;
  type: ShaderType;
}

/**
 * Canonical string form of a type. Structurally equal types serialize identically,
 * which is what struct name sharing keys on.
 */
export function serializeType(t: ShaderType): string {
  if (t.main === 'struct') {
    return `struct{${t.sub.map(serializeType).join(',')}}`;
  }
  return t.main;
}

/**
 * Parameters in local-index order: in, then inout, then out.
 */
export function funcParams(func: Func): FuncParam[] {
  return [
    ...(func.inParams ?? []).map(type => ({ direction: 'in' as const, type })),
    ...(func.inOutParams ?? []).map(type => ({ direction: 'inout' as const, type })),
    ...(func.outParams ?? []).map(type => ({ direction: 'out' as const, type })),
  ];
}

/**
 * Number of local indices a block claims, including nested blocks and loop counters.
 */
export function countBlockLocals(b: Block): number {
  let count = b.localVars?.length ?? 0;
  for (const stmt of b.stmts ?? []) {
    count += countStmtLocals(stmt);
  }
  return count;
}

function countStmtLocals(stmt: Stmt): number {
  switch (stmt.kind) {
    case 'block':
      return countBlockLocals(stmt.block);
    case 'if':
      return countBlockLocals(stmt.block) + countBlockLocals(stmt.elseBlock);
    case 'for':
      return 1 + countBlockLocals(stmt.block);
    case 'assign':
    case 'break':
    case 'continue':
    case 'discard':
    case 'call':
      return 0;
    default: {
      const unhandled: never = stmt;
      throw new Error(`Unknown statement kind: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Size of a function's local index domain (params + every local and loop counter in its body).
 */
export function countFuncLocals(func: Func): number {
  return funcParams(func).length + (func.block ? countBlockLocals(func.block) : 0);
}
