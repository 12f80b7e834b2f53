import { describe, it, expect } from 'vitest';
import { countBlockLocals, countFuncLocals, funcParams, serializeType } from './utils';
import { block, blockStmt, floatT, forStmt, ifStmt, mat4T, numericExpr, structT, vec2T, vec3T } from './builders';

describe('serializeType', () => {
  it('should serialize basic types as their name', () => {
    expect(serializeType(vec3T)).toBe('vec3');
  });

  it('should serialize nested structs structurally', () => {
    expect(serializeType(structT(floatT, structT(vec2T)))).toBe('struct{float,struct{vec2}}');
  });

  it('should give equal keys to structurally equal structs', () => {
    expect(serializeType(structT(floatT))).toBe(serializeType({ main: 'struct', sub: [{ main: 'float' }] }));
  });
});

describe('funcParams', () => {
  it('should order params in, inout, out', () => {
    const params = funcParams({ name: 'f', outParams: [mat4T], inParams: [floatT], inOutParams: [vec2T] });
    expect(params).toEqual([
      { direction: 'in', type: floatT },
      { direction: 'inout', type: vec2T },
      { direction: 'out', type: mat4T },
    ]);
  });

  it('should treat missing lists as empty', () => {
    expect(funcParams({ name: 'f' })).toEqual([]);
  });
});

describe('countFuncLocals', () => {
  it('should count params, locals, nested blocks, both if branches and loop counters', () => {
    const body = block([floatT],
      blockStmt(block([floatT, floatT])),
      ifStmt(numericExpr(1), block([floatT]), block([floatT])),
      forStmt(0, 4, 1, block([vec2T])),
    );
    expect(countBlockLocals(body)).toBe(1 + 2 + 2 + 2);
    expect(countFuncLocals({ name: 'f', inParams: [floatT], outParams: [floatT], block: body })).toBe(9);
  });

  it('should count only params for a function without a body', () => {
    expect(countFuncLocals({ name: 'f', inParams: [floatT, floatT] })).toBe(2);
  });
});
