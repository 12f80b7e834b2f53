import type { Program } from '../ir/types';
import {
  assignStmt, binaryExpr, block, callStmt, floatT, forStmt, ifStmt, mat4T, numericExpr,
  structT, unaryExpr, varNameExpr, vec2T, vec3T, vec4T
} from '../ir/builders';

/**
 * Vertex-stage style program: a light struct uniform, a transform, and a helper that scales a value.
 */
export const LIT_VERTEX_PROGRAM: Program = {
  uniforms: [
    mat4T,
    structT(vec3T, vec4T, floatT), // Light: direction, color, intensity
  ],
  attributes: [vec4T, vec3T],
  varyings: [vec4T],
  funcs: [
    {
      name: 'scale',
      inParams: [floatT, floatT],
      outParams: [floatT],
      block: block(undefined,
        assignStmt(
          varNameExpr('local', 2),
          binaryExpr('mul', varNameExpr('local', 0), varNameExpr('local', 1)),
        ),
      ),
    },
    {
      name: 'main',
      block: block([floatT],
        callStmt('scale', numericExpr(2), numericExpr(0.5), varNameExpr('local', 0)),
        assignStmt(varNameExpr('varying', 0), varNameExpr('attribute', 0)),
      ),
    },
  ],
};

/**
 * Accumulates a value over a counted loop, exiting early once it passes a threshold.
 */
export const ACCUMULATE_PROGRAM: Program = {
  uniforms: [floatT],
  varyings: [vec2T],
  funcs: [
    {
      name: 'accumulate',
      outParams: [floatT],
      block: block(undefined,
        assignStmt(varNameExpr('local', 0), numericExpr(0)),
        forStmt(0, 8, 1, block(undefined,
          assignStmt(
            varNameExpr('local', 0),
            binaryExpr('add', varNameExpr('local', 0), varNameExpr('uniform', 0)),
          ),
          ifStmt(
            binaryExpr('gt', varNameExpr('local', 0), numericExpr(1)),
            block(undefined, { kind: 'break' }),
            block(undefined),
          ),
        )),
        assignStmt(varNameExpr('local', 0), unaryExpr('neg', varNameExpr('local', 0))),
      ),
    },
  ],
};
