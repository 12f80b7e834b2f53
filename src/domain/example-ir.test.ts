import { describe, it, expect } from 'vitest';
import { ACCUMULATE_PROGRAM, LIT_VERTEX_PROGRAM } from './example-ir';
import { GlslGenerator } from '../compiler/glsl/glsl-generator';
import { validateIR } from '../ir/schema';

describe('Example IR', () => {
  const generator = new GlslGenerator();

  it('should validate every example', () => {
    expect(validateIR(LIT_VERTEX_PROGRAM).success).toBe(true);
    expect(validateIR(ACCUMULATE_PROGRAM).success).toBe(true);
  });

  it('should render the lit vertex program', () => {
    expect(generator.compile(LIT_VERTEX_PROGRAM)).toBe([
      'struct S0 {',
      '\tvec3 M0;',
      '\tvec4 M1;',
      '\tfloat M2;',
      '};',
      'uniform mat4 U0;',
      'uniform S0 U1;',
      'attribute vec4 A0;',
      'attribute vec3 A1;',
      'varying vec4 V0;',
      'void scale(in float l0, in float l1, out float l2) {',
      '\tl2 = (l0) * (l1);',
      '}',
      'void main(void) {',
      '\tfloat l0;',
      '\tscale(2.000000000e+00, 5.000000000e-01, l0);',
      '\tV0 = A0;',
      '}',
      '',
    ].join('\n'));
  });

  it('should render the accumulate program', () => {
    expect(generator.compile(ACCUMULATE_PROGRAM)).toBe([
      'uniform float U0;',
      'varying vec2 V0;',
      'void accumulate(out float l0) {',
      '\tl0 = 0.000000000e+00;',
      '\tfor (int l1 = 0; l1 < 8; l1++) {',
      '\t\tl0 = (l0) + (U0);',
      '\t\tif ((l0) > (1.000000000e+00)) {',
      '\t\t\tbreak;',
      '\t\t} else {',
      '\t\t}',
      '\t}',
      '\tl0 = -(l0);',
      '}',
      '',
    ].join('\n'));
  });
});
