import { describe, it, expect } from 'vitest';
import { formatNumericLiteral } from '../../compiler/glsl/glsl-generator';

describe('Unit: formatNumericLiteral', () => {
  it('should render zero with nine fraction digits and a two-digit exponent', () => {
    expect(formatNumericLiteral(0)).toBe('0.000000000e+00');
  });

  it('should keep the sign of negative zero', () => {
    expect(formatNumericLiteral(-0)).toBe('-0.000000000e+00');
  });

  it('should handle integers and fractions', () => {
    expect(formatNumericLiteral(1)).toBe('1.000000000e+00');
    expect(formatNumericLiteral(0.5)).toBe('5.000000000e-01');
    expect(formatNumericLiteral(-1.5)).toBe('-1.500000000e+00');
    expect(formatNumericLiteral(100)).toBe('1.000000000e+02');
    expect(formatNumericLiteral(123456.789)).toBe('1.234567890e+05');
  });

  it('should pad small exponents and keep three-digit ones', () => {
    expect(formatNumericLiteral(1e-7)).toBe('1.000000000e-07');
    expect(formatNumericLiteral(2.5e-12)).toBe('2.500000000e-12');
    expect(formatNumericLiteral(1e100)).toBe('1.000000000e+100');
  });

  it('should round ties to the even digit', () => {
    expect(formatNumericLiteral(10000000005)).toBe('1.000000000e+10');
    expect(formatNumericLiteral(12345678905)).toBe('1.234567890e+10');
    expect(formatNumericLiteral(12345678915)).toBe('1.234567892e+10');
  });

  it('should round values just past a tie away from zero', () => {
    expect(formatNumericLiteral(10000000005.5)).toBe('1.000000001e+10');
    expect(formatNumericLiteral(-10000000005.5)).toBe('-1.000000001e+10');
  });

  it('should carry a rounded-up mantissa into the exponent', () => {
    expect(formatNumericLiteral(9999999999.5)).toBe('1.000000000e+10');
  });

  it('should be stable across calls', () => {
    expect(formatNumericLiteral(0.1)).toBe(formatNumericLiteral(0.1));
    expect(formatNumericLiteral(0.1)).toBe('1.000000000e-01');
  });

  it('should reject non-finite values', () => {
    expect(() => formatNumericLiteral(NaN)).toThrow('[GlslGenerator] Numeric literal must be finite, got NaN');
    expect(() => formatNumericLiteral(Infinity)).toThrow(/must be finite/);
  });
});
