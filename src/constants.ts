/**
 * @file constants.ts
 * @description Generator defaults.
 */

// One indentation unit per nesting level.
export const DEFAULT_GLSL_INDENT = '\t';

// Digits after the decimal point in numeric literals (mantissa of `%.9e`).
export const NUMERIC_LITERAL_PRECISION = 9;

export const VARIABLE_PREFIXES = {
  uniform: 'U',
  attribute: 'A',
  varying: 'V',
  local: 'l',
} as const;
