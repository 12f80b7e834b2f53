export { GlslGenerator, compileGlslFromJson, formatNumericLiteral, BINARY_OP_TOKENS, UNARY_OP_TOKENS } from './compiler/glsl/glsl-generator';
export type { GlslOptions } from './compiler/glsl/glsl-generator';
export { validateIR, ProgramSchema } from './ir/schema';
export type { ValidationError, ValidationResult } from './ir/schema';
export * from './ir/builders';
export { serializeType, funcParams, countFuncLocals } from './ir/utils';
export type * from './ir/types';
export { BASIC_TYPES } from './ir/types';
