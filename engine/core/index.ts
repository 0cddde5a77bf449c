/**
 * SheetFormula Engine - Core Module Exports
 *
 * This is the main entry point for the formula engine.
 */

// Types - export all
export * from './types/index.js';

// Errors
export * from './errors/index.js';

// Addressing
export * from './address/index.js';

// Lexing & Parsing
export * from './lexer/index.js';
export * from './parser/index.js';

// Values
export * from './values/index.js';

// Contexts
export * from './context/index.js';

// Evaluation
export * from './evaluation/index.js';

// Builtin Library
export { createBuiltinEnvironment, builtinFunctions } from './builtins/index.js';
export type { BuiltinOptions } from './builtins/index.js';

// Grid Storage
export * from './data/index.js';

// Formula Engine
export * from './formula/index.js';
