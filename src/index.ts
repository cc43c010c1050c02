/**
 * Lox Module
 * Exports lexer, parser, runtime, and AST types
 */

export { LexerError, scan, type ScanResult } from './lexer/index.js';
export {
  parse,
  Parser,
  type FrontendError,
  type ParseResult,
} from './parser/index.js';
export {
  createRuntimeContext,
  createStepper,
  Environment,
  type ErrorEvent,
  execute,
  type ExecutionResult,
  type ExecutionStepper,
  formatValue,
  inferKind,
  isTruthy,
  type LoxValue,
  type ObservabilityCallbacks,
  type RuntimeCallbacks,
  type RuntimeContext,
  type RuntimeOptions,
  type ScopeEvent,
  type StepEndEvent,
  type StepResult,
  type StepStartEvent,
  valuesEqual,
  type ValueKind,
} from './runtime/index.js';

// ============================================================
// PIPELINE
// ============================================================
export {
  interpret,
  type InterpretResult,
  type InterpretStatus,
} from './interpret.js';
export {
  extractSnippet,
  formatDiagnostic,
  renderSnippet,
  type SnippetLine,
} from './diagnostics.js';
export { printExpr, printProgram, printStmt } from './ast-printer.js';

// ============================================================
// AST & TOKENS
// ============================================================
export type * from './ast-nodes.js';
export {
  TOKEN_TYPES,
  type SourceLocation,
  type SourceSpan,
  type Token,
  type TokenLiteral,
  type TokenType,
} from './types.js';

// ============================================================
// ERROR TAXONOMY
// ============================================================
export {
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
  ERROR_REGISTRY,
  LoxError,
  type LoxErrorData,
  ParseError,
  renderMessage,
  RuntimeError,
  type RuntimeErrorKind,
} from './types.js';
