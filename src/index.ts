// src/index.ts
// lispen - Public API
//
// Reader, transformer and host pipeline for embedding Lisp in TypeScript programs.

// ═══════════════════════════════════════════════════════════════════════════════
// PIPELINE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  read,
  quote,
  compile,
  evaluate,
  run,
  tryCompile,
  tryEvaluate,
  type CompileOptions,
  type EvaluateOptions,
  type RunResult,
} from "./core/pipeline/compileText";
export { lisp, template, type Lisp, type Template } from "./embed";

// ═══════════════════════════════════════════════════════════════════════════════
// READER
// ═══════════════════════════════════════════════════════════════════════════════

export { tokenize, describeTok, type Tok, type TokTag, type Pos } from "./core/reader/tokenize";
export { readAll, parse } from "./core/reader/parse";
export * from "./core/sexp";

// ═══════════════════════════════════════════════════════════════════════════════
// TRANSFORMER
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/transform";
export { printNode, printStatements, type PrintOptions } from "./core/host/print";

// ═══════════════════════════════════════════════════════════════════════════════
// RUNTIME
// ═══════════════════════════════════════════════════════════════════════════════

export { createRuntime, show, equals, isTuple, type Runtime, type RuntimeOptions, type Writer } from "./core/host/runtime";
export { stdlib, type Stdlib, type StdlibFn } from "./stdlib/core";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS, LOGGING, CONFIG
// ═══════════════════════════════════════════════════════════════════════════════

export { LispenError, LexError, ParseError, TransformError, MatchError } from "./core/errors";
export * from "./outcome";
export { Logger, LogLevel, logger, parseLogLevel, type LogLevelName, type LogSink } from "./core/logger";
export * from "./core/config";
