// src/core/errors.ts
// One error class per pipeline stage, plus the run-time match failure.

import type { Diagnostic, Span } from "../outcome/diagnostic";
import { formatSpan } from "../outcome/diagnostic";
import { makeDiagnostic, type DiagnosticCode } from "../outcome/codes";
import type { FailureReason } from "../outcome/failure";

export class LispenError extends Error {
  readonly diagnostic: Diagnostic;

  constructor(
    readonly reason: FailureReason,
    code: DiagnosticCode,
    params: Record<string, string | number>,
    span?: Span
  ) {
    const diagnostic = makeDiagnostic(code, params, span);
    const where = formatSpan(span);
    super(where ? `${diagnostic.message} at ${where}` : diagnostic.message);
    this.name = "LispenError";
    this.diagnostic = diagnostic;
  }

  get code(): string {
    return this.diagnostic.code;
  }
}

export class LexError extends LispenError {
  constructor(code: DiagnosticCode, params: Record<string, string | number>, span?: Span) {
    super("lex-error", code, params, span);
    this.name = "LexError";
  }
}

export class ParseError extends LispenError {
  constructor(code: DiagnosticCode, params: Record<string, string | number>, span?: Span) {
    super("parse-error", code, params, span);
    this.name = "ParseError";
  }
}

export class TransformError extends LispenError {
  constructor(code: DiagnosticCode, params: Record<string, string | number>) {
    super("transform-error", code, params);
    this.name = "TransformError";
  }

  static malformed(form: string, problem: string): TransformError {
    return new TransformError("E0200", { form, problem });
  }

  static unsupported(what: string): TransformError {
    return new TransformError("E0201", { what });
  }
}

/** Thrown by generated code when no function clause, `case` arm or `cond` test applies. */
export class MatchError extends LispenError {
  constructor(what: string, args: string) {
    super("runtime-error", "E0300", { what, args: args || "no arguments" });
    this.name = "MatchError";
  }
}
