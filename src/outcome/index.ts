// src/outcome/index.ts
// Result values for the non-throwing entry points

export type { Outcome, Done, Fail, OutcomeMeta } from "./outcome";
export { isDone, isFail } from "./outcome";
export { done, ok, fail } from "./constructors";
export { match, mapOutcome, unwrap, unwrapOr } from "./matchers";
export { type Failure, type FailureReason, failure, isFailureReason } from "./failure";
export { type Diagnostic, type DiagnosticSeverity, type Span, errorDiag, warnDiag, formatSpan } from "./diagnostic";
export { DIAGNOSTIC_CODES, type DiagnosticCode, makeDiagnostic } from "./codes";
