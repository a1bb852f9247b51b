export interface Span {
  file?: string;
  startLine: number;
  startCol: number;
  endLine?: number;
  endCol?: number;
}

export type DiagnosticSeverity = "error" | "warning" | "info" | "hint";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  span?: Span;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

/** `file:line:col` for a span, or the empty string when there is none. */
export function formatSpan(span: Span | undefined): string {
  if (!span) return "";
  const where = `${span.startLine}:${span.startCol}`;
  return span.file ? `${span.file}:${where}` : where;
}
