import type { Diagnostic, DiagnosticSeverity, Span } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: "Lex" | "Parse" | "Transform" | "Runtime";
  template: string;
}

export const DIAGNOSTIC_CODES = {
  E0001: { code: "E0001", severity: "error", category: "Lex", template: "Unsupported character '{char}'" },
  E0002: { code: "E0002", severity: "error", category: "Lex", template: "Unterminated string literal" },
  E0003: { code: "E0003", severity: "error", category: "Lex", template: "Unterminated interpolation ~{...}" },
  E0004: { code: "E0004", severity: "error", category: "Lex", template: "Empty {what}" },

  E0100: { code: "E0100", severity: "error", category: "Parse", template: "Unclosed {kind} - missing {closer}" },
  E0101: { code: "E0101", severity: "error", category: "Parse", template: "Unexpected end of input after {prefix}" },
  E0102: { code: "E0102", severity: "error", category: "Parse", template: "Unexpected token {token}" },
  E0103: { code: "E0103", severity: "error", category: "Parse", template: "Unexpected tokens remaining, starting at {token}" },

  E0200: { code: "E0200", severity: "error", category: "Transform", template: "{form}: {problem}" },
  E0201: { code: "E0201", severity: "error", category: "Transform", template: "Cannot transform {what}" },

  E0300: { code: "E0300", severity: "error", category: "Runtime", template: "No clause of {what} matched {args}" },
} satisfies Record<string, DiagCodeDef>;

export type DiagnosticCode = keyof typeof DIAGNOSTIC_CODES;

export function makeDiagnostic(
  code: DiagnosticCode,
  params?: Record<string, string | number>,
  span?: Span
): Diagnostic {
  const def: DiagCodeDef = DIAGNOSTIC_CODES[code];

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    span,
    data: params,
  };
}
