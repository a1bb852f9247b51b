// src/core/transform/mangle.ts
// Lisp symbol text → valid host identifier. Applied at emission only.

const RESERVED_WORDS = new Set([
  "arguments", "await", "break", "case", "catch", "class", "const", "continue",
  "debugger", "default", "delete", "do", "else", "enum", "eval", "export",
  "extends", "false", "finally", "for", "function", "if", "implements",
  "import", "in", "instanceof", "interface", "let", "new", "null", "package",
  "private", "protected", "public", "return", "static", "super", "switch",
  "this", "throw", "true", "try", "typeof", "undefined", "var", "void",
  "while", "with", "yield", "NaN", "Infinity",
  // globals the generated code calls: Symbol.for, Object.freeze, Array.isArray
  "Symbol", "Object", "Array",
]);

/**
 * Identifiers the generated code uses for its own plumbing. Mangling never
 * yields a bare `$`, so user symbols cannot collide with these.
 */
export const HOST_RESERVED = {
  runtime: "$rt",
  args: "$args",
  error: "$err",
  subject: "$subject",
} as const;

const NAMED: Partial<Record<string, string>> = { "-": "_", "?": "_p", "!": "_bang" };

function escapeChar(ch: string): string {
  const code = ch.codePointAt(0) ?? 0;
  return code <= 0xff
    ? "$" + code.toString(16).padStart(2, "0")
    : "$u" + code.toString(16).padStart(4, "0");
}

const IDENT_CHAR = /[\p{L}\p{Nd}_]/u;

export function mangle(name: string): string {
  let out = "";
  for (const ch of name) {
    const named = NAMED[ch];
    if (named !== undefined) out += named;
    else if (IDENT_CHAR.test(ch)) out += ch;
    else out += escapeChar(ch);
  }
  if (out.length === 0 || /^\p{Nd}/u.test(out)) out = "_" + out;
  return RESERVED_WORDS.has(out) ? out + "_" : out;
}
