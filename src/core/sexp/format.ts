// src/core/sexp/format.ts
// Canonical re-parseable rendering of S-expressions.

import type { Sexpr } from "./sexp";
import { isSeq } from "./sexp";

export interface FormatOptions {
  /** Spaces per nesting level. */
  indent?: number;
  /** Longest list that still renders on one line (when it has no nested sequences). */
  maxInline?: number;
}

const STRING_ESCAPES: Record<string, string> = { '"': '\\"', "\\": "\\\\", "\n": "\\n", "\t": "\\t", "\r": "\\r" };

function formatString(s: string): string {
  return '"' + s.replace(/["\\\n\t\r]/g, (c) => STRING_ESCAPES[c] ?? c) + '"';
}

/** Plain decimal digits; the reader has no exponent syntax. */
function decimal(value: number): string {
  const text = String(value);
  const m = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!m) return text;
  const [, sign, lead, frac = "", expText] = m;
  const exp = Number(expText);
  const digits = lead + frac;
  return exp > 0
    ? sign + digits + "0".repeat(exp - frac.length)
    : `${sign}0.${"0".repeat(-exp - 1)}${digits}`;
}

function formatNumber(value: number, float: boolean): string {
  const text = decimal(value);
  return float && !text.includes(".") ? `${text}.0` : text;
}

const isInline = (items: Sexpr[], maxInline: number) =>
  items.length <= maxInline && items.every((x) => !isSeq(x));

export function format(x: Sexpr, opts: FormatOptions = {}): string {
  const unit = " ".repeat(opts.indent ?? 2);
  const maxInline = opts.maxInline ?? 3;

  const go = (e: Sexpr, depth: number): string => {
    switch (e.tag) {
      case "Atom": return e.name;
      case "Num": return formatNumber(e.value, e.float);
      case "Str": return formatString(e.value);
      case "Bool": return e.value ? "true" : "false";
      case "Nil": return "nil";
      case "Keyword": return `:${e.name}`;
      case "Interpolate": return `~{${e.name}}`;
      case "Quote": return `'${go(e.expr, depth)}`;
      case "Quasiquote": return `\`${go(e.expr, depth)}`;
      case "Unquote": return `~${go(e.expr, depth)}`;
      case "UnquoteSplicing": return `~@${go(e.expr, depth)}`;
      case "Vector": return `[${e.items.map((c) => go(c, depth)).join(" ")}]`;
      case "Tuple": return `{${e.items.map((c) => go(c, depth)).join(" ")}}`;
      case "List": {
        if (isInline(e.items, maxInline)) {
          return `(${e.items.map((c) => go(c, depth)).join(" ")})`;
        }
        const pad = unit.repeat(depth);
        const body = e.items.map((c) => pad + unit + go(c, depth + 1)).join("\n");
        return `(\n${body}\n${pad})`;
      }
    }
  };

  return go(x, 0);
}

export function formatAll(xs: Sexpr[], opts: FormatOptions = {}): string {
  return xs.map((x) => format(x, opts)).join("\n");
}
