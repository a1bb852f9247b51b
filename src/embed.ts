// src/embed.ts
// `lisp` tagged template: host values spliced into source as interpolations.
//
// Usage:
//   import { lisp } from "lispen";
//
//   const n = 41;
//   lisp`(+ ${n} 1)`;            // 42
//   lisp.quote`(a ${n})`;        // reader output, the hole kept as Interpolate
//   lisp.compile`(* 2 ${n})`;    // "2 * __0"

import type { Sexpr } from "./core/sexp/sexp";
import { compile, evaluate, quote, type CompileOptions, type EvaluateOptions } from "./core/pipeline/compileText";

export interface Template {
  source: string;
  bindings: Record<string, unknown>;
}

/** Join the literal parts, replacing the i-th hole with `~{__i}` bound to the i-th value. */
export function template(strings: TemplateStringsArray, values: readonly unknown[]): Template {
  const bindings: Record<string, unknown> = {};
  let source = strings[0] ?? "";
  values.forEach((value, i) => {
    const name = `__${i}`;
    bindings[name] = value;
    source += `~{${name}}${strings[i + 1] ?? ""}`;
  });
  return { source, bindings };
}

export interface Lisp {
  (strings: TemplateStringsArray, ...values: unknown[]): unknown;
  quote(strings: TemplateStringsArray, ...values: unknown[]): Sexpr | Sexpr[];
  compile(strings: TemplateStringsArray, ...values: unknown[]): string;
  /** A tag that evaluates with the given options (runtime, writer, extra bindings). */
  with(opts: EvaluateOptions & CompileOptions): Lisp;
}

function makeLisp(opts: EvaluateOptions & CompileOptions): Lisp {
  const tag = (strings: TemplateStringsArray, ...values: unknown[]): unknown => {
    const t = template(strings, values);
    return evaluate(t.source, { ...opts, bindings: { ...opts.bindings, ...t.bindings } });
  };
  return Object.assign(tag, {
    quote: (strings: TemplateStringsArray, ...values: unknown[]) => quote(template(strings, values).source),
    compile: (strings: TemplateStringsArray, ...values: unknown[]) => compile(template(strings, values).source, opts),
    with: (more: EvaluateOptions & CompileOptions) => makeLisp({ ...opts, ...more }),
  });
}

export const lisp: Lisp = makeLisp({});
