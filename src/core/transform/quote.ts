// src/core/transform/quote.ts
// quote / quasiquote: S-expressions rewritten as literal data, not code.

import type ts from "typescript";
import type { Sexpr } from "../sexp/sexp";
import type { Env } from "./env";
import type { Lowerer } from "./lowerer";
import { mangle } from "./mangle";
import { arrayLit, boolLit, frozen, ident, nullLit, numLit, spread, strLit, symbolFor } from "./host";

const WRAPPER_TAG = {
  Quote: "quote",
  Quasiquote: "quasiquote",
  Unquote: "unquote",
  UnquoteSplicing: "unquote-splicing",
} as const;

/** `~{name}` inside data still refers to the variable in scope. */
export function interpolated(name: string, env: Env): ts.Expression {
  return ident(env.lookup(name) ?? mangle(name));
}

/**
 * Data value of a quoted form. Evaluation is suppressed everywhere except
 * at interpolation points.
 */
export function quoteData(x: Sexpr, env: Env): ts.Expression {
  switch (x.tag) {
    case "Atom":
    case "Keyword":
      return symbolFor(x.name);
    case "Num": return numLit(x.value);
    case "Str": return strLit(x.value);
    case "Bool": return boolLit(x.value);
    case "Nil": return nullLit();
    case "List":
    case "Vector":
      return arrayLit(x.items.map((c) => quoteData(c, env)));
    case "Tuple":
      return frozen(x.items.map((c) => quoteData(c, env)));
    case "Quote":
    case "Quasiquote":
    case "Unquote":
    case "UnquoteSplicing":
      return arrayLit([symbolFor(WRAPPER_TAG[x.tag]), quoteData(x.expr, env)]);
    case "Interpolate":
      return interpolated(x.name, env);
  }
}

/**
 * Quasiquote: like `quoteData`, but `~x` evaluates `x` and `~@xs` splices
 * the elements of `xs` into the enclosing sequence.
 */
export function quasiData(x: Sexpr, env: Env, lower: Lowerer): ts.Expression {
  switch (x.tag) {
    case "Unquote":
    case "UnquoteSplicing":
      return lower.expr(x.expr, env);
    case "List":
    case "Vector":
    case "Tuple": {
      const elements = x.items.map((c) =>
        c.tag === "UnquoteSplicing" ? spread(lower.expr(c.expr, env)) : quasiData(c, env, lower)
      );
      return x.tag === "Tuple" ? frozen(elements) : arrayLit(elements);
    }
    case "Quote":
    case "Quasiquote":
      return arrayLit([symbolFor(WRAPPER_TAG[x.tag]), quasiData(x.expr, env, lower)]);
    default:
      return quoteData(x, env);
  }
}
