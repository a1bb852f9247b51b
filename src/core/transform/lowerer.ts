// src/core/transform/lowerer.ts
// The recursion hooks helper modules call back into.

import type ts from "typescript";
import type { Sexpr } from "../sexp/sexp";
import type { Env } from "./env";

export interface Lowerer {
  /** Lower one form in expression position. */
  expr(x: Sexpr, env: Env): ts.Expression;
  /** Lower a body sequence to statements that end in a `return`. */
  body(forms: Sexpr[], env: Env): ts.Statement[];
}
