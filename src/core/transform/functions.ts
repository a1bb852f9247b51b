// src/core/transform/functions.ts
// defn / defp / lambda: clause parsing and lowering.

import ts from "typescript";
import type { Sexpr } from "../sexp/sexp";
import { isKeyword } from "../sexp/sexp";
import { TransformError } from "../errors";
import type { Env } from "./env";
import type { Lowerer } from "./lowerer";
import { HOST_RESERVED } from "./mangle";
import { planPatterns } from "./patterns";
import {
  allOf,
  arrow,
  binary,
  functionDecl,
  functionExpr,
  ident,
  ifStmt,
  index,
  numLit,
  param,
  restParam,
  ret,
  rt,
  strLit,
} from "./host";

export interface Clause {
  params: Sexpr[];
  guard: Sexpr | null;
  body: Sexpr[];
}

export interface FunctionDef {
  name: string;
  clauses: Clause[];
}

function argList(x: Sexpr, form: string): Sexpr[] {
  if (x.tag === "Vector" || x.tag === "List") return x.items;
  throw TransformError.malformed(form, "argument list must be a vector or a list");
}

const isArgList = (x: Sexpr | undefined) => x !== undefined && (x.tag === "Vector" || x.tag === "List");

/** `(args body)`, `(args guard body)` or `(args :when guard body)`. */
function isClauseShape(x: Sexpr): boolean {
  return (
    x.tag === "List" &&
    x.items.length >= 2 &&
    x.items.length <= 4 &&
    isArgList(x.items[0])
  );
}

function parseClause(x: Sexpr, form: string): Clause {
  if (x.tag !== "List") throw TransformError.malformed(form, "clause must be a list");
  const [args, ...rest] = x.items;
  const params = argList(args, form);
  if (rest.length === 1) return { params, guard: null, body: rest };
  if (rest.length === 2) return { params, guard: rest[0], body: [rest[1]] };
  if (rest.length === 3 && isKeyword(rest[0], "when")) return { params, guard: rest[1], body: [rest[2]] };
  throw TransformError.malformed(form, "clause must be (args body), (args guard body) or (args :when guard body)");
}

/** Arguments after the name: an argument list, an optional `:when guard`, then the body. */
export function parseSingleClause(items: Sexpr[], form: string): Clause {
  if (items.length === 0) throw TransformError.malformed(form, "missing argument list");
  const [args, ...tail] = items;
  const params = argList(args, form);
  if (tail.length > 0 && isKeyword(tail[0], "when")) {
    if (tail.length < 3) throw TransformError.malformed(form, ":when needs a guard and a body");
    return { params, guard: tail[1], body: tail.slice(2) };
  }
  if (tail.length === 0) throw TransformError.malformed(form, "missing body");
  return { params, guard: null, body: tail };
}

export function parseDefn(form: string, args: Sexpr[]): FunctionDef {
  const [name, ...rest] = args;
  if (name === undefined || name.tag !== "Atom") throw TransformError.malformed(form, "name must be a symbol");
  // a vector after the name is always the argument list of a single clause
  if (rest.length > 0 && rest[0].tag !== "Vector" && rest.every(isClauseShape)) {
    return { name: name.name, clauses: rest.map((c) => parseClause(c, form)) };
  }
  return { name: name.name, clauses: [parseSingleClause(rest, form)] };
}

/** One clause of plain, distinct symbols and no guard: lowers to ordinary parameters. */
function simpleParams(clauses: Clause[]): string[] | null {
  if (clauses.length !== 1) return null;
  const [{ params, guard }] = clauses;
  if (guard) return null;
  const names: string[] = [];
  for (const p of params) {
    if (p.tag !== "Atom" || p.name === "|") return null;
    if (p.name !== "_" && names.includes(p.name)) return null;
    names.push(p.name);
  }
  return names;
}

interface Lowered {
  params: ts.ParameterDeclaration[];
  body: ts.Statement[];
}

function lowerSimple(names: string[], body: Sexpr[], env: Env, lower: Lowerer): Lowered {
  const params: ts.ParameterDeclaration[] = [];
  let scope = env;
  for (const n of names) {
    const bound = scope.bind(n);
    scope = bound.env;
    params.push(param(bound.host));
  }
  return { params, body: lower.body(body, scope) };
}

/**
 * Multi-clause dispatch: each clause tests arity and patterns, binds, checks
 * its guards, and returns; the last statement reports that nothing matched.
 */
function lowerClauses(label: string, clauses: Clause[], env: Env, lower: Lowerer): Lowered {
  const args = () => ident(HOST_RESERVED.args);
  const statements: ts.Statement[] = [];

  for (const clause of clauses) {
    const plan = planPatterns(clause.params, (i) => index(args(), i), env, label);
    const arity = binary(
      ts.factory.createPropertyAccessExpression(args(), "length"),
      ts.SyntaxKind.EqualsEqualsEqualsToken,
      numLit(clause.params.length)
    );
    const guards = [...plan.guards, ...(clause.guard ? [clause.guard] : [])];
    const body = lower.body(clause.body, plan.env);
    const inner = guards.length > 0
      ? [ifStmt(allOf(guards.map((g) => lower.expr(g, plan.env))), body)]
      : body;
    statements.push(ifStmt(allOf([arity, ...plan.tests]), [...plan.binds, ...inner]));
  }

  statements.push(ret(rt("noMatch", [strLit(label), args()])));
  return { params: [restParam(HOST_RESERVED.args)], body: statements };
}

function lowerFunction(label: string, clauses: Clause[], env: Env, lower: Lowerer): Lowered {
  const simple = simpleParams(clauses);
  return simple ? lowerSimple(simple, clauses[0].body, env, lower) : lowerClauses(label, clauses, env, lower);
}

/**
 * Named function declaration. `env` must already bind the function's own
 * name so recursive calls resolve to `host`.
 */
export function lowerDefn(def: FunctionDef, host: string, env: Env, lower: Lowerer): ts.FunctionDeclaration {
  const { params, body } = lowerFunction(def.name, def.clauses, env, lower);
  return functionDecl(host, params, body);
}

/** `(lambda args body...)` / `(fn args body...)`: a closure value. */
export function lowerLambda(form: string, args: Sexpr[], env: Env, lower: Lowerer): ts.Expression {
  const clause = parseSingleClause(args, form);
  const simple = simpleParams([clause]);
  if (simple) {
    const { params, body } = lowerSimple(simple, clause.body, env, lower);
    return arrow(params, body);
  }
  const { params, body } = lowerClauses(form, [clause], env, lower);
  return functionExpr(undefined, params, body);
}
