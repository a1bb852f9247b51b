// src/core/transform/transform.ts
// S-expression → host AST. Dispatch on the head of each list:
// special form → keyword lookup → qualified call → plain call → dynamic call.

import ts from "typescript";
import type { Sexpr } from "../sexp/sexp";
import { headName, isKeyword } from "../sexp/sexp";
import { TransformError } from "../errors";
import { Env } from "./env";
import { assertNever, isSpecialForm, type SpecialForm } from "./forms";
import type { Lowerer } from "./lowerer";
import { HOST_RESERVED, mangle } from "./mangle";
import { caseTests } from "./patterns";
import { interpolated, quasiData, quoteData } from "./quote";
import { lowerDefn, lowerLambda, parseDefn, type Clause } from "./functions";
import {
  arrayLit,
  binary,
  block,
  boolLit,
  call,
  conditional,
  constDecl,
  exprStmt,
  frozen,
  ident,
  iife,
  method,
  negate,
  not,
  nullLit,
  numLit,
  objectLit,
  param,
  prop,
  ret,
  rt,
  strLit,
  symbolFor,
  tryCatch,
  typeOfIs,
  allOf,
  arrow,
  type BinaryOp,
} from "./host";

// ═══════════════════════════════════════════════════════════════
// Sequences
// ═══════════════════════════════════════════════════════════════

export type DefinitionKind = "def" | "defn" | "defp" | "defmodule";

export interface Definition {
  kind: DefinitionKind;
  name: string;
  host: string;
}

export interface LoweredSequence {
  statements: ts.Statement[];
  /** Value of the last form (`null` for an empty sequence). */
  result: ts.Expression;
  /** Environment after every definition in the sequence. */
  env: Env;
  definitions: Definition[];
}

function definitionKind(x: Sexpr): DefinitionKind | null {
  const h = headName(x);
  return h === "def" || h === "defn" || h === "defp" || h === "defmodule" ? h : null;
}

const argsOf = (x: Sexpr): Sexpr[] => (x.tag === "List" ? x.items.slice(1) : []);

/** Name of a defn/defp form, when it has a symbol name. */
function defnName(x: Sexpr): string | null {
  const [name] = argsOf(x);
  return name !== undefined && name.tag === "Atom" ? name.name : null;
}

/**
 * Lower forms left to right, threading the environment so each definition
 * is visible to the forms after it. Adjacent defn/defp forms sharing a name
 * become one multi-clause function.
 */
export function lowerSequence(forms: Sexpr[], env: Env): LoweredSequence {
  const statements: ts.Statement[] = [];
  const definitions: Definition[] = [];
  let scope = env;
  let result: ts.Expression = nullLit();

  for (let i = 0; i < forms.length; i++) {
    const form = forms[i];
    const kind = definitionKind(form);
    const last = i === forms.length - 1;

    if (kind === "defn" || kind === "defp") {
      const def = parseDefn(kind, argsOf(form));
      const clauses: Clause[] = [...def.clauses];
      while (
        i + 1 < forms.length &&
        definitionKind(forms[i + 1]) === kind &&
        defnName(forms[i + 1]) === def.name
      ) {
        i++;
        clauses.push(...parseDefn(kind, argsOf(forms[i])).clauses);
      }
      const bound = scope.bind(def.name);
      scope = bound.env;
      statements.push(lowerDefn({ name: def.name, clauses }, bound.host, scope, lowerer));
      definitions.push({ kind, name: def.name, host: bound.host });
      if (i === forms.length - 1) result = ident(bound.host);
      continue;
    }

    if (kind === "def") {
      const [name, value, ...extra] = argsOf(form);
      if (name === undefined || name.tag !== "Atom") throw TransformError.malformed("def", "name must be a symbol");
      if (value === undefined || extra.length > 0) throw TransformError.malformed("def", "expected (def name value)");
      const init = lowerExpr(value, scope);
      const bound = scope.bind(name.name);
      scope = bound.env;
      statements.push(constDecl(bound.host, init));
      definitions.push({ kind, name: name.name, host: bound.host });
      if (last) result = ident(bound.host);
      continue;
    }

    if (kind === "defmodule") {
      const [name, ...body] = argsOf(form);
      if (name === undefined || name.tag !== "Atom") throw TransformError.malformed("defmodule", "name must be a symbol");
      const bound = scope.bind(name.name);
      const inner = lowerSequence(body, bound.env);
      const members = inner.definitions
        .filter((d) => d.kind === "defn")
        .map((d) => [mangle(d.name), ident(d.host)] as const);
      scope = bound.env;
      statements.push(constDecl(bound.host, iife([...inner.statements, ret(objectLit(members))])));
      definitions.push({ kind, name: name.name, host: bound.host });
      if (last) result = ident(bound.host);
      continue;
    }

    const e = lowerExpr(form, scope);
    if (last) result = e;
    else statements.push(exprStmt(e));
  }

  return { statements, result, env: scope, definitions };
}

export function lowerBody(forms: Sexpr[], env: Env): ts.Statement[] {
  const seq = lowerSequence(forms, env);
  return [...seq.statements, ret(seq.result)];
}

const lowerer: Lowerer = {
  expr: (x, env) => lowerExpr(x, env),
  body: (forms, env) => lowerBody(forms, env),
};

// ═══════════════════════════════════════════════════════════════
// Expressions
// ═══════════════════════════════════════════════════════════════

/** Variable reference for a bound symbol, otherwise a free (possibly qualified) identifier. */
function reference(name: string, env: Env): ts.Expression {
  const host = env.lookup(name);
  if (host !== undefined) return ident(host);
  if (!name.includes(".")) return ident(mangle(name));

  const [base, ...members] = name.split(".");
  if (base === "" || members.some((m) => m === "")) {
    throw TransformError.malformed(name, "qualified name has an empty segment");
  }
  return members.reduce<ts.Expression>((acc, m) => prop(acc, mangle(m)), ident(env.lookup(base) ?? mangle(base)));
}

export function lowerExpr(x: Sexpr, env: Env): ts.Expression {
  switch (x.tag) {
    case "Num": return numLit(x.value);
    case "Str": return strLit(x.value);
    case "Bool": return boolLit(x.value);
    case "Nil": return nullLit();
    case "Keyword": return symbolFor(x.name);
    case "Atom": return reference(x.name, env);
    case "Interpolate": return interpolated(x.name, env);
    case "Vector": return arrayLit(x.items.map((c) => lowerExpr(c, env)));
    case "Tuple": return frozen(x.items.map((c) => lowerExpr(c, env)));
    case "Quote": return quoteData(x.expr, env);
    case "Quasiquote": return quasiData(x.expr, env, lowerer);
    case "Unquote":
    case "UnquoteSplicing":
      return lowerExpr(x.expr, env);
    case "List": {
      if (x.items.length === 0) return arrayLit([]);
      const [head, ...args] = x.items;
      return lowerCall(x, head, args, env);
    }
  }
}

function lowerArgs(args: Sexpr[], env: Env): ts.Expression[] {
  return args.map((a) => lowerExpr(a, env));
}

/** `(:key map)` / `(:key map default)` */
function lowerLookup(key: string, args: Sexpr[], env: Env): ts.Expression {
  if (args.length < 1 || args.length > 2) {
    throw TransformError.malformed(`:${key}`, `expected 1 or 2 arguments, got ${args.length}`);
  }
  const [target, ...dflt] = lowerArgs(args, env);
  return rt("lookup", [target, strLit(key), ...dflt]);
}

function lowerCall(form: Sexpr, head: Sexpr, args: Sexpr[], env: Env): ts.Expression {
  switch (head.tag) {
    case "Atom": {
      const name = head.name;
      if (isSpecialForm(name)) return lowerSpecial(name, form, args, env);
      if (name.startsWith(":") && name.length > 1) return lowerLookup(name.slice(1), args, env);
      return call(reference(name, env), lowerArgs(args, env));
    }
    case "Keyword":
      return lowerLookup(head.name, args, env);
    case "List":
    case "Interpolate":
    case "Unquote":
      return call(lowerExpr(head, env), lowerArgs(args, env));
    default:
      throw TransformError.unsupported(`${head.tag} in call position`);
  }
}

// ═══════════════════════════════════════════════════════════════
// Special forms
// ═══════════════════════════════════════════════════════════════

function arity(form: string, args: Sexpr[], min: number, max: number = min): void {
  if (args.length >= min && args.length <= max) return;
  const expected = min === max ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
  throw TransformError.malformed(form, `expected ${expected} argument(s), got ${args.length}`);
}

const ARITH: Record<"+" | "-" | "*" | "/", BinaryOp> = {
  "+": ts.SyntaxKind.PlusToken,
  "-": ts.SyntaxKind.MinusToken,
  "*": ts.SyntaxKind.AsteriskToken,
  "/": ts.SyntaxKind.SlashToken,
};

const COMPARE: Record<"<" | ">" | "<=" | ">=", BinaryOp> = {
  "<": ts.SyntaxKind.LessThanToken,
  ">": ts.SyntaxKind.GreaterThanToken,
  "<=": ts.SyntaxKind.LessThanEqualsToken,
  ">=": ts.SyntaxKind.GreaterThanEqualsToken,
};

function foldBinary(op: BinaryOp, args: ts.Expression[]): ts.Expression {
  return args.reduce((acc, a) => binary(acc, op, a));
}

function lowerSpecial(name: SpecialForm, form: Sexpr, args: Sexpr[], env: Env): ts.Expression {
  const unary = (build: (e: ts.Expression) => ts.Expression) => {
    arity(name, args, 1);
    return build(lowerExpr(args[0], env));
  };

  switch (name) {
    case "def":
    case "defn":
    case "defp":
    case "defmodule":
      // a definition in expression position evaluates to what it defines
      return iife(lowerBody([form], env));

    case "lambda":
    case "fn":
      return lowerLambda(name, args, env, lowerer);

    case "let":
      return lowerLet(args, env);

    case "if": {
      arity("if", args, 2, 3);
      const [test, then, otherwise] = args;
      return conditional(
        lowerExpr(test, env),
        lowerExpr(then, env),
        otherwise === undefined ? nullLit() : lowerExpr(otherwise, env)
      );
    }

    case "cond":
      return lowerCond(args, env);

    case "case":
      return lowerCase(args, env);

    case "do":
      return iife(lowerBody(args, env));

    case "try": {
      arity("try", args, 1, Infinity);
      const caught = frozen([symbolFor("error"), ident(HOST_RESERVED.error)]);
      return iife([tryCatch(lowerBody(args, env), HOST_RESERVED.error, [ret(caught)])]);
    }

    case "quote":
      arity("quote", args, 1);
      return quoteData(args[0], env);

    case "quasiquote":
      arity("quasiquote", args, 1);
      return quasiData(args[0], env, lowerer);

    case "unquote":
      return unary((e) => e);

    case "-":
      if (args.length === 1) return negate(lowerExpr(args[0], env));
      arity(name, args, 2, Infinity);
      return foldBinary(ARITH[name], lowerArgs(args, env));

    case "+":
    case "*":
    case "/":
      arity(name, args, 2, Infinity);
      return foldBinary(ARITH[name], lowerArgs(args, env));

    case "rem":
    case "mod": {
      arity(name, args, 2);
      const [a, b] = lowerArgs(args, env);
      return binary(a, ts.SyntaxKind.PercentToken, b);
    }

    case "<":
    case ">":
    case "<=":
    case ">=": {
      arity(name, args, 2);
      const [a, b] = lowerArgs(args, env);
      return binary(a, COMPARE[name], b);
    }

    case "==":
    case "=":
      arity(name, args, 2);
      return rt("equals", lowerArgs(args, env));

    case "!=":
      arity(name, args, 2);
      return not(rt("equals", lowerArgs(args, env)));

    case "and":
      arity(name, args, 2, Infinity);
      return foldBinary(ts.SyntaxKind.AmpersandAmpersandToken, lowerArgs(args, env));

    case "or":
      arity(name, args, 2, Infinity);
      return foldBinary(ts.SyntaxKind.BarBarToken, lowerArgs(args, env));

    case "not":
      return unary(not);

    case "car":
    case "head":
    case "first":
      return unary((e) => rt("car", [e]));

    case "cdr":
    case "tail":
    case "rest":
      return unary((e) => rt("cdr", [e]));

    case "cons":
      arity(name, args, 2);
      return rt("cons", lowerArgs(args, env));

    case "list":
      return arrayLit(lowerArgs(args, env));

    case "nil?":
      return unary((e) => binary(e, ts.SyntaxKind.EqualsEqualsToken, nullLit()));

    case "empty?":
      return unary((e) => rt("isEmpty", [e]));

    case "list?":
      return unary((e) => method(ident("Array"), "isArray", [e]));

    case "atom?":
      return unary((e) => rt("isAtom", [e]));

    case "number?":
      return unary((e) => typeOfIs(e, "number"));

    case "string?":
      return unary((e) => typeOfIs(e, "string"));

    case "str":
      return rt("str", lowerArgs(args, env));

    case "print":
      return rt("print", lowerArgs(args, env));

    case "println":
      return rt("println", lowerArgs(args, env));

    default:
      return assertNever(name);
  }
}

/** Flat `[a 1 b 2]` or paired `[[a 1] [b 2]]` / `((a 1) (b 2))` bindings. */
function letPairs(bindings: Sexpr): Array<[Sexpr, Sexpr]> {
  if (bindings.tag !== "Vector" && bindings.tag !== "List") {
    throw TransformError.malformed("let", "bindings must be a vector or a list");
  }
  const items = bindings.items;
  const paired = items.length > 0 && items.every((b) => (b.tag === "Vector" || b.tag === "List") && b.items.length === 2);
  if (paired) return items.map((b) => clausePair(b, "let"));
  if (items.length % 2 !== 0) throw TransformError.malformed("let", "bindings need an even number of forms");
  const pairs: Array<[Sexpr, Sexpr]> = [];
  for (let i = 0; i < items.length; i += 2) pairs.push([items[i], items[i + 1]]);
  return pairs;
}

/** Sequential bindings: each initializer sees only the bindings before it. */
function lowerLet(args: Sexpr[], env: Env): ts.Expression {
  arity("let", args, 1, Infinity);
  const [bindings, ...body] = args;
  const statements: ts.Statement[] = [];
  let scope = env;
  for (const [name, value] of letPairs(bindings)) {
    if (name.tag !== "Atom") throw TransformError.malformed("let", "binding name must be a symbol");
    const init = lowerExpr(value, scope);
    const bound = scope.bind(name.name);
    scope = bound.env;
    statements.push(constDecl(bound.host, init));
  }
  return iife([...statements, ...lowerBody(body, scope)]);
}

function clausePair(x: Sexpr, form: string): [Sexpr, Sexpr] {
  if ((x.tag === "List" || x.tag === "Vector") && x.items.length === 2) return [x.items[0], x.items[1]];
  throw TransformError.malformed(form, "each clause must hold exactly two forms");
}

/** Arms are tried in order; no matching test is a run-time MatchError. */
function lowerCond(args: Sexpr[], env: Env): ts.Expression {
  arity("cond", args, 1, Infinity);
  const only = args.length === 1 ? args[0] : undefined;
  const clauses =
    // a list of vector clauses; a list of lists is one (test expr) clause
    only && only.tag === "List" && only.items.length > 0 &&
    only.items.every((c) => c.tag === "Vector" && c.items.length === 2)
      ? only.items
      : args;

  const arms = clauses.map((c) => clausePair(c, "cond"));
  const fallthrough = rt("noMatch", [strLit("cond"), arrayLit([])]);
  return arms.reduceRight<ts.Expression>((acc, [test, body]) => {
    // a keyword test such as :else is always truthy
    if (isKeyword(test) || (test.tag === "Bool" && test.value)) return lowerExpr(body, env);
    return conditional(lowerExpr(test, env), lowerExpr(body, env), acc);
  }, fallthrough);
}

/** The scrutinee is evaluated once and bound to a reserved parameter. */
function lowerCase(args: Sexpr[], env: Env): ts.Expression {
  arity("case", args, 2, Infinity);
  const [scrutinee, ...clauses] = args;
  const subject = () => ident(HOST_RESERVED.subject);
  const arms = clauses.map((c) => clausePair(c, "case"));

  const body = arms.reduceRight<ts.Expression>(
    (acc, [pattern, result]) => {
      const tests = caseTests(pattern, subject, env);
      const value = lowerExpr(result, env);
      return tests.length === 0 ? value : conditional(allOf(tests), value, acc);
    },
    rt("noMatch", [strLit("case"), arrayLit([subject()])])
  );

  const fn = arrow([param(HOST_RESERVED.subject)], [ret(body)]);
  return call(ts.factory.createParenthesizedExpression(fn), [lowerExpr(scrutinee, env)]);
}

// ═══════════════════════════════════════════════════════════════
// Entry points
// ═══════════════════════════════════════════════════════════════

export interface ProgramOptions {
  /** Return `{ value, exports }` where exports holds the top-level defn functions. */
  exports?: boolean;
  /** Starting environment; a fresh one when omitted. */
  env?: Env;
}

/** Lower a sequence of top-level forms to a block ending in `return`. */
export function transformProgram(forms: Sexpr[], opts: ProgramOptions = {}): ts.Block {
  const seq = lowerSequence(forms, opts.env ?? Env.empty());
  if (!opts.exports) return block([...seq.statements, ret(seq.result)]);

  const exported = seq.definitions
    .filter((d) => d.kind === "defn")
    .map((d) => [mangle(d.name), ident(d.host)] as const);
  const value = objectLit([["value", seq.result], ["exports", objectLit(exported)]]);
  return block([...seq.statements, ret(value)]);
}

/**
 * Transform one form, or a program of several. Definitions come back as
 * statements, everything else as an expression.
 */
export function transform(x: Sexpr | Sexpr[]): ts.Expression | ts.Statement {
  const env = Env.empty();
  if (Array.isArray(x)) return transformProgram(x, { env });
  if (definitionKind(x)) {
    const seq = lowerSequence([x], env);
    return seq.statements.length === 1 ? seq.statements[0] : block(seq.statements);
  }
  return lowerExpr(x, env);
}
