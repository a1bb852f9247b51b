// src/core/transform/patterns.ts
// Structural patterns → host tests over an accessor plus const bindings.
//
// Tests only ever read the subject through accessors, never through the
// bindings, so every test of a clause can run before anything is bound.

import ts from "typescript";
import type { Sexpr } from "../sexp/sexp";
import { isAtom } from "../sexp/sexp";
import { TransformError } from "../errors";
import type { Env } from "./env";
import { quoteData, interpolated } from "./quote";
import {
  binary,
  constDecl,
  ident,
  index,
  method,
  numLit,
  rt,
  strictEq,
  strLit,
  symbolFor,
  boolLit,
  nullLit,
} from "./host";

type Access = () => ts.Expression;

export interface PatternPlan {
  /** Conditions over the subject, in evaluation order. */
  tests: ts.Expression[];
  /** `const` bindings for every named sub-pattern. */
  binds: ts.Statement[];
  /** Guards from `(when p guard)` sub-patterns, lowered later in `env`. */
  guards: Sexpr[];
  /** Outer environment extended with the pattern's names. */
  env: Env;
}

const isArray = (e: ts.Expression) => method(ident("Array"), "isArray", [e]);
const len = (e: ts.Expression) => ts.factory.createPropertyAccessExpression(e, "length");

function literal(p: Sexpr): ts.Expression | null {
  switch (p.tag) {
    case "Num": return numLit(p.value);
    case "Str": return strLit(p.value);
    case "Bool": return boolLit(p.value);
    case "Keyword": return symbolFor(p.name);
    default: return null;
  }
}

function restSplit(items: Sexpr[], form: string): { fixed: Sexpr[]; rest: Sexpr | null } {
  const bar = items.findIndex((p) => isAtom(p, "|"));
  if (bar < 0) return { fixed: items, rest: null };
  if (bar !== items.length - 2) {
    throw TransformError.malformed(form, "'|' must be followed by exactly one rest pattern");
  }
  return { fixed: items.slice(0, bar), rest: items[bar + 1] };
}

/**
 * Plan a list of argument patterns against `access(i)` accessors. `outer`
 * is the environment the clause is defined in; pinned `~{name}` patterns
 * resolve there.
 */
export function planPatterns(
  patterns: Sexpr[],
  access: (i: number) => ts.Expression,
  outer: Env,
  form: string
): PatternPlan {
  const plan: PatternPlan = { tests: [], binds: [], guards: [], env: outer };
  const seen = new Map<string, Access>();

  const walk = (p: Sexpr, at: Access): void => {
    const lit = literal(p);
    if (lit) {
      plan.tests.push(strictEq(at(), lit));
      return;
    }

    switch (p.tag) {
      case "Atom": {
        if (p.name === "_") return;
        if (p.name === "|") throw TransformError.malformed(form, "'|' outside a sequence pattern");
        const first = seen.get(p.name);
        if (first) {
          // repeated name: both positions must hold equal values
          plan.tests.push(rt("equals", [at(), first()]));
          return;
        }
        seen.set(p.name, at);
        const { env, host } = plan.env.bind(p.name);
        plan.env = env;
        plan.binds.push(constDecl(host, at()));
        return;
      }

      case "Nil":
        plan.tests.push(binary(at(), ts.SyntaxKind.EqualsEqualsToken, nullLit()));
        return;

      case "Quote":
        plan.tests.push(rt("equals", [at(), quoteData(p.expr, outer)]));
        return;

      case "Interpolate":
        plan.tests.push(rt("equals", [at(), interpolated(p.name, outer)]));
        return;

      case "Vector": {
        const { fixed, rest } = restSplit(p.items, form);
        const op = rest ? ts.SyntaxKind.GreaterThanEqualsToken : ts.SyntaxKind.EqualsEqualsEqualsToken;
        plan.tests.push(isArray(at()), binary(len(at()), op, numLit(fixed.length)));
        fixed.forEach((sub, i) => walk(sub, () => index(at(), i)));
        if (rest) walk(rest, () => method(at(), "slice", [numLit(fixed.length)]));
        return;
      }

      case "List": {
        const [head, ...tail] = p.items;
        if (head && isAtom(head, "|") && tail.length === 2) {
          plan.tests.push(isArray(at()), binary(len(at()), ts.SyntaxKind.GreaterThanToken, numLit(0)));
          walk(tail[0], () => index(at(), 0));
          walk(tail[1], () => method(at(), "slice", [numLit(1)]));
          return;
        }
        if (head && isAtom(head, "when") && tail.length === 2) {
          walk(tail[0], at);
          plan.guards.push(tail[1]);
          return;
        }
        walkTuple(p.items, at);
        return;
      }

      case "Tuple":
        walkTuple(p.items, at);
        return;

      default:
        throw TransformError.malformed(form, `unsupported pattern ${p.tag}`);
    }
  };

  const walkTuple = (items: Sexpr[], at: Access): void => {
    plan.tests.push(rt("isTuple", [at()]), strictEq(len(at()), numLit(items.length)));
    items.forEach((sub, i) => walk(sub, () => index(at(), i)));
  };

  patterns.forEach((p, i) => walk(p, () => access(i)));
  return plan;
}

/**
 * `case` patterns are literal data: symbols and keywords match their tag,
 * `_` matches anything, sequences match element-wise. Nothing is bound.
 */
export function caseTests(p: Sexpr, at: Access, env: Env): ts.Expression[] {
  const lit = literal(p);
  if (lit) return [strictEq(at(), lit)];

  switch (p.tag) {
    case "Atom":
      return p.name === "_" ? [] : [strictEq(at(), symbolFor(p.name))];
    case "Nil":
      return [binary(at(), ts.SyntaxKind.EqualsEqualsToken, nullLit())];
    case "Quote":
      return [rt("equals", [at(), quoteData(p.expr, env)])];
    case "Interpolate":
      return [rt("equals", [at(), interpolated(p.name, env)])];
    case "List":
    case "Vector":
    case "Tuple": {
      const shape = p.tag === "Tuple" ? rt("isTuple", [at()]) : isArray(at());
      const tests = [shape, strictEq(len(at()), numLit(p.items.length))];
      p.items.forEach((sub, i) => tests.push(...caseTests(sub, () => index(at(), i), env)));
      return tests;
    }
    default:
      throw TransformError.malformed("case", `unsupported pattern ${p.tag}`);
  }
}
