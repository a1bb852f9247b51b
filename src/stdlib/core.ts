// src/stdlib/core.ts
// List, math and predicate helpers that generated code calls by name.
// Keys are Lisp names; the evaluator binds each under its mangled identifier.

import { car, cdr, cons, equals, isAtom, isEmpty, isTuple, show } from "../core/host/runtime";

export type StdlibFn = (...args: never[]) => unknown;
export type Stdlib = Readonly<Record<string, StdlibFn>>;

type Fn1 = (x: unknown) => unknown;
type Fn2 = (x: unknown, acc: unknown) => unknown;

function expectList(xs: unknown, fname: string): unknown[] {
  if (Array.isArray(xs)) return xs;
  throw new TypeError(`${fname}: expected a list, got ${show(xs, true)}`);
}

function expectNumber(n: unknown, fname: string): number {
  if (typeof n === "number") return n;
  throw new TypeError(`${fname}: expected a number, got ${show(n, true)}`);
}

function expectInt(n: unknown, fname: string): number {
  const v = expectNumber(n, fname);
  if (Number.isInteger(v)) return v;
  throw new TypeError(`${fname}: expected an integer, got ${v}`);
}

function expectFn(f: unknown, fname: string): Fn1 {
  if (typeof f === "function") return (x: unknown): unknown => Reflect.apply(f, undefined, [x]);
  throw new TypeError(`${fname}: expected a function, got ${show(f, true)}`);
}

function compareValues(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return a - b;
  const sa = typeof a === "string" ? a : show(a, true);
  const sb = typeof b === "string" ? b : show(b, true);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function flattenDeep(xs: readonly unknown[]): unknown[] {
  return xs.flatMap((x) => (Array.isArray(x) && !isTuple(x) ? flattenDeep(x) : [x]));
}

function gcd(a: unknown, b: unknown): number {
  let x = Math.abs(expectInt(a, "gcd"));
  let y = Math.abs(expectInt(b, "gcd"));
  while (y !== 0) [x, y] = [y, x % y];
  return x;
}

function range(start: unknown, stop: unknown): number[] {
  const from = expectInt(start, "range");
  const to = expectInt(stop, "range");
  const step = from <= to ? 1 : -1;
  const out: number[] = [];
  for (let i = from; step > 0 ? i <= to : i >= to; i += step) out.push(i);
  return out;
}

function interleave(a: unknown, b: unknown): unknown[] {
  const xs = expectList(a, "interleave");
  const ys = expectList(b, "interleave");
  const out: unknown[] = [];
  const n = Math.min(xs.length, ys.length);
  for (let i = 0; i < n; i++) out.push(xs[i], ys[i]);
  return out.concat(xs.slice(n), ys.slice(n));
}

const numbers = (xs: readonly unknown[], fname: string) => xs.map((x) => expectNumber(x, fname));

export const stdlib: Stdlib = {
  // lists
  car,
  cdr,
  cons,
  first: car,
  rest: cdr,
  head: car,
  tail: cdr,
  second: (xs: unknown) => car(cdr(xs)),
  third: (xs: unknown) => car(cdr(cdr(xs))),
  nth: (xs: unknown, n: unknown) => expectList(xs, "nth")[expectInt(n, "nth")] ?? null,
  take: (xs: unknown, n: unknown) => expectList(xs, "take").slice(0, Math.max(0, expectInt(n, "take"))),
  drop: (xs: unknown, n: unknown) => expectList(xs, "drop").slice(Math.max(0, expectInt(n, "drop"))),
  last: (xs: unknown) => {
    const list = expectList(xs, "last");
    return list.length > 0 ? list[list.length - 1] : null;
  },
  reverse: (xs: unknown) => [...expectList(xs, "reverse")].reverse(),
  append: (a: unknown, b: unknown) => [...expectList(a, "append"), ...expectList(b, "append")],
  length: (xs: unknown) => expectList(xs, "length").length,
  list: (...xs: unknown[]) => xs,

  // higher-order
  map: (f: Fn1, xs: unknown) => expectList(xs, "map").map((x) => f(x)),
  filter: (f: Fn1, xs: unknown) => expectList(xs, "filter").filter((x) => f(x)),
  reduce: (f: Fn2, acc: unknown, xs: unknown) => expectList(xs, "reduce").reduce((a, x) => f(x, a), acc),
  foldl: (f: Fn2, acc: unknown, xs: unknown) => expectList(xs, "foldl").reduce((a, x) => f(x, a), acc),
  foldr: (f: Fn2, acc: unknown, xs: unknown) => expectList(xs, "foldr").reduceRight((a, x) => f(x, a), acc),
  apply: (f: (...args: unknown[]) => unknown, args: unknown) => f(...expectList(args, "apply")),
  compose: (f: Fn1, g: Fn1) => (x: unknown) => f(g(x)),
  partial: (f: (a: unknown, b: unknown) => unknown, a: unknown) => (b: unknown) => f(a, b),
  identity: (x: unknown) => x,
  constantly: (v: unknown) => () => v,
  "all?": (f: Fn1, xs: unknown) => expectList(xs, "all?").every((x) => Boolean(f(x))),
  "any?": (f: Fn1, xs: unknown) => expectList(xs, "any?").some((x) => Boolean(f(x))),
  find: (f: Fn1, xs: unknown) => expectList(xs, "find").find((x) => Boolean(f(x))) ?? null,
  // value threaded through a list of one-argument functions, in order
  "thread-first": (v: unknown, fs: unknown) => expectList(fs, "thread-first").reduce<unknown>((acc, f) => expectFn(f, "thread-first")(acc), v),
  "thread-last": (v: unknown, fs: unknown) => expectList(fs, "thread-last").reduce<unknown>((acc, f) => expectFn(f, "thread-last")(acc), v),
  tap: (v: unknown, f: Fn1) => {
    f(v);
    return v;
  },
  partition: (f: Fn1, xs: unknown) => {
    const yes: unknown[] = [];
    const no: unknown[] = [];
    for (const x of expectList(xs, "partition")) (f(x) ? yes : no).push(x);
    return [yes, no];
  },

  // predicates
  "nil?": (x: unknown) => x === null || x === undefined,
  "empty?": isEmpty,
  "list?": (x: unknown) => Array.isArray(x),
  "atom?": isAtom,
  "number?": (x: unknown) => typeof x === "number",
  "string?": (x: unknown) => typeof x === "string",
  "function?": (x: unknown) => typeof x === "function",
  "even?": (n: unknown) => expectInt(n, "even?") % 2 === 0,
  "odd?": (n: unknown) => expectInt(n, "odd?") % 2 !== 0,
  "zero?": (n: unknown) => expectNumber(n, "zero?") === 0,
  "positive?": (n: unknown) => expectNumber(n, "positive?") > 0,
  "negative?": (n: unknown) => expectNumber(n, "negative?") < 0,

  // math
  abs: (n: unknown) => Math.abs(expectNumber(n, "abs")),
  max: (a: unknown, b: unknown) => (compareValues(a, b) >= 0 ? a : b),
  min: (a: unknown, b: unknown) => (compareValues(a, b) <= 0 ? a : b),
  sum: (xs: unknown) => numbers(expectList(xs, "sum"), "sum").reduce((a, b) => a + b, 0),
  product: (xs: unknown) => numbers(expectList(xs, "product"), "product").reduce((a, b) => a * b, 1),
  inc: (n: unknown) => expectNumber(n, "inc") + 1,
  dec: (n: unknown) => expectNumber(n, "dec") - 1,
  square: (n: unknown) => expectNumber(n, "square") ** 2,
  cube: (n: unknown) => expectNumber(n, "cube") ** 3,
  pow: (b: unknown, e: unknown) => Math.pow(expectNumber(b, "pow"), expectNumber(e, "pow")),
  sqrt: (n: unknown) => {
    const v = expectNumber(n, "sqrt");
    if (v < 0) throw new RangeError(`sqrt: negative argument ${v}`);
    return Math.sqrt(v);
  },
  gcd,

  // first-class operators, for passing to map/reduce
  "+": (...xs: unknown[]) => numbers(xs, "+").reduce((a, b) => a + b, 0),
  "-": (...xs: unknown[]) => {
    const ns = numbers(xs, "-");
    if (ns.length === 0) return 0;
    const [first, ...rest] = ns;
    return rest.length === 0 ? -first : rest.reduce((a, b) => a - b, first);
  },
  "*": (...xs: unknown[]) => numbers(xs, "*").reduce((a, b) => a * b, 1),
  "/": (a: unknown, b: unknown) => expectNumber(a, "/") / expectNumber(b, "/"),
  "<": (a: unknown, b: unknown) => compareValues(a, b) < 0,
  ">": (a: unknown, b: unknown) => compareValues(a, b) > 0,
  "<=": (a: unknown, b: unknown) => compareValues(a, b) <= 0,
  ">=": (a: unknown, b: unknown) => compareValues(a, b) >= 0,
  "=": equals,
  "==": equals,
  "!=": (a: unknown, b: unknown) => !equals(a, b),
  not: (x: unknown) => !x,

  // conversion and strings
  "to-string": (v: unknown) => show(v),
  "to-atom": (s: unknown) => Symbol.for(String(s)),
  "to-integer": (v: unknown) => (typeof v === "string" ? Number.parseInt(v, 10) : Math.trunc(expectNumber(v, "to-integer"))),
  "to-float": (v: unknown) => (typeof v === "string" ? Number.parseFloat(v) : expectNumber(v, "to-float")),
  "str-length": (s: unknown) => [...String(s)].length,
  "str-concat": (xs: unknown) => expectList(xs, "str-concat").map((x) => show(x)).join(""),

  // collections
  range,
  repeat: (v: unknown, n: unknown) => Array.from({ length: Math.max(0, expectInt(n, "repeat")) }, () => v),
  zip: (a: unknown, b: unknown) => {
    const xs = expectList(a, "zip");
    const ys = expectList(b, "zip");
    return xs.slice(0, Math.min(xs.length, ys.length)).map((x, i) => Object.freeze([x, ys[i]]));
  },
  unzip: (pairs: unknown) => {
    const list = expectList(pairs, "unzip").map((p) => expectList(p, "unzip"));
    return Object.freeze([list.map((p) => p[0]), list.map((p) => p[1])]);
  },
  flatten: (xs: unknown) => flattenDeep(expectList(xs, "flatten")),
  distinct: (xs: unknown) => {
    const out: unknown[] = [];
    for (const x of expectList(xs, "distinct")) if (!out.some((y) => equals(x, y))) out.push(x);
    return out;
  },
  sort: (xs: unknown) => [...expectList(xs, "sort")].sort(compareValues),
  interleave,
};
