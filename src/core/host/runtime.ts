// src/core/host/runtime.ts
// Intrinsics generated code reaches through `$rt`.

import { MatchError } from "../errors";

export type Writer = (text: string) => void;

export interface Runtime {
  car(xs: unknown): unknown;
  cdr(xs: unknown): unknown[];
  cons(x: unknown, xs: unknown): unknown[];
  isEmpty(x: unknown): boolean;
  isAtom(x: unknown): boolean;
  isTuple(x: unknown): x is readonly unknown[];
  equals(a: unknown, b: unknown): boolean;
  lookup(target: unknown, key: string, dflt?: unknown): unknown;
  str(...parts: unknown[]): string;
  print(...parts: unknown[]): null;
  println(...parts: unknown[]): null;
  noMatch(what: string, args: readonly unknown[]): never;
}

export interface RuntimeOptions {
  /** Output for print/println. Defaults to process.stdout. */
  write?: Writer;
}

export function isTuple(x: unknown): x is readonly unknown[] {
  return Array.isArray(x) && Object.isFrozen(x);
}

export function equals(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") return Number.isNaN(a) && Number.isNaN(b);
  if (!Array.isArray(a) || !Array.isArray(b)) return false;
  if (a.length !== b.length || isTuple(a) !== isTuple(b)) return false;
  return a.every((x, i) => equals(x, b[i]));
}

/**
 * Display form used by str/print: strings unquoted, tags by name, lists in
 * parentheses, tuples in braces.
 */
export function show(v: unknown, nested = false): string {
  if (v === null || v === undefined) return "nil";
  if (typeof v === "string") return nested ? JSON.stringify(v) : v;
  if (typeof v === "symbol") return nested ? `:${v.description ?? ""}` : v.description ?? "";
  if (typeof v === "function") return `#<function ${v.name || "anonymous"}>`;
  if (Array.isArray(v)) {
    const inner = v.map((x) => show(x, true)).join(" ");
    return isTuple(v) ? `{${inner}}` : `(${inner})`;
  }
  if (v instanceof Map) {
    const inner = [...v.entries()].map(([k, x]) => `${show(k, true)} ${show(x, true)}`).join(", ");
    return `%{${inner}}`;
  }
  return String(v);
}

function lookup(target: unknown, key: string, dflt: unknown = null): unknown {
  if (target instanceof Map) {
    const tag = Symbol.for(key);
    if (target.has(tag)) return target.get(tag);
    if (target.has(key)) return target.get(key);
    return dflt;
  }
  if (typeof target === "object" && target !== null && Object.prototype.hasOwnProperty.call(target, key)) {
    const value: unknown = Reflect.get(target, key);
    return value;
  }
  return dflt;
}

export function car(xs: unknown): unknown {
  return Array.isArray(xs) && xs.length > 0 ? xs[0] : null;
}

export function cdr(xs: unknown): unknown[] {
  return Array.isArray(xs) ? xs.slice(1) : [];
}

export function cons(x: unknown, xs: unknown): unknown[] {
  if (xs === null || xs === undefined) return [x];
  if (Array.isArray(xs)) return [x, ...xs];
  throw new TypeError(`cons: expected a list, got ${show(xs, true)}`);
}

export function isEmpty(x: unknown): boolean {
  if (x === null || x === undefined) return true;
  if (Array.isArray(x) || typeof x === "string") return x.length === 0;
  if (x instanceof Map) return x.size === 0;
  return false;
}

/** Atoms are tags, booleans and nil. */
export function isAtom(x: unknown): boolean {
  return typeof x === "symbol" || typeof x === "boolean" || x === null;
}

const defaultWrite: Writer = (text) => {
  process.stdout.write(text);
};

export function createRuntime(opts: RuntimeOptions = {}): Runtime {
  const write = opts.write ?? defaultWrite;
  return {
    car,
    cdr,
    cons,
    isEmpty,
    isAtom,
    isTuple,
    equals,
    lookup,
    str: (...parts) => parts.map((p) => show(p)).join(""),
    print: (...parts) => {
      write(parts.map((p) => show(p)).join(" "));
      return null;
    },
    println: (...parts) => {
      write(parts.map((p) => show(p)).join(" ") + "\n");
      return null;
    },
    noMatch: (what, args) => {
      throw new MatchError(what, args.map((a) => show(a, true)).join(", "));
    },
  };
}
