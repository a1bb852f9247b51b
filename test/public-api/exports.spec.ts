// test/public-api/exports.spec.ts
// The package entry point exposes every pipeline stage without internal imports.

import { describe, it, expect } from "vitest";
import {
  // pipeline
  read,
  quote,
  compile,
  evaluate,
  run,
  tryEvaluate,
  lisp,

  // reader
  tokenize,
  readAll,
  parse,

  // S-expressions
  list,
  atom,
  num,
  format,

  // transformer
  transform,
  printNode,
  isSpecialForm,
  mangle,

  // runtime
  show,
  stdlib,

  // errors, outcomes, config
  ParseError,
  isDone,
  DEFAULT_CONFIG,
  type Sexpr,
} from "../../src";

describe("Public API", () => {
  it("runs every stage from the entry point", () => {
    const forms: Sexpr[] = readAll(tokenize("(+ 1 2)"));
    expect(forms).toEqual([list([atom("+"), num(1), num(2)])]);
    expect(parse(tokenize("(+ 1 2)"))).toEqual(forms[0]);
    expect(printNode(transform(forms[0]))).toBe("1 + 2");
    expect(format(forms[0])).toBe("(+ 1 2)");
  });

  it("exposes the text-level pipeline", () => {
    expect(read("a b")).toHaveLength(2);
    expect(quote("x")).toEqual(atom("x"));
    expect(compile("(- 5 2)")).toBe("5 - 2");
    expect(evaluate("(- 5 2)")).toBe(3);
    expect(run("(defn f [] 1) (f)").value).toBe(1);
    expect(lisp`(* 3 ${3})`).toBe(9);
  });

  it("exposes the runtime, errors and config", () => {
    expect(show([1, "a"], true)).toBe('(1 "a")');
    expect(typeof stdlib.map).toBe("function");
    expect(isSpecialForm("defn")).toBe(true);
    expect(mangle("empty?")).toBe("empty_p");
    expect(isDone(tryEvaluate("1"))).toBe(true);
    expect(new ParseError("E0102", { token: "')'" })).toBeInstanceOf(Error);
    expect(DEFAULT_CONFIG.format.indent).toBe(2);
  });
});
