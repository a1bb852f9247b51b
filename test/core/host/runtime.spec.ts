// test/core/host/runtime.spec.ts
// Intrinsics reached through $rt

import { describe, it, expect } from "vitest";
import { createRuntime, equals, show, isTuple, car, cdr, cons, isEmpty, isAtom } from "../../../src/core/host/runtime";
import { MatchError } from "../../../src/core/errors";

describe("equals", () => {
  it("compares arrays deeply", () => {
    expect(equals([1, [2, "x"]], [1, [2, "x"]])).toBe(true);
    expect(equals([1, 2], [1, 2, 3])).toBe(false);
  });

  it("tells tuples from lists", () => {
    expect(equals(Object.freeze([1]), [1])).toBe(false);
    expect(equals(Object.freeze([1]), Object.freeze([1]))).toBe(true);
  });

  it("treats NaN as equal to itself", () => {
    expect(equals(NaN, NaN)).toBe(true);
  });

  it("compares symbols by identity", () => {
    expect(equals(Symbol.for("a"), Symbol.for("a"))).toBe(true);
    expect(equals(Symbol.for("a"), "a")).toBe(false);
  });
});

describe("show", () => {
  it("renders top-level values plainly", () => {
    expect(show(null)).toBe("nil");
    expect(show("text")).toBe("text");
    expect(show(Symbol.for("ok"))).toBe("ok");
    expect(show(3.5)).toBe("3.5");
  });

  it("quotes nested strings and prefixes nested tags", () => {
    expect(show(["a", Symbol.for("b"), null])).toBe('("a" :b nil)');
    expect(show(Object.freeze([Symbol.for("ok"), 1]))).toBe("{:ok 1}");
  });

  it("renders maps and functions", () => {
    expect(show(new Map<unknown, unknown>([[Symbol.for("k"), 1], ["s", true]]))).toBe('%{:k 1, "s" true}');
    function named() {}
    expect(show(named)).toBe("#<function named>");
  });
});

describe("list intrinsics", () => {
  it("never faults on empty input", () => {
    expect(car([])).toBeNull();
    expect(car(null)).toBeNull();
    expect(cdr(null)).toEqual([]);
  });

  it("conses onto lists and nil", () => {
    expect(cons(1, [2])).toEqual([1, 2]);
    expect(cons(1, null)).toEqual([1]);
    expect(() => cons(1, 2)).toThrow("cons: expected a list, got 2");
  });

  it("classifies emptiness and atoms", () => {
    expect([isEmpty(null), isEmpty(""), isEmpty([]), isEmpty(new Map()), isEmpty([0])]).toEqual([
      true, true, true, true, false,
    ]);
    expect([isAtom(Symbol.for("a")), isAtom(true), isAtom(null), isAtom(1)]).toEqual([true, true, true, false]);
    expect(isTuple(Object.freeze([]))).toBe(true);
    expect(isTuple([])).toBe(false);
  });
});

describe("createRuntime", () => {
  it("routes print output to the writer", () => {
    const out: string[] = [];
    const rt = createRuntime({ write: (t) => out.push(t) });
    expect(rt.print("a", 1)).toBeNull();
    rt.println(["x"]);
    expect(out).toEqual(["a 1", '("x")\n']);
  });

  it("joins str parts without separators", () => {
    expect(createRuntime().str("a", 1, Symbol.for("b"))).toBe("a1b");
  });

  it("looks up own properties only", () => {
    const rt = createRuntime();
    expect(rt.lookup({ a: 1 }, "a")).toBe(1);
    expect(rt.lookup({}, "toString")).toBeNull();
    expect(rt.lookup(new Map([["s", 2]]), "s")).toBe(2);
    expect(rt.lookup(42, "a", "d")).toBe("d");
  });

  it("raises MatchError from noMatch", () => {
    const rt = createRuntime();
    expect(() => rt.noMatch("f", [1, "a"])).toThrow(MatchError);
    expect(() => rt.noMatch("f", [1, "a"])).toThrow('No clause of f matched 1, "a"');
  });
});
