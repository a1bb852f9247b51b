// test/stdlib/core.spec.ts
// Standard library, called the way generated code calls it

import { describe, it, expect } from "vitest";
import { evaluate } from "../../src/core/pipeline/compileText";
import { stdlib } from "../../src/stdlib/core";
import { mangle } from "../../src/core/transform/mangle";

describe("stdlib table", () => {
  it("mangles every name to a distinct identifier", () => {
    const names = Object.keys(stdlib).map(mangle);
    expect(new Set(names).size).toBe(names.length);
  });
});

describe("list functions", () => {
  it("accesses positions", () => {
    expect(evaluate("(second [1 2 3])")).toBe(2);
    expect(evaluate("(third [1 2])")).toBeNull();
    expect(evaluate("(nth [1 2 3] 2)")).toBe(3);
    expect(evaluate("(last [])")).toBeNull();
  });

  it("slices and joins", () => {
    expect(evaluate("(take [1 2 3] 2)")).toEqual([1, 2]);
    expect(evaluate("(drop [1 2 3] 2)")).toEqual([3]);
    expect(evaluate("(append [1] [2 3])")).toEqual([1, 2, 3]);
    expect(evaluate("(reverse [1 2 3])")).toEqual([3, 2, 1]);
    expect(evaluate("(length [1 2 3])")).toBe(3);
  });

  it("rejects non-lists", () => {
    expect(() => evaluate("(length 5)")).toThrow("length: expected a list, got 5");
  });
});

describe("higher-order functions", () => {
  it("maps and filters", () => {
    expect(evaluate("(map inc [1 2 3])")).toEqual([2, 3, 4]);
    expect(evaluate("(filter even? (range 1 6))")).toEqual([2, 4, 6]);
  });

  it("folds with the element first", () => {
    expect(evaluate("(reduce + 0 [1 2 3])")).toBe(6);
    expect(evaluate("(foldl cons nil [1 2 3])")).toEqual([3, 2, 1]);
    expect(evaluate("(foldr cons nil [1 2 3])")).toEqual([1, 2, 3]);
  });

  it("composes and partially applies", () => {
    expect(evaluate("((compose inc square) 3)")).toBe(10);
    expect(evaluate("((partial * 3) 4)")).toBe(12);
    expect(evaluate("(apply max [3 9])")).toBe(9);
    expect(evaluate("((constantly 7))")).toBe(7);
  });

  it("threads a value through functions", () => {
    expect(evaluate("(thread-first 3 [inc square])")).toBe(16);
    expect(evaluate("(thread-last [3 1 2] [sort reverse])")).toEqual([3, 2, 1]);
    expect(() => evaluate("(thread-first 1 [2])")).toThrow("thread-first: expected a function, got 2");
  });

  it("taps a value without changing it", () => {
    const out: string[] = [];
    expect(evaluate("(tap 5 (fn [x] (println x)))", { write: (t) => out.push(t) })).toBe(5);
    expect(out).toEqual(["5\n"]);
  });

  it("searches and splits", () => {
    expect(evaluate("(find odd? [2 4 5 7])")).toBe(5);
    expect(evaluate("(find odd? [2 4])")).toBeNull();
    expect(evaluate("(partition odd? [1 2 3 4])")).toEqual([[1, 3], [2, 4]]);
    expect(evaluate("(list (all? positive? [1 2]) (any? zero? [1 2]))")).toEqual([true, false]);
  });
});

describe("math", () => {
  it("computes aggregates", () => {
    expect(evaluate("(sum [1 2 3 4])")).toBe(10);
    expect(evaluate("(product [1 2 3 4])")).toBe(24);
    expect(evaluate("(gcd 12 18)")).toBe(6);
    expect(evaluate("(list (pow 2 10) (sqrt 16) (cube 2) (abs -4))")).toEqual([1024, 4, 8, 4]);
  });

  it("refuses a negative square root", () => {
    expect(() => evaluate("(sqrt -1)")).toThrow("sqrt: negative argument -1");
  });

  it("passes operators as values", () => {
    expect(evaluate("(map - [1 2])")).toEqual([-1, -2]);
    expect(evaluate("(apply - [10 3 2])")).toBe(5);
    expect(evaluate("(apply = [[1] [1]])")).toBe(true);
  });
});

describe("collections", () => {
  it("builds ranges in either direction", () => {
    expect(evaluate("(range 1 4)")).toEqual([1, 2, 3, 4]);
    expect(evaluate("(range 3 1)")).toEqual([3, 2, 1]);
  });

  it("zips into tuples", () => {
    const zipped = evaluate("(zip [1 2 3] [:a :b])");
    expect(zipped).toEqual([[1, Symbol.for("a")], [2, Symbol.for("b")]]);
    expect(Array.isArray(zipped) && zipped.every((p) => Object.isFrozen(p))).toBe(true);
  });

  it("deduplicates, sorts, flattens and interleaves", () => {
    expect(evaluate("(distinct [1 [2] 1 [2] 3])")).toEqual([1, [2], 3]);
    expect(evaluate("(sort [3 1 2])")).toEqual([1, 2, 3]);
    expect(evaluate("(flatten [1 [2 [3 {4 5}]]])")).toEqual([1, 2, 3, [4, 5]]);
    expect(evaluate("(interleave [1 2 3] [:a])")).toEqual([1, Symbol.for("a"), 2, 3]);
    expect(evaluate("(repeat :x 2)")).toEqual([Symbol.for("x"), Symbol.for("x")]);
  });
});

describe("conversions", () => {
  it("converts between strings, numbers and tags", () => {
    expect(evaluate("(to-string [1 :a])")).toBe("(1 :a)");
    expect(evaluate('(to-atom "ok")')).toBe(Symbol.for("ok"));
    expect(evaluate('(to-integer "42")')).toBe(42);
    expect(evaluate("(to-integer 3.9)")).toBe(3);
    expect(evaluate('(to-float "2.5")')).toBe(2.5);
    expect(evaluate('(str-length "héllo")')).toBe(5);
  });

  it("concatenates a list of strings", () => {
    expect(evaluate('(str-concat ["a" "b" 1])')).toBe("ab1");
  });

  it("answers predicates", () => {
    expect(evaluate("(list (function? inc) (string? 1) (empty? []) (atom? :a))")).toEqual([true, false, true, true]);
  });
});
