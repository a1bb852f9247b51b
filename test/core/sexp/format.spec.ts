// test/core/sexp/format.spec.ts
// Pretty-printer layout and round-trip through the reader

import { describe, it, expect } from "vitest";
import { tokenize } from "../../../src/core/reader/tokenize";
import { readAll } from "../../../src/core/reader/parse";
import { format, formatAll, sexprEquals, num, str } from "../../../src/core/sexp";

const one = (src: string) => readAll(tokenize(src))[0];

describe("format", () => {
  it("keeps short flat lists on one line", () => {
    expect(format(one("(+ 1 2)"))).toBe("(+ 1 2)");
    expect(format(one("()"))).toBe("()");
  });

  it("breaks lists longer than the inline limit", () => {
    expect(format(one("(a b c d)"))).toBe("(\n  a\n  b\n  c\n  d\n)");
  });

  it("breaks lists holding nested sequences", () => {
    expect(format(one("(if (> x 0) 1 2)"))).toBe("(\n  if\n  (> x 0)\n  1\n  2\n)");
  });

  it("indents nested broken lists one level deeper", () => {
    expect(format(one("(a (b c d e))"))).toBe("(\n  a\n  (\n    b\n    c\n    d\n    e\n  )\n)");
  });

  it("honours indent and maxInline", () => {
    expect(format(one("(a b c d)"), { maxInline: 4 })).toBe("(a b c d)");
    expect(format(one("(a (b))"), { indent: 4 })).toBe("(\n    a\n    (b)\n)");
  });

  it("renders vectors, tuples and prefix forms inline", () => {
    expect(format(one("[1 [2 3] {:ok x}]"))).toBe("[1 [2 3] {:ok x}]");
    expect(format(one("`(a ~b ~@c)"))).toBe("`(a ~b ~@c)");
    expect(format(one("'~{name}"))).toBe("'~{name}");
  });

  it("re-escapes strings and keeps float literals", () => {
    expect(format(str('say "hi"\n'))).toBe('"say \\"hi\\"\\n"');
    expect(format(num(3, true))).toBe("3.0");
    expect(format(num(-2.5))).toBe("-2.5");
  });

  it("writes very small and very large numbers without exponents", () => {
    expect(format(num(1e-7))).toBe("0.0000001");
    expect(format(num(-1.5e-7))).toBe("-0.00000015");
    expect(format(num(1e21))).toBe("1000000000000000000000");
    expect(format(num(1e21, true))).toBe("1000000000000000000000.0");
    expect(format(num(1.25e22))).toBe("12500000000000000000000");
  });

  it("joins top-level forms with newlines", () => {
    expect(formatAll(readAll(tokenize("(def x 1) x")))).toBe("(def x 1)\nx");
  });
});

describe("format round-trip", () => {
  const sources = [
    "(defn classify [n] :when (> n 0) \"positive\")",
    "(let [x 10 y (* x 2) z (+ x y)] (* z 3))",
    "(case r ({:ok v} v) ({:error _} nil) [1 2.0 \"a\\tb\"])",
    "'(quoted (deeply (nested list with many items)))",
    "(cond [(< n 0) :neg] [true :pos])",
    "(list 0.0000001 1000000000000000000000 -0.00000025)",
  ];

  for (const src of sources) {
    it(`reads back ${src}`, () => {
      const forms = readAll(tokenize(src));
      const again = readAll(tokenize(formatAll(forms)));
      expect(again).toHaveLength(forms.length);
      forms.forEach((f, i) => expect(sexprEquals(again[i], f)).toBe(true));
    });
  }
});
