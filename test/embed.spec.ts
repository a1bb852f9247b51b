// test/embed.spec.ts
// Tests for the lisp tagged template

import { describe, it, expect } from "vitest";
import { lisp, template } from "../src/embed";

const tpl = (strings: TemplateStringsArray, ...values: unknown[]) => template(strings, values);

describe("template", () => {
  it("replaces each hole with a named interpolation", () => {
    const n = 5;
    const s = "hi";
    const t = tpl`(f ${n} ${s})`;
    expect(t.source).toBe("(f ~{__0} ~{__1})");
    expect(t.bindings).toEqual({ __0: 5, __1: "hi" });
  });

  it("keeps source without holes unchanged", () => {
    expect(tpl`(+ 1 2)`).toEqual({ source: "(+ 1 2)", bindings: {} });
  });
});

describe("lisp", () => {
  it("evaluates with spliced values", () => {
    const n = 41;
    expect(lisp`(+ ${n} 1)`).toBe(42);
  });

  it("passes host functions and lists through", () => {
    const double = (x: number) => x * 2;
    expect(lisp`(map ${double} ${[1, 2, 3]})`).toEqual([2, 4, 6]);
  });

  it("compiles holes to their binding names", () => {
    const n = 7;
    expect(lisp.compile`(* 2 ${n})`).toBe("2 * __0");
  });

  it("quotes with the hole kept", () => {
    const n = 7;
    expect(lisp.quote`(a ${n})`).toEqual({
      tag: "List",
      items: [
        { tag: "Atom", name: "a" },
        { tag: "Interpolate", name: "__0" },
      ],
    });
  });

  it("takes options through with()", () => {
    const out: string[] = [];
    const quiet = lisp.with({ write: (t) => out.push(t), bindings: { greeting: "hello" } });
    expect(quiet`(println greeting ${"world"})`).toBeNull();
    expect(out).toEqual(["hello world\n"]);
  });
});
