// test/core/transform/mangle.spec.ts
// Symbol mangling and fresh host names

import { describe, it, expect } from "vitest";
import { mangle, HOST_RESERVED } from "../../../src/core/transform/mangle";
import { Env, NameSupply } from "../../../src/core/transform/env";

describe("mangle", () => {
  it("maps the common Lisp punctuation to readable names", () => {
    expect(mangle("foo-bar")).toBe("foo_bar");
    expect(mangle("empty?")).toBe("empty_p");
    expect(mangle("set!")).toBe("set_bang");
  });

  it("hex-escapes other characters", () => {
    expect(mangle("+")).toBe("$2b");
    expect(mangle("a*b")).toBe("a$2ab");
    expect(mangle("->")).toBe("_$3e");
    expect(mangle("→")).toBe("$u2192");
  });

  it("keeps letters from any script", () => {
    expect(mangle("λ")).toBe("λ");
    expect(mangle("größe")).toBe("größe");
  });

  it("renames the globals generated code calls", () => {
    expect(mangle("Symbol")).toBe("Symbol_");
    expect(mangle("Object")).toBe("Object_");
    expect(mangle("Array")).toBe("Array_");
  });

  it("avoids reserved words and leading digits", () => {
    expect(mangle("class")).toBe("class_");
    expect(mangle("new")).toBe("new_");
    expect(mangle("1st")).toBe("_1st");
    expect(mangle("")).toBe("_");
  });

  it("never produces a host reserved identifier", () => {
    for (const reserved of Object.values(HOST_RESERVED)) {
      expect(mangle(reserved)).not.toBe(reserved);
    }
    expect(mangle("$rt")).toBe("$24rt");
  });
});

describe("NameSupply", () => {
  it("hands out the mangled name first, then numbered variants", () => {
    const names = new NameSupply();
    expect(names.fresh("x")).toBe("x");
    expect(names.fresh("x")).toBe("x$1");
    expect(names.fresh("x")).toBe("x$2");
    expect(names.fresh("y-z")).toBe("y_z");
  });

  it("skips reserved names", () => {
    const names = new NameSupply(["map"]);
    expect(names.fresh("map")).toBe("map$1");
  });
});

describe("Env", () => {
  it("binds without touching the parent", () => {
    const root = Env.empty();
    const { env, host } = root.bind("x");
    expect(host).toBe("x");
    expect(env.lookup("x")).toBe("x");
    expect(root.has("x")).toBe(false);
  });

  it("resolves the innermost binding", () => {
    const outer = Env.empty().bind("x");
    const inner = outer.env.bind("x");
    expect(inner.host).toBe("x$1");
    expect(inner.env.lookup("x")).toBe("x$1");
    expect(outer.env.lookup("x")).toBe("x");
  });

  it("keeps sibling scopes apart", () => {
    const base = Env.empty();
    const left = base.bind("a").env;
    const right = base.bind("b").env;
    expect(left.has("b")).toBe(false);
    expect(right.has("a")).toBe(false);
  });
});
