// test/cli/lispen.spec.ts
// Tests for the lispen CLI library

import { describe, it, expect } from "vitest";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  detectMode,
  buildConfig,
  runSource,
  formatError,
  openDepth,
  ReplSession,
} from "../../bin/lispen-cli-lib";
import { DEFAULT_CONFIG, mergeConfigs } from "../../src/core/config/config";
import { ParseError } from "../../src/core/errors";

describe("lispen CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse --help and --version flags", () => {
      expect(parseCliArgs(["--help"]).help).toBe(true);
      expect(parseCliArgs(["-v"]).version).toBe(true);
    });

    it("should parse --eval with code", () => {
      const parsed = parseCliArgs(["--eval", "(+ 1 2)"]);
      expect(parsed.eval).toBe("(+ 1 2)");
      expect(parsed.mode).toBe("exec");
    });

    it("should parse file argument", () => {
      const parsed = parseCliArgs(["--compile", "example.lisp"]);
      expect(parsed.file).toBe("example.lisp");
      expect(parsed.output).toBe("compile");
      expect(parsed.mode).toBe("exec");
    });

    it("should parse output and config flags", () => {
      expect(parseCliArgs(["-q"]).output).toBe("quote");
      expect(parseCliArgs(["--format"]).output).toBe("format");
      expect(parseCliArgs(["--config", "cfg.yaml"]).config).toBe("cfg.yaml");
      expect(parseCliArgs(["--verbose"]).verbose).toBe(true);
    });

    it("should default to REPL mode with no arguments", () => {
      expect(parseCliArgs([]).mode).toBe("repl");
    });

    it("should ignore unknown flags", () => {
      expect(parseCliArgs(["--shiny"])).toEqual({ mode: "repl" });
    });
  });

  describe("Configuration building", () => {
    it("should detect exec mode from code or file", () => {
      expect(detectMode({ eval: "1" })).toBe("exec");
      expect(detectMode({ file: "a.lisp" })).toBe("exec");
      expect(detectMode({})).toBe("repl");
    });

    it("should fill defaults", () => {
      expect(buildConfig({ eval: "(f)" })).toEqual({
        mode: "exec",
        output: "eval",
        verbose: false,
        configFile: undefined,
        code: "(f)",
      });
    });
  });

  describe("Help and version", () => {
    it("should list every option", () => {
      const help = getHelpText();
      for (const flag of ["--eval", "--compile", "--quote", "--format", "--config", "--verbose"]) {
        expect(help).toContain(flag);
      }
    });

    it("should read the package version", () => {
      expect(getVersion()).toBe("lispen v0.1.0");
    });
  });
});

describe("runSource", () => {
  it("evaluates and shows the value", () => {
    expect(runSource("(+ 1 2)", "eval", DEFAULT_CONFIG)).toBe("3");
    expect(runSource('(str "a" "b")', "eval", DEFAULT_CONFIG)).toBe('"ab"');
  });

  it("compiles with the configured options", () => {
    expect(runSource("(+ 1 2)", "compile", DEFAULT_CONFIG)).toBe("1 + 2");
  });

  it("formats with the configured layout", () => {
    const cfg = mergeConfigs({ format: { maxInline: 4 } });
    expect(runSource("(a b c d)   (e)", "format", cfg)).toBe("(a b c d)\n(e)");
  });

  it("prints the reader output as JSON", () => {
    expect(JSON.parse(runSource(":k", "quote", DEFAULT_CONFIG))).toEqual([{ tag: "Keyword", name: "k" }]);
  });
});

describe("formatError", () => {
  it("includes the code of lispen errors", () => {
    expect(formatError(new ParseError("E0103", { token: "')'" }))).toBe(
      "ParseError E0103: Unexpected tokens remaining, starting at ')'"
    );
  });

  it("falls back to the error name", () => {
    expect(formatError(new TypeError("bad"))).toBe("TypeError: bad");
    expect(formatError("plain")).toBe("Error: plain");
  });
});

describe("openDepth", () => {
  it("counts unclosed brackets outside strings and comments", () => {
    expect(openDepth("(a [b")).toBe(2);
    expect(openDepth('(a ")"')).toBe(1);
    expect(openDepth("(a) ; (")).toBe(0);
    expect(openDepth('"\\"" (')).toBe(1);
  });
});

describe("ReplSession", () => {
  it("keeps definitions across inputs", () => {
    const session = new ReplSession(DEFAULT_CONFIG);
    expect(session.handle("(def x 2)")).toEqual({ output: "2" });
    expect(session.handle("(* x 10)")).toEqual({ output: "20" });
    expect(session.definitions).toEqual(["(def x 2)"]);
    expect(session.handle(":defs")).toEqual({ output: "(def x 2)" });
  });

  it("forgets definitions on :reset", () => {
    const session = new ReplSession(DEFAULT_CONFIG);
    session.handle("(def x 2)");
    expect(session.handle(":reset")).toEqual({ output: "definitions cleared" });
    expect(session.handle("x")).toEqual({ error: "ReferenceError: x is not defined" });
  });

  it("reports errors without keeping the failed input", () => {
    const session = new ReplSession(DEFAULT_CONFIG);
    expect(session.handle("(+ 1")).toEqual({ error: "ParseError E0100: Unclosed list - missing ')' at 1:1" });
    expect(session.definitions).toEqual([]);
  });

  it("shows front-end stages on request", () => {
    const session = new ReplSession(DEFAULT_CONFIG);
    expect(session.handle(":compile (+ 1 2)")).toEqual({ output: "1 + 2" });
    expect(session.handle(":format (a b c d)")).toEqual({ output: "(\n  a\n  b\n  c\n  d\n)" });
    expect(session.handle(":bogus")).toEqual({ error: "Unknown command: :bogus" });
  });

  it("writes printed output through its writer", () => {
    const out: string[] = [];
    const session = new ReplSession(DEFAULT_CONFIG, (t) => out.push(t));
    expect(session.handle('(println "x")')).toEqual({ output: "nil" });
    expect(out).toEqual(["x\n"]);
  });

  it("ignores blank lines and comments, and exits on :quit", () => {
    const session = new ReplSession(DEFAULT_CONFIG);
    expect(session.handle("   ")).toEqual({});
    expect(session.handle("; note")).toEqual({});
    expect(session.handle(":q")).toEqual({ exit: true });
  });
});
