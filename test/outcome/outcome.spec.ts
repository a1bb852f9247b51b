import { describe, it, expect } from "vitest";
import type { Span } from "../../src/outcome/diagnostic";
import { isDone, isFail } from "../../src/outcome/outcome";
import { failure, isFailureReason } from "../../src/outcome/failure";
import { errorDiag, warnDiag, formatSpan } from "../../src/outcome/diagnostic";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import { done, fail, ok } from "../../src/outcome/constructors";
import { mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/matchers";
import { LexError } from "../../src/core/errors";

const sampleSpan: Span = {
  file: "test.lisp",
  startLine: 1,
  startCol: 4,
};

describe("Outcome ADT", () => {
  it("constructs Done outcomes with metadata", () => {
    const outcome = done("value", { durationMs: 12 });
    expect(outcome.tag).toBe("Done");
    expect(outcome.value).toBe("value");
    expect(outcome.meta).toEqual({ durationMs: 12 });
    expect(ok(1)).toEqual(done(1));
  });

  it("constructs Fail outcomes with failures", () => {
    const diag = errorDiag("E0001", "err");
    const failureObj = failure("lex-error", "bad input", { diagnostics: [diag] });
    const outcome = fail(failureObj, { durationMs: 5 });
    expect(outcome.tag).toBe("Fail");
    expect(outcome.failure).toBe(failureObj);
    expect(outcome.failure.diagnostics).toEqual([diag]);
    expect(outcome.meta.durationMs).toBe(5);
  });

  it("narrows with the type guards", () => {
    const o = done(3);
    expect(isDone(o)).toBe(true);
    expect(isFail(o)).toBe(false);
    expect(isFailureReason(failure("parse-error", "x"), "parse-error")).toBe(true);
  });
});

describe("matchers", () => {
  const good = done(2);
  const bad = fail(failure("runtime-error", "boom"));

  it("folds both branches", () => {
    const show = (o: typeof good | typeof bad) =>
      match(o, { done: (d) => `done ${d.value}`, fail: (f) => `fail ${f.failure.message}` });
    expect(show(good)).toBe("done 2");
    expect(show(bad)).toBe("fail boom");
  });

  it("maps only Done values", () => {
    expect(mapOutcome(good, (n) => n * 10)).toEqual(done(20));
    expect(mapOutcome(bad, (n: number) => n * 10)).toBe(bad);
  });

  it("unwraps or falls back", () => {
    expect(unwrap(good)).toBe(2);
    expect(unwrapOr(bad, 0)).toBe(0);
    expect(() => unwrap(bad)).toThrow("boom");
  });

  it("rethrows the original error on unwrap", () => {
    const cause = new LexError("E0002", {});
    const o = fail(failure("lex-error", cause.message, { cause }));
    expect(() => unwrap(o)).toThrow(cause);
  });
});

describe("diagnostics", () => {
  it("fills message templates", () => {
    const d = makeDiagnostic("E0001", { char: "#" }, sampleSpan);
    expect(d).toEqual({
      code: "E0001",
      severity: "error",
      message: "Unsupported character '#'",
      span: sampleSpan,
      data: { char: "#" },
    });
  });

  it("keeps codes and keys aligned", () => {
    for (const [key, def] of Object.entries(DIAGNOSTIC_CODES)) expect(def.code).toBe(key);
  });

  it("formats spans", () => {
    expect(formatSpan(sampleSpan)).toBe("test.lisp:1:4");
    expect(formatSpan({ startLine: 2, startCol: 1 })).toBe("2:1");
    expect(formatSpan(undefined)).toBe("");
  });

  it("builds warnings", () => {
    expect(warnDiag("W1", "careful").severity).toBe("warning");
  });
});
