// test/outcome/outcome.spec.ts
import { describe, it, expect } from "vitest";
import { isDone, isFail, type Outcome } from "../../src/outcome/outcome";
import { allDiagnostics, failure, wrapFailure } from "../../src/outcome/failure";
import { errorDiag, formatDiagnostic, warnDiag } from "../../src/outcome/diagnostic";
import { DIAGNOSTIC_CODES, makeDiagnostic } from "../../src/outcome/codes";
import { attempt, configError, done, err, fail, fromError, ok, usageError } from "../../src/outcome/constructors";
import { flatMapOutcome, mapOutcome, match, unwrap, unwrapOr } from "../../src/outcome/matchers";
import { attributeNotFound, atLine, malformed } from "../../src/core/errors";

describe("Outcome", () => {
  it("constructs done and fail", () => {
    const d = done(42);
    expect(isDone(d)).toBe(true);
    expect(ok).toBe(done);

    const f = err("io", "gone");
    expect(isFail(f)).toBe(true);
    expect(f.failure).toEqual({ reason: "io", message: "gone", diagnostics: [], context: undefined, cause: undefined });
  });

  it("maps and chains", () => {
    expect(unwrap(mapOutcome(done(2), (n) => n * 21))).toBe(42);
    expect(unwrap(flatMapOutcome(done(2), (n) => done(n + 1)))).toBe(3);
    const f = err("merge", "nope");
    expect(mapOutcome(f, (n: number) => n + 1)).toBe(f);
    expect(unwrapOr(f, 7)).toBe(7);
    expect(() => unwrap(f)).toThrow("nope");
  });

  it("matches on the tag", () => {
    const show = (o: Outcome<number>) =>
      match(o, { done: (d) => `done ${d.value}`, fail: (f) => `fail ${f.failure.reason}` });
    expect(show(done(1))).toBe("done 1");
    expect(show(fail(failure("usage", "x")))).toBe("fail usage");
  });
});

describe("diagnostics", () => {
  it("fills templates", () => {
    expect(makeDiagnostic("E0001", { detail: "no command" })).toEqual({
      code: "E0001",
      severity: "error",
      message: "Bad command line: no command",
      line: undefined,
      data: { detail: "no command" },
    });
    expect(() => makeDiagnostic("E9999")).toThrow("Unknown diagnostic code: E9999");
  });

  it("has a code for every core error kind", () => {
    expect(DIAGNOSTIC_CODES.E0301.category).toBe("dataization");
    expect(DIAGNOSTIC_CODES.E0402.template).toBe("Corrupt graph binary");
  });

  it("formats with and without a line", () => {
    expect(formatDiagnostic(errorDiag("E0301", "Can't find .x in ν3"))).toBe("E0301 error: Can't find .x in ν3");
    expect(formatDiagnostic(warnDiag("W0002", "odd", { line: 4 }))).toBe("W0002 warning (line 4): odd");
  });

  it("collects diagnostics along the cause chain once", () => {
    const d = errorDiag("E0003", "inner");
    const inner = failure("internal-error", "inner", { diagnostics: [d] });
    const outer = wrapFailure(inner, "outer", { step: 2 });
    expect(outer.context).toEqual({ step: 2 });
    expect(allDiagnostics(outer)).toEqual([d]);
  });
});

describe("fromError", () => {
  it("keeps the family and code of core errors", () => {
    const f = fromError(attributeNotFound(3, "x"));
    expect(f.failure.reason).toBe("dataization");
    expect(allDiagnostics(f.failure).map(formatDiagnostic)).toEqual([
      "E0301 error: Can't find .x in ν3, it has no attributes",
    ]);
  });

  it("carries the line of assembly errors", () => {
    const f = fromError(atLine(malformed("bad"), 4, "ADD(x);"));
    expect(f.meta.line).toBe(4);
    expect(formatDiagnostic(allDiagnostics(f.failure)[0])).toBe(
      "E0105 error (line 4): Failure at line 4 'ADD(x);': bad"
    );
  });

  it("treats anything else as internal", () => {
    const f = fromError(new TypeError("boom"));
    expect(f.failure.reason).toBe("internal-error");
    expect(f.failure.diagnostics[0].message).toBe("Unexpected failure: boom");
  });

  it("is what attempt returns on a throw", () => {
    expect(attempt(() => 1)).toEqual(done(1));
    expect(attempt(() => { throw malformed("x"); }).tag).toBe("Fail");
  });

  it("builds usage and config failures", () => {
    expect(usageError("what").failure.reason).toBe("usage");
    expect(configError("bad").failure.diagnostics[0].message).toBe("Bad configuration: bad");
  });
});
