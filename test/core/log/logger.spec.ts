// test/core/log/logger.spec.ts
// Tests for logger construction and what the core logs

import { describe, it, expect } from "vitest";
import * as fs from "fs";
import * as path from "path";
import pino from "pino";
import { LOG_LEVELS, isLogLevel, makeLogger, makeNoopLogger } from "../../../src/core/log/logger";
import { Dataizer } from "../../../src/core/dataize/dataizer";
import { setupDirectory } from "../../../src/core/assembler/directory";
import { Graph } from "../../../src/core/graph/graph";
import { program, tmpDir, rmDir } from "../../helpers/sodg";

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** A pino logger whose JSON lines land in `lines`. */
function capture(level: pino.LevelWithSilent): { logger: pino.Logger; lines: Array<Record<string, unknown>> } {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino({ level }, {
    write(msg: string) {
      const parsed: unknown = JSON.parse(msg);
      if (isRecord(parsed)) lines.push(parsed);
    },
  });
  return { logger, lines };
}

describe("logger", () => {
  it("knows the pino levels", () => {
    expect(LOG_LEVELS).toContain("trace");
    expect(isLogLevel("info")).toBe(true);
    expect(isLogLevel("loud")).toBe(false);
  });

  it("creates a logger at the requested level", () => {
    expect(makeLogger("debug").level).toBe("debug");
    expect(makeLogger().level).toBe("warn");
  });

  it("creates a silent logger", () => {
    const logger = makeNoopLogger();
    expect(() => logger.error("nothing to see")).not.toThrow();
  });
});

describe("core logging", () => {
  it("traces every dataization step", () => {
    const { logger, lines } = capture("trace");
    new Dataizer(program("inc"), { logger }).dataize("foo");
    const msgs = lines.map((l) => l.msg);
    expect(msgs).toContain("dataize");
    expect(msgs).toContain("native call");
    const call = lines.find((l) => l.msg === "native call");
    expect(call?.native).toBe("inc");
    expect(call?.args).toEqual(["00-00-00-00-00-00-00-29"]);
  });

  it("logs nothing at warn while dataizing", () => {
    const { logger, lines } = capture("warn");
    new Dataizer(program("inc"), { logger }).dataize("foo");
    expect(lines).toEqual([]);
  });

  it("logs each compiled file at info", () => {
    const dir = tmpDir();
    try {
      fs.writeFileSync(path.join(dir, "a.sodg"), "ADD($a); BIND(0, $a, a);");
      const { logger, lines } = capture("info");
      setupDirectory(dir, Graph.empty(), { logger });
      expect(lines.map((l) => [l.msg, l.file])).toEqual([["compiling", "a.sodg"]]);
    } finally {
      rmDir(dir);
    }
  });
});
