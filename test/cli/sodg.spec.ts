// test/cli/sodg.spec.ts
// Tests for the sodg command: argument parsing and end-to-end runs

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import {
  buildConfig,
  getHelpText,
  getVersion,
  parseCliArgs,
  runCli,
  type CliEnv,
} from "../../bin/sodg-cli-lib";
import { isUpToDate } from "../../src/cli";
import { makeNoopLogger } from "../../src/core/log/logger";
import { loadGraph } from "../../src/core/codec/file";
import { inspect, toDot } from "../../src/core/graph/inspect";
import { BufferOutputPort } from "../../src/ports/output";
import { fixturePath, tmpDir, rmDir } from "../helpers/sodg";

type Harness = CliEnv & { stdout: string[]; stderr: string[]; port: BufferOutputPort };

function harness(cwd: string, vars: NodeJS.ProcessEnv = {}): Harness {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const port = new BufferOutputPort();
  return {
    stdout,
    stderr,
    port,
    out: (line) => stdout.push(line),
    err: (line) => stderr.push(line),
    output: port,
    cwd,
    env: vars,
    makeLogger: () => makeNoopLogger(),
  };
}

describe("sodg CLI", () => {
  describe("Command-line argument parsing", () => {
    it("should parse flags and positionals", () => {
      const parsed = parseCliArgs(["--verbose", "-f", "compile", "a.sodg", "a.bin"]);
      expect(parsed).toEqual({
        verbose: true,
        force: true,
        command: "compile",
        positionals: ["a.sodg", "a.bin"],
        unknown: [],
      });
    });

    it("should take values for --config and --dump", () => {
      const parsed = parseCliArgs(["-c", "cfg.json", "dataize", "--dump", "out.bin", "a.bin", "foo"]);
      expect(parsed.config).toBe("cfg.json");
      expect(parsed.dump).toBe("out.bin");
      expect(parsed.positionals).toEqual(["a.bin", "foo"]);
    });

    it("should collect unknown options", () => {
      expect(parseCliArgs(["--frob", "empty", "x"]).unknown).toEqual(["--frob"]);
    });
  });

  describe("Config building", () => {
    it("should build a dataize command", () => {
      const built = buildConfig(parseCliArgs(["--trace", "dataize", "a.bin", "foo"]));
      expect(built.tag).toBe("Done");
      if (built.tag !== "Done") return;
      expect(built.value).toEqual({
        command: { name: "dataize", binary: "a.bin", object: "foo", dump: undefined },
        logLevel: "trace",
      });
    });

    it("should default the inspect locator to Φ", () => {
      const built = buildConfig(parseCliArgs(["inspect", "a.bin"]));
      expect(built.tag === "Done" && built.value.command).toEqual({ name: "inspect", binary: "a.bin", locator: "Φ" });
    });

    it("should reject bad command lines", () => {
      const reasons = [
        [],
        ["frob"],
        ["dataize", "a.bin"],
        ["merge", "a.bin"],
        ["--nope", "empty", "a.bin"],
        ["-c"],
      ].map((argv) => {
        const built = buildConfig(parseCliArgs(argv));
        return built.tag === "Fail" ? built.failure.message : "ok";
      });
      expect(reasons).toEqual([
        "no command given, see --help",
        "unknown command 'frob'",
        "'dataize' expects <binary> <name>",
        "'merge' expects <target> <binary>...",
        "unknown option --nope",
        "--config needs a file",
      ]);
    });
  });

  describe("Help and version", () => {
    it("should describe the tool", () => {
      expect(getHelpText().startsWith("sodg - assemble, link and dataize object graphs")).toBe(true);
      expect(getVersion()).toBe("sodg v0.1.0");
    });

    it("should print help and exit 0", () => {
      const h = harness(process.cwd());
      expect(runCli(["--help"], h)).toBe(0);
      expect(h.stdout).toEqual([getHelpText()]);
    });
  });

  describe("Commands", () => {
    let dir: string;
    let h: Harness;
    const at = (name: string) => path.join(dir, name);

    beforeEach(() => {
      dir = tmpDir();
      h = harness(dir);
    });

    afterEach(() => rmDir(dir));

    it("should fail with usage status when no command is given", () => {
      expect(runCli([], h)).toBe(1);
      expect(h.stderr).toEqual(["E0001 error: Bad command line: no command given, see --help"]);
    });

    it("should compile and dataize", () => {
      expect(runCli(["compile", fixturePath("inc"), "inc.bin"], h)).toBe(0);
      expect(fs.existsSync(at("inc.bin"))).toBe(true);
      expect(runCli(["dataize", "inc.bin", "foo"], h)).toBe(0);
      expect(h.stdout).toEqual(["00-00-00-00-00-00-00-2A"]);
    });

    it("should compile a directory", () => {
      fs.mkdirSync(at("src/org"), { recursive: true });
      fs.writeFileSync(at("src/org/bar.sodg"), fs.readFileSync(fixturePath("bar")));
      expect(runCli(["compile", "src", "out/app.bin"], h)).toBe(0);
      expect(runCli(["dataize", "out/app.bin", "org.bar"], h)).toBe(0);
      expect(h.stdout).toEqual(["00-00-00-00-00-00-00-05"]);
    });

    it("should report an assembly failure with its line", () => {
      fs.writeFileSync(at("bad.sodg"), "ADD($a);\nBIND(0, $b, b);\n");
      expect(runCli(["compile", "bad.sodg", "bad.bin"], h)).toBe(2);
      expect(h.stderr).toEqual(["E0102 error (line 2): Failure at line 2 'BIND(0, $b, b);': Can't find $b"]);
      expect(fs.existsSync(at("bad.bin"))).toBe(false);
    });

    it("should report a missing source as an I/O failure", () => {
      expect(runCli(["compile", "absent.sodg", "x.bin"], h)).toBe(5);
      expect(h.stderr).toHaveLength(1);
      expect(h.stderr[0].startsWith("E0401 error: Can't access")).toBe(true);
    });

    it("should report a dataization failure", () => {
      runCli(["compile", fixturePath("inc"), "inc.bin"], h);
      expect(runCli(["dataize", "inc.bin", "nope"], h)).toBe(4);
      expect(h.stderr).toEqual(["E0301 error: Can't find .nope in ν0, among other 3 attributes: int, x, foo"]);
      expect(h.stdout).toEqual([]);
    });

    it("should send native output to the output port", () => {
      runCli(["compile", fixturePath("stdout"), "s.bin"], h);
      expect(runCli(["dataize", "s.bin", "hello"], h)).toBe(0);
      expect(h.port.text()).toBe("hi");
      expect(h.stdout).toEqual(["68-69"]);
    });

    it("should dump the graph even when dataization fails", () => {
      runCli(["compile", fixturePath("cycle"), "c.bin"], h);
      expect(runCli(["dataize", "--dump", "dump.bin", "c.bin", "x"], h)).toBe(4);
      expect(loadGraph(at("dump.bin")).size).toBe(4);
    });

    it("should merge binaries into a target", () => {
      expect(runCli(["empty", "app.bin"], h)).toBe(0);
      runCli(["compile", fixturePath("inc"), "inc.bin"], h);
      runCli(["compile", fixturePath("bar"), "bar.bin"], h);
      expect(runCli(["merge", "app.bin", "inc.bin", "bar.bin"], h)).toBe(0);
      expect(runCli(["dataize", "app.bin", "bar"], h)).toBe(0);
      expect(runCli(["dataize", "app.bin", "foo"], h)).toBe(0);
      expect(h.stdout).toEqual(["00-00-00-00-00-00-00-05", "00-00-00-00-00-00-00-2A"]);
    });

    it("should refuse a merge with colliding names", () => {
      runCli(["compile", fixturePath("bar"), "bar.bin"], h);
      runCli(["compile", fixturePath("bar"), "bar2.bin"], h);
      expect(runCli(["merge", "bar.bin", "bar2.bin"], h)).toBe(3);
      expect(h.stderr).toEqual(["E0201 error: Root-level name 'bar' is defined in both graphs"]);
    });

    it("should inspect and render", () => {
      runCli(["compile", fixturePath("inc"), "inc.bin"], h);
      const g = loadGraph(at("inc.bin"));
      expect(runCli(["inspect", "inc.bin", "Φ.x"], h)).toBe(0);
      expect(runCli(["dot", "inc.bin"], h)).toBe(0);
      expect(h.stdout).toEqual([inspect(g, "Φ.x"), toDot(g).trimEnd()]);
      expect(runCli(["dot", "inc.bin", "inc.dot"], h)).toBe(0);
      expect(fs.readFileSync(at("inc.dot"), "utf8")).toBe(toDot(g));
    });

    it("should take limits from the environment", () => {
      h = harness(dir, { SODG_MAX_DEPTH: "2" });
      runCli(["compile", fixturePath("chain"), "chain.bin"], h);
      expect(runCli(["dataize", "chain.bin", "a"], h)).toBe(4);
      expect(h.stderr).toEqual(["E0306 error: Dataization of ν2 is nested deeper than 2 levels"]);
    });

    it("should reject an invalid config file", () => {
      fs.writeFileSync(at("cfg.json"), JSON.stringify({ runtime: { maxDepth: 0 } }));
      expect(runCli(["-c", "cfg.json", "empty", "x.bin"], h)).toBe(1);
      expect(h.stderr).toEqual(["E0002 error: Bad configuration: maxDepth must be at least 1"]);
    });

    it("should reject a missing config file", () => {
      expect(runCli(["-c", "nope.json", "empty", "x.bin"], h)).toBe(1);
      expect(h.stderr).toEqual([`E0002 error: Bad configuration: Config file not found: ${at("nope.json")}`]);
    });
  });

  describe("Up-to-date check", () => {
    let dir: string;

    beforeEach(() => {
      dir = tmpDir();
    });

    afterEach(() => rmDir(dir));

    it("should compare modification times", () => {
      const src = path.join(dir, "a.sodg");
      const out = path.join(dir, "a.bin");
      fs.writeFileSync(src, "");
      expect(isUpToDate([src], out)).toBe(false);
      fs.writeFileSync(out, "");
      fs.utimesSync(src, new Date(1_000_000), new Date(1_000_000));
      fs.utimesSync(out, new Date(2_000_000), new Date(2_000_000));
      expect(isUpToDate([src], out)).toBe(true);
      fs.utimesSync(src, new Date(3_000_000), new Date(3_000_000));
      expect(isUpToDate([src], out)).toBe(false);
    });

    it("should skip compiling an up-to-date binary unless forced", () => {
      const src = path.join(dir, "a.sodg");
      const out = path.join(dir, "a.bin");
      fs.writeFileSync(src, "ADD($a); BIND(0, $a, a);");
      fs.writeFileSync(out, "stale");
      fs.utimesSync(src, new Date(1_000_000), new Date(1_000_000));
      fs.utimesSync(out, new Date(2_000_000), new Date(2_000_000));
      const h = harness(dir);
      expect(runCli(["compile", "a.sodg", "a.bin"], h)).toBe(0);
      expect(fs.readFileSync(out, "utf8")).toBe("stale");
      expect(runCli(["compile", "--force", "a.sodg", "a.bin"], h)).toBe(0);
      expect(loadGraph(out).attr(0, "a")).toBe(1);
    });
  });
});
