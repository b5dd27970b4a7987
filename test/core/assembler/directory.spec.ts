// test/core/assembler/directory.spec.ts
// Tests for compiling a tree of source files into one graph

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { Graph } from "../../../src/core/graph/graph";
import { assembleFile, listSources, packageVertex, setupDirectory } from "../../../src/core/assembler/directory";
import { SodgError } from "../../../src/core/errors";
import { toHex } from "../../../src/core/bytes/hex";
import { fixturePath, tmpDir, rmDir } from "../../helpers/sodg";

describe("directory assembly", () => {
  let dir: string;

  beforeEach(() => {
    dir = tmpDir();
    fs.mkdirSync(path.join(dir, "org", "eolang"), { recursive: true });
    fs.writeFileSync(path.join(dir, "main.sodg"), "ADD($m); BIND(0, $m, main);\nADD($l); BIND($m, $l, l);\n");
    fs.writeFileSync(path.join(dir, "org", "b.sodg"), "ADD($b); BIND(0, $b, b);\n");
    fs.writeFileSync(path.join(dir, "org", "eolang", "x.sodg"), "ADD($a); BIND(0, $a, answer); PUT($a, int/42);\n");
    fs.writeFileSync(path.join(dir, "org", "README.md"), "not a source\n");
  });

  afterEach(() => rmDir(dir));

  it("lists sources recursively in path order", () => {
    expect(listSources(dir)).toEqual(["main.sodg", "org/b.sodg", "org/eolang/x.sodg"]);
  });

  it("roots each file at its package vertex", () => {
    const g = Graph.empty();
    const files = setupDirectory(dir, g);
    expect(files).toHaveLength(3);
    expect(g.attr(0, "main")).toBe(1);
    expect(g.attr(1, "l")).toBe(2);
    expect(g.attr(0, "org")).toBe(3);
    expect(g.attr(3, "b")).toBe(4);
    expect(g.attr(3, "eolang")).toBe(5);
    expect(g.attr(5, "answer")).toBe(6);
    expect(toHex(g.data(6) ?? new Uint8Array(0))).toBe("00-00-00-00-00-00-00-2A");
  });

  it("reuses package vertices that already exist", () => {
    const g = Graph.empty();
    const org = packageVertex(g, ["org"]);
    expect(packageVertex(g, ["org"])).toBe(org);
    expect(packageVertex(g, [])).toBe(0);
  });

  it("rejects a package segment that isn't an attribute name", () => {
    expect(() => packageVertex(Graph.empty(), ["my pkg"])).toThrow(SodgError);
  });

  it("reports a missing directory as an I/O failure", () => {
    try {
      listSources(path.join(dir, "absent"));
      expect.unreachable();
    } catch (e) {
      expect(e instanceof SodgError && e.kind).toBe("IOError");
    }
  });

  it("assembles a single file", () => {
    const g = assembleFile(fixturePath("bar"));
    expect(g.attr(0, "bar")).toBe(1);
  });
});
