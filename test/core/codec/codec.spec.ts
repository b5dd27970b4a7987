// test/core/codec/codec.spec.ts
// Tests for the binary form and its file I/O

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { Graph } from "../../../src/core/graph/graph";
import { deserialize, serialize } from "../../../src/core/codec/binary";
import { loadGraph, saveGraph } from "../../../src/core/codec/file";
import { SodgError, type ErrorKind } from "../../../src/core/errors";
import { toHex } from "../../../src/core/bytes/hex";
import { assemble } from "../../../src/core/assembler/assembler";
import { program, tmpDir, rmDir } from "../../helpers/sodg";

function kindOf(fn: () => unknown): ErrorKind | undefined {
  try {
    fn();
  } catch (e) {
    if (e instanceof SodgError) return e.kind;
    throw e;
  }
  return undefined;
}

describe("binary form", () => {
  it("writes an empty graph as header, root and checksum", () => {
    const bytes = serialize(Graph.empty());
    expect(bytes.length).toBe(50);
    expect(toHex(bytes.subarray(0, 18))).toBe("53-4F-44-47-01-00-00-00-01-00-00-00-00-00-00-00-00-00");
  });

  it("reads back vertices, payloads and edges in order", () => {
    const g = program("inc");
    const back = deserialize(serialize(g));
    expect(back.vertices()).toEqual(g.vertices());
    expect(back.edges()).toEqual(g.edges());
    expect(back.data(5)).toEqual(g.data(5));
    expect(back.data(3)).toEqual(g.data(3));
    expect(back.data(1)).toBeUndefined();
  });

  it("keeps ids of sparse graphs, so fresh ids stay above them", () => {
    const g = Graph.empty();
    g.add(40);
    const back = deserialize(serialize(g));
    expect(back.nextId()).toBe(41);
  });

  it("keeps an empty payload apart from no payload", () => {
    const g = Graph.empty();
    g.put(0, new Uint8Array(0));
    expect(deserialize(serialize(g)).data(0)).toEqual(new Uint8Array(0));
  });

  it("keeps the largest storable id and refuses anything above it", () => {
    const g = Graph.empty();
    g.add(0xffffffff);
    g.bind(0, 0xffffffff, "top");
    expect(deserialize(serialize(g)).attr(0, "top")).toBe(0xffffffff);
    expect(kindOf(() => Graph.empty().add(0x100000000))).toBe("UnknownVertex");
    expect(kindOf(() => g.nextId())).toBe("UnknownVertex");
  });

  it("refuses vertex references too large for the binary form", () => {
    const src = "ADD(4294967296); BIND(0, 4294967296, big); PUT(4294967296, int/9);";
    expect(kindOf(() => assemble(src))).toBe("MalformedInstruction");
  });

  it("keeps the longest storable attribute name and refuses longer ones", () => {
    const g = Graph.empty();
    g.add(1);
    g.bind(0, 1, "a".repeat(0xffff));
    expect(deserialize(serialize(g)).attr(0, "a".repeat(0xffff))).toBe(1);
    expect(kindOf(() => g.bind(0, 1, "b".repeat(70000)))).toBe("InvalidAttribute");
    expect(kindOf(() => g.bind(0, 1, "ж".repeat(40000)))).toBe("InvalidAttribute");
  });

  it("rejects a flipped byte", () => {
    const bytes = serialize(program("bar"));
    bytes[10] ^= 0xff;
    expect(kindOf(() => deserialize(bytes))).toBe("CorruptGraph");
  });

  it("rejects a bad magic", () => {
    const bytes = serialize(Graph.empty());
    bytes[0] = 0x00;
    expect(() => deserialize(bytes)).toThrow("bad magic");
  });

  it("rejects truncated input", () => {
    const bytes = serialize(program("bar"));
    expect(() => deserialize(bytes.subarray(0, 60))).toThrow("checksum mismatch");
    expect(() => deserialize(bytes.subarray(0, 10))).toThrow("only 10 bytes");
  });
});

describe("graph files", () => {
  let dir: string;

  beforeEach(() => {
    dir = tmpDir();
  });

  afterEach(() => rmDir(dir));

  it("saves into missing directories and loads back", () => {
    const file = path.join(dir, "nested", "inc.sodg.bin");
    const written = saveGraph(file, program("inc"));
    expect(fs.statSync(file).size).toBe(written);
    expect(loadGraph(file).attr(0, "foo")).toBe(6);
  });

  it("reports a missing file as IOError", () => {
    expect(kindOf(() => loadGraph(path.join(dir, "absent.bin")))).toBe("IOError");
  });

  it("reports a garbage file as CorruptGraph", () => {
    const file = path.join(dir, "junk.bin");
    fs.writeFileSync(file, "this is not a graph at all, not even close to one!!");
    expect(kindOf(() => loadGraph(file))).toBe("CorruptGraph");
  });
});
