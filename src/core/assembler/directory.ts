// src/core/assembler/directory.ts
// Compiles a tree of *.sodg files into one store, each file rooted at its package

import * as fs from "fs";
import * as path from "path";
import { Graph, type VertexId } from "../graph/graph";
import { ROOT, isValidAttribute } from "../graph/attrs";
import { invalidAttribute, ioError } from "../errors";
import { Assembler, type AssembleOptions } from "./assembler";

export const SOURCE_EXT = ".sodg";

/** Relative paths (forward slashes) of every source file under `dir`, sorted. */
export function listSources(dir: string): string[] {
  const out: string[] = [];
  const walk = (rel: string) => {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(path.join(dir, rel), { withFileTypes: true });
    } catch (e) {
      throw ioError(path.join(dir, rel), e);
    }
    for (const entry of entries) {
      const child = rel === "" ? entry.name : `${rel}/${entry.name}`;
      if (entry.isDirectory()) {
        walk(child);
      } else if (entry.isFile() && entry.name.endsWith(SOURCE_EXT)) {
        out.push(child);
      }
    }
  };
  walk("");
  return out.sort();
}

/**
 * Vertex reached from the root by `segments`, creating empty package
 * vertices on the way.
 */
export function packageVertex(graph: Graph, segments: string[]): VertexId {
  let at: VertexId = ROOT;
  for (const seg of segments) {
    if (!isValidAttribute(seg)) {
      throw invalidAttribute(seg);
    }
    const next = graph.attr(at, seg);
    if (next !== undefined) {
      at = next;
      continue;
    }
    const id = graph.nextId();
    graph.add(id);
    graph.bind(at, id, seg);
    at = id;
  }
  return at;
}

export function readSource(file: string): string {
  try {
    return fs.readFileSync(file, "utf8");
  } catch (e) {
    throw ioError(file, e);
  }
}

/** Assemble one source file into `graph`. */
export function assembleFile(file: string, graph: Graph = Graph.empty(), opts: AssembleOptions = {}): Graph {
  new Assembler(graph, opts).run(readSource(file));
  return graph;
}

/**
 * Assemble every `*.sodg` file under `dir` in path order. A file at
 * `a/b/foo.sodg` is rooted at the vertex of `Φ.a.b`. Returns the files
 * compiled, relative to `dir`.
 */
export function setupDirectory(dir: string, graph: Graph, opts: Omit<AssembleOptions, "root"> = {}): string[] {
  const files = listSources(dir);
  for (const rel of files) {
    const pkg = rel.split("/").slice(0, -1);
    const root = packageVertex(graph, pkg);
    opts.logger?.info({ file: rel, root }, "compiling");
    new Assembler(graph, { ...opts, root }).run(readSource(path.join(dir, rel)));
  }
  return files;
}
