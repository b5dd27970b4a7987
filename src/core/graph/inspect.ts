// src/core/graph/inspect.ts
// Static views of a graph: tree listing, Graphviz, slices, consistency checks.
// Nothing here dataizes; locators are walked along plain edges.

import { Graph, type VertexId } from "./graph";
import { BETA, DELTA, EPSILON, LAMBDA, PHI, PI, Q, RHO, ROOT } from "./attrs";
import { attributeNotFound } from "../errors";
import { toHex, toUtf8 } from "../bytes/hex";

/** Follow a locator along edges only: `Φ`/`Q`, `νN`, `ρ` and names. */
export function locate(g: Graph, locator: string): VertexId {
  let v: VertexId = ROOT;
  for (const seg of locator.trim().split(".")) {
    if (seg === PHI || seg === Q) { v = ROOT; continue; }
    if (seg === DELTA) continue;
    const m = /^ν(\d+)$/.exec(seg);
    if (m) {
      const id = Number(m[1]);
      if (!g.has(id)) throw attributeNotFound(v, seg);
      v = id;
      continue;
    }
    const to = g.attr(v, seg);
    if (to === undefined) {
      throw attributeNotFound(v, seg, g.kids(v).map(([name]) => name));
    }
    v = to;
  }
  return v;
}

function nativeName(g: Graph, v: VertexId): string | undefined {
  const lambda = g.attr(v, LAMBDA);
  if (lambda === undefined) return undefined;
  const data = g.data(lambda);
  if (data === undefined) return "?";
  try {
    return toUtf8(data);
  } catch {
    return toHex(data);
  }
}

/**
 * Tree of everything reachable from `locator`, one edge per line:
 *
 *     Φ.foo
 *       .x ➞ ν3 Δ00-00-00-00-00-00-00-2A
 *       .inc ➞ ν4 λinc
 *
 * `ρ` edges are listed but not descended into; each vertex is expanded once.
 */
export function inspect(g: Graph, locator: string = PHI): string {
  const start = locate(g, locator);
  const seen = new Set<VertexId>([start]);
  const walk = (v: VertexId): string[] => {
    const lines: string[] = [];
    for (const [name, to] of g.kids(v)) {
      let line = `  .${name} ➞ ν${to}`;
      const lambda = nativeName(g, to);
      if (lambda !== undefined) line += ` λ${lambda}`;
      const data = g.data(to);
      if (data !== undefined) line += ` Δ${toHex(data)}`;
      lines.push(line);
      if (!seen.has(to) && name !== RHO) {
        seen.add(to);
        for (const sub of walk(to)) lines.push(`  ${sub}`);
      }
    }
    return lines;
  };
  return [locator, ...walk(start)].join("\n");
}

function dotEscape(s: string): string {
  return s.replace(/\\/g, "\\\\").replace(/"/g, "\\\"");
}

/** Graphviz rendering of the whole graph. */
export function toDot(g: Graph): string {
  const lines: string[] = [
    "digraph {",
    "  node [fixedsize=true,width=1,fontname=\"Arial\"];",
    "  edge [fontname=\"Arial\"];",
  ];
  for (const v of g.vertices()) {
    let label = `ν${v}`;
    const data = g.data(v);
    if (data !== undefined) label += `\\n${toHex(data)}`;
    const shape = v === ROOT ? "doublecircle" : "circle";
    lines.push(`  v${v} [shape=${shape},label="${label}"];`);
  }
  for (const e of g.edges()) {
    const style = e.name === RHO ? ",style=dashed" : "";
    lines.push(`  v${e.from} -> v${e.to} [label="${dotEscape(e.name)}"${style}];`);
  }
  lines.push("}");
  return lines.join("\n") + "\n";
}

/**
 * A new graph with the vertices reachable from `locator` (not through
 * `ρ`), keeping their ids, payloads and the edges among them.
 */
export function slice(g: Graph, locator: string): Graph {
  const start = locate(g, locator);
  const keep = new Set<VertexId>([ROOT, start]);
  const todo: VertexId[] = [start];
  for (let v = todo.pop(); v !== undefined; v = todo.pop()) {
    for (const [name, to] of g.kids(v)) {
      if (name === RHO || keep.has(to)) continue;
      keep.add(to);
      todo.push(to);
    }
  }

  const out = Graph.empty();
  for (const v of g.vertices()) {
    if (!keep.has(v)) continue;
    if (v !== ROOT) out.add(v);
    const data = g.data(v);
    if (data !== undefined) out.put(v, data);
  }
  for (const e of g.edges()) {
    if (keep.has(e.from) && keep.has(e.to)) out.bind(e.from, e.to, e.name);
  }
  return out;
}

/**
 * Structural problems the store itself can't rule out: an atom that is
 * also a copy, a vertex with both π and ε, λ or β targets without payload.
 */
export function inconsistencies(g: Graph): string[] {
  const errors: string[] = [];
  for (const v of g.vertices()) {
    const lambda = g.attr(v, LAMBDA);
    const pi = g.attr(v, PI);
    const eps = g.attr(v, EPSILON);
    const beta = g.attr(v, BETA);
    if (lambda !== undefined && (pi !== undefined || eps !== undefined)) {
      errors.push(`ν${v} already has λ, can't have π or ε`);
    }
    if (pi !== undefined && eps !== undefined) {
      errors.push(`ν${v} can't have both π and ε`);
    }
    if (lambda !== undefined && g.data(lambda) === undefined) {
      errors.push(`ν${v}.λ arrives to ν${lambda}, which has no native name`);
    }
    if (beta !== undefined && g.data(beta) === undefined) {
      errors.push(`ν${v}.β arrives to ν${beta}, which has no locator`);
    }
  }
  return errors;
}
