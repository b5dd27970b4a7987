// src/core/merge/merge.ts
// Folds one store into another, renumbering every non-root vertex

import type { Logger } from "pino";
import { Graph, type VertexId } from "../graph/graph";
import { ROOT, DELTA } from "../graph/attrs";
import { nameCollision } from "../errors";

/**
 * Merge `incoming` into `base` and return `base`. Root-level names are
 * joined by name; the same name on both roots is a NameCollision, and so
 * is a payload on both roots. Collisions are found before anything is
 * written, so a failed merge leaves `base` as it was.
 */
export function merge(base: Graph, incoming: Graph, logger?: Logger): Graph {
  for (const [name] of incoming.kids(ROOT)) {
    if (base.attr(ROOT, name) !== undefined) {
      throw nameCollision(name);
    }
  }
  const rootData = incoming.data(ROOT);
  if (rootData !== undefined && base.data(ROOT) !== undefined) {
    throw nameCollision(DELTA);
  }

  const remap = new Map<VertexId, VertexId>([[ROOT, ROOT]]);
  for (const v of incoming.vertices()) {
    if (v === ROOT) continue;
    const id = base.nextId();
    base.add(id);
    remap.set(v, id);
  }
  const target = (v: VertexId): VertexId => remap.get(v) ?? ROOT;

  for (const v of incoming.vertices()) {
    const data = incoming.data(v);
    if (data !== undefined) {
      base.put(target(v), data);
    }
  }
  for (const e of incoming.edges()) {
    base.bind(target(e.from), target(e.to), e.name);
  }

  logger?.debug({ vertices: remap.size - 1, edges: incoming.edgeCount }, "merged graph");
  return base;
}

/** Fold `graphs` left to right into a fresh empty store. */
export function mergeAll(graphs: Iterable<Graph>, logger?: Logger): Graph {
  let acc = Graph.empty();
  for (const g of graphs) {
    acc = merge(acc, g, logger);
  }
  return acc;
}
