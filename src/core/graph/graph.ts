// src/core/graph/graph.ts
// Attributed graph store: a flat arena of vertices addressed by integer id

import { MAX_VERTEX_ID, ROOT, isValidAttribute } from "./attrs";
import {
  duplicateAttribute,
  duplicateVertex,
  invalidAttribute,
  unknownVertex,
  type SodgError,
} from "../errors";

export type VertexId = number;

/**
 * Evaluation status of one vertex in one context. Absent means Unvisited.
 * `cached` and `failed` are terminal.
 */
export type MemoState =
  | { state: "in-progress" }
  | { state: "cached"; value: Uint8Array }
  | { state: "failed"; error: SodgError };

export interface Vertex {
  readonly id: VertexId;
  data?: Uint8Array;
  /** Outgoing edges in bind order. */
  readonly edges: Map<string, VertexId>;
  /** Dataization results keyed by context; never persisted. */
  readonly memo: Map<string, MemoState>;
}

export type Edge = { from: VertexId; to: VertexId; name: string };

/**
 * Graph is the only owner of vertices and edges. Nothing is ever removed:
 * the only mutations are add, bind, put and memo writes.
 */
export class Graph {
  private readonly verts: Map<VertexId, Vertex> = new Map();
  private latest: VertexId = ROOT;

  /** A store holding nothing but the root vertex. */
  static empty(): Graph {
    const g = new Graph();
    g.add(ROOT);
    return g;
  }

  get size(): number {
    return this.verts.size;
  }

  get edgeCount(): number {
    let n = 0;
    for (const v of this.verts.values()) n += v.edges.size;
    return n;
  }

  has(v: VertexId): boolean {
    return this.verts.has(v);
  }

  /**
   * A fresh id above every id seen so far. Ids are never reused, even
   * when the vertex was added with an explicit id.
   */
  nextId(): VertexId {
    let id = this.latest + 1;
    while (this.verts.has(id)) id++;
    if (id > MAX_VERTEX_ID) {
      throw unknownVertex(id);
    }
    this.latest = id;
    return id;
  }

  add(v: VertexId): void {
    if (!Number.isInteger(v) || v < 0 || v > MAX_VERTEX_ID) {
      throw unknownVertex(v);
    }
    if (this.verts.has(v)) {
      throw duplicateVertex(v);
    }
    this.verts.set(v, { id: v, edges: new Map(), memo: new Map() });
    if (v > this.latest) this.latest = v;
  }

  bind(from: VertexId, to: VertexId, name: string): void {
    const src = this.vertex(from);
    this.vertex(to);
    if (!isValidAttribute(name)) {
      throw invalidAttribute(name);
    }
    const existing = src.edges.get(name);
    if (existing !== undefined) {
      throw duplicateAttribute(from, name, existing);
    }
    src.edges.set(name, to);
  }

  put(v: VertexId, bytes: Uint8Array): void {
    this.vertex(v).data = Uint8Array.from(bytes);
  }

  attr(from: VertexId, name: string): VertexId | undefined {
    return this.verts.get(from)?.edges.get(name);
  }

  data(v: VertexId): Uint8Array | undefined {
    return this.verts.get(v)?.data;
  }

  /** Outgoing edges of `v` as `[name, to]` pairs, in bind order. */
  kids(v: VertexId): Array<[string, VertexId]> {
    return Array.from(this.vertex(v).edges.entries());
  }

  /** All vertex ids, ascending. */
  vertices(): VertexId[] {
    return Array.from(this.verts.keys()).sort((a, b) => a - b);
  }

  edges(): Edge[] {
    const out: Edge[] = [];
    for (const v of this.vertices()) {
      for (const [name, to] of this.vertex(v).edges) {
        out.push({ from: v, to, name });
      }
    }
    return out;
  }

  memoGet(v: VertexId, key: string): MemoState | undefined {
    return this.vertex(v).memo.get(key);
  }

  memoSet(v: VertexId, key: string, state: MemoState): void {
    this.vertex(v).memo.set(key, state);
  }

  memoClear(v: VertexId, key: string): void {
    this.vertex(v).memo.delete(key);
  }

  private vertex(v: VertexId): Vertex {
    const vtx = this.verts.get(v);
    if (!vtx) {
      throw unknownVertex(v);
    }
    return vtx;
  }
}
