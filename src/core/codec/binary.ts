// src/core/codec/binary.ts
// Binary form of a Graph: header, vertices, edges, SHA-256 trailer

import { createHash } from "crypto";
import { Graph } from "../graph/graph";
import { ROOT } from "../graph/attrs";
import { corruptGraph, isSodgError } from "../errors";
import { bytesEqual, fromString, toUtf8 } from "../bytes/hex";

export const MAGIC = fromString("SODG");
export const VERSION = 1;
const DIGEST = 32;

// ─────────────────────────────────────────────────────────────────
// Writer / Reader
// ─────────────────────────────────────────────────────────────────

class Writer {
  private readonly chunks: Uint8Array[] = [];
  private length = 0;

  bytes(b: Uint8Array): void {
    this.chunks.push(b);
    this.length += b.length;
  }

  u8(n: number): void {
    this.bytes(Uint8Array.of(n));
  }

  u16(n: number): void {
    const b = new Uint8Array(2);
    new DataView(b.buffer).setUint16(0, n);
    this.bytes(b);
  }

  u32(n: number): void {
    const b = new Uint8Array(4);
    new DataView(b.buffer).setUint32(0, n);
    this.bytes(b);
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.length);
    let at = 0;
    for (const c of this.chunks) {
      out.set(c, at);
      at += c.length;
    }
    return out;
  }
}

class Reader {
  private pos = 0;
  private readonly view: DataView;

  constructor(private readonly buf: Uint8Array) {
    this.view = new DataView(buf.buffer, buf.byteOffset, buf.byteLength);
  }

  get remaining(): number {
    return this.buf.length - this.pos;
  }

  private need(n: number): void {
    if (this.remaining < n) {
      throw corruptGraph(`truncated at byte ${this.pos}, needed ${n} more`);
    }
  }

  bytes(n: number): Uint8Array {
    this.need(n);
    const out = this.buf.slice(this.pos, this.pos + n);
    this.pos += n;
    return out;
  }

  u8(): number {
    this.need(1);
    return this.view.getUint8(this.pos++);
  }

  u16(): number {
    this.need(2);
    const n = this.view.getUint16(this.pos);
    this.pos += 2;
    return n;
  }

  u32(): number {
    this.need(4);
    const n = this.view.getUint32(this.pos);
    this.pos += 4;
    return n;
  }
}

function sha256(b: Uint8Array): Uint8Array {
  return new Uint8Array(createHash("sha256").update(b).digest());
}

// ─────────────────────────────────────────────────────────────────
// Encode / decode
// ─────────────────────────────────────────────────────────────────

export function serialize(g: Graph): Uint8Array {
  const w = new Writer();
  w.bytes(MAGIC);
  w.u8(VERSION);

  const vertices = g.vertices();
  w.u32(vertices.length);
  for (const v of vertices) {
    w.u32(v);
    const data = g.data(v);
    if (data === undefined) {
      w.u8(0);
    } else {
      w.u8(1);
      w.u32(data.length);
      w.bytes(data);
    }
  }

  const edges = g.edges();
  w.u32(edges.length);
  for (const e of edges) {
    const name = fromString(e.name);
    w.u32(e.from);
    w.u32(e.to);
    w.u16(name.length);
    w.bytes(name);
  }

  const body = w.finish();
  const out = new Uint8Array(body.length + DIGEST);
  out.set(body, 0);
  out.set(sha256(body), body.length);
  return out;
}

/**
 * Rebuild a Graph through add/bind/put, so every store invariant is
 * checked again. Any defect is a CorruptGraph.
 */
export function deserialize(buf: Uint8Array): Graph {
  if (buf.length < MAGIC.length + 1 + DIGEST) {
    throw corruptGraph(`only ${buf.length} bytes`);
  }
  if (!bytesEqual(buf.subarray(0, MAGIC.length), MAGIC)) {
    throw corruptGraph("bad magic");
  }
  const body = buf.subarray(0, buf.length - DIGEST);
  if (!bytesEqual(sha256(body), buf.subarray(buf.length - DIGEST))) {
    throw corruptGraph("checksum mismatch");
  }

  const r = new Reader(body);
  r.bytes(MAGIC.length);
  const version = r.u8();
  if (version !== VERSION) {
    throw corruptGraph(`unsupported version ${version}`);
  }

  try {
    const g = Graph.empty();
    const vertexCount = r.u32();
    for (let i = 0; i < vertexCount; i++) {
      const id = r.u32();
      if (id !== ROOT) g.add(id);
      const hasData = r.u8();
      if (hasData === 1) {
        g.put(id, r.bytes(r.u32()));
      } else if (hasData !== 0) {
        throw corruptGraph(`bad payload flag ${hasData} on ν${id}`);
      }
    }
    const edgeCount = r.u32();
    for (let i = 0; i < edgeCount; i++) {
      const from = r.u32();
      const to = r.u32();
      const name = toUtf8(r.bytes(r.u16()));
      g.bind(from, to, name);
    }
    if (r.remaining !== 0) {
      throw corruptGraph(`${r.remaining} trailing bytes`);
    }
    return g;
  } catch (e) {
    if (isSodgError(e) && e.kind === "CorruptGraph") throw e;
    const reason = e instanceof Error ? e.message : String(e);
    throw corruptGraph(reason);
  }
}
