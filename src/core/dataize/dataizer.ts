// src/core/dataize/dataizer.ts
// Reduces a vertex, seen in a frame, to bytes

import type { Logger } from "pino";
import type { Graph, VertexId } from "../graph/graph";
import { BETA, DELTA, EPSILON, LAMBDA, PHI, PI, RHO, ROOT, SYSTEM_ATTRS, XI, isAlpha } from "../graph/attrs";
import {
  attributeNotFound,
  cyclicDataization,
  depthExceeded,
  isSodgError,
  nativeFailure,
  unknownNative,
} from "../errors";
import { toHex, toUtf8 } from "../bytes/hex";
import { DEFAULT_RUNTIME_CONFIG, type RuntimeConfig } from "../config/config";
import { makeNoopLogger } from "../log/logger";
import { NativeRegistry } from "../natives/registry";
import { defaultNatives } from "../natives/builtins";
import type { NativeIO } from "../natives/types";
import { BufferOutputPort, type OutputPort } from "../../ports/output";
import { frameKey, protoChain, type Frame } from "./frame";
import { parseLocator } from "./locator";

export interface DataizerOptions {
  registry?: NativeRegistry;
  output?: OutputPort;
  /**
   * Limits of this run. Hitting one is not recorded in the graph's memo,
   * so a later run with higher limits starts over.
   */
  runtime?: Partial<RuntimeConfig>;
  logger?: Logger;
}

export class Dataizer {
  private readonly registry: NativeRegistry;
  private readonly io: NativeIO;
  private readonly maxDepth: number;
  private readonly maxJumps: number;
  private readonly log: Logger;

  /** Frames built so far, by key. */
  private readonly frames: Map<string, Frame> = new Map();
  /** Frames whose prototype is being resolved. */
  private readonly building: Set<string> = new Set();
  /** Frames whose β locator is being followed. */
  private readonly resolving: Set<string> = new Set();
  private depth = 0;

  readonly root: Frame;

  constructor(private readonly graph: Graph, opts: DataizerOptions = {}) {
    this.registry = opts.registry ?? NativeRegistry.of(defaultNatives());
    this.io = { output: opts.output ?? new BufferOutputPort() };
    this.maxDepth = opts.runtime?.maxDepth ?? DEFAULT_RUNTIME_CONFIG.maxDepth;
    this.maxJumps = opts.runtime?.maxLocatorJumps ?? DEFAULT_RUNTIME_CONFIG.maxLocatorJumps;
    this.log = opts.logger ?? makeNoopLogger();
    this.root = this.enter(ROOT, undefined);
  }

  // ─────────────────────────────────────────────────────────────────
  // Entry points
  // ─────────────────────────────────────────────────────────────────

  /** Dataize a root-level object, e.g. `foo` or `org.foo`. */
  dataize(name: string): Uint8Array {
    return this.dataizeLocator(`${PHI}.${name}`);
  }

  /** Results are copies; the graph keeps its own payloads and memo values. */
  dataizeLocator(locator: string): Uint8Array {
    return Uint8Array.from(this.dataizeFrame(this.resolve(locator, this.root)));
  }

  dataizeVertex(v: VertexId): Uint8Array {
    if (!this.graph.has(v)) {
      throw attributeNotFound(ROOT, `ν${v}`);
    }
    return Uint8Array.from(this.dataizeFrame(this.enter(v, undefined)));
  }

  /** Vertex a locator ends at, after following locator vertices. */
  find(locator: string): VertexId {
    return this.deref(this.resolve(locator, this.root)).vertex;
  }

  // ─────────────────────────────────────────────────────────────────
  // Dataization
  // ─────────────────────────────────────────────────────────────────

  private dataizeFrame(f: Frame): Uint8Array {
    const memo = this.graph.memoGet(f.vertex, f.key);
    if (memo?.state === "cached") return memo.value;
    if (memo?.state === "failed") throw memo.error;
    if (memo?.state === "in-progress") throw cyclicDataization(f.vertex);

    return this.nested(f.vertex, () => {
      this.log.trace({ vertex: f.vertex, key: f.key }, "dataize");
      this.graph.memoSet(f.vertex, f.key, { state: "in-progress" });
      try {
        const value = this.compute(f);
        this.graph.memoSet(f.vertex, f.key, { state: "cached", value });
        this.log.trace({ vertex: f.vertex, key: f.key, value: toHex(value) }, "dataized");
        return value;
      } catch (e) {
        if (isSodgError(e) && e.kind !== "DepthExceeded") {
          this.graph.memoSet(f.vertex, f.key, { state: "failed", error: e });
        } else {
          this.graph.memoClear(f.vertex, f.key);
        }
        throw e;
      }
    });
  }

  /**
   * Walk the frame and its prototypes, nearest first: a payload or a Δ
   * gives the literal, a λ runs the native with its parameters resolved
   * on `f` (the copy), a β is followed.
   */
  private compute(f: Frame): Uint8Array {
    for (const p of protoChain(f)) {
      const v = p.vertex;
      const data = this.graph.data(v);
      if (data !== undefined) return data;

      const delta = this.graph.attr(v, DELTA);
      if (delta !== undefined) {
        const literal = this.graph.data(delta);
        if (literal !== undefined) return literal;
        return this.dataizeFrame(this.enter(delta, f));
      }

      const lambda = this.graph.attr(v, LAMBDA);
      if (lambda !== undefined) {
        return this.callNative(f, lambda);
      }

      if (this.graph.attr(v, BETA) !== undefined) {
        return this.dataizeFrame(this.deref(p));
      }
    }
    throw attributeNotFound(f.vertex, DELTA, this.names(f.vertex));
  }

  private callNative(f: Frame, lambda: VertexId): Uint8Array {
    const name = this.text(lambda);
    const desc = this.registry.get(name);
    if (!desc) {
      throw unknownNative(name, f.vertex);
    }
    const args = desc.signature.params.map((p) => this.dataizeFrame(this.resolve(p.locator, f)));
    this.log.trace({ native: name, vertex: f.vertex, args: args.map(toHex) }, "native call");
    try {
      return desc.fn(args, this.io);
    } catch (e) {
      if (isSodgError(e)) throw e;
      throw nativeFailure(name, e instanceof Error ? e.message : String(e));
    }
  }

  // ─────────────────────────────────────────────────────────────────
  // Frames
  // ─────────────────────────────────────────────────────────────────

  /** Frame of `v` reached from `reach`. */
  private enter(v: VertexId, reach: Frame | undefined): Frame {
    const key = frameKey(v, reach);
    const known = this.frames.get(key);
    if (known) return known;
    if (this.building.has(key)) {
      throw cyclicDataization(v);
    }

    this.building.add(key);
    try {
      const target = this.graph.attr(v, PI) ?? this.graph.attr(v, EPSILON);
      let frame: Frame;
      if (target === undefined) {
        frame = { vertex: v, reach, rho: reach, key };
      } else {
        const proto = this.nested(v, () => this.deref(this.enter(target, reach)));
        frame = { vertex: v, reach, rho: proto.rho, proto, key };
      }
      this.frames.set(key, frame);
      return frame;
    } finally {
      this.building.delete(key);
    }
  }

  /** Follow β edges until a frame that is not a locator. */
  private deref(f: Frame): Frame {
    if (this.graph.attr(f.vertex, BETA) === undefined) return f;

    const seen: string[] = [];
    try {
      let cur = f;
      for (let jumps = 0; ; jumps++) {
        const beta = this.graph.attr(cur.vertex, BETA);
        if (beta === undefined) return cur;
        if (jumps >= this.maxJumps) {
          throw depthExceeded(this.maxJumps, f.vertex);
        }
        if (this.resolving.has(cur.key)) {
          throw cyclicDataization(cur.vertex);
        }
        this.resolving.add(cur.key);
        seen.push(cur.key);
        const from = cur;
        cur = this.nested(from.vertex, () => this.resolve(this.text(beta), from));
      }
    } finally {
      for (const k of seen) this.resolving.delete(k);
    }
  }

  /** Walk a locator starting at `start`. */
  private resolve(locator: string, start: Frame): Frame {
    let cur = start;
    for (const seg of parseLocator(locator)) {
      switch (seg.tag) {
        case "Root":
          cur = this.root;
          break;
        case "Self":
          break;
        case "Vertex":
          if (!this.graph.has(seg.id)) {
            throw attributeNotFound(cur.vertex, `ν${seg.id}`);
          }
          cur = this.enter(seg.id, undefined);
          break;
        case "Rho":
        case "Attr": {
          const name = seg.tag === "Rho" ? RHO : seg.name;
          const next = this.lookup(cur, name);
          if (!next) {
            const at = this.deref(cur);
            throw attributeNotFound(at.vertex, name, this.names(at.vertex));
          }
          cur = next;
          break;
        }
      }
    }
    return cur;
  }

  /**
   * `ξ` is the frame, `ρ` its receiver. Other names are looked up on the
   * vertex, then along the prototypes (the child is reached from the
   * copy), then, for plain names, on the receiver chain.
   */
  private lookup(from: Frame, name: string): Frame | undefined {
    const f = this.deref(from);
    if (name === XI) return f;
    if (name === RHO) {
      if (f.rho) return f.rho;
      const parent = this.graph.attr(f.vertex, RHO);
      return parent === undefined ? undefined : this.enter(parent, undefined);
    }

    const climb = !isAlpha(name) && !SYSTEM_ATTRS.has(name);
    let hops = 0;
    for (let cur: Frame | undefined = f; cur !== undefined; ) {
      for (const p of protoChain(cur)) {
        const to = this.graph.attr(p.vertex, name);
        if (to !== undefined) return this.enter(to, cur);
      }
      if (!climb || cur.rho === undefined) return undefined;
      if (++hops > this.maxDepth) {
        throw depthExceeded(this.maxDepth, f.vertex);
      }
      cur = this.deref(cur.rho);
    }
    return undefined;
  }

  // ─────────────────────────────────────────────────────────────────
  // Helpers
  // ─────────────────────────────────────────────────────────────────

  private nested<T>(v: VertexId, fn: () => T): T {
    if (this.depth >= this.maxDepth) {
      throw depthExceeded(this.maxDepth, v);
    }
    this.depth++;
    try {
      return fn();
    } finally {
      this.depth--;
    }
  }

  /** UTF-8 payload of a λ or β target. */
  private text(v: VertexId): string {
    const data = this.graph.data(v);
    if (data === undefined) {
      throw attributeNotFound(v, DELTA, this.names(v));
    }
    try {
      return toUtf8(data);
    } catch {
      throw attributeNotFound(v, DELTA, this.names(v));
    }
  }

  private names(v: VertexId): string[] {
    return this.graph.has(v) ? this.graph.kids(v).map(([name]) => name) : [];
  }
}
