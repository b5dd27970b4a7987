// src/core/assembler/assembler.ts
// Applies ADD/BIND/PUT instructions to a Graph, in order, with a per-unit alias scope

import type { Logger } from "pino";
import { Graph, type VertexId } from "../graph/graph";
import { MAX_VERTEX_ID, ROOT } from "../graph/attrs";
import { atLine, duplicateVertex, malformed, unknownVertex } from "../errors";
import { makeNoopLogger } from "../log/logger";
import { parseInstructions, type Instruction } from "../reader/parse";
import { parsePayload } from "./payload";

export interface AssembleOptions {
  /** Vertex that `0` denotes in the script. Defaults to the store's root. */
  root?: VertexId;
  logger?: Logger;
}

const NUMERIC = /^(?:ν|v)?(\d+)$/;
const ALIAS = /^\$(.+)$/;

/**
 * One assembly unit. Aliases (`$name`) are allocated by the ADD that
 * introduces them and are only visible inside this unit.
 */
export class Assembler {
  private readonly aliases: Map<string, VertexId> = new Map();
  private readonly root: VertexId;
  private readonly log: Logger;

  constructor(private readonly graph: Graph, opts: AssembleOptions = {}) {
    this.root = opts.root ?? ROOT;
    this.log = opts.logger ?? makeNoopLogger();
    if (!graph.has(this.root)) {
      throw unknownVertex(this.root);
    }
  }

  /** Parse and apply a whole script; returns the number of instructions applied. */
  run(src: string): number {
    const program = parseInstructions(src);
    for (const ins of program) {
      try {
        this.apply(ins);
      } catch (e) {
        throw atLine(e, ins.line, ins.text);
      }
    }
    this.log.debug({ instructions: program.length, root: this.root }, "assembled unit");
    return program.length;
  }

  apply(ins: Instruction): void {
    switch (ins.op) {
      case "ADD": {
        const [ref] = ins.args;
        const id = this.declare(ref);
        if (id !== undefined) {
          this.graph.add(id);
        }
        return;
      }
      case "BIND": {
        const [from, to, name] = ins.args;
        this.graph.bind(this.resolve(from), this.resolve(to), name);
        return;
      }
      case "PUT": {
        const [ref, payload] = ins.args;
        const id = this.resolve(ref);
        this.graph.put(id, parsePayload(payload));
        return;
      }
    }
  }

  /**
   * Id an ADD should create, or undefined for the unit root, which
   * already exists.
   */
  private declare(ref: string): VertexId | undefined {
    const alias = aliasName(ref);
    if (alias !== undefined) {
      const known = this.aliases.get(alias);
      if (known !== undefined) {
        throw duplicateVertex(known);
      }
      const id = this.graph.nextId();
      this.aliases.set(alias, id);
      return id;
    }
    const n = numeric(ref);
    return n === ROOT ? undefined : n;
  }

  private resolve(ref: string): VertexId {
    const alias = aliasName(ref);
    if (alias !== undefined) {
      const id = this.aliases.get(alias);
      if (id === undefined) {
        throw unknownVertex(ref);
      }
      return id;
    }
    const n = numeric(ref);
    return n === ROOT ? this.root : n;
  }
}

function aliasName(ref: string): string | undefined {
  const m = ALIAS.exec(ref);
  if (!m) return undefined;
  const name = m[1];
  const n = NUMERIC.exec(name);
  if (n && Number(n[1]) === ROOT) {
    throw malformed(`The root can't be aliased: '${ref}'`);
  }
  return name;
}

function numeric(ref: string): VertexId {
  const m = NUMERIC.exec(ref);
  if (!m) {
    throw malformed(`Can't parse vertex reference '${ref}'`);
  }
  const id = Number(m[1]);
  if (id > MAX_VERTEX_ID) {
    throw malformed(`Vertex reference '${ref}' is above the largest id ${MAX_VERTEX_ID}`);
  }
  return id;
}

/**
 * Assemble `src` into `graph` (a fresh store when omitted) and return the
 * store. On failure the store may hold a prefix of the script.
 */
export function assemble(src: string, graph: Graph = Graph.empty(), opts: AssembleOptions = {}): Graph {
  new Assembler(graph, opts).run(src);
  return graph;
}
