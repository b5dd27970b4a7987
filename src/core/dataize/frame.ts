// src/core/dataize/frame.ts
// Evaluation context threaded through dataization

import type { VertexId } from "../graph/graph";

/**
 * A vertex as seen from the frame it was reached from. Frames are a pure
 * function of `(vertex, reach)`, so `key` identifies one everywhere.
 */
export interface Frame {
  readonly vertex: VertexId;
  /** Frame this one was reached from; absent for the root and `νN` entries. */
  readonly reach?: Frame;
  /** Run-time receiver: what `ρ` means inside this frame. */
  readonly rho?: Frame;
  /** For copies (`π`, `ε`): the frame of the object being copied. */
  readonly proto?: Frame;
  readonly key: string;
}

export function frameKey(vertex: VertexId, reach?: Frame): string {
  return reach === undefined ? `${vertex}` : `${vertex}@${reach.key}`;
}

/** The frame itself followed by its prototypes, nearest first. */
export function protoChain(f: Frame): Frame[] {
  const out: Frame[] = [];
  for (let p: Frame | undefined = f; p !== undefined; p = p.proto) {
    out.push(p);
  }
  return out;
}
