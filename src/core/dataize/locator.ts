// src/core/dataize/locator.ts
// Locator text -> segments

import { DELTA, PHI, Q, RHO, XI } from "../graph/attrs";
import type { VertexId } from "../graph/graph";

export type Segment =
  | { tag: "Root" }
  | { tag: "Self" }
  | { tag: "Rho" }
  | { tag: "Vertex"; id: VertexId }
  | { tag: "Attr"; name: string };

const VERTEX = /^ν(\d+)$/;

/**
 * Split a dotted locator such as `Φ.org.foo`, `ξ.ρ.x` or `ν7.α0`. The
 * terminal marker `Δ` is dropped. Unknown names are kept as Attr
 * segments; whether they exist is decided while walking.
 */
export function parseLocator(text: string): Segment[] {
  const out: Segment[] = [];
  for (const raw of text.trim().split(".")) {
    if (raw === PHI || raw === Q) { out.push({ tag: "Root" }); continue; }
    if (raw === XI) { out.push({ tag: "Self" }); continue; }
    if (raw === RHO) { out.push({ tag: "Rho" }); continue; }
    if (raw === DELTA) continue;
    const m = VERTEX.exec(raw);
    if (m) { out.push({ tag: "Vertex", id: Number(m[1]) }); continue; }
    out.push({ tag: "Attr", name: raw });
  }
  return out;
}

export function formatLocator(segments: Segment[]): string {
  return segments
    .map((s) => {
      switch (s.tag) {
        case "Root": return PHI;
        case "Self": return XI;
        case "Rho": return RHO;
        case "Vertex": return `ν${s.id}`;
        case "Attr": return s.name;
      }
    })
    .join(".");
}
