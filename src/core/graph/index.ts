// src/core/graph/index.ts
export { Graph } from "./graph";
export type { Edge, MemoState, Vertex, VertexId } from "./graph";
export * from "./attrs";
export { inspect, inconsistencies, locate, slice, toDot } from "./inspect";
