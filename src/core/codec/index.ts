// src/core/codec/index.ts
export { MAGIC, VERSION, serialize, deserialize } from "./binary";
export { saveGraph, loadGraph } from "./file";
