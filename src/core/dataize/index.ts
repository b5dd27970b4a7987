// src/core/dataize/index.ts
export { Dataizer } from "./dataizer";
export type { DataizerOptions } from "./dataizer";
export { frameKey, protoChain } from "./frame";
export type { Frame } from "./frame";
export { parseLocator, formatLocator } from "./locator";
export type { Segment } from "./locator";
