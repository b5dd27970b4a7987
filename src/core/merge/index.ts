// src/core/merge/index.ts
export { merge, mergeAll } from "./merge";
