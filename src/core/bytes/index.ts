// src/core/bytes/index.ts
export * from "./hex";
