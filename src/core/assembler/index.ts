// src/core/assembler/index.ts
export { Assembler, assemble } from "./assembler";
export type { AssembleOptions } from "./assembler";
export { parsePayload } from "./payload";
export { SOURCE_EXT, assembleFile, listSources, packageVertex, readSource, setupDirectory } from "./directory";
