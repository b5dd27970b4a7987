// src/core/reader/index.ts
export { tokenize } from "./tokenize";
export type { Tok } from "./tokenize";
export { parseInstructions, render } from "./parse";
export type { Instruction, Op } from "./parse";
