// src/ports/index.ts
export { StdoutPort, BufferOutputPort } from "./output";
export type { OutputPort } from "./output";
