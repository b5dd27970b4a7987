// src/index.ts
// sodg - Public API
//
// Graph store, assembler, merger, binary codec and dataizer for embedding.

// ═══════════════════════════════════════════════════════════════════════════════
// GRAPH
// ═══════════════════════════════════════════════════════════════════════════════

export {
  Graph,
  inspect,
  inconsistencies,
  locate,
  slice,
  toDot,
  RHO,
  LAMBDA,
  DELTA,
  PI,
  XI,
  BETA,
  EPSILON,
  PHI,
  ROOT,
  alpha,
  isValidAttribute,
  type Edge,
  type MemoState,
  type Vertex,
  type VertexId,
} from "./core/graph";

export {
  toHex,
  parseHex,
  fromInt,
  toInt,
  fromFloat,
  toFloat,
  fromBool,
  toBool,
  fromString,
  toUtf8,
} from "./core/bytes";

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTRUCTION
// ═══════════════════════════════════════════════════════════════════════════════

export { parseInstructions, type Instruction } from "./core/reader";
export {
  Assembler,
  assemble,
  assembleFile,
  setupDirectory,
  parsePayload,
  type AssembleOptions,
} from "./core/assembler";
export { merge, mergeAll } from "./core/merge";
export { serialize, deserialize, saveGraph, loadGraph } from "./core/codec";

// ═══════════════════════════════════════════════════════════════════════════════
// EVALUATION
// ═══════════════════════════════════════════════════════════════════════════════

export { Dataizer, type DataizerOptions, type Frame } from "./core/dataize";
export {
  NativeRegistry,
  defaultNatives,
  defaultRegistry,
  type NativeDescriptor,
  type NativeFn,
  type NativeIO,
} from "./core/natives";
export { StdoutPort, BufferOutputPort, type OutputPort } from "./ports";

// ═══════════════════════════════════════════════════════════════════════════════
// ERRORS, CONFIG, LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export {
  SodgError,
  AssemblyError,
  MergeError,
  DataizationError,
  PersistenceError,
  ERROR_KINDS,
  isSodgError,
  type ErrorFamily,
  type ErrorKind,
} from "./core/errors";
export {
  loadConfig,
  mergeConfigs,
  validateConfig,
  DEFAULT_CONFIG,
  type SodgConfig,
  type RuntimeConfig,
} from "./core/config";
export { makeLogger, makeNoopLogger, type Logger, type LogLevel } from "./core/log";
export * from "./outcome";
