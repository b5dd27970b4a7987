// src/core/natives/index.ts
export { NativeRegistry } from "./registry";
export { defaultNatives, defaultRegistry } from "./builtins";
export type { Effect, NativeDescriptor, NativeDoc, NativeFn, NativeIO, NativeSig } from "./types";
