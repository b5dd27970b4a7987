// src/core/natives/types.ts
// Descriptor of a native function reachable through a λ edge

import type { OutputPort } from "../../ports/output";

/**
 * Effect kinds. Closed set.
 */
export type Effect =
  | "Pure"           // referentially transparent
  | "Sink";          // writes to the output port

/**
 * `params` are locators resolved on the frame of the atom, e.g. `ρ` for
 * the receiver and `α0` for the first argument.
 */
export interface NativeSig {
  params: Array<{
    locator: string;
    type: string;
  }>;
  returns: string;
}

export interface NativeDoc {
  summary: string;
  detail?: string;
  laws?: string[];
}

export interface NativeIO {
  output: OutputPort;
}

export type NativeFn = (args: Uint8Array[], io: NativeIO) => Uint8Array;

export interface NativeDescriptor {
  /** Name stored in the payload of the λ target. */
  id: string;
  signature: NativeSig;
  effects: Effect[];
  doc: NativeDoc;
  /** Semantic version */
  version: string;
  fn: NativeFn;
}
