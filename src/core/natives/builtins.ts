// src/core/natives/builtins.ts
// Built-in natives over int64 payloads and raw bytes

import { RHO, alpha } from "../graph/attrs";
import { INT_WIDTH, concatBytes, fromBool, fromInt, toInt, bytesEqual } from "../bytes/hex";
import { nativeFailure, nativeTypeMismatch } from "../errors";
import { NativeRegistry } from "./registry";
import type { NativeDescriptor, NativeFn } from "./types";

const A0 = alpha(0);

function int(native: string, args: Uint8Array[], index: number): bigint {
  const b = args[index];
  if (b === undefined) {
    throw nativeTypeMismatch(native, index, "argument is missing");
  }
  if (b.length !== INT_WIDTH) {
    throw nativeTypeMismatch(native, index, `expected ${INT_WIDTH} bytes, got ${b.length}`);
  }
  return toInt(b);
}

function bytes(native: string, args: Uint8Array[], index: number): Uint8Array {
  const b = args[index];
  if (b === undefined) {
    throw nativeTypeMismatch(native, index, "argument is missing");
  }
  return b;
}

function unary(id: string, summary: string, op: (x: bigint) => bigint): NativeDescriptor {
  return {
    id,
    signature: { params: [{ locator: RHO, type: "int" }], returns: "int" },
    effects: ["Pure"],
    doc: { summary },
    version: "1.0.0",
    fn: (args) => fromInt(op(int(id, args, 0))),
  };
}

function binary(
  id: string,
  summary: string,
  returns: string,
  fn: NativeFn,
  type = "int"
): NativeDescriptor {
  return {
    id,
    signature: {
      params: [
        { locator: RHO, type },
        { locator: A0, type },
      ],
      returns,
    },
    effects: ["Pure"],
    doc: { summary },
    version: "1.0.0",
    fn,
  };
}

function arith(id: string, summary: string, op: (x: bigint, y: bigint) => bigint): NativeDescriptor {
  return binary(id, summary, "int", (args) => fromInt(op(int(id, args, 0), int(id, args, 1))));
}

function compare(id: string, summary: string, op: (x: bigint, y: bigint) => boolean): NativeDescriptor {
  return binary(id, summary, "bool", (args) => fromBool(op(int(id, args, 0), int(id, args, 1))));
}

/** Descriptors of every built-in; ints wrap around at 64 bits. */
export function defaultNatives(): NativeDescriptor[] {
  return [
    unary("inc", "ρ + 1", (x) => x + 1n),
    unary("dec", "ρ - 1", (x) => x - 1n),
    unary("neg", "-ρ", (x) => -x),
    arith("plus", "ρ + α0", (x, y) => x + y),
    arith("minus", "ρ - α0", (x, y) => x - y),
    arith("times", "ρ × α0", (x, y) => x * y),
    binary("div", "ρ ÷ α0, truncated toward zero", "int", (args) => {
      const x = int("div", args, 0);
      const y = int("div", args, 1);
      if (y === 0n) {
        throw nativeFailure("div", "division by zero");
      }
      return fromInt(x / y);
    }),
    binary(
      "eq",
      "bytewise equality of ρ and α0",
      "bool",
      (args) => fromBool(bytesEqual(bytes("eq", args, 0), bytes("eq", args, 1))),
      "bytes"
    ),
    compare("lt", "ρ < α0", (x, y) => x < y),
    compare("gt", "ρ > α0", (x, y) => x > y),
    binary(
      "concat",
      "bytes of ρ followed by bytes of α0",
      "bytes",
      (args) => concatBytes(bytes("concat", args, 0), bytes("concat", args, 1)),
      "bytes"
    ),
    {
      id: "length",
      signature: { params: [{ locator: RHO, type: "bytes" }], returns: "int" },
      effects: ["Pure"],
      doc: { summary: "number of bytes in ρ" },
      version: "1.0.0",
      fn: (args) => fromInt(bytes("length", args, 0).length),
    },
    {
      id: "stdout",
      signature: { params: [{ locator: A0, type: "bytes" }], returns: "bytes" },
      effects: ["Sink"],
      doc: { summary: "writes α0 to the output port and returns it unchanged" },
      version: "1.0.0",
      fn: (args, io) => {
        const out = bytes("stdout", args, 0);
        io.output.write(out);
        return out;
      },
    },
  ];
}

export function defaultRegistry(): NativeRegistry {
  return NativeRegistry.of(defaultNatives());
}
