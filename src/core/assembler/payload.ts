// src/core/assembler/payload.ts
// Payload literals accepted by PUT: raw hex, `--`, or `type/value`

import { fromBool, fromFloat, fromInt, fromString, parseHex } from "../bytes/hex";
import { malformed } from "../errors";

const INT = /^[-+]?\d+$/;
const FLOAT = /^[-+]?(?:\d+\.?\d*|\.\d+)(?:[eE][-+]?\d+)?$/;

/**
 * `int/42` → int64 big-endian, `float/3.5` → float64, `bool/true` → 01,
 * `string/abc` → UTF-8, `bytes/CA-FE` and bare `CA-FE` → raw octets.
 */
export function parsePayload(text: string): Uint8Array {
  const slash = text.indexOf("/");
  if (slash > 0) {
    const type = text.slice(0, slash);
    const value = text.slice(slash + 1);
    switch (type) {
      case "int":
        if (!INT.test(value)) throw malformed(`Can't parse '${value}' as an int`);
        return fromInt(BigInt(value));
      case "float":
        if (!FLOAT.test(value)) throw malformed(`Can't parse '${value}' as a float`);
        return fromFloat(Number(value));
      case "bool":
        if (value === "true") return fromBool(true);
        if (value === "false") return fromBool(false);
        throw malformed(`Can't parse '${value}' as a bool`);
      case "string":
        return fromString(value);
      case "bytes":
        return hex(value);
      default:
        throw malformed(`Unknown payload type '${type}'`);
    }
  }
  return hex(text);
}

function hex(text: string): Uint8Array {
  const bytes = parseHex(text);
  if (bytes === undefined) {
    throw malformed(`Can't parse '${text}' as hex bytes`);
  }
  return bytes;
}
