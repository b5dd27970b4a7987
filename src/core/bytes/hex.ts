// src/core/bytes/hex.ts
// Payload codecs: hyphenated hex text and fixed-width scalar encodings

/** Render bytes the way the CLI prints them: `CA-FE`, or `--` when empty. */
export function toHex(bytes: Uint8Array): string {
  if (bytes.length === 0) return "--";
  const parts: string[] = [];
  for (const b of bytes) {
    parts.push(b.toString(16).toUpperCase().padStart(2, "0"));
  }
  return parts.join("-");
}

/**
 * Parse hex octets separated by hyphens or whitespace. Returns undefined
 * when the text is not an even run of hex digits.
 */
export function parseHex(text: string): Uint8Array | undefined {
  const trimmed = text.trim();
  if (trimmed === "--" || trimmed === "") return new Uint8Array(0);
  const d = trimmed.replace(/[\s-]/g, "");
  if (!/^(?:[0-9A-Fa-f]{2})+$/.test(d)) return undefined;
  const out = new Uint8Array(d.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(d.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

// ─────────────────────────────────────────────────────────────────
// Scalars
// ─────────────────────────────────────────────────────────────────

export const INT_WIDTH = 8;

/** 8-byte big-endian two's complement; values outside int64 wrap. */
export function fromInt(n: bigint | number): Uint8Array {
  const out = new Uint8Array(INT_WIDTH);
  const view = new DataView(out.buffer);
  view.setBigInt64(0, BigInt.asIntN(64, BigInt(n)));
  return out;
}

export function toInt(bytes: Uint8Array): bigint {
  if (bytes.length !== INT_WIDTH) {
    throw new RangeError(`expected ${INT_WIDTH} bytes for an int, got ${bytes.length}`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getBigInt64(0);
}

export function fromFloat(n: number): Uint8Array {
  const out = new Uint8Array(8);
  new DataView(out.buffer).setFloat64(0, n);
  return out;
}

export function toFloat(bytes: Uint8Array): number {
  if (bytes.length !== 8) {
    throw new RangeError(`expected 8 bytes for a float, got ${bytes.length}`);
  }
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).getFloat64(0);
}

export function fromBool(b: boolean): Uint8Array {
  return Uint8Array.of(b ? 0x01 : 0x00);
}

export function toBool(bytes: Uint8Array): boolean {
  if (bytes.length !== 1) {
    throw new RangeError(`expected 1 byte for a bool, got ${bytes.length}`);
  }
  return bytes[0] !== 0x00;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder("utf-8", { fatal: true });

export function fromString(s: string): Uint8Array {
  return encoder.encode(s);
}

/** Strict UTF-8 decode; throws TypeError on malformed input. */
export function toUtf8(bytes: Uint8Array): string {
  return decoder.decode(bytes);
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function concatBytes(...chunks: Uint8Array[]): Uint8Array {
  const total = chunks.reduce((n, c) => n + c.length, 0);
  const out = new Uint8Array(total);
  let at = 0;
  for (const c of chunks) {
    out.set(c, at);
    at += c.length;
  }
  return out;
}
