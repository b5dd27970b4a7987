// src/core/errors.ts
// Error taxonomy for assembly, merge, dataization and persistence

export type ErrorFamily = "assembly" | "merge" | "dataization" | "io";

export type ErrorKind =
  | "DuplicateVertex"
  | "UnknownVertex"
  | "DuplicateAttribute"
  | "InvalidAttribute"
  | "MalformedInstruction"
  | "NameCollision"
  | "AttributeNotFound"
  | "CyclicDataization"
  | "NativeTypeMismatch"
  | "UnknownNative"
  | "NativeFailure"
  | "DepthExceeded"
  | "IOError"
  | "CorruptGraph";

interface KindDef {
  code: string;
  family: ErrorFamily;
}

export const ERROR_KINDS: Record<ErrorKind, KindDef> = {
  DuplicateVertex: { code: "E0101", family: "assembly" },
  UnknownVertex: { code: "E0102", family: "assembly" },
  DuplicateAttribute: { code: "E0103", family: "assembly" },
  InvalidAttribute: { code: "E0104", family: "assembly" },
  MalformedInstruction: { code: "E0105", family: "assembly" },

  NameCollision: { code: "E0201", family: "merge" },

  AttributeNotFound: { code: "E0301", family: "dataization" },
  CyclicDataization: { code: "E0302", family: "dataization" },
  NativeTypeMismatch: { code: "E0303", family: "dataization" },
  UnknownNative: { code: "E0304", family: "dataization" },
  NativeFailure: { code: "E0305", family: "dataization" },
  DepthExceeded: { code: "E0306", family: "dataization" },

  IOError: { code: "E0401", family: "io" },
  CorruptGraph: { code: "E0402", family: "io" },
};

export function isErrorKind(s: string): s is ErrorKind {
  return Object.prototype.hasOwnProperty.call(ERROR_KINDS, s);
}

/**
 * Base class of every failure raised by the core. The `kind` is the
 * discriminator callers switch on; `context` carries the offending vertex
 * or attribute.
 */
export class SodgError extends Error {
  public readonly code: string;
  public readonly family: ErrorFamily;

  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly context: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SodgError";
    this.code = ERROR_KINDS[kind].code;
    this.family = ERROR_KINDS[kind].family;
  }
}

// ─────────────────────────────────────────────────────────────────
// Assembly
// ─────────────────────────────────────────────────────────────────

export class AssemblyError extends SodgError {
  constructor(kind: ErrorKind, message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(kind, message, context, options);
    this.name = "AssemblyError";
  }
}

export function duplicateVertex(v: number): AssemblyError {
  return new AssemblyError("DuplicateVertex", `Vertex ν${v} already exists`, { vertex: v });
}

export function unknownVertex(v: number | string): AssemblyError {
  const name = typeof v === "number" ? `ν${v}` : v;
  return new AssemblyError("UnknownVertex", `Can't find ${name}`, { vertex: v });
}

export function duplicateAttribute(from: number, name: string, to: number): AssemblyError {
  return new AssemblyError(
    "DuplicateAttribute",
    `Edge '${name}' already exists in ν${from}, arriving to ν${to}`,
    { vertex: from, attribute: name }
  );
}

export function invalidAttribute(name: string): AssemblyError {
  return new AssemblyError("InvalidAttribute", `Invalid attribute name '${name}'`, { attribute: name });
}

export function malformed(message: string, line?: number, text?: string): AssemblyError {
  return new AssemblyError("MalformedInstruction", message, { line, text });
}

/**
 * Re-raise an assembly failure with the position of the instruction that
 * caused it, keeping the original kind.
 */
export function atLine(e: unknown, line: number, text: string): unknown {
  if (!(e instanceof SodgError)) return e;
  return new AssemblyError(
    e.kind,
    `Failure at line ${line} '${text}': ${e.message}`,
    { ...e.context, line, text },
    { cause: e }
  );
}

// ─────────────────────────────────────────────────────────────────
// Merge
// ─────────────────────────────────────────────────────────────────

export class MergeError extends SodgError {
  constructor(kind: ErrorKind, message: string, context?: Record<string, unknown>) {
    super(kind, message, context);
    this.name = "MergeError";
  }
}

export function nameCollision(name: string): MergeError {
  return new MergeError("NameCollision", `Root-level name '${name}' is defined in both graphs`, { attribute: name });
}

// ─────────────────────────────────────────────────────────────────
// Dataization
// ─────────────────────────────────────────────────────────────────

export class DataizationError extends SodgError {
  constructor(kind: ErrorKind, message: string, context?: Record<string, unknown>) {
    super(kind, message, context);
    this.name = "DataizationError";
  }
}

export function attributeNotFound(v: number, name: string, others: string[] = []): DataizationError {
  const among = others.length === 0
    ? "it has no attributes"
    : `among other ${others.length} attribute${others.length === 1 ? "" : "s"}: ${others.join(", ")}`;
  return new DataizationError(
    "AttributeNotFound",
    `Can't find .${name} in ν${v}, ${among}`,
    { vertex: v, attribute: name }
  );
}

export function cyclicDataization(v: number): DataizationError {
  return new DataizationError("CyclicDataization", `ν${v} requires its own value while being dataized`, { vertex: v });
}

export function nativeTypeMismatch(native: string, index: number, detail: string): DataizationError {
  return new DataizationError(
    "NativeTypeMismatch",
    `Native '${native}' can't take argument #${index}: ${detail}`,
    { native, index }
  );
}

export function unknownNative(name: string, v: number): DataizationError {
  return new DataizationError("UnknownNative", `Native '${name}' at ν${v} is not registered`, { native: name, vertex: v });
}

export function nativeFailure(native: string, reason: string): DataizationError {
  return new DataizationError("NativeFailure", `Native '${native}' failed: ${reason}`, { native });
}

export function depthExceeded(limit: number, v: number): DataizationError {
  return new DataizationError(
    "DepthExceeded",
    `Dataization of ν${v} is nested deeper than ${limit} levels`,
    { vertex: v, limit }
  );
}

// ─────────────────────────────────────────────────────────────────
// Persistence
// ─────────────────────────────────────────────────────────────────

export class PersistenceError extends SodgError {
  constructor(kind: ErrorKind, message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(kind, message, context, options);
    this.name = "PersistenceError";
  }
}

export function ioError(path: string, cause: unknown): PersistenceError {
  const reason = cause instanceof Error ? cause.message : String(cause);
  return new PersistenceError("IOError", `Can't access "${path}": ${reason}`, { path }, { cause });
}

export function corruptGraph(reason: string): PersistenceError {
  return new PersistenceError("CorruptGraph", `Corrupt graph binary: ${reason}`);
}

export function isSodgError(e: unknown): e is SodgError {
  return e instanceof SodgError;
}
