// src/outcome/codes.ts
import { ERROR_KINDS, isErrorKind, type ErrorKind } from "../core/errors";
import type { Diagnostic, DiagnosticSeverity } from "./diagnostic";

interface DiagCodeDef {
  code: string;
  severity: DiagnosticSeverity;
  category: string;
  template: string;
}

const TEMPLATES: Record<ErrorKind, string> = {
  DuplicateVertex: "Vertex {vertex} already exists",
  UnknownVertex: "Unknown vertex {vertex}",
  DuplicateAttribute: "Attribute {attribute} already bound",
  InvalidAttribute: "Invalid attribute name {attribute}",
  MalformedInstruction: "Malformed instruction",
  NameCollision: "Root-level name {attribute} defined twice",
  AttributeNotFound: "Attribute {attribute} not found",
  CyclicDataization: "Cyclic dataization at {vertex}",
  NativeTypeMismatch: "Native {native} got a bad argument",
  UnknownNative: "Unknown native {native}",
  NativeFailure: "Native {native} failed",
  DepthExceeded: "Dataization deeper than {limit}",
  IOError: "Can't access {path}",
  CorruptGraph: "Corrupt graph binary",
};

function coreCodes(): Record<string, DiagCodeDef> {
  const out: Record<string, DiagCodeDef> = {};
  for (const [kind, template] of Object.entries(TEMPLATES)) {
    if (!isErrorKind(kind)) continue;
    const def = ERROR_KINDS[kind];
    out[def.code] = { code: def.code, severity: "error", category: def.family, template };
  }
  return out;
}

export const DIAGNOSTIC_CODES: Record<string, DiagCodeDef> = {
  E0001: { code: "E0001", severity: "error", category: "usage", template: "Bad command line: {detail}" },
  E0002: { code: "E0002", severity: "error", category: "config", template: "Bad configuration: {detail}" },
  E0003: { code: "E0003", severity: "error", category: "internal", template: "Unexpected failure: {detail}" },

  ...coreCodes(),

  W0001: { code: "W0001", severity: "warning", category: "config", template: "{detail}" },
  W0002: { code: "W0002", severity: "warning", category: "graph", template: "Inconsistent graph: {detail}" },
};

export function makeDiagnostic(
  code: string,
  params?: Record<string, string | number>,
  line?: number
): Diagnostic {
  const def = DIAGNOSTIC_CODES[code];
  if (!def) {
    throw new Error(`Unknown diagnostic code: ${code}`);
  }

  let message = def.template;
  if (params) {
    for (const [key, value] of Object.entries(params)) {
      message = message.replace(`{${key}}`, String(value));
    }
  }

  return {
    code: def.code,
    severity: def.severity,
    message,
    line,
    data: params,
  };
}
