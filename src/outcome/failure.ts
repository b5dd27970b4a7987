// src/outcome/failure.ts
import type { ErrorFamily } from "../core/errors";
import type { Diagnostic } from "./diagnostic";

export type FailureReason =
  | ErrorFamily          // assembly, merge, dataization, io
  | "usage"
  | "config"
  | "internal-error";

export interface Failure {
  reason: FailureReason;
  message: string;
  context?: Record<string, unknown>;
  diagnostics: Diagnostic[];
  cause?: Failure;
}

export function failure(
  reason: FailureReason,
  message: string,
  opts?: Partial<Omit<Failure, "reason" | "message">>
): Failure {
  return {
    reason,
    message,
    diagnostics: opts?.diagnostics ?? [],
    context: opts?.context,
    cause: opts?.cause,
  };
}

export function wrapFailure(
  inner: Failure,
  message: string,
  context?: Record<string, unknown>
): Failure {
  return {
    ...inner,
    message,
    context: { ...inner.context, ...context },
    cause: inner,
  };
}

export function allDiagnostics(f: Failure, seen = new Set<Diagnostic>()): Diagnostic[] {
  const collected: Diagnostic[] = [];
  for (const diag of f.diagnostics) {
    if (!seen.has(diag)) {
      seen.add(diag);
      collected.push(diag);
    }
  }
  if (f.cause) {
    collected.push(...allDiagnostics(f.cause, seen));
  }
  return collected;
}
