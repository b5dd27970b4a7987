// src/outcome/constructors.ts
import type { Done, Fail, OutcomeMeta } from "./outcome";
import type { Failure, FailureReason } from "./failure";
import { failure } from "./failure";
import { makeDiagnostic } from "./codes";
import { errorDiag } from "./diagnostic";
import { isSodgError } from "../core/errors";

export function done<A>(value: A, meta: OutcomeMeta = {}): Done<A> {
  return { tag: "Done", value, meta };
}

export const ok = done;

export function fail(f: Failure, meta: OutcomeMeta = {}): Fail {
  return { tag: "Fail", failure: f, meta };
}

export function err(reason: FailureReason, message: string, opts?: Partial<Omit<Failure, "reason" | "message">>): Fail {
  return fail(failure(reason, message, opts));
}

export function usageError(detail: string): Fail {
  return fail(
    failure("usage", detail, {
      diagnostics: [makeDiagnostic("E0001", { detail })],
    })
  );
}

export function configError(detail: string): Fail {
  return fail(
    failure("config", detail, {
      diagnostics: [makeDiagnostic("E0002", { detail })],
    })
  );
}

function lineOf(context: Record<string, unknown>): number | undefined {
  const line = context.line;
  return typeof line === "number" ? line : undefined;
}

/**
 * Turn anything thrown by the core into a Fail. SodgErrors keep their
 * family as the reason and their code on the diagnostic; anything else
 * is an internal error.
 */
export function fromError(e: unknown, meta: OutcomeMeta = {}): Fail {
  if (isSodgError(e)) {
    const line = lineOf(e.context);
    return fail(
      failure(e.family, e.message, {
        context: e.context,
        diagnostics: [errorDiag(e.code, e.message, { line, data: e.context })],
      }),
      { ...meta, line }
    );
  }
  const detail = e instanceof Error ? e.message : String(e);
  return fail(
    failure("internal-error", detail, {
      diagnostics: [makeDiagnostic("E0003", { detail })],
    }),
    meta
  );
}

/** Run `fn`, catching what it throws as a Fail. */
export function attempt<A>(fn: () => A, meta: OutcomeMeta = {}): Done<A> | Fail {
  try {
    return done(fn(), meta);
  } catch (e) {
    return fromError(e, meta);
  }
}
