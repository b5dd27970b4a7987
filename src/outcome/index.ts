// src/outcome/index.ts
export type { Outcome, Ok, Err, Done, Fail, OutcomeMeta } from "./outcome";
export { isDone, isFail } from "./outcome";
export type { Failure, FailureReason } from "./failure";
export { failure, wrapFailure, allDiagnostics } from "./failure";
export type { Diagnostic, DiagnosticSeverity } from "./diagnostic";
export { errorDiag, warnDiag, formatDiagnostic } from "./diagnostic";
export { DIAGNOSTIC_CODES, makeDiagnostic } from "./codes";
export { done, ok, fail, err, usageError, configError, fromError, attempt } from "./constructors";
export { match, mapOutcome, flatMapOutcome, unwrap, unwrapOr } from "./matchers";
