// src/outcome/diagnostic.ts
export type DiagnosticSeverity = "error" | "warning" | "info";

export interface Diagnostic {
  code: string;
  severity: DiagnosticSeverity;
  message: string;
  line?: number;
  data?: Record<string, unknown>;
}

type DiagnosticOpts = Partial<Omit<Diagnostic, "code" | "message" | "severity">>;

export function errorDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "error", ...opts };
}

export function warnDiag(code: string, message: string, opts?: DiagnosticOpts): Diagnostic {
  return { code, message, severity: "warning", ...opts };
}

/** `E0301 error: Can't find .x in ν3` or with a line: `E0105 error (line 4): ...` */
export function formatDiagnostic(d: Diagnostic): string {
  const where = d.line === undefined ? "" : ` (line ${d.line})`;
  return `${d.code} ${d.severity}${where}: ${d.message}`;
}
