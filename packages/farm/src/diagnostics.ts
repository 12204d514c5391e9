/* =======================================================================================
 * SUBMISSION DIAGNOSTICS
 * ---------------------------------------------------------------------------------------
 * Advisory and per-file failures collected while planning a batch. Nothing here aborts
 * the batch; callers decide what to show and whether to submit.
 * ======================================================================================= */

export type DiagnosticSeverity = "error" | "warning" | "info";

export const SubmissionDiagnosticCode = {
  SCENE_FAILED: "scene-failed",
  NO_PASSES_RESOLVED: "no-passes-resolved",
  NO_OUTPUTS_RESOLVED: "no-outputs-resolved",
  MULTIPLE_SETTINGS: "multiple-settings",
} as const;

export type SubmissionDiagnosticCodeType =
  (typeof SubmissionDiagnosticCode)[keyof typeof SubmissionDiagnosticCode];

export interface SubmissionDiagnostic<TData extends Record<string, unknown> = Record<string, unknown>> {
  code: SubmissionDiagnosticCodeType;
  message: string;
  severity: DiagnosticSeverity;
  /** Scene file the diagnostic belongs to. */
  file?: string;
  /** Pass key (`""` for the layer default). */
  pass?: string;
  data?: Readonly<TData>;
}

export interface BuildDiagnosticInput<TData extends Record<string, unknown> = Record<string, unknown>> {
  code: SubmissionDiagnosticCodeType;
  message: string;
  severity?: DiagnosticSeverity;
  file?: string;
  pass?: string;
  data?: Readonly<TData>;
}

/** Diagnostics default to warnings; optional fields are left out when absent. */
export function buildDiagnostic<TData extends Record<string, unknown> = Record<string, unknown>>(
  input: BuildDiagnosticInput<TData>,
): SubmissionDiagnostic<TData> {
  return {
    code: input.code,
    message: input.message,
    severity: input.severity ?? "warning",
    ...(input.file !== undefined ? { file: input.file } : {}),
    ...(input.pass !== undefined ? { pass: input.pass } : {}),
    ...(input.data ? { data: input.data } : {}),
  };
}

export function hasErrors(diagnostics: readonly SubmissionDiagnostic[]): boolean {
  return diagnostics.some((diag) => diag.severity === "error");
}

/** One line per diagnostic: `warning [no-outputs-resolved] shot.usd: message`. */
export function formatDiagnostic(diag: SubmissionDiagnostic): string {
  const where = diag.file ? ` ${diag.file}:` : "";
  return `${diag.severity} [${diag.code}]${where} ${diag.message}`;
}
