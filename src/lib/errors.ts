/**
 * Errors reported by the prospect pipeline. All are local and recoverable;
 * the caller decides whether to show a message or fall back to an unfiltered view.
 */

export type ProspectPipelineErrorKind = "InvalidParameter" | "EmptyCohort" | "InvalidCriteria";

export class ProspectPipelineError extends Error {
  public readonly kind: ProspectPipelineErrorKind;
  public readonly details?: Record<string, unknown>;

  constructor(kind: ProspectPipelineErrorKind, message: string, details?: Record<string, unknown>) {
    super(message);
    this.kind = kind;
    this.details = details;
    this.name = "ProspectPipelineError";
  }
}

export function isProspectPipelineError(
  err: unknown,
  kind?: ProspectPipelineErrorKind
): err is ProspectPipelineError {
  if (!(err instanceof ProspectPipelineError)) return false;
  return kind === undefined || err.kind === kind;
}

export const invalidParameter = (message: string, details?: Record<string, unknown>) =>
  new ProspectPipelineError("InvalidParameter", message, details);

export const emptyCohort = (message = "Cohort has no carrier records") =>
  new ProspectPipelineError("EmptyCohort", message);

export const invalidCriteria = (message: string, details?: Record<string, unknown>) =>
  new ProspectPipelineError("InvalidCriteria", message, details);
