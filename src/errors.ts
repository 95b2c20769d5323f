/**
 * Error taxonomy shared by the planning core. Fatal conditions (invalid
 * configuration, malformed records) carry a stable {@link code} so callers can
 * surface deterministic diagnostics; recoverable conditions are returned as
 * values or attached to plan records as warnings instead of being thrown.
 */
export class ConfigurationError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code = "E-CONFIG-INVALID", details?: unknown) {
    super(message);
    this.name = "ConfigurationError";
    this.code = code;
    this.details = details;
  }
}

/** Reason attached to a record rejected at the ingestion boundary. */
export class RecordValidationError extends Error {
  public readonly code = "E-RECORD-INVALID";
  public readonly recordKind: string;
  public readonly recordId: string | null;
  public readonly issues: string[];

  constructor(recordKind: string, recordId: string | null, issues: string[]) {
    super(`${recordKind} record ${recordId ?? "<unknown>"} rejected: ${issues.join("; ")}`);
    this.name = "RecordValidationError";
    this.recordKind = recordKind;
    this.recordId = recordId;
    this.issues = issues;
  }
}

export type PlanWarningCode = "W-GENERATOR-AUTONOMY" | "W-BUDGET-EXHAUSTED";

/** Non-fatal constraint violation surfaced alongside the plan. */
export interface PlanWarning {
  readonly code: PlanWarningCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}
