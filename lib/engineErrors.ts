/**
 * Decision engine error kinds. Every error names the evidence or configuration that was
 * missing so a caller can retry once the dependency is restored.
 */

export type DecisionErrorCode =
  | "INSUFFICIENT_EVIDENCE"
  | "SOURCE_UNAVAILABLE"
  | "INVALID_WEIGHT_CONFIGURATION"
  | "MALFORMED_INPUT"
  | "MISSING_FORECAST"
  | "DECISION_CANCELLED";

export class DecisionEngineError extends Error {
  public readonly code: DecisionErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: DecisionErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "DecisionEngineError";
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/** No usable source for a required decision. Never replaced by a default score. */
export class InsufficientEvidenceError extends DecisionEngineError {
  public readonly missing: { source: string; reason: string }[];

  constructor(decision: string, missing: { source: string; reason: string }[]) {
    const list = missing.map((m) => `${m.source} (${m.reason})`).join(", ");
    super("INSUFFICIENT_EVIDENCE", `Insufficient evidence for ${decision}: ${list || "no sources configured"}`, {
      decision,
      missing,
    });
    this.name = "InsufficientEvidenceError";
    this.missing = missing;
  }
}

/** A single source timed out or had nothing; absorbed by weight redistribution. */
export class SourceUnavailableError extends DecisionEngineError {
  public readonly source: string;

  constructor(source: string, reason: string) {
    super("SOURCE_UNAVAILABLE", `Evidence source ${source} unavailable: ${reason}`, { source, reason });
    this.name = "SourceUnavailableError";
    this.source = source;
  }
}

export class InvalidWeightConfigurationError extends DecisionEngineError {
  constructor(specName: string, reason: string, weights?: Record<string, number>) {
    super("INVALID_WEIGHT_CONFIGURATION", `Weight set "${specName}" is invalid: ${reason}`, {
      specName,
      weights,
    });
    this.name = "InvalidWeightConfigurationError";
  }
}

export class MalformedInputError extends DecisionEngineError {
  public readonly issues: { field: string; message: string }[];

  constructor(operation: string, issues: { field: string; message: string }[]) {
    const list = issues.map((i) => `${i.field}: ${i.message}`).join("; ");
    super("MALFORMED_INPUT", `Malformed ${operation} request: ${list}`, { operation, issues });
    this.name = "MalformedInputError";
    this.issues = issues;
  }
}

export class MissingForecastError extends DecisionEngineError {
  constructor(farmId: string, reason: string) {
    super("MISSING_FORECAST", `No usable forecast for farm ${farmId}: ${reason}`, { farmId, reason });
    this.name = "MissingForecastError";
  }
}

export class DecisionCancelledError extends DecisionEngineError {
  constructor(decision: string) {
    super("DECISION_CANCELLED", `${decision} was cancelled before completion`, { decision });
    this.name = "DecisionCancelledError";
  }
}

export function isDecisionEngineError(error: unknown): error is DecisionEngineError {
  return error instanceof DecisionEngineError;
}
