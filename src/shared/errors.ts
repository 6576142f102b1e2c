export type MalformedDetectionReason =
  | "invalid-box"
  | "out-of-bounds"
  | "invalid-confidence"
  | "unknown-label";

export class MalformedDetectionError extends Error {
  readonly code = "MALFORMED_DETECTION";

  readonly index: number;

  readonly reason: MalformedDetectionReason;

  constructor(index: number, reason: MalformedDetectionReason, detail: string) {
    super(`Detection #${index} rejected (${reason}): ${detail}`);
    this.name = "MalformedDetectionError";
    this.index = index;
    this.reason = reason;
  }
}

/** Soft condition: reported in diagnostics, never thrown by the pipeline. */
export class NoPersonsDetectedError extends Error {
  readonly code = "NO_PERSONS_DETECTED";

  constructor() {
    super("No person detections in image; all category counts are 0/0");
    this.name = "NoPersonsDetectedError";
  }
}

export class ComplianceConfigError extends Error {
  readonly code = "INVALID_CONFIG";

  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid compliance configuration: ${issues.join("; ")}`);
    this.name = "ComplianceConfigError";
    this.issues = issues;
  }
}

export class InvalidDetectionPayloadError extends Error {
  readonly code = "INVALID_PAYLOAD";

  constructor(message: string) {
    super(message);
    this.name = "InvalidDetectionPayloadError";
  }
}
