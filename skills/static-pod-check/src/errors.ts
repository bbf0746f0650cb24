export type CheckErrorCode =
  | "CLUSTER_UNREACHABLE"
  | "EVENT_LIST_FAILED"
  | "FAILURE_MESSAGE_UNPARSEABLE";

/**
 * Base for every error the check reports. `code` is stable and safe to match on;
 * `remediation` is a hint for whoever reads the report.
 */
export abstract class CheckError extends Error {
  abstract readonly code: CheckErrorCode;
  readonly remediation?: string;

  constructor(message: string, remediation?: string) {
    super(message);
    this.name = new.target.name;
    this.remediation = remediation;
  }
}

/**
 * The cluster (or the offline dump) cannot be reached at all. Fatal.
 */
export class ConnectionError extends CheckError {
  readonly code = "CLUSTER_UNREACHABLE" as const;
}

/**
 * Listing events for one namespace failed. The run continues with the next namespace.
 */
export class TransportError extends CheckError {
  readonly code = "EVENT_LIST_FAILED" as const;

  constructor(
    message: string,
    readonly namespace: string,
    remediation?: string
  ) {
    super(message, remediation);
  }
}

/**
 * An event note looked like a static pod failure but did not fit the template.
 */
export class ExtractionError extends CheckError {
  readonly code = "FAILURE_MESSAGE_UNPARSEABLE" as const;

  constructor(
    message: string,
    readonly text: string
  ) {
    super(message);
  }
}

export type SoftError = TransportError | ExtractionError;

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
