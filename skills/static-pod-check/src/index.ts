export { runCheck, newClient } from "./check.js";
export { correlate, type CorrelateOptions } from "./correlate.js";
export { extractFailure, FAILURE_MARKER, type ExtractResult } from "./extract.js";
export { findEvidence, isRecoveryEvidence, reachedRevision } from "./recovery.js";
export { verifyWithSecondary, type FallbackOutcome } from "./fallback.js";
export { buildTestResult, renderJUnit, type ReportInput } from "./report.js";
export { parseEventList } from "./events.js";
export { CheckInputSchema, type CheckInput, type CheckConfig } from "./schema.js";
export { KubectlEventSource, newKubectlClient, type KubectlOptions } from "./tools/kubectl.js";
export { FileEventSource, newFileClient } from "./tools/events-file.js";
export * from "./errors.js";
export * from "./types.js";
