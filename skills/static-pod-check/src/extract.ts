import { ExtractionError } from "./errors.js";
import type { FailureFact } from "./types.js";

export const FAILURE_MARKER = "static pod lifecycle failure";

// static pod lifecycle failure - static pod: "etcd" in namespace: "openshift-etcd" for revision: 6 on node: "master-2" didn't show up, waited: 2m30s
const FAILURE_PATTERN =
  /^static pod lifecycle failure - static pod: "[^"]*" in namespace: "([^"]+)" for revision: (\S+) on node: "([^"]+)" didn't show up, waited: .*$/;

export type ExtractResult =
  | { ok: true; fact: FailureFact }
  | { ok: false; error: ExtractionError };

/**
 * Parse an installer "static pod didn't show up" note into a FailureFact.
 * Never throws; anything off-template comes back as an ExtractionError.
 */
export function extractFailure(text: string): ExtractResult {
  const match = FAILURE_PATTERN.exec(text.trim());
  if (!match) {
    return {
      ok: false,
      error: new ExtractionError(`unrecognized static pod failure message: ${text}`, text),
    };
  }

  const [, namespace, revisionToken, node] = match;
  if (!/^\d+$/.test(revisionToken)) {
    return {
      ok: false,
      error: new ExtractionError(`revision "${revisionToken}" is not an integer in message: ${text}`, text),
    };
  }

  const targetRevision = Number.parseInt(revisionToken, 10);
  if (!Number.isSafeInteger(targetRevision)) {
    return {
      ok: false,
      error: new ExtractionError(`revision "${revisionToken}" is out of range in message: ${text}`, text),
    };
  }

  const fact: FailureFact = Object.freeze({
    namespace,
    node,
    targetRevision,
    rawMessage: text,
  });
  return { ok: true, fact };
}
