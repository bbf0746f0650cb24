import { REVISION_CHANGED_REASON, type EventRecord, type FailureFact } from "./types.js";

const REACHED_REVISION_PATTERN = /to ([0-9]+) because static pod is ready/;

/**
 * Revision the note says the node reached, or undefined if the note is not a
 * "static pod is ready" revision update or the revision is too large to compare.
 */
export function reachedRevision(text: string): number | undefined {
  const match = REACHED_REVISION_PATTERN.exec(text);
  if (!match) return undefined;
  const revision = Number.parseInt(match[1], 10);
  return Number.isSafeInteger(revision) ? revision : undefined;
}

/**
 * A record proves recovery when it is a revision change, mentions the node, and
 * reports exactly the revision the failure was waiting for. Jumping past the
 * target revision does not count.
 */
export function isRecoveryEvidence(fact: FailureFact, record: EventRecord): boolean {
  const isRevisionUpdate = record.reason === REVISION_CHANGED_REASON;
  const isForNode = record.text.includes(fact.node);
  return isRevisionUpdate && isForNode && reachedRevision(record.text) === fact.targetRevision;
}

// Existential, not temporal: the record may predate the failure event.
export function findEvidence(fact: FailureFact, records: readonly EventRecord[]): boolean {
  return records.some((record) => isRecoveryEvidence(fact, record));
}
