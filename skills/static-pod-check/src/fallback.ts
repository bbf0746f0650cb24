import { TransportError, errorMessage } from "./errors.js";
import { findEvidence } from "./recovery.js";
import type { EventRecord, EventSource, FailureFact } from "./types.js";

export type FallbackOutcome = {
  resolved: boolean;
  diagnostics: string[];
  error?: TransportError;
};

/**
 * The events API and the core API have been seen returning different event
 * sets. When the primary source has no evidence, look again in the secondary one.
 * Diagnostics are advisory; only a real match resolves the fact.
 */
export async function verifyWithSecondary(
  fact: FailureFact,
  primaryRecords: readonly EventRecord[],
  secondary: EventSource
): Promise<FallbackOutcome> {
  const label = `failure '${fact.rawMessage}'`;
  const diagnostics: string[] = [];

  let secondaryRecords: EventRecord[];
  try {
    secondaryRecords = await secondary.listEvents(fact.namespace);
  } catch (err) {
    const error =
      err instanceof TransportError
        ? err
        : new TransportError(`listing ${secondary.kind} events in ${fact.namespace}: ${errorMessage(err)}`, fact.namespace);
    diagnostics.push(`${label}: no evidence in ${primaryRecords.length} primary events, secondary ${secondary.kind} source unavailable`);
    return { resolved: false, diagnostics, error };
  }

  if (findEvidence(fact, secondaryRecords)) {
    diagnostics.push(
      `${label} recovered: ${secondary.kind} source has node ${fact.node} at revision ${fact.targetRevision} ` +
        `but the primary source did not (${primaryRecords.length} primary vs ${secondaryRecords.length} ${secondary.kind} events in ${fact.namespace})`
    );
    return { resolved: true, diagnostics };
  }

  diagnostics.push(
    `${label}: no evidence in ${primaryRecords.length} primary or ${secondaryRecords.length} ${secondary.kind} events in ${fact.namespace}`
  );
  return { resolved: false, diagnostics };
}
