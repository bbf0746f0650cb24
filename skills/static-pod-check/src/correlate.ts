import { TransportError, errorMessage, type SoftError } from "./errors.js";
import { FAILURE_MARKER, extractFailure } from "./extract.js";
import { verifyWithSecondary } from "./fallback.js";
import { findEvidence } from "./recovery.js";
import {
  NOISY_REASON,
  type ClusterClient,
  type CorrelationResult,
  type EventRecord,
  type EventSource,
  type FailureFact,
  type Verdict,
} from "./types.js";

export type CorrelateOptions = {
  namespaces: readonly string[];
  verbose?: boolean;
};

async function listOrRecord(
  source: EventSource,
  namespace: string,
  softErrors: SoftError[]
): Promise<EventRecord[] | undefined> {
  try {
    return await source.listEvents(namespace);
  } catch (err) {
    softErrors.push(
      err instanceof TransportError
        ? err
        : new TransportError(`listing ${source.kind} events in ${namespace}: ${errorMessage(err)}`, namespace)
    );
    return undefined;
  }
}

/**
 * Find every static pod failure in the configured namespaces and decide, per
 * failure, whether the node later reached the revision it was waiting for.
 */
export async function correlate(client: ClusterClient, options: CorrelateOptions): Promise<CorrelationResult> {
  const verbose = options.verbose === true;
  const softErrors: SoftError[] = [];
  const facts: FailureFact[] = [];

  // 1. Collect failures
  for (const namespace of options.namespaces) {
    const records = await listOrRecord(client.primary, namespace, softErrors);
    if (!records) {
      if (verbose) console.error(`   ⚠️  Could not list events in ${namespace}, skipping`);
      continue;
    }

    for (const record of records) {
      if (record.reason === NOISY_REASON) continue;
      if (!record.text.includes(FAILURE_MARKER)) continue;

      const extracted = extractFailure(record.text);
      if (!extracted.ok) {
        softErrors.push(extracted.error);
        continue;
      }
      facts.push(extracted.fact);
    }
  }

  if (verbose) {
    console.error(`   Found ${facts.length} static pod failure(s) in ${options.namespaces.length} namespace(s)`);
  }

  // 2. Look for recovery. Events are listed again: more may have arrived since the first pass.
  const verdicts: Verdict[] = [];
  for (const fact of facts) {
    const primaryRecords = (await listOrRecord(client.primary, fact.namespace, softErrors)) ?? [];

    if (findEvidence(fact, primaryRecords)) {
      verdicts.push({ status: "resolved", fact, resolvedBy: client.primary.kind, diagnostics: [] });
      continue;
    }

    if (verbose) {
      console.error(`   primary (${client.primary.kind}) records for ${fact.namespace}: ${JSON.stringify(primaryRecords)}`);
    }

    const outcome = await verifyWithSecondary(fact, primaryRecords, client.secondary);
    if (outcome.error) softErrors.push(outcome.error);
    if (verbose) outcome.diagnostics.forEach((d) => console.error(`   ${d}`));

    verdicts.push(
      outcome.resolved
        ? { status: "resolved", fact, resolvedBy: client.secondary.kind, diagnostics: outcome.diagnostics }
        : { status: "unresolved", fact, diagnostics: outcome.diagnostics }
    );
  }

  return { verdicts, softErrors };
}
