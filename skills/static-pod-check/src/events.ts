import { z } from "zod";
import type { EventRecord, EventSourceKind } from "./types.js";

const MetadataSchema = z
  .object({
    namespace: z.string().nullish(),
    creationTimestamp: z.string().nullish(),
  })
  .nullish();

// events.k8s.io/v1 Event
const StructuredEventSchema = z.object({
  reason: z.string().nullish(),
  note: z.string().nullish(),
  eventTime: z.string().nullish(),
  deprecatedLastTimestamp: z.string().nullish(),
  metadata: MetadataSchema,
});

// core/v1 Event
const CoreEventSchema = z.object({
  reason: z.string().nullish(),
  message: z.string().nullish(),
  lastTimestamp: z.string().nullish(),
  eventTime: z.string().nullish(),
  metadata: MetadataSchema,
});

const StructuredEventListSchema = z.object({ items: z.array(StructuredEventSchema).nullish() });
const CoreEventListSchema = z.object({ items: z.array(CoreEventSchema).nullish() });

export type StructuredEvent = z.infer<typeof StructuredEventSchema>;
export type CoreEvent = z.infer<typeof CoreEventSchema>;

function firstTimestamp(...candidates: Array<string | null | undefined>): string | undefined {
  return candidates.find((c): c is string => typeof c === "string" && c.length > 0);
}

export function fromStructuredEvent(event: StructuredEvent, namespace: string): EventRecord {
  return {
    reason: event.reason ?? "",
    text: event.note ?? "",
    namespace,
    source: "events",
    timestamp: firstTimestamp(event.eventTime, event.deprecatedLastTimestamp, event.metadata?.creationTimestamp),
  };
}

export function fromCoreEvent(event: CoreEvent, namespace: string): EventRecord {
  return {
    reason: event.reason ?? "",
    text: event.message ?? "",
    namespace,
    source: "core",
    timestamp: firstTimestamp(event.lastTimestamp, event.eventTime, event.metadata?.creationTimestamp),
  };
}

/**
 * Translate a `kubectl get ... -o json` event list into source-neutral records.
 * Throws on JSON that is not an event list; callers wrap that as a TransportError.
 */
export function parseEventList(kind: EventSourceKind, raw: string, namespace: string): EventRecord[] {
  const data: unknown = JSON.parse(raw);
  if (kind === "events") {
    const list = StructuredEventListSchema.parse(data);
    return (list.items ?? []).map((e) => fromStructuredEvent(e, namespace));
  }
  const list = CoreEventListSchema.parse(data);
  return (list.items ?? []).map((e) => fromCoreEvent(e, namespace));
}
