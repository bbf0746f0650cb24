import { TransportError } from "../src/errors.js";
import type { ClusterClient, EventRecord, EventSource, EventSourceKind } from "../src/types.js";

export const ETCD_NS = "openshift-etcd-operator";
export const APISERVER_NS = "openshift-kube-apiserver-operator";

export function failureNote(opts: { namespace?: string; revision?: string | number; node?: string } = {}): string {
  const namespace = opts.namespace ?? ETCD_NS;
  const revision = opts.revision ?? 6;
  const node = opts.node ?? "node-1";
  return `static pod lifecycle failure - static pod: "etcd" in namespace: "${namespace}" for revision: ${revision} on node: "${node}" didn't show up, waited: 2m30s`;
}

export function recoveryNote(node: string, from: number, to: number): string {
  return `Updated node "${node}" from revision ${from} to ${to} because static pod is ready`;
}

export function record(reason: string, text: string, namespace = ETCD_NS, source: EventSourceKind = "events"): EventRecord {
  return { reason, text, namespace, source };
}

/**
 * In-process event source. Namespaces listed in `failing` reject with a
 * TransportError; every call is recorded in `calls`.
 */
export class MemoryEventSource implements EventSource {
  readonly calls: string[] = [];
  private readonly failing: Set<string>;

  constructor(
    readonly kind: EventSourceKind,
    private readonly byNamespace: Record<string, EventRecord[]>,
    failing: string[] = []
  ) {
    this.failing = new Set(failing);
  }

  async listEvents(namespace: string): Promise<EventRecord[]> {
    this.calls.push(namespace);
    if (this.failing.has(namespace)) {
      throw new TransportError(`${namespace} (${this.kind}): connection reset`, namespace);
    }
    return [...(this.byNamespace[namespace] ?? [])];
  }
}

export function memoryClient(primary: MemoryEventSource, secondary: MemoryEventSource): ClusterClient {
  return { primary, secondary, describe: "memory" };
}
