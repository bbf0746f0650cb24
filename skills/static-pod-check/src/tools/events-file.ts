import { existsSync, statSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ConnectionError, TransportError, errorMessage } from "../errors.js";
import { parseEventList } from "../events.js";
import type { ClusterClient, EventRecord, EventSource, EventSourceKind } from "../types.js";

const FILE_SUFFIX: Record<EventSourceKind, string> = {
  events: "events.json",
  core: "core-events.json",
};

export function dumpPath(dir: string, namespace: string, kind: EventSourceKind): string {
  return join(dir, `${namespace}.${FILE_SUFFIX[kind]}`);
}

/**
 * Reads `kubectl get ... -o json` output saved per namespace, e.g.
 *   openshift-etcd-operator.events.json       (events.k8s.io/v1)
 *   openshift-etcd-operator.core-events.json  (core/v1)
 */
export class FileEventSource implements EventSource {
  constructor(
    readonly kind: EventSourceKind,
    private readonly dir: string
  ) {}

  async listEvents(namespace: string): Promise<EventRecord[]> {
    const path = dumpPath(this.dir, namespace, this.kind);
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      throw new TransportError(`reading ${path}: ${errorMessage(err)}`, namespace);
    }

    try {
      return parseEventList(this.kind, raw, namespace);
    } catch (err) {
      throw new TransportError(`unreadable event dump ${path}: ${errorMessage(err)}`, namespace);
    }
  }
}

export async function newFileClient(dir: string): Promise<ClusterClient> {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new ConnectionError(`event dump directory not found: ${dir}`, "Pass --events-dir pointing at a directory of saved event lists.");
  }
  return {
    primary: new FileEventSource("events", dir),
    secondary: new FileEventSource("core", dir),
    describe: `event dumps in ${dir}`,
  };
}
