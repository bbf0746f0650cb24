import { ConnectionError, TransportError, errorMessage } from "../errors.js";
import { parseEventList } from "../events.js";
import type { ClusterClient, EventRecord, EventSource, EventSourceKind } from "../types.js";
import { classifyFailure, run, type ShellResult } from "./shell.js";

export type KubectlOptions = {
  kubeconfig?: string;
  context?: string;
  requestTimeoutSeconds?: number;
};

// Plain "events" resolves to the legacy core/v1 resource.
const EVENT_RESOURCE: Record<EventSourceKind, string> = {
  events: "events.v1.events.k8s.io",
  core: "events",
};

export async function kubectl(args: string[], opts: KubectlOptions = {}): Promise<ShellResult> {
  const global: string[] = [];
  if (opts.kubeconfig) global.push("--kubeconfig", opts.kubeconfig);
  if (opts.context) global.push("--context", opts.context);
  if (opts.requestTimeoutSeconds) global.push(`--request-timeout=${opts.requestTimeoutSeconds}s`);

  // Give kubectl a moment past its own request timeout before killing it.
  const timeoutMs = opts.requestTimeoutSeconds ? (opts.requestTimeoutSeconds + 10) * 1000 : undefined;
  return run("kubectl", [...global, ...args], { timeoutMs });
}

function remediationFor(result: ShellResult): string | undefined {
  switch (classifyFailure(result)) {
    case "not-found":
      return "Install kubectl, or pass --events-dir to read saved event dumps instead.";
    case "unauthorized":
      return "Refresh the credentials in your kubeconfig (or pass --kubeconfig/--context) and retry.";
    case "unreachable":
      return "Check that the API server is reachable: kubectl cluster-info";
    default:
      return undefined;
  }
}

export class KubectlEventSource implements EventSource {
  constructor(
    readonly kind: EventSourceKind,
    private readonly opts: KubectlOptions = {}
  ) {}

  async listEvents(namespace: string): Promise<EventRecord[]> {
    const resource = EVENT_RESOURCE[this.kind];
    const result = await kubectl(["get", resource, "-n", namespace, "-o", "json"], this.opts);
    if (!result.ok) {
      throw new TransportError(
        `listing ${resource} in ${namespace} failed: ${result.stderr || `kubectl exited with ${result.exitCode}`}`,
        namespace,
        remediationFor(result)
      );
    }

    try {
      return parseEventList(this.kind, result.stdout, namespace);
    } catch (err) {
      throw new TransportError(`unreadable ${resource} list for ${namespace}: ${errorMessage(err)}`, namespace);
    }
  }
}

/**
 * Build a client over the events API (primary) and the core API (secondary).
 * Fails fast with a ConnectionError if the API server does not answer.
 */
export async function newKubectlClient(opts: KubectlOptions = {}): Promise<ClusterClient> {
  let probe: ShellResult;
  try {
    probe = await kubectl(["version", "-o", "json"], opts);
  } catch (err) {
    throw new ConnectionError(`cannot reach cluster: ${errorMessage(err)}`);
  }
  if (!probe.ok) {
    throw new ConnectionError(
      `cannot reach cluster: ${probe.stderr || `kubectl exited with ${probe.exitCode}`}`,
      remediationFor(probe)
    );
  }

  return {
    primary: new KubectlEventSource("events", opts),
    secondary: new KubectlEventSource("core", opts),
    describe: `kubectl${opts.context ? ` (context ${opts.context})` : ""}`,
  };
}
