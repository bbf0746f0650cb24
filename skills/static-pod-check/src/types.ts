import type { SoftError } from "./errors.js";

export const TEST_NAME = "[sig-node] static pods should start after being created";

export const DEFAULT_STATIC_POD_NAMESPACES = [
  "openshift-etcd-operator",
  "openshift-kube-apiserver-operator",
  "openshift-kube-controller-manager-operator",
  "openshift-kube-scheduler-operator",
] as const;

export const NOISY_REASON = "OperatorStatusChanged";
export const REVISION_CHANGED_REASON = "NodeCurrentRevisionChanged";

// "events" is events.k8s.io/v1 (text in `note`), "core" is the legacy v1 Event (text in `message`)
export type EventSourceKind = "events" | "core";

export type EventRecord = {
  reason: string;
  text: string;
  namespace: string;
  source: EventSourceKind;
  timestamp?: string;
};

export interface EventSource {
  readonly kind: EventSourceKind;
  /** Rejects with a TransportError when the listing fails. */
  listEvents(namespace: string): Promise<EventRecord[]>;
}

export type ClusterClient = {
  primary: EventSource;
  secondary: EventSource;
  describe: string;
};

export type FailureFact = Readonly<{
  namespace: string;
  node: string;
  targetRevision: number;
  rawMessage: string;
}>;

export type Verdict =
  | { status: "resolved"; fact: FailureFact; resolvedBy: EventSourceKind; diagnostics: string[] }
  | { status: "unresolved"; fact: FailureFact; diagnostics: string[] };

export type CorrelationResult = {
  verdicts: Verdict[];
  softErrors: SoftError[];
};

export type TestResult = {
  name: string;
  passed: boolean;
  failureDetail: string;
  systemOut: string;
};
