import { describe, it, expect } from "vitest";
import { findEvidence, isRecoveryEvidence, reachedRevision } from "../src/recovery.js";
import { REVISION_CHANGED_REASON, type FailureFact } from "../src/types.js";
import { recoveryNote, record } from "./helpers.js";

const fact: FailureFact = {
  namespace: "openshift-etcd-operator",
  node: "node-1",
  targetRevision: 6,
  rawMessage: "static pod lifecycle failure - ...",
};

describe("reachedRevision", () => {
  it("reads the revision from a static pod ready note", () => {
    expect(reachedRevision(recoveryNote("node-1", 5, 6))).toBe(6);
    expect(reachedRevision(recoveryNote("node-1", 9, 10))).toBe(10);
  });

  it("is undefined for other notes", () => {
    expect(reachedRevision("Updated node \"node-1\" from revision 5 to 6")).toBeUndefined();
  });

  it("is undefined for a revision too large to compare exactly", () => {
    expect(reachedRevision('Updated node "node-1" from revision 5 to 9007199254740993 because static pod is ready')).toBeUndefined();
  });
});

describe("isRecoveryEvidence", () => {
  it("matches when reason, node and revision all line up", () => {
    expect(isRecoveryEvidence(fact, record(REVISION_CHANGED_REASON, recoveryNote("node-1", 5, 6)))).toBe(true);
  });

  it("rejects a different reason", () => {
    expect(isRecoveryEvidence(fact, record("RevisionTriggered", recoveryNote("node-1", 5, 6)))).toBe(false);
  });

  it("rejects a note for a different node", () => {
    expect(isRecoveryEvidence(fact, record(REVISION_CHANGED_REASON, recoveryNote("node-2", 5, 6)))).toBe(false);
  });

  it("rejects a note without the static pod ready clause", () => {
    expect(
      isRecoveryEvidence(fact, record(REVISION_CHANGED_REASON, 'Updated node "node-1" from revision 5 to 6 because new revision'))
    ).toBe(false);
  });

  it("requires the exact revision", () => {
    expect(isRecoveryEvidence(fact, record(REVISION_CHANGED_REASON, recoveryNote("node-1", 6, 7)))).toBe(false);
    expect(isRecoveryEvidence(fact, record(REVISION_CHANGED_REASON, recoveryNote("node-1", 4, 5)))).toBe(false);
  });

  it("does not match two large revisions that round to the same number", () => {
    const large: FailureFact = { ...fact, targetRevision: 9007199254740992 };
    const note = 'Updated node "node-1" from revision 5 to 9007199254740993 because static pod is ready';
    expect(isRecoveryEvidence(large, record(REVISION_CHANGED_REASON, note))).toBe(false);
  });

  it("matches the node as a substring of the note", () => {
    expect(isRecoveryEvidence(fact, record(REVISION_CHANGED_REASON, recoveryNote("node-10", 5, 6)))).toBe(true);
  });
});

describe("findEvidence", () => {
  it("is false for no records", () => {
    expect(findEvidence(fact, [])).toBe(false);
  });

  it("is true when any one record matches", () => {
    const records = [
      record("OperatorStatusChanged", "Status for clusteroperator/etcd changed"),
      record(REVISION_CHANGED_REASON, recoveryNote("node-2", 5, 6)),
      record(REVISION_CHANGED_REASON, recoveryNote("node-1", 5, 6)),
    ];
    expect(findEvidence(fact, records)).toBe(true);
  });

  it("is false when records only satisfy two conditions each", () => {
    const records = [
      record("RevisionTriggered", recoveryNote("node-1", 5, 6)),
      record(REVISION_CHANGED_REASON, recoveryNote("node-2", 5, 6)),
      record(REVISION_CHANGED_REASON, recoveryNote("node-1", 6, 7)),
    ];
    expect(findEvidence(fact, records)).toBe(false);
  });
});
