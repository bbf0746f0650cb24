import { describe, it, expect } from "vitest";
import { CheckInputSchema } from "../src/schema.js";
import { DEFAULT_STATIC_POD_NAMESPACES, TEST_NAME } from "../src/types.js";

describe("CheckInputSchema", () => {
  it("fills in defaults", () => {
    expect(CheckInputSchema.parse({})).toEqual({
      namespaces: [...DEFAULT_STATIC_POD_NAMESPACES],
      testName: TEST_NAME,
      overwriteJunit: true,
      requestTimeoutSeconds: 120,
      verbose: false,
    });
  });

  it("splits and de-duplicates a comma separated namespace list", () => {
    const config = CheckInputSchema.parse({ namespaces: "openshift-etcd-operator, custom-operator,openshift-etcd-operator" });
    expect(config.namespaces).toEqual(["openshift-etcd-operator", "custom-operator"]);
  });

  it("accepts an array of namespaces", () => {
    expect(CheckInputSchema.parse({ namespaces: ["a", "b"] }).namespaces).toEqual(["a", "b"]);
  });

  it("coerces the request timeout from a flag string", () => {
    expect(CheckInputSchema.parse({ requestTimeoutSeconds: "45" }).requestTimeoutSeconds).toBe(45);
  });

  it("rejects a non-numeric or non-positive timeout", () => {
    expect(CheckInputSchema.safeParse({ requestTimeoutSeconds: "soon" }).success).toBe(false);
    expect(CheckInputSchema.safeParse({ requestTimeoutSeconds: 0 }).success).toBe(false);
  });
});
