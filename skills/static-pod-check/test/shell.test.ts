import { describe, it, expect } from "vitest";
import { execCmd } from "../src/tools/exec.js";
import { classifyFailure, type ShellResult } from "../src/tools/shell.js";

function failed(stderr: string, exitCode = 1): ShellResult {
  return { ok: false, exitCode, stdout: "", stderr };
}

describe("classifyFailure", () => {
  it("recognizes a missing binary by exit code", () => {
    expect(classifyFailure(failed("", 127))).toBe("not-found");
  });

  it("recognizes expired or missing credentials", () => {
    expect(classifyFailure(failed("error: You must be logged in to the server (Unauthorized)"))).toBe("unauthorized");
    expect(classifyFailure(failed("the server has asked for the client to provide credentials"))).toBe("unauthorized");
  });

  it("recognizes an unreachable API server", () => {
    expect(classifyFailure(failed("Unable to connect to the server: dial tcp: lookup api.ci.example: no such host"))).toBe(
      "unreachable"
    );
    expect(classifyFailure(failed("context deadline exceeded"))).toBe("unreachable");
  });

  it("falls back to other", () => {
    expect(classifyFailure(failed('error: the server doesn\'t have a resource type "events"'))).toBe("other");
  });
});

describe("execCmd", () => {
  it("resolves with exit code 127 when the command does not exist", async () => {
    const res = await execCmd("podcheck-no-such-binary", ["version"]);
    expect(res).toEqual({
      code: 127,
      stdout: "",
      stderr: "Command not found: podcheck-no-such-binary. Install it and make sure it is on PATH.",
    });
  });
});
