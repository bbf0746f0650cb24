import { execCmd, type ExecOptions } from "./exec.js";

export type ShellResult = {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type FailureKind = "unauthorized" | "unreachable" | "not-found" | "other";

/**
 * Rough classification of a failed kubectl call, used to pick a remediation hint.
 */
export function classifyFailure(result: ShellResult): FailureKind {
  const { stderr } = result;
  if (result.exitCode === 127) return "not-found";
  if (stderr.includes("Unauthorized") || stderr.includes("asked for the client to provide credentials") || stderr.includes("Forbidden")) {
    return "unauthorized";
  }
  if (
    stderr.includes("Unable to connect to the server") ||
    stderr.includes("Kubernetes cluster unreachable") ||
    stderr.includes("connection refused") ||
    stderr.includes("context deadline exceeded") ||
    stderr.includes("timed out")
  ) {
    return "unreachable";
  }
  return "other";
}

export async function run(cmd: string, args: string[], opts?: ExecOptions): Promise<ShellResult> {
  const result = await execCmd(cmd, args, opts);
  return {
    ok: result.code === 0,
    exitCode: result.code,
    stdout: result.stdout,
    stderr: result.stderr,
  };
}
