import { spawn } from "node:child_process";
import { startSpinner, stopSpinner } from "./spinner.js";

export type ExecResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  env?: Record<string, string>;
  timeoutMs?: number;
};

const DEFAULT_TIMEOUT_MS = 2 * 60 * 1000;

/**
 * Spawn a command and collect its output. A missing binary resolves with exit
 * code 127 instead of rejecting; a command that outlives `timeoutMs` is killed.
 */
export function execCmd(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(cmd, args, {
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
    });

    const timeoutMs = opts?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    let timedOut = false;
    const killTimeout = setTimeout(() => {
      if (child.kill()) {
        timedOut = true;
        console.error(`\n❌ Command timed out after ${timeoutMs / 1000}s and was killed: ${cmd} ${args.join(" ")}`);
      }
    }, timeoutMs);

    startSpinner(`Running ${cmd} ${args.slice(0, 2).join(" ")}${args.length > 2 ? "..." : ""}`);

    let stdout = "";
    let stderr = "";
    child.stdout.on("data", (d: Buffer) => (stdout += d.toString()));
    child.stderr.on("data", (d: Buffer) => (stderr += d.toString()));

    child.on("error", (err: NodeJS.ErrnoException) => {
      clearTimeout(killTimeout);
      stopSpinner();
      if (err.code === "ENOENT") {
        resolve({ code: 127, stdout: "", stderr: `Command not found: ${cmd}. Install it and make sure it is on PATH.` });
      } else {
        reject(err);
      }
    });

    child.on("close", (code) => {
      clearTimeout(killTimeout);
      stopSpinner();
      resolve({
        code: code ?? 1,
        stdout: stdout.trim(),
        stderr: timedOut ? `timed out after ${timeoutMs / 1000}s` : stderr.trim(),
      });
    });
  });
}
