import type { ConnectionError, SoftError } from "./errors.js";
import type { TestResult, Verdict } from "./types.js";

export type ReportInput = {
  name: string;
  verdicts: readonly Verdict[];
  softErrors: readonly SoftError[];
  fatalErrors?: readonly ConnectionError[];
};

/**
 * Fold a correlation run into one pass/fail result. Soft errors alone do not
 * fail the check; they ride along in systemOut and, on failure, in the detail.
 */
export function buildTestResult(input: ReportInput): TestResult {
  const fatal = (input.fatalErrors ?? []).map((e) => e.message);
  const soft = input.softErrors.map((e) => e.message);
  const unresolved = input.verdicts.filter((v) => v.status === "unresolved").map((v) => v.fact.rawMessage);
  const diagnostics = input.verdicts.flatMap((v) => v.diagnostics);

  const passed = fatal.length === 0 && unresolved.length === 0;
  return {
    name: input.name,
    passed,
    failureDetail: passed ? "" : [...fatal, ...soft, ...unresolved].join("\n"),
    systemOut: [...fatal, ...soft, ...diagnostics].join("\n"),
  };
}

function escapeXml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export function renderJUnit(result: TestResult, suiteName = "static-pod-check"): string {
  const lines = [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<testsuite name="${escapeXml(suiteName)}" tests="1" failures="${result.passed ? 0 : 1}">`,
    `  <testcase name="${escapeXml(result.name)}">`,
  ];
  if (!result.passed) {
    lines.push(`    <failure>${escapeXml(result.failureDetail)}</failure>`);
  }
  if (result.systemOut) {
    lines.push(`    <system-out>${escapeXml(result.systemOut)}</system-out>`);
  }
  lines.push(`  </testcase>`, `</testsuite>`);
  return lines.join("\n") + "\n";
}
