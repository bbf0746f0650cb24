import { correlate } from "./correlate.js";
import { ConnectionError } from "./errors.js";
import { buildTestResult, renderJUnit } from "./report.js";
import { CheckInputSchema, type CheckConfig, type CheckInput } from "./schema.js";
import { newFileClient } from "./tools/events-file.js";
import { writeReportFile } from "./tools/file.js";
import { newKubectlClient } from "./tools/kubectl.js";
import type { ClusterClient, TestResult } from "./types.js";

export async function newClient(config: CheckConfig): Promise<ClusterClient> {
  if (config.eventsDir) {
    return newFileClient(config.eventsDir);
  }
  return newKubectlClient({
    kubeconfig: config.kubeconfig,
    context: config.context,
    requestTimeoutSeconds: config.requestTimeoutSeconds,
  });
}

async function scan(config: CheckConfig): Promise<TestResult> {
  let client: ClusterClient;
  try {
    client = await newClient(config);
  } catch (err) {
    if (!(err instanceof ConnectionError)) throw err;
    console.error(`❌ ${err.message}`);
    if (err.remediation) console.error(`   ${err.remediation}`);
    return buildTestResult({ name: config.testName, verdicts: [], softErrors: [], fatalErrors: [err] });
  }

  console.error(`⏳ Scanning ${config.namespaces.length} namespace(s) via ${client.describe}...`);
  const { verdicts, softErrors } = await correlate(client, {
    namespaces: config.namespaces,
    verbose: config.verbose,
  });

  for (const e of softErrors) {
    console.error(`   ⚠️  ${e.message}`);
    if (e.remediation) console.error(`      ${e.remediation}`);
  }
  const unresolved = verdicts.filter((v) => v.status === "unresolved").length;
  console.error(`✓ ${verdicts.length} static pod failure(s) checked, ${unresolved} unresolved, ${softErrors.length} warning(s)`);

  return buildTestResult({ name: config.testName, verdicts, softErrors });
}

/**
 * Decide whether every "static pod didn't show up" failure in the watched
 * namespaces eventually recovered. Always resolves to a single pass/fail result;
 * only an unreachable cluster short-circuits the run.
 */
export async function runCheck(input: CheckInput = {}): Promise<TestResult> {
  const config = CheckInputSchema.parse(input);
  const result = await scan(config);

  if (config.junitPath) {
    const written = await writeReportFile(config.junitPath, renderJUnit(result), config.overwriteJunit);
    if (written.ok) {
      console.error(`✓ JUnit report written to ${config.junitPath}`);
    } else {
      console.error(`⚠️  ${written.error}`);
    }
  }

  return result;
}
