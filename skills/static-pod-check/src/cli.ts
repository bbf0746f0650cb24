import { runCheck } from "./check.js";
import { CheckInputSchema, type CheckInput } from "./schema.js";
import { showHelp } from "./tools/help.js";

export type CliEnv = Record<string, string | undefined>;

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (!a.startsWith("--")) continue;
    const key = a.slice(2);
    const val = argv[i + 1] && !argv[i + 1].startsWith("--") ? argv[++i] : "true";
    out[key] = val;
  }
  return out;
}

/**
 * Map CLI flags and environment variables to check input; flags win.
 * KUBECONFIG is left to kubectl, which reads it (path list and all) from the
 * inherited environment.
 */
export function toCheckInput(args: Record<string, string>, env: CliEnv): CheckInput {
  return {
    namespaces: args["namespaces"] || env.STATIC_POD_NAMESPACES || undefined,
    kubeconfig: args["kubeconfig"] || undefined,
    context: args["context"] || env.KUBE_CONTEXT || undefined,
    eventsDir: args["events-dir"] || env.EVENTS_DIR || undefined,
    testName: args["test-name"],
    junitPath: args["junit"],
    overwriteJunit: args["overwrite-junit"] !== "false",
    requestTimeoutSeconds: args["request-timeout"],
    verbose: args["verbose"] === "true",
  };
}

async function execCheck(args: Record<string, string>, env: CliEnv): Promise<number> {
  const result = await runCheck(toCheckInput(args, env));
  console.log(JSON.stringify(result, null, 2));
  if (!result.passed) {
    console.error(`\n❌ ${result.name} failed:`);
    result.failureDetail.split("\n").forEach((line) => console.error(`  - ${line}`));
    return 1;
  }
  console.error(`\n✓ ${result.name} passed`);
  return 0;
}

function execNamespaces(args: Record<string, string>, env: CliEnv): number {
  const config = CheckInputSchema.parse(toCheckInput(args, env));
  config.namespaces.forEach((ns) => console.log(ns));
  return 0;
}

/**
 * Run one podcheck command and return its exit code.
 */
export async function executeCommand(
  command: string,
  args: Record<string, string>,
  env: CliEnv,
  helpTopic?: string
): Promise<number> {
  switch (command) {
    case "check":
      return execCheck(args, env);

    case "namespaces":
      return execNamespaces(args, env);

    case "help":
      return showHelp(helpTopic) ? 0 : 1;

    default:
      console.error(`Unknown command: ${command}`);
      console.error("Run 'podcheck help' for available commands");
      return 1;
  }
}
