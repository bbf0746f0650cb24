/**
 * Show general help or command-specific help. Returns false for an unknown command.
 */
export function showHelp(command?: string): boolean {
  if (!command) {
    showGeneralHelp();
    return true;
  }

  const helpText = getCommandHelp(command);
  if (!helpText) {
    console.error(`Unknown command: ${command}`);
    console.error("Run 'podcheck help' to see all commands");
    return false;
  }

  console.error(helpText.trim());
  return true;
}

function showGeneralHelp() {
  console.error("Static Pod Lifecycle Check");
  console.error("=".repeat(60));
  console.error("");
  console.error("Usage:");
  console.error("  podcheck [command] [options]");
  console.error("");
  console.error("Commands:");
  console.error("  check (default)  Decide whether static pod failures recovered");
  console.error("  namespaces       Print the namespaces that will be scanned");
  console.error("  help [cmd]       Show help for command");
  console.error("");
  console.error("Examples:");
  console.error("  podcheck                               # Check the current kube context");
  console.error("  podcheck --events-dir ./must-gather    # Check saved event dumps");
  console.error("  podcheck --junit out/junit_static_pod.xml");
  console.error("");
  console.error("For detailed help on a command: podcheck help <command>");
}

function getCommandHelp(command: string): string | null {
  const helpTexts: Record<string, string> = {
    check: `
podcheck check - Decide whether static pod failures recovered

Description:
  Lists events in each watched namespace, picks out installer notes of the form
  "static pod lifecycle failure ... didn't show up", and looks for a later
  NodeCurrentRevisionChanged event showing the node reached that exact revision.
  The events.k8s.io API is searched first; the core events API is the fallback.

  Prints the result as JSON on stdout. Exit code 0 on pass, 1 on failure.

Options:
  --namespaces <a,b>      Namespaces to scan (default: the four static pod operators)
  --kubeconfig <path>     kubeconfig file to use (otherwise kubectl reads $KUBECONFIG)
  --context <name>        kube context to use
  --events-dir <dir>      Read <ns>.events.json / <ns>.core-events.json instead of kubectl
  --junit <path>          Also write a JUnit XML report
  --overwrite-junit false Keep an existing JUnit file
  --test-name <name>      Test case name in the report
  --request-timeout <s>   Per-request timeout for kubectl (default: 120)
  --verbose               Dump events and reconciliation notes to stderr

Example:
  podcheck check --context ci --junit artifacts/junit_static_pods.xml
`,
    namespaces: `
podcheck namespaces - Print the namespaces that will be scanned

Description:
  Resolves --namespaces / STATIC_POD_NAMESPACES against the defaults and prints
  one namespace per line.
`,
  };

  return helpTexts[command] || null;
}
