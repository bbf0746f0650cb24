#!/usr/bin/env node

import { ZodError } from "zod";
import { executeCommand, parseArgs } from "../src/cli.js";
import { showHelp } from "../src/tools/help.js";

const first = process.argv[2];
const explicit = first && !first.startsWith("--") ? first : undefined;
const command = explicit ?? "check";
const args = parseArgs(process.argv.slice(2));

if (args["help"] === "true") {
  process.exit(showHelp(explicit) ? 0 : 1);
}

try {
  process.exit(await executeCommand(command, args, process.env, process.argv[3]));
} catch (err) {
  if (err instanceof ZodError) {
    console.error("❌ Invalid options:");
    err.issues.forEach((i) => console.error(`  - ${i.path.join(".") || "input"}: ${i.message}`));
  } else {
    console.error(`❌ ${err instanceof Error ? err.message : String(err)}`);
  }
  process.exit(1);
}
