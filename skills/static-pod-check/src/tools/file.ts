import { existsSync } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { errorMessage } from "../errors.js";

export async function writeReportFile(path: string, contents: string, overwrite: boolean) {
  if (existsSync(path) && !overwrite) {
    return { ok: false as const, error: `Report file already exists: ${path}. Use --overwrite-junit to replace.` };
  }
  try {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, contents, "utf8");
  } catch (err) {
    return { ok: false as const, error: `Could not write report file ${path}: ${errorMessage(err)}` };
  }
  return { ok: true as const };
}
