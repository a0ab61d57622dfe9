import { promises as fs } from "fs";
import path from "path";
import type { RunId } from "../core/ids.js";

export function safeJoin(baseDir: string, name: string): string {
  const joined = path.join(baseDir, name);
  const rel = path.relative(baseDir, joined);
  if (rel.startsWith("..") || path.isAbsolute(rel)) {
    throw new Error(`unsafe workspace path: ${name}`);
  }
  return joined;
}

/** Writes the full, untruncated output of a run to `<runsDir>/<runId>/output.log`; returns the file path. */
export async function writeOutputLog(runsDir: string, runId: RunId, text: string): Promise<string> {
  const root = path.resolve(runsDir, runId);
  await fs.mkdir(root, { recursive: true });
  const logPath = safeJoin(root, "output.log");
  await fs.writeFile(logPath, text, "utf8");
  return logPath;
}
