import { isMarkerLine } from "./markers.js";

const EXCEPTION_LINE = /^(?:[A-Za-z_][\w]*\.)*[A-Za-z_]\w*(?:Error|Exception|Exit|Interrupt)(?::\s.*)?$/;

/** Best single-line description of a runner that died before reporting. */
export function crashMessage(runner: string, lines: readonly string[], exitCode: number | null): string {
  const meaningful = lines.filter((l) => l.trim().length > 0 && !isMarkerLine(l));

  for (let i = meaningful.length - 1; i >= 0; i--) {
    const line = meaningful[i]?.trim();
    if (line && EXCEPTION_LINE.test(line)) return line;
  }

  const last = meaningful[meaningful.length - 1];
  if (last !== undefined) return last.trim();
  return `${runner} exited with code ${exitCode ?? "unknown"}`;
}
