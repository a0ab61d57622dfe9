// CSI sequences (colors, cursor movement) and OSC sequences terminated by BEL or ST.
const ANSI_PATTERN = /\u001b\[[0-?]*[ -/]*[@-~]|\u001b\][^\u0007\u001b]*(?:\u0007|\u001b\\)|\u001b[@-Z\\-_]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, "");
}

/**
 * Normalizes one physical line: ANSI codes removed and, for progress bars that
 * redraw with a bare carriage return, only the text after the last `\r` kept.
 */
export function normalizeLine(line: string): string {
  const clean = stripAnsi(line).replace(/\r+$/, "");
  const lastCr = clean.lastIndexOf("\r");
  const visible = lastCr >= 0 ? clean.slice(lastCr + 1) : clean;
  return visible.trimEnd();
}

export function normalizeOutput(text: string): string[] {
  if (!text) return [];
  const lines = text.split("\n").map(normalizeLine);
  while (lines.length > 0 && lines[lines.length - 1] === "") lines.pop();
  return lines;
}
