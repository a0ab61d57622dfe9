/**
 * Lines the execution strategies write into the relay stream when they stop a
 * runner themselves. They are parsed back out of the captured output, so the
 * parser stays a function of the text alone.
 */

export type StopReason =
  | { kind: "timeout"; seconds: number }
  | { kind: "cancelled"; reason: string }
  | { kind: "cutoff"; failures: number };

const PREFIX = "[testrelay]";

export function markerLine(reason: StopReason): string {
  switch (reason.kind) {
    case "timeout":
      return `${PREFIX} timed out after ${reason.seconds}s`;
    case "cancelled":
      return `${PREFIX} cancelled: ${reason.reason}`;
    case "cutoff":
      return `${PREFIX} stopped after ${reason.failures} failures (max_failures=${reason.failures})`;
  }
}

const TIMEOUT_RE = /^\[testrelay\] timed out after (\d+(?:\.\d+)?)s$/;
const CANCELLED_RE = /^\[testrelay\] cancelled: (.*)$/;
const CUTOFF_RE = /^\[testrelay\] stopped after (\d+) failures/;

export interface DetectedMarkers {
  timeout: { seconds: number } | null;
  cancelled: { reason: string } | null;
  cutoff: { failures: number } | null;
}

export function isMarkerLine(line: string): boolean {
  return line.startsWith(`${PREFIX} `);
}

export function detectMarkers(lines: readonly string[]): DetectedMarkers {
  const found: DetectedMarkers = { timeout: null, cancelled: null, cutoff: null };
  for (const line of lines) {
    if (!isMarkerLine(line)) continue;
    const t = TIMEOUT_RE.exec(line);
    if (t) {
      found.timeout = { seconds: Number(t[1]) };
      continue;
    }
    const c = CANCELLED_RE.exec(line);
    if (c) {
      found.cancelled = { reason: c[1] ?? "" };
      continue;
    }
    const k = CUTOFF_RE.exec(line);
    if (k) found.cutoff = { failures: Number(k[1]) };
  }
  return found;
}

export function isStopReason(value: unknown): value is StopReason {
  if (typeof value !== "object" || value === null || !("kind" in value)) return false;
  if (value.kind === "timeout") return "seconds" in value && typeof value.seconds === "number";
  if (value.kind === "cancelled") return "reason" in value && typeof value.reason === "string";
  if (value.kind === "cutoff") return "failures" in value && typeof value.failures === "number";
  return false;
}

/** Reads an AbortSignal reason back as a StopReason. */
export function toStopReason(reason: unknown): StopReason {
  if (isStopReason(reason)) return reason;
  if (reason instanceof Error) return { kind: "cancelled", reason: reason.message };
  return { kind: "cancelled", reason: typeof reason === "string" ? reason : "aborted" };
}
