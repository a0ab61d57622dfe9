import type { FailingTest, OutcomeCounts } from "../core/testRun.js";
import { zeroCounts } from "../core/testRun.js";
import type { ProgressEntry, TestResult } from "./types.js";

export function formatCounts(counts: OutcomeCounts, seconds: string | null): string {
  const parts: string[] = [];
  if (counts.failed) parts.push(`${counts.failed} failed`);
  if (counts.passed) parts.push(`${counts.passed} passed`);
  if (counts.skipped) parts.push(`${counts.skipped} skipped`);
  if (counts.xfailed) parts.push(`${counts.xfailed} xfailed`);
  if (counts.errored) parts.push(`${counts.errored} ${counts.errored === 1 ? "error" : "errors"}`);
  const head = parts.length ? parts.join(", ") : "no tests ran";
  return seconds === null ? head : `${head} in ${seconds}s`;
}

export function countsFromProgress(progress: readonly ProgressEntry[]): OutcomeCounts {
  const last = new Map<string, TestResult>();
  for (const entry of progress) {
    if (entry.result) last.set(entry.testId, entry.result);
  }
  const counts = zeroCounts();
  for (const result of last.values()) {
    if (result === "passed") counts.passed++;
    else if (result === "failed") counts.failed++;
    else if (result === "errored") counts.errored++;
    else if (result === "skipped") counts.skipped++;
    else counts.xfailed++;
  }
  return counts;
}

/** The test the runner was executing when its output stopped, if any. */
export function inFlightTest(progress: readonly ProgressEntry[]): string | null {
  const last = progress[progress.length - 1];
  if (!last || last.result !== null) return null;
  const finished = progress.some((p) => p.testId === last.testId && p.result !== null);
  return finished ? null : last.testId;
}

type FailureKind = "failed" | "errored";

/** Failing tests keyed by id, kept in order of first appearance. */
export class FailureCollector {
  private readonly order: string[] = [];
  private readonly entries = new Map<string, { kind: FailureKind; message: string | null }>();

  note(testId: string, kind: FailureKind, message: string | null = null): void {
    const existing = this.entries.get(testId);
    if (!existing) {
      this.order.push(testId);
      this.entries.set(testId, { kind, message });
      return;
    }
    if (kind === "errored") existing.kind = kind;
    if (message && !existing.message) existing.message = message;
  }

  has(testId: string): boolean {
    return this.entries.has(testId);
  }

  ids(): string[] {
    return [...this.order];
  }

  setMessage(testId: string, message: string): void {
    const existing = this.entries.get(testId);
    if (existing && !existing.message) existing.message = message;
  }

  toFailingTests(): FailingTest[] {
    return this.order.map((testId) => {
      const entry = this.entries.get(testId);
      const fallback = entry?.kind === "errored" ? "error" : "failed";
      return { testId, shortMessage: entry?.message ?? fallback };
    });
  }
}

export function clipMessage(message: string, max = 200): string {
  const oneLine = message.trim().replace(/\s+/g, " ");
  return oneLine.length > max ? `${oneLine.slice(0, max - 3)}...` : oneLine;
}
