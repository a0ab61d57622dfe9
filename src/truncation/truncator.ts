import type { OutcomeCounts, TestOutcome } from "../core/testRun.js";
import { normalizeOutput } from "../parsing/normalize.js";
import { approximateTokens, type TokenCounter } from "./tokenCounter.js";

export const TRUNCATION_MARKER = "... [output truncated] ...";

export interface TruncationResult {
  outcome: TestOutcome;
  /** Plain-text rendering of the bounded payload. */
  text: string;
}

export function countsLine(counts: OutcomeCounts): string {
  return `passed=${counts.passed} failed=${counts.failed} errored=${counts.errored} skipped=${counts.skipped} xfailed=${counts.xfailed}`;
}

export function failingLine(entry: { testId: string; shortMessage: string }): string {
  return `${entry.testId} - ${entry.shortMessage}`;
}

/** Size of a bounded outcome: summary, counts, each failing entry and each detail line. */
export function measurePayload(outcome: TestOutcome, counter: TokenCounter = approximateTokens): number {
  let total = counter(outcome.summaryText) + counter(countsLine(outcome.counts));
  for (const f of outcome.failingTests) total += counter(failingLine(f));
  if (outcome.details) {
    for (const line of outcome.details.split("\n")) total += counter(line);
  }
  return total;
}

/** Line indexes alternating from both ends: 0, n-1, 1, n-2, ... */
function headTailOrder(n: number): number[] {
  const order: number[] = [];
  for (let lo = 0, hi = n - 1; lo <= hi; lo++, hi--) {
    order.push(lo);
    if (hi !== lo) order.push(hi);
  }
  return order;
}

function renderWindow(lines: readonly string[], kept: ReadonlySet<number>): string {
  if (kept.size === lines.length) return lines.join("\n");
  const head: string[] = [];
  const tail: string[] = [];
  let inHead = true;
  for (let i = 0; i < lines.length; i++) {
    if (!kept.has(i)) {
      inHead = false;
      continue;
    }
    (inHead ? head : tail).push(lines[i] ?? "");
  }
  return [...head, TRUNCATION_MARKER, ...tail].join("\n");
}

/**
 * Bounds an outcome to `budget` tokens. Counts and summary are always kept;
 * then the longest prefix of failing tests that fits; then raw output lines
 * taken alternately from head and tail. Everything kept is a prefix of one
 * fixed priority order, so a smaller budget never yields a larger payload.
 */
export function truncate(
  outcome: TestOutcome,
  rawOutput: string,
  budget: number,
  counter: TokenCounter = approximateTokens
): TruncationResult {
  let remaining = budget - counter(outcome.summaryText) - counter(countsLine(outcome.counts));

  const keptFailures: TestOutcome["failingTests"] = [];
  for (const f of outcome.failingTests) {
    const cost = counter(failingLine(f));
    if (cost > remaining) break;
    keptFailures.push(f);
    remaining -= cost;
  }
  const allFailuresKept = keptFailures.length === outcome.failingTests.length;

  const lines = normalizeOutput(rawOutput);
  let details = "";
  let allLinesKept = lines.length === 0;

  if (allFailuresKept && lines.length > 0) {
    const fullCost = lines.reduce((sum, l) => sum + counter(l), 0);
    if (fullCost <= remaining) {
      details = lines.join("\n");
      allLinesKept = true;
    } else {
      let windowBudget = remaining - counter(TRUNCATION_MARKER);
      const kept = new Set<number>();
      for (const idx of headTailOrder(lines.length)) {
        const cost = counter(lines[idx] ?? "");
        if (cost > windowBudget) break;
        kept.add(idx);
        windowBudget -= cost;
      }
      if (kept.size > 0) details = renderWindow(lines, kept);
    }
  }

  const truncated = !allFailuresKept || !allLinesKept;
  const bounded: TestOutcome = {
    counts: { ...outcome.counts },
    failingTests: keptFailures,
    summaryText: outcome.summaryText,
    details,
    truncated
  };

  return { outcome: bounded, text: renderOutcome(bounded) };
}

/** Plain-text form of an outcome: summary, counts, failing tests, then the output window. */
export function renderOutcome(outcome: TestOutcome): string {
  return [
    outcome.summaryText,
    countsLine(outcome.counts),
    ...outcome.failingTests.map(failingLine),
    ...(outcome.details ? ["", outcome.details] : [])
  ].join("\n");
}
