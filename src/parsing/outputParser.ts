import { ParseError } from "../core/errors.js";
import type { FailingTest, RunnerKind, TestOutcome } from "../core/testRun.js";
import { totalTests, zeroCounts } from "../core/testRun.js";
import { countsFromProgress, formatCounts, inFlightTest } from "../runners/common.js";
import { runnerDefinition } from "../runners/registry.js";
import { crashMessage } from "./crash.js";
import { detectMarkers } from "./markers.js";
import { normalizeOutput } from "./normalize.js";

export type ParseVerdict = "tests_ran" | "no_tests" | "collection_error" | "crashed";

export interface ParseResult {
  verdict: ParseVerdict;
  /** Untruncated: `details` is empty until the truncator fills it. */
  outcome: TestOutcome;
}

export const UNKNOWN_TEST_ID = "<unknown>";

function bareOutcome(summaryText: string): TestOutcome {
  return { counts: zeroCounts(), failingTests: [], summaryText, details: "", truncated: false };
}

/**
 * Turns captured runner output into a TestOutcome. Pure: the same three inputs
 * always give the same result. Stdout lines are scanned before stderr lines.
 */
export function parseOutput(runner: RunnerKind, stdout: string, stderr: string, exitCode: number | null): ParseResult {
  const grammar = runnerDefinition(runner).grammar;
  const lines = [...normalizeOutput(stdout), ...normalizeOutput(stderr)];
  const scan = grammar.scan(lines);
  const markers = detectMarkers(lines);

  if (scan.collectionError) {
    return { verdict: "collection_error", outcome: bareOutcome(scan.collectionError) };
  }

  if (scan.summary) {
    const counts = { ...scan.summary.counts };
    if (totalTests(counts) === 0) {
      if (grammar.nothingCollected(exitCode)) {
        return { verdict: "no_tests", outcome: bareOutcome(scan.summary.text) };
      }
      return { verdict: "collection_error", outcome: bareOutcome(scan.usageError ?? scan.summary.text) };
    }
    return {
      verdict: "tests_ran",
      outcome: {
        counts,
        failingTests: scan.failures,
        summaryText: scan.summary.text,
        details: "",
        truncated: false
      }
    };
  }

  if (markers.timeout || markers.cancelled || markers.cutoff) {
    const counts = countsFromProgress(scan.progress);
    const failingTests: FailingTest[] = [...scan.failures];
    let reason: string;

    if (markers.timeout) {
      const testId = inFlightTest(scan.progress) ?? UNKNOWN_TEST_ID;
      failingTests.push({ testId, shortMessage: "timed out" });
      counts.errored++;
      reason = `timed out after ${markers.timeout.seconds}s`;
    } else if (markers.cancelled) {
      reason = `cancelled: ${markers.cancelled.reason}`;
    } else {
      reason = `stopped after ${markers.cutoff?.failures ?? 0} failures`;
    }

    return {
      verdict: "tests_ran",
      outcome: {
        counts,
        failingTests,
        summaryText: `${formatCounts(counts, null)} (${reason})`,
        details: "",
        truncated: false
      }
    };
  }

  if (exitCode !== 0) {
    return { verdict: "crashed", outcome: bareOutcome(crashMessage(runner, lines, exitCode)) };
  }

  throw new ParseError(`unrecognized ${runner} output (exit code ${exitCode ?? "none"})`);
}
