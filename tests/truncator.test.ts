import { describe, it, expect } from "vitest";
import type { TestOutcome } from "../src/core/testRun.js";
import { approximateTokens } from "../src/truncation/tokenCounter.js";
import { TRUNCATION_MARKER, measurePayload, renderOutcome, truncate } from "../src/truncation/truncator.js";

function bulkFailures(n: number): TestOutcome {
  return {
    counts: { passed: 0, failed: n, errored: 0, skipped: 0, xfailed: 0 },
    failingTests: Array.from({ length: n }, (_, i) => ({ testId: `tests/test_bulk.py::test_case_${i}`, shortMessage: "assert False" })),
    summaryText: `${n} failed in 1.00s`,
    details: "",
    truncated: false
  };
}

function outcome(summaryText: string): TestOutcome {
  return {
    counts: { passed: 0, failed: 0, errored: 0, skipped: 0, xfailed: 0 },
    failingTests: [],
    summaryText,
    details: "",
    truncated: false
  };
}

describe("truncate", () => {
  it("keeps the true counts and a prefix of 200 failures at the minimum budget", () => {
    const { outcome: bounded } = truncate(bulkFailures(200), "", 50);

    expect(bounded.counts.failed).toBe(200);
    expect(bounded.failingTests.map((f) => f.testId)).toEqual(["tests/test_bulk.py::test_case_0", "tests/test_bulk.py::test_case_1"]);
    expect(bounded.details).toBe("");
    expect(bounded.truncated).toBe(true);
    expect(measurePayload(bounded)).toBeLessThanOrEqual(50);
  });

  it("returns everything when it fits", () => {
    const raw = "tests/test_a.py::test_one PASSED\n1 passed in 0.01s\n";
    const { outcome: bounded, text } = truncate(outcome("1 passed in 0.01s"), raw, 4000);

    expect(bounded.truncated).toBe(false);
    expect(bounded.details).toBe("tests/test_a.py::test_one PASSED\n1 passed in 0.01s");
    expect(text).toBe(
      [
        "1 passed in 0.01s",
        "passed=0 failed=0 errored=0 skipped=0 xfailed=0",
        "",
        "tests/test_a.py::test_one PASSED",
        "1 passed in 0.01s"
      ].join("\n")
    );
  });

  it("keeps output lines alternately from the head and the tail", () => {
    const raw = Array.from({ length: 10 }, (_, i) => `line ${i}`).join("\n");
    // summary 1 + counts 12 + marker 7 leaves room for four 2-token lines
    const { outcome: bounded } = truncate(outcome("s"), raw, 28);

    expect(bounded.details).toBe(["line 0", "line 1", TRUNCATION_MARKER, "line 8", "line 9"].join("\n"));
    expect(bounded.truncated).toBe(true);
  });

  it("never grows the payload when the budget shrinks", () => {
    const raw = Array.from({ length: 60 }, (_, i) => `tests/test_bulk.py::test_case_${i} FAILED`).join("\n");
    const source = bulkFailures(12);

    let previous = Infinity;
    for (let budget = 2000; budget >= 50; budget -= 25) {
      const size = measurePayload(truncate(source, raw, budget).outcome, approximateTokens);
      expect(size).toBeLessThanOrEqual(budget);
      expect(size).toBeLessThanOrEqual(previous);
      previous = size;
    }
  });

  it("renders the bounded outcome as its text", () => {
    const result = truncate(bulkFailures(3), "", 4000);
    expect(result.text).toBe(renderOutcome(result.outcome));
    expect(result.text.split("\n")[2]).toBe("tests/test_bulk.py::test_case_0 - assert False");
  });
});
