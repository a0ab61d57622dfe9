import type { FailureCutoff } from "./types.js";

/**
 * Counts failure lines as they stream past. Advisory only: output already
 * buffered by the runner when the threshold is crossed still arrives, and a
 * runner may finish more tests before the termination signal lands.
 */
export class FailureWatch {
  private seen = 0;
  private tripped = false;

  constructor(private readonly cutoff: FailureCutoff | null) {}

  /** True exactly once, on the line that reaches max_failures. */
  observe(line: string): boolean {
    if (!this.cutoff || this.tripped) return false;
    if (!this.cutoff.failureLine.test(line)) return false;
    this.seen++;
    if (this.seen < this.cutoff.maxFailures) return false;
    this.tripped = true;
    return true;
  }

  get failures(): number {
    return this.seen;
  }
}
