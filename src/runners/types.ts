import type { FailingTest, OutcomeCounts, RunnerKind, RunTarget } from "../core/testRun.js";

export type TestResult = "passed" | "failed" | "errored" | "skipped" | "xfailed";

export interface ProgressEntry {
  testId: string;
  /** null while the runner has announced the test but not reported its result. */
  result: TestResult | null;
}

export interface FinalSummary {
  counts: OutcomeCounts;
  text: string;
}

export interface GrammarScan {
  summary: FinalSummary | null;
  progress: ProgressEntry[];
  /** Failed and errored tests in order of first appearance, with the best message found. */
  failures: FailingTest[];
  collectionError: string | null;
  /** A usage-level error line (e.g. a missing test file) to report when nothing was collected. */
  usageError: string | null;
}

/** Line grammar of one runner's verbose output. */
export interface RunnerGrammar {
  readonly runner: RunnerKind;
  /** Matches a single progress line reporting a failed or errored test. */
  readonly failureLine: RegExp;
  scan(lines: readonly string[]): GrammarScan;
  /** Exit codes that mean "nothing to run" rather than a collection failure. */
  nothingCollected(exitCode: number | null): boolean;
}

export interface CommandInput {
  python: string;
  target: RunTarget;
  maxFailures: number | null;
  container: boolean;
  /** Already allowed by policy; placed before the test selection. */
  extraArgs?: readonly string[];
}

export interface RunnerCommand {
  argv: string[];
  /** The runner stops itself at max_failures; no output watcher needed. */
  nativeCutoff: boolean;
}

export interface RunnerDefinition {
  readonly kind: RunnerKind;
  readonly grammar: RunnerGrammar;
  command(input: CommandInput): RunnerCommand;
}
