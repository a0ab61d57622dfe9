import type { RunId } from "./ids.js";
import type { JsonObject } from "./json.js";

export const RUNNER_KINDS = ["pytest", "unittest", "nose2"] as const;
export type RunnerKind = (typeof RUNNER_KINDS)[number];

export const EXECUTION_MODES = ["local", "container"] as const;
export type ExecutionMode = (typeof EXECUTION_MODES)[number];

export interface RunRequest {
  projectPath: string;
  testPath: string;
  runner: RunnerKind;
  mode: ExecutionMode;
  containerImage: string | null;
  maxTokens: number;
  maxFailures: number | null;
  runLastFailed: boolean;
  timeoutSeconds: number;
  /** Runner options passed through after the policy's per-runner allowlist. */
  additionalArgs: string[];
}

/** Caller-facing shape; everything but the project and runner has a policy default. */
export interface RunRequestInput {
  projectPath: string;
  runner: RunnerKind;
  testPath?: string;
  mode?: ExecutionMode;
  containerImage?: string | null;
  maxTokens?: number;
  maxFailures?: number | null;
  runLastFailed?: boolean;
  timeoutSeconds?: number;
  additionalArgs?: string[];
}

export const TEST_RUN_STATUSES = ["pending", "running", "completed", "failed_tests", "error"] as const;
export type TestRunStatus = (typeof TEST_RUN_STATUSES)[number];
export type TerminalStatus = Extract<TestRunStatus, "completed" | "failed_tests" | "error">;

export function isTerminalStatus(status: TestRunStatus): status is TerminalStatus {
  return status === "completed" || status === "failed_tests" || status === "error";
}

export interface OutcomeCounts {
  passed: number;
  failed: number;
  errored: number;
  skipped: number;
  xfailed: number;
}

export interface FailingTest {
  testId: string;
  shortMessage: string;
}

export interface TestOutcome {
  counts: OutcomeCounts;
  failingTests: FailingTest[];
  summaryText: string;
  /** Head and tail of the raw output that fit the token budget. */
  details: string;
  truncated: boolean;
}

export const RUN_ERROR_KINDS = [
  "configuration",
  "execution",
  "parse",
  "crash",
  "collection",
  "cancelled",
  "timeout",
  "internal"
] as const;
export type RunErrorKind = (typeof RUN_ERROR_KINDS)[number];

export interface RunError {
  kind: RunErrorKind;
  message: string;
}

export type RunTarget =
  | { kind: "project" }
  | { kind: "path"; path: string; directory: boolean }
  | { kind: "last_failed"; testIds: string[] };

export interface ExecutionInfo {
  requestedMode: ExecutionMode;
  mode: ExecutionMode;
  /** Non-null whenever a container request ran as a local process. */
  fallbackReason: string | null;
  target: RunTarget;
  command: string[];
}

export interface TestRunRecord {
  runId: RunId;
  request: RunRequest;
  status: TestRunStatus;
  outcome: TestOutcome | null;
  rawOutputRef: string | null;
  exitCode: number | null;
  error: RunError | null;
  execution: ExecutionInfo;
  environment: JsonObject;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
}

export function zeroCounts(): OutcomeCounts {
  return { passed: 0, failed: 0, errored: 0, skipped: 0, xfailed: 0 };
}

export function hasFailures(counts: OutcomeCounts): boolean {
  return counts.failed + counts.errored > 0;
}

export function totalTests(counts: OutcomeCounts): number {
  return counts.passed + counts.failed + counts.errored + counts.skipped + counts.xfailed;
}
