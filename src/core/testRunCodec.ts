import * as z from "zod/v4";
import { isRunId } from "./ids.js";
import {
  EXECUTION_MODES,
  RUN_ERROR_KINDS,
  RUNNER_KINDS,
  TEST_RUN_STATUSES,
  type ExecutionInfo,
  type OutcomeCounts,
  type RunError,
  type RunRequest,
  type RunTarget,
  type TestOutcome,
  type TestRunRecord
} from "./testRun.js";

// snake_case JSON shapes shared by the store's JSONB columns and the MCP tool results

export const zRunnerKind = z.enum(RUNNER_KINDS);
export const zExecutionMode = z.enum(EXECUTION_MODES);
export const zTestRunStatus = z.enum(TEST_RUN_STATUSES);

export const zRunRequestJson = z.object({
  project_path: z.string(),
  test_path: z.string(),
  runner: zRunnerKind,
  mode: zExecutionMode,
  container_image: z.string().nullable(),
  max_tokens: z.number().int(),
  max_failures: z.number().int().nullable(),
  run_last_failed: z.boolean(),
  timeout_seconds: z.number(),
  // absent on rows written before runner options were accepted
  additional_args: z.array(z.string()).default([])
});

export const zCountsJson = z.object({
  passed: z.number().int(),
  failed: z.number().int(),
  errored: z.number().int(),
  skipped: z.number().int(),
  xfailed: z.number().int()
});

export const zFailingTestJson = z.object({
  test_id: z.string(),
  short_message: z.string()
});

export const zOutcomeJson = z.object({
  counts: zCountsJson,
  failing_tests: z.array(zFailingTestJson),
  summary_text: z.string(),
  details: z.string(),
  truncated: z.boolean()
});

export const zRunErrorJson = z.object({
  kind: z.enum(RUN_ERROR_KINDS),
  message: z.string()
});

export const zRunTargetJson = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("project") }),
  z.object({ kind: z.literal("path"), path: z.string(), directory: z.boolean() }),
  z.object({ kind: z.literal("last_failed"), test_ids: z.array(z.string()) })
]);

export const zExecutionJson = z.object({
  requested_mode: zExecutionMode,
  mode: zExecutionMode,
  fallback_reason: z.string().nullable(),
  target: zRunTargetJson,
  command: z.array(z.string())
});

export const zTestRunJson = z.object({
  run_id: z.string(),
  request: zRunRequestJson,
  status: zTestRunStatus,
  outcome: zOutcomeJson.nullable(),
  raw_output_ref: z.string().nullable(),
  exit_code: z.number().int().nullable(),
  error: zRunErrorJson.nullable(),
  execution: zExecutionJson,
  environment: z.record(z.string(), z.unknown()),
  created_at: z.string(),
  started_at: z.string().nullable(),
  finished_at: z.string().nullable()
});

export type RunRequestJson = z.infer<typeof zRunRequestJson>;
export type OutcomeJson = z.infer<typeof zOutcomeJson>;
export type RunErrorJson = z.infer<typeof zRunErrorJson>;
export type ExecutionJson = z.infer<typeof zExecutionJson>;
export type TestRunJson = z.infer<typeof zTestRunJson>;

export function encodeRequest(r: RunRequest): RunRequestJson {
  return {
    project_path: r.projectPath,
    test_path: r.testPath,
    runner: r.runner,
    mode: r.mode,
    container_image: r.containerImage,
    max_tokens: r.maxTokens,
    max_failures: r.maxFailures,
    run_last_failed: r.runLastFailed,
    timeout_seconds: r.timeoutSeconds,
    additional_args: [...r.additionalArgs]
  };
}

export function decodeRequest(value: unknown): RunRequest {
  const j = zRunRequestJson.parse(value);
  return {
    projectPath: j.project_path,
    testPath: j.test_path,
    runner: j.runner,
    mode: j.mode,
    containerImage: j.container_image,
    maxTokens: j.max_tokens,
    maxFailures: j.max_failures,
    runLastFailed: j.run_last_failed,
    timeoutSeconds: j.timeout_seconds,
    additionalArgs: j.additional_args
  };
}

export function encodeOutcome(o: TestOutcome): OutcomeJson {
  return {
    counts: { ...o.counts },
    failing_tests: o.failingTests.map((f) => ({ test_id: f.testId, short_message: f.shortMessage })),
    summary_text: o.summaryText,
    details: o.details,
    truncated: o.truncated
  };
}

export function decodeOutcome(value: unknown): TestOutcome {
  const j = zOutcomeJson.parse(value);
  const counts: OutcomeCounts = { ...j.counts };
  return {
    counts,
    failingTests: j.failing_tests.map((f) => ({ testId: f.test_id, shortMessage: f.short_message })),
    summaryText: j.summary_text,
    details: j.details,
    truncated: j.truncated
  };
}

export function encodeError(e: RunError): RunErrorJson {
  return { kind: e.kind, message: e.message };
}

export function decodeError(value: unknown): RunError {
  return zRunErrorJson.parse(value);
}

function encodeTarget(t: RunTarget): ExecutionJson["target"] {
  if (t.kind === "last_failed") return { kind: "last_failed", test_ids: [...t.testIds] };
  return { ...t };
}

export function encodeExecution(e: ExecutionInfo): ExecutionJson {
  return {
    requested_mode: e.requestedMode,
    mode: e.mode,
    fallback_reason: e.fallbackReason,
    target: encodeTarget(e.target),
    command: [...e.command]
  };
}

export function decodeExecution(value: unknown): ExecutionInfo {
  const j = zExecutionJson.parse(value);
  const target: RunTarget = j.target.kind === "last_failed" ? { kind: "last_failed", testIds: j.target.test_ids } : j.target;
  return {
    requestedMode: j.requested_mode,
    mode: j.mode,
    fallbackReason: j.fallback_reason,
    target,
    command: j.command
  };
}

export function encodeTestRun(run: TestRunRecord): TestRunJson {
  return {
    run_id: run.runId,
    request: encodeRequest(run.request),
    status: run.status,
    outcome: run.outcome ? encodeOutcome(run.outcome) : null,
    raw_output_ref: run.rawOutputRef,
    exit_code: run.exitCode,
    error: run.error ? encodeError(run.error) : null,
    execution: encodeExecution(run.execution),
    environment: run.environment,
    created_at: run.createdAt,
    started_at: run.startedAt,
    finished_at: run.finishedAt
  };
}

export function decodeTestRun(value: unknown): TestRunRecord {
  const j = zTestRunJson.parse(value);
  if (!isRunId(j.run_id)) throw new Error(`invalid run_id: ${j.run_id}`);
  return {
    runId: j.run_id,
    request: decodeRequest(j.request),
    status: j.status,
    outcome: j.outcome ? decodeOutcome(j.outcome) : null,
    rawOutputRef: j.raw_output_ref,
    exitCode: j.exit_code,
    error: j.error,
    execution: decodeExecution(j.execution),
    environment: j.environment,
    createdAt: j.created_at,
    startedAt: j.started_at,
    finishedAt: j.finished_at
  };
}
