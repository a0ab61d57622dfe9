import * as z from "zod/v4";
import { zExecutionMode, zRunnerKind, zTestRunJson } from "../core/testRunCodec.js";

const ulid26 = "[0-9A-HJKMNP-TV-Z]{26}";

export const zRunId = z.string().regex(new RegExp(`^run_${ulid26}$`), "invalid run_id");

export const zRunTestsInput = z.object({
  project_path: z.string().min(1),
  runner: zRunnerKind,
  test_path: z.string().optional(),
  mode: zExecutionMode.optional(),
  container_image: z.string().min(1).optional(),
  max_tokens: z.number().int().optional(),
  max_failures: z.number().int().min(1).optional(),
  run_last_failed: z.boolean().optional(),
  timeout_seconds: z.number().positive().optional(),
  additional_args: z.array(z.string().min(1)).max(32).optional(),
  wait: z.boolean().default(true)
});

export const zRunTestsOutput = z.object({
  run_id: zRunId,
  status: zTestRunJson.shape.status,
  run: zTestRunJson
});

export const zGetTestRunInput = z.object({
  run_id: zRunId,
  include_events: z.boolean().default(false)
});

export const zRunEventJson = z.object({
  ts: z.string(),
  kind: z.string(),
  message: z.string().nullable(),
  data: z.record(z.string(), z.unknown()).nullable()
});

export const zGetTestRunOutput = z.object({
  run: zTestRunJson,
  events: z.array(zRunEventJson).optional()
});

export const zListTestRunsInput = z.object({});

export const zListTestRunsOutput = z.object({
  run_ids: z.array(zRunId)
});

export const zGetLastFailedInput = z.object({
  project_path: z.string().min(1)
});

export const zGetLastFailedOutput = z.object({
  project_path: z.string(),
  test_ids: z.array(z.string())
});

export const zCancelTestRunInput = z.object({
  run_id: zRunId,
  reason: z.string().min(1).max(200).optional()
});

export const zCancelTestRunOutput = z.object({
  run: zTestRunJson
});
