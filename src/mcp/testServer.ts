import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { ConfigurationError, ConflictError, NotFoundError, PolicyDeniedError } from "../core/errors.js";
import { isRunId, type RunId } from "../core/ids.js";
import type { RunRequestInput, TestRunRecord } from "../core/testRun.js";
import { encodeTestRun } from "../core/testRunCodec.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import type { PolicyEngine } from "../policy/policy.js";
import type { RunCoordinator } from "../runs/coordinator.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { renderOutcome } from "../truncation/truncator.js";
import {
  zCancelTestRunInput,
  zCancelTestRunOutput,
  zGetLastFailedInput,
  zGetLastFailedOutput,
  zGetTestRunInput,
  zGetTestRunOutput,
  zListTestRunsInput,
  zListTestRunsOutput,
  zRunTestsInput,
  zRunTestsOutput
} from "./toolSchemas.js";

export interface TestServerDeps {
  policy: PolicyEngine;
  coordinator: RunCoordinator;
  store: PostgresStore;
  logger?: Logger;
}

/** Domain errors as MCP protocol errors; anything else propagates unchanged. */
function toMcpError(e: unknown): unknown {
  if (e instanceof McpError) return e;
  if (e instanceof PolicyDeniedError) return new McpError(ErrorCode.InvalidRequest, e.message);
  if (e instanceof ConfigurationError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof ConflictError) return new McpError(ErrorCode.InvalidRequest, e.message, { active_run_id: e.activeRunId });
  if (e instanceof NotFoundError) return new McpError(ErrorCode.InvalidParams, e.message);
  return e;
}

function requireRunId(value: string): RunId {
  if (!isRunId(value)) throw new McpError(ErrorCode.InvalidParams, `invalid run_id: ${value}`);
  return value;
}

function describeRun(run: TestRunRecord): string {
  const head = `${run.runId}: ${run.status}`;
  if (run.error && run.outcome) return `${head} (${run.error.kind})\n${renderOutcome(run.outcome)}`;
  if (run.error) return `${head} (${run.error.kind}): ${run.error.message}`;
  if (run.outcome) return `${head}\n${renderOutcome(run.outcome)}`;
  return head;
}

export function createTestServer(deps: TestServerDeps): McpServer {
  const log = deps.logger ?? rootLogger;
  const mcp = new McpServer({
    name: "testrelay",
    version: "0.1.0"
  });

  mcp.registerTool(
    "run_tests",
    {
      description:
        "Run a project's tests (pytest, unittest or nose2) locally or in a container and return a token-bounded summary.",
      inputSchema: zRunTestsInput,
      outputSchema: zRunTestsOutput
    },
    async (args, extra) => {
      try {
        deps.policy.assertToolAllowed("run_tests");

        const input: RunRequestInput = {
          projectPath: args.project_path,
          runner: args.runner,
          testPath: args.test_path,
          mode: args.mode,
          containerImage: args.container_image,
          maxTokens: args.max_tokens,
          maxFailures: args.max_failures,
          runLastFailed: args.run_last_failed,
          timeoutSeconds: args.timeout_seconds,
          additionalArgs: args.additional_args
        };

        let run: TestRunRecord;
        const progressToken = extra._meta?.progressToken;
        if (!args.wait) {
          const runId = await deps.coordinator.submitRun(input);
          run = await deps.coordinator.getRun(runId);
        } else if (progressToken === undefined) {
          run = await deps.coordinator.runTests(input);
        } else {
          const { runId, events } = await deps.coordinator.streamRun(input);
          let finalized: TestRunRecord | null = null;
          let progress = 0;
          let notify = true;
          for await (const event of events) {
            if (event.type === "finalized") {
              finalized = event.run;
            } else if (event.type === "line" && notify) {
              progress++;
              try {
                await extra.sendNotification({
                  method: "notifications/progress",
                  params: { progressToken, progress, message: event.text }
                });
              } catch (err) {
                // the run keeps going; the caller just stops seeing lines
                notify = false;
                log.warn({ err, run_id: runId }, "progress notification failed");
              }
            }
          }
          run = finalized ?? (await deps.coordinator.waitForRun(runId));
        }

        return {
          content: [{ type: "text", text: describeRun(run) }],
          structuredContent: { run_id: run.runId, status: run.status, run: encodeTestRun(run) }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "get_test_run",
    {
      description: "Fetch a test run by run_id, optionally with its lifecycle events.",
      inputSchema: zGetTestRunInput,
      outputSchema: zGetTestRunOutput
    },
    async (args) => {
      try {
        deps.policy.assertToolAllowed("get_test_run");
        const runId = requireRunId(args.run_id);
        const run = await deps.coordinator.getRun(runId);
        const events = args.include_events ? await deps.store.listRunEvents(runId) : undefined;

        return {
          content: [{ type: "text", text: describeRun(run) }],
          structuredContent: { run: encodeTestRun(run), ...(events ? { events } : {}) }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "list_test_runs",
    {
      description: "List test run ids in the order they were accepted.",
      inputSchema: zListTestRunsInput,
      outputSchema: zListTestRunsOutput
    },
    async () => {
      try {
        deps.policy.assertToolAllowed("list_test_runs");
        const runIds = await deps.coordinator.listRuns();
        return {
          content: [{ type: "text", text: runIds.length ? runIds.join("\n") : "no test runs" }],
          structuredContent: { run_ids: runIds }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "get_last_failed",
    {
      description: "Test ids that failed in the project's most recent completed run.",
      inputSchema: zGetLastFailedInput,
      outputSchema: zGetLastFailedOutput
    },
    async (args) => {
      try {
        deps.policy.assertToolAllowed("get_last_failed");
        const testIds = await deps.coordinator.getLastFailed(args.project_path);
        return {
          content: [{ type: "text", text: testIds.length ? testIds.join("\n") : "no failed tests recorded" }],
          structuredContent: { project_path: args.project_path, test_ids: testIds }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "cancel_test_run",
    {
      description: "Cancel an in-flight test run and wait for its process or container to be torn down.",
      inputSchema: zCancelTestRunInput,
      outputSchema: zCancelTestRunOutput
    },
    async (args) => {
      try {
        deps.policy.assertToolAllowed("cancel_test_run");
        const runId = requireRunId(args.run_id);
        const run = await deps.coordinator.cancelRun(runId, args.reason);
        return {
          content: [{ type: "text", text: describeRun(run) }],
          structuredContent: { run: encodeTestRun(run) }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  return mcp;
}
