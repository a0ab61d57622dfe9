import { ConfigurationError, ExecutionError, ParseError, errorMessage } from "../core/errors.js";
import { newRunId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import {
  hasFailures,
  isTerminalStatus,
  zeroCounts,
  type ExecutionInfo,
  type ExecutionMode,
  type RunError,
  type RunRequest,
  type RunRequestInput,
  type RunTarget,
  type TerminalStatus,
  type TestOutcome,
  type TestRunRecord
} from "../core/testRun.js";
import type { ContainerSpec, ExecutionStrategy, LocalProcessSpec, OutputEvent } from "../execution/backends/types.js";
import { EventQueue } from "../execution/backends/eventQueue.js";
import { writeOutputLog } from "../execution/workspace.js";
import { logger as rootLogger, type Logger } from "../logger.js";
import { isMarkerLine, toStopReason, type StopReason } from "../parsing/markers.js";
import { UNKNOWN_TEST_ID, parseOutput } from "../parsing/outputParser.js";
import type { PolicyEngine } from "../policy/policy.js";
import { runnerDefinition } from "../runners/registry.js";
import type { PostgresStore } from "../store/postgresStore.js";
import { approximateTokens, type TokenCounter } from "../truncation/tokenCounter.js";
import { truncate } from "../truncation/truncator.js";
import { RunRegistry, type ActiveRun } from "./runRegistry.js";
import { normalizeRunRequest } from "./runRequest.js";
import { TestRunRecorder } from "./testRunRecorder.js";

export type RunStreamEvent = OutputEvent | { type: "finalized"; run: TestRunRecord };

export interface Strategies {
  local: ExecutionStrategy<"local_process">;
  container: ExecutionStrategy<"container">;
}

export interface CoordinatorDeps {
  store: PostgresStore;
  policy: PolicyEngine;
  strategies: Strategies;
  runsDir: string;
  registry?: RunRegistry;
  tokenCounter?: TokenCounter;
  environment?: () => JsonObject;
  logger?: Logger;
}

type ExecutionPlan =
  | { kind: "local_process"; strategy: ExecutionStrategy<"local_process">; spec: LocalProcessSpec }
  | { kind: "container"; strategy: ExecutionStrategy<"container">; spec: ContainerSpec };

interface CapturedOutput {
  stdout: string[];
  /** stderr plus the strategies' relay lines */
  stderr: string[];
  combined: string[];
  exitCode: number | null;
  stopped: boolean;
}

function bareOutcome(summaryText: string): TestOutcome {
  return { counts: zeroCounts(), failingTests: [], summaryText, details: "", truncated: false };
}

function classifyError(err: unknown): RunError {
  if (err instanceof ConfigurationError) return { kind: "configuration", message: err.message };
  if (err instanceof ExecutionError) return { kind: "execution", message: err.message };
  return { kind: "internal", message: errorMessage(err) };
}

function stopError(reason: StopReason): RunError | null {
  if (reason.kind === "timeout") return { kind: "timeout", message: `timed out after ${reason.seconds}s` };
  if (reason.kind === "cancelled") return { kind: "cancelled", message: `cancelled: ${reason.reason}` };
  return null;
}

/**
 * Accepts run requests, drives an execution strategy per run, and turns the
 * captured output into a finalized, token-bounded TestRun. At most one run per
 * project path is in flight at a time.
 */
export class RunCoordinator {
  private readonly registry: RunRegistry;
  private readonly counter: TokenCounter;
  private readonly log: Logger;

  constructor(private readonly deps: CoordinatorDeps) {
    this.registry = deps.registry ?? new RunRegistry();
    this.counter = deps.tokenCounter ?? approximateTokens;
    this.log = deps.logger ?? rootLogger;
  }

  /** Starts a run in the background; validation and conflicts throw before any record exists. */
  async submitRun(input: RunRequestInput): Promise<RunId> {
    const active = await this.accept(input, null);
    return active.runId;
  }

  /** Output events in production order, then one `finalized` event. */
  async streamRun(input: RunRequestInput): Promise<{ runId: RunId; events: AsyncIterable<RunStreamEvent> }> {
    const queue = new EventQueue<RunStreamEvent>();
    const active = await this.accept(input, queue);
    return { runId: active.runId, events: queue };
  }

  async runTests(input: RunRequestInput): Promise<TestRunRecord> {
    const active = await this.accept(input, null);
    return active.done;
  }

  async waitForRun(runId: RunId): Promise<TestRunRecord> {
    const active = this.registry.get(runId);
    if (active) return active.done;
    return this.deps.store.requireTestRun(runId);
  }

  async cancelRun(runId: RunId, reason = "cancelled by caller"): Promise<TestRunRecord> {
    const active = this.registry.get(runId);
    if (active) {
      const stop: StopReason = { kind: "cancelled", reason };
      active.controller.abort(stop);
      return active.done;
    }

    const run = await this.deps.store.requireTestRun(runId);
    if (isTerminalStatus(run.status)) return run;

    // left open by a previous process; nothing is running it any more
    const closed: TestRunRecord = {
      ...run,
      status: "error",
      outcome: run.outcome ?? bareOutcome(`cancelled: ${reason}`),
      error: { kind: "cancelled", message: `cancelled: ${reason} (no active process)` },
      finishedAt: new Date().toISOString()
    };
    await this.deps.store.putTestRun(closed);
    return closed;
  }

  async getRun(runId: RunId): Promise<TestRunRecord> {
    return this.deps.store.requireTestRun(runId);
  }

  async listRuns(): Promise<RunId[]> {
    return this.deps.store.listTestRunIds();
  }

  async getLastFailed(projectPath: string): Promise<string[]> {
    const real = await this.deps.policy.resolveProjectPath(projectPath);
    return this.deps.store.getLastFailed(real);
  }

  activeRun(projectPath: string): RunId | undefined {
    return this.registry.holderOf(projectPath);
  }

  /** Cancels every in-flight run and waits for their processes and containers to be torn down. */
  async shutdown(): Promise<void> {
    const active = this.registry.all();
    const stop: StopReason = { kind: "cancelled", reason: "service shutting down" };
    for (const run of active) run.controller.abort(stop);
    await Promise.all(active.map((run) => run.done));
  }

  private async accept(input: RunRequestInput, sink: EventQueue<RunStreamEvent> | null): Promise<ActiveRun> {
    const request = await normalizeRunRequest(input, this.deps.policy);
    const runId = newRunId();
    this.registry.claim(request.projectPath, runId);

    let recorder: TestRunRecorder;
    let plan: ExecutionPlan;
    try {
      const target = await this.resolveTarget(request);
      const planned = await this.plan(runId, request, target);
      plan = planned.plan;
      recorder = new TestRunRecorder(this.deps.store, {
        runId,
        request,
        status: "pending",
        outcome: null,
        rawOutputRef: null,
        exitCode: null,
        error: null,
        execution: planned.execution,
        environment: {
          ...(this.deps.environment?.() ?? {}),
          policy_hash: this.deps.policy.policyHash
        },
        createdAt: new Date().toISOString(),
        startedAt: null,
        finishedAt: null
      });
      await recorder.accept();
    } catch (err) {
      this.registry.release(request.projectPath, runId);
      throw err;
    }

    const controller = new AbortController();
    const done = this.execute(recorder, plan, controller, sink);
    const active: ActiveRun = { runId, projectPath: request.projectPath, controller, done };
    this.registry.activate(active);
    return active;
  }

  private async resolveTarget(request: RunRequest): Promise<RunTarget> {
    if (request.runLastFailed) {
      const testIds = await this.deps.store.getLastFailed(request.projectPath);
      if (testIds.length > 0) return { kind: "last_failed", testIds };
    }
    return this.deps.policy.resolveTestTarget(request.projectPath, request.testPath);
  }

  private async plan(
    runId: RunId,
    request: RunRequest,
    target: RunTarget
  ): Promise<{ plan: ExecutionPlan; execution: ExecutionInfo }> {
    const { policy, strategies } = this.deps;
    let mode: ExecutionMode = request.mode;
    let fallbackReason: string | null = null;

    if (mode === "container") {
      const availability = await strategies.container.available();
      if (!availability.ok) {
        const reason = `container runtime unavailable: ${availability.reason}`;
        if (!policy.containerFallbackToLocal()) throw new ConfigurationError(reason);
        this.log.warn({ run_id: runId, reason }, "falling back to local execution");
        mode = "local";
        fallbackReason = reason;
      }
    }

    const runner = runnerDefinition(request.runner);
    const inContainer = mode === "container";
    const command = runner.command({
      python: inContainer ? "python" : policy.pythonExecutable(),
      target,
      maxFailures: request.maxFailures,
      container: inContainer,
      extraArgs: request.additionalArgs
    });
    const cutoff =
      request.maxFailures !== null && !command.nativeCutoff
        ? { maxFailures: request.maxFailures, failureLine: runner.grammar.failureLine }
        : null;
    const execution: ExecutionInfo = { requestedMode: request.mode, mode, fallbackReason, target, command: command.argv };

    if (inContainer) {
      const spec: ContainerSpec = {
        kind: "container",
        runId,
        image: request.containerImage ?? policy.containerImage(null),
        argv: command.argv,
        projectPath: request.projectPath,
        networkMode: policy.containerNetworkMode(),
        setupCommand: policy.containerSetupCommand(),
        env: policy.containerEnv(),
        cutoff,
        killGraceMs: policy.killGraceMs()
      };
      await strategies.container.prepare(spec);
      return { plan: { kind: "container", strategy: strategies.container, spec }, execution };
    }

    const spec: LocalProcessSpec = {
      kind: "local_process",
      argv: command.argv,
      cwd: request.projectPath,
      cutoff,
      killGraceMs: policy.killGraceMs()
    };
    await strategies.local.prepare(spec);
    return { plan: { kind: "local_process", strategy: strategies.local, spec }, execution };
  }

  private events(plan: ExecutionPlan, signal: AbortSignal): AsyncGenerator<OutputEvent, void, undefined> {
    switch (plan.kind) {
      case "local_process":
        return plan.strategy.execute(plan.spec, { signal });
      case "container":
        return plan.strategy.execute(plan.spec, { signal });
    }
  }

  /** Runs to a terminal record. Never rejects: every failure ends up in the record. */
  private async execute(
    recorder: TestRunRecorder,
    plan: ExecutionPlan,
    controller: AbortController,
    sink: EventQueue<RunStreamEvent> | null
  ): Promise<TestRunRecord> {
    const { request } = recorder.current;
    const log = this.log.child({ run_id: recorder.runId });
    const timeout: StopReason = { kind: "timeout", seconds: request.timeoutSeconds };
    const timer = setTimeout(() => controller.abort(timeout), request.timeoutSeconds * 1000);

    const captured: CapturedOutput = { stdout: [], stderr: [], combined: [], exitCode: null, stopped: false };
    let failure: RunError | null = null;

    try {
      await recorder.start();
      for await (const event of this.events(plan, controller.signal)) {
        sink?.push(event);
        if (event.type === "line") {
          captured.combined.push(event.text);
          if (event.stream === "stdout") captured.stdout.push(event.text);
          else captured.stderr.push(event.text);
          if (event.stream === "relay" && isMarkerLine(event.text)) captured.stopped = true;
        } else if (event.type === "cutoff") {
          await recorder.event("run.cutoff", `stopped after ${event.failures} failures`, { failures: event.failures });
        } else if (event.type === "exited") {
          captured.exitCode = event.exitCode;
        }
      }
    } catch (err) {
      failure = classifyError(err);
      log.error({ err }, "test run did not execute");
    } finally {
      clearTimeout(timer);
    }

    let run: TestRunRecord;
    try {
      run = await this.finalize(recorder, captured, failure, controller.signal, log);
    } catch (err) {
      log.error({ err }, "failed to finalize test run");
      run = recorder.current;
    } finally {
      this.registry.release(request.projectPath, recorder.runId);
    }

    sink?.push({ type: "finalized", run });
    sink?.close();
    return run;
  }

  private async finalize(
    recorder: TestRunRecorder,
    captured: CapturedOutput,
    failure: RunError | null,
    signal: AbortSignal,
    log: Logger
  ): Promise<TestRunRecord> {
    const { request, execution } = recorder.current;
    let status: TerminalStatus = "error";
    let error: RunError | null = failure;
    let outcome: TestOutcome;
    let parsedCleanly = false;

    if (failure) {
      outcome = bareOutcome(failure.message);
    } else {
      try {
        const result = parseOutput(request.runner, captured.stdout.join("\n"), captured.stderr.join("\n"), captured.exitCode);
        outcome = result.outcome;
        if (result.verdict === "tests_ran" || result.verdict === "no_tests") {
          status = hasFailures(outcome.counts) ? "failed_tests" : "completed";
          parsedCleanly = true;
        } else {
          error = { kind: result.verdict === "crashed" ? "crash" : "collection", message: outcome.summaryText };
        }
      } catch (err) {
        if (!(err instanceof ParseError)) throw err;
        error = { kind: "parse", message: `${err.message}; full output kept in the run log` };
        outcome = bareOutcome(err.message);
      }
    }

    // a cutoff is a normal completion; timeouts and cancellations are not
    const stop = signal.aborted && captured.stopped ? stopError(toStopReason(signal.reason)) : null;
    if (stop) {
      status = "error";
      error = stop;
      parsedCleanly = false;
    }

    if (execution.fallbackReason) {
      outcome = { ...outcome, summaryText: `[ran locally: ${execution.fallbackReason}] ${outcome.summaryText}` };
    }

    const rawText = captured.combined.join("\n");
    const bounded = truncate(outcome, rawText, request.maxTokens, this.counter);

    let rawOutputRef: string | null = null;
    try {
      rawOutputRef = await writeOutputLog(this.deps.runsDir, recorder.runId, rawText ? `${rawText}\n` : "");
    } catch (err) {
      log.warn({ err }, "failed to write run output log");
    }

    const run = await recorder.finish({
      status,
      outcome: bounded.outcome,
      exitCode: captured.exitCode,
      error,
      rawOutputRef
    });
    log.info({ status, exitCode: captured.exitCode, summary: bounded.outcome.summaryText }, "test run finished");

    if (parsedCleanly) await this.updateLastFailed(request.projectPath, outcome, recorder.runId, log);
    return run;
  }

  /**
   * Rewritten wholesale after every cleanly parsed run; a run without failures
   * records an empty list. When the counts report failures that could not be
   * named, the previous list stays.
   */
  private async updateLastFailed(projectPath: string, outcome: TestOutcome, runId: RunId, log: Logger): Promise<void> {
    const failedIds = outcome.failingTests.map((f) => f.testId).filter((id) => id !== UNKNOWN_TEST_ID);
    if (hasFailures(outcome.counts) && failedIds.length === 0) {
      log.warn({ counts: outcome.counts }, "failing tests could not be named; last-failed list left unchanged");
      return;
    }
    try {
      await this.deps.store.setLastFailed(projectPath, failedIds, runId);
    } catch (err) {
      log.error({ err }, "failed to update last-failed index");
    }
  }
}
