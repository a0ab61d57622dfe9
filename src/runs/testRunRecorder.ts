import type { RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import type { RunError, TerminalStatus, TestOutcome, TestRunRecord } from "../core/testRun.js";
import type { PostgresStore } from "../store/postgresStore.js";

export interface RunFinish {
  status: TerminalStatus;
  outcome: TestOutcome;
  exitCode: number | null;
  error: RunError | null;
  rawOutputRef: string | null;
}

/** Lifecycle writes for one TestRun: pending → running → terminal, plus its event log. */
export class TestRunRecorder {
  readonly runId: RunId;
  private record: TestRunRecord;

  constructor(
    private readonly store: PostgresStore,
    initial: TestRunRecord
  ) {
    this.runId = initial.runId;
    this.record = initial;
  }

  get current(): TestRunRecord {
    return this.record;
  }

  async accept(): Promise<void> {
    await this.store.putTestRun(this.record);
    await this.event("run.accepted", `runner=${this.record.request.runner} mode=${this.record.execution.mode}`, {
      requested_mode: this.record.execution.requestedMode,
      fallback_reason: this.record.execution.fallbackReason
    });
  }

  async start(): Promise<void> {
    const now = new Date().toISOString();
    this.record = { ...this.record, status: "running", startedAt: now };
    await this.store.putTestRun(this.record);
    await this.event("run.started", this.record.execution.command.join(" "), { now });
  }

  async event(kind: string, message: string, data: JsonObject | null): Promise<void> {
    await this.store.addRunEvent(this.runId, kind, message, data);
  }

  /**
   * Moves the in-memory record to its terminal state first, so `current` is
   * final even when the store write fails.
   */
  async finish(input: RunFinish): Promise<TestRunRecord> {
    this.record = {
      ...this.record,
      status: input.status,
      outcome: input.outcome,
      exitCode: input.exitCode,
      error: input.error,
      rawOutputRef: input.rawOutputRef,
      finishedAt: new Date().toISOString()
    };
    await this.store.putTestRun(this.record);
    await this.event(`run.${input.status}`, input.error ? `${input.error.kind}: ${input.error.message}` : input.outcome.summaryText, {
      exit_code: input.exitCode
    });
    return this.record;
  }
}
