import type { Kysely, Selectable } from "kysely";
import { ConflictError, NotFoundError } from "../core/errors.js";
import { isRunId, type RunId } from "../core/ids.js";
import type { JsonObject } from "../core/json.js";
import {
  decodeError,
  decodeExecution,
  decodeOutcome,
  decodeRequest,
  encodeError,
  encodeExecution,
  encodeOutcome,
  encodeRequest,
  zTestRunStatus
} from "../core/testRunCodec.js";
import type { TestRunRecord } from "../core/testRun.js";
import type { DB } from "../db/types.js";

function toIso(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  if (typeof value === "string") return value;
  return new Date(String(value)).toISOString();
}

function toIsoOrNull(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  return toIso(value);
}

function testIdsOf(payload: JsonObject): string[] {
  const ids = payload.test_ids;
  if (!Array.isArray(ids)) return [];
  return ids.filter((id): id is string => typeof id === "string");
}

export interface RunEventRecord {
  ts: string;
  kind: string;
  message: string | null;
  data: JsonObject | null;
}

const OPEN_STATUSES = ["pending", "running"];

export class PostgresStore {
  constructor(private readonly db: Kysely<DB>) {}

  /**
   * Inserts or replaces a run record in one statement. Finalized records are
   * read-only: writing to one throws ConflictError.
   */
  async putTestRun(run: TestRunRecord): Promise<void> {
    const columns = {
      project_path: run.request.projectPath,
      runner: run.request.runner,
      status: run.status,
      request: encodeRequest(run.request),
      execution: encodeExecution(run.execution),
      outcome: run.outcome ? encodeOutcome(run.outcome) : null,
      error: run.error ? encodeError(run.error) : null,
      environment: run.environment,
      raw_output_ref: run.rawOutputRef,
      exit_code: run.exitCode,
      created_at: run.createdAt,
      started_at: run.startedAt,
      finished_at: run.finishedAt
    };

    const updated = await this.db
      .updateTable("test_runs")
      .set(columns)
      .where("run_id", "=", run.runId)
      .where("status", "in", OPEN_STATUSES)
      .returning(["run_id"])
      .executeTakeFirst();
    if (updated) return;

    const existing = await this.db
      .selectFrom("test_runs")
      .select(["status"])
      .where("run_id", "=", run.runId)
      .executeTakeFirst();
    if (existing) {
      throw new ConflictError(`test run ${run.runId} is finalized (${existing.status}) and cannot be modified`, run.runId);
    }

    await this.db
      .insertInto("test_runs")
      .values({ run_id: run.runId, ...columns })
      .execute();
  }

  async getTestRun(runId: RunId): Promise<TestRunRecord | null> {
    const row = await this.db.selectFrom("test_runs").selectAll().where("run_id", "=", runId).executeTakeFirst();
    return row ? this.mapTestRun(row) : null;
  }

  async requireTestRun(runId: RunId): Promise<TestRunRecord> {
    const run = await this.getTestRun(runId);
    if (!run) throw new NotFoundError(`unknown run_id: ${runId}`);
    return run;
  }

  /** All run ids in insertion order. */
  async listTestRunIds(): Promise<RunId[]> {
    const rows = await this.db.selectFrom("test_runs").select(["run_id"]).orderBy("seq", "asc").execute();
    return rows.map((r) => r.run_id).filter(isRunId);
  }

  async getLastFailed(projectPath: string): Promise<string[]> {
    const row = await this.db
      .selectFrom("last_failed")
      .select(["payload"])
      .where("project_path", "=", projectPath)
      .executeTakeFirst();
    return row ? testIdsOf(row.payload) : [];
  }

  async setLastFailed(projectPath: string, testIds: string[], runId: RunId | null): Promise<void> {
    const now = new Date().toISOString();
    const payload = { test_ids: [...testIds] };
    await this.db
      .insertInto("last_failed")
      .values({ project_path: projectPath, payload, run_id: runId, updated_at: now })
      .onConflict((oc) => oc.column("project_path").doUpdateSet({ payload, run_id: runId, updated_at: now }))
      .execute();
  }

  async addRunEvent(runId: RunId, kind: string, message: string | null, data: JsonObject | null): Promise<void> {
    await this.db
      .insertInto("test_run_events")
      .values({
        run_id: runId,
        ts: new Date().toISOString(),
        kind,
        message,
        data: data ?? null
      })
      .execute();
  }

  async listRunEvents(runId: RunId): Promise<RunEventRecord[]> {
    const rows = await this.db
      .selectFrom("test_run_events")
      .selectAll()
      .where("run_id", "=", runId)
      .orderBy("event_id", "asc")
      .execute();
    return rows.map((r) => ({ ts: toIso(r.ts), kind: r.kind, message: r.message, data: r.data }));
  }

  private mapTestRun(row: Selectable<DB["test_runs"]>): TestRunRecord {
    if (!isRunId(row.run_id)) throw new Error(`invalid run_id in store: ${row.run_id}`);
    return {
      runId: row.run_id,
      request: decodeRequest(row.request),
      status: zTestRunStatus.parse(row.status),
      outcome: row.outcome ? decodeOutcome(row.outcome) : null,
      rawOutputRef: row.raw_output_ref,
      exitCode: row.exit_code,
      error: row.error ? decodeError(row.error) : null,
      execution: decodeExecution(row.execution),
      environment: row.environment,
      createdAt: toIso(row.created_at),
      startedAt: toIsoOrNull(row.started_at),
      finishedAt: toIsoOrNull(row.finished_at)
    };
  }
}
