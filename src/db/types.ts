import type { ColumnType, Generated, JSONColumnType } from "kysely";

type OptionalNullable<T> = ColumnType<T | null, T | null | undefined, T | null>;
type JsonObject = Record<string, unknown>;
type Json = JSONColumnType<JsonObject, JsonObject, JsonObject>;
type JsonNullable = JSONColumnType<JsonObject | null, JsonObject | null | undefined, JsonObject | null>;
// pg returns timestamptz as Date; inserts take ISO strings
type Timestamp = ColumnType<Date | string, string, string>;
type TimestampNullable = ColumnType<Date | string | null, string | null | undefined, string | null>;

export interface TestRunsTable {
  seq: Generated<number>;
  run_id: string;
  project_path: string;
  runner: string;
  status: string;
  request: Json;
  execution: Json;
  outcome: JsonNullable;
  error: JsonNullable;
  environment: Json;
  raw_output_ref: OptionalNullable<string>;
  exit_code: OptionalNullable<number>;
  created_at: Timestamp;
  started_at: TimestampNullable;
  finished_at: TimestampNullable;
}

export interface TestRunEventsTable {
  event_id: Generated<number>;
  run_id: string;
  ts: ColumnType<Date | string, string | undefined, string>;
  kind: string;
  message: OptionalNullable<string>;
  data: JsonNullable;
}

export interface LastFailedTable {
  project_path: string;
  /** { test_ids: string[] }; kept as an object so the column never holds a bare array */
  payload: Json;
  run_id: OptionalNullable<string>;
  updated_at: Timestamp;
}

export interface DB {
  test_runs: TestRunsTable;
  test_run_events: TestRunEventsTable;
  last_failed: LastFailedTable;
}
