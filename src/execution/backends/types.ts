import type { RunId } from "../../core/ids.js";

export type OutputStream = "stdout" | "stderr" | "relay";

export type OutputEvent =
  | { type: "started"; pid: number | null; containerId: string | null }
  | { type: "line"; stream: OutputStream; text: string }
  | { type: "cutoff"; failures: number }
  /** Always the last event. exitCode is null only when the runner never started. */
  | { type: "exited"; exitCode: number | null; signal: NodeJS.Signals | null };

export interface FailureCutoff {
  maxFailures: number;
  failureLine: RegExp;
}

export interface LocalProcessSpec {
  kind: "local_process";
  argv: string[];
  cwd: string;
  env?: Record<string, string>;
  cutoff: FailureCutoff | null;
  killGraceMs: number;
}

export interface ContainerSpec {
  kind: "container";
  runId: RunId;
  image: string;
  argv: string[];
  projectPath: string;
  networkMode: "none" | "bridge";
  setupCommand: string | null;
  env?: Record<string, string>;
  cutoff: FailureCutoff | null;
  killGraceMs: number;
}

export type ExecutionSpec = LocalProcessSpec | ContainerSpec;

export type Availability = { ok: true } | { ok: false; reason: string };

export interface ExecuteOptions {
  /** Aborting stops the runner; the reason should be a StopReason. */
  signal: AbortSignal;
}

/**
 * One way of running a test command. `execute` is a lazy, single-pass stream:
 * iterating it starts the runner, returning early from the iteration tears it
 * down, and it always ends with an `exited` event unless it throws.
 */
export interface ExecutionStrategy<K extends ExecutionSpec["kind"] = ExecutionSpec["kind"]> {
  readonly kind: K;
  available(): Promise<Availability>;
  /** Checks run before a TestRun record exists; throws ConfigurationError. */
  prepare(spec: Extract<ExecutionSpec, { kind: K }>): Promise<void>;
  execute(spec: Extract<ExecutionSpec, { kind: K }>, options: ExecuteOptions): AsyncGenerator<OutputEvent, void, undefined>;
}
