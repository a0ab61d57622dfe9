import { mkdtemp, realpath } from "fs/promises";
import os from "os";
import path from "path";
import type * as pg from "pg";
import { ConfigurationError } from "../src/core/errors.js";
import { applySchema } from "../src/db/bootstrap.js";
import { openDatabase } from "../src/db/connection.js";
import type { ContainerCreateSpec, ContainerLogLine, ContainerRuntime } from "../src/execution/backends/containerRuntime.js";
import type { Availability, ExecuteOptions, ExecutionStrategy, LocalProcessSpec, OutputEvent } from "../src/execution/backends/types.js";
import { markerLine, toStopReason } from "../src/parsing/markers.js";
import { PolicyEngine } from "../src/policy/policy.js";
import { PostgresStore } from "../src/store/postgresStore.js";

export const ALL_TOOLS = ["run_tests", "get_test_run", "list_test_runs", "get_last_failed", "cancel_test_run"];

/** mkdtemp, resolved so symlinked temp roots (macOS /var) pass the symlink check. */
export async function tempDir(prefix: string): Promise<string> {
  return realpath(await mkdtemp(path.join(os.tmpdir(), prefix)));
}

export function testPolicy(roots: string[], overrides: Record<string, unknown> = {}): PolicyEngine {
  return PolicyEngine.fromConfig({
    version: 1,
    tool_allowlist: ALL_TOOLS,
    projects: { root_allowlist: roots },
    runners: {
      allowlist: ["pytest", "unittest", "nose2"],
      python: "python3",
      extra_args: { pytest: { "-k": true, "-l": false, "--tb": true }, unittest: { "-b": false } }
    },
    quotas: { max_tokens: 32000, max_timeout_seconds: 3600, kill_grace_seconds: 1 },
    container: { image_allowlist: ["python:3.11-slim"], network_mode: "none" },
    ...overrides
  });
}

export async function memoryStore(): Promise<{ pool: pg.Pool; store: PostgresStore }> {
  const { pool, db } = openDatabase(undefined);
  await applySchema(pool);
  return { pool, store: new PostgresStore(db) };
}

function aborted(signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) resolve();
    else signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

export interface ProcessScript {
  stdout?: string[];
  stderr?: string[];
  exitCode?: number;
  /** Keep running until aborted, like a test stuck in a sleep. */
  hang?: boolean;
  throws?: Error;
}

/** Plays back canned runner output instead of starting a process. */
export class ScriptedLocalStrategy implements ExecutionStrategy<"local_process"> {
  readonly kind = "local_process" as const;
  readonly executed: LocalProcessSpec[] = [];
  private readonly scripts: ProcessScript[];

  constructor(...scripts: ProcessScript[]) {
    this.scripts = scripts;
  }

  enqueue(script: ProcessScript): void {
    this.scripts.push(script);
  }

  async available(): Promise<Availability> {
    return { ok: true };
  }

  async prepare(_spec: LocalProcessSpec): Promise<void> {}

  async *execute(spec: LocalProcessSpec, { signal }: ExecuteOptions): AsyncGenerator<OutputEvent, void, undefined> {
    this.executed.push(spec);
    const script = this.scripts.shift() ?? { exitCode: 0 };
    if (script.throws) throw script.throws;

    yield { type: "started", pid: 4242, containerId: null };
    for (const text of script.stdout ?? []) yield { type: "line", stream: "stdout", text };
    for (const text of script.stderr ?? []) yield { type: "line", stream: "stderr", text };

    if (script.hang) {
      await aborted(signal);
      yield { type: "line", stream: "relay", text: markerLine(toStopReason(signal.reason)) };
      yield { type: "exited", exitCode: 143, signal: "SIGTERM" };
      return;
    }
    yield { type: "exited", exitCode: script.exitCode ?? 0, signal: null };
  }
}

export interface ContainerScript {
  lines?: ContainerLogLine[];
  exitCode?: number;
  hang?: boolean;
}

interface FakeContainer {
  spec: ContainerCreateSpec;
  stopRequested: boolean;
  exitCode: number | null;
  release: () => void;
  released: Promise<void>;
}

/** In-process container runtime; containers live in a map until removed. */
export class FakeContainerRuntime implements ContainerRuntime {
  reachable = true;
  readonly images = new Set<string>(["python:3.11-slim"]);
  readonly created: ContainerCreateSpec[] = [];
  readonly stopped: string[] = [];
  script: ContainerScript = { exitCode: 0 };
  private readonly containers = new Map<string, FakeContainer>();
  private seq = 0;

  async ping(): Promise<Availability> {
    return this.reachable ? { ok: true } : { ok: false, reason: "cannot connect to the container daemon" };
  }

  async ensureImage(image: string): Promise<void> {
    if (!this.images.has(image)) throw new ConfigurationError(`container image not available: ${image}`);
  }

  async create(spec: ContainerCreateSpec): Promise<string> {
    const id = `fake-${++this.seq}`;
    let release = (): void => {};
    const released = new Promise<void>((resolve) => {
      release = resolve;
    });
    this.containers.set(id, { spec, stopRequested: false, exitCode: null, release, released });
    this.created.push(spec);
    return id;
  }

  async *attach(containerId: string): AsyncGenerator<ContainerLogLine, void, undefined> {
    const container = this.require(containerId);
    for (const line of this.script.lines ?? []) yield line;
    if (this.script.hang && !container.stopRequested) await container.released;
    container.exitCode = container.stopRequested ? 137 : this.script.exitCode ?? 0;
  }

  async wait(containerId: string): Promise<number> {
    return this.require(containerId).exitCode ?? 0;
  }

  async stop(containerId: string, _graceSeconds: number): Promise<void> {
    const container = this.require(containerId);
    container.stopRequested = true;
    this.stopped.push(containerId);
    container.release();
  }

  async remove(containerId: string): Promise<void> {
    this.containers.delete(containerId);
  }

  async list(labels: Record<string, string>): Promise<string[]> {
    return [...this.containers.entries()]
      .filter(([, c]) => Object.entries(labels).every(([k, v]) => c.spec.labels[k] === v))
      .map(([id]) => id);
  }

  private require(containerId: string): FakeContainer {
    const container = this.containers.get(containerId);
    if (!container) throw new Error(`no such container: ${containerId}`);
    return container;
  }
}

export async function collect<T>(events: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const event of events) out.push(event);
  return out;
}
