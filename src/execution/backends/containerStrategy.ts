import { ConfigurationError, ExecutionError, errorMessage } from "../../core/errors.js";
import { logger as rootLogger, type Logger } from "../../logger.js";
import { markerLine, toStopReason, type StopReason } from "../../parsing/markers.js";
import { normalizeLine } from "../../parsing/normalize.js";
import { RUN_ID_LABEL, type ContainerCreateSpec, type ContainerRuntime } from "./containerRuntime.js";
import { EventQueue } from "./eventQueue.js";
import { FailureWatch } from "./failureWatch.js";
import type { Availability, ContainerSpec, ExecuteOptions, ExecutionStrategy, OutputEvent } from "./types.js";

export const CONTAINER_WORKDIR = "/workspace";

export function containerCreateSpec(spec: ContainerSpec): ContainerCreateSpec {
  const argv = spec.setupCommand ? ["sh", "-c", `${spec.setupCommand} && exec "$@"`, "sh", ...spec.argv] : spec.argv;
  return {
    image: spec.image,
    argv,
    labels: { [RUN_ID_LABEL]: spec.runId },
    mounts: [{ hostPath: spec.projectPath, containerPath: CONTAINER_WORKDIR, readOnly: true }],
    workdir: CONTAINER_WORKDIR,
    networkMode: spec.networkMode,
    env: { PYTHONDONTWRITEBYTECODE: "1", PYTHONUNBUFFERED: "1", ...spec.env },
    readOnlyRootFs: true,
    tmpfs: ["/tmp:rw,nosuid,size=512m"]
  };
}

/**
 * Runs the test command in an ephemeral container. The container is removed on
 * every exit path: completion, cutoff, abort, errors, and early return by the
 * consumer.
 */
export class ContainerStrategy implements ExecutionStrategy<"container"> {
  readonly kind = "container" as const;

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly log: Logger = rootLogger
  ) {}

  available(): Promise<Availability> {
    return this.runtime.ping();
  }

  async prepare(spec: ContainerSpec): Promise<void> {
    const availability = await this.runtime.ping();
    if (!availability.ok) {
      throw new ConfigurationError(`container runtime unavailable: ${availability.reason}`);
    }
    await this.runtime.ensureImage(spec.image);
  }

  async *execute(spec: ContainerSpec, { signal }: ExecuteOptions): AsyncGenerator<OutputEvent, void, undefined> {
    if (signal.aborted) {
      yield { type: "line", stream: "relay", text: markerLine(toStopReason(signal.reason)) };
      yield { type: "exited", exitCode: null, signal: null };
      return;
    }

    let containerId: string;
    try {
      containerId = await this.runtime.create(containerCreateSpec(spec));
    } catch (err) {
      if (err instanceof ConfigurationError || err instanceof ExecutionError) throw err;
      throw new ExecutionError(`failed to create container: ${errorMessage(err)}`, { cause: err });
    }

    const log = this.log.child({ containerId, run_id: spec.runId });

    // aborted while the container was being created: never start it
    if (signal.aborted) {
      try {
        yield { type: "line", stream: "relay", text: markerLine(toStopReason(signal.reason)) };
        yield { type: "exited", exitCode: null, signal: null };
      } finally {
        await this.removeQuietly(containerId, log);
      }
      return;
    }
    const graceSeconds = Math.max(1, Math.ceil(spec.killGraceMs / 1000));
    const queue = new EventQueue<OutputEvent>();
    const watch = new FailureWatch(spec.cutoff);
    let stopping: Promise<void> | null = null;

    const halt = (): void => {
      if (stopping) return;
      stopping = this.runtime.stop(containerId, graceSeconds).catch((err: unknown) => {
        log.warn({ err }, "failed to stop container");
      });
    };
    const stop = (reason: StopReason): void => {
      queue.push({ type: "line", stream: "relay", text: markerLine(reason) });
      halt();
    };

    try {
      queue.push({ type: "started", pid: null, containerId });

      const pump = async (): Promise<number> => {
        for await (const line of this.runtime.attach(containerId)) {
          queue.push({ type: "line", stream: line.stream, text: line.text });
          if (watch.observe(normalizeLine(line.text))) {
            log.info({ failures: watch.failures }, "max_failures reached, stopping container");
            queue.push({ type: "cutoff", failures: watch.failures });
            stop({ kind: "cutoff", failures: watch.failures });
          }
        }
        return this.runtime.wait(containerId);
      };

      const finished = pump().then(
        (exitCode) => {
          queue.push({ type: "exited", exitCode, signal: null });
          queue.close();
        },
        (err: unknown) => {
          queue.fail(err instanceof ExecutionError ? err : new ExecutionError(`container run failed: ${errorMessage(err)}`, { cause: err }));
        }
      );

      const onAbort = (): void => stop(toStopReason(signal.reason));
      signal.addEventListener("abort", onAbort, { once: true });
      if (signal.aborted) onAbort();

      try {
        for await (const event of queue) yield event;
      } finally {
        signal.removeEventListener("abort", onAbort);
        if (!queue.isClosed) halt();
        await finished;
      }
    } finally {
      if (stopping) await stopping;
      await this.removeQuietly(containerId, log);
    }
  }

  private async removeQuietly(containerId: string, log: Logger): Promise<void> {
    try {
      await this.runtime.remove(containerId);
    } catch (err) {
      log.error({ err }, "failed to remove container");
    }
  }
}
