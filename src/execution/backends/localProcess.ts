import { spawn } from "child_process";
import { promises as fs } from "fs";
import { ConfigurationError, ExecutionError, errorMessage } from "../../core/errors.js";
import { logger as rootLogger, type Logger } from "../../logger.js";
import { markerLine, toStopReason, type StopReason } from "../../parsing/markers.js";
import { normalizeLine } from "../../parsing/normalize.js";
import { EventQueue } from "./eventQueue.js";
import { FailureWatch } from "./failureWatch.js";
import { ProcessTerminator, pumpLines, spawned } from "./processLines.js";
import type { Availability, ExecuteOptions, ExecutionStrategy, LocalProcessSpec, OutputEvent } from "./types.js";

function isMissingExecutable(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

export class LocalProcessStrategy implements ExecutionStrategy<"local_process"> {
  readonly kind = "local_process" as const;

  constructor(private readonly log: Logger = rootLogger) {}

  async available(): Promise<Availability> {
    return { ok: true };
  }

  async prepare(spec: LocalProcessSpec): Promise<void> {
    const st = await fs.stat(spec.cwd).catch(() => null);
    if (!st?.isDirectory()) {
      throw new ConfigurationError(`project_path is not a directory: ${spec.cwd}`);
    }
  }

  async *execute(spec: LocalProcessSpec, { signal }: ExecuteOptions): AsyncGenerator<OutputEvent, void, undefined> {
    const [command, ...args] = spec.argv;
    if (!command) throw new ExecutionError("local_process argv must be non-empty");

    if (signal.aborted) {
      yield { type: "line", stream: "relay", text: markerLine(toStopReason(signal.reason)) };
      yield { type: "exited", exitCode: null, signal: null };
      return;
    }

    const child = spawn(command, args, {
      cwd: spec.cwd,
      env: { ...process.env, PYTHONUNBUFFERED: "1", ...spec.env },
      stdio: ["ignore", "pipe", "pipe"] as const,
      // own process group so termination reaches anything the runner forks
      detached: true
    });

    try {
      await spawned(child);
    } catch (err) {
      if (isMissingExecutable(err)) {
        throw new ExecutionError(`runner executable not found: ${command}`, { cause: err });
      }
      throw new ExecutionError(`failed to start ${command}: ${errorMessage(err)}`, { cause: err });
    }

    const log = this.log.child({ pid: child.pid });
    log.debug({ argv: spec.argv, cwd: spec.cwd }, "runner started");

    const queue = new EventQueue<OutputEvent>();
    const watch = new FailureWatch(spec.cutoff);
    const terminator = new ProcessTerminator(child, spec.killGraceMs);

    const stop = (reason: StopReason): void => {
      queue.push({ type: "line", stream: "relay", text: markerLine(reason) });
      terminator.terminate();
    };

    queue.push({ type: "started", pid: child.pid ?? null, containerId: null });

    const finished = pumpLines(child, (stream, text) => {
      queue.push({ type: "line", stream, text });
      if (watch.observe(normalizeLine(text))) {
        log.info({ failures: watch.failures }, "max_failures reached, stopping runner");
        queue.push({ type: "cutoff", failures: watch.failures });
        stop({ kind: "cutoff", failures: watch.failures });
      }
    }).then(
      (exit) => {
        log.debug(exit, "runner exited");
        queue.push({ type: "exited", exitCode: exit.exitCode, signal: exit.signal });
        queue.close();
      },
      (err: unknown) => queue.fail(err)
    );

    const onAbort = (): void => stop(toStopReason(signal.reason));
    signal.addEventListener("abort", onAbort, { once: true });
    if (signal.aborted) onAbort();

    try {
      for await (const event of queue) yield event;
    } finally {
      signal.removeEventListener("abort", onAbort);
      // consumer stopped iterating before the runner finished
      if (!queue.isClosed) terminator.terminate();
      await finished;
      terminator.dispose();
    }
  }
}
