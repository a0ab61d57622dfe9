import { spawn } from "child_process";
import { ConfigurationError, ExecutionError, errorMessage } from "../../core/errors.js";
import type { ContainerCreateSpec, ContainerLogLine, ContainerRuntime } from "./containerRuntime.js";
import { EventQueue } from "./eventQueue.js";
import { pumpLines, spawned } from "./processLines.js";
import type { Availability } from "./types.js";

const MAX_CAPTURE_BYTES = 1024 * 1024;

interface CliResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

function appendLimited(chunks: Buffer[], chunk: Buffer, state: { bytes: number }): void {
  if (state.bytes >= MAX_CAPTURE_BYTES) return;
  const keep = Math.min(chunk.byteLength, MAX_CAPTURE_BYTES - state.bytes);
  chunks.push(keep < chunk.byteLength ? chunk.subarray(0, keep) : chunk);
  state.bytes += keep;
}

export function createArgs(spec: ContainerCreateSpec): string[] {
  const args: string[] = ["create", "--init"];

  for (const [k, v] of Object.entries(spec.labels)) {
    args.push("--label", `${k}=${v}`);
  }

  args.push("--network", spec.networkMode);

  if (spec.readOnlyRootFs) {
    args.push("--read-only");
  }

  for (const t of spec.tmpfs) {
    args.push("--tmpfs", t);
  }

  for (const [k, v] of Object.entries(spec.env)) {
    args.push("--env", `${k}=${v}`);
  }

  for (const m of spec.mounts) {
    const mode = m.readOnly ? "ro" : "rw";
    args.push("--volume", `${m.hostPath}:${m.containerPath}:${mode}`);
  }

  args.push("--workdir", spec.workdir);
  args.push(spec.image, ...spec.argv);
  return args;
}

/** Drives the docker CLI; every call is a short-lived `docker` subprocess. */
export class DockerCliRuntime implements ContainerRuntime {
  constructor(private readonly binary = "docker") {}

  private run(args: string[]): Promise<CliResult> {
    return new Promise<CliResult>((resolve, reject) => {
      const child = spawn(this.binary, args, { stdio: ["ignore", "pipe", "pipe"] as const });
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      const stdoutState = { bytes: 0 };
      const stderrState = { bytes: 0 };

      child.stdout.on("data", (chunk: Buffer) => appendLimited(stdoutChunks, chunk, stdoutState));
      child.stderr.on("data", (chunk: Buffer) => appendLimited(stderrChunks, chunk, stderrState));
      child.on("error", reject);
      child.on("close", (code: number | null) =>
        resolve({
          code,
          stdout: Buffer.concat(stdoutChunks).toString("utf8"),
          stderr: Buffer.concat(stderrChunks).toString("utf8")
        })
      );
    });
  }

  private async runOrThrow(args: string[], context: string): Promise<string> {
    const result = await this.run(args).catch((err: unknown) => {
      throw new ExecutionError(`${context}: ${errorMessage(err)}`, { cause: err });
    });
    if (result.code !== 0) {
      throw new ExecutionError(`${context}: ${result.stderr.trim() || `exit code ${result.code}`}`);
    }
    return result.stdout.trim();
  }

  async ping(): Promise<Availability> {
    try {
      const result = await this.run(["version", "--format", "{{.Server.Version}}"]);
      if (result.code === 0) return { ok: true };
      return { ok: false, reason: result.stderr.trim() || `docker version exited with code ${result.code}` };
    } catch (err) {
      return { ok: false, reason: `${this.binary} not runnable: ${errorMessage(err)}` };
    }
  }

  async ensureImage(image: string): Promise<void> {
    const inspect = await this.run(["image", "inspect", "--format", "{{.Id}}", image]);
    if (inspect.code === 0) return;

    const pull = await this.run(["pull", "--quiet", image]);
    if (pull.code !== 0) {
      throw new ConfigurationError(`container image not available: ${image}: ${pull.stderr.trim() || "pull failed"}`);
    }
  }

  async create(spec: ContainerCreateSpec): Promise<string> {
    const id = await this.runOrThrow(createArgs(spec), "docker create failed");
    if (!id) throw new ExecutionError("docker create returned no container id");
    return id;
  }

  async *attach(containerId: string): AsyncGenerator<ContainerLogLine, void, undefined> {
    const child = spawn(this.binary, ["start", "--attach", containerId], { stdio: ["ignore", "pipe", "pipe"] as const });
    await spawned(child);

    const queue = new EventQueue<ContainerLogLine>();
    const finished = pumpLines(child, (stream, text) => queue.push({ stream, text })).then(
      () => queue.close(),
      (err: unknown) => queue.fail(err)
    );

    try {
      for await (const line of queue) yield line;
    } finally {
      await finished;
    }
  }

  async wait(containerId: string): Promise<number> {
    const state = await this.runOrThrow(
      ["container", "inspect", "--format", "{{.State.Status}} {{.State.ExitCode}}", containerId],
      "docker inspect failed"
    );
    const [status = "", code = ""] = state.split(" ");
    if (status === "created") {
      throw new ExecutionError(`container ${containerId} never started`);
    }
    const raw = status === "running" ? await this.runOrThrow(["wait", containerId], "docker wait failed") : code;
    const exitCode = Number.parseInt(raw, 10);
    if (Number.isNaN(exitCode)) throw new ExecutionError(`unexpected container exit status: ${raw}`);
    return exitCode;
  }

  async stop(containerId: string, graceSeconds: number): Promise<void> {
    await this.runOrThrow(["stop", "--time", String(graceSeconds), containerId], "docker stop failed");
  }

  async remove(containerId: string): Promise<void> {
    const result = await this.run(["rm", "--force", containerId]);
    if (result.code !== 0 && !/No such container/i.test(result.stderr)) {
      throw new ExecutionError(`docker rm failed: ${result.stderr.trim()}`);
    }
  }

  async list(labels: Record<string, string>): Promise<string[]> {
    const filters = Object.entries(labels).flatMap(([k, v]) => ["--filter", `label=${k}=${v}`]);
    const out = await this.runOrThrow(["ps", "--all", "--quiet", "--no-trunc", ...filters], "docker ps failed");
    return out.split("\n").filter((l) => l.trim().length > 0);
  }
}
