import type { ChildProcessByStdio } from "child_process";
import { once } from "events";
import os from "os";
import * as readline from "readline";
import type { Readable } from "stream";

export type PipedChild = ChildProcessByStdio<null, Readable, Readable>;

export interface ChildExit {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
}

export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number | null {
  if (code !== null) return code;
  if (!signal) return null;
  const signum = Object.entries(os.constants.signals).find(([name]) => name === signal)?.[1];
  return signum === undefined ? null : 128 + signum;
}

/** Resolves once the child has started, rejects with the spawn error (e.g. ENOENT). */
export function spawned(child: PipedChild): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const onError = (err: Error): void => {
      child.off("spawn", onSpawn);
      reject(err);
    };
    const onSpawn = (): void => {
      child.off("error", onError);
      resolve();
    };
    child.once("error", onError);
    child.once("spawn", onSpawn);
  });
}

/**
 * Forwards each stdout/stderr line as it is produced and resolves after both
 * streams are drained and the child has exited.
 */
export async function pumpLines(child: PipedChild, onLine: (stream: "stdout" | "stderr", text: string) => void): Promise<ChildExit> {
  const out = readline.createInterface({ input: child.stdout, crlfDelay: Infinity });
  const err = readline.createInterface({ input: child.stderr, crlfDelay: Infinity });
  out.on("line", (text: string) => onLine("stdout", text));
  err.on("line", (text: string) => onLine("stderr", text));

  const exited = new Promise<ChildExit>((resolve) => {
    child.once("close", (code: number | null, signal: NodeJS.Signals | null) => {
      resolve({ exitCode: exitCodeOf(code, signal), signal });
    });
  });

  const [, , exit] = await Promise.all([once(out, "close"), once(err, "close"), exited]);
  return exit;
}

/** SIGTERM to the child's process group, then SIGKILL once the grace period runs out. */
export class ProcessTerminator {
  private killTimer: NodeJS.Timeout | null = null;
  private requested = false;
  // "close" rather than "exit": grandchildren holding the pipes keep the run alive
  private closed = false;

  constructor(
    private readonly child: PipedChild,
    private readonly graceMs: number
  ) {
    child.once("close", () => {
      this.closed = true;
      this.dispose();
    });
  }

  private signalGroup(signal: NodeJS.Signals): void {
    const pid = this.child.pid;
    if (pid === undefined) return;
    try {
      process.kill(-pid, signal);
    } catch {
      // not a group leader (or the group is gone): signal the child alone
      this.child.kill(signal);
    }
  }

  terminate(): void {
    if (this.requested || this.closed) return;
    this.requested = true;
    this.signalGroup("SIGTERM");
    this.killTimer = setTimeout(() => {
      if (!this.closed) this.signalGroup("SIGKILL");
    }, this.graceMs);
    this.killTimer.unref();
  }

  dispose(): void {
    if (this.killTimer) clearTimeout(this.killTimer);
    this.killTimer = null;
  }
}
