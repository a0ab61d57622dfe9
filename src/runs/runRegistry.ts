import { ConflictError } from "../core/errors.js";
import type { RunId } from "../core/ids.js";
import type { TestRunRecord } from "../core/testRun.js";

export interface ActiveRun {
  runId: RunId;
  projectPath: string;
  controller: AbortController;
  /** Settles with the finalized record; never rejects. */
  done: Promise<TestRunRecord>;
}

/**
 * In-flight runs, keyed by project path (single-flight) and by run id. Owned by
 * one coordinator; claims are synchronous so two concurrent requests for the
 * same project cannot both pass.
 */
export class RunRegistry {
  private readonly claims = new Map<string, RunId>();
  private readonly active = new Map<RunId, ActiveRun>();

  claim(projectPath: string, runId: RunId): void {
    const holder = this.claims.get(projectPath);
    if (holder) {
      throw new ConflictError(`a test run is already in flight for ${projectPath}: ${holder}`, holder);
    }
    this.claims.set(projectPath, runId);
  }

  activate(run: ActiveRun): void {
    this.active.set(run.runId, run);
  }

  release(projectPath: string, runId: RunId): void {
    if (this.claims.get(projectPath) === runId) this.claims.delete(projectPath);
    this.active.delete(runId);
  }

  get(runId: RunId): ActiveRun | undefined {
    return this.active.get(runId);
  }

  holderOf(projectPath: string): RunId | undefined {
    return this.claims.get(projectPath);
  }

  all(): ActiveRun[] {
    return [...this.active.values()];
  }
}
