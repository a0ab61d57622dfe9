import type { RunnerKind } from "../core/testRun.js";
import { nose2Runner } from "./nose2.js";
import { pytestRunner } from "./pytest.js";
import type { RunnerDefinition } from "./types.js";
import { unittestRunner } from "./unittest.js";

const RUNNERS: Record<RunnerKind, RunnerDefinition> = {
  pytest: pytestRunner,
  unittest: unittestRunner,
  nose2: nose2Runner
};

export function runnerDefinition(kind: RunnerKind): RunnerDefinition {
  return RUNNERS[kind];
}
