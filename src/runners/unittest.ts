import type { RunTarget } from "../core/testRun.js";
import { scanUnittestFamily } from "./unittestFamily.js";
import type { CommandInput, RunnerCommand, RunnerDefinition, RunnerGrammar } from "./types.js";

export const unittestGrammar: RunnerGrammar = {
  runner: "unittest",
  failureLine: / \.\.\. (?:FAIL|ERROR|unexpected success)$/,

  nothingCollected(exitCode) {
    // 5 is "NO TESTS RAN" from Python 3.12 on; older releases exit 0.
    return exitCode === 0 || exitCode === 5;
  },

  scan(lines) {
    return scanUnittestFamily(lines, { loaderPrefix: "unittest.loader.", bareNames: false });
  }
};

/** "tests/test_a.py::Case::test_x" → "tests.test_a.Case.test_x" */
export function dottedName(testPath: string): string {
  const [file = "", ...rest] = testPath.split("::");
  const module = file
    .replace(/^\.\//, "")
    .replace(/\.py$/, "")
    .split("/")
    .filter((p) => p.length > 0)
    .join(".");
  return [module, ...rest].join(".");
}

/** Last-failed ids may come from a pytest run on the same project. */
export function asTestName(testId: string): string {
  return testId.includes("::") ? dottedName(testId) : testId;
}

function selection(target: RunTarget): string[] | null {
  switch (target.kind) {
    case "project":
      return null;
    case "path":
      if (target.directory) return null;
      return [target.path.includes("::") ? dottedName(target.path) : target.path];
    case "last_failed":
      return target.testIds.map(asTestName);
  }
}

export const unittestRunner: RunnerDefinition = {
  kind: "unittest",
  grammar: unittestGrammar,

  command({ python, target, maxFailures, extraArgs = [] }: CommandInput): RunnerCommand {
    const nativeCutoff = maxFailures === 1;
    const flags = [...(nativeCutoff ? ["-v", "-f"] : ["-v"]), ...extraArgs];
    const base = [python, "-m", "unittest"];
    const names = selection(target);
    if (names) return { argv: [...base, ...flags, ...names], nativeCutoff };

    const startDir = target.kind === "path" ? target.path : ".";
    return { argv: [...base, "discover", ...flags, "-s", startDir, "-t", "."], nativeCutoff };
  }
};
