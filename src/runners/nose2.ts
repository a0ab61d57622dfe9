import type { RunTarget } from "../core/testRun.js";
import { scanUnittestFamily } from "./unittestFamily.js";
import { asTestName, dottedName } from "./unittest.js";
import type { CommandInput, RunnerCommand, RunnerDefinition, RunnerGrammar } from "./types.js";

export const nose2Grammar: RunnerGrammar = {
  runner: "nose2",
  failureLine: / \.\.\. (?:FAIL|ERROR|unexpected success)$/,

  nothingCollected(exitCode) {
    return exitCode === 0 || exitCode === 5;
  },

  scan(lines) {
    return scanUnittestFamily(lines, { loaderPrefix: "nose2.loader.", bareNames: true });
  }
};

function targetArgs(target: RunTarget): string[] {
  switch (target.kind) {
    case "project":
      return [];
    case "path":
      // nose2 takes test names, not file paths
      return target.directory ? ["-s", target.path, "-t", "."] : [dottedName(target.path)];
    case "last_failed":
      return target.testIds.map(asTestName);
  }
}

export const nose2Runner: RunnerDefinition = {
  kind: "nose2",
  grammar: nose2Grammar,

  command({ python, target, maxFailures, extraArgs = [] }: CommandInput): RunnerCommand {
    const nativeCutoff = maxFailures === 1;
    const argv = [python, "-m", "nose2", "-v"];
    if (nativeCutoff) argv.push("--fail-fast");
    argv.push(...extraArgs, ...targetArgs(target));
    return { argv, nativeCutoff };
  }
};
