import type { OutcomeCounts, RunTarget } from "../core/testRun.js";
import { zeroCounts } from "../core/testRun.js";
import { FailureCollector, clipMessage } from "./common.js";
import type { CommandInput, FinalSummary, GrammarScan, ProgressEntry, RunnerCommand, RunnerDefinition, RunnerGrammar, TestResult } from "./types.js";

// a node id; parametrize ids in brackets may contain spaces ("test_split[a b]")
const NODE_ID = String.raw`\S+?::[^\s\[]+(?:\[[^\]]*\])?`;
const PROGRESS = new RegExp(`^(${NODE_ID})\\s+(PASSED|FAILED|ERROR|SKIPPED|XFAIL|XPASS)\\b`);
const ANNOUNCED = new RegExp(`^(${NODE_ID})$`);
const SUMMARY = /^=*\s*((?:\d+ [a-z]+)(?:, \d+ [a-z]+)*|no tests ran) in (\d+(?:\.\d+)?)s\b/;
const SHORT_SUMMARY = new RegExp(`^(FAILED|ERROR) (${NODE_ID}|\\S+)(?: - (.*))?$`);
const SECTION = /^_{3,} (.+?) _{3,}$/;
const SECTION_END = /^={3,}/;
const E_LINE = /^E\s+(.+)$/;
const INTERRUPTED = /Interrupted: \d+ errors? during collection/;
const COLLECT_TITLE = /^ERROR collecting (.+)$/;
const USAGE_ERROR = /^ERROR: (.+)$/;

const RESULTS: Record<string, TestResult> = {
  PASSED: "passed",
  XPASS: "passed",
  FAILED: "failed",
  ERROR: "errored",
  SKIPPED: "skipped",
  XFAIL: "xfailed"
};

function summaryCounts(text: string): OutcomeCounts {
  const counts = zeroCounts();
  for (const m of text.matchAll(/(\d+) ([a-z]+)/g)) {
    const n = Number(m[1]);
    switch (m[2]) {
      case "passed":
      case "xpassed":
        counts.passed += n;
        break;
      case "failed":
        counts.failed += n;
        break;
      case "error":
      case "errors":
        counts.errored += n;
        break;
      case "skipped":
        counts.skipped += n;
        break;
      case "xfailed":
        counts.xfailed += n;
        break;
      default:
        // warnings, deselected, rerun: not test outcomes
        break;
    }
  }
  return counts;
}

/** "test_x", "TestCls.test_x" or "ERROR at setup of test_x" as the node id suffix it names. */
function sectionKey(title: string): string {
  return title.replace(/^ERROR at (?:setup|teardown) of /, "").replace(/\.(?![^[]*\])/g, "::");
}

function nodeKey(testId: string): string {
  return testId.split("::").slice(1).join("::");
}

export const pytestGrammar: RunnerGrammar = {
  runner: "pytest",
  failureLine: new RegExp(`^${NODE_ID}\\s+(?:FAILED|ERROR)\\b`),

  nothingCollected(exitCode) {
    return exitCode === 0 || exitCode === 5;
  },

  scan(lines): GrammarScan {
    const progress: ProgressEntry[] = [];
    const failures = new FailureCollector();
    const sectionMessages = new Map<string, string>();
    let summary: FinalSummary | null = null;
    let interrupted: string | null = null;
    let collectFailure: { path: string; message: string | null } | null = null;
    let usageError: string | null = null;
    let section: { key: string; collecting: string | null; captured: boolean } | null = null;

    for (const line of lines) {
      const p = PROGRESS.exec(line);
      if (p?.[1] && p[2]) {
        const result = RESULTS[p[2]] ?? null;
        progress.push({ testId: p[1], result });
        if (result === "failed" || result === "errored") failures.note(p[1], result);
        continue;
      }

      const a = ANNOUNCED.exec(line);
      if (a?.[1]) {
        progress.push({ testId: a[1], result: null });
        continue;
      }

      const s = SUMMARY.exec(line);
      if (s?.[1] && s[2]) {
        summary = { counts: summaryCounts(s[1]), text: `${s[1]} in ${s[2]}s` };
        section = null;
        continue;
      }

      const i = INTERRUPTED.exec(line);
      if (i) {
        interrupted = i[0];
        continue;
      }

      const short = SHORT_SUMMARY.exec(line);
      if (short?.[1] && short[2] && short[2].includes("::")) {
        const kind = short[1] === "ERROR" ? "errored" : "failed";
        failures.note(short[2], kind, short[3] ? clipMessage(short[3]) : null);
        continue;
      }

      const u = USAGE_ERROR.exec(line);
      if (u?.[1] && !usageError) {
        usageError = line;
        continue;
      }

      const title = SECTION.exec(line);
      if (title?.[1]) {
        const collecting = COLLECT_TITLE.exec(title[1])?.[1] ?? null;
        section = { key: sectionKey(title[1]), collecting, captured: false };
        if (collecting && !collectFailure) collectFailure = { path: collecting, message: null };
        continue;
      }

      if (SECTION_END.test(line)) {
        section = null;
        continue;
      }

      const e = E_LINE.exec(line);
      if (e?.[1] && section && !section.captured) {
        section.captured = true;
        const message = clipMessage(e[1]);
        if (section.collecting) {
          if (collectFailure && collectFailure.path === section.collecting) collectFailure.message = message;
        } else {
          sectionMessages.set(section.key, message);
        }
      }
    }

    for (const testId of failures.ids()) {
      const message = sectionMessages.get(nodeKey(testId));
      if (message) failures.setMessage(testId, message);
    }

    let collectionError: string | null = null;
    if (interrupted) {
      const detail = collectFailure ? `; ${collectFailure.path}${collectFailure.message ? `: ${collectFailure.message}` : ""}` : "";
      collectionError = `${interrupted}${detail}`;
    }

    return { summary, progress, failures: failures.toFailingTests(), collectionError, usageError };
  }
};

function targetArgs(target: RunTarget): string[] {
  switch (target.kind) {
    case "project":
      return [];
    case "path":
      return [target.path];
    case "last_failed":
      return [...target.testIds];
  }
}

export const pytestRunner: RunnerDefinition = {
  kind: "pytest",
  grammar: pytestGrammar,

  command({ python, target, maxFailures, container, extraArgs = [] }: CommandInput): RunnerCommand {
    const argv = [python, "-m", "pytest", "-v", "-rfE"];
    // the project is mounted read-only inside containers
    if (container) argv.push("-p", "no:cacheprovider");
    if (maxFailures !== null) argv.push(maxFailures === 1 ? "-x" : `--maxfail=${maxFailures}`);
    argv.push(...extraArgs, ...targetArgs(target));
    return { argv, nativeCutoff: true };
  }
};
