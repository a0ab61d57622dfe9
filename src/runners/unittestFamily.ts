import type { OutcomeCounts } from "../core/testRun.js";
import { zeroCounts } from "../core/testRun.js";
import { FailureCollector, clipMessage, formatCounts } from "./common.js";
import type { FinalSummary, GrammarScan, ProgressEntry, TestResult } from "./types.js";

// "test_x (pkg.mod.Case.test_x) ... ok"; on Python < 3.11 the parens hold only "pkg.mod.Case".
// Loader failures name the module: "pkg.test_mod (unittest.loader._FailedTest.pkg.test_mod)".
const CASE_LINE = /^([\w.]+) \(([\w.]+)\)(?: \.\.\.(?: (.*))?)?$/;
// nose2 function tests: "pkg.mod.test_func ... ok"
const BARE_LINE = /^([A-Za-z_]\w*(?:\.\w+)+(?::\d+)?) \.\.\.(?: (.*))?$/;
const DOCSTRING_RESULT = /^.* \.\.\.(?: (.*))?$/;
const BLOCK_HEADER = /^(FAIL|ERROR|UNEXPECTED SUCCESS): (?:([\w.]+) \(([\w.]+)\)|([A-Za-z_][\w.:]*))/;
const RULE = /^(?:={20,}|-{20,})$/;
const RAN = /^Ran (\d+) tests? in (\d+(?:\.\d+)?)s$/;
const STATUS_OK = /^OK(?: \((.*)\))?$/;
const STATUS_FAILED = /^FAILED \((.*)\)$/;
const STATUS_NONE = /^NO TESTS RAN$/;

export interface FamilyOptions {
  /** Class-name prefix the loader uses for modules it could not import. */
  loaderPrefix: string;
  /** Accept nose2's "dotted.name ... status" progress lines. */
  bareNames: boolean;
}

function caseId(method: string, paren: string): string {
  return paren === method || paren.endsWith(`.${method}`) ? paren : `${paren}.${method}`;
}

function resultOf(status: string): TestResult | null {
  const s = status.trim();
  if (s === "ok") return "passed";
  if (s === "FAIL") return "failed";
  if (s === "ERROR") return "errored";
  if (s.startsWith("skipped") || s === "skip") return "skipped";
  if (s === "expected failure") return "xfailed";
  if (s === "unexpected success") return "failed";
  return null;
}

function trailerCounts(ran: number, detail: string | undefined): OutcomeCounts {
  const counts = zeroCounts();
  for (const part of (detail ?? "").split(",")) {
    const m = /^\s*([a-z ]+)=(\d+)\s*$/.exec(part);
    if (!m?.[1]) continue;
    const n = Number(m[2]);
    switch (m[1]) {
      case "failures":
      case "unexpected successes":
        counts.failed += n;
        break;
      case "errors":
        counts.errored += n;
        break;
      case "skipped":
        counts.skipped += n;
        break;
      case "expected failures":
        counts.xfailed += n;
        break;
      default:
        break;
    }
  }
  counts.passed = Math.max(0, ran - counts.failed - counts.errored - counts.skipped - counts.xfailed);
  return counts;
}

interface Block {
  testId: string;
  /** The name before the parentheses: a method, or the module a loader failed on. */
  name: string;
  kind: "failed" | "errored";
  loader: boolean;
  /** The dashed rule right under the header has been seen. */
  opened: boolean;
  body: string[];
}

export function scanUnittestFamily(lines: readonly string[], options: FamilyOptions): GrammarScan {
  const progress: ProgressEntry[] = [];
  const failures = new FailureCollector();
  const blocks: Block[] = [];
  let summary: FinalSummary | null = null;
  let ran: { count: number; seconds: string } | null = null;
  let block: Block | null = null;
  let pendingDocstring: string | null = null;

  const record = (testId: string, status: string | undefined, loader: boolean): void => {
    const result = status === undefined ? null : resultOf(status);
    progress.push({ testId, result });
    if ((result === "failed" || result === "errored") && !loader) failures.note(testId, result);
  };

  for (let idx = 0; idx < lines.length; idx++) {
    const line = lines[idx] ?? "";

    if (block) {
      if (RULE.test(line)) {
        if (!block.opened) {
          block.opened = true;
          continue;
        }
        blocks.push(block);
        block = null;
      } else {
        block.body.push(line);
        continue;
      }
    }

    const header = BLOCK_HEADER.exec(line);
    if (header?.[1]) {
      const paren = header[3];
      const testId = header[2] && paren ? caseId(header[2], paren) : header[4] ?? "<unknown>";
      const loader = (paren ?? testId).startsWith(options.loaderPrefix);
      block = { testId, name: header[2] ?? testId, kind: header[1] === "ERROR" ? "errored" : "failed", loader, opened: false, body: [] };
      continue;
    }

    if (pendingDocstring) {
      const d = DOCSTRING_RESULT.exec(line);
      const testId = pendingDocstring;
      pendingDocstring = null;
      if (d) {
        const last = progress[progress.length - 1];
        if (last && last.testId === testId && last.result === null) progress.pop();
        record(testId, d[1], false);
        continue;
      }
    }

    const c = CASE_LINE.exec(line);
    if (c?.[1] && c[2]) {
      const testId = caseId(c[1], c[2]);
      const loader = c[2].startsWith(options.loaderPrefix);
      const hasEllipsis = line.includes(" ...");
      record(testId, hasEllipsis ? c[3] : undefined, loader);
      if (!hasEllipsis) pendingDocstring = testId;
      continue;
    }

    if (options.bareNames) {
      const b = BARE_LINE.exec(line);
      if (b?.[1]) {
        record(b[1], b[2], b[1].startsWith(options.loaderPrefix));
        continue;
      }
    }

    const r = RAN.exec(line);
    if (r?.[1] && r[2]) {
      ran = { count: Number(r[1]), seconds: r[2] };
      continue;
    }

    if (ran) {
      const ok = STATUS_OK.exec(line);
      const failed = ok ? null : STATUS_FAILED.exec(line);
      if (ok || failed || STATUS_NONE.test(line)) {
        const counts = trailerCounts(ran.count, ok?.[1] ?? failed?.[1]);
        summary = { counts, text: formatCounts(counts, ran.seconds) };
        ran = null;
      }
    }
  }
  if (block) blocks.push(block);

  let collectionError: string | null = null;
  for (const b of blocks) {
    const body = b.body.map((l) => l.trim()).filter((l) => l.length > 0 && !/^-+$/.test(l));
    const lastLine = body[body.length - 1];
    if (b.loader) {
      if (collectionError) continue;
      const first = body[0];
      const detail = first && lastLine && first !== lastLine ? `${first} (${lastLine})` : lastLine ?? first;
      collectionError = `failed to load ${b.name}: ${detail ? clipMessage(detail) : "import error"}`;
      continue;
    }
    failures.note(b.testId, b.kind, lastLine ? clipMessage(lastLine) : null);
  }

  return { summary, progress, failures: failures.toFailingTests(), collectionError, usageError: null };
}
