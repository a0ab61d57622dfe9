import { describe, it, expect } from "vitest";
import { runnerDefinition } from "../src/runners/registry.js";
import { dottedName } from "../src/runners/unittest.js";

describe("runner commands", () => {
  it("builds verbose pytest invocations with a native cutoff", () => {
    const pytest = runnerDefinition("pytest");
    expect(pytest.command({ python: "python3", target: { kind: "project" }, maxFailures: null, container: false })).toEqual({
      argv: ["python3", "-m", "pytest", "-v", "-rfE"],
      nativeCutoff: true
    });
    expect(
      pytest.command({
        python: "python",
        target: { kind: "path", path: "tests/test_a.py::test_x", directory: false },
        maxFailures: 3,
        container: true
      }).argv
    ).toEqual(["python", "-m", "pytest", "-v", "-rfE", "-p", "no:cacheprovider", "--maxfail=3", "tests/test_a.py::test_x"]);
    expect(pytest.command({ python: "python3", target: { kind: "project" }, maxFailures: 1, container: false }).argv).toEqual([
      "python3",
      "-m",
      "pytest",
      "-v",
      "-rfE",
      "-x"
    ]);
  });

  it("uses discovery for unittest projects and directories", () => {
    const unittest = runnerDefinition("unittest");
    expect(unittest.command({ python: "python3", target: { kind: "project" }, maxFailures: null, container: false })).toEqual({
      argv: ["python3", "-m", "unittest", "discover", "-v", "-s", ".", "-t", "."],
      nativeCutoff: false
    });
    expect(
      unittest.command({ python: "python3", target: { kind: "path", path: "tests", directory: true }, maxFailures: 1, container: false })
    ).toEqual({
      argv: ["python3", "-m", "unittest", "discover", "-v", "-f", "-s", "tests", "-t", "."],
      nativeCutoff: true
    });
  });

  it("names unittest files, node ids and last-failed ids directly", () => {
    const unittest = runnerDefinition("unittest");
    expect(
      unittest.command({
        python: "python3",
        target: { kind: "path", path: "tests/test_calc.py::CalcTest::test_div", directory: false },
        maxFailures: 2,
        container: false
      })
    ).toEqual({ argv: ["python3", "-m", "unittest", "-v", "tests.test_calc.CalcTest.test_div"], nativeCutoff: false });
    expect(
      unittest.command({
        python: "python3",
        target: { kind: "last_failed", testIds: ["tests.test_calc.CalcTest.test_div"] },
        maxFailures: null,
        container: false
      }).argv
    ).toEqual(["python3", "-m", "unittest", "-v", "tests.test_calc.CalcTest.test_div"]);
  });

  it("passes nose2 test names rather than paths", () => {
    const nose2 = runnerDefinition("nose2");
    expect(nose2.command({ python: "python3", target: { kind: "project" }, maxFailures: 1, container: false })).toEqual({
      argv: ["python3", "-m", "nose2", "-v", "--fail-fast"],
      nativeCutoff: true
    });
    expect(
      nose2.command({ python: "python3", target: { kind: "path", path: "tests/test_funcs.py", directory: false }, maxFailures: null, container: false })
        .argv
    ).toEqual(["python3", "-m", "nose2", "-v", "tests.test_funcs"]);
    expect(
      nose2.command({ python: "python3", target: { kind: "path", path: "tests", directory: true }, maxFailures: null, container: false }).argv
    ).toEqual(["python3", "-m", "nose2", "-v", "-s", "tests", "-t", "."]);
  });

  it("maps last-failed node ids from a pytest run to dotted names", () => {
    const target = { kind: "last_failed" as const, testIds: ["tests/test_calc.py::CalcTest::test_div", "tests.test_b.Case.test_y"] };
    expect(runnerDefinition("unittest").command({ python: "python3", target, maxFailures: null, container: false }).argv).toEqual([
      "python3",
      "-m",
      "unittest",
      "-v",
      "tests.test_calc.CalcTest.test_div",
      "tests.test_b.Case.test_y"
    ]);
    expect(runnerDefinition("nose2").command({ python: "python3", target, maxFailures: null, container: false }).argv).toEqual([
      "python3",
      "-m",
      "nose2",
      "-v",
      "tests.test_calc.CalcTest.test_div",
      "tests.test_b.Case.test_y"
    ]);
  });

  it("places extra runner options before the test selection", () => {
    const extraArgs = ["-k", "div", "-l"];
    expect(
      runnerDefinition("pytest").command({
        python: "python3",
        target: { kind: "path", path: "tests/test_a.py", directory: false },
        maxFailures: 2,
        container: false,
        extraArgs
      }).argv
    ).toEqual(["python3", "-m", "pytest", "-v", "-rfE", "--maxfail=2", "-k", "div", "-l", "tests/test_a.py"]);
    expect(
      runnerDefinition("unittest").command({ python: "python3", target: { kind: "project" }, maxFailures: 1, container: false, extraArgs: ["-b"] })
        .argv
    ).toEqual(["python3", "-m", "unittest", "discover", "-v", "-f", "-b", "-s", ".", "-t", "."]);
    expect(
      runnerDefinition("unittest").command({
        python: "python3",
        target: { kind: "last_failed", testIds: ["tests.test_b.Case.test_y"] },
        maxFailures: null,
        container: false,
        extraArgs: ["-b"]
      }).argv
    ).toEqual(["python3", "-m", "unittest", "-v", "-b", "tests.test_b.Case.test_y"]);
    expect(
      runnerDefinition("nose2").command({
        python: "python3",
        target: { kind: "path", path: "tests/test_funcs.py", directory: false },
        maxFailures: null,
        container: false,
        extraArgs: ["-A", "fast"]
      }).argv
    ).toEqual(["python3", "-m", "nose2", "-v", "-A", "fast", "tests.test_funcs"]);
  });

  it("converts file paths and node ids to dotted names", () => {
    expect(dottedName("./tests/unit/test_a.py")).toBe("tests.unit.test_a");
    expect(dottedName("tests/test_a.py::Case::test_x")).toBe("tests.test_a.Case.test_x");
  });

  it("recognises failure progress lines for the output watcher", () => {
    expect(runnerDefinition("unittest").grammar.failureLine.test("test_div (tests.test_calc.CalcTest.test_div) ... FAIL")).toBe(true);
    expect(runnerDefinition("unittest").grammar.failureLine.test("test_add (tests.test_calc.CalcTest.test_add) ... ok")).toBe(false);
    expect(runnerDefinition("pytest").grammar.failureLine.test("tests/test_a.py::test_x FAILED   [ 50%]")).toBe(true);
  });
});
