import { describe, it, expect } from "vitest";
import { ParseError } from "../src/core/errors.js";
import { parseOutput } from "../src/parsing/outputParser.js";
import { normalizeLine, normalizeOutput } from "../src/parsing/normalize.js";

const lines = (...l: string[]): string => l.join("\n") + "\n";

describe("parseOutput: pytest", () => {
  it("reads a passing session", () => {
    const stdout = lines(
      "============================= test session starts ==============================",
      "collected 3 items",
      "",
      "tests/test_math.py::test_add PASSED                                      [ 33%]",
      "tests/test_math.py::test_sub PASSED                                      [ 66%]",
      "tests/test_math.py::test_mul PASSED                                      [100%]",
      "",
      "============================== 3 passed in 0.02s ==============================="
    );

    const { verdict, outcome } = parseOutput("pytest", stdout, "", 0);
    expect(verdict).toBe("tests_ran");
    expect(outcome.counts).toEqual({ passed: 3, failed: 0, errored: 0, skipped: 0, xfailed: 0 });
    expect(outcome.failingTests).toEqual([]);
    expect(outcome.summaryText).toBe("3 passed in 0.02s");
  });

  it("takes failure messages from the short summary and E lines", () => {
    const stdout = lines(
      "tests/test_math.py::test_add PASSED                                      [ 50%]",
      "tests/test_math.py::test_div FAILED                                      [100%]",
      "",
      "=================================== FAILURES ===================================",
      "___________________________________ test_div ___________________________________",
      "",
      "    def test_div():",
      ">       assert 1 / 1 == 2",
      "E       assert 1.0 == 2",
      "",
      "tests/test_math.py:7: AssertionError",
      "=========================== short test summary info ============================",
      "FAILED tests/test_math.py::test_div - assert 1.0 == 2",
      "========================= 1 failed, 1 passed in 0.03s =========================="
    );

    const { verdict, outcome } = parseOutput("pytest", stdout, "", 1);
    expect(verdict).toBe("tests_ran");
    expect(outcome.counts).toEqual({ passed: 1, failed: 1, errored: 0, skipped: 0, xfailed: 0 });
    expect(outcome.failingTests).toEqual([{ testId: "tests/test_math.py::test_div", shortMessage: "assert 1.0 == 2" }]);
    expect(outcome.summaryText).toBe("1 failed, 1 passed in 0.03s");
  });

  it("keeps parametrized ids that contain spaces", () => {
    const stdout = lines(
      "tests/test_s.py::test_split[a b] FAILED                                  [ 50%]",
      "tests/test_s.py::test_split[c] PASSED                                    [100%]",
      "",
      "=================================== FAILURES ===================================",
      "_______________________________ test_split[a b] ________________________________",
      "E       AssertionError: boom",
      "=========================== short test summary info ============================",
      "FAILED tests/test_s.py::test_split[a b] - AssertionError: boom",
      "========================= 1 failed, 1 passed in 0.03s =========================="
    );

    const { verdict, outcome } = parseOutput("pytest", stdout, "", 1);
    expect(verdict).toBe("tests_ran");
    expect(outcome.counts).toEqual({ passed: 1, failed: 1, errored: 0, skipped: 0, xfailed: 0 });
    expect(outcome.failingTests).toEqual([{ testId: "tests/test_s.py::test_split[a b]", shortMessage: "AssertionError: boom" }]);
  });

  it("matches failure sections of dotted parametrize ids", () => {
    const stdout = lines(
      "tests/test_s.py::TestRound::test_half[1.5] FAILED",
      "________________________ TestRound.test_half[1.5] _________________________",
      "E       assert 2 == 1",
      "============================== 1 failed in 0.02s ==============================="
    );

    const { outcome } = parseOutput("pytest", stdout, "", 1);
    expect(outcome.failingTests).toEqual([{ testId: "tests/test_s.py::TestRound::test_half[1.5]", shortMessage: "assert 2 == 1" }]);
  });

  it("reports a collection error with the module and its exception", () => {
    const stdout = lines(
      "collected 0 items / 1 error",
      "",
      "==================================== ERRORS ====================================",
      "____________________ ERROR collecting tests/test_broken.py _____________________",
      "ImportError while importing test module '/proj/tests/test_broken.py'.",
      "Traceback:",
      "tests/test_broken.py:1: in <module>",
      "    import missing_dep",
      "E   ModuleNotFoundError: No module named 'missing_dep'",
      "=========================== short test summary info ============================",
      "ERROR tests/test_broken.py",
      "!!!!!!!!!!!!!!!!!!!! Interrupted: 1 error during collection !!!!!!!!!!!!!!!!!!!!",
      "=============================== 1 error in 0.05s ==============================="
    );

    const { verdict, outcome } = parseOutput("pytest", stdout, "", 2);
    expect(verdict).toBe("collection_error");
    expect(outcome.summaryText).toBe(
      "Interrupted: 1 error during collection; tests/test_broken.py: ModuleNotFoundError: No module named 'missing_dep'"
    );
    expect(outcome.counts.errored).toBe(0);
  });

  it("treats an empty session as no tests", () => {
    const stdout = lines("collected 0 items", "", "============================ no tests ran in 0.01s =============================");
    const { verdict, outcome } = parseOutput("pytest", stdout, "", 5);
    expect(verdict).toBe("no_tests");
    expect(outcome.summaryText).toBe("no tests ran in 0.01s");
  });

  it("reports a usage error when nothing ran and the exit code says so", () => {
    const { verdict, outcome } = parseOutput(
      "pytest",
      lines("no tests ran in 0.01s"),
      lines("ERROR: file or directory not found: tests/nope.py"),
      4
    );
    expect(verdict).toBe("collection_error");
    expect(outcome.summaryText).toBe("ERROR: file or directory not found: tests/nope.py");
  });

  it("strips ANSI colours and carriage-return redraws", () => {
    const stdout = [
      "\u001b[1mtests/test_a.py::test_ok \rtests/test_a.py::test_ok \u001b[32mPASSED\u001b[0m\r",
      "\u001b[32m============================== 1 passed in 0.01s ===============================\u001b[0m"
    ].join("\n");

    const { outcome } = parseOutput("pytest", stdout, "", 0);
    expect(outcome.counts.passed).toBe(1);
    expect(outcome.summaryText).toBe("1 passed in 0.01s");
  });

  it("marks the in-flight test as timed out", () => {
    const stdout = lines("tests/test_slow.py::test_fast PASSED", "tests/test_slow.py::test_sleep ");
    const stderr = lines("[testrelay] timed out after 5s");

    const { verdict, outcome } = parseOutput("pytest", stdout, stderr, 143);
    expect(verdict).toBe("tests_ran");
    expect(outcome.counts).toEqual({ passed: 1, failed: 0, errored: 1, skipped: 0, xfailed: 0 });
    expect(outcome.failingTests).toEqual([{ testId: "tests/test_slow.py::test_sleep", shortMessage: "timed out" }]);
    expect(outcome.summaryText).toBe("1 passed, 1 error (timed out after 5s)");
  });

  it("describes a crash by its last exception line", () => {
    const stderr = lines(
      "Traceback (most recent call last):",
      '  File "<frozen runpy>", line 198, in _run_module_as_main',
      "ModuleNotFoundError: No module named 'pytest'"
    );
    const { verdict, outcome } = parseOutput("pytest", "", stderr, 1);
    expect(verdict).toBe("crashed");
    expect(outcome.summaryText).toBe("ModuleNotFoundError: No module named 'pytest'");
  });

  it("falls back to the exit code when a crash printed nothing", () => {
    const { verdict, outcome } = parseOutput("pytest", "", "", 2);
    expect(verdict).toBe("crashed");
    expect(outcome.summaryText).toBe("pytest exited with code 2");
  });

  it("throws ParseError on unrecognised output from a clean exit", () => {
    expect(() => parseOutput("pytest", lines("hello"), "", 0)).toThrow(ParseError);
  });

  it("is a pure function of its inputs", () => {
    const stdout = lines("tests/test_x.py::test_a FAILED", "FAILED tests/test_x.py::test_a - boom", "1 failed in 0.10s");
    expect(parseOutput("pytest", stdout, "", 1)).toEqual(parseOutput("pytest", stdout, "", 1));
  });
});

describe("parseOutput: unittest", () => {
  it("reads verbose progress, failure blocks and the trailer", () => {
    const stderr = lines(
      "test_add (tests.test_calc.CalcTest.test_add) ... ok",
      "test_div (tests.test_calc.CalcTest.test_div) ... FAIL",
      "test_skip (tests.test_calc.CalcTest.test_skip) ... skipped 'not ready'",
      "",
      "======================================================================",
      "FAIL: test_div (tests.test_calc.CalcTest.test_div)",
      "----------------------------------------------------------------------",
      "Traceback (most recent call last):",
      '  File "/proj/tests/test_calc.py", line 9, in test_div',
      "    self.assertEqual(1 / 1, 2)",
      "AssertionError: 1.0 != 2",
      "",
      "----------------------------------------------------------------------",
      "Ran 3 tests in 0.001s",
      "",
      "FAILED (failures=1, skipped=1)"
    );

    const { verdict, outcome } = parseOutput("unittest", "", stderr, 1);
    expect(verdict).toBe("tests_ran");
    expect(outcome.counts).toEqual({ passed: 1, failed: 1, errored: 0, skipped: 1, xfailed: 0 });
    expect(outcome.failingTests).toEqual([
      { testId: "tests.test_calc.CalcTest.test_div", shortMessage: "AssertionError: 1.0 != 2" }
    ]);
    expect(outcome.summaryText).toBe("1 failed, 1 passed, 1 skipped in 0.001s");
  });

  it("reports a module that failed to import as a collection error", () => {
    const stderr = lines(
      "tests.test_broken (unittest.loader._FailedTest.tests.test_broken) ... ERROR",
      "",
      "======================================================================",
      "ERROR: tests.test_broken (unittest.loader._FailedTest.tests.test_broken)",
      "----------------------------------------------------------------------",
      "ImportError: Failed to import test module: tests.test_broken",
      "Traceback (most recent call last):",
      '  File "/usr/lib/python3.11/unittest/loader.py", line 407, in _find_test_path',
      "    module = self._get_module_from_name(name)",
      "ModuleNotFoundError: No module named 'requests'",
      "",
      "",
      "----------------------------------------------------------------------",
      "Ran 1 test in 0.000s",
      "",
      "FAILED (errors=1)"
    );

    const { verdict, outcome } = parseOutput("unittest", "", stderr, 1);
    expect(verdict).toBe("collection_error");
    expect(outcome.summaryText).toBe(
      "failed to load tests.test_broken: ImportError: Failed to import test module: tests.test_broken (ModuleNotFoundError: No module named 'requests')"
    );
  });

  it("reports an import error without a trailer as a crash carrying the import text", () => {
    const stderr = lines(
      "Traceback (most recent call last):",
      '  File "/usr/lib/python3.11/unittest/__main__.py", line 18, in <module>',
      "    main(module=None)",
      "ImportError: Start directory is not importable: 'tests'"
    );

    const { verdict, outcome } = parseOutput("unittest", "", stderr, 1);
    expect(verdict).toBe("crashed");
    expect(outcome.summaryText).toBe("ImportError: Start directory is not importable: 'tests'");
  });

  it("treats NO TESTS RAN as no tests", () => {
    const stderr = lines("", "----------------------------------------------------------------------", "Ran 0 tests in 0.000s", "", "NO TESTS RAN");
    const { verdict, outcome } = parseOutput("unittest", "", stderr, 5);
    expect(verdict).toBe("no_tests");
    expect(outcome.summaryText).toBe("no tests ran in 0.000s");
  });
});

describe("parseOutput: nose2", () => {
  it("accepts bare dotted names for function tests", () => {
    const stderr = lines(
      "test_add (tests.test_calc.CalcTest.test_add) ... ok",
      "tests.test_funcs.test_bad ... FAIL",
      "",
      "======================================================================",
      "FAIL: tests.test_funcs.test_bad",
      "----------------------------------------------------------------------",
      "Traceback (most recent call last):",
      '  File "/proj/tests/test_funcs.py", line 4, in test_bad',
      "    assert 1 == 2",
      "AssertionError",
      "",
      "----------------------------------------------------------------------",
      "Ran 2 tests in 0.002s",
      "",
      "FAILED (failures=1)"
    );

    const { verdict, outcome } = parseOutput("nose2", "", stderr, 1);
    expect(verdict).toBe("tests_ran");
    expect(outcome.counts).toEqual({ passed: 1, failed: 1, errored: 0, skipped: 0, xfailed: 0 });
    expect(outcome.failingTests).toEqual([{ testId: "tests.test_funcs.test_bad", shortMessage: "AssertionError" }]);
    expect(outcome.summaryText).toBe("1 failed, 1 passed in 0.002s");
  });
});

describe("normalize", () => {
  it("keeps the text after the last carriage return", () => {
    expect(normalizeLine("collecting 1 item\rcollecting 5 items\rcollected 7 items  ")).toBe("collected 7 items");
  });

  it("drops trailing blank lines only", () => {
    expect(normalizeOutput("a\n\nb\n\n\n")).toEqual(["a", "", "b"]);
  });
});
