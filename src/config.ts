import * as path from "path";
import { isBuiltin } from "module";
import {
  DEFAULT_BASE_SEED,
  DEFAULT_ENTRY_POINT,
  DEFAULT_LOG_FILE,
  DEFAULT_RESULTS_CSV,
  DEFAULT_SUBMISSIONS_DIR,
  DEFAULT_SUMMARY_CSV,
  DEFAULT_TARGET_FILENAME,
  DEFAULT_TESTS_DIR,
  DEFAULT_TIMEOUT_SECONDS,
} from "./constants";
import { GraderConfig } from "./types";
import {
  assertKnownFlags,
  readFlag,
  readFlags,
  readNumberFlag,
} from "./utils/cli-args";
import { ConfigurationError } from "./utils/errors";
import * as fsUtils from "./utils/fs-utils";

export const KNOWN_FLAGS = [
  "submissions-dir",
  "tests-dir",
  "support-dir",
  "target",
  "module-name",
  "entry",
  "results-csv",
  "summary-csv",
  "log-file",
  "report-json",
  "timeout",
  "base-seed",
  "student",
  "help",
];

export const USAGE = `Usage: isolated-grader [options]

  --submissions-dir=DIR   one folder per student (default: ${DEFAULT_SUBMISSIONS_DIR})
  --tests-dir=DIR         folder of test_* files (default: ${DEFAULT_TESTS_DIR})
  --support-dir=DIR       support module folder, repeatable, first wins (default: tests dir)
  --target=FILE           file graded in each student folder (default: ${DEFAULT_TARGET_FILENAME})
  --module-name=NAME      name tests require the submission by (default: target without extension)
  --entry=NAME            exported test function (default: ${DEFAULT_ENTRY_POINT})
  --results-csv=FILE      per-test results (default: ${DEFAULT_RESULTS_CSV})
  --summary-csv=FILE      per-student totals (default: ${DEFAULT_SUMMARY_CSV})
  --log-file=FILE         run log (default: ${DEFAULT_LOG_FILE})
  --report-json=FILE      also write a JSON grading report
  --timeout=SECONDS       wall-clock limit per test (default: ${DEFAULT_TIMEOUT_SECONDS})
  --base-seed=N           seed offset for test randomness (default: ${DEFAULT_BASE_SEED})
  --student=A,B           grade only these student folders`;

const LOGICAL_NAME_PATTERN = /^[A-Za-z_$][\w$.-]*$/;

const nonEmpty = (args: string[], name: string, fallback: string): string => {
  const value = readFlag(args, name);
  if (value === undefined) return fallback;
  if (value.trim() === "") {
    throw new ConfigurationError(`--${name} needs a value`);
  }
  return value;
};

/**
 * Build the run configuration from command-line flags
 * @param args Arguments after the script name
 * @param cwd Directory relative paths resolve against
 */
export function loadConfig(
  args: string[],
  cwd: string = process.cwd()
): GraderConfig {
  assertKnownFlags(args, KNOWN_FLAGS);
  const resolve = (p: string) => path.resolve(cwd, p);

  const testsDir = resolve(nonEmpty(args, "tests-dir", DEFAULT_TESTS_DIR));
  const supportFlags = readFlags(args, "support-dir").filter(
    (dir) => dir.trim() !== ""
  );
  const supportDirs =
    supportFlags.length > 0 ? supportFlags.map(resolve) : [testsDir];

  const targetFilename = nonEmpty(args, "target", DEFAULT_TARGET_FILENAME);
  if (path.basename(targetFilename) !== targetFilename) {
    throw new ConfigurationError(
      `--target must be a file name, not a path: ${targetFilename}`
    );
  }

  const logicalName = nonEmpty(
    args,
    "module-name",
    path.basename(targetFilename, path.extname(targetFilename))
  );
  if (!LOGICAL_NAME_PATTERN.test(logicalName) || isBuiltin(logicalName)) {
    throw new ConfigurationError(
      `Cannot bind the submission as "${logicalName}"; pick another --module-name`
    );
  }

  const timeoutSeconds = readNumberFlag(
    args,
    "timeout",
    DEFAULT_TIMEOUT_SECONDS,
    (value) => Number.isFinite(value) && value > 0,
    "expected a positive number of seconds"
  );
  const baseSeed = readNumberFlag(
    args,
    "base-seed",
    DEFAULT_BASE_SEED,
    (value) => Number.isSafeInteger(value),
    "expected an integer"
  );

  const studentArg = readFlag(args, "student");
  let studentFilter: string[] | undefined;
  if (studentArg !== undefined) {
    studentFilter = studentArg
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s !== "");
    if (studentFilter.length === 0) {
      console.warn(`Empty student value provided. Grading all students.`);
      studentFilter = undefined;
    }
  }

  const reportJson = readFlag(args, "report-json");

  return {
    submissionsDir: resolve(
      nonEmpty(args, "submissions-dir", DEFAULT_SUBMISSIONS_DIR)
    ),
    testsDir,
    supportDirs,
    targetFilename,
    logicalName,
    entryPoint: nonEmpty(args, "entry", DEFAULT_ENTRY_POINT),
    resultsCsv: resolve(nonEmpty(args, "results-csv", DEFAULT_RESULTS_CSV)),
    summaryCsv: resolve(nonEmpty(args, "summary-csv", DEFAULT_SUMMARY_CSV)),
    logFile: resolve(nonEmpty(args, "log-file", DEFAULT_LOG_FILE)),
    reportJson: reportJson ? resolve(reportJson) : undefined,
    timeoutSeconds,
    baseSeed,
    studentFilter,
  };
}

/**
 * Check the directories a run depends on
 * @returns Warnings for support directories that do not exist
 */
export async function validateConfig(config: GraderConfig): Promise<string[]> {
  if (!(await fsUtils.isDirectory(config.submissionsDir))) {
    throw new ConfigurationError(
      `Submissions directory not found: ${config.submissionsDir}`
    );
  }
  if (!(await fsUtils.isDirectory(config.testsDir))) {
    throw new ConfigurationError(
      `Tests directory not found: ${config.testsDir}`
    );
  }

  const warnings: string[] = [];
  for (const dir of config.supportDirs) {
    if (!(await fsUtils.isDirectory(dir))) {
      warnings.push(
        `Support dir not found: ${dir} (tests that import support modules may fail)`
      );
    }
  }
  return warnings;
}
