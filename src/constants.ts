export const DEFAULT_SUBMISSIONS_DIR = "submissions";
export const DEFAULT_TESTS_DIR = "tests";
export const DEFAULT_TARGET_FILENAME = "submission.js";
export const DEFAULT_ENTRY_POINT = "testCase";
export const DEFAULT_RESULTS_CSV = "grading_results.csv";
export const DEFAULT_SUMMARY_CSV = "grading_summary.csv";
export const DEFAULT_LOG_FILE = "grading_log.txt";
export const DEFAULT_TIMEOUT_SECONDS = 20;
export const DEFAULT_BASE_SEED = 1337;

// 10 MB of stdout/stderr per runner
export const MAX_RUNNER_OUTPUT_BYTES = 10 * 1024 * 1024;

export const TEST_FILE_PREFIX = "test_";
export const TEST_FILE_EXTENSIONS = [".js", ".cjs", ".ts", ".cts"];

// Environment and cache folders never searched for a submission
export const IGNORED_DIRECTORIES = [
  "node_modules",
  ".git",
  ".venv",
  "venv",
  "__pycache__",
  ".cache",
];

// Display caps for failure diagnostics in the log
export const LOG_MESSAGE_CHARS = 300;
export const LOG_SHORT_MESSAGE_CHARS = 100;
export const LOG_DETAIL_LINES = 20;
export const LOG_STDERR_LINES = 10;

export const RunnerMessages = {
  BAD_ARGUMENTS: "bad runner arguments",
  SUBMISSION_NOT_FOUND: "submission module not found",
  TEST_NOT_FOUND: "test module not found",
  SUBMISSION_LOAD_FAILED: "failed to load submission",
  TEST_LOAD_FAILED: "failed to load test module",
  ENTRY_POINT_NOT_FOUND: "entry point not found",
  TEST_EXCEPTION: "exception during test execution",
  NEVER_SETTLED: "entry point never settled",
} as const;

export const SupervisorMessages = {
  NO_RESULT: "runner produced no result",
  INVALID_OUTPUT: "invalid result output",
  LAUNCH_FAILED: "failed to launch runner",
} as const;
