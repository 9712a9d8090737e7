/**
 * Wire message a runner writes to stdout, exactly once per check
 */
export interface ResultMessage {
  ok: boolean;
  message: string;
  detail?: string;
}

/**
 * A student folder resolved by the submission locator.
 * modulePath is undefined when no target file exists in the folder tree.
 */
export interface SubmissionTarget {
  readonly studentKey: string;
  readonly modulePath?: string;
}

/**
 * One externally supplied check, backed by its own source file
 */
export interface TestCase {
  readonly name: string;
  readonly sourcePath: string;
  readonly ordinalIndex: number;
}

/**
 * Unit of work handed to the process supervisor
 */
export interface ExecutionRequest {
  readonly modulePath: string;
  readonly testCase: TestCase;
  readonly seed: number;
  readonly timeoutMs: number;
}

/**
 * Outcome of a single (student, test case) pair
 */
export interface ResultRecord {
  readonly ok: boolean;
  readonly message: string;
  readonly detail?: string;
  readonly stderr?: string;
  readonly exitCode?: number;
  readonly timedOut: boolean;
}

/**
 * Running totals for a student
 */
export interface StudentSummary {
  studentKey: string;
  total: number;
  passed: number;
  failed: number;
  missingModule: boolean;
}

/**
 * One row of the per-test report
 */
export interface TestOutcome {
  studentKey: string;
  testName: string;
  record: ResultRecord;
}

/**
 * Anything that can turn an execution request into a result record.
 * Implementations must resolve, never reject.
 */
export interface TestExecutor {
  execute(request: ExecutionRequest): Promise<ResultRecord>;
}

/**
 * How runners bind and invoke code units
 */
export interface SandboxOptions {
  /** Name the test code uses to reference the submission */
  logicalName: string;
  /** Export invoked on the test module */
  entryPoint: string;
  /** Directories searched for support modules, highest priority first */
  supportPaths: string[];
  /** Cap on captured stdout/stderr per runner */
  maxOutputBytes: number;
  /** Node.js binary that runs the runner; defaults to the current one */
  nodeExecutable?: string;
}

/**
 * Fully resolved configuration for a grading run
 */
export interface GraderConfig {
  submissionsDir: string;
  testsDir: string;
  supportDirs: string[];
  targetFilename: string;
  logicalName: string;
  entryPoint: string;
  resultsCsv: string;
  summaryCsv: string;
  logFile: string;
  reportJson?: string;
  timeoutSeconds: number;
  baseSeed: number;
  studentFilter?: string[];
}

/**
 * Complete grading report format
 */
export interface GradingReport {
  timestamp: string;
  totalStudents: number;
  totalTests: number;
  totalPassed: number;
  totalFailed: number;
  missingSubmissions: number;
  timedOutTests: number;
  averagePercentPassed: number;
  executionTimeSeconds: number;
  students: StudentSummary[];
}
