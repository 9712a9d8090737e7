import * as path from "path";
import {
  ExecutionRequest,
  ResultRecord,
  SubmissionTarget,
  TestCase,
  TestExecutor,
} from "../types";
import { RunLog } from "../utils/logger";
import { GradeAggregator } from "./grade-aggregator";

export interface GradingLoopOptions {
  baseSeed: number;
  timeoutMs: number;
  targetFilename: string;
  submissionsDir: string;
}

/**
 * Seed for a test case; identical for every student
 */
export function seedFor(baseSeed: number, testCase: TestCase): number {
  return baseSeed + testCase.ordinalIndex;
}

/**
 * Result recorded for every test of a student with no target file
 */
export function missingModuleRecord(targetFilename: string): ResultRecord {
  return {
    ok: false,
    message: `${targetFilename} not found`,
    timedOut: false,
  };
}

/**
 * Grade every student against every test case, one request at a time.
 * Students run in the order given, tests in ordinal order.
 */
export async function gradeSubmissions(
  targets: readonly SubmissionTarget[],
  testCases: readonly TestCase[],
  executor: TestExecutor,
  options: GradingLoopOptions,
  runLog: RunLog
): Promise<GradeAggregator> {
  const aggregator = new GradeAggregator();
  const orderedTests = [...testCases].sort(
    (a, b) => a.ordinalIndex - b.ordinalIndex
  );

  for (const target of targets) {
    const { studentKey, modulePath } = target;
    aggregator.registerStudent(studentKey, modulePath === undefined);

    if (modulePath === undefined) {
      const record = missingModuleRecord(options.targetFilename);
      for (const testCase of orderedTests) {
        aggregator.record(studentKey, testCase.name, record);
      }
      runLog.log(`SKIP: ${studentKey}: ${options.targetFilename} not found`);
      continue;
    }

    const relativePath = path.relative(
      path.join(options.submissionsDir, studentKey),
      modulePath
    );
    runLog.log(`RUN: ${studentKey} -> ${relativePath}`);

    for (const testCase of orderedTests) {
      const request: ExecutionRequest = {
        modulePath,
        testCase,
        seed: seedFor(options.baseSeed, testCase),
        timeoutMs: options.timeoutMs,
      };
      const record = await executor.execute(request);
      aggregator.record(studentKey, testCase.name, record);

      if (record.ok) {
        runLog.log(`  ✓ ${testCase.name}`);
      } else {
        runLog.logFailure(studentKey, testCase.name, record);
      }
    }
  }

  return aggregator;
}
