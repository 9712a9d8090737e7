import { GradeAggregator, percentPassed } from "../services/grade-aggregator";
import { GradingReport } from "../types";
import * as fsUtils from "../utils/fs-utils";

/**
 * Generate a grading report from a finished run
 * @param aggregator Totals and outcomes of the run
 * @param executionTime Time taken to grade, in milliseconds
 * @returns Grading report object
 */
export function generateGradingReport(
  aggregator: GradeAggregator,
  executionTime: number
): GradingReport {
  const students = aggregator.getSummaries();
  const outcomes = aggregator.getOutcomes();

  const totalPassed = students.reduce((sum, s) => sum + s.passed, 0);
  const totalFailed = students.reduce((sum, s) => sum + s.failed, 0);
  const averagePercentPassed =
    students.length > 0
      ? students.reduce((sum, s) => sum + percentPassed(s), 0) /
        students.length
      : 0;

  return {
    timestamp: new Date().toISOString(),
    totalStudents: students.length,
    totalTests: outcomes.length,
    totalPassed,
    totalFailed,
    missingSubmissions: students.filter((s) => s.missingModule).length,
    timedOutTests: outcomes.filter((o) => o.record.timedOut).length,
    averagePercentPassed: Math.round(averagePercentPassed * 100) / 100,
    executionTimeSeconds: Math.round(executionTime / 100) / 10,
    students,
  };
}

/**
 * Save the grading report as JSON
 * @returns Path to the saved report
 */
export async function saveGradingReport(
  report: GradingReport,
  outputPath: string
): Promise<string> {
  await fsUtils.writeFile(outputPath, JSON.stringify(report, null, 2));
  return outputPath;
}

/**
 * Print summary statistics from a grading report
 */
export function printGradingSummary(
  report: GradingReport,
  print: (line: string) => void = console.log
): void {
  print("=== Grading Summary ===");
  print(
    `Students: ${report.totalStudents} (${report.missingSubmissions} missing a submission)`
  );
  print(
    `Tests run: ${report.totalTests} (${report.totalPassed} passed, ${report.totalFailed} failed, ${report.timedOutTests} timed out)`
  );
  print(`Average pass rate: ${report.averagePercentPassed.toFixed(2)}%`);
  print(`Execution Time: ${report.executionTimeSeconds.toFixed(1)}s`);
}
