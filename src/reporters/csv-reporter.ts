import { stringify } from "csv-stringify/sync";
import { percentPassed } from "../services/grade-aggregator";
import { ResultRecord, StudentSummary, TestOutcome } from "../types";
import * as fsUtils from "../utils/fs-utils";

export const RESULTS_HEADER = ["student", "test_file", "passed", "message"];
export const SUMMARY_HEADER = [
  "student",
  "total_tests",
  "passed",
  "failed",
  "percent_passed",
  "missing_module",
];

/**
 * Message column of the results CSV: the record message plus the full
 * diagnostic text, or stderr when there is no diagnostic
 */
export function formatRecordMessage(record: ResultRecord): string {
  let text = record.message;
  if (record.detail) {
    text += `\n\nERROR:\n${record.detail}`;
  } else if (record.stderr && record.stderr.trim() !== "") {
    text += `\n\nSTDERR:\n${record.stderr.trim()}`;
  }
  return text;
}

export function renderResultsCsv(outcomes: readonly TestOutcome[]): string {
  const rows = outcomes.map((outcome) => [
    outcome.studentKey,
    outcome.testName,
    outcome.record.ok ? 1 : 0,
    formatRecordMessage(outcome.record),
  ]);
  return stringify([RESULTS_HEADER, ...rows]);
}

export function renderSummaryCsv(summaries: readonly StudentSummary[]): string {
  const rows = summaries.map((summary) => [
    summary.studentKey,
    summary.total,
    summary.passed,
    summary.failed,
    percentPassed(summary).toFixed(2),
    summary.missingModule ? 1 : 0,
  ]);
  return stringify([SUMMARY_HEADER, ...rows]);
}

/**
 * Write the per-test results CSV
 * @returns Path to the written file
 */
export async function saveResultsCsv(
  outcomes: readonly TestOutcome[],
  filePath: string
): Promise<string> {
  await fsUtils.writeFile(filePath, renderResultsCsv(outcomes));
  return filePath;
}

/**
 * Write the per-student summary CSV
 * @returns Path to the written file
 */
export async function saveSummaryCsv(
  summaries: readonly StudentSummary[],
  filePath: string
): Promise<string> {
  await fsUtils.writeFile(filePath, renderSummaryCsv(summaries));
  return filePath;
}
