import { ResultRecord, StudentSummary, TestOutcome } from "../types";

/**
 * Owns the per-student totals and the per-test outcomes of one run.
 * Only the grading loop mutates it.
 */
export class GradeAggregator {
  private readonly summaries = new Map<string, StudentSummary>();
  private readonly outcomes: TestOutcome[] = [];

  registerStudent(studentKey: string, missingModule: boolean): void {
    if (this.summaries.has(studentKey)) {
      throw new Error(`Student ${studentKey} registered twice`);
    }
    this.summaries.set(studentKey, {
      studentKey,
      total: 0,
      passed: 0,
      failed: 0,
      missingModule,
    });
  }

  record(studentKey: string, testName: string, record: ResultRecord): void {
    const summary = this.summaries.get(studentKey);
    if (!summary) {
      throw new Error(`Student ${studentKey} was never registered`);
    }

    summary.total += 1;
    if (record.ok) {
      summary.passed += 1;
    } else {
      summary.failed += 1;
    }
    this.outcomes.push({ studentKey, testName, record });
  }

  /** Summaries in registration order */
  getSummaries(): StudentSummary[] {
    return Array.from(this.summaries.values(), (summary) => ({ ...summary }));
  }

  /** Outcomes in the order they were recorded */
  getOutcomes(): readonly TestOutcome[] {
    return this.outcomes;
  }
}

export function percentPassed(summary: StudentSummary): number {
  return summary.total > 0 ? (summary.passed / summary.total) * 100 : 0;
}
