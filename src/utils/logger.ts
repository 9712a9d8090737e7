import {
  LOG_DETAIL_LINES,
  LOG_MESSAGE_CHARS,
  LOG_SHORT_MESSAGE_CHARS,
  LOG_STDERR_LINES,
} from "../constants";
import { ResultRecord } from "../types";
import * as fsUtils from "./fs-utils";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTime(date: Date): string {
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(
    date.getSeconds()
  )}`;
}

export function formatDateTime(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(
    date.getDate()
  )} ${formatTime(date)}`;
}

function nonBlankLines(text: string, limit: number): string[] {
  return text
    .split("\n")
    .filter((line) => line.trim() !== "")
    .slice(0, limit);
}

/**
 * The slice of the logger the grading loop needs
 */
export interface RunLog {
  log(message: string): void;
  warn(message: string): void;
  logFailure(studentKey: string, testName: string, record: ResultRecord): void;
}

/**
 * Writes every line to the console and, when a path is given, appends it to
 * the run's log file.
 */
export class GradingLogger implements RunLog {
  private startTime = new Date();

  constructor(private readonly logFilePath?: string) {}

  start(): void {
    if (this.logFilePath) {
      fsUtils.resetFileSync(this.logFilePath);
    }
    this.startTime = new Date();
    this.log(`=== Grading Started at ${formatDateTime(this.startTime)} ===`);
  }

  log(message: string): void {
    this.write(message, console.log);
  }

  warn(message: string): void {
    this.write(message, console.warn);
  }

  error(message: string): void {
    this.write(message, console.error);
  }

  /**
   * Failure block with the message, traceback and stderr cut to a readable
   * prefix; the untruncated text stays in the result record.
   */
  logFailure(studentKey: string, testName: string, record: ResultRecord): void {
    if (record.timedOut) {
      this.log(`  ✗ ${testName}: TIMEOUT`);
      return;
    }

    const detail = record.detail ?? "";
    const stderr = record.stderr ?? "";
    if (detail === "" && stderr === "") {
      this.log(
        `  ✗ ${testName}: ${record.message.slice(0, LOG_SHORT_MESSAGE_CHARS)}`
      );
      return;
    }

    this.log(`  ✗ ${testName} FAILED for ${studentKey}`);
    this.log(`    MESSAGE: ${record.message.slice(0, LOG_MESSAGE_CHARS)}`);
    if (detail !== "") {
      this.log("    ERROR TRACEBACK:");
      for (const line of nonBlankLines(detail, LOG_DETAIL_LINES)) {
        this.log(`      ${line}`);
      }
    }
    if (stderr !== "") {
      this.log("    STDERR:");
      for (const line of nonBlankLines(stderr, LOG_STDERR_LINES)) {
        this.log(`      ${line}`);
      }
    }
  }

  close(): void {
    const endTime = new Date();
    const seconds = (endTime.getTime() - this.startTime.getTime()) / 1000;
    this.log(
      `=== Grading Completed at ${formatDateTime(
        endTime
      )} (Duration: ${seconds.toFixed(1)}s) ===`
    );
  }

  private write(message: string, sink: (line: string) => void): void {
    const line = `[${formatTime(new Date())}] ${message}`;
    sink(line);
    if (this.logFilePath) {
      fsUtils.appendFileSync(this.logFilePath, `${line}\n`);
    }
  }
}
