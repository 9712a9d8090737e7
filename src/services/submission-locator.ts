import * as path from "path";
import * as fsPromises from "fs/promises";
import { Dirent } from "fs";
import { IGNORED_DIRECTORIES } from "../constants";
import { SubmissionTarget } from "../types";
import { ConfigurationError } from "../utils/errors";
import * as fsUtils from "../utils/fs-utils";
import { GradingLogger, RunLog } from "../utils/logger";

export interface LocatorOptions {
  /** Restrict the run to these student folders */
  onlyStudents?: readonly string[];
  ignoredDirectories?: readonly string[];
  /** Receives unreadable-directory warnings; console only when omitted */
  log?: Pick<RunLog, "warn">;
}

async function listDirectory(
  dir: string,
  log: Pick<RunLog, "warn">
): Promise<Dirent[]> {
  try {
    const entries = await fsPromises.readdir(dir, { withFileTypes: true });
    return entries.sort((a, b) => fsUtils.compareNames(a.name, b.name));
  } catch (error) {
    log.warn(`WARN: Could not read ${dir}, treating it as empty: ${error}`);
    return [];
  }
}

/**
 * Depth-first pre-order search: a directory's own files are checked before
 * any of its subdirectories, and subdirectories are visited in name order.
 * Symlinked directories are not followed.
 */
async function searchTree(
  dir: string,
  targetFilename: string,
  ignored: ReadonlySet<string>,
  log: Pick<RunLog, "warn">
): Promise<string | undefined> {
  const entries = await listDirectory(dir, log);

  const match = entries.find(
    (entry) => entry.isFile() && entry.name === targetFilename
  );
  if (match) {
    return path.join(dir, match.name);
  }

  for (const entry of entries) {
    if (!entry.isDirectory() || ignored.has(entry.name)) continue;
    const found = await searchTree(
      path.join(dir, entry.name),
      targetFilename,
      ignored,
      log
    );
    if (found) return found;
  }

  return undefined;
}

/**
 * Find the target file for one student folder
 * @param studentDir The student's directory
 * @param targetFilename File name to look for
 * @returns Path to the first match, or undefined when there is none
 */
export async function findTargetFile(
  studentDir: string,
  targetFilename: string,
  options: LocatorOptions = {}
): Promise<string | undefined> {
  const direct = path.join(studentDir, targetFilename);
  if (await fsUtils.isFile(direct)) {
    return direct;
  }

  return searchTree(
    studentDir,
    targetFilename,
    new Set(options.ignoredDirectories ?? IGNORED_DIRECTORIES),
    options.log ?? new GradingLogger()
  );
}

/**
 * Map every student folder under the submissions root to its target file
 * @param submissionsDir Directory holding one folder per student
 * @param targetFilename File name to look for in each folder
 * @returns Targets in student-name order
 */
export async function locateSubmissions(
  submissionsDir: string,
  targetFilename: string,
  options: LocatorOptions = {}
): Promise<SubmissionTarget[]> {
  const { onlyStudents } = options;
  let students = await fsUtils.discoverStudentSubmissions(submissionsDir);

  if (onlyStudents) {
    const notFound = onlyStudents.filter((s) => !students.includes(s));
    if (notFound.length > 0) {
      throw new ConfigurationError(
        `Student(s) not found in submissions directory: ${notFound.join(
          ", "
        )}. Available students: ${students.join(", ")}`
      );
    }
    students = students.filter((s) => onlyStudents.includes(s));
  }

  const targets: SubmissionTarget[] = [];

  for (const studentKey of students) {
    const modulePath = await findTargetFile(
      path.join(submissionsDir, studentKey),
      targetFilename,
      options
    );
    targets.push({ studentKey, modulePath });
  }

  return targets;
}
