import * as fs from "fs";
import * as path from "path";
import * as fsPromises from "fs/promises";

/**
 * Lists the immediate subdirectories of a submissions root
 * @param submissionsDir The base directory containing student submissions
 * @returns Directory names sorted in code-unit order
 */
export async function discoverStudentSubmissions(
  submissionsDir: string
): Promise<string[]> {
  const entries = await fsPromises.readdir(submissionsDir, {
    withFileTypes: true,
  });

  return entries
    .filter((dirent) => dirent.isDirectory())
    .map((dirent) => dirent.name)
    .sort(compareNames);
}

/**
 * Locale-independent ordering used for every listing in the grader
 */
export function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Writes content to a file, creating parent directories as needed
 */
export async function writeFile(
  filePath: string,
  content: string
): Promise<void> {
  await fsPromises.mkdir(path.dirname(filePath), { recursive: true });
  await fsPromises.writeFile(filePath, content, "utf-8");
}

/**
 * Checks if a path is a directory (symlinks followed)
 */
export async function isDirectory(dirPath: string): Promise<boolean> {
  return fsPromises
    .stat(dirPath)
    .then((stats) => stats.isDirectory())
    .catch(() => false);
}

/**
 * Checks if a path is a regular file (symlinks followed)
 */
export async function isFile(filePath: string): Promise<boolean> {
  return fsPromises
    .stat(filePath)
    .then((stats) => stats.isFile())
    .catch(() => false);
}

/**
 * Appends text synchronously so log lines survive a crash
 */
export function appendFileSync(filePath: string, content: string): void {
  fs.appendFileSync(filePath, content, "utf-8");
}

/**
 * Truncates (or creates) a file synchronously
 */
export function resetFileSync(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, "", "utf-8");
}
