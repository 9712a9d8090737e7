import * as path from "path";
import * as fsPromises from "fs/promises";
import { TEST_FILE_EXTENSIONS, TEST_FILE_PREFIX } from "../constants";
import { TestCase } from "../types";
import { ConfigurationError } from "../utils/errors";
import * as fsUtils from "../utils/fs-utils";

function isTestFileName(name: string): boolean {
  return (
    name.startsWith(TEST_FILE_PREFIX) &&
    !name.endsWith(".d.ts") &&
    TEST_FILE_EXTENSIONS.includes(path.extname(name))
  );
}

/**
 * Collect the test cases of a tests directory in a stable order.
 * The position in that order becomes each case's ordinal index.
 */
export async function discoverTestCases(testsDir: string): Promise<TestCase[]> {
  if (!(await fsUtils.isDirectory(testsDir))) {
    throw new ConfigurationError(
      `Tests directory not found: ${path.resolve(testsDir)}`
    );
  }

  const entries = await fsPromises.readdir(testsDir, { withFileTypes: true });
  const names = entries
    .filter((entry) => entry.isFile() && isTestFileName(entry.name))
    .map((entry) => entry.name)
    .sort(fsUtils.compareNames);

  if (names.length === 0) {
    throw new ConfigurationError(
      `No ${TEST_FILE_PREFIX}* test files found in ${path.resolve(testsDir)}`
    );
  }

  return names.map((name, ordinalIndex) => ({
    name,
    sourcePath: path.resolve(testsDir, name),
    ordinalIndex,
  }));
}
