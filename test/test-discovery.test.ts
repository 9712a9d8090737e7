import * as os from "os";
import * as path from "path";
import * as fsPromises from "fs/promises";
import { expect } from "chai";
import { discoverTestCases } from "../src/services/test-discovery";
import { ConfigurationError } from "../src/utils/errors";

async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  return undefined;
}

describe("discoverTestCases", () => {
  let dir: string;

  before(async () => {
    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "discovery-test-"));
    for (const name of [
      "test_b.ts",
      "test_a.js",
      "test_C.cjs",
      "test_types.d.ts",
      "test_notes.md",
      "helper.js",
      "test_d.cts",
    ]) {
      await fsPromises.writeFile(path.join(dir, name), "");
    }
    await fsPromises.mkdir(path.join(dir, "test_folder.js"));
  });

  after(async () => {
    await fsPromises.rm(dir, { recursive: true, force: true });
  });

  it("returns test_ files in code-unit order with ordinal indexes", async () => {
    const cases = await discoverTestCases(dir);

    expect(cases).to.deep.equal([
      { name: "test_C.cjs", sourcePath: path.join(dir, "test_C.cjs"), ordinalIndex: 0 },
      { name: "test_a.js", sourcePath: path.join(dir, "test_a.js"), ordinalIndex: 1 },
      { name: "test_b.ts", sourcePath: path.join(dir, "test_b.ts"), ordinalIndex: 2 },
      { name: "test_d.cts", sourcePath: path.join(dir, "test_d.cts"), ordinalIndex: 3 },
    ]);
  });

  it("fails when the directory does not exist", async () => {
    const missing = path.join(dir, "nope");
    const error = await captureError(discoverTestCases(missing));

    expect(error).to.be.instanceOf(ConfigurationError);
    expect(error instanceof Error ? error.message : error).to.equal(
      `Tests directory not found: ${missing}`
    );
  });

  it("fails when no test files are present", async () => {
    const empty = await fsPromises.mkdtemp(
      path.join(os.tmpdir(), "discovery-empty-")
    );
    try {
      const error = await captureError(discoverTestCases(empty));

      expect(error).to.be.instanceOf(ConfigurationError);
      expect(error instanceof Error ? error.message : error).to.equal(
        `No test_* test files found in ${empty}`
      );
    } finally {
      await fsPromises.rm(empty, { recursive: true, force: true });
    }
  });
});
