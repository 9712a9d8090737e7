import * as os from "os";
import * as path from "path";
import * as fsPromises from "fs/promises";
import { expect } from "chai";
import { formatDateTime, formatTime, GradingLogger } from "../src/utils/logger";

const TIMESTAMP = /^\[\d{2}:\d{2}:\d{2}\] /;

describe("GradingLogger", () => {
  let dir: string;
  let logFile: string;
  let consoleLines: string[];
  const originalLog = console.log;

  beforeEach(async () => {
    dir = await fsPromises.mkdtemp(path.join(os.tmpdir(), "logger-test-"));
    logFile = path.join(dir, "grading_log.txt");
    consoleLines = [];
    console.log = (line: string) => {
      consoleLines.push(line);
    };
  });

  afterEach(async () => {
    console.log = originalLog;
    await fsPromises.rm(dir, { recursive: true, force: true });
  });

  async function fileLines(): Promise<string[]> {
    const text = await fsPromises.readFile(logFile, "utf8");
    return text
      .split("\n")
      .filter((line) => line !== "")
      .map((line) => line.replace(TIMESTAMP, ""));
  }

  it("writes the same timestamped line to the console and the file", async () => {
    const logger = new GradingLogger(logFile);

    logger.log("RUN: alice -> calc.js");

    expect(consoleLines).to.have.length(1);
    expect(consoleLines[0]).to.match(TIMESTAMP);
    expect(await fsPromises.readFile(logFile, "utf8")).to.equal(
      `${consoleLines[0]}\n`
    );
  });

  it("starts from an empty file on every run", async () => {
    await fsPromises.writeFile(logFile, "previous run\n");
    const logger = new GradingLogger(logFile);

    logger.start();

    const lines = await fileLines();
    expect(lines).to.have.length(1);
    expect(lines[0]).to.match(
      /^=== Grading Started at \d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} ===$/
    );
  });

  it("logs a timeout on one line", async () => {
    new GradingLogger(logFile).logFailure("alice", "test_hang.js", {
      ok: false,
      message: "timed out after 20s",
      stderr: "partial",
      timedOut: true,
    });

    expect(await fileLines()).to.deep.equal(["  ✗ test_hang.js: TIMEOUT"]);
  });

  it("logs a plain failure with a shortened message", async () => {
    new GradingLogger(logFile).logFailure("alice", "test_add.js", {
      ok: false,
      message: "x".repeat(150),
      timedOut: false,
    });

    expect(await fileLines()).to.deep.equal([`  ✗ test_add.js: ${"x".repeat(100)}`]);
  });

  it("logs a failure block with capped traceback and stderr", async () => {
    const detail = Array.from({ length: 25 }, (_, i) => `frame ${i}`).join("\n\n");
    const stderr = Array.from({ length: 12 }, (_, i) => `err ${i}`).join("\n");

    new GradingLogger(logFile).logFailure("carol", "test_add.js", {
      ok: false,
      message: "failed to load submission",
      detail,
      stderr,
      timedOut: false,
    });

    expect(await fileLines()).to.deep.equal([
      "  ✗ test_add.js FAILED for carol",
      "    MESSAGE: failed to load submission",
      "    ERROR TRACEBACK:",
      ...Array.from({ length: 20 }, (_, i) => `      frame ${i}`),
      "    STDERR:",
      ...Array.from({ length: 10 }, (_, i) => `      err ${i}`),
    ]);
  });

  it("logs only to the console without a log file", () => {
    const logger = new GradingLogger();

    logger.log("no file");

    expect(consoleLines.map((line) => line.replace(TIMESTAMP, ""))).to.deep.equal([
      "no file",
    ]);
  });
});

describe("time formatting", () => {
  const date = new Date(2024, 2, 5, 9, 7, 3);

  it("formats clock time with zero padding", () => {
    expect(formatTime(date)).to.equal("09:07:03");
  });

  it("formats date and time", () => {
    expect(formatDateTime(date)).to.equal("2024-03-05 09:07:03");
  });
});
