import * as path from "path";
import { expect } from "chai";
import { GradeAggregator, percentPassed } from "../src/services/grade-aggregator";
import {
  gradeSubmissions,
  missingModuleRecord,
  seedFor,
} from "../src/services/grading-loop";
import {
  ExecutionRequest,
  ResultRecord,
  SubmissionTarget,
  TestCase,
  TestExecutor,
} from "../src/types";
import { RunLog } from "../src/utils/logger";

class RecordingExecutor implements TestExecutor {
  readonly requests: ExecutionRequest[] = [];

  constructor(
    private readonly decide: (request: ExecutionRequest) => ResultRecord
  ) {}

  async execute(request: ExecutionRequest): Promise<ResultRecord> {
    this.requests.push(request);
    return this.decide(request);
  }
}

class CollectingLog implements RunLog {
  readonly lines: string[] = [];

  log(message: string): void {
    this.lines.push(message);
  }

  warn(message: string): void {
    this.lines.push(message);
  }

  logFailure(studentKey: string, testName: string, record: ResultRecord): void {
    this.lines.push(`FAIL ${studentKey} ${testName}: ${record.message}`);
  }
}

const ROOT = path.join(path.sep, "grading", "submissions");

const testCases: TestCase[] = [
  { name: "test_b.js", sourcePath: "/tests/test_b.js", ordinalIndex: 1 },
  { name: "test_a.js", sourcePath: "/tests/test_a.js", ordinalIndex: 0 },
];

const options = {
  baseSeed: 1337,
  timeoutMs: 5000,
  targetFilename: "calc.js",
  submissionsDir: ROOT,
};

const pass = (message: string): ResultRecord => ({
  ok: true,
  message,
  timedOut: false,
});

describe("grading loop", () => {
  it("runs tests in ordinal order with base seed plus index", async () => {
    const executor = new RecordingExecutor((r) => pass(r.testCase.name));
    const targets: SubmissionTarget[] = [
      { studentKey: "alice", modulePath: path.join(ROOT, "alice", "src", "calc.js") },
      { studentKey: "dave", modulePath: path.join(ROOT, "dave", "calc.js") },
    ];

    await gradeSubmissions(targets, testCases, executor, options, new CollectingLog());

    expect(
      executor.requests.map((r) => [
        path.basename(path.dirname(r.modulePath)),
        r.testCase.name,
        r.seed,
        r.timeoutMs,
      ])
    ).to.deep.equal([
      ["src", "test_a.js", 1337, 5000],
      ["src", "test_b.js", 1338, 5000],
      ["dave", "test_a.js", 1337, 5000],
      ["dave", "test_b.js", 1338, 5000],
    ]);
  });

  it("never invokes the executor for a missing submission", async () => {
    const executor = new RecordingExecutor((r) => pass(r.testCase.name));
    const runLog = new CollectingLog();

    const aggregator = await gradeSubmissions(
      [{ studentKey: "bob", modulePath: undefined }],
      testCases,
      executor,
      options,
      runLog
    );

    expect(executor.requests).to.have.length(0);
    expect(aggregator.getSummaries()).to.deep.equal([
      { studentKey: "bob", total: 2, passed: 0, failed: 2, missingModule: true },
    ]);
    expect(aggregator.getOutcomes().map((o) => [o.testName, o.record])).to.deep.equal([
      ["test_a.js", missingModuleRecord("calc.js")],
      ["test_b.js", missingModuleRecord("calc.js")],
    ]);
    expect(runLog.lines).to.deep.equal(["SKIP: bob: calc.js not found"]);
  });

  it("counts passes and failures per student and logs each test", async () => {
    const executor = new RecordingExecutor((r) =>
      r.testCase.name === "test_a.js"
        ? pass("fine")
        : { ok: false, message: "wrong answer", timedOut: false }
    );
    const runLog = new CollectingLog();

    const aggregator = await gradeSubmissions(
      [{ studentKey: "alice", modulePath: path.join(ROOT, "alice", "src", "calc.js") }],
      testCases,
      executor,
      options,
      runLog
    );

    expect(aggregator.getSummaries()).to.deep.equal([
      { studentKey: "alice", total: 2, passed: 1, failed: 1, missingModule: false },
    ]);
    expect(runLog.lines).to.deep.equal([
      `RUN: alice -> ${path.join("src", "calc.js")}`,
      "  ✓ test_a.js",
      "FAIL alice test_b.js: wrong answer",
    ]);
  });

  it("derives the same seed for a test regardless of student", () => {
    expect(seedFor(1337, testCases[0])).to.equal(1338);
    expect(seedFor(0, testCases[1])).to.equal(0);
  });
});

describe("GradeAggregator", () => {
  it("rejects outcomes for unknown students", () => {
    const aggregator = new GradeAggregator();

    expect(() => aggregator.record("ghost", "test_a.js", pass("x"))).to.throw(
      "Student ghost was never registered"
    );
  });

  it("rejects registering a student twice", () => {
    const aggregator = new GradeAggregator();
    aggregator.registerStudent("alice", false);

    expect(() => aggregator.registerStudent("alice", false)).to.throw(
      "Student alice registered twice"
    );
  });

  it("returns copies so callers cannot change the totals", () => {
    const aggregator = new GradeAggregator();
    aggregator.registerStudent("alice", false);
    aggregator.record("alice", "test_a.js", pass("x"));

    aggregator.getSummaries()[0].passed = 99;

    expect(aggregator.getSummaries()[0].passed).to.equal(1);
  });

  it("computes the percentage passed", () => {
    expect(
      percentPassed({ studentKey: "a", total: 3, passed: 1, failed: 2, missingModule: false })
    ).to.be.closeTo(33.333, 0.001);
    expect(
      percentPassed({ studentKey: "b", total: 0, passed: 0, failed: 0, missingModule: true })
    ).to.equal(0);
  });
});
