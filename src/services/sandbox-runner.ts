import * as fs from "fs";
import Module from "module";
import * as path from "path";
import { inspect } from "util";
import { RunnerMessages } from "../constants";
import { ResultMessage } from "../types";
import { createSeededRandom } from "../utils/seeded-random";
import { encodeResultMessage } from "./result-protocol";

/*
 * Child-process entry point. Runs one submission against one test case and
 * writes exactly one result line to stdout.
 *
 *   node --require tsx/cjs sandbox-runner <module> <test> <seed> <logical-name> <entry-point>
 *
 * The submission is reachable as require("<logical-name>") from the test and
 * its support modules, whatever else that name would resolve to.
 */

type ResolveFilename = (
  request: string,
  parent: unknown,
  ...rest: unknown[]
) => string;

interface ModuleResolver {
  _resolveFilename: ResolveFilename;
}

function hasResolver(value: unknown): value is ModuleResolver {
  return (
    typeof value === "function" &&
    "_resolveFilename" in value &&
    typeof value._resolveFilename === "function"
  );
}

/**
 * Resolve `logicalName` to the submission file before Node searches
 * node_modules or NODE_PATH
 */
export function bindLogicalName(logicalName: string, modulePath: string): void {
  if (!hasResolver(Module)) {
    throw new Error("Module resolution cannot be hooked in this runtime");
  }
  const resolver = Module;
  const target = path.resolve(modulePath);
  const resolveFilename = resolver._resolveFilename;

  resolver._resolveFilename = (request, parent, ...rest) =>
    request === logicalName
      ? target
      : resolveFilename.call(resolver, request, parent, ...rest);
}

function describeFault(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? `${error.name}: ${error.message}`;
  }
  return inspect(error);
}

function toText(value: unknown): string {
  return typeof value === "string" ? value : inspect(value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    (typeof value === "object" || typeof value === "function") &&
    value !== null
  );
}

/**
 * Load, seed and invoke. Every failure is returned as a result, never thrown.
 */
export async function runCheck(argv: string[]): Promise<ResultMessage> {
  if (argv.length < 5) {
    return {
      ok: false,
      message: RunnerMessages.BAD_ARGUMENTS,
      detail: `Expected 5 arguments (module, test, seed, logical name, entry point), got ${argv.length}`,
    };
  }

  const [modulePath, testPath, seedArg, logicalName, entryPoint] = argv;
  const seed = Number(seedArg);
  if (!Number.isInteger(seed)) {
    return {
      ok: false,
      message: RunnerMessages.BAD_ARGUMENTS,
      detail: `Seed must be an integer, got ${JSON.stringify(seedArg)}`,
    };
  }

  if (!fs.existsSync(modulePath)) {
    return {
      ok: false,
      message: RunnerMessages.SUBMISSION_NOT_FOUND,
      detail: `Path does not exist: ${modulePath}`,
    };
  }
  if (!fs.existsSync(testPath)) {
    return {
      ok: false,
      message: RunnerMessages.TEST_NOT_FOUND,
      detail: `Path does not exist: ${testPath}`,
    };
  }

  // Loading through the logical name caches the module, so the test's own
  // require of the same name gets this instance.
  try {
    bindLogicalName(logicalName, modulePath);
    require(logicalName);
  } catch (error) {
    return {
      ok: false,
      message: RunnerMessages.SUBMISSION_LOAD_FAILED,
      detail: describeFault(error),
    };
  }

  const testName = path.basename(testPath, path.extname(testPath));
  let testModule: unknown;
  try {
    testModule = require(path.resolve(testPath));
  } catch (error) {
    return {
      ok: false,
      message: RunnerMessages.TEST_LOAD_FAILED,
      detail: describeFault(error),
    };
  }

  const entry = isRecord(testModule) ? testModule[entryPoint] : undefined;
  if (typeof entry !== "function") {
    return {
      ok: false,
      message: RunnerMessages.ENTRY_POINT_NOT_FOUND,
      detail: `${testName} does not export a function named "${entryPoint}"`,
    };
  }

  Math.random = createSeededRandom(seed);

  try {
    const outcome: unknown = await entry();
    if (!Array.isArray(outcome) || outcome.length !== 2) {
      throw new TypeError(
        `${testName}.${entryPoint}() must return [passed, message], got ${inspect(outcome)}`
      );
    }
    const passed: unknown = outcome[0];
    const message: unknown = outcome[1];
    return { ok: Boolean(passed), message: toText(message) };
  } catch (error) {
    return {
      ok: false,
      message: RunnerMessages.TEST_EXCEPTION,
      detail: describeFault(error),
    };
  }
}

/**
 * Redirect untrusted stdout writes to stderr and report once, however the
 * check ends.
 */
export function main(argv: string[]): void {
  const writeResult = process.stdout.write.bind(process.stdout);
  process.stdout.write = process.stderr.write.bind(process.stderr);

  let emitted = false;
  const emit = (result: ResultMessage): void => {
    if (emitted) return;
    emitted = true;
    writeResult(encodeResultMessage(result), () => process.exit(0));
  };

  process.on("uncaughtException", (error) => {
    emit({
      ok: false,
      message: RunnerMessages.TEST_EXCEPTION,
      detail: describeFault(error),
    });
  });

  // The loop drained while the entry point's promise was still pending
  process.on("beforeExit", () => {
    emit({
      ok: false,
      message: RunnerMessages.NEVER_SETTLED,
      detail: "The event loop emptied before the test returned a result",
    });
  });

  runCheck(argv)
    .then(emit)
    .catch((error: unknown) => {
      emit({
        ok: false,
        message: RunnerMessages.TEST_EXCEPTION,
        detail: describeFault(error),
      });
    });
}

if (require.main === module) {
  main(process.argv.slice(2));
}
