import * as path from "path";
import { execFile } from "child_process";
import { promisify } from "util";
import { SupervisorMessages } from "../constants";
import {
  ExecutionRequest,
  ResultRecord,
  SandboxOptions,
  TestExecutor,
} from "../types";
import { parseResultMessage } from "./result-protocol";

const execFileAsync = promisify(execFile);

// Resolves to the .ts source under tsx and to the compiled .js under dist/
const RUNNER_PATH = path.join(
  __dirname,
  `sandbox-runner${path.extname(__filename)}`
);

const MAX_BUFFER_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

/**
 * Shape of the error promisified execFile rejects with
 */
interface ChildProcessFailure extends Error {
  code?: number | string | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
  stdout?: unknown;
  stderr?: unknown;
}

function isChildProcessFailure(error: unknown): error is ChildProcessFailure {
  return error instanceof Error;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.stack ?? error.message;
  }
  return String(error);
}

function formatSeconds(ms: number): string {
  return `${Number((ms / 1000).toFixed(3))}s`;
}

function exitSuffix(
  exitCode: number | undefined,
  signal: NodeJS.Signals | null
): string {
  if (exitCode !== undefined && exitCode !== 0) {
    return ` (runner exited with code ${exitCode})`;
  }
  if (signal) {
    return ` (runner terminated by ${signal})`;
  }
  return "";
}

/**
 * Turn whatever a finished runner printed into a result record.
 * A parsed result wins over the exit status; the status is only appended.
 */
export function interpretRunnerOutput(
  stdout: string,
  stderr: string,
  exitCode: number | undefined,
  signal: NodeJS.Signals | null
): ResultRecord {
  const stderrText = stderr.trim() === "" ? undefined : stderr;
  const parsed = parseResultMessage(stdout);

  if (!parsed.valid) {
    const message =
      stdout.trim() === ""
        ? SupervisorMessages.NO_RESULT
        : SupervisorMessages.INVALID_OUTPUT;
    return {
      ok: false,
      message: message + exitSuffix(exitCode, signal),
      detail: `${parsed.reason}\nSTDOUT:\n${stdout}\nSTDERR:\n${stderr}`,
      stderr: stderrText,
      exitCode,
      timedOut: false,
    };
  }

  return {
    ok: parsed.result.ok,
    message: parsed.result.message + exitSuffix(exitCode, signal),
    detail: parsed.result.detail,
    stderr: stderrText,
    exitCode,
    timedOut: false,
  };
}

/**
 * Launches one runner process per execution request, enforces the timeout
 * and converts every outcome into a ResultRecord. execute() never rejects.
 */
export class ProcessSupervisor implements TestExecutor {
  private readonly loaderPath: string;

  constructor(private readonly options: SandboxOptions) {
    this.loaderPath = require.resolve("tsx/cjs");
  }

  async execute(request: ExecutionRequest): Promise<ResultRecord> {
    try {
      const { stdout, stderr } = await execFileAsync(
        this.options.nodeExecutable ?? process.execPath,
        this.buildArgs(request),
        {
          encoding: "utf8",
          env: this.buildEnv(),
          timeout: request.timeoutMs,
          killSignal: "SIGKILL",
          maxBuffer: this.options.maxOutputBytes,
          windowsHide: true,
        }
      );

      return interpretRunnerOutput(stdout, stderr, 0, null);
    } catch (error) {
      return this.interpretFailure(error, request);
    }
  }

  private buildArgs(request: ExecutionRequest): string[] {
    return [
      "--require",
      this.loaderPath,
      RUNNER_PATH,
      path.resolve(request.modulePath),
      path.resolve(request.testCase.sourcePath),
      String(request.seed),
      this.options.logicalName,
      this.options.entryPoint,
    ];
  }

  private buildEnv(): NodeJS.ProcessEnv {
    const searchPath = this.options.supportPaths
      .map((dir) => path.resolve(dir))
      .join(path.delimiter);
    return { ...process.env, NODE_PATH: searchPath };
  }

  private interpretFailure(
    error: unknown,
    request: ExecutionRequest
  ): ResultRecord {
    if (!isChildProcessFailure(error)) {
      return {
        ok: false,
        message: SupervisorMessages.LAUNCH_FAILED,
        detail: describeError(error),
        timedOut: false,
      };
    }

    const stdout = typeof error.stdout === "string" ? error.stdout : "";
    const stderr = typeof error.stderr === "string" ? error.stderr : "";
    const stderrText = stderr.trim() === "" ? undefined : stderr;

    if (error.code === MAX_BUFFER_CODE) {
      return {
        ok: false,
        message: `runner output exceeded ${this.options.maxOutputBytes} bytes`,
        detail: `STDOUT:\n${stdout}\nSTDERR:\n${stderr}`,
        stderr: stderrText,
        timedOut: false,
      };
    }

    if (error.killed) {
      return {
        ok: false,
        message: `timed out after ${formatSeconds(request.timeoutMs)}`,
        stderr: stderrText,
        timedOut: true,
      };
    }

    if (typeof error.code === "number") {
      return interpretRunnerOutput(
        stdout,
        stderr,
        error.code,
        error.signal ?? null
      );
    }

    if (error.signal) {
      return interpretRunnerOutput(stdout, stderr, undefined, error.signal);
    }

    // spawn errors (ENOENT, EACCES, ...)
    return {
      ok: false,
      message: SupervisorMessages.LAUNCH_FAILED,
      detail: describeError(error),
      stderr: stderrText,
      timedOut: false,
    };
  }
}
