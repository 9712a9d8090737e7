#!/usr/bin/env node
import { loadConfig, USAGE, validateConfig } from "./config";
import { MAX_RUNNER_OUTPUT_BYTES } from "./constants";
import { saveResultsCsv, saveSummaryCsv } from "./reporters/csv-reporter";
import {
  generateGradingReport,
  printGradingSummary,
  saveGradingReport,
} from "./reporters/report-generator";
import { gradeSubmissions } from "./services/grading-loop";
import { ProcessSupervisor } from "./services/process-supervisor";
import { locateSubmissions } from "./services/submission-locator";
import { discoverTestCases } from "./services/test-discovery";
import { GraderConfig, GradingReport } from "./types";
import { hasFlag } from "./utils/cli-args";
import { ConfigurationError } from "./utils/errors";
import { GradingLogger } from "./utils/logger";

/**
 * Grade every submission against every test case and write the reports.
 * Throws ConfigurationError before any grading when setup is broken.
 */
export async function runGrader(
  config: GraderConfig,
  logger: GradingLogger
): Promise<GradingReport> {
  const startTime = Date.now();

  const warnings = await validateConfig(config);
  for (const warning of warnings) {
    logger.warn(`WARN: ${warning}`);
  }

  const testCases = await discoverTestCases(config.testsDir);
  logger.log(
    `Found ${testCases.length} test(s): ${testCases
      .map((t) => t.name)
      .join(", ")}`
  );

  const targets = await locateSubmissions(
    config.submissionsDir,
    config.targetFilename,
    { onlyStudents: config.studentFilter, log: logger }
  );
  logger.log(`Found ${targets.length} student submission folder(s)`);

  const supervisor = new ProcessSupervisor({
    logicalName: config.logicalName,
    entryPoint: config.entryPoint,
    supportPaths: config.supportDirs,
    maxOutputBytes: MAX_RUNNER_OUTPUT_BYTES,
  });

  const aggregator = await gradeSubmissions(
    targets,
    testCases,
    supervisor,
    {
      baseSeed: config.baseSeed,
      timeoutMs: config.timeoutSeconds * 1000,
      targetFilename: config.targetFilename,
      submissionsDir: config.submissionsDir,
    },
    logger
  );

  const report = generateGradingReport(aggregator, Date.now() - startTime);

  await saveResultsCsv(aggregator.getOutcomes(), config.resultsCsv);
  await saveSummaryCsv(report.students, config.summaryCsv);
  logger.log(`✅ Results:  ${config.resultsCsv}`);
  logger.log(`✅ Summary:  ${config.summaryCsv}`);
  if (config.reportJson) {
    await saveGradingReport(report, config.reportJson);
    logger.log(`✅ Report:   ${config.reportJson}`);
  }
  logger.log(`✅ Log file: ${config.logFile}`);

  printGradingSummary(report, (line) => logger.log(line));
  return report;
}

/**
 * Command-line entry point
 * @returns Process exit code
 */
export async function main(args: string[]): Promise<number> {
  if (hasFlag(args, "help")) {
    console.log(USAGE);
    return 0;
  }

  let config: GraderConfig;
  try {
    config = loadConfig(args);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`ERROR: ${error.message}\n\n${USAGE}`);
      return 1;
    }
    throw error;
  }

  const logger = new GradingLogger(config.logFile);
  logger.start();
  try {
    await runGrader(config, logger);
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error(`ERROR: ${error.message}`);
      return 1;
    }
    throw error;
  } finally {
    logger.close();
  }
}

// Run the grader if this file is executed directly
if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      console.error("Error running grader:", error);
      process.exit(1);
    });
}
