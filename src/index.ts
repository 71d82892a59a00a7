#!/usr/bin/env node
import { runAnalysis } from "./analysis/dispatcher";
import { buildJobDescriptor, config, configWarnings } from "./config";
import { logger } from "./logger";
import { writeMetricsFile } from "./metrics";
import { detectCompletion } from "./services/completionDetector";
import { runComputation } from "./services/computation";
import { JobSupervisor } from "./services/jobSupervisor";
import { sendStatusUpdate } from "./services/statusReporter";

async function main() {
  for (const warning of configWarnings) {
    logger.warn({ configuration: true }, warning);
  }

  const descriptor = buildJobDescriptor(config);
  const supervisor = new JobSupervisor({
    computation: (projectType) =>
      runComputation(projectType, { command: config.solver.command, workDir: descriptor.workDir }),
    reporter: sendStatusUpdate,
    detectCompletion,
    runAnalysis,
    gracePeriodMs: config.supervisor.gracePeriodMs,
    reportIntervalMs: config.watcher.intervalMs,
  });

  const outcome = await supervisor.run(descriptor);

  if (config.metricsFile) {
    try {
      await writeMetricsFile(config.metricsFile);
    } catch (err) {
      logger.error({ err, path: config.metricsFile }, "Failed to write metrics file");
    }
  }
  return outcome;
}

main()
  .then((outcome) => {
    logger.info({ outcome: outcome.completion.outcome, reason: outcome.completion.reason }, "Runner finished");
  })
  .catch((err) => {
    logger.error({ err }, "Runner failed unexpectedly");
  })
  .finally(() => {
    process.exitCode = 0;
  });
