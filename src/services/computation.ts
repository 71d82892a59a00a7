import { spawn } from "node:child_process";
import { logger } from "../logger";
import type { ComputationResult, ProjectType } from "../types/job";

export interface ComputationOptions {
  command: readonly string[];
  workDir: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Runs the solver as a child process in the job directory and resolves once
 * it closes. There is no deadline.
 */
export function runComputation(projectType: ProjectType, opts: ComputationOptions): Promise<ComputationResult> {
  const [executable, ...args] = opts.command;
  if (!executable) {
    return Promise.reject(new Error("Solver command is empty"));
  }
  const fullArgs = [...args, projectType];

  return new Promise((resolve, reject) => {
    logger.info({ cmd: executable, args: fullArgs, cwd: opts.workDir }, "Starting computation");
    const proc = spawn(executable, fullArgs, {
      cwd: opts.workDir,
      env: { ...(opts.env ?? process.env), PROJECT_TYPE: projectType },
      stdio: ["ignore", "inherit", "inherit"],
    });

    proc.on("error", (err) => {
      logger.error({ err, cmd: executable }, "Computation could not be started");
      reject(err);
    });

    proc.on("close", (exitCode, signal) => {
      logger.info({ exitCode, signal }, "Computation exited");
      resolve({ exitCode, signal });
    });
  });
}

export type ComputationRunner = (projectType: ProjectType) => Promise<ComputationResult>;
