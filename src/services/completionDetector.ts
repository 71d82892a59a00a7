import fs from "node:fs/promises";
import path from "node:path";
import { COMPLETION_SENTINEL, artifacts } from "../constants";
import { logger } from "../logger";
import type { CompletionResult, ProjectType } from "../types/job";

type CompletionPolicy = (outputPath: string, workDir: string) => Promise<CompletionResult>;

function success(reason: string): CompletionResult {
  return { outcome: "SUCCESS", reason };
}

function failure(reason: string): CompletionResult {
  return { outcome: "FAILURE", reason };
}

function describeError(error: unknown) {
  if (error instanceof Error && "code" in error && error.code === "ENOENT") {
    return "file not found";
  }
  return error instanceof Error ? error.message : String(error);
}

export function lastNonEmptyLine(text: string): string | null {
  const lines = text.split(/\r?\n/).filter((line) => line.length > 0);
  return lines.length ? lines[lines.length - 1] : null;
}

async function textSentinelPolicy(outputPath: string): Promise<CompletionResult> {
  let text: string;
  try {
    text = await fs.readFile(outputPath, "utf8");
  } catch (error) {
    return failure(`Cannot read ${outputPath}: ${describeError(error)}`);
  }
  const last = lastNonEmptyLine(text);
  if (last === null) {
    return failure(`${outputPath} is empty`);
  }
  if (last !== COMPLETION_SENTINEL) {
    return failure(`Last line of ${outputPath} is ${JSON.stringify(last)}, expected "${COMPLETION_SENTINEL}"`);
  }
  return success(`${outputPath} ends with "${COMPLETION_SENTINEL}"`);
}

// Existence and size only; the trajectory has no completion marker.
async function trajectoryPolicy(_outputPath: string, workDir: string): Promise<CompletionResult> {
  const trajectoryPath = path.join(workDir, artifacts.trajectory);
  try {
    const stats = await fs.stat(trajectoryPath);
    if (stats.size > 0) {
      return success(`${trajectoryPath} has ${stats.size} bytes`);
    }
    return failure(`${trajectoryPath} is empty`);
  } catch (error) {
    return failure(`Cannot stat ${trajectoryPath}: ${describeError(error)}`);
  }
}

const POLICIES: Record<ProjectType, CompletionPolicy> = {
  single_point: textSentinelPolicy,
  md: textSentinelPolicy,
  geometry_optimization: trajectoryPolicy,
};

export async function detectCompletion(
  projectType: ProjectType,
  outputPath: string,
  workDir: string,
): Promise<CompletionResult> {
  let result: CompletionResult;
  try {
    result = await POLICIES[projectType](outputPath, workDir);
  } catch (error) {
    result = failure(`Completion check crashed: ${describeError(error)}`);
  }
  if (result.outcome === "FAILURE") {
    logger.warn({ projectType, path: outputPath, reason: result.reason }, "Job did not complete");
  } else {
    logger.info({ projectType, reason: result.reason }, "Job completion detected");
  }
  return result;
}

export type CompletionDetector = typeof detectCompletion;
