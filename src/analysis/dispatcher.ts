import path from "node:path";
import { logger } from "../logger";
import { recordAnalysisTask } from "../metrics";
import type { AnalysisTask, AnalysisTaskReport, ProjectType } from "../types/job";
import { bandStructureTask } from "./bandStructure";
import { dosTask } from "./dos";
import { generalInfoTask } from "./generalInfo";
import { potentialGridTask, rhoGridTask } from "./grid";
import { fileExists } from "./io";
import { pdosTask } from "./pdos";
import { trajectoryTask } from "./trajectory";

// Order matters: the grid tasks read general_info.json.
export const ANALYSIS_TASKS: Record<ProjectType, readonly AnalysisTask[]> = {
  single_point: [generalInfoTask, bandStructureTask, dosTask, rhoGridTask, potentialGridTask, pdosTask],
  geometry_optimization: [trajectoryTask],
  md: [],
};

async function missingInputs(task: AnalysisTask, workDir: string) {
  const missing: string[] = [];
  for (const input of task.requiredInputs) {
    if (!(await fileExists(path.join(workDir, input)))) {
      missing.push(input);
    }
  }
  return missing;
}

async function runTask(task: AnalysisTask, projectType: ProjectType, workDir: string): Promise<AnalysisTaskReport> {
  const started = Date.now();
  const finish = (report: Omit<AnalysisTaskReport, "name" | "durationMs">): AnalysisTaskReport => {
    const durationMs = Date.now() - started;
    recordAnalysisTask(task.name, report.status, durationMs);
    return { name: task.name, ...report, durationMs };
  };

  try {
    const missing = await missingInputs(task, workDir);
    if (missing.length) {
      const error = `missing input ${missing.join(", ")}`;
      logger.error({ task: task.name, workDir, missing }, "Analysis task inputs missing");
      return finish({ status: "failed", error });
    }
    const artifact = await task.run({ workDir, projectType });
    if (artifact === null) {
      logger.info({ task: task.name }, "Analysis task skipped");
      return finish({ status: "skipped" });
    }
    logger.info({ task: task.name, artifact }, "Analysis task completed");
    return finish({ status: "completed", artifact });
  } catch (err) {
    logger.error({ err, task: task.name, workDir }, "Analysis task failed");
    return finish({ status: "failed", error: err instanceof Error ? err.message : String(err) });
  }
}

/**
 * Runs every analysis task for the project type in order. A failing task is
 * logged and reported; later tasks still run. Never throws.
 */
export async function runAnalysis(
  projectType: ProjectType,
  workDir: string,
  tasks: readonly AnalysisTask[] = ANALYSIS_TASKS[projectType],
): Promise<AnalysisTaskReport[]> {
  logger.info({ projectType, tasks: tasks.map((task) => task.name) }, "Starting analysis");
  const reports: AnalysisTaskReport[] = [];
  for (const task of tasks) {
    reports.push(await runTask(task, projectType, workDir));
  }
  const failed = reports.filter((report) => report.status === "failed").map((report) => report.name);
  logger.info({ projectType, total: reports.length, failed }, "Analysis finished");
  return reports;
}

export type AnalysisDispatcher = (projectType: ProjectType, workDir: string) => Promise<AnalysisTaskReport[]>;
