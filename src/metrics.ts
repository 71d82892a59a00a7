import fs from "node:fs/promises";
import path from "node:path";
import { Counter, Histogram, Registry, collectDefaultMetrics } from "prom-client";
import type { AnalysisTaskStatus, CompletionOutcome, JobStatus } from "./types/job";

export const metricsRegistry = new Registry();
collectDefaultMetrics({ register: metricsRegistry });

export const statusUpdatesCounter = new Counter({
  name: "job_runner_status_updates_total",
  help: "Status updates sent to the backend, by status and delivery result",
  labelNames: ["status", "result"],
  registers: [metricsRegistry],
});

export const watcherErrorsCounter = new Counter({
  name: "job_runner_watcher_errors_total",
  help: "Output watcher iteration failures by stage",
  labelNames: ["stage"],
  registers: [metricsRegistry],
});

export const analysisTasksCounter = new Counter({
  name: "job_runner_analysis_tasks_total",
  help: "Analysis tasks attempted, by task and status",
  labelNames: ["task", "status"],
  registers: [metricsRegistry],
});

export const analysisTaskDurationHistogram = new Histogram({
  name: "job_runner_analysis_task_duration_seconds",
  help: "Wall time spent in each analysis task",
  buckets: [0.05, 0.1, 0.5, 1, 5, 15, 60],
  labelNames: ["task"],
  registers: [metricsRegistry],
});

export const jobsCounter = new Counter({
  name: "job_runner_jobs_total",
  help: "Supervised jobs by completion outcome",
  labelNames: ["outcome"],
  registers: [metricsRegistry],
});

export function recordStatusUpdate(status: JobStatus, delivered: boolean) {
  statusUpdatesCounter.labels(status, delivered ? "delivered" : "dropped").inc();
}

export function recordWatcherError(stage: "stat" | "report") {
  watcherErrorsCounter.labels(stage).inc();
}

export function recordAnalysisTask(task: string, status: AnalysisTaskStatus, durationMs: number) {
  analysisTasksCounter.labels(task, status).inc();
  analysisTaskDurationHistogram.labels(task).observe(durationMs / 1000);
}

export function recordJobOutcome(outcome: CompletionOutcome) {
  jobsCounter.labels(outcome).inc();
}

export async function writeMetricsFile(filePath: string) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, await metricsRegistry.metrics(), "utf8");
}
